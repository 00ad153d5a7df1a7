import { inspect } from "node:util";

export function formatError(error: unknown): string {
  if (!(error instanceof Error)) {
    return inspect(error, { depth: 4 });
  }

  const details = error.stack ?? error.message;
  return error.cause === undefined ? details : `${details}\nCaused by: ${formatError(error.cause)}`;
}
