import { loadDatabaseConfig } from "../../src/config";
import { createDatabasePool } from "../../src/db/connection";
import { migrateDown, migrateUp } from "../../src/db/migrations";
import { formatError } from "./format-error";

type Command = { direction: "up" } | { direction: "down"; steps: number };

const USAGE = "Usage: tsx scripts/db/migrate.ts [up | down <positive-integer-steps>]";

function parseCommand(argv: string[]): Command {
  const [direction = "up", rawSteps] = argv.slice(2);

  if (direction === "up") {
    return { direction };
  }

  if (direction === "down") {
    const steps = rawSteps === undefined ? 1 : Number(rawSteps);
    if (!Number.isInteger(steps) || steps < 1) {
      throw new Error(USAGE);
    }
    return { direction, steps };
  }

  throw new Error(USAGE);
}

async function main() {
  const command = parseCommand(process.argv);
  const pool = createDatabasePool(loadDatabaseConfig());

  try {
    if (command.direction === "up") {
      const applied = await migrateUp(pool);
      console.info(applied.length === 0 ? "No pending migrations." : `Applied migrations: ${applied.join(", ")}`);
      return;
    }

    const rolledBack = await migrateDown(pool, command.steps);
    console.info(rolledBack.length === 0 ? "No migrations to roll back." : `Rolled back migrations: ${rolledBack.join(", ")}`);
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  console.error(`Migration failed:\n${formatError(error)}`);
  process.exitCode = 1;
});
