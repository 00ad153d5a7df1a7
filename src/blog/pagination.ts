export const POSTS_PER_PAGE = 10;

export interface PageWindow {
  number: number;
  numPages: number;
  totalCount: number;
  limit: number;
  offset: number;
  previousPageNumber: number | null;
  nextPageNumber: number | null;
}

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

function lastValue(rawValue: unknown): unknown {
  return Array.isArray(rawValue) ? rawValue[rawValue.length - 1] : rawValue;
}

export function parsePageNumber(rawValue: unknown): number | undefined {
  const value = lastValue(rawValue);
  if (typeof value !== "string" || !INTEGER_PATTERN.test(value)) {
    return undefined;
  }

  return Number.parseInt(value.trim(), 10);
}

// Missing or malformed page numbers fall back to the first page; numbers outside
// the available range land on the last one.
export function resolvePageWindow(totalCount: number, rawPage: unknown, perPage = POSTS_PER_PAGE): PageWindow {
  const numPages = Math.max(1, Math.ceil(totalCount / perPage));
  const requested = parsePageNumber(rawPage);

  let number: number;
  if (requested === undefined) {
    number = 1;
  } else if (requested < 1 || requested > numPages) {
    number = numPages;
  } else {
    number = requested;
  }

  return {
    number,
    numPages,
    totalCount,
    limit: perPage,
    offset: (number - 1) * perPage,
    previousPageNumber: number > 1 ? number - 1 : null,
    nextPageNumber: number < numPages ? number + 1 : null
  };
}
