import { DateTime, IANAZone } from "luxon";

export const DATETIME_LOCAL_FORMAT = "yyyy-MM-dd'T'HH:mm";

// A calendar date and a time of day at minute precision, optionally followed by seconds and an offset.
const SUBMITTED_TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?(?:Z|[+-]\d{2}:?\d{2})?$/i;

export function isValidTimeZone(zone: string): boolean {
  return IANAZone.isValidZone(zone);
}

function parseSubmittedTimestamp(value: string, timeZone: string): DateTime {
  const iso = DateTime.fromISO(value, { zone: timeZone });
  if (iso.isValid) {
    return iso;
  }

  return DateTime.fromSQL(value, { zone: timeZone });
}

/**
 * Values without an offset are read as wall-clock time in `timeZone`; values
 * that carry one keep their instant. Returns a UTC ISO string, or null when the
 * input cannot be parsed.
 */
export function normalizePublicationTimestamp(rawValue: string, timeZone: string): string | null {
  const value = rawValue.trim();
  if (!SUBMITTED_TIMESTAMP_PATTERN.test(value)) {
    return null;
  }

  const parsed = parseSubmittedTimestamp(value, timeZone);
  if (!parsed.isValid) {
    return null;
  }

  return parsed.toJSDate().toISOString();
}

export function toDateTimeLocalValue(isoValue: string, timeZone: string): string {
  const parsed = DateTime.fromISO(isoValue, { zone: "utc" }).setZone(timeZone);
  return parsed.isValid ? parsed.toFormat(DATETIME_LOCAL_FORMAT) : "";
}

export function formatDisplayTimestamp(isoValue: string, timeZone: string): string {
  const parsed = DateTime.fromISO(isoValue, { zone: "utc" }).setZone(timeZone);
  return parsed.isValid ? parsed.setLocale("en-US").toFormat("LLL d, yyyy, HH:mm") : isoValue;
}
