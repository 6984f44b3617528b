import { addDays, format, isValid, parse, parseISO } from "date-fns";
import { formatInTimeZone } from "date-fns-tz";

/**
 * Number of forecast days kept per municipality (today + 4).
 */
export const FORECAST_DAYS = 5;

/**
 * Formats an instant as "YYYY-MM-DD" in the operating timezone.
 *
 * The daily cache key and the target dates of a collection run are both
 * derived from this, so a run started at 22:30 in Brasília still belongs to
 * the Brasília calendar day even though UTC has already rolled over.
 *
 * @example
 * // At 2024-01-02 01:30 UTC:
 * formatInOperatingTimezone(now, "America/Sao_Paulo") // "2024-01-01"
 * formatInOperatingTimezone(now, "UTC") // "2024-01-02"
 */
export function formatInOperatingTimezone(date: Date, timezone: string): string {
  return formatInTimeZone(date, timezone, "yyyy-MM-dd");
}

/**
 * Adds whole calendar days to a "YYYY-MM-DD" date.
 */
export function addCalendarDays(date: string, days: number): string {
  return format(addDays(parseISO(date), days), "yyyy-MM-dd");
}

/**
 * `days` consecutive calendar dates starting at `start` (inclusive). A
 * collection run asks for the range starting at the operating-timezone day.
 */
export function getDateRange(start: string, days: number): string[] {
  return Array.from({ length: days }, (_, offset) =>
    addCalendarDays(start, offset),
  );
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;
const BR_DATE = /^(\d{2})\/(\d{2})\/(\d{4})$/;

/**
 * Parses a calendar date written as "YYYY-MM-DD" (optionally followed by a
 * time part) or as "DD/MM/YYYY".
 *
 * @returns The date as "YYYY-MM-DD", or null when the text is not a real date
 */
export function parseCalendarDate(value: string): string | null {
  const text = value.trim();

  const iso = ISO_DATE.exec(text);
  if (iso) {
    return toValidDate(`${iso[1]}-${iso[2]}-${iso[3]}`);
  }

  const br = BR_DATE.exec(text);
  if (br) {
    return toValidDate(`${br[3]}-${br[2]}-${br[1]}`);
  }

  return null;
}

function toValidDate(candidate: string): string | null {
  const parsed = parse(candidate, "yyyy-MM-dd", new Date(2000, 0, 1));
  if (!isValid(parsed) || format(parsed, "yyyy-MM-dd") !== candidate) {
    return null;
  }
  return candidate;
}

/**
 * Short day label used by the dashboard ("DD/MM").
 */
export function formatDayLabel(date: string): string {
  const [, month, day] = date.split("-");
  return `${day}/${month}`;
}
