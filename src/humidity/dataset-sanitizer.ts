import { Logger } from "@nestjs/common";
import { HumidityRecord, RawHumidityRow } from "./humidity.types";
import { PipelineContractError } from "../common/errors/humidity-pipeline.error";
import {
  formatInOperatingTimezone,
  parseCalendarDate,
} from "../common/utils/date.util";
import {
  normalizeMunicipalityCode,
  toNullableNumber,
} from "../common/utils/value.util";
import { DEFAULT_OPERATING_TIMEZONE } from "../config/humidity.config";

const logger = new Logger("DatasetSanitizer");

export const REQUIRED_COLUMNS = [
  "code",
  "name",
  "state",
  "latitude",
  "longitude",
  "date",
  "humidityMin",
] as const;

export interface SanitizeOptions {
  /** Timezone used to turn Date instances into calendar dates */
  timeZone?: string;
}

function toCalendarDate(value: unknown, timeZone: string): string | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime())
      ? null
      : formatInOperatingTimezone(value, timeZone);
  }
  return typeof value === "string" ? parseCalendarDate(value) : null;
}

function toText(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
}

function compareRecords(a: HumidityRecord, b: HumidityRecord): number {
  if (a.code !== b.code) return a.code < b.code ? -1 : 1;
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  return 0;
}

/**
 * Enforce the dataset schema on a collected table.
 *
 * - Every row must carry the required columns, otherwise the whole table is
 *   rejected with a PipelineContractError
 * - `humidityMax` is optional and defaults to null
 * - Codes are re-normalised to 7 digits, dates to YYYY-MM-DD and numeric
 *   columns to number | null
 * - Rows whose code or date cannot be read are dropped
 * - Output is frozen and sorted by (code, date)
 *
 * Sanitizing an already sanitized table returns an equal table.
 */
export function sanitizeHumidityRows(
  rows: readonly RawHumidityRow[],
  options: SanitizeOptions = {},
): readonly HumidityRecord[] {
  const timeZone = options.timeZone ?? DEFAULT_OPERATING_TIMEZONE;

  const missing = new Set<string>();
  for (const row of rows) {
    for (const column of REQUIRED_COLUMNS) {
      if (!(column in row)) missing.add(column);
    }
  }
  if (missing.size > 0) {
    throw new PipelineContractError(
      REQUIRED_COLUMNS.filter((column) => missing.has(column)),
    );
  }

  const records: HumidityRecord[] = [];
  let dropped = 0;

  for (const row of rows) {
    const code = normalizeMunicipalityCode(row.code);
    const date = toCalendarDate(row.date, timeZone);
    if (code === null || date === null) {
      dropped++;
      continue;
    }

    records.push(
      Object.freeze({
        code,
        name: toText(row.name),
        state: toText(row.state),
        latitude: toNullableNumber(row.latitude),
        longitude: toNullableNumber(row.longitude),
        date,
        humidityMin: toNullableNumber(row.humidityMin),
        humidityMax: toNullableNumber(row.humidityMax),
      }),
    );
  }

  if (dropped > 0) {
    logger.warn(`Dropped ${dropped} rows without a valid code or date`);
  }

  records.sort(compareRecords);
  return Object.freeze(records);
}
