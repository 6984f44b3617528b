import { HumidityByDate, ShapeMatcher } from "./inmet.types";
import { parseCalendarDate } from "../../common/utils/date.util";
import { isPlainObject, toNullableNumber } from "../../common/utils/value.util";

/**
 * Field names the minimum relative humidity has been published under.
 * Checked in order; the first one holding a number wins.
 */
export const MIN_HUMIDITY_ALIASES = [
  "umidade_min",
  "ur_min",
  "umi_min",
  "umidadeMin",
  "UR_min",
] as const;

function readAlias(record: Record<string, unknown>): number | null {
  for (const alias of MIN_HUMIDITY_ALIASES) {
    if (alias in record) {
      const value = toNullableNumber(record[alias]);
      if (value !== null) return value;
    }
  }
  return null;
}

/**
 * Minimum humidity of one forecast day.
 *
 * 1. A top-level alias (`umidade_min`, `ur_min`, ...)
 * 2. The lowest alias value among period sub-records (`manha`, `tarde`, `noite`)
 * 3. The minimum of the first list of numeric-looking values (hourly readings).
 *    This is a heuristic and may pick up an unrelated series.
 */
export function extractMinimumHumidity(record: unknown): number | null {
  if (!isPlainObject(record)) {
    return null;
  }

  const direct = readAlias(record);
  if (direct !== null) {
    return direct;
  }

  const periodValues = Object.values(record)
    .filter(isPlainObject)
    .map(readAlias)
    .filter((value): value is number => value !== null);
  if (periodValues.length > 0) {
    return Math.min(...periodValues);
  }

  for (const value of Object.values(record)) {
    if (!Array.isArray(value) || value.length === 0) continue;
    const first: unknown = value[0];
    if (typeof first !== "number" && typeof first !== "string") continue;

    const readings = value
      .map((reading: unknown) => toNullableNumber(reading))
      .filter((reading): reading is number => reading !== null);
    if (readings.length > 0) {
      return Math.min(...readings);
    }
  }

  return null;
}

function parseDatedRecords(records: Record<string, unknown>): HumidityByDate {
  const byDate: HumidityByDate = new Map();
  for (const [key, record] of Object.entries(records)) {
    const date = parseCalendarDate(key);
    if (date === null) continue;
    byDate.set(date, extractMinimumHumidity(record));
  }
  return byDate;
}

/**
 * `{ "<ibge>": { "<date>": {...}, ... } }`
 */
export const keyedByMunicipality: ShapeMatcher = {
  name: "keyed-by-municipality",
  match(code, body) {
    if (!isPlainObject(body)) return null;
    const nested = body[code];
    return isPlainObject(nested) ? parseDatedRecords(nested) : null;
  },
};

/**
 * `{ "<date>": {...}, ... }`
 */
export const keyedByDate: ShapeMatcher = {
  name: "keyed-by-date",
  match(_code, body) {
    return isPlainObject(body) ? parseDatedRecords(body) : null;
  },
};

export const SHAPE_MATCHERS: readonly ShapeMatcher[] = [
  keyedByMunicipality,
  keyedByDate,
];

/**
 * Interpret a decoded forecast body as minimum humidity per date.
 * Unknown layouts yield an empty map.
 */
export function parseHumidityByDate(
  code: string,
  body: unknown,
  matchers: readonly ShapeMatcher[] = SHAPE_MATCHERS,
): HumidityByDate {
  for (const matcher of matchers) {
    const result = matcher.match(code, body);
    if (result !== null) {
      return result;
    }
  }
  return new Map();
}
