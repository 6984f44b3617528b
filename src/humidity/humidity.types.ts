/**
 * One municipality on one forecast day, as stored in the daily dataset.
 *
 * `humidityMin` / `humidityMax` are relative humidity percentages; null means
 * the forecast did not provide a usable value for that day.
 */
export type HumidityRecord = {
  code: string;
  name: string;
  state: string;
  latitude: number | null;
  longitude: number | null;
  /** YYYY-MM-DD */
  date: string;
  humidityMin: number | null;
  humidityMax: number | null;
};

/**
 * A row of a collected table before sanitizing. Values may be of any type;
 * the sanitizer enforces the HumidityRecord schema.
 */
export type RawHumidityRow = Readonly<Record<string, unknown>>;

export type DatasetSource = "inmet" | "snapshot" | "demo";

/**
 * The dataset served for one operating-timezone day. Frozen once built and
 * shared by every reader.
 */
export interface HumidityDataset {
  /** Operating-timezone date the dataset was built for (YYYY-MM-DD) */
  key: string;
  generatedAt: string;
  source: DatasetSource;
  /** Distinct record dates, ascending */
  dates: readonly string[];
  /** Sorted by (code, date) */
  records: readonly HumidityRecord[];
}
