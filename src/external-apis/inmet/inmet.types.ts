/**
 * Humidity per calendar date ("YYYY-MM-DD"); null means the day was present
 * but its minimum could not be read.
 */
export type HumidityByDate = Map<string, number | null>;

/**
 * A response layout recogniser. Returns null when the body does not have the
 * layout it understands.
 */
export interface ShapeMatcher {
  name: string;
  match(code: string, body: unknown): HumidityByDate | null;
}
