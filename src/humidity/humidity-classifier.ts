/**
 * Severity scale for the daily minimum relative humidity.
 *
 * Ranges as shown on the dashboard legend:
 *
 * | Class        | Minimum RH    |
 * |--------------|---------------|
 * | Ideal        | > 60%         |
 * | Quase ideal  | 41–60%        |
 * | Observação   | 30–40%        |
 * | Atenção      | 20–29%        |
 * | Alerta       | 12–19%        |
 * | Emergência   | < 12%         |
 *
 * The ranges are closed on whole percentages, so fractional values between
 * two classes (e.g. 40.5) are left unclassified.
 */

export type SeverityClassId =
  | "ideal"
  | "near-ideal"
  | "observation"
  | "attention"
  | "alert"
  | "emergency";

export interface SeverityClass {
  id: SeverityClassId;
  label: string;
  /** Fill colour on the map, chart and cards */
  color: string;
  /** Text colour readable on top of `color` */
  textColor: string;
  /** 0 = best, 5 = worst */
  rank: number;
}

export const UNKNOWN_COLOR = "#9CA3AF";

const CLASSES: SeverityClass[] = [
  { id: "ideal", label: "Ideal (>60%)", color: "#1E3A8A", textColor: "white", rank: 0 },
  { id: "near-ideal", label: "Quase ideal (41–60%)", color: "#60A5FA", textColor: "#0b0b0b", rank: 1 },
  { id: "observation", label: "Observação (30–40%)", color: "#FEF08A", textColor: "#0b0b0b", rank: 2 },
  { id: "attention", label: "Atenção (20–29%)", color: "#F59E0B", textColor: "white", rank: 3 },
  { id: "alert", label: "Caso de alerta (12–19%)", color: "#F87171", textColor: "white", rank: 4 },
  { id: "emergency", label: "Emergência (<12%)", color: "#B91C1C", textColor: "white", rank: 5 },
];

/** Ordered best to worst */
export const SEVERITY_CLASSES: readonly SeverityClass[] = Object.freeze(
  CLASSES.map((entry) => Object.freeze(entry)),
);

const byId = new Map<SeverityClassId, SeverityClass>(
  SEVERITY_CLASSES.map((entry) => [entry.id, entry]),
);

const SEVERITY_IDS: readonly string[] = SEVERITY_CLASSES.map((s) => s.id);

export function isSeverityClassId(value: string): value is SeverityClassId {
  return SEVERITY_IDS.includes(value);
}

export function findSeverityClass(id: string): SeverityClass | undefined {
  return isSeverityClassId(id) ? byId.get(id) : undefined;
}

function getSeverity(id: SeverityClassId): SeverityClass {
  const found = byId.get(id);
  if (!found) {
    throw new Error(`Unknown severity class: ${id}`);
  }
  return found;
}

/**
 * Classify a minimum relative humidity value.
 *
 * @returns The severity class, or undefined for unknown, negative or
 * in-between values
 */
export function classifyHumidity(
  value: number | null | undefined,
): SeverityClass | undefined {
  if (value === null || value === undefined || Number.isNaN(value)) {
    return undefined;
  }
  if (value > 60) return getSeverity("ideal");
  if (value >= 41 && value <= 60) return getSeverity("near-ideal");
  if (value >= 30 && value <= 40) return getSeverity("observation");
  if (value >= 20 && value <= 29) return getSeverity("attention");
  if (value >= 12 && value <= 19) return getSeverity("alert");
  if (value >= 0 && value < 12) return getSeverity("emergency");
  return undefined;
}
