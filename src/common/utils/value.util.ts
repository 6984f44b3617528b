/**
 * Extracts the first run of digits from an IBGE municipality code and pads it
 * to the canonical 7 characters.
 *
 * @example
 * normalizeMunicipalityCode("5300108") // "5300108"
 * normalizeMunicipalityCode(110001) // "0110001"
 * normalizeMunicipalityCode("IBGE 530010-8") // "0530010"
 * normalizeMunicipalityCode("n/a") // null
 */
export function normalizeMunicipalityCode(value: unknown): string | null {
  if (typeof value !== "string" && typeof value !== "number") {
    return null;
  }
  const match = /\d+/.exec(String(value));
  return match ? match[0].padStart(7, "0") : null;
}

/**
 * Coerces a spreadsheet or JSON cell to a finite number.
 *
 * Numbers and numeric strings pass; everything else (blank cells, "n/d",
 * NaN, booleans) becomes null, which the dataset treats as "unknown".
 */
export function toNullableNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    const text = value.trim();
    if (text === "") {
      return null;
    }
    const parsed = Number(text);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
