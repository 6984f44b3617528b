/**
 * A Brazilian municipality as read from the IBGE reference spreadsheet.
 */
export interface Municipality {
  /** IBGE code, 7 digits, zero-padded */
  code: string;
  name: string;
  /** UF abbreviation (e.g. "DF") */
  state: string;
  latitude: number;
  longitude: number;
}
