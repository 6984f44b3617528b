import { RawHumidityRow } from "./humidity.types";
import { Municipality } from "../municipalities/municipality.types";

const DEMO_MUNICIPALITIES: readonly Municipality[] = [
  { code: "5300108", name: "Brasília", state: "DF", latitude: -15.78, longitude: -47.93 },
  { code: "3550308", name: "São Paulo", state: "SP", latitude: -23.55, longitude: -46.63 },
  { code: "3304557", name: "Rio de Janeiro", state: "RJ", latitude: -22.9, longitude: -43.17 },
];

const DEMO_HUMIDITY = [55, 35, 18, 62, 28];

/**
 * Placeholder table shown while the forecast service is unavailable:
 * three capitals with a fixed humidity pattern over the target dates.
 */
export function buildDemoRows(targetDates: readonly string[]): RawHumidityRow[] {
  return DEMO_MUNICIPALITIES.flatMap((municipality) =>
    targetDates.map((date, index) => ({
      ...municipality,
      date,
      humidityMin: DEMO_HUMIDITY[index % DEMO_HUMIDITY.length],
      humidityMax: null,
    })),
  );
}
