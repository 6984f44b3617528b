import { ConfigService } from "@nestjs/config";

export const DEFAULT_FORECAST_URL_TEMPLATE =
  "https://apiprevmet3.inmet.gov.br/previsao/{ibge}";
export const DEFAULT_OPERATING_TIMEZONE = "America/Sao_Paulo";

export interface HumidityConfig {
  municipalitiesPath: string;
  geojsonPath: string;
  forecastUrlTemplate: string;
  requestTimeoutMs: number;
  maxWorkers: number;
  refreshToken: string;
  maxMunicipalities: number; // 0 = all
  timeZone: string;
}

/**
 * Read the humidity pipeline settings from the environment.
 *
 * Every value is optional; numeric settings that are missing, non-numeric or
 * out of range fall back to their defaults, and so does a timezone the
 * runtime does not know.
 */
export const getHumidityConfig = (
  configService: ConfigService,
): HumidityConfig => {
  const read = (key: string): string | undefined => {
    const value = configService.get<string>(key);
    return value === undefined || value === "" ? undefined : String(value);
  };

  const timeoutSeconds = parsePositiveNumber(read("REQUEST_TIMEOUT"), 8);

  return {
    municipalitiesPath: read("ATTR_XLSX") ?? "arquivo_completo_brasil.xlsx",
    geojsonPath: read("GEOJSON_PATH") ?? "municipios_br.geojson",
    forecastUrlTemplate:
      read("INMET_FORECAST_URL_TEMPLATE") ?? DEFAULT_FORECAST_URL_TEMPLATE,
    requestTimeoutMs: Math.round(timeoutSeconds * 1000),
    maxWorkers: Math.floor(parsePositiveNumber(read("MAX_WORKERS"), 16)),
    refreshToken: read("REFRESH_TOKEN") ?? "",
    maxMunicipalities: Math.floor(parseNonNegativeNumber(read("MAX_MUN"), 0)),
    timeZone: parseTimeZone(read("OPERATING_TIMEZONE")),
  };
};

function parsePositiveNumber(value: string | undefined, fallback: number): number {
  const parsed = value === undefined ? NaN : Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseNonNegativeNumber(
  value: string | undefined,
  fallback: number,
): number {
  const parsed = value === undefined ? NaN : Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function parseTimeZone(value: string | undefined): string {
  if (value === undefined) {
    return DEFAULT_OPERATING_TIMEZONE;
  }
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return value;
  } catch {
    return DEFAULT_OPERATING_TIMEZONE;
  }
}
