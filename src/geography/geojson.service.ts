import { Injectable, Logger, OnModuleInit } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import * as fs from "fs/promises";
import { getHumidityConfig } from "../config/humidity.config";
import { isPlainObject } from "../common/utils/value.util";

export interface GeoJsonFeature {
  type: string;
  properties: Record<string, unknown>;
  geometry: unknown;
  [member: string]: unknown;
}

export interface GeoJsonFeatureCollection {
  type: string;
  features: GeoJsonFeature[];
  [member: string]: unknown;
}

/** Property names used for the IBGE code by the usual municipal meshes */
export const CODE_PROPERTY_CANDIDATES = [
  "CD_MUN",
  "CD_GEOCMU",
  "CD_GEOCODI",
  "CD_MUNIC",
  "CD_IBGE",
  "GEOCODIGO",
  "GEOCODE",
  "GEOCOD_M",
  "codigo_ibge",
];

function digitsOf(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value).replace(/\D/g, "");
}

/**
 * Find the 7-digit IBGE code in a feature's properties.
 *
 * Known property names are tried first, then any property whose digits form
 * a 6 or 7 digit number.
 */
export function guessMunicipalityCode(
  properties: Record<string, unknown>,
): string | null {
  const candidates = [
    ...CODE_PROPERTY_CANDIDATES.filter((key) => key in properties).map(
      (key) => properties[key],
    ),
    ...Object.values(properties),
  ];

  for (const value of candidates) {
    const digits = digitsOf(value);
    if (digits.length >= 6 && digits.length <= 7) {
      return digits.padStart(7, "0");
    }
  }
  return null;
}

/**
 * Parse a GeoJSON document and write the normalised code to
 * `properties.CD_MUN` of every feature.
 */
export function normalizeGeoJson(document: unknown): GeoJsonFeatureCollection {
  if (!isPlainObject(document)) {
    throw new Error("GeoJSON root is not an object");
  }

  const rawFeatures: unknown[] = Array.isArray(document.features)
    ? document.features
    : [];
  const features: GeoJsonFeature[] = rawFeatures
    .filter(isPlainObject)
    .map((feature) => {
      const properties: Record<string, unknown> = isPlainObject(
        feature.properties,
      )
        ? { ...feature.properties }
        : {};
      properties.CD_MUN =
        guessMunicipalityCode(properties) ??
        digitsOf(properties.CD_MUN).padStart(7, "0");

      return {
        ...feature,
        type: typeof feature.type === "string" ? feature.type : "Feature",
        properties,
        geometry: feature.geometry ?? null,
      };
    });

  return {
    ...document,
    type: typeof document.type === "string" ? document.type : "FeatureCollection",
    features,
  };
}

/**
 * GeoJSON Service
 *
 * Loads the municipal boundary overlay once at startup. Without an overlay
 * the dashboard draws point markers from the reference coordinates, so a
 * missing or broken file is only logged.
 */
@Injectable()
export class GeoJsonService implements OnModuleInit {
  private readonly logger = new Logger(GeoJsonService.name);
  private overlay: GeoJsonFeatureCollection | null = null;

  constructor(private readonly configService: ConfigService) {}

  async onModuleInit(): Promise<void> {
    await this.reload();
  }

  async reload(): Promise<void> {
    const { geojsonPath } = getHumidityConfig(this.configService);

    try {
      const content = await fs.readFile(geojsonPath, "utf-8");
      this.overlay = normalizeGeoJson(JSON.parse(content));
      this.logger.log(
        `✅ Loaded ${this.overlay.features.length} boundary features from ${geojsonPath}`,
      );
    } catch (error: unknown) {
      this.overlay = null;
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `GeoJSON overlay not available (${geojsonPath}): ${errorMessage}. Falling back to point markers.`,
      );
    }
  }

  getOverlay(): GeoJsonFeatureCollection | null {
    return this.overlay;
  }
}
