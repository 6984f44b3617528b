import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { InmetClient } from "../external-apis/inmet/inmet.client";
import { parseHumidityByDate } from "../external-apis/inmet/inmet-response.parser";
import { HumidityByDate } from "../external-apis/inmet/inmet.types";
import { Municipality } from "../municipalities/municipality.types";
import { HumidityRecord } from "./humidity.types";
import { getHumidityConfig } from "../config/humidity.config";

export interface CollectOptions {
  /** Concurrent requests (defaults to MAX_WORKERS) */
  workers?: number;
  /** Rows between cooperative pauses */
  pauseEvery?: number;
  pauseMs?: number;
}

const DEFAULT_PAUSE_EVERY = 1000;
const DEFAULT_PAUSE_MS = 200;
const PROGRESS_EVERY = 1000;

/**
 * Forecast Collector
 *
 * Fetches the INMET forecast for every municipality through a fixed pool of
 * workers and flattens it into one row per municipality and target date.
 *
 * - Each municipality always yields exactly one row per target date; days the
 *   forecast lacks (or a failed request) get `humidityMin: null`
 * - One municipality failing never affects the others
 * - Workers pause for 200ms every 1000 rows
 */
@Injectable()
export class ForecastCollectorService {
  private readonly logger = new Logger(ForecastCollectorService.name);

  constructor(
    private readonly inmetClient: InmetClient,
    private readonly configService: ConfigService,
  ) {}

  async collect(
    municipalities: readonly Municipality[],
    targetDates: readonly string[],
    options: CollectOptions = {},
  ): Promise<HumidityRecord[]> {
    const workers = Math.max(
      1,
      Math.min(
        options.workers ?? getHumidityConfig(this.configService).maxWorkers,
        municipalities.length,
      ),
    );
    const pauseEvery = options.pauseEvery ?? DEFAULT_PAUSE_EVERY;
    const pauseMs = options.pauseMs ?? DEFAULT_PAUSE_MS;
    const total = municipalities.length;

    this.logger.log(
      `🌡️  Collecting humidity forecast for ${total} municipalities (${workers} workers, ${targetDates.join(", ")})`,
    );

    const rows: HumidityRecord[] = [];
    let cursor = 0;
    let completed = 0;
    let failed = 0;

    const worker = async (): Promise<void> => {
      while (cursor < total) {
        const municipality = municipalities[cursor++];
        const byDate = await this.fetchHumidityByDate(municipality.code);
        if (byDate.size === 0) failed++;

        for (const date of targetDates) {
          rows.push({
            code: municipality.code,
            name: municipality.name,
            state: municipality.state,
            latitude: municipality.latitude,
            longitude: municipality.longitude,
            date,
            humidityMin: byDate.get(date) ?? null,
            humidityMax: null,
          });
        }

        completed++;
        if (completed % PROGRESS_EVERY === 0 || completed === total) {
          const percent = Math.round((completed / total) * 100);
          this.logger.log(
            `Humidity collection progress: ${completed}/${total} (${percent}%)`,
          );
        }

        if (pauseMs > 0 && rows.length % pauseEvery === 0) {
          await new Promise((resolve) => setTimeout(resolve, pauseMs));
        }
      }
    };

    await Promise.all(Array.from({ length: workers }, () => worker()));

    const known = rows.filter((row) => row.humidityMin !== null).length;
    if (known === 0) {
      this.logger.warn(
        "⚠️  No humidity values in the INMET responses; keeping unknown values (force a refresh once the service is back)",
      );
    } else {
      this.logger.log(
        `✅ Humidity collection complete: ${known}/${rows.length} values, ${failed} municipalities without data`,
      );
    }

    return rows;
  }

  /**
   * Fetch and parse one municipality. Never rejects.
   */
  private async fetchHumidityByDate(code: string): Promise<HumidityByDate> {
    try {
      const body = await this.inmetClient.getForecast(code);
      return body === null ? new Map() : parseHumidityByDate(code, body);
    } catch (error: unknown) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      this.logger.debug(`Forecast for ${code} failed: ${errorMessage}`);
      return new Map();
    }
  }
}
