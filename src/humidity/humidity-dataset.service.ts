import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { Redis } from "ioredis";
import { REDIS_CLIENT } from "../common/redis/redis.module";
import { MunicipalityRegistry } from "../municipalities/municipality.registry";
import { ForecastCollectorService } from "./forecast-collector.service";
import { sanitizeHumidityRows } from "./dataset-sanitizer";
import { buildDemoRows } from "./demo-dataset";
import { CLOCK, Clock } from "./clock";
import {
  DatasetSource,
  HumidityDataset,
  HumidityRecord,
  RawHumidityRow,
} from "./humidity.types";
import { getHumidityConfig } from "../config/humidity.config";
import {
  FORECAST_DAYS,
  formatInOperatingTimezone,
  getDateRange,
} from "../common/utils/date.util";
import { isPlainObject } from "../common/utils/value.util";

interface CacheEntry {
  key: string;
  dataset: HumidityDataset;
}

export interface DatasetStatus {
  key: string | null;
  source: DatasetSource | null;
  generatedAt: string | null;
  records: number;
  knownValues: number;
  rebuilding: boolean;
}

export const SNAPSHOT_KEY_PREFIX = "humidity:dataset:";

function hasKnownValues(records: readonly HumidityRecord[]): boolean {
  return records.some((record) => record.humidityMin !== null);
}

/**
 * Humidity Dataset Service
 *
 * Owns the dataset for the current day in the operating timezone.
 *
 * - The first read of a day builds the dataset (Redis snapshot if one exists,
 *   otherwise a full INMET collection); later reads that day share it
 * - `force` always rebuilds from INMET
 * - Rebuilds run one at a time. Callers that find a stale key while a rebuild
 *   is running wait for it and reuse its result
 * - If the collection fails for any reason the demo dataset is served so the
 *   dashboard always has something to show
 * - The stored entry is swapped in a single assignment; readers see the old
 *   dataset or the new one, never a partial table
 */
@Injectable()
export class HumidityDatasetService {
  private readonly logger = new Logger(HumidityDatasetService.name);
  private readonly SNAPSHOT_TTL_SECONDS = 36 * 60 * 60; // 36 hours

  private entry: CacheEntry | null = null;
  private lock: Promise<unknown> = Promise.resolve();
  private pending = 0;

  constructor(
    private readonly registry: MunicipalityRegistry,
    private readonly collector: ForecastCollectorService,
    private readonly configService: ConfigService,
    @Inject(REDIS_CLIENT) private readonly redis: Redis,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Cache key for "now": the operating-timezone date as YYYY-MM-DD.
   */
  currentKey(): string {
    const { timeZone } = getHumidityConfig(this.configService);
    return formatInOperatingTimezone(this.clock.now(), timeZone);
  }

  /**
   * The dataset for today, building it if needed.
   *
   * @param force - Rebuild from INMET even if today's dataset exists
   */
  async getData(force: boolean = false): Promise<HumidityDataset> {
    if (!force) {
      const cached = this.lookup(this.currentKey());
      if (cached) {
        return cached;
      }
    }

    return this.exclusive(async () => {
      const key = this.currentKey();

      // Another caller may have rebuilt while we were waiting
      if (!force) {
        const cached = this.lookup(key);
        if (cached) {
          return cached;
        }
      }

      const dataset = await this.build(key, force);
      this.entry = { key, dataset };
      return dataset;
    });
  }

  /**
   * The stored dataset, without building one.
   */
  getCurrent(): HumidityDataset | null {
    return this.entry?.dataset ?? null;
  }

  getStatus(): DatasetStatus {
    const dataset = this.getCurrent();
    return {
      key: this.entry?.key ?? null,
      source: dataset?.source ?? null,
      generatedAt: dataset?.generatedAt ?? null,
      records: dataset?.records.length ?? 0,
      knownValues:
        dataset?.records.filter((record) => record.humidityMin !== null)
          .length ?? 0,
      rebuilding: this.pending > 0,
    };
  }

  private lookup(key: string): HumidityDataset | null {
    return this.entry !== null && this.entry.key === key
      ? this.entry.dataset
      : null;
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const run = this.lock.then(task).finally(() => {
      this.pending--;
    });
    this.lock = run.catch(() => undefined);
    return run;
  }

  private async build(key: string, force: boolean): Promise<HumidityDataset> {
    const { timeZone } = getHumidityConfig(this.configService);

    if (!force) {
      const snapshot = await this.readSnapshot(key, timeZone);
      if (snapshot) {
        this.logger.log(`Using stored humidity snapshot for ${key}`);
        return snapshot;
      }
    }

    this.logger.log(`🔄 Building humidity dataset for ${key}${force ? " (forced)" : ""}`);

    const targetDates = getDateRange(key, FORECAST_DAYS);
    let rows: RawHumidityRow[];
    let source: DatasetSource;

    try {
      const municipalities = this.registry.list();
      if (municipalities.length === 0) {
        throw new Error("No municipalities loaded");
      }
      rows = await this.collector.collect(municipalities, targetDates);
      source = "inmet";
    } catch (error: unknown) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `⚠️  Humidity collection failed, serving demo data: ${errorMessage}`,
      );
      rows = buildDemoRows(targetDates);
      source = "demo";
    }

    const dataset = this.toDataset(
      key,
      source,
      sanitizeHumidityRows(rows, { timeZone }),
    );

    // An all-unknown collection is not worth keeping across restarts
    if (source === "inmet" && hasKnownValues(dataset.records)) {
      await this.writeSnapshot(dataset);
    }

    return dataset;
  }

  private toDataset(
    key: string,
    source: DatasetSource,
    records: readonly HumidityRecord[],
  ): HumidityDataset {
    const dates = Array.from(new Set(records.map((record) => record.date))).sort();
    return Object.freeze({
      key,
      generatedAt: this.clock.now().toISOString(),
      source,
      dates: Object.freeze(dates),
      records,
    });
  }

  private async readSnapshot(
    key: string,
    timeZone: string,
  ): Promise<HumidityDataset | null> {
    try {
      const cached = await this.redis.get(`${SNAPSHOT_KEY_PREFIX}${key}`);
      if (!cached) {
        return null;
      }

      const parsed: unknown = JSON.parse(cached);
      if (!isPlainObject(parsed) || !Array.isArray(parsed.records)) {
        this.logger.warn(`Ignoring malformed humidity snapshot for ${key}`);
        return null;
      }

      const records = sanitizeHumidityRows(
        parsed.records.filter(isPlainObject),
        { timeZone },
      );
      if (!hasKnownValues(records)) {
        this.logger.warn(`Ignoring humidity snapshot without values for ${key}`);
        return null;
      }

      const dataset = this.toDataset(key, "snapshot", records);
      return typeof parsed.generatedAt === "string"
        ? Object.freeze({ ...dataset, generatedAt: parsed.generatedAt })
        : dataset;
    } catch (err: unknown) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Redis snapshot read failed: ${errorMessage}`);
      return null;
    }
  }

  private async writeSnapshot(dataset: HumidityDataset): Promise<void> {
    try {
      await this.redis.set(
        `${SNAPSHOT_KEY_PREFIX}${dataset.key}`,
        JSON.stringify(dataset),
        "EX",
        this.SNAPSHOT_TTL_SECONDS,
      );
    } catch (err: unknown) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Failed to store humidity snapshot: ${errorMessage}`);
    }
  }
}
