import { Processor, Process } from "@nestjs/bull";
import { Logger } from "@nestjs/common";
import { Job } from "bull";
import { HumidityDatasetService } from "../../humidity/humidity-dataset.service";
import {
  HUMIDITY_QUEUE,
  REFRESH_DATASET_JOB,
  RefreshDatasetJobData,
} from "../queue.constants";

/**
 * Humidity Refresh Processor
 *
 * Builds the day's dataset ahead of the first dashboard request.
 *
 * Strategy:
 * - Scheduled runs only build when the cached day is stale, so a request
 *   that already rebuilt after midnight is not repeated
 * - `{ force: true }` always collects from INMET
 */
@Processor(HUMIDITY_QUEUE)
export class HumidityRefreshProcessor {
  private readonly logger = new Logger(HumidityRefreshProcessor.name);

  constructor(private readonly datasetService: HumidityDatasetService) {}

  @Process(REFRESH_DATASET_JOB)
  async handleRefresh(
    job: Pick<Job<RefreshDatasetJobData>, "data">,
  ): Promise<void> {
    const force = job.data?.force === true;
    this.logger.log(`💧 Refreshing humidity dataset${force ? " (forced)" : ""}...`);

    try {
      const dataset = await this.datasetService.getData(force);
      this.logger.log(
        `✅ Humidity dataset ${dataset.key} ready: ${dataset.records.length} records (${dataset.source})`,
      );
    } catch (error: unknown) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      this.logger.error(`❌ Humidity refresh failed: ${errorMessage}`);
      throw error;
    }
  }
}
