import { Injectable, OnModuleInit, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { InjectQueue } from "@nestjs/bull";
import { Queue } from "bull";
import { getHumidityConfig } from "../../config/humidity.config";
import {
  HUMIDITY_QUEUE,
  REFRESH_DATASET_CRON,
  REFRESH_DATASET_CRON_ID,
  REFRESH_DATASET_JOB,
  RefreshDatasetJobData,
} from "../queue.constants";

/**
 * Queue Scheduler Service
 *
 * Registers the repeating dataset refresh.
 *
 * Schedule:
 * - humidity: Daily at 00:05 in the operating timezone
 */
@Injectable()
export class QueueSchedulerService implements OnModuleInit {
  private readonly logger = new Logger(QueueSchedulerService.name);

  constructor(
    @InjectQueue(HUMIDITY_QUEUE)
    private humidityQueue: Queue<RefreshDatasetJobData>,
    private readonly configService: ConfigService,
  ) {}

  async onModuleInit(): Promise<void> {
    // Wait a bit to let bootstrap complete first
    setTimeout(() => {
      this.registerScheduledJobs().catch((err: unknown) => {
        this.logger.error("Failed to register scheduled jobs", err);
      });
    }, 5000);
  }

  async registerScheduledJobs(): Promise<void> {
    this.logger.log("📅 Registering scheduled jobs...");

    const hasRefreshCron = await this.hasRepeatableJob(
      this.humidityQueue,
      REFRESH_DATASET_CRON_ID,
    );

    if (!hasRefreshCron) {
      const { timeZone } = getHumidityConfig(this.configService);
      await this.humidityQueue.add(
        REFRESH_DATASET_JOB,
        {},
        {
          repeat: {
            cron: REFRESH_DATASET_CRON,
            tz: timeZone,
          },
          jobId: REFRESH_DATASET_CRON_ID,
        },
      );
    }

    this.logger.log("🎉 All scheduled jobs registered!");
  }

  /**
   * Check if a repeatable job with the given jobId already exists.
   */
  private async hasRepeatableJob(
    queue: Queue<RefreshDatasetJobData>,
    jobId: string,
  ): Promise<boolean> {
    const repeatableJobs = await queue.getRepeatableJobs();
    return repeatableJobs.some((job) => job.id === jobId);
  }
}
