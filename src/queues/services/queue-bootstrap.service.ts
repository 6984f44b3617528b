import { Injectable, OnModuleInit, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { InjectQueue } from "@nestjs/bull";
import { Queue } from "bull";
import {
  HUMIDITY_QUEUE,
  REFRESH_DATASET_JOB,
  RefreshDatasetJobData,
} from "../queue.constants";

/**
 * Queue Bootstrap Service
 *
 * Problem: The first dashboard request of a fresh process would have to wait
 * for a full INMET collection.
 *
 * Solution: Queue one refresh on startup (non-blocking). The daily cron keeps
 * the dataset current afterwards.
 */
@Injectable()
export class QueueBootstrapService implements OnModuleInit {
  private readonly logger = new Logger(QueueBootstrapService.name);

  constructor(
    @InjectQueue(HUMIDITY_QUEUE)
    private humidityQueue: Queue<RefreshDatasetJobData>,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Runs after all modules initialized.
   */
  async onModuleInit(): Promise<void> {
    // Skip bootstrap if SKIP_QUEUE_BOOTSTRAP is set (for scripts and tests)
    if (this.configService.get<string>("SKIP_QUEUE_BOOTSTRAP") === "true") {
      this.logger.debug("Queue bootstrap skipped (SKIP_QUEUE_BOOTSTRAP=true)");
      return;
    }

    // Non-blocking: fire and forget
    this.bootstrapQueues().catch((err: unknown) => {
      this.logger.error("Queue bootstrap failed", err);
    });
  }

  async bootstrapQueues(): Promise<void> {
    this.logger.log("🚀 Queue bootstrap starting...");

    await this.cleanupQueue();

    await this.humidityQueue.add(REFRESH_DATASET_JOB, {}, { priority: 1 });
    this.logger.log("✅ Initial humidity refresh queued");
  }

  /**
   * Drop finished jobs left over from earlier runs.
   */
  private async cleanupQueue(): Promise<void> {
    try {
      const completed = await this.humidityQueue.clean(0, "completed", 1000);
      const failed = await this.humidityQueue.clean(0, "failed", 1000);
      const cleaned = completed.length + failed.length;

      if (cleaned > 0) {
        this.logger.debug(
          `  ✓ Queue [${HUMIDITY_QUEUE}]: cleaned ${completed.length} completed, ${failed.length} failed jobs`,
        );
      }
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `Failed to clean queue [${HUMIDITY_QUEUE}]: ${errorMessage}`,
      );
    }
  }
}
