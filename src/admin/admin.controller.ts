import {
  Controller,
  ForbiddenException,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
  Post,
  Query,
  Res,
} from "@nestjs/common";
import {
  ApiOperation,
  ApiResponse,
  ApiSecurity,
  ApiTags,
} from "@nestjs/swagger";
import { ConfigService } from "@nestjs/config";
import { InjectQueue } from "@nestjs/bull";
import { Queue } from "bull";
import { Redis } from "ioredis";
import { Response } from "express";
import { REDIS_CLIENT } from "../common/redis/redis.module";
import { HumidityDatasetService } from "../humidity/humidity-dataset.service";
import { getHumidityConfig } from "../config/humidity.config";
import { RefreshQueryDto } from "./dto/refresh-query.dto";
import {
  HUMIDITY_QUEUE,
  REFRESH_DATASET_JOB,
  RefreshDatasetJobData,
} from "../queues/queue.constants";

const HUMIDITY_CACHE_PATTERN = "humidity:*";

export type RefreshResult = { ok: true } | { ok: false; error: string };

/**
 * Admin Controller
 *
 * ⚠️ SECURITY NOTICE:
 * When REFRESH_TOKEN is set, refresh endpoints require `token=XXX` as query
 * parameter. Without it they are open, which is only meant for local use.
 */
@ApiTags("admin")
@ApiSecurity("admin-auth")
@Controller("admin")
export class AdminController {
  private readonly logger = new Logger(AdminController.name);

  constructor(
    private readonly datasetService: HumidityDatasetService,
    private readonly configService: ConfigService,
    @InjectQueue(HUMIDITY_QUEUE)
    private readonly humidityQueue: Queue<RefreshDatasetJobData>,
    @Inject(REDIS_CLIENT) private readonly redis: Redis,
  ) {}

  /**
   * Rebuild today's dataset from INMET and wait for it.
   */
  @Get("refresh")
  @ApiOperation({
    summary: "Refresh humidity dataset",
    description:
      "Forces a full INMET collection and waits for it (may take several minutes)",
  })
  @ApiResponse({ status: 200, description: "Dataset rebuilt" })
  @ApiResponse({ status: 403, description: "Invalid token" })
  @ApiResponse({ status: 500, description: "Rebuild failed" })
  async refresh(
    @Query() query: RefreshQueryDto,
    @Res({ passthrough: true }) res: Pick<Response, "status">,
  ): Promise<RefreshResult> {
    return this.runRefresh(query.token, res);
  }

  @Post("refresh")
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: "Refresh humidity dataset",
    description: "Same as GET /admin/refresh",
  })
  @ApiResponse({ status: 200, description: "Dataset rebuilt" })
  @ApiResponse({ status: 403, description: "Invalid token" })
  @ApiResponse({ status: 500, description: "Rebuild failed" })
  async refreshPost(
    @Query() query: RefreshQueryDto,
    @Res({ passthrough: true }) res: Pick<Response, "status">,
  ): Promise<RefreshResult> {
    return this.runRefresh(query.token, res);
  }

  /**
   * Queue a forced rebuild and return immediately.
   */
  @Post("refresh/queue")
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({
    summary: "Queue humidity refresh",
    description: "Queues a forced rebuild on the humidity queue",
  })
  @ApiResponse({ status: 202, description: "Refresh job queued" })
  @ApiResponse({ status: 403, description: "Invalid token" })
  async queueRefresh(
    @Query() query: RefreshQueryDto,
  ): Promise<{ message: string; jobId: string }> {
    this.assertToken(query.token);

    const job = await this.humidityQueue.add(
      REFRESH_DATASET_JOB,
      { force: true },
      { priority: 10 },
    );
    return {
      message: "Humidity refresh job queued",
      jobId: job.id.toString(),
    };
  }

  /**
   * Flush humidity snapshots
   *
   * Deletes stored daily snapshots so the next rebuild collects from INMET.
   * Bull queue keys are left alone.
   */
  @Post("flush-cache")
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: "Flush humidity snapshots",
    description: "Deletes stored humidity snapshots without affecting queue jobs",
  })
  @ApiResponse({ status: 200, description: "Snapshots flushed" })
  async flushCache(): Promise<{ message: string; keysDeleted: number }> {
    const keys = await this.redis.keys(HUMIDITY_CACHE_PATTERN);
    if (keys.length > 0) {
      await this.redis.del(...keys);
    }

    return {
      message: "Humidity snapshots flushed",
      keysDeleted: keys.length,
    };
  }

  private async runRefresh(
    token: string | undefined,
    res: Pick<Response, "status">,
  ): Promise<RefreshResult> {
    this.assertToken(token);

    try {
      await this.datasetService.getData(true);
      return { ok: true };
    } catch (error: unknown) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      this.logger.error(`Manual refresh failed: ${errorMessage}`);
      res.status(HttpStatus.INTERNAL_SERVER_ERROR);
      return { ok: false, error: errorMessage };
    }
  }

  private assertToken(token: string | undefined): void {
    const { refreshToken } = getHumidityConfig(this.configService);
    if (refreshToken && token !== refreshToken) {
      throw new ForbiddenException("Invalid refresh token");
    }
  }
}
