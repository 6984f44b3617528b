import { Controller, Get, Inject } from "@nestjs/common";
import { ApiTags, ApiOperation, ApiResponse } from "@nestjs/swagger";
import { Redis } from "ioredis";
import { REDIS_CLIENT } from "../common/redis/redis.module";
import {
  DatasetStatus,
  HumidityDatasetService,
} from "../humidity/humidity-dataset.service";
import { MunicipalityRegistry } from "../municipalities/municipality.registry";

export interface HealthStatus {
  status: "ok" | "degraded";
  timestamp: string;
  uptime: number;
  version: string;
  services: {
    redis: {
      status: "connected" | "disconnected";
    };
  };
  data: {
    municipalities: number;
    dataset: DatasetStatus;
    data_age_minutes?: number;
  };
}

@ApiTags("health")
@Controller("health")
export class HealthController {
  constructor(
    private readonly datasetService: HumidityDatasetService,
    private readonly registry: MunicipalityRegistry,
    @Inject(REDIS_CLIENT) private readonly redis: Redis,
  ) {}

  @Get()
  @ApiOperation({
    summary: "System health check",
    description:
      "Returns the state of the daily humidity dataset and the Redis connection.",
  })
  @ApiResponse({
    status: 200,
    description: "System health status retrieved successfully",
    schema: {
      type: "object",
      properties: {
        status: { type: "string", example: "ok" },
        timestamp: { type: "string", format: "date-time" },
        uptime: { type: "number" },
        services: { type: "object" },
        data: { type: "object" },
      },
    },
  })
  async getHealth(): Promise<HealthStatus> {
    const redisConnected = await this.checkRedisConnection();
    const dataset = this.datasetService.getStatus();

    // Calculate data age
    let dataAgeMinutes: number | undefined;
    if (dataset.generatedAt) {
      const ageMs = Date.now() - new Date(dataset.generatedAt).getTime();
      dataAgeMinutes = Math.round(ageMs / 60000);
    }

    // Demo data, a missing dataset or a day without any value means INMET
    // has not been reached yet
    const datasetHealthy =
      (dataset.source === "inmet" || dataset.source === "snapshot") &&
      dataset.knownValues > 0;

    return {
      status: redisConnected && datasetHealthy ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      uptime: Math.floor(process.uptime()),
      version: "1.0.0",
      services: {
        redis: {
          status: redisConnected ? "connected" : "disconnected",
        },
      },
      data: {
        municipalities: this.registry.size,
        dataset,
        ...(dataAgeMinutes !== undefined && {
          data_age_minutes: dataAgeMinutes,
        }),
      },
    };
  }

  private async checkRedisConnection(): Promise<boolean> {
    try {
      await this.redis.ping();
      return true;
    } catch {
      return false;
    }
  }
}
