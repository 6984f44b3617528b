import { Module } from "@nestjs/common";
import { BullModule } from "@nestjs/bull";
import { ConfigModule } from "@nestjs/config";
import { getRedisConfig } from "../config/redis.config";
import { QueueBootstrapService } from "./services/queue-bootstrap.service";
import { QueueSchedulerService } from "./services/queue-scheduler.service";
import { HumidityRefreshProcessor } from "./processors/humidity-refresh.processor";
import { HumidityModule } from "../humidity/humidity.module";
import { HUMIDITY_QUEUE } from "./queue.constants";

@Module({
  imports: [
    ConfigModule,
    // Register Bull queues with Redis connection
    BullModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: () => {
        const redisConfig = getRedisConfig();
        return {
          redis: {
            host: redisConfig.host,
            port: redisConfig.port,
            password: redisConfig.password,
          },
          prefix: process.env.BULL_PREFIX || "umidade",
          defaultJobOptions: {
            attempts: 2,
            backoff: {
              type: "exponential",
              delay: 60000, // A failed collection is retried after a minute
            },
            removeOnComplete: 50,
            removeOnFail: 100,
          },
        };
      },
    }),

    BullModule.registerQueue({ name: HUMIDITY_QUEUE }),

    // Feature modules for processors
    HumidityModule,
  ],
  providers: [
    QueueBootstrapService,
    QueueSchedulerService,
    HumidityRefreshProcessor,
  ],
  exports: [BullModule],
})
export class QueuesModule {}
