import { Module, Global } from "@nestjs/common";
import Redis from "ioredis";
import { getRedisConfig } from "../../config/redis.config";

export const REDIS_CLIENT = "REDIS_CLIENT";

@Global()
@Module({
  providers: [
    {
      provide: REDIS_CLIENT,
      useFactory: () => {
        const { host, port, password } = getRedisConfig();
        return new Redis({
          host,
          port,
          password,
          enableReadyCheck: true,
          maxRetriesPerRequest: 3,
          enableOfflineQueue: false, // Fail fast if Redis is down
          lazyConnect: false,
          connectTimeout: 10000,
          retryStrategy: (times: number) => {
            // Exponential backoff: 50ms, 100ms, 200ms, ..., max 2s
            return Math.min(times * 50, 2000);
          },
        });
      },
    },
  ],
  exports: [REDIS_CLIENT],
})
export class RedisModule {}
