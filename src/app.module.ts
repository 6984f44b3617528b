import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { RedisModule } from "./common/redis/redis.module";
import { QueuesModule } from "./queues/queues.module";
import { HealthModule } from "./health/health.module";
import { MunicipalitiesModule } from "./municipalities/municipalities.module";
import { HumidityModule } from "./humidity/humidity.module";
import { GeographyModule } from "./geography/geography.module";
import { AdminModule } from "./admin/admin.module";

@Module({
  imports: [
    // Global config module
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ".env",
      cache: true,
    }),

    // Redis
    RedisModule,

    // Core modules
    QueuesModule,
    HealthModule,

    // Feature modules
    MunicipalitiesModule,
    HumidityModule,
    GeographyModule,

    // Admin utilities
    AdminModule,
  ],
})
export class AppModule {}
