import { Module } from "@nestjs/common";
import { HealthController } from "./health.controller";
import { HumidityModule } from "../humidity/humidity.module";
import { MunicipalitiesModule } from "../municipalities/municipalities.module";

/**
 * Health Module
 *
 * Provides the health check endpoint with dataset statistics.
 */
@Module({
  imports: [HumidityModule, MunicipalitiesModule],
  controllers: [HealthController],
})
export class HealthModule {}
