import { Module } from "@nestjs/common";
import { HumidityController } from "./humidity.controller";
import { HumidityQueryService } from "./humidity-query.service";
import { HumidityDatasetService } from "./humidity-dataset.service";
import { ForecastCollectorService } from "./forecast-collector.service";
import { CLOCK, systemClock } from "./clock";
import { MunicipalitiesModule } from "../municipalities/municipalities.module";
import { InmetModule } from "../external-apis/inmet/inmet.module";
import { RedisModule } from "../common/redis/redis.module";

@Module({
  imports: [MunicipalitiesModule, InmetModule, RedisModule],
  controllers: [HumidityController],
  providers: [
    ForecastCollectorService,
    HumidityDatasetService,
    HumidityQueryService,
    { provide: CLOCK, useValue: systemClock },
  ],
  exports: [HumidityDatasetService],
})
export class HumidityModule {}
