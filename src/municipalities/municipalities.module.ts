import { Module } from "@nestjs/common";
import { MunicipalityLoaderService } from "./municipality-loader.service";
import { MunicipalityRegistry } from "./municipality.registry";

@Module({
  providers: [MunicipalityLoaderService, MunicipalityRegistry],
  exports: [MunicipalityRegistry],
})
export class MunicipalitiesModule {}
