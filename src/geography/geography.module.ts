import { Module } from "@nestjs/common";
import { GeographyController } from "./geography.controller";
import { GeoJsonService } from "./geojson.service";

@Module({
  controllers: [GeographyController],
  providers: [GeoJsonService],
  exports: [GeoJsonService],
})
export class GeographyModule {}
