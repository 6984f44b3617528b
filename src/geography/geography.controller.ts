import { Controller, Get, NotFoundException } from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import {
  GeoJsonFeatureCollection,
  GeoJsonService,
} from "./geojson.service";

@ApiTags("geography")
@Controller("geography")
export class GeographyController {
  constructor(private readonly geoJsonService: GeoJsonService) {}

  /**
   * GET /v1/geography
   *
   * Municipal boundaries with `properties.CD_MUN` set to the 7-digit IBGE code.
   */
  @Get()
  @ApiOperation({
    summary: "Municipal boundary overlay",
    description:
      "GeoJSON FeatureCollection keyed by properties.CD_MUN. 404 when no overlay is available; draw point markers instead.",
  })
  @ApiResponse({ status: 200, description: "GeoJSON FeatureCollection" })
  @ApiResponse({ status: 404, description: "No overlay loaded" })
  getOverlay(): GeoJsonFeatureCollection {
    const overlay = this.geoJsonService.getOverlay();
    if (!overlay) {
      throw new NotFoundException("GeoJSON overlay not available");
    }
    return overlay;
  }
}
