import { Controller, Get, Param, Query } from "@nestjs/common";
import {
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from "@nestjs/swagger";
import { HumidityQueryService, parseStates } from "./humidity-query.service";
import {
  HumidityQueryDto,
  MunicipalityOptionsQueryDto,
} from "./dto/humidity-query.dto";
import {
  ClassListingDto,
  HumidityMapDto,
  HumiditySeriesDto,
  HumiditySummaryDto,
  MunicipalityOptionDto,
} from "./dto/humidity-response.dto";
import { LegendDto } from "./dto/severity.dto";

/**
 * Humidity Controller
 *
 * Read endpoints behind the dashboard.
 *
 * Endpoints:
 * - GET /humidity/summary - Dataset metadata and class counts
 * - GET /humidity/legend - Severity classes and colours
 * - GET /humidity/map - Classified points of one date
 * - GET /humidity/municipalities/:code/series - Forecast days of one municipality
 * - GET /humidity/classes/:classId - Municipalities in a severity class
 */
@ApiTags("humidity")
@Controller("humidity")
export class HumidityController {
  constructor(private readonly queryService: HumidityQueryService) {}

  @Get("summary")
  @ApiOperation({
    summary: "Dataset summary",
    description:
      "Day key, source, forecast dates, states and class counts for the first date",
  })
  @ApiResponse({ status: 200, type: HumiditySummaryDto })
  async getSummary(): Promise<HumiditySummaryDto> {
    return this.queryService.getSummary();
  }

  @Get("legend")
  @ApiOperation({ summary: "Severity legend" })
  @ApiResponse({ status: 200, type: LegendDto })
  getLegend(): LegendDto {
    return this.queryService.getLegend();
  }

  @Get("dates")
  @ApiOperation({ summary: "Forecast dates of the current dataset" })
  @ApiResponse({ status: 200, type: [String] })
  async getDates(): Promise<string[]> {
    return this.queryService.getDates();
  }

  @Get("states")
  @ApiOperation({ summary: "States present in the current dataset" })
  @ApiResponse({ status: 200, type: [String] })
  async getStates(): Promise<string[]> {
    return this.queryService.getStates();
  }

  @Get("municipalities")
  @ApiOperation({
    summary: "Municipality options",
    description: "Municipalities for the selector, optionally filtered by state",
  })
  @ApiResponse({ status: 200, type: MunicipalityOptionDto, isArray: true })
  async getMunicipalities(
    @Query() query: MunicipalityOptionsQueryDto,
  ): Promise<MunicipalityOptionDto[]> {
    return this.queryService.getMunicipalityOptions(parseStates(query.states));
  }

  /**
   * GET /v1/humidity/map
   *
   * Points for the choropleth. Without `date` the last forecast day is used.
   */
  @Get("map")
  @ApiOperation({
    summary: "Humidity map layer",
    description:
      "Minimum humidity and severity of every municipality on one date",
  })
  @ApiResponse({ status: 200, type: HumidityMapDto })
  @ApiResponse({ status: 400, description: "Invalid query parameters" })
  async getMap(@Query() query: HumidityQueryDto): Promise<HumidityMapDto> {
    return this.queryService.getMap({
      date: query.date,
      states: parseStates(query.states),
      municipality: query.municipality,
    });
  }

  @Get("municipalities/:code/series")
  @ApiOperation({
    summary: "Municipality series",
    description: "Minimum humidity of one municipality for each forecast day",
  })
  @ApiParam({ name: "code", example: "5300108" })
  @ApiResponse({ status: 200, type: HumiditySeriesDto })
  @ApiResponse({ status: 404, description: "Municipality not in the dataset" })
  async getSeries(@Param("code") code: string): Promise<HumiditySeriesDto> {
    return this.queryService.getSeries(code);
  }

  @Get("classes/:classId")
  @ApiOperation({
    summary: "Municipalities by severity class",
    description:
      "Municipalities whose minimum humidity falls in the class on the selected date",
  })
  @ApiParam({
    name: "classId",
    enum: ["ideal", "near-ideal", "observation", "attention", "alert", "emergency"],
  })
  @ApiResponse({ status: 200, type: ClassListingDto })
  @ApiResponse({ status: 404, description: "Unknown severity class" })
  async getClassListing(
    @Param("classId") classId: string,
    @Query() query: HumidityQueryDto,
  ): Promise<ClassListingDto> {
    return this.queryService.getClassListing(classId, {
      date: query.date,
      states: parseStates(query.states),
      municipality: query.municipality,
    });
  }
}
