import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { SeverityDto } from "./severity.dto";
import { DatasetSource } from "../humidity.types";

/**
 * One municipality on one day, with its severity class
 */
export class HumidityPointDto {
  @ApiProperty({ example: "5300108" })
  code!: string;

  @ApiProperty({ example: "Brasília" })
  name!: string;

  @ApiProperty({ example: "DF" })
  state!: string;

  @ApiProperty({ nullable: true, example: -15.78 })
  latitude!: number | null;

  @ApiProperty({ nullable: true, example: -47.93 })
  longitude!: number | null;

  @ApiProperty({ example: "2024-01-01" })
  date!: string;

  @ApiProperty({
    description: "Minimum relative humidity (%), null when unknown",
    nullable: true,
    example: 18,
  })
  humidityMin!: number | null;

  @ApiProperty({ nullable: true })
  humidityMax!: number | null;

  @ApiProperty({ type: SeverityDto, nullable: true })
  severity!: SeverityDto | null;
}

export class HumidityMapDto {
  @ApiProperty({ nullable: true, example: "2024-01-01" })
  date!: string | null;

  @ApiProperty({ type: [String] })
  dates!: string[];

  @ApiProperty({ type: [HumidityPointDto] })
  items!: HumidityPointDto[];
}

export class HumiditySeriesItemDto extends HumidityPointDto {
  @ApiProperty({ example: "01/01" })
  dayLabel!: string;
}

export class HumiditySeriesDto {
  @ApiProperty({ example: "5300108" })
  code!: string;

  @ApiProperty({ example: "Brasília" })
  name!: string;

  @ApiProperty({ example: "DF" })
  state!: string;

  @ApiProperty({ type: [HumiditySeriesItemDto] })
  items!: HumiditySeriesItemDto[];
}

export class MunicipalityOptionDto {
  @ApiProperty({ example: "5300108" })
  code!: string;

  @ApiProperty({ example: "Brasília / DF" })
  label!: string;

  @ApiProperty({ example: "Brasília" })
  name!: string;

  @ApiProperty({ example: "DF" })
  state!: string;
}

export class ClassListingItemDto {
  @ApiProperty({ example: "5300108" })
  code!: string;

  @ApiProperty({ example: "Brasília" })
  name!: string;

  @ApiProperty({ example: "DF" })
  state!: string;

  @ApiProperty({ example: 18 })
  humidityMin!: number;
}

export class ClassListingDto {
  @ApiProperty({ type: SeverityDto })
  severity!: SeverityDto;

  @ApiProperty({ nullable: true, example: "2024-01-01" })
  date!: string | null;

  @ApiProperty({ nullable: true, example: "01/01" })
  dateLabel!: string | null;

  @ApiProperty({ example: 1 })
  count!: number;

  @ApiProperty({ type: [ClassListingItemDto] })
  items!: ClassListingItemDto[];
}

export class HumiditySummaryDto {
  @ApiProperty({ description: "Operating-timezone day of the dataset", example: "2024-01-01" })
  key!: string;

  @ApiProperty({ format: "date-time" })
  generatedAt!: string;

  @ApiProperty({ enum: ["inmet", "snapshot", "demo"] })
  source!: DatasetSource;

  @ApiProperty({ type: [String] })
  dates!: string[];

  @ApiProperty({ type: [String], example: ["DF", "GO"] })
  states!: string[];

  @ApiPropertyOptional({
    description: "Municipality selected when the dashboard opens",
    nullable: true,
    example: "5300108",
  })
  defaultMunicipality!: string | null;

  @ApiProperty({
    description: "Municipalities per severity class on the first date (plus `unknown`)",
    example: { ideal: 120, "near-ideal": 800, unknown: 3 },
  })
  classCounts!: Record<string, number>;
}
