import { ApiPropertyOptional } from "@nestjs/swagger";
import { IsOptional, IsString, Matches } from "class-validator";

export class HumidityQueryDto {
  @ApiPropertyOptional({
    description: "Forecast date (YYYY-MM-DD). Defaults to the last day of the dataset",
    example: "2024-01-01",
  })
  @IsOptional()
  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: "date must be YYYY-MM-DD" })
  date?: string;

  @ApiPropertyOptional({
    description: "Comma-separated UF abbreviations",
    example: "DF,GO",
  })
  @IsOptional()
  @IsString()
  states?: string;

  @ApiPropertyOptional({
    description: "IBGE municipality code",
    example: "5300108",
  })
  @IsOptional()
  @Matches(/^\d{1,7}$/, { message: "municipality must be an IBGE code" })
  municipality?: string;
}

export class MunicipalityOptionsQueryDto {
  @ApiPropertyOptional({
    description: "Comma-separated UF abbreviations",
    example: "SP,RJ",
  })
  @IsOptional()
  @IsString()
  states?: string;
}
