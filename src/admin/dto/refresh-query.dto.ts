import { ApiPropertyOptional } from "@nestjs/swagger";
import { IsOptional, IsString } from "class-validator";

export class RefreshQueryDto {
  @ApiPropertyOptional({
    description: "Must match REFRESH_TOKEN when one is configured",
  })
  @IsOptional()
  @IsString()
  token?: string;
}
