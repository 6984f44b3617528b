import { ApiProperty } from "@nestjs/swagger";
import { SeverityClassId } from "../humidity-classifier";

export class SeverityDto {
  @ApiProperty({
    enum: ["ideal", "near-ideal", "observation", "attention", "alert", "emergency"],
  })
  id!: SeverityClassId;

  @ApiProperty({ example: "Caso de alerta (12–19%)" })
  label!: string;

  @ApiProperty({ example: "#F87171" })
  color!: string;

  @ApiProperty({ example: "white" })
  textColor!: string;

  @ApiProperty({ description: "0 = best, 5 = worst", example: 4 })
  rank!: number;
}

export class LegendDto {
  @ApiProperty({ type: [SeverityDto] })
  classes!: SeverityDto[];

  @ApiProperty({ description: "Colour for unknown values", example: "#9CA3AF" })
  unknownColor!: string;
}
