import { Module } from "@nestjs/common";
import { InmetClient } from "./inmet.client";

@Module({
  providers: [InmetClient],
  exports: [InmetClient],
})
export class InmetModule {}
