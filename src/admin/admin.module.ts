import { Module } from "@nestjs/common";
import { BullModule } from "@nestjs/bull";
import { RedisModule } from "../common/redis/redis.module";
import { HumidityModule } from "../humidity/humidity.module";
import { HUMIDITY_QUEUE } from "../queues/queue.constants";
import { AdminController } from "./admin.controller";

@Module({
  imports: [
    RedisModule,
    HumidityModule,
    BullModule.registerQueue({ name: HUMIDITY_QUEUE }),
  ],
  controllers: [AdminController],
})
export class AdminModule {}
