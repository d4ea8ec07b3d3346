import { Module } from "@nestjs/common";
import { GoogleMapsModule } from "../google-maps/google-maps.module";
import { RoutesController } from "./routes.controller";
import { RoutesService } from "./routes.service";

@Module({
  imports: [GoogleMapsModule],
  controllers: [RoutesController],
  providers: [RoutesService],
})
export class RoutesModule {}
