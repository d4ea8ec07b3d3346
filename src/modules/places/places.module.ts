import { Module } from "@nestjs/common";
import { GoogleMapsModule } from "../google-maps/google-maps.module";
import { PlacesController } from "./places.controller";
import { PlacesService } from "./places.service";

@Module({
  imports: [GoogleMapsModule],
  controllers: [PlacesController],
  providers: [PlacesService],
})
export class PlacesModule {}
