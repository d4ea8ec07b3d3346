import { Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import type { EnvConfig } from "../../config/env.config";
import { HttpClientService } from "../http-client/http-client.service";
import type { GoogleMapsContext } from "./google-maps.interface";
import { GOOGLE_MAPS_CONTEXT } from "./google-maps.tokens";

@Module({
  imports: [ConfigModule],
  providers: [
    HttpClientService,
    {
      provide: GOOGLE_MAPS_CONTEXT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<EnvConfig, true>): GoogleMapsContext => ({
        apiKey: configService.get("GOOGLE_MAPS_API_KEY", { infer: true }),
        placesUrl: configService.get("GOOGLE_PLACES_API_URL", { infer: true }),
        routesUrl: configService.get("GOOGLE_ROUTES_API_URL", { infer: true }),
        timeoutMs: configService.get("GOOGLE_MAPS_TIMEOUT_MS", { infer: true }),
      }),
    },
  ],
  exports: [HttpClientService, GOOGLE_MAPS_CONTEXT],
})
export class GoogleMapsModule {}
