import { MiddlewareConsumer, Module, NestModule } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { RequestTraceMiddleware } from "./common/middlewares/request-trace.middleware";
import { validateEnvironment } from "./config/env.config";
import { HealthController } from "./modules/health/health.controller";
import { HealthModule } from "./modules/health/health.module";
import { PlacesController } from "./modules/places/places.controller";
import { PlacesModule } from "./modules/places/places.module";
import { RoutesController } from "./modules/routes/routes.controller";
import { RoutesModule } from "./modules/routes/routes.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    HealthModule,
    PlacesModule,
    RoutesModule,
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(RequestTraceMiddleware).forRoutes(HealthController, PlacesController, RoutesController);
  }
}
