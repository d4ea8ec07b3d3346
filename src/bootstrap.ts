import { Logger, type Type } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { HttpAdapterHost, NestFactory } from "@nestjs/core";
import { GlobalExceptionFilter } from "./common/filters/global-exception.filter";

/**
 * Creates and starts the application. Any startup failure, including an
 * invalid environment, is logged and ends the process with exit code 1.
 */
export async function bootstrap(rootModule: Type<unknown>): Promise<void> {
  const logger = new Logger("Bootstrap");

  try {
    logger.log("Starting application...");

    // Nest aborts the process on init errors unless told otherwise.
    const app = await NestFactory.create(rootModule, { abortOnError: false });

    app.enableShutdownHooks();
    app.useGlobalFilters(new GlobalExceptionFilter(app.get(HttpAdapterHost)));

    const configService = app.get(ConfigService);
    const port = configService.get<number>("PORT", 3000);
    const host = configService.get<string>("HOST", "0.0.0.0");

    await app.listen(port, host);

    logger.log(`Application started successfully on ${host}:${port}`);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to start application: ${errorMessage}`);
    process.exit(1);
  }
}
