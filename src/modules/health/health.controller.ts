import { Controller, Get, Header } from "@nestjs/common";

@Controller("health-check")
export class HealthController {
  /**
   * Liveness only. Does not touch the provider.
   */
  @Get()
  @Header("Content-Type", "text/plain; charset=utf-8")
  checkHealth(): string {
    return "OK";
  }
}
