import { Controller, HttpCode, HttpStatus, Post } from "@nestjs/common";
import { ZodBody } from "../../common/decorators/zod-validation.decorator";
import { type ComputeRoutesDto, computeRoutesSchema } from "./dto/compute-routes.dto";
import type { RoutesResult } from "./routes.interface";
import { RoutesService } from "./routes.service";

@Controller("routes")
export class RoutesController {
  constructor(private readonly routesService: RoutesService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async computeRoutes(@ZodBody(computeRoutesSchema) body: ComputeRoutesDto): Promise<RoutesResult> {
    return this.routesService.computeRoutes(body);
  }
}
