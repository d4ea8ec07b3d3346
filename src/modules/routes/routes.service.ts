import { Inject, Injectable, Logger } from "@nestjs/common";
import type { AxiosInstance } from "axios";
import { GOOGLE_ROUTES_SERVICE_NAME } from "../google-maps/google-maps.const";
import { GoogleMapsUpstreamException } from "../google-maps/google-maps.error";
import { buildGoogleHeaders } from "../google-maps/google-maps.helper";
import type { GoogleMapsContext } from "../google-maps/google-maps.interface";
import { GOOGLE_MAPS_CONTEXT } from "../google-maps/google-maps.tokens";
import { HttpClientService } from "../http-client/http-client.service";
import type { ComputeRoutesDto } from "./dto/compute-routes.dto";
import { ROUTES_FIELD_MASK } from "./routes.const";
import { buildComputeRoutesRequest, mapComputeRoutesResponse } from "./routes.helper";
import type { RoutesResult } from "./routes.interface";
import { googleComputeRoutesResponseSchema } from "./routes.schema";

@Injectable()
export class RoutesService {
  private readonly logger = new Logger(RoutesService.name);
  private readonly httpClient: AxiosInstance;

  constructor(
    @Inject(GOOGLE_MAPS_CONTEXT) private readonly context: GoogleMapsContext,
    private readonly httpClientService: HttpClientService,
  ) {
    this.httpClient = this.httpClientService.createClient({
      timeout: this.context.timeoutMs,
      headers: buildGoogleHeaders(this.context.apiKey, ROUTES_FIELD_MASK),
      serviceName: GOOGLE_ROUTES_SERVICE_NAME,
    });
  }

  /**
   * Compute driving routes, alternatives included, between two coordinates.
   */
  async computeRoutes(input: ComputeRoutesDto): Promise<RoutesResult> {
    this.logger.debug("Computing routes", input);

    let body: unknown;
    try {
      const { data } = await this.httpClient.post<unknown>(
        this.context.routesUrl,
        buildComputeRoutesRequest(input),
      );
      body = data;
    } catch (error) {
      const errorInfo = this.httpClientService.handleError(
        error,
        "computeRoutes",
        GOOGLE_ROUTES_SERVICE_NAME,
      );

      this.logger.error("Error sending request to Google Routes API", {
        kind: errorInfo.kind,
        status: errorInfo.status,
        code: errorInfo.code,
        error: errorInfo.message,
      });
      throw new GoogleMapsUpstreamException();
    }

    const parsed = googleComputeRoutesResponseSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.error("Error parsing response from Google Routes API", {
        issues: parsed.error.issues.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`),
      });
      throw new GoogleMapsUpstreamException();
    }

    return mapComputeRoutesResponse(parsed.data);
  }
}
