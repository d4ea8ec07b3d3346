import { Inject, Injectable, Logger } from "@nestjs/common";
import type { AxiosInstance } from "axios";
import { GOOGLE_PLACES_SERVICE_NAME } from "../google-maps/google-maps.const";
import { GoogleMapsUpstreamException } from "../google-maps/google-maps.error";
import { buildGoogleHeaders } from "../google-maps/google-maps.helper";
import type { GoogleMapsContext } from "../google-maps/google-maps.interface";
import { GOOGLE_MAPS_CONTEXT } from "../google-maps/google-maps.tokens";
import { HttpClientService } from "../http-client/http-client.service";
import { PLACES_FIELD_MASK } from "./places.const";
import { buildSearchTextRequest, mapSearchTextResponse } from "./places.helper";
import type { PlacesSearchResult } from "./places.interface";
import { googleSearchTextResponseSchema } from "./places.schema";

@Injectable()
export class PlacesService {
  private readonly logger = new Logger(PlacesService.name);
  private readonly httpClient: AxiosInstance;

  constructor(
    @Inject(GOOGLE_MAPS_CONTEXT) private readonly context: GoogleMapsContext,
    private readonly httpClientService: HttpClientService,
  ) {
    this.httpClient = this.httpClientService.createClient({
      timeout: this.context.timeoutMs,
      headers: buildGoogleHeaders(this.context.apiKey, PLACES_FIELD_MASK),
      serviceName: GOOGLE_PLACES_SERVICE_NAME,
    });
  }

  /**
   * Forward a free-text search to Places Text Search and reshape the result.
   *
   * @throws GoogleMapsUpstreamException on any provider failure; the cause is only logged
   */
  async searchPlaces(textQuery: string): Promise<PlacesSearchResult> {
    let body: unknown;
    try {
      const { data } = await this.httpClient.post<unknown>(
        this.context.placesUrl,
        buildSearchTextRequest(textQuery),
      );
      body = data;
    } catch (error) {
      const errorInfo = this.httpClientService.handleError(
        error,
        "searchPlaces",
        GOOGLE_PLACES_SERVICE_NAME,
      );

      this.logger.error("Error sending request to Google Places API", {
        kind: errorInfo.kind,
        status: errorInfo.status,
        code: errorInfo.code,
        error: errorInfo.message,
      });
      throw new GoogleMapsUpstreamException();
    }

    const parsed = googleSearchTextResponseSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.error("Error parsing response from Google Places API", {
        issues: parsed.error.issues.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`),
      });
      throw new GoogleMapsUpstreamException();
    }

    const result = mapSearchTextResponse(parsed.data);
    this.logger.debug("Places search completed", {
      textQuery,
      resultCount: result.places?.length ?? 0,
    });

    return result;
  }
}
