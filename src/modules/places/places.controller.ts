import { Controller, Get, HttpCode, HttpStatus, Post } from "@nestjs/common";
import { ZodBody, ZodQuery } from "../../common/decorators/zod-validation.decorator";
import { type SearchPlacesDto, searchPlacesSchema } from "./dto/search-places.dto";
import type { PlacesSearchResult } from "./places.interface";
import { PlacesService } from "./places.service";

@Controller("places")
export class PlacesController {
  constructor(private readonly placesService: PlacesService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async searchPlaces(@ZodBody(searchPlacesSchema) body: SearchPlacesDto): Promise<PlacesSearchResult> {
    return this.placesService.searchPlaces(body.textQuery);
  }

  /**
   * Query-string variant kept for clients that predate the POST endpoint.
   */
  @Get()
  async searchPlacesByQuery(
    @ZodQuery(searchPlacesSchema) query: SearchPlacesDto,
  ): Promise<PlacesSearchResult> {
    return this.placesService.searchPlaces(query.textQuery);
  }
}
