import { PLACES_MAX_RESULT_COUNT } from "./places.const";
import type { Place, PlacesSearchResult, SearchTextRequest } from "./places.interface";
import type { GooglePlace, GoogleSearchTextResponse } from "./places.schema";

export function buildSearchTextRequest(textQuery: string): SearchTextRequest {
  // TODO: send a locationBias once clients pass their viewport
  return { textQuery, maxResultCount: PLACES_MAX_RESULT_COUNT };
}

export function mapPlace(place: GooglePlace): Place {
  return {
    id: place.id,
    formattedAddress: place.formattedAddress,
    ...(place.priceLevel != null && { priceLevel: place.priceLevel }),
    displayName: {
      text: place.displayName.text,
      ...(place.displayName.languageCode != null && {
        languageCode: place.displayName.languageCode,
      }),
    },
    location: {
      latitude: place.location.latitude,
      longitude: place.location.longitude,
    },
  };
}

export function mapSearchTextResponse(response: GoogleSearchTextResponse): PlacesSearchResult {
  return { places: response.places ? response.places.map(mapPlace) : null };
}
