import type { LatLng } from "../google-maps/google-maps.interface";

export interface SearchTextRequest {
  textQuery: string;
  maxResultCount: string;
}

export interface PlaceDisplayName {
  text: string;
  languageCode?: string;
}

export interface Place {
  id: string;
  formattedAddress: string;
  priceLevel?: string;
  displayName: PlaceDisplayName;
  location: LatLng;
}

/**
 * `places` is null when the provider returned no results.
 */
export interface PlacesSearchResult {
  places: Place[] | null;
}
