/**
 * Process-wide provider settings, resolved once at startup and shared
 * read-only by every translator.
 */
export interface GoogleMapsContext {
  apiKey: string;
  placesUrl: string;
  routesUrl: string;
  timeoutMs: number;
}

export interface LatLng {
  latitude: number;
  longitude: number;
}
