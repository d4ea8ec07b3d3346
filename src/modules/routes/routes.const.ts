export const ROUTES_FIELD_MASK = "routes.duration,routes.distanceMeters,routes.polyline.encodedPolyline";

/**
 * Routing options applied to every compute-routes call.
 */
export const DEFAULT_ROUTE_PREFERENCES = {
  travelMode: "DRIVE",
  routingPreference: "TRAFFIC_AWARE_OPTIMAL",
  computeAlternativeRoutes: true,
  routeModifiers: {
    avoidTolls: false,
    avoidHighways: false,
    avoidFerries: false,
  },
  languageCode: "en-US",
  units: "METRIC",
} as const;
