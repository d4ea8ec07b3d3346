export const GOOGLE_API_KEY_HEADER = "X-Goog-Api-Key";
export const GOOGLE_FIELD_MASK_HEADER = "X-Goog-FieldMask";

export const GOOGLE_PLACES_SERVICE_NAME = "GooglePlaces";
export const GOOGLE_ROUTES_SERVICE_NAME = "GoogleRoutes";

/**
 * Detail returned to callers for any provider failure. The cause is only logged.
 */
export const UPSTREAM_FAILURE_MESSAGE = "Something went wrong. Try again later";
