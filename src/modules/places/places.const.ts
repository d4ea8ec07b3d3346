export const PLACES_FIELD_MASK = "places.id,places.displayName,places.formattedAddress,places.location";

/**
 * Sent as a string, which the Places API accepts for its int32 fields.
 */
export const PLACES_MAX_RESULT_COUNT = "10";

/**
 * Literal some clients send when the search box was never filled in.
 */
export const UNSET_QUERY_SENTINEL = "undefined";
