export const GOOGLE_MAPS_CONTEXT = Symbol("GOOGLE_MAPS_CONTEXT");
