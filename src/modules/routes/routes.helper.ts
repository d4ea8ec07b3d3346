import type { LatLng } from "../google-maps/google-maps.interface";
import type { ComputeRoutesDto } from "./dto/compute-routes.dto";
import { DEFAULT_ROUTE_PREFERENCES } from "./routes.const";
import type { ComputeRoutesRequest, Route, RoutesResult, RouteWaypoint } from "./routes.interface";
import type { GoogleComputeRoutesResponse, GoogleRoute } from "./routes.schema";

function toWaypoint({ latitude, longitude }: LatLng): RouteWaypoint {
  return { location: { latLng: { latitude, longitude } } };
}

export function buildComputeRoutesRequest(input: ComputeRoutesDto): ComputeRoutesRequest {
  return {
    origin: toWaypoint(input.originLocation),
    destination: toWaypoint(input.destinationLocation),
    departureTime: input.departureTime,
    ...DEFAULT_ROUTE_PREFERENCES,
  };
}

export function mapRoute(route: GoogleRoute): Route {
  return {
    distanceMeters: route.distanceMeters,
    duration: route.duration,
    polyline: { encodedPolyline: route.polyline.encodedPolyline },
  };
}

/**
 * Every alternative is returned in provider order. No ranking happens here.
 */
export function mapComputeRoutesResponse(response: GoogleComputeRoutesResponse): RoutesResult {
  return { routes: response.routes.map(mapRoute) };
}
