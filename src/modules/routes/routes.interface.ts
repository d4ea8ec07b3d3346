import type { LatLng } from "../google-maps/google-maps.interface";
import type { DEFAULT_ROUTE_PREFERENCES } from "./routes.const";

export interface RouteWaypoint {
  location: {
    latLng: LatLng;
  };
}

export type ComputeRoutesRequest = typeof DEFAULT_ROUTE_PREFERENCES & {
  origin: RouteWaypoint;
  destination: RouteWaypoint;
  departureTime: string;
};

export interface Route {
  distanceMeters: number;
  duration: string; // provider format, e.g. "1234s"
  polyline: {
    encodedPolyline: string;
  };
}

export interface RoutesResult {
  routes: Route[];
}
