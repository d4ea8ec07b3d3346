import { describe, expect, it } from "vitest";
import { buildComputeRoutesRequest, mapComputeRoutesResponse } from "./routes.helper";

const input = {
  originLocation: { latitude: 37.419734, longitude: -122.0827784 },
  destinationLocation: { latitude: 37.41767, longitude: -122.079595 },
  departureTime: "2030-10-15T15:01:23.045123456Z",
};

describe("buildComputeRoutesRequest", () => {
  it("nests both coordinates and applies the fixed routing options", () => {
    expect(buildComputeRoutesRequest(input)).toEqual({
      origin: { location: { latLng: { latitude: 37.419734, longitude: -122.0827784 } } },
      destination: { location: { latLng: { latitude: 37.41767, longitude: -122.079595 } } },
      departureTime: "2030-10-15T15:01:23.045123456Z",
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
    });
  });

  it("passes the departure time through unparsed", () => {
    expect(buildComputeRoutesRequest({ ...input, departureTime: "tomorrow-ish" }).departureTime).toBe(
      "tomorrow-ish",
    );
  });
});

describe("mapComputeRoutesResponse", () => {
  it("returns every candidate route in provider order", () => {
    const response = {
      routes: [
        { distanceMeters: 773, duration: "165s", polyline: { encodedPolyline: "ipkcFfichV" } },
        { distanceMeters: 912.5, duration: "201s", polyline: { encodedPolyline: "_p~iF~ps|U" } },
        { distanceMeters: 1020, duration: "240s", polyline: { encodedPolyline: "wa}fEqgquJ" } },
      ],
    };

    expect(mapComputeRoutesResponse(response)).toEqual(response);
  });

  it("returns an empty list when the provider returns no candidates", () => {
    expect(mapComputeRoutesResponse({ routes: [] })).toEqual({ routes: [] });
  });
});
