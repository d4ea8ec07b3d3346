import { describe, expect, it } from "vitest";
import { computeRoutesSchema } from "./compute-routes.dto";

const valid = {
  originLocation: { latitude: 51.5072, longitude: -0.1276 },
  destinationLocation: { latitude: 51.4545, longitude: -2.5879 },
  departureTime: "2030-01-01T08:00:00Z",
};

describe("computeRoutesSchema", () => {
  it("accepts a complete body", () => {
    expect(computeRoutesSchema.parse(valid)).toEqual(valid);
  });

  it("does not validate the departure time format", () => {
    expect(computeRoutesSchema.safeParse({ ...valid, departureTime: "soon" }).success).toBe(true);
  });

  it("rejects a missing destination", () => {
    const { destinationLocation: _destinationLocation, ...body } = valid;
    const result = computeRoutesSchema.safeParse(body);

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(["destinationLocation"]);
  });

  it("rejects coordinates sent as strings", () => {
    const result = computeRoutesSchema.safeParse({
      ...valid,
      originLocation: { latitude: "51.5", longitude: -0.1276 },
    });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(["originLocation", "latitude"]);
  });
});
