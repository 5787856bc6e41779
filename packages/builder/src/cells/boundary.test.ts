import { describe, it, expect } from "vitest";
import { boundaryCrossing } from "./boundary.js";

const unit = { minLat: 0, minLon: 0, maxLat: 1, maxLon: 1 };

describe("boundaryCrossing", () => {
  it("lands on the east edge for an eastward hop", () => {
    const point = boundaryCrossing({ lat: 0.5, lon: 0.5 }, { lat: 0.5, lon: 1.5 }, unit);
    expect(point).toEqual({ lat: 0.5, lon: 1 });
  });

  it("lands on the south edge for a southward hop", () => {
    const point = boundaryCrossing({ lat: 0.2, lon: 0.5 }, { lat: -0.8, lon: 0.5 }, unit);
    expect(point).toEqual({ lat: 0, lon: 0.5 });
  });

  it("uses the edge reached first on a diagonal hop", () => {
    // Longitude reaches 1 a quarter of the way; latitude would need half
    const point = boundaryCrossing({ lat: 0.5, lon: 0.5 }, { lat: 1.5, lon: 2.5 }, unit);
    expect(point.lon).toBe(1);
    expect(point.lat).toBeCloseTo(0.75, 9);
  });

  it("snaps both axes when the hop leaves through a corner", () => {
    const point = boundaryCrossing({ lat: 0.5, lon: 0.5 }, { lat: 1.5, lon: 1.5 }, unit);
    expect(point).toEqual({ lat: 1, lon: 1 });
  });

  it("returns the outside point when it already sits on the edge", () => {
    const point = boundaryCrossing({ lat: 0.5, lon: 0.5 }, { lat: 0.5, lon: 1 }, unit);
    expect(point).toEqual({ lat: 0.5, lon: 1 });
  });
});
