import { describe, it, expect } from "vitest";
import {
  EARTH_RADIUS_KM,
  haversineDistance,
  pathLength,
  pointAtDistance,
  pointAtRatio,
  roadMidpoint,
  roundTo,
  samePosition,
} from "./geo-math.js";

const KM_PER_DEGREE = (EARTH_RADIUS_KM * Math.PI) / 180;

describe("haversineDistance", () => {
  it("returns 0 for identical points", () => {
    const p = { lat: 40.1, lon: -75.38 };
    expect(haversineDistance(p, p)).toBe(0);
  });

  it("is symmetric", () => {
    const pairs = [
      [{ lat: 40.0853, lon: -75.4005 }, { lat: 40.1186, lon: -75.3549 }],
      [{ lat: -33.9, lon: 18.4 }, { lat: -33.95, lon: 18.5 }],
      [{ lat: 0, lon: 0 }, { lat: 0.5, lon: -0.5 }],
    ] as const;

    for (const [a, b] of pairs) {
      expect(haversineDistance(a, b)).toBeCloseTo(haversineDistance(b, a), 12);
    }
  });

  it("measures 0.02° of longitude at the equator as ~2.224 km", () => {
    const d = haversineDistance({ lat: 0, lon: 0 }, { lat: 0, lon: 0.02 });
    expect(d).toBeCloseTo(2.2239, 4);
  });

  it("measures one degree of latitude as R·π/180", () => {
    const d = haversineDistance({ lat: 10, lon: 5 }, { lat: 11, lon: 5 });
    expect(d).toBeCloseTo(KM_PER_DEGREE, 9);
    expect(d).toBeCloseTo(111.1949, 3);
  });

  it("shrinks longitude distances away from the equator", () => {
    const atEquator = haversineDistance({ lat: 0, lon: 0 }, { lat: 0, lon: 1 });
    const at60 = haversineDistance({ lat: 60, lon: 0 }, { lat: 60, lon: 1 });
    expect(at60 / atEquator).toBeCloseTo(0.5, 3);
  });

  it("is never negative", () => {
    const d = haversineDistance({ lat: 1, lon: 1 }, { lat: -1, lon: -1 });
    expect(d).toBeGreaterThan(0);
  });
});

describe("pointAtDistance", () => {
  const a = { lat: 40.1, lon: -75.4 };
  const b = { lat: 40.11, lon: -75.38 };
  const total = haversineDistance(a, b);

  it("returns the far point at distance 0", () => {
    expect(pointAtDistance(a, b, 0, total)).toEqual(a);
  });

  it("returns the near point at the full distance", () => {
    const p = pointAtDistance(a, b, total, total);
    expect(p.lat).toBeCloseTo(b.lat, 12);
    expect(p.lon).toBeCloseTo(b.lon, 12);
  });

  it("interpolates linearly in degree space", () => {
    const p = pointAtDistance(a, b, total / 4, total);
    expect(p.lat).toBeCloseTo(40.1025, 12);
    expect(p.lon).toBeCloseTo(-75.395, 12);
  });

  it("returns the far point for a zero-length chord", () => {
    expect(pointAtDistance(a, a, 1, 0)).toEqual(a);
  });
});

describe("pointAtRatio", () => {
  it("finds the midpoint", () => {
    expect(pointAtRatio({ lat: 0, lon: 0 }, { lat: 2, lon: -4 }, 0.5)).toEqual({
      lat: 1,
      lon: -2,
    });
  });
});

describe("pathLength", () => {
  it("sums consecutive distances", () => {
    const points = [
      { lat: 0, lon: 0 },
      { lat: 0, lon: 0.02 },
      { lat: 0, lon: 0.04 },
    ];
    expect(pathLength(points)).toBeCloseTo(4.4478, 4);
  });

  it("is 0 for fewer than two points", () => {
    expect(pathLength([])).toBe(0);
    expect(pathLength([{ lat: 1, lon: 1 }])).toBe(0);
  });
});

describe("roadMidpoint", () => {
  it("returns the centre of the covered extent", () => {
    const mid = roadMidpoint([
      { lat: 0, lon: 0 },
      { lat: 2, lon: 4 },
      { lat: 1, lon: 1 },
    ]);
    expect(mid).toEqual({ lat: 1, lon: 2 });
  });

  it("returns null for no points", () => {
    expect(roadMidpoint([])).toBeNull();
  });
});

describe("roundTo", () => {
  it("rounds to the requested decimals", () => {
    expect(roundTo(1.0000004, 6)).toBe(1);
    expect(roundTo(1.0000006, 6)).toBe(1.000001);
  });
});

describe("samePosition", () => {
  it("compares both axes", () => {
    expect(samePosition({ lat: 1, lon: 2 }, { lat: 1, lon: 2 })).toBe(true);
    expect(samePosition({ lat: 1, lon: 2 }, { lat: 1, lon: 2.5 })).toBe(false);
  });
});
