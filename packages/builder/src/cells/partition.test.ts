import { describe, it, expect } from "vitest";
import type { WaypointRow } from "@roadgrid/types";
import { partitionCell, partitionCells } from "./partition.js";
import { haversineDistance } from "../geo/index.js";
import { createIdAllocator } from "../resample/id-allocator.js";
import {
  DuplicateCoordinateConflictError,
  InvalidParameterError,
  MalformedRowError,
} from "../errors.js";

const unit = { minLat: 0, minLon: 0, maxLat: 1, maxLon: 1 };

function row(roadId: string, nodeId: string, lat: number, lon: number): WaypointRow {
  return { roadId, nodeId, lat, lon };
}

/** Road that leaves the cell eastward and comes back */
const reentering = [
  row("W2", "A", 0.5, 0.2),
  row("W2", "B", 0.5, 0.4),
  row("W2", "C", 0.5, 1.5),
  row("W2", "D", 0.5, 1.6),
  row("W2", "E", 0.5, 0.8),
  row("W2", "F", 0.5, 0.6),
];

const p = (lat: number, lon: number) => ({ lat, lon });

describe("partitionCell", () => {
  it("keeps a fully-inside road untagged and sums its hops", () => {
    const rows = [row("W1", "a", 0.2, 0.2), row("W1", "b", 0.3, 0.3), row("W1", "c", 0.4, 0.5)];
    const { rows: out, summary } = partitionCell(rows, unit, {
      cellId: 0,
      boundaryMode: "drop",
      ids: createIdAllocator(),
    }).collect();

    expect(out).toEqual([
      { cell: "0,0,1,1_0", roadId: "W1", nodeId: "a", lat: 0.2, lon: 0.2 },
      { cell: "0,0,1,1_0", roadId: "W1", nodeId: "b", lat: 0.3, lon: 0.3 },
      { cell: "0,0,1,1_0", roadId: "W1", nodeId: "c", lat: 0.4, lon: 0.5 },
    ]);
    expect(summary.totalLengthKm).toBeCloseTo(
      haversineDistance(p(0.2, 0.2), p(0.3, 0.3)) + haversineDistance(p(0.3, 0.3), p(0.4, 0.5)),
      9
    );
    expect(summary.rowCount).toBe(3);
    expect(summary.roadCount).toBe(1);
    expect(summary.cell).toBe("0,0,1,1_0");
  });

  it("emits nothing for a road entirely outside", () => {
    const rows = [row("W9", "x", 2, 2), row("W9", "y", 3, 3)];
    const { rows: out, summary } = partitionCell(rows, unit, {
      cellId: 0,
      boundaryMode: "interpolate",
      ids: createIdAllocator(),
    }).collect();

    expect(out).toEqual([]);
    expect(summary.totalLengthKm).toBe(0);
    expect(summary.roadCount).toBe(0);
  });

  it("treats points on the edge as outside", () => {
    const rows = [row("W3", "edge", 0, 0.5), row("W3", "in", 0.5, 0.5)];
    const { rows: out, summary } = partitionCell(rows, unit, {
      cellId: 0,
      boundaryMode: "drop",
      ids: createIdAllocator(),
    }).collect();

    expect(out.map((r) => r.nodeId)).toEqual(["in"]);
    expect(summary.totalLengthKm).toBe(0);
  });

  describe("drop mode", () => {
    it("tags each inside-run of a re-entering road", () => {
      const { rows: out, summary } = partitionCell(reentering, unit, {
        cellId: 0,
        boundaryMode: "drop",
        ids: createIdAllocator(),
      }).collect();

      expect(out.map((r) => r.nodeId)).toEqual([
        "A_segment_0",
        "B_segment_0",
        "E_segment_1",
        "F_segment_1",
      ]);
      expect(summary.totalLengthKm).toBeCloseTo(
        haversineDistance(p(0.5, 0.2), p(0.5, 0.4)) + haversineDistance(p(0.5, 0.8), p(0.5, 0.6)),
        9
      );
    });
  });

  describe("interpolate mode", () => {
    it("closes and reopens runs on the crossed edge", () => {
      const ids = createIdAllocator();
      const { rows: out, summary } = partitionCell(reentering, unit, {
        cellId: 0,
        boundaryMode: "interpolate",
        ids,
      }).collect();

      expect(out).toEqual([
        { cell: "0,0,1,1_0", roadId: "W2", nodeId: "A_segment_0", lat: 0.5, lon: 0.2 },
        { cell: "0,0,1,1_0", roadId: "W2", nodeId: "B_segment_0", lat: 0.5, lon: 0.4 },
        {
          cell: "0,0,1,1_0",
          roadId: "W2",
          nodeId: "Generated node # 1_segment_0",
          lat: 0.5,
          lon: 1,
        },
        {
          cell: "0,0,1,1_0",
          roadId: "W2",
          nodeId: "Generated node # 2_segment_1",
          lat: 0.5,
          lon: 1,
        },
        { cell: "0,0,1,1_0", roadId: "W2", nodeId: "E_segment_1", lat: 0.5, lon: 0.8 },
        { cell: "0,0,1,1_0", roadId: "W2", nodeId: "F_segment_1", lat: 0.5, lon: 0.6 },
      ]);
      expect(ids.peek()).toBe(3);

      const edge = p(0.5, 1);
      expect(summary.totalLengthKm).toBeCloseTo(
        haversineDistance(p(0.5, 0.2), p(0.5, 0.4)) +
          haversineDistance(p(0.5, 0.4), edge) +
          haversineDistance(edge, p(0.5, 0.8)) +
          haversineDistance(p(0.5, 0.8), p(0.5, 0.6)),
        9
      );
      expect(summary.rowCount).toBe(6);
    });

    it("starts a road that begins outside on the edge", () => {
      const rows = [row("W4", "out", -0.5, 0.5), row("W4", "in", 0.5, 0.5)];
      const { rows: out } = partitionCell(rows, unit, {
        cellId: 2,
        boundaryMode: "interpolate",
        ids: createIdAllocator({ start: 10 }),
      }).collect();

      expect(out).toEqual([
        { cell: "0,0,1,1_2", roadId: "W4", nodeId: "Generated node # 10", lat: 0, lon: 0.5 },
        { cell: "0,0,1,1_2", roadId: "W4", nodeId: "in", lat: 0.5, lon: 0.5 },
      ]);
    });
  });

  it("skips a repeated node id", () => {
    const rows = [row("W1", "a", 0.2, 0.2), row("W1", "a", 0.2, 0.2), row("W1", "b", 0.3, 0.3)];
    const { rows: out, summary } = partitionCell(rows, unit, {
      cellId: 0,
      boundaryMode: "drop",
      ids: createIdAllocator(),
    }).collect();

    expect(out.map((r) => r.nodeId)).toEqual(["a", "b"]);
    expect(summary.issues).toEqual([]);
  });

  it("drops a road whose distinct nodes share a position", () => {
    const rows = [
      row("W1", "a", 0.2, 0.2),
      row("W1", "b", 0.2, 0.2),
      row("W1", "c", 0.3, 0.3),
      row("W2", "d", 0.4, 0.4),
    ];
    const { rows: out, summary } = partitionCell(rows, unit, {
      cellId: 0,
      boundaryMode: "drop",
      ids: createIdAllocator(),
    }).collect();

    expect(out.map((r) => r.nodeId)).toEqual(["d"]);
    expect(summary.roadCount).toBe(1);
    expect(summary.issues).toHaveLength(1);
    const issue = summary.issues[0];
    expect(issue?.index).toBe(1);
    expect(issue?.roadId).toBe("W1");
    expect(issue?.error).toBeInstanceOf(DuplicateCoordinateConflictError);
  });

  it("records malformed rows and keeps going", () => {
    const rows = [
      row("W1", "a", 0.2, 0.2),
      { roadId: "W1", nodeId: "b", lat: "x", lon: 0.3 },
      row("W1", "c", 0.4, 0.4),
    ];
    const { rows: out, summary } = partitionCell(rows, unit, {
      cellId: 0,
      boundaryMode: "drop",
      ids: createIdAllocator(),
    }).collect();

    expect(out.map((r) => r.nodeId)).toEqual(["a", "c"]);
    expect(summary.issues).toHaveLength(1);
    expect(summary.issues[0]?.index).toBe(1);
    expect(summary.issues[0]?.error).toBeInstanceOf(MalformedRowError);
  });

  it("rejects a malformed cell before reading any rows", () => {
    let pulled = 0;
    function* rows(): Generator<WaypointRow> {
      pulled++;
      yield row("W1", "a", 0.2, 0.2);
    }

    expect(() =>
      partitionCell(rows(), { ...unit, maxLat: 0 }, {
        cellId: 0,
        boundaryMode: "drop",
        ids: createIdAllocator(),
      })
    ).toThrow(InvalidParameterError);
    expect(pulled).toBe(0);
  });

  it("reads rows lazily", () => {
    let pulled = 0;
    const source = [
      row("W1", "a", 0.2, 0.2),
      row("W1", "b", 0.3, 0.3),
      row("W2", "c", 0.4, 0.4),
      row("W2", "d", 0.5, 0.5),
    ];
    function* rows(): Generator<WaypointRow> {
      for (const r of source) {
        pulled++;
        yield r;
      }
    }

    const partition = partitionCell(rows(), unit, {
      cellId: 0,
      boundaryMode: "drop",
      ids: createIdAllocator(),
    });
    expect(pulled).toBe(0);

    for (const first of partition) {
      expect(first.nodeId).toBe("a");
      break;
    }
    // W1 is only complete once W2's first row is seen
    expect(pulled).toBe(3);
    expect(partition.summary()).toBeNull();
  });

  it("gives the same result on every pass over a re-iterable input", () => {
    const partition = partitionCell(reentering, unit, {
      cellId: 0,
      boundaryMode: "drop",
      ids: createIdAllocator(),
    });

    const first = [...partition];
    const firstSummary = partition.summary();
    const second = [...partition];

    expect(second).toEqual(first);
    expect(partition.summary()).toEqual(firstSummary);
  });
});

describe("CellPartition boundary ids", () => {
  it("draws new boundary ids on every pass from a shared allocator", () => {
    const partition = partitionCell(reentering, unit, {
      cellId: 0,
      boundaryMode: "interpolate",
      ids: createIdAllocator(),
    });

    const first = [...partition].map((r) => r.nodeId);
    const second = [...partition].map((r) => r.nodeId);

    expect(first.slice(2, 4)).toEqual([
      "Generated node # 1_segment_0",
      "Generated node # 2_segment_1",
    ]);
    expect(second.slice(2, 4)).toEqual([
      "Generated node # 3_segment_0",
      "Generated node # 4_segment_1",
    ]);
  });

  it("repeats ids when each pass has its own allocator", () => {
    const pass = () =>
      partitionCell(reentering, unit, {
        cellId: 0,
        boundaryMode: "interpolate",
        ids: createIdAllocator(),
      }).collect().rows;

    expect(pass()).toEqual(pass());
  });
});

describe("partitionCells", () => {
  it("partitions each cell with its own id", () => {
    const rows = [row("W1", "a", 0.5, 0.5), row("W1", "b", 0.5, 1.5)];
    const cells = [unit, { minLat: 0, minLon: 1, maxLat: 1, maxLon: 2 }];

    const results = partitionCells(rows, cells, {
      boundaryMode: "drop",
      ids: createIdAllocator(),
    });

    expect(results.map((r) => r.summary.cell)).toEqual(["0,0,1,1_0", "0,1,1,2_1"]);
    expect(results.map((r) => r.rows.map((x) => x.nodeId))).toEqual([["a"], ["b"]]);
  });

  it("serves every cell from a one-shot generator", () => {
    function* rows(): Generator<WaypointRow> {
      yield row("W1", "a", 0.5, 0.5);
      yield row("W1", "b", 0.5, 1.5);
    }
    const cells = [unit, { minLat: 0, minLon: 1, maxLat: 1, maxLon: 2 }];

    const results = partitionCells(rows(), cells, {
      boundaryMode: "drop",
      ids: createIdAllocator(),
    });

    expect(results.map((r) => r.rows.map((x) => x.nodeId))).toEqual([["a"], ["b"]]);
  });

  it("rejects a malformed cell before reading any rows", () => {
    let pulled = 0;
    function* rows(): Generator<WaypointRow> {
      pulled++;
      yield row("W1", "a", 0.5, 0.5);
    }

    expect(() =>
      partitionCells(rows(), [unit, { ...unit, minLon: 2 }], {
        boundaryMode: "drop",
        ids: createIdAllocator(),
      })
    ).toThrow(InvalidParameterError);
    expect(pulled).toBe(0);
  });
});
