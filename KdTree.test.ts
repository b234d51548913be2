import { describe, it, expect } from "vitest";
import { argsort, buildIndex, buildKDTree, KDNode, searchNearest, SpatialIndex } from "./KdTree";
import { EmptyInputError, EmptyTreeError, InvalidCoordinateError } from "./errors";
import { MAX_COORDINATE, PointRecord } from "./point";
import { seededRandom } from "./app/api/benchmark/random";

const pt = (x: number, y: number, id: string) => new PointRecord(x, y, id);

function randomPoints(n: number, seed: number, grid = 0): PointRecord<string>[] {
  const random = seededRandom(seed);
  return Array.from({ length: n }, (_, i) => {
    const x = random() * 100;
    const y = random() * 100;
    return grid ? pt(Math.round(x / grid), Math.round(y / grid), `p${i}`) : pt(x, y, `p${i}`);
  });
}

function subtree<P>(node: KDNode<P> | null): PointRecord<P>[] {
  return node ? [node.point, ...subtree(node.left), ...subtree(node.right)] : [];
}

function linearMinDistance(points: PointRecord<string>[], x: number, y: number): number {
  return Math.sqrt(Math.min(...points.map((p) => p.distanceSquaredTo([x, y]))));
}

describe("argsort", () => {
  it("orders indices by value", () => {
    expect(argsort([])).toEqual([]);
    expect(argsort([3, 1, 2])).toEqual([1, 2, 0]);
    expect(argsort([8, 6, 7, 5, 3, 0, 9])).toEqual([5, 4, 3, 1, 2, 0, 6]);
    expect(argsort([-3, -1, -2])).toEqual([0, 2, 1]);
  });

  it("keeps equal values in index order", () => {
    expect(argsort([4, 2, 2, 3])).toEqual([1, 2, 3, 0]);
  });

  it("breaks ties by rank when given", () => {
    expect(argsort([1, 1, 0], [5, 2, 9])).toEqual([2, 1, 0]);
  });
});

describe("buildKDTree", () => {
  it("rejects empty input", () => {
    expect(() => buildKDTree([])).toThrow(EmptyInputError);
    expect(() => SpatialIndex.build([])).toThrow(EmptyInputError);
  });

  it("splits on the median, x first", () => {
    const root = buildKDTree([pt(3, 3, "c"), pt(1, 1, "a"), pt(2, 2, "b")]);
    expect(root.point.payload).toBe("b");
    expect(root.axis).toBe(0);
    expect(root.left?.point.payload).toBe("a");
    expect(root.left?.axis).toBe(1);
    expect(root.right?.point.payload).toBe("c");
  });

  it("keeps every node's subtrees on the correct side of its split", () => {
    const points = [...randomPoints(400, 3), ...randomPoints(100, 4, 10)];
    const root = buildKDTree(points);

    const check = (node: KDNode<string> | null, depth: number) => {
      if (!node) return;
      expect(node.axis).toBe(depth % 2);
      const pivot = node.point.coordinate(node.axis);
      for (const p of subtree(node.left)) expect(p.coordinate(node.axis)).toBeLessThanOrEqual(pivot);
      for (const p of subtree(node.right)) expect(p.coordinate(node.axis)).toBeGreaterThanOrEqual(pivot);
      check(node.left, depth + 1);
      check(node.right, depth + 1);
    };
    check(root, 0);
  });

  it("indexes every input point exactly once", () => {
    const points = randomPoints(257, 11, 5);
    const index = SpatialIndex.build(points);
    expect(index.size).toBe(257);
    expect(index.points().map((p) => p.payload).sort()).toEqual(points.map((p) => p.payload).sort());
  });

  it("does not reorder the caller's array", () => {
    const points = randomPoints(50, 5);
    const before = points.map((p) => p.payload);
    buildKDTree(points);
    expect(points.map((p) => p.payload)).toEqual(before);
  });

  it("is balanced", () => {
    const index = SpatialIndex.build(randomPoints(7, 1));
    expect(index.height()).toBe(3);
  });
});

describe("SpatialIndex.nearest", () => {
  it("finds the nearest point and its distance", () => {
    const index = SpatialIndex.build([pt(0, 0, "A"), pt(10, 10, "B"), pt(2, 1, "C")]);
    const result = index.nearest(1, 1);
    expect(result.point).toBe("C");
    expect(result.record.x).toBe(2);
    expect(result.distance).toBe(1);
  });

  it("resolves duplicates to the first point reached", () => {
    const index = SpatialIndex.build([pt(5, 5, "A"), pt(5, 5, "B")]);
    expect(index.root?.point.payload).toBe("B");
    expect(index.nearest(5, 5)).toEqual({ point: "B", record: index.root?.point, distance: 0 });
  });

  it("returns the only point of a single-point tree", () => {
    const only = pt(3, -4, "only");
    const index = SpatialIndex.build([only]);
    for (const [x, y] of [[0, 0], [3, -4], [-100, 250.5]]) {
      const result = index.nearest(x, y);
      expect(result.point).toBe("only");
      expect(result.distance).toBe(only.distanceTo([x, y]));
    }
  });

  it("searches the far side when the splitting plane is closer than the best so far", () => {
    const index = SpatialIndex.build([pt(4.9, 0, "l"), pt(5, 100, "r"), pt(6, 50, "n")]);
    const result = index.nearest(5.05, 0);
    expect(result.point).toBe("l");
    expect(result.distance).toBeCloseTo(0.15, 10);
  });

  it("agrees with a linear scan", () => {
    const points = [...randomPoints(300, 21), ...randomPoints(200, 22, 4)];
    const index = SpatialIndex.build(points);
    const random = seededRandom(99);
    for (let i = 0; i < 200; i++) {
      const x = random() * 120 - 10;
      const y = random() * 120 - 10;
      expect(index.nearest(x, y).distance).toBe(linearMinDistance(points, x, y));
    }
  });

  it("gives the same answers for the same input", () => {
    const points = randomPoints(200, 8, 10);
    const a = SpatialIndex.build(points);
    const b = SpatialIndex.build(points);
    const random = seededRandom(12);
    for (let i = 0; i < 50; i++) {
      const x = random() * 100;
      const y = random() * 100;
      expect(a.nearest(x, y)).toEqual(b.nearest(x, y));
    }
  });

  it("prunes subtrees that cannot hold a closer point", () => {
    const root = buildKDTree(randomPoints(1000, 42));
    const found = searchNearest(root, [50.5, 50.5]);
    expect(found?.visited).toBeGreaterThan(0);
    expect(found?.visited).toBeLessThan(250);
  });

  it("stays exact at the largest accepted coordinates", () => {
    const m = MAX_COORDINATE;
    const index = SpatialIndex.build([pt(-m, -m, "A"), pt(m, m, "B"), pt(0, 0, "C")]);
    const result = index.nearest(-m, m);
    expect(result.point).toBe("C");
    expect(Number.isFinite(result.distance)).toBe(true);
    expect(result.distance / m).toBeCloseTo(Math.SQRT2, 12);
    expect(index.nearest(-m, -m).point).toBe("A");
  });

  it("rejects coordinates whose squared distances would overflow", () => {
    expect(() => pt(1e300, 0, "B")).toThrow(InvalidCoordinateError);
    const index = SpatialIndex.build([pt(0, 0, "A")]);
    expect(() => index.nearest(-1e300, 0)).toThrow(InvalidCoordinateError);
  });

  it("rejects non-finite queries", () => {
    const index = SpatialIndex.build([pt(0, 0, "A")]);
    expect(() => index.nearest(NaN, 0)).toThrow(InvalidCoordinateError);
    expect(() => index.nearest(0, Infinity)).toThrow(InvalidCoordinateError);
  });

  it("fails on an index that was never built", () => {
    const index = new SpatialIndex<string>();
    expect(index.size).toBe(0);
    expect(index.height()).toBe(0);
    expect(index.points()).toEqual([]);
    expect(() => index.nearest(0, 0)).toThrow(EmptyTreeError);
    expect(searchNearest(null, [0, 0])).toBeNull();
  });
});

describe("SpatialIndex.contains", () => {
  const index = SpatialIndex.build([pt(0, 0, "A"), pt(10, 10, "B"), pt(2, 1, "C")]);

  it("finds exact coordinates", () => {
    expect(index.contains(2, 1)).toBe(true);
    expect(index.contains(10, 10)).toBe(true);
    expect(index.contains(2, 2)).toBe(false);
  });

  it("matches within a tolerance", () => {
    expect(index.contains(2.000001, 0.999999, 1e-5)).toBe(true);
    expect(index.contains(2.001, 1, 1e-5)).toBe(false);
  });

  it("rejects a negative or non-finite tolerance", () => {
    expect(() => index.contains(2, 1, -1)).toThrow(InvalidCoordinateError);
    expect(() => index.contains(2, 1, NaN)).toThrow(InvalidCoordinateError);
    expect(() => index.contains(2, 1, Infinity)).toThrow(InvalidCoordinateError);
  });

  it("finds points tied with a split coordinate on either side", () => {
    const tied = SpatialIndex.build([pt(1, 0, "a"), pt(1, 5, "b"), pt(1, 9, "c")]);
    expect(tied.root?.point.payload).toBe("b");
    expect(tied.contains(1, 0)).toBe(true);
    expect(tied.contains(1, 9)).toBe(true);
    expect(tied.contains(1, 4)).toBe(false);
  });
});

describe("buildIndex", () => {
  it("builds the same index as SpatialIndex.build", () => {
    const points = [pt(0, 0, "A"), pt(10, 10, "B"), pt(2, 1, "C")];
    const index = buildIndex(points);
    expect(index.size).toBe(3);
    expect(index.nearest(1, 1)).toEqual(SpatialIndex.build(points).nearest(1, 1));
  });

  it("rejects empty input", () => {
    expect(() => buildIndex([])).toThrow(EmptyInputError);
  });
});

describe("SpatialIndex.render", () => {
  it("draws the tree with a custom label", () => {
    const index = SpatialIndex.build([pt(0, 0, "A"), pt(10, 10, "B"), pt(2, 1, "C")]);
    expect(index.render((p) => p.payload)).toEqual([" C ", "| |", "A B"]);
  });
});
