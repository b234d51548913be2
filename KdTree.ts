// lib/kdTree.ts
import { renderTree, type NodeLabel } from "./display";
import { EmptyInputError, EmptyTreeError, InvalidCoordinateError } from "./errors";
import { assertCoordinate, type Axis, type Coordinate, PointRecord } from "./point";

export class KDNode<P> {
  readonly point: PointRecord<P>;
  readonly axis: Axis; // 0 splits on x, 1 on y
  readonly left: KDNode<P> | null;
  readonly right: KDNode<P> | null;

  constructor(point: PointRecord<P>, axis: Axis, left: KDNode<P> | null = null, right: KDNode<P> | null = null) {
    this.point = point;
    this.axis = axis;
    this.left = left;
    this.right = right;
  }
}

/**
 * Indices of `values` in ascending order of value. Equal values are ordered
 * by `rank` when given, otherwise by their index.
 */
export function argsort(values: readonly number[], rank?: readonly number[]): number[] {
  const indices = values.map((_, i) => i);
  return indices.sort((a, b) => values[a] - values[b] || (rank ? rank[a] - rank[b] : a - b));
}

interface RankedPoint<P> {
  point: PointRecord<P>;
  rank: number; // position in the caller's input
}

function buildSubtree<P>(entries: RankedPoint<P>[], depth: number): KDNode<P> | null {
  if (entries.length === 0) return null;
  const axis: Axis = depth % 2 === 0 ? 0 : 1;
  const order = argsort(
    entries.map((e) => e.point.coordinate(axis)),
    entries.map((e) => e.rank)
  );
  const sorted = order.map((i) => entries[i]);
  const mid = Math.floor(sorted.length / 2);
  return new KDNode(
    sorted[mid].point,
    axis,
    buildSubtree(sorted.slice(0, mid), depth + 1),
    buildSubtree(sorted.slice(mid + 1), depth + 1)
  );
}

/**
 * Builds a K-D tree by median splits on alternating axes (x at even depths,
 * y at odd). Points sharing a split coordinate keep their input order, so the
 * same input always yields the same tree. `points` itself is not reordered.
 */
export function buildKDTree<P>(points: readonly PointRecord<P>[]): KDNode<P> {
  if (points.length === 0) throw new EmptyInputError();
  const entries = points.map((point, rank) => {
    assertCoordinate(point.x, point.y);
    return { point, rank };
  });
  const root = buildSubtree(entries, 0);
  if (!root) throw new EmptyInputError();
  return root;
}

export interface NearestSearch<P> {
  point: PointRecord<P>;
  distanceSquared: number;
  visited: number; // nodes whose distance was computed
}

interface SearchState<P> {
  best: PointRecord<P> | null;
  bestDistanceSquared: number;
  visited: number;
}

function descend<P>(node: KDNode<P> | null, query: Coordinate, state: SearchState<P>): void {
  if (!node) return;
  state.visited++;

  const d2 = node.point.distanceSquaredTo(query);
  if (state.best === null || d2 < state.bestDistanceSquared) {
    state.best = node.point;
    state.bestDistanceSquared = d2;
  }

  // a query lying on the plane goes right first
  const diff = query[node.axis] - node.point.coordinate(node.axis);
  const near = diff < 0 ? node.left : node.right;
  const far = diff < 0 ? node.right : node.left;
  descend(near, query, state);

  // the far side is at least |diff| away along this axis alone
  if (diff * diff < state.bestDistanceSquared) descend(far, query, state);
}

/**
 * Nearest point to `query`, or null for an empty tree. Among equidistant
 * points the first one reached in descent order wins.
 */
export function searchNearest<P>(root: KDNode<P> | null, query: Coordinate): NearestSearch<P> | null {
  const state: SearchState<P> = { best: null, bestDistanceSquared: Infinity, visited: 0 };
  descend(root, query, state);
  if (state.best === null) return null;
  return { point: state.best, distanceSquared: state.bestDistanceSquared, visited: state.visited };
}

function within<P>(root: KDNode<P> | null, query: Coordinate, tolerance: number): boolean {
  if (!root) return false;
  const { x, y } = root.point;
  if (Math.abs(x - query[0]) <= tolerance && Math.abs(y - query[1]) <= tolerance) return true;

  const pivot = root.point.coordinate(root.axis);
  const value = query[root.axis];
  return (
    (value - tolerance <= pivot && within(root.left, query, tolerance)) ||
    (value + tolerance >= pivot && within(root.right, query, tolerance))
  );
}

// True if a point lies within `tolerance` of `query` on both axes
export function containsPoint<P>(root: KDNode<P> | null, query: Coordinate, tolerance = 0): boolean {
  if (!Number.isFinite(tolerance) || tolerance < 0) {
    throw new InvalidCoordinateError(query[0], query[1], `tolerance ${tolerance} must be finite and non-negative`);
  }
  return within(root, query, tolerance);
}

function countNodes<P>(node: KDNode<P> | null): number {
  return node ? 1 + countNodes(node.left) + countNodes(node.right) : 0;
}

function heightOf<P>(node: KDNode<P> | null): number {
  return node ? 1 + Math.max(heightOf(node.left), heightOf(node.right)) : 0;
}

export interface NearestResult<P> {
  point: P;
  record: PointRecord<P>;
  distance: number;
}

export class SpatialIndex<P> {
  readonly root: KDNode<P> | null;
  readonly size: number;

  /** An index without a root holds nothing; use `SpatialIndex.build` to fill one. */
  constructor(root: KDNode<P> | null = null) {
    this.root = root;
    this.size = countNodes(root);
  }

  static build<P>(points: readonly PointRecord<P>[]): SpatialIndex<P> {
    return new SpatialIndex(buildKDTree(points));
  }

  nearest(x: number, y: number): NearestResult<P> {
    const found = searchNearest(this.root, assertCoordinate(x, y));
    if (!found) throw new EmptyTreeError();
    return {
      point: found.point.payload,
      record: found.point,
      distance: Math.sqrt(found.distanceSquared),
    };
  }

  contains(x: number, y: number, tolerance = 0): boolean {
    return containsPoint(this.root, assertCoordinate(x, y), tolerance);
  }

  height(): number {
    return heightOf(this.root);
  }

  /** Every indexed point, in pre-order. */
  points(): PointRecord<P>[] {
    const out: PointRecord<P>[] = [];
    const walk = (node: KDNode<P> | null) => {
      if (!node) return;
      out.push(node.point);
      walk(node.left);
      walk(node.right);
    };
    walk(this.root);
    return out;
  }

  render(label?: NodeLabel<P>): string[] {
    return renderTree(this.root, label);
  }
}

export function buildIndex<P>(points: readonly PointRecord<P>[]): SpatialIndex<P> {
  return SpatialIndex.build(points);
}
