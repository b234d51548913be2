import { InvalidCoordinateError } from "./errors";

export type Axis = 0 | 1;
export type Coordinate = readonly [x: number, y: number];

// beyond this, squared distances between two points can overflow to Infinity
export const MAX_COORDINATE = Math.sqrt(Number.MAX_VALUE) / 4;

export function assertCoordinate(x: number, y: number): Coordinate {
  if (!Number.isFinite(x) || !Number.isFinite(y)) {
    throw new InvalidCoordinateError(x, y);
  }
  if (Math.abs(x) > MAX_COORDINATE || Math.abs(y) > MAX_COORDINATE) {
    throw new InvalidCoordinateError(x, y, `magnitude exceeds ${MAX_COORDINATE}`);
  }
  return [x, y];
}

export function distanceSquared(a: Coordinate, b: Coordinate): number {
  const dx = a[0] - b[0];
  const dy = a[1] - b[1];
  return dx * dx + dy * dy;
}

/** One indexed location. The payload is carried through the index untouched. */
export class PointRecord<P> {
  readonly x: number;
  readonly y: number;
  readonly payload: P;

  constructor(x: number, y: number, payload: P) {
    assertCoordinate(x, y);
    this.x = x;
    this.y = y;
    this.payload = payload;
    Object.freeze(this);
  }

  coordinate(axis: Axis): number {
    return axis === 0 ? this.x : this.y;
  }

  get position(): Coordinate {
    return [this.x, this.y];
  }

  distanceSquaredTo(query: Coordinate): number {
    return distanceSquared(this.position, query);
  }

  distanceTo(query: Coordinate): number {
    return Math.sqrt(this.distanceSquaredTo(query));
  }
}
