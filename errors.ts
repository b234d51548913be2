export type SpatialIndexErrorCode = "EMPTY_INPUT" | "EMPTY_TREE" | "INVALID_COORDINATE" | "INVALID_RECORD";

export class SpatialIndexError extends Error {
  readonly code: SpatialIndexErrorCode;

  constructor(code: SpatialIndexErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = new.target.name;
  }
}

export class EmptyInputError extends SpatialIndexError {
  constructor() {
    super("EMPTY_INPUT", "cannot build a K-D tree from zero points");
  }
}

export class EmptyTreeError extends SpatialIndexError {
  constructor() {
    super("EMPTY_TREE", "cannot query an index that holds no points");
  }
}

export class InvalidCoordinateError extends SpatialIndexError {
  readonly x: number;
  readonly y: number;

  constructor(x: number, y: number, reason = "coordinates must be finite numbers") {
    super("INVALID_COORDINATE", `invalid coordinate (${x}, ${y}): ${reason}`);
    this.x = x;
    this.y = y;
  }
}

export class InvalidRecordError extends SpatialIndexError {
  readonly field: string;

  constructor(field: string, value: unknown) {
    super("INVALID_RECORD", `invalid ${field}: ${JSON.stringify(value)}`);
    this.field = field;
  }
}
