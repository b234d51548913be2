import { InvalidRecordError } from "./errors";
import { PointRecord } from "./point";

export interface MunicipalTree {
  id: number;
  ward: number;
  species: string;
  diameter: number;
}

/** A tree as an external loader hands it over, fields possibly still text. */
export interface TreeRow {
  id: string | number;
  ward: string | number;
  species: string;
  diameter: string | number;
  lon: string | number;
  lat: string | number;
}

function toInteger(field: keyof TreeRow, value: string | number): number {
  const n = parseCoordinate(value);
  if (!Number.isInteger(n)) throw new InvalidRecordError(field, value);
  return n;
}

// blank text reads as NaN, not 0
export function parseCoordinate(value: string | number): number {
  if (typeof value === "number") return value;
  return value.trim() === "" ? NaN : Number(value);
}

// x = lat, y = lon: latitude is the first split axis
export function toTreeRecord(row: TreeRow): PointRecord<MunicipalTree> {
  if (typeof row.species !== "string" || row.species.length === 0) {
    throw new InvalidRecordError("species", row.species);
  }
  const tree: MunicipalTree = Object.freeze({
    id: toInteger("id", row.id),
    ward: toInteger("ward", row.ward),
    species: row.species,
    diameter: toInteger("diameter", row.diameter),
  });
  return new PointRecord(parseCoordinate(row.lat), parseCoordinate(row.lon), tree);
}

// rounded to 3 places, whole numbers keep one decimal ("2.0")
function formatDegrees(value: number): string {
  const rounded = Math.round(value * 1000) / 1000;
  return Number.isInteger(rounded) ? rounded.toFixed(1) : String(rounded);
}

export function describeTree(record: PointRecord<MunicipalTree>): string {
  const { species, diameter } = record.payload;
  return `${species} at (${formatDegrees(record.x)}, ${formatDegrees(record.y)}) with diameter ${diameter}`;
}

/** Node label for `renderTree`: `lat,lon`. */
export function treeLabel(record: PointRecord<MunicipalTree>): string {
  return `${formatDegrees(record.x)},${formatDegrees(record.y)}`;
}

const isField = (v: unknown): v is string | number => typeof v === "string" || typeof v === "number";

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function isTreeRow(row: unknown): row is TreeRow {
  return (
    isObject(row) &&
    isField(row.id) &&
    isField(row.ward) &&
    typeof row.species === "string" &&
    isField(row.diameter) &&
    isField(row.lon) &&
    isField(row.lat)
  );
}
