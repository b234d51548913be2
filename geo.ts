// lib/geo.ts
import { InvalidCoordinateError } from "./errors";

const R = 6378137; // Web Mercator radius in meters
export const MAX_MERCATOR_LATITUDE = 85.05112878;

export function lonLatToMercator([lon, lat]: [number, number]): [number, number] {
  if (!Number.isFinite(lon) || !Number.isFinite(lat)) {
    throw new InvalidCoordinateError(lon, lat);
  }
  if (Math.abs(lat) > MAX_MERCATOR_LATITUDE) {
    throw new InvalidCoordinateError(lon, lat, `latitude beyond ±${MAX_MERCATOR_LATITUDE}`);
  }
  const λ = (lon * Math.PI) / 180;
  const φ = (lat * Math.PI) / 180;
  const x = R * λ;
  const y = R * Math.log(Math.tan(Math.PI / 4 + φ / 2));
  return [x, y];
}

// projected lengths near `lat` are this many times their length on the ground
export function mercatorScale(lat: number): number {
  return 1 / Math.cos((lat * Math.PI) / 180);
}

export function projectedToGroundMeters(projected: number, lat: number): number {
  return projected / mercatorScale(lat);
}
