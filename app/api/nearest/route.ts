import { NextResponse } from 'next/server';
import { SpatialIndex } from '../../../KdTree';
import { readConfig } from '../../../config';
import { lonLatToMercator, projectedToGroundMeters } from '../../../geo';
import { PointRecord } from '../../../point';
import { describeTree, isTreeRow, parseCoordinate, toTreeRecord, type TreeRow } from '../../../trees';
import { BadRequestError, errorResponse, readJsonBody } from '../respond';

function readTreeRows(value: unknown, maxPoints: number): TreeRow[] {
  if (!Array.isArray(value)) throw new BadRequestError('trees must be an array of tree rows');
  if (value.length > maxPoints) {
    throw new BadRequestError(`Too many trees: ${value.length} > ${maxPoints}`);
  }
  return value.map((row: unknown, i) => {
    if (!isTreeRow(row)) throw new BadRequestError(`trees[${i}] is not a tree row`);
    return row;
  });
}

function readDegrees(body: Record<string, unknown>, name: 'lon' | 'lat'): number {
  const value = body[name];
  if (typeof value !== 'number' && typeof value !== 'string') {
    throw new BadRequestError(`${name} must be a number`);
  }
  return parseCoordinate(value);
}

export async function POST(req: Request) {
  try {
    const { maxPoints } = readConfig();
    const body = await readJsonBody(req);
    const records = readTreeRows(body.trees, maxPoints).map(toTreeRecord);
    const lon = readDegrees(body, 'lon');
    const lat = readDegrees(body, 'lat');

    if (body.project === true) {
      // index in Web Mercator meters, carrying the lat/lon record as payload
      const index = SpatialIndex.build(
        records.map((r) => {
          const [x, y] = lonLatToMercator([r.y, r.x]);
          return new PointRecord(x, y, r);
        })
      );
      const [qx, qy] = lonLatToMercator([lon, lat]);
      const { point: record, distance } = index.nearest(qx, qy);
      return NextResponse.json({
        tree: record.payload,
        description: describeTree(record),
        distance,
        distanceMeters: projectedToGroundMeters(distance, lat),
      });
    }

    const { record, distance } = SpatialIndex.build(records).nearest(lat, lon);
    return NextResponse.json({
      tree: record.payload,
      description: describeTree(record),
      distance,
    });
  } catch (e) {
    return errorResponse(e);
  }
}
