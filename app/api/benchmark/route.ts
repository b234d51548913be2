import { NextResponse } from 'next/server';
import { searchNearest, SpatialIndex } from '../../../KdTree';
import { readConfig } from '../../../config';
import { type Coordinate, PointRecord } from '../../../point';
import { BadRequestError, errorResponse, readJsonBody } from '../respond';
import { seededRandom } from './random';

function nowNs() {
  return process.hrtime.bigint();
}

function requireCount(name: string, value: number, max: number) {
  if (!Number.isInteger(value) || value < 1 || value > max) {
    throw new BadRequestError(`${name} must be an integer between 1 and ${max}`);
  }
  return value;
}

function requireExtent(name: string, value: number) {
  if (!Number.isFinite(value) || value <= 0) {
    throw new BadRequestError(`${name} must be a positive number`);
  }
  return value;
}

function linearNearest(points: PointRecord<number>[], query: Coordinate) {
  let best = Infinity;
  for (const p of points) {
    const d = p.distanceSquaredTo(query);
    if (d < best) best = d;
  }
  return best;
}

export async function POST(req: Request) {
  try {
    const config = readConfig();
    const body = await readJsonBody(req);
    const count = requireCount('count', Number(body.count ?? config.benchmarkPoints), config.maxPoints);
    const queries = requireCount('queries', Number(body.queries ?? config.benchmarkQueries), config.maxPoints);
    if (count * queries > config.benchmarkMaxWork) {
      throw new BadRequestError(`count * queries must not exceed ${config.benchmarkMaxWork}`);
    }
    const seed = Number(body.seed ?? 1);
    const width = requireExtent('width', Number(body.width ?? 10000));
    const height = requireExtent('height', Number(body.height ?? 10000));

    const random = seededRandom(seed);
    const points = Array.from({ length: count }, (_, i) => new PointRecord(random() * width, random() * height, i));
    const probes = Array.from({ length: queries }, (): Coordinate => [random() * width, random() * height]);

    const t0 = nowNs();
    const index = SpatialIndex.build(points);
    const t1 = nowNs();
    const buildMs = Number(t1 - t0) / 1e6;

    let kdVisited = 0;
    const kdDistances: number[] = [];
    const t2 = nowNs();
    for (const q of probes) {
      const found = searchNearest(index.root, q);
      if (found) {
        kdVisited += found.visited;
        kdDistances.push(found.distanceSquared);
      }
    }
    const t3 = nowNs();
    const kdMs = Number(t3 - t2) / 1e6;

    const t4 = nowNs();
    const linDistances = probes.map((q) => linearNearest(points, q));
    const t5 = nowNs();
    const linMs = Number(t5 - t4) / 1e6;

    const mismatches = linDistances.filter((d, i) => kdDistances[i] !== d).length;

    return NextResponse.json({
      count,
      queries,
      buildMs,
      kdMs,
      linMs,
      mismatches,
      kdVisited,
      linVisited: count * queries,
      height: index.height(),
    });
  } catch (e) {
    return errorResponse(e);
  }
}
