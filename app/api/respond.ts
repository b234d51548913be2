import { NextResponse } from 'next/server';
import { SpatialIndexError } from '../../errors';

export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function readJsonBody(req: Request): Promise<Record<string, unknown>> {
  let body: unknown;
  try {
    body = await req.json();
  } catch (err) {
    throw new BadRequestError(`Failed to parse JSON body: ${String(err)}`);
  }
  if (!isRecord(body)) throw new BadRequestError('Request body must be a JSON object');
  return body;
}

export function errorResponse(e: unknown) {
  if (e instanceof SpatialIndexError) {
    return NextResponse.json({ error: e.message, code: e.code }, { status: 400 });
  }
  if (e instanceof BadRequestError) {
    return NextResponse.json({ error: e.message }, { status: 400 });
  }
  console.error('Request failed:', e);
  return NextResponse.json({ error: String(e) }, { status: 500 });
}
