import { z } from 'zod';
import { TableError } from '../errors';
import { fromEtag } from '../etag/codec';
import { VERSION_PROPERTY } from '../systemProperties/codec';
import type { Entity, ServiceResponse } from '../types';

// ---------- Schemas ----------
const entitySchema = z.record(z.unknown());

const entityListSchema = z.union([
  z.array(entitySchema),
  // inline-count form
  z.object({ results: z.array(entitySchema), count: z.number().optional() }).transform((page) => page.results),
]);

function parseJson(response: ServiceResponse, what: string): unknown {
  try {
    return JSON.parse(response.body);
  } catch (err) {
    throw new TableError('InvalidResponse', `${what}: response body is not JSON`, { cause: err });
  }
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, response: ServiceResponse, what: string): T {
  const parsed = schema.safeParse(parseJson(response, what));
  if (!parsed.success) {
    throw new TableError('InvalidResponse', `${what}: unexpected response shape (${parsed.error.issues[0]?.message ?? 'invalid'})`);
  }
  return parsed.data;
}

/** Entity from a single-row response; an ETag header becomes `__version`. */
export function parseEntity(response: ServiceResponse, what: string): Entity {
  const entity = parseWith(entitySchema, response, what);
  const etag = response.headers.etag;
  if (etag) entity[VERSION_PROPERTY] = fromEtag(etag);
  return entity;
}

export function parseEntities(response: ServiceResponse, what: string): Entity[] {
  return parseWith(entityListSchema, response, what);
}
