import { cloneEntity } from '../entity';
import { IdentifierError } from '../errors';
import type { Entity, Identifier } from '../types';
import { isInt64 } from './validate';

export const ID_FIELD = 'id';

/** Every casing of the id field the service accepts. */
export const ID_FIELD_VARIANTS = ['id', 'Id', 'iD', 'ID'] as const;
export type IdFieldName = (typeof ID_FIELD_VARIANTS)[number];

const ID_FIELD_LOOKUP: ReadonlySet<string> = new Set(ID_FIELD_VARIANTS);

function isIdFieldName(key: string): key is IdFieldName {
  return ID_FIELD_LOOKUP.has(key);
}

export function isEntity(value: unknown): value is Entity {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Returns the entity's id key: exact `id` wins, otherwise the first variant in entry order. */
export function findIdField(entity: Entity): IdFieldName | null {
  if (Object.prototype.hasOwnProperty.call(entity, ID_FIELD)) return ID_FIELD;
  for (const key of Object.keys(entity)) {
    if (isIdFieldName(key)) return key;
  }
  return null;
}

/**
 * Renames a differently-cased id key to `id`, IN PLACE. The value is carried over unchanged.
 * Use {@link normalizeEntity} when the caller's object must stay untouched.
 */
export function canonicalizeIdField(entity: Entity): IdFieldName | null {
  const field = findIdField(entity);
  if (field === null || field === ID_FIELD) return field;

  const value = entity[field];
  delete entity[field];
  entity[ID_FIELD] = value;
  return field;
}

function toNumericId(value: number | bigint): Identifier {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new IdentifierError('InvalidIdentifierShape', 'The id must be numeric or string.');
  }
  const int = typeof value === 'bigint' ? value : BigInt(Math.trunc(value));
  if (!isInt64(int)) {
    throw new IdentifierError('InvalidNumericIdentifier', 'The numeric id is outside the 64-bit range.');
  }
  return { kind: 'numeric', value: int };
}

/** Identifier from an id value already pulled out of an entity (or given directly). */
export function toIdentifier(value: unknown): Identifier {
  switch (typeof value) {
    case 'string':
      return { kind: 'string', value };
    case 'number':
    case 'bigint':
      return toNumericId(value);
    default:
      throw new IdentifierError('InvalidIdentifierShape', 'The id must be numeric or string.');
  }
}

function identifierOfCanonicalEntity(entity: Entity): Identifier {
  const value = entity[ID_FIELD];
  if (value === null || value === undefined) {
    throw new IdentifierError(
      'MissingIdentifier',
      'You must specify an id property with a valid numeric or string value.',
    );
  }
  return toIdentifier(value);
}

/**
 * Normalizes a raw id or an entity into an {@link Identifier}.
 * Entities are canonicalized in place (see {@link canonicalizeIdField}).
 */
export function normalizeIdentifier(input: unknown): Identifier {
  if (input === null || input === undefined) {
    throw new IdentifierError('MissingIdentifier', 'Element or id cannot be null.');
  }
  if (isEntity(input)) {
    canonicalizeIdField(input);
    return identifierOfCanonicalEntity(input);
  }
  return toIdentifier(input);
}

export interface NormalizedEntity {
  identifier: Identifier;
  entity: Entity;
}

/** Copy-first normalization: the returned entity is a canonicalized clone. */
export function normalizeEntity(entity: Entity): NormalizedEntity {
  const copy = cloneEntity(entity);
  canonicalizeIdField(copy);
  return { identifier: identifierOfCanonicalEntity(copy), entity: copy };
}

export function formatIdentifier(id: Identifier): string {
  return id.kind === 'string' ? id.value : id.value.toString(10);
}
