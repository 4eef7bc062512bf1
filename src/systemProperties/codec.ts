import { cloneEntity } from '../entity';
import { TableError } from '../errors';
import type { Entity, QueryParameters } from '../types';

export const SYSTEM_PROPERTY_PREFIX = '__';
export const SYSTEM_PROPERTIES_PARAMETER = '__systemproperties';
export const SYSTEM_PROPERTIES_WILDCARD = '*';

/** Known system properties, in canonical wire order. */
export const SYSTEM_PROPERTIES = ['CreatedAt', 'UpdatedAt', 'Version'] as const;
export type SystemProperty = (typeof SYSTEM_PROPERTIES)[number];
export type SystemPropertySet = ReadonlySet<SystemProperty>;

export const ALL_SYSTEM_PROPERTIES: SystemPropertySet = new Set(SYSTEM_PROPERTIES);
export const NO_SYSTEM_PROPERTIES: SystemPropertySet = new Set();

/** `UpdatedAt` -> `__updatedAt` */
export function systemPropertyName(property: SystemProperty): string {
  return `${SYSTEM_PROPERTY_PREFIX}${property.charAt(0).toLowerCase()}${property.slice(1)}`;
}

export const VERSION_PROPERTY = systemPropertyName('Version');

// lower-cased wire names (prefix optional) -> property
const PROPERTY_BY_TOKEN: ReadonlyMap<string, SystemProperty> = new Map(
  SYSTEM_PROPERTIES.flatMap((p) => [
    [systemPropertyName(p).toLowerCase(), p] as const,
    [p.toLowerCase(), p] as const,
  ]),
);

export function isSystemPropertyKey(key: string): boolean {
  return key.startsWith(SYSTEM_PROPERTY_PREFIX);
}

export function isSystemPropertiesParameter(name: string): boolean {
  return name.toLowerCase() === SYSTEM_PROPERTIES_PARAMETER;
}

/**
 * Wire value for the `__systemproperties` query parameter, or null when nothing is requested.
 * Order follows {@link SYSTEM_PROPERTIES}, not the caller's insertion order.
 */
export function encodeSystemProperties(properties: SystemPropertySet | null | undefined): string | null {
  if (!properties || properties.size === 0) return null;
  if (SYSTEM_PROPERTIES.every((p) => properties.has(p))) return SYSTEM_PROPERTIES_WILDCARD;

  return SYSTEM_PROPERTIES.filter((p) => properties.has(p))
    .map(systemPropertyName)
    .join(',');
}

/** Inverse of {@link encodeSystemProperties}; accepts `*`, blanks, and tokens in any case. */
export function parseSystemProperties(value: string | null | undefined): SystemPropertySet {
  const trimmed = (value ?? '').trim();
  if (!trimmed) return NO_SYSTEM_PROPERTIES;
  if (trimmed === SYSTEM_PROPERTIES_WILDCARD) return ALL_SYSTEM_PROPERTIES;

  const result = new Set<SystemProperty>();
  for (const raw of trimmed.split(',')) {
    const token = raw.trim();
    if (!token) continue;
    const property = PROPERTY_BY_TOKEN.get(token.toLowerCase());
    if (!property) {
      throw new TableError('InvalidArgument', `Unknown system property: ${token}`);
    }
    result.add(property);
  }
  return result;
}

/**
 * Adds the table's requested system properties to a copy of the caller's parameters.
 * An explicit `__systemproperties` parameter (any casing) wins and nothing is added.
 */
export function mergeSystemProperties(
  properties: SystemPropertySet | null | undefined,
  parameters: QueryParameters = [],
): QueryParameters {
  const result = [...parameters];
  if (parameters.some(([name]) => isSystemPropertiesParameter(name))) return result;

  const encoded = encodeSystemProperties(properties);
  if (encoded !== null) result.push([SYSTEM_PROPERTIES_PARAMETER, encoded]);
  return result;
}

/**
 * Drops every `__`-prefixed key. The input is never mutated: it is cloned once, on the
 * first system property found. With none present the same reference comes back.
 */
export function stripSystemProperties(entity: Entity): Entity {
  let result: Entity | null = null;
  for (const key of Object.keys(entity)) {
    if (!isSystemPropertyKey(key)) continue;
    if (result === null) result = cloneEntity(entity);
    delete result[key];
  }
  return result ?? entity;
}

export function readVersion(entity: Entity): string | null {
  let version: string | null = null;
  for (const [key, value] of Object.entries(entity)) {
    if (key.toLowerCase() !== VERSION_PROPERTY.toLowerCase()) continue;
    if (typeof value === 'string') version = value;
    else if (typeof value === 'number' || typeof value === 'bigint') version = value.toString();
  }
  return version;
}
