import { cloneEntity, serializeEntity } from '../entity';
import { IdentifierError, TableError } from '../errors';
import { toEtag } from '../etag/codec';
import {
  ID_FIELD,
  canonicalizeIdField,
  formatIdentifier,
  isEntity,
  normalizeEntity,
  normalizeIdentifier,
  toIdentifier,
} from '../ids/normalize';
import { isDefaultIdentifier, isValidIdentifier, requireConcreteId } from '../ids/validate';
import {
  mergeSystemProperties,
  readVersion,
  stripSystemProperties,
  type SystemPropertySet,
} from '../systemProperties/codec';
import type {
  Entity,
  HttpMethod,
  Identifier,
  QueryParameters,
  RequestDescriptor,
  TableName,
} from '../types';

export const TABLES_PATH = 'tables';

/** What every request for one table is built from. Read-only for the duration of a call. */
export interface TableContext {
  appUrl: string;
  tableName: TableName;
  systemProperties: SystemPropertySet;
}

export interface ShapedRequest {
  request: RequestDescriptor;
  identifier?: Identifier;
  /** Canonicalized copy of the caller's entity, when one was given. */
  entity?: Entity;
}

export function encodeTableName(tableName: TableName): string {
  try {
    return encodeURIComponent(tableName);
  } catch (err) {
    throw new TableError('EncodingFailure', `Table name cannot be UTF-8 encoded: ${JSON.stringify(tableName)}`, {
      cause: err,
    });
  }
}

export function encodeQuery(parameters: QueryParameters): string {
  return parameters.map(([name, value]) => `${encodeURIComponent(name)}=${encodeURIComponent(value)}`).join('&');
}

/** `<appUrl>/tables/<table>[/<id>][?query]`; a path on appUrl is kept. */
export function buildTableUrl(
  context: TableContext,
  identifier?: Identifier,
  parameters: QueryParameters = [],
): string {
  const base = context.appUrl.replace(/\/+$/, '');
  const segments = [TABLES_PATH, encodeTableName(context.tableName)];
  if (identifier) segments.push(encodeURIComponent(formatIdentifier(identifier)));

  const merged = mergeSystemProperties(context.systemProperties, parameters);
  const query = encodeQuery(merged);
  return `${base}/${segments.join('/')}${query ? `?${query}` : ''}`;
}

function describeRequest(
  method: HttpMethod,
  url: string,
  options: { body?: Entity; version?: string | null } = {},
): RequestDescriptor {
  const headers: Record<string, string> = {};
  if (options.version) headers['if-match'] = toEtag(options.version);
  const request: RequestDescriptor = { method, url, headers };
  if (options.body !== undefined) request.body = serializeEntity(options.body);
  return request;
}

/** Copy-first normalization plus the concrete-id check shared by delete, lookup and update. */
function resolveConcrete(elementOrId: unknown): { identifier: Identifier; entity?: Entity } {
  if (isEntity(elementOrId)) {
    const { identifier, entity } = normalizeEntity(elementOrId);
    return { identifier: requireConcreteId(identifier, 'id property'), entity };
  }
  return { identifier: requireConcreteId(normalizeIdentifier(elementOrId)) };
}

export function shapeDelete(
  context: TableContext,
  elementOrId: unknown,
  parameters?: QueryParameters,
): ShapedRequest {
  const { identifier, entity } = resolveConcrete(elementOrId);
  const url = buildTableUrl(context, identifier, parameters);
  const version = entity ? readVersion(entity) : null;
  return { request: describeRequest('DELETE', url, { version }), identifier, entity };
}

export function shapeLookup(context: TableContext, id: unknown, parameters?: QueryParameters): ShapedRequest {
  const { identifier } = resolveConcrete(id);
  return { request: describeRequest('GET', buildTableUrl(context, identifier, parameters)), identifier };
}

export function shapeRead(context: TableContext, parameters?: QueryParameters): ShapedRequest {
  return { request: describeRequest('GET', buildTableUrl(context, undefined, parameters)) };
}

/**
 * Insert accepts a missing or default id (the service assigns one) or a valid string id.
 * A default id field is left out of the body.
 */
export function shapeInsert(context: TableContext, element: unknown, parameters?: QueryParameters): ShapedRequest {
  if (!isEntity(element)) {
    throw new IdentifierError('InvalidIdentifierShape', 'The entity to insert must be an object.');
  }

  const { entity: canonical, identifier } = normalizeForInsert(element);
  if (identifier && !isDefaultIdentifier(identifier)) {
    if (identifier.kind === 'numeric') {
      throw new IdentifierError('InvalidNumericIdentifier', 'Cannot insert an entity whose numeric id is already set.');
    }
    if (!isValidIdentifier(identifier)) {
      throw new IdentifierError('InvalidStringIdentifier', 'The entity has an invalid string value on id property.');
    }
  }

  const stripped = stripSystemProperties(canonical);
  const body = identifier && isDefaultIdentifier(identifier) ? omitId(stripped) : stripped;

  const url = buildTableUrl(context, undefined, parameters);
  return { request: describeRequest('POST', url, { body }), identifier, entity: canonical };
}

function normalizeForInsert(element: Entity): { entity: Entity; identifier?: Identifier } {
  const entity = cloneEntity(element);
  canonicalizeIdField(entity);
  const value = entity[ID_FIELD];
  if (value === null || value === undefined) {
    delete entity[ID_FIELD];
    return { entity };
  }
  return { entity, identifier: toIdentifier(value) };
}

function omitId(entity: Entity): Entity {
  const { [ID_FIELD]: _id, ...rest } = entity;
  return rest;
}

export function shapeUpdate(context: TableContext, element: unknown, parameters?: QueryParameters): ShapedRequest {
  if (!isEntity(element)) {
    throw new IdentifierError('InvalidIdentifierShape', 'The entity to update must be an object.');
  }

  const { identifier, entity } = normalizeEntity(element);
  requireConcreteId(identifier, 'id property');
  const version = readVersion(entity);
  const body = stripSystemProperties(entity);
  const url = buildTableUrl(context, identifier, parameters);
  return { request: describeRequest('PATCH', url, { body, version }), identifier, entity };
}
