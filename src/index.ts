export { createTablesClient, TablesClient, type TablesClientOptions } from './client';
export { config } from './config';
export {
  IdentifierError,
  TableError,
  TransportError,
  type IdentifierErrorKind,
  type TableErrorKind,
} from './errors';
export { fromEtag, toEtag } from './etag/codec';
export { FetchTransport } from './http/fetchTransport';
export type { FetchLike, Transport } from './http/transport';
export {
  ID_FIELD,
  ID_FIELD_VARIANTS,
  canonicalizeIdField,
  findIdField,
  formatIdentifier,
  normalizeEntity,
  normalizeIdentifier,
  toIdentifier,
  type NormalizedEntity,
} from './ids/normalize';
export {
  MAX_STRING_ID_LENGTH,
  isDefaultIdentifier,
  isDefaultNumericId,
  isDefaultStringId,
  isValidNumericId,
  isValidStringId,
  requireConcreteId,
} from './ids/validate';
export { createLogger, getLogger, type Logger } from './logger';
export {
  ALL_SYSTEM_PROPERTIES,
  NO_SYSTEM_PROPERTIES,
  SYSTEM_PROPERTIES,
  SYSTEM_PROPERTIES_PARAMETER,
  SYSTEM_PROPERTY_PREFIX,
  VERSION_PROPERTY,
  encodeSystemProperties,
  mergeSystemProperties,
  parseSystemProperties,
  readVersion,
  stripSystemProperties,
  systemPropertyName,
  type SystemProperty,
  type SystemPropertySet,
} from './systemProperties/codec';
export type { CompletionCallback } from './table/completion';
export { patchEntity } from './table/patch';
export { cloneEntity, serializeEntity } from './entity';
export {
  buildTableUrl,
  shapeDelete,
  shapeInsert,
  shapeLookup,
  shapeRead,
  shapeUpdate,
  type ShapedRequest,
  type TableContext,
} from './table/requestShaper';
export { Table } from './table/table';
export type * from './types';
