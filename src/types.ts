export type TableName = string;

/** One table row as sent to or received from the service. */
export type Entity = Record<string, unknown>;

export type StringId = { kind: 'string'; value: string };
export type NumericId = { kind: 'numeric'; value: bigint };
export type Identifier = StringId | NumericId;

/** Anything an operation accepts where an id is expected. */
export type IdentifierInput = string | number | bigint | Entity | null | undefined;

export type QueryParameter = readonly [name: string, value: string];
export type QueryParameters = readonly QueryParameter[];

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export interface RequestDescriptor {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface ServiceResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>; // lower-cased names
  body: string;
}
