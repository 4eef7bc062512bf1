import { TableError } from '../errors';
import type { Transport } from '../http/transport';
import type { Logger } from '../logger';
import type { SystemPropertySet } from '../systemProperties/codec';
import type { Entity, IdentifierInput, QueryParameters, ServiceResponse, TableName } from '../types';
import { deliver, type CompletionCallback } from './completion';
import { patchEntity } from './patch';
import {
  shapeDelete,
  shapeInsert,
  shapeLookup,
  shapeRead,
  shapeUpdate,
  type ShapedRequest,
  type TableContext,
} from './requestShaper';
import { parseEntities, parseEntity } from './responses';

/** What a table borrows from its client. */
export interface TableHost {
  appUrl: string;
  transport: Transport;
  logger: Logger;
}

type OperationName = 'delete' | 'lookup' | 'insert' | 'update' | 'read';

/**
 * One remote table. Every operation validates, shapes and dispatches a single request;
 * local failures never throw synchronously, they reject (or reach the callback) like
 * transport failures do, and no request is sent.
 */
export class Table {
  readonly name: TableName;
  private systemPropertySet: SystemPropertySet;
  private readonly host: TableHost;
  private readonly log: Logger;

  constructor(name: TableName, host: TableHost, systemProperties: SystemPropertySet) {
    if (typeof name !== 'string' || name.trim().length === 0) {
      throw new TableError('InvalidArgument', 'Invalid table name');
    }
    this.name = name;
    this.host = host;
    this.systemPropertySet = systemProperties;
    this.log = host.logger.child({ table: name });
  }

  /** Requested on every call unless the caller passes `__systemproperties` itself. */
  get systemProperties(): SystemPropertySet {
    return this.systemPropertySet;
  }

  set systemProperties(properties: SystemPropertySet) {
    this.systemPropertySet = new Set(properties);
  }

  delete(elementOrId: IdentifierInput, parameters?: QueryParameters): Promise<ServiceResponse>;
  delete(
    elementOrId: IdentifierInput,
    parameters: QueryParameters | undefined,
    callback: CompletionCallback<ServiceResponse>,
  ): void;
  delete(
    elementOrId: IdentifierInput,
    parameters?: QueryParameters,
    callback?: CompletionCallback<ServiceResponse>,
  ): Promise<ServiceResponse> | void {
    const operation = this.run(
      'delete',
      (context) => shapeDelete(context, elementOrId, parameters),
      (_shaped, response) => response,
    );
    return this.settle(operation, callback);
  }

  lookup(id: IdentifierInput, parameters?: QueryParameters): Promise<Entity>;
  lookup(id: IdentifierInput, parameters: QueryParameters | undefined, callback: CompletionCallback<Entity>): void;
  lookup(id: IdentifierInput, parameters?: QueryParameters, callback?: CompletionCallback<Entity>): Promise<Entity> | void {
    const operation = this.run(
      'lookup',
      (context) => shapeLookup(context, id, parameters),
      (_shaped, response) => parseEntity(response, `lookup on ${this.name}`),
    );
    return this.settle(operation, callback);
  }

  insert(element: Entity, parameters?: QueryParameters): Promise<Entity>;
  insert(element: Entity, parameters: QueryParameters | undefined, callback: CompletionCallback<Entity>): void;
  insert(element: Entity, parameters?: QueryParameters, callback?: CompletionCallback<Entity>): Promise<Entity> | void {
    const operation = this.run(
      'insert',
      (context) => shapeInsert(context, element, parameters),
      (shaped, response) => patchEntity(shaped.entity ?? element, parseEntity(response, `insert into ${this.name}`)),
    );
    return this.settle(operation, callback);
  }

  update(element: Entity, parameters?: QueryParameters): Promise<Entity>;
  update(element: Entity, parameters: QueryParameters | undefined, callback: CompletionCallback<Entity>): void;
  update(element: Entity, parameters?: QueryParameters, callback?: CompletionCallback<Entity>): Promise<Entity> | void {
    const operation = this.run(
      'update',
      (context) => shapeUpdate(context, element, parameters),
      (shaped, response) => patchEntity(shaped.entity ?? element, parseEntity(response, `update on ${this.name}`)),
    );
    return this.settle(operation, callback);
  }

  read(parameters?: QueryParameters): Promise<Entity[]>;
  read(parameters: QueryParameters | undefined, callback: CompletionCallback<Entity[]>): void;
  read(parameters?: QueryParameters, callback?: CompletionCallback<Entity[]>): Promise<Entity[]> | void {
    const operation = this.run(
      'read',
      (context) => shapeRead(context, parameters),
      (_shaped, response) => parseEntities(response, `read on ${this.name}`),
    );
    return this.settle(operation, callback);
  }

  private context(): TableContext {
    return { appUrl: this.host.appUrl, tableName: this.name, systemProperties: this.systemPropertySet };
  }

  private async run<T>(
    operation: OperationName,
    shape: (context: TableContext) => ShapedRequest,
    complete: (shaped: ShapedRequest, response: ServiceResponse) => T,
  ): Promise<T> {
    let shaped: ShapedRequest;
    try {
      shaped = shape(this.context());
    } catch (err) {
      this.log.warn({ err, operation }, 'Table request rejected before dispatch');
      throw err;
    }

    const { method, url } = shaped.request;
    this.log.debug({ operation, method, url }, 'Dispatching table request');

    let response: ServiceResponse;
    try {
      response = await this.host.transport.send(shaped.request);
    } catch (err) {
      this.log.error({ err, operation, method, url }, 'Table request failed');
      throw err;
    }
    return complete(shaped, response);
  }

  private settle<T>(operation: Promise<T>, callback?: CompletionCallback<T>): Promise<T> | void {
    if (!callback) return operation;
    deliver(operation, callback, this.log);
    return undefined;
  }
}
