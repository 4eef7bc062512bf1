import { z } from 'zod';
import { config } from './config';
import { TableError } from './errors';
import { FetchTransport } from './http/fetchTransport';
import type { FetchLike, Transport } from './http/transport';
import { createLogger, type Logger } from './logger';
import { parseSystemProperties, type SystemPropertySet } from './systemProperties/codec';
import { Table, type TableHost } from './table/table';
import type { TableName } from './types';

export interface TablesClientOptions {
  /** Service root; tables live under `<appUrl>/tables/`. Defaults to TABLES_APP_URL. */
  appUrl?: string;
  /** Used for the default {@link FetchTransport}; ignored when `transport` is given. */
  fetch?: FetchLike;
  transport?: Transport;
  logger?: Logger;
  /** Default for every table; a set, or the wire form (`*`, `__createdAt,__version`). */
  systemProperties?: SystemPropertySet | string;
}

const optionsSchema = z.object({
  appUrl: z.string().url('appUrl must be an absolute URL'),
});

export class TablesClient implements TableHost {
  readonly appUrl: string;
  readonly transport: Transport;
  readonly logger: Logger;
  private readonly defaultSystemProperties: SystemPropertySet;

  constructor(options: TablesClientOptions = {}) {
    const parsed = optionsSchema.safeParse({ appUrl: options.appUrl ?? config.appUrl });
    if (!parsed.success) {
      throw new TableError('InvalidArgument', parsed.error.issues.map((issue) => issue.message).join('; '));
    }

    this.appUrl = parsed.data.appUrl;
    this.transport = options.transport ?? new FetchTransport(options.fetch);
    this.logger = options.logger ?? createLogger('table');

    const requested = options.systemProperties ?? config.systemProperties;
    this.defaultSystemProperties =
      typeof requested === 'string' ? parseSystemProperties(requested) : new Set(requested);
  }

  /** A fresh handle on `name`, starting from the client's default system properties. */
  getTable(name: TableName): Table {
    return new Table(name, this, this.defaultSystemProperties);
  }
}

export function createTablesClient(options: TablesClientOptions = {}): TablesClient {
  return new TablesClient(options);
}
