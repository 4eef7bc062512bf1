import { describe, expect, it, vi } from 'vitest';
import { createTablesClient } from '../src/client';
import { TableError } from '../src/errors';
import type { Transport } from '../src/http/transport';
import type { RequestDescriptor, ServiceResponse } from '../src/types';
import { captureError } from './support/capture';

const ok: ServiceResponse = { status: 200, statusText: 'OK', headers: {}, body: '[]' };

describe('createTablesClient', () => {
  it('rejects an app url that is not absolute', () => {
    const err = captureError(() => createTablesClient({ appUrl: 'not a url' }));
    expect(err).toBeInstanceOf(TableError);
    expect(err).toMatchObject({ kind: 'InvalidArgument', message: 'appUrl must be an absolute URL' });
  });

  it('rejects blank table names synchronously', () => {
    const client = createTablesClient({ appUrl: 'https://tables.test' });
    expect(captureError(() => client.getTable('   '))).toMatchObject({
      kind: 'InvalidArgument',
      message: 'Invalid table name',
    });
  });

  it('parses wire-form default system properties', () => {
    const client = createTablesClient({ appUrl: 'https://tables.test', systemProperties: '__version' });
    expect([...client.getTable('todoitem').systemProperties]).toEqual(['Version']);
  });

  it('gives each table its own copy of the system properties', () => {
    const client = createTablesClient({ appUrl: 'https://tables.test', systemProperties: '*' });
    const first = client.getTable('a');
    first.systemProperties = new Set();
    expect(client.getTable('b').systemProperties.size).toBe(3);
    expect(first.systemProperties.size).toBe(0);
  });

  it('dispatches through a supplied transport', async () => {
    const send = vi.fn(async (_request: RequestDescriptor) => ok);
    const transport: Transport = { send };
    const client = createTablesClient({ appUrl: 'https://tables.test/app/', transport, systemProperties: '' });

    const rows = await client.getTable('todoitem').read([['mode', 'fast']]);

    expect(rows).toEqual([]);
    expect(send).toHaveBeenCalledOnce();
    expect(send).toHaveBeenCalledWith({
      method: 'GET',
      url: 'https://tables.test/app/tables/todoitem?mode=fast',
      headers: {},
    });
  });

  it('reports responses that are not JSON objects', async () => {
    const transport: Transport = { send: async () => ({ ...ok, body: '"just a string"' }) };
    const table = createTablesClient({ appUrl: 'https://tables.test', transport }).getTable('todoitem');

    await expect(table.lookup('a')).rejects.toMatchObject({ kind: 'InvalidResponse' });
    await expect(table.read()).rejects.toMatchObject({ kind: 'InvalidResponse' });
  });

  it('accepts inline-count pages from read', async () => {
    const page = JSON.stringify({ results: [{ id: 'a' }], count: 1 });
    const transport: Transport = { send: async () => ({ ...ok, body: page }) };
    const table = createTablesClient({ appUrl: 'https://tables.test', transport }).getTable('todoitem');

    await expect(table.read()).resolves.toEqual([{ id: 'a' }]);
  });
});
