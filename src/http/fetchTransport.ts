import { TransportError } from '../errors';
import type { RequestDescriptor, ServiceResponse } from '../types';
import type { FetchLike, Transport } from './transport';

export class FetchTransport implements Transport {
  private readonly fetchImpl: FetchLike;

  constructor(fetchImpl?: FetchLike) {
    const impl = fetchImpl ?? globalThis.fetch;
    if (!impl) {
      throw new TypeError('FetchTransport: fetch implementation required (pass options.fetch).');
    }
    this.fetchImpl = impl;
  }

  async send(request: RequestDescriptor): Promise<ServiceResponse> {
    const headers: Record<string, string> = { accept: 'application/json', ...request.headers };
    if (request.body !== undefined) headers['content-type'] = 'application/json';

    let res: Response;
    try {
      res = await this.fetchImpl(request.url, {
        method: request.method,
        headers,
        body: request.body,
      });
    } catch (err) {
      throw new TransportError(`${request.method} ${request.url} failed: ${describe(err)}`, { cause: err });
    }

    const response: ServiceResponse = {
      status: res.status,
      statusText: res.statusText,
      headers: collectHeaders(res.headers),
      body: await safeReadBody(res),
    };

    if (!res.ok) {
      throw TransportError.fromResponse(response, `${request.method} ${request.url}`);
    }
    return response;
  }
}

function collectHeaders(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, name) => {
    out[name.toLowerCase()] = value;
  });
  return out;
}

async function safeReadBody(res: Response): Promise<string> {
  try {
    return await res.text();
  } catch {
    return '';
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
