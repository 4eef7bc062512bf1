import type { RequestDescriptor, ServiceResponse } from '../types';

/** Single-shot outbound call. No retry at this layer. */
export interface Transport {
  send(request: RequestDescriptor): Promise<ServiceResponse>;
}

/** The slice of `fetch` the client relies on; the global one fits. */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;
