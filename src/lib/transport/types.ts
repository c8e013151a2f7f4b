import type { QueryParams } from "../types";

/**
 * Whatever carries requests to vPIC. Resolves with the decoded JSON body or
 * rejects with a TransportError; the clients never retry on their own.
 */
export interface VpicTransport {
  get(path: string, params?: QueryParams): Promise<unknown>;
  post(path: string, form: Record<string, string>, params?: QueryParams): Promise<unknown>;
}

export interface TransportOptions {
  baseUrl?: string;
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
}
