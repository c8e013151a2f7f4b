import { ProxyAgent, fetch as undiciFetch } from "undici";
import { config } from "../config";
import { TransportError, errorFromResponse } from "../errors";
import type { QueryParams } from "../types";
import { VERSION } from "../version";
import type { TransportOptions, VpicTransport } from "./types";

const RETRYABLE_STATUSES = new Set([429, 503]);

export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function getProxyDispatcher(): ProxyAgent | undefined {
  const proxyUrl =
    process.env.HTTPS_PROXY ||
    process.env.https_proxy ||
    process.env.HTTP_PROXY ||
    process.env.http_proxy;
  if (!proxyUrl) return undefined;
  return new ProxyAgent(proxyUrl);
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function buildUrl(baseUrl: string, path: string, params: QueryParams = {}): string {
  const base = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
  const url = new URL(path.replace(/^\/+/, ""), base);
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

/**
 * Default transport: undici fetch with a per-attempt timeout, exponential
 * backoff on 429/503 and timeouts, and proxy support from the environment.
 */
export class HttpTransport implements VpicTransport {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly retries: number;
  readonly retryDelayMs: number;

  constructor(options: TransportOptions = {}) {
    this.baseUrl = options.baseUrl ?? config.baseUrl;
    this.timeoutMs = options.timeoutMs ?? config.timeoutMs;
    this.retries = options.retries ?? config.retries;
    this.retryDelayMs = options.retryDelayMs ?? config.retryDelayMs;
  }

  get(path: string, params?: QueryParams): Promise<unknown> {
    return this.send("GET", buildUrl(this.baseUrl, path, params));
  }

  post(path: string, form: Record<string, string>, params?: QueryParams): Promise<unknown> {
    return this.send("POST", buildUrl(this.baseUrl, path, params), form);
  }

  private async send(
    method: "GET" | "POST",
    url: string,
    form?: Record<string, string>
  ): Promise<unknown> {
    const dispatcher = getProxyDispatcher();

    for (let attempt = 0; ; attempt++) {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

      try {
        const headers: Record<string, string> = {
          Accept: "application/json",
          "Accept-Charset": "utf-8",
          "User-Agent": `vpic-client/${VERSION}`,
        };
        if (form) headers["Content-Type"] = "application/x-www-form-urlencoded";

        const response = await undiciFetch(url, {
          method,
          headers,
          body: form ? new URLSearchParams(form).toString() : undefined,
          signal: controller.signal,
          dispatcher,
        });

        if (RETRYABLE_STATUSES.has(response.status) && attempt < this.retries) {
          const backoff = this.retryDelayMs * Math.pow(2, attempt);
          console.warn(`[vpic] ${response.status} from ${url}, retrying in ${backoff}ms`);
          // Release the connection before waiting
          await response.body?.cancel();
          await delay(backoff);
          continue;
        }

        const text = await response.text();
        if (!response.ok) {
          throw errorFromResponse(response.status, parseJson(text) ?? text, url, response.statusText);
        }

        const body = parseJson(text);
        if (body === undefined) {
          throw new TransportError(`Malformed JSON from ${url}`, {
            status: response.status,
            url,
          });
        }
        return body;
      } catch (error: unknown) {
        if (error instanceof TransportError) throw error;
        if (isAbortError(error)) {
          if (attempt < this.retries) {
            const backoff = this.retryDelayMs * Math.pow(2, attempt);
            console.warn(`[vpic] Timed out after ${this.timeoutMs}ms: ${url}, retrying in ${backoff}ms`);
            await delay(backoff);
            continue;
          }
          throw new TransportError(`Timed out after ${this.timeoutMs}ms: ${url}`, {
            url,
            cause: error,
          });
        }
        const reason = error instanceof Error ? error.message : String(error);
        throw new TransportError(`Request to ${url} failed: ${reason}`, { url, cause: error });
      } finally {
        clearTimeout(timeout);
      }
    }
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
