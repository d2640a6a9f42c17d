import type { Logger } from 'pino';
import { generateJwt } from './auth.js';
import { TransportError } from './types.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryValue = string | number | boolean | undefined;

export interface FileField {
  /** Multipart field name. Default: 'file' */
  field?: string;
  filename: string;
  data: Uint8Array | Blob;
}

export interface TransportRequest {
  query?: Record<string, QueryValue>;
  json?: unknown;
  form?: Record<string, string>;
  files?: FileField[];
}

export interface TransportResponse<T = unknown> {
  status: number;
  ok: boolean;
  /** Parsed JSON body; undefined when the response had none */
  body: T | undefined;
}

/**
 * Performs authenticated HTTP calls against the API. Non-2xx answers are
 * returned, not thrown; only network-level failures throw TransportError.
 */
export interface Transport {
  request<T = unknown>(
    method: HttpMethod,
    path: string,
    init?: TransportRequest
  ): Promise<TransportResponse<T>>;
}

export interface HttpTransportOptions {
  baseUrl: string;
  apiKey: string;
  apiSecret: string;
  fetch: typeof globalThis.fetch;
  timeout: number;
  logger: Logger;
}

/**
 * fetch-backed transport. Every request carries a freshly signed JWT.
 */
export class HttpTransport implements Transport {
  readonly #baseUrl: string;
  readonly #apiKey: string;
  readonly #apiSecret: string;
  readonly #fetch: typeof globalThis.fetch;
  readonly #timeout: number;
  readonly #logger: Logger;

  constructor(options: HttpTransportOptions) {
    this.#baseUrl = options.baseUrl.replace(/\/$/, '');
    this.#apiKey = options.apiKey;
    this.#apiSecret = options.apiSecret;
    this.#fetch = options.fetch;
    this.#timeout = options.timeout;
    this.#logger = options.logger;
  }

  async request<T = unknown>(
    method: HttpMethod,
    path: string,
    init: TransportRequest = {}
  ): Promise<TransportResponse<T>> {
    const url = this.#buildUrl(path, init.query);
    const token = await generateJwt(this.#apiKey, this.#apiSecret);
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      Accept: 'application/json',
    };

    let body: BodyInit | undefined;
    if (init.files && init.files.length > 0) {
      // fetch sets the multipart boundary itself
      const form = new FormData();
      for (const [key, value] of Object.entries(init.form ?? {})) {
        form.append(key, value);
      }
      for (const file of init.files) {
        const blob = file.data instanceof Blob ? file.data : new Blob([new Uint8Array(file.data)]);
        form.append(file.field ?? 'file', blob, file.filename);
      }
      body = form;
    } else if (init.form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      body = new URLSearchParams(init.form).toString();
    } else if (init.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(init.json);
    }

    this.#logger.debug({ method, url }, 'api request');

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.#timeout);

    let res: Response;
    try {
      res = await this.#fetch(url, {
        method,
        headers,
        body,
        signal: controller.signal,
      });
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${this.#timeout}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      this.#logger.debug({ method, url, reason }, 'api request failed');
      throw new TransportError(`${method} ${path} failed: ${reason}`, error);
    } finally {
      clearTimeout(timeoutId);
    }

    this.#logger.debug({ method, url, status: res.status }, 'api response');

    if (res.status === 204) {
      return { status: res.status, ok: res.ok, body: undefined };
    }

    try {
      const parsed: T = await res.json();
      return { status: res.status, ok: res.ok, body: parsed };
    } catch (error) {
      if (res.ok) {
        throw new TransportError(`${method} ${path} returned a non-JSON body`, error);
      }
      return { status: res.status, ok: res.ok, body: undefined };
    }
  }

  #buildUrl(path: string, query?: Record<string, QueryValue>): string {
    const url = new URL(`${this.#baseUrl}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }
}
