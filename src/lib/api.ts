import { ApiError } from './errors';
import { isRecord } from './json';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryParams = Record<string, string | null | undefined>;

export interface TransportRequest {
  method: HttpMethod;
  path: string;
  /** Bearer token; omitted for unauthenticated calls */
  token?: string | null;
  query?: QueryParams;
  /** JSON body */
  json?: unknown;
  /** application/x-www-form-urlencoded body */
  form?: Record<string, string>;
}

export interface UploadFile {
  field: string;
  data: Blob;
  filename: string;
}

export interface UploadRequest {
  path: string;
  token?: string | null;
  fields: Record<string, string>;
  file: UploadFile;
}

/**
 * Remote backend transport. Resolves with the decoded payload (null for an
 * empty body); rejects with ApiError.
 */
export interface Transport {
  request(req: TransportRequest): Promise<unknown>;
  upload(req: UploadRequest): Promise<unknown>;
}

export interface FetchTransportOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export function buildUrl(baseUrl: string, path: string, query?: QueryParams): string {
  const url = `${baseUrl.replace(/\/+$/, '')}${path}`;
  if (!query) return url;

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined && value !== null && value !== '') {
      params.append(key, value);
    }
  }
  const qs = params.toString();
  return qs ? `${url}?${qs}` : url;
}

function errorMessageFrom(payload: unknown, response: Response): string {
  if (isRecord(payload)) {
    for (const key of ['detail', 'error', 'message']) {
      const value = payload[key];
      if (typeof value === 'string' && value.length > 0) {
        return value;
      }
    }
  }
  return `HTTP ${response.status}: ${response.statusText}`;
}

async function decodeBody(response: Response): Promise<unknown> {
  if (response.status === 204) return null;

  const text = await response.text();
  if (text.length === 0) return null;

  try {
    return JSON.parse(text);
  } catch {
    // Plain-text bodies (proxies, gateway errors) are passed through as-is
    return text;
  }
}

/**
 * Transport over the Fetch API
 *
 * Features:
 * - Sends the session token as a Bearer Authorization header when given
 * - Aborts requests that exceed the configured timeout
 * - Converts non-2xx responses into ApiError carrying the status and decoded body
 *
 * @example
 * const transport = new FetchTransport({ baseUrl: 'http://127.0.0.1:8000', timeoutMs: 15000 });
 * const issues = await transport.request({ method: 'GET', path: '/users/issues', token });
 */
export class FetchTransport implements Transport {
  private baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;

  constructor({ baseUrl, timeoutMs, fetchImpl }: FetchTransportOptions) {
    this.baseUrl = baseUrl;
    this.timeoutMs = timeoutMs;
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async request({ method, path, token, query, json, form }: TransportRequest): Promise<unknown> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    let body: string | undefined;

    if (form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      body = new URLSearchParams(form).toString();
    } else if (json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(json);
    }
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    return this.send(path, buildUrl(this.baseUrl, path, query), {
      method,
      headers,
      ...(body !== undefined && { body }),
    });
  }

  async upload({ path, token, fields, file }: UploadRequest): Promise<unknown> {
    const formData = new FormData();
    for (const [key, value] of Object.entries(fields)) {
      formData.append(key, value);
    }
    formData.append(file.field, file.data, file.filename);

    // Content-Type is left unset so the multipart boundary is generated
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    return this.send(path, buildUrl(this.baseUrl, path), {
      method: 'POST',
      headers,
      body: formData,
    });
  }

  private async send(path: string, url: string, init: RequestInit): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      } catch (error) {
        if (controller.signal.aborted) {
          throw new ApiError(0, 'Request timeout - check your internet connection');
        }
        const reason = error instanceof Error ? error.message : String(error);
        throw new ApiError(0, `Network connection failed: ${reason}`);
      }

      const payload = await decodeBody(response);
      if (!response.ok) {
        throw new ApiError(response.status, errorMessageFrom(payload, response), payload);
      }
      return payload;
    } catch (error) {
      console.error(`[api] ${init.method ?? 'GET'} ${path} failed:`, error);
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
