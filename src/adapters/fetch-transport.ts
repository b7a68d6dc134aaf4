/**
 * HTTP transport adapter built on the global fetch
 */

import type {
  TransferOptions,
  TransportAdapter,
  TransportRequestOptions,
  TransportResponse,
  UploadRequest,
} from '../interfaces';
import { TransportError, errorMessage } from '../errors';
import { safeJsonParse } from '../utils';

export interface FetchTransportConfig {
  baseUrl: string;
  apiKey?: string;
  /** Default request timeout in ms */
  timeout?: number;
  headers?: Record<string, string>;
  /** Replaces the global fetch, e.g. for an in-process stand-in */
  fetch?: typeof fetch;
}

type RequestBody = { kind: 'none' } | { kind: 'json'; value: unknown } | { kind: 'form'; value: UploadRequest };

/**
 * Resolves with any HTTP status; rejects with TransportError when no
 * response arrives (network failure, timeout, caller abort).
 */
export class FetchTransportAdapter implements TransportAdapter {
  private readonly config: {
    baseUrl: string;
    timeout: number;
    headers: Record<string, string>;
    apiKey?: string;
  };
  private readonly fetchImpl: typeof fetch;

  constructor(config: FetchTransportConfig) {
    this.config = {
      baseUrl: config.baseUrl.replace(/\/+$/, ''),
      timeout: config.timeout ?? 30000,
      headers: config.headers ?? {},
    };

    if (config.apiKey) {
      this.config.apiKey = config.apiKey;
    }

    this.fetchImpl = config.fetch ?? fetch;
  }

  get(path: string, options: TransportRequestOptions = {}): Promise<TransportResponse> {
    return this.request('GET', path, { kind: 'none' }, options);
  }

  post(path: string, body?: unknown, options: TransportRequestOptions = {}): Promise<TransportResponse> {
    return this.request('POST', path, jsonBody(body), options);
  }

  put(path: string, body?: unknown, options: TransportRequestOptions = {}): Promise<TransportResponse> {
    return this.request('PUT', path, jsonBody(body), options);
  }

  patch(path: string, body?: unknown, options: TransportRequestOptions = {}): Promise<TransportResponse> {
    return this.request('PATCH', path, jsonBody(body), options);
  }

  delete(path: string, options: TransportRequestOptions = {}): Promise<TransportResponse> {
    return this.request('DELETE', path, { kind: 'none' }, options);
  }

  async upload(path: string, request: UploadRequest, options: TransferOptions = {}): Promise<TransportResponse> {
    const response = await this.request('POST', path, { kind: 'form', value: request }, options);
    // fetch exposes no upload progress; report completion once
    const total = request.files.reduce((sum, file) => sum + file.content.byteLength, 0);
    options.onProgress?.(total, total);
    return response;
  }

  download(path: string, options: TransferOptions = {}): Promise<TransportResponse> {
    return this.request('GET', path, { kind: 'none' }, options, true);
  }

  private async request(
    method: string,
    path: string,
    body: RequestBody,
    options: TransferOptions,
    binary = false
  ): Promise<TransportResponse> {
    const url = this.buildUrl(path, options.query);
    const timeout = options.timeout ?? this.config.timeout;

    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...this.config.headers,
      ...options.headers,
    };

    if (this.config.apiKey) {
      headers['Authorization'] = `Bearer ${this.config.apiKey}`;
    }

    const init: RequestInit = { method, headers };
    if (body.kind === 'json') {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(body.value);
    } else if (body.kind === 'form') {
      init.body = toFormData(body.value);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeout);
    const abortFromCaller = (): void => controller.abort();
    if (options.signal?.aborted) controller.abort();
    options.signal?.addEventListener('abort', abortFromCaller, { once: true });
    init.signal = controller.signal;

    try {
      const response = await this.fetchImpl(url, init);
      return await this.normalize(response, binary, options.onProgress);
    } catch (error) {
      const message = timedOut
        ? `${method} ${path} timed out after ${timeout}ms`
        : `${method} ${path} failed: ${errorMessage(error)}`;
      throw new TransportError(message, error, timedOut);
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', abortFromCaller);
    }
  }

  private buildUrl(path: string, query?: TransportRequestOptions['query']): string {
    const url = `${this.config.baseUrl}${path.startsWith('/') ? path : `/${path}`}`;
    if (!query) return url;
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      params.set(key, String(value));
    }
    const search = params.toString();
    return search ? `${url}?${search}` : url;
  }

  private async normalize(
    response: Response,
    binary: boolean,
    onProgress?: TransferOptions['onProgress']
  ): Promise<TransportResponse> {
    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    const base = { status: response.status, statusText: response.statusText, headers };

    if (binary && response.ok) {
      return { ...base, data: await readBytes(response, onProgress) };
    }

    const text = await response.text();
    if (text === '') return { ...base, data: null };
    const parsed = safeJsonParse(text);
    return { ...base, data: parsed.ok ? parsed.value : text };
  }
}

function jsonBody(value: unknown): RequestBody {
  return value === undefined ? { kind: 'none' } : { kind: 'json', value };
}

function toFormData(request: UploadRequest): FormData {
  const form = new FormData();
  for (const [name, value] of Object.entries(request.fields ?? {})) {
    form.append(name, value);
  }
  for (const file of request.files) {
    form.append(file.fieldName, new Blob([file.content], { type: file.contentType }), file.fileName);
  }
  return form;
}

async function readBytes(response: Response, onProgress?: TransferOptions['onProgress']): Promise<Uint8Array> {
  const total = Number(response.headers.get('content-length') ?? 0);
  if (!response.body) {
    const bytes = new Uint8Array(await response.arrayBuffer());
    onProgress?.(bytes.byteLength, bytes.byteLength);
    return bytes;
  }

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let received = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    chunks.push(value);
    received += value.byteLength;
    onProgress?.(received, total > 0 ? total : received);
  }

  const bytes = new Uint8Array(received);
  let offset = 0;
  for (const part of chunks) {
    bytes.set(part, offset);
    offset += part.byteLength;
  }
  return bytes;
}
