/**
 * Programmable in-process transport for testing and development
 */

import type {
  MaybePromise,
  TransferOptions,
  TransportAdapter,
  TransportRequestOptions,
  TransportResponse,
  UploadRequest,
} from '../interfaces';
import { TransportError } from '../errors';
import { sleep } from '../utils';

export interface RecordedRequest {
  method: string;
  path: string;
  body?: unknown;
  upload?: UploadRequest;
  options: TransportRequestOptions;
}

export interface MockResponse {
  status?: number;
  data?: unknown;
  headers?: Record<string, string>;
}

export type MockRouteHandler = (request: RecordedRequest) => MaybePromise<MockResponse>;

export interface MockTransportOptions {
  /** Simulated latency in ms */
  delay?: number;
  /** 0-1, probability a request fails with a TransportError */
  failureRate?: number;
  isConnected?: boolean;
  /** Used when no route matches */
  defaultResponse?: MockResponse;
}

/**
 * Routes are keyed by method and path (query excluded). Queued one-shot
 * responses are consumed before the route handler.
 */
export class MockTransportAdapter implements TransportAdapter {
  readonly requests: RecordedRequest[] = [];
  private readonly handlers = new Map<string, MockRouteHandler>();
  private readonly queued = new Map<string, Array<MockResponse | Error>>();
  private readonly delay: number;
  private failureRate: number;
  private isConnected: boolean;
  private readonly defaultResponse: MockResponse;

  constructor(options: MockTransportOptions = {}) {
    this.delay = options.delay ?? 0;
    this.failureRate = options.failureRate ?? 0;
    this.isConnected = options.isConnected ?? true;
    this.defaultResponse = options.defaultResponse ?? { status: 200, data: {} };
  }

  get(path: string, options: TransportRequestOptions = {}): Promise<TransportResponse> {
    return this.handle({ method: 'GET', path, options });
  }

  post(path: string, body?: unknown, options: TransportRequestOptions = {}): Promise<TransportResponse> {
    return this.handle({ method: 'POST', path, body, options });
  }

  put(path: string, body?: unknown, options: TransportRequestOptions = {}): Promise<TransportResponse> {
    return this.handle({ method: 'PUT', path, body, options });
  }

  patch(path: string, body?: unknown, options: TransportRequestOptions = {}): Promise<TransportResponse> {
    return this.handle({ method: 'PATCH', path, body, options });
  }

  delete(path: string, options: TransportRequestOptions = {}): Promise<TransportResponse> {
    return this.handle({ method: 'DELETE', path, options });
  }

  async upload(path: string, upload: UploadRequest, options: TransferOptions = {}): Promise<TransportResponse> {
    const response = await this.handle({ method: 'POST', path, upload, options });
    const total = upload.files.reduce((sum, file) => sum + file.content.byteLength, 0);
    options.onProgress?.(total, total);
    return response;
  }

  download(path: string, options: TransferOptions = {}): Promise<TransportResponse> {
    return this.handle({ method: 'GET', path, options });
  }

  // Test utilities
  route(method: string, path: string, handler: MockRouteHandler | MockResponse): this {
    this.handlers.set(routeKey(method, path), typeof handler === 'function' ? handler : () => handler);
    return this;
  }

  /** One-shot responses (or errors to throw), consumed in order */
  enqueue(method: string, path: string, ...responses: Array<MockResponse | Error>): this {
    const key = routeKey(method, path);
    this.queued.set(key, [...(this.queued.get(key) ?? []), ...responses]);
    return this;
  }

  requestsTo(method: string, path: string): RecordedRequest[] {
    return this.requests.filter(request => request.method === method && request.path === path);
  }

  setConnected(connected: boolean): void {
    this.isConnected = connected;
  }

  setFailureRate(rate: number): void {
    this.failureRate = Math.max(0, Math.min(1, rate));
  }

  reset(): void {
    this.requests.length = 0;
    this.handlers.clear();
    this.queued.clear();
  }

  private async handle(request: RecordedRequest): Promise<TransportResponse> {
    if (this.delay > 0) {
      await sleep(this.delay);
    }

    this.requests.push(request);

    if (!this.isConnected || (this.failureRate > 0 && Math.random() < this.failureRate)) {
      throw new TransportError('Network error or server unavailable');
    }

    const key = routeKey(request.method, request.path);
    const next = this.queued.get(key)?.shift();
    if (next instanceof Error) throw next;

    const handler = this.handlers.get(key);
    const response = next ?? (handler ? await handler(request) : this.defaultResponse);
    return {
      status: response.status ?? 200,
      data: response.data ?? null,
      headers: response.headers ?? {},
    };
  }
}

function routeKey(method: string, path: string): string {
  return `${method.toUpperCase()} ${path}`;
}
