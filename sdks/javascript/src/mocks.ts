/**
 * In-process transport for testing code built on the storage client.
 */

import { StorageApiError } from './errors';
import type { HttpRequest, HttpTransport } from './transport';
import type { HttpMethod } from './types';

export interface MockResponse<T = unknown> {
  /** Defaults to 200. Anything >= 400 is thrown as StorageApiError. */
  status?: number;
  data: T;
  /** Thrown instead of answering. */
  error?: Error;
}

/**
 * Answers requests from a queue of canned responses keyed by
 * `METHOD url`, and records every request it sees.
 */
export class MockTransport implements HttpTransport {
  private readonly responses: Map<string, MockResponse[]> = new Map();
  private readonly defaultResponse: MockResponse;
  private readonly recordedRequests: HttpRequest[] = [];

  constructor(defaultResponse: MockResponse = { status: 200, data: {} }) {
    this.defaultResponse = defaultResponse;
  }

  on(method: HttpMethod, url: string, response: MockResponse): this {
    const key = `${method} ${url}`;
    const existing = this.responses.get(key) ?? [];
    existing.push(response);
    this.responses.set(key, existing);
    return this;
  }

  getRecordedRequests(): HttpRequest[] {
    return [...this.recordedRequests];
  }

  getLastRequest(): HttpRequest | undefined {
    return this.recordedRequests[this.recordedRequests.length - 1];
  }

  /**
   * Decoded JSON body of the last request.
   */
  getLastBody(): unknown {
    const body = this.getLastRequest()?.body;
    if (typeof body !== 'string') {
      return body;
    }
    return JSON.parse(body) as unknown;
  }

  reset(): this {
    this.responses.clear();
    this.recordedRequests.length = 0;
    return this;
  }

  async request<T = unknown>(req: HttpRequest): Promise<T> {
    this.recordedRequests.push(req);

    const queue = this.responses.get(`${req.method} ${req.url}`);
    const response = queue?.shift() ?? this.defaultResponse;

    if (response.error) {
      throw response.error;
    }

    const status = response.status ?? 200;
    if (status >= 400) {
      throw new StorageApiError(`HTTP ${status}`, status, response.data);
    }

    return response.data as T;
  }
}
