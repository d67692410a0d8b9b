/**
 * HTTP transport for the storage client
 */

import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import {
  StorageApiError,
  StorageConnectionError,
  StorageSerializationError,
  StorageTimeoutError,
  StorageTransportError,
} from './errors';
import type { HttpMethod } from './types';

export interface HttpRequest {
  method: HttpMethod;
  /** Fully-qualified address. */
  url: string;
  headers: Record<string, string>;
  /** Pre-serialized JSON text or a binary payload. */
  body?: string | Buffer;
  /**
   * `json` decodes the body as JSON, falling back to the raw text when it
   * does not parse. `binary` returns the bytes untouched.
   */
  responseType?: 'json' | 'binary';
}

export interface HttpTransport {
  request<T = unknown>(req: HttpRequest): Promise<T>;
}

export interface TransportOptions {
  timeout?: number;
  debug?: boolean;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Default transport using axios. Every status code is handed back to us so
 * 4xx/5xx responses become StorageApiError instead of axios errors.
 */
export class AxiosTransport implements HttpTransport {
  private readonly client: AxiosInstance;
  private readonly timeout: number;
  private readonly debug: boolean;

  constructor(options: TransportOptions = {}) {
    this.timeout = options.timeout ?? 0;
    this.debug = options.debug ?? false;
    this.client = axios.create({
      timeout: this.timeout,
      validateStatus: () => true,
      transformResponse: [(data: unknown) => data],
    });
  }

  async request<T = unknown>(req: HttpRequest): Promise<T> {
    const binary = req.responseType === 'binary';
    const axiosConfig: AxiosRequestConfig = {
      method: req.method,
      url: req.url,
      headers: req.headers,
      responseType: binary ? 'arraybuffer' : 'text',
    };

    if (req.body !== undefined) {
      axiosConfig.data = req.body;
    }

    if (this.debug) {
      console.log(`[storage] ${req.method} ${req.url}`);
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.request<unknown>(axiosConfig);
    } catch (error) {
      throw this.toTransportError(req, error);
    }

    if (response.status >= 400) {
      const body = decodeJson(toText(response.data));
      if (this.debug) {
        console.warn(`[storage] ${req.method} ${req.url} failed with ${response.status}`);
      }
      throw new StorageApiError(errorMessage(response.status, body), response.status, body);
    }

    if (binary) {
      return toBuffer(response.data) as T;
    }
    return decodeJson(toText(response.data)) as T;
  }

  private toTransportError(req: HttpRequest, error: unknown): StorageTransportError {
    if (this.debug) {
      console.warn(
        `[storage] ${req.method} ${req.url} got no response: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }

    if (axios.isAxiosError(error)) {
      if (error.code && TIMEOUT_CODES.has(error.code)) {
        return new StorageTimeoutError(req.url, this.timeout);
      }
      return new StorageConnectionError(req.url, error.code ?? error.message);
    }

    return new StorageTransportError(
      `Request to ${req.url} failed`,
      req.url,
      error instanceof Error ? error.message : 'Unknown transport error'
    );
  }
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  if (typeof data === 'string') {
    return Buffer.from(data, 'utf-8');
  }
  return Buffer.alloc(0);
}

function toText(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  return toBuffer(data).toString('utf-8');
}

export function encodeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch (error) {
    throw new StorageSerializationError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Empty bodies decode to null, text that is not JSON is returned as is.
 */
export function decodeJson(text: string): unknown {
  if (text.trim().length === 0) {
    return null;
  }
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
}

function errorMessage(status: number, body: unknown): string {
  if (typeof body === 'string' && body.length > 0) {
    return body;
  }
  if (typeof body === 'object' && body !== null) {
    if ('message' in body && typeof body.message === 'string') {
      return body.message;
    }
    if ('error' in body && typeof body.error === 'string') {
      return body.error;
    }
  }
  return `HTTP ${status}`;
}
