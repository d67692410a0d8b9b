/**
 * Object operations for the storage client
 */

import { mergeHeaders, resolveEndpoint } from './config';
import { StorageDecodeError, ValidationError } from './errors';
import { AxiosTransport, encodeJson, type HttpTransport } from './transport';
import type {
  FileObject,
  FileOptions,
  HttpMethod,
  MessageResponse,
  PublicUrl,
  SearchOptions,
  SignedUrl,
  SignedUrlEntry,
  SignedUrlOptions,
  UploadData,
} from './types';

const DEFAULT_SEARCH_OPTIONS = {
  limit: 100,
  offset: 0,
  sortBy: {
    column: 'name',
    order: 'asc',
  },
} satisfies SearchOptions;

const DEFAULT_FILE_OPTIONS = {
  cacheControl: '3600',
  upsert: false,
} satisfies FileOptions;

const CONTENT_TYPES: Record<string, string> = {
  txt: 'text/plain',
  html: 'text/html',
  htm: 'text/html',
  css: 'text/css',
  js: 'application/javascript',
  json: 'application/json',
  xml: 'application/xml',
  pdf: 'application/pdf',
  zip: 'application/zip',
  tar: 'application/x-tar',
  gz: 'application/gzip',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  svg: 'image/svg+xml',
  webp: 'image/webp',
  mp3: 'audio/mpeg',
  mp4: 'video/mp4',
  webm: 'video/webm',
};

export class StorageFileApi {
  private readonly transport: HttpTransport;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly bucketId: string;

  /**
   * Connect to a hosted project by API key and project reference id
   */
  constructor(apiKey: string, referenceId: string, bucketId: string, transport?: HttpTransport);
  /**
   * Connect to any deployment by explicit url and headers
   */
  constructor(
    url: string,
    headers: Readonly<Record<string, string>>,
    bucketId: string,
    transport?: HttpTransport
  );
  constructor(
    urlOrApiKey: string,
    headersOrReferenceId: string | Readonly<Record<string, string>>,
    bucketId: string,
    transport: HttpTransport = new AxiosTransport()
  ) {
    if (!bucketId || bucketId.trim().length === 0) {
      throw new ValidationError('bucketId', 'Bucket id cannot be empty');
    }
    const endpoint = resolveEndpoint(urlOrApiKey, headersOrReferenceId);
    this.url = endpoint.url;
    this.headers = endpoint.headers;
    this.bucketId = bucketId;
    this.transport = transport;
  }

  /**
   * Upload a file to a path that does not exist yet, unless `upsert` is set
   */
  async upload(
    path: string,
    data: UploadData,
    options: FileOptions = {}
  ): Promise<{ Key: string }> {
    return this.uploadOrUpdate('POST', path, data, options);
  }

  /**
   * Replace the file stored at `path`
   */
  async update(
    path: string,
    data: UploadData,
    options: FileOptions = {}
  ): Promise<{ Key: string }> {
    return this.uploadOrUpdate('PUT', path, data, options);
  }

  /**
   * Download a file's bytes
   */
  async download(path: string): Promise<Buffer> {
    const key = this.objectKey(path);

    return this.transport.request<Buffer>({
      method: 'GET',
      url: `${this.url}/object/${key}`,
      headers: mergeHeaders(this.headers),
      responseType: 'binary',
    });
  }

  /**
   * List the files under a folder prefix
   */
  async list(prefix = '', options: SearchOptions = {}): Promise<FileObject[]> {
    return this.send('POST', `${this.url}/object/list/${encodeURIComponent(this.bucketId)}`, {
      ...DEFAULT_SEARCH_OPTIONS,
      ...options,
      prefix: cleanPath(prefix),
    });
  }

  /**
   * Move a file within the bucket, renaming it if needed
   */
  async move(fromPath: string, toPath: string): Promise<MessageResponse> {
    return this.send('POST', `${this.url}/object/move`, {
      bucketId: this.bucketId,
      sourceKey: this.requirePath(fromPath, 'fromPath'),
      destinationKey: this.requirePath(toPath, 'toPath'),
    });
  }

  /**
   * Copy a file within the bucket
   */
  async copy(fromPath: string, toPath: string): Promise<{ Key: string }> {
    return this.send('POST', `${this.url}/object/copy`, {
      bucketId: this.bucketId,
      sourceKey: this.requirePath(fromPath, 'fromPath'),
      destinationKey: this.requirePath(toPath, 'toPath'),
    });
  }

  /**
   * Delete one or more files
   */
  async remove(paths: string | string[]): Promise<FileObject[]> {
    const prefixes = (Array.isArray(paths) ? paths : [paths]).map((path) =>
      this.requirePath(path, 'paths')
    );

    if (prefixes.length === 0) {
      return [];
    }

    if (prefixes.length > 1000) {
      throw new ValidationError('paths', 'Cannot delete more than 1000 objects at once');
    }

    return this.send('DELETE', `${this.url}/object/${encodeURIComponent(this.bucketId)}`, {
      prefixes,
    });
  }

  /**
   * Create a URL that grants access to a file for `expiresIn` seconds
   */
  async createSignedUrl(
    path: string,
    expiresIn: number,
    options: SignedUrlOptions = {}
  ): Promise<SignedUrl> {
    this.validateExpiresIn(expiresIn);
    const key = this.objectKey(path);

    const response = await this.send<unknown>('POST', `${this.url}/object/sign/${key}`, {
      expiresIn,
    });

    if (!isSignedUrlResponse(response)) {
      throw new StorageDecodeError('createSignedUrl', 'an object with a signedURL string', response);
    }

    return {
      signedUrl: this.absoluteUrl(response.signedURL) + downloadQuery(response.signedURL, options),
    };
  }

  /**
   * Create signed URLs for several files in one request
   */
  async createSignedUrls(
    paths: string[],
    expiresIn: number,
    options: SignedUrlOptions = {}
  ): Promise<SignedUrlEntry[]> {
    this.validateExpiresIn(expiresIn);

    const url = `${this.url}/object/sign/${encodeURIComponent(this.bucketId)}`;
    const response = await this.send<unknown>('POST', url, {
      expiresIn,
      paths: paths.map((path) => this.requirePath(path, 'paths')),
    });

    if (!Array.isArray(response)) {
      throw new StorageDecodeError('createSignedUrls', 'an array of signed URL entries', response);
    }

    return response.map((entry: unknown) => {
      if (typeof entry !== 'object' || entry === null) {
        throw new StorageDecodeError('createSignedUrls', 'an array of signed URL entries', response);
      }
      const path = 'path' in entry && typeof entry.path === 'string' ? entry.path : null;
      const error = 'error' in entry && typeof entry.error === 'string' ? entry.error : null;
      const signedURL =
        'signedURL' in entry && typeof entry.signedURL === 'string' ? entry.signedURL : null;

      return {
        path,
        error,
        signedUrl: signedURL
          ? this.absoluteUrl(signedURL) + downloadQuery(signedURL, options)
          : null,
      };
    });
  }

  /**
   * URL of a file in a public bucket. No request is made, so nothing checks
   * that the bucket is actually public.
   */
  getPublicUrl(path: string, options: SignedUrlOptions = {}): PublicUrl {
    const key = this.objectKey(path);
    const base = `${this.url}/object/public/${key}`;

    return { publicUrl: base + downloadQuery(base, options) };
  }

  private async uploadOrUpdate(
    method: 'POST' | 'PUT',
    path: string,
    data: UploadData,
    options: FileOptions
  ): Promise<{ Key: string }> {
    const cleaned = this.requirePath(path, 'path');
    const cacheControl = options.cacheControl ?? DEFAULT_FILE_OPTIONS.cacheControl;
    const upsert = options.upsert ?? DEFAULT_FILE_OPTIONS.upsert;

    const headers = mergeHeaders(this.headers, {
      'Content-Type': options.contentType ?? this.detectContentType(cleaned),
      'cache-control': `max-age=${cacheControl}`,
      'x-upsert': String(upsert),
    });

    return this.transport.request<{ Key: string }>({
      method,
      url: `${this.url}/object/${encodeURIComponent(this.bucketId)}/${encodePath(cleaned)}`,
      headers,
      body: normalizeData(data),
    });
  }

  private async send<T>(method: HttpMethod, url: string, body: unknown): Promise<T> {
    return this.transport.request<T>({
      method,
      url,
      headers: mergeHeaders(this.headers),
      body: encodeJson(body),
    });
  }

  private objectKey(path: string): string {
    return `${encodeURIComponent(this.bucketId)}/${encodePath(this.requirePath(path, 'path'))}`;
  }

  private requirePath(path: string, field: string): string {
    const cleaned = cleanPath(path);
    if (cleaned.length === 0) {
      throw new ValidationError(field, 'Object path cannot be empty');
    }
    if (cleaned.length > 1024) {
      throw new ValidationError(field, 'Object path cannot exceed 1024 characters');
    }
    return cleaned;
  }

  private validateExpiresIn(expiresIn: number): void {
    if (!Number.isInteger(expiresIn) || expiresIn <= 0) {
      throw new ValidationError('expiresIn', 'Expiry must be a positive number of seconds');
    }
  }

  private absoluteUrl(signedUrl: string): string {
    return `${this.url}${signedUrl.startsWith('/') ? '' : '/'}${signedUrl}`;
  }

  private detectContentType(path: string): string {
    const ext = path.includes('.') ? path.split('.').pop()?.toLowerCase() : undefined;

    return CONTENT_TYPES[ext ?? ''] ?? 'application/octet-stream';
  }
}

function isSignedUrlResponse(value: unknown): value is { signedURL: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'signedURL' in value &&
    typeof value.signedURL === 'string'
  );
}

function encodePath(path: string): string {
  return path.split('/').map(encodeURIComponent).join('/');
}

function cleanPath(path: string): string {
  return path.replace(/^\/+|\/+$/g, '').replace(/\/+/g, '/');
}

function downloadQuery(url: string, options: SignedUrlOptions): string {
  if (options.download === undefined || options.download === false) {
    return '';
  }
  const name = options.download === true ? '' : encodeURIComponent(options.download);
  return `${url.includes('?') ? '&' : '?'}download=${name}`;
}

function normalizeData(data: UploadData): string | Buffer {
  if (typeof data === 'string') {
    return data;
  }
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}
