/**
 * Bucket operations for the storage client
 */

import { mergeHeaders, resolveEndpoint } from './config';
import { ValidationError } from './errors';
import { AxiosTransport, encodeJson, type HttpTransport } from './transport';
import type { Bucket, BucketOptions, HttpMethod, MessageResponse } from './types';

export class StorageBucketApi {
  private readonly transport: HttpTransport;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;

  /**
   * Connect to a hosted project by API key and project reference id
   */
  constructor(apiKey: string, referenceId: string, transport?: HttpTransport);
  /**
   * Connect to any deployment by explicit url and headers
   */
  constructor(url: string, headers: Readonly<Record<string, string>>, transport?: HttpTransport);
  constructor(
    urlOrApiKey: string,
    headersOrReferenceId: string | Readonly<Record<string, string>>,
    transport: HttpTransport = new AxiosTransport()
  ) {
    const endpoint = resolveEndpoint(urlOrApiKey, headersOrReferenceId);
    this.url = endpoint.url;
    this.headers = endpoint.headers;
    this.transport = transport;
  }

  /**
   * Create a new bucket. Buckets are private unless `options.public` is set.
   */
  async createBucket(
    bucketId: string,
    options: BucketOptions = { public: false }
  ): Promise<Pick<Bucket, 'name'>> {
    this.validateBucketId(bucketId);

    return this.send('POST', `${this.url}/bucket`, {
      id: bucketId,
      name: bucketId,
      public: options.public,
    });
  }

  /**
   * Retrieve the details of an existing bucket
   */
  async getBucket(bucketId: string): Promise<Bucket> {
    this.validateBucketId(bucketId);

    return this.send('GET', `${this.url}/bucket/${encodeURIComponent(bucketId)}`);
  }

  /**
   * Retrieve the details of every bucket in the project
   */
  async listBuckets(): Promise<Bucket[]> {
    return this.send('GET', `${this.url}/bucket`);
  }

  /**
   * Update a bucket's visibility
   */
  async updateBucket(bucketId: string, options: BucketOptions): Promise<MessageResponse> {
    this.validateBucketId(bucketId);

    return this.send('PUT', `${this.url}/bucket/${encodeURIComponent(bucketId)}`, {
      id: bucketId,
      name: bucketId,
      public: options.public,
    });
  }

  /**
   * Delete a bucket. The server refuses buckets that still hold objects,
   * call `emptyBucket` first.
   */
  async deleteBucket(bucketId: string): Promise<MessageResponse> {
    this.validateBucketId(bucketId);

    return this.send('DELETE', `${this.url}/bucket/${encodeURIComponent(bucketId)}`);
  }

  /**
   * Remove every object inside a bucket. The bucket itself is kept.
   */
  async emptyBucket(bucketId: string): Promise<MessageResponse> {
    this.validateBucketId(bucketId);

    return this.send('POST', `${this.url}/bucket/${encodeURIComponent(bucketId)}/empty`);
  }

  private async send<T>(method: HttpMethod, url: string, body?: unknown): Promise<T> {
    return this.transport.request<T>({
      method,
      url,
      headers: mergeHeaders(this.headers),
      body: body === undefined ? undefined : encodeJson(body),
    });
  }

  private validateBucketId(bucketId: string): void {
    if (!bucketId || bucketId.trim().length === 0) {
      throw new ValidationError('bucketId', 'Bucket id cannot be empty');
    }
  }
}
