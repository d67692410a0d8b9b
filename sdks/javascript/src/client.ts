/**
 * Storage client - main entry point
 */

import { StorageBucketApi } from './bucket';
import {
  type ClientConfig,
  type ResolvedConfig,
  bearerHeaders,
  configFromEnv,
  mergeConfig,
  projectUrl,
} from './config';
import { ConfigurationError } from './errors';
import { StorageFileApi } from './object';
import { AxiosTransport, type HttpTransport } from './transport';
import type { Bucket, BucketOptions, MessageResponse } from './types';

export interface StorageClientOptions {
  /** Replaces the axios transport, e.g. with a MockTransport in tests. */
  transport?: HttpTransport;
}

export class StorageClient {
  private readonly config: ResolvedConfig;
  private readonly transport: HttpTransport;
  private readonly buckets: StorageBucketApi;

  /**
   * Connect to a hosted project by API key and project reference id
   */
  constructor(apiKey: string, referenceId: string, options?: StorageClientOptions);
  /**
   * Connect to any deployment by explicit url and headers
   */
  constructor(config: ClientConfig, options?: StorageClientOptions);
  constructor(
    apiKeyOrConfig: string | ClientConfig,
    referenceIdOrOptions?: string | StorageClientOptions,
    maybeOptions: StorageClientOptions = {}
  ) {
    let config: ClientConfig;
    let options: StorageClientOptions;

    if (typeof apiKeyOrConfig === 'string') {
      const referenceId = typeof referenceIdOrOptions === 'string' ? referenceIdOrOptions : '';
      if (!apiKeyOrConfig || !referenceId) {
        throw new ConfigurationError('Both an API key and a project reference id are required');
      }
      config = { url: projectUrl(referenceId), headers: bearerHeaders(apiKeyOrConfig) };
      options = maybeOptions;
    } else {
      config = apiKeyOrConfig;
      options = typeof referenceIdOrOptions === 'object' ? referenceIdOrOptions : {};
    }

    this.config = mergeConfig(config);
    this.transport =
      options.transport ??
      new AxiosTransport({ timeout: this.config.timeout, debug: this.config.debug });
    this.buckets = new StorageBucketApi(this.config.url, this.config.headers, this.transport);
  }

  /**
   * Create a client from STORAGE_* environment variables
   */
  static fromEnv(options: StorageClientOptions = {}): StorageClient {
    return new StorageClient(configFromEnv(), options);
  }

  /**
   * Object operations scoped to one bucket
   */
  from(bucketId: string): StorageFileApi {
    return new StorageFileApi(this.config.url, this.config.headers, bucketId, this.transport);
  }

  async createBucket(
    bucketId: string,
    options: BucketOptions = { public: false }
  ): Promise<Pick<Bucket, 'name'>> {
    return this.buckets.createBucket(bucketId, options);
  }

  async getBucket(bucketId: string): Promise<Bucket> {
    return this.buckets.getBucket(bucketId);
  }

  async listBuckets(): Promise<Bucket[]> {
    return this.buckets.listBuckets();
  }

  async updateBucket(bucketId: string, options: BucketOptions): Promise<MessageResponse> {
    return this.buckets.updateBucket(bucketId, options);
  }

  async deleteBucket(bucketId: string): Promise<MessageResponse> {
    return this.buckets.deleteBucket(bucketId);
  }

  async emptyBucket(bucketId: string): Promise<MessageResponse> {
    return this.buckets.emptyBucket(bucketId);
  }

  /**
   * Get the current configuration
   */
  getConfig(): ResolvedConfig {
    return this.config;
  }
}
