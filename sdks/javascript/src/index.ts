/**
 * Storage REST client
 *
 * Bucket and object operations for a Supabase-style storage service.
 */

export { StorageClient } from './client';
export type { StorageClientOptions } from './client';
export { StorageBucketApi } from './bucket';
export { StorageFileApi } from './object';
export { AxiosTransport, decodeJson, encodeJson } from './transport';
export type { HttpRequest, HttpTransport, TransportOptions } from './transport';
export { MockTransport } from './mocks';
export type { MockResponse } from './mocks';
export {
  CLIENT_VERSION,
  defaultHeaders,
  mergeHeaders,
  mergeConfig,
  configFromEnv,
} from './config';
export type { ClientConfig, ResolvedConfig } from './config';
export {
  StorageError,
  StorageApiError,
  StorageTransportError,
  StorageConnectionError,
  StorageTimeoutError,
  StorageSerializationError,
  StorageDecodeError,
  ValidationError,
  ConfigurationError,
  isStorageError,
  isApiError,
  isTransportError,
  isTimeout,
  isNotFound,
} from './errors';
export type {
  Bucket,
  BucketOptions,
  FileObject,
  FileOptions,
  HttpMethod,
  MessageResponse,
  PublicUrl,
  SearchOptions,
  SignedUrl,
  SignedUrlEntry,
  SignedUrlOptions,
  SortBy,
  UploadData,
} from './types';
