/**
 * Type definitions for the storage client
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

export interface BucketOptions {
  /**
   * Public buckets serve objects without an authorization token.
   * All other operations still require one.
   */
  public: boolean;
}

export interface Bucket {
  id: string;
  name: string;
  owner?: string;
  public: boolean;
  created_at?: string;
  updated_at?: string;
  file_size_limit?: number | null;
  allowed_mime_types?: string[] | null;
}

export interface FileObject {
  name: string;
  id: string | null;
  bucket_id?: string;
  owner?: string;
  updated_at: string | null;
  created_at: string | null;
  last_accessed_at: string | null;
  metadata: Record<string, unknown> | null;
}

export interface FileOptions {
  /** Seconds the asset is cached by the CDN, sent as `max-age`. */
  cacheControl?: string;
  contentType?: string;
  /** Overwrite an existing object at the same path. */
  upsert?: boolean;
}

export interface SortBy {
  column: string;
  order: 'asc' | 'desc';
}

export interface SearchOptions {
  limit?: number;
  offset?: number;
  sortBy?: SortBy;
  search?: string;
}

export interface SignedUrlOptions {
  /** Trigger a download; a string sets the downloaded file name. */
  download?: string | boolean;
}

export interface SignedUrl {
  signedUrl: string;
}

export interface SignedUrlEntry {
  path: string | null;
  signedUrl: string | null;
  error: string | null;
}

export interface PublicUrl {
  publicUrl: string;
}

export interface MessageResponse {
  message: string;
}

export type UploadData = Buffer | Uint8Array | ArrayBuffer | string;
