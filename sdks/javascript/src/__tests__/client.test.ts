/**
 * Tests for the top-level client
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import { StorageClient } from '../client';
import { CLIENT_VERSION } from '../config';
import { ConfigurationError } from '../errors';
import { MockTransport } from '../mocks';
import { StorageFileApi } from '../object';

describe('StorageClient', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('from an API key and reference id', () => {
    it('should derive the hosted url and auth headers', () => {
      const client = new StorageClient('test-key', 'abcdref', { transport: new MockTransport() });

      expect(client.getConfig().url).toBe('https://abcdref.supabase.co/storage/v1');
      expect(client.getConfig().headers).toEqual({
        'Content-Type': 'application/json',
        'X-Client-Info': `storage-rest-client/${CLIENT_VERSION}`,
        Authorization: 'Bearer test-key',
      });
    });

    it('should require both values', () => {
      expect(() => new StorageClient('', 'abcdref')).toThrow(ConfigurationError);
      expect(() => new StorageClient('test-key', '')).toThrow(ConfigurationError);
    });
  });

  describe('from an explicit configuration', () => {
    it('should accept a custom url and headers', () => {
      const client = new StorageClient(
        {
          url: 'http://localhost:5000/storage/v1/',
          headers: { Authorization: 'Bearer test-key', apikey: 'test-key' },
        },
        { transport: new MockTransport() }
      );

      expect(client.getConfig().url).toBe('http://localhost:5000/storage/v1');
      expect(client.getConfig().headers['apikey']).toBe('test-key');
      expect(client.getConfig().headers['Authorization']).toBe('Bearer test-key');
    });

    it('should reject a url that is not http(s)', () => {
      expect(() => new StorageClient({ url: 'localhost:5000' })).toThrow(ConfigurationError);
    });
  });

  it('should keep its configuration frozen', () => {
    const client = new StorageClient('test-key', 'abcdref', { transport: new MockTransport() });

    expect(Object.isFrozen(client.getConfig())).toBe(true);
    expect(Object.isFrozen(client.getConfig().headers)).toBe(true);
  });

  it('should delegate bucket operations with its url and headers', async () => {
    const transport = new MockTransport();
    const client = new StorageClient('test-key', 'abcdref', { transport });

    await client.createBucket('avatars', { public: true });
    await client.getBucket('avatars');
    await client.listBuckets();
    await client.updateBucket('avatars', { public: false });
    await client.emptyBucket('avatars');
    await client.deleteBucket('avatars');

    const calls = transport
      .getRecordedRequests()
      .map((request) => `${request.method} ${request.url}`);
    const base = 'https://abcdref.supabase.co/storage/v1';
    expect(calls).toEqual([
      `POST ${base}/bucket`,
      `GET ${base}/bucket/avatars`,
      `GET ${base}/bucket`,
      `PUT ${base}/bucket/avatars`,
      `POST ${base}/bucket/avatars/empty`,
      `DELETE ${base}/bucket/avatars`,
    ]);
    for (const request of transport.getRecordedRequests()) {
      expect(request.headers['Authorization']).toBe('Bearer test-key');
    }
  });

  it('should scope object operations to a bucket', async () => {
    const transport = new MockTransport();
    const client = new StorageClient('test-key', 'abcdref', { transport });

    const files = client.from('photos');
    await files.remove('path/to/file.png');

    expect(files).toBeInstanceOf(StorageFileApi);
    expect(files.bucketId).toBe('photos');
    expect(transport.getLastRequest()?.url).toBe(
      'https://abcdref.supabase.co/storage/v1/object/photos'
    );
    expect(transport.getLastRequest()?.headers['Authorization']).toBe('Bearer test-key');
  });

  it('should build a client from the environment', () => {
    vi.stubEnv('STORAGE_API_KEY', 'test-key');
    vi.stubEnv('STORAGE_REFERENCE_ID', 'envref');
    vi.stubEnv('STORAGE_TIMEOUT_MS', '1500');

    const client = StorageClient.fromEnv({ transport: new MockTransport() });

    expect(client.getConfig().url).toBe('https://envref.supabase.co/storage/v1');
    expect(client.getConfig().headers['Authorization']).toBe('Bearer test-key');
    expect(client.getConfig().timeout).toBe(1500);
  });
});
