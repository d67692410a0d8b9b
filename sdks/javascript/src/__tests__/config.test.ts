/**
 * Tests for configuration and header handling
 */

import { describe, expect, it } from 'vitest';
import { CLIENT_VERSION, configFromEnv, defaultHeaders, mergeConfig, mergeHeaders } from '../config';
import { ConfigurationError } from '../errors';

describe('defaultHeaders', () => {
  it('should return the JSON content type and client marker', () => {
    expect(defaultHeaders()).toEqual({
      'Content-Type': 'application/json',
      'X-Client-Info': `storage-rest-client/${CLIENT_VERSION}`,
    });
  });

  it('should return a fresh object on every call', () => {
    const first = defaultHeaders();
    first['Content-Type'] = 'text/plain';

    expect(defaultHeaders()['Content-Type']).toBe('application/json');
  });
});

describe('mergeHeaders', () => {
  it('should let later sets win regardless of case', () => {
    const merged = mergeHeaders(
      { 'Content-Type': 'application/json', Authorization: 'Bearer test-key' },
      { 'content-type': 'text/plain' }
    );

    expect(merged).toEqual({ Authorization: 'Bearer test-key', 'content-type': 'text/plain' });
  });

  it('should skip missing sets', () => {
    expect(mergeHeaders(undefined, { a: '1' }, undefined)).toEqual({ a: '1' });
  });
});

describe('configFromEnv', () => {
  it('should derive the hosted url from the reference id', () => {
    const config = configFromEnv({ STORAGE_REFERENCE_ID: 'ref', STORAGE_API_KEY: 'test-key' });

    expect(config).toEqual({
      url: 'https://ref.supabase.co/storage/v1',
      headers: { Authorization: 'Bearer test-key' },
    });
  });

  it('should prefer an explicit url and read the optional settings', () => {
    const config = configFromEnv({
      STORAGE_URL: 'http://localhost:5000/storage/v1',
      STORAGE_REFERENCE_ID: 'ref',
      STORAGE_TIMEOUT_MS: '2500',
      STORAGE_DEBUG: 'true',
    });

    expect(config).toEqual({
      url: 'http://localhost:5000/storage/v1',
      timeout: 2500,
      debug: true,
    });
  });

  it('should fail without a url or reference id', () => {
    expect(() => configFromEnv({})).toThrow(ConfigurationError);
  });

  it('should fail on a timeout that is not a number', () => {
    expect(() =>
      configFromEnv({ STORAGE_URL: 'http://localhost:5000', STORAGE_TIMEOUT_MS: 'soon' })
    ).toThrow('STORAGE_TIMEOUT_MS must be a number, got "soon"');
  });
});

describe('mergeConfig', () => {
  it('should fill in defaults', () => {
    const config = mergeConfig({ url: 'https://ref.supabase.co/storage/v1' });

    expect(config.timeout).toBe(0);
    expect(config.debug).toBe(false);
    expect(config.headers).toEqual(defaultHeaders());
  });

  it('should let configured headers override the defaults', () => {
    const config = mergeConfig({
      url: 'https://ref.supabase.co/storage/v1',
      headers: { 'content-type': 'application/vnd.custom+json' },
    });

    expect(config.headers).toEqual({
      'X-Client-Info': `storage-rest-client/${CLIENT_VERSION}`,
      'content-type': 'application/vnd.custom+json',
    });
  });

  it('should reject bad values', () => {
    expect(() => mergeConfig({ url: 'ftp://example.com' })).toThrow(ConfigurationError);
    expect(() => mergeConfig({ url: 'https://example.com', timeout: -1 })).toThrow(
      'timeout must be a non-negative number'
    );
    expect(() => mergeConfig({ url: 'https://example.com', timeout: Number.NaN })).toThrow(
      'timeout must be a non-negative number'
    );
  });
});
