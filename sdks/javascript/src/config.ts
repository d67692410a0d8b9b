/**
 * Client configuration
 */

import { ConfigurationError } from './errors';

export const CLIENT_VERSION = '0.1.0';

export interface ClientConfig {
  // Storage API root, e.g. https://<ref>.supabase.co/storage/v1
  url: string;

  // Extra headers sent with every request (usually Authorization)
  headers?: Record<string, string>;

  // Request timeout in milliseconds, 0 leaves it to the platform
  timeout?: number;

  // Debug
  debug?: boolean;
}

export type ResolvedConfig = Readonly<{
  url: string;
  headers: Readonly<Record<string, string>>;
  timeout: number;
  debug: boolean;
}>;

export const defaultConfig: Omit<Required<ClientConfig>, 'url'> = {
  headers: {},
  timeout: 0,
  debug: false,
};

/**
 * Headers merged into every request. Returns a fresh object on each call.
 */
export function defaultHeaders(): Record<string, string> {
  return {
    'Content-Type': 'application/json',
    'X-Client-Info': `storage-rest-client/${CLIENT_VERSION}`,
  };
}

/**
 * Merge header sets left to right. Names compare case-insensitively and the
 * later set wins, keeping the later spelling of the name.
 */
export function mergeHeaders(
  ...sets: Array<Readonly<Record<string, string>> | undefined>
): Record<string, string> {
  const merged: Record<string, string> = {};
  const names = new Map<string, string>();

  for (const set of sets) {
    if (!set) {
      continue;
    }
    for (const [name, value] of Object.entries(set)) {
      const lower = name.toLowerCase();
      const previous = names.get(lower);
      if (previous !== undefined) {
        delete merged[previous];
      }
      names.set(lower, name);
      merged[name] = value;
    }
  }

  return merged;
}

export function projectUrl(referenceId: string): string {
  return `https://${referenceId}.supabase.co/storage/v1`;
}

export function bearerHeaders(apiKey: string): Record<string, string> {
  return { Authorization: `Bearer ${apiKey}` };
}

export interface Endpoint {
  url: string;
  headers: Readonly<Record<string, string>>;
}

/**
 * Url and headers for the sub-clients, either from an API key and project
 * reference id or from an explicit url and header set. Default headers are
 * always merged underneath.
 */
export function resolveEndpoint(
  urlOrApiKey: string,
  headersOrReferenceId: string | Readonly<Record<string, string>>
): Endpoint {
  if (typeof headersOrReferenceId === 'string') {
    if (!urlOrApiKey || !headersOrReferenceId) {
      throw new ConfigurationError('Both an API key and a project reference id are required');
    }
    return {
      url: projectUrl(headersOrReferenceId),
      headers: Object.freeze(mergeHeaders(defaultHeaders(), bearerHeaders(urlOrApiKey))),
    };
  }

  return {
    url: urlOrApiKey.replace(/\/+$/, ''),
    headers: Object.freeze(mergeHeaders(defaultHeaders(), headersOrReferenceId)),
  };
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const apiKey = env['STORAGE_API_KEY'];
  const referenceId = env['STORAGE_REFERENCE_ID'];
  const url = env['STORAGE_URL'] ?? (referenceId ? projectUrl(referenceId) : undefined);

  if (!url) {
    throw new ConfigurationError('Set STORAGE_URL or STORAGE_REFERENCE_ID');
  }

  const config: ClientConfig = { url };

  if (apiKey) {
    config.headers = bearerHeaders(apiKey);
  }
  if (env['STORAGE_TIMEOUT_MS']) {
    const timeout = Number(env['STORAGE_TIMEOUT_MS']);
    if (!Number.isFinite(timeout)) {
      throw new ConfigurationError(
        `STORAGE_TIMEOUT_MS must be a number, got "${env['STORAGE_TIMEOUT_MS']}"`
      );
    }
    config.timeout = timeout;
  }
  if (env['STORAGE_DEBUG'] === 'true') {
    config.debug = true;
  }

  return config;
}

export function mergeConfig(config: ClientConfig): ResolvedConfig {
  const url = config.url.replace(/\/+$/, '');

  if (!/^https?:\/\/[^/]+/.test(url)) {
    throw new ConfigurationError(`Storage url must be an http(s) address, got "${config.url}"`);
  }

  const timeout = config.timeout ?? defaultConfig.timeout;
  if (!Number.isFinite(timeout) || timeout < 0) {
    throw new ConfigurationError('timeout must be a non-negative number');
  }

  return Object.freeze({
    url,
    headers: Object.freeze(mergeHeaders(defaultHeaders(), config.headers)),
    timeout,
    debug: config.debug ?? defaultConfig.debug,
  });
}
