import { ZodError } from 'zod';
import { ConnectionConfigSchema, type ConnectionConfigInput } from '../schemas/connection-config.schema.js';
import { ConfigurationError } from '../exception/errors.js';
import { extractMessage } from '../exception/classifier.js';
import type { ConnectionConfig, ProxySettings } from '../types/connection.js';

type Env = Record<string, string | undefined>;

function parseConfig(input: ConnectionConfigInput) {
  try {
    return ConnectionConfigSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(
        `Invalid connection config: ${extractMessage(error)}`,
        error.issues.map((issue) => issue.message),
      );
    }
    throw error;
  }
}

/**
 * Validate and freeze a connection config. Anything invalid raises
 * ConfigurationError; those are never retried.
 */
export function createConnectionConfig(input: ConnectionConfigInput = {}): Readonly<ConnectionConfig> {
  const parsed = parseConfig(input);

  let proxy: ProxySettings | undefined;
  if (parsed.proxy?.host && parsed.proxy.port !== undefined) {
    proxy = Object.freeze({
      host: parsed.proxy.host,
      port: parsed.proxy.port,
      ...(parsed.proxy.username ? { username: parsed.proxy.username } : {}),
      ...(parsed.proxy.password ? { password: parsed.proxy.password } : {}),
    });
  }

  const config: ConnectionConfig = {
    host: parsed.host,
    port: parsed.port,
    connectTimeoutMs: parsed.connectTimeoutMs,
    commandTimeoutMs: parsed.commandTimeoutMs,
    maxRetries: parsed.maxRetries,
    retryDelayMs: parsed.retryDelayMs,
    noProxy: parsed.noProxy,
    ...(proxy ? { proxy } : {}),
    ...(parsed.targetId ? { targetId: parsed.targetId } : {}),
    ...(parsed.endpoint ? { endpoint: parsed.endpoint } : {}),
  };
  return Object.freeze(config);
}

function parseNumberEnv(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function parseBoolEnv(env: Env, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return undefined;
  return raw === '1' || raw === 'true' || raw === 'yes';
}

/** Parse `http://[user:pass@]host:port` as found in HTTP(S)_PROXY. */
export function parseProxyUrl(raw: string): ConnectionConfigInput['proxy'] | undefined {
  let url: URL;
  try {
    url = new URL(raw.includes('://') ? raw : `http://${raw}`);
  } catch {
    return undefined;
  }
  if (!url.hostname) return undefined;
  return {
    host: url.hostname,
    ...(url.port ? { port: Number(url.port) } : {}),
    ...(url.username ? { username: decodeURIComponent(url.username) } : {}),
    ...(url.password ? { password: decodeURIComponent(url.password) } : {}),
  };
}

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*').replace(/\?/g, '.');
  return new RegExp(`^${escaped}$`);
}

/** NO_PROXY entries: `*`, an exact host, or a glob such as `127.*`. */
export function matchesNoProxy(host: string, noProxy: string): boolean {
  const patterns = noProxy
    .split(',')
    .map((p) => p.trim())
    .filter(Boolean);
  return patterns.some((pattern) => pattern === '*' || pattern === host || globToRegExp(pattern).test(host));
}

/**
 * Build a config from the environment, with explicit overrides taking precedence.
 * Proxy settings fall back to HTTPS_PROXY / HTTP_PROXY when none are given, and
 * NO_PROXY is honoured for the CDP host.
 */
export function loadConnectionConfig(
  env: Env = process.env,
  overrides: ConnectionConfigInput = {},
): Readonly<ConnectionConfig> {
  const input: ConnectionConfigInput = {
    host: env.TABRUNNER_CDP_HOST || undefined,
    port: parseNumberEnv(env, 'TABRUNNER_CDP_PORT'),
    connectTimeoutMs: parseNumberEnv(env, 'TABRUNNER_CONNECT_TIMEOUT_MS'),
    commandTimeoutMs: parseNumberEnv(env, 'TABRUNNER_COMMAND_TIMEOUT_MS'),
    maxRetries: parseNumberEnv(env, 'TABRUNNER_MAX_RETRIES'),
    retryDelayMs: parseNumberEnv(env, 'TABRUNNER_RETRY_DELAY_MS'),
    targetId: env.TABRUNNER_TARGET_ID || undefined,
    endpoint: env.TABRUNNER_CDP_ENDPOINT || undefined,
    noProxy: parseBoolEnv(env, 'TABRUNNER_NO_PROXY'),
  };

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(input, { [key]: value });
    }
  }

  if (!input.noProxy && !input.proxy) {
    const proxyUrl = env.HTTPS_PROXY || env.https_proxy || env.HTTP_PROXY || env.http_proxy;
    const proxy = proxyUrl ? parseProxyUrl(proxyUrl) : undefined;
    if (proxy) input.proxy = proxy;
  }

  if (!input.noProxy) {
    const noProxyEnv = env.NO_PROXY || env.no_proxy;
    if (noProxyEnv && matchesNoProxy(input.host ?? '127.0.0.1', noProxyEnv)) {
      input.noProxy = true;
    }
  }

  return createConnectionConfig(input);
}

/** Printable form with proxy credentials masked. */
export function describeConnectionConfig(config: ConnectionConfig): string {
  const proxy = config.proxy
    ? {
        ...config.proxy,
        ...(config.proxy.username ? { username: '***' } : {}),
        ...(config.proxy.password ? { password: '***' } : {}),
      }
    : undefined;
  return `ConnectionConfig(${JSON.stringify({ ...config, proxy })})`;
}

/** The proxy the transport should dial through, or undefined when bypassed. */
export function effectiveProxy(config: ConnectionConfig): ProxySettings | undefined {
  if (config.noProxy) return undefined;
  return config.proxy;
}
