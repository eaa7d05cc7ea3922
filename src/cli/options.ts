import type { ConnectionConfig } from '../types/connection.js';
import type { ConnectionConfigInput } from '../schemas/connection-config.schema.js';
import { loadConnectionConfig, parseProxyUrl } from '../cdp/config.js';
import { ConfigurationError } from '../exception/errors.js';
import type { LogLevel } from '../logging/logger.js';

export interface GlobalOptions {
  host?: string;
  port?: number;
  commandTimeout?: number;
  proxy?: string | false;
  target?: string;
  stealth?: boolean;
  logLevel?: string;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/** Connection config from the environment with CLI flags on top. */
export function connectionFromOptions(
  options: GlobalOptions,
  env: Record<string, string | undefined> = process.env,
): Readonly<ConnectionConfig> {
  const overrides: ConnectionConfigInput = {
    host: options.host,
    port: options.port,
    commandTimeoutMs: options.commandTimeout,
    targetId: options.target,
  };
  if (options.proxy === false) {
    overrides.noProxy = true;
  } else if (typeof options.proxy === 'string') {
    const proxy = parseProxyUrl(options.proxy);
    if (!proxy) throw new ConfigurationError(`Invalid proxy URL: ${options.proxy}`);
    overrides.proxy = proxy;
  }
  return loadConnectionConfig(env, overrides);
}
