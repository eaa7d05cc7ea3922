import { HttpsProxyAgent } from 'https-proxy-agent';
import type { ConnectionConfig, ProxySettings } from '../types/connection.js';
import { ConfigurationError } from '../exception/errors.js';
import { effectiveProxy } from './config.js';

export function proxyUrl(proxy: ProxySettings): string {
  const auth =
    proxy.username && proxy.password
      ? `${encodeURIComponent(proxy.username)}:${encodeURIComponent(proxy.password)}@`
      : '';
  return `http://${auth}${proxy.host}:${proxy.port}`;
}

/**
 * Tunnelling agent for every HTTP or WebSocket request to the browser, or
 * undefined when no proxy applies. Throws ConfigurationError for a proxy
 * that cannot be dialled.
 */
export function proxyAgentFor(config: ConnectionConfig): HttpsProxyAgent<string> | undefined {
  const proxy = effectiveProxy(config);
  if (!proxy) return undefined;
  if (!proxy.host || !Number.isInteger(proxy.port) || proxy.port < 1 || proxy.port > 65535) {
    throw new ConfigurationError('Proxy host is set but the proxy port is missing or invalid');
  }
  return new HttpsProxyAgent(proxyUrl(proxy));
}
