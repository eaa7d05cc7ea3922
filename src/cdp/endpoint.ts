import { get, type Agent } from 'node:http';
import type { ConnectionConfig } from '../types/connection.js';
import { VersionInfoSchema } from '../schemas/cdp-frame.schema.js';
import { createLogger } from '../logging/logger.js';
import { proxyAgentFor } from './proxy.js';

const log = createLogger('endpoint');

export function httpBaseUrl(config: ConnectionConfig): string {
  return `http://${config.host}:${config.port}`;
}

export function staticBrowserUrl(config: ConnectionConfig): string {
  return `ws://${config.host}:${config.port}/devtools/browser`;
}

async function fetchJson(url: string, timeoutMs: number): Promise<unknown> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, { signal: controller.signal });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }
    return await response.json();
  } finally {
    clearTimeout(timeout);
  }
}

/** GET through a tunnelling agent; the global fetch takes no agent. */
function getJsonThrough(agent: Agent, url: string, timeoutMs: number): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const request = get(url, { agent }, (response) => {
      if (response.statusCode !== 200) {
        response.resume();
        reject(new Error(`HTTP ${response.statusCode ?? 'unknown'}: ${response.statusMessage ?? ''}`));
        return;
      }
      let body = '';
      response.setEncoding('utf-8');
      response.on('data', (chunk: string) => {
        body += chunk;
      });
      response.on('end', () => {
        try {
          resolve(JSON.parse(body));
        } catch (error) {
          reject(error);
        }
      });
      response.on('error', reject);
    });
    const timer = setTimeout(() => request.destroy(new Error(`timed out after ${timeoutMs}ms`)), timeoutMs);
    request.on('close', () => clearTimeout(timer));
    request.on('error', reject);
  });
}

/**
 * Find the browser-level WebSocket URL. An explicit `endpoint` wins; otherwise
 * ask `/json/version` (through the proxy when one applies, within
 * `connectTimeoutMs`), and fall back to the static path when that fails.
 */
export async function resolveBrowserEndpoint(config: ConnectionConfig): Promise<string> {
  if (config.endpoint) return config.endpoint;

  const url = `${httpBaseUrl(config)}/json/version`;
  try {
    const agent = proxyAgentFor(config);
    const body = agent
      ? await getJsonThrough(agent, url, config.connectTimeoutMs)
      : await fetchJson(url, config.connectTimeoutMs);
    const info = VersionInfoSchema.parse(body);
    if (info.webSocketDebuggerUrl) {
      return info.webSocketDebuggerUrl;
    }
    throw new Error('webSocketDebuggerUrl missing from /json/version');
  } catch (error) {
    log.debug('Falling back to static browser endpoint', {
      error: error instanceof Error ? error.message : String(error),
    });
    return staticBrowserUrl(config);
  }
}
