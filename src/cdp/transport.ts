import WebSocket from 'ws';
import type { Agent } from 'node:http';
import type { ConnectionConfig } from '../types/connection.js';
import { ConnectionLost, DialError } from '../exception/errors.js';
import { proxyAgentFor } from './proxy.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('transport');

export interface CloseInfo {
  /** True when the local side asked for the close. */
  intentional: boolean;
  error?: Error;
}

export interface TransportHandlers {
  onFrame(frame: string): void;
  onClose(info: CloseInfo): void;
}

/** One live socket. No protocol semantics: text frames in, text frames out. */
export interface Transport {
  readonly open: boolean;
  send(frame: string): void;
  close(): void;
}

export type Dialer = (url: string, config: ConnectionConfig, handlers: TransportHandlers) => Promise<Transport>;

function frameToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}

class WebSocketTransport implements Transport {
  private intentional = false;
  private lastError: Error | undefined;
  private closeReported = false;

  constructor(
    private ws: WebSocket,
    private handlers: TransportHandlers,
  ) {
    ws.on('message', (data) => {
      handlers.onFrame(frameToString(data));
    });
    ws.on('error', (err) => {
      this.lastError = err;
      log.warn('Socket error', { error: err.message });
    });
    ws.on('close', () => {
      this.reportClose();
    });
  }

  get open(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  send(frame: string): void {
    if (!this.open) {
      throw new ConnectionLost('Cannot send: socket is not open');
    }
    this.ws.send(frame, (err) => {
      if (err) {
        log.warn('Frame write failed', { error: err.message });
        this.lastError = err;
        this.ws.terminate();
      }
    });
  }

  close(): void {
    this.intentional = true;
    if (this.ws.readyState === WebSocket.CLOSED) {
      this.reportClose();
      return;
    }
    this.ws.close();
  }

  private reportClose(): void {
    if (this.closeReported) return;
    this.closeReported = true;
    this.handlers.onClose({ intentional: this.intentional, error: this.lastError });
  }
}

/**
 * Open a WebSocket to a debugging endpoint. Resolves once the socket is open,
 * rejects with DialError on failure or after `connectTimeoutMs`.
 */
export const dial: Dialer = (url, config, handlers) => {
  let agent: Agent | undefined;
  try {
    agent = proxyAgentFor(config);
  } catch (error) {
    return Promise.reject(error);
  }

  return new Promise<Transport>((resolve, reject) => {
    const started = Date.now();
    const ws = new WebSocket(url, {
      perMessageDeflate: false,
      handshakeTimeout: config.connectTimeoutMs,
      ...(agent ? { agent } : {}),
    });
    let settled = false;

    const fail = (reason: string): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      ws.removeAllListeners();
      ws.on('error', () => undefined);
      ws.terminate();
      reject(new DialError(`Failed to connect to ${url}: ${reason}`, url));
    };

    const timer = setTimeout(() => {
      fail(`timed out after ${config.connectTimeoutMs}ms`);
    }, config.connectTimeoutMs);

    ws.once('open', () => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      ws.removeAllListeners();
      log.info('Connected', { url, elapsedMs: Date.now() - started, proxied: Boolean(agent) });
      resolve(new WebSocketTransport(ws, handlers));
    });
    ws.once('error', (err) => fail(err.message));
    ws.once('close', () => fail('socket closed during handshake'));
    ws.once('unexpected-response', (_req, res) => fail(`unexpected HTTP ${res.statusCode} during handshake`));
  });
};
