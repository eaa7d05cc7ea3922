import type { ConnectionConfig, SessionState, TargetSelector } from '../types/connection.js';
import type { CommandParams, CommandResult, EventHandler } from '../types/cdp.js';
import { TargetInfosResultSchema } from '../schemas/cdp-frame.schema.js';
import {
  ConnectionExhausted,
  ConnectionLost,
  DialError,
  ProtocolError,
  TargetNotFound,
} from '../exception/errors.js';
import { RetryPolicy, sleep as defaultSleep } from '../runner/retry-policy.js';
import { createLogger } from '../logging/logger.js';
import { Correlator } from './correlator.js';
import { EventBus, DEFAULT_QUEUE_CAPACITY } from './event-bus.js';
import { SerialLock } from './serial-lock.js';
import { dial, type CloseInfo, type Dialer, type Transport } from './transport.js';
import { resolveBrowserEndpoint } from './endpoint.js';
import { STEALTH_SCRIPT } from './stealth.js';

const log = createLogger('session');

export interface SessionOptions {
  dialer?: Dialer;
  resolveEndpoint?: (config: ConnectionConfig) => Promise<string>;
  /** Register the fingerprint-masking init script on every attach. */
  stealth?: boolean;
  initScripts?: string[];
  eventQueueCapacity?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface CommandOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  /** `browser` sends without the page session id (Target.*, Browser.*). */
  scope?: 'page' | 'browser';
}

export type StateListener = (state: SessionState, previous: SessionState) => void;

/** What page helpers and recipe adapters need from a session. */
export interface CommandChannel {
  command(method: string, params?: CommandParams, options?: CommandOptions): Promise<CommandResult>;
  subscribe(prefix: string, handler: EventHandler): () => void;
}

function describeSelector(selector: TargetSelector): string {
  if (typeof selector === 'string') return `id ${selector}`;
  if ('urlIncludes' in selector) return `url containing "${selector.urlIncludes}"`;
  return `title containing "${selector.titleIncludes}"`;
}

/**
 * A logical debugging session over one browser connection. Owns the
 * transport, the correlator and the event bus; survives transient socket
 * loss by redialing per the retry policy and re-attaching to the same
 * target with the same init scripts.
 */
export class Session implements CommandChannel {
  private transport: Transport | null = null;
  private readonly bus: EventBus;
  private readonly correlator: Correlator;
  private readonly lock = new SerialLock();
  private readonly dialer: Dialer;
  private readonly resolveEndpoint: (config: ConnectionConfig) => Promise<string>;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly initScripts: string[];
  private readonly stateListeners = new Set<StateListener>();
  private current: SessionState = 'disconnected';
  private attachedTarget: string | null = null;
  private protocolSessionId: string | null = null;
  private generation = 0;
  private closeRequested = false;
  private fatal: ConnectionExhausted | null = null;
  private refs = 1;

  constructor(
    readonly config: Readonly<ConnectionConfig>,
    options: SessionOptions = {},
  ) {
    this.dialer = options.dialer ?? dial;
    this.resolveEndpoint = options.resolveEndpoint ?? resolveBrowserEndpoint;
    this.sleep = options.sleep ?? defaultSleep;
    this.bus = new EventBus(options.eventQueueCapacity ?? DEFAULT_QUEUE_CAPACITY);
    this.correlator = new Correlator(this.bus);
    this.initScripts = [...(options.stealth ? [STEALTH_SCRIPT] : []), ...(options.initScripts ?? [])];
  }

  get state(): SessionState {
    return this.current;
  }

  get targetId(): string | null {
    return this.attachedTarget;
  }

  get pendingCommands(): number {
    return this.correlator.pendingCount;
  }

  onStateChange(listener: StateListener): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  subscribe(prefix: string, handler: EventHandler): () => void {
    return this.bus.subscribe(prefix, handler);
  }

  /** Share this session with another owner; pair every call with `release()`. */
  retain(): this {
    this.refs++;
    return this;
  }

  async release(): Promise<void> {
    this.refs = Math.max(0, this.refs - 1);
    if (this.refs === 0) await this.close();
  }

  async connect(): Promise<void> {
    await this.lock.run(async () => {
      this.assertUsable();
      if (this.current === 'connected' || this.current === 'attached') return;
      this.setState('connecting');
      try {
        await this.openTransport();
      } catch (error) {
        this.setState('disconnected');
        throw error;
      }
      this.setState('connected');
    });
  }

  /** Attach to a page target. Without a selector: configured target, first page, or a new blank page. */
  async attach(selector?: TargetSelector): Promise<string> {
    return this.lock.run(() => this.attachUnlocked(selector ?? this.config.targetId));
  }

  async detach(): Promise<void> {
    await this.lock.run(async () => {
      if (this.current !== 'attached' || !this.protocolSessionId) return;
      await this.send('Target.detachFromTarget', { sessionId: this.protocolSessionId }, { scope: 'browser' });
      this.protocolSessionId = null;
      this.attachedTarget = null;
      this.setState('connected');
    });
  }

  /**
   * Send one command and wait for its result. Waits for any lifecycle change
   * in progress (connect, attach, reconnect) to finish first.
   */
  async command(method: string, params: CommandParams = {}, options: CommandOptions = {}): Promise<CommandResult> {
    await this.lock.idle();
    return this.send(method, params, options);
  }

  /** Register a script to run before page scripts on every new document, now and after every re-attach. */
  async addInitScript(source: string): Promise<void> {
    this.initScripts.push(source);
    if (this.current === 'attached') {
      await this.command('Page.addScriptToEvaluateOnNewDocument', { source });
    }
  }

  /** Resolves when no lifecycle change is in progress; rejects once reconnection has given up. */
  async whenReady(): Promise<void> {
    await this.lock.idle();
    this.assertUsable();
  }

  async close(): Promise<void> {
    this.closeRequested = true;
    await this.lock.run(async () => {
      if (this.current === 'closed') return;
      this.setState('closed');
      this.teardown(new ConnectionLost('Session closed'));
      this.bus.clear();
      log.info('Session closed');
    });
  }

  private assertUsable(): void {
    if (this.fatal) throw this.fatal;
    if (this.current === 'closed' || this.closeRequested) {
      throw new ConnectionLost('Session is closed');
    }
  }

  private send(method: string, params: CommandParams, options: CommandOptions): Promise<CommandResult> {
    if (this.fatal) return Promise.reject(this.fatal);
    const transport = this.transport;
    if (this.current === 'closed' || !transport || !transport.open) {
      return Promise.reject(new ConnectionLost(`Cannot send ${method}: not connected`));
    }
    const sessionId = options.scope === 'browser' ? undefined : (this.protocolSessionId ?? undefined);
    return this.correlator.issue(
      method,
      params,
      {
        timeoutMs: options.timeoutMs ?? this.config.commandTimeoutMs,
        signal: options.signal,
        sessionId,
      },
      (frame) => transport.send(frame),
    );
  }

  /** Endpoint lookup and dial share one `connectTimeoutMs` budget. */
  private async openTransport(): Promise<void> {
    const deadline = Date.now() + this.config.connectTimeoutMs;
    const url = await this.resolveEndpoint(this.config);
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new DialError(`Failed to connect to ${url}: timed out after ${this.config.connectTimeoutMs}ms`, url);
    }
    const generation = ++this.generation;
    this.correlator.reset();
    this.protocolSessionId = null;
    this.transport = await this.dialer(url, { ...this.config, connectTimeoutMs: remaining }, {
      onFrame: (frame) => {
        if (generation === this.generation) this.correlator.handleFrame(frame);
      },
      onClose: (info) => {
        if (generation === this.generation) this.handleClose(info);
      },
    });
  }

  private async attachUnlocked(selector: TargetSelector | undefined): Promise<string> {
    this.assertUsable();
    if (this.current === 'attached' && this.protocolSessionId) {
      await this.send('Target.detachFromTarget', { sessionId: this.protocolSessionId }, { scope: 'browser' });
      this.protocolSessionId = null;
      this.setState('connected');
    }

    const targetId = await this.pickTarget(selector);
    const result = await this.send('Target.attachToTarget', { targetId, flatten: true }, { scope: 'browser' });
    const sessionId = result.sessionId;
    if (typeof sessionId !== 'string') {
      throw new ProtocolError('Target.attachToTarget', -32000, 'response carried no sessionId');
    }

    this.protocolSessionId = sessionId;
    this.attachedTarget = targetId;
    await this.send('Page.enable', {}, {});
    await this.send('Runtime.enable', {}, {});
    for (const source of this.initScripts) {
      await this.send('Page.addScriptToEvaluateOnNewDocument', { source }, {});
    }
    this.setState('attached');
    log.info('Attached', { targetId, initScripts: this.initScripts.length });
    return targetId;
  }

  private async pickTarget(selector: TargetSelector | undefined): Promise<string> {
    const result = await this.send('Target.getTargets', {}, { scope: 'browser' });
    const pages = TargetInfosResultSchema.parse(result).targetInfos.filter((t) => t.type === 'page');

    if (selector === undefined) {
      if (pages.length > 0) return pages[0].targetId;
      const created = await this.send('Target.createTarget', { url: 'about:blank' }, { scope: 'browser' });
      if (typeof created.targetId !== 'string') {
        throw new ProtocolError('Target.createTarget', -32000, 'response carried no targetId');
      }
      return created.targetId;
    }

    const match = pages.find((page) => {
      if (typeof selector === 'string') return page.targetId === selector;
      if ('urlIncludes' in selector) return page.url.includes(selector.urlIncludes);
      return page.title.includes(selector.titleIncludes);
    });
    if (!match) throw new TargetNotFound(describeSelector(selector));
    return match.targetId;
  }

  private handleClose(info: CloseInfo): void {
    this.transport = null;
    this.protocolSessionId = null;
    this.correlator.failAll(
      new ConnectionLost(info.error ? `Connection lost: ${info.error.message}` : 'Connection to the browser was lost'),
    );
    if (info.intentional || this.current === 'closed' || this.closeRequested) return;

    log.warn('Connection lost, reconnecting', { targetId: this.attachedTarget, error: info.error?.message });
    this.setState('disconnected');
    void this.lock.run(() => this.reconnect());
  }

  /** Never rejects: on exhaustion the session is closed and the failure stored for `whenReady`. */
  private async reconnect(): Promise<void> {
    const delays = RetryPolicy.attempts(this.config);
    const target = this.attachedTarget;
    let lastError: Error | undefined;

    for (let attempt = 0; attempt < delays.length; attempt++) {
      await this.sleep(delays[attempt]);
      if (this.closeRequested) return;

      this.setState('connecting');
      try {
        await this.openTransport();
        this.setState('connected');
        if (target) await this.attachUnlocked(target);
        log.info('Reconnected', { attempt: attempt + 1, targetId: target });
        return;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        this.teardown(lastError);
        this.setState('disconnected');
        log.warn('Reconnect attempt failed', { attempt: attempt + 1, error: lastError.message });
      }
    }

    this.fatal = new ConnectionExhausted(delays.length, lastError);
    this.setState('closed');
    this.bus.clear();
    log.error('Giving up on reconnect', { attempts: delays.length, error: lastError?.message });
  }

  /** Drop the current transport without triggering reconnection. */
  private teardown(reason: Error): void {
    this.generation++;
    const transport = this.transport;
    this.transport = null;
    this.protocolSessionId = null;
    this.correlator.failAll(reason);
    transport?.close();
  }

  private setState(next: SessionState): void {
    const previous = this.current;
    if (previous === next) return;
    this.current = next;
    for (const listener of this.stateListeners) {
      try {
        listener(next, previous);
      } catch (error) {
        log.warn('State listener failed', { error: error instanceof Error ? error.message : String(error) });
      }
    }
  }
}
