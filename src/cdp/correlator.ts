import type { CommandParams, CommandResult, RequestFrame } from '../types/cdp.js';
import { ResponseFrameSchema, EventFrameSchema } from '../schemas/cdp-frame.schema.js';
import { CommandCancelled, CommandTimeout, ProtocolError } from '../exception/errors.js';
import type { EventBus } from './event-bus.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('correlator');

export interface IssueOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  sessionId?: string;
}

interface PendingCommand {
  id: number;
  method: string;
  resolve: (value: CommandResult) => void;
  reject: (reason: Error) => void;
  timer: ReturnType<typeof setTimeout>;
  cleanup: () => void;
}

/**
 * Matches responses to the callers that issued them and routes id-less
 * frames to the event bus. Ids are scoped to one connection.
 */
export class Correlator {
  private nextId = 1;
  private pending = new Map<number, PendingCommand>();

  constructor(private bus: EventBus) {}

  get pendingCount(): number {
    return this.pending.size;
  }

  /** Register a command, hand its frame to `write`, and wait for the matching response. */
  issue(
    method: string,
    params: CommandParams,
    options: IssueOptions,
    write: (frame: string) => void,
  ): Promise<CommandResult> {
    if (options.signal?.aborted) {
      return Promise.reject(new CommandCancelled(method));
    }

    const id = this.nextId++;
    const request: RequestFrame = { id, method, params };
    if (options.sessionId) request.sessionId = options.sessionId;
    const frame = JSON.stringify(request);

    return new Promise<CommandResult>((resolve, reject) => {
      const onAbort = (): void => {
        if (this.take(id)) {
          log.debug('Command cancelled locally', { id, method });
          reject(new CommandCancelled(method));
        }
      };

      const timer = setTimeout(() => {
        if (this.take(id)) {
          reject(new CommandTimeout(method, options.timeoutMs));
        }
      }, options.timeoutMs);

      options.signal?.addEventListener('abort', onAbort, { once: true });

      this.pending.set(id, {
        id,
        method,
        resolve,
        reject,
        timer,
        cleanup: () => options.signal?.removeEventListener('abort', onAbort),
      });

      try {
        write(frame);
        log.debug('Sent command', { id, method });
      } catch (error) {
        if (this.take(id)) {
          reject(error instanceof Error ? error : new Error(String(error)));
        }
      }
    });
  }

  /** Entry point of the receive loop. Never throws. */
  handleFrame(raw: string): void {
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch {
      log.warn('Dropping malformed frame', { preview: raw.slice(0, 120) });
      return;
    }

    if (value === null || typeof value !== 'object') {
      log.warn('Dropping non-object frame');
      return;
    }

    if ('id' in value && value.id !== undefined) {
      this.handleResponse(value);
      return;
    }

    const event = EventFrameSchema.safeParse(value);
    if (!event.success) {
      log.warn('Dropping frame with neither id nor method');
      return;
    }
    this.bus.publish(event.data);
  }

  /** Fail every in-flight command, e.g. when the socket goes away. */
  failAll(error: Error): void {
    const ids = [...this.pending.keys()];
    for (const id of ids) {
      const entry = this.take(id);
      entry?.reject(error);
    }
  }

  /** Start a new id space for a fresh connection. */
  reset(): void {
    this.nextId = 1;
  }

  private handleResponse(value: object): void {
    const parsed = ResponseFrameSchema.safeParse(value);
    if (!parsed.success) {
      log.warn('Dropping malformed response frame');
      return;
    }
    const response = parsed.data;
    const entry = this.take(response.id);
    if (!entry) {
      log.debug('Discarding response with no pending command', { id: response.id });
      return;
    }

    if (response.error) {
      entry.reject(new ProtocolError(entry.method, response.error.code, response.error.message));
      return;
    }
    entry.resolve(response.result ?? {});
  }

  /** Remove and return a pending command; at most once per id. */
  private take(id: number): PendingCommand | undefined {
    const entry = this.pending.get(id);
    if (!entry) return undefined;
    this.pending.delete(id);
    clearTimeout(entry.timer);
    entry.cleanup();
    return entry;
  }
}
