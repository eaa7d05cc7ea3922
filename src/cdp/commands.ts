import type { CommandChannel } from './session.js';
import type { CommandResult } from '../types/cdp.js';
import type { TargetInfo } from '../types/connection.js';
import { TargetInfosResultSchema } from '../schemas/cdp-frame.schema.js';
import { ProtocolError, ScriptEvaluationError, CommandTimeout } from '../exception/errors.js';
import { sleep } from '../runner/retry-policy.js';

export interface EvaluateOptions {
  awaitPromise?: boolean;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ScreenshotOptions {
  fullPage?: boolean;
  format?: 'png' | 'jpeg';
  quality?: number;
}

export interface PageContent {
  sourceUrl: string;
  content: string;
  links: { url: string; text: string }[];
}

const DEFAULT_LOAD_TIMEOUT_MS = 30_000;

/** Extraction run in the page; link text is cut to 100 characters. */
function contentScript(selector: string): string {
  return `(() => {
  const el = document.querySelector(${JSON.stringify(selector)});
  if (!el) return { found: false };
  const links = [];
  for (const a of el.querySelectorAll('a[href]')) {
    if (a.href && !a.href.startsWith('javascript:')) {
      links.push({ url: a.href, text: (a.innerText || a.textContent || '').trim().slice(0, 100) });
    }
  }
  return { found: true, sourceUrl: location.href, content: el.innerText || el.textContent || '', links };
})()`;
}

export interface PageStatus {
  browser: string;
  protocolVersion: string;
  url: string;
  title: string;
  readyState: string;
}

const KEY_CODES: Record<string, { code: string; keyCode: number; text?: string }> = {
  Enter: { code: 'Enter', keyCode: 13, text: '\r' },
  Tab: { code: 'Tab', keyCode: 9 },
  Escape: { code: 'Escape', keyCode: 27 },
  Backspace: { code: 'Backspace', keyCode: 8 },
  Delete: { code: 'Delete', keyCode: 46 },
  ArrowUp: { code: 'ArrowUp', keyCode: 38 },
  ArrowDown: { code: 'ArrowDown', keyCode: 40 },
  ArrowLeft: { code: 'ArrowLeft', keyCode: 37 },
  ArrowRight: { code: 'ArrowRight', keyCode: 39 },
  PageUp: { code: 'PageUp', keyCode: 33 },
  PageDown: { code: 'PageDown', keyCode: 34 },
  Home: { code: 'Home', keyCode: 36 },
  End: { code: 'End', keyCode: 35 },
};

function asRecord(value: unknown): Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

/** Description of a thrown page exception, as Runtime.evaluate reports it. */
function describeException(details: Record<string, unknown>): string {
  const exception = asRecord(details.exception);
  if (typeof exception.description === 'string') return exception.description;
  if (typeof details.text === 'string') return details.text;
  return 'Script threw an exception';
}

/**
 * Typed helpers for the page-level commands recipes and the CLI use. Every
 * call goes through the channel, so they inherit its timeouts and
 * reconnection behaviour.
 */
export class PageCommands {
  constructor(private channel: CommandChannel) {}

  /**
   * Navigate and, unless `waitForLoad` is false, wait for the `load`
   * lifecycle event of the new document (matched by frame and loader id).
   * Same-document navigations return at once.
   */
  async navigate(url: string, options: { waitForLoad?: boolean; timeoutMs?: number } = {}): Promise<string> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_LOAD_TIMEOUT_MS;
    const loads = options.waitForLoad === false ? null : this.watchLoads();
    try {
      if (loads) await this.channel.command('Page.setLifecycleEventsEnabled', { enabled: true });
      const result = await this.channel.command('Page.navigate', { url }, { timeoutMs });
      if (typeof result.errorText === 'string' && result.errorText.length > 0) {
        throw new ProtocolError('Page.navigate', -32000, result.errorText);
      }
      const frameId = typeof result.frameId === 'string' ? result.frameId : '';
      if (loads && typeof result.loaderId === 'string') {
        await loads.until(frameId, result.loaderId, timeoutMs);
      }
      return frameId;
    } finally {
      loads?.stop();
    }
  }

  /** Evaluate an expression in the page and return its JSON value. */
  async evaluate(expression: string, options: EvaluateOptions = {}): Promise<unknown> {
    const result = await this.channel.command(
      'Runtime.evaluate',
      {
        expression,
        awaitPromise: options.awaitPromise ?? true,
        returnByValue: true,
        userGesture: true,
      },
      { timeoutMs: options.timeoutMs, signal: options.signal },
    );
    return this.unwrapEvaluation(result);
  }

  async screenshot(options: ScreenshotOptions = {}): Promise<Buffer> {
    const params: Record<string, unknown> = { format: options.format ?? 'png' };
    if (options.format === 'jpeg' && options.quality !== undefined) params.quality = options.quality;
    if (options.fullPage) params.captureBeyondViewport = true;

    const result = await this.channel.command('Page.captureScreenshot', params);
    if (typeof result.data !== 'string') {
      throw new ProtocolError('Page.captureScreenshot', -32000, 'response carried no image data');
    }
    return Buffer.from(result.data, 'base64');
  }

  /** Node id of the first match, or null. */
  async querySelector(selector: string): Promise<number | null> {
    const doc = await this.channel.command('DOM.getDocument', { depth: 0 });
    const root = asRecord(doc.root);
    if (typeof root.nodeId !== 'number') {
      throw new ProtocolError('DOM.getDocument', -32000, 'response carried no root node');
    }
    const found = await this.channel.command('DOM.querySelector', { nodeId: root.nodeId, selector });
    return typeof found.nodeId === 'number' && found.nodeId > 0 ? found.nodeId : null;
  }

  async click(selector: string): Promise<void> {
    const nodeId = await this.querySelector(selector);
    if (nodeId === null) {
      throw new ScriptEvaluationError(`No element matches selector ${selector}`);
    }
    const model = asRecord((await this.channel.command('DOM.getBoxModel', { nodeId })).model);
    const quad = Array.isArray(model.content) ? model.content.filter((n): n is number => typeof n === 'number') : [];
    if (quad.length < 8) {
      throw new ScriptEvaluationError(`Element ${selector} has no layout box`);
    }
    const x = (quad[0] + quad[2] + quad[4] + quad[6]) / 4;
    const y = (quad[1] + quad[3] + quad[5] + quad[7]) / 4;

    for (const type of ['mousePressed', 'mouseReleased']) {
      await this.channel.command('Input.dispatchMouseEvent', { type, x, y, button: 'left', clickCount: 1 });
    }
  }

  async typeText(text: string): Promise<void> {
    await this.channel.command('Input.insertText', { text });
  }

  async pressKey(key: string): Promise<void> {
    const known = KEY_CODES[key];
    const base = {
      key,
      code: known?.code ?? key,
      windowsVirtualKeyCode: known?.keyCode,
    };
    await this.channel.command('Input.dispatchKeyEvent', {
      type: 'keyDown',
      ...base,
      ...(known?.text ? { text: known.text } : key.length === 1 ? { text: key } : {}),
    });
    await this.channel.command('Input.dispatchKeyEvent', { type: 'keyUp', ...base });
  }

  async scrollBy(dy: number, dx = 0): Promise<void> {
    await this.evaluate(`window.scrollBy(${Number(dx)}, ${Number(dy)})`, { awaitPromise: false });
  }

  /** Poll until the selector matches or the timeout passes. */
  async waitForSelector(selector: string, timeoutMs = 10_000, intervalMs = 100): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    const matches = `document.querySelector(${JSON.stringify(selector)}) !== null`;
    for (;;) {
      if ((await this.evaluate(matches)) === true) return;
      if (Date.now() >= deadline) throw new CommandTimeout(`waitForSelector(${selector})`, timeoutMs);
      await sleep(intervalMs);
    }
  }

  /** Text, source URL and links of the first element matching `selector`. */
  async content(selector = 'body'): Promise<PageContent> {
    const value = asRecord(await this.evaluate(contentScript(selector)));
    if (value.found !== true) {
      throw new ScriptEvaluationError(`No element matches selector ${selector}`);
    }
    const links = Array.isArray(value.links) ? value.links.map(asRecord) : [];
    return {
      sourceUrl: typeof value.sourceUrl === 'string' ? value.sourceUrl : '',
      content: typeof value.content === 'string' ? value.content : '',
      links: links.map((link) => ({
        url: typeof link.url === 'string' ? link.url : '',
        text: typeof link.text === 'string' ? link.text : '',
      })),
    };
  }

  /** Collects `load` lifecycle events from the moment it is created. */
  private watchLoads(): { until(frameId: string, loaderId: string, timeoutMs: number): Promise<void>; stop(): void } {
    const loaded = new Set<string>();
    let notify: (() => void) | null = null;
    const unsubscribe = this.channel.subscribe('Page.lifecycleEvent', (event) => {
      const { name, frameId, loaderId } = event.params;
      if (name !== 'load' || typeof frameId !== 'string' || typeof loaderId !== 'string') return;
      loaded.add(`${frameId}/${loaderId}`);
      notify?.();
    });

    return {
      until: (frameId, loaderId, timeoutMs) =>
        new Promise<void>((resolve, reject) => {
          const key = `${frameId}/${loaderId}`;
          if (loaded.has(key)) {
            resolve();
            return;
          }
          const timer = setTimeout(() => {
            notify = null;
            reject(new CommandTimeout('Page.navigate (load)', timeoutMs));
          }, timeoutMs);
          notify = () => {
            if (!loaded.has(key)) return;
            clearTimeout(timer);
            notify = null;
            resolve();
          };
        }),
      stop: unsubscribe,
    };
  }

  async status(): Promise<PageStatus> {
    const version = await this.channel.command('Browser.getVersion', {}, { scope: 'browser' });
    const value = asRecord(
      await this.evaluate('({ url: location.href, title: document.title, readyState: document.readyState })'),
    );
    return {
      browser: typeof version.product === 'string' ? version.product : '',
      protocolVersion: typeof version.protocolVersion === 'string' ? version.protocolVersion : '',
      url: typeof value.url === 'string' ? value.url : '',
      title: typeof value.title === 'string' ? value.title : '',
      readyState: typeof value.readyState === 'string' ? value.readyState : '',
    };
  }

  async listTargets(): Promise<TargetInfo[]> {
    const result = await this.channel.command('Target.getTargets', {}, { scope: 'browser' });
    return TargetInfosResultSchema.parse(result).targetInfos;
  }

  async setZoom(factor: number): Promise<void> {
    await this.channel.command('Emulation.setPageScaleFactor', { pageScaleFactor: factor });
  }

  private unwrapEvaluation(result: CommandResult): unknown {
    if (result.exceptionDetails !== undefined) {
      const details = asRecord(result.exceptionDetails);
      throw new ScriptEvaluationError(describeException(details), details);
    }
    const remote = asRecord(result.result);
    if (remote.subtype === 'error') {
      throw new ScriptEvaluationError(typeof remote.description === 'string' ? remote.description : 'Script error');
    }
    return remote.value ?? null;
  }
}
