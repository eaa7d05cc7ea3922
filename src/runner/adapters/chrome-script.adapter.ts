import { readFile } from 'node:fs/promises';
import type { AdapterOutcome, AdapterRequest, RuntimeAdapter } from './runtime-adapter.js';
import type { CommandChannel } from '../../cdp/session.js';
import type { SessionState } from '../../types/connection.js';
import { PageCommands } from '../../cdp/commands.js';
import { RuntimeExecutionError } from '../../exception/errors.js';

export const PARAMS_GLOBAL = '__TABRUNNER_PARAMS__';

export interface PageChannel extends CommandChannel {
  readonly state: SessionState;
  /** Settles once any connect, attach or reconnect in progress is over. */
  whenReady(): Promise<void>;
}

/** A string result that holds JSON becomes that value; any other string is wrapped. */
export function normalizeScriptResult(value: unknown): unknown {
  if (value === undefined) return null;
  if (typeof value !== 'string') return value;
  try {
    return JSON.parse(value);
  } catch {
    return { result: value };
  }
}

/**
 * Evaluates the recipe script in the attached page, after any reconnect in
 * progress has settled. Params are published as
 * `window.__TABRUNNER_PARAMS__` first; the script's completion value
 * (awaited when it is a promise) is the output.
 */
export class ChromeScriptAdapter implements RuntimeAdapter {
  readonly runtime = 'chrome-script' as const;

  constructor(private channel: () => PageChannel | null) {}

  async run(request: AdapterRequest): Promise<AdapterOutcome> {
    const { recipe, params, timeoutMs, signal } = request;
    const channel = this.channel();
    if (channel) await channel.whenReady();
    if (!channel || channel.state !== 'attached') {
      throw new RuntimeExecutionError(
        recipe.name,
        `Recipe "${recipe.name}" needs a browser page but there is no attached browser session`,
      );
    }

    const source = await readFile(recipe.scriptPath, 'utf-8');
    const page = new PageCommands(channel);
    await page.evaluate(`window.${PARAMS_GLOBAL} = ${JSON.stringify(params)}; undefined`, { timeoutMs, signal });
    const value = await page.evaluate(source, { awaitPromise: true, timeoutMs, signal });
    return { output: normalizeScriptResult(value) };
  }
}
