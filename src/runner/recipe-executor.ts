import type { ExecuteOptions, ExecutionError, ExecutionResult, StepResult } from '../types/execution.js';
import type { RecipeMetadata } from '../types/recipe.js';
import type { RecipeRegistry } from '../recipe/registry.js';
import { EnvLoader, type EnvProvider } from '../recipe/env-loader.js';
import { validateParams, type RecipeParams } from './params.js';
import { WorkflowHost } from './workflow-host.js';
import type { AdapterTable, AdapterOutcome } from './adapters/runtime-adapter.js';
import { ChromeScriptAdapter, type PageChannel } from './adapters/chrome-script.adapter.js';
import { ProcessAdapter } from './adapters/process.adapter.js';
import { ShellAdapter } from './adapters/shell.adapter.js';
import { CommandCancelled, RecipeTimeout, RuntimeExecutionError } from '../exception/errors.js';
import { errorToPayload } from '../exception/classifier.js';
import type { ExecutionLogger, ExecutionMeta } from '../logging/run-logger.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('executor');

export const DEFAULT_RECIPE_TIMEOUT_MS = 5 * 60 * 1000;

export interface RecipeExecutorOptions {
  registry: RecipeRegistry;
  /** Page used by chrome-script recipes when no adapter table is given. */
  session?: () => PageChannel | null;
  adapters?: AdapterTable;
  env?: EnvProvider;
  workflows?: WorkflowHost;
  logger?: ExecutionLogger;
  defaultTimeoutMs?: number;
}

interface DispatchOutcome {
  success: boolean;
  output: unknown;
  error?: ExecutionError;
  stderr?: string;
}

/** Settles with `work`, or rejects with the abort reason as soon as `signal` fires. */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(signal.reason instanceof Error ? signal.reason : new CommandCancelled('execute'));
    };
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Resolves a recipe, validates its params, and runs it in its runtime.
 * `execute` never throws: every failure comes back as a result.
 */
export class RecipeExecutor {
  private readonly registry: RecipeRegistry;
  private readonly adapters: AdapterTable;
  private readonly env: EnvProvider;
  private readonly workflows: WorkflowHost;
  private readonly logger?: ExecutionLogger;
  private readonly defaultTimeoutMs: number;

  constructor(options: RecipeExecutorOptions) {
    this.registry = options.registry;
    this.adapters = options.adapters ?? {
      'chrome-script': new ChromeScriptAdapter(options.session ?? (() => null)),
      process: new ProcessAdapter(),
      shell: new ShellAdapter(),
    };
    this.env = options.env ?? new EnvLoader();
    this.workflows = options.workflows ?? new WorkflowHost();
    this.logger = options.logger;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_RECIPE_TIMEOUT_MS;
  }

  execute(name: string, params: RecipeParams = {}, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    return this.executeWithin(name, params, options);
  }

  private async executeWithin(
    name: string,
    params: RecipeParams,
    options: ExecuteOptions,
    parent?: string,
  ): Promise<ExecutionResult> {
    const started = Date.now();
    const startedAt = new Date(started).toISOString();
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new RecipeTimeout(name, timeoutMs)), timeoutMs);
    const onCallerAbort = (): void => controller.abort(new CommandCancelled(name));
    if (options.signal?.aborted) onCallerAbort();
    else options.signal?.addEventListener('abort', onCallerAbort, { once: true });

    let recipe: RecipeMetadata | null = null;
    const steps: StepResult[] = [];
    let result: ExecutionResult;

    try {
      recipe = this.registry.resolve(name, options.source);
      const resolved = recipe;
      const validated = validateParams(resolved, params);
      const env = await this.env.resolve(resolved, options.env);
      log.debug('Executing recipe', { recipe: name, runtime: resolved.runtime, source: resolved.source, parent });

      const outcome = await untilAborted(
        this.dispatch(resolved, validated, env, timeoutMs, controller.signal, options, steps),
        controller.signal,
      );
      result = {
        recipe: name,
        success: outcome.success,
        output: outcome.output,
        durationMs: Date.now() - started,
        ...(outcome.error ? { error: outcome.error } : {}),
        ...(outcome.stderr ? { stderr: outcome.stderr } : {}),
      };
    } catch (error) {
      result = {
        recipe: name,
        success: false,
        output: null,
        error: errorToPayload(error),
        durationMs: Date.now() - started,
        ...(error instanceof RuntimeExecutionError && error.stderr ? { stderr: error.stderr } : {}),
      };
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
      if (!controller.signal.aborted) controller.abort(new CommandCancelled(name));
    }

    if (recipe?.kind === 'workflow') result.steps = [...steps];
    if (!result.success) {
      log.warn('Recipe failed', { recipe: name, kind: result.error?.kind, durationMs: result.durationMs });
    }
    await this.record(result, {
      source: recipe?.source ?? null,
      runtime: recipe?.runtime ?? null,
      version: recipe?.version ?? null,
      startedAt,
      ...(parent ? { parent } : {}),
    });
    return result;
  }

  private async dispatch(
    recipe: RecipeMetadata,
    params: RecipeParams,
    env: Record<string, string>,
    timeoutMs: number,
    signal: AbortSignal,
    options: ExecuteOptions,
    steps: StepResult[],
  ): Promise<DispatchOutcome> {
    if (recipe.kind === 'workflow') {
      return this.workflows.run(
        { recipe, params, env, signal },
        (step, stepParams, stepOptions) =>
          this.executeWithin(
            step,
            stepParams,
            {
              timeoutMs: stepOptions.timeoutMs,
              signal: stepOptions.signal,
              env: { ...options.env, ...stepOptions.env },
            },
            recipe.name,
          ),
        steps,
      );
    }

    const adapter = this.adapters[recipe.runtime];
    if (!adapter) {
      throw new RuntimeExecutionError(recipe.name, `No adapter registered for runtime "${recipe.runtime}"`);
    }
    const outcome: AdapterOutcome = await adapter.run({ recipe, params, env, timeoutMs, signal });
    return { success: true, output: outcome.output, stderr: outcome.stderr };
  }

  private async record(result: ExecutionResult, meta: ExecutionMeta): Promise<void> {
    if (!this.logger) return;
    try {
      await this.logger.record(result, meta);
    } catch (error) {
      log.warn('Execution logger failed', { error: error instanceof Error ? error.message : String(error) });
    }
  }
}
