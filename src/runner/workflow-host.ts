import { extname } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { ExecutionError, ExecutionResult, StepResult } from '../types/execution.js';
import type { RecipeMetadata } from '../types/recipe.js';
import type { RecipeParams } from './params.js';
import { ParameterValidationError, RuntimeExecutionError } from '../exception/errors.js';
import { errorToPayload } from '../exception/classifier.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { WORKFLOW_EXTENSIONS } from '../recipe/discovery.js';

export interface StepOptions {
  /** A failed optional step does not fail the workflow. */
  optional?: boolean;
  timeoutMs?: number;
}

export interface StepCall extends StepOptions {
  name: string;
  params?: RecipeParams;
}

export interface WorkflowContext {
  readonly params: RecipeParams;
  readonly env: Readonly<Record<string, string>>;
  readonly signal: AbortSignal;
  readonly log: Logger;
  /** Values set here are passed as environment overrides to every step started afterwards. */
  readonly sharedEnv: Record<string, string>;
  /** Run one declared dependency. Never throws; inspect `success`. */
  run(name: string, params?: RecipeParams, options?: StepOptions): Promise<ExecutionResult>;
  /** Run several dependencies concurrently; results come back in call order. */
  parallel(calls: StepCall[]): Promise<ExecutionResult[]>;
}

export type WorkflowFunction = (context: WorkflowContext) => unknown;

export interface WorkflowModuleLoader {
  load(scriptPath: string): Promise<WorkflowFunction>;
}


/** Loads the workflow's default export with a dynamic import. */
export class ImportWorkflowLoader implements WorkflowModuleLoader {
  async load(scriptPath: string): Promise<WorkflowFunction> {
    if (!WORKFLOW_EXTENSIONS.includes(extname(scriptPath))) {
      throw new Error(`workflow entry ${scriptPath} is not a JavaScript module`);
    }
    const mod: unknown = await import(pathToFileURL(scriptPath).href);
    if (mod === null || typeof mod !== 'object' || !('default' in mod) || typeof mod.default !== 'function') {
      throw new Error(`workflow module ${scriptPath} has no default export function`);
    }
    const entry = mod.default;
    return (context) => {
      const value: unknown = Reflect.apply(entry, undefined, [context]);
      return value;
    };
  }
}

export type StepRunner = (
  name: string,
  params: RecipeParams,
  options: { timeoutMs?: number; signal: AbortSignal; env: Record<string, string> },
) => Promise<ExecutionResult>;

export interface WorkflowRequest {
  recipe: RecipeMetadata;
  params: RecipeParams;
  env: Record<string, string>;
  signal: AbortSignal;
}

export interface WorkflowOutcome {
  success: boolean;
  output: unknown;
  error?: ExecutionError;
}

function refused(recipe: RecipeMetadata, name: string): ExecutionResult {
  const error = new ParameterValidationError(recipe.name, [
    `"${name}" is not declared in the dependencies of workflow "${recipe.name}"`,
  ]);
  return { recipe: name, success: false, output: null, error: errorToPayload(error), durationMs: 0 };
}

/**
 * Runs a workflow module in-process. Every `run` call goes back through the
 * executor, so steps get the same validation and deadlines as top-level
 * calls. Step results land in `steps` in call order as they finish.
 */
export class WorkflowHost {
  constructor(private loader: WorkflowModuleLoader = new ImportWorkflowLoader()) {}

  async run(request: WorkflowRequest, runStep: StepRunner, steps: StepResult[]): Promise<WorkflowOutcome> {
    const { recipe, signal } = request;
    const log = createLogger(`workflow:${recipe.name}`);
    const slots: (StepResult | undefined)[] = [];
    const inFlight = new Set<Promise<ExecutionResult>>();
    const allowed = new Set(recipe.dependencies);
    const sharedEnv: Record<string, string> = {};
    const snapshotEnv = (): Record<string, string> =>
      Object.fromEntries(Object.entries(sharedEnv).map(([key, value]) => [key, String(value)]));

    const publish = (): void => {
      steps.length = 0;
      for (const slot of slots) if (slot) steps.push(slot);
    };

    const run = (name: string, params: RecipeParams = {}, options: StepOptions = {}): Promise<ExecutionResult> => {
      const index = slots.length;
      slots.push(undefined);
      const required = !options.optional;
      const started = allowed.has(name)
        ? runStep(name, params, { timeoutMs: options.timeoutMs, signal, env: snapshotEnv() })
        : Promise.resolve(refused(recipe, name));
      const pending = started.then((result) => {
        slots[index] = { ...result, required };
        publish();
        if (!result.success) {
          log.warn('Step failed', { step: name, required, kind: result.error?.kind });
        }
        return result;
      });
      inFlight.add(pending);
      void pending.finally(() => inFlight.delete(pending));
      return pending;
    };

    const context: WorkflowContext = {
      params: request.params,
      env: request.env,
      signal,
      log,
      sharedEnv,
      run,
      parallel: (calls) => Promise.all(calls.map((call) => run(call.name, call.params, call))),
    };

    let output: unknown = null;
    let thrown: ExecutionError | undefined;
    try {
      const entry = await this.loader.load(recipe.scriptPath);
      output = (await entry(context)) ?? null;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      thrown = errorToPayload(new RuntimeExecutionError(recipe.name, `Workflow "${recipe.name}" failed: ${message}`));
    }

    await Promise.allSettled([...inFlight]);
    publish();

    if (thrown) return { success: false, output, error: thrown };

    const failed = steps.find((step) => step.required && !step.success);
    if (failed) {
      return {
        success: false,
        output,
        error: {
          kind: failed.error?.kind ?? 'RuntimeExecutionError',
          message: `Required step "${failed.recipe}" failed: ${failed.error?.message ?? 'unknown error'}`,
        },
      };
    }
    return { success: true, output };
  }
}
