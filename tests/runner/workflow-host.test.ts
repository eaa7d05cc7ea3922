import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  ImportWorkflowLoader,
  WorkflowHost,
  type StepRunner,
  type WorkflowContext,
  type WorkflowFunction,
  type WorkflowModuleLoader,
} from '../../src/runner/workflow-host.js';
import type { ExecutionResult, StepResult } from '../../src/types/execution.js';
import { createLogger } from '../../src/logging/logger.js';
import { makeTempDir, recipe, removeDir } from '../helpers/recipe-tree.js';

class MemoryLoader implements WorkflowModuleLoader {
  constructor(private entry: WorkflowFunction) {}

  async load(): Promise<WorkflowFunction> {
    return this.entry;
  }
}

const ok = (name: string, output: unknown = null): ExecutionResult => ({
  recipe: name,
  success: true,
  output,
  durationMs: 1,
});

const failed = (name: string, message: string): ExecutionResult => ({
  recipe: name,
  success: false,
  output: null,
  error: { kind: 'RuntimeExecutionError', message },
  durationMs: 1,
});

const workflow = recipe('report', { kind: 'workflow', dependencies: ['A', 'B'] });

function request() {
  return { recipe: workflow, params: { url: 'https://example.com' }, env: {}, signal: new AbortController().signal };
}

describe('WorkflowHost', () => {
  it('fails the workflow when a required step fails, keeping every step result', async () => {
    const runStep = vi.fn<StepRunner>(async (name) => (name === 'A' ? failed('A', 'A broke') : ok('B', { n: 1 })));
    const host = new WorkflowHost(
      new MemoryLoader(async (ctx) => {
        const a = await ctx.run('A');
        const b = await ctx.run('B', { afterFailure: !a.success });
        return { a: a.success, b: b.output };
      }),
    );
    const steps: StepResult[] = [];

    const outcome = await host.run(request(), runStep, steps);

    expect(outcome).toEqual({
      success: false,
      output: { a: false, b: { n: 1 } },
      error: { kind: 'RuntimeExecutionError', message: 'Required step "A" failed: A broke' },
    });
    expect(steps).toEqual([
      { ...failed('A', 'A broke'), required: true },
      { ...ok('B', { n: 1 }), required: true },
    ]);
    expect(runStep.mock.calls[1][1]).toEqual({ afterFailure: true });
  });

  it('tolerates a failing optional step', async () => {
    const host = new WorkflowHost(
      new MemoryLoader(async (ctx) => {
        await ctx.run('A', {}, { optional: true });
        await ctx.run('B');
        return 'done';
      }),
    );
    const steps: StepResult[] = [];

    const outcome = await host.run(request(), async (name) => (name === 'A' ? failed('A', 'flaky') : ok('B')), steps);

    expect(outcome).toEqual({ success: true, output: 'done' });
    expect(steps.map((s) => [s.recipe, s.success, s.required])).toEqual([
      ['A', false, false],
      ['B', true, true],
    ]);
  });

  it('refuses steps that are not declared dependencies', async () => {
    const runStep = vi.fn<StepRunner>(async (name) => ok(name));
    const host = new WorkflowHost(
      new MemoryLoader(async (ctx) => {
        const result = await ctx.run('C');
        return result.error;
      }),
    );
    const steps: StepResult[] = [];

    const outcome = await host.run(request(), runStep, steps);

    expect(runStep).not.toHaveBeenCalled();
    expect(outcome.output).toEqual({
      kind: 'ParameterValidationError',
      message: 'Invalid parameters for "report": "C" is not declared in the dependencies of workflow "report"',
    });
    expect(outcome.success).toBe(false);
    expect(outcome.error?.message).toBe(
      'Required step "C" failed: Invalid parameters for "report": "C" is not declared in the dependencies of workflow "report"',
    );
  });

  it('turns a thrown error into a runtime failure and keeps finished steps', async () => {
    const host = new WorkflowHost(
      new MemoryLoader(async (ctx) => {
        await ctx.run('A');
        throw new Error('kaboom');
      }),
    );
    const steps: StepResult[] = [];

    const outcome = await host.run(request(), async (name) => ok(name), steps);

    expect(outcome).toEqual({
      success: false,
      output: null,
      error: { kind: 'RuntimeExecutionError', message: 'Workflow "report" failed: kaboom' },
    });
    expect(steps.map((s) => s.recipe)).toEqual(['A']);
  });

  it('runs parallel steps concurrently and reports them in call order', async () => {
    const finished: string[] = [];
    const runStep: StepRunner = async (name) => {
      await new Promise((resolve) => setTimeout(resolve, name === 'A' ? 30 : 1));
      finished.push(name);
      return ok(name, name.toLowerCase());
    };
    const host = new WorkflowHost(
      new MemoryLoader(async (ctx) => {
        const results = await ctx.parallel([{ name: 'A' }, { name: 'B', optional: true }]);
        return results.map((r) => r.output);
      }),
    );
    const steps: StepResult[] = [];

    const outcome = await host.run(request(), runStep, steps);

    expect(finished).toEqual(['B', 'A']);
    expect(outcome.output).toEqual(['a', 'b']);
    expect(steps.map((s) => [s.recipe, s.required])).toEqual([
      ['A', true],
      ['B', false],
    ]);
  });

  it('waits for steps the workflow started but did not await', async () => {
    const host = new WorkflowHost(
      new MemoryLoader((ctx) => {
        void ctx.run('A');
        return 'started';
      }),
    );
    const steps: StepResult[] = [];
    const runStep: StepRunner = async (name) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return ok(name);
    };

    const outcome = await host.run(request(), runStep, steps);

    expect(outcome.output).toBe('started');
    expect(steps.map((s) => s.recipe)).toEqual(['A']);
  });

  it('hands the workflow its params and signal, and passes the signal to steps', async () => {
    const req = request();
    const seen: unknown[] = [];
    const runStep = vi.fn<StepRunner>(async (name) => ok(name));
    const host = new WorkflowHost(
      new MemoryLoader(async (ctx) => {
        seen.push(ctx.params, ctx.signal === req.signal);
        await ctx.run('B', {}, { timeoutMs: 250 });
      }),
    );

    const outcome = await host.run(req, runStep, []);

    expect(outcome).toEqual({ success: true, output: null });
    expect(seen).toEqual([{ url: 'https://example.com' }, true]);
    expect(runStep).toHaveBeenCalledWith('B', {}, { timeoutMs: 250, signal: req.signal, env: {} });
  });

  it('passes shared env values to the steps started after they are set', async () => {
    const runStep = vi.fn<StepRunner>(async (name) => ok(name));
    const host = new WorkflowHost(
      new MemoryLoader(async (ctx) => {
        await ctx.run('A');
        ctx.sharedEnv.SESSION_TOKEN = 'test-secret';
        await ctx.run('B');
      }),
    );

    await host.run(request(), runStep, []);

    expect(runStep.mock.calls.map((call) => [call[0], call[2].env])).toEqual([
      ['A', {}],
      ['B', { SESSION_TOKEN: 'test-secret' }],
    ]);
  });
});

describe('ImportWorkflowLoader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('loads the default export of an ES module', async () => {
    const path = join(dir, 'double.mjs');
    await writeFile(path, 'export default (ctx) => ctx.params.n * 2;\n');

    const entry = await new ImportWorkflowLoader().load(path);

    const context: WorkflowContext = {
      params: { n: 21 },
      env: {},
      sharedEnv: {},
      signal: new AbortController().signal,
      log: createLogger('test'),
      run: async (name) => ok(name),
      parallel: async () => [],
    };
    expect(entry(context)).toBe(42);
  });

  it('rejects a module without a default function', async () => {
    const path = join(dir, 'named.mjs');
    await writeFile(path, 'export const run = () => 1;\n');
    await expect(new ImportWorkflowLoader().load(path)).rejects.toThrow(
      `workflow module ${path} has no default export function`,
    );
  });

  it('rejects scripts that are not JavaScript modules', async () => {
    await expect(new ImportWorkflowLoader().load(join(dir, 'flow.py'))).rejects.toThrow(
      `workflow entry ${join(dir, 'flow.py')} is not a JavaScript module`,
    );
  });
});
