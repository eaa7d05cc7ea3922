import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { ExecutionResult } from '../types/execution.js';
import type { RecipeRuntime, RecipeSource } from '../types/recipe.js';

export interface ExecutionMeta {
  source: RecipeSource | null;
  runtime: RecipeRuntime | null;
  version: string | null;
  startedAt: string;
  /** Set for workflow steps. */
  parent?: string;
}

/** Receives every finished execution. The core keeps no history of its own. */
export interface ExecutionLogger {
  record(result: ExecutionResult, meta: ExecutionMeta): Promise<void>;
}

export class RunLogger implements ExecutionLogger {
  private logPath: string;
  private initialized = false;

  constructor(private runDir: string) {
    this.logPath = join(runDir, 'logs.jsonl');
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.runDir, { recursive: true });
    this.initialized = true;
  }

  async record(result: ExecutionResult, meta: ExecutionMeta): Promise<void> {
    await this.ensureDir();
    const { steps, ...rest } = result;
    const entry = {
      timestamp: new Date().toISOString(),
      ...meta,
      ...rest,
      ...(steps ? { steps: steps.map((s) => ({ recipe: s.recipe, success: s.success, required: s.required })) } : {}),
    };
    await appendFile(this.logPath, JSON.stringify(entry) + '\n', 'utf-8');
  }
}
