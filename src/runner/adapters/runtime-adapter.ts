import type { RecipeMetadata, RecipeRuntime } from '../../types/recipe.js';
import type { RecipeParams } from '../params.js';

export interface AdapterRequest {
  recipe: RecipeMetadata;
  params: RecipeParams;
  env: Record<string, string>;
  timeoutMs: number;
  signal: AbortSignal;
}

export interface AdapterOutcome {
  output: unknown;
  stderr?: string;
}

/**
 * Runs one atomic recipe in its runtime. Failures are thrown as
 * TabrunnerError subclasses; the executor turns them into results.
 */
export interface RuntimeAdapter {
  readonly runtime: RecipeRuntime;
  run(request: AdapterRequest): Promise<AdapterOutcome>;
}

export type AdapterTable = Partial<Record<RecipeRuntime, RuntimeAdapter>>;
