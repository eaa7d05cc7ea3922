import type { ErrorKind } from '../exception/errors.js';
import type { RecipeSource } from './recipe.js';

export interface ExecutionError {
  kind: ErrorKind;
  message: string;
}

export interface ExecutionResult {
  recipe: string;
  success: boolean;
  output: unknown;
  error?: ExecutionError;
  durationMs: number;
  stderr?: string;
  steps?: StepResult[];
}

export interface StepResult extends ExecutionResult {
  required: boolean;
}

export interface ExecuteOptions {
  timeoutMs?: number;
  source?: RecipeSource;
  signal?: AbortSignal;
  env?: Record<string, string>;
}
