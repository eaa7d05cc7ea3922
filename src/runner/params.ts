import type { InputDeclaration, RecipeMetadata } from '../types/recipe.js';
import { ParameterValidationError } from '../exception/errors.js';

export type RecipeParams = Record<string, unknown>;

const CHECKS: Record<string, (value: unknown) => boolean> = {
  string: (v) => typeof v === 'string',
  number: (v) => typeof v === 'number' && Number.isFinite(v),
  boolean: (v) => typeof v === 'boolean',
  array: (v) => Array.isArray(v),
  object: (v) => v !== null && typeof v === 'object' && !Array.isArray(v),
};

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/** Problems with one declared input, or null. Unknown declared types are not checked. */
function checkInput(name: string, declaration: InputDeclaration, value: unknown): string | null {
  if (value === undefined || value === null) {
    return declaration.required ? `missing required parameter "${name}"` : null;
  }
  const check = CHECKS[declaration.type];
  if (check && !check(value)) {
    return `parameter "${name}" must be ${declaration.type}, got ${describe(value)}`;
  }
  return null;
}

/**
 * Check `params` against the recipe's declared inputs and fill declared
 * defaults. Throws before anything runs; undeclared params pass through.
 */
export function validateParams(recipe: RecipeMetadata, params: RecipeParams = {}): RecipeParams {
  const result: RecipeParams = { ...params };
  const errors: string[] = [];

  for (const [name, declaration] of Object.entries(recipe.inputs)) {
    if (result[name] === undefined && declaration.default !== undefined) {
      result[name] = declaration.default;
    }
    const problem = checkInput(name, declaration, result[name]);
    if (problem) errors.push(problem);
  }

  if (errors.length > 0) {
    throw new ParameterValidationError(recipe.name, errors);
  }
  return result;
}

/** Parse CLI-style params: a JSON object, or nothing. */
export function parseParamsJson(raw: string | undefined): RecipeParams {
  if (raw === undefined || raw.trim() === '') return {};
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new ParameterValidationError('(params)', [
      `params are not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    throw new ParameterValidationError('(params)', ['params must be a JSON object']);
  }
  return { ...value };
}
