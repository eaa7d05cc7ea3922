import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { parse as parseDotenv } from 'dotenv';
import type { RecipeMetadata } from '../types/recipe.js';
import { ParameterValidationError } from '../exception/errors.js';
import { HOME_DIR_NAME } from './namespaces.js';

export interface EnvProvider {
  /** Full environment for one recipe invocation. */
  resolve(recipe: RecipeMetadata, overrides?: Record<string, string>): Promise<Record<string, string>>;
}

export interface EnvLoaderOptions {
  baseEnv?: NodeJS.ProcessEnv;
  /** `.env` files, lowest priority first. */
  files?: string[];
}

async function readEnvFile(path: string): Promise<Record<string, string>> {
  try {
    return parseDotenv(await readFile(path, 'utf-8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return {};
    throw error;
  }
}

/** `~/.tabrunner/.env`, then the project `.tabrunner/.env` next to the project recipes directory. */
export function defaultEnvFiles(projectRecipesDir: string | null, home: string = homedir()): string[] {
  const files = [join(home, HOME_DIR_NAME, '.env')];
  if (projectRecipesDir) files.push(join(dirname(projectRecipesDir), '.env'));
  return files;
}

/**
 * Layers process env, the user and project `.env` files and per-call
 * overrides (later wins), then applies the recipe's own env declarations.
 */
export class EnvLoader implements EnvProvider {
  private readonly baseEnv: NodeJS.ProcessEnv;
  private readonly files: string[];

  constructor(options: EnvLoaderOptions = {}) {
    this.baseEnv = options.baseEnv ?? process.env;
    this.files = options.files ?? defaultEnvFiles(null);
  }

  async resolve(recipe: RecipeMetadata, overrides: Record<string, string> = {}): Promise<Record<string, string>> {
    const merged: Record<string, string> = {};
    for (const [key, value] of Object.entries(this.baseEnv)) {
      if (value !== undefined) merged[key] = value;
    }
    for (const file of this.files) {
      Object.assign(merged, await readEnvFile(file));
    }
    Object.assign(merged, overrides);

    const missing: string[] = [];
    for (const [name, decl] of Object.entries(recipe.env)) {
      if (merged[name] !== undefined && merged[name] !== '') continue;
      if (decl.default !== undefined) {
        merged[name] = decl.default;
      } else if (decl.required) {
        missing.push(`missing required environment variable ${name}`);
      }
    }
    if (missing.length > 0) {
      throw new ParameterValidationError(recipe.name, missing);
    }
    return merged;
  }
}
