import { existsSync } from 'node:fs';
import { stat } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Namespace } from '../types/recipe.js';

export const HOME_DIR_NAME = '.tabrunner';
export const RECIPES_DIR_NAME = 'recipes';

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/** The innermost `.tabrunner/recipes` at or above `cwd`. */
export async function findProjectRecipesDir(cwd: string = process.cwd()): Promise<string | null> {
  let current = resolve(cwd);
  for (;;) {
    const candidate = join(current, HOME_DIR_NAME, RECIPES_DIR_NAME);
    if (await isDirectory(candidate)) return candidate;
    const parent = dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export function userRecipesDir(home: string = homedir()): string {
  return join(home, HOME_DIR_NAME, RECIPES_DIR_NAME);
}

/** Bundled `recipes/` next to the package.json that ships this module (works from src/ and dist/). */
export function systemRecipesDir(): string {
  let current = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    if (existsSync(join(current, 'package.json'))) return join(current, RECIPES_DIR_NAME);
    const parent = dirname(current);
    if (parent === current) return join(dirname(fileURLToPath(import.meta.url)), RECIPES_DIR_NAME);
    current = parent;
  }
}

export interface NamespaceOptions {
  cwd?: string;
  home?: string;
  systemDir?: string;
}

/** Namespaces in priority order: Project, User, System. */
export async function defaultNamespaces(options: NamespaceOptions = {}): Promise<Namespace[]> {
  const namespaces: Namespace[] = [];
  const project = await findProjectRecipesDir(options.cwd);
  const user = userRecipesDir(options.home);
  if (project && project !== user) namespaces.push({ source: 'Project', root: project });
  namespaces.push({ source: 'User', root: user });
  namespaces.push({ source: 'System', root: options.systemDir ?? systemRecipesDir() });
  return namespaces;
}
