import { InvalidArgumentError } from 'commander';
import type { RecipeMetadata, RegistryDiagnostic } from '../types/recipe.js';
import { isTabrunnerError } from '../exception/errors.js';

export function printJson(value: unknown): void {
  process.stdout.write(JSON.stringify(value, null, 2) + '\n');
}

export function printError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  const kind = isTabrunnerError(error) ? `[${error.kind}] ` : '';
  process.stderr.write(`Error: ${kind}${message}\n`);
}

export function parseIntOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

const SCROLL_ALIASES: ReadonlyMap<string, number> = new Map([
  ['up', -500],
  ['down', 500],
  ['page-up', -800],
  ['page-down', 800],
]);

/** Pixels to scroll: an integer, or up, down, page-up or page-down. */
export function parseScrollDistance(value: string): number {
  const alias = SCROLL_ALIASES.get(value.toLowerCase());
  if (alias !== undefined) return alias;
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Expected an integer or one of up, down, page-up, page-down.');
  }
  return parsed;
}

export function parseZoomFactor(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Zoom factor must be a number greater than 0.');
  }
  return parsed;
}

export function parseWaitSeconds(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative number of seconds.');
  }
  return parsed;
}

/** Repeatable `--env KEY=VALUE`. */
export function collectEnvPair(value: string, previous: Record<string, string> = {}): Record<string, string> {
  const eq = value.indexOf('=');
  if (eq <= 0) {
    throw new InvalidArgumentError(`Expected KEY=VALUE, got "${value}".`);
  }
  return { ...previous, [value.slice(0, eq)]: value.slice(eq + 1) };
}

/** Plain-text recipe table, one row per recipe. */
export function formatRecipeTable(recipes: RecipeMetadata[]): string {
  if (recipes.length === 0) return 'No recipes found.';
  const rows = recipes.map((r) => [
    r.name,
    r.version,
    r.kind,
    r.runtime,
    r.shadowed.length > 0 ? `${r.source} (shadows ${r.shadowed.join(', ')})` : r.source,
    r.description,
  ]);
  const header = ['NAME', 'VERSION', 'TYPE', 'RUNTIME', 'SOURCE', 'DESCRIPTION'];
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((row) => row[i].length)));
  const line = (cells: string[]): string =>
    cells
      .map((cell, i) => (i === cells.length - 1 ? cell : cell.padEnd(widths[i])))
      .join('  ')
      .trimEnd();
  return [line(header), ...rows.map(line)].join('\n');
}

export function formatDiagnostics(diagnostics: readonly RegistryDiagnostic[]): string {
  if (diagnostics.length === 0) return 'No problems found.';
  return diagnostics.map((d) => `${d.source}  ${d.kind}  ${d.path}\n    ${d.message}`).join('\n');
}

/** Summary form used by `recipe list --json`. */
export function recipeSummary(recipe: RecipeMetadata): Record<string, unknown> {
  return {
    name: recipe.name,
    type: recipe.kind,
    runtime: recipe.runtime,
    version: recipe.version,
    source: recipe.source,
    description: recipe.description,
    tags: recipe.tags,
    shadowed: recipe.shadowed,
  };
}
