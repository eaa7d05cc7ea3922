import { readFile, writeFile } from 'node:fs/promises';
import type { Command } from 'commander';
import type { RecipeSource } from '../types/recipe.js';
import { SOURCE_PRIORITY } from '../types/recipe.js';
import { RecipeRegistry } from '../recipe/registry.js';
import { defaultNamespaces, findProjectRecipesDir } from '../recipe/namespaces.js';
import { EnvLoader, defaultEnvFiles } from '../recipe/env-loader.js';
import { RecipeExecutor } from '../runner/recipe-executor.js';
import { parseParamsJson } from '../runner/params.js';
import { RunLogger } from '../logging/run-logger.js';
import { writeSummary } from '../logging/summary-writer.js';
import { CdpEngine } from '../engines/cdp-engine.js';
import { ConfigurationError } from '../exception/errors.js';
import { connectionFromOptions, type GlobalOptions } from './options.js';
import {
  collectEnvPair,
  formatDiagnostics,
  formatRecipeTable,
  parseIntOption,
  printJson,
  recipeSummary,
} from './output.js';

interface ListOptions {
  all?: boolean;
  json?: boolean;
}

interface RunOptions {
  params?: string;
  paramsFile?: string;
  timeout?: number;
  source?: string;
  env: Record<string, string>;
  logDir?: string;
  outputFile?: string;
}

async function loadRegistry(): Promise<RecipeRegistry> {
  const registry = new RecipeRegistry(await defaultNamespaces());
  await registry.discover();
  return registry;
}

function parseSource(value: string | undefined): RecipeSource | undefined {
  if (value === undefined) return undefined;
  const match = SOURCE_PRIORITY.find((s) => s.toLowerCase() === value.toLowerCase());
  if (!match) {
    throw new ConfigurationError(`Unknown source "${value}" (expected ${SOURCE_PRIORITY.join(', ')})`);
  }
  return match;
}

/** Whether the recipe, or any workflow step under it, evaluates in the page. */
export function needsBrowser(
  registry: RecipeRegistry,
  name: string,
  source?: RecipeSource,
  seen = new Set<string>(),
): boolean {
  if (seen.has(name) || !registry.has(name)) return false;
  seen.add(name);
  const recipe = registry.resolve(name, source);
  if (recipe.runtime === 'chrome-script') return true;
  return recipe.dependencies.some((dep) => needsBrowser(registry, dep, undefined, seen));
}

export function configureRecipeCommands(root: Command): void {
  const recipe = root.command('recipe').description('List, inspect and run recipes');

  recipe
    .command('list')
    .description('List available recipes')
    .option('--all', 'include shadowed lower-priority definitions', false)
    .option('--json', 'print JSON', false)
    .action(async (options: ListOptions) => {
      const registry = await loadRegistry();
      const recipes = registry.list({ includeShadowed: options.all });
      if (options.json) {
        printJson(recipes.map(recipeSummary));
      } else {
        process.stdout.write(formatRecipeTable(recipes) + '\n');
      }
    });

  recipe
    .command('info')
    .description('Show the full metadata of a recipe')
    .argument('<name>', 'recipe name')
    .option('--source <source>', 'namespace to read from (Project, User, System)')
    .action(async (name: string, options: { source?: string }) => {
      const registry = await loadRegistry();
      const metadata = registry.resolve(name, parseSource(options.source));
      printJson({ ...metadata, definedIn: registry.sourcesOf(name) });
    });

  recipe
    .command('diagnostics')
    .description('Show problems found while indexing recipes')
    .option('--json', 'print JSON', false)
    .action(async (options: { json?: boolean }) => {
      const registry = await loadRegistry();
      const diagnostics = registry.diagnostics();
      if (options.json) printJson(diagnostics);
      else process.stdout.write(formatDiagnostics(diagnostics) + '\n');
    });

  recipe
    .command('run')
    .description('Run a recipe and print its ExecutionResult as JSON')
    .argument('<name>', 'recipe name')
    .option('--params <json>', 'parameters as a JSON object')
    .option('--params-file <path>', 'read parameters from a JSON file')
    .option('--timeout <ms>', 'whole-run deadline in ms', parseIntOption)
    .option('--source <source>', 'namespace to run from (Project, User, System)')
    .option('--env <pair>', 'extra environment variable KEY=VALUE (repeatable)', collectEnvPair, {})
    .option('--log-dir <dir>', 'append a JSONL run log and summary.md to this directory')
    .option('--output-file <path>', 'write the result JSON to a file instead of stdout')
    .action(async (name: string, options: RunOptions, command: Command) => {
      if (options.params !== undefined && options.paramsFile !== undefined) {
        throw new ConfigurationError('Use either --params or --params-file, not both');
      }
      const rawParams = options.paramsFile !== undefined ? await readFile(options.paramsFile, 'utf-8') : options.params;
      const params = parseParamsJson(rawParams);
      const source = parseSource(options.source);

      const registry = await loadRegistry();
      const globals = command.optsWithGlobals<GlobalOptions>();
      const engine = needsBrowser(registry, name, source)
        ? await CdpEngine.open(connectionFromOptions(globals), { stealth: globals.stealth })
        : null;
      const logger = options.logDir ? new RunLogger(options.logDir) : undefined;

      try {
        const executor = new RecipeExecutor({
          registry,
          session: () => engine?.session ?? null,
          env: new EnvLoader({ files: defaultEnvFiles(await findProjectRecipesDir()) }),
          logger,
        });
        const result = await executor.execute(name, params, {
          timeoutMs: options.timeout,
          source,
          env: options.env,
        });

        if (options.logDir && registry.has(name)) {
          await writeSummary(options.logDir, registry.resolve(name, source), result);
        }
        if (options.outputFile) {
          await writeFile(options.outputFile, JSON.stringify(result, null, 2) + '\n', 'utf-8');
        } else {
          printJson(result);
        }
        if (!result.success) process.exitCode = 1;
      } finally {
        await engine?.close();
      }
    });
}
