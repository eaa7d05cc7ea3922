import { readdir, readFile, stat } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import type { Namespace, RecipeMetadata, RecipeRuntime, RegistryDiagnostic } from '../types/recipe.js';
import { isTabrunnerError } from '../exception/errors.js';
import { createLogger } from '../logging/logger.js';
import { extractFrontMatter, parseFrontMatter, toRecipeMetadata } from './metadata.js';

const log = createLogger('discovery');

export const SCRIPT_EXTENSIONS: Record<RecipeRuntime, readonly string[]> = {
  'chrome-script': ['.js'],
  process: ['.js', '.mjs', '.cjs', '.py'],
  shell: ['.sh'],
};

/** Workflows run in-process, so their entry must be a module Node can import. */
export const WORKFLOW_EXTENSIONS: readonly string[] = ['.js', '.mjs', '.cjs'];

const SKIPPED_DIRS = new Set(['node_modules', '__pycache__']);

export interface NamespaceScan {
  recipes: RecipeMetadata[];
  diagnostics: RegistryDiagnostic[];
}

async function exists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/** Every `*.md` file under `root`, sorted. A missing root yields nothing. */
export async function listMetadataFiles(root: string): Promise<string[]> {
  let entries;
  try {
    entries = await readdir(root, { withFileTypes: true });
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return [];
    }
    throw error;
  }

  const files: string[] = [];
  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue;
    const path = join(root, entry.name);
    if (entry.isDirectory()) {
      if (SKIPPED_DIRS.has(entry.name)) continue;
      files.push(...(await listMetadataFiles(path)));
    } else if (entry.isFile() && extname(entry.name) === '.md') {
      files.push(path);
    }
  }
  return files.sort();
}

async function findScript(metadataPath: string, extensions: readonly string[]): Promise<string | null> {
  const base = metadataPath.slice(0, -'.md'.length);
  for (const ext of extensions) {
    if (await exists(base + ext)) return base + ext;
  }
  return null;
}

/**
 * Index one namespace. Bad documents become diagnostics instead of errors so
 * one broken recipe never hides the rest.
 */
export async function scanNamespace(namespace: Namespace): Promise<NamespaceScan> {
  const recipes: RecipeMetadata[] = [];
  const diagnostics: RegistryDiagnostic[] = [];
  const seen = new Map<string, string>();

  for (const metadataPath of await listMetadataFiles(namespace.root)) {
    const text = await readFile(metadataPath, 'utf-8');
    if (extractFrontMatter(text) === null) {
      log.debug('Skipping markdown without front matter', { path: metadataPath });
      continue;
    }

    let front;
    try {
      front = parseFrontMatter(text, metadataPath);
    } catch (error) {
      if (!isTabrunnerError(error)) throw error;
      diagnostics.push({ source: namespace.source, path: metadataPath, kind: error.kind, message: error.message });
      continue;
    }

    const scriptPath = await findScript(
      metadataPath,
      front.type === 'workflow' ? WORKFLOW_EXTENSIONS : SCRIPT_EXTENSIONS[front.runtime],
    );
    if (!scriptPath && front.type === 'workflow') {
      const other = await findScript(metadataPath, SCRIPT_EXTENSIONS[front.runtime]);
      diagnostics.push({
        source: namespace.source,
        path: metadataPath,
        kind: other ? 'UnsupportedWorkflowScript' : 'MissingScript',
        recipe: front.name,
        message: other
          ? `Workflow "${front.name}" must be a ${WORKFLOW_EXTENSIONS.join('/')} module, found ${basename(other)}`
          : `No ${WORKFLOW_EXTENSIONS.join('/')} workflow module next to ${metadataPath}`,
      });
      continue;
    }
    if (!scriptPath) {
      diagnostics.push({
        source: namespace.source,
        path: metadataPath,
        kind: 'MissingScript',
        recipe: front.name,
        message: `No ${SCRIPT_EXTENSIONS[front.runtime].join('/')} script next to ${metadataPath}`,
      });
      continue;
    }

    const first = seen.get(front.name);
    if (first) {
      diagnostics.push({
        source: namespace.source,
        path: metadataPath,
        kind: 'DuplicateRecipe',
        recipe: front.name,
        message: `"${front.name}" is already defined by ${first}; ignoring this copy`,
      });
      continue;
    }
    seen.set(front.name, metadataPath);
    recipes.push(toRecipeMetadata(front, { source: namespace.source, metadataPath, scriptPath }));
  }

  log.debug('Scanned namespace', { source: namespace.source, root: namespace.root, recipes: recipes.length });
  return { recipes, diagnostics };
}
