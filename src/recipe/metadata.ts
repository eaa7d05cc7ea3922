import { parse as parseYaml } from 'yaml';
import { RecipeFrontMatterSchema, type RecipeFrontMatter } from '../schemas/recipe-metadata.schema.js';
import type { RecipeMetadata, RecipeSource } from '../types/recipe.js';
import { MetadataParseError } from '../exception/errors.js';
import { extractMessage } from '../exception/classifier.js';

const FRONT_MATTER = /^\uFEFF?---[ \t]*\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)/;
const RAW_VERSION = /^version:[ \t]*["']?(\d+(?:\.\d+)*)["']?[ \t]*(?:#.*)?$/m;

/** The YAML between the leading `---` fences, or null when the document has none. */
export function extractFrontMatter(text: string): string | null {
  const match = FRONT_MATTER.exec(text);
  return match ? match[1] : null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * YAML reads `version: 1.0` as the number 1. Recover the literal from the
 * source so it still validates as a dotted version string.
 */
function normalizeVersion(data: Record<string, unknown>, block: string): Record<string, unknown> {
  if (typeof data.version !== 'number') return data;
  const raw = RAW_VERSION.exec(block);
  return { ...data, version: raw ? raw[1] : String(data.version) };
}

export function parseFrontMatter(text: string, path: string): RecipeFrontMatter {
  const block = extractFrontMatter(text);
  if (block === null) {
    throw new MetadataParseError(path, 'missing YAML front matter');
  }

  let data: unknown;
  try {
    data = parseYaml(block);
  } catch (error) {
    throw new MetadataParseError(path, error instanceof Error ? error.message : String(error));
  }
  if (!isPlainObject(data)) {
    throw new MetadataParseError(path, 'front matter must be a mapping');
  }

  const result = RecipeFrontMatterSchema.safeParse(normalizeVersion(data, block));
  if (!result.success) {
    throw new MetadataParseError(path, extractMessage(result.error));
  }
  return result.data;
}

export interface RecipeLocation {
  source: RecipeSource;
  metadataPath: string;
  scriptPath: string;
}

export function toRecipeMetadata(front: RecipeFrontMatter, location: RecipeLocation): RecipeMetadata {
  const inputs: RecipeMetadata['inputs'] = {};
  for (const [name, input] of Object.entries(front.inputs)) {
    inputs[name] = {
      type: input.type,
      required: input.required,
      ...(input.default !== undefined ? { default: input.default } : {}),
      ...(input.description !== undefined ? { description: input.description } : {}),
    };
  }

  const env: RecipeMetadata['env'] = {};
  for (const [name, decl] of Object.entries(front.env)) {
    env[name] = {
      required: decl.required,
      ...(decl.default !== undefined ? { default: decl.default } : {}),
      ...(decl.description !== undefined ? { description: decl.description } : {}),
    };
  }

  return Object.freeze({
    name: front.name,
    kind: front.type,
    runtime: front.runtime,
    version: front.version,
    description: front.description,
    inputs,
    outputs: front.outputs,
    dependencies: front.dependencies,
    tags: front.tags,
    env,
    source: location.source,
    scriptPath: location.scriptPath,
    metadataPath: location.metadataPath,
    shadowed: [],
  });
}
