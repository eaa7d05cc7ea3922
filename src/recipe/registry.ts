import type { Namespace, RecipeMetadata, RecipeSource, RegistryDiagnostic } from '../types/recipe.js';
import { SOURCE_PRIORITY } from '../types/recipe.js';
import { RecipeNotFound, type TabrunnerError } from '../exception/errors.js';
import { createLogger } from '../logging/logger.js';
import { scanNamespace } from './discovery.js';
import { checkDependencies } from './dependency-graph.js';
import { defaultNamespaces } from './namespaces.js';

const log = createLogger('registry');

export interface RegistrySnapshot {
  readonly namespaces: readonly Namespace[];
  /** Winning definition per name. */
  readonly active: ReadonlyMap<string, RecipeMetadata>;
  /** Every definition per name, highest priority first. */
  readonly all: ReadonlyMap<string, readonly RecipeMetadata[]>;
  readonly rejected: ReadonlyMap<string, TabrunnerError>;
  readonly diagnostics: readonly RegistryDiagnostic[];
}

export interface ListOptions {
  includeShadowed?: boolean;
}

const EMPTY_SNAPSHOT: RegistrySnapshot = Object.freeze({
  namespaces: [],
  active: new Map(),
  all: new Map(),
  rejected: new Map(),
  diagnostics: [],
});

function rank(source: RecipeSource): number {
  return SOURCE_PRIORITY.indexOf(source);
}

/**
 * Name → recipe lookup over the layered namespaces. Each `discover()` builds
 * a complete snapshot and swaps it in at once; readers never see a partial
 * index.
 */
export class RecipeRegistry {
  private snapshot: RegistrySnapshot = EMPTY_SNAPSHOT;

  constructor(private namespaces?: Namespace[]) {}

  async discover(namespaces?: Namespace[]): Promise<RegistrySnapshot> {
    const roots = [...(namespaces ?? this.namespaces ?? (await defaultNamespaces()))].sort(
      (a, b) => rank(a.source) - rank(b.source),
    );

    const diagnostics: RegistryDiagnostic[] = [];
    const grouped = new Map<string, RecipeMetadata[]>();

    for (const namespace of roots) {
      const scan = await scanNamespace(namespace);
      diagnostics.push(...scan.diagnostics);
      for (const recipe of scan.recipes) {
        const list = grouped.get(recipe.name) ?? [];
        list.push(recipe);
        grouped.set(recipe.name, list);
      }
    }

    const active = new Map<string, RecipeMetadata>();
    const all = new Map<string, readonly RecipeMetadata[]>();
    for (const name of [...grouped.keys()].sort()) {
      const [winner, ...losers] = grouped.get(name) ?? [];
      if (!winner) continue;
      const chosen: RecipeMetadata = Object.freeze({ ...winner, shadowed: losers.map((l) => l.source) });
      active.set(name, chosen);
      all.set(name, Object.freeze([chosen, ...losers]));
      for (const loser of losers) {
        diagnostics.push({
          source: loser.source,
          path: loser.metadataPath,
          kind: 'Shadowed',
          recipe: name,
          message: `"${name}" from ${loser.source} is shadowed by ${winner.source}`,
        });
      }
    }

    const rejected = new Map<string, TabrunnerError>();
    for (const rejection of checkDependencies(active)) {
      const recipe = active.get(rejection.recipe);
      rejected.set(rejection.recipe, rejection.error);
      diagnostics.push({
        source: recipe?.source ?? 'System',
        path: recipe?.metadataPath ?? '',
        kind: rejection.error.kind,
        recipe: rejection.recipe,
        message: rejection.message,
      });
    }

    this.snapshot = Object.freeze({
      namespaces: Object.freeze(roots),
      active,
      all,
      rejected,
      diagnostics: Object.freeze(diagnostics),
    });
    log.info('Discovered recipes', {
      recipes: active.size - rejected.size,
      rejected: rejected.size,
      diagnostics: diagnostics.length,
    });
    return this.snapshot;
  }

  /** Active definition, or the one from `source` when given. */
  resolve(name: string, source?: RecipeSource): RecipeMetadata {
    const current = this.snapshot;
    const definitions = current.all.get(name) ?? [];
    const found = source ? definitions.find((d) => d.source === source) : definitions[0];

    if (!found) {
      const searched = current.namespaces.filter((ns) => !source || ns.source === source).map((ns) => ns.root);
      throw new RecipeNotFound(name, searched);
    }
    const error = current.rejected.get(name);
    if (error && found === definitions[0]) throw error;
    return found;
  }

  has(name: string): boolean {
    return this.snapshot.active.has(name) && !this.snapshot.rejected.has(name);
  }

  /** Active recipes sorted by name; with `includeShadowed`, lower-priority copies follow their winner. */
  list(options: ListOptions = {}): RecipeMetadata[] {
    const current = this.snapshot;
    const result: RecipeMetadata[] = [];
    for (const [name, definitions] of current.all) {
      if (current.rejected.has(name)) continue;
      if (options.includeShadowed) result.push(...definitions);
      else result.push(definitions[0]);
    }
    return result;
  }

  diagnostics(): readonly RegistryDiagnostic[] {
    return this.snapshot.diagnostics;
  }

  /** Namespaces defining `name`, highest priority first. */
  sourcesOf(name: string): RecipeSource[] {
    return (this.snapshot.all.get(name) ?? []).map((d) => d.source);
  }

  get current(): RegistrySnapshot {
    return this.snapshot;
  }
}
