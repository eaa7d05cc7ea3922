import type { RecipeMetadata } from '../types/recipe.js';
import { CircularDependencyError, RecipeNotFound, type TabrunnerError } from '../exception/errors.js';

export interface GraphRejection {
  recipe: string;
  error: TabrunnerError;
  message: string;
}

/** Shortest dependency path from `start` back to itself, staying inside `members`. */
function findCycle(start: string, members: ReadonlySet<string>, edges: ReadonlyMap<string, string[]>): string[] {
  const previous = new Map<string, string>();
  const queue = [start];
  while (queue.length > 0) {
    const node = queue.shift();
    if (node === undefined) break;
    for (const next of edges.get(node) ?? []) {
      if (!members.has(next)) continue;
      if (next === start) {
        const path = [start];
        for (let at = node; at !== start; at = previous.get(at) ?? start) path.push(at);
        return [start, ...path.slice(1).reverse(), start];
      }
      if (!previous.has(next)) {
        previous.set(next, node);
        queue.push(next);
      }
    }
  }
  return [start, start];
}

/** Strongly connected components (Tarjan), each as a set of names. */
function components(nodes: string[], edges: ReadonlyMap<string, string[]>): Set<string>[] {
  const index = new Map<string, number>();
  const low = new Map<string, number>();
  const stack: string[] = [];
  const onStack = new Set<string>();
  const result: Set<string>[] = [];
  let counter = 0;

  const visit = (node: string): void => {
    index.set(node, counter);
    low.set(node, counter);
    counter++;
    stack.push(node);
    onStack.add(node);

    for (const next of edges.get(node) ?? []) {
      if (!index.has(next)) {
        visit(next);
        low.set(node, Math.min(low.get(node) ?? 0, low.get(next) ?? 0));
      } else if (onStack.has(next)) {
        low.set(node, Math.min(low.get(node) ?? 0, index.get(next) ?? 0));
      }
    }

    if (low.get(node) === index.get(node)) {
      const component = new Set<string>();
      for (;;) {
        const member = stack.pop();
        if (member === undefined) break;
        onStack.delete(member);
        component.add(member);
        if (member === node) break;
      }
      result.push(component);
    }
  };

  for (const node of nodes) {
    if (!index.has(node)) visit(node);
  }
  return result;
}

/**
 * Check the dependency graph of the active recipes. Workflows that name an
 * unknown recipe, and every workflow that sits on a cycle, are rejected.
 */
export function checkDependencies(active: ReadonlyMap<string, RecipeMetadata>): GraphRejection[] {
  const rejections: GraphRejection[] = [];
  const edges = new Map<string, string[]>();

  for (const recipe of active.values()) {
    if (recipe.kind !== 'workflow') continue;
    const missing = recipe.dependencies.find((dep) => !active.has(dep));
    if (missing !== undefined) {
      rejections.push({
        recipe: recipe.name,
        error: new RecipeNotFound(missing),
        message: `Workflow "${recipe.name}" depends on unknown recipe "${missing}"`,
      });
    }
    edges.set(
      recipe.name,
      recipe.dependencies.filter((dep) => active.has(dep)),
    );
  }

  for (const component of components([...edges.keys()].sort(), edges)) {
    const [only] = component;
    const selfLoop = component.size === 1 && (edges.get(only) ?? []).includes(only);
    if (component.size < 2 && !selfLoop) continue;

    for (const name of [...component].sort()) {
      if (rejections.some((r) => r.recipe === name)) continue;
      const error = new CircularDependencyError(name, findCycle(name, component, edges));
      rejections.push({ recipe: name, error, message: error.message });
    }
  }

  return rejections;
}
