import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { RecipeRegistry } from '../../src/recipe/registry.js';
import { CircularDependencyError, RecipeNotFound } from '../../src/exception/errors.js';
import type { Namespace } from '../../src/types/recipe.js';
import { makeTempDir, removeDir, writeRaw, writeRecipe } from '../helpers/recipe-tree.js';

describe('RecipeRegistry', () => {
  let base: string;
  let namespaces: Namespace[];
  let project: string;
  let user: string;
  let system: string;

  beforeEach(async () => {
    base = await makeTempDir();
    project = join(base, 'project');
    user = join(base, 'user');
    system = join(base, 'system');
    namespaces = [
      { source: 'System', root: system },
      { source: 'Project', root: project },
      { source: 'User', root: user },
    ];
  });

  afterEach(async () => {
    await removeDir(base);
  });

  it('lets a project recipe shadow the bundled one of the same name', async () => {
    await writeRecipe(system, { name: 'page_peek', runtime: 'shell', dir: 'atomic' });
    await writeRecipe(project, { name: 'page_peek', runtime: 'shell', version: '2.0.0' });
    const registry = new RecipeRegistry(namespaces);

    await registry.discover();

    const active = registry.resolve('page_peek');
    expect(active.source).toBe('Project');
    expect(active.version).toBe('2.0.0');
    expect(active.shadowed).toEqual(['System']);
    expect(registry.resolve('page_peek', 'System').source).toBe('System');
    expect(registry.sourcesOf('page_peek')).toEqual(['Project', 'System']);
    expect(registry.list().map((r) => r.source)).toEqual(['Project']);
    expect(registry.list({ includeShadowed: true }).map((r) => r.source)).toEqual(['Project', 'System']);
    expect(registry.diagnostics()).toEqual([
      {
        source: 'System',
        path: join(system, 'atomic', 'page_peek.md'),
        kind: 'Shadowed',
        recipe: 'page_peek',
        message: '"page_peek" from System is shadowed by Project',
      },
    ]);
  });

  it('prefers User over System when there is no project copy', async () => {
    await writeRecipe(system, { name: 'notes', runtime: 'shell' });
    await writeRecipe(user, { name: 'notes', runtime: 'shell' });
    const registry = new RecipeRegistry(namespaces);
    await registry.discover();
    expect(registry.resolve('notes').source).toBe('User');
  });

  it('lists recipes sorted by name', async () => {
    await writeRecipe(system, { name: 'zeta', runtime: 'shell' });
    await writeRecipe(user, { name: 'alpha', runtime: 'shell' });
    await writeRecipe(project, { name: 'mid', runtime: 'shell' });
    const registry = new RecipeRegistry(namespaces);
    await registry.discover();
    expect(registry.list().map((r) => r.name)).toEqual(['alpha', 'mid', 'zeta']);
  });

  it('throws RecipeNotFound naming the searched roots', async () => {
    const registry = new RecipeRegistry(namespaces);
    await registry.discover();

    const error = (() => {
      try {
        registry.resolve('nope');
      } catch (e) {
        return e;
      }
      return undefined;
    })();
    expect(error).toBeInstanceOf(RecipeNotFound);
    expect(error).toMatchObject({ message: `Recipe "nope" not found (searched: ${project}, ${user}, ${system})` });
  });

  it('searches only the requested namespace', async () => {
    await writeRecipe(system, { name: 'only_system', runtime: 'shell' });
    const registry = new RecipeRegistry(namespaces);
    await registry.discover();
    expect(() => registry.resolve('only_system', 'User')).toThrow(`Recipe "only_system" not found (searched: ${user})`);
  });

  it('reports broken metadata and keeps the rest of the namespace', async () => {
    await writeRecipe(user, { name: 'good', runtime: 'shell' });
    const broken = join(user, 'broken.md');
    await writeRaw(broken, '---\nname: broken\ntype: atomic\n---\n');
    await writeRaw(join(user, 'broken.sh'), 'echo {}\n');
    await writeRaw(join(user, 'README.md'), '# Notes about these recipes\n');
    const registry = new RecipeRegistry(namespaces);

    await registry.discover();

    expect(registry.list().map((r) => r.name)).toEqual(['good']);
    expect(registry.diagnostics()).toHaveLength(1);
    expect(registry.diagnostics()[0]).toMatchObject({ source: 'User', path: broken, kind: 'MetadataParseError' });
  });

  it('reports a recipe with no script beside it', async () => {
    const path = await writeRecipe(system, { name: 'lonely', runtime: 'shell', script: null });
    const registry = new RecipeRegistry(namespaces);
    await registry.discover();

    expect(registry.has('lonely')).toBe(false);
    expect(registry.diagnostics()).toEqual([
      {
        source: 'System',
        path,
        kind: 'MissingScript',
        recipe: 'lonely',
        message: `No .sh script next to ${path}`,
      },
    ]);
  });

  it('refuses a workflow whose entry is not a JavaScript module', async () => {
    await writeRecipe(user, { name: 'leaf' });
    const path = await writeRecipe(user, {
      name: 'flow',
      type: 'workflow',
      dependencies: ['leaf'],
      extension: '.py',
      script: 'print("hi")\n',
    });
    const registry = new RecipeRegistry(namespaces);
    await registry.discover();

    expect(registry.list().map((r) => r.name)).toEqual(['leaf']);
    expect(registry.diagnostics()).toEqual([
      {
        source: 'User',
        path,
        kind: 'UnsupportedWorkflowScript',
        recipe: 'flow',
        message: 'Workflow "flow" must be a .js/.mjs/.cjs module, found flow.py',
      },
    ]);
  });

  it('keeps the first of two same-named recipes in one namespace', async () => {
    const first = await writeRecipe(user, { name: 'twin', runtime: 'shell', dir: 'a' });
    const second = await writeRecipe(user, { name: 'twin', runtime: 'shell', dir: 'b' });
    const registry = new RecipeRegistry(namespaces);
    await registry.discover();

    expect(registry.resolve('twin').metadataPath).toBe(first);
    expect(registry.diagnostics()).toEqual([
      {
        source: 'User',
        path: second,
        kind: 'DuplicateRecipe',
        recipe: 'twin',
        message: `"twin" is already defined by ${first}; ignoring this copy`,
      },
    ]);
  });

  it('rejects workflows on a dependency cycle', async () => {
    await writeRecipe(project, { name: 'w1', type: 'workflow', dependencies: ['w2'] });
    await writeRecipe(project, { name: 'w2', type: 'workflow', dependencies: ['w1'] });
    await writeRecipe(project, { name: 'leaf', runtime: 'shell' });
    const registry = new RecipeRegistry(namespaces);

    await registry.discover();

    expect(registry.list().map((r) => r.name)).toEqual(['leaf']);
    expect(registry.has('w1')).toBe(false);
    expect(() => registry.resolve('w1')).toThrow(CircularDependencyError);
    expect(() => registry.resolve('w1')).toThrow('Recipe "w1" is part of a dependency cycle: w1 -> w2 -> w1');
    expect(registry.diagnostics().map((d) => [d.recipe, d.kind])).toEqual([
      ['w1', 'CircularDependencyError'],
      ['w2', 'CircularDependencyError'],
    ]);
  });

  it('rejects a workflow that names an unknown recipe', async () => {
    await writeRecipe(project, { name: 'report', type: 'workflow', dependencies: ['ghost'] });
    const registry = new RecipeRegistry(namespaces);
    await registry.discover();

    expect(() => registry.resolve('report')).toThrow('Recipe "ghost" not found');
    expect(registry.diagnostics()[0]).toMatchObject({
      kind: 'RecipeNotFound',
      recipe: 'report',
      message: 'Workflow "report" depends on unknown recipe "ghost"',
    });
  });

  it('gives the same index when discovering twice', async () => {
    await writeRecipe(system, { name: 'a', runtime: 'shell' });
    await writeRecipe(user, { name: 'b', runtime: 'shell' });
    const registry = new RecipeRegistry(namespaces);

    await registry.discover();
    const first = registry.list();
    await registry.discover();

    expect(registry.list()).toEqual(first);
  });

  it('picks up recipes added after the last discovery', async () => {
    const registry = new RecipeRegistry(namespaces);
    await registry.discover();
    expect(registry.has('late')).toBe(false);

    await writeRecipe(user, { name: 'late', runtime: 'shell' });
    await registry.discover();
    expect(registry.has('late')).toBe(true);
  });

  it('treats a missing namespace root as empty', async () => {
    const registry = new RecipeRegistry([{ source: 'User', root: join(base, 'does-not-exist') }]);
    await registry.discover();
    expect(registry.list()).toEqual([]);
    expect(registry.diagnostics()).toEqual([]);
  });
});
