import { describe, it, expect } from 'vitest';
import { extractFrontMatter, parseFrontMatter, toRecipeMetadata } from '../../src/recipe/metadata.js';
import { MetadataParseError } from '../../src/exception/errors.js';

const doc = (body: string): string => `---\n${body}\n---\n\n# Notes\n`;

describe('extractFrontMatter', () => {
  it('reads the block between the fences', () => {
    expect(extractFrontMatter('---\nname: a\n---\nbody')).toBe('name: a');
  });

  it('accepts a byte order mark and CRLF line endings', () => {
    expect(extractFrontMatter('\uFEFF---\r\nname: a\r\n---\r\n')).toBe('name: a');
  });

  it('returns null for plain markdown', () => {
    expect(extractFrontMatter('# Just a readme\n')).toBeNull();
  });
});

describe('parseFrontMatter', () => {
  it('keeps an unquoted 1.0 version as written', () => {
    const front = parseFrontMatter(doc('name: page_peek\ntype: atomic\nruntime: shell\nversion: 1.0'), 'p.md');
    expect(front.version).toBe('1.0');
  });

  it('keeps trailing zeros in minor versions', () => {
    const front = parseFrontMatter(doc('name: a\ntype: atomic\nruntime: shell\nversion: 2.10'), 'a.md');
    expect(front.version).toBe('2.10');
  });

  it('maps runtime aliases and fills empty collections', () => {
    const front = parseFrontMatter(doc('name: a\ntype: atomic\nruntime: python\nversion: "1.2.3"'), 'a.md');
    expect(front).toMatchObject({
      runtime: 'process',
      description: '',
      inputs: {},
      outputs: {},
      dependencies: [],
      tags: [],
      env: {},
    });
  });

  it('reads inputs with defaults', () => {
    const front = parseFrontMatter(
      doc(
        [
          'name: a',
          'type: atomic',
          'runtime: chrome-script',
          'version: "1.0"',
          'inputs:',
          '  limit:',
          '    type: number',
          '    required: false',
          '    default: 100',
        ].join('\n'),
      ),
      'a.md',
    );
    expect(front.inputs.limit).toEqual({ type: 'number', required: false, default: 100 });
  });

  it('rejects a document without front matter', () => {
    expect(() => parseFrontMatter('# nothing here', 'docs/readme.md')).toThrow(
      'Cannot parse recipe metadata docs/readme.md: missing YAML front matter',
    );
  });

  it('rejects YAML that is not a mapping', () => {
    expect(() => parseFrontMatter(doc('- a\n- b'), 'list.md')).toThrow('front matter must be a mapping');
  });

  it('rejects broken YAML', () => {
    expect(() => parseFrontMatter(doc('name: [unclosed'), 'broken.md')).toThrow(MetadataParseError);
  });

  it('rejects names with spaces', () => {
    expect(() => parseFrontMatter(doc('name: bad name\ntype: atomic\nruntime: shell\nversion: "1.0"'), 'b.md')).toThrow(
      'name: name must only contain letters, numbers, underscores and hyphens',
    );
  });

  it('rejects dependencies on atomic recipes', () => {
    expect(() =>
      parseFrontMatter(doc('name: a\ntype: atomic\nruntime: shell\nversion: "1.0"\ndependencies: [b]'), 'a.md'),
    ).toThrow('dependencies: atomic recipes cannot declare dependencies');
  });

  it('requires workflows to use the process runtime', () => {
    expect(() => parseFrontMatter(doc('name: w\ntype: workflow\nruntime: shell\nversion: "1.0"'), 'w.md')).toThrow(
      'runtime: workflow recipes must use the process runtime',
    );
  });
});

describe('toRecipeMetadata', () => {
  it('builds a frozen record with its location', () => {
    const front = parseFrontMatter(doc('name: a\ntype: atomic\nruntime: shell\nversion: "1.0"'), '/r/a.md');
    const meta = toRecipeMetadata(front, { source: 'User', metadataPath: '/r/a.md', scriptPath: '/r/a.sh' });

    expect(meta).toMatchObject({
      name: 'a',
      kind: 'atomic',
      runtime: 'shell',
      source: 'User',
      scriptPath: '/r/a.sh',
      shadowed: [],
    });
    expect(Object.isFrozen(meta)).toBe(true);
  });
});
