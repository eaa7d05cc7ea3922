import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { EnvLoader, defaultEnvFiles } from '../../src/recipe/env-loader.js';
import { ParameterValidationError } from '../../src/exception/errors.js';
import { makeTempDir, recipe, removeDir, writeRaw } from '../helpers/recipe-tree.js';

describe('EnvLoader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('layers base env, env files and overrides with the later source winning', async () => {
    const userFile = join(dir, 'user.env');
    const projectFile = join(dir, 'project.env');
    await writeRaw(userFile, 'API_BASE=https://user.example\nREGION=eu\n');
    await writeRaw(projectFile, 'API_BASE=https://project.example\n');
    const loader = new EnvLoader({
      baseEnv: { API_BASE: 'https://base.example', PATH: '/bin' },
      files: [userFile, projectFile],
    });

    const env = await loader.resolve(recipe('r'), { REGION: 'us' });

    expect(env).toEqual({ API_BASE: 'https://project.example', PATH: '/bin', REGION: 'us' });
  });

  it('skips env files that do not exist', async () => {
    const loader = new EnvLoader({ baseEnv: { A: '1' }, files: [join(dir, 'missing.env')] });
    await expect(loader.resolve(recipe('r'))).resolves.toEqual({ A: '1' });
  });

  it('applies declared defaults to missing or empty variables', async () => {
    const loader = new EnvLoader({ baseEnv: { EMPTY: '' }, files: [] });
    const env = await loader.resolve(
      recipe('r', { env: { EMPTY: { required: false, default: 'filled' }, ABSENT: { required: true, default: 'x' } } }),
    );
    expect(env).toEqual({ EMPTY: 'filled', ABSENT: 'x' });
  });

  it('fails before running when a required variable is missing', async () => {
    const loader = new EnvLoader({ baseEnv: {}, files: [] });
    const pending = loader.resolve(recipe('needs_token', { env: { API_TOKEN: { required: true } } }));

    await expect(pending).rejects.toBeInstanceOf(ParameterValidationError);
    await expect(pending).rejects.toThrow(
      'Invalid parameters for "needs_token": missing required environment variable API_TOKEN',
    );
  });
});

describe('defaultEnvFiles', () => {
  it('puts the user file before the project file', () => {
    expect(defaultEnvFiles('/work/app/.tabrunner/recipes', '/home/dev')).toEqual([
      '/home/dev/.tabrunner/.env',
      '/work/app/.tabrunner/.env',
    ]);
  });

  it('has only the user file outside a project', () => {
    expect(defaultEnvFiles(null, '/home/dev')).toEqual(['/home/dev/.tabrunner/.env']);
  });
});
