import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { realpath, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ProcessAdapter, interpreterFor } from '../../../src/runner/adapters/process.adapter.js';
import { ShellAdapter } from '../../../src/runner/adapters/shell.adapter.js';
import type { AdapterRequest } from '../../../src/runner/adapters/runtime-adapter.js';
import { RecipeTimeout, RuntimeExecutionError } from '../../../src/exception/errors.js';
import { makeTempDir, recipe, removeDir } from '../../helpers/recipe-tree.js';

const env = { PATH: process.env.PATH ?? '/usr/bin:/bin', GREETING: 'hello' };

describe('process runtimes', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await realpath(await makeTempDir());
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  async function script(name: string, body: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, body);
    return path;
  }

  function request(scriptPath: string, params: Record<string, unknown> = {}, signal?: AbortSignal): AdapterRequest {
    return {
      recipe: recipe('disk_report', { scriptPath }),
      params,
      env,
      timeoutMs: 10_000,
      signal: signal ?? new AbortController().signal,
    };
  }

  describe('ProcessAdapter', () => {
    it('passes params as an argument and in the environment, from the script directory', async () => {
      const path = await script(
        'echo.mjs',
        [
          'const fromArg = JSON.parse(process.argv[2]);',
          'const fromEnv = JSON.parse(process.env.TABRUNNER_PARAMS);',
          'console.log(JSON.stringify({ arg: fromArg.value, env: fromEnv.value, greeting: process.env.GREETING, cwd: process.cwd() }));',
        ].join('\n'),
      );

      const outcome = await new ProcessAdapter().run(request(path, { value: 7 }));

      expect(outcome.output).toEqual({ arg: 7, env: 7, greeting: 'hello', cwd: dir });
    });

    it('gives null for a script that prints nothing', async () => {
      const path = await script('quiet.mjs', '');
      await expect(new ProcessAdapter().run(request(path))).resolves.toEqual({ output: null, stderr: '' });
    });

    it('fails with the exit code and stderr of a crashing script', async () => {
      const path = await script('crash.mjs', "console.error('disk full');\nprocess.exit(3);\n");

      const error = await new ProcessAdapter().run(request(path)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RuntimeExecutionError);
      expect(error).toMatchObject({
        message: 'Recipe "disk_report" exited with code 3\ndisk full',
        exitCode: 3,
        stderr: 'disk full\n',
      });
    });

    it('fails when stdout is not JSON', async () => {
      const path = await script('chatty.mjs', "console.log('done!');\n");
      await expect(new ProcessAdapter().run(request(path))).rejects.toThrow(
        'Recipe "disk_report" did not print valid JSON: done!',
      );
    });

    it('kills the child when the signal aborts', async () => {
      const path = await script('hang.mjs', 'setTimeout(() => {}, 60_000);\n');
      const controller = new AbortController();
      const started = Date.now();
      setTimeout(() => controller.abort(new RecipeTimeout('disk_report', 50)), 50);

      await expect(new ProcessAdapter().run(request(path, {}, controller.signal))).rejects.toBeInstanceOf(RecipeTimeout);
      expect(Date.now() - started).toBeLessThan(10_000);
    });
  });

  describe('ShellAdapter', () => {
    it('runs the script through sh with the params as $1', async () => {
      const path = await script('echo.sh', "printf '%s\\n' \"$1\"\n");
      const outcome = await new ShellAdapter().run(request(path, { url: 'https://example.com', depth: 2 }));
      expect(outcome.output).toEqual({ url: 'https://example.com', depth: 2 });
    });

    it('reports a non-zero exit', async () => {
      const path = await script('fail.sh', 'echo "no such file" >&2\nexit 2\n');
      await expect(new ShellAdapter().run(request(path))).rejects.toThrow(
        'Recipe "disk_report" exited with code 2\nno such file',
      );
    });
  });
});

describe('interpreterFor', () => {
  it('runs JavaScript with the current node binary', () => {
    expect(interpreterFor('/r/a.mjs')).toEqual({ command: process.execPath, args: ['/r/a.mjs'] });
  });

  it('runs Python scripts with python3', () => {
    expect(interpreterFor('/r/a.py')).toEqual({ command: 'python3', args: ['/r/a.py'] });
  });

  it('executes anything else directly', () => {
    expect(interpreterFor('/r/a.bin')).toEqual({ command: '/r/a.bin', args: [] });
  });
});
