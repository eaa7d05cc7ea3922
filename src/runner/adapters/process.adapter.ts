import { spawn } from 'node:child_process';
import { dirname, extname } from 'node:path';
import type { AdapterOutcome, AdapterRequest, RuntimeAdapter } from './runtime-adapter.js';
import { CommandCancelled, RuntimeExecutionError } from '../../exception/errors.js';
import { createLogger } from '../../logging/logger.js';

const log = createLogger('process-adapter');

export const MAX_STDOUT_BYTES = 10 * 1024 * 1024;
const MAX_STDERR_BYTES = 1024 * 1024;
export const PARAMS_ENV = 'TABRUNNER_PARAMS';

export interface SpawnSpec {
  command: string;
  args: string[];
}

/** How to start a process-runtime script, by extension. */
export function interpreterFor(scriptPath: string): SpawnSpec {
  switch (extname(scriptPath)) {
    case '.js':
    case '.mjs':
    case '.cjs':
      return { command: process.execPath, args: [scriptPath] };
    case '.py':
      return { command: 'python3', args: [scriptPath] };
    default:
      return { command: scriptPath, args: [] };
  }
}

function tail(text: string, max = 2000): string {
  const trimmed = text.trim();
  return trimmed.length > max ? `…${trimmed.slice(-max)}` : trimmed;
}

function withStderr(message: string, stderr: string): string {
  const excerpt = tail(stderr);
  return excerpt ? `${message}\n${excerpt}` : message;
}

/**
 * Spawn a script with the params as one JSON argument (and in
 * TABRUNNER_PARAMS) and read one JSON document from its stdout.
 */
export function runScript(request: AdapterRequest, spec: SpawnSpec): Promise<AdapterOutcome> {
  const { recipe, params, signal } = request;
  const payload = JSON.stringify(params);

  if (signal.aborted) {
    return Promise.reject(signal.reason instanceof Error ? signal.reason : new CommandCancelled(recipe.name));
  }

  return new Promise<AdapterOutcome>((resolve, reject) => {
    const started = Date.now();
    const child = spawn(spec.command, [...spec.args, payload], {
      cwd: dirname(recipe.scriptPath),
      env: { ...request.env, [PARAMS_ENV]: payload },
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdout: Buffer[] = [];
    let stdoutBytes = 0;
    let stderr = '';
    let failure: Error | null = null;
    let settled = false;

    const finish = (error: Error | null, outcome?: AdapterOutcome): void => {
      if (settled) return;
      settled = true;
      signal.removeEventListener('abort', onAbort);
      if (error) reject(error);
      else if (outcome) resolve(outcome);
    };

    const stop = (reason: Error): void => {
      if (failure) return;
      failure = reason;
      child.kill('SIGTERM');
    };

    const onAbort = (): void => {
      stop(signal.reason instanceof Error ? signal.reason : new CommandCancelled(recipe.name));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    child.stdout.on('data', (chunk: Buffer) => {
      stdoutBytes += chunk.length;
      if (stdoutBytes > MAX_STDOUT_BYTES) {
        stop(
          new RuntimeExecutionError(
            recipe.name,
            `Recipe "${recipe.name}" wrote more than ${MAX_STDOUT_BYTES} bytes to stdout`,
          ),
        );
        return;
      }
      stdout.push(chunk);
    });

    child.stderr.on('data', (chunk: Buffer) => {
      if (stderr.length < MAX_STDERR_BYTES) stderr += chunk.toString('utf-8');
    });

    child.on('error', (err) => {
      finish(new RuntimeExecutionError(recipe.name, `Cannot start ${spec.command}: ${err.message}`));
    });

    child.on('close', (code, killedBy) => {
      log.debug('Script exited', { recipe: recipe.name, code, signal: killedBy, elapsedMs: Date.now() - started });
      if (failure) {
        finish(failure);
        return;
      }
      if (code !== 0) {
        const status = code === null ? `was terminated by ${killedBy ?? 'a signal'}` : `exited with code ${code}`;
        finish(
          new RuntimeExecutionError(
            recipe.name,
            withStderr(`Recipe "${recipe.name}" ${status}`, stderr),
            code ?? undefined,
            stderr,
          ),
        );
        return;
      }

      const text = Buffer.concat(stdout).toString('utf-8').trim();
      if (text === '') {
        finish(null, { output: null, stderr });
        return;
      }
      try {
        finish(null, { output: JSON.parse(text), stderr });
      } catch {
        finish(
          new RuntimeExecutionError(
            recipe.name,
            withStderr(`Recipe "${recipe.name}" did not print valid JSON: ${tail(text, 200)}`, stderr),
            0,
            stderr,
          ),
        );
      }
    });
  });
}

export class ProcessAdapter implements RuntimeAdapter {
  readonly runtime = 'process' as const;

  run(request: AdapterRequest): Promise<AdapterOutcome> {
    return runScript(request, interpreterFor(request.recipe.scriptPath));
  }
}
