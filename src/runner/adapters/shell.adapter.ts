import type { AdapterOutcome, AdapterRequest, RuntimeAdapter } from './runtime-adapter.js';
import { runScript } from './process.adapter.js';

/** Shell recipes run through `sh` with the same params and stdout contract as process recipes. */
export class ShellAdapter implements RuntimeAdapter {
  readonly runtime = 'shell' as const;

  constructor(private shell = 'sh') {}

  run(request: AdapterRequest): Promise<AdapterOutcome> {
    return runScript(request, { command: this.shell, args: [request.recipe.scriptPath] });
  }
}
