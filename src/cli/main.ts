#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { ConfigurationError } from '../exception/errors.js';
import { setLogLevel } from '../logging/logger.js';
import { configureRecipeCommands } from './recipe-commands.js';
import { configureChromeCommands } from './chrome-commands.js';
import { parseIntOption, printError } from './output.js';
import { LOG_LEVELS, type GlobalOptions } from './options.js';

export function buildProgram(): Command {
  const program = new Command();
  program
    .name('tabrunner')
    .description('Drive a Chromium browser over CDP and run reusable automation recipes')
    .version('0.1.0')
    .option('--host <host>', 'CDP host (TABRUNNER_CDP_HOST)')
    .option('--port <port>', 'CDP port (TABRUNNER_CDP_PORT)', parseIntOption)
    .option('--command-timeout <ms>', 'default per-command timeout in ms', parseIntOption)
    .option('--proxy <url>', 'HTTP proxy for the CDP connection')
    .option('--no-proxy', 'ignore proxy settings from the environment')
    .option('--target <id>', 'page target to attach to')
    .option('--stealth', 'mask automation fingerprints in the attached page', false)
    .option('--log-level <level>', `log threshold (${LOG_LEVELS.join('|')})`)
    .hook('preAction', (command) => {
      const level = command.opts<GlobalOptions>().logLevel;
      if (level === undefined) return;
      const match = LOG_LEVELS.find((l) => l === level);
      if (!match) throw new ConfigurationError(`Unknown log level "${level}"`);
      setLogLevel(match);
    });

  configureRecipeCommands(program);
  configureChromeCommands(program);
  return program;
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      printError(error);
      process.exitCode = 1;
    });
}
