import { readFile, stat, writeFile } from 'node:fs/promises';
import type { Command } from 'commander';
import { CdpEngine } from '../engines/cdp-engine.js';
import type { BrowserEngine } from '../engines/browser-engine.js';
import { Session } from '../cdp/session.js';
import { PageCommands } from '../cdp/commands.js';
import { connectionFromOptions, type GlobalOptions } from './options.js';
import { sleep } from '../runner/retry-policy.js';
import { parseIntOption, parseScrollDistance, parseWaitSeconds, parseZoomFactor, printJson } from './output.js';

async function withEngine<T>(command: Command, body: (engine: BrowserEngine) => Promise<T>): Promise<T> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const engine = await CdpEngine.open(connectionFromOptions(globals), { stealth: globals.stealth });
  try {
    return await body(engine);
  } finally {
    await engine.close();
  }
}

/** An existing file's contents, otherwise the argument itself. */
async function scriptSource(expressionOrFile: string): Promise<string> {
  try {
    if ((await stat(expressionOrFile)).isFile()) {
      return await readFile(expressionOrFile, 'utf-8');
    }
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENAMETOOLONG'))) {
      throw error;
    }
  }
  return expressionOrFile;
}

export function configureChromeCommands(root: Command): void {
  const chrome = root.command('chrome').description('Drive the attached browser page directly');

  chrome
    .command('status')
    .description('Browser version and current page')
    .action(async (_options: unknown, command: Command) => {
      printJson(await withEngine(command, (engine) => engine.status()));
    });

  chrome
    .command('navigate')
    .description('Open a URL and wait for it to load')
    .argument('<url>', 'address to open')
    .action(async (url: string, _options: unknown, command: Command) => {
      const page = await withEngine(command, async (engine) => {
        await engine.goto(url);
        return { url: await engine.currentUrl(), title: await engine.currentTitle() };
      });
      printJson(page);
    });

  chrome
    .command('exec-js')
    .description('Evaluate JavaScript in the page and print the result')
    .argument('<script>', 'expression, or path to a .js file')
    .action(async (script: string, _options: unknown, command: Command) => {
      const source = await scriptSource(script);
      printJson(await withEngine(command, (engine) => engine.evaluate(source)));
    });

  chrome
    .command('screenshot')
    .description('Capture the page as PNG')
    .argument('<file>', 'output path')
    .option('--full-page', 'capture beyond the viewport', false)
    .action(async (file: string, options: { fullPage?: boolean }, command: Command) => {
      const image = await withEngine(command, (engine) => engine.screenshot({ fullPage: options.fullPage }));
      await writeFile(file, image);
      printJson({ path: file, bytes: image.length });
    });

  chrome
    .command('click')
    .description('Click the first element matching a CSS selector')
    .argument('<selector>', 'CSS selector')
    .action(async (selector: string, _options: unknown, command: Command) => {
      await withEngine(command, (engine) => engine.click(selector));
      printJson({ clicked: selector });
    });

  chrome
    .command('scroll')
    .description('Scroll the page vertically')
    .argument('<distance>', 'pixels, or up, down, page-up, page-down', parseScrollDistance)
    .action(async (distance: number, _options: unknown, command: Command) => {
      await withEngine(command, (engine) => engine.scroll(distance));
      printJson({ scrolled: distance });
    });

  chrome
    .command('zoom')
    .description('Set the page scale factor')
    .argument('<factor>', 'scale, greater than 0', parseZoomFactor)
    .action(async (factor: number, _options: unknown, command: Command) => {
      await withEngine(command, (engine) => engine.zoom(factor));
      printJson({ zoom: factor });
    });

  chrome
    .command('wait')
    .description('Pause for a number of seconds')
    .argument('<seconds>', 'duration, may be fractional', parseWaitSeconds)
    .action(async (seconds: number) => {
      await sleep(seconds * 1000);
      printJson({ waited: seconds });
    });

  chrome
    .command('wait-for')
    .description('Wait until a CSS selector matches')
    .argument('<selector>', 'CSS selector')
    .option('--timeout <ms>', 'give up after this long', parseIntOption, 10_000)
    .action(async (selector: string, options: { timeout: number }, command: Command) => {
      await withEngine(command, (engine) => engine.waitForSelector(selector, options.timeout));
      printJson({ found: selector });
    });

  chrome
    .command('get-title')
    .description('Print the page title and URL')
    .action(async (_options: unknown, command: Command) => {
      const page = await withEngine(command, async (engine) => ({
        title: await engine.currentTitle(),
        url: await engine.currentUrl(),
      }));
      printJson(page);
    });

  chrome
    .command('get-content')
    .description('Print the text and links of an element')
    .argument('[selector]', 'CSS selector', 'body')
    .action(async (selector: string, _options: unknown, command: Command) => {
      printJson(await withEngine(command, (engine) => engine.content(selector)));
    });

  chrome
    .command('targets')
    .description('List browser targets without attaching to any')
    .action(async (_options: unknown, command: Command) => {
      const session = new Session(connectionFromOptions(command.optsWithGlobals<GlobalOptions>()));
      try {
        await session.connect();
        printJson(await new PageCommands(session).listTargets());
      } finally {
        await session.close();
      }
    });
}
