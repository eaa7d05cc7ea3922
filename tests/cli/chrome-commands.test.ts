import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { buildProgram } from '../../src/cli/main.js';
import { CdpEngine } from '../../src/engines/cdp-engine.js';
import { createConnectionConfig } from '../../src/cdp/config.js';
import { FakeBrowser, lifecycleResponder, resolveFakeEndpoint, type Responder } from '../helpers/fake-browser.js';

const pageContent = {
  found: true,
  sourceUrl: 'https://example.com/',
  content: 'Example Domain',
  links: [{ url: 'https://www.iana.org/domains/example', text: 'More information...' }],
};

const pageResponder = (): Responder => {
  const lifecycle = lifecycleResponder();
  return (frame) => {
    if (frame.method === 'Emulation.setPageScaleFactor') return { result: {} };
    if (frame.method !== 'Runtime.evaluate') return lifecycle(frame);
    const expression = String(frame.params.expression);
    if (expression === 'document.title') return { result: { result: { type: 'string', value: 'Example Domain' } } };
    if (expression === 'location.href') {
      return { result: { result: { type: 'string', value: 'https://example.com/' } } };
    }
    if (expression.includes('querySelectorAll')) return { result: { result: { type: 'object', value: pageContent } } };
    if (expression.endsWith('!== null')) return { result: { result: { type: 'boolean', value: true } } };
    return { result: { result: { type: 'undefined' } } };
  };
};

describe('chrome commands', () => {
  let browser: FakeBrowser;
  let written: string[];

  beforeEach(async () => {
    browser = new FakeBrowser(pageResponder());
    const config = createConnectionConfig({ maxRetries: 0, commandTimeoutMs: 1000 });
    const engine = await CdpEngine.open(config, { dialer: browser.dialer, resolveEndpoint: resolveFakeEndpoint });
    vi.spyOn(CdpEngine, 'open').mockResolvedValue(engine);
    written = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      written.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const run = (...args: string[]) => buildProgram().parseAsync(['chrome', ...args], { from: 'user' });
  const printed = (): unknown => JSON.parse(written.join(''));
  const sent = (method: string) => browser.current.sent.filter((frame) => frame.method === method);

  it('scrolls by a named distance', async () => {
    await run('scroll', 'page-down');

    expect(sent('Runtime.evaluate').map((frame) => frame.params.expression)).toEqual(['window.scrollBy(0, 800)']);
    expect(printed()).toEqual({ scrolled: 800 });
  });

  it('sets the page scale factor', async () => {
    await run('zoom', '1.5');

    expect(sent('Emulation.setPageScaleFactor').map((frame) => frame.params)).toEqual([{ pageScaleFactor: 1.5 }]);
    expect(printed()).toEqual({ zoom: 1.5 });
  });

  it('waits for a selector to match', async () => {
    await run('wait-for', '#ready', '--timeout', '500');

    expect(sent('Runtime.evaluate').map((frame) => frame.params.expression)).toEqual([
      'document.querySelector("#ready") !== null',
    ]);
    expect(printed()).toEqual({ found: '#ready' });
  });

  it('prints the title and url', async () => {
    await run('get-title');
    expect(printed()).toEqual({ title: 'Example Domain', url: 'https://example.com/' });
  });

  it('prints the text and links of the chosen element', async () => {
    await run('get-content', 'main');

    expect(String(sent('Runtime.evaluate')[0].params.expression)).toContain('document.querySelector("main")');
    expect(printed()).toEqual({
      sourceUrl: 'https://example.com/',
      content: 'Example Domain',
      links: [{ url: 'https://www.iana.org/domains/example', text: 'More information...' }],
    });
  });

  it('pauses without connecting to the browser', async () => {
    await run('wait', '0');

    expect(CdpEngine.open).not.toHaveBeenCalled();
    expect(printed()).toEqual({ waited: 0 });
  });

  it('releases the session after each command', async () => {
    await run('get-title');
    expect(browser.current.open).toBe(false);
  });
});
