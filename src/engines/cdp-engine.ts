import type { ConnectionConfig, TargetInfo, TargetSelector } from '../types/connection.js';
import type { BrowserEngine } from './browser-engine.js';
import { Session, type SessionOptions } from '../cdp/session.js';
import { PageCommands, type PageContent, type PageStatus, type ScreenshotOptions } from '../cdp/commands.js';

export class CdpEngine implements BrowserEngine {
  private page: PageCommands;

  constructor(readonly session: Session) {
    this.page = new PageCommands(session);
  }

  /** Connect and attach in one step. The session is closed again if attaching fails. */
  static async open(
    config: Readonly<ConnectionConfig>,
    options: SessionOptions & { target?: TargetSelector } = {},
  ): Promise<CdpEngine> {
    const session = new Session(config, options);
    try {
      await session.connect();
      await session.attach(options.target);
    } catch (error) {
      await session.close();
      throw error;
    }
    return new CdpEngine(session);
  }

  async goto(url: string): Promise<void> {
    await this.page.navigate(url);
  }

  async click(selector: string): Promise<void> {
    await this.page.click(selector);
  }

  async type(text: string): Promise<void> {
    await this.page.typeText(text);
  }

  async evaluate(expression: string): Promise<unknown> {
    return this.page.evaluate(expression);
  }

  async screenshot(options?: ScreenshotOptions): Promise<Buffer> {
    return this.page.screenshot(options);
  }

  async status(): Promise<PageStatus> {
    return this.page.status();
  }

  async targets(): Promise<TargetInfo[]> {
    return this.page.listTargets();
  }

  async currentUrl(): Promise<string> {
    return String(await this.page.evaluate('location.href'));
  }

  async currentTitle(): Promise<string> {
    return String(await this.page.evaluate('document.title'));
  }

  async scroll(dy: number): Promise<void> {
    await this.page.scrollBy(dy);
  }

  async zoom(factor: number): Promise<void> {
    await this.page.setZoom(factor);
  }

  async waitForSelector(selector: string, timeoutMs?: number): Promise<void> {
    await this.page.waitForSelector(selector, timeoutMs);
  }

  async content(selector?: string): Promise<PageContent> {
    return this.page.content(selector);
  }

  async close(): Promise<void> {
    await this.session.release();
  }
}
