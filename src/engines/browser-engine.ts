import type { PageContent, PageStatus, ScreenshotOptions } from '../cdp/commands.js';
import type { TargetInfo } from '../types/connection.js';

/** Page operations the CLI drives, independent of how the browser is reached. */
export interface BrowserEngine {
  goto(url: string): Promise<void>;
  click(selector: string): Promise<void>;
  type(text: string): Promise<void>;
  evaluate(expression: string): Promise<unknown>;
  screenshot(options?: ScreenshotOptions): Promise<Buffer>;
  status(): Promise<PageStatus>;
  targets(): Promise<TargetInfo[]>;
  currentUrl(): Promise<string>;
  currentTitle(): Promise<string>;
  scroll(dy: number): Promise<void>;
  zoom(factor: number): Promise<void>;
  waitForSelector(selector: string, timeoutMs?: number): Promise<void>;
  content(selector?: string): Promise<PageContent>;
  close(): Promise<void>;
}
