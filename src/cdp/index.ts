export { Session } from './session.js';
export type { SessionOptions, CommandOptions, CommandChannel, StateListener } from './session.js';
export { PageCommands } from './commands.js';
export type { EvaluateOptions, ScreenshotOptions, PageStatus, PageContent } from './commands.js';
export { dial } from './transport.js';
export type { Transport, TransportHandlers, CloseInfo, Dialer } from './transport.js';
export { Correlator } from './correlator.js';
export { EventBus, DEFAULT_QUEUE_CAPACITY } from './event-bus.js';
export { SerialLock } from './serial-lock.js';
export { resolveBrowserEndpoint, staticBrowserUrl, httpBaseUrl } from './endpoint.js';
export { STEALTH_SCRIPT } from './stealth.js';
export {
  createConnectionConfig,
  loadConnectionConfig,
  describeConnectionConfig,
  effectiveProxy,
  parseProxyUrl,
  matchesNoProxy,
} from './config.js';
