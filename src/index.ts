export type * from './types/index.js';
export { SOURCE_PRIORITY } from './types/recipe.js';
export * from './schemas/index.js';
export * from './exception/errors.js';
export { classifyError, errorToPayload } from './exception/classifier.js';
export * from './cdp/index.js';
export { RecipeRegistry } from './recipe/registry.js';
export type { RegistrySnapshot, ListOptions } from './recipe/registry.js';
export { defaultNamespaces, findProjectRecipesDir, userRecipesDir, systemRecipesDir } from './recipe/namespaces.js';
export { EnvLoader, defaultEnvFiles } from './recipe/env-loader.js';
export type { EnvProvider, EnvLoaderOptions } from './recipe/env-loader.js';
export { parseFrontMatter } from './recipe/metadata.js';
export { RecipeExecutor, DEFAULT_RECIPE_TIMEOUT_MS } from './runner/recipe-executor.js';
export type { RecipeExecutorOptions } from './runner/recipe-executor.js';
export { validateParams } from './runner/params.js';
export type { RecipeParams } from './runner/params.js';
export { WorkflowHost, ImportWorkflowLoader } from './runner/workflow-host.js';
export type {
  WorkflowContext,
  WorkflowFunction,
  WorkflowModuleLoader,
  StepCall,
  StepOptions,
} from './runner/workflow-host.js';
export type {
  RuntimeAdapter,
  AdapterRequest,
  AdapterOutcome,
  AdapterTable,
} from './runner/adapters/runtime-adapter.js';
export { ChromeScriptAdapter } from './runner/adapters/chrome-script.adapter.js';
export { ProcessAdapter } from './runner/adapters/process.adapter.js';
export { ShellAdapter } from './runner/adapters/shell.adapter.js';
export { RetryPolicy, withRetry, sleep } from './runner/retry-policy.js';
export type { WithRetryOptions } from './runner/retry-policy.js';
export type { BrowserEngine } from './engines/browser-engine.js';
export { CdpEngine } from './engines/cdp-engine.js';
export { createLogger, setLogLevel, setLogSink } from './logging/logger.js';
export type { Logger, LogLevel } from './logging/logger.js';
export { RunLogger } from './logging/run-logger.js';
export type { ExecutionLogger, ExecutionMeta } from './logging/run-logger.js';
