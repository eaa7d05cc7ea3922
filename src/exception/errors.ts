export type ErrorKind =
  | 'ConfigurationError'
  | 'DialError'
  | 'ConnectionLost'
  | 'ConnectionExhausted'
  | 'CommandTimeout'
  | 'CommandCancelled'
  | 'ProtocolError'
  | 'TargetNotFound'
  | 'ScriptEvaluationError'
  | 'RecipeNotFound'
  | 'CircularDependencyError'
  | 'MetadataParseError'
  | 'ParameterValidationError'
  | 'RuntimeExecutionError'
  | 'RecipeTimeout';

const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>(['DialError', 'ConnectionLost']);

export function isRetryableKind(kind: ErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind);
}

/**
 * Base class for every error this package raises. `kind` is stable and is what
 * callers branch on; retryability follows from the kind alone.
 */
export class TabrunnerError extends Error {
  readonly kind: ErrorKind;
  readonly details?: unknown;

  constructor(kind: ErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.details = details;
  }

  get retryable(): boolean {
    return isRetryableKind(this.kind);
  }
}

export class ConfigurationError extends TabrunnerError {
  constructor(message: string, public readonly issues: string[] = []) {
    super('ConfigurationError', message, issues.length > 0 ? { issues } : undefined);
  }
}

export class DialError extends TabrunnerError {
  constructor(message: string, public readonly url: string) {
    super('DialError', message, { url });
  }
}

export class ConnectionLost extends TabrunnerError {
  constructor(message = 'Connection to the browser was lost') {
    super('ConnectionLost', message);
  }
}

export class ConnectionExhausted extends TabrunnerError {
  constructor(public readonly attempts: number, cause?: Error) {
    super(
      'ConnectionExhausted',
      `Reconnect failed after ${attempts} attempt(s)${cause ? `: ${cause.message}` : ''}`,
      { attempts },
    );
  }
}

export class CommandTimeout extends TabrunnerError {
  constructor(public readonly method: string, public readonly timeoutMs: number) {
    super('CommandTimeout', `Command ${method} timed out after ${timeoutMs}ms`, { method, timeoutMs });
  }
}

export class CommandCancelled extends TabrunnerError {
  constructor(public readonly method: string) {
    super('CommandCancelled', `Command ${method} was cancelled`, { method });
  }
}

export class ProtocolError extends TabrunnerError {
  constructor(
    public readonly method: string,
    public readonly code: number,
    message: string,
  ) {
    super('ProtocolError', `${method} failed: ${message} (code: ${code})`, { method, code });
  }
}

export class TargetNotFound extends TabrunnerError {
  constructor(public readonly selector: string) {
    super('TargetNotFound', `No page target matches ${selector}`, { selector });
  }
}

export class ScriptEvaluationError extends TabrunnerError {
  constructor(message: string, public readonly exception?: unknown) {
    super('ScriptEvaluationError', message, exception === undefined ? undefined : { exception });
  }
}

export class RecipeNotFound extends TabrunnerError {
  constructor(public readonly recipe: string, public readonly searchedPaths: string[] = []) {
    const searched = searchedPaths.length > 0 ? ` (searched: ${searchedPaths.join(', ')})` : '';
    super('RecipeNotFound', `Recipe "${recipe}" not found${searched}`, { recipe });
  }
}

export class CircularDependencyError extends TabrunnerError {
  constructor(public readonly recipe: string, public readonly cycle: string[]) {
    super('CircularDependencyError', `Recipe "${recipe}" is part of a dependency cycle: ${cycle.join(' -> ')}`, {
      recipe,
      cycle,
    });
  }
}

export class MetadataParseError extends TabrunnerError {
  constructor(public readonly path: string, reason: string) {
    super('MetadataParseError', `Cannot parse recipe metadata ${path}: ${reason}`, { path });
  }
}

export class ParameterValidationError extends TabrunnerError {
  constructor(public readonly recipe: string, public readonly errors: string[]) {
    super('ParameterValidationError', `Invalid parameters for "${recipe}": ${errors.join('; ')}`, { recipe, errors });
  }
}

export class RuntimeExecutionError extends TabrunnerError {
  constructor(
    public readonly recipe: string,
    message: string,
    public readonly exitCode?: number,
    public readonly stderr?: string,
  ) {
    super('RuntimeExecutionError', message, { recipe, exitCode });
  }
}

export class RecipeTimeout extends TabrunnerError {
  constructor(public readonly recipe: string, public readonly timeoutMs: number) {
    super('RecipeTimeout', `Recipe "${recipe}" did not finish within ${timeoutMs}ms`, { recipe, timeoutMs });
  }
}

export function isTabrunnerError(err: unknown): err is TabrunnerError {
  return err instanceof TabrunnerError;
}
