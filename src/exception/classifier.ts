import { ZodError } from 'zod';
import { isTabrunnerError, type ErrorKind } from './errors.js';
import type { ExecutionError } from '../types/execution.js';

const SOCKET_CODES = ['econnrefused', 'econnreset', 'ehostunreach', 'enotfound', 'etimedout', 'eai_again'];

export function classifyError(error: unknown): ErrorKind {
  if (isTabrunnerError(error)) {
    return error.kind;
  }

  if (error instanceof ZodError) {
    return 'ConfigurationError';
  }

  const message = extractMessage(error).toLowerCase();
  const code = extractCode(error);

  if ((code && SOCKET_CODES.includes(code)) || isSocketClosed(message)) {
    return 'ConnectionLost';
  }

  return 'RuntimeExecutionError';
}

export function errorToPayload(error: unknown): ExecutionError {
  return {
    kind: classifyError(error),
    message: extractMessage(error),
  };
}

export function extractMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
  }
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

function extractCode(error: unknown): string | undefined {
  if (error !== null && typeof error === 'object' && 'code' in error) {
    const code = error.code;
    if (typeof code === 'string') return code.toLowerCase();
  }
  return undefined;
}

function isSocketClosed(text: string): boolean {
  const patterns = ['socket hang up', 'websocket was closed', 'connection closed', 'connection reset'];
  return patterns.some((p) => text.includes(p));
}
