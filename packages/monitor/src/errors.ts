/**
 * Error taxonomy for the monitoring engine.
 *
 * Every class carries a `kind` so supervisors can report failures on the
 * output stream without instanceof chains at the edges.
 */

import type { MonitorErrorKind } from './types.js';

export class ShepherdError extends Error {
  readonly kind: MonitorErrorKind;
  readonly projectId?: string;

  constructor(kind: MonitorErrorKind, message: string, options?: { projectId?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = kind;
    this.kind = kind;
    this.projectId = options?.projectId;
  }
}

/**
 * The conversation log cannot be located or read
 */
export class LogAccessError extends ShepherdError {
  constructor(message: string, options?: { projectId?: string; cause?: unknown }) {
    super('LogAccessError', message, options);
  }
}

export type AnalysisFailureReason = 'timeout' | 'process' | 'malformed' | 'aborted';

/**
 * One reasoning-service call failed; the round is skipped
 */
export class AnalysisServiceError extends ShepherdError {
  readonly reason: AnalysisFailureReason;

  constructor(reason: AnalysisFailureReason, message: string, options?: { projectId?: string; cause?: unknown }) {
    super('AnalysisServiceError', message, options);
    this.reason = reason;
  }
}

/**
 * Missing or invalid configuration; fatal for the affected project only
 */
export class ConfigError extends ShepherdError {
  constructor(message: string, options?: { projectId?: string; cause?: unknown }) {
    super('ConfigError', message, options);
  }
}

/**
 * A suggestion could not be handed to the prompt hook
 */
export class SuggestionWriteError extends ShepherdError {
  constructor(message: string, options?: { projectId?: string; cause?: unknown }) {
    super('SuggestionWriteError', message, options);
  }
}

/**
 * Message text for any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/**
 * Node system errors expose a string `code` (ENOENT, EACCES, ...)
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
