/**
 * Failure taxonomy for the harvester.
 *
 * Every error that leaves a page interaction is either a {@link HarvestError}
 * already, or is mapped to one by {@link classifyError}. `retryable` decides
 * whether {@link retryWithBackoff} spends another attempt on it; `kind` is what
 * ends up in the target result and the collection log.
 */

export type FailureKind =
  | 'navigation'
  | 'blocked'
  | 'element-not-found'
  | 'execution'
  | 'session-crash'
  | 'aborted'
  | 'storage'
  | 'unknown';

export type NavigationFailure = 'http' | 'timeout' | 'network' | 'blocked';

export class HarvestError extends Error {
  readonly kind: FailureKind;
  readonly retryable: boolean;

  constructor(message: string, kind: FailureKind, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.retryable = retryable;
  }
}

export class NavigationError extends HarvestError {
  readonly reason: NavigationFailure;
  readonly status: number | null;

  constructor(reason: NavigationFailure, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, reason === 'blocked' ? 'blocked' : 'navigation', reason === 'timeout' || reason === 'network', {
      cause: options.cause,
    });
    this.reason = reason;
    this.status = options.status ?? null;
  }
}

export class ElementNotFoundError extends HarvestError {
  readonly element: string;

  constructor(element: string, message = `${element} not found`) {
    super(message, 'element-not-found', true);
    this.element = element;
  }
}

export class ExecutionError extends HarvestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'execution', true, options);
  }
}

export class SessionCrashError extends HarvestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'session-crash', false, options);
  }
}

export class StopRequestedError extends HarvestError {
  constructor(message = 'stop requested') {
    super(message, 'aborted', false);
  }
}

export class StorageError extends HarvestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'storage', false, options);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}

// Playwright wording: "Timeout 30000ms exceeded", "Target page, context or browser has been closed".
const TIMEOUT_PATTERN = /timeout|timed out|etimedout/i;
const STALE_PATTERN = /detached|stale|not attached|execution context was destroyed|frame was detached/i;
const CLOSED_PATTERN = /target (page, context or browser )?(has been )?closed|browser has been closed|browser has disconnected|page crashed/i;

export function isTimeoutMessage(message: string): boolean {
  return TIMEOUT_PATTERN.test(message);
}

export function isClosedTargetMessage(message: string): boolean {
  return CLOSED_PATTERN.test(message);
}

export function classifyError(err: unknown): HarvestError {
  if (err instanceof HarvestError) return err;
  const message = errorMessage(err);
  if (isClosedTargetMessage(message)) {
    return new SessionCrashError(message, { cause: err });
  }
  if (isTimeoutMessage(message) || STALE_PATTERN.test(message)) {
    return new ExecutionError(message, { cause: err });
  }
  return new HarvestError(message, 'unknown', false, { cause: err });
}
