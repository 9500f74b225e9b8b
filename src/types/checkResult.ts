/**
 * Outcome of a single check.
 *
 * `failed` is a definitive negative answer (with the data that led to it),
 * `errored` means a collaborator (DNS, HTTP, SMTP) could not give an answer.
 */

export type CheckStatus = 'passed' | 'failed' | 'skipped' | 'errored';

export interface PassedCheck<T> {
  readonly status: 'passed';
  readonly data: T;
}

export interface FailedCheck<T> {
  readonly status: 'failed';
  readonly data: T | null;
}

export interface SkippedCheck {
  readonly status: 'skipped';
}

export interface ErroredCheck {
  readonly status: 'errored';
  readonly error: Error;
}

export type CheckResult<T> = PassedCheck<T> | FailedCheck<T> | SkippedCheck | ErroredCheck;

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Payloads are copied, so the checker's objects stay its own, and frozen
 * all the way down.
 */
function ownedPayload<T>(data: T): T {
  return deepFreeze(structuredClone(data));
}

export function passed<T>(data: T): PassedCheck<T> {
  const result: PassedCheck<T> = { status: 'passed', data: ownedPayload(data) };
  return Object.freeze(result);
}

export function failed<T>(data: T | null = null): FailedCheck<T> {
  const result: FailedCheck<T> = { status: 'failed', data: ownedPayload(data) };
  return Object.freeze(result);
}

const SKIPPED: SkippedCheck = { status: 'skipped' };
Object.freeze(SKIPPED);

export function skipped(): SkippedCheck {
  return SKIPPED;
}

export function errored(error: unknown): ErroredCheck {
  const result: ErroredCheck = {
    status: 'errored',
    error: error instanceof Error ? error : new Error(String(error)),
  };
  return Object.freeze(result);
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}
