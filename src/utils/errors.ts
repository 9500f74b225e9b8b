/**
 * Error types surfaced by the verifier.
 */

/**
 * The input could not be split into username and hostname.
 * Never escapes `EmailVerifier.verify`: it becomes a failed syntax check.
 */
export class FormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FormatError';
  }
}

/**
 * An external collaborator (HTTP endpoint, DNS, SMTP exchanger) failed
 * to produce an answer.
 */
export class ConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

/**
 * Connect/read/write/timeout failure on an SMTP socket.
 * Retried by the SMTP prober and never returned to callers directly.
 */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * One or more dataset refreshes failed. The failed datasets keep serving
 * their previous contents.
 */
export class RefreshError extends Error {
  readonly errors: Error[];

  constructor(errors: Error[]) {
    super(`${errors.length} dataset refresh(es) failed: ${errors.map(e => e.message).join('; ')}`);
    this.name = 'RefreshError';
    this.errors = errors;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
