/**
 * Core types for email address verification.
 */

/**
 * An address split into the pieces every check works on.
 * `hostname` is lower-cased and ASCII-compatible (IDN labels punycoded).
 */
export interface AddressParts {
  readonly username: string;
  readonly plusTag: string;
  readonly hostname: string;
}

/**
 * Validity of each address component.
 */
export interface SyntaxData {
  readonly username: boolean;
  readonly plusTag: boolean;
  readonly hostname: boolean;
}

export interface RegistrabilityData {
  readonly registrableDomain: string | null;
}

/**
 * MX record from DNS
 */
export interface MxRecord {
  readonly exchange: string;
  readonly priority: number;
}

export interface MxData {
  readonly records: readonly MxRecord[];
}

/**
 * Which list produced a dataset match.
 */
export type MatchSource = 'allow' | 'deny' | 'default';

export interface DatasetData {
  readonly match: boolean;
  readonly matchedOn: string | null;
  readonly source: MatchSource | null;
}

export interface AvatarData {
  readonly avatarUrl: string | null;
}

/**
 * One (possibly multi-line) SMTP reply. `code` is 0 when the reply
 * did not start with a three digit code.
 */
export interface SmtpResponse {
  code: number;
  message: string;
}

export interface SmtpData {
  readonly deliverable: boolean;
  readonly catchAll: boolean | null;
  readonly code: number;
  readonly message: string;
}
