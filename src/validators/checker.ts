import { AddressParts } from '../types/email';

/**
 * One verification step over a parsed address.
 * `C` is extra input the step needs (the SMTP probe takes the MX records).
 */
export interface Checker<T, C = void> {
  check(parts: AddressParts, context: C): Promise<T>;
}

/**
 * A checker backed by a dataset that can be reloaded from its source.
 */
export interface Refreshable {
  refresh(): Promise<void>;
}

export function isRefreshable(value: object): value is Refreshable {
  return 'refresh' in value && typeof value.refresh === 'function';
}
