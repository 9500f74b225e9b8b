/**
 * Email syntax validator.
 * Grammar checks on each address component, following the practical
 * subset of RFC 5321/5322 that mail servers accept.
 */

import { AddressParts, SyntaxData } from '../types/email';

const MAX_USERNAME_LENGTH = 64;
const MAX_HOSTNAME_LENGTH = 253;
const MAX_LABEL_LENGTH = 63;

const ATOM = "[A-Za-z0-9!#$%&'*+/=?^_`{|}~-]+";
const DOT_ATOM = new RegExp(`^${ATOM}(\\.${ATOM})*$`);
const PLUS_TAG = /^[A-Za-z0-9!#$%&'*+/=?^_`{|}~.-]*$/;
const LABEL = /^[A-Za-z0-9-]+$/;

function isQuotedStringValid(value: string): boolean {
  // interior only, without the surrounding quotes
  const interior = value.slice(1, -1);

  for (let i = 0; i < interior.length; i++) {
    const ch = interior[i];

    if (ch === '\r' || ch === '\n') {
      return false;
    }
    if (ch === '\\') {
      if (i + 1 >= interior.length) return false;
      const escaped = interior[i + 1];
      if (escaped === '\r' || escaped === '\n') return false;
      i++;
      continue;
    }
    if (ch === '"') {
      return false;
    }
  }

  return true;
}

export function isUsernameValid(username: string): boolean {
  if (username.length < 1 || username.length > MAX_USERNAME_LENGTH) {
    return false;
  }

  if (username.length >= 2 && username.startsWith('"') && username.endsWith('"')) {
    return isQuotedStringValid(username);
  }

  return DOT_ATOM.test(username);
}

export function isPlusTagValid(plusTag: string): boolean {
  return PLUS_TAG.test(plusTag);
}

export function isHostnameValid(hostname: string): boolean {
  if (hostname.length > MAX_HOSTNAME_LENGTH) {
    return false;
  }

  if (hostname.startsWith('.') || hostname.endsWith('.')) {
    return false;
  }

  return hostname.split('.').every(label =>
    label.length >= 1 &&
    label.length <= MAX_LABEL_LENGTH &&
    LABEL.test(label) &&
    !label.startsWith('-') &&
    !label.endsWith('-')
  );
}

/**
 * Validate every component of a parsed address
 */
export function validateSyntax(parts: AddressParts): SyntaxData {
  return {
    username: isUsernameValid(parts.username),
    plusTag: isPlusTagValid(parts.plusTag),
    hostname: isHostnameValid(parts.hostname),
  };
}

export function isSyntaxValid(data: SyntaxData): boolean {
  return data.username && data.plusTag && data.hostname;
}
