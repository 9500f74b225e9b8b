import { AddressParts } from '../types/email';
import { FormatError } from '../utils/errors';
import { toAsciiHostname } from '../utils/idn';

/**
 * Split an address into username, plus-tag and hostname.
 *
 * The local part is split on its first "+"; the hostname is lower-cased
 * and its non-ASCII labels punycoded. No validity checks happen here.
 *
 * @throws FormatError unless the address contains exactly one "@"
 */
export function parseAddress(email: string): AddressParts {
  const trimmed = email.trim();
  const atCount = trimmed.split('@').length - 1;

  if (atCount !== 1) {
    throw new FormatError(
      atCount === 0 ? 'Address has no "@" separator' : `Address has ${atCount} "@" separators, expected 1`
    );
  }

  const atIndex = trimmed.indexOf('@');
  const localPart = trimmed.slice(0, atIndex);
  const plusIndex = localPart.indexOf('+');

  return Object.freeze({
    username: plusIndex === -1 ? localPart : localPart.slice(0, plusIndex),
    plusTag: plusIndex === -1 ? '' : localPart.slice(plusIndex + 1),
    hostname: toAsciiHostname(trimmed.slice(atIndex + 1)),
  });
}
