import { domainToASCII } from 'url';

const ASCII_ONLY = /^[\x00-\x7f]*$/;

/**
 * Lower-case a hostname and punycode its non-ASCII labels.
 * ASCII labels pass through untouched so that later syntax checks
 * still see what the caller typed. A label the IDNA conversion rejects
 * is kept as-is (and will fail hostname validation).
 */
export function toAsciiHostname(hostname: string): string {
  return hostname
    .toLowerCase()
    .split('.')
    .map(label => {
      if (ASCII_ONLY.test(label)) return label;
      const converted = domainToASCII(label);
      return converted === '' ? label : converted;
    })
    .join('.');
}
