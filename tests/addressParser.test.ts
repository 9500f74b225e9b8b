/**
 * Tests for address parsing
 */

import { parseAddress } from '../src/validators/addressParser';
import { FormatError } from '../src/utils/errors';

describe('AddressParser', () => {
  it('should split username and hostname', () => {
    expect(parseAddress('john.doe@example.com')).toEqual({
      username: 'john.doe',
      plusTag: '',
      hostname: 'example.com',
    });
  });

  it('should split the plus-tag on the first plus sign', () => {
    expect(parseAddress('john+news+weekly@example.com')).toEqual({
      username: 'john',
      plusTag: 'news+weekly',
      hostname: 'example.com',
    });
  });

  it('should lower-case the hostname but keep the username as typed', () => {
    const parts = parseAddress('John.Doe@Example.COM');
    expect(parts.username).toBe('John.Doe');
    expect(parts.hostname).toBe('example.com');
  });

  it('should trim surrounding whitespace', () => {
    expect(parseAddress('  user@example.com \n').hostname).toBe('example.com');
  });

  it('should punycode internationalized hostnames', () => {
    expect(parseAddress('user@bücher.example').hostname).toBe('xn--bcher-kva.example');
  });

  it('should return a frozen object', () => {
    expect(Object.isFrozen(parseAddress('user@example.com'))).toBe(true);
  });

  it('should reject input without "@"', () => {
    expect(() => parseAddress('not-an-email')).toThrow(FormatError);
  });

  it('should reject input with more than one "@"', () => {
    expect(() => parseAddress('bad@@example.com')).toThrow('Address has 2 "@" separators, expected 1');
  });

  it('should accept empty username or hostname and leave judgement to syntax validation', () => {
    expect(parseAddress('@example.com').username).toBe('');
    expect(parseAddress('user@').hostname).toBe('');
  });
});
