import { describe, it, expect } from 'vitest';
import { validateClientId } from './client-id.js';

const CHARSET_REASON =
  'Can only contain: Alphanumeric characters (a-z, A-Z, 0-9), @, -, _, . and :';

describe('validateClientId', () => {
  describe('given every permitted character class', () => {
    it('returns the identifier', () => {
      expect(validateClientId('Sensor-01_a.b@plant:7')._unsafeUnwrap()).toBe(
        'Sensor-01_a.b@plant:7'
      );
    });
  });

  describe('given a plain hyphenated identifier', () => {
    it('returns the identifier', () => {
      expect(validateClientId('client-12345')._unsafeUnwrap()).toBe('client-12345');
    });
  });

  describe('given every permitted punctuation mark after mixed-case letters and digits', () => {
    it('returns the identifier', () => {
      expect(validateClientId('ABCDEFabcdef1234567890@-_.:')._unsafeUnwrap()).toBe(
        'ABCDEFabcdef1234567890@-_.:'
      );
    });
  });

  describe('given 73 alphanumeric characters', () => {
    it('rejects the length', () => {
      const id = `${'abcdefghij'.repeat(7)}abc`;

      expect(id).toHaveLength(73);
      expect(validateClientId(id)._unsafeUnwrapErr().reason).toBe(
        'Exceeded a maximum of 64 characters'
      );
    });
  });

  describe('given a space between words', () => {
    it('rejects the character set', () => {
      expect(validateClientId('client A')._unsafeUnwrapErr().reason).toBe(CHARSET_REASON);
    });
  });

  describe('given exactly 64 characters', () => {
    it('accepts it', () => {
      expect(validateClientId('a'.repeat(64)).isOk()).toBe(true);
    });
  });

  describe('given 65 characters', () => {
    it('rejects the length', () => {
      const id = 'a'.repeat(65);

      expect(validateClientId(id)._unsafeUnwrapErr()).toEqual({
        code: 'invalid_client_id',
        message: `Invalid client id "${id}": Exceeded a maximum of 64 characters`,
        clientId: id,
        reason: 'Exceeded a maximum of 64 characters',
      });
    });
  });

  describe('given a space', () => {
    it('rejects the character set', () => {
      const error = validateClientId('sensor 01')._unsafeUnwrapErr();

      expect(error.code).toBe('invalid_client_id');
      expect(error.clientId).toBe('sensor 01');
      expect(error.reason).toBe(CHARSET_REASON);
    });
  });

  describe('given a non-ASCII letter', () => {
    it('rejects the character set', () => {
      expect(validateClientId('sensör')._unsafeUnwrapErr().reason).toBe(CHARSET_REASON);
    });
  });

  describe('given an identifier that is too long and has illegal characters', () => {
    it('reports the character set first', () => {
      expect(validateClientId(`${'a'.repeat(70)}/`)._unsafeUnwrapErr().reason).toBe(
        CHARSET_REASON
      );
    });
  });
});
