import {
  generateSalt,
  generateKey,
  encodeKey,
  decodeKey,
  hashPassword,
  verifyPassword,
  encrypt,
  decrypt,
} from '../crypto';

describe('crypto', () => {
  describe('generateSalt', () => {
    it('returns 16 random bytes as hex', () => {
      expect(generateSalt()).toMatch(/^[0-9a-f]{32}$/);
    });

    it('generates unique salts', () => {
      expect(generateSalt()).not.toBe(generateSalt());
    });
  });

  describe('hashPassword / verifyPassword', () => {
    it('same password + salt produces the same digest', () => {
      const salt = generateSalt();
      expect(hashPassword('Sub4Life!', salt)).toBe(hashPassword('Sub4Life!', salt));
    });

    it('different salts produce different digests', () => {
      expect(hashPassword('same', generateSalt())).not.toBe(hashPassword('same', generateSalt()));
    });

    it('returns a 64-byte hex digest', () => {
      expect(hashPassword('secret', 'abc')).toMatch(/^[0-9a-f]{128}$/);
    });

    it('verifies the correct password', () => {
      const salt = generateSalt();
      const hash = hashPassword('secret', salt);
      expect(verifyPassword('secret', salt, hash)).toBe(true);
    });

    it('rejects a wrong password', () => {
      const salt = generateSalt();
      const hash = hashPassword('secret', salt);
      expect(verifyPassword('wrong', salt, hash)).toBe(false);
    });

    it('rejects a digest of the wrong length', () => {
      expect(verifyPassword('secret', 'abc', 'abcd')).toBe(false);
    });
  });

  describe('encrypt / decrypt', () => {
    const key = generateKey();

    it('round-trips a value', () => {
      expect(decrypt(encrypt('hello world', key), key)).toBe('hello world');
    });

    it('uses a fresh IV per call', () => {
      expect(encrypt('same', key)).not.toBe(encrypt('same', key));
    });

    it('fails with a different key', () => {
      const ciphertext = encrypt('hello', key);
      expect(() => decrypt(ciphertext, generateKey())).toThrow();
    });

    it('rejects a ciphertext shorter than iv + tag', () => {
      expect(() => decrypt(Buffer.alloc(10).toString('base64'), key)).toThrow('Invalid ciphertext: too short');
    });
  });

  describe('encodeKey / decodeKey', () => {
    it('decodes what encodeKey produced', () => {
      const key = generateKey();
      expect(decodeKey(encodeKey(key))?.equals(key)).toBe(true);
    });

    it('accepts base64url without padding and surrounding whitespace', () => {
      const key = Buffer.alloc(32, 0xfb);
      const material = `  ${key.toString('base64url')}\n`;
      expect(decodeKey(material)?.equals(key)).toBe(true);
    });

    it('rejects material of the wrong length', () => {
      expect(decodeKey(Buffer.alloc(16, 1).toString('base64'))).toBeNull();
    });

    it('rejects non-base64 material', () => {
      expect(decodeKey('not a key!')).toBeNull();
      expect(decodeKey('')).toBeNull();
    });
  });
});
