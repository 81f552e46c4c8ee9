/**
 * Encryption utilities for Keyward storage
 *
 * - Column-level AES-256-GCM encryption for stored password hashes
 * - PBKDF2-SHA512 for the one-way password digest
 * - Key material encoding for the key file and environment secret
 */

import * as crypto from 'node:crypto';

export const KEY_LEN = 32;
const SALT_LEN = 16;
const AES_ALGORITHM = 'aes-256-gcm' as const;
const IV_LEN = 12;
const AUTH_TAG_LEN = 16;
const PBKDF2_ITERATIONS = 100_000;
const PBKDF2_KEY_LEN = 64;
const PBKDF2_DIGEST = 'sha512';

/**
 * Generate a random per-user salt, hex encoded.
 */
export function generateSalt(): string {
  return crypto.randomBytes(SALT_LEN).toString('hex');
}

/**
 * Generate a fresh 32-byte encryption key.
 */
export function generateKey(): Buffer {
  return crypto.randomBytes(KEY_LEN);
}

/**
 * Encode a key for the key file or the environment.
 */
export function encodeKey(key: Buffer): string {
  return key.toString('base64');
}

/**
 * Decode base64 or base64url key material. Returns null unless it decodes
 * to exactly KEY_LEN bytes.
 */
export function decodeKey(material: string): Buffer | null {
  const trimmed = material.trim();
  if (!/^[A-Za-z0-9+/_-]+={0,2}$/.test(trimmed)) return null;

  const normalized = trimmed.replace(/-/g, '+').replace(/_/g, '/');
  const key = Buffer.from(normalized, 'base64');
  return key.length === KEY_LEN ? key : null;
}

/**
 * One-way digest of a password with its salt (PBKDF2-SHA512, hex).
 */
export function hashPassword(password: string, salt: string): string {
  const hash = crypto.pbkdf2Sync(password, salt, PBKDF2_ITERATIONS, PBKDF2_KEY_LEN, PBKDF2_DIGEST);
  return hash.toString('hex');
}

/**
 * Compare a password against a stored digest in constant time.
 */
export function verifyPassword(password: string, salt: string, storedHash: string): boolean {
  const expected = Buffer.from(storedHash, 'hex');
  const actual = Buffer.from(hashPassword(password, salt), 'hex');
  if (expected.length !== actual.length) return false;
  return crypto.timingSafeEqual(expected, actual);
}

/**
 * Encrypt plaintext with AES-256-GCM.
 * Returns base64-encoded string: iv + authTag + ciphertext
 */
export function encrypt(plaintext: string, key: Buffer): string {
  const iv = crypto.randomBytes(IV_LEN);
  const cipher = crypto.createCipheriv(AES_ALGORITHM, key, iv);
  const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
  const authTag = cipher.getAuthTag();

  // Pack: iv (12) + authTag (16) + ciphertext
  const packed = Buffer.concat([iv, authTag, encrypted]);
  return packed.toString('base64');
}

/**
 * Decrypt a base64-encoded AES-256-GCM ciphertext.
 */
export function decrypt(ciphertext: string, key: Buffer): string {
  const packed = Buffer.from(ciphertext, 'base64');

  if (packed.length < IV_LEN + AUTH_TAG_LEN) {
    throw new Error('Invalid ciphertext: too short');
  }

  const iv = packed.subarray(0, IV_LEN);
  const authTag = packed.subarray(IV_LEN, IV_LEN + AUTH_TAG_LEN);
  const encrypted = packed.subarray(IV_LEN + AUTH_TAG_LEN);

  const decipher = crypto.createDecipheriv(AES_ALGORITHM, key, iv);
  decipher.setAuthTag(authTag);
  const decrypted = Buffer.concat([decipher.update(encrypted), decipher.final()]);
  return decrypted.toString('utf8');
}
