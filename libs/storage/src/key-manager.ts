/**
 * Key manager
 *
 * Resolves the store encryption key once per instance, in order:
 * 1. external key material (environment), used verbatim
 * 2. the persisted key file
 * 3. a freshly generated key, written to the key file before it is returned
 *
 * The key file is published with link(2), which fails if the target exists,
 * so concurrent first use from several processes converges on one key.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Logger } from '@keyward/ipc';
import { noopLogger } from '@keyward/ipc';
import { FILE_PERMISSIONS } from './constants';
import { decodeKey, encodeKey, generateKey } from './crypto';
import { KeyResolutionError, errorCode, errorMessage } from './errors';

export type KeySource = 'external' | 'file' | 'generated';

export interface KeyManagerOptions {
  /** Location of the persisted key file */
  keyFile: string;
  /** Externally supplied key material (base64 or base64url, 32 bytes) */
  externalKey?: string;
  logger?: Logger;
}

export interface ResolveKeyOptions {
  /** Generate and persist a key when none exists (default true) */
  allowGenerate?: boolean;
}

export class KeyManager {
  private readonly keyFile: string;
  private readonly externalKey: string | undefined;
  private readonly logger: Logger;
  private key: Buffer | null = null;
  private source: KeySource | null = null;

  constructor(options: KeyManagerOptions) {
    this.keyFile = options.keyFile;
    this.externalKey = options.externalKey;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Resolve the encryption key. Idempotent: later calls return the same key.
   * Throws KeyResolutionError on malformed key material, or when no key
   * exists and `allowGenerate` is false.
   */
  resolveKey(options: ResolveKeyOptions = {}): Buffer {
    if (this.key) return this.key;

    if (this.externalKey !== undefined && this.externalKey !== '') {
      this.key = this.fromExternal(this.externalKey);
      this.source = 'external';
    } else {
      const persisted = this.readKeyFile();
      if (persisted) {
        this.key = persisted;
        this.source = 'file';
      } else {
        if (options.allowGenerate === false) {
          throw new KeyResolutionError(
            `Key file ${this.keyFile} is missing but the credential store already exists; restore the key file or supply the key externally`,
          );
        }
        const { key, created } = this.persistNewKey();
        this.key = key;
        this.source = created ? 'generated' : 'file';
      }
    }

    this.logger.info(`[keys] Encryption key resolved from ${this.describeSource()}`);
    return this.key;
  }

  /**
   * Where the resolved key came from, or null before resolution.
   */
  getSource(): KeySource | null {
    return this.source;
  }

  getKeyFile(): string {
    return this.keyFile;
  }

  private describeSource(): string {
    switch (this.source) {
      case 'external':
        return 'external secret';
      case 'file':
        return `key file ${this.keyFile}`;
      case 'generated':
        return `newly generated key (saved to ${this.keyFile})`;
      default:
        return 'unknown source';
    }
  }

  private fromExternal(material: string): Buffer {
    const key = decodeKey(material);
    if (!key) {
      throw new KeyResolutionError(
        'External encryption key is malformed: expected base64 encoding of exactly 32 bytes',
      );
    }
    return key;
  }

  /**
   * Read the key file; null when it does not exist.
   */
  private readKeyFile(): Buffer | null {
    let content: string;
    try {
      content = fs.readFileSync(this.keyFile, 'utf8');
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return null;
      throw new KeyResolutionError(`Cannot read key file ${this.keyFile}: ${errorMessage(err)}`, { cause: err });
    }

    const key = decodeKey(content);
    if (!key) {
      throw new KeyResolutionError(`Key file ${this.keyFile} is malformed`);
    }
    return key;
  }

  /**
   * Generate a key and publish it atomically. If another writer published
   * first, adopt its key instead.
   */
  private persistNewKey(): { key: Buffer; created: boolean } {
    const dir = path.dirname(this.keyFile);
    const tmpFile = path.join(dir, `.${path.basename(this.keyFile)}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`);
    const key = generateKey();

    try {
      fs.mkdirSync(dir, { recursive: true, mode: FILE_PERMISSIONS.DB_DIR });

      const fd = fs.openSync(tmpFile, 'wx', FILE_PERMISSIONS.KEY_FILE);
      try {
        fs.writeFileSync(fd, `${encodeKey(key)}\n`);
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }

      try {
        fs.linkSync(tmpFile, this.keyFile);
      } catch (err) {
        if (errorCode(err) !== 'EEXIST') throw err;
        const existing = this.readKeyFile();
        if (!existing) throw err;
        this.logger.info(`[keys] Key file ${this.keyFile} was created concurrently, using it`);
        return { key: existing, created: false };
      }
    } catch (err) {
      if (err instanceof KeyResolutionError) throw err;
      throw new KeyResolutionError(`Cannot persist key file ${this.keyFile}: ${errorMessage(err)}`, { cause: err });
    } finally {
      fs.rmSync(tmpFile, { force: true });
    }

    this.logger.warn(`[keys] Generated a new encryption key at ${this.keyFile}; back it up`);
    return { key, created: true };
  }
}
