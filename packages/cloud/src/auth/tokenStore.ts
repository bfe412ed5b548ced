/**
 * Token Store
 *
 * Persists the cloud credential to a single file with owner-only permissions.
 * With a secret configured the payload is sealed with AES-256-GCM.
 */

import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'node:crypto';
import { z } from 'zod';
import { LocalIOError, type Credential } from '@seedsync/core';
import { atomicWriteFile, createLogger, removeFile, safeReadFile, type Logger } from '@seedsync/utils';

const FILE_MODE = 0o600;
const KEY_LENGTH = 32;
const IV_LENGTH = 12;

export const DEFAULT_SAFETY_MARGIN_MS = 60_000;

const credentialSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).nullable(),
  expiresAt: z.number().int().nonnegative(),
});

const sealedSchema = z.object({
  version: z.literal(1),
  salt: z.string(),
  iv: z.string(),
  tag: z.string(),
  data: z.string(),
});

export interface TokenStoreOptions {
  path: string;
  /** Encrypts the file when set */
  secret?: string;
  safetyMarginMs?: number;
  logger?: Logger;
}

export class TokenStore {
  readonly path: string;
  readonly safetyMarginMs: number;
  private readonly secret?: string;
  private readonly logger: Logger;

  constructor(options: TokenStoreOptions) {
    this.path = options.path;
    this.secret = options.secret || undefined;
    this.safetyMarginMs = options.safetyMarginMs ?? DEFAULT_SAFETY_MARGIN_MS;
    this.logger = options.logger ?? createLogger({ component: 'token-store' });
  }

  /**
   * Read the stored credential. Missing, unreadable or corrupt files yield null.
   */
  async load(): Promise<Credential | null> {
    let content: string | null;
    try {
      content = await safeReadFile(this.path);
    } catch (error) {
      this.logger.warn({ path: this.path, error: String(error) }, 'Cannot read credentials file');
      return null;
    }
    if (content === null) {
      return null;
    }

    try {
      const payload: unknown = JSON.parse(content);
      const plain = this.secret ? this.open(payload, this.secret) : payload;
      const parsed = credentialSchema.safeParse(plain);
      if (!parsed.success) {
        this.logger.warn({ path: this.path }, 'Credentials file is malformed, ignoring it');
        return null;
      }
      return parsed.data;
    } catch (error) {
      this.logger.warn({ path: this.path, error: String(error) }, 'Credentials file is corrupt, ignoring it');
      return null;
    }
  }

  /**
   * Persist atomically. Failures surface as LocalIOError.
   */
  async save(credential: Credential): Promise<void> {
    const plain = JSON.stringify(credential);
    const content = this.secret ? JSON.stringify(this.seal(plain, this.secret)) : plain;

    try {
      await atomicWriteFile(this.path, content, { mode: FILE_MODE });
    } catch (error) {
      throw new LocalIOError('save credentials', this.path, error);
    }
  }

  async clear(): Promise<void> {
    try {
      await removeFile(this.path);
    } catch (error) {
      throw new LocalIOError('remove credentials', this.path, error);
    }
  }

  /**
   * True while the credential is usable for longer than the safety margin
   */
  isValid(credential: Credential, now: number = Date.now()): boolean {
    return credential.expiresAt - now > this.safetyMarginMs;
  }

  private seal(plain: string, secret: string): z.infer<typeof sealedSchema> {
    const salt = randomBytes(16);
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv('aes-256-gcm', scryptSync(secret, salt, KEY_LENGTH), iv);
    const data = Buffer.concat([cipher.update(plain, 'utf8'), cipher.final()]);

    return {
      version: 1,
      salt: salt.toString('base64'),
      iv: iv.toString('base64'),
      tag: cipher.getAuthTag().toString('base64'),
      data: data.toString('base64'),
    };
  }

  /**
   * Throws when the payload was not sealed with this secret
   */
  private open(payload: unknown, secret: string): unknown {
    const sealed = sealedSchema.parse(payload);
    const key = scryptSync(secret, Buffer.from(sealed.salt, 'base64'), KEY_LENGTH);
    const decipher = createDecipheriv('aes-256-gcm', key, Buffer.from(sealed.iv, 'base64'));
    decipher.setAuthTag(Buffer.from(sealed.tag, 'base64'));
    const plain = Buffer.concat([
      decipher.update(Buffer.from(sealed.data, 'base64')),
      decipher.final(),
    ]).toString('utf8');

    const value: unknown = JSON.parse(plain);
    return value;
  }
}
