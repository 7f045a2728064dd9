import crypto from 'crypto';
import { ConfigurationError } from '../core/errors.js';

const KEY_SALT = 'genai-netops-credentials';

/**
 * AES-256-GCM encryption for credentials stored in the database
 *
 * Blob format: iv(16) + tag(16) + ciphertext, base64 encoded.
 */
export class SecretBox {
  private readonly key: Buffer;

  constructor(secret: string) {
    if (!secret) {
      throw new ConfigurationError('A secret key is required to encrypt credentials');
    }
    this.key = crypto.pbkdf2Sync(secret, KEY_SALT, 100_000, 32, 'sha256');
  }

  encrypt(plaintext: string): string {
    const iv = crypto.randomBytes(16);
    const cipher = crypto.createCipheriv('aes-256-gcm', this.key, iv);
    const enc = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();
    return Buffer.concat([iv, tag, enc]).toString('base64');
  }

  /**
   * Throws when the blob was not produced with the same secret
   */
  decrypt(encrypted: string): string {
    const blob = Buffer.from(encrypted, 'base64');
    if (blob.length < 32) {
      throw new ConfigurationError('Encrypted value is truncated');
    }
    const iv = blob.subarray(0, 16);
    const tag = blob.subarray(16, 32);
    const ciphertext = blob.subarray(32);
    const decipher = crypto.createDecipheriv('aes-256-gcm', this.key, iv);
    decipher.setAuthTag(tag);
    return decipher.update(ciphertext, undefined, 'utf8') + decipher.final('utf8');
  }
}

/**
 * Masks all but the last four characters
 */
export function maskSecret(value: string): string {
  if (value.length <= 4) return '****';
  return '*'.repeat(20) + value.slice(-4);
}
