import crypto from 'node:crypto';
import { EncryptionError } from '../utils/errors.js';

const ALGORITHM = 'aes-256-gcm';
const KEY_LENGTH = 32;
const IV_LENGTH = 12; // 96-bit IV for GCM
const AUTH_TAG_LENGTH = 16; // 128-bit auth tag

/**
 * Seals and opens secret material (SCM tokens, OAuth client secrets) before it
 * reaches storage.
 */
export interface CredentialCipher {
  seal(plaintext: string): string;
  open(ciphertext: string): string;
}

/**
 * AES-256-GCM cipher. Ciphertext is base64 of IV + ciphertext + authTag.
 * The empty string seals and opens to itself.
 */
export class TokenCipher implements CredentialCipher {
  private readonly key: Buffer;

  constructor(key: Buffer) {
    if (key.length !== KEY_LENGTH) {
      throw new EncryptionError(`encryption key must be exactly ${KEY_LENGTH} bytes for AES-256`);
    }
    this.key = Buffer.from(key);
  }

  /**
   * Build a cipher from a hex-encoded key such as the ENCRYPTION_KEY env variable.
   */
  static fromHex(hexKey: string): TokenCipher {
    if (!/^[0-9a-fA-F]*$/.test(hexKey)) {
      throw new EncryptionError('encryption key must be hex-encoded');
    }
    return new TokenCipher(Buffer.from(hexKey, 'hex'));
  }

  seal(plaintext: string): string {
    if (plaintext === '') {
      return '';
    }

    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, this.key, iv);

    const encrypted = Buffer.concat([
      cipher.update(plaintext, 'utf8'),
      cipher.final(),
    ]);

    const authTag = cipher.getAuthTag();

    // Combine: IV (12 bytes) + ciphertext + authTag (16 bytes)
    return Buffer.concat([iv, encrypted, authTag]).toString('base64');
  }

  open(ciphertext: string): string {
    if (ciphertext === '') {
      return '';
    }

    const combined = Buffer.from(ciphertext, 'base64');
    if (combined.length < IV_LENGTH + AUTH_TAG_LENGTH) {
      throw new EncryptionError('ciphertext is corrupted or tampered');
    }

    const iv = combined.subarray(0, IV_LENGTH);
    const authTag = combined.subarray(combined.length - AUTH_TAG_LENGTH);
    const encrypted = combined.subarray(IV_LENGTH, combined.length - AUTH_TAG_LENGTH);

    try {
      const decipher = crypto.createDecipheriv(ALGORITHM, this.key, iv);
      decipher.setAuthTag(authTag);

      const decrypted = Buffer.concat([
        decipher.update(encrypted),
        decipher.final(),
      ]);

      return decrypted.toString('utf8');
    } catch (err) {
      throw new EncryptionError(`decryption failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
