/**
 * Crypto primitives used throughout the OAuth flow and session storage.
 *
 * Provides base64url encoding, HMAC digests for client secrets, token generation, timing-safe
 * compares, and the `TokenCipher` that keeps upstream provider tokens encrypted at rest.
 */
import crypto from 'crypto';

import { ConfigurationError, DecryptionError } from '../lib/errors';

export const base64url = {
  encode: (buf: Uint8Array | Buffer | string) => {
    const b = typeof buf === 'string' ? Buffer.from(buf, 'utf8') : Buffer.from(buf);
    return b.toString('base64').replace(/=/g, '').replace(/\+/g, '-').replace(/\//g, '_');
  },
  decode: (str: string) => {
    const pad = str.length % 4 === 0 ? '' : '='.repeat(4 - (str.length % 4));
    const s = str.replace(/-/g, '+').replace(/_/g, '/') + pad;
    return Buffer.from(s, 'base64');
  },
};

export const hmacSha256Hex = (secret: string, data: string) => {
  return crypto.createHmac('sha256', secret).update(data).digest('hex');
};

export const sha256Base64url = (data: string) => {
  const digest = crypto.createHash('sha256').update(data).digest();
  return base64url.encode(digest);
};

export const randomToken = (bytes = 32) => {
  return base64url.encode(crypto.randomBytes(bytes));
};

export const timingSafeEqualStr = (a: string, b: string) => {
  const ab = Buffer.from(a);
  const bb = Buffer.from(b);
  if (ab.length !== bb.length) return false;
  return crypto.timingSafeEqual(ab, bb);
};

export const derive32ByteKey = (secret: string) => {
  return crypto.createHash('sha256').update(secret).digest(); // 32 bytes
};

const IV_BYTES = 12;
const TAG_BYTES = 16;

/**
 * AES-256-GCM over opaque token strings.
 *
 * Output layout is `iv | tag | ciphertext`, base64url encoded. A bad tag, truncated input or a
 * foreign key all surface as `DecryptionError`.
 */
export class TokenCipher {
  private readonly key: Buffer;

  constructor(secret: string | undefined) {
    if (!secret || !secret.trim()) {
      throw new ConfigurationError('ENCRYPTION_KEY is not configured');
    }
    this.key = derive32ByteKey(secret);
  }

  encrypt(plaintext: string): string {
    const iv = crypto.randomBytes(IV_BYTES);
    const cipher = crypto.createCipheriv('aes-256-gcm', this.key, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();
    return base64url.encode(Buffer.concat([iv, tag, ciphertext]));
  }

  decrypt(encoded: string): string {
    const raw = base64url.decode(encoded);
    if (raw.length < IV_BYTES + TAG_BYTES) {
      throw new DecryptionError('Ciphertext is truncated');
    }
    const iv = raw.subarray(0, IV_BYTES);
    const tag = raw.subarray(IV_BYTES, IV_BYTES + TAG_BYTES);
    const ciphertext = raw.subarray(IV_BYTES + TAG_BYTES);
    try {
      const decipher = crypto.createDecipheriv('aes-256-gcm', this.key, iv);
      decipher.setAuthTag(tag);
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
    } catch (err) {
      throw new DecryptionError('Unable to decrypt stored token', { cause: err });
    }
  }
}
