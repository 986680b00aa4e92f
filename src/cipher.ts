import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'node:crypto';

const ALGORITHM = 'aes-256-gcm';
const NONCE_SIZE = 12;
const TAG_SIZE = 16;

/**
 * @description Number of bytes sealing adds to a plaintext: nonce(12) + tag(16).
 * */
export const SEAL_OVERHEAD = NONCE_SIZE + TAG_SIZE;

/**
 * AES-256-GCM sealing keyed by the query password.
 *
 * Layout of a sealed body: `nonce[12] | ciphertext | tag[16]`.
 */
export class QueryCipher {
  private readonly $key: Buffer;

  constructor(password: string) {
    this.$key = createHash('sha256').update(password, 'utf-8').digest();
  }

  public seal(plaintext: Buffer): Buffer {
    const nonce = randomBytes(NONCE_SIZE);
    const cipher = createCipheriv(ALGORITHM, this.$key, nonce);
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return Buffer.concat([nonce, ciphertext, cipher.getAuthTag()]);
  }

  /**
   * @description Open a sealed body. Returns null when it is too short or fails authentication.
   * */
  public open(sealed: Buffer): Buffer | null {
    if (sealed.length < SEAL_OVERHEAD) {
      return null;
    }
    const nonce = sealed.subarray(0, NONCE_SIZE);
    const tag = sealed.subarray(sealed.length - TAG_SIZE);
    const ciphertext = sealed.subarray(NONCE_SIZE, sealed.length - TAG_SIZE);
    try {
      const decipher = createDecipheriv(ALGORITHM, this.$key, nonce);
      decipher.setAuthTag(tag);
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    } catch {
      return null;
    }
  }
}
