import crypto from 'crypto';

const AAD = Buffer.from('storefront-copilot:credential');

/**
 * Reversible transformation applied to vendor credentials before they reach the
 * settings store. AES-256-GCM with a key derived from the process-wide secret.
 */
export class CredentialCipher {
  private readonly key: Buffer;

  constructor(secret: string | Buffer) {
    this.key = crypto.createHash('sha256').update(secret).digest();
  }

  encrypt(text: string): string {
    if (!text) {
      return '';
    }

    const iv = crypto.randomBytes(12);
    const cipher = crypto.createCipheriv('aes-256-gcm', this.key, iv);
    cipher.setAAD(AAD);

    let encrypted = cipher.update(text, 'utf8', 'hex');
    encrypted += cipher.final('hex');

    const authTag = cipher.getAuthTag();
    return iv.toString('hex') + ':' + authTag.toString('hex') + ':' + encrypted;
  }

  /** Throws when the value was not produced by `encrypt` with the same secret. */
  decrypt(encryptedText: string): string {
    if (!encryptedText) {
      return '';
    }

    const parts = encryptedText.split(':');
    if (parts.length !== 3) throw new Error('Invalid encrypted format');
    const [ivHex, tagHex, encrypted] = parts;

    const decipher = crypto.createDecipheriv('aes-256-gcm', this.key, Buffer.from(ivHex, 'hex'));
    decipher.setAAD(AAD);
    decipher.setAuthTag(Buffer.from(tagHex, 'hex'));

    let decrypted = decipher.update(encrypted, 'hex', 'utf8');
    decrypted += decipher.final('utf8');

    return decrypted;
  }
}
