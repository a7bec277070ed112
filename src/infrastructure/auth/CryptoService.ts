import CryptoJS from 'crypto-js';
import { injectable } from 'inversify';
import { logger } from '../logging/Logger';

const MIN_KEY_LENGTH = 32;

@injectable()
export class CryptoService {
  private readonly encryptionKey: string;

  constructor() {
    this.encryptionKey = process.env.ENCRYPTION_KEY || '';
    // Apps running without on-chain settlement never need the key, so only warn here
    if (this.encryptionKey.length < MIN_KEY_LENGTH) {
      logger.warn('ENCRYPTION_KEY is not set or too short; cryptographic operations will be disabled until properly configured');
    }
  }

  encrypt(text: string): string {
    this.assertKey();
    try {
      return CryptoJS.AES.encrypt(text, this.encryptionKey).toString();
    } catch (error) {
      logger.error('Encryption failed', { error: error instanceof Error ? error.message : 'Unknown error' });
      throw new Error('Failed to encrypt data');
    }
  }

  decrypt(encryptedText: string): string {
    this.assertKey();
    let decrypted: string;
    try {
      decrypted = CryptoJS.AES.decrypt(encryptedText, this.encryptionKey).toString(CryptoJS.enc.Utf8);
    } catch (error) {
      logger.error('Decryption failed', { error: error instanceof Error ? error.message : 'Unknown error' });
      throw new Error('Failed to decrypt data');
    }
    if (!decrypted) {
      throw new Error('Failed to decrypt data');
    }
    return decrypted;
  }

  getSettlementPrivateKey(): string {
    const encryptedKey = process.env.SETTLEMENT_PRIVATE_KEY_ENCRYPTED;
    if (!encryptedKey) {
      throw new Error('Encrypted settlement private key not configured');
    }
    return this.decrypt(encryptedKey);
  }

  private assertKey(): void {
    if (this.encryptionKey.length < MIN_KEY_LENGTH) {
      throw new Error(`ENCRYPTION_KEY missing or too short (>= ${MIN_KEY_LENGTH} chars required)`);
    }
  }
}
