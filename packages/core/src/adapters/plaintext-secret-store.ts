import type { SecretStore } from '../ports/secret-store.js';

/**
 * Keeps the API key base64-encoded in preferences.json.
 * This hides the key from a casual glance only; it is not encryption.
 */
export class PlaintextSecretStore implements SecretStore {
  encrypt(plain: string): string {
    return Buffer.from(plain, 'utf-8').toString('base64');
  }

  decrypt(encoded: string): string {
    return Buffer.from(encoded, 'base64').toString('utf-8');
  }
}
