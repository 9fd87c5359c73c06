/** Reversible encoding for the stored API key; the config store only ever sees the encoded form. */
export interface SecretStore {
  encrypt(plain: string): string;
  decrypt(encoded: string): string;
}
