/**
 * Interfaces for the credential store
 */

/**
 * Turns secrets into blobs only the current user can read back
 */
export interface SecretProtector {
  protect(plaintext: string): Promise<Buffer>;
  unprotect(blob: Buffer): Promise<string>;
}

export interface ISecretStore {
  /**
   * Store or replace a value
   * @throws ValidationError for a blank key
   * @throws PersistenceError when the file cannot be written
   */
  store(key: string, value: string): Promise<void>;

  /**
   * Read a value
   * @returns The value, or undefined when absent
   */
  retrieve(key: string): Promise<string | undefined>;

  /**
   * Remove a value
   * @returns Whether the key existed
   */
  delete(key: string): Promise<boolean>;

  /**
   * Keys currently stored
   */
  listKeys(): Promise<string[]>;

  /**
   * Remove every value
   */
  clear(): Promise<void>;
}
