/**
 * LocalKeyProtector - AES-256-GCM with a per-user master key file
 *
 * Blob layout: version (1 byte) | iv (12) | auth tag (16) | ciphertext
 */

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import { PersistenceError } from "../types";
import { SecretProtector } from "../interfaces";
import { errnoCode } from "./ErrorHandler";

const BLOB_VERSION = 1;
const KEY_BYTES = 32;
const IV_BYTES = 12;
const TAG_BYTES = 16;
const HEADER_BYTES = 1 + IV_BYTES + TAG_BYTES;

export class LocalKeyProtector implements SecretProtector {
  private keyPath: string;
  private key?: Promise<Buffer>;

  /**
   * @param keyPath Master key file, created with mode 0600 when missing
   */
  constructor(keyPath: string) {
    this.keyPath = keyPath;
  }

  async protect(plaintext: string): Promise<Buffer> {
    const key = await this.getKey();
    const iv = crypto.randomBytes(IV_BYTES);
    const cipher = crypto.createCipheriv("aes-256-gcm", key, iv);
    const ciphertext = Buffer.concat([
      cipher.update(plaintext, "utf8"),
      cipher.final(),
    ]);
    return Buffer.concat([
      Buffer.from([BLOB_VERSION]),
      iv,
      cipher.getAuthTag(),
      ciphertext,
    ]);
  }

  async unprotect(blob: Buffer): Promise<string> {
    if (blob.length < HEADER_BYTES || blob[0] !== BLOB_VERSION) {
      throw new Error("Unrecognized protected value");
    }
    const key = await this.getKey();
    const iv = blob.subarray(1, 1 + IV_BYTES);
    const tag = blob.subarray(1 + IV_BYTES, HEADER_BYTES);
    const decipher = crypto.createDecipheriv("aes-256-gcm", key, iv);
    decipher.setAuthTag(tag);
    return Buffer.concat([
      decipher.update(blob.subarray(HEADER_BYTES)),
      decipher.final(),
    ]).toString("utf8");
  }

  private getKey(): Promise<Buffer> {
    if (!this.key) {
      this.key = this.loadOrCreateKey();
      // A failed attempt is retried on the next call
      void this.key.catch(() => {
        this.key = undefined;
      });
    }
    return this.key;
  }

  private async loadOrCreateKey(): Promise<Buffer> {
    const existing = await this.readKey();
    if (existing) {
      return existing;
    }

    const key = crypto.randomBytes(KEY_BYTES);
    try {
      await fs.promises.mkdir(path.dirname(this.keyPath), {
        recursive: true,
        mode: 0o700,
      });
      await fs.promises.writeFile(this.keyPath, key, { flag: "wx", mode: 0o600 });
      return key;
    } catch (error) {
      // Another process created it first
      if (errnoCode(error) === "EEXIST") {
        const created = await this.readKey();
        if (created) {
          return created;
        }
      }
      throw new PersistenceError(
        `Failed to create master key ${this.keyPath}`,
        error
      );
    }
  }

  private async readKey(): Promise<Buffer | undefined> {
    let key: Buffer;
    try {
      key = await fs.promises.readFile(this.keyPath);
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return undefined;
      }
      throw new PersistenceError(`Failed to read master key ${this.keyPath}`, error);
    }
    if (key.length !== KEY_BYTES) {
      throw new PersistenceError(`Master key ${this.keyPath} is corrupt`);
    }
    return key;
  }
}
