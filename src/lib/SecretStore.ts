/**
 * SecretStore - Encrypted key-value credential store
 *
 * All values live in one JSON file mapping keys to base64 protected blobs.
 * Every mutation rewrites the file through a temp file and a rename, so the
 * file on disk is always either the old or the new mapping.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import PQueue from "p-queue";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { PersistenceError, ValidationError } from "../types";
import { ISecretStore, SecretProtector } from "../interfaces";
import { errnoCode, errorMessage } from "./ErrorHandler";
import { LocalKeyProtector } from "./SecretProtector";

const STORE_FILE = "secure_storage.dat";
const KEY_FILE = "master.key";

// Checked as entries: a record schema would drop a "__proto__" key
const storedEntriesSchema = z.array(z.tuple([z.string(), z.string()]));

function objectEntries(value: unknown): [string, unknown][] | undefined {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.entries(value)
    : undefined;
}

/**
 * Per-user data directory of the gateway
 */
export function defaultDataDirectory(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env
): string {
  if (platform === "win32") {
    return path.join(
      env.APPDATA ?? path.join(os.homedir(), "AppData", "Roaming"),
      "CommandGateway"
    );
  }
  if (platform === "darwin") {
    return path.join(
      os.homedir(),
      "Library",
      "Application Support",
      "CommandGateway"
    );
  }
  return path.join(
    env.XDG_CONFIG_HOME ?? path.join(os.homedir(), ".config"),
    "command-gateway"
  );
}

export interface SecretStoreOptions {
  /** Backing file (default: secure_storage.dat in the per-user data directory) */
  filePath?: string;
  /** Blob protector (default: LocalKeyProtector beside the backing file) */
  protector?: SecretProtector;
}

function assertKey(key: string): void {
  if (key.trim() === "") {
    throw new ValidationError("Key must not be empty");
  }
}

export class SecretStore implements ISecretStore {
  readonly filePath: string;
  private protector: SecretProtector;
  private queue = new PQueue({ concurrency: 1 });

  constructor(options: SecretStoreOptions = {}) {
    this.filePath =
      options.filePath ?? path.join(defaultDataDirectory(), STORE_FILE);
    this.protector =
      options.protector ??
      new LocalKeyProtector(path.join(path.dirname(this.filePath), KEY_FILE));
  }

  async store(key: string, value: string): Promise<void> {
    assertKey(key);
    await this.queue.add(async () => {
      const secrets = await this.readAll();
      const blob = await this.protector.protect(value);
      secrets.set(key, blob.toString("base64"));
      await this.writeAll(secrets);
    });
  }

  async retrieve(key: string): Promise<string | undefined> {
    assertKey(key);
    const blob = (await this.readAll()).get(key);
    if (blob === undefined) {
      return undefined;
    }
    try {
      return await this.protector.unprotect(Buffer.from(blob, "base64"));
    } catch (error) {
      console.error(
        `[SecretStore] Value for '${key}' could not be decrypted:`,
        error
      );
      return undefined;
    }
  }

  async delete(key: string): Promise<boolean> {
    assertKey(key);
    return this.queue.add(async () => {
      const secrets = await this.readAll();
      if (!secrets.delete(key)) {
        return false;
      }
      await this.writeAll(secrets);
      return true;
    });
  }

  async listKeys(): Promise<string[]> {
    return Array.from((await this.readAll()).keys()).sort();
  }

  async clear(): Promise<void> {
    await this.queue.add(() => this.writeAll(new Map()));
  }

  /**
   * Current mapping. A missing file is empty; so is a corrupt one.
   */
  private async readAll(): Promise<Map<string, string>> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, "utf8");
    } catch (error) {
      if (errnoCode(error) !== "ENOENT") {
        console.error(
          `[SecretStore] Failed to read ${this.filePath}, treating it as empty:`,
          error
        );
      }
      return new Map();
    }

    try {
      const parsed = storedEntriesSchema.safeParse(
        objectEntries(JSON.parse(content))
      );
      if (parsed.success) {
        return new Map(parsed.data);
      }
      console.error(
        `[SecretStore] ${this.filePath} has an unexpected shape, treating it as empty`
      );
    } catch (error) {
      console.error(
        `[SecretStore] ${this.filePath} is corrupt, treating it as empty:`,
        error
      );
    }
    return new Map();
  }

  private async writeAll(secrets: Map<string, string>): Promise<void> {
    const tempPath = `${this.filePath}.${uuidv4()}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), {
        recursive: true,
        mode: 0o700,
      });
      const handle = await fs.promises.open(tempPath, "wx", 0o600);
      try {
        await handle.writeFile(JSON.stringify(Object.fromEntries(secrets)), "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.promises.rename(tempPath, this.filePath);
    } catch (error) {
      await this.removeTemp(tempPath);
      throw new PersistenceError(
        `Failed to write credential store ${this.filePath}: ${errorMessage(
          error
        )}`,
        error
      );
    }
  }

  private async removeTemp(tempPath: string): Promise<void> {
    try {
      await fs.promises.unlink(tempPath);
    } catch (error) {
      if (errnoCode(error) !== "ENOENT") {
        console.error(`[SecretStore] Failed to remove ${tempPath}:`, error);
      }
    }
  }
}
