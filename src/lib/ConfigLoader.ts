/**
 * Configuration Loader
 *
 * Loads and validates gateway configuration from file or environment.
 * Values the source leaves out fall back to DEFAULT_GATEWAY_CONFIG.
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { ErrorCode, GatewayConfig, GatewayError } from "../types";
import { errorMessage } from "./ErrorHandler";
import { defaultDataDirectory } from "./SecretStore";

export const CONFIG_PATH_ENV = "COMMAND_GATEWAY_CONFIG_PATH";
export const CONFIG_JSON_ENV = "COMMAND_GATEWAY_CONFIG";

/**
 * Default gateway configuration
 */
export const DEFAULT_GATEWAY_CONFIG: GatewayConfig = {
  extensionsDirectory: path.join(defaultDataDirectory(), "extensions"),
  defaultTimeoutMs: 30000,
  additionalBlockedPaths: [],
  enableAuditLog: true,
  terminationGraceMs: 3000,
  terminationForceMs: 5000,
};

const positiveMs = z.number().int().positive();

const configSchema = z
  .object({
    extensionsDirectory: z.string().trim().min(1),
    secretStorePath: z.string().trim().min(1),
    defaultTimeoutMs: positiveMs,
    additionalBlockedPaths: z.array(z.string().trim().min(1)),
    enableAuditLog: z.boolean(),
    terminationGraceMs: positiveMs,
    terminationForceMs: positiveMs,
  })
  .partial()
  .strict();

function configurationError(message: string, cause?: unknown): GatewayError {
  return new GatewayError(
    `Configuration error: ${message}`,
    ErrorCode.INVALID_CONFIGURATION,
    { cause }
  );
}

/**
 * Configuration loader class
 */
export class ConfigLoader {
  /**
   * Load configuration from file
   * @throws GatewayError (INVALID_CONFIGURATION) when missing or invalid
   */
  static loadFromFile(configPath: string): GatewayConfig {
    const absolutePath = path.resolve(configPath);
    console.error(`[ConfigLoader] Loading configuration from: ${absolutePath}`);

    let content: string;
    try {
      content = fs.readFileSync(absolutePath, "utf-8");
    } catch (error) {
      throw configurationError(
        `configuration file not found: ${absolutePath}`,
        error
      );
    }
    // Relative directories in a file are relative to the file
    return this.parse(content, path.dirname(absolutePath));
  }

  /**
   * Load configuration from a JSON environment variable
   */
  static loadFromEnv(envVar: string = CONFIG_JSON_ENV): GatewayConfig {
    const configJson = process.env[envVar];
    if (!configJson) {
      throw configurationError(`environment variable ${envVar} not set`);
    }
    return this.parse(configJson, process.cwd());
  }

  /**
   * Load configuration with fallback chain:
   * 1. File named by COMMAND_GATEWAY_CONFIG_PATH
   * 2. ./command-gateway.json, then ./config/command-gateway.json
   * 3. Defaults
   */
  static load(): GatewayConfig {
    const configPath = process.env[CONFIG_PATH_ENV];
    if (configPath) {
      try {
        return this.loadFromFile(configPath);
      } catch (error) {
        console.error("[ConfigLoader] Failed to load from env path:", error);
      }
    }

    const defaultPaths = [
      path.join(process.cwd(), "command-gateway.json"),
      path.join(process.cwd(), "config", "command-gateway.json"),
    ];
    for (const defaultPath of defaultPaths) {
      if (fs.existsSync(defaultPath)) {
        try {
          return this.loadFromFile(defaultPath);
        } catch (error) {
          console.error(
            `[ConfigLoader] Failed to load from ${defaultPath}:`,
            error
          );
        }
      }
    }

    console.error("[ConfigLoader] No configuration file found, using defaults");
    return { ...DEFAULT_GATEWAY_CONFIG, additionalBlockedPaths: [] };
  }

  /**
   * Write a sample configuration file
   */
  static createSampleConfig(outputPath: string): void {
    const sample: GatewayConfig = {
      ...DEFAULT_GATEWAY_CONFIG,
      extensionsDirectory: "./extensions",
      additionalBlockedPaths: ["/srv/backups", "**/.ssh/**"],
    };
    fs.writeFileSync(outputPath, JSON.stringify(sample, null, 2) + "\n");
    console.error(`[ConfigLoader] Sample configuration written to: ${outputPath}`);
  }

  /**
   * Validate JSON text and merge it over the defaults
   */
  private static parse(json: string, baseDirectory: string): GatewayConfig {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error) {
      throw configurationError(
        `invalid JSON: ${errorMessage(error)}`,
        error
      );
    }

    const result = configSchema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw configurationError(
        `${issue.path.join(".") || "configuration"}: ${issue.message}`
      );
    }
    const overrides = result.data;

    const merged: GatewayConfig = {
      ...DEFAULT_GATEWAY_CONFIG,
      ...overrides,
      additionalBlockedPaths: overrides.additionalBlockedPaths ?? [],
    };
    if (overrides.extensionsDirectory) {
      merged.extensionsDirectory = path.resolve(
        baseDirectory,
        overrides.extensionsDirectory
      );
    }
    if (overrides.secretStorePath) {
      merged.secretStorePath = path.resolve(
        baseDirectory,
        overrides.secretStorePath
      );
    }

    console.error("[ConfigLoader] Configuration loaded successfully");
    console.error(
      `[ConfigLoader] Extensions directory: ${merged.extensionsDirectory}`
    );
    console.error(
      `[ConfigLoader] Additional blocked paths: ${merged.additionalBlockedPaths.length}`
    );
    return merged;
  }
}
