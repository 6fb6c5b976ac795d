#!/usr/bin/env node
/**
 * Command Gateway - CLI Entry Point
 *
 * Starts the gateway's MCP server with stdio transport.
 * Configuration is loaded from file or environment.
 */

import { MCPServer } from "./lib/MCPServer";
import {
  CONFIG_JSON_ENV,
  CONFIG_PATH_ENV,
  ConfigLoader,
} from "./lib/ConfigLoader";
import { createGateway } from "./lib/Gateway";
import { GatewayConfig } from "./types";

const HELP = `
Command Gateway - Local tool execution for AI agents

Usage:
  command-gateway [options]

Options:
  --help, -h              Show this help message
  --create-config <path>  Create a sample configuration file
  --config <path>         Load configuration from specified file

Environment Variables:
  ${CONFIG_PATH_ENV}  Path to configuration file
  ${CONFIG_JSON_ENV}       JSON configuration string

Configuration:
  The gateway looks for configuration in the following order:
  1. --config command line argument
  2. ${CONFIG_PATH_ENV} environment variable
  3. ${CONFIG_JSON_ENV} environment variable
  4. ./command-gateway.json
  5. ./config/command-gateway.json

Security:
  - Blocked executables and destructive command patterns are refused
  - Writes inside protected system paths are refused
  - Critical system processes cannot be terminated
  - Every call is audited to stderr unless enableAuditLog is false
`;

function optionValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  return index === -1 ? undefined : argv[index + 1];
}

function resolveConfig(argv: string[]): GatewayConfig {
  if (argv.includes("--config")) {
    const configPath = optionValue(argv, "--config");
    if (!configPath) {
      throw new Error("--config requires a path argument");
    }
    return ConfigLoader.loadFromFile(configPath);
  }
  if (!process.env[CONFIG_PATH_ENV] && process.env[CONFIG_JSON_ENV]) {
    return ConfigLoader.loadFromEnv();
  }
  return ConfigLoader.load();
}

async function main(argv: string[]): Promise<void> {
  if (argv.includes("--help") || argv.includes("-h")) {
    console.error(HELP);
    return;
  }

  if (argv.includes("--create-config")) {
    ConfigLoader.createSampleConfig(
      optionValue(argv, "--create-config") ?? "./command-gateway.json"
    );
    return;
  }

  const gateway = await createGateway(resolveConfig(argv));
  const server = new MCPServer(gateway);
  await server.start();
}

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
