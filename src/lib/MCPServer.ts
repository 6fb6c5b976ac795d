/**
 * MCP Server - Exposes the gateway's tools over the Model Context Protocol
 *
 * tools/list advertises every built-in and enabled extension tool; tools/call
 * goes through the dispatcher with the request's abort signal, so a
 * notifications/cancelled from the client cancels the call.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { ToolResult } from "../types";
import { ErrorHandler, ErrorResponse } from "./ErrorHandler";
import { Gateway } from "./Gateway";

export const SERVER_NAME = "command-gateway";
export const SERVER_VERSION = "0.1.0";

type CallToolResponse = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

/**
 * MCP payload of a tool result
 */
export function toCallToolResponse(result: ToolResult): CallToolResponse {
  if (result.success) {
    return { content: [{ type: "text", text: result.output }] };
  }
  const response: ErrorResponse = {
    status: "error",
    code: result.code,
    message: result.error,
    remediation: ErrorHandler.getRemediation(result.code),
    details: { status: result.status, durationMs: result.durationMs },
    timestamp: new Date().toISOString(),
  };
  return {
    content: [{ type: "text", text: JSON.stringify(response, null, 2) }],
    isError: true,
  };
}

/**
 * MCP Server
 */
export class MCPServer {
  private server: Server;
  private gateway: Gateway;
  private transport?: Transport;
  private isRunning: boolean = false;

  constructor(gateway: Gateway) {
    this.gateway = gateway;
    this.server = new Server(
      { name: SERVER_NAME, version: SERVER_VERSION },
      { capabilities: { tools: {} } }
    );
    this.server.onerror = (error) => {
      console.error("[MCP Server Error]", error);
    };
    this.registerHandlers();
  }

  /**
   * Serve over an arbitrary transport
   */
  async connect(transport: Transport): Promise<void> {
    if (this.isRunning) {
      throw new Error("Server is already running");
    }
    await this.server.connect(transport);
    this.transport = transport;
    this.isRunning = true;
    console.error(
      `[MCP Server] Serving ${this.gateway.dispatcher.listTools().length} tools`
    );
  }

  /**
   * Serve over stdio and shut down on SIGINT / SIGTERM
   */
  async start(): Promise<void> {
    console.error(`[MCP Server] Starting ${SERVER_NAME} v${SERVER_VERSION}`);
    try {
      await this.connect(new StdioServerTransport());
    } catch (error) {
      console.error("[MCP Server] Failed to start server:", error);
      throw error;
    }

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, () => {
        console.error(`[MCP Server] Received ${signal}, shutting down...`);
        this.shutdown().then(
          () => process.exit(0),
          (error: unknown) => {
            console.error("[MCP Server] Error during shutdown:", error);
            process.exit(1);
          }
        );
      });
    }
  }

  /**
   * Close the transport and release the gateway
   */
  async shutdown(): Promise<void> {
    if (!this.isRunning) {
      return;
    }
    console.error("[MCP Server] Shutting down gracefully...");
    this.isRunning = false;
    await this.gateway.close();
    await this.transport?.close();
    this.transport = undefined;
    console.error("[MCP Server] Shutdown complete");
  }

  getServer(): Server {
    return this.server;
  }

  isServerRunning(): boolean {
    return this.isRunning;
  }

  private registerHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.gateway.dispatcher.listTools(),
    }));

    this.server.setRequestHandler(
      CallToolRequestSchema,
      async (request, extra) => {
        const { name, arguments: args } = request.params;
        try {
          const result = await this.gateway.dispatcher.execute(name, args ?? {}, {
            signal: extra.signal,
          });
          return toCallToolResponse(result);
        } catch (error) {
          return {
            content: [
              {
                type: "text" as const,
                text: JSON.stringify(ErrorHandler.formatError(error), null, 2),
              },
            ],
            isError: true,
          };
        }
      }
    );
  }
}
