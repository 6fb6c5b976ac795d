/**
 * ToolDispatcher - Routes tool calls and produces result envelopes
 *
 * Every call moves through Received, Validating, then either Denied or
 * Executing, and ends Completed, TimedOut, Cancelled or Faulted. Whatever a
 * handler does, the caller gets a ToolResult back, never an exception.
 */

import {
  CancelledError,
  ErrorCode,
  GatewayError,
  SecurityError,
  ToolNotFoundError,
  ToolResult,
} from "../types";
import { IExtensionRegistry, ITimeoutManager } from "../interfaces";
import { ErrorHandler } from "./ErrorHandler";
import {
  BoundToolCall,
  Tool,
  ToolDescriptor,
  defineExtensionTool,
} from "./ToolDefinition";

export const EXTENSION_TOOL_PREFIX = "extension_";

export interface DispatchOptions {
  /** Timeout in milliseconds; 0 or less applies the default */
  timeoutMs?: number;
  /** External cancellation signal */
  signal?: AbortSignal;
}

export interface ToolDispatcherOptions {
  /** Write audit records to stderr */
  enableAuditLog?: boolean;
}

/**
 * ToolDispatcher class
 */
export class ToolDispatcher {
  private tools: Map<string, Tool> = new Map();
  private timeoutManager: ITimeoutManager;
  private extensions?: IExtensionRegistry;
  private enableAuditLog: boolean;

  constructor(
    timeoutManager: ITimeoutManager,
    extensions?: IExtensionRegistry,
    options: ToolDispatcherOptions = {}
  ) {
    this.timeoutManager = timeoutManager;
    this.extensions = extensions;
    this.enableAuditLog = options.enableAuditLog ?? false;
  }

  /**
   * Register a built-in tool
   * @throws Error if the name is taken or reserved for extensions
   */
  register(tool: Tool): void {
    if (tool.name.startsWith(EXTENSION_TOOL_PREFIX)) {
      throw new Error(
        `Tool name '${tool.name}' uses the reserved prefix '${EXTENSION_TOOL_PREFIX}'`
      );
    }
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool '${tool.name}' is already registered`);
    }
    this.tools.set(tool.name, tool);
  }

  /**
   * Register several built-in tools
   */
  registerAll(tools: Tool[]): void {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  /**
   * Descriptors of the built-in tools and every enabled extension tool
   */
  listTools(): ToolDescriptor[] {
    const builtins = Array.from(this.tools.values());
    const extensionTools = (this.extensions?.getActiveTools() ?? []).map(
      defineExtensionTool
    );
    return [...builtins, ...extensionTools].map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
    }));
  }

  /**
   * Execute a tool call
   */
  async execute(
    toolName: string,
    args: Record<string, unknown> = {},
    options: DispatchOptions = {}
  ): Promise<ToolResult> {
    const startedAt = Date.now();

    // Received
    if (options.signal?.aborted) {
      return this.fail(toolName, new CancelledError(), startedAt);
    }

    const tool = this.resolve(toolName);
    if (!tool) {
      return this.fail(toolName, new ToolNotFoundError(toolName), startedAt);
    }

    // Validating
    let call: BoundToolCall;
    try {
      call = tool.bind(args);
    } catch (error) {
      return this.fail(toolName, ErrorHandler.normalize(error), startedAt);
    }

    const scope = this.timeoutManager.begin(
      options.timeoutMs ?? 0,
      options.signal
    );
    try {
      const decision = await scope.race(call.authorize());
      if (!decision.allowed) {
        this.auditViolation(scope.callId, toolName, decision.reason);
        return this.fail(toolName, new SecurityError(decision.reason), startedAt);
      }

      // Executing
      scope.throwIfAborted();
      const output = await scope.race(call.execute(scope));

      const result: ToolResult = {
        success: true,
        status: "completed",
        output,
        durationMs: Date.now() - startedAt,
      };
      this.audit(scope.callId, toolName, result);
      return Object.freeze(result);
    } catch (error) {
      const result = this.fail(
        toolName,
        ErrorHandler.normalize(error),
        startedAt
      );
      this.audit(scope.callId, toolName, result);
      return result;
    } finally {
      scope.dispose();
    }
  }

  private resolve(toolName: string): Tool | undefined {
    const builtin = this.tools.get(toolName);
    if (builtin) {
      return builtin;
    }
    if (this.extensions && toolName.startsWith(EXTENSION_TOOL_PREFIX)) {
      const resolved = this.extensions.resolveTool(toolName);
      return resolved ? defineExtensionTool(resolved) : undefined;
    }
    return undefined;
  }

  private fail(
    toolName: string,
    error: GatewayError,
    startedAt: number
  ): ToolResult {
    const status = ErrorHandler.statusFor(error.code);
    if (error.code === ErrorCode.UNKNOWN_ERROR) {
      console.error(`[ToolDispatcher] Tool '${toolName}' failed:`, error);
    }
    const result: ToolResult = {
      success: false,
      status,
      error: error.message,
      code: error.code,
      durationMs: Date.now() - startedAt,
    };
    return Object.freeze(result);
  }

  private audit(callId: string, toolName: string, result: ToolResult): void {
    if (this.enableAuditLog) {
      console.error(
        JSON.stringify({
          timestamp: new Date().toISOString(),
          level: "AUDIT",
          callId,
          tool: toolName,
          status: result.status,
          durationMs: result.durationMs,
        })
      );
    }
  }

  private auditViolation(callId: string, toolName: string, reason: string): void {
    if (this.enableAuditLog) {
      console.error(
        JSON.stringify({
          timestamp: new Date().toISOString(),
          level: "SECURITY_VIOLATION",
          callId,
          tool: toolName,
          reason,
        })
      );
    }
  }
}
