/**
 * Core type definitions for the Command Gateway
 */

/**
 * Error codes for every failure the gateway can report
 */
export enum ErrorCode {
  // Request validation
  VALIDATION_ERROR = "VALIDATION_ERROR",
  TOOL_NOT_FOUND = "TOOL_NOT_FOUND",

  // Policy
  SECURITY_DENIED = "SECURITY_DENIED",
  PROTECTED_PROCESS = "PROTECTED_PROCESS",

  // Lookup
  NOT_FOUND = "NOT_FOUND",
  PROCESS_NOT_FOUND = "PROCESS_NOT_FOUND",
  EXECUTABLE_NOT_FOUND = "EXECUTABLE_NOT_FOUND",

  // Execution
  TIMEOUT = "TIMEOUT",
  CANCELLED = "CANCELLED",
  FAULTED = "FAULTED",
  SPAWN_FAILED = "SPAWN_FAILED",
  PERMISSION_DENIED = "PERMISSION_DENIED",
  TERMINATION_FAILED = "TERMINATION_FAILED",

  // Persistence
  PERSISTENCE_ERROR = "PERSISTENCE_ERROR",

  // Configuration
  INVALID_CONFIGURATION = "INVALID_CONFIGURATION",

  UNKNOWN_ERROR = "UNKNOWN_ERROR",
}

/**
 * Terminal state of a tool call
 */
export type ToolCallStatus =
  | "completed"
  | "denied"
  | "timed_out"
  | "cancelled"
  | "faulted";

/**
 * Result envelope returned for every tool call.
 * A completed call carries output, every other status carries an error.
 */
export type ToolResult =
  | {
      readonly success: true;
      readonly status: "completed";
      readonly output: string;
      readonly durationMs: number;
    }
  | {
      readonly success: false;
      readonly status: Exclude<ToolCallStatus, "completed">;
      readonly error: string;
      readonly code: ErrorCode;
      readonly durationMs: number;
    };

/**
 * A single request from the planning loop
 */
export interface ToolCallRequest {
  /** Tool name */
  tool: string;
  /** Flat argument map as produced by the model */
  arguments: Record<string, unknown>;
  /** Timeout in milliseconds */
  timeoutMs: number;
  /** External cancellation signal */
  signal?: AbortSignal;
}

/**
 * Verdict of a policy check. A reason is present iff the request was denied.
 */
export type SecurityDecision =
  | { readonly allowed: true }
  | { readonly allowed: false; readonly reason: string };

/**
 * A process as reported by the host process table
 */
export interface ProcessInfo {
  pid: number;
  /** Image name without directory */
  name: string;
  /** Main window title, when the platform reports one */
  windowTitle?: string;
  /** Whether the process accepts a graceful close request */
  hasMainWindow: boolean;
}

/**
 * Entry of the running-process listing
 */
export interface RunningProcess {
  pid: number;
  name: string;
  windowTitle?: string;
  memoryMB: number;
}

/**
 * Process started by the launcher
 */
export interface LaunchedProcess {
  pid: number;
  /** Resolved executable path */
  path: string;
}

/**
 * Outcome of a successful termination
 */
export interface TerminationResult {
  pid: number;
  name: string;
  reason: "graceful" | "forced";
}

/**
 * Public view of a loaded extension
 */
export interface ExtensionDescriptor {
  name: string;
  version: string;
  /** Package path the extension was loaded from ("<registered>" when linked in) */
  originPath: string;
  enabled: boolean;
  installedAt: Date;
  lastUsedAt?: Date;
  /** Qualified names of the tools it contributes */
  tools: string[];
}

/**
 * Gateway configuration
 */
export interface GatewayConfig {
  /** Directory scanned for extension packages (created on demand) */
  extensionsDirectory: string;
  /** Backing file of the credential store (per-user default when omitted) */
  secretStorePath?: string;
  /** Timeout applied to tool calls that do not carry one */
  defaultTimeoutMs: number;
  /** Extra write-protected paths: absolute paths or glob patterns */
  additionalBlockedPaths: string[];
  /** Write audit records to stderr */
  enableAuditLog: boolean;
  /** How long a graceful close may take before forcing */
  terminationGraceMs: number;
  /** How long a forced termination may take before giving up */
  terminationForceMs: number;
}

/**
 * Base class of all gateway errors
 */
export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "GatewayError";
  }
}

/**
 * Arguments did not match the tool's declared shape
 */
export class ValidationError extends GatewayError {
  constructor(message: string) {
    super(message, ErrorCode.VALIDATION_ERROR);
    this.name = "ValidationError";
  }
}

/**
 * Security error class
 */
export class SecurityError extends GatewayError {
  constructor(message: string) {
    super(message, ErrorCode.SECURITY_DENIED);
    this.name = "SecurityError";
  }
}

export class ToolNotFoundError extends GatewayError {
  constructor(public readonly toolName: string) {
    super(`Tool '${toolName}' not found`, ErrorCode.TOOL_NOT_FOUND);
    this.name = "ToolNotFoundError";
  }
}

/**
 * Process error class
 */
export class ProcessError extends GatewayError {
  constructor(message: string, code: ErrorCode = ErrorCode.FAULTED) {
    super(message, code);
    this.name = "ProcessError";
  }
}

/**
 * Raised when a critical system process is targeted
 */
export class ProtectedProcessError extends GatewayError {
  constructor(public readonly pid: number, public readonly processName: string) {
    super(
      `System process '${processName}' (PID: ${pid}) is protected and cannot be terminated`,
      ErrorCode.PROTECTED_PROCESS
    );
    this.name = "ProtectedProcessError";
  }
}

/**
 * Credential store could not be written
 */
export class PersistenceError extends GatewayError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCode.PERSISTENCE_ERROR, { cause });
    this.name = "PersistenceError";
  }
}

export class TimeoutError extends GatewayError {
  constructor(public readonly timeoutMs: number) {
    super(`Execution timed out after ${timeoutMs}ms`, ErrorCode.TIMEOUT);
    this.name = "TimeoutError";
  }
}

export class CancelledError extends GatewayError {
  constructor(message: string = "Execution was cancelled") {
    super(message, ErrorCode.CANCELLED);
    this.name = "CancelledError";
  }
}
