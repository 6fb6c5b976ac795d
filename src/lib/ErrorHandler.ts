/**
 * ErrorHandler - Centralized error handling and response formatting
 *
 * Provides structured error responses with error codes, clear messages,
 * and suggested remediation, and maps error codes to tool call statuses.
 */

import {
  ErrorCode,
  GatewayError,
  ProcessError,
  ToolCallStatus,
} from "../types";

/**
 * Structured error response
 */
export interface ErrorResponse {
  /** Status indicator (always "error") */
  status: "error";
  /** Error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable error message */
  message: string;
  /** Suggested remediation steps */
  remediation?: string;
  /** Additional error details */
  details?: Record<string, unknown>;
  /** Timestamp of the error */
  timestamp: string;
}

const DENIED_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.VALIDATION_ERROR,
  ErrorCode.TOOL_NOT_FOUND,
  ErrorCode.SECURITY_DENIED,
  ErrorCode.PROTECTED_PROCESS,
]);

const REMEDIATIONS: Record<ErrorCode, string> = {
  [ErrorCode.VALIDATION_ERROR]:
    "Correct the tool arguments and try again.",
  [ErrorCode.TOOL_NOT_FOUND]:
    "List the available tools and use one of the registered names.",
  [ErrorCode.SECURITY_DENIED]:
    "This operation is blocked by the security policy and cannot be performed.",
  [ErrorCode.PROTECTED_PROCESS]:
    "Critical system processes cannot be terminated.",
  [ErrorCode.NOT_FOUND]:
    "Verify the path is correct and the file or directory exists.",
  [ErrorCode.PROCESS_NOT_FOUND]:
    "Verify the process ID is correct. The process may have already exited.",
  [ErrorCode.EXECUTABLE_NOT_FOUND]:
    "Verify the executable path is correct or that the program is on the PATH.",
  [ErrorCode.TIMEOUT]:
    "The operation took longer than its timeout. Retry with a longer timeout.",
  [ErrorCode.CANCELLED]: "The operation was cancelled by the caller.",
  [ErrorCode.FAULTED]:
    "The operation failed. Check the error message for details.",
  [ErrorCode.SPAWN_FAILED]:
    "Check the executable path, permissions, and system resources.",
  [ErrorCode.PERMISSION_DENIED]:
    "Ensure you have the necessary permissions to perform this operation.",
  [ErrorCode.TERMINATION_FAILED]:
    "The process did not exit. It may be running with higher privileges.",
  [ErrorCode.PERSISTENCE_ERROR]:
    "The credential store could not be written. Check disk space and permissions.",
  [ErrorCode.INVALID_CONFIGURATION]:
    "Fix the configuration file and restart the gateway.",
  [ErrorCode.UNKNOWN_ERROR]:
    "An unknown error occurred. Check the error message for details.",
};

/**
 * Error check that also holds for errors created in another realm
 */
export function isErrorLike(error: unknown): error is Error {
  return (
    error instanceof Error ||
    (typeof error === "object" &&
      error !== null &&
      "message" in error &&
      typeof error.message === "string" &&
      "name" in error &&
      typeof error.name === "string")
  );
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return isErrorLike(error) ? error.message : String(error);
}

/**
 * errno code of a Node.js system error, when present
 */
export function errnoCode(error: unknown): string | undefined {
  // Errors raised by Node's own modules may come from another realm
  if (typeof error === "object" && error !== null && "code" in error) {
    const code: unknown = error.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * ErrorHandler class
 * Provides centralized error handling and response formatting
 */
export class ErrorHandler {
  /**
   * Format an error into a structured error response
   */
  static formatError(error: unknown): ErrorResponse {
    const timestamp = new Date().toISOString();

    if (error instanceof GatewayError) {
      return {
        status: "error",
        code: error.code,
        message: error.message,
        remediation: this.getRemediation(error.code),
        timestamp,
      };
    }

    if (isErrorLike(error)) {
      const code = this.inferErrorCode(error);
      return {
        status: "error",
        code,
        message: error.message,
        remediation: this.getRemediation(code),
        timestamp,
      };
    }

    return {
      status: "error",
      code: ErrorCode.UNKNOWN_ERROR,
      message: String(error),
      remediation: this.getRemediation(ErrorCode.UNKNOWN_ERROR),
      timestamp,
    };
  }

  /**
   * Convert any thrown value into a GatewayError
   */
  static normalize(error: unknown): GatewayError {
    if (error instanceof GatewayError) {
      return error;
    }
    if (isErrorLike(error)) {
      return new GatewayError(error.message, this.inferErrorCode(error), {
        cause: error,
      });
    }
    return new GatewayError(String(error), ErrorCode.UNKNOWN_ERROR);
  }

  /**
   * Map a spawn failure to a ProcessError
   */
  static handleSpawnError(error: Error, executable: string): ProcessError {
    const code = errnoCode(error);
    const message = error.message.toLowerCase();

    if (code === "ENOENT" || message.includes("not found")) {
      return new ProcessError(
        `Executable not found: ${executable}`,
        ErrorCode.EXECUTABLE_NOT_FOUND
      );
    }

    if (
      code === "EACCES" ||
      code === "EPERM" ||
      message.includes("permission denied")
    ) {
      return new ProcessError(
        `Permission denied: ${executable}`,
        ErrorCode.PERMISSION_DENIED
      );
    }

    if (code === "EMFILE") {
      return new ProcessError(
        "Too many open files",
        ErrorCode.SPAWN_FAILED
      );
    }

    return new ProcessError(
      `Failed to start process: ${error.message}`,
      ErrorCode.SPAWN_FAILED
    );
  }

  /**
   * Result status a failure with this code is reported under
   */
  static statusFor(code: ErrorCode): Exclude<ToolCallStatus, "completed"> {
    if (code === ErrorCode.TIMEOUT) {
      return "timed_out";
    }
    if (code === ErrorCode.CANCELLED) {
      return "cancelled";
    }
    return DENIED_CODES.has(code) ? "denied" : "faulted";
  }

  /**
   * Get remediation advice for an error code
   */
  static getRemediation(code: ErrorCode): string {
    return REMEDIATIONS[code];
  }

  /**
   * Infer an error code from a plain Error
   */
  private static inferErrorCode(error: Error): ErrorCode {
    switch (errnoCode(error)) {
      case "ENOENT":
      case "ENOTDIR":
        return ErrorCode.NOT_FOUND;
      case "EACCES":
      case "EPERM":
        return ErrorCode.PERMISSION_DENIED;
      case undefined:
        break;
      default:
        return ErrorCode.FAULTED;
    }

    const lowerMessage = error.message.toLowerCase();
    if (lowerMessage.includes("permission denied")) {
      return ErrorCode.PERMISSION_DENIED;
    }
    if (lowerMessage.includes("timed out")) {
      return ErrorCode.TIMEOUT;
    }
    return ErrorCode.FAULTED;
  }
}
