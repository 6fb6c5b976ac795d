/**
 * ProcessTerminator - Handles process termination
 *
 * Responsibilities:
 * - Refuse to touch critical system processes
 * - Request a graceful close when the process has a main window
 * - Escalate to forced termination when the close request is ignored
 * - Poll for exit against the caller's cancellation signal
 */

import { setTimeout as delay } from "timers/promises";
import {
  ErrorCode,
  ProcessError,
  ProtectedProcessError,
  TerminationResult,
  ValidationError,
} from "../types";
import { IProcessTable, IProcessTerminator } from "../interfaces";
import { abortReason } from "./TimeoutManager";

// Session and login managers, window managers, and core service hosts
const CRITICAL_PROCESSES = new Set([
  // Windows
  "system",
  "registry",
  "smss",
  "csrss",
  "wininit",
  "services",
  "lsass",
  "svchost",
  "explorer",
  "winlogon",
  "fontdrvhost",
  "dwm",
  "memory compression",
  "secure system",
  // Linux
  "init",
  "systemd",
  "systemd-logind",
  "gdm",
  "sddm",
  "lightdm",
  "xorg",
  "xwayland",
  "gnome-shell",
  "kwin_x11",
  "kwin_wayland",
  // macOS
  "launchd",
  "loginwindow",
  "windowserver",
  "kernel_task",
]);

export interface ProcessTerminatorOptions {
  /** How long a graceful close may take (default: 3000ms) */
  gracefulTimeoutMs?: number;
  /** How long forced termination may take (default: 5000ms) */
  forceTimeoutMs?: number;
  /** Interval between liveness checks (default: 100ms) */
  pollIntervalMs?: number;
}

export class ProcessTerminator implements IProcessTerminator {
  private table: IProcessTable;
  private gracefulTimeoutMs: number;
  private forceTimeoutMs: number;
  private pollIntervalMs: number;

  constructor(table: IProcessTable, options: ProcessTerminatorOptions = {}) {
    this.table = table;
    this.gracefulTimeoutMs = options.gracefulTimeoutMs ?? 3000;
    this.forceTimeoutMs = options.forceTimeoutMs ?? 5000;
    this.pollIntervalMs = options.pollIntervalMs ?? 100;
  }

  /**
   * Terminate a process, gracefully first when it has a main window
   * @param pid Process ID
   * @param signal Cancellation signal checked at every poll
   * @returns How the process ended
   */
  async terminate(
    pid: number,
    signal?: AbortSignal
  ): Promise<TerminationResult> {
    if (!Number.isInteger(pid) || pid <= 0) {
      throw new ValidationError(
        `Invalid process ID: ${pid}. Must be a positive integer`
      );
    }

    const info = await this.table.getProcess(pid);
    if (!info) {
      throw new ProcessError(
        `Process ID ${pid} was not found`,
        ErrorCode.PROCESS_NOT_FOUND
      );
    }

    if (this.isProtected(info.name)) {
      throw new ProtectedProcessError(pid, info.name);
    }

    if (info.hasMainWindow) {
      await this.table.requestClose(pid);
      if (await this.waitForExit(pid, this.gracefulTimeoutMs, signal)) {
        return { pid, name: info.name, reason: "graceful" };
      }
    }

    await this.table.forceKill(pid);
    if (await this.waitForExit(pid, this.forceTimeoutMs, signal)) {
      return { pid, name: info.name, reason: "forced" };
    }

    throw new ProcessError(
      `Failed to terminate application '${info.name}' (PID: ${pid})`,
      ErrorCode.TERMINATION_FAILED
    );
  }

  isProtected(processName: string): boolean {
    const normalized = processName.trim().toLowerCase().replace(/\.exe$/, "");
    return CRITICAL_PROCESSES.has(normalized);
  }

  /**
   * Poll until the process is gone or the timeout elapses
   * @returns True if the process exited
   */
  private async waitForExit(
    pid: number,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }
      if (!this.table.isAlive(pid)) {
        return true;
      }
      if (Date.now() >= deadline) {
        return false;
      }

      try {
        await delay(this.pollIntervalMs, undefined, { signal });
      } catch (error) {
        if (signal?.aborted) {
          throw abortReason(signal);
        }
        throw error;
      }
    }
  }
}
