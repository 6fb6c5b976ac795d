/**
 * ProcessManager - Process lifecycle facade
 *
 * Responsibilities:
 * - Resolve and launch applications
 * - Terminate applications
 * - List running processes with their memory use
 */

import {
  LaunchedProcess,
  RunningProcess,
  TerminationResult,
} from "../types";
import {
  IProcessLauncher,
  IProcessTable,
  IProcessTerminator,
} from "../interfaces";

const BYTES_PER_MB = 1024 * 1024;

/**
 * ProcessManager implementation
 */
export class ProcessManager {
  private launcher: IProcessLauncher;
  private terminator: IProcessTerminator;
  private table: IProcessTable;

  constructor(
    launcher: IProcessLauncher,
    terminator: IProcessTerminator,
    table: IProcessTable
  ) {
    this.launcher = launcher;
    this.terminator = terminator;
    this.table = table;
  }

  resolvePath(candidate: string): string | undefined {
    return this.launcher.resolvePath(candidate);
  }

  launch(
    executable: string,
    args?: string,
    workingDirectory?: string,
    signal?: AbortSignal
  ): Promise<LaunchedProcess> {
    return this.launcher.launch(executable, args, workingDirectory, signal);
  }

  terminate(pid: number, signal?: AbortSignal): Promise<TerminationResult> {
    return this.terminator.terminate(pid, signal);
  }

  isProtected(processName: string): boolean {
    return this.terminator.isProtected(processName);
  }

  /**
   * Snapshot of running processes, sorted by name then pid
   */
  async listRunning(): Promise<RunningProcess[]> {
    const processes = (await this.table.listProcesses()).filter(
      (info) => info.name.trim() !== ""
    );
    const memory = await this.table.memoryUsage(
      processes.map((info) => info.pid)
    );

    return processes
      .map((info) => ({
        pid: info.pid,
        name: info.name,
        windowTitle: info.windowTitle,
        memoryMB: Math.floor((memory.get(info.pid) ?? 0) / BYTES_PER_MB),
      }))
      .sort(
        (a, b) =>
          a.name.localeCompare(b.name, undefined, { sensitivity: "base" }) ||
          a.pid - b.pid
      );
  }
}
