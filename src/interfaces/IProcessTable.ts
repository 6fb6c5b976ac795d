/**
 * IProcessTable - Read and signal access to the host process table
 */

import { ProcessInfo } from "../types";

export interface IProcessTable {
  /**
   * Look up a single process
   * @returns Process info, or undefined when no such process exists
   */
  getProcess(pid: number): Promise<ProcessInfo | undefined>;

  /**
   * Snapshot of every visible process
   */
  listProcesses(): Promise<ProcessInfo[]>;

  /**
   * Whether the process is still running
   */
  isAlive(pid: number): boolean;

  /**
   * Ask the process to close (window close request or SIGTERM)
   */
  requestClose(pid: number): Promise<void>;

  /**
   * Kill the process unconditionally
   */
  forceKill(pid: number): Promise<void>;

  /**
   * Resident memory in bytes per pid. Pids whose read fails map to 0.
   */
  memoryUsage(pids: number[]): Promise<Map<number, number>>;
}
