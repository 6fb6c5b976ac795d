/**
 * IProcessTerminator - Interface for process termination
 */

import { TerminationResult } from "../types";

export interface IProcessTerminator {
  /**
   * Close a process, gracefully when it has a main window, then by force
   * @param pid Process ID
   * @param signal Cancellation signal observed while polling for exit
   * @throws ValidationError for an invalid pid
   * @throws ProcessError when the process does not exist or survives
   * @throws ProtectedProcessError for critical system processes
   */
  terminate(pid: number, signal?: AbortSignal): Promise<TerminationResult>;

  /**
   * Whether a process name belongs to the critical system set
   */
  isProtected(processName: string): boolean;
}
