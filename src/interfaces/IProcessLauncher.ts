/**
 * Interface for resolving and starting applications
 */

import { LaunchedProcess } from "../types";

export interface IProcessLauncher {
  /**
   * Resolve an executable to an absolute path
   * @param candidate Absolute, relative or bare executable name
   * @returns Absolute path, or undefined when nothing matches
   */
  resolvePath(candidate: string): string | undefined;

  /**
   * Start an application detached from the gateway
   * @param executable Executable path or bare name
   * @param args Raw argument string
   * @param workingDirectory Existing directory to start in
   * @param signal Cancellation signal observed during the startup check
   * @throws ValidationError, SecurityError or ProcessError
   */
  launch(
    executable: string,
    args?: string,
    workingDirectory?: string,
    signal?: AbortSignal
  ): Promise<LaunchedProcess>;
}
