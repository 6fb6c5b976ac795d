/**
 * ProcessLauncher - Resolves and starts applications
 *
 * Responsibilities:
 * - Resolve bare executable names against the search path
 * - Re-check the security policy against the resolved path
 * - Spawn detached, without a shell
 * - Detect processes that crash right after starting
 */

import { spawn, ChildProcess } from "child_process";
import * as fs from "fs";
import * as path from "path";
import which from "which";
import {
  ErrorCode,
  LaunchedProcess,
  ProcessError,
  SecurityError,
  ValidationError,
} from "../types";
import { IProcessLauncher, ISecurityPolicy } from "../interfaces";
import { ErrorHandler, isErrorLike } from "./ErrorHandler";
import { abortReason } from "./TimeoutManager";

const WINDOWS_PATH_EXTENSIONS = ".EXE;.COM;.BAT;.CMD";

export interface ProcessLauncherOptions {
  /** Search path for bare names (default: PATH) */
  searchPath?: string;
  /** How long a new process is watched for an immediate crash (default: 100ms) */
  startupCheckMs?: number;
  platform?: NodeJS.Platform;
}

/**
 * Split an argument string on whitespace, keeping quoted runs together
 */
export function splitArguments(argumentString: string): string[] {
  const args: string[] = [];
  let current = "";
  let quote: string | undefined;
  let pending = false;

  for (const char of argumentString) {
    if (quote) {
      if (char === quote) {
        quote = undefined;
      } else {
        current += char;
      }
    } else if (char === '"' || char === "'") {
      quote = char;
      pending = true;
    } else if (/\s/.test(char)) {
      if (pending) {
        args.push(current);
        current = "";
        pending = false;
      }
    } else {
      current += char;
      pending = true;
    }
  }

  if (pending) {
    args.push(current);
  }
  return args;
}

function isFile(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

function isDirectory(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isDirectory();
  } catch {
    return false;
  }
}

export class ProcessLauncher implements IProcessLauncher {
  private policy: ISecurityPolicy;
  private searchPath?: string;
  private startupCheckMs: number;
  private platform: NodeJS.Platform;

  constructor(policy: ISecurityPolicy, options: ProcessLauncherOptions = {}) {
    this.policy = policy;
    this.searchPath = options.searchPath;
    this.startupCheckMs = options.startupCheckMs ?? 100;
    this.platform = options.platform ?? process.platform;
  }

  resolvePath(candidate: string): string | undefined {
    const trimmed = candidate.trim();
    if (!trimmed) {
      return undefined;
    }

    const absolute = path.resolve(trimmed);
    if (isFile(absolute)) {
      return absolute;
    }
    if (path.isAbsolute(trimmed)) {
      return undefined;
    }

    const found = which.sync(trimmed, {
      nothrow: true,
      path: this.searchPath ?? process.env.PATH ?? "",
      pathExt: WINDOWS_PATH_EXTENSIONS,
    });
    return found ?? undefined;
  }

  async launch(
    executable: string,
    args: string = "",
    workingDirectory?: string,
    signal?: AbortSignal
  ): Promise<LaunchedProcess> {
    if (workingDirectory !== undefined && !isDirectory(workingDirectory)) {
      throw new ValidationError(
        `Working directory '${workingDirectory}' does not exist`
      );
    }

    const resolved = this.resolvePath(executable);
    if (!resolved) {
      throw new ProcessError(
        `Application '${executable}' was not found`,
        ErrorCode.EXECUTABLE_NOT_FOUND
      );
    }

    // The resolved file may carry a different name than the one asked for
    const decision = this.policy.evaluate(resolved, args);
    if (!decision.allowed) {
      throw new SecurityError(decision.reason);
    }

    if (signal?.aborted) {
      throw abortReason(signal);
    }

    let child: ChildProcess;
    try {
      child = this.spawnDetached(resolved, args, workingDirectory);
    } catch (error) {
      throw ErrorHandler.handleSpawnError(
        isErrorLike(error) ? error : new Error(String(error)),
        resolved
      );
    }

    return this.watchStartup(child, resolved, signal);
  }

  private spawnDetached(
    resolved: string,
    args: string,
    workingDirectory?: string
  ): ChildProcess {
    const windows = this.platform === "win32";
    const argv = windows ? (args.trim() ? [args] : []) : splitArguments(args);

    return spawn(resolved, argv, {
      cwd: workingDirectory,
      detached: true,
      stdio: "ignore",
      shell: false,
      windowsHide: false,
      // Windows receives the argument string exactly as written
      windowsVerbatimArguments: windows,
    });
  }

  /**
   * Resolve once the process has survived the startup window
   */
  private watchStartup(
    child: ChildProcess,
    resolved: string,
    signal?: AbortSignal
  ): Promise<LaunchedProcess> {
    const name = path.basename(resolved);

    return new Promise<LaunchedProcess>((resolve, reject) => {
      let settled = false;

      const settle = (action: () => void) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        child.removeListener("exit", onExit);
        action();
      };

      const onAbort = () => {
        settle(() => {
          child.kill();
          child.unref();
          reject(signal ? abortReason(signal) : new ProcessError("Launch aborted"));
        });
      };

      const onExit = (code: number | null, exitSignal: NodeJS.Signals | null) => {
        if (code === 0) {
          return;
        }
        const detail =
          code !== null ? `exit code ${code}` : `signal ${exitSignal ?? "unknown"}`;
        settle(() =>
          reject(
            new ProcessError(
              `Application '${name}' exited immediately after launch (${detail})`,
              ErrorCode.FAULTED
            )
          )
        );
      };

      child.on("error", (error) => {
        if (settled) {
          console.error(`[ProcessLauncher] ${name} reported an error:`, error);
          return;
        }
        settle(() => reject(ErrorHandler.handleSpawnError(error, resolved)));
      });
      child.on("exit", onExit);
      signal?.addEventListener("abort", onAbort, { once: true });

      const timer = setTimeout(() => {
        settle(() => {
          const pid = child.pid;
          child.unref();
          if (pid === undefined) {
            reject(
              new ProcessError(
                `Failed to start process: ${name}`,
                ErrorCode.SPAWN_FAILED
              )
            );
            return;
          }
          resolve({ pid, path: resolved });
        });
      }, this.startupCheckMs);
    });
  }
}
