/**
 * NodeProcessTable - Host process table access
 *
 * Linux reads /proc; other POSIX systems use ps; Windows uses tasklist and
 * taskkill. On POSIX every process counts as having a main window, with
 * SIGTERM as the close request.
 */

import { execFile } from "child_process";
import * as fs from "fs";
import * as path from "path";
import { promisify } from "util";
import pidusage from "pidusage";
import { ProcessInfo } from "../types";
import { IProcessTable } from "../interfaces";
import { errnoCode, errorMessage } from "./ErrorHandler";

const execFileAsync = promisify(execFile);

/**
 * Exit status carried by a failed execFile call
 */
function exitStatus(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const code: unknown = error.code;
    return typeof code === "number" ? code : undefined;
  }
  return undefined;
}

/**
 * Parse quoted CSV rows as printed by tasklist /FO CSV
 */
export function parseCsvRows(output: string): string[][] {
  return output
    .split(/\r?\n/)
    .map((line) => Array.from(line.matchAll(/"([^"]*)"/g), (match) => match[1]))
    .filter((fields) => fields.length > 0);
}

/**
 * Turn a tasklist /V row into process info
 */
export function parseTasklistRow(fields: string[]): ProcessInfo | undefined {
  const [imageName, pidField] = fields;
  const pid = Number(pidField);
  if (!imageName || !Number.isInteger(pid)) {
    return undefined;
  }
  const title = fields[8];
  const windowTitle = title && title !== "N/A" ? title : undefined;
  return {
    pid,
    name: imageName,
    windowTitle,
    hasMainWindow: windowTitle !== undefined,
  };
}

/**
 * Process table backed by the operating system
 */
export class NodeProcessTable implements IProcessTable {
  private platform: NodeJS.Platform;

  constructor(platform: NodeJS.Platform = process.platform) {
    this.platform = platform;
  }

  async getProcess(pid: number): Promise<ProcessInfo | undefined> {
    if (this.platform === "win32") {
      const { stdout } = await execFileAsync("tasklist", [
        "/FI",
        `PID eq ${pid}`,
        "/FO",
        "CSV",
        "/NH",
        "/V",
      ]);
      const rows = parseCsvRows(stdout);
      return rows.length > 0 ? parseTasklistRow(rows[0]) : undefined;
    }

    if (this.platform === "linux") {
      const name = await this.readProcName(pid);
      return name === undefined
        ? undefined
        : { pid, name, hasMainWindow: true };
    }

    try {
      const { stdout } = await execFileAsync("ps", [
        "-p",
        String(pid),
        "-o",
        "comm=",
      ]);
      const comm = stdout.trim();
      return comm
        ? { pid, name: path.basename(comm), hasMainWindow: true }
        : undefined;
    } catch (error) {
      // ps exits with status 1 when the pid does not exist
      if (exitStatus(error) === 1) {
        return undefined;
      }
      throw error;
    }
  }

  async listProcesses(): Promise<ProcessInfo[]> {
    if (this.platform === "win32") {
      const { stdout } = await execFileAsync(
        "tasklist",
        ["/FO", "CSV", "/NH", "/V"],
        { maxBuffer: 16 * 1024 * 1024 }
      );
      return parseCsvRows(stdout).flatMap((row) => {
        const info = parseTasklistRow(row);
        return info ? [info] : [];
      });
    }

    if (this.platform === "linux") {
      const entries = await fs.promises.readdir("/proc");
      const pids = entries.filter((entry) => /^\d+$/.test(entry)).map(Number);
      const processes = await Promise.all(
        pids.map(async (pid): Promise<ProcessInfo | undefined> => {
          const name = await this.readProcName(pid);
          return name === undefined
            ? undefined
            : { pid, name, hasMainWindow: true };
        })
      );
      return processes.filter(
        (info): info is ProcessInfo => info !== undefined
      );
    }

    const { stdout } = await execFileAsync("ps", ["-A", "-o", "pid=,comm="], {
      maxBuffer: 16 * 1024 * 1024,
    });
    return stdout.split("\n").flatMap((line) => {
      const match = /^\s*(\d+)\s+(.+)$/.exec(line);
      return match
        ? [
            {
              pid: Number(match[1]),
              name: path.basename(match[2].trim()),
              hasMainWindow: true,
            },
          ]
        : [];
    });
  }

  isAlive(pid: number): boolean {
    try {
      process.kill(pid, 0);
    } catch (error) {
      // EPERM: exists but belongs to another user
      return errnoCode(error) === "EPERM";
    }

    if (this.platform === "linux") {
      try {
        const stat = fs.readFileSync(`/proc/${pid}/stat`, "utf8");
        // State follows the parenthesised command name; Z is a zombie
        const state = stat.charAt(stat.lastIndexOf(")") + 2);
        return state !== "Z" && state !== "X";
      } catch (error) {
        return errnoCode(error) !== "ENOENT";
      }
    }
    return true;
  }

  async requestClose(pid: number): Promise<void> {
    if (this.platform === "win32") {
      try {
        await this.taskkill(["/PID", String(pid)]);
      } catch (error) {
        // The caller still escalates to forceKill
        console.error(
          `[ProcessTable] Close request for PID ${pid} failed: ${errorMessage(error)}`
        );
      }
      return;
    }
    this.signal(pid, "SIGTERM");
  }

  async forceKill(pid: number): Promise<void> {
    if (this.platform === "win32") {
      await this.taskkill(["/F", "/PID", String(pid)]);
      return;
    }
    this.signal(pid, "SIGKILL");
  }

  async memoryUsage(pids: number[]): Promise<Map<number, number>> {
    const usage = new Map<number, number>();
    if (pids.length === 0) {
      return usage;
    }

    try {
      const stats = await pidusage(pids);
      for (const pid of pids) {
        usage.set(pid, stats[String(pid)]?.memory ?? 0);
      }
    } catch {
      // One unreadable pid fails the batch; fall back to reading one at a time
      await Promise.all(
        pids.map(async (pid) => {
          usage.set(pid, await this.readMemory(pid));
        })
      );
    } finally {
      pidusage.clear();
    }
    return usage;
  }

  private async readMemory(pid: number): Promise<number> {
    try {
      const stat = await pidusage(pid);
      return stat.memory;
    } catch {
      // Elevated or exited processes report no memory
      return 0;
    }
  }

  private async readProcName(pid: number): Promise<string | undefined> {
    try {
      const comm = await fs.promises.readFile(`/proc/${pid}/comm`, "utf8");
      return comm.trim();
    } catch (error) {
      const code = errnoCode(error);
      if (code === "ENOENT" || code === "ESRCH" || code === "EACCES") {
        return undefined;
      }
      throw error;
    }
  }

  private signal(pid: number, signal: NodeJS.Signals): void {
    try {
      process.kill(pid, signal);
    } catch (error) {
      // Already gone
      if (errnoCode(error) !== "ESRCH") {
        throw error;
      }
    }
  }

  private async taskkill(args: string[]): Promise<void> {
    try {
      await execFileAsync("taskkill", args);
    } catch (error) {
      // taskkill exits with 128 when the process no longer exists
      if (exitStatus(error) !== 128) {
        throw error;
      }
    }
  }
}
