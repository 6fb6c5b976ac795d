/**
 * PathGuard - Filesystem checks for the file and text tools
 *
 * Responsibilities:
 * - Deny writes inside protected system locations
 * - Enforce the 10MB ceiling on reads and written content
 */

import * as fs from "fs";
import * as path from "path";
import { Minimatch } from "minimatch";
import { SecurityDecision } from "../types";
import { IPathGuard } from "../interfaces";
import { errnoCode } from "./ErrorHandler";

export const MAX_FILE_SIZE = 10 * 1024 * 1024;

const WINDOWS_PROTECTED_ROOTS = [
  "C:\\Windows",
  "C:\\Program Files",
  "C:\\Program Files (x86)",
  "C:\\ProgramData",
  "C:\\Users\\All Users",
  "C:\\Users\\Default",
  "C:\\Users\\Public",
  "C:\\$Recycle.Bin",
  "C:\\System Volume Information",
  "C:\\Boot",
  "C:\\Config.Msi",
  "C:\\Recovery",
  "C:\\inetpub",
];

const POSIX_PROTECTED_ROOTS = [
  "/etc",
  "/bin",
  "/sbin",
  "/usr/bin",
  "/usr/sbin",
  "/var/log",
  "/var/spool",
  "/proc",
  "/sys",
  "/dev",
  "/boot",
  "/root",
];

/**
 * Drive-letter or UNC path
 */
export function isWindowsStylePath(target: string): boolean {
  return /^[a-zA-Z]:([\\/]|$)/.test(target) || /^\\\\/.test(target);
}

function isInside(
  child: string,
  root: string,
  pathApi: path.PlatformPath
): boolean {
  const relative = pathApi.relative(root, child);
  if (relative === "") {
    return true;
  }
  return (
    relative !== ".." &&
    !relative.startsWith(`..${pathApi.sep}`) &&
    !pathApi.isAbsolute(relative)
  );
}

function sizeDenial(kind: "File" | "Content", bytes: number): SecurityDecision {
  return {
    allowed: false,
    reason: `${kind} too large: ${bytes} bytes exceeds the 10MB size limit`,
  };
}

export interface PathGuardOptions {
  /** Host platform; on win32 every path is a Windows path */
  platform?: NodeJS.Platform;
  /** Directory relative paths resolve against (default: process.cwd()) */
  cwd?: string;
}

export class PathGuard implements IPathGuard {
  private windowsRoots: string[];
  private posixRoots: string[];
  private patterns: Minimatch[] = [];
  private windowsHost: boolean;
  private cwd?: string;

  /**
   * @param additionalBlockedPaths Extra protected roots or glob patterns
   */
  constructor(
    additionalBlockedPaths: string[] = [],
    options: PathGuardOptions = {}
  ) {
    this.windowsHost = (options.platform ?? process.platform) === "win32";
    this.cwd = options.cwd;
    this.windowsRoots = [...WINDOWS_PROTECTED_ROOTS];
    this.posixRoots = [...POSIX_PROTECTED_ROOTS];

    for (const entry of additionalBlockedPaths) {
      // Decided without nocase, under which every letter counts as magic
      if (new Minimatch(entry).hasMagic()) {
        this.patterns.push(new Minimatch(entry, { dot: true, nocase: true }));
      } else if (this.windowsHost || isWindowsStylePath(entry)) {
        this.windowsRoots.push(this.resolveWindows(entry));
      } else {
        this.posixRoots.push(path.posix.resolve(this.cwd ?? process.cwd(), entry));
      }
    }
  }

  checkWrite(targetPath: string): SecurityDecision {
    const windows = this.windowsHost || isWindowsStylePath(targetPath);
    const pathApi: path.PlatformPath = windows ? path.win32 : path.posix;
    const resolved = windows
      ? this.resolveWindows(targetPath)
      : path.posix.resolve(this.cwd ?? process.cwd(), targetPath);
    const roots = windows ? this.windowsRoots : this.posixRoots;

    for (const root of roots) {
      if (isInside(resolved, root, pathApi)) {
        return this.denyWrite(targetPath, root);
      }
    }

    // Glob patterns are written with forward slashes
    const normalized = windows ? resolved.replace(/\\/g, "/") : resolved;
    for (const matcher of this.patterns) {
      if (matcher.match(normalized)) {
        return this.denyWrite(targetPath, matcher.pattern);
      }
    }

    return { allowed: true };
  }

  /**
   * Absolute win32 form; rooted paths without a drive take the drive of
   * the working directory
   */
  private resolveWindows(target: string): string {
    const cwd = this.cwd ?? process.cwd();
    return this.windowsHost || isWindowsStylePath(cwd)
      ? path.win32.resolve(cwd, target)
      : path.win32.resolve(target);
  }

  async checkRead(targetPath: string): Promise<SecurityDecision> {
    try {
      const stats = await fs.promises.stat(targetPath);
      if (stats.isFile() && stats.size > MAX_FILE_SIZE) {
        return sizeDenial("File", stats.size);
      }
      return { allowed: true };
    } catch (error) {
      const code = errnoCode(error);
      if (code === "ENOENT" || code === "ENOTDIR") {
        return { allowed: true };
      }
      throw error;
    }
  }

  checkContentSize(bytes: number): SecurityDecision {
    return bytes > MAX_FILE_SIZE
      ? sizeDenial("Content", bytes)
      : { allowed: true };
  }

  private denyWrite(targetPath: string, root: string): SecurityDecision {
    return {
      allowed: false,
      reason: `Access denied: '${targetPath}' is inside the protected system path '${root}'`,
    };
  }
}
