/**
 * SecurityPolicy - Fixed deny-list evaluation for process launches
 *
 * Evaluates a (path, argument string) pair in three layers, stopping at the
 * first denial:
 * 1. Executable name against blocked tools (registry, disk, boot, ACL, scheduling)
 * 2. Full command line against destructive command signatures
 * 3. Shell and script hosts: argument string against dangerous operations
 *
 * The lists are curated and fixed. Anything that matches none of them is
 * allowed; there is no allowlist.
 */

import * as path from "path";
import { SecurityDecision } from "../types";
import { ISecurityPolicy } from "../interfaces";

interface CommandSignature {
  pattern: RegExp;
  description: string;
}

const EXECUTABLE_EXTENSIONS = [".exe", ".com", ".bat", ".cmd"];

// Compared against the lower-cased file name with its executable extension removed
const BLOCKED_EXECUTABLES = new Set([
  // Registry editors
  "regedit",
  "regedt32",
  "reg",
  // Partitioning and formatting
  "format",
  "diskpart",
  "fdisk",
  "sfdisk",
  "parted",
  "mkfs",
  "wipefs",
  // Backup and shadow copies
  "vssadmin",
  "wbadmin",
  // Boot configuration
  "bcdedit",
  "bootrec",
  "efibootmgr",
  "grub-install",
  // ACL and ownership
  "takeown",
  "icacls",
  "cacls",
  "attrib",
  "chown",
  "chgrp",
  "setfacl",
  // Low-level disk and file tools
  "fsutil",
  "cipher",
  "dd",
  "shred",
  // Accounts and services
  "net",
  "net1",
  "sc",
  // Scheduling
  "schtasks",
  "at",
  "crontab",
  // Legacy debuggers and editors
  "debug",
  "debug64",
  "edlin",
  "edlin64",
]);

const DANGEROUS_SIGNATURES: CommandSignature[] = [
  {
    pattern: /\bdel\s+\/[fq]\s+.*[a-z]:\\/i,
    description: "forced delete on a system drive",
  },
  {
    pattern: /\b(rmdir|rd)\s+\/[sq]\s+.*[a-z]:\\/i,
    description: "recursive directory removal on a system drive",
  },
  {
    pattern: /\brm\s+(-[a-z]*r[a-z]*f[a-z]*|-[a-z]*f[a-z]*r[a-z]*|--recursive\s+--force|--force\s+--recursive)\s+(\/|~|\/\*)(\s|$)/i,
    description: "recursive forced delete of the filesystem root",
  },
  { pattern: /\bformat(\.com)?\s+[a-z]:/i, description: "full disk format" },
  { pattern: /\bmkfs(\.[a-z0-9]+)?\s+/i, description: "filesystem creation" },
  { pattern: /\bdiskpart\b/i, description: "disk partitioning" },
  { pattern: /\breg(\.exe)?\s+delete\b/i, description: "registry deletion" },
  { pattern: /\bnet1?(\.exe)?\s+user\b/i, description: "user account change" },
  {
    pattern: /\bnet1?(\.exe)?\s+localgroup\b/i,
    description: "local group change",
  },
  { pattern: /\btakeown\b/i, description: "ownership takeover" },
  {
    pattern: /\bicacls\b.*\/grant.*administrators/i,
    description: "privilege-escalating ACL grant",
  },
  {
    // PowerShell accepts any prefix of -EncodedCommand
    pattern: /\b(powershell|pwsh)\b.*\s[-\/]e(c|nc[a-z]*)?\b/i,
    description: "encoded shell command",
  },
  {
    pattern: /\b(powershell|pwsh)\b.*\b(iex|invoke-expression)\b/i,
    description: "shell expression invocation",
  },
  { pattern: /\bcmd(\.exe)?\b.*\/[ck]\b.*\bdel\b/i, description: "shell delete" },
  {
    pattern: />\s*nul.*2>&1.*\bdel\b/i,
    description: "silenced delete",
  },
  {
    pattern: /\bfsutil\s+file\s+setzerodata\b/i,
    description: "zero-fill of file data",
  },
  { pattern: /\bcipher\s+\/w\b/i, description: "free-space wipe" },
  {
    pattern: /\bvssadmin\s+delete\b/i,
    description: "shadow copy deletion",
  },
  { pattern: /\bwbadmin\s+delete\b/i, description: "backup deletion" },
  { pattern: /\bbcdedit\b/i, description: "boot configuration edit" },
  { pattern: /\bbootrec\b/i, description: "boot record edit" },
  {
    pattern: /\bdd\b.*\bof=\/dev\//i,
    description: "raw device write",
  },
  { pattern: />\s*\/dev\/(sd|nvme|hd|disk)/i, description: "raw device write" },
];

// Interactive shells and script hosts whose arguments are inspected further
const SHELL_HOSTS = new Set([
  "cmd",
  "powershell",
  "pwsh",
  "bash",
  "sh",
  "zsh",
  "dash",
  "ksh",
  "fish",
  "wscript",
  "cscript",
]);

const DANGEROUS_SHELL_OPERATIONS = [
  "del ",
  "erase ",
  "rmdir ",
  "rd ",
  "rm -rf",
  "rm -fr",
  "format ",
  "diskpart",
  "reg delete",
  "reg add",
  "net user",
  "net localgroup",
  "useradd",
  "userdel",
  "usermod",
  "passwd",
  "takeown",
  "icacls",
  "chown",
  "attrib -r -s -h",
  "fsutil",
  "cipher",
  "vssadmin",
  "wbadmin",
  "bcdedit",
  "bootrec",
  "mkfs",
  "dd if=",
  ">nul",
  "2>&1",
];

/**
 * Lower-cased file name of an executable path, without its executable
 * extension. Both Windows and POSIX separators are honoured.
 */
export function executableStem(executable: string): string {
  const name = path.win32.basename(executable.trim()).toLowerCase();
  for (const ext of EXECUTABLE_EXTENSIONS) {
    if (name.endsWith(ext)) {
      return name.slice(0, -ext.length);
    }
  }
  return name;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const SHELL_OPERATION_MATCHERS = DANGEROUS_SHELL_OPERATIONS.map((entry) => ({
  entry,
  // Entries must start at a token boundary so "model " does not match "del "
  pattern: new RegExp(`(^|[^a-z0-9_-])${escapeRegExp(entry)}`),
}));

export class SecurityPolicy implements ISecurityPolicy {
  /**
   * Evaluate a process launch request
   * @param executable Executable path or name as requested
   * @param args Raw argument string
   */
  evaluate(executable: string, args: string = ""): SecurityDecision {
    const stem = executableStem(executable);
    const fileName = path.win32.basename(executable.trim()).toLowerCase();

    // Layer 1: blocked executables
    if (BLOCKED_EXECUTABLES.has(stem) || /^mkfs\./.test(stem)) {
      return {
        allowed: false,
        reason: `'${fileName}' is a blocked executable and cannot be launched`,
      };
    }

    // Layer 2: destructive command signatures
    const fullCommand = `${executable} ${args}`;
    for (const signature of DANGEROUS_SIGNATURES) {
      if (signature.pattern.test(fullCommand)) {
        return {
          allowed: false,
          reason: `Dangerous command pattern detected: ${signature.description}`,
        };
      }
    }

    // Layer 3: shells and script hosts
    if (SHELL_HOSTS.has(stem)) {
      const lowerArgs = args.toLowerCase();
      const match = SHELL_OPERATION_MATCHERS.find((m) =>
        m.pattern.test(lowerArgs)
      );
      if (match) {
        return {
          allowed: false,
          reason: `Command contains a dangerous operation: '${match.entry.trim()}'`,
        };
      }
    }

    return { allowed: true };
  }

  /**
   * Whether the executable is a shell or script host
   */
  isShellHost(executable: string): boolean {
    return SHELL_HOSTS.has(executableStem(executable));
  }
}
