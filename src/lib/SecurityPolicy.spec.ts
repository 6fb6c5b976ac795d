/**
 * SecurityPolicy - Unit and Property-Based Tests
 */

import * as fc from "fast-check";
import { SecurityPolicy, executableStem } from "./SecurityPolicy";

describe("SecurityPolicy", () => {
  const policy = new SecurityPolicy();

  describe("executableStem", () => {
    it.each([
      ["C:\\Windows\\regedit.exe", "regedit"],
      ["/usr/sbin/diskpart", "diskpart"],
      ["FORMAT.COM", "format"],
      ["tools/run.BAT", "run"],
      ["  notepad.exe ", "notepad"],
      ["script.sh", "script.sh"],
    ])("should reduce %s to %s", (input, expected) => {
      expect(executableStem(input)).toBe(expected);
    });
  });

  describe("Blocked executables", () => {
    it("should deny regedit by full Windows path", () => {
      expect(policy.evaluate("C:\\Windows\\regedit.exe", "")).toEqual({
        allowed: false,
        reason: "'regedit.exe' is a blocked executable and cannot be launched",
      });
    });

    it("should deny format regardless of case", () => {
      expect(policy.evaluate("FORMAT", "C:")).toEqual({
        allowed: false,
        reason: "'format' is a blocked executable and cannot be launched",
      });
    });

    it("should deny reg before looking at its arguments", () => {
      expect(policy.evaluate("reg.exe", "delete HKLM\\Software\\Foo /f")).toEqual({
        allowed: false,
        reason: "'reg.exe' is a blocked executable and cannot be launched",
      });
    });

    it("should deny mkfs variants", () => {
      expect(policy.evaluate("/sbin/mkfs.ext4", "/dev/sdb1")).toEqual({
        allowed: false,
        reason: "'mkfs.ext4' is a blocked executable and cannot be launched",
      });
    });

    it.each(["vssadmin", "bcdedit.exe", "takeown", "schtasks", "crontab", "dd"])(
      "should deny %s",
      (executable) => {
        expect(policy.evaluate(executable, "").allowed).toBe(false);
      }
    );
  });

  describe("Dangerous command signatures", () => {
    it("should deny a shell format of a drive", () => {
      expect(policy.evaluate("cmd.exe", "/c format C: /y")).toEqual({
        allowed: false,
        reason: "Dangerous command pattern detected: full disk format",
      });
    });

    it("should deny a forced delete on a system drive", () => {
      expect(policy.evaluate("cmd.exe", "/c del /f /q C:\\Windows\\*")).toEqual({
        allowed: false,
        reason:
          "Dangerous command pattern detected: forced delete on a system drive",
      });
    });

    it("should deny registry deletion through a shell", () => {
      expect(policy.evaluate("cmd", "/c reg delete HKCU\\Software\\Foo")).toEqual({
        allowed: false,
        reason: "Dangerous command pattern detected: registry deletion",
      });
    });

    it("should deny encoded PowerShell", () => {
      expect(
        policy.evaluate(
          "powershell.exe",
          "-NoProfile -EncodedCommand ZQBjAGgAbwA="
        )
      ).toEqual({
        allowed: false,
        reason: "Dangerous command pattern detected: encoded shell command",
      });
    });

    it.each(["-enco", "-encod", "-EncodedCom", "/enc", "-ec", "-e"])(
      "should deny the abbreviated encoded flag %s",
      (flag) => {
        expect(
          policy.evaluate("powershell.exe", `-NoProfile ${flag} ZQBjAGgAbwA=`)
        ).toEqual({
          allowed: false,
          reason: "Dangerous command pattern detected: encoded shell command",
        });
      }
    );

    it("should allow PowerShell flags that only start with e", () => {
      expect(
        policy.evaluate("pwsh", "-ExecutionPolicy Bypass -File build.ps1")
      ).toEqual({ allowed: true });
    });

    it("should deny a recursive delete of the filesystem root", () => {
      expect(policy.evaluate("rm", "-rf /")).toEqual({
        allowed: false,
        reason:
          "Dangerous command pattern detected: recursive forced delete of the filesystem root",
      });
    });

    it("should allow a recursive delete of an ordinary directory", () => {
      expect(policy.evaluate("rm", "-rf /home/user/build")).toEqual({
        allowed: true,
      });
    });
  });

  describe("Shell host arguments", () => {
    it("should deny dangerous operations passed to a shell", () => {
      expect(policy.evaluate("/bin/bash", "-c 'userdel bob'")).toEqual({
        allowed: false,
        reason: "Command contains a dangerous operation: 'userdel'",
      });
    });

    it("should deny a plain delete passed to a shell", () => {
      expect(policy.evaluate("sh", "-c 'del x'")).toEqual({
        allowed: false,
        reason: "Command contains a dangerous operation: 'del'",
      });
    });

    it("should match entries only at a token boundary", () => {
      expect(policy.evaluate("bash", "-c 'echo model list'")).toEqual({
        allowed: true,
      });
    });

    it("should not inspect arguments of non-shell programs", () => {
      expect(policy.evaluate("python3", "-c \"print('del x')\"")).toEqual({
        allowed: true,
      });
    });

    it("should recognise shell hosts", () => {
      expect(policy.isShellHost("C:\\Windows\\System32\\cmd.exe")).toBe(true);
      expect(policy.isShellHost("/usr/bin/pwsh")).toBe(true);
      expect(policy.isShellHost("notepad.exe")).toBe(false);
    });
  });

  describe("Allowed launches", () => {
    it.each([
      ["notepad.exe", "notes.txt"],
      ["C:\\Program Files\\App\\app.exe", "--profile default"],
      ["/usr/bin/python3", "script.py --verbose"],
      ["node", "server.js"],
    ])("should allow %s %s", (executable, args) => {
      expect(policy.evaluate(executable, args)).toEqual({ allowed: true });
    });

    it("should treat a missing argument string as empty", () => {
      expect(policy.evaluate("notepad.exe")).toEqual({ allowed: true });
    });
  });

  describe("Property: evaluation is deterministic", () => {
    it("should return the same verdict for the same input", () => {
      fc.assert(
        fc.property(fc.string(), fc.string(), (executable, args) => {
          const first = policy.evaluate(executable, args);
          const second = new SecurityPolicy().evaluate(executable, args);
          expect(second).toEqual(first);
          expect(first.allowed || first.reason.length > 0).toBe(true);
        }),
        { numRuns: 200 }
      );
    });
  });

  describe("Property: any path ending in regedit.exe is denied", () => {
    it("should deny regedit under any directory and casing", () => {
      fc.assert(
        fc.property(
          fc.array(fc.stringMatching(/^[A-Za-z0-9_]{1,8}$/), { maxLength: 4 }),
          fc.constantFrom("regedit.exe", "REGEDIT.EXE", "RegEdit.Exe"),
          fc.constantFrom("\\", "/"),
          fc.string(),
          (dirs, fileName, separator, args) => {
            const executable = ["C:", ...dirs, fileName].join(separator);
            expect(policy.evaluate(executable, args).allowed).toBe(false);
          }
        )
      );
    });
  });
});
