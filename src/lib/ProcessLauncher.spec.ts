/**
 * ProcessLauncher - Unit Tests
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ProcessLauncher, splitArguments } from "./ProcessLauncher";
import { SecurityPolicy } from "./SecurityPolicy";
import {
  CancelledError,
  ErrorCode,
  ProcessError,
  SecurityError,
  ValidationError,
} from "../types";
import { ISecurityPolicy } from "../interfaces";

function killQuietly(pid: number): void {
  try {
    process.kill(pid, "SIGKILL");
  } catch {
    // Already exited
  }
}

describe("ProcessLauncher", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "launcher-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("splitArguments", () => {
    it.each([
      ["a b  c", ["a", "b", "c"]],
      [`-e "one two" 'three four' x`, ["-e", "one two", "three four", "x"]],
      [`--name=""`, ["--name="]],
      [`""`, [""]],
      ["   ", []],
      ["", []],
    ])("should split %p", (input, expected) => {
      expect(splitArguments(input)).toEqual(expected);
    });
  });

  describe("resolvePath", () => {
    const launcher = () =>
      new ProcessLauncher(new SecurityPolicy(), { searchPath: tempDir });

    it("should return an existing absolute file as is", () => {
      const file = path.join(tempDir, "app.bin");
      fs.writeFileSync(file, "");
      expect(launcher().resolvePath(file)).toBe(file);
    });

    it("should resolve an existing relative file against the cwd", () => {
      const file = path.join(tempDir, "relative.bin");
      fs.writeFileSync(file, "");
      const relative = path.relative(process.cwd(), file);
      expect(launcher().resolvePath(relative)).toBe(file);
    });

    it("should not search for a missing absolute path", () => {
      expect(
        launcher().resolvePath(path.join(tempDir, "missing", "tool"))
      ).toBeUndefined();
    });

    it("should return undefined for a blank candidate", () => {
      expect(launcher().resolvePath("   ")).toBeUndefined();
    });

    it("should find a bare name on the search path", () => {
      if (process.platform === "win32") {
        return;
      }
      const file = path.join(tempDir, "mytool");
      fs.writeFileSync(file, "#!/bin/sh\n", { mode: 0o755 });
      expect(launcher().resolvePath("mytool")).toBe(file);
    });

    it("should return undefined when nothing on the search path matches", () => {
      expect(launcher().resolvePath("no-such-app-xyz")).toBeUndefined();
    });
  });

  describe("launch", () => {
    it("should reject a missing working directory", async () => {
      const launcher = new ProcessLauncher(new SecurityPolicy());
      const missing = path.join(tempDir, "nowhere");

      await expect(
        launcher.launch(process.execPath, "", missing)
      ).rejects.toThrow(
        new ValidationError(`Working directory '${missing}' does not exist`)
      );
    });

    it("should report an application that cannot be resolved", async () => {
      const launcher = new ProcessLauncher(new SecurityPolicy(), {
        searchPath: tempDir,
      });

      const error = await launcher
        .launch("no-such-app-xyz")
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProcessError);
      expect(error).toMatchObject({
        code: ErrorCode.EXECUTABLE_NOT_FOUND,
        message: "Application 'no-such-app-xyz' was not found",
      });
    });

    it("should evaluate the policy against the resolved path", async () => {
      const evaluate = jest.fn<
        ReturnType<ISecurityPolicy["evaluate"]>,
        Parameters<ISecurityPolicy["evaluate"]>
      >(() => ({ allowed: false, reason: "resolved path is blocked" }));
      const launcher = new ProcessLauncher({ evaluate });

      await expect(
        launcher.launch(process.execPath, "-e 1")
      ).rejects.toThrow(new SecurityError("resolved path is blocked"));
      expect(evaluate).toHaveBeenCalledWith(process.execPath, "-e 1");
    });

    it("should start a process and return its pid and path", async () => {
      if (process.platform === "win32") {
        return;
      }
      const launcher = new ProcessLauncher(new SecurityPolicy());

      const launched = await launcher.launch(
        process.execPath,
        `-e "setTimeout(() => {}, 5000)"`,
        tempDir
      );

      try {
        expect(launched.path).toBe(process.execPath);
        expect(launched.pid).toBeGreaterThan(0);
        expect(() => process.kill(launched.pid, 0)).not.toThrow();
      } finally {
        killQuietly(launched.pid);
      }
    });

    it("should accept a process that exits cleanly during startup", async () => {
      if (process.platform === "win32") {
        return;
      }
      const launcher = new ProcessLauncher(new SecurityPolicy(), {
        startupCheckMs: 1000,
      });

      const launched = await launcher.launch(process.execPath, "-e 0");

      expect(launched.path).toBe(process.execPath);
    });

    it("should fault a process that crashes during startup", async () => {
      if (process.platform === "win32") {
        return;
      }
      const launcher = new ProcessLauncher(new SecurityPolicy(), {
        startupCheckMs: 5000,
      });

      const error = await launcher
        .launch(process.execPath, `-e "process.exit(3)"`)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProcessError);
      expect(error).toMatchObject({
        code: ErrorCode.FAULTED,
        message: `Application '${path.basename(
          process.execPath
        )}' exited immediately after launch (exit code 3)`,
      });
    });

    it("should stop waiting when the call is cancelled", async () => {
      if (process.platform === "win32") {
        return;
      }
      const launcher = new ProcessLauncher(new SecurityPolicy(), {
        startupCheckMs: 5000,
      });
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 50);

      await expect(
        launcher.launch(
          process.execPath,
          `-e "setTimeout(() => {}, 5000)"`,
          undefined,
          controller.signal
        )
      ).rejects.toBeInstanceOf(CancelledError);
    });
  });
});
