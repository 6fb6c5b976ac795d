/**
 * File tools - Unit Tests
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ToolDispatcher } from "./ToolDispatcher";
import { TimeoutManager } from "./TimeoutManager";
import { PathGuard } from "./PathGuard";
import { createFileTools } from "./FileTools";
import { ErrorCode } from "../types";

describe("File tools", () => {
  let tempDir: string;
  let dispatcher: ToolDispatcher;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "file-tools-"));
    dispatcher = new ToolDispatcher(new TimeoutManager(5000));
    dispatcher.registerAll(createFileTools(new PathGuard()));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("write_file and read_file", () => {
    it("should create missing directories and read the text back", async () => {
      const target = path.join(tempDir, "nested", "deeper", "note.txt");

      const written = await dispatcher.execute("write_file", {
        path: target,
        content: "héllo",
      });
      const read = await dispatcher.execute("read_file", { path: target });

      expect(written.success && written.output).toBe("File written successfully");
      expect(read.success && read.output).toBe("héllo");
      expect(fs.readFileSync(target, "utf8")).toBe("héllo");
    });

    it("should report a missing file as faulted", async () => {
      const target = path.join(tempDir, "missing.txt");

      const result = await dispatcher.execute("read_file", { path: target });

      expect(result).toEqual({
        success: false,
        status: "faulted",
        error: `File not found: ${target}`,
        code: ErrorCode.NOT_FOUND,
        durationMs: expect.any(Number),
      });
    });

    it("should deny a blank path", async () => {
      const result = await dispatcher.execute("read_file", { path: "  " });

      expect(result.status).toBe("denied");
      expect(result.success || result.error).toBe(
        "Invalid parameter 'path': Path must not be empty"
      );
    });

    it("should deny writes into a Windows system directory", async () => {
      const result = await dispatcher.execute("write_file", {
        path: "C:\\Windows\\System32\\x.txt",
        content: "x",
      });

      expect(result.status).toBe("denied");
      expect(result.success || result.error).toBe(
        "Access denied: 'C:\\Windows\\System32\\x.txt' is inside the protected system path 'C:\\Windows'"
      );
    });

    it("should deny writes into /etc", async () => {
      if (process.platform === "win32") {
        return;
      }
      const result = await dispatcher.execute("write_file", {
        path: "/etc/gateway-test.conf",
        content: "x",
      });

      expect(result.success || result.error).toBe(
        "Access denied: '/etc/gateway-test.conf' is inside the protected system path '/etc'"
      );
      expect(fs.existsSync("/etc/gateway-test.conf")).toBe(false);
    });

    it("should deny reads of files over 10MB", async () => {
      const target = path.join(tempDir, "big.bin");
      fs.writeFileSync(target, "");
      fs.truncateSync(target, 10 * 1024 * 1024 + 1);

      const result = await dispatcher.execute("read_file", { path: target });

      expect(result.status).toBe("denied");
      expect(result.success || result.error).toBe(
        "File too large: 10485761 bytes exceeds the 10MB size limit"
      );
    });
  });

  describe("list_directory", () => {
    it("should list entries sorted by name with their kind", async () => {
      fs.mkdirSync(path.join(tempDir, "sub"));
      fs.writeFileSync(path.join(tempDir, "b.txt"), "");
      fs.writeFileSync(path.join(tempDir, "a.txt"), "");

      const result = await dispatcher.execute("list_directory", {
        path: tempDir,
      });

      expect(result.success && result.output).toBe(
        "[FILE] a.txt\n[FILE] b.txt\n[DIR] sub"
      );
    });

    it("should say so when the directory is empty", async () => {
      const result = await dispatcher.execute("list_directory", {
        path: tempDir,
      });
      expect(result.success && result.output).toBe("Directory is empty");
    });

    it("should report a missing directory", async () => {
      const target = path.join(tempDir, "nope");

      const result = await dispatcher.execute("list_directory", {
        path: target,
      });

      expect(result.success || result.error).toBe(
        `Directory not found: ${target}`
      );
      expect(result.status).toBe("faulted");
    });
  });
});
