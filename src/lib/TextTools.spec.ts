/**
 * Text tools - Unit and Property-Based Tests
 */

import * as fc from "fast-check";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ToolDispatcher } from "./ToolDispatcher";
import { TimeoutManager } from "./TimeoutManager";
import { PathGuard } from "./PathGuard";
import { createTextTools, resolveEncoding } from "./TextTools";
import { ErrorCode, ValidationError } from "../types";

describe("Text tools", () => {
  let tempDir: string;
  let dispatcher: ToolDispatcher;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "text-tools-"));
    dispatcher = new ToolDispatcher(new TimeoutManager(5000));
    dispatcher.registerAll(createTextTools(new PathGuard()));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("resolveEncoding", () => {
    it.each([
      [undefined, "utf8"],
      ["UTF-8", "utf8"],
      ["utf8", "utf8"],
      ["utf-16", "utf16le"],
      ["UTF-16LE", "utf16le"],
      ["utf16", "utf16le"],
      ["ascii", "ascii"],
      ["latin1", "latin1"],
      ["ISO-8859-1", "latin1"],
      ["UTF-16BE", "utf16be"],
      ["utf-32", "utf32le"],
      ["Shift_JIS", "shiftjis"],
      ["EUC-JP", "eucjp"],
    ])("should map %p to %p", (name, expected) => {
      expect(resolveEncoding(name)).toBe(expected);
    });

    it("should reject other encodings", () => {
      expect(() => resolveEncoding("iso-2022-jp")).toThrow(
        new ValidationError("Unsupported encoding: iso-2022-jp")
      );
    });
  });

  describe("read_text_file", () => {
    it("should decode UTF-16 content", async () => {
      const target = path.join(tempDir, "wide.txt");
      fs.writeFileSync(target, Buffer.from("wide text", "utf16le"));

      const result = await dispatcher.execute("read_text_file", {
        path: target,
        encoding: "utf-16",
      });

      expect(result.success && result.output).toBe("wide text");
    });

    it("should decode EUC-JP content", async () => {
      const target = path.join(tempDir, "euc.txt");
      fs.writeFileSync(target, Buffer.from([0xc6, 0xfc]));

      const result = await dispatcher.execute("read_text_file", {
        path: target,
        encoding: "euc-jp",
      });

      expect(result.success && result.output).toBe("日");
    });

    it("should deny a file over 10MB", async () => {
      const target = path.join(tempDir, "huge.log");
      fs.writeFileSync(target, "");
      fs.truncateSync(target, 11 * 1024 * 1024);

      const result = await dispatcher.execute("read_text_file", {
        path: target,
      });

      expect(result).toEqual({
        success: false,
        status: "denied",
        error: "File too large: 11534336 bytes exceeds the 10MB size limit",
        code: ErrorCode.SECURITY_DENIED,
        durationMs: expect.any(Number),
      });
    });

    it("should deny an unsupported encoding", async () => {
      const target = path.join(tempDir, "a.txt");
      fs.writeFileSync(target, "a");

      const result = await dispatcher.execute("read_text_file", {
        path: target,
        encoding: "ebcdic",
      });

      expect(result.status).toBe("denied");
      expect(result.success || result.error).toBe(
        "Unsupported encoding: ebcdic"
      );
    });
  });

  describe("write_text_file", () => {
    it("should deny a path inside C:\\Windows", async () => {
      const result = await dispatcher.execute("write_text_file", {
        path: "C:\\Windows\\System32\\x.txt",
        content: "x",
      });

      expect(result).toEqual({
        success: false,
        status: "denied",
        error:
          "Access denied: 'C:\\Windows\\System32\\x.txt' is inside the protected system path 'C:\\Windows'",
        code: ErrorCode.SECURITY_DENIED,
        durationMs: expect.any(Number),
      });
    });

    it("should keep the previous contents in a backup", async () => {
      const target = path.join(tempDir, "config.ini");
      fs.writeFileSync(target, "old=1");

      const result = await dispatcher.execute("write_text_file", {
        path: target,
        content: "new=2",
        create_backup: true,
      });

      expect(result.success && result.output).toBe("File written successfully");
      expect(fs.readFileSync(target, "utf8")).toBe("new=2");
      expect(fs.readFileSync(`${target}.backup`, "utf8")).toBe("old=1");
    });

    it("should not create a backup of a file that did not exist", async () => {
      const target = path.join(tempDir, "dir", "fresh.txt");

      await dispatcher.execute("write_text_file", {
        path: target,
        content: "x",
        create_backup: true,
      });

      expect(fs.readFileSync(target, "utf8")).toBe("x");
      expect(fs.existsSync(`${target}.backup`)).toBe(false);
    });

    it("should encode Shift_JIS as two bytes per kanji", async () => {
      const target = path.join(tempDir, "sjis.txt");

      const result = await dispatcher.execute("write_text_file", {
        path: target,
        content: "日本語",
        encoding: "shift_jis",
      });

      expect(result.success && result.output).toBe("File written successfully");
      expect(fs.readFileSync(target)).toEqual(
        Buffer.from([0x93, 0xfa, 0x96, 0x7b, 0x8c, 0xea])
      );
    });

    it("should encode UTF-16BE without a byte order mark", async () => {
      const target = path.join(tempDir, "be.txt");

      await dispatcher.execute("write_text_file", {
        path: target,
        content: "Hi",
        encoding: "utf-16be",
      });

      expect(fs.readFileSync(target)).toEqual(
        Buffer.from([0x00, 0x48, 0x00, 0x69])
      );
    });

    it("should encode latin1 as one byte per character", async () => {
      const target = path.join(tempDir, "latin.txt");

      await dispatcher.execute("write_text_file", {
        path: target,
        content: "café",
        encoding: "latin1",
      });

      expect(fs.readFileSync(target)).toEqual(
        Buffer.from([0x63, 0x61, 0x66, 0xe9])
      );
    });
  });

  describe("append_to_file", () => {
    it("should append to an existing file", async () => {
      const target = path.join(tempDir, "log.txt");
      fs.writeFileSync(target, "one\n");

      const result = await dispatcher.execute("append_to_file", {
        path: target,
        content: "two\n",
      });

      expect(result.success && result.output).toBe(
        "Content appended successfully"
      );
      expect(fs.readFileSync(target, "utf8")).toBe("one\ntwo\n");
    });

    it("should deny an append that takes the file past 10MB", async () => {
      const target = path.join(tempDir, "grow.log");
      fs.writeFileSync(target, "");
      fs.truncateSync(target, 10 * 1024 * 1024);

      const result = await dispatcher.execute("append_to_file", {
        path: target,
        content: "xy",
      });

      expect(result.success || result.error).toBe(
        "Content too large: 10485762 bytes exceeds the 10MB size limit"
      );
      expect(fs.statSync(target).size).toBe(10 * 1024 * 1024);
    });
  });

  describe("search_in_file", () => {
    let target: string;

    beforeEach(() => {
      target = path.join(tempDir, "notes.txt");
      fs.writeFileSync(target, "Alpha beta\r\ngamma\nBETA max\rdelta 42");
    });

    it("should match substrings case-insensitively", async () => {
      const result = await dispatcher.execute("search_in_file", {
        path: target,
        pattern: "beta",
      });

      expect(result.success && result.output).toBe(
        "Line 1: Alpha beta\nLine 3: BETA max"
      );
    });

    it("should match regular expressions", async () => {
      const result = await dispatcher.execute("search_in_file", {
        path: target,
        pattern: "\\d+$",
        use_regex: true,
      });

      expect(result.success && result.output).toBe("Line 4: delta 42");
    });

    it("should say when nothing matches", async () => {
      const result = await dispatcher.execute("search_in_file", {
        path: target,
        pattern: "omega",
      });

      expect(result.success && result.output).toBe("No matching lines found");
    });

    it("should time out a regular expression that backtracks without end", async () => {
      fs.writeFileSync(target, `${"a".repeat(40)}!`);

      const result = await dispatcher.execute(
        "search_in_file",
        { path: target, pattern: "^(a+)+$", use_regex: true },
        { timeoutMs: 200 }
      );

      expect(result.status).toBe("timed_out");
      expect(result.success || result.code).toBe(ErrorCode.TIMEOUT);
      expect(result.durationMs).toBeLessThan(2000);
    });

    it("should deny an invalid regular expression", async () => {
      const result = await dispatcher.execute("search_in_file", {
        path: target,
        pattern: "(unclosed",
        use_regex: true,
      });

      expect(result.status).toBe("denied");
      expect(result.success || result.error).toMatch(
        /^Invalid regular expression: /
      );
    });
  });

  describe("replace_in_file", () => {
    it("should replace literal text and write a byte-identical backup", async () => {
      const target = path.join(tempDir, "doc.txt");
      const original = Buffer.from("a.b a.b a-b", "utf8");
      fs.writeFileSync(target, original);

      const result = await dispatcher.execute("replace_in_file", {
        path: target,
        old_text: "a.b",
        new_text: "X",
        create_backup: true,
      });

      expect(result.success && result.output).toBe("Replaced 2 occurrence(s)");
      expect(fs.readFileSync(target, "utf8")).toBe("X X a-b");
      expect(fs.readFileSync(`${target}.backup`).equals(original)).toBe(true);
    });

    it("should replace regular expression matches with group references", async () => {
      const target = path.join(tempDir, "dates.txt");
      fs.writeFileSync(target, "2024-01-02 and 2025-03-04");

      const result = await dispatcher.execute("replace_in_file", {
        path: target,
        old_text: "(\\d{4})-(\\d{2})-(\\d{2})",
        new_text: "$3/$2/$1",
        use_regex: true,
      });

      expect(result.success && result.output).toBe("Replaced 2 occurrence(s)");
      expect(fs.readFileSync(target, "utf8")).toBe("02/01/2024 and 04/03/2025");
    });

    it("should stop a backtracking replacement at the timeout and keep the file", async () => {
      const target = path.join(tempDir, "slow.txt");
      const original = `${"a".repeat(40)}!`;
      fs.writeFileSync(target, original);

      const result = await dispatcher.execute(
        "replace_in_file",
        { path: target, old_text: "(a+)+$", new_text: "b", use_regex: true },
        { timeoutMs: 200 }
      );

      expect(result.status).toBe("timed_out");
      expect(fs.readFileSync(target, "utf8")).toBe(original);
    });

    it("should report a missing file", async () => {
      const target = path.join(tempDir, "absent.txt");

      const result = await dispatcher.execute("replace_in_file", {
        path: target,
        old_text: "a",
        new_text: "b",
      });

      expect(result.status).toBe("faulted");
      expect(result.success || result.code).toBe(ErrorCode.NOT_FOUND);
    });

    it("Property: literal replacement removes every occurrence", async () => {
      const target = path.join(tempDir, "prop.txt");
      await fc.assert(
        fc.asyncProperty(
          fc.array(fc.constantFrom("ab", "cd", "x", " "), { maxLength: 20 }),
          async (pieces) => {
            const content = pieces.join("");
            fs.writeFileSync(target, content);
            const expected = content.split("ab").length - 1;

            const result = await dispatcher.execute("replace_in_file", {
              path: target,
              old_text: "ab",
              new_text: "-",
            });

            expect(result.success && result.output).toBe(
              `Replaced ${expected} occurrence(s)`
            );
            expect(fs.readFileSync(target, "utf8")).not.toContain("ab");
          }
        ),
        { numRuns: 30 }
      );
    });
  });
});
