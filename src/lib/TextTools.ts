/**
 * Text tools - encoded reads and writes, append, search and replace
 *
 * Text is encoded and decoded with iconv-lite. Every write goes through the
 * path guard; every read of an existing file through the size ceiling. Regular
 * expressions run on a worker thread.
 */

import * as fs from "fs";
import * as iconv from "iconv-lite";
import { z } from "zod";
import { SecurityDecision, ValidationError } from "../types";
import { IPathGuard } from "../interfaces";
import { Tool, defineTool } from "./ToolDefinition";
import { errnoCode, isErrorLike } from "./ErrorHandler";
import {
  ensureParentDirectory,
  firstDenial,
  pathArgument,
  readExisting,
} from "./FileTools";
import { matchLines, replaceMatches } from "./RegexWorker";

// Names accepted from callers, mapped to iconv-lite codecs. Encoders write no BOM.
const ENCODINGS: Record<string, string> = {
  "utf-8": "utf8",
  utf8: "utf8",
  "utf-16": "utf16le",
  "utf-16le": "utf16le",
  utf16: "utf16le",
  unicode: "utf16le",
  "utf-16be": "utf16be",
  bigendianunicode: "utf16be",
  "utf-32": "utf32le",
  utf32: "utf32le",
  "utf-32le": "utf32le",
  "utf-32be": "utf32be",
  ascii: "ascii",
  "us-ascii": "ascii",
  latin1: "latin1",
  "iso-8859-1": "latin1",
  shift_jis: "shiftjis",
  "shift-jis": "shiftjis",
  sjis: "shiftjis",
  "euc-jp": "eucjp",
};

// Lines checked between cancellation checks while searching
const SEARCH_CHECK_INTERVAL = 1000;

/**
 * Map an encoding name to an iconv-lite codec
 * @throws ValidationError for names outside the supported set
 */
export function resolveEncoding(name?: string): string {
  if (name === undefined) {
    return "utf8";
  }
  const encoding = ENCODINGS[name.trim().toLowerCase()];
  if (!encoding) {
    throw new ValidationError(`Unsupported encoding: ${name}`);
  }
  return encoding;
}

export function encodeText(text: string, encoding: string): Buffer {
  return iconv.encode(text, encoding);
}

export function decodeText(content: Buffer, encoding: string): string {
  return iconv.decode(content, encoding);
}

function compilePattern(pattern: string, flags: string): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (error) {
    // SyntaxError messages already read "Invalid regular expression: /.../: ..."
    throw new ValidationError(
      isErrorLike(error)
        ? error.message
        : `Invalid regular expression: /${pattern}/`
    );
  }
}

async function fileSize(filePath: string): Promise<number> {
  try {
    return (await fs.promises.stat(filePath)).size;
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return 0;
    }
    throw error;
  }
}

async function backup(filePath: string): Promise<void> {
  await fs.promises.copyFile(filePath, `${filePath}.backup`);
}

/**
 * Back up a file that may not exist yet
 */
async function backupIfPresent(filePath: string): Promise<void> {
  try {
    await backup(filePath);
  } catch (error) {
    if (errnoCode(error) !== "ENOENT") {
      throw error;
    }
  }
}

const encodingArgument = z
  .string()
  .optional()
  .describe(
    "Text encoding: utf-8, utf-16, utf-16be, utf-32, ascii, latin1, shift_jis or euc-jp (default: utf-8)"
  );

/**
 * Create the text tools
 */
export function createTextTools(guard: IPathGuard): Tool[] {
  const readTextFile = defineTool({
    name: "read_text_file",
    description: "Read a text file in the given encoding",
    inputSchema: z.object({
      path: pathArgument("Path of the file to read"),
      encoding: encodingArgument,
    }),
    authorize: (args) => {
      resolveEncoding(args.encoding);
      return guard.checkRead(args.path);
    },
    execute: async (args) => {
      const content = await readExisting(args.path);
      return decodeText(content, resolveEncoding(args.encoding));
    },
  });

  const writeTextFile = defineTool({
    name: "write_text_file",
    description:
      "Write a text file in the given encoding, optionally keeping a .backup copy of the previous contents",
    inputSchema: z.object({
      path: pathArgument("Path of the file to write"),
      content: z.string().describe("Text to write"),
      encoding: encodingArgument,
      create_backup: z
        .boolean()
        .optional()
        .describe("Copy the existing file to <path>.backup first"),
    }),
    authorize: (args) =>
      firstDenial(
        guard.checkWrite(args.path),
        guard.checkContentSize(
          encodeText(args.content, resolveEncoding(args.encoding)).length
        )
      ),
    execute: async (args, context) => {
      const encoding = resolveEncoding(args.encoding);
      await ensureParentDirectory(args.path);
      if (args.create_backup) {
        await backupIfPresent(args.path);
      }
      context.throwIfAborted();
      await fs.promises.writeFile(args.path, encodeText(args.content, encoding));
      return "File written successfully";
    },
  });

  const appendToFile = defineTool({
    name: "append_to_file",
    description: "Append text to a file, creating it when missing",
    inputSchema: z.object({
      path: pathArgument("Path of the file to append to"),
      content: z.string().describe("Text to append"),
      encoding: encodingArgument,
    }),
    authorize: async (args): Promise<SecurityDecision> => {
      const write = guard.checkWrite(args.path);
      if (!write.allowed) {
        return write;
      }
      const added = encodeText(
        args.content,
        resolveEncoding(args.encoding)
      ).length;
      return guard.checkContentSize((await fileSize(args.path)) + added);
    },
    execute: async (args, context) => {
      const encoding = resolveEncoding(args.encoding);
      await ensureParentDirectory(args.path);
      context.throwIfAborted();
      await fs.promises.appendFile(args.path, encodeText(args.content, encoding));
      return "Content appended successfully";
    },
  });

  const searchInFile = defineTool({
    name: "search_in_file",
    description:
      "List the lines of a file that contain a text (case-insensitive) or match a regular expression",
    inputSchema: z.object({
      path: pathArgument("Path of the file to search"),
      pattern: z
        .string()
        .min(1, "Pattern must not be empty")
        .describe("Text or regular expression to look for"),
      use_regex: z
        .boolean()
        .optional()
        .describe("Treat the pattern as a regular expression"),
      encoding: encodingArgument,
    }),
    authorize: (args) => {
      resolveEncoding(args.encoding);
      if (args.use_regex) {
        compilePattern(args.pattern, "");
      }
      return guard.checkRead(args.path);
    },
    execute: async (args, context) => {
      const content = decodeText(
        await readExisting(args.path),
        resolveEncoding(args.encoding)
      );
      const lines = content.split(/\r\n|\r|\n/);
      const matches: string[] = [];

      if (args.use_regex) {
        for (const index of await matchLines(args.pattern, content, context.signal)) {
          matches.push(`Line ${index + 1}: ${lines[index]}`);
        }
      } else {
        const needle = args.pattern.toLowerCase();
        for (let i = 0; i < lines.length; i++) {
          if (i % SEARCH_CHECK_INTERVAL === 0) {
            context.throwIfAborted();
          }
          if (lines[i].toLowerCase().includes(needle)) {
            matches.push(`Line ${i + 1}: ${lines[i]}`);
          }
        }
      }

      return matches.length > 0 ? matches.join("\n") : "No matching lines found";
    },
  });

  const replaceInFile = defineTool({
    name: "replace_in_file",
    description:
      "Replace every occurrence of a text or regular expression in a file",
    inputSchema: z.object({
      path: pathArgument("Path of the file to modify"),
      old_text: z
        .string()
        .min(1, "Text to replace must not be empty")
        .describe("Text or regular expression to replace"),
      new_text: z.string().describe("Replacement text"),
      use_regex: z
        .boolean()
        .optional()
        .describe("Treat old_text as a regular expression"),
      create_backup: z
        .boolean()
        .optional()
        .describe("Copy the file to <path>.backup first"),
      encoding: encodingArgument,
    }),
    authorize: async (args) => {
      resolveEncoding(args.encoding);
      if (args.use_regex) {
        compilePattern(args.old_text, "g");
      }
      return firstDenial(
        guard.checkWrite(args.path),
        await guard.checkRead(args.path)
      );
    },
    execute: async (args, context) => {
      const encoding = resolveEncoding(args.encoding);
      const content = decodeText(await readExisting(args.path), encoding);

      let replaced: string;
      let count: number;
      if (args.use_regex) {
        ({ count, replaced } = await replaceMatches(
          args.old_text,
          content,
          args.new_text,
          context.signal
        ));
      } else {
        const parts = content.split(args.old_text);
        count = parts.length - 1;
        replaced = parts.join(args.new_text);
      }

      if (args.create_backup) {
        await backup(args.path);
      }
      context.throwIfAborted();
      await fs.promises.writeFile(args.path, encodeText(replaced, encoding));
      return `Replaced ${count} occurrence(s)`;
    },
  });

  return [readTextFile, writeTextFile, appendToFile, searchInFile, replaceInFile];
}
