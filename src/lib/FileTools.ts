/**
 * File tools - read_file, write_file, list_directory
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { ErrorCode, GatewayError, SecurityDecision } from "../types";
import { IPathGuard } from "../interfaces";
import { Tool, defineTool } from "./ToolDefinition";
import { errnoCode } from "./ErrorHandler";

/**
 * Non-blank path argument
 */
export function pathArgument(description: string) {
  return z
    .string()
    .refine((value) => value.trim() !== "", "Path must not be empty")
    .describe(description);
}

/**
 * First denial of several decisions, or allowed
 */
export function firstDenial(...decisions: SecurityDecision[]): SecurityDecision {
  return decisions.find((decision) => !decision.allowed) ?? { allowed: true };
}

/**
 * Read a file, reporting a missing file as NOT_FOUND
 */
export async function readExisting(filePath: string): Promise<Buffer> {
  try {
    return await fs.promises.readFile(filePath);
  } catch (error) {
    const code = errnoCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") {
      throw new GatewayError(`File not found: ${filePath}`, ErrorCode.NOT_FOUND, {
        cause: error,
      });
    }
    throw error;
  }
}

/**
 * Create the parent directory of a file when missing
 */
export async function ensureParentDirectory(filePath: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(path.resolve(filePath)), {
    recursive: true,
  });
}

/**
 * Create the file tools
 */
export function createFileTools(guard: IPathGuard): Tool[] {
  const readFile = defineTool({
    name: "read_file",
    description: "Read the contents of a file as UTF-8 text",
    inputSchema: z.object({
      path: pathArgument("Path of the file to read"),
    }),
    authorize: (args) => guard.checkRead(args.path),
    execute: async (args) => (await readExisting(args.path)).toString("utf8"),
  });

  const writeFile = defineTool({
    name: "write_file",
    description:
      "Write UTF-8 text to a file, replacing it and creating missing directories",
    inputSchema: z.object({
      path: pathArgument("Path of the file to write"),
      content: z.string().describe("Text to write"),
    }),
    authorize: (args) =>
      firstDenial(
        guard.checkWrite(args.path),
        guard.checkContentSize(Buffer.byteLength(args.content, "utf8"))
      ),
    execute: async (args, context) => {
      await ensureParentDirectory(args.path);
      context.throwIfAborted();
      await fs.promises.writeFile(args.path, args.content, "utf8");
      return "File written successfully";
    },
  });

  const listDirectory = defineTool({
    name: "list_directory",
    description: "List the entries of a directory",
    inputSchema: z.object({
      path: pathArgument("Path of the directory to list"),
    }),
    execute: async (args) => {
      let entries: fs.Dirent[];
      try {
        entries = await fs.promises.readdir(args.path, { withFileTypes: true });
      } catch (error) {
        const code = errnoCode(error);
        if (code === "ENOENT" || code === "ENOTDIR") {
          throw new GatewayError(
            `Directory not found: ${args.path}`,
            ErrorCode.NOT_FOUND,
            { cause: error }
          );
        }
        throw error;
      }

      if (entries.length === 0) {
        return "Directory is empty";
      }
      return entries
        .sort((a, b) => a.name.localeCompare(b.name))
        .map((entry) => `${entry.isDirectory() ? "[DIR]" : "[FILE]"} ${entry.name}`)
        .join("\n");
    },
  });

  return [readFile, writeFile, listDirectory];
}
