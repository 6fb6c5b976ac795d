/**
 * Application tools - launch_application, close_application,
 * get_running_applications
 */

import { z } from "zod";
import { RunningProcess } from "../types";
import { ISecurityPolicy } from "../interfaces";
import { Tool, defineTool } from "./ToolDefinition";
import { ProcessManager } from "./ProcessManager";

export const MAX_LISTED_PROCESSES = 100;

const NAME_WIDTH = 32;
const MAX_NAME_LENGTH = 30;
const MAX_TITLE_LENGTH = 40;

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength - 3)}...` : text;
}

function formatRow(
  pid: string,
  name: string,
  memory: string,
  title: string
): string {
  return `${pid.padEnd(8)}${name.padEnd(NAME_WIDTH)}${memory.padStart(11)}  ${title}`;
}

/**
 * Render the running-process listing as a fixed-width table
 */
export function formatProcessTable(processes: RunningProcess[]): string {
  const lines = [
    `Running applications: ${processes.length}`,
    formatRow("PID", "Name", "Memory (MB)", "Window Title"),
  ];

  for (const entry of processes.slice(0, MAX_LISTED_PROCESSES)) {
    lines.push(
      formatRow(
        String(entry.pid),
        truncate(entry.name, MAX_NAME_LENGTH),
        String(entry.memoryMB),
        entry.windowTitle
          ? truncate(entry.windowTitle, MAX_TITLE_LENGTH)
          : "(background)"
      )
    );
  }

  if (processes.length > MAX_LISTED_PROCESSES) {
    lines.push(`... ${processes.length - MAX_LISTED_PROCESSES} more processes`);
  }
  return lines.join("\n");
}

/**
 * Create the application tools
 */
export function createApplicationTools(
  processes: ProcessManager,
  policy: ISecurityPolicy
): Tool[] {
  const launchApplication = defineTool({
    name: "launch_application",
    description:
      "Start an application by path or name, detached from the gateway",
    inputSchema: z.object({
      path: z
        .string()
        .refine((value) => value.trim() !== "", "Path must not be empty")
        .describe("Executable path or name found on the search path"),
      arguments: z
        .string()
        .optional()
        .describe("Command-line arguments as a single string"),
      working_directory: z
        .string()
        .optional()
        .describe("Existing directory to start in"),
    }),
    authorize: (args) => policy.evaluate(args.path, args.arguments ?? ""),
    execute: async (args, context) => {
      const launched = await processes.launch(
        args.path,
        args.arguments ?? "",
        args.working_directory,
        context.signal
      );
      return `Application launched (PID: ${launched.pid}, Path: ${launched.path})`;
    },
  });

  const closeApplication = defineTool({
    name: "close_application",
    description:
      "Close an application by process ID, gracefully first and then by force",
    inputSchema: z.object({
      process_id: z
        .union([z.number().int(), z.string().regex(/^\s*-?\d+\s*$/)])
        .transform(Number)
        .describe("Process ID of the application"),
    }),
    execute: async (args, context) => {
      const result = await processes.terminate(args.process_id, context.signal);
      return result.reason === "graceful"
        ? `Application '${result.name}' (PID: ${result.pid}) closed gracefully.`
        : `Application '${result.name}' (PID: ${result.pid}) was forcibly terminated.`;
    },
  });

  const getRunningApplications = defineTool({
    name: "get_running_applications",
    description: "List running processes with their memory use and window title",
    inputSchema: z.object({}),
    execute: async () => formatProcessTable(await processes.listRunning()),
  });

  return [launchApplication, closeApplication, getRunningApplications];
}
