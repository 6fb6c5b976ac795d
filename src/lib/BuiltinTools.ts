/**
 * Built-in tool set
 */

import { IPathGuard, ISecurityPolicy } from "../interfaces";
import { Tool } from "./ToolDefinition";
import { ProcessManager } from "./ProcessManager";
import { createFileTools } from "./FileTools";
import { createTextTools } from "./TextTools";
import { createApplicationTools } from "./ApplicationTools";

export interface BuiltinToolDependencies {
  pathGuard: IPathGuard;
  policy: ISecurityPolicy;
  processes: ProcessManager;
}

export function createBuiltinTools(deps: BuiltinToolDependencies): Tool[] {
  return [
    ...createFileTools(deps.pathGuard),
    ...createApplicationTools(deps.processes, deps.policy),
    ...createTextTools(deps.pathGuard),
  ];
}
