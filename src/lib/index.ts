/**
 * Core library implementations
 */

export * from "./SecurityPolicy";
export * from "./PathGuard";
export * from "./ProcessTable";
export * from "./ProcessLauncher";
export * from "./ProcessTerminator";
export * from "./ProcessManager";
export * from "./TimeoutManager";
export * from "./ToolDefinition";
export * from "./ToolDispatcher";
export * from "./FileTools";
export * from "./TextTools";
export * from "./ApplicationTools";
export * from "./BuiltinTools";
export * from "./ExtensionRegistry";
export * from "./SecretProtector";
export * from "./SecretStore";
export * from "./ConfigLoader";
export * from "./ErrorHandler";
export * from "./Gateway";
export * from "./MCPServer";
