/**
 * Core interfaces for the Command Gateway
 */

export * from "./ISecurityPolicy";
export * from "./IProcessTable";
export * from "./IProcessLauncher";
export * from "./IProcessTerminator";
export * from "./ITimeoutManager";
export * from "./IExtensionRegistry";
export * from "./ISecretStore";
