/**
 * Extension contract and registry interface
 */

import { ExtensionDescriptor } from "../types";

export type ExtensionParameterType =
  | "string"
  | "number"
  | "boolean"
  | "object"
  | "array";

export interface ExtensionParameter {
  type: ExtensionParameterType;
  required?: boolean;
  description?: string;
}

/**
 * A tool contributed by an extension
 */
export interface ExtensionTool {
  name: string;
  description: string;
  parameters?: Record<string, ExtensionParameter>;
  execute(
    args: Record<string, unknown>,
    signal: AbortSignal
  ): string | Promise<string>;
}

/**
 * Services handed to an extension when it is initialized
 */
export interface ExtensionContext {
  /** Read-only view of the credential store */
  secrets: {
    retrieve(key: string): Promise<string | undefined>;
  };
  /** Directory the extension was loaded from */
  directory: string;
}

/**
 * Dynamically loaded tool provider
 */
export interface ToolExtension {
  name: string;
  version: string;
  initialize(context: ExtensionContext): void | Promise<void>;
  getTools(): ExtensionTool[];
  dispose?(): void | Promise<void>;
}

/**
 * An enabled extension tool, ready to run
 */
export interface ResolvedExtensionTool {
  qualifiedName: string;
  extensionName: string;
  tool: ExtensionTool;
}

export interface IExtensionRegistry {
  /**
   * Scan the extensions directory and replace the loaded set
   */
  load(): Promise<void>;

  /**
   * Dispose the loaded set, then load again
   */
  reload(): Promise<void>;

  /**
   * Add an extension unless one with the same name is loaded
   * @returns Whether it was added
   */
  register(extension: ToolExtension): Promise<boolean>;

  /**
   * Remove an extension by name
   * @returns Whether it was removed
   */
  unregister(name: string): Promise<boolean>;

  /**
   * Enable or disable an extension
   * @returns False when no extension has that name
   */
  setEnabled(name: string, enabled: boolean): Promise<boolean>;

  /**
   * Descriptors of every loaded extension
   */
  getLoaded(): ExtensionDescriptor[];

  /**
   * Tools of every enabled extension
   */
  getActiveTools(): ResolvedExtensionTool[];

  /**
   * Find an enabled extension tool by qualified name and mark its use
   */
  resolveTool(qualifiedName: string): ResolvedExtensionTool | undefined;

  /**
   * Dispose every loaded extension
   */
  dispose(): Promise<void>;
}
