/**
 * Gateway - Composition root
 *
 * Wires the security checks, process lifecycle, credential store, extension
 * registry and built-in tools into one dispatcher.
 */

import { GatewayConfig } from "../types";
import { IProcessTable, ISecretStore } from "../interfaces";
import { createBuiltinTools } from "./BuiltinTools";
import { ExtensionRegistry } from "./ExtensionRegistry";
import { PathGuard } from "./PathGuard";
import { ProcessLauncher } from "./ProcessLauncher";
import { ProcessManager } from "./ProcessManager";
import { NodeProcessTable } from "./ProcessTable";
import { ProcessTerminator } from "./ProcessTerminator";
import { SecretStore } from "./SecretStore";
import { SecurityPolicy } from "./SecurityPolicy";
import { TimeoutManager } from "./TimeoutManager";
import { ToolDispatcher } from "./ToolDispatcher";

export interface GatewayOverrides {
  /** Process table (default: the host's) */
  table?: IProcessTable;
  /** Credential store (default: SecretStore at config.secretStorePath) */
  secrets?: ISecretStore;
}

export interface Gateway {
  readonly config: GatewayConfig;
  readonly dispatcher: ToolDispatcher;
  readonly extensions: ExtensionRegistry;
  readonly secrets: ISecretStore;
  readonly processes: ProcessManager;
  readonly timeouts: TimeoutManager;
  /**
   * Cancel open calls and dispose every extension
   */
  close(): Promise<void>;
}

/**
 * Build a gateway and load its extensions
 */
export async function createGateway(
  config: GatewayConfig,
  overrides: GatewayOverrides = {}
): Promise<Gateway> {
  const policy = new SecurityPolicy();
  const pathGuard = new PathGuard(config.additionalBlockedPaths);
  const table = overrides.table ?? new NodeProcessTable();
  const processes = new ProcessManager(
    new ProcessLauncher(policy),
    new ProcessTerminator(table, {
      gracefulTimeoutMs: config.terminationGraceMs,
      forceTimeoutMs: config.terminationForceMs,
    }),
    table
  );

  const secrets =
    overrides.secrets ?? new SecretStore({ filePath: config.secretStorePath });
  const extensions = new ExtensionRegistry({
    directory: config.extensionsDirectory,
    secrets: { retrieve: (key) => secrets.retrieve(key) },
  });

  const timeouts = new TimeoutManager(config.defaultTimeoutMs);
  const dispatcher = new ToolDispatcher(timeouts, extensions, {
    enableAuditLog: config.enableAuditLog,
  });
  dispatcher.registerAll(createBuiltinTools({ pathGuard, policy, processes }));

  await extensions.load();
  console.error(
    `[Gateway] Ready with ${dispatcher.listTools().length} tools`
  );

  return {
    config,
    dispatcher,
    extensions,
    secrets,
    processes,
    timeouts,
    close: async () => {
      timeouts.cancelAll();
      await extensions.dispose();
      timeouts.clearAll();
    },
  };
}
