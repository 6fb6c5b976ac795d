/**
 * Gateway composition - Integration Tests
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { createGateway, Gateway } from "./Gateway";
import { DEFAULT_GATEWAY_CONFIG } from "./ConfigLoader";
import { SecretStore } from "./SecretStore";
import { FakeProcessTable } from "../testing/FakeProcessTable";
import { ErrorCode, GatewayConfig } from "../types";

const BUILTIN_TOOLS = [
  "read_file",
  "write_file",
  "list_directory",
  "launch_application",
  "close_application",
  "get_running_applications",
  "read_text_file",
  "write_text_file",
  "append_to_file",
  "search_in_file",
  "replace_in_file",
];

const TOKEN_EXTENSION = `
module.exports = {
  name: "token",
  version: "1.0.0",
  async initialize(context) {
    this.token = await context.secrets.retrieve("api-token");
  },
  getTools() {
    return [
      {
        name: "show",
        description: "Shows the configured token",
        execute: () => this.token || "none",
      },
    ];
  },
};
`;

describe("createGateway", () => {
  let tempDir: string;
  let config: GatewayConfig;
  let secrets: SecretStore;
  let table: FakeProcessTable;
  let gateway: Gateway | undefined;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "gateway-"));
    config = {
      ...DEFAULT_GATEWAY_CONFIG,
      extensionsDirectory: path.join(tempDir, "extensions"),
      additionalBlockedPaths: [path.join(tempDir, "locked")],
      enableAuditLog: false,
      terminationGraceMs: 50,
      terminationForceMs: 50,
    };
    secrets = new SecretStore({ filePath: path.join(tempDir, "secrets.dat") });
    table = new FakeProcessTable([
      { pid: 10, name: "editor", windowTitle: "notes.txt", hasMainWindow: true },
      {
        pid: 11,
        name: "stuck",
        hasMainWindow: true,
        ignoresClose: true,
        ignoresKill: true,
      },
    ]);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await gateway?.close();
    gateway = undefined;
    fs.rmSync(tempDir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  it("should register every built-in tool", async () => {
    gateway = await createGateway(config, { table, secrets });

    expect(gateway.dispatcher.listTools().map((tool) => tool.name)).toEqual(
      BUILTIN_TOOLS
    );
    expect(fs.statSync(config.extensionsDirectory).isDirectory()).toBe(true);
  });

  it("should load extensions with access to stored secrets", async () => {
    await secrets.store("api-token", "test-secret");
    fs.mkdirSync(config.extensionsDirectory);
    fs.writeFileSync(
      path.join(config.extensionsDirectory, "token.js"),
      TOKEN_EXTENSION
    );

    gateway = await createGateway(config, { table, secrets });
    const result = await gateway.dispatcher.execute("extension_token_show");

    expect(result.success && result.output).toBe("test-secret");
    expect(gateway.dispatcher.listTools()).toHaveLength(BUILTIN_TOOLS.length + 1);
  });

  it("should deny writes to configured blocked paths", async () => {
    gateway = await createGateway(config, { table, secrets });
    const target = path.join(tempDir, "locked", "file.txt");

    const result = await gateway.dispatcher.execute("write_file", {
      path: target,
      content: "x",
    });

    expect(result.status).toBe("denied");
    expect(result.success || result.error).toBe(
      `Access denied: '${target}' is inside the protected system path '${path.join(
        tempDir,
        "locked"
      )}'`
    );
    expect(fs.existsSync(target)).toBe(false);
  });

  it("should close applications through the injected process table", async () => {
    gateway = await createGateway(config, { table, secrets });

    const result = await gateway.dispatcher.execute("close_application", {
      process_id: 10,
    });

    expect(result.success && result.output).toBe(
      "Application 'editor' (PID: 10) closed gracefully."
    );
    expect(table.closeRequests).toEqual([10]);
  });

  it("should apply the configured termination timeouts", async () => {
    gateway = await createGateway(config, { table, secrets });

    const result = await gateway.dispatcher.execute("close_application", {
      process_id: 11,
    });

    expect(result.status).toBe("faulted");
    expect(result.success || result.code).toBe(ErrorCode.TERMINATION_FAILED);
    expect(result.durationMs).toBeLessThan(2000);
  });

  it("should dispose extensions on close", async () => {
    const marker = path.join(tempDir, "closed.txt");
    fs.mkdirSync(config.extensionsDirectory);
    fs.writeFileSync(
      path.join(config.extensionsDirectory, "closer.js"),
      `module.exports = {
        name: "closer",
        version: "1.0.0",
        initialize() {},
        getTools() { return []; },
        dispose() { require("fs").writeFileSync(${JSON.stringify(marker)}, "done"); },
      };`
    );
    gateway = await createGateway(config, { table, secrets });

    await gateway.close();

    expect(fs.readFileSync(marker, "utf8")).toBe("done");
    expect(gateway.extensions.getLoaded()).toEqual([]);
  });
});
