/**
 * ExtensionRegistry - Loads and tracks tool extensions
 *
 * Every `*.js` / `*.cjs` file and every sub-directory of the extensions
 * directory is a package. A package's own files are evaluated afresh on every
 * load, so a reload sees them as they are now; anything else it requires goes
 * through Node's require.
 * Exported classes whose prototype has getTools are instantiated; exported
 * objects that already satisfy the contract are used as they are.
 *
 * Mutations run one at a time on a queue. The loaded set is replaced as a
 * whole, so readers never see a half-built set.
 */

import * as fs from "fs";
import { createRequire } from "module";
import * as path from "path";
import * as vm from "vm";
import PQueue from "p-queue";
import { z } from "zod";
import { ExtensionDescriptor, ValidationError } from "../types";
import {
  ExtensionContext,
  ExtensionTool,
  IExtensionRegistry,
  ResolvedExtensionTool,
  ToolExtension,
} from "../interfaces";
import { errorMessage } from "./ErrorHandler";

export const REGISTERED_ORIGIN = "<registered>";

const PACKAGE_FILE = /\.c?js$/i;

// Names end up inside MCP tool names
const identifier = z
  .string()
  .regex(/^[A-Za-z0-9_-]+$/, "must contain only letters, digits, '_' or '-'");

const extensionSchema = z.object({
  name: identifier,
  version: z.string().min(1),
  initialize: z.function(),
  getTools: z.function(),
  dispose: z.function().optional(),
});

const toolSchema = z.object({
  name: identifier,
  description: z.string(),
  parameters: z
    .record(
      z.object({
        type: z.enum(["string", "number", "boolean", "object", "array"]),
        required: z.boolean().optional(),
        description: z.string().optional(),
      })
    )
    .optional(),
  execute: z.function(),
});

export interface ExtensionRegistryOptions {
  /** Directory scanned for extension packages */
  directory: string;
  /** Credential lookup handed to extensions */
  secrets?: ExtensionContext["secrets"];
}

interface LoadedExtension {
  extension: ToolExtension;
  descriptor: ExtensionDescriptor;
  tools: ResolvedExtensionTool[];
}

function isToolExtension(value: unknown): value is ToolExtension {
  return extensionSchema.safeParse(value).success;
}

function isToolArray(value: unknown): value is ExtensionTool[] {
  return z.array(toolSchema).safeParse(value).success;
}

function isExtensionClass(value: unknown): value is new () => unknown {
  if (typeof value !== "function") {
    return false;
  }
  const prototype: unknown = value.prototype;
  return (
    typeof prototype === "object" &&
    prototype !== null &&
    "getTools" in prototype &&
    typeof prototype.getTools === "function"
  );
}

function describeError(error: unknown): string {
  return errorMessage(error);
}

interface PackageModule {
  exports: unknown;
}

const FRESH_EXTENSIONS = new Set([".js", ".cjs", ".json"]);

function isInside(root: string, file: string): boolean {
  const relative = path.relative(root, file);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

/**
 * Evaluate a CommonJS file without consulting any require cache. Files under
 * root that it requires are evaluated the same way; cycles share `modules`.
 */
function evaluateModule(
  file: string,
  root: string,
  modules: Map<string, PackageModule>
): unknown {
  const existing = modules.get(file);
  if (existing) {
    return existing.exports;
  }
  const record: PackageModule = { exports: {} };
  modules.set(file, record);

  const source = fs.readFileSync(file, "utf8");
  if (path.extname(file).toLowerCase() === ".json") {
    record.exports = JSON.parse(source);
    return record.exports;
  }

  const nodeRequire = createRequire(file);
  const packageRequire = (request: string): unknown => {
    const resolved = nodeRequire.resolve(request);
    return isInside(root, resolved) &&
      FRESH_EXTENSIONS.has(path.extname(resolved).toLowerCase())
      ? evaluateModule(resolved, root, modules)
      : nodeRequire(request);
  };

  // Keep line numbers: the wrapper shares the first line, a shebang becomes a comment
  const body = source.startsWith("#!") ? `//${source}` : source;
  const wrapper: unknown = vm.runInThisContext(
    `(function (exports, require, module, __filename, __dirname) {${body}\n})`,
    { filename: file }
  );
  if (typeof wrapper !== "function") {
    throw new ValidationError(`Could not compile ${file}`);
  }
  wrapper.call(
    record.exports,
    record.exports,
    packageRequire,
    record,
    file,
    path.dirname(file)
  );
  return record.exports;
}

/**
 * First qualified tool name of `candidate` already served by another extension
 */
function findToolConflict(
  entries: Map<string, LoadedExtension>,
  candidate: LoadedExtension
): { qualifiedName: string; owner: string } | undefined {
  for (const entry of entries.values()) {
    for (const tool of candidate.tools) {
      if (entry.tools.some((t) => t.qualifiedName === tool.qualifiedName)) {
        return { qualifiedName: tool.qualifiedName, owner: entry.descriptor.name };
      }
    }
  }
  return undefined;
}

/**
 * Qualified dispatch name of an extension tool
 */
export function qualifyToolName(extensionName: string, toolName: string): string {
  return `extension_${extensionName}_${toolName}`;
}

export class ExtensionRegistry implements IExtensionRegistry {
  private directory: string;
  private secrets: ExtensionContext["secrets"];
  private entries: Map<string, LoadedExtension> = new Map();
  private queue = new PQueue({ concurrency: 1 });

  constructor(options: ExtensionRegistryOptions) {
    this.directory = path.resolve(options.directory);
    this.secrets = options.secrets ?? {
      retrieve: async () => undefined,
    };
  }

  load(): Promise<void> {
    return this.queue.add(() => this.loadDirectory());
  }

  reload(): Promise<void> {
    return this.queue.add(async () => {
      const previous = this.entries;
      this.entries = new Map();
      await this.disposeAll(previous);
      await this.loadDirectory();
    });
  }

  register(extension: ToolExtension): Promise<boolean> {
    return this.queue.add(async () => {
      if (this.entries.has(extension.name)) {
        return false;
      }
      const loaded = await this.activate(
        extension,
        REGISTERED_ORIGIN,
        this.directory
      );
      const conflict = findToolConflict(this.entries, loaded);
      if (conflict) {
        await this.disposeOne(loaded);
        throw new ValidationError(
          `Extension '${extension.name}' tool '${conflict.qualifiedName}' is already provided by extension '${conflict.owner}'`
        );
      }
      this.entries = new Map(this.entries).set(extension.name, loaded);
      return true;
    });
  }

  unregister(name: string): Promise<boolean> {
    return this.queue.add(async () => {
      const entry = this.entries.get(name);
      if (!entry) {
        return false;
      }
      const next = new Map(this.entries);
      next.delete(name);
      this.entries = next;
      await this.disposeOne(entry);
      return true;
    });
  }

  setEnabled(name: string, enabled: boolean): Promise<boolean> {
    return this.queue.add(async () => {
      const entry = this.entries.get(name);
      if (!entry) {
        return false;
      }
      this.entries = new Map(this.entries).set(name, {
        ...entry,
        descriptor: { ...entry.descriptor, enabled },
      });
      console.error(
        `[ExtensionRegistry] Extension '${name}' ${enabled ? "enabled" : "disabled"}`
      );
      return true;
    });
  }

  getLoaded(): ExtensionDescriptor[] {
    return Array.from(this.entries.values(), (entry) => ({
      ...entry.descriptor,
      tools: [...entry.descriptor.tools],
    }));
  }

  getActiveTools(): ResolvedExtensionTool[] {
    return Array.from(this.entries.values())
      .filter((entry) => entry.descriptor.enabled)
      .flatMap((entry) => entry.tools);
  }

  resolveTool(qualifiedName: string): ResolvedExtensionTool | undefined {
    for (const entry of this.entries.values()) {
      if (!entry.descriptor.enabled) {
        continue;
      }
      const tool = entry.tools.find((t) => t.qualifiedName === qualifiedName);
      if (tool) {
        entry.descriptor.lastUsedAt = new Date();
        return tool;
      }
    }
    return undefined;
  }

  dispose(): Promise<void> {
    return this.queue.add(async () => {
      const previous = this.entries;
      this.entries = new Map();
      await this.disposeAll(previous);
    });
  }

  /**
   * Build a fresh set from the directory and swap it in
   */
  private async loadDirectory(): Promise<void> {
    await fs.promises.mkdir(this.directory, { recursive: true });
    const dirents = await fs.promises.readdir(this.directory, {
      withFileTypes: true,
    });
    const packages = dirents
      .filter(
        (entry) =>
          entry.isDirectory() || (entry.isFile() && PACKAGE_FILE.test(entry.name))
      )
      .map((entry) => entry.name)
      .sort();

    const next = new Map<string, LoadedExtension>();
    for (const name of packages) {
      const packagePath = path.join(this.directory, name);
      try {
        for (const loaded of await this.loadPackage(packagePath)) {
          if (next.has(loaded.descriptor.name)) {
            console.error(
              `[ExtensionRegistry] Skipping duplicate extension '${loaded.descriptor.name}' from ${packagePath}`
            );
            await this.disposeOne(loaded);
            continue;
          }
          const conflict = findToolConflict(next, loaded);
          if (conflict) {
            console.error(
              `[ExtensionRegistry] Skipping extension '${loaded.descriptor.name}' from ${packagePath}: tool '${conflict.qualifiedName}' is already provided by extension '${conflict.owner}'`
            );
            await this.disposeOne(loaded);
            continue;
          }
          next.set(loaded.descriptor.name, loaded);
        }
      } catch (error) {
        console.error(
          `[ExtensionRegistry] Failed to load package ${packagePath}: ${describeError(error)}`
        );
      }
    }

    const previous = this.entries;
    this.entries = next;
    await this.disposeAll(previous);
    console.error(
      `[ExtensionRegistry] Loaded ${next.size} extension(s) from ${this.directory}`
    );
  }

  private async loadPackage(packagePath: string): Promise<LoadedExtension[]> {
    const isDirectory = fs.statSync(packagePath).isDirectory();
    const entryFile = createRequire(path.join(this.directory, "index.js")).resolve(
      packagePath
    );
    const exported = evaluateModule(
      entryFile,
      isDirectory ? packagePath : entryFile,
      new Map()
    );
    const directory = isDirectory ? packagePath : path.dirname(packagePath);

    const candidates = new Set<unknown>([exported]);
    if (typeof exported === "object" && exported !== null) {
      for (const value of Object.values(exported)) {
        candidates.add(value);
      }
    }

    const loaded: LoadedExtension[] = [];
    for (const candidate of candidates) {
      try {
        let instance: unknown;
        if (isExtensionClass(candidate)) {
          instance = new candidate();
        } else if (isToolExtension(candidate)) {
          instance = candidate;
        } else {
          continue;
        }
        loaded.push(await this.activate(instance, packagePath, directory));
      } catch (error) {
        console.error(
          `[ExtensionRegistry] Failed to initialize an export of ${packagePath}: ${describeError(error)}`
        );
      }
    }
    return loaded;
  }

  /**
   * Validate and initialize an extension
   * @throws ValidationError when it breaks the contract
   */
  private async activate(
    candidate: unknown,
    originPath: string,
    directory: string
  ): Promise<LoadedExtension> {
    if (!isToolExtension(candidate)) {
      const result = extensionSchema.safeParse(candidate);
      const issue = result.success ? undefined : result.error.issues[0];
      throw new ValidationError(
        `Invalid extension: ${
          issue ? `${issue.path.join(".") || "value"} ${issue.message}` : "contract not met"
        }`
      );
    }
    const extension = candidate;

    await extension.initialize({ secrets: this.secrets, directory });

    const tools: unknown = extension.getTools();
    if (!isToolArray(tools)) {
      await this.disposeExtension(extension);
      throw new ValidationError(
        `Extension '${extension.name}' returned invalid tool definitions`
      );
    }

    const seen = new Set<string>();
    for (const tool of tools) {
      if (seen.has(tool.name)) {
        await this.disposeExtension(extension);
        throw new ValidationError(
          `Extension '${extension.name}' declares tool '${tool.name}' more than once`
        );
      }
      seen.add(tool.name);
    }

    const resolved = tools.map((tool) => ({
      qualifiedName: qualifyToolName(extension.name, tool.name),
      extensionName: extension.name,
      tool,
    }));

    return {
      extension,
      tools: resolved,
      descriptor: {
        name: extension.name,
        version: extension.version,
        originPath,
        enabled: true,
        installedAt: new Date(),
        tools: resolved.map((tool) => tool.qualifiedName),
      },
    };
  }

  private async disposeAll(entries: Map<string, LoadedExtension>): Promise<void> {
    for (const entry of entries.values()) {
      await this.disposeOne(entry);
    }
  }

  private disposeOne(entry: LoadedExtension): Promise<void> {
    return this.disposeExtension(entry.extension);
  }

  private async disposeExtension(extension: ToolExtension): Promise<void> {
    try {
      await extension.dispose?.();
    } catch (error) {
      console.error(
        `[ExtensionRegistry] Failed to dispose extension '${extension.name}': ${describeError(error)}`
      );
    }
  }
}
