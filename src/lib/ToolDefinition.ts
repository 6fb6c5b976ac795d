/**
 * ToolDefinition - Typed tool declarations
 *
 * A tool declares a zod object schema for its arguments, an optional
 * authorize hook run before execution, and an execute handler. Declarations
 * are erased to the Tool shape the dispatcher works with.
 */

import { z } from "zod";
import { SecurityDecision, ValidationError } from "../types";
import {
  ExecutionContext,
  ExtensionParameter,
  ExtensionParameterType,
  ResolvedExtensionTool,
} from "../interfaces";

/**
 * JSON schema of one tool argument, as advertised to clients
 */
export interface JsonSchemaProperty {
  type?: string | string[];
  description?: string;
  items?: JsonSchemaProperty;
}

/**
 * JSON schema of a tool's argument object
 */
export interface ToolInputSchema {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
}

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

/**
 * A call whose arguments passed validation
 */
export interface BoundToolCall {
  authorize(): Promise<SecurityDecision>;
  execute(context: ExecutionContext): Promise<string>;
}

/**
 * Tool as registered with the dispatcher
 */
export interface Tool extends ToolDescriptor {
  /**
   * Validate raw arguments
   * @throws ValidationError naming the offending parameter
   */
  bind(args: Record<string, unknown>): BoundToolCall;
}

/**
 * Object schema parsing to T. Input is left open so fields may transform.
 */
export type ArgumentSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown> & {
  shape: z.ZodRawShape;
};

export interface ToolDefinition<T> {
  name: string;
  description: string;
  inputSchema: ArgumentSchema<T>;
  authorize?(args: T): SecurityDecision | Promise<SecurityDecision>;
  execute(args: T, context: ExecutionContext): Promise<string>;
}

const ALLOWED: SecurityDecision = { allowed: true };

function unwrap(schema: z.ZodTypeAny): z.ZodTypeAny {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return unwrap(schema.unwrap());
  }
  if (schema instanceof z.ZodDefault) {
    return unwrap(schema.removeDefault());
  }
  if (schema instanceof z.ZodEffects) {
    return unwrap(schema.innerType());
  }
  return schema;
}

function toJsonSchemaProperty(schema: z.ZodTypeAny): JsonSchemaProperty {
  const inner = unwrap(schema);
  const property: JsonSchemaProperty = {};
  if (schema.description) {
    property.description = schema.description;
  }

  if (inner instanceof z.ZodString) {
    property.type = "string";
  } else if (inner instanceof z.ZodNumber) {
    property.type = inner.isInt ? "integer" : "number";
  } else if (inner instanceof z.ZodBoolean) {
    property.type = "boolean";
  } else if (inner instanceof z.ZodArray) {
    property.type = "array";
    property.items = toJsonSchemaProperty(inner.element);
  } else if (inner instanceof z.ZodObject || inner instanceof z.ZodRecord) {
    property.type = "object";
  } else if (inner instanceof z.ZodUnion) {
    const options: z.ZodTypeAny[] = inner.options;
    const types = options.flatMap((option) => {
      const type = toJsonSchemaProperty(option).type;
      return type === undefined ? [] : Array.isArray(type) ? type : [type];
    });
    property.type = Array.from(new Set(types));
  }

  return property;
}

/**
 * Build the advertised JSON schema of a zod object schema
 */
export function toInputSchema(schema: {
  shape: z.ZodRawShape;
}): ToolInputSchema {
  const shape = schema.shape;
  const properties: Record<string, JsonSchemaProperty> = {};
  const required: string[] = [];

  for (const [key, value] of Object.entries(shape)) {
    properties[key] = toJsonSchemaProperty(value);
    if (!value.isOptional()) {
      required.push(key);
    }
  }

  return { type: "object", properties, required };
}

/**
 * Validate raw arguments against a tool schema
 * @throws ValidationError
 */
export function parseArguments<T>(
  schema: ArgumentSchema<T>,
  args: Record<string, unknown>
): T {
  const shape = schema.shape;
  for (const [key, value] of Object.entries(shape)) {
    if (!value.isOptional() && args[key] === undefined) {
      throw new ValidationError(`Missing required parameter: ${key}`);
    }
  }

  const result = schema.safeParse(args);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue?.path[0];
    if (issue && key !== undefined) {
      throw new ValidationError(
        `Invalid parameter '${String(key)}': ${issue.message}`
      );
    }
    throw new ValidationError(
      `Invalid arguments: ${issue ? issue.message : "unknown shape"}`
    );
  }
  return result.data;
}

/**
 * Declare a tool
 */
export function defineTool<T>(definition: ToolDefinition<T>): Tool {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: toInputSchema(definition.inputSchema),
    bind(args) {
      const parsed = parseArguments(definition.inputSchema, args);
      return {
        authorize: async () =>
          definition.authorize ? definition.authorize(parsed) : ALLOWED,
        execute: (context) => definition.execute(parsed, context),
      };
    },
  };
}

const PARAMETER_SCHEMAS: Record<ExtensionParameterType, () => z.ZodTypeAny> = {
  string: () => z.string(),
  number: () => z.number(),
  boolean: () => z.boolean(),
  array: () => z.array(z.unknown()),
  object: () => z.record(z.unknown()),
};

function parameterSchema(parameter: ExtensionParameter): z.ZodTypeAny {
  let schema = PARAMETER_SCHEMAS[parameter.type]();
  if (parameter.description) {
    schema = schema.describe(parameter.description);
  }
  return parameter.required ? schema : schema.optional();
}

/**
 * Wrap an extension tool so it dispatches like a built-in
 */
export function defineExtensionTool(resolved: ResolvedExtensionTool): Tool {
  const shape: z.ZodRawShape = {};
  for (const [key, parameter] of Object.entries(
    resolved.tool.parameters ?? {}
  )) {
    shape[key] = parameterSchema(parameter);
  }

  return defineTool({
    name: resolved.qualifiedName,
    description: resolved.tool.description,
    inputSchema: z.object(shape).passthrough(),
    execute: async (args, context) => {
      const output = await resolved.tool.execute(args, context.signal);
      return typeof output === "string" ? output : String(output);
    },
  });
}
