import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import { findTool, resolveServerModule } from "../registry/moduleResolver.js";
import type { ToolServerRegistry } from "../registry/serverRegistry.js";
import type { ReturnContract, ServerEntry, ToolServerModule } from "../registry/types.js";
import {
  SandboxError,
  ToolValidationError,
  isToolFailure,
  normaliseThrown,
  toToolFailure,
  type ToolFailure,
} from "../runtime/errors.js";

export const DETAIL_LEVELS = ["summary", "full"] as const;
export type DetailLevel = (typeof DETAIL_LEVELS)[number];

export interface ToolParameterSchema {
  readonly name: string;
  readonly type: string;
  readonly required: boolean;
  readonly default?: unknown;
  readonly description?: string;
  readonly enum?: readonly unknown[];
}

export interface ToolSchema {
  readonly server: string;
  readonly name: string;
  readonly summary: string;
  readonly description: string;
  readonly parameters: readonly ToolParameterSchema[];
  readonly returns: ReturnContract;
}

export interface ToolSummary {
  readonly server: string;
  readonly name: string;
  readonly summary: string;
}

export interface ServerToolIndex {
  readonly server: string;
  readonly description: string;
  readonly tools: ReadonlyArray<{ readonly name: string; readonly summary: string }>;
}

export type DescribeResult = ServerToolIndex | ToolSummary | ToolSchema;

/**
 * Produces tool documentation on demand. Nothing is cached: every call loads
 * the collaborator module and introspects its zod input schema, so the
 * answer always reflects the implementation the proxies will reach.
 */
export class SchemaLoader {
  constructor(
    private readonly registry: ToolServerRegistry,
    private readonly logger: StructuredLogger,
  ) {}

  async describe(server: string, tool?: string | null, detail: unknown = "summary"): Promise<DescribeResult | ToolFailure> {
    if (!isDetailLevel(detail)) {
      return toToolFailure(
        new ToolValidationError(`detail must be one of ${DETAIL_LEVELS.join(", ")}`, {
          details: { detail: String(detail) },
        }),
      );
    }
    const entry = this.registry.getServer(server);
    if (isToolFailure(entry)) {
      return entry;
    }
    try {
      const module = await resolveServerModule(entry);
      if (tool === undefined || tool === null) {
        return buildIndex(entry, module);
      }
      const definition = findTool(entry, module, tool);
      if (detail === "summary") {
        return { server: entry.name, name: definition.name, summary: definition.summary };
      }
      return {
        server: entry.name,
        name: definition.name,
        summary: definition.summary,
        description: definition.description ?? definition.summary,
        parameters: describeParameters(definition.input),
        returns: definition.returns,
      };
    } catch (error) {
      const failure = normaliseThrown(error, `describe failed for server "${server}"`);
      if (failure.category !== "NOT_FOUND") {
        this.logger.warn("describe_failed", { server, tool: tool ?? null, code: failure.code, message: failure.message });
      }
      return toToolFailure(failure);
    }
  }

  /**
   * Summary-tier listing of one server, in declared tool order. Throws a
   * {@link SandboxError} when the module cannot be loaded.
   */
  async listToolSummaries(entry: ServerEntry): Promise<ServerToolIndex> {
    const module = await resolveServerModule(entry);
    return buildIndex(entry, module);
  }
}

function isDetailLevel(value: unknown): value is DetailLevel {
  return value === "summary" || value === "full";
}

function buildIndex(entry: ServerEntry, module: ToolServerModule): ServerToolIndex {
  return {
    server: entry.name,
    description: entry.description,
    tools: entry.toolNames.map((name) => {
      const definition = module.tools.find((candidate) => candidate.name === name);
      return { name, summary: definition?.summary ?? "" };
    }),
  };
}

/** Lists the parameters of a zod object schema in declaration order. */
export function describeParameters(schema: z.AnyZodObject): ToolParameterSchema[] {
  return Object.entries(schema.shape).map(([name, field]) => describeParameter(name, toZodType(field)));
}

function toZodType(value: unknown): z.ZodTypeAny {
  if (value instanceof z.ZodType) {
    return value;
  }
  throw new SandboxError("COLLABORATOR_ERROR", "input schema contains a non-zod field");
}

interface UnwrappedField {
  readonly inner: z.ZodTypeAny;
  readonly optional: boolean;
  readonly hasDefault: boolean;
  readonly defaultValue: unknown;
  readonly description: string | undefined;
}

/** Peels optional/nullable/default and transform wrappers off a field. */
function unwrapField(field: z.ZodTypeAny): UnwrappedField {
  let current = field;
  let optional = false;
  let hasDefault = false;
  let defaultValue: unknown;
  let description = field.description;

  for (;;) {
    description ??= current.description;
    if (current instanceof z.ZodOptional) {
      optional = true;
      current = current.unwrap();
    } else if (current instanceof z.ZodNullable) {
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      if (!hasDefault) {
        hasDefault = true;
        defaultValue = current._def.defaultValue();
      }
      current = current.removeDefault();
    } else if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else if (current instanceof z.ZodBranded) {
      current = current.unwrap();
    } else if (current instanceof z.ZodCatch) {
      current = current.removeCatch();
    } else if (current instanceof z.ZodReadonly) {
      current = current.unwrap();
    } else if (current instanceof z.ZodLazy) {
      current = current.schema;
    } else {
      break;
    }
  }

  return { inner: current, optional, hasDefault, defaultValue, description };
}

function describeParameter(name: string, field: z.ZodTypeAny): ToolParameterSchema {
  const { inner, optional, hasDefault, defaultValue, description } = unwrapField(field);
  const enumValues = enumValuesOf(inner);
  return {
    name,
    type: typeName(inner),
    required: !optional && !hasDefault,
    ...(hasDefault ? { default: toJsonValue(defaultValue) } : {}),
    ...(description !== undefined ? { description } : {}),
    ...(enumValues ? { enum: enumValues } : {}),
  };
}

/** Semantic type label of a zod schema, e.g. `integer`, `array<string>`. */
export function typeName(schema: z.ZodTypeAny): string {
  const { inner } = unwrapField(schema);
  if (inner instanceof z.ZodString) return "string";
  if (inner instanceof z.ZodNumber) return inner.isInt ? "integer" : "number";
  if (inner instanceof z.ZodBoolean) return "boolean";
  if (inner instanceof z.ZodBigInt) return "bigint";
  if (inner instanceof z.ZodDate) return "date";
  if (inner instanceof z.ZodNull) return "null";
  if (inner instanceof z.ZodArray) return `array<${typeName(inner.element)}>`;
  if (inner instanceof z.ZodObject || inner instanceof z.ZodDiscriminatedUnion) return "object";
  if (inner instanceof z.ZodRecord) return `record<string, ${typeName(inner.valueSchema)}>`;
  if (inner instanceof z.ZodEnum || inner instanceof z.ZodNativeEnum) return "enum";
  if (inner instanceof z.ZodLiteral) return "literal";
  if (inner instanceof z.ZodUnion) {
    const options: readonly z.ZodTypeAny[] = inner.options;
    return options.map((option) => typeName(option)).join(" | ");
  }
  if (inner instanceof z.ZodAny || inner instanceof z.ZodUnknown) return "any";
  return "unknown";
}

function enumValuesOf(schema: z.ZodTypeAny): readonly unknown[] | undefined {
  if (schema instanceof z.ZodEnum) {
    const options: readonly string[] = schema.options;
    return [...options];
  }
  if (schema instanceof z.ZodNativeEnum) {
    const values: unknown[] = Object.values(schema.enum);
    // Numeric TS enums map both ways; keep the numeric members only.
    const numeric = values.filter((value) => typeof value === "number");
    return numeric.length > 0 ? numeric : values;
  }
  if (schema instanceof z.ZodLiteral) {
    const value: unknown = schema.value;
    return [value];
  }
  return undefined;
}

function toJsonValue(value: unknown): unknown {
  if (value === undefined) {
    return null;
  }
  try {
    const encoded = JSON.stringify(value);
    return encoded === undefined ? String(value) : JSON.parse(encoded);
  } catch {
    return String(value);
  }
}
