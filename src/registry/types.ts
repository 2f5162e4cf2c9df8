import type { z } from "zod";

import type { StructuredLogger } from "../logger.js";

/**
 * Value returned by every tool. Collaborators are free to add fields; the
 * runtime only relies on `success` being a boolean.
 */
export type ToolResult = {
  readonly success: boolean;
  readonly error?: string;
  readonly [key: string]: unknown;
};

/** Context handed to a tool on every invocation. */
export interface ToolInvocationContext {
  readonly server: string;
  readonly tool: string;
  /** Aborted when the owning execution times out. */
  readonly signal: AbortSignal;
  readonly logger: StructuredLogger;
}

/** Shape of the value a tool returns, advertised by `describe(..., "full")`. */
export interface ReturnContract {
  readonly type: string;
  readonly description: string;
  readonly properties?: Readonly<Record<string, string>>;
}

export interface ToolDefinition {
  readonly name: string;
  /** One-line description used by the summary tier and by search. */
  readonly summary: string;
  /** Long documentation, only returned at the full detail level. */
  readonly description?: string;
  readonly input: z.AnyZodObject;
  readonly returns: ReturnContract;
  invoke(args: unknown, context: ToolInvocationContext): Promise<ToolResult>;
}

/** Contract every collaborator module satisfies. */
export interface ToolServerModule {
  readonly tools: readonly ToolDefinition[];
}

/**
 * How the registry reaches a collaborator module. Static entries carry a
 * loader closure; catalogue entries carry an import specifier resolved at
 * call time.
 */
export type ModuleReference =
  | { readonly kind: "loader"; readonly load: () => Promise<ToolServerModule> }
  | { readonly kind: "specifier"; readonly specifier: string };

export interface ServerEntry {
  readonly name: string;
  readonly description: string;
  readonly toolNames: readonly string[];
  readonly module: ModuleReference;
}

/** Payload returned by `listServers()`: names and descriptions only. */
export interface ServerSummary {
  readonly name: string;
  readonly description: string;
}
