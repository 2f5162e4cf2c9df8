import type { SchemaLoader } from "../discovery/schemaLoader.js";
import type { ToolSearch } from "../discovery/search.js";
import type { ToolProxyFactory } from "../proxy/toolProxy.js";
import type { ToolServerRegistry } from "../registry/serverRegistry.js";
import { LimitExceededError, ToolValidationError, toToolFailure } from "../runtime/errors.js";
import { buildCapabilitySummary } from "./capabilities.js";

/** Services shared by every execution. */
export interface HelperServices {
  readonly registry: ToolServerRegistry;
  readonly schemaLoader: SchemaLoader;
  readonly search: ToolSearch;
  readonly proxyFactory: ToolProxyFactory;
}

export const HELPER_OPS = [
  "list_servers",
  "get_tool_names",
  "capability_summary",
  "describe",
  "search",
  "call_proxy",
] as const;
export type HelperOp = (typeof HELPER_OPS)[number];

export function isHelperOp(op: string): op is HelperOp {
  return HELPER_OPS.some((candidate) => candidate === op);
}

type Fields = Readonly<Record<string, unknown>>;

function isFields(value: unknown): value is Fields {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function field(args: unknown, key: string): unknown {
  return isFields(args) ? args[key] : undefined;
}

function textField(args: unknown, key: string): string | undefined {
  const value = field(args, key);
  return typeof value === "string" ? value : undefined;
}

/**
 * Host side of the helper surface for one execution. Every helper answers
 * asynchronously; proxies are bound inside the context and resolved here on
 * each call, which is also where the per-execution tool-call budget is
 * charged.
 */
export class HelperHost {
  private toolCalls = 0;

  constructor(
    private readonly services: HelperServices,
    private readonly maxToolCalls: number,
    private readonly signal: AbortSignal,
  ) {}

  get toolCallCount(): number {
    return this.toolCalls;
  }

  async call(op: HelperOp, args: unknown): Promise<unknown> {
    switch (op) {
      case "list_servers":
        return this.services.registry.listServers();
      case "get_tool_names": {
        const server = textField(args, "server");
        if (server === undefined) {
          return toToolFailure(new ToolValidationError("server must be a string"));
        }
        return this.services.registry.getToolNames(server);
      }
      case "capability_summary":
        return buildCapabilitySummary(this.services.registry);
      case "describe": {
        const server = textField(args, "server");
        const tool = field(args, "tool");
        if (server === undefined || (tool !== null && typeof tool !== "string")) {
          return toToolFailure(new ToolValidationError("describe(server, tool?, detail?) expects string names"));
        }
        return this.services.schemaLoader.describe(server, tool, field(args, "detail"));
      }
      case "search":
        return this.services.search.search(field(args, "query"), field(args, "limit") ?? undefined);
      case "call_proxy": {
        const server = textField(args, "server");
        const tool = textField(args, "tool");
        if (server === undefined || tool === undefined) {
          return toToolFailure(new ToolValidationError("proxy binding must name a server and a tool"));
        }
        if (this.toolCalls >= this.maxToolCalls) {
          return toToolFailure(
            new LimitExceededError(`tool call budget of ${this.maxToolCalls} calls per execution exhausted`, {
              hint: "batch the work into fewer tool calls or split it across executions",
              details: { max_tool_calls: this.maxToolCalls },
            }),
          );
        }
        this.toolCalls += 1;
        const proxy = this.services.proxyFactory.createProxy(server, tool);
        return proxy(field(args, "args"), { signal: this.signal });
      }
    }
  }
}
