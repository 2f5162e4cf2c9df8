import { performance } from "node:perf_hooks";

import type { StructuredLogger } from "../logger.js";
import { findTool, resolveServerModule } from "../registry/moduleResolver.js";
import type { ToolServerRegistry } from "../registry/serverRegistry.js";
import type { ToolResult } from "../registry/types.js";
import {
  CollaboratorError,
  ToolValidationError,
  isToolFailure,
  normaliseThrown,
  toToolFailure,
} from "../runtime/errors.js";

export interface ToolProxyCallOptions {
  /** Aborted when the caller gives up on the invocation. */
  readonly signal?: AbortSignal;
}

/** Callable bound to one `(server, tool)` pair. */
export type ToolProxy = ((args?: unknown, options?: ToolProxyCallOptions) => Promise<ToolResult>) & {
  readonly server: string;
  readonly tool: string;
};

const NEVER_ABORTED = new AbortController().signal;

/**
 * Creates proxies for registered tools. A proxy only captures its binding;
 * the registry entry, the module and the definition are resolved again on
 * every call and nothing is memoised between calls.
 */
export class ToolProxyFactory {
  constructor(
    private readonly registry: ToolServerRegistry,
    private readonly logger: StructuredLogger,
  ) {}

  createProxy(server: string, tool: string): ToolProxy {
    const proxy = (args?: unknown, options: ToolProxyCallOptions = {}) => this.invoke(server, tool, args, options);
    return Object.assign(proxy, { server, tool });
  }

  /**
   * Invokes `server.tool` with keyword arguments. Failures never throw: they
   * come back as structured values carrying an error code.
   */
  async invoke(server: string, tool: string, args: unknown, options: ToolProxyCallOptions = {}): Promise<ToolResult> {
    const startedAt = performance.now();
    const durationMs = () => Math.round((performance.now() - startedAt) * 1_000) / 1_000;

    if (args !== undefined && args !== null && (typeof args !== "object" || Array.isArray(args))) {
      return toToolFailure(
        new ToolValidationError(`arguments for ${server}.${tool} must be an object of named parameters`),
      );
    }

    const entry = this.registry.getServer(server);
    if (isToolFailure(entry)) {
      this.logger.warn("tool_proxy_failed", { server, tool, code: entry.code, duration_ms: durationMs() });
      return entry;
    }

    try {
      const module = await resolveServerModule(entry);
      const definition = findTool(entry, module, tool);
      const result: unknown = await definition.invoke(args ?? {}, {
        server,
        tool,
        signal: options.signal ?? NEVER_ABORTED,
        logger: this.logger,
      });
      if (!isToolResult(result)) {
        throw new CollaboratorError(
          `${server}.${tool} returned a malformed result (expected an object with a boolean "success" field)`,
        );
      }
      this.logger.info("tool_proxy_invoked", { server, tool, success: result.success, duration_ms: durationMs() });
      return result;
    } catch (error) {
      const failure = normaliseThrown(error, `${server}.${tool} failed`);
      this.logger.warn("tool_proxy_failed", {
        server,
        tool,
        code: failure.code,
        message: failure.message,
        duration_ms: durationMs(),
      });
      return toToolFailure(failure);
    }
  }
}

function isToolResult(value: unknown): value is ToolResult {
  return !!value && typeof value === "object" && !Array.isArray(value) && "success" in value && typeof value.success === "boolean";
}
