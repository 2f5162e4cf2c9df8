import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { pathToFileURL } from "node:url";
import process from "node:process";

import { SchemaLoader } from "./discovery/schemaLoader.js";
import { ToolSearch } from "./discovery/search.js";
import { startHttpServer } from "./httpServer.js";
import { StructuredLogger } from "./logger.js";
import { registerExecuteCodeTool } from "./mcp/executeCodeTool.js";
import { ToolProxyFactory } from "./proxy/toolProxy.js";
import { buildRegistry } from "./registry/catalog.js";
import type { ToolServerRegistry } from "./registry/serverRegistry.js";
import { verifyRegistry } from "./registry/verify.js";
import { HELPER_SUMMARY, buildCapabilitySummary } from "./sandbox/capabilities.js";
import { ExecutionSandbox, type SandboxLimits } from "./sandbox/executionSandbox.js";
import { parseServerOptions, type ServerOptions } from "./serverOptions.js";

export const SERVER_NAME = "mcp-code-sandbox";
export const SERVER_VERSION = "0.1.0";

export interface SandboxRuntimeOptions {
  readonly registry: ToolServerRegistry;
  readonly logger: StructuredLogger;
  readonly limits?: Partial<SandboxLimits>;
  readonly defaultTimeoutSeconds?: number;
  readonly maxTimeoutSeconds?: number;
}

/** Everything one process shares across MCP sessions. */
export interface SandboxRuntime {
  readonly registry: ToolServerRegistry;
  readonly logger: StructuredLogger;
  readonly sandbox: ExecutionSandbox;
  readonly defaultTimeoutSeconds: number;
  readonly maxTimeoutSeconds: number;
}

export function createSandboxRuntime(options: SandboxRuntimeOptions): SandboxRuntime {
  const { registry, logger } = options;
  const schemaLoader = new SchemaLoader(registry, logger);
  const sandbox = new ExecutionSandbox({
    services: {
      registry,
      schemaLoader,
      search: new ToolSearch(registry, schemaLoader, logger),
      proxyFactory: new ToolProxyFactory(registry, logger),
    },
    logger,
    ...(options.limits ? { limits: options.limits } : {}),
  });
  return {
    registry,
    logger,
    sandbox,
    defaultTimeoutSeconds: options.defaultTimeoutSeconds ?? 30,
    maxTimeoutSeconds: options.maxTimeoutSeconds ?? 300,
  };
}

/** Builds an MCP server exposing the single `execute_code` tool. */
export function createSandboxServer(runtime: SandboxRuntime): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  registerExecuteCodeTool(server, {
    sandbox: runtime.sandbox,
    logger: runtime.logger,
    defaultTimeoutSeconds: runtime.defaultTimeoutSeconds,
    maxTimeoutSeconds: runtime.maxTimeoutSeconds,
  });
  return server;
}

async function main(): Promise<void> {
  const bootstrapLogger = new StructuredLogger();
  let options: ServerOptions;
  try {
    options = parseServerOptions(process.argv.slice(2));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    bootstrapLogger.error("cli_options_invalid", { message });
    process.exit(1);
  }

  const logger = new StructuredLogger({ logFile: options.logFile, level: options.logLevel });

  let registry: ToolServerRegistry;
  try {
    registry = await buildRegistry({ serversFile: options.serversFile });
  } catch (error) {
    logger.error("registry_load_failed", { message: error instanceof Error ? error.message : String(error) });
    await logger.flush();
    process.exit(1);
  }

  if (options.info) {
    process.stdout.write(`${buildCapabilitySummary(registry)}\n\n${HELPER_SUMMARY}\n`);
    return;
  }

  const report = await verifyRegistry(registry);
  for (const entry of report.undeclared) {
    logger.warn("registry_tool_undeclared", { server: entry.server, tool: entry.tool ?? null });
  }
  if (!report.ok) {
    logger.error("registry_verification_failed", { problems: report.problems });
    await logger.flush();
    process.exit(1);
  }

  const runtime = createSandboxRuntime({
    registry,
    logger,
    limits: options.limits,
    defaultTimeoutSeconds: options.defaultTimeoutSeconds,
    maxTimeoutSeconds: options.maxTimeoutSeconds,
  });

  const cleanup: Array<() => Promise<void>> = [];

  if (options.http.enabled) {
    try {
      const handle = await startHttpServer(() => createSandboxServer(runtime), options.http, logger);
      cleanup.push(handle.close);
    } catch (error) {
      logger.error("http_start_failed", { message: error instanceof Error ? error.message : String(error) });
      await logger.flush();
      process.exit(1);
    }
  }

  if (options.enableStdio) {
    const server = createSandboxServer(runtime);
    await server.connect(new StdioServerTransport());
    cleanup.push(() => server.close());
    logger.info("stdio_listening");
  }

  logger.info("runtime_started", {
    stdio: options.enableStdio,
    http: options.http.enabled,
    servers: registry.listServers().map((server) => server.name),
    limits: runtime.sandbox.limits,
  });

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    logger.warn("shutdown_signal", { signal });
    for (const closer of cleanup) {
      try {
        await closer();
      } catch (error) {
        logger.error("transport_close_failed", { message: error instanceof Error ? error.message : String(error) });
      }
    }
    await logger.flush();
    process.exit(0);
  };
  process.once("SIGINT", (signal) => void shutdown(signal));
  process.once("SIGTERM", (signal) => void shutdown(signal));
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  main().catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
    process.exit(1);
  });
}
