import { z } from "zod";

import { StructuredLogger, type LogEntry } from "../../src/logger.js";
import type { ServerEntry, ToolResult, ToolServerModule } from "../../src/registry/types.js";
import { defineTool } from "../../src/tools/defineTool.js";

/** `echo.ping` returns the message it receives. */
export const echoServer: ToolServerModule = {
  tools: [
    defineTool({
      name: "ping",
      summary: "Echo a message back",
      description: "Returns the provided message unchanged so callers can test the round trip.",
      input: z.object({ message: z.string().describe("Text echoed back") }),
      returns: { type: "object", description: "The echoed message", properties: { message: "string" } },
      handler: ({ message }) => ({ success: true, message }),
    }),
  ],
};

export const ECHO_ENTRY: ServerEntry = {
  name: "echo",
  description: "Echo messages back",
  toolNames: ["ping"],
  module: { kind: "loader", load: async () => echoServer },
};

/** Observations made by the `flaky` tools, reset by {@link resetFlakyState}. */
export const flakyState = { slowCalls: 0, slowAborted: false };

export function resetFlakyState(): void {
  flakyState.slowCalls = 0;
  flakyState.slowAborted = false;
}

export const flakyServer: ToolServerModule = {
  tools: [
    defineTool({
      name: "explode",
      summary: "Always throw an exception",
      input: z.object({}),
      returns: { type: "object", description: "Never returns" },
      handler: () => {
        throw new Error("kaboom");
      },
    }),
    defineTool({
      name: "slow",
      summary: "Wait until the execution is cancelled",
      input: z.object({}),
      returns: { type: "object", description: "Resolves once the signal aborts" },
      handler: (_args, context) => {
        flakyState.slowCalls += 1;
        return new Promise<ToolResult>((resolve) => {
          if (context.signal.aborted) {
            flakyState.slowAborted = true;
            resolve({ success: false, error: "aborted" });
            return;
          }
          context.signal.addEventListener(
            "abort",
            () => {
              flakyState.slowAborted = true;
              resolve({ success: false, error: "aborted" });
            },
            { once: true },
          );
        });
      },
    }),
  ],
};

export const FLAKY_ENTRY: ServerEntry = {
  name: "flaky",
  description: "Misbehaving tools used to exercise failure paths",
  toolNames: ["explode", "slow"],
  module: { kind: "loader", load: async () => flakyServer },
};

/** Logger writing nowhere and keeping every entry for assertions. */
export function createCapturingLogger(): { logger: StructuredLogger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new StructuredLogger({
    level: "debug",
    sink: { write: () => true },
    onEntry: (entry) => entries.push(entry),
  });
  return { logger, entries };
}
