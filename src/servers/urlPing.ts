import { performance } from "node:perf_hooks";

import { z } from "zod";

import type { ToolServerModule } from "../registry/types.js";
import { defineTool } from "../tools/defineTool.js";

const PingUrlInputSchema = z.object({
  url: z.string().min(1).describe("The URL to ping (must include the protocol, e.g. https://example.com)"),
  timeout_seconds: z
    .number()
    .int()
    .positive()
    .max(120)
    .default(10)
    .describe("Request timeout in seconds"),
});

export type PingUrlInput = z.output<typeof PingUrlInputSchema>;

/** Subset of the `fetch` signature the tool relies on. */
export type FetchLike = (input: string, init: { method: string; signal: AbortSignal; redirect: "follow" }) => Promise<Response>;

/**
 * Builds the `url_ping` server. The fetch implementation is injectable so
 * tests never touch the network.
 */
export function createUrlPingServer(fetchImpl: FetchLike = (input, init) => fetch(input, init)): ToolServerModule {
  const pingUrl = defineTool({
    name: "ping_url",
    summary: "Ping a URL and return the response status, timing and headers",
    description:
      "Issues a GET request against the URL and reports the HTTP status code, the status text, the response " +
      "time in seconds (rounded to milliseconds) and the response headers. Only http:// and https:// URLs are " +
      "accepted. Network failures and timeouts are reported with success=false and an error message.",
    input: PingUrlInputSchema,
    returns: {
      type: "object",
      description: "Reachability report for the URL",
      properties: {
        success: "boolean",
        url: "string",
        status_code: "integer",
        status_text: "string",
        response_time_seconds: "number",
        headers: "record<string, string>",
        error: "string (only when success is false)",
      },
    },
    async handler(args, context) {
      const { url, timeout_seconds: timeoutSeconds } = args;
      if (!url.startsWith("http://") && !url.startsWith("https://")) {
        return { success: false, url, error: "URL must start with http:// or https://" };
      }

      const controller = new AbortController();
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, timeoutSeconds * 1_000);
      const forwardAbort = () => controller.abort();
      if (context.signal.aborted) {
        controller.abort();
      } else {
        context.signal.addEventListener("abort", forwardAbort, { once: true });
      }

      const startedAt = performance.now();
      try {
        const response = await fetchImpl(url, { method: "GET", signal: controller.signal, redirect: "follow" });
        const responseTime = (performance.now() - startedAt) / 1_000;
        const headers: Record<string, string> = {};
        response.headers.forEach((value, key) => {
          headers[key] = value;
        });
        // Only the status line and headers are reported; release the connection.
        await response.body?.cancel();
        return {
          success: true,
          url,
          status_code: response.status,
          status_text: response.statusText,
          response_time_seconds: Math.round(responseTime * 1_000) / 1_000,
          headers,
        };
      } catch (error) {
        if (timedOut) {
          return { success: false, url, error: `Request timed out after ${timeoutSeconds} seconds` };
        }
        if (context.signal.aborted) {
          return { success: false, url, error: "Request aborted because the execution was cancelled" };
        }
        const message = error instanceof Error ? error.message : String(error);
        return { success: false, url, error: `HTTP error: ${message}` };
      } finally {
        clearTimeout(timer);
        context.signal.removeEventListener("abort", forwardAbort);
      }
    },
  });

  return { tools: [pingUrl] };
}

export const urlPingServer: ToolServerModule = createUrlPingServer();
