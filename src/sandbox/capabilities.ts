import type { ToolServerRegistry } from "../registry/serverRegistry.js";

/** Helper surface advertised to callers; it never grows with the registry. */
export const HELPER_SUMMARY = [
  "The code runs as the body of an async function: use await, and `return` a JSON-serialisable value",
  "(or define `async function main()`, which is called when nothing is returned).",
  "Helpers available as globals:",
  "- list_servers() → Promise<{ name, description }[]>",
  "- get_tool_names(server) → Promise<string[]>",
  '- describe(server, tool?, detail = "summary" | "full") → Promise<tool index, summary or full schema>',
  "- search(query, limit?) → Promise<{ server, tool, score, description }[]>",
  "- create_proxy(server, tool) → (args?) => Promise<{ success, ... }>",
  "- capability_summary() → Promise<string>",
  "- print(...values) and console.log/info/debug/warn/error capture output.",
  'Failures come back as values: { success: false, code: "E-NOT-FOUND" | "E-VALIDATION" | "E-COLLABORATOR" | "E-LIMIT", error, hint? }.',
  "There is no process, require, import(), eval, timers, network or file system access.",
].join("\n");

/** One paragraph describing the registered servers and the helper surface. */
export function buildCapabilitySummary(registry: ToolServerRegistry): string {
  const servers = registry.servers();
  if (servers.length === 0) {
    return "No tool servers are registered. Helpers: list_servers, get_tool_names, describe, search, create_proxy, print.";
  }
  const listing = servers
    .map((entry) => {
      const noun = entry.toolNames.length === 1 ? "tool" : "tools";
      return `${entry.name} (${entry.toolNames.length} ${noun}: ${entry.toolNames.join(", ")})`;
    })
    .join("; ");
  const plural = servers.length === 1 ? "server is" : "servers are";
  return (
    `${servers.length} tool ${plural} registered: ${listing}. ` +
    "Call describe(server, tool, \"full\") for parameters, search(query) to find tools by keyword, " +
    "and create_proxy(server, tool) to obtain an async function invoking a tool."
  );
}
