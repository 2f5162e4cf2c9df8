import { after, before, describe, it } from "mocha";
import { expect } from "chai";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";

import { startHttpServer, type HttpServerHandle } from "../src/httpServer.js";
import { EXECUTE_CODE_TOOL_NAME } from "../src/mcp/executeCodeTool.js";
import { ToolServerRegistry } from "../src/registry/serverRegistry.js";
import { createSandboxRuntime, createSandboxServer } from "../src/server.js";
import { ECHO_ENTRY, createCapturingLogger } from "./helpers/fixtures.js";

/**
 * Streamable HTTP front-end bound to an ephemeral loopback port. The body
 * limit is lowered so the 413 path needs only a small request.
 */
describe("http transport", function () {
  this.timeout(15_000);

  const { logger, entries } = createCapturingLogger();
  let handle: HttpServerHandle | null = null;
  let origin = "";

  before(async () => {
    const runtime = createSandboxRuntime({
      registry: ToolServerRegistry.create([ECHO_ENTRY]),
      logger,
      defaultTimeoutSeconds: 5,
      maxTimeoutSeconds: 10,
    });
    handle = await startHttpServer(
      () => createSandboxServer(runtime),
      { enabled: true, host: "127.0.0.1", port: 0, path: "/mcp" },
      logger,
      { maxBodyBytes: 1_024 },
    );
    origin = `http://127.0.0.1:${handle.port}`;
  });

  after(async () => {
    if (handle) {
      await handle.close();
      handle = null;
    }
  });

  function postJson(body: string, headers: Record<string, string> = {}): Promise<Response> {
    return fetch(`${origin}/mcp`, {
      method: "POST",
      headers: { "content-type": "application/json", accept: "application/json, text/event-stream", ...headers },
      body,
    });
  }

  it("answers health checks with security headers and the request id", async () => {
    const response = await fetch(`${origin}/healthz`, { headers: { "x-request-id": "req-health" } });

    expect(response.status).to.equal(200);
    expect(response.headers.get("x-request-id")).to.equal("req-health");
    expect(response.headers.get("x-content-type-options")).to.equal("nosniff");
    expect(response.headers.get("x-frame-options")).to.equal("DENY");
    expect(await response.json()).to.deep.equal({ status: "ok", sessions: 0 });
  });

  it("returns 404 outside the MCP path", async () => {
    const response = await fetch(`${origin}/elsewhere`);

    expect(response.status).to.equal(404);
    expect(await response.json()).to.deep.equal({
      jsonrpc: "2.0",
      error: { code: -32601, message: "Method not found" },
      id: null,
    });
  });

  it("returns 413 for bodies above the limit", async () => {
    const body = JSON.stringify({ jsonrpc: "2.0", id: 1, method: "initialize", params: { filler: "x".repeat(4_096) } });

    const response = await postJson(body);

    expect(response.status).to.equal(413);
    expect(await response.json()).to.deep.equal({
      jsonrpc: "2.0",
      error: { code: -32600, message: "Payload Too Large" },
      id: null,
    });
  });

  it("returns 400 for bodies that are not JSON", async () => {
    const response = await postJson("{not json");

    expect(response.status).to.equal(400);
    expect(await response.json()).to.deep.equal({ jsonrpc: "2.0", error: { code: -32700, message: "Parse error" }, id: null });
  });

  it("returns 400 for requests outside a session", async () => {
    const response = await postJson(JSON.stringify({ jsonrpc: "2.0", id: 2, method: "tools/list", params: {} }), {
      "x-request-id": "req-orphan",
    });

    expect(response.status).to.equal(400);
    expect(await response.json()).to.deep.equal({
      jsonrpc: "2.0",
      error: { code: -32000, message: "Bad Request: No valid session ID provided" },
      id: null,
    });
    const logged = entries.find((entry) => entry.message === "http_session_missing");
    expect(logged?.payload).to.deep.equal({ request_id: "req-orphan", session_id: null });
  });

  it("initializes a session and runs code through it", async () => {
    const client = new Client({ name: "sandbox-http-test-client", version: "1.0.0" });
    const transport = new StreamableHTTPClientTransport(new URL(`${origin}/mcp`));
    await client.connect(transport);

    try {
      expect(transport.sessionId).to.be.a("string");

      const { tools } = await client.listTools();
      expect(tools.map((tool) => tool.name)).to.deep.equal([EXECUTE_CODE_TOOL_NAME]);

      const result = await client.callTool({ name: EXECUTE_CODE_TOOL_NAME, arguments: { code: "return 6 * 7;" } });
      expect(result.structuredContent).to.deep.include({ status: "completed", result: 42, error: null });

      const health = await fetch(`${origin}/healthz`);
      expect(await health.json()).to.deep.equal({ status: "ok", sessions: 1 });
    } finally {
      await client.close();
    }
  });
});
