import { afterEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import type { ToolDefinition, ToolInvocationContext } from "../src/registry/types.js";
import { createUrlPingServer, type FetchLike } from "../src/servers/urlPing.js";
import { createCapturingLogger } from "./helpers/fixtures.js";

function pingTool(fetchImpl: FetchLike): ToolDefinition {
  const [tool] = createUrlPingServer(fetchImpl).tools;
  if (!tool) {
    throw new Error("url_ping exports no tool");
  }
  return tool;
}

function contextWith(signal: AbortSignal = new AbortController().signal): ToolInvocationContext {
  return { server: "url_ping", tool: "ping_url", signal, logger: createCapturingLogger().logger };
}

/** Fetch that never settles until its signal aborts. */
const hangingFetch: FetchLike = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    init.signal.addEventListener("abort", () => reject(new Error("This operation was aborted")), { once: true });
  });

describe("url_ping server", () => {
  afterEach(() => {
    sinon.restore();
  });

  it("reports the status, text and headers of the response", async () => {
    const fetchStub = sinon.stub<Parameters<FetchLike>, ReturnType<FetchLike>>().resolves(
      new Response(null, { status: 204, statusText: "No Content", headers: { "x-trace": "1" } }),
    );

    const result = await pingTool(fetchStub).invoke({ url: "https://example.test/health" }, contextWith());

    expect(result).to.deep.include({
      success: true,
      url: "https://example.test/health",
      status_code: 204,
      status_text: "No Content",
      headers: { "x-trace": "1" },
    });
    expect(result["response_time_seconds"]).to.be.a("number");
    sinon.assert.calledOnce(fetchStub);
    expect(fetchStub.firstCall.args[0]).to.equal("https://example.test/health");
    expect(fetchStub.firstCall.args[1]).to.deep.include({ method: "GET", redirect: "follow" });
  });

  it("cancels the unread response body", async () => {
    const response = new Response("ignored payload", { status: 200, statusText: "OK" });
    const body = response.body;
    if (!body) {
      throw new Error("response has no body");
    }
    const cancel = sinon.spy(body, "cancel");
    const fetchStub = sinon.stub<Parameters<FetchLike>, ReturnType<FetchLike>>().resolves(response);

    const result = await pingTool(fetchStub).invoke({ url: "https://example.test/page" }, contextWith());

    expect(result).to.deep.include({ success: true, status_code: 200, status_text: "OK" });
    sinon.assert.calledOnce(cancel);
  });

  it("refuses URLs without an http scheme", async () => {
    const fetchStub = sinon.stub<Parameters<FetchLike>, ReturnType<FetchLike>>();

    const result = await pingTool(fetchStub).invoke({ url: "ftp://example.test" }, contextWith());

    expect(result).to.deep.equal({
      success: false,
      url: "ftp://example.test",
      error: "URL must start with http:// or https://",
    });
    sinon.assert.notCalled(fetchStub);
  });

  it("reports network failures", async () => {
    const fetchStub = sinon.stub<Parameters<FetchLike>, ReturnType<FetchLike>>().rejects(new TypeError("fetch failed"));

    const result = await pingTool(fetchStub).invoke({ url: "http://unreachable.test" }, contextWith());

    expect(result).to.deep.equal({ success: false, url: "http://unreachable.test", error: "HTTP error: fetch failed" });
  });

  it("gives up after the requested timeout", async () => {
    const clock = sinon.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });

    try {
      const pending = pingTool(hangingFetch).invoke({ url: "https://slow.test", timeout_seconds: 2 }, contextWith());
      await clock.tickAsync(2_000);

      expect(await pending).to.deep.equal({
        success: false,
        url: "https://slow.test",
        error: "Request timed out after 2 seconds",
      });
    } finally {
      clock.restore();
    }
  });

  it("stops when the execution is cancelled", async () => {
    const controller = new AbortController();

    const pending = pingTool(hangingFetch).invoke({ url: "https://slow.test" }, contextWith(controller.signal));
    controller.abort();

    expect(await pending).to.deep.equal({
      success: false,
      url: "https://slow.test",
      error: "Request aborted because the execution was cancelled",
    });
  });

  it("validates the timeout range", async () => {
    const result = await pingTool(hangingFetch).invoke({ url: "https://slow.test", timeout_seconds: 500 }, contextWith());

    expect(result).to.include({ success: false, code: "E-VALIDATION" });
  });
});
