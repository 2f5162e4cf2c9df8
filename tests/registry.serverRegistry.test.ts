import { describe, it } from "mocha";
import { expect } from "chai";

import { RegistryConfigurationError, ToolServerRegistry } from "../src/registry/serverRegistry.js";
import { DISCOVERY_HINT, isToolFailure } from "../src/runtime/errors.js";
import { ECHO_ENTRY, FLAKY_ENTRY } from "./helpers/fixtures.js";

describe("registry server table", () => {
  it("lists servers in registration order without schema payloads", () => {
    const registry = ToolServerRegistry.create([ECHO_ENTRY, FLAKY_ENTRY]);

    expect(registry.listServers()).to.deep.equal([
      { name: "echo", description: "Echo messages back" },
      { name: "flaky", description: "Misbehaving tools used to exercise failure paths" },
    ]);
    expect(registry.getToolNames("flaky")).to.deep.equal(["explode", "slow"]);
  });

  it("reports unknown servers as structured not-found values", () => {
    const registry = ToolServerRegistry.create([ECHO_ENTRY]);

    const lookup = registry.getServer("nonexistent");
    expect(isToolFailure(lookup)).to.equal(true);
    expect(lookup).to.deep.equal({
      success: false,
      code: "E-NOT-FOUND",
      error: 'server "nonexistent" is not registered',
      hint: DISCOVERY_HINT,
      details: { server: "nonexistent" },
    });
    expect(registry.getToolNames("nonexistent")).to.have.property("code", "E-NOT-FOUND");
  });

  it("returns copies of the tool names so callers cannot mutate the snapshot", () => {
    const registry = ToolServerRegistry.create([ECHO_ENTRY]);
    const names = registry.getToolNames("echo");
    if (isToolFailure(names)) {
      throw new Error("echo should be registered");
    }
    names.push("injected");

    expect(registry.getToolNames("echo")).to.deep.equal(["ping"]);
  });

  it("rejects duplicate servers, blank names and duplicate tools", () => {
    expect(() => ToolServerRegistry.create([ECHO_ENTRY, ECHO_ENTRY])).to.throw(
      RegistryConfigurationError,
      'server "echo" is registered twice',
    );
    expect(() => ToolServerRegistry.create([{ ...ECHO_ENTRY, name: "  " }])).to.throw(RegistryConfigurationError);
    expect(() => ToolServerRegistry.create([{ ...ECHO_ENTRY, toolNames: ["ping", "ping"] }])).to.throw(
      RegistryConfigurationError,
      'server "echo" declares tool "ping" twice',
    );
  });

  it("derives a new snapshot with withServer and leaves the original untouched", () => {
    const original = ToolServerRegistry.create([ECHO_ENTRY]);
    const extended = original.withServer(FLAKY_ENTRY);

    expect(original.size).to.equal(1);
    expect(original.has("flaky")).to.equal(false);
    expect(extended.size).to.equal(2);
    expect(extended.listServers().map((server) => server.name)).to.deep.equal(["echo", "flaky"]);
    expect(() => extended.withServer(ECHO_ENTRY)).to.throw(RegistryConfigurationError);
  });

  it("freezes registered entries", () => {
    const registry = ToolServerRegistry.create([ECHO_ENTRY]);
    const entry = registry.getServer("echo");

    expect(Object.isFrozen(entry)).to.equal(true);
    expect(ToolServerRegistry.empty().listServers()).to.deep.equal([]);
  });
});
