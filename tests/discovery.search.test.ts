import { describe, it } from "mocha";
import { expect } from "chai";
import { z } from "zod";

import { SchemaLoader } from "../src/discovery/schemaLoader.js";
import { ToolSearch, scoreCandidate } from "../src/discovery/search.js";
import { ToolServerRegistry } from "../src/registry/serverRegistry.js";
import type { ServerEntry, ToolServerModule } from "../src/registry/types.js";
import { defineTool } from "../src/tools/defineTool.js";
import { createCapturingLogger } from "./helpers/fixtures.js";

function moduleOf(tools: Array<{ name: string; summary: string }>): ToolServerModule {
  return {
    tools: tools.map(({ name, summary }) =>
      defineTool({
        name,
        summary,
        input: z.object({}),
        returns: { type: "object", description: "unused" },
        handler: () => ({ success: true }),
      }),
    ),
  };
}

function entry(name: string, tools: Array<{ name: string; summary: string }>): ServerEntry {
  const module = moduleOf(tools);
  return {
    name,
    description: `${name} tools`,
    toolNames: tools.map((tool) => tool.name),
    module: { kind: "loader", load: async () => module },
  };
}

const FILES = entry("files", [
  { name: "read_file", summary: "Read a file from disk" },
  { name: "write_file", summary: "Write a file to disk" },
]);
const NET = entry("net", [
  { name: "ping_url", summary: "Ping a URL and report status" },
  { name: "fetch_page", summary: "Download a page and return its text" },
]);

function createSearch(entries: ServerEntry[] = [FILES, NET]) {
  const { logger, entries: logs } = createCapturingLogger();
  const registry = ToolServerRegistry.create(entries);
  return { search: new ToolSearch(registry, new SchemaLoader(registry, logger), logger), logs };
}

describe("discovery search", () => {
  it("scores whole-query and per-token matches", () => {
    const candidate = { server: "files", tool: "read_file", summary: "Read a file from disk" };

    // whole query in tool (+3) and summary (+1); token in tool (+2), server (+1), summary (+1)
    expect(scoreCandidate("file", ["file"], candidate)).to.equal(8);
    expect(scoreCandidate("ping url", ["ping", "url"], { server: "net", tool: "ping_url", summary: "Ping a URL and report status" })).to.equal(6);
  });

  it("breaks ties by registry insertion order", async () => {
    const { search } = createSearch();

    expect(await search.search("file")).to.deep.equal([
      { server: "files", tool: "read_file", score: 8, description: "Read a file from disk" },
      { server: "files", tool: "write_file", score: 8, description: "Write a file to disk" },
    ]);
  });

  it("ranks by descending score and drops non-matching tools", async () => {
    const { search } = createSearch();

    const matches = await search.search("Read File");
    expect(matches).to.deep.equal([
      { server: "files", tool: "read_file", score: 7, description: "Read a file from disk" },
      { server: "files", tool: "write_file", score: 4, description: "Write a file to disk" },
    ]);
  });

  it("splits the query on non-alphanumeric characters", async () => {
    const { search } = createSearch();

    expect(await search.search("ping-url")).to.deep.equal([
      { server: "net", tool: "ping_url", score: 6, description: "Ping a URL and report status" },
    ]);
  });

  it("applies the limit after ranking", async () => {
    const { search } = createSearch();

    expect(await search.search("net")).to.deep.equal([
      { server: "net", tool: "ping_url", score: 1, description: "Ping a URL and report status" },
      { server: "net", tool: "fetch_page", score: 1, description: "Download a page and return its text" },
    ]);
    expect(await search.search("net", 1)).to.deep.equal([
      { server: "net", tool: "ping_url", score: 1, description: "Ping a URL and report status" },
    ]);
  });

  it("rejects blank queries and invalid limits", async () => {
    const { search } = createSearch();

    expect(await search.search("   ")).to.include({ success: false, code: "E-VALIDATION" });
    expect(await search.search("file", 0)).to.include({ code: "E-VALIDATION", error: "limit must be a positive integer" });
    expect(await search.search("file", 1.5)).to.include({ code: "E-VALIDATION" });
  });

  it("skips servers whose module fails to load", async () => {
    const broken: ServerEntry = {
      name: "broken",
      description: "never loads",
      toolNames: ["file_tool"],
      module: {
        kind: "loader",
        load: async () => {
          throw new Error("unavailable");
        },
      },
    };
    const { search, logs } = createSearch([broken, FILES]);

    const matches = await search.search("write");
    expect(matches).to.deep.equal([
      { server: "files", tool: "write_file", score: 7, description: "Write a file to disk" },
    ]);
    const skipped = logs.find((entry) => entry.message === "search_server_skipped");
    expect(skipped?.payload).to.deep.include({ server: "broken", code: "E-COLLABORATOR" });
  });
});
