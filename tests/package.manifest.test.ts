import { describe, it } from "mocha";
import { expect } from "chai";
import { readFile } from "node:fs/promises";
import { register } from "node:module";

describe("package manifest", () => {
  it("requires a Node.js release that can register the tsx loader", async () => {
    const manifest: unknown = JSON.parse(await readFile(new URL("../package.json", import.meta.url), "utf8"));

    expect(manifest).to.have.nested.property("engines.node", ">=20.6.0");
    expect(register).to.be.a("function");
  });
});
