import { describe, it } from "mocha";
import { expect } from "chai";

import { ConcurrencyGate } from "../src/sandbox/concurrencyGate.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
}

describe("ConcurrencyGate", () => {
  it("rejects limits that are not positive integers", () => {
    expect(() => new ConcurrencyGate(0)).to.throw(RangeError);
    expect(() => new ConcurrencyGate(1.5)).to.throw(RangeError);
  });

  it("starts queued operations in arrival order", async () => {
    const gate = new ConcurrencyGate(2);
    const started: string[] = [];
    const blockers = { a: deferred(), b: deferred(), c: deferred(), d: deferred() };

    const runs = (["a", "b", "c", "d"] as const).map((name) =>
      gate.run(async () => {
        started.push(name);
        await blockers[name].promise;
        return name;
      }),
    );

    await Promise.resolve();
    expect(started).to.deep.equal(["a", "b"]);
    expect(gate.running).to.equal(2);
    expect(gate.queued).to.equal(2);

    blockers.b.resolve();
    await runs[1];
    await Promise.resolve();
    expect(started).to.deep.equal(["a", "b", "c"]);

    blockers.a.resolve();
    blockers.c.resolve();
    blockers.d.resolve();
    expect(await Promise.all(runs)).to.deep.equal(["a", "b", "c", "d"]);
    expect(gate.running).to.equal(0);
    expect(gate.queued).to.equal(0);
  });

  it("releases the slot when an operation throws", async () => {
    const gate = new ConcurrencyGate(1);

    let caught: unknown;
    try {
      await gate.run(async () => {
        throw new Error("failed run");
      });
    } catch (error) {
      caught = error;
    }
    expect(String(caught)).to.equal("Error: failed run");
    expect(await gate.run(async () => "next")).to.equal("next");
    expect(gate.running).to.equal(0);
  });
});
