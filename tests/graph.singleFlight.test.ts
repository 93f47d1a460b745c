import { expect } from "chai";
import { describe, it } from "mocha";

import { AsyncMutex, SingleFlight } from "../src/graph/singleFlight.js";
import { captureRejection } from "./helpers/storeContract.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("graph/singleFlight", () => {
  it("shares one operation between callers of the same key", async () => {
    const flights = new SingleFlight<number>();
    const gate = deferred();
    let runs = 0;
    const operation = async () => {
      runs += 1;
      await gate.promise;
      return runs;
    };

    const first = flights.run("X", operation);
    const second = flights.run("X", operation);
    const other = flights.run("Y", operation);
    gate.resolve();

    expect(await Promise.all([first, second, other])).to.deep.equal([2, 2, 2]);
    expect(runs).to.equal(2);
    expect(await flights.run("X", operation)).to.equal(3);
  });

  it("drops failed operations so the next call starts afresh", async () => {
    const flights = new SingleFlight<string>();
    const failure = new Error("boom");

    expect(await captureRejection(flights.run("X", async () => Promise.reject(failure)))).to.equal(failure);
    expect(await flights.run("X", async () => "ok")).to.equal("ok");
  });

  it("runs mutex sections one at a time in arrival order", async () => {
    const mutex = new AsyncMutex();
    const gate = deferred();
    const events: string[] = [];

    const first = mutex.runExclusive(async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
    });
    const second = mutex.runExclusive(() => {
      events.push("second");
      return 2;
    });
    await new Promise((resolve) => setImmediate(resolve));
    expect(events).to.deep.equal(["first:start"]);

    gate.resolve();
    expect(await second).to.equal(2);
    await first;
    expect(events).to.deep.equal(["first:start", "first:end", "second"]);
  });

  it("releases the mutex after a failing section", async () => {
    const mutex = new AsyncMutex();

    await captureRejection(mutex.runExclusive(async () => Promise.reject(new Error("boom"))));
    expect(await mutex.runExclusive(() => "next")).to.equal("next");
  });
});
