import assert from "node:assert";
import { describe, it } from "node:test";

import { Throttle } from "./throttle";

function fakeTime() {
  let current = 1_000;
  const sleeps: number[] = [];
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
    sleep: async (ms: number) => {
      sleeps.push(ms);
      current += ms;
    },
    sleeps,
  };
}

const noop = async (): Promise<void> => {};

describe("Throttle", () => {
  it("lets the first task through and spaces the following ones", async () => {
    const time = fakeTime();
    const throttle = new Throttle(50, { now: time.now, sleep: time.sleep });

    await throttle.run(noop);
    await throttle.run(noop);
    await throttle.run(noop);

    assert.deepStrictEqual(time.sleeps, [50, 50]);
  });

  it("only waits for the remainder of the interval", async () => {
    const time = fakeTime();
    const throttle = new Throttle(50, { now: time.now, sleep: time.sleep });

    await throttle.run(noop);
    time.advance(30);
    await throttle.run(noop);

    assert.deepStrictEqual(time.sleeps, [20]);
  });

  it("measures the interval from the end of a slow task", async () => {
    const time = fakeTime();
    const throttle = new Throttle(50, { now: time.now, sleep: time.sleep });

    await throttle.run(async () => {
      time.advance(80);
    });
    await throttle.run(noop);

    assert.deepStrictEqual(time.sleeps, [50]);
  });

  it("hands a failure to its caller and still waits before the next task", async () => {
    const time = fakeTime();
    const throttle = new Throttle(50, { now: time.now, sleep: time.sleep });

    await assert.rejects(
      throttle.run(async () => {
        throw new Error("send failed");
      }),
      /send failed/,
    );
    const value = await throttle.run(async () => "next");

    assert.strictEqual(value, "next");
    assert.deepStrictEqual(time.sleeps, [50]);
  });

  it("serializes tasks submitted without waiting for each other", async () => {
    const time = fakeTime();
    const throttle = new Throttle(50, { now: time.now, sleep: time.sleep });
    const startedAt: number[] = [];
    const record = async (): Promise<void> => {
      startedAt.push(time.now());
    };

    await Promise.all([throttle.run(record), throttle.run(record), throttle.run(record)]);

    assert.deepStrictEqual(startedAt, [1_000, 1_050, 1_100]);
  });

  it("never sleeps with a zero interval", async () => {
    const time = fakeTime();
    const throttle = new Throttle(0, { now: time.now, sleep: time.sleep });

    await throttle.run(noop);
    await throttle.run(noop);

    assert.deepStrictEqual(time.sleeps, []);
  });
});
