import assert from "node:assert";
import { describe, it } from "node:test";

import { BackgroundQueue } from "./background-queue";
import { RecordingLogger } from "./test-utils";

describe("BackgroundQueue", () => {
  it("does not run tasks before submit returns", async () => {
    const queue = new BackgroundQueue(new RecordingLogger());
    const order: string[] = [];

    queue.submit("task", () => {
      order.push("task");
    });
    order.push("after_submit");
    assert.strictEqual(queue.size, 1);

    await queue.drain();
    assert.deepStrictEqual(order, ["after_submit", "task"]);
    assert.strictEqual(queue.size, 0);
  });

  it("logs a failing task and keeps running the others", async () => {
    const logger = new RecordingLogger();
    const queue = new BackgroundQueue(logger);
    const done: string[] = [];

    queue.submit("sync_throw", () => {
      throw new Error("disk full");
    });
    queue.submit("async_reject", async () => {
      throw new Error("locked");
    });
    queue.submit("ok", () => {
      done.push("ok");
    });

    await queue.drain();
    assert.deepStrictEqual(done, ["ok"]);
    const failures = logger.entries.filter((entry) => entry.event === "background_task_failed");
    assert.deepStrictEqual(
      failures.map((entry) => [entry.payload?.task, entry.payload?.message]),
      [
        ["sync_throw", "disk full"],
        ["async_reject", "locked"],
      ],
    );
  });

  it("drain waits for tasks submitted by running tasks", async () => {
    const queue = new BackgroundQueue(new RecordingLogger());
    const done: string[] = [];

    queue.submit("outer", () => {
      queue.submit("inner", () => {
        done.push("inner");
      });
      done.push("outer");
    });

    await queue.drain();
    assert.deepStrictEqual(done, ["outer", "inner"]);
  });
});
