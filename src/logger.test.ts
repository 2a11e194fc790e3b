import assert from "node:assert";
import fs from "node:fs";
import path from "node:path";
import { describe, it } from "node:test";

import { AppLogger, normalizeError } from "./logger";
import { mkTempDir } from "./test-utils";

function readLines(logPath: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(logPath, "utf8")
    .split("\n")
    .filter(Boolean)
    .map((line): Record<string, unknown> => JSON.parse(line));
}

describe("AppLogger", () => {
  it("appends json lines and creates the log directory", () => {
    const dir = mkTempDir("engagement-logger-");
    const logPath = path.join(dir, "nested", "bot.log");
    const logger = new AppLogger({ logPath, console: false });

    logger.info("bot_started", { admins: 2 });
    logger.error("stats_failed");

    const lines = readLines(logPath);
    assert.strictEqual(lines.length, 2);
    assert.strictEqual(lines[0]?.level, "info");
    assert.strictEqual(lines[0]?.event, "bot_started");
    assert.deepStrictEqual(lines[0]?.payload, { admins: 2 });
    assert.strictEqual(lines[1]?.event, "stats_failed");
    assert.strictEqual("payload" in (lines[1] ?? {}), false);
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("drops entries below the configured level", () => {
    const dir = mkTempDir("engagement-logger-");
    const logPath = path.join(dir, "bot.log");
    const logger = new AppLogger({ logPath, level: "warn", console: false });

    logger.debug("gate_verifying");
    logger.info("gate_granted");
    logger.warn("broadcast_send_failed");

    assert.deepStrictEqual(
      readLines(logPath).map((line) => line.event),
      ["broadcast_send_failed"],
    );
    fs.rmSync(dir, { recursive: true, force: true });
  });
});

describe("normalizeError", () => {
  it("keeps the message of errors and stringifies other values", () => {
    assert.strictEqual(normalizeError(new Error("boom")).message, "boom");
    assert.deepStrictEqual(normalizeError("plain"), { message: "plain" });
  });
});
