import assert from "node:assert";
import { describe, it } from "node:test";

import { isAdmin, loadConfig } from "./config";

describe("loadConfig", () => {
  it("parses explicit env values", () => {
    const config = loadConfig({
      BOT_TOKEN: "token-token-token",
      ADMIN_USER_IDS: "10, 11,12",
      REQUIRED_CHAT_ID: "-70001",
      STORAGE_PATH: "data/custom.db",
      REGISTRY_PATH: "data/custom.txt",
      BROADCAST_DELAY_MS: "120",
      LOG_PATH: "data/custom.log",
      LOG_LEVEL: "debug",
      DEFAULT_LOCALE: "en",
      STORE_URL: " https://shop.example.com ",
    });

    assert.strictEqual(config.botToken, "token-token-token");
    assert.deepStrictEqual([...config.adminUserIds], [10, 11, 12]);
    assert.strictEqual(config.requiredChatId, -70001);
    assert.strictEqual(config.storagePath, "data/custom.db");
    assert.strictEqual(config.registryPath, "data/custom.txt");
    assert.strictEqual(config.broadcastDelayMs, 120);
    assert.strictEqual(config.logPath, "data/custom.log");
    assert.strictEqual(config.logLevel, "debug");
    assert.strictEqual(config.defaultLocale, "en");
    assert.strictEqual(config.storeUrl, "https://shop.example.com");
    assert.ok(Object.isFrozen(config));
  });

  it("applies defaults for optional values", () => {
    const config = loadConfig({
      BOT_TOKEN: "token-token-token",
      REQUIRED_CHAT_ID: "42",
    });

    assert.deepStrictEqual([...config.adminUserIds], []);
    assert.strictEqual(config.storagePath, "data/engagement.db");
    assert.strictEqual(config.registryPath, "data/participants.txt");
    assert.strictEqual(config.broadcastDelayMs, 50);
    assert.strictEqual(config.logPath, "data/bot.log");
    assert.strictEqual(config.logLevel, "info");
    assert.strictEqual(config.defaultLocale, "ru");
    assert.strictEqual(config.storeUrl, undefined);
  });

  it("throws on invalid token", () => {
    assert.throws(
      () => loadConfig({ BOT_TOKEN: "short", REQUIRED_CHAT_ID: "42" }),
      /Invalid environment: BOT_TOKEN is required/,
    );
  });

  it("throws when the required chat is missing", () => {
    assert.throws(() => loadConfig({ BOT_TOKEN: "token-token-token" }), /REQUIRED_CHAT_ID/);
  });

  it("rejects non-numeric admin ids", () => {
    assert.throws(
      () =>
        loadConfig({
          BOT_TOKEN: "token-token-token",
          REQUIRED_CHAT_ID: "42",
          ADMIN_USER_IDS: "1,alice",
        }),
      /ADMIN_USER_IDS contains a non-numeric id: alice/,
    );
  });
});

describe("isAdmin", () => {
  it("checks the allow-list", () => {
    const config = { adminUserIds: new Set([7]) };
    assert.strictEqual(isAdmin(config, 7), true);
    assert.strictEqual(isAdmin(config, 8), false);
  });
});
