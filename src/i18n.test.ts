import { describe, it } from "node:test";
import assert from "node:assert";

import { t } from "./i18n";

describe("i18n", () => {
  it("returns russian text by key", () => {
    assert.strictEqual(t("ru", "participantsEmpty"), "Участников пока нет.");
  });

  it("returns english text by key", () => {
    assert.strictEqual(t("en", "participantsEmpty"), "No participants yet.");
  });

  it("applies interpolation variables", () => {
    assert.strictEqual(t("en", "whoami", { userId: 42 }), "Your user ID: 42");
    assert.strictEqual(
      t("en", "broadcastFinished", { sent: 2, failed: 1, total: 3 }),
      "Broadcast finished.\nSent: 2\nFailed: 1\nTotal: 3",
    );
    assert.strictEqual(t("ru", "broadcastStarted", { total: 5 }), "Рассылка запущена. Получателей: 5");
  });
});
