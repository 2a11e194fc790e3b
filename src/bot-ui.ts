import { Keyboard } from "@maxhub/max-bot-api";

import { t, type SupportedLocale } from "./i18n";
import type { GateOutcome } from "./membership-gate";
import type { BroadcastReport, EntryRecord } from "./types";

export const JOIN_CALLBACK_PAYLOAD = "giveaway:join";
const PARTICIPANTS_PAGE_LIMIT = 200;

export function buildHelpMessage(locale: SupportedLocale, canManage: boolean): string {
  const lines = [t(locale, "helpTitle"), "/start", "/whoami", "/join"];
  if (canManage) {
    lines.push("", "/stats", "/participants", "/sendall <text>");
  }
  return lines.join("\n");
}

function isPrivateOrLocalHost(hostname: string): boolean {
  const host = hostname.trim().toLowerCase();
  if (!host || host === "localhost" || host === "127.0.0.1" || host === "::1") {
    return true;
  }
  if (host.startsWith("10.") || host.startsWith("192.168.") || host.startsWith("127.")) {
    return true;
  }
  if (host.startsWith("172.")) {
    const second = Number(host.split(".")[1] ?? "");
    if (Number.isFinite(second) && second >= 16 && second <= 31) {
      return true;
    }
  }
  return false;
}

export function canUseLinkButtonUrl(rawUrl: string): boolean {
  try {
    const parsed = new URL(rawUrl);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      return false;
    }
    return !isPrivateOrLocalHost(parsed.hostname);
  } catch {
    return false;
  }
}

export function buildStartKeyboard(
  locale: SupportedLocale,
  storeUrl?: string,
): ReturnType<typeof Keyboard.inlineKeyboard> {
  const rows: Parameters<typeof Keyboard.inlineKeyboard>[0] = [[Keyboard.button.callback(t(locale, "joinButton"), JOIN_CALLBACK_PAYLOAD)]];
  if (storeUrl && canUseLinkButtonUrl(storeUrl)) {
    rows.push([Keyboard.button.link(t(locale, "storeButton"), storeUrl)]);
  }
  return Keyboard.inlineKeyboard(rows);
}

/** Denied and failed lookups read the same to the user. */
export function describeGateOutcome(locale: SupportedLocale, outcome: GateOutcome): string {
  if (outcome.state === "granted") {
    return t(locale, outcome.result.created ? "joinGranted" : "joinAlready");
  }
  return t(locale, "joinRequiresGroup");
}

export function formatParticipants(locale: SupportedLocale, entries: EntryRecord[]): string {
  if (entries.length === 0) {
    return t(locale, "participantsEmpty");
  }
  const shown = entries.slice(0, PARTICIPANTS_PAGE_LIMIT).map((entry, index) => {
    const label = entry.username ? `@${entry.username}` : `id ${entry.userId}`;
    return `${index + 1}. ${label} (${entry.userId})`;
  });
  const rest = entries.length - shown.length;
  return [
    t(locale, "participantsTitle", { count: entries.length }),
    ...shown,
    ...(rest > 0 ? [`… +${rest}`] : []),
  ].join("\n");
}

export function formatBroadcastReport(locale: SupportedLocale, report: BroadcastReport): string {
  return t(locale, "broadcastFinished", {
    sent: report.sent,
    failed: report.failed,
    total: report.total,
  });
}
