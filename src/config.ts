import { z } from "zod";

import type { SupportedLocale } from "./i18n";
import type { LogLevel } from "./logger";

const UserIdListSchema = z
  .string()
  .optional()
  .default("")
  .transform((raw, ctx) => {
    const ids: number[] = [];
    for (const part of raw.split(",")) {
      const value = part.trim();
      if (!value) {
        continue;
      }
      const id = Number(value);
      if (!Number.isSafeInteger(id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `ADMIN_USER_IDS contains a non-numeric id: ${value}`,
        });
        return z.NEVER;
      }
      ids.push(id);
    }
    return ids;
  });

const EnvSchema = z.object({
  BOT_TOKEN: z.string().min(10, "BOT_TOKEN is required"),
  ADMIN_USER_IDS: UserIdListSchema,
  REQUIRED_CHAT_ID: z.coerce
    .number({ invalid_type_error: "REQUIRED_CHAT_ID must be a number" })
    .int("REQUIRED_CHAT_ID must be an integer")
    .refine((value) => value !== 0, "REQUIRED_CHAT_ID is required"),
  STORAGE_PATH: z.string().optional().default("data/engagement.db"),
  REGISTRY_PATH: z.string().optional().default("data/participants.txt"),
  BROADCAST_DELAY_MS: z.coerce.number().int().min(0).default(50),
  LOG_PATH: z.string().optional().default("data/bot.log"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  DEFAULT_LOCALE: z.enum(["ru", "en"]).default("ru"),
  STORE_URL: z.string().optional().default(""),
});

export type AppConfig = Readonly<{
  botToken: string;
  adminUserIds: ReadonlySet<number>;
  requiredChatId: number;
  storagePath: string;
  registryPath: string;
  broadcastDelayMs: number;
  logPath: string;
  logLevel: LogLevel;
  defaultLocale: SupportedLocale;
  storeUrl?: string;
}>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(
      `Invalid environment: ${parsed.error.issues.map((issue) => issue.message).join(", ")}`,
    );
  }

  const storeUrl = parsed.data.STORE_URL.trim() || undefined;

  return Object.freeze({
    botToken: parsed.data.BOT_TOKEN,
    adminUserIds: new Set(parsed.data.ADMIN_USER_IDS),
    requiredChatId: parsed.data.REQUIRED_CHAT_ID,
    storagePath: parsed.data.STORAGE_PATH,
    registryPath: parsed.data.REGISTRY_PATH,
    broadcastDelayMs: parsed.data.BROADCAST_DELAY_MS,
    logPath: parsed.data.LOG_PATH,
    logLevel: parsed.data.LOG_LEVEL,
    defaultLocale: parsed.data.DEFAULT_LOCALE,
    ...(storeUrl ? { storeUrl } : {}),
  });
}

export function isAdmin(config: Pick<AppConfig, "adminUserIds">, userId: number): boolean {
  return config.adminUserIds.has(userId);
}
