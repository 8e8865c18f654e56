import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  ALLOWED_CHAT_IDS: z.string().optional(),
  POLL_INTERVAL_SECONDS: z.coerce.number().int().positive().default(600),
  PORT: z.coerce.number().int().min(0).max(65535).default(10000),
  STARTUP_NOTIFY_COOLDOWN_SECONDS: z.coerce.number().int().min(0).default(1800),
  STATE_PATH: z.string().min(1).default("./data/tracks.json"),
  TRACKING_URL_TEMPLATE: z
    .string()
    .url()
    .refine((v) => v.includes("{track}"), "must contain a {track} placeholder")
    .default("https://tracking.ozon.ru/?track={track}"),
  FETCH_MODE: z.enum(["browser", "http"]).default("browser"),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  BROWSER_SETTLE_MS: z.coerce.number().int().min(0).default(5_000),
  CHROMIUM_EXECUTABLE_PATH: z.string().min(1).optional(),
  STOP_POLLING_WHEN_DELIVERED: booleanFlag,
  LEGACY_OWNER_ID: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
});

export type FetchMode = "browser" | "http";

export type AppConfig = {
  telegramBotToken: string;
  allowedChatIds: ReadonlySet<string>;
  pollIntervalSeconds: number;
  port: number;
  startupNotifyCooldownSeconds: number;
  statePath: string;
  trackingUrlTemplate: string;
  fetchMode: FetchMode;
  fetchTimeoutMs: number;
  browserSettleMs: number;
  chromiumExecutablePath?: string;
  stopPollingWhenDelivered: boolean;
  legacyOwnerId: string;
  logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  const allowedChatIds = (parsed.ALLOWED_CHAT_IDS ?? "")
    .split(",")
    .map((v) => v.trim())
    .filter(Boolean);

  if (allowedChatIds.some((id) => !/^-?\d+$/.test(id))) {
    throw new Error("ALLOWED_CHAT_IDS must be a comma-separated list of numeric Telegram chat ids");
  }

  return {
    telegramBotToken: parsed.TELEGRAM_BOT_TOKEN,
    allowedChatIds: new Set(allowedChatIds),
    pollIntervalSeconds: parsed.POLL_INTERVAL_SECONDS,
    port: parsed.PORT,
    startupNotifyCooldownSeconds: parsed.STARTUP_NOTIFY_COOLDOWN_SECONDS,
    statePath: parsed.STATE_PATH,
    trackingUrlTemplate: parsed.TRACKING_URL_TEMPLATE,
    fetchMode: parsed.FETCH_MODE,
    fetchTimeoutMs: parsed.FETCH_TIMEOUT_MS,
    browserSettleMs: parsed.BROWSER_SETTLE_MS,
    chromiumExecutablePath: parsed.CHROMIUM_EXECUTABLE_PATH,
    stopPollingWhenDelivered: parsed.STOP_POLLING_WHEN_DELIVERED,
    legacyOwnerId: parsed.LEGACY_OWNER_ID ?? allowedChatIds[0] ?? "default",
    logLevel: parsed.LOG_LEVEL
  };
}
