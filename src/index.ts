import { Telegraf } from "telegraf";
import { AppConfig, loadConfig } from "./config.js";
import { logger, setLogLevel } from "./logger.js";
import { ChatController } from "./bot/chat-controller.js";
import { registerHandlers } from "./bot/handlers.js";
import { TelegramNotifier } from "./bot/telegram-notifier.js";
import { TrackingCommands } from "./bot/tracking-commands.js";
import { buildHealthServer } from "./health.js";
import { maybeNotifyStartup } from "./jobs/dispatch.js";
import { startPoller, PollerHandle } from "./jobs/poll-updates.js";
import { BrowserPageFetcher } from "./services/browser-fetcher.js";
import { StatusChecker } from "./services/checker.js";
import { HttpPageFetcher } from "./services/http-fetcher.js";
import { PageFetcher } from "./services/page-fetcher.js";
import { JsonTrackingStore } from "./store/tracking-store.js";

const config = loadConfig();
setLogLevel(config.logLevel);

const store = new JsonTrackingStore(config.statePath, { legacyOwnerId: config.legacyOwnerId });
const checker = new StatusChecker(createFetcher(config));
const commands = new TrackingCommands(store, checker);
const controller = new ChatController(commands, {
  pollIntervalSeconds: config.pollIntervalSeconds,
  trackingUrlTemplate: config.trackingUrlTemplate
});

const bot = new Telegraf(config.telegramBotToken);
registerHandlers(bot, controller, config.allowedChatIds);
const notifier = new TelegramNotifier(bot.telegram);
const healthServer = buildHealthServer();

let pollTimer: PollerHandle | undefined;

process.once("SIGINT", () => void shutdown("SIGINT"));
process.once("SIGTERM", () => void shutdown("SIGTERM"));

async function bootstrap(): Promise<void> {
  await healthServer.listen({ port: config.port, host: "0.0.0.0" });
  logger.info({ port: config.port }, "liveness endpoint listening");

  // launch() resolves only when polling stops, so the rest of startup hangs off onLaunch.
  await bot.launch({ dropPendingUpdates: false }, () => {
    afterLaunch().catch((error) => {
      logger.error({ err: error }, "post-launch startup failed");
    });
  });
}

async function afterLaunch(): Promise<void> {
  logger.info(
    { pollEverySeconds: config.pollIntervalSeconds, fetchMode: config.fetchMode, statePath: store.filePath },
    "bot started"
  );

  await maybeNotifyStartup({
    store,
    notifier,
    allowedChatIds: config.allowedChatIds,
    cooldownSeconds: config.startupNotifyCooldownSeconds
  });

  pollTimer = startPoller({
    store,
    checker,
    notifier,
    intervalSeconds: config.pollIntervalSeconds,
    stopWhenDelivered: config.stopPollingWhenDelivered
  });
}

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, "shutting down");
  pollTimer?.stop();
  bot.stop(signal);
  await healthServer.close();
  process.exit(0);
}

function createFetcher(appConfig: AppConfig): PageFetcher {
  if (appConfig.fetchMode === "http") {
    return new HttpPageFetcher({
      urlTemplate: appConfig.trackingUrlTemplate,
      timeoutMs: appConfig.fetchTimeoutMs
    });
  }
  return new BrowserPageFetcher({
    urlTemplate: appConfig.trackingUrlTemplate,
    timeoutMs: appConfig.fetchTimeoutMs,
    settleMs: appConfig.browserSettleMs,
    executablePath: appConfig.chromiumExecutablePath
  });
}

bootstrap().catch((error) => {
  logger.fatal({ err: error }, "failed to start bot");
  process.exit(1);
});
