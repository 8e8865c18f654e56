import { formatTransition } from "../bot/format.js";
import { logger } from "../logger.js";
import { TrackingStore } from "../store/tracking-store.js";
import { Notifier, StoreDocument, TransitionEvent } from "../types.js";

export const STARTUP_MESSAGE = "Parcel watcher started. Send /start or a tracking number.";

export type StartupNotificationDeps = {
  store: TrackingStore;
  notifier: Notifier;
  allowedChatIds: ReadonlySet<string>;
  cooldownSeconds: number;
  now?: () => Date;
};

export async function dispatchTransitions(events: readonly TransitionEvent[], notifier: Notifier): Promise<number> {
  let sent = 0;
  for (const event of events) {
    try {
      await notifier.send(event.ownerId, formatTransition(event));
      sent += 1;
    } catch (error) {
      logger.warn(
        { err: error, ownerId: event.ownerId, trackingNumber: event.trackingNumber },
        "failed to send transition notification"
      );
    }
  }
  return sent;
}

export async function maybeNotifyStartup(deps: StartupNotificationDeps): Promise<number> {
  const now = (deps.now ?? (() => new Date()))();

  const lastSent = deps.store.loadAll().meta.lastStartupNotificationAt;
  const lastSentMs = lastSent ? Date.parse(lastSent) : Number.NaN;
  if (Number.isFinite(lastSentMs) && now.getTime() - lastSentMs < deps.cooldownSeconds * 1000) {
    logger.info({ lastSent }, "startup notification suppressed by cooldown");
    return 0;
  }

  const recipients = deps.store.update((document) => {
    document.meta.lastStartupNotificationAt = now.toISOString();
    return startupRecipients(document, deps.allowedChatIds);
  });

  let sent = 0;
  for (const ownerId of recipients) {
    try {
      await deps.notifier.send(ownerId, STARTUP_MESSAGE);
      sent += 1;
    } catch (error) {
      logger.warn({ err: error, ownerId }, "failed to send startup notification");
    }
  }
  return sent;
}

export function startupRecipients(document: StoreDocument, allowedChatIds: ReadonlySet<string>): string[] {
  if (allowedChatIds.size > 0) {
    return [...allowedChatIds];
  }
  return Object.keys(document.tracking);
}
