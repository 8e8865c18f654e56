import { logger } from "../logger.js";
import { Notifier } from "../types.js";
import { dispatchTransitions } from "./dispatch.js";
import { runWatchCycle, WatchCycleDeps } from "./watch-cycle.js";

export type PollerHandle = {
  stop: () => void;
};

export type PollerDeps = WatchCycleDeps & {
  notifier: Notifier;
  intervalSeconds: number;
};

export function startPoller(deps: PollerDeps): PollerHandle {
  let stopped = false;
  let timer: NodeJS.Timeout | undefined;

  const schedule = (delayMs: number): void => {
    if (stopped) {
      return;
    }
    timer = setTimeout(() => {
      void runCycle();
    }, delayMs);
  };

  const runCycle = async (): Promise<void> => {
    if (stopped) {
      return;
    }

    try {
      const { events } = await runWatchCycle(deps);
      await dispatchTransitions(events, deps.notifier);
    } catch (error) {
      logger.error({ err: error }, "poll cycle failed");
    }

    schedule(deps.intervalSeconds * 1000);
  };

  schedule(0);

  return {
    stop: () => {
      stopped = true;
      if (timer) {
        clearTimeout(timer);
      }
    }
  };
}
