import { logger } from "../logger.js";
import { commandArgument, parseTrackingNumber } from "./command-args.js";
import { formatAddReply, formatDebug, formatHelp, formatRecordList } from "./format.js";
import { TrackingCommands } from "./tracking-commands.js";

export type ChatControllerOptions = {
  pollIntervalSeconds: number;
  trackingUrlTemplate: string;
};

type PendingAction = "add" | "remove";

const NOT_A_NUMBER = "That doesn't look like a tracking number. Try again.";

export class ChatController {
  // Set by the menu buttons; consumed by the next plain-text message of that chat.
  private readonly pending = new Map<string, PendingAction>();

  constructor(
    private readonly commands: TrackingCommands,
    private readonly options: ChatControllerOptions
  ) {}

  help(): string {
    return formatHelp(this.options.pollIntervalSeconds, this.options.trackingUrlTemplate);
  }

  list(ownerId: string): string {
    return formatRecordList(this.commands.listTracking(ownerId));
  }

  beginAdd(ownerId: string): string {
    this.pending.set(ownerId, "add");
    return "Send the tracking link or number to add:";
  }

  beginRemove(ownerId: string): string {
    this.pending.set(ownerId, "remove");
    return "Send the tracking number to remove:";
  }

  async addCommand(ownerId: string, text: string): Promise<string> {
    const arg = commandArgument(text);
    if (!arg) {
      return this.beginAdd(ownerId);
    }
    return this.add(ownerId, arg);
  }

  async removeCommand(ownerId: string, text: string): Promise<string> {
    const arg = commandArgument(text);
    if (!arg) {
      return this.beginRemove(ownerId);
    }
    return this.remove(ownerId, arg);
  }

  async debugCommand(text: string): Promise<string> {
    const trackingNumber = parseTrackingNumber(commandArgument(text));
    if (!trackingNumber) {
      return "Usage: /debug 94044975-0220-1";
    }
    const result = await this.commands.debugCheck(trackingNumber);
    return formatDebug(trackingNumber, result);
  }

  async handleText(ownerId: string, text: string): Promise<string | undefined> {
    const action = this.pending.get(ownerId);
    this.pending.delete(ownerId);

    if (action === "remove") {
      return this.remove(ownerId, text);
    }

    if (action === "add" || parseTrackingNumber(text)) {
      return this.add(ownerId, text);
    }

    return undefined;
  }

  private async add(ownerId: string, text: string): Promise<string> {
    const trackingNumber = parseTrackingNumber(text);
    if (!trackingNumber) {
      return NOT_A_NUMBER;
    }

    const outcome = await this.commands.addTracking(ownerId, trackingNumber);
    if (outcome.kind === "exists") {
      return `Already tracking ${trackingNumber}.`;
    }

    logger.info(
      { ownerId, trackingNumber, status: outcome.result.status, reason: outcome.result.reason },
      "tracking added"
    );
    return formatAddReply(trackingNumber, outcome.result);
  }

  private remove(ownerId: string, text: string): string {
    const trackingNumber = parseTrackingNumber(text);
    if (!trackingNumber) {
      return NOT_A_NUMBER;
    }

    const outcome = this.commands.removeTracking(ownerId, trackingNumber);
    if (outcome.kind === "not-found") {
      return `${trackingNumber} is not in your list.`;
    }
    return `Removed ${trackingNumber}.`;
  }
}
