import type { Telegram } from "telegraf";
import { Notifier } from "../types.js";

export class TelegramNotifier implements Notifier {
  constructor(private readonly telegram: Pick<Telegram, "sendMessage">) {}

  async send(ownerId: string, text: string): Promise<void> {
    await this.telegram.sendMessage(ownerId, text);
  }
}
