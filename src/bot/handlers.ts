import { Markup, Telegraf } from "telegraf";
import { message } from "telegraf/filters";
import { logger } from "../logger.js";
import { ChatController } from "./chat-controller.js";

export const MENU_BUTTONS = {
  add: "➕ Add tracking",
  list: "📦 Tracked parcels",
  remove: "➖ Remove tracking",
  help: "ℹ️ Help"
} as const;

const menu = Markup.keyboard([
  [MENU_BUTTONS.add, MENU_BUTTONS.list],
  [MENU_BUTTONS.remove, MENU_BUTTONS.help]
]).resize();

export function isAllowedChat(chatId: string, allowedChatIds: ReadonlySet<string>): boolean {
  return allowedChatIds.size === 0 || allowedChatIds.has(chatId);
}

export function registerHandlers(bot: Telegraf, controller: ChatController, allowedChatIds: ReadonlySet<string>): void {
  // Strangers get no reply.
  bot.use(async (ctx, next) => {
    const chatId = ctx.chat?.id;
    if (chatId === undefined || !isAllowedChat(String(chatId), allowedChatIds)) {
      logger.debug({ chatId }, "ignoring update from chat outside allow-list");
      return;
    }
    await next();
  });

  bot.start(async (ctx) => {
    await ctx.reply("Parcel watcher is running. Use the buttons or send a tracking number.", menu);
    await ctx.reply(controller.help(), menu);
  });

  bot.help(async (ctx) => {
    await ctx.reply(controller.help(), menu);
  });

  bot.command("list", async (ctx) => {
    await ctx.reply(controller.list(String(ctx.message.chat.id)), menu);
  });

  bot.command("add", async (ctx) => {
    await ctx.reply(await controller.addCommand(String(ctx.message.chat.id), ctx.message.text), menu);
  });

  bot.command("remove", async (ctx) => {
    await ctx.reply(await controller.removeCommand(String(ctx.message.chat.id), ctx.message.text), menu);
  });

  bot.command("debug", async (ctx) => {
    await ctx.reply(await controller.debugCommand(ctx.message.text), menu);
  });

  bot.hears(MENU_BUTTONS.list, async (ctx) => {
    await ctx.reply(controller.list(String(ctx.message.chat.id)), menu);
  });

  bot.hears(MENU_BUTTONS.add, async (ctx) => {
    await ctx.reply(controller.beginAdd(String(ctx.message.chat.id)), menu);
  });

  bot.hears(MENU_BUTTONS.remove, async (ctx) => {
    await ctx.reply(controller.beginRemove(String(ctx.message.chat.id)), menu);
  });

  bot.hears(MENU_BUTTONS.help, async (ctx) => {
    await ctx.reply(controller.help(), menu);
  });

  bot.on(message("text"), async (ctx) => {
    const reply = await controller.handleText(String(ctx.message.chat.id), ctx.message.text.trim());
    if (reply) {
      await ctx.reply(reply, menu);
    }
  });

  bot.catch((error, ctx) => {
    logger.error({ err: error, update: ctx.update }, "telegram update error");
  });
}
