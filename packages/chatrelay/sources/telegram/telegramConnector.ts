import { buffer } from "node:stream/consumers";

import TelegramBot from "node-telegram-bot-api";

import { getLogger } from "../log.js";
import type {
  CommandHandler,
  Connector,
  InboundImage,
  MessageHandler,
  TextFormat
} from "../types.js";
import { telegramCommandParse } from "./telegramCommandParse.js";
import { telegramConflictErrorIs, telegramUnauthorizedErrorIs } from "./telegramErrors.js";

export type TelegramConnectorOptions = {
  token: string;
  polling?: boolean;
  clearWebhook?: boolean;
};

type FatalHandler = (reason: string, error?: unknown) => void;

type TypingTimer = {
  timer: NodeJS.Timeout;
  holders: number;
};

const logger = getLogger("telegram");

const TELEGRAM_TYPING_INTERVAL_MS = 4000;
const TELEGRAM_SLASH_COMMANDS: TelegramBot.BotCommand[] = [
  { command: "start", description: "Start the conversation." },
  { command: "help", description: "Show available commands." },
  { command: "clear", description: "Forget the conversation and the last image." }
];

export class TelegramConnector implements Connector {
  private bot: TelegramBot;
  private handlers: MessageHandler[] = [];
  private commandHandlers: CommandHandler[] = [];
  private fatalHandlers: FatalHandler[] = [];
  private typingTimers = new Map<string, TypingTimer>();
  private pollingEnabled: boolean;
  private clearWebhookOnStart: boolean;
  private clearedWebhook = false;
  private shuttingDown = false;

  constructor(options: TelegramConnectorOptions) {
    this.pollingEnabled = options.polling ?? true;
    this.clearWebhookOnStart = options.clearWebhook ?? true;
    this.bot = new TelegramBot(options.token, { polling: false });
    logger.debug(`init: TelegramConnector created polling=${this.pollingEnabled}`);

    this.bot.on("message", (message) => {
      void this.handleMessage(message).catch((error) => {
        logger.warn({ error, chatId: message.chat?.id }, "error: Telegram message handling failed");
      });
    });

    this.bot.on("polling_error", (error) => {
      if (this.shuttingDown) {
        return;
      }
      this.handlePollingError(error);
    });
  }

  onMessage(handler: MessageHandler): () => void {
    return listenerAdd(this.handlers, handler);
  }

  onCommand(handler: CommandHandler): () => void {
    return listenerAdd(this.commandHandlers, handler);
  }

  onFatal(handler: FatalHandler): () => void {
    return listenerAdd(this.fatalHandlers, handler);
  }

  /**
   * Verifies the token, registers slash commands and starts long polling.
   * Rejects when Telegram refuses the token.
   */
  async start(): Promise<void> {
    const me = await this.bot.getMe();
    logger.info(`start: Connected to Telegram as @${me.username ?? me.id}`);
    await this.registerSlashCommands();
    if (this.pollingEnabled && this.clearWebhookOnStart) {
      await this.ensureWebhookCleared();
    }
    if (this.pollingEnabled) {
      await this.startPolling();
    }
  }

  async sendText(targetId: string, text: string, format: TextFormat): Promise<void> {
    logger.debug(`send: Sending text targetId=${targetId} format=${format} length=${text.length}`);
    if (format === "html") {
      await this.bot.sendMessage(targetId, text, { parse_mode: "HTML" });
      return;
    }
    await this.bot.sendMessage(targetId, text);
  }

  /**
   * Keeps the typing action alive for the chat until every caller has stopped.
   * The returned stopper is idempotent.
   */
  startTyping(targetId: string): () => void {
    const key = String(targetId);
    const existing = this.typingTimers.get(key);
    if (existing) {
      existing.holders += 1;
    } else {
      const send = () => {
        void this.bot.sendChatAction(targetId, "typing").catch((error) => {
          logger.warn({ error }, "error: Telegram typing failed");
        });
      };
      send();
      this.typingTimers.set(key, { timer: setInterval(send, TELEGRAM_TYPING_INTERVAL_MS), holders: 1 });
    }

    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.stopTyping(key);
    };
  }

  async shutdown(reason: string = "shutdown"): Promise<void> {
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;
    logger.debug(`event: Shutting down reason=${reason} typingTimers=${this.typingTimers.size}`);

    for (const typing of this.typingTimers.values()) {
      clearInterval(typing.timer);
    }
    this.typingTimers.clear();

    try {
      if (this.bot.isPolling()) {
        await this.bot.stopPolling({ cancel: true, reason });
      }
    } catch (error) {
      logger.warn({ error }, "error: Telegram polling stop failed");
    }
  }

  private async handleMessage(message: TelegramBot.Message): Promise<void> {
    if (this.shuttingDown) {
      logger.debug(`skip: Dropping message during shutdown chatId=${message.chat?.id}`);
      return;
    }
    const chatType = message.chat?.type;
    if (chatType !== "private" && chatType !== "group" && chatType !== "supergroup") {
      logger.debug(`skip: Skipping unsupported chat type=${chatType}`);
      return;
    }
    const userId = String(message.from?.id ?? message.chat.id);
    const chatId = String(message.chat.id);
    logger.debug(
      `receive: Telegram message chatId=${chatId} userId=${userId} hasText=${!!message.text} hasPhoto=${!!message.photo}`
    );

    const command = message.text ? telegramCommandParse(message.text) : null;
    if (command) {
      for (const handler of this.commandHandlers) {
        await handler({ userId, chatId, command: command.command, args: command.args });
      }
      return;
    }

    const image = await this.extractImage(message);
    const text = message.text ?? message.caption ?? null;
    if (!image && !text) {
      logger.debug(`skip: Message without text or image chatId=${chatId}`);
      return;
    }
    for (const handler of this.handlers) {
      await handler({ userId, chatId, text, image });
    }
  }

  private async extractImage(message: TelegramBot.Message): Promise<InboundImage | null> {
    if (message.photo && message.photo.length > 0) {
      const largest = message.photo.reduce((prev, current) =>
        (current.file_size ?? current.width * current.height) > (prev.file_size ?? prev.width * prev.height)
          ? current
          : prev
      );
      return this.downloadImage(largest.file_id, "image/jpeg");
    }
    const document = message.document;
    if (document?.file_id && document.mime_type?.startsWith("image/")) {
      return this.downloadImage(document.file_id, document.mime_type);
    }
    return null;
  }

  private async downloadImage(fileId: string, mimeType: string): Promise<InboundImage> {
    const data = await buffer(this.bot.getFileStream(fileId));
    logger.debug(`receive: Image downloaded fileId=${fileId} bytes=${data.byteLength}`);
    return { data: new Uint8Array(data), mimeType };
  }

  private async registerSlashCommands(): Promise<void> {
    try {
      await this.bot.setMyCommands(TELEGRAM_SLASH_COMMANDS);
      logger.debug("register: Telegram slash commands registered");
    } catch (error) {
      logger.warn({ error }, "error: Failed to register Telegram slash commands");
    }
  }

  private async startPolling(): Promise<void> {
    if (this.bot.isPolling()) {
      return;
    }
    await this.bot.startPolling({
      restart: true,
      polling: { autoStart: true, params: { timeout: 30 } }
    });
    logger.debug("start: Telegram polling started");
  }

  private handlePollingError(error: unknown): void {
    if (telegramUnauthorizedErrorIs(error)) {
      this.fatal("unauthorized", error);
      return;
    }
    if (telegramConflictErrorIs(error)) {
      if (!this.clearedWebhook) {
        logger.warn({ error }, "event: Telegram polling conflict; clearing webhook");
        void this.ensureWebhookCleared();
        return;
      }
      this.fatal("polling_conflict", error);
      return;
    }
    logger.warn({ error }, "error: Telegram polling error; relying on library restart");
  }

  private fatal(reason: string, error: unknown): void {
    logger.error({ error, reason }, "error: Telegram connector failed");
    for (const handler of this.fatalHandlers) {
      handler(reason, error);
    }
  }

  private async ensureWebhookCleared(): Promise<void> {
    if (this.clearedWebhook) {
      return;
    }
    try {
      await this.bot.deleteWebHook();
      this.clearedWebhook = true;
      logger.info("event: Telegram webhook cleared for polling");
    } catch (error) {
      logger.warn({ error }, "error: Failed to clear Telegram webhook");
    }
  }

  private stopTyping(key: string): void {
    const typing = this.typingTimers.get(key);
    if (!typing) {
      return;
    }
    typing.holders -= 1;
    if (typing.holders > 0) {
      return;
    }
    clearInterval(typing.timer);
    this.typingTimers.delete(key);
  }
}

function listenerAdd<T>(list: T[], listener: T): () => void {
  list.push(listener);
  return () => {
    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
  };
}
