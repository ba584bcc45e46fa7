import { ChunkedSender } from "../delivery/chunkedSender.js";
import { MessageDispatcher } from "../dispatch/messageDispatcher.js";
import { getLogger } from "../log.js";
import { SessionStore } from "../sessions/sessionStore.js";
import { telegramParseErrorIs } from "../telegram/telegramErrors.js";
import type { CompletionClient, Connector, DispatchResult, InboundCommand, InboundMessage } from "../types.js";
import {
    RELAY_CLEARED_TEXT,
    RELAY_HELP_TEXT,
    RELAY_WELCOME_TEXT,
    relayUnknownCommandText
} from "./relayCommands.js";

export type RelayRuntimeOptions = {
    connector: Connector;
    completion: CompletionClient;
    maxHistory?: number;
};

type RunSettle = {
    resolve: () => void;
    reject: (error: Error) => void;
};

const logger = getLogger("runtime");

/**
 * One run of the relay: a fresh session table bound to one connector.
 * `run()` resolves when stopped and rejects when the connector reports a fatal failure.
 */
export class RelayRuntime {
    readonly sessions: SessionStore;
    private connector: Connector;
    private dispatcher: MessageDispatcher;
    private sender: ChunkedSender;
    private unsubscribes: Array<() => void> = [];
    private accepting = false;
    private running = false;
    private stopped = false;
    private failure: Error | null = null;
    private settle: RunSettle | null = null;

    constructor(options: RelayRuntimeOptions) {
        this.connector = options.connector;
        this.sessions = new SessionStore({ maxHistory: options.maxHistory });
        this.dispatcher = new MessageDispatcher({ sessions: this.sessions, completion: options.completion });
        this.sender = new ChunkedSender({ transport: this.connector, formatErrorIs: telegramParseErrorIs });
    }

    async run(onReady?: () => void): Promise<void> {
        if (this.running) {
            throw new Error("RelayRuntime is already running");
        }
        this.running = true;
        this.unsubscribes.push(
            this.connector.onMessage((message) => this.handleMessage(message)),
            this.connector.onCommand((command) => this.handleCommand(command)),
            this.connector.onFatal((reason, error) => this.fail(reason, error))
        );

        await this.connector.start();
        if (this.failure) {
            throw this.failure;
        }
        if (this.stopped) {
            return;
        }
        this.accepting = true;
        logger.info("start: Relay runtime accepting messages");
        onReady?.();

        await new Promise<void>((resolve, reject) => {
            this.settle = { resolve, reject };
        });
    }

    async stop(reason: string = "shutdown"): Promise<void> {
        if (this.stopped) {
            return;
        }
        this.stopped = true;
        this.accepting = false;
        logger.info(`stop: Relay runtime stopping reason=${reason} sessions=${this.sessions.size}`);
        for (const unsubscribe of this.unsubscribes.splice(0)) {
            unsubscribe();
        }
        await this.connector.shutdown(reason);
        this.sessions.clearAll();
        this.settle?.resolve();
        this.settle = null;
    }

    private fail(reason: string, error: unknown): void {
        const failure = new Error(`Connector failed: ${reason}`, { cause: error });
        this.accepting = false;
        if (this.settle) {
            this.settle.reject(failure);
            this.settle = null;
            return;
        }
        this.failure ??= failure;
    }

    private async handleMessage(message: InboundMessage): Promise<void> {
        if (!this.accepting) {
            return;
        }
        const stopTyping = this.connector.startTyping(message.chatId);
        let result: DispatchResult;
        try {
            if (message.image) {
                result = await this.dispatcher.handleImage(
                    message.userId,
                    message.image.data,
                    message.image.mimeType,
                    message.text
                );
            } else if (message.text) {
                result = await this.dispatcher.handleText(message.userId, message.text);
            } else {
                return;
            }
        } finally {
            stopTyping();
        }
        await this.reply(message.chatId, result.text);
    }

    private async handleCommand(command: InboundCommand): Promise<void> {
        if (!this.accepting) {
            return;
        }
        logger.debug(`event: Command received userId=${command.userId} command=${command.command}`);
        switch (command.command) {
            case "start":
                await this.replyPlain(command.chatId, RELAY_WELCOME_TEXT);
                return;
            case "help":
                await this.replyPlain(command.chatId, RELAY_HELP_TEXT);
                return;
            case "clear":
            case "reset":
                await this.sessions.inUserLock(command.userId, async () => {
                    this.sessions.clear(command.userId);
                });
                await this.replyPlain(command.chatId, RELAY_CLEARED_TEXT);
                return;
            default:
                await this.replyPlain(command.chatId, relayUnknownCommandText(command.command));
        }
    }

    private async reply(chatId: string, text: string): Promise<void> {
        try {
            await this.sender.send(chatId, text);
        } catch (error) {
            logger.warn({ error, chatId }, "error: Reply delivery failed");
        }
    }

    private async replyPlain(chatId: string, text: string): Promise<void> {
        try {
            await this.connector.sendText(chatId, text, "plain");
        } catch (error) {
            logger.warn({ error, chatId }, "error: Command reply failed");
        }
    }
}
