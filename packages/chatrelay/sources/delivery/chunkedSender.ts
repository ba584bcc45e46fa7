import { getLogger } from "../log.js";
import type { TextTransport } from "../types.js";
import { markdownToTelegramHtml } from "./markdownToTelegramHtml.js";
import { DEFAULT_SEGMENT_MAX_LENGTH, replySegments } from "./replySegments.js";

export const TELEGRAM_MESSAGE_MAX_LENGTH = 4096;

export type ChunkedSenderOptions = {
    transport: TextTransport;
    maxLength?: number;
    formatting?: boolean;
    /** Decides which send failures are formatting rejections worth a plain retry. */
    formatErrorIs?: (error: unknown) => boolean;
};

const logger = getLogger("delivery");

/**
 * Delivers a reply of any length as ordered transport-sized messages.
 * Each segment is sent as Telegram HTML first and retried once as plain text when the
 * transport rejects the formatting.
 */
export class ChunkedSender {
    private transport: TextTransport;
    private maxLength: number;
    private formatting: boolean;
    private formatErrorIs: (error: unknown) => boolean;

    constructor(options: ChunkedSenderOptions) {
        this.transport = options.transport;
        this.maxLength = options.maxLength ?? DEFAULT_SEGMENT_MAX_LENGTH;
        this.formatting = options.formatting ?? true;
        this.formatErrorIs = options.formatErrorIs ?? (() => true);
    }

    /**
     * Sends every segment in order and returns how many were delivered.
     */
    async send(targetId: string, text: string): Promise<number> {
        let delivered = 0;
        for (const segment of replySegments(text, this.maxLength)) {
            if (segment.trim().length === 0) {
                continue;
            }
            await this.sendSegment(targetId, segment);
            delivered += 1;
        }
        logger.debug(`send: Reply delivered targetId=${targetId} segments=${delivered} length=${text.length}`);
        return delivered;
    }

    private async sendSegment(targetId: string, segment: string): Promise<void> {
        if (!this.formatting) {
            await this.transport.sendText(targetId, segment, "plain");
            return;
        }
        const html = markdownToTelegramHtml(segment);
        if (html.trim().length === 0 || html.length > TELEGRAM_MESSAGE_MAX_LENGTH) {
            await this.transport.sendText(targetId, segment, "plain");
            return;
        }
        try {
            await this.transport.sendText(targetId, html, "html");
        } catch (error) {
            if (!this.formatErrorIs(error)) {
                throw error;
            }
            logger.warn({ error, targetId }, "error: Formatted segment rejected; retrying as plain text");
            await this.transport.sendText(targetId, segment, "plain");
        }
    }
}
