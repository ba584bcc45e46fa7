import { getLogger } from "../log.js";
import type { SessionStore } from "../sessions/sessionStore.js";
import type { CompletionClient, CompletionRequest, DispatchResult, FollowUpKind } from "../types.js";
import { followUpClassify } from "./followUpClassify.js";
import { imageFollowUpPromptBuild } from "./imageFollowUpPromptBuild.js";

export const DEFAULT_IMAGE_DESCRIPTOR = "Describe this image.";

export type MessageDispatcherOptions = {
    sessions: SessionStore;
    completion: CompletionClient;
};

const logger = getLogger("dispatch");

/**
 * Turns inbound user messages into replies.
 * Completion failures come back as `{ ok: false }` results with a user-facing text.
 */
export class MessageDispatcher {
    private sessions: SessionStore;
    private completion: CompletionClient;

    constructor(options: MessageDispatcherOptions) {
        this.sessions = options.sessions;
        this.completion = options.completion;
    }

    handleText(userId: string, text: string): Promise<DispatchResult> {
        return this.sessions.inUserLock(userId, async () => {
            const session = this.sessions.getOrCreate(userId);
            const kind: FollowUpKind = followUpClassify(text, session);
            logger.debug(`event: Text classified userId=${userId} kind=${kind} historyLength=${session.history.length}`);

            let request: CompletionRequest;
            if (kind === "image_follow_up" && session.imageContext) {
                request = {
                    kind: "parts",
                    parts: [
                        { type: "text", text: imageFollowUpPromptBuild(session.imageContext.descriptor, text) },
                        {
                            type: "image",
                            data: session.imageContext.image,
                            mimeType: session.imageContext.mimeType
                        }
                    ]
                };
            } else {
                request = {
                    kind: "history",
                    history: [...session.history, { role: "user", content: text }]
                };
            }

            const result = await this.generate(userId, request);
            if (result.ok) {
                this.sessions.appendExchange(userId, text, result.text);
            }
            return result;
        });
    }

    handleImage(userId: string, image: Uint8Array, mimeType: string, caption: string | null): Promise<DispatchResult> {
        return this.sessions.inUserLock(userId, async () => {
            const descriptor = caption?.trim() || DEFAULT_IMAGE_DESCRIPTOR;
            this.sessions.setImageContext(userId, image, mimeType, descriptor);
            logger.debug(`event: Image received userId=${userId} mimeType=${mimeType} bytes=${image.byteLength}`);

            const result = await this.generate(userId, {
                kind: "parts",
                parts: [
                    { type: "text", text: descriptor },
                    { type: "image", data: image, mimeType }
                ]
            });
            if (result.ok) {
                this.sessions.appendExchange(userId, `[Sent an image with caption: ${descriptor}]`, result.text);
            }
            return result;
        });
    }

    private async generate(userId: string, request: CompletionRequest): Promise<DispatchResult> {
        try {
            const text = await this.completion.generate(request);
            return { ok: true, text };
        } catch (error) {
            logger.warn({ error, userId }, "error: Completion failed");
            return { ok: false, text: `Sorry, an error occurred: ${errorMessage(error)}`, error };
        }
    }
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
