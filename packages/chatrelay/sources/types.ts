export type TurnRole = "user" | "assistant";

export type Turn = {
    readonly role: TurnRole;
    readonly content: string;
};

export type ImageContext = {
    image: Uint8Array;
    mimeType: string;
    descriptor: string;
    capturedAt: Date;
};

/**
 * Read-only view of one user's session.
 * History is a copy; mutating it does not affect the store.
 */
export type Session = {
    userId: string;
    history: Turn[];
    imageContext: ImageContext | null;
};

export type FollowUpKind = "image_follow_up" | "fresh_text";

export type CompletionPart =
    | { type: "text"; text: string }
    | { type: "image"; data: Uint8Array; mimeType: string };

export type CompletionRequest =
    | { kind: "prompt"; prompt: string }
    | { kind: "parts"; parts: CompletionPart[] }
    | { kind: "history"; history: Turn[] };

export interface CompletionClient {
    generate(request: CompletionRequest): Promise<string>;
}

export type DispatchResult =
    | { ok: true; text: string }
    | { ok: false; text: string; error: unknown };

export type InboundImage = {
    data: Uint8Array;
    mimeType: string;
};

export type InboundMessage = {
    userId: string;
    chatId: string;
    text: string | null;
    image: InboundImage | null;
};

export type InboundCommand = {
    userId: string;
    chatId: string;
    command: string;
    args: string;
};

export type MessageHandler = (message: InboundMessage) => void | Promise<void>;
export type CommandHandler = (command: InboundCommand) => void | Promise<void>;

export type TextFormat = "html" | "plain";

/** Outbound text sink used by the chunked sender. */
export interface TextTransport {
    sendText(targetId: string, text: string, format: TextFormat): Promise<void>;
}

/** Chat transport consumed by the relay runtime. */
export interface Connector extends TextTransport {
    onMessage(handler: MessageHandler): () => void;
    onCommand(handler: CommandHandler): () => void;
    onFatal(handler: (reason: string, error?: unknown) => void): () => void;
    startTyping(targetId: string): () => void;
    start(): Promise<void>;
    shutdown(reason?: string): Promise<void>;
}
