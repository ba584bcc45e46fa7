import { getLogger } from "../log.js";
import type { CompletionClient, CompletionPart, CompletionRequest, Turn } from "../types.js";
import { CompletionError } from "./completionError.js";

export const DEFAULT_GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";
export const DEFAULT_GEMINI_MODEL = "gemini-1.5-flash";
const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export type GeminiClientOptions = {
    apiKey: string;
    textModel?: string;
    visionModel?: string;
    baseUrl?: string;
    requestTimeoutMs?: number;
    fetch?: typeof fetch;
};

export type GeminiPart = { text: string } | { inlineData: { mimeType: string; data: string } };

export type GeminiContent = {
    role: "user" | "model";
    parts: GeminiPart[];
};

type GeminiGenerateContentResponse = {
    candidates?: Array<{
        finishReason?: string;
        content?: {
            parts?: Array<{
                text?: string;
            }>;
        };
    }>;
    promptFeedback?: {
        blockReason?: string;
    };
};

const logger = getLogger("gemini");

/**
 * Completion client for the Gemini generateContent REST endpoint.
 * Text-only requests use the text model; any request with an image part uses the vision model.
 */
export class GeminiClient implements CompletionClient {
    private apiKey: string;
    private textModel: string;
    private visionModel: string;
    private baseUrl: string;
    private requestTimeoutMs: number;
    private fetchImpl: typeof fetch;

    constructor(options: GeminiClientOptions) {
        if (options.apiKey.trim().length === 0) {
            throw new Error("Gemini apiKey is required");
        }
        this.apiKey = options.apiKey;
        this.textModel = options.textModel ?? DEFAULT_GEMINI_MODEL;
        this.visionModel = options.visionModel ?? this.textModel;
        this.baseUrl = (options.baseUrl ?? DEFAULT_GEMINI_BASE_URL).replace(/\/+$/, "");
        this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
        this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    }

    async generate(request: CompletionRequest): Promise<string> {
        const contents = geminiContentsBuild(request);
        const model = request.kind === "parts" && request.parts.some((part) => part.type === "image")
            ? this.visionModel
            : this.textModel;
        const endpoint = `${this.baseUrl}/models/${model}:generateContent`;
        logger.debug(`send: Gemini request model=${model} kind=${request.kind} contents=${contents.length}`);

        const abortController = new AbortController();
        const timeout = setTimeout(() => {
            abortController.abort();
        }, this.requestTimeoutMs);
        let response: Response;
        try {
            response = await this.fetchImpl(endpoint, {
                method: "POST",
                headers: {
                    "Content-Type": "application/json",
                    "x-goog-api-key": this.apiKey
                },
                body: JSON.stringify({ contents }),
                signal: abortController.signal
            });
        } catch (error) {
            if (abortController.signal.aborted) {
                throw new CompletionError(`Gemini request timed out after ${this.requestTimeoutMs}ms`, null, {
                    cause: error
                });
            }
            throw new CompletionError(`Gemini request failed: ${errorMessage(error)}`, null, { cause: error });
        } finally {
            clearTimeout(timeout);
        }

        if (!response.ok) {
            const body = await response.text().catch(() => "");
            throw new CompletionError(
                `Gemini request failed (${response.status}): ${body.slice(0, 200) || response.statusText}`,
                response.status
            );
        }

        const payload = (await response.json()) as GeminiGenerateContentResponse;
        const blockReason = payload.promptFeedback?.blockReason;
        if (blockReason) {
            throw new CompletionError(`Gemini blocked the prompt: ${blockReason}`, response.status);
        }
        const text = (payload.candidates?.[0]?.content?.parts ?? [])
            .map((part) => part.text ?? "")
            .join("")
            .trim();
        if (!text) {
            const finishReason = payload.candidates?.[0]?.finishReason ?? "no candidates";
            throw new CompletionError(`Gemini returned no text (${finishReason})`, response.status);
        }
        logger.debug(`receive: Gemini response model=${model} length=${text.length}`);
        return text;
    }
}

/**
 * Maps a completion request onto Gemini contents.
 * Assistant turns become Gemini "model" turns.
 */
export function geminiContentsBuild(request: CompletionRequest): GeminiContent[] {
    switch (request.kind) {
        case "prompt":
            return [{ role: "user", parts: [{ text: request.prompt }] }];
        case "parts":
            return [{ role: "user", parts: request.parts.map(geminiPartBuild) }];
        case "history":
            return request.history.map(geminiTurnBuild);
    }
}

function geminiTurnBuild(turn: Turn): GeminiContent {
    return {
        role: turn.role === "assistant" ? "model" : "user",
        parts: [{ text: turn.content }]
    };
}

function geminiPartBuild(part: CompletionPart): GeminiPart {
    if (part.type === "text") {
        return { text: part.text };
    }
    return {
        inlineData: {
            mimeType: part.mimeType,
            data: Buffer.from(part.data).toString("base64")
        }
    };
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
