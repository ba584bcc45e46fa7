import { describe, expect, it, vi } from "vitest";

import { CompletionError } from "./completionError.js";
import { GeminiClient, geminiContentsBuild } from "./geminiClient.js";

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { "Content-Type": "application/json" }
    });
}

function fetchMockBuild(response: () => Response) {
    return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => response());
}

function requestBody(init: RequestInit | undefined): unknown {
    return JSON.parse(String(init?.body));
}

describe("geminiContentsBuild", () => {
    it("maps assistant turns to the model role", () => {
        const contents = geminiContentsBuild({
            kind: "history",
            history: [
                { role: "user", content: "hello" },
                { role: "assistant", content: "hi there" }
            ]
        });

        expect(contents).toEqual([
            { role: "user", parts: [{ text: "hello" }] },
            { role: "model", parts: [{ text: "hi there" }] }
        ]);
    });

    it("wraps a flat prompt as one user turn", () => {
        expect(geminiContentsBuild({ kind: "prompt", prompt: "ping" })).toEqual([
            { role: "user", parts: [{ text: "ping" }] }
        ]);
    });
});

describe("GeminiClient", () => {
    it("posts history to the text model and joins candidate parts", async () => {
        const fetchMock = fetchMockBuild(() =>
            jsonResponse({ candidates: [{ content: { parts: [{ text: "Hello " }, { text: "world" }] } }] })
        );
        const client = new GeminiClient({
            apiKey: "test-key",
            textModel: "text-model",
            visionModel: "vision-model",
            baseUrl: "https://gemini.test/v1beta/",
            fetch: fetchMock
        });

        const text = await client.generate({ kind: "history", history: [{ role: "user", content: "hi" }] });

        expect(text).toBe("Hello world");
        const [input, init] = fetchMock.mock.calls[0] ?? [];
        expect(input).toBe("https://gemini.test/v1beta/models/text-model:generateContent");
        expect(init?.headers).toEqual({ "Content-Type": "application/json", "x-goog-api-key": "test-key" });
        expect(requestBody(init)).toEqual({ contents: [{ role: "user", parts: [{ text: "hi" }] }] });
    });

    it("sends image parts inline to the vision model", async () => {
        const fetchMock = fetchMockBuild(() => jsonResponse({ candidates: [{ content: { parts: [{ text: "A cat" }] } }] }));
        const client = new GeminiClient({
            apiKey: "test-key",
            textModel: "text-model",
            visionModel: "vision-model",
            fetch: fetchMock
        });

        await client.generate({
            kind: "parts",
            parts: [
                { type: "text", text: "What is this?" },
                { type: "image", data: new Uint8Array([1, 2, 3]), mimeType: "image/jpeg" }
            ]
        });

        const [input, init] = fetchMock.mock.calls[0] ?? [];
        expect(input).toBe("https://generativelanguage.googleapis.com/v1beta/models/vision-model:generateContent");
        expect(requestBody(init)).toEqual({
            contents: [
                {
                    role: "user",
                    parts: [{ text: "What is this?" }, { inlineData: { mimeType: "image/jpeg", data: "AQID" } }]
                }
            ]
        });
    });

    it("raises a completion error with the status for failed responses", async () => {
        const client = new GeminiClient({
            apiKey: "test-key",
            fetch: fetchMockBuild(() => new Response("overloaded", { status: 503 }))
        });

        const failure = client.generate({ kind: "prompt", prompt: "hi" });

        await expect(failure).rejects.toBeInstanceOf(CompletionError);
        await expect(failure).rejects.toMatchObject({
            status: 503,
            message: "Gemini request failed (503): overloaded"
        });
    });

    it("raises when the prompt is blocked", async () => {
        const client = new GeminiClient({
            apiKey: "test-key",
            fetch: fetchMockBuild(() => jsonResponse({ promptFeedback: { blockReason: "SAFETY" } }))
        });

        await expect(client.generate({ kind: "prompt", prompt: "hi" })).rejects.toThrow(
            "Gemini blocked the prompt: SAFETY"
        );
    });

    it("raises when no candidate carries text", async () => {
        const client = new GeminiClient({
            apiKey: "test-key",
            fetch: fetchMockBuild(() => jsonResponse({ candidates: [{ finishReason: "RECITATION" }] }))
        });

        await expect(client.generate({ kind: "prompt", prompt: "hi" })).rejects.toThrow(
            "Gemini returned no text (RECITATION)"
        );
    });

    it("aborts requests that exceed the timeout", async () => {
        const hangingFetch = vi.fn(
            (_input: string | URL | Request, init?: RequestInit) =>
                new Promise<Response>((_resolve, reject) => {
                    init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
                })
        );
        const client = new GeminiClient({ apiKey: "test-key", requestTimeoutMs: 10, fetch: hangingFetch });

        await expect(client.generate({ kind: "prompt", prompt: "hi" })).rejects.toThrow(
            "Gemini request timed out after 10ms"
        );
    });

    it("requires an api key", () => {
        expect(() => new GeminiClient({ apiKey: " " })).toThrow("Gemini apiKey is required");
    });
});
