import { describe, expect, it, vi } from "vitest";

import { SessionStore } from "../sessions/sessionStore.js";
import type { CompletionClient, CompletionRequest } from "../types.js";
import { MessageDispatcher } from "./messageDispatcher.js";

function completionBuild(reply: (request: CompletionRequest) => string | Promise<string>) {
    const generate = vi.fn(async (request: CompletionRequest) => reply(request));
    const completion: CompletionClient = { generate };
    return { completion, generate };
}

describe("MessageDispatcher", () => {
    it("answers fresh text with the history as context and records the exchange", async () => {
        const sessions = new SessionStore();
        sessions.appendExchange("42", "earlier question", "earlier answer");
        const { completion, generate } = completionBuild(() => "Paris");
        const dispatcher = new MessageDispatcher({ sessions, completion });

        const result = await dispatcher.handleText("42", "Capital of France?");

        expect(result).toEqual({ ok: true, text: "Paris" });
        expect(generate).toHaveBeenCalledWith({
            kind: "history",
            history: [
                { role: "user", content: "earlier question" },
                { role: "assistant", content: "earlier answer" },
                { role: "user", content: "Capital of France?" }
            ]
        });
        expect(sessions.getOrCreate("42").history.slice(-2)).toEqual([
            { role: "user", content: "Capital of France?" },
            { role: "assistant", content: "Paris" }
        ]);
    });

    it("answers image follow-ups with the stored image and keeps the image context", async () => {
        const sessions = new SessionStore();
        const image = new Uint8Array([9, 8, 7]);
        sessions.setImageContext("42", image, "image/png", "my bike");
        const { completion, generate } = completionBuild(() => "It is red.");
        const dispatcher = new MessageDispatcher({ sessions, completion });

        const result = await dispatcher.handleText("42", "What color is it?");

        expect(result).toEqual({ ok: true, text: "It is red." });
        expect(generate).toHaveBeenCalledWith({
            kind: "parts",
            parts: [
                {
                    type: "text",
                    text: 'Earlier the user shared this image with the caption: "my bike".\nAnswer their follow-up question about the image: What color is it?'
                },
                { type: "image", data: image, mimeType: "image/png" }
            ]
        });
        const session = sessions.getOrCreate("42");
        expect(session.imageContext?.descriptor).toBe("my bike");
        expect(session.history).toEqual([
            { role: "user", content: "What color is it?" },
            { role: "assistant", content: "It is red." }
        ]);
    });

    it("falls back to plain text when a greeting follows an image", async () => {
        const sessions = new SessionStore();
        sessions.setImageContext("42", new Uint8Array([1]), "image/jpeg", "my bike");
        const { completion, generate } = completionBuild(() => "Hello!");
        const dispatcher = new MessageDispatcher({ sessions, completion });

        await dispatcher.handleText("42", "Hi, how are you?");

        expect(generate.mock.calls[0]?.[0].kind).toBe("history");
    });

    it("stores the image, asks with its caption and records a synthetic turn", async () => {
        const sessions = new SessionStore();
        const image = new Uint8Array([1, 2]);
        const { completion, generate } = completionBuild(() => "A sunset over the sea.");
        const dispatcher = new MessageDispatcher({ sessions, completion });

        const result = await dispatcher.handleImage("42", image, "image/jpeg", "What is this?");

        expect(result).toEqual({ ok: true, text: "A sunset over the sea." });
        expect(generate).toHaveBeenCalledWith({
            kind: "parts",
            parts: [
                { type: "text", text: "What is this?" },
                { type: "image", data: image, mimeType: "image/jpeg" }
            ]
        });
        const session = sessions.getOrCreate("42");
        expect(session.imageContext?.descriptor).toBe("What is this?");
        expect(session.history).toEqual([
            { role: "user", content: "[Sent an image with caption: What is this?]" },
            { role: "assistant", content: "A sunset over the sea." }
        ]);
    });

    it("uses a default descriptor for images without a caption", async () => {
        const sessions = new SessionStore();
        const { completion } = completionBuild(() => "A cat.");
        const dispatcher = new MessageDispatcher({ sessions, completion });

        await dispatcher.handleImage("42", new Uint8Array([1]), "image/jpeg", "  ");

        expect(sessions.getOrCreate("42").imageContext?.descriptor).toBe("Describe this image.");
    });

    it("converts completion failures into an error reply without touching history", async () => {
        const sessions = new SessionStore();
        const { completion } = completionBuild(() => {
            throw new Error("quota exceeded");
        });
        const dispatcher = new MessageDispatcher({ sessions, completion });

        const result = await dispatcher.handleText("42", "Tell me a joke");

        expect(result.ok).toBe(false);
        expect(result.text).toBe("Sorry, an error occurred: quota exceeded");
        expect(sessions.getOrCreate("42").history).toEqual([]);
    });

    it("keeps the received image when the vision call fails", async () => {
        const sessions = new SessionStore();
        const { completion } = completionBuild(() => {
            throw new Error("unavailable");
        });
        const dispatcher = new MessageDispatcher({ sessions, completion });

        const result = await dispatcher.handleImage("42", new Uint8Array([1]), "image/jpeg", "a cat");

        expect(result).toMatchObject({ ok: false, text: "Sorry, an error occurred: unavailable" });
        expect(sessions.getOrCreate("42").history).toEqual([]);
        expect(sessions.getOrCreate("42").imageContext?.descriptor).toBe("a cat");
    });

    it("records concurrent messages of one user in arrival order", async () => {
        const sessions = new SessionStore();
        const releases: Array<() => void> = [];
        const { completion } = completionBuild(
            (request) =>
                new Promise<string>((resolve) => {
                    const history = request.kind === "history" ? request.history : [];
                    releases.push(() => resolve(`reply to ${history[history.length - 1]?.content ?? "?"}`));
                })
        );
        const dispatcher = new MessageDispatcher({ sessions, completion });

        const first = dispatcher.handleText("42", "one");
        const second = dispatcher.handleText("42", "two");
        await vi.waitFor(() => expect(releases).toHaveLength(1));
        releases[0]?.();
        await first;
        await vi.waitFor(() => expect(releases).toHaveLength(2));
        releases[1]?.();
        await second;

        expect(sessions.getOrCreate("42").history.map((turn) => turn.content)).toEqual([
            "one",
            "reply to one",
            "two",
            "reply to two"
        ]);
    });
});
