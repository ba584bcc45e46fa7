import { describe, expect, it } from "vitest";

import { telegramCommandParse } from "./telegramCommandParse.js";

describe("telegramCommandParse", () => {
    it("parses a bare command", () => {
        expect(telegramCommandParse("/start")).toEqual({ command: "start", args: "" });
    });

    it("drops the bot mention and lowercases the name", () => {
        expect(telegramCommandParse("/HELP@relay_bot")).toEqual({ command: "help", args: "" });
    });

    it("keeps trimmed arguments", () => {
        expect(telegramCommandParse("  /reset   all of it  ")).toEqual({ command: "reset", args: "all of it" });
    });

    it("returns null for ordinary text", () => {
        expect(telegramCommandParse("hello /start")).toBeNull();
        expect(telegramCommandParse("/")).toBeNull();
        expect(telegramCommandParse("/start-now")).toBeNull();
    });
});
