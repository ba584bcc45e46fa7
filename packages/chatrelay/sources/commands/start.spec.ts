import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { ConfigError } from "../config/configError.js";
import { startConfigResolve } from "./start.js";

const tempRoots: string[] = [];

async function envFileWrite(lines: string[]): Promise<string> {
    const dir = await mkdtemp(path.join(os.tmpdir(), "chatrelay-start-"));
    tempRoots.push(dir);
    const file = path.join(dir, ".env");
    await writeFile(file, lines.join("\n"), "utf8");
    return file;
}

afterEach(async () => {
    await Promise.all(tempRoots.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

describe("startConfigResolve", () => {
    it("loads the env file without overriding existing variables", async () => {
        const file = await envFileWrite([
            "TELEGRAM_BOT_TOKEN=test-token",
            "GEMINI_API_KEY=file-key",
            "CHATRELAY_MAX_HISTORY=6"
        ]);
        const env: NodeJS.ProcessEnv = { GEMINI_API_KEY: "test-key" };

        const config = startConfigResolve({ env: file }, env);

        expect(config.telegramToken).toBe("test-token");
        expect(config.gemini.apiKey).toBe("test-key");
        expect(config.maxHistory).toBe(6);
    });

    it("lets --port override PORT", async () => {
        const file = await envFileWrite(["TELEGRAM_BOT_TOKEN=test-token", "GEMINI_API_KEY=test-key", "PORT=8000"]);

        const config = startConfigResolve({ env: file, port: "9100" }, {});

        expect(config.port).toBe(9100);
    });

    it("fails with ConfigError when the env file is missing", () => {
        expect(() => startConfigResolve({ env: "/nonexistent/chatrelay/.env" }, {})).toThrow(ConfigError);
    });
});
