import { describe, expect, it } from "vitest";

import { ConfigError } from "./configError.js";
import { configResolve } from "./configResolve.js";

const baseEnv = {
    TELEGRAM_BOT_TOKEN: "test-token",
    GEMINI_API_KEY: "test-key"
};

describe("configResolve", () => {
    it("applies defaults when only the secrets are set", () => {
        const config = configResolve(baseEnv);

        expect(config).toEqual({
            telegramToken: "test-token",
            gemini: {
                apiKey: "test-key",
                textModel: "gemini-1.5-flash",
                visionModel: "gemini-1.5-flash",
                baseUrl: "https://generativelanguage.googleapis.com/v1beta"
            },
            port: 8080,
            maxHistory: 20,
            maxRestarts: 3,
            restartDelayMs: 5000
        });
    });

    it("reads overrides and coerces numbers", () => {
        const config = configResolve({
            ...baseEnv,
            PORT: "9090",
            GEMINI_TEXT_MODEL: "gemini-pro",
            GEMINI_BASE_URL: "http://localhost:4000/v1/",
            CHATRELAY_MAX_HISTORY: "8",
            CHATRELAY_MAX_RESTARTS: "5",
            CHATRELAY_RESTART_DELAY_MS: "0"
        });

        expect(config.port).toBe(9090);
        expect(config.gemini.textModel).toBe("gemini-pro");
        expect(config.gemini.visionModel).toBe("gemini-1.5-flash");
        expect(config.gemini.baseUrl).toBe("http://localhost:4000/v1");
        expect(config.maxHistory).toBe(8);
        expect(config.maxRestarts).toBe(5);
        expect(config.restartDelayMs).toBe(0);
    });

    it("treats blank values as unset", () => {
        const config = configResolve({ ...baseEnv, PORT: "  ", GEMINI_VISION_MODEL: "" });

        expect(config.port).toBe(8080);
        expect(config.gemini.visionModel).toBe("gemini-1.5-flash");
    });

    it("lists every missing or invalid variable", () => {
        let caught: unknown = null;
        try {
            configResolve({ GEMINI_API_KEY: " ", PORT: "abc", CHATRELAY_MAX_HISTORY: "0" });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ConfigError);
        const issues = caught instanceof ConfigError ? caught.issues : [];
        expect(issues.map((issue) => issue.split(":")[0])).toEqual([
            "TELEGRAM_BOT_TOKEN",
            "GEMINI_API_KEY",
            "PORT",
            "CHATRELAY_MAX_HISTORY"
        ]);
        expect(issues[0]).toBe("TELEGRAM_BOT_TOKEN: Required");
    });
});
