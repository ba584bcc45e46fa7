import { z } from "zod";

import { DEFAULT_GEMINI_BASE_URL, DEFAULT_GEMINI_MODEL } from "../completion/geminiClient.js";
import { DEFAULT_MAX_RESTARTS, DEFAULT_RESTART_DELAY_MS } from "../lifecycle/lifecycleSupervisor.js";
import { DEFAULT_MAX_HISTORY } from "../sessions/sessionStore.js";
import { ConfigError } from "./configError.js";
import type { RelayConfig } from "./configTypes.js";

export const DEFAULT_PORT = 8080;

const blankToUndefined = (value: unknown) =>
    typeof value === "string" && value.trim().length === 0 ? undefined : value;

const requiredString = () => z.preprocess(blankToUndefined, z.string({ required_error: "Required" }).trim().min(1));

const optionalString = (fallback: string) => z.preprocess(blankToUndefined, z.string().trim().default(fallback));

const integer = (fallback: number, min: number, max?: number) => {
    let schema = z.coerce.number().int().min(min);
    if (max !== undefined) {
        schema = schema.max(max);
    }
    return z.preprocess(blankToUndefined, schema.default(fallback));
};

const envSchema = z.object({
    TELEGRAM_BOT_TOKEN: requiredString(),
    GEMINI_API_KEY: requiredString(),
    PORT: integer(DEFAULT_PORT, 0, 65535),
    GEMINI_TEXT_MODEL: optionalString(DEFAULT_GEMINI_MODEL),
    GEMINI_VISION_MODEL: optionalString(DEFAULT_GEMINI_MODEL),
    GEMINI_BASE_URL: z.preprocess(blankToUndefined, z.string().trim().url().default(DEFAULT_GEMINI_BASE_URL)),
    CHATRELAY_MAX_HISTORY: integer(DEFAULT_MAX_HISTORY, 1),
    CHATRELAY_MAX_RESTARTS: integer(DEFAULT_MAX_RESTARTS, 1),
    CHATRELAY_RESTART_DELAY_MS: integer(DEFAULT_RESTART_DELAY_MS, 0)
});

/**
 * Validates environment variables into a RelayConfig.
 * Throws ConfigError naming every invalid or missing variable.
 */
export function configResolve(env: NodeJS.ProcessEnv = process.env): RelayConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
        );
    }
    const values = parsed.data;
    return {
        telegramToken: values.TELEGRAM_BOT_TOKEN,
        gemini: {
            apiKey: values.GEMINI_API_KEY,
            textModel: values.GEMINI_TEXT_MODEL,
            visionModel: values.GEMINI_VISION_MODEL,
            baseUrl: values.GEMINI_BASE_URL.replace(/\/+$/, "")
        },
        port: values.PORT,
        maxHistory: values.CHATRELAY_MAX_HISTORY,
        maxRestarts: values.CHATRELAY_MAX_RESTARTS,
        restartDelayMs: values.CHATRELAY_RESTART_DELAY_MS
    };
}
