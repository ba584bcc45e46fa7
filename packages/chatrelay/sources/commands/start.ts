import path from "node:path";

import { config as loadEnv } from "dotenv";

import { GeminiClient } from "../completion/geminiClient.js";
import { ConfigError } from "../config/configError.js";
import { configResolve } from "../config/configResolve.js";
import type { RelayConfig } from "../config/configTypes.js";
import { LifecycleSupervisor } from "../lifecycle/lifecycleSupervisor.js";
import { getLogger } from "../log.js";
import { RelayRuntime } from "../runtime/relayRuntime.js";
import { TelegramConnector } from "../telegram/telegramConnector.js";

const logger = getLogger("command.start");

export type StartOptions = {
    env?: string;
    port?: string;
};

/**
 * Resolves the environment for `chatrelay start`.
 * Variables already set win over the .env file and `--port` wins over PORT.
 * An explicit `--env` file must exist.
 */
export function startConfigResolve(options: StartOptions, env: NodeJS.ProcessEnv = process.env): RelayConfig {
    const fileEnv: Record<string, string> = {};
    if (options.env) {
        const loaded = loadEnv({ path: path.resolve(options.env), processEnv: fileEnv });
        if (loaded.error) {
            throw new ConfigError([`--env: cannot read ${options.env} (${loaded.error.message})`]);
        }
    } else {
        loadEnv({ processEnv: fileEnv });
    }
    const merged: NodeJS.ProcessEnv = { ...fileEnv, ...env };
    return configResolve(options.port === undefined ? merged : { ...merged, PORT: options.port });
}

export function relayRuntimeCreate(config: RelayConfig): RelayRuntime {
    return new RelayRuntime({
        connector: new TelegramConnector({ token: config.telegramToken }),
        completion: new GeminiClient({
            apiKey: config.gemini.apiKey,
            textModel: config.gemini.textModel,
            visionModel: config.gemini.visionModel,
            baseUrl: config.gemini.baseUrl
        }),
        maxHistory: config.maxHistory
    });
}

export async function startCommand(options: StartOptions): Promise<void> {
    let config: RelayConfig;
    try {
        config = startConfigResolve(options);
    } catch (error) {
        if (error instanceof ConfigError) {
            logger.error(`error: ${error.message}`);
            process.exit(1);
        }
        throw error;
    }

    logger.info(
        `start: Starting relay port=${config.port} textModel=${config.gemini.textModel} visionModel=${config.gemini.visionModel}`
    );
    const supervisor = new LifecycleSupervisor({
        runtimeCreate: () => relayRuntimeCreate(config),
        maxRestarts: config.maxRestarts,
        restartDelayMs: config.restartDelayMs,
        health: { port: config.port }
    });
    const code = await supervisor.run();
    process.exit(code);
}
