import { createRequire } from "node:module";

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type LogFormat = "pretty" | "json";
export type LogDestination = "stdout" | "stderr" | string;

export type LogConfig = {
    level: string;
    format: LogFormat;
    destination: LogDestination;
    redact: string[];
    service: string;
    environment: string;
};

const DEFAULT_REDACT = ["token", "apiKey", "secret", "*.token", "*.apiKey", "*.secret"];
const MODULE_WIDTH = 16;

const nodeRequire = createRequire(import.meta.url);

let rootLogger: Logger | null = null;

export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
    if (rootLogger) {
        return rootLogger;
    }
    rootLogger = buildLogger(resolveLogConfig(overrides));
    return rootLogger;
}

export function getLogger(moduleName?: string): Logger {
    const logger = rootLogger ?? initLogging();
    return logger.child({ module: moduleNormalize(moduleName) });
}

export function resetLogging(): void {
    rootLogger = null;
}

export function resolveLogConfig(overrides: Partial<LogConfig> = {}): LogConfig {
    const isDev = process.env.NODE_ENV !== "production";
    const isUnitTest = process.env.VITEST === "true" || process.env.VITEST === "1";
    const level =
        overrides.level ??
        envValue("CHATRELAY_LOG_LEVEL") ??
        envValue("LOG_LEVEL") ??
        (isUnitTest ? "silent" : isDev ? "debug" : "info");
    const destination = overrides.destination ?? envValue("CHATRELAY_LOG_DEST") ?? envValue("LOG_DEST") ?? "stdout";
    let format =
        overrides.format ??
        formatParse(envValue("CHATRELAY_LOG_FORMAT")) ??
        formatParse(envValue("LOG_FORMAT")) ??
        (isDev ? "pretty" : "json");

    // Files always get json lines.
    if (destination !== "stdout" && destination !== "stderr") {
        format = "json";
    }

    return {
        level,
        format,
        destination,
        redact: overrides.redact ?? DEFAULT_REDACT,
        service: overrides.service ?? "chatrelay",
        environment: overrides.environment ?? envValue("NODE_ENV") ?? "development"
    };
}

/**
 * Formats one pretty log line: `[HH:MM:SS] [module] message key=value`.
 * Used as pino-pretty's messageFormat.
 */
export function formatPrettyMessage(log: Record<string, unknown>, messageKey: string): string {
    const time = timeFormat(log.time);
    const module = moduleNormalize(typeof log.module === "string" ? log.module : undefined).padEnd(MODULE_WIDTH, " ");
    const rawMessage = log[messageKey];
    const message = rawMessage === undefined || rawMessage === null ? "" : String(rawMessage);
    const details = Object.entries(log)
        .filter(([key, value]) => key !== messageKey && !PRETTY_RESERVED_FIELDS.has(key) && value !== undefined)
        .map(([key, value]) => `${key}=${detailFormat(key, value)}`)
        .join(" ");
    return [`[${time}]`, `[${module}]`, message, details].filter((part) => part.length > 0).join(" ");
}

const PRETTY_RESERVED_FIELDS = new Set([
    "pid",
    "hostname",
    "level",
    "time",
    "service",
    "environment",
    "module",
    "msg"
]);

function buildLogger(config: LogConfig): Logger {
    const options: LoggerOptions = {
        level: config.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: {
            service: config.service,
            environment: config.environment
        },
        redact: config.redact.length > 0 ? { paths: config.redact, censor: "[REDACTED]" } : undefined,
        errorKey: "error",
        serializers: {
            error: pino.stdSerializers.err
        }
    };

    if (config.format === "pretty") {
        const prettyFactory = prettyFactoryResolve();
        if (prettyFactory) {
            const stream = prettyFactory({
                colorize: true,
                ignore: "pid,hostname,service,environment,module",
                hideObject: true,
                messageFormat: formatPrettyMessage,
                destination: config.destination === "stderr" ? 2 : 1
            });
            return pino(options, stream);
        }
    }

    const destination = destinationResolve(config.destination);
    return destination ? pino(options, destination) : pino(options);
}

function destinationResolve(destination: LogDestination): DestinationStream | undefined {
    if (destination === "stdout") {
        return undefined;
    }
    if (destination === "stderr") {
        return pino.destination(2);
    }
    return pino.destination({ dest: destination, mkdir: true, sync: false });
}

function prettyFactoryResolve(): ((options: Record<string, unknown>) => DestinationStream) | null {
    try {
        return nodeRequire("pino-pretty");
    } catch {
        return null;
    }
}

function detailFormat(key: string, value: unknown): string {
    if (value === null) {
        return "null";
    }
    if (key === "error" && typeof value === "object") {
        const message = (value as { message?: unknown }).message;
        return textFormat(typeof message === "string" ? message : String(value));
    }
    if (typeof value === "object") {
        return textFormat(JSON.stringify(value));
    }
    return textFormat(String(value));
}

function textFormat(value: string): string {
    const truncated = value.length > 180 ? `${value.slice(0, 180)}...` : value;
    if (truncated.length === 0) {
        return '""';
    }
    return /[=\s]/.test(truncated) ? JSON.stringify(truncated) : truncated;
}

function timeFormat(value: unknown): string {
    const date = typeof value === "string" || typeof value === "number" ? new Date(value) : new Date();
    const safe = Number.isNaN(date.getTime()) ? new Date() : date;
    return [safe.getHours(), safe.getMinutes(), safe.getSeconds()]
        .map((part) => String(part).padStart(2, "0"))
        .join(":");
}

function moduleNormalize(moduleName?: string): string {
    const trimmed = moduleName?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : "unknown";
}

function formatParse(value: string | null): LogFormat | null {
    const normalized = value?.trim().toLowerCase();
    if (normalized === "pretty" || normalized === "json") {
        return normalized;
    }
    return null;
}

function envValue(key: string): string | null {
    const value = process.env[key];
    if (typeof value !== "string") {
        return null;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}
