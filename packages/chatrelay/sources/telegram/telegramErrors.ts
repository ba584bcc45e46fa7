type TelegramErrorShape = {
    code?: unknown;
    message?: unknown;
    response?: {
        statusCode?: number;
        body?: { description?: unknown; error_code?: number };
    };
};

function telegramStatus(error: unknown): number | null {
    if (!error || typeof error !== "object") {
        return null;
    }
    const maybe = error as TelegramErrorShape;
    if (maybe.code !== "ETELEGRAM") {
        return null;
    }
    return maybe.response?.statusCode ?? maybe.response?.body?.error_code ?? null;
}

/**
 * True for "can't parse entities" rejections of HTML messages.
 */
export function telegramParseErrorIs(error: unknown): boolean {
    if (telegramStatus(error) === null) {
        return false;
    }
    const maybe = error as TelegramErrorShape;
    const description = maybe.response?.body?.description ?? maybe.message;
    if (typeof description !== "string") {
        return false;
    }
    const normalized = description.toLowerCase();
    return normalized.includes("can't parse entities") || normalized.includes("cant parse entities");
}

/**
 * True when another client is polling with the same token (HTTP 409).
 */
export function telegramConflictErrorIs(error: unknown): boolean {
    return telegramStatus(error) === 409;
}

/**
 * True when Telegram rejects the bot token (HTTP 401).
 */
export function telegramUnauthorizedErrorIs(error: unknown): boolean {
    return telegramStatus(error) === 401;
}
