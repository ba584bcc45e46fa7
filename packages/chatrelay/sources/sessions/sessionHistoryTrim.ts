import type { Turn } from "../types.js";

/**
 * Drops the oldest turns in place until at most maxHistory remain.
 * Expects: maxHistory > 0.
 */
export function sessionHistoryTrim(history: Turn[], maxHistory: number): Turn[] {
    if (maxHistory <= 0) {
        throw new Error("maxHistory must be greater than 0");
    }
    const overflow = history.length - maxHistory;
    if (overflow > 0) {
        history.splice(0, overflow);
    }
    return history;
}
