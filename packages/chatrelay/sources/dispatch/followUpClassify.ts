import type { FollowUpKind, Session } from "../types.js";

/**
 * Greeting and reset words that end an image discussion.
 * Matched as case-insensitive substrings, so "this" also counts as "hi".
 */
export const FOLLOW_UP_RESET_TOKENS = ["hello", "hi", "start"] as const;

/**
 * Decides whether a text message continues the user's last image discussion.
 * Returns "image_follow_up" when an image context exists and no reset token appears.
 */
export function followUpClassify(text: string, session: Pick<Session, "imageContext">): FollowUpKind {
    if (!session.imageContext) {
        return "fresh_text";
    }
    const normalized = text.toLowerCase();
    const reset = FOLLOW_UP_RESET_TOKENS.some((token) => normalized.includes(token));
    return reset ? "fresh_text" : "image_follow_up";
}
