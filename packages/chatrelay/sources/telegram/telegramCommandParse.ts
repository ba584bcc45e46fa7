export type TelegramCommand = {
    command: string;
    args: string;
};

/**
 * Parses "/name@bot rest" into a lowercase command name and its trimmed arguments.
 * Returns null when the text is not a command.
 */
export function telegramCommandParse(text: string): TelegramCommand | null {
    const match = /^\/([a-zA-Z0-9_]+)(?:@[a-zA-Z0-9_]+)?(?:\s+([\s\S]*))?$/.exec(text.trim());
    if (!match?.[1]) {
        return null;
    }
    return {
        command: match[1].toLowerCase(),
        args: (match[2] ?? "").trim()
    };
}
