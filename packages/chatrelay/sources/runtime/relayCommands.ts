export const RELAY_WELCOME_TEXT = "👋 Hello! I'm your AI assistant powered by Gemini. Feel free to ask me anything!";

export const RELAY_HELP_TEXT = [
    "Here are the available commands:",
    "/start - Start the bot",
    "/help - Show this help message",
    "/clear - Forget our conversation and the last image",
    "",
    "Simply send any message or photo, and I'll respond using Gemini AI!"
].join("\n");

export const RELAY_CLEARED_TEXT = "🧹 Conversation cleared. Let's start fresh!";

export function relayUnknownCommandText(command: string): string {
    return `Unknown command /${command}. Send /help to see what I can do.`;
}
