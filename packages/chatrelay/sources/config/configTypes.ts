export type GeminiConfig = {
    apiKey: string;
    textModel: string;
    visionModel: string;
    baseUrl: string;
};

export type RelayConfig = {
    telegramToken: string;
    gemini: GeminiConfig;
    port: number;
    maxHistory: number;
    maxRestarts: number;
    restartDelayMs: number;
};
