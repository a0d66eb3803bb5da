// Bounds and defaults of the query controls offered to the UI.
export const CHAT_SETTINGS = {
    topK: { min: 1, max: 10, default: 3 },
    temperature: { min: 0, max: 1, step: 0.1, default: 0.7 },
    maxTokens: { min: 100, max: 1000, step: 50, default: 500 },
} as const;
