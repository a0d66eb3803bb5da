import z from 'zod';

export const envSchema = z.object({
    DB_HOST: z.string().default('localhost'),
    DB_PORT: z.coerce.number().int().positive().default(5432),
    DB_NAME: z.string().default('rag_chatbot'),
    DB_USER: z.string().default('postgres'),
    DB_PASSWORD: z.string().default(''),
    DB_QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

    GEMINI_API_KEY: z.string({ required_error: 'GEMINI_API_KEY is required' }).trim().min(1, 'GEMINI_API_KEY is required'),
    GEMINI_EMBED_MODEL: z.string().min(1).default('gemini-embedding-001'),
    EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(768),
    GEMINI_CHAT_MODEL: z.string().min(1).default('gemini-2.5-flash'),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

    PORT: z.coerce.number().int().positive().default(8787),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Passed to `ConfigModule.forRoot({ validate })`. Throwing here aborts bootstrap,
 * so a missing API key or a malformed port never reaches a request handler.
 */
export function validateEnv(raw: Record<string, unknown>): EnvConfig {
    const parsed = envSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${issues}`);
    }
    return parsed.data;
}
