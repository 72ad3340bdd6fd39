import { z } from 'zod';
import 'dotenv/config';
import { ConfigurationError } from './errors.js';

/**
 * A variable left blank in .env counts as unset, so its default applies.
 */
function dropBlankValues(env: unknown): unknown {
    if (typeof env !== 'object' || env === null) return env;
    return Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''));
}

/**
 * Environment variable schema with validation.
 * Pool members (USERn_API_KEY / USERn_USERNAME) are read separately by the credential pool.
 */
const configSchema = z.preprocess(dropBlankValues, z.object({
    // Forum
    DISCOURSE_URL: z
        .string({ required_error: 'DISCOURSE_URL is required' })
        .url('DISCOURSE_URL must be a valid URL')
        .transform((url) => url.replace(/\/+$/, '')),
    API_KEY: z.string().optional(),
    API_USERNAME: z.string().optional(),

    // Input
    TOPICS_FILE: z.string().min(1).default('topics.json'),

    // Activity log
    LOG_SINK: z.enum(['file', 'sqlite']).default('file'),
    LOG_FILE: z.string().min(1).default('discourse_topics.log'),
    LOG_DB_PATH: z.string().min(1).default('data/topic-poster.db'),

    // Submission
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    SUBMIT_CONCURRENCY: z.coerce.number().int().positive().default(1),
    REQUEST_DELAY_MS: z.coerce.number().int().min(0).default(0),
}));

export type Config = z.infer<typeof configSchema>;

export type Env = Record<string, string | undefined>;

/**
 * Load and validate configuration from environment variables.
 * Throws ConfigurationError on invalid or missing required values.
 */
export function loadConfig(env: Env = process.env): Config {
    const result = configSchema.safeParse(env);

    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        const errors = issues.map((issue) => `  - ${issue}`).join('\n');
        throw new ConfigurationError(`Configuration validation failed:\n${errors}`, issues);
    }

    return result.data;
}
