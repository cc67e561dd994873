// src/config/schemas.ts
import { z } from 'zod';
import { CONFERENCE_CATEGORIES } from '../types/deadline.types';

// --- Helper Functions for Environment Variable Parsing ---

/**
 * Parses a comma-separated string from an environment variable into an array of trimmed strings.
 */
export const parseCommaSeparatedString = (val: string | undefined): string[] => {
    if (!val) {
        return [];
    }
    return val.split(',').map(item => item.trim()).filter(item => item !== '');
};

/** Empty strings count as "not set". */
const optionalNonEmpty = z.string().optional().transform(val => (val && val.trim() !== '' ? val.trim() : undefined));

// --- Zod Schema Definition for Environment Variables ---
/**
 * Structure and validation rules for the environment variables the digest reads.
 */
export const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // --- Logging Configuration ---
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    LOGS_DIRECTORY: z.string().default('./logs'),
    APP_LOG_FILE_NAME: z.string().default('deadline-digest.log'),
    LOG_TO_CONSOLE: z.enum(['true', 'false']).transform(val => val === 'true').default('true'),
    LOG_TO_FILE: z.enum(['true', 'false']).transform(val => val === 'true').default('true'),

    // --- Sources ---
    /**
     * Nested YAML list published by ccfddl. An empty value disables the source.
     */
    CCFDDL_URL: z.string().default('https://ccfddl.github.io/conference/allconf.yml'),
    /**
     * Flat YAML list from sec-deadlines, which uses rolling %y/%Y deadline templates.
     */
    SEC_DEADLINES_URL: z.string().default('https://raw.githubusercontent.com/sec-deadlines/sec-deadlines.github.io/master/_data/conferences.yml'),
    /**
     * Comma-separated URLs returning flat JSON arrays of conferences.
     */
    JSON_FEED_URLS: z.string().optional().transform(parseCommaSeparatedString),
    SOURCE_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

    // --- Target conferences ---
    TARGETS_FILE: z.string().default('config/targets.json'),

    // --- Delivery ---
    SLACK_WEBHOOK_URL: optionalNonEmpty,
    WEBHOOK_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    FAIL_ON_DELIVERY_ERROR: z.enum(['true', 'false']).transform(val => val === 'true').default('false'),

    // --- Rendering ---
    DIGEST_TIMEZONE_LABEL: optionalNonEmpty,
    /**
     * Slack rejects messages with more than 50 blocks; the rest of the layout takes up to 11.
     */
    MAX_CONFERENCE_SECTIONS: z.coerce.number().int().positive().max(39).default(39),

    // --- Scheduling ---
    DIGEST_CRON_SCHEDULE: optionalNonEmpty,
    CRON_TIMEZONE: z.string().default('Asia/Seoul'),
});

// --- Target table file ---
export const targetTableFileSchema = z.object({
    categories: z.array(z.object({
        category: z.enum(CONFERENCE_CATEGORIES),
        aliases: z.array(z.string().trim().min(1)).min(1),
    })).min(1),
});
