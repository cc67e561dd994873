// src/config/types.ts
import { z } from 'zod';
import { type envSchema } from './schemas';
import { ConferenceCategory } from '../types/deadline.types';

/** Injection token for the raw environment the configuration is parsed from. */
export const ENVIRONMENT = 'Environment';
export type EnvironmentSource = Record<string, string | undefined>;

/**
 * Type inferred from the Zod schema for environment variables.
 */
export type AppConfig = z.infer<typeof envSchema>;

/** Injection token for the table of tracked conferences. */
export const TARGET_TABLE = 'TargetTable';

/**
 * Ordered category → aliases table. Earlier entries win when a conference matches several.
 */
export type TargetTable = ReadonlyArray<{
    category: ConferenceCategory;
    aliases: readonly string[];
}>;

export class ConfigurationError extends Error {
    details: Record<string, unknown>;

    constructor(message: string, details: Record<string, unknown> = {}) {
        super(message);
        this.name = 'ConfigurationError';
        this.details = details;
        Object.setPrototypeOf(this, ConfigurationError.prototype);
    }
}
