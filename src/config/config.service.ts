// src/config/config.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import dotenv from 'dotenv';
import { z } from 'zod';
import { LevelWithSilent } from 'pino';

import { envSchema } from './schemas';
import { AppConfig, ENVIRONMENT, EnvironmentSource } from './types';
import { AppConfiguration } from './app.config';
import { DigestConfiguration } from './digest.config';

@singleton()
export class ConfigService {
    public readonly rawConfig: AppConfig;
    public readonly appConfiguration: AppConfiguration;
    public readonly digestConfiguration: DigestConfiguration;

    constructor(@inject(ENVIRONMENT) env: EnvironmentSource) {
        dotenv.config();

        try {
            this.rawConfig = envSchema.parse(env);
        } catch (error) {
            if (error instanceof z.ZodError) {
                console.error("❌ Invalid environment variables (schema validation failed):", JSON.stringify(error.format(), null, 2));
            } else {
                console.error("❌ Unexpected error loading configuration:", error);
            }
            process.exit(1);
        }

        this.appConfiguration = new AppConfiguration(this.rawConfig);
        this.digestConfiguration = new DigestConfiguration(this.rawConfig);
    }

    // --- Delegated Getters from AppConfiguration ---
    get nodeEnv(): AppConfiguration['nodeEnv'] { return this.appConfiguration.nodeEnv; }
    get isProduction(): boolean { return this.appConfiguration.nodeEnv === 'production'; }
    get logLevel(): LevelWithSilent { return this.appConfiguration.logLevel; }
    get logsDirectory(): string { return this.appConfiguration.logsDirectoryPath; }
    get appLogFilePath(): string { return this.appConfiguration.appLogFilePath; }
    get logToConsole(): boolean { return this.appConfiguration.logToConsole; }
    get logToFile(): boolean { return this.appConfiguration.logToFile; }
    get targetsFilePath(): string { return this.appConfiguration.targetsFilePath; }

    // --- Delegated Getters from DigestConfiguration ---
    get ccfddlUrl(): string | undefined { return this.digestConfiguration.ccfddlUrl; }
    get secDeadlinesUrl(): string | undefined { return this.digestConfiguration.secDeadlinesUrl; }
    get jsonFeedUrls(): string[] { return this.digestConfiguration.jsonFeedUrls; }
    get sourceFetchTimeoutMs(): number { return this.digestConfiguration.sourceFetchTimeoutMs; }
    get webhookUrl(): string | undefined { return this.digestConfiguration.webhookUrl; }
    get webhookTimeoutMs(): number { return this.digestConfiguration.webhookTimeoutMs; }
    get failOnDeliveryError(): boolean { return this.digestConfiguration.failOnDeliveryError; }
    get timezoneLabel(): string | undefined { return this.digestConfiguration.timezoneLabel; }
    get maxConferenceSections(): number { return this.digestConfiguration.maxConferenceSections; }
    get digestCronSchedule(): string | undefined { return this.digestConfiguration.cronSchedule; }
    get cronTimezone(): string { return this.digestConfiguration.cronTimezone; }

    /**
     * Loggable summary of the effective configuration. The webhook URL is a secret and only reported as set/not set.
     */
    public describe(): Record<string, unknown> {
        return {
            nodeEnv: this.nodeEnv,
            logLevel: this.logLevel,
            logFile: this.logToFile ? this.appLogFilePath : null,
            targetsFile: this.targetsFilePath,
            sources: {
                ccfddl: this.ccfddlUrl ?? null,
                secDeadlines: this.secDeadlinesUrl ?? null,
                jsonFeeds: this.jsonFeedUrls,
            },
            sourceFetchTimeoutMs: this.sourceFetchTimeoutMs,
            webhook: this.webhookUrl ? 'Set' : 'Not Set',
            failOnDeliveryError: this.failOnDeliveryError,
            cronSchedule: this.digestCronSchedule ?? null,
        };
    }
}
