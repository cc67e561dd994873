// src/config/digest.config.ts
import { AppConfig } from './types';

export class DigestConfiguration {
    public readonly ccfddlUrl: string | undefined;
    public readonly secDeadlinesUrl: string | undefined;
    public readonly jsonFeedUrls: string[];
    public readonly sourceFetchTimeoutMs: number;

    public readonly webhookUrl: string | undefined;
    public readonly webhookTimeoutMs: number;
    public readonly failOnDeliveryError: boolean;

    public readonly timezoneLabel: string | undefined;
    public readonly maxConferenceSections: number;

    public readonly cronSchedule: string | undefined;
    public readonly cronTimezone: string;

    constructor(appConfig: AppConfig) {
        // An empty URL switches the source off.
        this.ccfddlUrl = appConfig.CCFDDL_URL.trim() || undefined;
        this.secDeadlinesUrl = appConfig.SEC_DEADLINES_URL.trim() || undefined;
        this.jsonFeedUrls = appConfig.JSON_FEED_URLS;
        this.sourceFetchTimeoutMs = appConfig.SOURCE_FETCH_TIMEOUT_MS;

        this.webhookUrl = appConfig.SLACK_WEBHOOK_URL;
        this.webhookTimeoutMs = appConfig.WEBHOOK_TIMEOUT_MS;
        this.failOnDeliveryError = appConfig.FAIL_ON_DELIVERY_ERROR;

        this.timezoneLabel = appConfig.DIGEST_TIMEZONE_LABEL;
        this.maxConferenceSections = appConfig.MAX_CONFERENCE_SECTIONS;

        this.cronSchedule = appConfig.DIGEST_CRON_SCHEDULE;
        this.cronTimezone = appConfig.CRON_TIMEZONE;
    }
}
