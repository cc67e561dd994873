// src/services/sources/baseSourceAdapter.ts
import { Logger } from 'pino';
import { z } from 'zod';
import { HttpFetchService } from '../httpFetch.service';
import { LoggingService } from '../logging.service';
import { TargetFilterService } from '../targetFilter.service';
import { ISourceAdapter } from '../interfaces/sourceAdapter.interface';
import { entryListSchema } from './sourcePayload.schemas';
import { ConferenceRecord, Milestone, MilestoneType, SourceId } from '../../types/deadline.types';
import { RollingTemplateRule, SourceFetchError, SourcePayloadError } from '../../types/source.types';
import { parseDeadline } from '../../utils/deadline/parseDeadline';
import { resolveRollingTemplate } from '../../utils/deadline/rollingTemplate';
import { getErrorMessageAndStack } from '../../utils/errorUtils';

export interface MilestoneInput {
    type: MilestoneType;
    raw: unknown;
    editionYear: number;
    timezone?: string;
    comment?: string;
    /** Only for sources that publish year-relative templates. */
    rollingRule?: RollingTemplateRule;
}

/**
 * Shared fetch → decode → map → filter flow. Subclasses supply the URLs, the decoder
 * and the mapping from one document to records.
 */
export abstract class BaseSourceAdapter implements ISourceAdapter {
    abstract readonly sourceId: SourceId;
    protected readonly serviceBaseLogger: Logger;

    protected constructor(
        protected readonly httpFetchService: HttpFetchService,
        protected readonly targetFilter: TargetFilterService,
        loggingService: LoggingService,
        serviceName: string,
    ) {
        this.serviceBaseLogger = loggingService.getLogger({ service: serviceName });
    }

    protected abstract getSourceUrls(): string[];

    /** @throws anything; the caller wraps it in a SourcePayloadError. */
    protected abstract decode(payload: string): unknown;

    protected abstract mapDocument(entries: unknown[], logger: Logger): ConferenceRecord[];

    async fetchRecords(parentLogger?: Logger): Promise<ConferenceRecord[]> {
        const logger = (parentLogger ?? this.serviceBaseLogger).child({ sourceId: this.sourceId });
        const urls = this.getSourceUrls();
        if (urls.length === 0) {
            logger.debug({ event: 'source_disabled' }, 'No URL configured; skipping source.');
            return [];
        }

        const records: ConferenceRecord[] = [];
        for (const url of urls) {
            try {
                const payload = await this.httpFetchService.fetchText(url, logger);
                const entries = this.decodeDocument(payload, url);
                const mapped = this.mapDocument(entries, logger);
                const tracked = this.keepTracked(mapped);
                logger.info(
                    { url, entries: entries.length, mapped: mapped.length, tracked: tracked.length, event: 'source_fetched' },
                    `Fetched ${tracked.length} tracked conference editions.`,
                );
                records.push(...tracked);
            } catch (error) {
                const { message } = getErrorMessageAndStack(error);
                const details = error instanceof SourceFetchError || error instanceof SourcePayloadError ? error.details : {};
                logger.error(
                    { ...details, url, err: message, event: 'source_failed' },
                    `Source contributed no records: ${message}`,
                );
            }
        }
        return records;
    }

    private decodeDocument(payload: string, url: string): unknown[] {
        let decoded: unknown;
        try {
            decoded = this.decode(payload);
        } catch (error) {
            throw new SourcePayloadError(`Cannot decode payload: ${getErrorMessageAndStack(error).message}`, { url });
        }
        const parsed = entryListSchema.safeParse(decoded);
        if (!parsed.success) {
            throw new SourcePayloadError('Payload is not a list of conferences.', { url, receivedType: typeof decoded });
        }
        return parsed.data;
    }

    private keepTracked(records: ConferenceRecord[]): ConferenceRecord[] {
        const tracked: ConferenceRecord[] = [];
        for (const record of records) {
            const category = this.targetFilter.classify(record.name, record.fullName);
            if (category) {
                tracked.push({ ...record, category });
            }
        }
        return tracked;
    }

    /**
     * Parses one raw value into a milestone. Unparseable and unannounced deadlines give `null`.
     */
    protected buildMilestone(input: MilestoneInput, logger: Logger): Milestone | null {
        if (input.raw === undefined || input.raw === null) {
            return null;
        }
        const raw = typeof input.raw === 'string' && input.rollingRule
            ? resolveRollingTemplate(input.raw, input.editionYear, input.rollingRule)
            : input.raw;

        const deadline = parseDeadline(raw, { timezone: input.timezone });
        if (!deadline) {
            logger.debug({ raw: input.raw, milestoneType: input.type, event: 'deadline_unparsed' }, 'Deadline not parseable or not announced; milestone dropped.');
            return null;
        }
        return input.comment ? { type: input.type, deadline, comment: input.comment } : { type: input.type, deadline };
    }

    protected buildMilestones(inputs: MilestoneInput[], logger: Logger): Milestone[] {
        const milestones: Milestone[] = [];
        for (const input of inputs) {
            const milestone = this.buildMilestone(input, logger);
            if (milestone) {
                milestones.push(milestone);
            }
        }
        return milestones;
    }

    /**
     * Validates one entry, logging and skipping it when it does not match.
     */
    protected parseEntry<T extends z.ZodTypeAny>(schema: T, value: unknown, logger: Logger, context: Record<string, unknown>): z.output<T> | null {
        const parsed = schema.safeParse(value);
        if (!parsed.success) {
            logger.warn(
                { ...context, issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`), event: 'entry_skipped' },
                'Skipping malformed entry.',
            );
            return null;
        }
        return parsed.data;
    }
}

/** A single value or a list of values, as feeds write deadlines. */
export function toDeadlineList(value: unknown): unknown[] {
    if (value === undefined || value === null) {
        return [];
    }
    return Array.isArray(value) ? value : [value];
}
