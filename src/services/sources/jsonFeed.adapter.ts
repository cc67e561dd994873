// src/services/sources/jsonFeed.adapter.ts
import 'reflect-metadata';
import { injectable, inject } from 'tsyringe';
import { Logger } from 'pino';
import { ConfigService } from '../../config/config.service';
import { HttpFetchService } from '../httpFetch.service';
import { LoggingService } from '../logging.service';
import { TargetFilterService } from '../targetFilter.service';
import { BaseSourceAdapter, MilestoneInput, toDeadlineList } from './baseSourceAdapter';
import { jsonFeedEntrySchema } from './sourcePayload.schemas';
import { ConferenceRecord } from '../../types/deadline.types';

/**
 * Flat JSON arrays of conferences. Several feeds may be configured; they are read in order.
 */
@injectable()
export class JsonFeedSourceAdapter extends BaseSourceAdapter {
    readonly sourceId = 'json-feed' as const;

    constructor(
        @inject(HttpFetchService) httpFetchService: HttpFetchService,
        @inject(TargetFilterService) targetFilter: TargetFilterService,
        @inject(LoggingService) loggingService: LoggingService,
        @inject(ConfigService) private configService: ConfigService,
    ) {
        super(httpFetchService, targetFilter, loggingService, 'JsonFeedSourceAdapter');
    }

    protected getSourceUrls(): string[] {
        return this.configService.jsonFeedUrls;
    }

    protected decode(payload: string): unknown {
        return JSON.parse(payload);
    }

    protected mapDocument(entries: unknown[], logger: Logger): ConferenceRecord[] {
        const records: ConferenceRecord[] = [];

        entries.forEach((rawEntry, entryIndex) => {
            const entry = this.parseEntry(jsonFeedEntrySchema, rawEntry, logger, { entryIndex });
            if (!entry) return;

            const shared = { editionYear: entry.year, timezone: entry.timezone, comment: entry.comment };
            const inputs: MilestoneInput[] = [
                ...toDeadlineList(entry.abstract_deadline).map((raw): MilestoneInput => ({ type: 'AbstractRegistration', raw, ...shared })),
                ...toDeadlineList(entry.deadline).map((raw): MilestoneInput => ({ type: 'PaperSubmission', raw, ...shared })),
            ];

            records.push({
                name: entry.name ?? entry.title ?? '',
                fullName: entry.full_name ?? entry.description ?? '',
                rank: entry.rank,
                year: entry.year,
                place: entry.place,
                link: entry.link,
                date: entry.date,
                timelineMilestones: this.buildMilestones(inputs, logger),
                source: this.sourceId,
            });
        });

        return records;
    }
}
