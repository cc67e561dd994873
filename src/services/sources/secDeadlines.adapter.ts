// src/services/sources/secDeadlines.adapter.ts
import 'reflect-metadata';
import { injectable, inject } from 'tsyringe';
import { Logger } from 'pino';
import { parse as parseYaml } from 'yaml';
import { ConfigService } from '../../config/config.service';
import { HttpFetchService } from '../httpFetch.service';
import { LoggingService } from '../logging.service';
import { TargetFilterService } from '../targetFilter.service';
import { BaseSourceAdapter, MilestoneInput, toDeadlineList } from './baseSourceAdapter';
import { secDeadlinesEntrySchema } from './sourcePayload.schemas';
import { ConferenceRecord } from '../../types/deadline.types';
import { SEC_DEADLINES_ROLLING_RULE } from '../../utils/deadline/rollingTemplate';

/**
 * sec-deadlines: a flat YAML list, one entry per edition, with one deadline or a list of them.
 */
@injectable()
export class SecDeadlinesSourceAdapter extends BaseSourceAdapter {
    readonly sourceId = 'sec-deadlines' as const;

    constructor(
        @inject(HttpFetchService) httpFetchService: HttpFetchService,
        @inject(TargetFilterService) targetFilter: TargetFilterService,
        @inject(LoggingService) loggingService: LoggingService,
        @inject(ConfigService) private configService: ConfigService,
    ) {
        super(httpFetchService, targetFilter, loggingService, 'SecDeadlinesSourceAdapter');
    }

    protected getSourceUrls(): string[] {
        return this.configService.secDeadlinesUrl ? [this.configService.secDeadlinesUrl] : [];
    }

    protected decode(payload: string): unknown {
        return parseYaml(payload);
    }

    protected mapDocument(entries: unknown[], logger: Logger): ConferenceRecord[] {
        const records: ConferenceRecord[] = [];

        entries.forEach((rawEntry, entryIndex) => {
            const entry = this.parseEntry(secDeadlinesEntrySchema, rawEntry, logger, { entryIndex });
            if (!entry) return;

            const shared = {
                editionYear: entry.year,
                timezone: entry.timezone,
                comment: entry.comment,
                rollingRule: SEC_DEADLINES_ROLLING_RULE,
            };
            const inputs: MilestoneInput[] = [
                ...toDeadlineList(entry.abstract_deadline).map((raw): MilestoneInput => ({ type: 'AbstractRegistration', raw, ...shared })),
                ...toDeadlineList(entry.deadline).map((raw): MilestoneInput => ({ type: 'PaperSubmission', raw, ...shared })),
            ];

            records.push({
                name: entry.name ?? '',
                fullName: entry.description ?? '',
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
