// src/services/sources/ccfddl.adapter.ts
import 'reflect-metadata';
import { injectable, inject } from 'tsyringe';
import { Logger } from 'pino';
import { parse as parseYaml } from 'yaml';
import { ConfigService } from '../../config/config.service';
import { HttpFetchService } from '../httpFetch.service';
import { LoggingService } from '../logging.service';
import { TargetFilterService } from '../targetFilter.service';
import { BaseSourceAdapter, MilestoneInput } from './baseSourceAdapter';
import {
    CcfddlConference,
    ccfddlConferenceSchema,
    ccfddlCycleSchema,
    ccfddlTimelineEntrySchema,
} from './sourcePayload.schemas';
import { ConferenceRecord } from '../../types/deadline.types';

/**
 * ccfddl's allconf.yml: conferences → `confs` (one per edition) → `timeline`
 * (one per submission cycle, each with an optional abstract deadline).
 */
@injectable()
export class CcfddlSourceAdapter extends BaseSourceAdapter {
    readonly sourceId = 'ccfddl' as const;

    constructor(
        @inject(HttpFetchService) httpFetchService: HttpFetchService,
        @inject(TargetFilterService) targetFilter: TargetFilterService,
        @inject(LoggingService) loggingService: LoggingService,
        @inject(ConfigService) private configService: ConfigService,
    ) {
        super(httpFetchService, targetFilter, loggingService, 'CcfddlSourceAdapter');
    }

    protected getSourceUrls(): string[] {
        return this.configService.ccfddlUrl ? [this.configService.ccfddlUrl] : [];
    }

    protected decode(payload: string): unknown {
        return parseYaml(payload);
    }

    protected mapDocument(entries: unknown[], logger: Logger): ConferenceRecord[] {
        const records: ConferenceRecord[] = [];

        entries.forEach((entry, conferenceIndex) => {
            const conference = this.parseEntry(ccfddlConferenceSchema, entry, logger, { conferenceIndex });
            if (!conference) return;

            conference.confs.forEach((rawCycle, cycleIndex) => {
                const cycle = this.parseEntry(ccfddlCycleSchema, rawCycle, logger, { conference: conference.title, cycleIndex });
                if (!cycle) return;

                const inputs: MilestoneInput[] = [];
                cycle.timeline.forEach((rawTimelineEntry, timelineIndex) => {
                    const timelineEntry = this.parseEntry(ccfddlTimelineEntrySchema, rawTimelineEntry, logger, {
                        conference: conference.title, year: cycle.year, timelineIndex,
                    });
                    if (!timelineEntry) return;

                    const shared = { editionYear: cycle.year, timezone: cycle.timezone, comment: timelineEntry.comment };
                    inputs.push({ type: 'AbstractRegistration', raw: timelineEntry.abstract_deadline, ...shared });
                    inputs.push({ type: 'PaperSubmission', raw: timelineEntry.deadline, ...shared });
                });

                records.push({
                    name: conference.title ?? '',
                    fullName: conference.description ?? '',
                    rank: formatCcfddlRank(conference.rank),
                    year: cycle.year,
                    place: cycle.place,
                    link: cycle.link,
                    date: cycle.date,
                    timelineMilestones: this.buildMilestones(inputs, logger),
                    source: this.sourceId,
                });
            });
        });

        return records;
    }
}

/** "CCF-A / CORE A*"; ccfddl writes "N" for unranked. */
export function formatCcfddlRank(rank: CcfddlConference['rank']): string | undefined {
    if (!rank) {
        return undefined;
    }
    const parts: string[] = [];
    if (rank.ccf && rank.ccf !== 'N') parts.push(`CCF-${rank.ccf}`);
    if (rank.core && rank.core !== 'N') parts.push(`CORE ${rank.core}`);
    return parts.length > 0 ? parts.join(' / ') : undefined;
}
