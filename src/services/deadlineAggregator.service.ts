// src/services/deadlineAggregator.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { Logger } from 'pino';
import { LoggingService } from './logging.service';
import { ConferenceRecord, Milestone } from '../types/deadline.types';

/**
 * Windows, deduplicates and orders the records gathered from all sources.
 * Input order is source priority: on duplicates the earlier record wins.
 */
@singleton()
export class DeadlineAggregatorService {
    private readonly serviceBaseLogger: Logger;

    constructor(@inject(LoggingService) private loggingService: LoggingService) {
        this.serviceBaseLogger = this.loggingService.getLogger({ service: 'DeadlineAggregatorService' });
    }

    aggregate(records: readonly ConferenceRecord[], now: Date, parentLogger?: Logger): ConferenceRecord[] {
        const logger = (parentLogger ?? this.serviceBaseLogger).child({ serviceMethod: 'DeadlineAggregatorService.aggregate' });
        const currentYear = now.getFullYear();
        const yearsAllowed = new Set([currentYear, currentYear + 1]);

        let outOfWindowEditions = 0;
        let withoutOpenDeadlines = 0;
        let duplicates = 0;

        const seen = new Set<string>();
        const kept: ConferenceRecord[] = [];

        for (const record of records) {
            if (Number.isFinite(record.year) && !yearsAllowed.has(record.year)) {
                outOfWindowEditions++;
                continue;
            }

            const milestones = this.openMilestones(record.timelineMilestones, now, currentYear + 1);
            if (milestones.length === 0) {
                withoutOpenDeadlines++;
                continue;
            }

            const key = `${editionName(record)}_${record.year}`;
            if (seen.has(key)) {
                duplicates++;
                logger.debug({ key, source: record.source, event: 'duplicate_dropped' }, 'Duplicate edition dropped; earlier source kept.');
                continue;
            }
            seen.add(key);
            kept.push({ ...record, timelineMilestones: milestones });
        }

        // Array.prototype.sort is stable, so ties keep source order.
        kept.sort((a, b) => earliestTime(a) - earliestTime(b));

        logger.info({
            input: records.length,
            output: kept.length,
            outOfWindowEditions,
            withoutOpenDeadlines,
            duplicates,
            event: 'aggregation_complete',
        }, `Aggregated ${records.length} records into ${kept.length}.`);

        return kept;
    }

    private openMilestones(milestones: readonly Milestone[], now: Date, lastYear: number): Milestone[] {
        const seen = new Set<string>();
        const open: Milestone[] = [];
        for (const milestone of milestones) {
            const time = milestone.deadline.getTime();
            if (time < now.getTime() || milestone.deadline.getFullYear() > lastYear) {
                continue;
            }
            const key = `${milestone.type}@${time}`;
            if (seen.has(key)) {
                continue;
            }
            seen.add(key);
            open.push(milestone);
        }
        return open.sort((a, b) => a.deadline.getTime() - b.deadline.getTime());
    }
}

/** Short name, or the full name when a source gives none. */
function editionName(record: ConferenceRecord): string {
    return (record.name.trim() || record.fullName.trim()).toLowerCase();
}

function earliestTime(record: ConferenceRecord): number {
    return Math.min(...record.timelineMilestones.map(m => m.deadline.getTime()));
}
