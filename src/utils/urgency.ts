// src/utils/urgency.ts
import { differenceInDays } from 'date-fns';
import {
    ClassifiedConference,
    ClassifiedMilestone,
    ConferenceRecord,
    UrgencyBucket,
    UrgencyTier,
} from '../types/deadline.types';

/** Upper bounds (inclusive) in days; anything above the last one is Informational. */
export const URGENCY_TIER_LIMITS: ReadonlyArray<readonly [UrgencyTier, number]> = [
    ['Critical', 3],
    ['High', 7],
    ['Medium', 14],
    ['Low', 60],
];

export const URGENCY_BUCKET_LIMITS: ReadonlyArray<readonly [UrgencyBucket, number]> = [
    ['Urgent', 60],
    ['Upcoming', 180],
];

export const URGENCY_BUCKET_ORDER: readonly UrgencyBucket[] = ['Urgent', 'Upcoming', 'Later'];

export function classifyUrgency(daysLeft: number): UrgencyTier {
    for (const [tier, limit] of URGENCY_TIER_LIMITS) {
        if (daysLeft <= limit) {
            return tier;
        }
    }
    return 'Informational';
}

export function classifyBucket(daysLeft: number): UrgencyBucket {
    for (const [bucket, limit] of URGENCY_BUCKET_LIMITS) {
        if (daysLeft <= limit) {
            return bucket;
        }
    }
    return 'Later';
}

/**
 * Whole days from `now` until `deadline`, truncated. 0 means the deadline is today (or already passed).
 */
export function daysUntil(deadline: Date, now: Date): number {
    return Math.max(0, differenceInDays(deadline, now));
}

/**
 * Attaches days left, tier and bucket. Records without a category or without
 * milestones are skipped; the aggregator never produces them.
 */
export function classifyConferences(records: readonly ConferenceRecord[], now: Date): ClassifiedConference[] {
    const classified: ClassifiedConference[] = [];
    for (const record of records) {
        const { timelineMilestones, category, ...rest } = record;
        if (!category || timelineMilestones.length === 0) {
            continue;
        }

        const milestones: ClassifiedMilestone[] = timelineMilestones.map(milestone => {
            const daysLeft = daysUntil(milestone.deadline, now);
            return { ...milestone, daysLeft, tier: classifyUrgency(daysLeft) };
        });
        const daysLeft = Math.min(...milestones.map(m => m.daysLeft));

        classified.push({
            ...rest,
            category,
            milestones,
            daysLeft,
            tier: classifyUrgency(daysLeft),
            bucket: classifyBucket(daysLeft),
        });
    }
    return classified;
}
