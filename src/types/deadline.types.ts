// src/types/deadline.types.ts
import { SlackMessage } from './slack.types';

/**
 * Categories a tracked conference can belong to. The order here is also the
 * order categories appear in the default target table.
 */
export const CONFERENCE_CATEGORIES = ['AI/Vision', 'Security', 'Network', 'Data', 'System', 'Software'] as const;
export type ConferenceCategory = typeof CONFERENCE_CATEGORIES[number];

/** Identifiers of the upstream sources, in default priority order. */
export const SOURCE_IDS = ['ccfddl', 'sec-deadlines', 'json-feed'] as const;
export type SourceId = typeof SOURCE_IDS[number];

export type MilestoneType = 'AbstractRegistration' | 'PaperSubmission';

export interface Milestone {
    type: MilestoneType;
    deadline: Date;
    comment?: string;
}

/**
 * One edition of a conference as produced by a source adapter.
 * `category` is filled in by the target filter; adapters drop records it rejects.
 */
export interface ConferenceRecord {
    name: string;
    fullName: string;
    category?: ConferenceCategory;
    rank?: string;
    year: number;
    place?: string;
    link?: string;
    date?: string; // free-form, e.g. "October 13-17, 2026"
    timelineMilestones: Milestone[];
    source: SourceId;
}

export type UrgencyTier = 'Critical' | 'High' | 'Medium' | 'Low' | 'Informational';
export type UrgencyBucket = 'Urgent' | 'Upcoming' | 'Later';

export interface ClassifiedMilestone extends Milestone {
    daysLeft: number;
    tier: UrgencyTier;
}

export interface ClassifiedConference extends Omit<ConferenceRecord, 'timelineMilestones'> {
    category: ConferenceCategory;
    milestones: ClassifiedMilestone[];
    /** Minimum days left across the conference's milestones. */
    daysLeft: number;
    tier: UrgencyTier;
    bucket: UrgencyBucket;
}

export interface DigestRunSummary {
    startedAt: string; // ISO
    fetchedBySource: Partial<Record<SourceId, number>>;
    totalFetched: number;
    aggregated: number;
    delivered: boolean;
    durationMs: number;
    message: SlackMessage;
}
