// src/services/digestRenderer.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { format } from 'date-fns';
import { ConfigService } from '../config/config.service';
import {
    ClassifiedConference,
    ClassifiedMilestone,
    MilestoneType,
    SourceId,
    UrgencyBucket,
    UrgencyTier,
} from '../types/deadline.types';
import { SlackBlock, SlackMessage, SlackSectionBlock } from '../types/slack.types';
import { URGENCY_BUCKET_ORDER } from '../utils/urgency';

export interface RenderContext {
    generatedAt: Date;
    sources: readonly SourceId[];
}

export const DIGEST_TITLE = '📅 Conference Deadline Alert';
export const EMPTY_DIGEST_TEXT = `📅 *Conference Deadline Alert*\n\nNo tracked conference deadlines in the upcoming window.`;

const DISPLAY_FORMAT = 'yyyy-MM-dd HH:mm';
const PLACEHOLDER = 'TBA';

const BUCKET_HEADINGS: Record<UrgencyBucket, string> = {
    Urgent: '*🚨 Urgent (≤ 60 days)*',
    Upcoming: '*📌 Upcoming (61–180 days)*',
    Later: '*🗓️ Later (> 180 days)*',
};

const TIER_MARKERS: Record<UrgencyTier, string> = {
    Critical: '🔴',
    High: '🟠',
    Medium: '🟡',
    Low: '🟢',
    Informational: '🔵',
};

const MILESTONE_LABELS: Record<MilestoneType, string> = {
    AbstractRegistration: 'Abstract',
    PaperSubmission: 'Paper',
};

/**
 * Builds the Slack Block Kit payload. Conferences arrive already ordered by the aggregator;
 * within a bucket that order is kept.
 */
@singleton()
export class DigestRendererService {
    constructor(@inject(ConfigService) private configService: ConfigService) { }

    render(conferences: readonly ClassifiedConference[], context: RenderContext): SlackMessage {
        if (conferences.length === 0) {
            return { text: EMPTY_DIGEST_TEXT };
        }

        const blocks: SlackBlock[] = [
            { type: 'header', text: { type: 'plain_text', text: DIGEST_TITLE, emoji: true } },
            mrkdwnSection(`*Tracked conferences with open deadlines: ${conferences.length}*`),
        ];

        const maxSections = this.configService.maxConferenceSections;
        let rendered = 0;

        for (const bucket of URGENCY_BUCKET_ORDER) {
            const inBucket = conferences.filter(conference => conference.bucket === bucket);
            if (inBucket.length === 0 || rendered >= maxSections) {
                continue;
            }
            blocks.push({ type: 'divider' }, mrkdwnSection(BUCKET_HEADINGS[bucket]));
            for (const conference of inBucket) {
                if (rendered >= maxSections) {
                    break;
                }
                blocks.push(mrkdwnSection(renderConference(conference)));
                rendered++;
            }
        }

        const remaining = conferences.length - rendered;
        if (remaining > 0) {
            blocks.push(mrkdwnSection(`_…and ${remaining} more conference${remaining === 1 ? '' : 's'}_`));
        }

        blocks.push(
            { type: 'divider' },
            { type: 'context', elements: [{ type: 'mrkdwn', text: this.renderContextLine(context) }] },
        );

        return {
            text: `${DIGEST_TITLE}: ${conferences.length} tracked conference${conferences.length === 1 ? '' : 's'} with open deadlines`,
            blocks,
        };
    }

    private renderContextLine(context: RenderContext): string {
        const label = this.configService.timezoneLabel;
        const updated = format(context.generatedAt, DISPLAY_FORMAT) + (label ? ` ${label}` : '');
        const sources = context.sources.length > 0 ? context.sources.join(', ') : 'none';
        return `Updated: ${updated} | Sources: ${sources}`;
    }
}

function mrkdwnSection(text: string): SlackSectionBlock {
    return { type: 'section', text: { type: 'mrkdwn', text } };
}

/** Slack mrkdwn control characters. */
export function escapeMrkdwn(value: string): string {
    return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** A URL inside `<url|label>`: mrkdwn-escaped, with `|` percent-encoded so it cannot end the URL early. */
export function escapeLinkUrl(url: string): string {
    return escapeMrkdwn(url).replace(/\|/g, '%7C');
}

export function formatDaysLeft(daysLeft: number): string {
    return daysLeft === 0 ? 'D-DAY!' : `D-${daysLeft}`;
}

function renderTitle(conference: ClassifiedConference): string {
    const name = escapeMrkdwn(conference.name || conference.fullName || PLACEHOLDER);
    const title = conference.link ? `<${escapeLinkUrl(conference.link)}|${name}>` : name;
    return `*${title}*`;
}

function renderMilestone(milestone: ClassifiedMilestone): string {
    const line = `• ${MILESTONE_LABELS[milestone.type]}: ${format(milestone.deadline, DISPLAY_FORMAT)} (${formatDaysLeft(milestone.daysLeft)})`;
    return milestone.comment ? `${line} — ${escapeMrkdwn(milestone.comment)}` : line;
}

export function renderConference(conference: ClassifiedConference): string {
    const rank = conference.rank ? ` (${escapeMrkdwn(conference.rank)})` : '';
    const lines = [
        `${TIER_MARKERS[conference.tier]} ${renderTitle(conference)}${rank}`,
        `📁 ${conference.category} | ⏰ ${formatDaysLeft(conference.daysLeft)}`,
        `📍 ${escapeMrkdwn(conference.place ?? PLACEHOLDER)} | 📆 ${escapeMrkdwn(conference.date ?? PLACEHOLDER)}`,
        ...conference.milestones.map(renderMilestone),
    ];
    return lines.join('\n');
}
