// src/types/slack.types.ts
// Subset of Slack's Block Kit used by the digest.

export interface SlackTextObject {
    type: 'plain_text' | 'mrkdwn';
    text: string;
    emoji?: boolean;
}

export interface SlackHeaderBlock {
    type: 'header';
    text: SlackTextObject;
}

export interface SlackSectionBlock {
    type: 'section';
    text: SlackTextObject;
}

export interface SlackDividerBlock {
    type: 'divider';
}

export interface SlackContextBlock {
    type: 'context';
    elements: SlackTextObject[];
}

export type SlackBlock = SlackHeaderBlock | SlackSectionBlock | SlackDividerBlock | SlackContextBlock;

export interface SlackMessage {
    /** Fallback shown in notifications, and the whole message when there are no blocks. */
    text: string;
    blocks?: SlackBlock[];
}
