// src/services/sources/sourcePayload.schemas.ts
import { z } from 'zod';

/**
 * Optional display text. Numbers are accepted (YAML reads `place: 2026` as a number),
 * blank strings become `undefined`.
 */
export const optionalText = z.union([z.string(), z.number()]).nullish().transform(value => {
    if (value === null || value === undefined) {
        return undefined;
    }
    const text = String(value).trim();
    return text !== '' ? text : undefined;
});

const editionYear = z.coerce.number().int().min(1900).max(2999);

/** Raw deadline values are handed to the deadline parser as they are. */
const rawDeadline = z.unknown();

/** Top level of every document: a list whose items are validated one by one. */
export const entryListSchema = z.array(z.unknown());

// --- ccfddl (allconf.yml) ---

export const ccfddlTimelineEntrySchema = z.object({
    abstract_deadline: rawDeadline.optional(),
    deadline: rawDeadline.optional(),
    comment: optionalText,
});
export type CcfddlTimelineEntry = z.infer<typeof ccfddlTimelineEntrySchema>;

export const ccfddlCycleSchema = z.object({
    year: editionYear,
    id: optionalText,
    link: optionalText,
    timeline: z.array(z.unknown()).nullish().transform(value => value ?? []),
    timezone: optionalText,
    date: optionalText,
    place: optionalText,
});
export type CcfddlCycle = z.infer<typeof ccfddlCycleSchema>;

export const ccfddlConferenceSchema = z.object({
    title: optionalText,
    description: optionalText,
    sub: optionalText,
    rank: z.object({
        ccf: optionalText,
        core: optionalText,
        thcpl: optionalText,
    }).partial().nullish(),
    dblp: optionalText,
    confs: z.array(z.unknown()).nullish().transform(value => value ?? []),
});
export type CcfddlConference = z.infer<typeof ccfddlConferenceSchema>;

// --- sec-deadlines (_data/conferences.yml) ---

export const secDeadlinesEntrySchema = z.object({
    name: optionalText,
    description: optionalText,
    year: editionYear,
    link: optionalText,
    deadline: rawDeadline.optional(),
    abstract_deadline: rawDeadline.optional(),
    timezone: optionalText,
    place: optionalText,
    date: optionalText,
    comment: optionalText,
    rank: optionalText,
});
export type SecDeadlinesEntry = z.infer<typeof secDeadlinesEntrySchema>;

// --- flat JSON feeds ---

export const jsonFeedEntrySchema = z.object({
    name: optionalText,
    title: optionalText,
    full_name: optionalText,
    description: optionalText,
    year: editionYear,
    deadline: rawDeadline.optional(),
    abstract_deadline: rawDeadline.optional(),
    place: optionalText,
    link: optionalText,
    rank: optionalText,
    timezone: optionalText,
    comment: optionalText,
    date: optionalText,
});
export type JsonFeedEntry = z.infer<typeof jsonFeedEntrySchema>;
