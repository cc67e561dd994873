import { ConferenceRecord } from '../types/deadline.types';
import { classifyBucket, classifyConferences, classifyUrgency, daysUntil } from './urgency';

describe('classifyUrgency', () => {
    it.each([
        [0, 'Critical'],
        [3, 'Critical'],
        [4, 'High'],
        [7, 'High'],
        [8, 'Medium'],
        [14, 'Medium'],
        [15, 'Low'],
        [60, 'Low'],
        [61, 'Informational'],
        [400, 'Informational'],
    ])('%d days → %s', (days, tier) => {
        expect(classifyUrgency(days)).toBe(tier);
    });
});

describe('classifyBucket', () => {
    it.each([
        [0, 'Urgent'],
        [60, 'Urgent'],
        [61, 'Upcoming'],
        [180, 'Upcoming'],
        [181, 'Later'],
    ])('%d days → %s', (days, bucket) => {
        expect(classifyBucket(days)).toBe(bucket);
    });
});

describe('daysUntil', () => {
    const now = new Date(2025, 0, 1, 12, 0);

    it('counts whole days, truncating partial ones', () => {
        expect(daysUntil(new Date(2025, 0, 4, 11, 59), now)).toBe(2);
        expect(daysUntil(new Date(2025, 0, 4, 12, 0), now)).toBe(3);
        expect(daysUntil(new Date(2025, 0, 1, 23, 0), now)).toBe(0);
    });

    it('never goes negative', () => {
        expect(daysUntil(new Date(2024, 11, 20), now)).toBe(0);
    });
});

describe('classifyConferences', () => {
    const now = new Date(2025, 0, 1, 12, 0);
    const base: ConferenceRecord = {
        name: 'NDSS',
        fullName: 'Network and Distributed System Security Symposium',
        category: 'Security',
        year: 2025,
        timelineMilestones: [],
        source: 'sec-deadlines',
    };

    it('uses the nearest milestone for the conference', () => {
        const [conference] = classifyConferences([{
            ...base,
            timelineMilestones: [
                { type: 'PaperSubmission', deadline: new Date(2025, 0, 11, 12, 0) },
                { type: 'AbstractRegistration', deadline: new Date(2025, 0, 3, 12, 0) },
            ],
        }], now);

        expect(conference.daysLeft).toBe(2);
        expect(conference.tier).toBe('Critical');
        expect(conference.bucket).toBe('Urgent');
        expect(conference.milestones.map(m => [m.type, m.daysLeft, m.tier])).toEqual([
            ['PaperSubmission', 10, 'Medium'],
            ['AbstractRegistration', 2, 'Critical'],
        ]);
    });

    it('skips records without a category or without milestones', () => {
        const milestone = { type: 'PaperSubmission' as const, deadline: new Date(2025, 1, 1) };
        const { category: _category, ...uncategorized } = base;
        expect(classifyConferences([
            { ...uncategorized, timelineMilestones: [milestone] },
            base,
        ], now)).toEqual([]);
    });
});
