import { JsonFeedSourceAdapter } from './jsonFeed.adapter';
import { HttpFetchService } from '../httpFetch.service';
import { TargetFilterService } from '../targetFilter.service';
import { TEST_TARGET_TABLE, createTestConfig, createTestLogging, createUrlMapHttpClient } from '../../testing/testServices';

const FEED_A = 'https://feeds.example.test/a.json';
const FEED_B = 'https://feeds.example.test/b.json';
const FEED_MISSING = 'https://feeds.example.test/missing.json';

const FEED_A_BODY = JSON.stringify([
    {
        title: 'CVPR',
        description: 'IEEE/CVF Conference on Computer Vision and Pattern Recognition',
        year: 2026,
        deadline: '2025-11-14 23:59',
        timezone: 'UTC-12',
        place: 'Denver',
        link: 'https://cvpr.example.test',
    },
    {
        name: 'OSDI',
        full_name: 'Operating Systems Design and Implementation',
        year: '2026',
        deadline: ['2025-12-11', 'TBA'],
        abstract_deadline: '2025-12-04',
    },
]);

const FEED_B_BODY = JSON.stringify([
    { name: 'SIGCOMM', year: 2026, deadline: 'Feb 1, 2026', rank: 'A*' },
    { name: 'NeurIPS', year: 'next' },
    { name: 'Regional Meetup', year: 2026, deadline: '2026-03-01' },
]);

describe('JsonFeedSourceAdapter', () => {
    const config = createTestConfig({ JSON_FEED_URLS: [FEED_A, FEED_MISSING, FEED_B].join(',') });
    const logging = createTestLogging(config);

    it('reads every configured feed in order and skips the ones that fail', async () => {
        const { client, requests } = createUrlMapHttpClient({ [FEED_A]: FEED_A_BODY, [FEED_B]: FEED_B_BODY });
        const adapter = new JsonFeedSourceAdapter(
            new HttpFetchService(client, config, logging),
            new TargetFilterService(TEST_TARGET_TABLE),
            logging,
            config,
        );

        const records = await adapter.fetchRecords();

        expect(requests.map(r => r.url)).toEqual([FEED_A, FEED_MISSING, FEED_B]);
        expect(records.map(r => [r.name, r.fullName, r.category])).toEqual([
            ['CVPR', 'IEEE/CVF Conference on Computer Vision and Pattern Recognition', 'AI/Vision'],
            ['OSDI', 'Operating Systems Design and Implementation', 'System'],
            ['SIGCOMM', '', 'Network'],
        ]);

        const [cvpr, osdi, sigcomm] = records;
        expect(cvpr.timelineMilestones.map(m => m.deadline.toISOString())).toEqual(['2025-11-15T11:59:00.000Z']);
        expect(cvpr.link).toBe('https://cvpr.example.test');
        expect(osdi.year).toBe(2026);
        expect(osdi.timelineMilestones).toEqual([
            { type: 'AbstractRegistration', deadline: new Date(2025, 11, 4) },
            { type: 'PaperSubmission', deadline: new Date(2025, 11, 11) },
        ]);
        expect(sigcomm.rank).toBe('A*');
        expect(sigcomm.timelineMilestones).toEqual([{ type: 'PaperSubmission', deadline: new Date(2026, 1, 1) }]);
    });
});
