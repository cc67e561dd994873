import { TargetFilterService } from './targetFilter.service';
import { TEST_TARGET_TABLE } from '../testing/testServices';

describe('TargetFilterService', () => {
    const filter = new TargetFilterService(TEST_TARGET_TABLE);

    it('matches the short name case-insensitively', () => {
        expect(filter.classify('CVPR', '')).toBe('AI/Vision');
        expect(filter.classify('Sigcomm', '')).toBe('Network');
    });

    it('matches aliases inside the full name', () => {
        expect(filter.classify('', 'The 35th USENIX Security Symposium')).toBe('Security');
    });

    it('returns null for untracked conferences', () => {
        expect(filter.classify('FOO', 'Unknown Workshop')).toBeNull();
        expect(filter.classify('', '')).toBeNull();
    });

    it('prefers the earlier category when several match', () => {
        const ordered = new TargetFilterService([
            { category: 'Network', aliases: ['usenix'] },
            { category: 'Security', aliases: ['usenix security'] },
        ]);
        expect(ordered.classify('USENIX Security', '')).toBe('Network');
    });

    it('normalizes aliases from the table', () => {
        const padded = new TargetFilterService([{ category: 'System', aliases: ['  OSDI '] }]);
        expect(padded.classify('osdi 2026', '')).toBe('System');
    });
});
