// src/services/targetFilter.service.ts
import 'reflect-metadata';
import { injectable, inject } from 'tsyringe';
import { TARGET_TABLE, TargetTable } from '../config/types';
import { ConferenceCategory } from '../types/deadline.types';

/**
 * The only gate deciding whether a conference is tracked.
 * Matching is a case-insensitive substring test of name and full name against each category's aliases.
 */
@injectable()
export class TargetFilterService {
    private readonly table: ReadonlyArray<{ category: ConferenceCategory; aliases: string[] }>;

    constructor(@inject(TARGET_TABLE) table: TargetTable) {
        this.table = table.map(entry => ({
            category: entry.category,
            aliases: entry.aliases.map(alias => alias.trim().toLowerCase()).filter(alias => alias !== ''),
        }));
    }

    /** First matching category in table order, or `null` for untracked conferences. */
    classify(name: string, fullName: string): ConferenceCategory | null {
        const haystacks = [name, fullName].map(value => value.toLowerCase()).filter(value => value !== '');
        if (haystacks.length === 0) {
            return null;
        }
        for (const { category, aliases } of this.table) {
            if (aliases.some(alias => haystacks.some(haystack => haystack.includes(alias)))) {
                return category;
            }
        }
        return null;
    }
}
