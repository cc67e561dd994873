// src/utils/deadline/rollingTemplate.ts
import { RollingTemplateRule } from '../../types/source.types';

/**
 * sec-deadlines writes recurring deadlines as "%y-06-05 23:59" (edition year)
 * or "%Y-06-05 23:59" (the year before the edition, for cycles that open early).
 * The minus one belongs to that feed, not to deadline parsing in general.
 */
export const SEC_DEADLINES_ROLLING_RULE: RollingTemplateRule = {
    primaryToken: '%y',
    secondaryToken: '%Y',
    secondaryOffset: -1,
};

export function isRollingTemplate(raw: string, rule: RollingTemplateRule): boolean {
    return raw.includes(rule.primaryToken) || raw.includes(rule.secondaryToken);
}

/**
 * Substitutes the year tokens of `rule`. Strings without tokens come back unchanged.
 */
export function resolveRollingTemplate(raw: string, editionYear: number, rule: RollingTemplateRule): string {
    if (!isRollingTemplate(raw, rule)) {
        return raw;
    }
    return raw
        .replaceAll(rule.primaryToken, String(editionYear))
        .replaceAll(rule.secondaryToken, String(editionYear + rule.secondaryOffset));
}
