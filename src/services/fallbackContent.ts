import fallbackSkillTable from './data/fallbackSkills.json';
import { ContentGenerator, GenerationContext } from './ContentGenerator';

const capitalize = (value: string): string =>
    value.length > 0 ? value.charAt(0).toUpperCase() + value.slice(1) : value;

export const fallbackSkills = (targetRole: string | undefined): string[] => {
    const role = (targetRole ?? '').toLowerCase();
    const group = fallbackSkillTable.groups.find(entry => entry.keywords.some(keyword => role.includes(keyword)));
    return [...(group ? group.skills : fallbackSkillTable.default)];
};

export const fallbackSummary = (context: GenerationContext): string => {
    const title = (context.targetRole ?? '').trim() || 'professional';
    const company = context.experiences[0]?.company.trim() ?? '';

    const parts = [
        company
            ? `${capitalize(title)} with hands-on experience at ${company}.`
            : `${capitalize(title)} with hands-on experience.`
    ];

    if (context.skills.length > 0) {
        parts.push(`Skilled in ${context.skills.slice(0, 3).join(', ')}.`);
    } else {
        parts.push('Delivering reliable results and clean execution.');
    }

    return parts.join(' ');
};

/** Returns the submitted text unchanged, trimmed */
export const fallbackRevamp = (context: GenerationContext): string => (context.sourceText ?? '').trim();

/**
 * Static generator used when no API key is configured, and as the fallback
 * for failed or slow upstream calls.
 */
export class StaticContentGenerator implements ContentGenerator {
    async generateSkills(context: GenerationContext): Promise<string[]> {
        return fallbackSkills(context.targetRole);
    }

    async generateSummary(context: GenerationContext): Promise<string> {
        return fallbackSummary(context);
    }

    async revamp(context: GenerationContext): Promise<string> {
        return fallbackRevamp(context);
    }
}
