import { Basics, ExperienceEntry } from '../types/Job';
import { Tier } from '../types/User';

/** What the generator gets to see about a job */
export interface GenerationContext {
    tier: Tier;
    targetRole?: string;
    basics?: Basics;
    experiences: ExperienceEntry[];
    skills: string[];
    personalTraits?: string;
    /** Existing document text, for revamps */
    sourceText?: string;
}

export interface ContentGenerator {
    /** Five to eight skill suggestions for the target role */
    generateSkills(context: GenerationContext): Promise<string[]>;
    generateSummary(context: GenerationContext): Promise<string>;
    revamp(context: GenerationContext): Promise<string>;
}
