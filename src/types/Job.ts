import { DocumentType } from './User';

export type JobStatus =
    | 'collecting'
    | 'draft_ready'
    | 'preview_ready'
    | 'awaiting_payment'
    | 'paid'
    | 'rendering'
    | 'delivered'
    | 'closed';

export const JOB_STATUSES: readonly JobStatus[] = [
    'collecting',
    'draft_ready',
    'preview_ready',
    'awaiting_payment',
    'paid',
    'rendering',
    'delivered',
    'closed'
];

export type StepId =
    // resume / cv
    | 'basics'
    | 'target_role'
    | 'experience'
    | 'experience_bullets'
    | 'experience_more'
    | 'education'
    | 'education_more'
    | 'certifications'
    | 'certifications_more'
    | 'profiles'
    | 'profiles_more'
    | 'projects'
    | 'projects_more'
    | 'skills'
    | 'personal_info'
    | 'summary'
    // cover letter
    | 'cover_role_company'
    | 'cover_experience'
    | 'cover_interest'
    | 'cover_current_role'
    | 'cover_achievement'
    | 'cover_achievement_extra'
    | 'cover_key_skills'
    | 'cover_company_goal'
    // revamp
    | 'revamp_upload'
    | 'revamp_review'
    // shared tail
    | 'preview'
    | 'template'
    | 'finalize'
    | 'done';

export type TemplateId = 'template_1' | 'template_2' | 'template_3';

export interface Basics {
    name: string;
    email: string;
    phone: string;
    location: string;
}

export interface ExperienceEntry {
    role: string;
    company: string;
    location: string;
    start: string;
    end: string;
    bullets: string[];
}

export interface EducationEntry {
    degree: string;
    school: string;
    year: string;
}

export interface CertificationEntry {
    details: string;
}

export interface ProfileEntry {
    platform: string;
    url: string;
}

export interface ProjectEntry {
    details: string;
}

export interface CoverLetterAnswers {
    role?: string;
    company?: string;
    yearsExperience?: string;
    industries?: string;
    interestReason?: string;
    currentTitle?: string;
    currentEmployer?: string;
    achievements: string[];
    keySkills: string[];
    companyGoal?: string;
}

export interface RevampSource {
    text?: string;
    attachmentRef?: string;
}

export interface Answers {
    basics?: Basics;
    targetRole?: string;
    experiences: ExperienceEntry[];
    education: EducationEntry[];
    certifications: CertificationEntry[];
    profiles: ProfileEntry[];
    projects: ProjectEntry[];
    skills: string[];
    personalTraits?: string;
    summary?: string;
    cover: CoverLetterAnswers;
    revampSource?: RevampSource;
    revampedContent?: string;
    template?: TemplateId;
}

export type GenerationKind = 'skills' | 'summary' | 'revamp';

/**
 * AI output cache. Written out of band by the content generation scheduler,
 * never by a conversation turn.
 */
export interface GeneratedContent {
    skills?: string[];
    summary?: string;
    revamp?: string;
}

export interface Job {
    jobId: string;
    userId: string;
    docType: DocumentType;
    status: JobStatus;
    step: StepId;
    answers: Answers;
    generated: GeneratedContent;
    /** Bumped on reset so late AI results for discarded answers are dropped */
    epoch: number;
    paymentReference?: string;
    paidGeneration: boolean;
    lastProcessedMessageId: string | null;
    version: number;
    createdAt: Date;
    updatedAt: Date;
    deliveredAt?: Date;
}

export const createEmptyAnswers = (): Answers => ({
    experiences: [],
    education: [],
    certifications: [],
    profiles: [],
    projects: [],
    skills: [],
    cover: { achievements: [], keySkills: [] }
});

export const createStatusCounts = (): Record<JobStatus, number> => ({
    collecting: 0,
    draft_ready: 0,
    preview_ready: 0,
    awaiting_payment: 0,
    paid: 0,
    rendering: 0,
    delivered: 0,
    closed: 0
});
