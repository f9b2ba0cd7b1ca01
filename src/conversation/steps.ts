import { Answers, GenerationKind, Job, JobStatus, ProfileEntry, StepId } from '../types/Job';
import { DocumentType, Tier } from '../types/User';
import { GenerationDecision } from '../managers/EntitlementManager';
import { PricingOptions } from '../managers/PaymentManager';
import { ValidationError } from '../models/errors';
import { isTemplateId } from '../models/validation';
import { documentDisplayName } from '../services/documentModel';
import {
    fail,
    isConfirmation,
    isDoneWord,
    normalizeWord,
    ok,
    parseCsv,
    parseCsvList,
    parseEmail,
    parseFreeText,
    ParseResult,
    parseSingleSelection,
    parseSkillInput,
    parseUrl,
    parseYesNo,
    hasYear
} from './grammar';
import {
    AWAITING_PAYMENT,
    DOCUMENT_SENT,
    GENERATING_PLACEHOLDER,
    notAllowedReply,
    PAYMENTS_UNAVAILABLE,
    quotaExceededReply,
    RENDERING_IN_PROGRESS,
    validationReply
} from './messages';
import { formatPreview, truncate } from './preview';

/** Everything a step handler may know besides the job itself */
export interface StepContext {
    tier: Tier;
    isAdmin: boolean;
    /** canGenerate for the job's document type, computed after the lazy entitlement checks */
    decision: GenerationDecision;
    paymentsEnabled: boolean;
    pricing: PricingOptions;
    attachmentRef?: string;
}

export type StepEffect =
    | { kind: 'generate'; generation: GenerationKind }
    | { kind: 'render' }
    | { kind: 'checkout' };

export interface StepOutcome {
    job: Job;
    reply: string;
    effects: StepEffect[];
    /** Show the document-type keyboard with the reply */
    menu?: boolean;
}

export type StepHandler = (job: Job, input: string, ctx: StepContext) => StepOutcome;

export const FLOWS: Readonly<Record<DocumentType, readonly StepId[]>> = {
    resume: [
        'basics', 'target_role', 'experience', 'experience_bullets', 'experience_more',
        'education', 'education_more', 'certifications', 'certifications_more',
        'profiles', 'profiles_more', 'projects', 'projects_more',
        'skills', 'personal_info', 'summary', 'preview', 'template', 'finalize', 'done'
    ],
    cv: [
        'basics', 'target_role', 'experience', 'experience_bullets', 'experience_more',
        'education', 'education_more', 'certifications', 'certifications_more',
        'profiles', 'profiles_more', 'projects', 'projects_more',
        'skills', 'personal_info', 'summary', 'preview', 'template', 'finalize', 'done'
    ],
    cover_letter: [
        'basics', 'cover_role_company', 'cover_experience', 'cover_interest', 'cover_current_role',
        'cover_achievement', 'cover_achievement_extra', 'cover_key_skills', 'cover_company_goal',
        'preview', 'finalize', 'done'
    ],
    revamp: ['revamp_upload', 'revamp_review', 'preview', 'finalize', 'done']
};

export const firstStep = (docType: DocumentType): StepId => FLOWS[docType][0];

/** Steps that take "skip" as an answer */
export const SKIPPABLE_STEPS: ReadonlySet<StepId> = new Set<StepId>([
    'experience',
    'education',
    'certifications',
    'profiles',
    'projects',
    'personal_info',
    'cover_achievement_extra'
]);

export const TEMPLATE_NAMES = ['Classic', 'Modern', 'Executive'] as const;

// Progress milestones of the resume/CV flow; loop sub-steps count as their parent
const MILESTONES: readonly StepId[] = [
    'basics', 'target_role', 'experience', 'education', 'certifications',
    'profiles', 'projects', 'skills', 'personal_info', 'summary', 'preview'
];

const MILESTONE_OF: Partial<Record<StepId, StepId>> = {
    experience_bullets: 'experience',
    experience_more: 'experience',
    education_more: 'education',
    certifications_more: 'certifications',
    profiles_more: 'profiles',
    projects_more: 'projects'
};

export const progressIndicator = (docType: DocumentType, step: StepId): string | null => {
    if (docType !== 'resume' && docType !== 'cv') {
        return null;
    }
    const index = MILESTONES.indexOf(MILESTONE_OF[step] ?? step);
    if (index === -1) {
        return null;
    }
    const current = index + 1;
    const total = MILESTONES.length;
    const bar = '●'.repeat(current) + '○'.repeat(total - current);
    return `Progress: ${bar} ${Math.floor((current / total) * 100)}% (${current}/${total})`;
};

const ADD_ANOTHER = (what: string): string => `Add another ${what}? (yes / no)`;

const STATIC_PROMPTS: Partial<Record<StepId, (job: Job) => string>> = {
    basics: () => [
        'Let\'s start with your details. Send them in one line, separated by commas:',
        'Full Name, Email, Phone, City Country'
    ].join('\n') + '\n\nExample: Jane Doe, jane@example.com, +234 800 000 0000, Lagos Nigeria',
    target_role: () => 'What role or position are you applying for?\n\nExample: Data Analyst',
    experience: () => [
        'Let\'s add a work experience.',
        'Send: Role, Company, City, Start, End',
        '',
        'Example: Backend Engineer, TechCorp, Lagos, Jan 2020, Present',
        '',
        'Type skip if you have no work experience to add.'
    ].join('\n'),
    experience_bullets: () => [
        'Now send your achievements in this role, one per message.',
        '',
        'Example: Increased sales by 40% through targeted campaigns',
        '',
        'Type done when finished.'
    ].join('\n'),
    experience_more: () => ADD_ANOTHER('work experience'),
    education: job => [
        'Education: Degree, School, Year',
        '',
        'Example: B.Sc. Computer Science, University of Lagos, 2020',
        '',
        job.docType === 'cv' ? 'A CV needs at least one education entry.' : 'Type skip if you prefer to leave education out.'
    ].join('\n'),
    education_more: () => ADD_ANOTHER('education entry'),
    certifications: () => 'Any certifications? Send one per message.\n\nExample: AWS Certified Solutions Architect, 2023\n\nType skip if you have none.',
    certifications_more: () => ADD_ANOTHER('certification'),
    profiles: () => 'Add an online profile as: Platform, URL\n\nExample: LinkedIn, linkedin.com/in/janedoe\n\nType skip if you have none.',
    profiles_more: () => ADD_ANOTHER('profile'),
    projects: () => 'Any projects worth mentioning? Send one per message.\n\nExample: Built an inventory dashboard with React and Node.js\n\nType skip if you have none.',
    projects_more: () => ADD_ANOTHER('project'),
    personal_info: () => 'Tell me a little about yourself: strengths, interests or what drives you at work. I will use it for your summary.\n\nExample: Detail-oriented, enjoy mentoring junior colleagues\n\nType skip to leave it out.',
    cover_role_company: () => 'Which role and company are you applying to?\nFormat: Position Title, Company Name\n\nExample: Senior HR Manager, Acme Corp',
    cover_experience: () => 'How many years of experience do you have, and in which industries?\nFormat: Years, Industries\n\nExample: 8 years, HR and Talent Management',
    cover_interest: () => 'Why are you interested in this role or company?\n\nExample: I admire your commitment to employee development',
    cover_current_role: () => 'What is your current (or most recent) job title and employer?\nFormat: Job Title, Employer\n\nExample: HR Director, Northwind Ltd',
    cover_achievement: () => 'Describe a key achievement with a measurable result.\n\nExample: Redesigned recruitment to cut time to hire by 35%',
    cover_achievement_extra: () => 'Share another key achievement, or type skip.\n\nExample: Led workforce planning that saved 20% in hiring costs',
    cover_key_skills: () => 'List 3 to 5 key skills for this role, separated by commas.\n\nExample: performance management, HRIS, employee relations',
    cover_company_goal: job => `What goal at ${job.answers.cover.company ?? 'the company'} do you want to help with?\n\nExample: Building a more inclusive workplace culture`,
    revamp_upload: () => 'Paste the text of your current resume here, or send it as a .txt file. I will improve the wording and structure.',
    template: () => [
        'Choose a template:',
        ...TEMPLATE_NAMES.map((name, index) => `${index + 1}. ${name}`),
        '',
        'Reply with 1, 2 or 3.'
    ].join('\n')
};

const withProgress = (job: Job, text: string): string => {
    const progress = progressIndicator(job.docType, job.step);
    return progress ? `${progress}\n\n${text}` : text;
};

const statusForStep = (job: Job, step: StepId): JobStatus => {
    switch (step) {
        case 'summary':
        case 'revamp_review':
            return 'draft_ready';
        case 'preview':
        case 'template':
            return 'preview_ready';
        case 'finalize':
            if (job.status === 'rendering' || job.status === 'awaiting_payment') {
                return job.status;
            }
            return job.paidGeneration ? 'paid' : 'preview_ready';
        case 'done':
            return 'delivered';
        default:
            return 'collecting';
    }
};

const reply = (job: Job, text: string, effects: StepEffect[] = []): StepOutcome => ({ job, reply: text, effects });

const invalid = (job: Job, error: ValidationError): StepOutcome =>
    reply(job, validationReply(error.message, error.example));

const withAnswers = (job: Job, patch: Partial<Answers>): Job => ({
    ...job,
    answers: { ...job.answers, ...patch }
});

export interface RequiredField {
    field: string;
    step: StepId;
}

/** Fields that must be present before a job may reach preview, in flow order */
export const missingRequiredFields = (job: Job): RequiredField[] => {
    const answers = job.answers;
    const missing: RequiredField[] = [];
    const need = (present: boolean, field: string, step: StepId) => {
        if (!present) {
            missing.push({ field, step });
        }
    };

    switch (job.docType) {
        case 'resume':
        case 'cv':
            need(Boolean(answers.basics?.name && answers.basics.email), 'contact details', 'basics');
            need(Boolean(answers.targetRole), 'target role', 'target_role');
            if (job.docType === 'cv') {
                need(answers.education.length > 0, 'education', 'education');
            }
            need(answers.skills.length >= 3, 'skills', 'skills');
            need(Boolean(answers.summary), 'professional summary', 'summary');
            break;
        case 'cover_letter': {
            const cover = answers.cover;
            need(Boolean(answers.basics?.name && answers.basics.email), 'contact details', 'basics');
            need(Boolean(cover.role && cover.company), 'role and company', 'cover_role_company');
            need(Boolean(cover.yearsExperience && cover.industries), 'experience overview', 'cover_experience');
            need(Boolean(cover.interestReason), 'reason for applying', 'cover_interest');
            need(Boolean(cover.currentTitle && cover.currentEmployer), 'current role', 'cover_current_role');
            need(cover.achievements.length > 0, 'key achievement', 'cover_achievement');
            need(cover.keySkills.length >= 3, 'key skills', 'cover_key_skills');
            need(Boolean(cover.companyGoal), 'company goal', 'cover_company_goal');
            break;
        }
        case 'revamp':
            need(Boolean(answers.revampSource?.text), 'resume text', 'revamp_upload');
            need(Boolean(answers.revampedContent), 'improved content', 'revamp_review');
            break;
    }
    return missing;
};

const aiStepReply = (job: Job, kind: GenerationKind, ready: (job: Job) => string): StepOutcome => {
    if (job.generated[kind] !== undefined) {
        return reply(job, ready(job));
    }
    return reply(job, withProgress(job, GENERATING_PLACEHOLDER), [{ kind: 'generate', generation: kind }]);
};

const skillsReady = (job: Job): string => {
    const skills = job.generated.skills ?? [];
    return withProgress(job, [
        'Based on your target role, here are some suggested skills:',
        '',
        ...skills.map((skill, index) => `${index + 1}. ${skill}`),
        '',
        'Select 3 to 5 skills by sending their numbers, e.g. 1,3,5',
        'Or type your own skills, separated by commas.'
    ].join('\n'));
};

const summaryReady = (job: Job): string => withProgress(job, [
    'Your AI-generated professional summary:',
    '',
    job.generated.summary ?? '',
    '',
    'Happy with it? Reply yes to continue, or send your own summary to replace it.'
].join('\n'));

const revampReady = (job: Job): string => [
    'Here is your improved resume:',
    '',
    truncate(job.generated.revamp ?? ''),
    '',
    'Reply yes to use it, or paste your own edited version.'
].join('\n');

/**
 * Moves the job to `step` and returns the prompt for it. Entering an AI step
 * schedules generation; entering preview checks required fields; entering
 * finalize attempts generation straight away.
 */
export const enterStep = (job: Job, step: StepId, ctx: StepContext): StepOutcome => {
    const entered: Job = { ...job, step, status: statusForStep(job, step) };

    switch (step) {
        case 'skills':
            return aiStepReply(entered, 'skills', skillsReady);
        case 'summary':
            return aiStepReply(entered, 'summary', summaryReady);
        case 'revamp_review':
            return aiStepReply(entered, 'revamp', revampReady);
        case 'preview': {
            const missing = missingRequiredFields(entered);
            if (missing.length > 0) {
                const back = enterStep(job, missing[0].step, ctx);
                const fields = missing.map(item => item.field).join(', ');
                return { ...back, reply: `Some required details are missing: ${fields}.\n\n${back.reply}` };
            }
            return reply(entered, `${formatPreview(entered)}\n\nReply yes to continue, or reset to start over.`);
        }
        case 'finalize':
            return finalizeOnEntry(entered, ctx);
        case 'done':
            return { ...reply(entered, DOCUMENT_SENT), menu: true };
        default: {
            const prompt = STATIC_PROMPTS[step];
            return reply(entered, withProgress(entered, prompt ? prompt(entered) : ''));
        }
    }
};

const advance = (job: Job, step: StepId, ctx: StepContext, lead?: string): StepOutcome => {
    const next = enterStep(job, step, ctx);
    return lead ? { ...next, reply: `${lead}\n\n${next.reply}` } : next;
};

const attemptGeneration = (job: Job, ctx: StepContext): StepOutcome => {
    const ready: Job = { ...job, answers: { ...job.answers, template: job.answers.template ?? 'template_1' } };

    if (ready.paidGeneration || ctx.decision.allowed) {
        return reply(
            { ...ready, status: 'rendering' },
            `Generating your ${documentDisplayName(job.docType)}... It will arrive in a moment.`,
            [{ kind: 'render' }]
        );
    }

    if (ctx.decision.reason === 'not_allowed') {
        return reply(job, notAllowedReply(job.docType));
    }
    return reply(job, quotaExceededReply(job.docType, ctx.decision.limit, ctx.pricing, ctx.paymentsEnabled));
};

const finalizeOnEntry = (job: Job, ctx: StepContext): StepOutcome => {
    if (job.status === 'rendering') {
        return reply(job, RENDERING_IN_PROGRESS, [{ kind: 'render' }]);
    }
    if (job.status === 'awaiting_payment') {
        return reply(job, AWAITING_PAYMENT);
    }
    return attemptGeneration(job, ctx);
};

const loopStep = <T>(
    job: Job,
    input: string,
    ctx: StepContext,
    options: {
        parse: (input: string) => ParseResult<T>;
        add: (job: Job, item: T) => Job;
        more: StepId;
        next: StepId;
    }
): StepOutcome => {
    if (isDoneWord(input)) {
        return advance(job, options.next, ctx);
    }
    const parsed = options.parse(input);
    if (!parsed.ok) {
        return invalid(job, parsed.error);
    }
    return advance(options.add(job, parsed.value), options.more, ctx, 'Added.');
};

const yesNoStep = (job: Job, input: string, ctx: StepContext, yes: StepId, no: StepId): StepOutcome => {
    const parsed = parseYesNo(input);
    if (!parsed.ok) {
        return invalid(job, parsed.error);
    }
    return advance(job, parsed.value ? yes : no, ctx);
};

const BASICS_EXAMPLE = 'Jane Doe, jane@example.com, +234 800 000 0000, Lagos Nigeria';

const handleBasics: StepHandler = (job, input, ctx) => {
    const parsed = parseCsv(input, {
        fields: ['Full Name', 'Email', 'Phone', 'City Country'],
        example: BASICS_EXAMPLE,
        absorbRest: true
    });
    if (!parsed.ok) {
        return invalid(job, parsed.error);
    }
    const [name, email, phone, location] = parsed.value;
    const validEmail = parseEmail(email, BASICS_EXAMPLE);
    if (!validEmail.ok) {
        return invalid(job, validEmail.error);
    }

    const next = withAnswers(job, { basics: { name, email, phone, location } });
    return advance(next, job.docType === 'cover_letter' ? 'cover_role_company' : 'target_role', ctx);
};

const handleTargetRole: StepHandler = (job, input, ctx) => {
    const parsed = parseFreeText(input, { minLength: 2, label: 'target role', example: 'Data Analyst' });
    if (!parsed.ok) {
        return invalid(job, parsed.error);
    }
    return advance(withAnswers(job, { targetRole: parsed.value }), 'experience', ctx);
};

const handleExperience: StepHandler = (job, input, ctx) => {
    if (normalizeWord(input) === 'skip') {
        return advance(job, 'education', ctx);
    }
    const parsed = parseCsv(input, {
        fields: ['Role', 'Company', 'City', 'Start', 'End'],
        example: 'Backend Engineer, TechCorp, Lagos, Jan 2020, Present'
    });
    if (!parsed.ok) {
        return invalid(job, parsed.error);
    }
    const [role, company, location, start, end] = parsed.value;
    const experiences = [...job.answers.experiences, { role, company, location, start, end, bullets: [] }];
    return advance(withAnswers(job, { experiences }), 'experience_bullets', ctx);
};

const BULLET_MARKER = /^[-*•]\s*/;

const handleExperienceBullets: StepHandler = (job, input, ctx) => {
    const experiences = job.answers.experiences;
    const current = experiences[experiences.length - 1];
    if (!current) {
        return advance(job, 'experience', ctx);
    }

    if (isDoneWord(input)) {
        if (current.bullets.length === 0) {
            return invalid(job, new ValidationError(
                'Please add at least one achievement for this role before typing done.',
                'Reduced report turnaround from 3 days to 1'
            ));
        }
        return advance(job, 'experience_more', ctx);
    }

    const parsed = parseFreeText(input.replace(BULLET_MARKER, ''), {
        minLength: 5,
        label: 'achievement',
        example: 'Increased sales by 40% through targeted campaigns'
    });
    if (!parsed.ok) {
        return invalid(job, parsed.error);
    }

    const bullets = [...current.bullets, parsed.value];
    const next = withAnswers(job, {
        experiences: [...experiences.slice(0, -1), { ...current, bullets }]
    });
    return reply(next, `Got it! (${bullets.length} achievement${bullets.length === 1 ? '' : 's'} added)\n\nSend another one or type done to continue.`);
};

const EDUCATION_EXAMPLE = 'B.Sc. Computer Science, University of Lagos, 2020';

const handleEducation: StepHandler = (job, input, ctx) => {
    if (isDoneWord(input)) {
        if (job.docType === 'cv' && job.answers.education.length === 0) {
            return invalid(job, new ValidationError('A CV needs at least one education entry.', EDUCATION_EXAMPLE));
        }
        return advance(job, 'certifications', ctx);
    }
    return loopStep(job, input, ctx, {
        parse: (text): ParseResult<string[]> => {
            const parsed = parseCsv(text, { fields: ['Degree', 'School', 'Year'], example: EDUCATION_EXAMPLE });
            if (parsed.ok && !hasYear(parsed.value[2])) {
                return fail(`"${parsed.value[2]}" is not a year.`, EDUCATION_EXAMPLE);
            }
            return parsed;
        },
        add: (current, [degree, school, year]) => withAnswers(current, {
            education: [...current.answers.education, { degree, school, year }]
        }),
        more: 'education_more',
        next: 'certifications'
    });
};

const handleCertifications: StepHandler = (job, input, ctx) => loopStep(job, input, ctx, {
    parse: text => parseFreeText(text, { minLength: 3, label: 'certification', example: 'AWS Certified Solutions Architect, 2023' }),
    add: (current, details) => withAnswers(current, {
        certifications: [...current.answers.certifications, { details }]
    }),
    more: 'certifications_more',
    next: 'profiles'
});

const PROFILE_EXAMPLE = 'LinkedIn, linkedin.com/in/janedoe';

const handleProfiles: StepHandler = (job, input, ctx) => loopStep(job, input, ctx, {
    parse: (text): ParseResult<ProfileEntry> => {
        const parsed = parseCsv(text, { fields: ['Platform', 'URL'], example: PROFILE_EXAMPLE });
        if (!parsed.ok) {
            return parsed;
        }
        const url = parseUrl(parsed.value[1], PROFILE_EXAMPLE);
        return url.ok ? ok({ platform: parsed.value[0], url: url.value }) : url;
    },
    add: (current, profile) => withAnswers(current, {
        profiles: [...current.answers.profiles, profile]
    }),
    more: 'profiles_more',
    next: 'projects'
});

const handleProjects: StepHandler = (job, input, ctx) => loopStep(job, input, ctx, {
    parse: text => parseFreeText(text, { minLength: 5, label: 'project', example: 'Built an inventory dashboard with React and Node.js' }),
    add: (current, details) => withAnswers(current, {
        projects: [...current.answers.projects, { details }]
    }),
    more: 'projects_more',
    next: 'skills'
});

const handleSkills: StepHandler = (job, input, ctx) => {
    const parsed = parseSkillInput(input, job.generated.skills);
    if (!parsed.ok) {
        return invalid(job, parsed.error);
    }
    return advance(withAnswers(job, { skills: parsed.value }), 'personal_info', ctx);
};

const handlePersonalInfo: StepHandler = (job, input, ctx) => {
    if (normalizeWord(input) === 'skip') {
        return advance(withAnswers(job, { personalTraits: undefined }), 'summary', ctx);
    }
    const parsed = parseFreeText(input, { minLength: 3, label: 'details', example: 'Detail-oriented, enjoy mentoring' });
    if (!parsed.ok) {
        return invalid(job, parsed.error);
    }
    return advance(withAnswers(job, { personalTraits: parsed.value }), 'summary', ctx);
};

const handleSummary: StepHandler = (job, input, ctx) => {
    if (isConfirmation(input)) {
        const generated = job.generated.summary;
        if (!generated) {
            return reply(job, GENERATING_PLACEHOLDER, [{ kind: 'generate', generation: 'summary' }]);
        }
        return advance(withAnswers(job, { summary: generated }), 'preview', ctx);
    }

    const parsed = parseFreeText(input, {
        minLength: 30,
        label: 'summary',
        example: 'Data Analyst with 5 years of experience building dashboards that guide pricing decisions.'
    });
    if (!parsed.ok) {
        return invalid(job, parsed.error);
    }
    return advance(withAnswers(job, { summary: parsed.value }), 'preview', ctx);
};

const pairStep = (
    job: Job,
    input: string,
    fields: [string, string],
    example: string,
    apply: (job: Job, first: string, second: string) => Job,
    next: StepId,
    ctx: StepContext
): StepOutcome => {
    const parsed = parseCsv(input, { fields, example, absorbRest: true });
    if (!parsed.ok) {
        return invalid(job, parsed.error);
    }
    return advance(apply(job, parsed.value[0], parsed.value[1]), next, ctx);
};

const withCover = (job: Job, patch: Partial<Answers['cover']>): Job =>
    withAnswers(job, { cover: { ...job.answers.cover, ...patch } });

const handleCoverRoleCompany: StepHandler = (job, input, ctx) => pairStep(
    job, input, ['Position Title', 'Company Name'], 'Senior HR Manager, Acme Corp',
    (current, role, company) => withAnswers(withCover(current, { role, company }), { targetRole: role }),
    'cover_experience', ctx
);

const handleCoverExperience: StepHandler = (job, input, ctx) => pairStep(
    job, input, ['Years', 'Industries'], '8 years, HR and Talent Management',
    (current, yearsExperience, industries) => withCover(current, { yearsExperience, industries }),
    'cover_interest', ctx
);

const handleCoverInterest: StepHandler = (job, input, ctx) => {
    const parsed = parseFreeText(input, { minLength: 10, label: 'reason', example: 'I admire your commitment to employee development' });
    if (!parsed.ok) {
        return invalid(job, parsed.error);
    }
    return advance(withCover(job, { interestReason: parsed.value }), 'cover_current_role', ctx);
};

const handleCoverCurrentRole: StepHandler = (job, input, ctx) => pairStep(
    job, input, ['Job Title', 'Employer'], 'HR Director, Northwind Ltd',
    (current, currentTitle, currentEmployer) => withCover(current, { currentTitle, currentEmployer }),
    'cover_achievement', ctx
);

const ACHIEVEMENT_EXAMPLE = 'Redesigned recruitment to cut time to hire by 35%';

const handleCoverAchievement: StepHandler = (job, input, ctx) => {
    const parsed = parseFreeText(input, { minLength: 10, label: 'achievement', example: ACHIEVEMENT_EXAMPLE });
    if (!parsed.ok) {
        return invalid(job, parsed.error);
    }
    return advance(withCover(job, { achievements: [parsed.value] }), 'cover_achievement_extra', ctx);
};

const handleCoverAchievementExtra: StepHandler = (job, input, ctx) => {
    if (isDoneWord(input)) {
        return advance(job, 'cover_key_skills', ctx);
    }
    const parsed = parseFreeText(input, { minLength: 10, label: 'achievement', example: ACHIEVEMENT_EXAMPLE });
    if (!parsed.ok) {
        return invalid(job, parsed.error);
    }
    const achievements = [...job.answers.cover.achievements.slice(0, 1), parsed.value];
    return advance(withCover(job, { achievements }), 'cover_key_skills', ctx);
};

const handleCoverKeySkills: StepHandler = (job, input, ctx) => {
    const parsed = parseCsvList(input, {
        min: 3,
        max: 5,
        label: 'key skills',
        example: 'performance management, HRIS, employee relations'
    });
    if (!parsed.ok) {
        return invalid(job, parsed.error);
    }
    return advance(withCover(job, { keySkills: parsed.value }), 'cover_company_goal', ctx);
};

const handleCoverCompanyGoal: StepHandler = (job, input, ctx) => {
    const parsed = parseFreeText(input, { minLength: 5, label: 'company goal', example: 'Building a more inclusive workplace culture' });
    if (!parsed.ok) {
        return invalid(job, parsed.error);
    }
    return advance(withCover(job, { companyGoal: parsed.value }), 'preview', ctx);
};

const MIN_RESUME_TEXT = 100;

const handleRevampUpload: StepHandler = (job, input, ctx) => {
    const parsed = parseFreeText(input, {
        minLength: MIN_RESUME_TEXT,
        label: 'resume text',
        example: 'paste the full text of your resume, including experience and education'
    });
    if (!parsed.ok) {
        return invalid(job, parsed.error);
    }
    const next = withAnswers(job, {
        revampSource: { text: parsed.value, attachmentRef: ctx.attachmentRef },
        revampedContent: undefined
    });
    return advance(next, 'revamp_review', ctx);
};

const handleRevampReview: StepHandler = (job, input, ctx) => {
    if (isConfirmation(input)) {
        const generated = job.generated.revamp;
        if (!generated) {
            return reply(job, GENERATING_PLACEHOLDER, [{ kind: 'generate', generation: 'revamp' }]);
        }
        return advance(withAnswers(job, { revampedContent: generated }), 'preview', ctx);
    }

    const parsed = parseFreeText(input, {
        minLength: MIN_RESUME_TEXT,
        label: 'edited resume',
        example: 'paste your full edited resume text'
    });
    if (!parsed.ok) {
        return invalid(job, parsed.error);
    }
    return advance(withAnswers(job, { revampedContent: parsed.value }), 'preview', ctx);
};

const offersTemplates = (job: Job, ctx: StepContext): boolean =>
    (job.docType === 'resume' || job.docType === 'cv') && (ctx.isAdmin || ctx.tier === 'pro');

const handlePreview: StepHandler = (job, input, ctx) => {
    if (!isConfirmation(input)) {
        return reply(job, 'To make changes, type reset to start over. Or reply yes to continue.');
    }
    if (offersTemplates(job, ctx)) {
        return advance(job, 'template', ctx);
    }
    return advance(withAnswers(job, { template: 'template_1' }), 'finalize', ctx);
};

const handleTemplate: StepHandler = (job, input, ctx) => {
    const parsed = parseSingleSelection(input, TEMPLATE_NAMES.length);
    if (!parsed.ok) {
        return invalid(job, parsed.error);
    }
    const template = `template_${parsed.value}`;
    if (!isTemplateId(template)) {
        return invalid(job, new ValidationError('Please reply with 1, 2 or 3.', '1'));
    }
    return advance(withAnswers(job, { template }), 'finalize', ctx);
};

const handleFinalize: StepHandler = (job, input, ctx) => {
    if (job.status === 'rendering') {
        return reply(job, RENDERING_IN_PROGRESS);
    }

    if (normalizeWord(input) === 'pay') {
        if (job.paidGeneration || ctx.decision.allowed) {
            return attemptGeneration(job, ctx);
        }
        if (ctx.decision.reason === 'not_allowed') {
            return reply(job, notAllowedReply(job.docType));
        }
        return ctx.paymentsEnabled
            ? reply(job, '', [{ kind: 'checkout' }])
            : reply(job, PAYMENTS_UNAVAILABLE);
    }

    if (job.status === 'awaiting_payment') {
        return reply(job, AWAITING_PAYMENT);
    }
    if (isConfirmation(input)) {
        return attemptGeneration(job, ctx);
    }
    return reply(job, 'Reply yes to generate your document, or reset to start over.');
};

const handleDone: StepHandler = job => ({ ...reply(job, DOCUMENT_SENT), menu: true });

export const STEP_HANDLERS: Readonly<Record<StepId, StepHandler>> = {
    basics: handleBasics,
    target_role: handleTargetRole,
    experience: handleExperience,
    experience_bullets: handleExperienceBullets,
    experience_more: (job, input, ctx) => yesNoStep(job, input, ctx, 'experience', 'education'),
    education: handleEducation,
    education_more: (job, input, ctx) => yesNoStep(job, input, ctx, 'education', 'certifications'),
    certifications: handleCertifications,
    certifications_more: (job, input, ctx) => yesNoStep(job, input, ctx, 'certifications', 'profiles'),
    profiles: handleProfiles,
    profiles_more: (job, input, ctx) => yesNoStep(job, input, ctx, 'profiles', 'projects'),
    projects: handleProjects,
    projects_more: (job, input, ctx) => yesNoStep(job, input, ctx, 'projects', 'skills'),
    skills: handleSkills,
    personal_info: handlePersonalInfo,
    summary: handleSummary,
    cover_role_company: handleCoverRoleCompany,
    cover_experience: handleCoverExperience,
    cover_interest: handleCoverInterest,
    cover_current_role: handleCoverCurrentRole,
    cover_achievement: handleCoverAchievement,
    cover_achievement_extra: handleCoverAchievementExtra,
    cover_key_skills: handleCoverKeySkills,
    cover_company_goal: handleCoverCompanyGoal,
    revamp_upload: handleRevampUpload,
    revamp_review: handleRevampReview,
    preview: handlePreview,
    template: handleTemplate,
    finalize: handleFinalize,
    done: handleDone
};

export const handleStep = (job: Job, input: string, ctx: StepContext): StepOutcome =>
    STEP_HANDLERS[job.step](job, input.trim(), ctx);
