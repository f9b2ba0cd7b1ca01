import { Answers, Job } from '../types/Job';

const plural = (count: number, singular: string, pluralForm: string = `${singular}s`): string =>
    `${count} ${count === 1 ? singular : pluralForm}`;

// Telegram caps a message at 4096 characters
const PREVIEW_TEXT_LIMIT = 3000;

export const truncate = (text: string, limit: number = PREVIEW_TEXT_LIMIT): string =>
    text.length > limit ? `${text.slice(0, limit).trimEnd()}...` : text;

const contactLines = (answers: Answers): string[] => [
    `Name: ${answers.basics?.name ?? 'N/A'}`,
    `Email: ${answers.basics?.email ?? 'N/A'}`,
    `Phone: ${answers.basics?.phone ?? 'N/A'}`,
    `Location: ${answers.basics?.location ?? 'N/A'}`
];

export const formatResumePreview = (answers: Answers): string => {
    const lines = ['Preview of your information', '', 'Contact details:', ...contactLines(answers)];
    if (answers.targetRole) {
        lines.push(`Target role: ${answers.targetRole}`);
    }
    lines.push('');

    if (answers.summary) {
        lines.push('Professional summary:', answers.summary, '');
    }
    if (answers.skills.length > 0) {
        lines.push('Skills:', answers.skills.join(', '), '');
    }
    if (answers.experiences.length > 0) {
        lines.push(`Work experience (${plural(answers.experiences.length, 'position')}):`);
        answers.experiences.forEach((exp, index) => {
            lines.push(`${index + 1}. ${exp.role} at ${exp.company} (${plural(exp.bullets.length, 'achievement')})`);
        });
        lines.push('');
    }
    if (answers.education.length > 0) {
        lines.push(`Education: ${plural(answers.education.length, 'entry', 'entries')}`);
    }
    if (answers.certifications.length > 0) {
        lines.push(`Certifications: ${plural(answers.certifications.length, 'item')}`);
    }
    if (answers.profiles.length > 0) {
        lines.push(`Profiles: ${answers.profiles.map(profile => profile.platform).join(', ')}`);
    }
    if (answers.projects.length > 0) {
        lines.push(`Projects: ${plural(answers.projects.length, 'item')}`);
    }

    return lines.join('\n').trimEnd();
};

export const formatCoverPreview = (answers: Answers): string => {
    const cover = answers.cover;
    const lines = [
        'Cover letter preview',
        '',
        'Contact info:',
        ...contactLines(answers),
        '',
        'Target position:',
        `Role: ${cover.role ?? 'N/A'}`,
        `Company: ${cover.company ?? 'N/A'}`,
        '',
        'Experience:',
        `${cover.yearsExperience ?? 'N/A'} in ${cover.industries ?? 'N/A'}`,
        `Current: ${cover.currentTitle ?? 'N/A'} at ${cover.currentEmployer ?? 'N/A'}`,
        '',
        'Key achievements:',
        ...(cover.achievements.length > 0 ? cover.achievements : ['N/A']),
        '',
        'Key skills:',
        cover.keySkills.length > 0 ? cover.keySkills.join(', ') : 'N/A'
    ];
    if (cover.companyGoal) {
        lines.push('', 'Company goal:', cover.companyGoal);
    }
    return lines.join('\n');
};

export const formatRevampPreview = (answers: Answers): string => [
    'Your improved resume',
    '',
    truncate(answers.revampedContent ?? '')
].join('\n');

export const formatPreview = (job: Job): string => {
    switch (job.docType) {
        case 'resume':
        case 'cv':
            return formatResumePreview(job.answers);
        case 'cover_letter':
            return formatCoverPreview(job.answers);
        case 'revamp':
            return formatRevampPreview(job.answers);
    }
};
