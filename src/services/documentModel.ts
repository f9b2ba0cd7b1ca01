import { RenderRequest } from '../types/Directive';
import { Answers, GeneratedContent, TemplateId } from '../types/Job';
import { DocumentType } from '../types/User';

export type DocumentBlock =
    | { kind: 'title'; text: string }
    | { kind: 'subtitle'; text: string }
    | { kind: 'heading'; text: string }
    | { kind: 'paragraph'; text: string }
    | { kind: 'entry'; title: string; meta: string }
    | { kind: 'bullet'; text: string };

export interface TemplateStyle {
    docxFont: string;
    pdfFont: string;
    pdfBoldFont: string;
    /** Hex colour without the leading # */
    accent: string;
}

export const TEMPLATE_STYLES: Readonly<Record<TemplateId, TemplateStyle>> = {
    template_1: { docxFont: 'Calibri', pdfFont: 'Helvetica', pdfBoldFont: 'Helvetica-Bold', accent: '1F3864' },
    template_2: { docxFont: 'Georgia', pdfFont: 'Times-Roman', pdfBoldFont: 'Times-Bold', accent: '2E5E3E' },
    template_3: { docxFont: 'Arial', pdfFont: 'Helvetica', pdfBoldFont: 'Helvetica-Bold', accent: '6A1B9A' }
};

const DISPLAY_NAMES: Record<DocumentType, string> = {
    resume: 'Resume',
    cv: 'CV',
    cover_letter: 'Cover Letter',
    revamp: 'Revamp'
};

export const documentDisplayName = (docType: DocumentType): string => DISPLAY_NAMES[docType];

/** "Jane Doe - Resume.docx"; characters that are unsafe in file names are dropped */
export const buildFilename = (name: string | undefined, docType: DocumentType, extension: string): string => {
    const cleaned = (name ?? '').replace(/[<>:"/\\|?*]/g, '').trim();
    return `${cleaned || 'Document'} - ${DISPLAY_NAMES[docType]}.${extension}`;
};

const sentence = (text: string): string => {
    const trimmed = text.trim();
    return /[.!?]$/.test(trimmed) ? trimmed : `${trimmed}.`;
};

const lowerFirst = (text: string): string =>
    text.length > 0 ? text.charAt(0).toLowerCase() + text.slice(1) : text;

const contactLine = (answers: Answers): string =>
    [answers.basics?.email, answers.basics?.phone, answers.basics?.location]
        .filter((part): part is string => Boolean(part))
        .join(' | ');

const resumeBlocks = (docType: DocumentType, answers: Answers, generated: GeneratedContent): DocumentBlock[] => {
    const blocks: DocumentBlock[] = [{ kind: 'title', text: answers.basics?.name ?? 'Document' }];

    if (answers.targetRole) {
        blocks.push({ kind: 'subtitle', text: answers.targetRole });
    }
    const contact = contactLine(answers);
    if (contact) {
        blocks.push({ kind: 'paragraph', text: contact });
    }
    if (answers.profiles.length > 0) {
        blocks.push({ kind: 'paragraph', text: answers.profiles.map(p => `${p.platform}: ${p.url}`).join(' | ') });
    }

    const summary = answers.summary ?? generated.summary;
    if (summary) {
        blocks.push({ kind: 'heading', text: docType === 'cv' ? 'Personal Statement' : 'Professional Summary' });
        blocks.push({ kind: 'paragraph', text: summary });
    }

    if (answers.skills.length > 0) {
        blocks.push({ kind: 'heading', text: 'Skills' });
        blocks.push({ kind: 'paragraph', text: answers.skills.join(' • ') });
    }

    if (answers.experiences.length > 0) {
        blocks.push({ kind: 'heading', text: 'Work Experience' });
        for (const exp of answers.experiences) {
            blocks.push({
                kind: 'entry',
                title: `${exp.role}, ${exp.company}`,
                meta: [exp.location, `${exp.start} - ${exp.end}`].filter(Boolean).join(' | ')
            });
            for (const bullet of exp.bullets) {
                blocks.push({ kind: 'bullet', text: bullet });
            }
        }
    }

    if (answers.education.length > 0) {
        blocks.push({ kind: 'heading', text: 'Education' });
        for (const edu of answers.education) {
            blocks.push({ kind: 'entry', title: edu.degree, meta: `${edu.school} | ${edu.year}` });
        }
    }

    if (answers.certifications.length > 0) {
        blocks.push({ kind: 'heading', text: 'Certifications' });
        for (const cert of answers.certifications) {
            blocks.push({ kind: 'bullet', text: cert.details });
        }
    }

    if (answers.projects.length > 0) {
        blocks.push({ kind: 'heading', text: 'Projects' });
        for (const project of answers.projects) {
            blocks.push({ kind: 'bullet', text: project.details });
        }
    }

    if (docType === 'cv' && answers.personalTraits) {
        blocks.push({ kind: 'heading', text: 'Personal Information' });
        blocks.push({ kind: 'paragraph', text: answers.personalTraits });
    }

    return blocks;
};

const coverLetterBlocks = (answers: Answers): DocumentBlock[] => {
    const cover = answers.cover;
    const name = answers.basics?.name ?? '';
    const role = cover.role ?? answers.targetRole ?? 'the advertised';
    const company = cover.company ?? 'your company';

    const blocks: DocumentBlock[] = [{ kind: 'title', text: name || 'Cover Letter' }];
    const contact = contactLine(answers);
    if (contact) {
        blocks.push({ kind: 'paragraph', text: contact });
    }

    blocks.push({ kind: 'paragraph', text: 'Dear Hiring Manager,' });

    const opening = [`I am writing to apply for the ${role} position at ${company}.`];
    if (cover.yearsExperience && cover.industries) {
        opening.push(`I bring ${cover.yearsExperience} of experience in ${cover.industries}.`);
    }
    if (cover.interestReason) {
        opening.push(sentence(cover.interestReason));
    }
    blocks.push({ kind: 'paragraph', text: opening.join(' ') });

    if (cover.currentTitle && cover.currentEmployer) {
        blocks.push({
            kind: 'paragraph',
            text: `In my current role as ${cover.currentTitle} at ${cover.currentEmployer}, my recent results include:`
        });
    } else if (cover.achievements.length > 0) {
        blocks.push({ kind: 'paragraph', text: 'Recent results I am proud of include:' });
    }
    for (const achievement of cover.achievements) {
        blocks.push({ kind: 'bullet', text: sentence(achievement) });
    }

    const closing: string[] = [];
    if (cover.keySkills.length > 0) {
        closing.push(`My key strengths include ${cover.keySkills.join(', ')}.`);
    }
    if (cover.companyGoal) {
        closing.push(`I would welcome the opportunity to contribute to ${company}'s goal of ${lowerFirst(sentence(cover.companyGoal))}`);
    }
    closing.push('Thank you for considering my application.');
    blocks.push({ kind: 'paragraph', text: closing.join(' ') });

    blocks.push({ kind: 'paragraph', text: 'Sincerely,' });
    if (name) {
        blocks.push({ kind: 'paragraph', text: name });
    }
    return blocks;
};

const BULLET_PREFIX = /^\s*[-*•]\s+/;

const revampBlocks = (answers: Answers, generated: GeneratedContent): DocumentBlock[] => {
    const content = answers.revampedContent ?? generated.revamp ?? answers.revampSource?.text ?? '';
    const blocks: DocumentBlock[] = [{ kind: 'title', text: answers.basics?.name ?? 'Improved Resume' }];

    for (const raw of content.split('\n')) {
        const line = raw.trim();
        if (!line) {
            continue;
        }
        if (BULLET_PREFIX.test(line)) {
            blocks.push({ kind: 'bullet', text: line.replace(BULLET_PREFIX, '') });
        } else if (line.endsWith(':') || (line === line.toUpperCase() && /[A-Z]/.test(line) && line.length <= 40)) {
            blocks.push({ kind: 'heading', text: line.replace(/:$/, '') });
        } else {
            blocks.push({ kind: 'paragraph', text: line });
        }
    }
    return blocks;
};

/**
 * Layout-independent content of the final document. The DOCX and PDF writers
 * only decide how each block looks.
 */
export const buildDocumentModel = (request: Pick<RenderRequest, 'docType' | 'answers' | 'generated'>): DocumentBlock[] => {
    switch (request.docType) {
        case 'resume':
        case 'cv':
            return resumeBlocks(request.docType, request.answers, request.generated);
        case 'cover_letter':
            return coverLetterBlocks(request.answers);
        case 'revamp':
            return revampBlocks(request.answers, request.generated);
    }
};
