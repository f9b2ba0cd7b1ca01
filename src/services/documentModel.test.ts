import { buildDocumentModel, buildFilename } from './documentModel';
import { createEmptyAnswers } from '../types/Job';

describe('buildFilename', () => {
    test('uses the name and document type', () => {
        expect(buildFilename('Jane Doe', 'resume', 'docx')).toBe('Jane Doe - Resume.docx');
        expect(buildFilename('Jane/Doe?', 'cover_letter', 'pdf')).toBe('JaneDoe - Cover Letter.pdf');
        expect(buildFilename(undefined, 'cv', 'docx')).toBe('Document - CV.docx');
    });
});

describe('buildDocumentModel', () => {
    test('resume sections follow the answers', () => {
        const answers = createEmptyAnswers();
        answers.basics = { name: 'Jane Doe', email: 'jane@example.com', phone: '08012345678', location: 'Lagos' };
        answers.targetRole = 'Data Analyst';
        answers.skills = ['SQL', 'Excel'];
        answers.experiences = [{
            role: 'Analyst', company: 'Acme', location: 'Lagos', start: 'Jan 2022', end: 'Present', bullets: ['Built dashboards']
        }];
        answers.education = [{ degree: 'BSc Statistics', school: 'Unilag', year: '2021' }];

        expect(buildDocumentModel({ docType: 'resume', answers, generated: { summary: 'Analyst with three years.' } })).toEqual([
            { kind: 'title', text: 'Jane Doe' },
            { kind: 'subtitle', text: 'Data Analyst' },
            { kind: 'paragraph', text: 'jane@example.com | 08012345678 | Lagos' },
            { kind: 'heading', text: 'Professional Summary' },
            { kind: 'paragraph', text: 'Analyst with three years.' },
            { kind: 'heading', text: 'Skills' },
            { kind: 'paragraph', text: 'SQL • Excel' },
            { kind: 'heading', text: 'Work Experience' },
            { kind: 'entry', title: 'Analyst, Acme', meta: 'Lagos | Jan 2022 - Present' },
            { kind: 'bullet', text: 'Built dashboards' },
            { kind: 'heading', text: 'Education' },
            { kind: 'entry', title: 'BSc Statistics', meta: 'Unilag | 2021' }
        ]);
    });

    test('a typed summary wins over the generated one and CVs call it a personal statement', () => {
        const answers = createEmptyAnswers();
        answers.summary = 'My own words.';
        const blocks = buildDocumentModel({ docType: 'cv', answers, generated: { summary: 'Generated.' } });
        expect(blocks).toContainEqual({ kind: 'heading', text: 'Personal Statement' });
        expect(blocks).toContainEqual({ kind: 'paragraph', text: 'My own words.' });
        expect(blocks).not.toContainEqual({ kind: 'paragraph', text: 'Generated.' });
    });

    test('cover letter', () => {
        const answers = createEmptyAnswers();
        answers.basics = { name: 'Jane Doe', email: 'jane@example.com', phone: '', location: '' };
        answers.cover = {
            role: 'Data Analyst',
            company: 'Acme',
            yearsExperience: '3 years',
            industries: 'fintech',
            interestReason: 'I admire your data culture',
            currentTitle: 'Analyst',
            currentEmployer: 'Beta Ltd',
            achievements: ['Cut reporting time by 40%'],
            keySkills: ['SQL', 'Python'],
            companyGoal: 'Expanding across Africa'
        };

        expect(buildDocumentModel({ docType: 'cover_letter', answers, generated: {} })).toEqual([
            { kind: 'title', text: 'Jane Doe' },
            { kind: 'paragraph', text: 'jane@example.com' },
            { kind: 'paragraph', text: 'Dear Hiring Manager,' },
            {
                kind: 'paragraph',
                text: 'I am writing to apply for the Data Analyst position at Acme. I bring 3 years of experience in fintech. I admire your data culture.'
            },
            { kind: 'paragraph', text: 'In my current role as Analyst at Beta Ltd, my recent results include:' },
            { kind: 'bullet', text: 'Cut reporting time by 40%.' },
            {
                kind: 'paragraph',
                text: "My key strengths include SQL, Python. I would welcome the opportunity to contribute to Acme's goal of expanding across Africa. Thank you for considering my application."
            },
            { kind: 'paragraph', text: 'Sincerely,' },
            { kind: 'paragraph', text: 'Jane Doe' }
        ]);
    });

    test('revamp text is split into headings, bullets and paragraphs', () => {
        const answers = createEmptyAnswers();
        answers.revampSource = { text: 'old' };
        const generated = { revamp: 'EXPERIENCE\n- Led a team of 4\n\nSkills:\nPlain line' };

        expect(buildDocumentModel({ docType: 'revamp', answers, generated })).toEqual([
            { kind: 'title', text: 'Improved Resume' },
            { kind: 'heading', text: 'EXPERIENCE' },
            { kind: 'bullet', text: 'Led a team of 4' },
            { kind: 'heading', text: 'Skills' },
            { kind: 'paragraph', text: 'Plain line' }
        ]);
    });
});
