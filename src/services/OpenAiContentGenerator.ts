import OpenAI from 'openai';
import { ContentGenerator, GenerationContext } from './ContentGenerator';
import { UpstreamGenerationError } from '../models/errors';
import { logger } from '../utils/logger';

const log = logger.child('openai');

export interface OpenAiGeneratorOptions {
    apiKey: string;
    model: string;
    timeoutMs: number;
}

const describeExperience = (context: GenerationContext): string =>
    context.experiences
        .map(exp => {
            const bullets = exp.bullets.map(bullet => `  - ${bullet}`).join('\n');
            return `${exp.role} at ${exp.company} (${exp.start} - ${exp.end})${bullets ? `\n${bullets}` : ''}`;
        })
        .join('\n');

/**
 * Splits a model reply into skill names. Accepts numbered lists, bullets and comma lists.
 */
export const parseSkillList = (content: string): string[] => {
    const items = content
        .split(/\n|,/)
        .map(item => item.replace(/^\s*(?:\d+[.)]|[-*•])\s*/, '').trim())
        .filter(item => item.length > 0 && item.length <= 60);

    return [...new Set(items)].slice(0, 8);
};

export class OpenAiContentGenerator implements ContentGenerator {
    private readonly client: OpenAI;
    private readonly model: string;

    constructor(options: OpenAiGeneratorOptions) {
        this.client = new OpenAI({
            apiKey: options.apiKey,
            maxRetries: 2,
            timeout: options.timeoutMs
        });
        this.model = options.model;
    }

    async generateSkills(context: GenerationContext): Promise<string[]> {
        const prompt = [
            `Suggest 8 concise professional skills for a candidate targeting the role "${context.targetRole ?? 'professional'}".`,
            context.tier === 'pro'
                ? 'Mix technical, domain and leadership skills that an applicant tracking system would match.'
                : 'Prefer widely recognised skill names.',
            'Experience:',
            describeExperience(context) || 'None provided.',
            'Return one skill per line with no numbering or commentary.'
        ].join('\n');

        const content = await this.complete('You are a career coach who writes resumes.', prompt, 200);
        const skills = parseSkillList(content);
        if (skills.length < 3) {
            throw new UpstreamGenerationError('Model returned too few skills');
        }
        return skills;
    }

    async generateSummary(context: GenerationContext): Promise<string> {
        const prompt = [
            `Write a ${context.tier === 'pro' ? '3 to 4' : '2 to 3'} sentence professional summary in the first person implied style.`,
            `Target role: ${context.targetRole ?? 'not specified'}`,
            `Skills: ${context.skills.join(', ') || 'not specified'}`,
            `Personal traits: ${context.personalTraits ?? 'not specified'}`,
            'Experience:',
            describeExperience(context) || 'None provided.',
            'Return only the summary text.'
        ].join('\n');

        return this.complete('You are a professional resume writer.', prompt, 300);
    }

    async revamp(context: GenerationContext): Promise<string> {
        const requirements = context.tier === 'pro'
            ? 'Strengthen every bullet with metrics and business impact, use strong action verbs, keep it ATS-friendly.'
            : 'Fix grammar and spelling, use consistent formatting and action verbs, keep it concise and ATS-friendly.';

        const prompt = [
            'Improve the following resume content while keeping its structure.',
            requirements,
            '',
            context.sourceText ?? ''
        ].join('\n');

        return this.complete('You are a professional resume writer who improves resume content.', prompt, 1500);
    }

    private async complete(system: string, prompt: string, maxTokens: number): Promise<string> {
        try {
            const response = await this.client.chat.completions.create({
                model: this.model,
                messages: [
                    { role: 'system', content: system },
                    { role: 'user', content: prompt }
                ],
                temperature: 0.7,
                max_tokens: maxTokens
            });

            const content = response.choices[0]?.message.content?.trim();
            if (!content) {
                throw new UpstreamGenerationError('OpenAI returned an empty completion');
            }
            return content;
        } catch (error) {
            if (error instanceof UpstreamGenerationError) {
                throw error;
            }
            log.warn('Completion request failed', { error });
            throw new UpstreamGenerationError('OpenAI completion failed', error);
        }
    }
}
