import { Store } from '../database/Store';
import { ContentGenerator, GenerationContext } from '../services/ContentGenerator';
import { StaticContentGenerator } from '../services/fallbackContent';
import { GenerationKind, GeneratedContent, Job } from '../types/Job';
import { Tier } from '../types/User';
import { UpstreamGenerationError } from '../models/errors';
import { logger } from '../utils/logger';

const log = logger.child('generation');

export const buildGenerationContext = (job: Job, tier: Tier): GenerationContext => ({
    tier,
    targetRole: job.answers.targetRole,
    basics: job.answers.basics,
    experiences: job.answers.experiences,
    skills: job.answers.skills,
    personalTraits: job.answers.personalTraits,
    sourceText: job.answers.revampSource?.text
});

const withTimeout = async <T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> => {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new UpstreamGenerationError(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
    });
    try {
        return await Promise.race([work, timeout]);
    } finally {
        clearTimeout(timer);
    }
};

/**
 * Runs AI generation outside the conversation turn. Results land in
 * job.generated, keyed by the job's epoch so output for answers that were
 * reset in the meantime is discarded. The user polls with a wake word.
 */
export class ContentGenerationManager {
    private readonly inFlight = new Map<string, Promise<void>>();

    constructor(
        private readonly store: Store,
        private readonly generator: ContentGenerator,
        private readonly timeoutMs: number,
        private readonly fallback: ContentGenerator = new StaticContentGenerator()
    ) {}

    /** Starts generation unless a result is cached or a request is already running */
    request(job: Job, kind: GenerationKind, tier: Tier): void {
        if (job.generated[kind] !== undefined) {
            return;
        }

        const key = this.key(job, kind);
        if (this.inFlight.has(key)) {
            return;
        }

        const task = this.run(job, kind, buildGenerationContext(job, tier))
            .finally(() => this.inFlight.delete(key));
        this.inFlight.set(key, task);
    }

    isPending(job: Job, kind: GenerationKind): boolean {
        return this.inFlight.has(this.key(job, kind));
    }

    /** Resolves once every running generation has settled */
    async whenIdle(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.all([...this.inFlight.values()]);
        }
    }

    private key(job: Job, kind: GenerationKind): string {
        return `${job.jobId}:${job.epoch}:${kind}`;
    }

    private async run(job: Job, kind: GenerationKind, context: GenerationContext): Promise<void> {
        try {
            switch (kind) {
                case 'skills': {
                    const skills = await this.generate(kind, () => this.generator.generateSkills(context), () => this.fallback.generateSkills(context));
                    await this.save(job, kind, skills);
                    break;
                }
                case 'summary': {
                    const summary = await this.generate(kind, () => this.generator.generateSummary(context), () => this.fallback.generateSummary(context));
                    await this.save(job, kind, summary);
                    break;
                }
                case 'revamp': {
                    const revamp = await this.generate(kind, () => this.generator.revamp(context), () => this.fallback.revamp(context));
                    await this.save(job, kind, revamp);
                    break;
                }
            }
        } catch (error) {
            // Nothing is cached; the next wake word schedules another attempt
            log.error('Could not store generated content', { jobId: job.jobId, kind, error });
        }
    }

    private async generate<T>(kind: GenerationKind, primary: () => Promise<T>, fallback: () => Promise<T>): Promise<T> {
        try {
            return await withTimeout(primary(), this.timeoutMs, `${kind} generation`);
        } catch (error) {
            log.warn('Content generation failed, using fallback content', { kind, error });
            return fallback();
        }
    }

    private async save<K extends GenerationKind>(job: Job, kind: K, value: GeneratedContent[K]): Promise<void> {
        const stored = await this.store.jobs.storeGenerated(job.jobId, job.epoch, kind, value);
        if (!stored) {
            log.debug('Discarded generated content for a reset job', { jobId: job.jobId, kind });
        }
    }
}
