import { Store } from '../database/Store';
import { DocumentRenderer, RenderedDocument } from '../services/DocumentRenderer';
import { RenderRequest } from '../types/Directive';
import { Job } from '../types/Job';
import { ConcurrentUpdateError, EntitlementDeniedError, QuotaExceededError } from '../models/errors';
import { Clock, systemClock } from '../models/utils';
import { EntitlementManager } from './EntitlementManager';
import { logger } from '../utils/logger';

const log = logger.child('delivery');

export type DeliveryResult =
    | { kind: 'sent'; document: RenderedDocument }
    /** The job was already delivered or reset; send nothing */
    | { kind: 'skipped' }
    | { kind: 'failed' };

const MAX_ATTEMPTS = 3;

/**
 * Renders a finalized job and commits the delivery. The status change to
 * `delivered` and the quota increment happen in one transaction, after the
 * file exists and before it is sent.
 */
export class DeliveryManager {
    constructor(
        private readonly store: Store,
        private readonly entitlements: EntitlementManager,
        private readonly renderer: DocumentRenderer,
        private readonly clock: Clock = systemClock
    ) {}

    async deliver(request: RenderRequest): Promise<DeliveryResult> {
        let document: RenderedDocument;
        try {
            document = await this.renderer.render(request);
        } catch (error) {
            log.error('Render failed', { jobId: request.jobId, docType: request.docType, error });
            await this.abortGeneration(request.jobId);
            return { kind: 'failed' };
        }

        let delivered: Job | null;
        try {
            delivered = await this.completeGeneration(request.jobId);
        } catch (error) {
            if (!(error instanceof QuotaExceededError || error instanceof EntitlementDeniedError)) {
                throw error;
            }
            // Entitlement changed since finalize; the transaction rolled back
            log.warn('Delivery no longer allowed', { jobId: request.jobId, reason: error.name });
            await this.abortGeneration(request.jobId);
            return { kind: 'failed' };
        }
        if (!delivered) {
            return { kind: 'skipped' };
        }
        return { kind: 'sent', document };
    }

    /** PDF copies of delivered jobs; no state change and no quota use */
    async export(request: RenderRequest): Promise<RenderedDocument> {
        return this.renderer.render({ ...request, format: 'pdf' });
    }

    /**
     * Moves a rendering job to delivered and counts it, unless it was paid for
     * separately. Returns null when the job is no longer rendering.
     */
    async completeGeneration(jobId: string): Promise<Job | null> {
        return this.withRetry(jobId, () => this.store.transaction(async tx => {
            const job = await tx.jobs.findById(jobId);
            if (!job || job.status !== 'rendering') {
                log.info('Job is no longer rendering, delivery skipped', { jobId, status: job?.status });
                return null;
            }
            const user = await tx.users.findById(job.userId);
            if (!user) {
                log.warn('Rendering job has no owner', { jobId });
                return null;
            }

            const now = this.clock();
            const delivered = await tx.jobs.commit(
                { ...job, status: 'delivered', step: 'done', deliveredAt: now, updatedAt: now },
                { version: job.version, lastProcessedMessageId: job.lastProcessedMessageId }
            );
            if (!job.paidGeneration) {
                await this.entitlements.recordGeneration(user, job.docType, tx);
            }

            log.info('Document delivered', { jobId, docType: job.docType, paid: job.paidGeneration });
            return delivered;
        }));
    }

    /** Returns a rendering job to finalize so the user can try again */
    async abortGeneration(jobId: string): Promise<Job | null> {
        return this.withRetry(jobId, async () => {
            const job = await this.store.jobs.findById(jobId);
            if (!job || job.status !== 'rendering') {
                return null;
            }
            return this.store.jobs.commit(
                {
                    ...job,
                    status: job.paidGeneration ? 'paid' : 'preview_ready',
                    step: 'finalize',
                    updatedAt: this.clock()
                },
                { version: job.version, lastProcessedMessageId: job.lastProcessedMessageId }
            );
        });
    }

    // A user message can commit between our read and write
    private async withRetry<T>(jobId: string, work: () => Promise<T>): Promise<T> {
        for (let attempt = 1; ; attempt++) {
            try {
                return await work();
            } catch (error) {
                if (error instanceof ConcurrentUpdateError && attempt < MAX_ATTEMPTS) {
                    log.debug('Job changed during delivery, retrying', { jobId, attempt });
                    continue;
                }
                throw error;
            }
        }
    }
}
