import { Job } from '../types/Job';
import { DuplicateMessageError } from '../models/errors';
import { JobVersion } from '../database/Store';

/**
 * A message is a duplicate when it matches the last id committed on the job.
 * The id is only ever written by the job commit that also carries the step
 * transition, so a turn that fails leaves the message replayable.
 */
export class IdempotencyFilter {
    isDuplicate(job: Pick<Job, 'lastProcessedMessageId'>, messageId: string): boolean {
        return job.lastProcessedMessageId !== null && job.lastProcessedMessageId === messageId;
    }

    assertFresh(job: Pick<Job, 'lastProcessedMessageId'>, messageId: string): void {
        if (this.isDuplicate(job, messageId)) {
            throw new DuplicateMessageError(messageId);
        }
    }

    /** The compare-and-set guard for committing a turn against `job` */
    expectedVersion(job: Pick<Job, 'version' | 'lastProcessedMessageId'>): JobVersion {
        return { version: job.version, lastProcessedMessageId: job.lastProcessedMessageId };
    }

    markProcessed(job: Job, messageId: string): Job {
        return { ...job, lastProcessedMessageId: messageId };
    }
}
