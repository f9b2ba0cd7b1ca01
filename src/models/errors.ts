import { DocumentType } from '../types/User';

// Error taxonomy shared by managers and the conversation engine.
// Only ValidationError, QuotaExceededError and EntitlementDeniedError are
// turned into text the user sees.

export abstract class AppError extends Error {
    abstract readonly userVisible: boolean;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class ValidationError extends AppError {
    readonly userVisible = true;
    readonly example?: string;

    constructor(message: string, example?: string) {
        super(message);
        this.example = example;
    }
}

export class QuotaExceededError extends AppError {
    readonly userVisible = true;

    constructor(readonly docType: DocumentType, readonly limit: number) {
        super(`Quota exceeded for ${docType} (limit ${limit})`);
    }
}

/** `feature` is a document type the tier does not offer, or PDF export */
export class EntitlementDeniedError extends AppError {
    readonly userVisible = true;

    constructor(readonly feature: DocumentType | 'pdf_export') {
        super(`${feature} is not available on the current tier`);
    }
}

export class DuplicateMessageError extends AppError {
    readonly userVisible = false;

    constructor(readonly messageId: string) {
        super(`Message ${messageId} was already processed`);
    }
}

/**
 * Raised when an optimistic compare-and-set loses to another writer.
 * Callers treat it the same way as a duplicate delivery.
 */
export class ConcurrentUpdateError extends AppError {
    readonly userVisible = false;

    constructor(readonly jobId: string) {
        super(`Job ${jobId} was modified concurrently`);
    }
}

export class UpstreamGenerationError extends AppError {
    readonly userVisible = false;

    constructor(message: string, readonly cause?: unknown) {
        super(message);
    }
}

export class PersistenceError extends AppError {
    readonly userVisible = false;

    constructor(operation: string, readonly cause?: unknown) {
        super(`Persistence failure during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`);
    }
}
