import { DocumentType } from './User';

export type PaymentPurpose = DocumentType | 'premium_upgrade';

export type PaymentStatus = 'init' | 'success' | 'failed';

export interface Payment {
    reference: string;
    userId: string;
    purpose: PaymentPurpose;
    jobId?: string;
    amount: number;
    currency: string;
    status: PaymentStatus;
    createdAt: Date;
    processedAt?: Date;
}

/**
 * Normalized inbound payment notification, independent of the provider.
 */
export interface PaymentEvent {
    reference: string;
    status: 'success' | 'failed' | 'abandoned';
    metadata: {
        userId: string;
        purpose: PaymentPurpose;
    };
}
