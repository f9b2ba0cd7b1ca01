import { Store } from '../database/Store';
import { CheckoutSession, PaymentGateway } from '../services/PaymentGateway';
import { Payment, PaymentEvent, PaymentPurpose } from '../types/Payment';
import { Job } from '../types/Job';
import { User } from '../types/User';
import { ConcurrentUpdateError } from '../models/errors';
import { Clock, generatePaymentReference, systemClock } from '../models/utils';
import { EntitlementManager } from './EntitlementManager';
import { logger } from '../utils/logger';

const log = logger.child('payments');

export interface PricingOptions {
    currency: string;
    premiumPrice: number;
    documentPrice: number;
}

/** Message to push to a user after a payment event was applied */
export interface PaymentNotification {
    chatId: string;
    message: string;
}

const MAX_ATTEMPTS = 3;

export class PaymentManager {
    constructor(
        private readonly store: Store,
        private readonly entitlements: EntitlementManager,
        private readonly gateway: PaymentGateway | null,
        private readonly pricing: PricingOptions,
        private readonly clock: Clock = systemClock
    ) {}

    isEnabled(): boolean {
        return this.gateway !== null;
    }

    getPricing(): PricingOptions {
        return this.pricing;
    }

    /**
     * Records an 'init' payment and asks the gateway for a checkout link.
     * Document purchases are tied to the job they unlock.
     */
    async createCheckout(
        user: User,
        purpose: PaymentPurpose,
        job?: Job,
        reference: string = generatePaymentReference(purpose)
    ): Promise<CheckoutSession> {
        if (!this.gateway) {
            throw new Error('Payments are not configured');
        }

        const amount = purpose === 'premium_upgrade' ? this.pricing.premiumPrice : this.pricing.documentPrice;
        const payment: Payment = {
            reference,
            userId: user.userId,
            purpose,
            jobId: job?.jobId,
            amount,
            currency: this.pricing.currency,
            status: 'init',
            createdAt: this.clock()
        };
        await this.store.payments.insert(payment);

        return this.gateway.createCheckout({
            reference: payment.reference,
            amount,
            currency: payment.currency,
            email: job?.answers.basics?.email ?? `user-${user.userId}@users.invalid`,
            userId: user.userId,
            purpose,
            jobId: job?.jobId
        });
    }

    /**
     * Applies a gateway event at most once per reference. Returns the message
     * to send the payer, or null when there is nothing to tell them.
     */
    async handleEvent(event: PaymentEvent): Promise<PaymentNotification | null> {
        for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
            try {
                return await this.applyEvent(event);
            } catch (error) {
                if (error instanceof ConcurrentUpdateError && attempt < MAX_ATTEMPTS) {
                    log.debug('Job changed while applying payment, retrying', { reference: event.reference, attempt });
                    continue;
                }
                throw error;
            }
        }
        return null;
    }

    private async applyEvent(event: PaymentEvent): Promise<PaymentNotification | null> {
        const payment = await this.store.payments.findByReference(event.reference);
        if (!payment) {
            log.warn('Payment event for unknown reference', { reference: event.reference });
            return null;
        }
        if (payment.userId !== event.metadata.userId || payment.purpose !== event.metadata.purpose) {
            log.warn('Payment event metadata does not match the recorded payment', { reference: event.reference });
            return null;
        }

        return this.store.transaction(async tx => {
            const now = this.clock();
            const status = event.status === 'success' ? 'success' : 'failed';
            const first = await tx.payments.markProcessed(payment.reference, status, now);
            if (!first) {
                log.info('Payment event already processed', { reference: payment.reference });
                return null;
            }

            const user = await tx.users.findById(payment.userId);
            if (!user) {
                log.warn('Payment for unknown user', { reference: payment.reference });
                return null;
            }

            if (status === 'failed') {
                return {
                    chatId: user.chatId,
                    message: 'Your payment was not completed. You can try again any time.'
                };
            }

            if (payment.purpose === 'premium_upgrade') {
                const upgraded = await this.entitlements.upgrade(user, tx);
                log.info('Premium payment applied', { reference: payment.reference, userId: user.userId });
                return {
                    chatId: user.chatId,
                    message: upgraded.premiumExpiresAt
                        ? `Welcome to Premium! Your plan is active until ${upgraded.premiumExpiresAt.toISOString().slice(0, 10)}. Type status to see your limits.`
                        : 'Welcome to Premium! Type status to see your limits.'
                };
            }

            const job = payment.jobId ? await tx.jobs.findById(payment.jobId) : null;
            if (!job || job.status === 'closed') {
                log.warn('Document payment without an open job', { reference: payment.reference, jobId: payment.jobId });
                return {
                    chatId: user.chatId,
                    message: 'Payment received, but the document it was for is no longer open. Please contact support.'
                };
            }

            await tx.jobs.commit(
                {
                    ...job,
                    paidGeneration: true,
                    status: job.status === 'awaiting_payment' ? 'paid' : job.status,
                    updatedAt: now
                },
                { version: job.version, lastProcessedMessageId: job.lastProcessedMessageId }
            );
            log.info('Document payment applied', { reference: payment.reference, jobId: job.jobId });

            return {
                chatId: user.chatId,
                message: 'Payment received! Reply yes to generate your document.'
            };
        });
    }
}
