import axios, { AxiosInstance } from 'axios';
import crypto from 'crypto';
import { PaymentEvent, PaymentPurpose } from '../types/Payment';
import { isPaymentPurpose, isRecord } from '../models/validation';
import { logger } from '../utils/logger';

const log = logger.child('paystack');

export interface CheckoutRequest {
    reference: string;
    /** Major currency units */
    amount: number;
    currency: string;
    email: string;
    userId: string;
    purpose: PaymentPurpose;
    jobId?: string;
}

export interface CheckoutSession {
    reference: string;
    authorizationUrl: string;
}

export interface PaymentGateway {
    createCheckout(request: CheckoutRequest): Promise<CheckoutSession>;
    verifySignature(rawBody: Buffer, signature: string | undefined): boolean;
    /** Null for well-formed events this system does not act on */
    parseEvent(payload: unknown): PaymentEvent | null;
}

export interface PaystackOptions {
    secretKey: string;
    callbackUrl: string;
    baseUrl?: string;
}

const EVENT_STATUSES = ['success', 'failed', 'abandoned'] as const;
type EventStatus = typeof EVENT_STATUSES[number];

const isEventStatus = (value: unknown): value is EventStatus =>
    typeof value === 'string' && EVENT_STATUSES.some(status => status === value);

export class PaystackGateway implements PaymentGateway {
    private readonly http: AxiosInstance;

    constructor(private readonly options: PaystackOptions) {
        this.http = axios.create({
            baseURL: options.baseUrl ?? 'https://api.paystack.co',
            timeout: 15000,
            headers: {
                Authorization: `Bearer ${options.secretKey}`,
                'Content-Type': 'application/json'
            }
        });
    }

    async createCheckout(request: CheckoutRequest): Promise<CheckoutSession> {
        try {
            const response = await this.http.post('/transaction/initialize', {
                email: request.email,
                // Paystack amounts are in the subunit (kobo)
                amount: Math.round(request.amount * 100),
                currency: request.currency,
                reference: request.reference,
                callback_url: this.options.callbackUrl,
                metadata: {
                    userId: request.userId,
                    purpose: request.purpose,
                    jobId: request.jobId
                }
            });

            const data: unknown = response.data;
            const url = isRecord(data) && isRecord(data.data) ? data.data.authorization_url : undefined;
            if (typeof url !== 'string') {
                throw new Error('Paystack response did not include an authorization_url');
            }

            log.info('Checkout created', { reference: request.reference, purpose: request.purpose });
            return { reference: request.reference, authorizationUrl: url };
        } catch (error) {
            const detail = axios.isAxiosError(error) ? error.response?.data : undefined;
            log.error('Paystack checkout failed', { error, detail });
            throw error;
        }
    }

    verifySignature(rawBody: Buffer, signature: string | undefined): boolean {
        if (!signature) {
            return false;
        }
        const expected = crypto.createHmac('sha512', this.options.secretKey).update(rawBody).digest('hex');
        const given = Buffer.from(signature, 'utf8');
        const wanted = Buffer.from(expected, 'utf8');
        return given.length === wanted.length && crypto.timingSafeEqual(given, wanted);
    }

    parseEvent(payload: unknown): PaymentEvent | null {
        if (!isRecord(payload) || typeof payload.event !== 'string' || !payload.event.startsWith('charge.')) {
            return null;
        }

        const data = payload.data;
        if (!isRecord(data) || typeof data.reference !== 'string' || !isEventStatus(data.status)) {
            return null;
        }

        const metadata = data.metadata;
        if (!isRecord(metadata) || typeof metadata.userId !== 'string' || !isPaymentPurpose(metadata.purpose)) {
            log.warn('Payment event without usable metadata', { reference: data.reference });
            return null;
        }

        return {
            reference: data.reference,
            status: data.status,
            metadata: { userId: metadata.userId, purpose: metadata.purpose }
        };
    }
}
