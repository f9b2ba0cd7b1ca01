// In-process stand-ins for external services
import { CheckoutRequest, CheckoutSession, PaymentGateway } from '../services/PaymentGateway';
import { DocumentRenderer, RenderedDocument } from '../services/DocumentRenderer';
import { RenderRequest } from '../types/Directive';
import { PaymentEvent } from '../types/Payment';

export class FakePaymentGateway implements PaymentGateway {
    readonly checkouts: CheckoutRequest[] = [];
    failWith: Error | null = null;

    async createCheckout(request: CheckoutRequest): Promise<CheckoutSession> {
        this.checkouts.push(request);
        if (this.failWith) {
            throw this.failWith;
        }
        return { reference: request.reference, authorizationUrl: `https://pay.example.test/${request.reference}` };
    }

    verifySignature(_rawBody: Buffer, signature: string | undefined): boolean {
        return signature === 'valid';
    }

    parseEvent(_payload: unknown): PaymentEvent | null {
        return null;
    }
}

export class FakeRenderer implements DocumentRenderer {
    readonly requests: RenderRequest[] = [];
    failWith: Error | null = null;

    async render(request: RenderRequest): Promise<RenderedDocument> {
        this.requests.push(request);
        if (this.failWith) {
            throw this.failWith;
        }
        return {
            filename: `${request.docType}.${request.format}`,
            mimeType: 'application/octet-stream',
            content: Buffer.from(`rendered ${request.jobId}`)
        };
    }
}
