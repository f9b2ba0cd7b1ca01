import express, { Express, Request, Response } from 'express';
import { Server } from 'http';
import { PaymentManager } from '../managers/PaymentManager';
import { PaymentGateway } from '../services/PaymentGateway';
import { logger } from '../utils/logger';

const log = logger.child('webhook');

export type Notifier = (chatId: string, text: string) => Promise<void>;

export interface WebhookDeps {
    payments: PaymentManager;
    gateway: PaymentGateway;
    notify: Notifier;
}

const parseJson = (rawBody: Buffer): unknown => {
    try {
        const parsed: unknown = JSON.parse(rawBody.toString('utf8'));
        return parsed;
    } catch {
        return null;
    }
};

/**
 * Verifies and applies one gateway notification. Returns the HTTP status to
 * answer with; a 5xx makes the gateway redeliver, which is safe because
 * events are applied once per reference.
 */
export const handlePaymentWebhook = async (
    deps: WebhookDeps,
    rawBody: Buffer,
    signature: string | undefined
): Promise<number> => {
    if (!deps.gateway.verifySignature(rawBody, signature)) {
        log.warn('Rejected webhook with an invalid signature');
        return 401;
    }

    const payload = parseJson(rawBody);
    if (payload === null) {
        return 400;
    }

    const event = deps.gateway.parseEvent(payload);
    if (!event) {
        return 200;
    }

    const notification = await deps.payments.handleEvent(event);
    if (notification) {
        try {
            await deps.notify(notification.chatId, notification.message);
        } catch (error) {
            // The payment is applied; only the courtesy message is lost
            log.error('Could not notify payer', { reference: event.reference, error });
        }
    }
    return 200;
};

export const createWebhookApp = (deps: WebhookDeps): Express => {
    const app = express();

    app.get('/health', (_req: Request, res: Response) => {
        res.send('OK');
    });

    app.get('/payments/callback', (_req: Request, res: Response) => {
        res.send('Thank you! Your payment is being confirmed. You can return to the chat now.');
    });

    // Signatures are computed over the exact bytes, so no JSON body parser here
    app.post('/payments/webhook', express.raw({ type: 'application/json' }), async (req: Request, res: Response) => {
        const body: unknown = req.body;
        if (!Buffer.isBuffer(body)) {
            res.sendStatus(400);
            return;
        }
        try {
            res.sendStatus(await handlePaymentWebhook(deps, body, req.header('x-paystack-signature')));
        } catch (error) {
            log.error('Webhook processing failed', { error });
            res.sendStatus(500);
        }
    });

    return app;
};

export class PaymentWebhookServer {
    private server: Server | null = null;

    constructor(private readonly deps: WebhookDeps, private readonly port: number) {}

    async start(): Promise<void> {
        const app = createWebhookApp(this.deps);
        await new Promise<void>((resolve, reject) => {
            const server = app.listen(this.port, () => resolve());
            server.once('error', reject);
            this.server = server;
        });
        log.info('Payment webhook listening', { port: this.port });
    }

    async stop(): Promise<void> {
        const server = this.server;
        if (!server) {
            return;
        }
        this.server = null;
        await new Promise<void>((resolve, reject) => {
            server.close(error => (error ? reject(error) : resolve()));
        });
    }
}
