import crypto from 'crypto';
import { handlePaymentWebhook, WebhookDeps } from './PaymentWebhookServer';
import { PaystackGateway } from '../services/PaymentGateway';
import { PaymentManager } from '../managers/PaymentManager';
import { EntitlementManager } from '../managers/EntitlementManager';
import { AdminPolicy } from '../managers/AdminPolicy';
import { InMemoryStore } from '../database/InMemoryStore';
import { BASE_TIME, makeUser, TestClock } from '../testing/factories';

const SECRET = 'test-secret';

const signed = (payload: unknown): { body: Buffer; signature: string } => {
    const body = Buffer.from(JSON.stringify(payload));
    return { body, signature: crypto.createHmac('sha512', SECRET).update(body).digest('hex') };
};

const chargeEvent = (reference: string) => ({
    event: 'charge.success',
    data: {
        reference,
        status: 'success',
        metadata: { userId: 'user-1', purpose: 'premium_upgrade' }
    }
});

describe('handlePaymentWebhook', () => {
    let store: InMemoryStore;
    let sent: Array<[string, string]>;
    let deps: WebhookDeps;

    beforeEach(async () => {
        store = new InMemoryStore();
        sent = [];
        const clock = new TestClock();
        const gateway = new PaystackGateway({ secretKey: SECRET, callbackUrl: 'https://bot.example.test/payments/callback' });
        const entitlements = new EntitlementManager(store, new AdminPolicy([]), { clock: clock.now });
        deps = {
            payments: new PaymentManager(store, entitlements, gateway, { currency: 'NGN', premiumPrice: 7500, documentPrice: 5000 }, clock.now),
            gateway,
            notify: async (chatId, text) => {
                sent.push([chatId, text]);
            }
        };

        await store.users.create(makeUser());
        await store.payments.insert({
            reference: 'premium-ref-1',
            userId: 'user-1',
            purpose: 'premium_upgrade',
            amount: 7500,
            currency: 'NGN',
            status: 'init',
            createdAt: BASE_TIME
        });
    });

    test('rejects a bad signature without touching state', async () => {
        const { body } = signed(chargeEvent('premium-ref-1'));
        expect(await handlePaymentWebhook(deps, body, 'forged')).toBe(401);
        expect((await store.users.findById('user-1'))?.tier).toBe('free');
    });

    test('rejects a signed body that is not JSON', async () => {
        const body = Buffer.from('not json');
        const signature = crypto.createHmac('sha512', SECRET).update(body).digest('hex');
        expect(await handlePaymentWebhook(deps, body, signature)).toBe(400);
    });

    test('acknowledges events it does not handle', async () => {
        const { body, signature } = signed({ event: 'transfer.success', data: {} });
        expect(await handlePaymentWebhook(deps, body, signature)).toBe(200);
        expect(sent).toEqual([]);
    });

    test('applies a charge once and notifies the payer once', async () => {
        const { body, signature } = signed(chargeEvent('premium-ref-1'));

        expect(await handlePaymentWebhook(deps, body, signature)).toBe(200);
        expect(await handlePaymentWebhook(deps, body, signature)).toBe(200);

        expect((await store.users.findById('user-1'))?.tier).toBe('pro');
        expect(sent).toEqual([
            ['1001', 'Welcome to Premium! Your plan is active until 2026-01-31. Type status to see your limits.']
        ]);
    });

    test('a failed notification still acknowledges the event', async () => {
        deps.notify = async () => {
            throw new Error('chat not found');
        };
        const { body, signature } = signed(chargeEvent('premium-ref-1'));
        expect(await handlePaymentWebhook(deps, body, signature)).toBe(200);
        expect((await store.payments.findByReference('premium-ref-1'))?.status).toBe('success');
    });
});
