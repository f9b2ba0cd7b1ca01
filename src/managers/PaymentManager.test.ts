import { PaymentManager } from './PaymentManager';
import { EntitlementManager } from './EntitlementManager';
import { AdminPolicy } from './AdminPolicy';
import { InMemoryStore } from '../database/InMemoryStore';
import { PaymentEvent } from '../types/Payment';
import { FakePaymentGateway } from '../testing/fakes';
import { makeJob, makeUser, TestClock } from '../testing/factories';

const PRICING = { currency: 'NGN', premiumPrice: 7500, documentPrice: 5000 };

const setup = async () => {
    const store = new InMemoryStore();
    const clock = new TestClock();
    const entitlements = new EntitlementManager(store, new AdminPolicy([]), { clock: clock.now });
    const gateway = new FakePaymentGateway();
    const payments = new PaymentManager(store, entitlements, gateway, PRICING, clock.now);
    const user = await store.users.create(makeUser());
    return { store, clock, gateway, payments, user };
};

const successFor = (reference: string, purpose: PaymentEvent['metadata']['purpose'], userId = 'user-1'): PaymentEvent => ({
    reference,
    status: 'success',
    metadata: { userId, purpose }
});

describe('PaymentManager', () => {
    test('is disabled without a gateway', () => {
        const store = new InMemoryStore();
        const payments = new PaymentManager(store, new EntitlementManager(store, new AdminPolicy([])), null, PRICING);
        expect(payments.isEnabled()).toBe(false);
        expect(payments.getPricing()).toEqual(PRICING);
    });

    test('a premium payment upgrades the user exactly once', async () => {
        const { store, payments, user } = await setup();
        const session = await payments.createCheckout(user, 'premium_upgrade');

        const stored = await store.payments.findByReference(session.reference);
        expect(stored).toMatchObject({ status: 'init', amount: 7500, currency: 'NGN', purpose: 'premium_upgrade' });

        const notice = await payments.handleEvent(successFor(session.reference, 'premium_upgrade'));
        expect(notice).toEqual({
            chatId: '1001',
            message: 'Welcome to Premium! Your plan is active until 2026-01-31. Type status to see your limits.'
        });
        expect((await store.users.findById(user.userId))?.tier).toBe('pro');
        expect((await store.payments.findByReference(session.reference))?.status).toBe('success');

        // Redelivery of the same event changes nothing
        expect(await payments.handleEvent(successFor(session.reference, 'premium_upgrade'))).toBeNull();
    });

    test('a failed payment is recorded and reported', async () => {
        const { store, payments, user } = await setup();
        const session = await payments.createCheckout(user, 'premium_upgrade');

        const notice = await payments.handleEvent({ ...successFor(session.reference, 'premium_upgrade'), status: 'failed' });
        expect(notice?.message).toBe('Your payment was not completed. You can try again any time.');
        expect((await store.users.findById(user.userId))?.tier).toBe('free');
        expect((await store.payments.findByReference(session.reference))?.status).toBe('failed');
    });

    test('events that do not match the recorded payment are ignored', async () => {
        const { store, payments, user } = await setup();
        const session = await payments.createCheckout(user, 'premium_upgrade');

        expect(await payments.handleEvent(successFor('unknown-ref', 'premium_upgrade'))).toBeNull();
        expect(await payments.handleEvent(successFor(session.reference, 'premium_upgrade', 'someone-else'))).toBeNull();
        expect(await payments.handleEvent(successFor(session.reference, 'resume'))).toBeNull();
        expect((await store.payments.findByReference(session.reference))?.status).toBe('init');
    });

    test('a document payment marks its job as paid', async () => {
        const { store, payments, user } = await setup();
        const job = makeJob({ step: 'finalize', status: 'awaiting_payment' });
        await store.jobs.insert(job);

        const session = await payments.createCheckout(user, 'resume', job);
        const notice = await payments.handleEvent(successFor(session.reference, 'resume'));

        expect(notice?.message).toBe('Payment received! Reply yes to generate your document.');
        const paid = await store.jobs.findById(job.jobId);
        expect(paid?.status).toBe('paid');
        expect(paid?.paidGeneration).toBe(true);
        expect(paid?.version).toBe(1);
    });

    test('a document payment for a closed job is reported, not applied', async () => {
        const { store, payments, user } = await setup();
        const job = makeJob({ status: 'closed' });
        await store.jobs.insert(job);

        const session = await payments.createCheckout(user, 'resume', job);
        const notice = await payments.handleEvent(successFor(session.reference, 'resume'));

        expect(notice?.message).toBe('Payment received, but the document it was for is no longer open. Please contact support.');
        expect((await store.jobs.findById(job.jobId))?.paidGeneration).toBe(false);
    });

    test('checkout uses a placeholder email when the job has none', async () => {
        const { gateway, payments, user } = await setup();
        await payments.createCheckout(user, 'premium_upgrade');
        expect(gateway.checkouts[0].email).toBe('user-user-1@users.invalid');
    });
});
