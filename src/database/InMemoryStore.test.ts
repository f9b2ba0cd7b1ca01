import { InMemoryStore } from './InMemoryStore';
import { ConcurrentUpdateError } from '../models/errors';
import { BASE_TIME, makeJob, makeUser } from '../testing/factories';

describe('InMemoryStore', () => {
    let store: InMemoryStore;

    beforeEach(() => {
        store = new InMemoryStore();
    });

    describe('users', () => {
        test('create returns the existing row for a known chat id', async () => {
            await store.users.create(makeUser());
            const again = await store.users.create(makeUser({ userId: 'user-2' }));
            expect(again.userId).toBe('user-1');
            expect(await store.users.findById('user-2')).toBeNull();
        });

        test('concurrent creates for one chat store a single row', async () => {
            const [first, second] = await Promise.all([
                store.users.create(makeUser()),
                store.users.create(makeUser({ userId: 'user-2' }))
            ]);
            expect(first.userId).toBe('user-1');
            expect(second.userId).toBe('user-1');
            expect(await store.users.countByTier()).toEqual({ free: 1, pro: 0 });
        });

        test('resetQuota applies once per cycle', async () => {
            const user = await store.users.create(makeUser({ usage: { resume: 1, cv: 1, cover_letter: 0, revamp: 0 } }));
            const now = user.quotaResetAt;
            const next = new Date(now.getTime() + 1000);

            expect(await store.users.resetQuota(user.userId, now, next)).toBe(true);
            expect(await store.users.resetQuota(user.userId, now, next)).toBe(false);

            const stored = await store.users.findById(user.userId);
            expect(stored?.usage).toEqual({ resume: 0, cv: 0, cover_letter: 0, revamp: 0 });
            expect(stored?.quotaResetAt).toEqual(next);
        });

        test('returned rows are copies', async () => {
            const user = await store.users.create(makeUser());
            user.usage.resume = 9;
            expect((await store.users.findById('user-1'))?.usage.resume).toBe(0);
        });
    });

    describe('jobs', () => {
        test('commit bumps the version and rejects stale writers', async () => {
            const job = makeJob();
            await store.jobs.insert(job);

            const committed = await store.jobs.commit(
                { ...job, lastProcessedMessageId: 'm-1' },
                { version: 0, lastProcessedMessageId: null }
            );
            expect(committed.version).toBe(1);

            await expect(
                store.jobs.commit({ ...job, lastProcessedMessageId: 'm-2' }, { version: 0, lastProcessedMessageId: null })
            ).rejects.toBeInstanceOf(ConcurrentUpdateError);
            await expect(
                store.jobs.commit({ ...committed, lastProcessedMessageId: 'm-2' }, { version: 1, lastProcessedMessageId: 'm-0' })
            ).rejects.toBeInstanceOf(ConcurrentUpdateError);
        });

        test('commit keeps stored AI output unless told to clear it', async () => {
            const job = makeJob();
            await store.jobs.insert(job);
            await store.jobs.storeGenerated(job.jobId, 0, 'summary', 'Generated summary');

            // The caller's copy predates the AI write
            const kept = await store.jobs.commit(job, { version: 0, lastProcessedMessageId: null });
            expect(kept.generated).toEqual({ summary: 'Generated summary' });

            const cleared = await store.jobs.commit(kept, { version: 1, lastProcessedMessageId: null }, { clearGenerated: true });
            expect(cleared.generated).toEqual({});
        });

        test('storeGenerated ignores results for an older epoch', async () => {
            await store.jobs.insert(makeJob({ epoch: 2 }));
            expect(await store.jobs.storeGenerated('job-1', 1, 'skills', ['SQL'])).toBe(false);
            expect(await store.jobs.storeGenerated('missing', 2, 'skills', ['SQL'])).toBe(false);
            expect(await store.jobs.storeGenerated('job-1', 2, 'skills', ['SQL'])).toBe(true);
            expect((await store.jobs.findById('job-1'))?.generated.skills).toEqual(['SQL']);
        });

        test('findActive returns the newest open job', async () => {
            await store.jobs.insert(makeJob({ jobId: 'old', status: 'closed' }));
            await store.jobs.insert(makeJob({ jobId: 'new', createdAt: new Date(BASE_TIME.getTime() + 1000) }));
            expect((await store.jobs.findActive('user-1'))?.jobId).toBe('new');
            expect(await store.jobs.findActive('user-2')).toBeNull();
        });

        test('a user holds at most one open job', async () => {
            await store.jobs.insert(makeJob({ jobId: 'first' }));
            await expect(store.jobs.insert(makeJob({ jobId: 'second' }))).rejects.toBeInstanceOf(ConcurrentUpdateError);
            await store.jobs.insert(makeJob({ jobId: 'other-user', userId: 'user-2' }));
            await store.jobs.insert(makeJob({ jobId: 'archived', status: 'closed' }));

            expect(await store.jobs.findById('second')).toBeNull();
            expect((await store.jobs.findActive('user-1'))?.jobId).toBe('first');
        });

        test('closing the open job allows a new one', async () => {
            const first = makeJob({ jobId: 'first' });
            await store.jobs.insert(first);
            await store.jobs.commit({ ...first, status: 'closed' }, { version: 0, lastProcessedMessageId: null });

            await store.jobs.insert(makeJob({ jobId: 'second' }));
            expect((await store.jobs.findActive('user-1'))?.jobId).toBe('second');
        });

        test('countByStatus covers every status', async () => {
            await store.jobs.insert(makeJob({ jobId: 'a', status: 'delivered', userId: 'user-a' }));
            await store.jobs.insert(makeJob({ jobId: 'b', status: 'delivered', userId: 'user-b' }));
            await store.jobs.insert(makeJob({ jobId: 'c', userId: 'user-c' }));
            const counts = await store.jobs.countByStatus();
            expect(counts.delivered).toBe(2);
            expect(counts.collecting).toBe(1);
            expect(counts.closed).toBe(0);
        });
    });

    describe('payments', () => {
        const payment = {
            reference: 'ref-1',
            userId: 'user-1',
            purpose: 'premium_upgrade' as const,
            amount: 7500,
            currency: 'NGN',
            status: 'init' as const,
            createdAt: BASE_TIME
        };

        test('references are unique', async () => {
            await store.payments.insert(payment);
            await expect(store.payments.insert(payment)).rejects.toThrow('Duplicate payment reference ref-1');
        });

        test('markProcessed moves init exactly once', async () => {
            await store.payments.insert(payment);
            expect(await store.payments.markProcessed('ref-1', 'success', BASE_TIME)).toBe(true);
            expect(await store.payments.markProcessed('ref-1', 'failed', BASE_TIME)).toBe(false);
            expect((await store.payments.findByReference('ref-1'))?.status).toBe('success');
        });
    });

    describe('transaction', () => {
        test('rolls back every write when the work throws', async () => {
            await store.users.create(makeUser());

            await expect(store.transaction(async tx => {
                await tx.users.incrementUsage('user-1', 'resume');
                await tx.jobs.insert(makeJob());
                throw new Error('boom');
            })).rejects.toThrow('boom');

            expect((await store.users.findById('user-1'))?.usage.resume).toBe(0);
            expect(await store.jobs.findById('job-1')).toBeNull();
        });

        test('a rollback leaves writes made outside the transaction in place', async () => {
            await store.users.create(makeUser());
            await store.jobs.insert(makeJob({ jobId: 'other', userId: 'user-2' }));

            let markStarted = (): void => undefined;
            const started = new Promise<void>(resolve => {
                markStarted = () => resolve();
            });
            const failing = store.transaction(async tx => {
                await tx.users.incrementUsage('user-1', 'resume');
                markStarted();
                await new Promise(resolve => setTimeout(resolve, 10));
                throw new Error('boom');
            });

            await started;
            const committed = await store.jobs.commit(
                { ...makeJob({ jobId: 'other', userId: 'user-2' }), step: 'target_role', lastProcessedMessageId: 'b' },
                { version: 0, lastProcessedMessageId: null }
            );

            await expect(failing).rejects.toThrow('boom');
            expect(await store.jobs.findById('other')).toEqual(committed);
            expect((await store.users.findById('user-1'))?.usage.resume).toBe(0);
        });

        test('runs transactions one at a time', async () => {
            const order: string[] = [];
            const first = store.transaction(async () => {
                order.push('first:start');
                await new Promise(resolve => setTimeout(resolve, 10));
                order.push('first:end');
            });
            const second = store.transaction(async () => {
                order.push('second');
            });
            await Promise.all([first, second]);
            expect(order).toEqual(['first:start', 'first:end', 'second']);
        });
    });
});
