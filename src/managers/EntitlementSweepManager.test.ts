import { EntitlementSweepManager } from './EntitlementSweepManager';
import { EntitlementManager } from './EntitlementManager';
import { AdminPolicy } from './AdminPolicy';
import { InMemoryStore } from '../database/InMemoryStore';
import { makeUser, TestClock } from '../testing/factories';

describe('EntitlementSweepManager', () => {
    test('resets due quotas and expires lapsed premium plans', async () => {
        const store = new InMemoryStore();
        const clock = new TestClock();
        const admins = new AdminPolicy([]);
        const entitlements = new EntitlementManager(store, admins, { clock: clock.now });
        const sweeper = new EntitlementSweepManager(store, entitlements, admins, clock.now);

        await store.users.create(makeUser({ usage: { resume: 1, cv: 0, cover_letter: 0, revamp: 0 } }));
        await store.users.create(makeUser({
            userId: 'user-2',
            chatId: '1002',
            tier: 'pro',
            premiumExpiresAt: new Date('2026-01-20T00:00:00.000Z'),
            quotaResetAt: new Date('2026-02-15T00:00:00.000Z')
        }));

        expect(await sweeper.sweep()).toEqual({ usersChecked: 0, quotasReset: 0, premiumsExpired: 0 });

        clock.advanceDays(31);
        expect(await sweeper.sweep()).toEqual({ usersChecked: 2, quotasReset: 1, premiumsExpired: 1 });

        expect((await store.users.findById('user-1'))?.usage.resume).toBe(0);
        expect((await store.users.findById('user-2'))?.tier).toBe('free');

        // Nothing left to do
        expect(await sweeper.sweep()).toEqual({ usersChecked: 0, quotasReset: 0, premiumsExpired: 0 });
    });

    test('admins with past reset dates are not picked up', async () => {
        const store = new InMemoryStore();
        const clock = new TestClock();
        const admins = new AdminPolicy(['1001']);
        const sweeper = new EntitlementSweepManager(store, new EntitlementManager(store, admins, { clock: clock.now }), admins, clock.now);

        const admin = await store.users.create(makeUser({
            chatId: '1001',
            usage: { resume: 4, cv: 0, cover_letter: 0, revamp: 0 }
        }));
        await store.users.create(makeUser({ userId: 'user-2', chatId: '1002' }));
        clock.advanceDays(31);

        expect(await sweeper.sweep()).toEqual({ usersChecked: 1, quotasReset: 1, premiumsExpired: 0 });
        expect(await sweeper.sweep()).toEqual({ usersChecked: 0, quotasReset: 0, premiumsExpired: 0 });
        expect(await store.users.findById(admin.userId)).toEqual(admin);
    });

    test('rejects an empty batch', async () => {
        const store = new InMemoryStore();
        const admins = new AdminPolicy([]);
        const sweeper = new EntitlementSweepManager(store, new EntitlementManager(store, admins), admins);
        await expect(sweeper.sweep(0)).rejects.toThrow('Batch size must be at least 1.');
    });
});
