import { Store } from '../database/Store';
import { Clock, systemClock } from '../models/utils';
import { AdminPolicy } from './AdminPolicy';
import { EntitlementManager } from './EntitlementManager';

export interface SweepResult {
    usersChecked: number;
    quotasReset: number;
    premiumsExpired: number;
}

/**
 * Applies due quota resets and premium expiries for users who have not come
 * back. Uses the same guarded writes as the lazy checks, so running both is safe.
 * Admin chats are left out of the query, since refresh never writes to them.
 */
export class EntitlementSweepManager {
    constructor(
        private readonly store: Store,
        private readonly entitlements: EntitlementManager,
        private readonly admins: AdminPolicy,
        private readonly clock: Clock = systemClock
    ) {}

    async sweep(batchSize: number = 500): Promise<SweepResult> {
        if (batchSize < 1) {
            throw new Error('Batch size must be at least 1.');
        }

        const due = await this.store.users.findDueForRefresh(this.clock(), batchSize, this.admins.chatIds());
        const result: SweepResult = { usersChecked: due.length, quotasReset: 0, premiumsExpired: 0 };

        for (const user of due) {
            const refreshed = await this.entitlements.refresh(user);
            if (refreshed.quotaResetAt.getTime() !== user.quotaResetAt.getTime()) {
                result.quotasReset += 1;
            }
            if (user.tier === 'pro' && refreshed.tier === 'free') {
                result.premiumsExpired += 1;
            }
        }

        return result;
    }
}
