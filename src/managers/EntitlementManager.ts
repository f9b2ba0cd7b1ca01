import { Store, StoreContext } from '../database/Store';
import { createEmptyUsage, DocumentType, Tier, User } from '../types/User';
import { addDays, Clock, systemClock } from '../models/utils';
import { AdminPolicy } from './AdminPolicy';
import { EntitlementDeniedError, QuotaExceededError } from '../models/errors';
import { logger } from '../utils/logger';

const log = logger.child('entitlements');

export interface TierLimits {
    /** 0 means the document type is not offered on the tier at all */
    documents: Record<DocumentType, number>;
    pdfAllowed: boolean;
}

export const TIER_LIMITS: Readonly<Record<Tier, TierLimits>> = {
    free: {
        documents: { resume: 1, cv: 1, cover_letter: 0, revamp: 1 },
        pdfAllowed: false
    },
    pro: {
        documents: { resume: 2, cv: 2, cover_letter: 1, revamp: 1 },
        pdfAllowed: true
    }
};

export const DEFAULT_QUOTA_CYCLE_DAYS = 30;

export type GenerationDecision =
    | { allowed: true; reason: 'ok' }
    | { allowed: false; reason: 'not_allowed'; limit: 0 }
    | { allowed: false; reason: 'quota_exceeded'; limit: number };

export const UNLIMITED = 'unlimited';

export interface QuotaLine {
    used: number;
    limit: number | typeof UNLIMITED;
    remaining: number | typeof UNLIMITED;
}

export interface EntitlementStatus {
    tier: Tier;
    isAdmin: boolean;
    perType: Record<DocumentType, QuotaLine>;
    pdfAllowed: boolean;
    /** Omitted for admins */
    quotaResetAt?: Date;
    premiumExpiresAt?: Date | null;
}

export interface EntitlementOptions {
    cycleDays?: number;
    clock?: Clock;
}

/**
 * Quota counters and the free/pro tier machine. Time-based transitions are
 * applied lazily by refresh(); every entry point is a no-op or an automatic
 * pass for admin identities.
 */
export class EntitlementManager {
    private readonly cycleDays: number;
    private readonly clock: Clock;

    constructor(
        private readonly store: Store,
        private readonly adminPolicy: AdminPolicy,
        options: EntitlementOptions = {}
    ) {
        this.cycleDays = options.cycleDays ?? DEFAULT_QUOTA_CYCLE_DAYS;
        this.clock = options.clock ?? systemClock;
    }

    /**
     * Zero every counter once the cycle has ended. Must run before any quota read.
     */
    async checkAndResetQuota(user: User): Promise<User> {
        if (this.adminPolicy.isAdmin(user)) {
            return user;
        }

        const now = this.clock();
        if (now.getTime() < user.quotaResetAt.getTime()) {
            return user;
        }

        const nextResetAt = addDays(now, this.cycleDays);
        const applied = await this.store.users.resetQuota(user.userId, now, nextResetAt);
        if (!applied) {
            // Another writer reset it first
            return (await this.store.users.findById(user.userId)) ?? user;
        }

        log.info('Quota cycle reset', { userId: user.userId, nextResetAt });
        return { ...user, usage: createEmptyUsage(), quotaResetAt: nextResetAt };
    }

    /**
     * Downgrade an expired pro user. Counters carry over against the free limits.
     */
    async checkPremiumExpiry(user: User): Promise<User> {
        if (this.adminPolicy.isAdmin(user) || user.tier !== 'pro' || !user.premiumExpiresAt) {
            return user;
        }

        const now = this.clock();
        if (now.getTime() < user.premiumExpiresAt.getTime()) {
            return user;
        }

        const applied = await this.store.users.expirePremium(user.userId, now);
        if (!applied) {
            return (await this.store.users.findById(user.userId)) ?? user;
        }

        log.info('Premium expired, downgraded to free', { userId: user.userId });
        return { ...user, tier: 'free' };
    }

    async refresh(user: User): Promise<User> {
        const reset = await this.checkAndResetQuota(user);
        return this.checkPremiumExpiry(reset);
    }

    canGenerate(user: User, docType: DocumentType): GenerationDecision {
        if (this.adminPolicy.isAdmin(user)) {
            return { allowed: true, reason: 'ok' };
        }

        const limit = TIER_LIMITS[user.tier].documents[docType];
        if (limit === 0) {
            return { allowed: false, reason: 'not_allowed', limit: 0 };
        }
        if (user.usage[docType] >= limit) {
            return { allowed: false, reason: 'quota_exceeded', limit };
        }
        return { allowed: true, reason: 'ok' };
    }

    canUsePdfExport(user: User): boolean {
        return this.adminPolicy.isAdmin(user) || TIER_LIMITS[user.tier].pdfAllowed;
    }

    /**
     * Count one generation. Pass the transaction context so the increment
     * commits together with the delivery it pays for. Throws rather than
     * count past the tier limit.
     */
    async recordGeneration(user: User, docType: DocumentType, tx: StoreContext = this.store): Promise<void> {
        if (this.adminPolicy.isAdmin(user)) {
            return;
        }
        const decision = this.canGenerate(user, docType);
        if (!decision.allowed) {
            throw decision.reason === 'not_allowed'
                ? new EntitlementDeniedError(docType)
                : new QuotaExceededError(docType, decision.limit);
        }
        await tx.users.incrementUsage(user.userId, docType);
        log.debug('Generation recorded', { userId: user.userId, docType });
    }

    async upgrade(user: User, tx: StoreContext = this.store): Promise<User> {
        if (this.adminPolicy.isAdmin(user)) {
            return user;
        }

        const until = addDays(this.clock(), this.cycleDays);
        await tx.users.applyUpgrade(user.userId, until);
        log.info('User upgraded to pro', { userId: user.userId, until });

        return {
            ...user,
            tier: 'pro',
            usage: createEmptyUsage(),
            quotaResetAt: until,
            premiumExpiresAt: until
        };
    }

    getStatus(user: User): EntitlementStatus {
        const isAdmin = this.adminPolicy.isAdmin(user);
        const limits = TIER_LIMITS[user.tier].documents;

        const line = (docType: DocumentType): QuotaLine => {
            const used = user.usage[docType];
            return isAdmin
                ? { used, limit: UNLIMITED, remaining: UNLIMITED }
                : { used, limit: limits[docType], remaining: Math.max(0, limits[docType] - used) };
        };
        const perType: Record<DocumentType, QuotaLine> = {
            resume: line('resume'),
            cv: line('cv'),
            cover_letter: line('cover_letter'),
            revamp: line('revamp')
        };

        if (isAdmin) {
            return { tier: user.tier, isAdmin, perType, pdfAllowed: true };
        }

        return {
            tier: user.tier,
            isAdmin,
            perType,
            pdfAllowed: TIER_LIMITS[user.tier].pdfAllowed,
            quotaResetAt: user.quotaResetAt,
            premiumExpiresAt: user.tier === 'pro' ? user.premiumExpiresAt : null
        };
    }

    /** First quota cycle boundary for a user created at `now` */
    initialResetAt(now: Date): Date {
        return addDays(now, this.cycleDays);
    }
}
