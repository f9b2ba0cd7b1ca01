export type Tier = 'free' | 'pro';

export type DocumentType = 'resume' | 'cv' | 'cover_letter' | 'revamp';

export const DOCUMENT_TYPES: readonly DocumentType[] = ['resume', 'cv', 'cover_letter', 'revamp'];

export type UsageCounters = Record<DocumentType, number>;

export interface User {
    userId: string;
    /** Opaque chat id from the messaging gateway */
    chatId: string;
    username?: string;
    tier: Tier;
    usage: UsageCounters;
    quotaResetAt: Date;
    /** Only meaningful while tier is 'pro' */
    premiumExpiresAt: Date | null;
    createdAt: Date;
    lastActive: Date;
}

export const createEmptyUsage = (): UsageCounters => ({
    resume: 0,
    cv: 0,
    cover_letter: 0,
    revamp: 0
});
