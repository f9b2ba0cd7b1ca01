import { ConcurrentUpdateError } from '../models/errors';
import { Payment, PaymentStatus } from '../types/Payment';
import { GenerationKind, GeneratedContent, Job, JobStatus, createStatusCounts } from '../types/Job';
import { createEmptyUsage, DocumentType, Tier, User } from '../types/User';
import {
    CommitOptions,
    JobRepository,
    JobVersion,
    PaymentRepository,
    Store,
    StoreContext,
    UserRepository
} from './Store';

interface MemoryState {
    users: Map<string, User>;
    jobs: Map<string, Job>;
    payments: Map<string, Payment>;
}

const clone = <T>(value: T): T => structuredClone(value);

/** Steps that put written entries back, replayed newest first on rollback */
type UndoLog = Array<() => void>;

/** Records the current value of `key` so a rollback restores only this entry */
const remember = <V>(undo: UndoLog | undefined, map: Map<string, V>, key: string): void => {
    if (!undo) {
        return;
    }
    const prior = map.get(key);
    if (prior === undefined) {
        undo.push(() => { map.delete(key); });
    } else {
        const copy = clone(prior);
        undo.push(() => { map.set(key, copy); });
    }
};

class MemoryUserRepository implements UserRepository {
    constructor(private readonly state: MemoryState, private readonly undo?: UndoLog) {}

    async findByChatId(chatId: string): Promise<User | null> {
        for (const user of this.state.users.values()) {
            if (user.chatId === chatId) {
                return clone(user);
            }
        }
        return null;
    }

    async findById(userId: string): Promise<User | null> {
        const user = this.state.users.get(userId);
        return user ? clone(user) : null;
    }

    async create(user: User): Promise<User> {
        // Lookup and insert run without an await between them, like an upsert on chatId
        for (const existing of this.state.users.values()) {
            if (existing.chatId === user.chatId) {
                return clone(existing);
            }
        }
        remember(this.undo, this.state.users, user.userId);
        this.state.users.set(user.userId, clone(user));
        return clone(user);
    }

    async touch(userId: string, lastActive: Date, username?: string): Promise<void> {
        const user = this.state.users.get(userId);
        if (user) {
            remember(this.undo, this.state.users, userId);
            user.lastActive = lastActive;
            if (username) {
                user.username = username;
            }
        }
    }

    async resetQuota(userId: string, now: Date, nextResetAt: Date): Promise<boolean> {
        const user = this.state.users.get(userId);
        if (!user || user.quotaResetAt.getTime() > now.getTime()) {
            return false;
        }
        remember(this.undo, this.state.users, userId);
        user.usage = createEmptyUsage();
        user.quotaResetAt = nextResetAt;
        return true;
    }

    async expirePremium(userId: string, now: Date): Promise<boolean> {
        const user = this.state.users.get(userId);
        if (!user || user.tier !== 'pro' || !user.premiumExpiresAt || user.premiumExpiresAt.getTime() > now.getTime()) {
            return false;
        }
        remember(this.undo, this.state.users, userId);
        user.tier = 'free';
        return true;
    }

    async applyUpgrade(userId: string, until: Date): Promise<void> {
        const user = this.state.users.get(userId);
        if (user) {
            remember(this.undo, this.state.users, userId);
            user.tier = 'pro';
            user.usage = createEmptyUsage();
            user.quotaResetAt = until;
            user.premiumExpiresAt = until;
        }
    }

    async incrementUsage(userId: string, docType: DocumentType): Promise<void> {
        const user = this.state.users.get(userId);
        if (user) {
            remember(this.undo, this.state.users, userId);
            user.usage[docType] += 1;
        }
    }

    async findDueForRefresh(now: Date, limit: number, excludeChatIds: readonly string[] = []): Promise<User[]> {
        const due: User[] = [];
        for (const user of this.state.users.values()) {
            if (excludeChatIds.includes(user.chatId)) {
                continue;
            }
            const quotaDue = user.quotaResetAt.getTime() <= now.getTime();
            const premiumDue = user.tier === 'pro' && user.premiumExpiresAt !== null
                && user.premiumExpiresAt.getTime() <= now.getTime();
            if (quotaDue || premiumDue) {
                due.push(clone(user));
            }
            if (due.length >= limit) {
                break;
            }
        }
        return due;
    }

    async countByTier(): Promise<Record<Tier, number>> {
        const counts: Record<Tier, number> = { free: 0, pro: 0 };
        for (const user of this.state.users.values()) {
            counts[user.tier] += 1;
        }
        return counts;
    }
}

class MemoryJobRepository implements JobRepository {
    constructor(private readonly state: MemoryState, private readonly undo?: UndoLog) {}

    async findById(jobId: string): Promise<Job | null> {
        const job = this.state.jobs.get(jobId);
        return job ? clone(job) : null;
    }

    async findActive(userId: string): Promise<Job | null> {
        return this.newest(job => job.userId === userId && job.status !== 'closed');
    }

    async findLatestDelivered(userId: string): Promise<Job | null> {
        return this.newest(job => job.userId === userId && job.deliveredAt !== undefined);
    }

    async listRecent(userId: string, limit: number): Promise<Job[]> {
        return [...this.state.jobs.values()]
            .filter(job => job.userId === userId)
            .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
            .slice(0, limit)
            .map(clone);
    }

    /** A user has at most one job that is not closed */
    async insert(job: Job): Promise<void> {
        if (this.state.jobs.has(job.jobId)) {
            throw new Error(`Duplicate job id ${job.jobId}`);
        }
        if (job.status !== 'closed') {
            for (const other of this.state.jobs.values()) {
                if (other.userId === job.userId && other.status !== 'closed') {
                    throw new ConcurrentUpdateError(job.jobId);
                }
            }
        }
        remember(this.undo, this.state.jobs, job.jobId);
        this.state.jobs.set(job.jobId, clone(job));
    }

    async commit(job: Job, expected: JobVersion, options: CommitOptions = {}): Promise<Job> {
        const stored = this.state.jobs.get(job.jobId);
        if (!stored
            || stored.version !== expected.version
            || stored.lastProcessedMessageId !== expected.lastProcessedMessageId) {
            throw new ConcurrentUpdateError(job.jobId);
        }

        const next: Job = {
            ...clone(job),
            generated: options.clearGenerated ? {} : stored.generated,
            version: stored.version + 1
        };
        remember(this.undo, this.state.jobs, job.jobId);
        this.state.jobs.set(job.jobId, next);
        return clone(next);
    }

    async storeGenerated<K extends GenerationKind>(
        jobId: string,
        epoch: number,
        kind: K,
        value: GeneratedContent[K]
    ): Promise<boolean> {
        const stored = this.state.jobs.get(jobId);
        if (!stored || stored.epoch !== epoch) {
            return false;
        }
        remember(this.undo, this.state.jobs, jobId);
        stored.generated[kind] = clone(value);
        return true;
    }

    async countByStatus(): Promise<Record<JobStatus, number>> {
        const counts = createStatusCounts();
        for (const job of this.state.jobs.values()) {
            counts[job.status] += 1;
        }
        return counts;
    }

    private newest(predicate: (job: Job) => boolean): Job | null {
        const matches = [...this.state.jobs.values()]
            .filter(predicate)
            .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
        return matches.length > 0 ? clone(matches[0]) : null;
    }
}

class MemoryPaymentRepository implements PaymentRepository {
    constructor(private readonly state: MemoryState, private readonly undo?: UndoLog) {}

    async insert(payment: Payment): Promise<void> {
        if (this.state.payments.has(payment.reference)) {
            throw new Error(`Duplicate payment reference ${payment.reference}`);
        }
        remember(this.undo, this.state.payments, payment.reference);
        this.state.payments.set(payment.reference, clone(payment));
    }

    async findByReference(reference: string): Promise<Payment | null> {
        const payment = this.state.payments.get(reference);
        return payment ? clone(payment) : null;
    }

    async markProcessed(reference: string, status: Exclude<PaymentStatus, 'init'>, processedAt: Date): Promise<boolean> {
        const payment = this.state.payments.get(reference);
        if (!payment || payment.status !== 'init') {
            return false;
        }
        remember(this.undo, this.state.payments, reference);
        payment.status = status;
        payment.processedAt = processedAt;
        return true;
    }
}

/**
 * Process-local store used by tests and by STORAGE_DRIVER=memory.
 * Transactions are serialized. Each one keeps an undo log of the entries it
 * wrote, so a rollback leaves writes made outside it in place.
 */
export class InMemoryStore implements Store {
    private readonly state: MemoryState = { users: new Map(), jobs: new Map(), payments: new Map() };
    private queue: Promise<unknown> = Promise.resolve();

    readonly users: UserRepository = new MemoryUserRepository(this.state);
    readonly jobs: JobRepository = new MemoryJobRepository(this.state);
    readonly payments: PaymentRepository = new MemoryPaymentRepository(this.state);

    async transaction<T>(work: (tx: StoreContext) => Promise<T>): Promise<T> {
        const run = async (): Promise<T> => {
            const undo: UndoLog = [];
            const tx: StoreContext = {
                users: new MemoryUserRepository(this.state, undo),
                jobs: new MemoryJobRepository(this.state, undo),
                payments: new MemoryPaymentRepository(this.state, undo)
            };
            try {
                return await work(tx);
            } catch (error) {
                for (const step of undo.reverse()) {
                    step();
                }
                throw error;
            }
        };

        const result = this.queue.then(run, run);
        this.queue = result.catch(() => undefined);
        return result;
    }
}
