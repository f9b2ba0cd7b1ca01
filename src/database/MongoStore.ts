import { ClientSession, MongoClient, MongoError, MongoServerError, UpdateFilter } from 'mongodb';
import { ConcurrentUpdateError, PersistenceError } from '../models/errors';
import { Payment, PaymentStatus } from '../types/Payment';
import { GenerationKind, GeneratedContent, Job, JobStatus, createStatusCounts } from '../types/Job';
import { createEmptyUsage, DocumentType, Tier, User } from '../types/User';
import { Collections, JobDocument } from './Collections';
import {
    CommitOptions,
    JobRepository,
    JobVersion,
    PaymentRepository,
    Store,
    StoreContext,
    UserRepository
} from './Store';

const WITHOUT_ID = { _id: 0 } as const;
const JOB_FIELDS = { _id: 0, openJobOwner: 0 } as const;

const DUPLICATE_KEY = 11000;

class MongoUserRepository implements UserRepository {
    constructor(private readonly collections: Collections, private readonly session?: ClientSession) {}

    async findByChatId(chatId: string): Promise<User | null> {
        return this.collections.users.findOne({ chatId }, { projection: WITHOUT_ID, session: this.session });
    }

    async findById(userId: string): Promise<User | null> {
        return this.collections.users.findOne({ userId }, { projection: WITHOUT_ID, session: this.session });
    }

    async create(user: User): Promise<User> {
        // Upsert keeps two first messages from the same chat from creating two rows
        await this.collections.users.updateOne(
            { chatId: user.chatId },
            { $setOnInsert: { ...user } },
            { upsert: true, session: this.session }
        );
        const stored = await this.findByChatId(user.chatId);
        return stored ?? user;
    }

    async touch(userId: string, lastActive: Date, username?: string): Promise<void> {
        await this.collections.users.updateOne(
            { userId },
            { $set: username ? { lastActive, username } : { lastActive } },
            { session: this.session }
        );
    }

    async resetQuota(userId: string, now: Date, nextResetAt: Date): Promise<boolean> {
        const result = await this.collections.users.updateOne(
            { userId, quotaResetAt: { $lte: now } },
            { $set: { usage: createEmptyUsage(), quotaResetAt: nextResetAt } },
            { session: this.session }
        );
        return result.modifiedCount === 1;
    }

    async expirePremium(userId: string, now: Date): Promise<boolean> {
        const result = await this.collections.users.updateOne(
            { userId, tier: 'pro', premiumExpiresAt: { $ne: null, $lte: now } },
            { $set: { tier: 'free' } },
            { session: this.session }
        );
        return result.modifiedCount === 1;
    }

    async applyUpgrade(userId: string, until: Date): Promise<void> {
        await this.collections.users.updateOne(
            { userId },
            { $set: { tier: 'pro', usage: createEmptyUsage(), quotaResetAt: until, premiumExpiresAt: until } },
            { session: this.session }
        );
    }

    async incrementUsage(userId: string, docType: DocumentType): Promise<void> {
        await this.collections.users.updateOne(
            { userId },
            { $inc: { [`usage.${docType}`]: 1 } },
            { session: this.session }
        );
    }

    async findDueForRefresh(now: Date, limit: number, excludeChatIds: readonly string[] = []): Promise<User[]> {
        return this.collections.users
            .find(
                {
                    chatId: { $nin: [...excludeChatIds] },
                    $or: [
                        { quotaResetAt: { $lte: now } },
                        { tier: 'pro', premiumExpiresAt: { $ne: null, $lte: now } }
                    ]
                },
                { projection: WITHOUT_ID, session: this.session }
            )
            .limit(limit)
            .toArray();
    }

    async countByTier(): Promise<Record<Tier, number>> {
        const [free, pro] = await Promise.all([
            this.collections.users.countDocuments({ tier: 'free' }, { session: this.session }),
            this.collections.users.countDocuments({ tier: 'pro' }, { session: this.session })
        ]);
        return { free, pro };
    }
}

class MongoJobRepository implements JobRepository {
    constructor(private readonly collections: Collections, private readonly session?: ClientSession) {}

    async findById(jobId: string): Promise<Job | null> {
        return this.collections.jobs.findOne({ jobId }, { projection: JOB_FIELDS, session: this.session });
    }

    async findActive(userId: string): Promise<Job | null> {
        return this.collections.jobs.findOne(
            { userId, status: { $ne: 'closed' } },
            { projection: JOB_FIELDS, sort: { createdAt: -1 }, session: this.session }
        );
    }

    async findLatestDelivered(userId: string): Promise<Job | null> {
        return this.collections.jobs.findOne(
            { userId, deliveredAt: { $exists: true } },
            { projection: JOB_FIELDS, sort: { createdAt: -1 }, session: this.session }
        );
    }

    async listRecent(userId: string, limit: number): Promise<Job[]> {
        return this.collections.jobs
            .find({ userId }, { projection: JOB_FIELDS, session: this.session })
            .sort({ createdAt: -1 })
            .limit(limit)
            .toArray();
    }

    async insert(job: Job): Promise<void> {
        const document: JobDocument = job.status === 'closed' ? { ...job } : { ...job, openJobOwner: job.userId };
        await this.collections.jobs.insertOne(document, { session: this.session }).catch((error: unknown) => {
            if (error instanceof MongoServerError && error.code === DUPLICATE_KEY && error.message.includes('openJobOwner')) {
                throw new ConcurrentUpdateError(job.jobId);
            }
            throw error;
        });
    }

    async commit(job: Job, expected: JobVersion, options: CommitOptions = {}): Promise<Job> {
        // The AI cache and the version counter are never written from a turn's copy of the job
        const { generated: _generated, version: _version, ...fields } = job;
        const written = options.clearGenerated ? { ...fields, generated: {} } : fields;
        const update: UpdateFilter<JobDocument> = job.status === 'closed'
            ? { $set: written, $unset: { openJobOwner: '' }, $inc: { version: 1 } }
            : { $set: { ...written, openJobOwner: job.userId }, $inc: { version: 1 } };
        const updated = await this.collections.jobs.findOneAndUpdate(
            {
                jobId: job.jobId,
                version: expected.version,
                lastProcessedMessageId: expected.lastProcessedMessageId
            },
            update,
            { returnDocument: 'after', projection: JOB_FIELDS, session: this.session }
        ).catch((error: unknown) => {
            throw new PersistenceError('job commit', error);
        });

        if (!updated) {
            throw new ConcurrentUpdateError(job.jobId);
        }
        return updated;
    }

    async storeGenerated<K extends GenerationKind>(
        jobId: string,
        epoch: number,
        kind: K,
        value: GeneratedContent[K]
    ): Promise<boolean> {
        const result = await this.collections.jobs.updateOne(
            { jobId, epoch },
            { $set: { [`generated.${kind}`]: value } },
            { session: this.session }
        );
        return result.matchedCount === 1;
    }

    async countByStatus(): Promise<Record<JobStatus, number>> {
        const rows = await this.collections.jobs
            .aggregate<{ _id: JobStatus; count: number }>(
                [{ $group: { _id: '$status', count: { $sum: 1 } } }],
                { session: this.session }
            )
            .toArray();

        const counts = createStatusCounts();
        for (const row of rows) {
            counts[row._id] = row.count;
        }
        return counts;
    }
}

class MongoPaymentRepository implements PaymentRepository {
    constructor(private readonly collections: Collections, private readonly session?: ClientSession) {}

    async insert(payment: Payment): Promise<void> {
        await this.collections.payments.insertOne({ ...payment }, { session: this.session });
    }

    async findByReference(reference: string): Promise<Payment | null> {
        return this.collections.payments.findOne({ reference }, { projection: WITHOUT_ID, session: this.session });
    }

    async markProcessed(reference: string, status: Exclude<PaymentStatus, 'init'>, processedAt: Date): Promise<boolean> {
        const result = await this.collections.payments.updateOne(
            { reference, status: 'init' },
            { $set: { status, processedAt } },
            { session: this.session }
        );
        return result.modifiedCount === 1;
    }
}

/**
 * Store backed by the official MongoDB driver. Transactions need a replica set
 * (a single-node replica set is enough).
 */
export class MongoStore implements Store {
    readonly users: UserRepository;
    readonly jobs: JobRepository;
    readonly payments: PaymentRepository;

    constructor(private readonly client: MongoClient, private readonly collections: Collections) {
        this.users = new MongoUserRepository(collections);
        this.jobs = new MongoJobRepository(collections);
        this.payments = new MongoPaymentRepository(collections);
    }

    async transaction<T>(work: (tx: StoreContext) => Promise<T>): Promise<T> {
        const session = this.client.startSession();
        const tx: StoreContext = {
            users: new MongoUserRepository(this.collections, session),
            jobs: new MongoJobRepository(this.collections, session),
            payments: new MongoPaymentRepository(this.collections, session)
        };

        try {
            session.startTransaction();
            const result = await work(tx);
            await session.commitTransaction();
            return result;
        } catch (error) {
            if (session.inTransaction()) {
                await session.abortTransaction();
            }
            throw error instanceof MongoError ? new PersistenceError('transaction', error) : error;
        } finally {
            await session.endSession();
        }
    }
}
