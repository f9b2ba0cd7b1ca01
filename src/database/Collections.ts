import { Collection, Db } from 'mongodb';
import { User } from '../types/User';
import { Job } from '../types/Job';
import { Payment } from '../types/Payment';
import { logger } from '../utils/logger';

const log = logger.child('collections');

/**
 * Stored job shape. `openJobOwner` holds the userId while the job is not
 * closed; a unique index on it allows one open job per user.
 */
export type JobDocument = Job & { openJobOwner?: string };

const COLLECTION_NAMES = ['users', 'jobs', 'payments'] as const;

export class Collections {
    private db: Db;

    // Collection references
    public users: Collection<User>;
    public jobs: Collection<JobDocument>;
    public payments: Collection<Payment>;

    constructor(db: Db) {
        this.db = db;

        this.users = db.collection<User>('users');
        this.jobs = db.collection<JobDocument>('jobs');
        this.payments = db.collection<Payment>('payments');
    }

    async initializeCollections(): Promise<void> {
        log.info('Initializing MongoDB collections and indexes');

        try {
            await this.users.createIndex({ userId: 1 }, { unique: true });
            await this.users.createIndex({ chatId: 1 }, { unique: true });
            // Used by the entitlement sweep
            await this.users.createIndex({ quotaResetAt: 1 });
            await this.users.createIndex({ premiumExpiresAt: 1 });

            await this.jobs.createIndex({ jobId: 1 }, { unique: true });
            await this.jobs.createIndex({ userId: 1, status: 1 });
            await this.jobs.createIndex({ userId: 1, createdAt: -1 });
            await this.jobs.createIndex({ lastProcessedMessageId: 1 });
            await this.jobs.createIndex(
                { openJobOwner: 1 },
                { unique: true, partialFilterExpression: { openJobOwner: { $exists: true } } }
            );

            await this.payments.createIndex({ reference: 1 }, { unique: true });
            await this.payments.createIndex({ userId: 1 });

            log.info('Successfully initialized all collections and indexes');
        } catch (error) {
            log.error('Error initializing collections', { error });
            throw error;
        }
    }

    async ensureCollectionsExist(): Promise<void> {
        const existingCollections = await this.db.listCollections().toArray();
        const existingNames = existingCollections.map(col => col.name);

        for (const collectionName of COLLECTION_NAMES) {
            if (!existingNames.includes(collectionName)) {
                await this.db.createCollection(collectionName);
                log.info(`Created collection: ${collectionName}`);
            }
        }
    }
}
