import { DocumentType, Tier, User } from '../types/User';
import { GenerationKind, GeneratedContent, Job, JobStatus } from '../types/Job';
import { Payment, PaymentStatus } from '../types/Payment';

export interface UserRepository {
    findByChatId(chatId: string): Promise<User | null>;
    findById(userId: string): Promise<User | null>;
    /** Inserts the user, or returns the existing row when the chat id is already registered */
    create(user: User): Promise<User>;
    touch(userId: string, lastActive: Date, username?: string): Promise<void>;
    /** Zeroes all counters if the cycle has ended at `now`; false when another writer got there first */
    resetQuota(userId: string, now: Date, nextResetAt: Date): Promise<boolean>;
    /** Downgrades a pro user whose premium period has ended at `now` */
    expirePremium(userId: string, now: Date): Promise<boolean>;
    applyUpgrade(userId: string, until: Date): Promise<void>;
    incrementUsage(userId: string, docType: DocumentType): Promise<void>;
    /** Users with a due quota reset or premium expiry, skipping the given chats */
    findDueForRefresh(now: Date, limit: number, excludeChatIds?: readonly string[]): Promise<User[]>;
    countByTier(): Promise<Record<Tier, number>>;
}

export interface JobVersion {
    version: number;
    lastProcessedMessageId: string | null;
}

export interface CommitOptions {
    /** Drop cached AI output, used when answers are discarded */
    clearGenerated?: boolean;
}

export interface JobRepository {
    findById(jobId: string): Promise<Job | null>;
    /** Newest non-closed job for the user */
    findActive(userId: string): Promise<Job | null>;
    findLatestDelivered(userId: string): Promise<Job | null>;
    listRecent(userId: string, limit: number): Promise<Job[]>;
    insert(job: Job): Promise<void>;
    /**
     * Compare-and-set on version and last processed message id.
     * Throws ConcurrentUpdateError when the stored job no longer matches `expected`.
     */
    commit(job: Job, expected: JobVersion, options?: CommitOptions): Promise<Job>;
    /** Writes one AI result; ignored if the job was reset since the request */
    storeGenerated<K extends GenerationKind>(jobId: string, epoch: number, kind: K, value: GeneratedContent[K]): Promise<boolean>;
    countByStatus(): Promise<Record<JobStatus, number>>;
}

export interface PaymentRepository {
    insert(payment: Payment): Promise<void>;
    findByReference(reference: string): Promise<Payment | null>;
    /** Moves an 'init' payment to a final status; false if it was already processed */
    markProcessed(reference: string, status: Exclude<PaymentStatus, 'init'>, processedAt: Date): Promise<boolean>;
}

export interface StoreContext {
    users: UserRepository;
    jobs: JobRepository;
    payments: PaymentRepository;
}

export interface Store extends StoreContext {
    /** Runs `work` so that every write through `tx` commits together or not at all */
    transaction<T>(work: (tx: StoreContext) => Promise<T>): Promise<T>;
}
