import { MongoClient, Db, MongoClientOptions } from 'mongodb';
import { logger } from '../utils/logger';

const log = logger.child('mongodb');

export interface ConnectionOptions {
    maxRetries?: number;
    /** Delay before the first retry; doubles on each further attempt */
    retryDelayMs?: number;
}

const CLIENT_OPTIONS: MongoClientOptions = {
    appName: 'career-document-bot',
    serverSelectionTimeoutMS: 5000,
    connectTimeoutMS: 10000,
    socketTimeoutMS: 45000,
    // Optional fields are omitted instead of stored as null
    ignoreUndefined: true
};

export class DatabaseConnection {
    private client: MongoClient | null = null;
    private db: Db | null = null;
    private readonly maxRetries: number;
    private readonly retryDelayMs: number;

    constructor(
        private readonly uri: string,
        private readonly databaseName: string,
        options: ConnectionOptions = {}
    ) {
        this.maxRetries = options.maxRetries ?? 5;
        this.retryDelayMs = options.retryDelayMs ?? 1000;
    }

    async connect(): Promise<void> {
        let lastError: Error | null = null;

        for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
            const client = new MongoClient(this.uri, CLIENT_OPTIONS);
            try {
                log.info(`Connecting to MongoDB (attempt ${attempt}/${this.maxRetries})`);
                await client.connect();

                const db = client.db(this.databaseName);
                await this.checkTransactionSupport(db);

                this.client = client;
                this.db = db;
                log.info(`Connected to MongoDB database: ${this.databaseName}`);
                return;
            } catch (error) {
                lastError = error instanceof Error ? error : new Error(String(error));
                log.error(`Connection attempt ${attempt} failed`, { error: lastError });
                await client.close().catch(closeError => log.warn('Could not close failed client', { error: closeError }));

                if (attempt < this.maxRetries) {
                    const wait = this.retryDelayMs * 2 ** (attempt - 1);
                    log.info(`Retrying in ${wait}ms...`);
                    await new Promise(resolve => setTimeout(resolve, wait));
                }
            }
        }

        throw new Error(`Failed to connect to MongoDB after ${this.maxRetries} attempts. Last error: ${lastError?.message}`);
    }

    async disconnect(): Promise<void> {
        if (this.client) {
            await this.client.close();
            this.client = null;
            this.db = null;
            log.info('Disconnected from MongoDB');
        }
    }

    getDatabase(): Db {
        if (!this.db) {
            throw new Error('Database connection not established. Call connect() first.');
        }
        return this.db;
    }

    /** Sessions for multi-document transactions are opened on the client */
    getClient(): MongoClient {
        if (!this.client) {
            throw new Error('Database connection not established. Call connect() first.');
        }
        return this.client;
    }

    isConnected(): boolean {
        return this.client !== null && this.db !== null;
    }

    /**
     * Delivery and payment commits need transactions, which a standalone
     * server rejects. Fail at startup rather than on the first delivery.
     */
    private async checkTransactionSupport(db: Db): Promise<void> {
        const hello = await db.admin().command({ hello: 1 });
        const replicaSet: unknown = hello.setName;
        const mongos = hello.msg === 'isdbgrid';
        if (typeof replicaSet !== 'string' && !mongos) {
            throw new Error('MongoDB must run as a replica set or sharded cluster to support transactions');
        }
    }
}
