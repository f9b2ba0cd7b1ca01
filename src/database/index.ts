// Export database connection and utilities
export { DatabaseConnection } from './DatabaseConnection';
export { Collections } from './Collections';
export { MongoStore } from './MongoStore';
export { InMemoryStore } from './InMemoryStore';
export * from './Store';

import { DatabaseConnection } from './DatabaseConnection';
import { Collections } from './Collections';
import { MongoStore } from './MongoStore';

export class DatabaseManager {
    private connection: DatabaseConnection;
    private store: MongoStore | null = null;

    constructor(connectionString: string, databaseName: string) {
        this.connection = new DatabaseConnection(connectionString, databaseName);
    }

    async initialize(): Promise<MongoStore> {
        await this.connection.connect();
        const db = this.connection.getDatabase();

        const collections = new Collections(db);
        await collections.ensureCollectionsExist();
        await collections.initializeCollections();

        this.store = new MongoStore(this.connection.getClient(), collections);
        return this.store;
    }

    async disconnect(): Promise<void> {
        await this.connection.disconnect();
        this.store = null;
    }

    getStore(): MongoStore {
        if (!this.store) {
            throw new Error('Database not initialized. Call initialize() first.');
        }
        return this.store;
    }

    isConnected(): boolean {
        return this.connection.isConnected();
    }
}
