import dotenv from 'dotenv';
import { LOG_LEVELS, LogLevel } from '../utils/logger';
import { validateConfig } from './validation';

// Load environment variables
dotenv.config();

export type StorageDriver = 'mongodb' | 'memory';

export interface AppConfig {
    botToken: string;
    storageDriver: StorageDriver;
    mongodbUri: string;
    mongodbDbName: string;
    nodeEnv: string;
    port: number;
    adminChatIds: string[];
    logLevel: LogLevel;
    openaiApiKey: string;
    openaiModel: string;
    aiTimeoutMs: number;
    paystackSecret: string;
    publicUrl: string;
    currency: string;
    premiumPrice: number;
    documentPrice: number;
    quotaCycleDays: number;
    entitlementSweepIntervalHours: number;
}

const parseStorageDriver = (value: string): StorageDriver => {
    if (value !== 'mongodb' && value !== 'memory') {
        throw new Error('STORAGE_DRIVER must be one of: mongodb, memory');
    }
    return value;
};

const parseLogLevel = (value: string): LogLevel => {
    const level = LOG_LEVELS.find(candidate => candidate === value);
    if (!level) {
        throw new Error(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
    }
    return level;
};

export class Config {
    private static instance: AppConfig;

    public static getInstance(): AppConfig {
        if (!Config.instance) {
            Config.instance = Config.loadConfig(process.env);
        }
        return Config.instance;
    }

    public static loadConfig(env: NodeJS.ProcessEnv): AppConfig {
        const storageDriver = parseStorageDriver(env.STORAGE_DRIVER || 'mongodb');
        const requiredEnvVars = storageDriver === 'mongodb' ? ['BOT_TOKEN', 'MONGODB_URI'] : ['BOT_TOKEN'];

        for (const envVar of requiredEnvVars) {
            if (!env[envVar]) {
                throw new Error(`Required environment variable ${envVar} is not set`);
            }
        }

        const mongodbUri = env.MONGODB_URI || '';
        const dbNameFromUri = (() => {
            try {
                const name = new URL(mongodbUri).pathname.replace(/^\//, '');
                return name || undefined;
            } catch {
                return undefined;
            }
        })();

        const config: AppConfig = {
            botToken: env.BOT_TOKEN || '',
            storageDriver,
            mongodbUri,
            mongodbDbName: env.MONGODB_DB_NAME || dbNameFromUri || 'document-assistant',
            nodeEnv: env.NODE_ENV || 'development',
            port: parseInt(env.PORT || '3000', 10),
            adminChatIds: env.ADMIN_CHAT_IDS
                ? env.ADMIN_CHAT_IDS.split(',').map(id => id.trim()).filter(id => id.length > 0)
                : [],
            logLevel: parseLogLevel(env.LOG_LEVEL || 'info'),
            openaiApiKey: env.OPENAI_API_KEY || '',
            openaiModel: env.OPENAI_MODEL || 'gpt-4o-mini',
            aiTimeoutMs: parseInt(env.AI_TIMEOUT_MS || '20000', 10),
            paystackSecret: env.PAYSTACK_SECRET || '',
            publicUrl: env.PUBLIC_URL || '',
            currency: env.PAYMENT_CURRENCY || 'NGN',
            premiumPrice: parseInt(env.PREMIUM_PRICE || '7500', 10),
            documentPrice: parseInt(env.DOCUMENT_PRICE || '7500', 10),
            quotaCycleDays: parseInt(env.QUOTA_CYCLE_DAYS || '30', 10),
            entitlementSweepIntervalHours: parseInt(env.ENTITLEMENT_SWEEP_INTERVAL_HOURS || '0', 10)
        };

        validateConfig(config);
        return config;
    }
}

// Re-export validateConfig for convenience
export { validateConfig };
