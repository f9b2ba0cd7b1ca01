import { AppConfig } from './Config';
import { LOG_LEVELS } from '../utils/logger';

export function validateConfig(config: AppConfig): void {
    // Validate bot token format (should be a valid Telegram bot token)
    if (!config.botToken.match(/^\d+:[A-Za-z0-9_-]{35}$/)) {
        throw new Error('Invalid BOT_TOKEN format. Expected format: 123456789:ABCdefGHIjklMNOpqrSTUvwxYZ123456789');
    }

    if (config.storageDriver !== 'mongodb' && config.storageDriver !== 'memory') {
        throw new Error('STORAGE_DRIVER must be one of: mongodb, memory');
    }

    // Validate MongoDB URI format
    if (config.storageDriver === 'mongodb'
        && !config.mongodbUri.startsWith('mongodb://')
        && !config.mongodbUri.startsWith('mongodb+srv://')) {
        throw new Error('Invalid MONGODB_URI format. Must start with mongodb:// or mongodb+srv://');
    }

    // Validate port range
    if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
        throw new Error('PORT must be between 1 and 65535');
    }

    for (const chatId of config.adminChatIds) {
        if (!/^-?\d+$/.test(chatId) || chatId === '0') {
            throw new Error('All ADMIN_CHAT_IDS must be valid non-zero integers');
        }
    }

    if (!LOG_LEVELS.includes(config.logLevel)) {
        throw new Error(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
    }

    if (!Number.isInteger(config.aiTimeoutMs) || config.aiTimeoutMs < 1000) {
        throw new Error('AI_TIMEOUT_MS must be at least 1000');
    }

    if (!Number.isInteger(config.quotaCycleDays) || config.quotaCycleDays < 1) {
        throw new Error('QUOTA_CYCLE_DAYS must be at least 1');
    }

    if (!Number.isInteger(config.premiumPrice) || config.premiumPrice < 0
        || !Number.isInteger(config.documentPrice) || config.documentPrice < 0) {
        throw new Error('PREMIUM_PRICE and DOCUMENT_PRICE must be non-negative integers');
    }

    if (!Number.isInteger(config.entitlementSweepIntervalHours) || config.entitlementSweepIntervalHours < 0) {
        throw new Error('ENTITLEMENT_SWEEP_INTERVAL_HOURS must be 0 (disabled) or a positive integer');
    }

    if (config.paystackSecret && !config.publicUrl) {
        throw new Error('PUBLIC_URL is required when PAYSTACK_SECRET is set');
    }
}
