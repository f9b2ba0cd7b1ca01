// Utility functions for ID generation and date arithmetic
import { v4 as uuidv4 } from 'uuid';

const DAY_MS = 24 * 60 * 60 * 1000;

export const generateUserId = (): string => {
    return uuidv4();
};

export const generateJobId = (): string => {
    return `job_${uuidv4()}`;
};

export const generatePaymentReference = (purpose: string): string => {
    return `${purpose.replace(/_/g, '-')}-${uuidv4()}`;
};

export const addDays = (date: Date, days: number): Date => {
    return new Date(date.getTime() + days * DAY_MS);
};

export const formatDate = (date: Date): string => {
    return date.toISOString().slice(0, 10);
};

// Keeps log lines free of full chat identifiers
export const anonymizeChatId = (chatId: string): string => {
    if (chatId.length <= 4) {
        return '****';
    }
    return `${chatId.slice(0, 2)}***${chatId.slice(-2)}`;
};

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
