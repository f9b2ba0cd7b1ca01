import { DocumentType } from '../types/User';
import { isDocumentType } from '../models/validation';

export type Command =
    | { kind: 'menu' }
    | { kind: 'help' }
    | { kind: 'reset' }
    | { kind: 'status' }
    | { kind: 'history' }
    | { kind: 'upgrade' }
    | { kind: 'pdf' }
    | { kind: 'skip' }
    | { kind: 'wake' }
    /** `explicit` when it came from a menu button rather than typed text */
    | { kind: 'select'; docType: DocumentType; explicit: boolean }
    | { kind: 'new'; docType: DocumentType }
    | { kind: 'admin_stats' }
    | { kind: 'admin_setpro'; chatId: string | null };

const SIMPLE_COMMANDS: ReadonlyMap<string, Command> = new Map<string, Command>([
    ['start', { kind: 'menu' }],
    ['menu', { kind: 'menu' }],
    ['hi', { kind: 'menu' }],
    ['hello', { kind: 'menu' }],
    ['help', { kind: 'help' }],
    ['reset', { kind: 'reset' }],
    ['restart', { kind: 'reset' }],
    ['status', { kind: 'status' }],
    ['history', { kind: 'history' }],
    ['upgrade', { kind: 'upgrade' }],
    ['premium', { kind: 'upgrade' }],
    ['pdf', { kind: 'pdf' }],
    ['skip', { kind: 'skip' }],
    ['stats', { kind: 'admin_stats' }]
]);

// Polls the AI cache for the current step
export const WAKE_WORDS: ReadonlySet<string> = new Set(['continue', 'ready', 'show', 'generate', 'next', 'proceed', 'go', 'ok']);

const DOCUMENT_ALIASES: ReadonlyMap<string, DocumentType> = new Map<string, DocumentType>([
    ['resume', 'resume'],
    ['cv', 'cv'],
    ['cover', 'cover_letter'],
    ['cover letter', 'cover_letter'],
    ['cover_letter', 'cover_letter'],
    ['coverletter', 'cover_letter'],
    ['revamp', 'revamp'],
    ['revamp resume', 'revamp']
]);

export const documentTypeFromText = (text: string): DocumentType | null => {
    const normalized = text.trim().toLowerCase().replace(/\s+/g, ' ');
    if (isDocumentType(normalized)) {
        return normalized;
    }
    return DOCUMENT_ALIASES.get(normalized) ?? null;
};

/**
 * Recognizes command tokens. The leading slash is optional and matching is
 * case-insensitive. Returns null for anything that should go to the current step.
 */
export const parseCommand = (text: string): Command | null => {
    const normalized = text.trim().toLowerCase()
        .replace(/^\/(\S+?)@\S+/, '/$1') // group chats append the bot name
        .replace(/^\//, '')
        .replace(/\s+/g, ' ');
    if (normalized.length === 0) {
        return null;
    }

    const simple = SIMPLE_COMMANDS.get(normalized);
    if (simple) {
        return simple;
    }
    if (WAKE_WORDS.has(normalized)) {
        return { kind: 'wake' };
    }

    if (normalized.startsWith('choose_')) {
        const docType = documentTypeFromText(normalized.slice('choose_'.length));
        return docType ? { kind: 'select', docType, explicit: true } : null;
    }

    const [head, ...rest] = normalized.split(' ');
    if (head === 'new' && rest.length > 0) {
        const docType = documentTypeFromText(rest.join(' '));
        return docType ? { kind: 'new', docType } : null;
    }
    if (head === 'setpro') {
        return { kind: 'admin_setpro', chatId: rest.length === 1 ? rest[0] : null };
    }

    const docType = documentTypeFromText(normalized);
    return docType ? { kind: 'select', docType, explicit: false } : null;
};
