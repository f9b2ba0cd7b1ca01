import { ValidationError } from '../models/errors';
import { isValidEmail } from '../models/validation';

/**
 * Named input grammars for conversation steps. Each parser returns a
 * structured value or a ValidationError carrying an example; none of them guess.
 */
export type ParseResult<T> =
    | { ok: true; value: T }
    | { ok: false; error: ValidationError };

export const ok = <T>(value: T): ParseResult<T> => ({ ok: true, value });

export const fail = <T = never>(message: string, example?: string): ParseResult<T> => ({
    ok: false,
    error: new ValidationError(message, example)
});

const YES_WORDS = new Set(['yes', 'y', 'yeah', 'yep', 'sure', 'add', 'add another']);
const NO_WORDS = new Set(['no', 'n', 'nope', 'done']);
const DONE_WORDS = new Set(['done', 'skip', 'finish', 'finished', 'no']);
const CONFIRM_WORDS = new Set(['yes', 'y', 'confirm', 'okay', 'accept', 'good', 'looks good']);

export const normalizeWord = (text: string): string => text.trim().toLowerCase();

export const isDoneWord = (text: string): boolean => DONE_WORDS.has(normalizeWord(text));

export const isConfirmation = (text: string): boolean => CONFIRM_WORDS.has(normalizeWord(text));

export interface CsvSpec {
    fields: readonly string[];
    example: string;
    /** Extra commas are kept inside the last field (e.g. "Lagos, Nigeria") */
    absorbRest?: boolean;
}

/** Fixed-arity comma-separated fields; every field must be non-empty */
export const parseCsv = (text: string, spec: CsvSpec): ParseResult<string[]> => {
    const parts = text.split(',').map(part => part.trim());
    const arity = spec.fields.length;
    const format = spec.fields.join(', ');

    if (parts.length < arity) {
        return fail(`Please send ${arity} comma-separated values: ${format}`, spec.example);
    }
    if (parts.length > arity && !spec.absorbRest) {
        return fail(`Too many commas. Please send exactly ${arity} values: ${format}`, spec.example);
    }

    const values = parts.slice(0, arity - 1);
    values.push(parts.slice(arity - 1).join(', '));

    const emptyIndex = values.findIndex(value => value.length === 0);
    if (emptyIndex !== -1) {
        return fail(`${spec.fields[emptyIndex]} is missing. Please send: ${format}`, spec.example);
    }

    return ok(values);
};

/** Comma-separated list with a bounded number of non-empty items */
export const parseCsvList = (
    text: string,
    bounds: { min: number; max: number; label: string; example: string }
): ParseResult<string[]> => {
    const items = [...new Set(text.split(',').map(item => item.trim()).filter(item => item.length > 0))];
    if (items.length < bounds.min) {
        return fail(`Please list at least ${bounds.min} ${bounds.label}, separated by commas.`, bounds.example);
    }
    if (items.length > bounds.max) {
        return fail(`Please list at most ${bounds.max} ${bounds.label}.`, bounds.example);
    }
    return ok(items);
};

export const parseFreeText = (
    text: string,
    options: { minLength?: number; label: string; example: string }
): ParseResult<string> => {
    const value = text.trim();
    const minLength = options.minLength ?? 1;
    if (value.length < minLength) {
        return value.length === 0
            ? fail(`Please send your ${options.label}.`, options.example)
            : fail(`Your ${options.label} is too short. Please add a little more detail.`, options.example);
    }
    return ok(value);
};

export const parseYesNo = (text: string): ParseResult<boolean> => {
    const word = normalizeWord(text);
    if (YES_WORDS.has(word)) {
        return ok(true);
    }
    if (NO_WORDS.has(word)) {
        return ok(false);
    }
    return fail('Please reply yes or no.', 'yes');
};

const SELECTION_PATTERN = /^\d+(\s*,\s*\d+|\s+\d+)*$/;

export const looksLikeSelection = (text: string): boolean => SELECTION_PATTERN.test(text.trim());

/** 1-based numeric multi-selection, e.g. "1,3,5"; duplicates are ignored */
export const parseNumericSelection = (
    text: string,
    options: { available: number; min: number; max: number; example: string }
): ParseResult<number[]> => {
    if (!looksLikeSelection(text)) {
        return fail('Please send the numbers of your choices, separated by commas.', options.example);
    }

    const numbers = [...new Set(text.split(/[\s,]+/).filter(Boolean).map(part => Number(part)))];
    const outOfRange = numbers.find(number => number < 1 || number > options.available);
    if (outOfRange !== undefined) {
        return fail(`${outOfRange} is not on the list. Choose numbers from 1 to ${options.available}.`, options.example);
    }
    if (numbers.length < options.min || numbers.length > options.max) {
        return fail(`Please choose between ${options.min} and ${options.max} options.`, options.example);
    }
    return ok(numbers);
};

export const parseSingleSelection = (text: string, available: number): ParseResult<number> => {
    const value = text.trim();
    if (!/^\d+$/.test(value)) {
        return fail(`Please reply with a number from 1 to ${available}.`, '1');
    }
    const number = Number(value);
    if (number < 1 || number > available) {
        return fail(`Please reply with a number from 1 to ${available}.`, '1');
    }
    return ok(number);
};

export const SKILL_EXAMPLE = '1,3,5 or Python, SQL, Communication';

/**
 * Either a selection of 3 to 5 suggested skills by number, or at least 3
 * skills typed by hand.
 */
export const parseSkillInput = (text: string, suggestions: readonly string[] | undefined): ParseResult<string[]> => {
    if (looksLikeSelection(text)) {
        if (!suggestions || suggestions.length === 0) {
            return fail('The suggestions are not ready yet. Send continue to see them, or type your own skills.', 'Python, SQL, Communication');
        }
        const selection = parseNumericSelection(text, {
            available: suggestions.length,
            min: 3,
            max: 5,
            example: '1,3,5'
        });
        return selection.ok ? ok(selection.value.map(index => suggestions[index - 1])) : selection;
    }

    return parseCsvList(text, { min: 3, max: 10, label: 'skills', example: SKILL_EXAMPLE });
};

export const parseEmail = (email: string, example: string): ParseResult<string> => {
    return isValidEmail(email) ? ok(email) : fail(`"${email}" does not look like an email address.`, example);
};

const YEAR_PATTERN = /\b(19|20)\d{2}\b/;

export const hasYear = (text: string): boolean => YEAR_PATTERN.test(text);

/** A URL with or without scheme, e.g. linkedin.com/in/jane */
export const parseUrl = (value: string, example: string): ParseResult<string> => {
    const candidate = /^https?:\/\//i.test(value) ? value : `https://${value}`;
    try {
        const url = new URL(candidate);
        if (!url.hostname.includes('.') || /\s/.test(value)) {
            return fail(`"${value}" does not look like a link.`, example);
        }
        return ok(candidate);
    } catch {
        return fail(`"${value}" does not look like a link.`, example);
    }
};
