// Type guards for values that arrive as untyped strings (commands, webhooks, env)
import { DOCUMENT_TYPES, DocumentType } from '../types/User';
import { PaymentPurpose } from '../types/Payment';
import { TemplateId } from '../types/Job';

export const isDocumentType = (value: unknown): value is DocumentType => {
    return typeof value === 'string' && DOCUMENT_TYPES.some(type => type === value);
};

export const isPaymentPurpose = (value: unknown): value is PaymentPurpose => {
    return value === 'premium_upgrade' || isDocumentType(value);
};

export const isTemplateId = (value: unknown): value is TemplateId => {
    return value === 'template_1' || value === 'template_2' || value === 'template_3';
};

export const isRecord = (value: unknown): value is Record<string, unknown> => {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
};

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export const isValidEmail = (value: string): boolean => EMAIL_PATTERN.test(value);
