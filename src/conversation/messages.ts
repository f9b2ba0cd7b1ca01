import { EntitlementStatus, QuotaLine, TIER_LIMITS } from '../managers/EntitlementManager';
import { PricingOptions } from '../managers/PaymentManager';
import { Job } from '../types/Job';
import { DocumentType } from '../types/User';
import { documentDisplayName } from '../services/documentModel';
import { formatDate } from '../models/utils';

export const WELCOME = [
    'Welcome to your career document assistant!',
    '',
    'I can help you create a professional resume, CV or cover letter, or improve a resume you already have.',
    'Answer a few simple questions, and I will format everything and send you the finished document.',
    '',
    'Choose a document type below, or type resume, cv, cover letter or revamp.'
].join('\n');

export const HELP = [
    'How it works:',
    '1. Choose a document type: resume, cv, cover letter (premium) or revamp',
    '2. Answer the questions step by step',
    '3. Review the preview',
    '4. Receive your document',
    '',
    'Commands (type them at any time):',
    'menu - choose a document type',
    'status - your plan and remaining documents',
    'history - your recent documents',
    'upgrade - premium plan',
    'pdf - get your last document as PDF (premium)',
    'skip - skip an optional step',
    'continue - show AI suggestions once they are ready',
    'reset - discard your answers and start this document again',
    'help - show this message'
].join('\n');

export const GENERIC_APOLOGY = 'Sorry, something went wrong on our side. Please send your last message again.';

export const NOTHING_TO_RESET = 'There is nothing to reset. Choose a document type to begin.';

export const NO_ACTIVE_JOB = 'You have no document in progress. Choose a document type to begin.';

export const GENERATING_PLACEHOLDER = 'I am still generating this for you. Send continue again in a few seconds.';

export const RENDERING_IN_PROGRESS = 'Your document is being prepared. It will arrive shortly.';

export const DOCUMENT_SENT = 'Your document has been sent! Type pdf for a PDF copy (premium), or choose another document type.';

export const RENDER_FAILED = 'Sorry, I could not create your document. No document was counted against your plan. Reply yes to try again.';

export const ADMIN_ONLY = 'This command is only available to administrators.';

export const STEP_NOT_SKIPPABLE = 'This step is required and cannot be skipped.';

export const formatMoney = (pricing: PricingOptions, amount: number): string =>
    `${pricing.currency} ${amount.toLocaleString('en-US')}`;

export const validationReply = (message: string, example?: string): string =>
    example ? `${message}\n\nExample: ${example}` : message;

export const notAllowedReply = (docType: DocumentType): string => [
    `The ${documentDisplayName(docType)} is a premium feature.`,
    'Type upgrade to unlock it along with more documents and PDF export.'
].join('\n');

export const quotaExceededReply = (
    docType: DocumentType,
    limit: number,
    pricing: PricingOptions,
    paymentsEnabled: boolean
): string => {
    const lines = [`You have used all ${limit} ${documentDisplayName(docType)} generation${limit === 1 ? '' : 's'} in this cycle.`];
    if (paymentsEnabled) {
        lines.push(`Reply pay to buy this document for ${formatMoney(pricing, pricing.documentPrice)}, or type upgrade for the premium plan.`);
    } else {
        lines.push('Type upgrade for the premium plan, or wait for your quota to reset.');
    }
    return lines.join('\n');
};

export const pdfLockedReply = (pricing: PricingOptions): string => [
    'PDF export is a premium feature.',
    `Type upgrade to unlock it for ${formatMoney(pricing, pricing.premiumPrice)} per month.`
].join('\n');

const quotaLine = (label: string, line: QuotaLine): string =>
    line.limit === 'unlimited'
        ? `${label}: unlimited (${line.used} used)`
        : `${label}: ${line.remaining} of ${line.limit} left`;

export const formatStatus = (status: EntitlementStatus, activeJob: Job | null): string => {
    const lines = [status.isAdmin ? 'Account status: administrator' : `Account status: ${status.tier === 'pro' ? 'Premium' : 'Free'} plan`];
    lines.push('');
    lines.push(quotaLine('Resume', status.perType.resume));
    lines.push(quotaLine('CV', status.perType.cv));
    lines.push(quotaLine('Cover Letter', status.perType.cover_letter));
    lines.push(quotaLine('Revamp', status.perType.revamp));
    lines.push(`PDF export: ${status.pdfAllowed ? 'included' : 'premium only'}`);

    if (status.quotaResetAt) {
        lines.push(`Quota resets on: ${formatDate(status.quotaResetAt)}`);
    }
    if (status.premiumExpiresAt) {
        lines.push(`Premium active until: ${formatDate(status.premiumExpiresAt)}`);
    }
    if (activeJob && activeJob.status !== 'delivered') {
        lines.push('');
        lines.push(`In progress: ${documentDisplayName(activeJob.docType)} (${activeJob.status.replace(/_/g, ' ')})`);
    }
    return lines.join('\n');
};

export const formatHistory = (jobs: Job[]): string => {
    if (jobs.length === 0) {
        return 'You have not created any documents yet. Choose a document type to begin.';
    }
    const lines = ['Your recent documents:'];
    jobs.forEach((job, index) => {
        const name = job.answers.basics?.name ? ` for ${job.answers.basics.name}` : '';
        const state = job.deliveredAt ? `delivered ${formatDate(job.deliveredAt)}` : job.status.replace(/_/g, ' ');
        lines.push(`${index + 1}. ${documentDisplayName(job.docType)}${name} (${state})`);
    });
    return lines.join('\n');
};

export const upgradeOffer = (pricing: PricingOptions, checkoutUrl?: string): string => {
    const free = TIER_LIMITS.free.documents;
    const pro = TIER_LIMITS.pro.documents;
    const lines = [
        `Premium plan: ${formatMoney(pricing, pricing.premiumPrice)} per month`,
        '',
        `Free: ${free.resume} resume, ${free.cv} CV, ${free.revamp} revamp, no cover letters, DOCX only`,
        `Premium: ${pro.resume} resumes, ${pro.cv} CVs, ${pro.cover_letter} cover letter, ${pro.revamp} revamp, PDF export and 3 templates`,
        ''
    ];
    lines.push(checkoutUrl
        ? `Pay securely here: ${checkoutUrl}`
        : 'Online payment is not available right now. Please contact support to upgrade.');
    return lines.join('\n');
};

export const alreadyPremium = (status: EntitlementStatus): string =>
    ['You are already on the premium plan.', '', formatStatus(status, null)].join('\n');

export const paymentLinkReply = (pricing: PricingOptions, url: string): string => [
    `Pay ${formatMoney(pricing, pricing.documentPrice)} to generate this document: ${url}`,
    'I will let you know as soon as the payment is confirmed.'
].join('\n');

export const AWAITING_PAYMENT = 'I am waiting for your payment to be confirmed. I will message you as soon as it arrives.';

export const PAYMENTS_UNAVAILABLE = 'Online payment is not available right now. Type upgrade for the premium plan, or wait for your quota to reset.';
