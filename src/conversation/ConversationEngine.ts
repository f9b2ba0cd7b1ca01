import { Store } from '../database/Store';
import { AdminPolicy } from '../managers/AdminPolicy';
import { ContentGenerationManager } from '../managers/ContentGenerationManager';
import { EntitlementManager } from '../managers/EntitlementManager';
import { IdempotencyFilter } from '../managers/IdempotencyFilter';
import { PaymentManager } from '../managers/PaymentManager';
import { StatisticsManager } from '../managers/StatisticsManager';
import { documentDisplayName } from '../services/documentModel';
import { DocumentFormat, InboundMessage, RenderRequest, ResponseDirective } from '../types/Directive';
import { createEmptyAnswers, Job } from '../types/Job';
import { createEmptyUsage, DocumentType, User } from '../types/User';
import {
    AppError,
    ConcurrentUpdateError,
    DuplicateMessageError,
    EntitlementDeniedError,
    QuotaExceededError
} from '../models/errors';
import {
    anonymizeChatId,
    Clock,
    formatDate,
    generateJobId,
    generatePaymentReference,
    generateUserId,
    systemClock
} from '../models/utils';
import { logger } from '../utils/logger';
import { Command, parseCommand } from './commands';
import {
    ADMIN_ONLY,
    alreadyPremium,
    formatHistory,
    formatStatus,
    GENERIC_APOLOGY,
    HELP,
    NO_ACTIVE_JOB,
    NOTHING_TO_RESET,
    notAllowedReply,
    paymentLinkReply,
    pdfLockedReply,
    quotaExceededReply,
    STEP_NOT_SKIPPABLE,
    upgradeOffer,
    WELCOME
} from './messages';
import { enterStep, firstStep, handleStep, SKIPPABLE_STEPS, StepContext, StepEffect, StepOutcome } from './steps';

const log = logger.child('engine');

const HISTORY_LIMIT = 5;

export interface ConversationEngineDeps {
    store: Store;
    entitlements: EntitlementManager;
    adminPolicy: AdminPolicy;
    idempotency: IdempotencyFilter;
    generation: ContentGenerationManager;
    payments: PaymentManager;
    statistics: StatisticsManager;
    clock?: Clock;
}

/** What a turn wants written back against the job it loaded */
interface Turn {
    directive: ResponseDirective;
    job?: Job;
    clearGenerated?: boolean;
    effects?: StepEffect[];
}

/** A turn that closes the loaded job (if any) and starts another */
interface Replacement {
    replacement: Job;
    outcome: StepOutcome;
}

const reply = (text: string, menu = false): ResponseDirective =>
    menu ? { kind: 'reply', text, menu: 'documents' } : { kind: 'reply', text };

const NOOP: ResponseDirective = { kind: 'noop' };

export const buildRenderRequest = (job: Job, chatId: string, format: DocumentFormat): RenderRequest => ({
    jobId: job.jobId,
    chatId,
    docType: job.docType,
    template: job.answers.template ?? 'template_1',
    format,
    answers: job.answers,
    generated: job.generated
});

/**
 * Turns one inbound message into one directive. Each turn loads the user and
 * the active job, runs the lazy entitlement checks, and commits the job with
 * a compare-and-set that also records the message id.
 */
export class ConversationEngine {
    private readonly store: Store;
    private readonly entitlements: EntitlementManager;
    private readonly adminPolicy: AdminPolicy;
    private readonly idempotency: IdempotencyFilter;
    private readonly generation: ContentGenerationManager;
    private readonly payments: PaymentManager;
    private readonly statistics: StatisticsManager;
    private readonly clock: Clock;

    constructor(deps: ConversationEngineDeps) {
        this.store = deps.store;
        this.entitlements = deps.entitlements;
        this.adminPolicy = deps.adminPolicy;
        this.idempotency = deps.idempotency;
        this.generation = deps.generation;
        this.payments = deps.payments;
        this.statistics = deps.statistics;
        this.clock = deps.clock ?? systemClock;
    }

    async handleInbound(message: InboundMessage): Promise<ResponseDirective> {
        try {
            return await this.processInbound(message);
        } catch (error) {
            if (error instanceof ConcurrentUpdateError || error instanceof DuplicateMessageError) {
                log.debug('Dropped duplicate or concurrent message', { messageId: message.messageId, reason: error.name });
                return NOOP;
            }
            if (error instanceof AppError && error.userVisible) {
                return reply(error.message);
            }
            log.error('Failed to handle message', {
                chatId: anonymizeChatId(message.chatId),
                messageId: message.messageId,
                error
            });
            return reply(GENERIC_APOLOGY);
        }
    }

    private async processInbound(message: InboundMessage): Promise<ResponseDirective> {
        const loaded = await this.loadUser(message);
        const active = await this.store.jobs.findActive(loaded.userId);

        if (active) {
            this.idempotency.assertFresh(active, message.messageId);
        }

        const user = await this.entitlements.refresh(loaded);
        const command = parseCommand(message.text);

        const turn = await this.dispatch(user, active, message, command).catch((error: unknown): Turn => {
            // Refusals still count as a processed message
            if (error instanceof EntitlementDeniedError || error instanceof QuotaExceededError) {
                return { directive: this.refusal(error) };
            }
            throw error;
        });
        if ('replacement' in turn) {
            return this.startJob(user, active, message, turn);
        }
        return this.commitTurn(user, active, message, turn);
    }

    private refusal(error: EntitlementDeniedError | QuotaExceededError): ResponseDirective {
        const pricing = this.payments.getPricing();
        if (error instanceof QuotaExceededError) {
            return reply(quotaExceededReply(error.docType, error.limit, pricing, this.payments.isEnabled()));
        }
        return error.feature === 'pdf_export'
            ? reply(pdfLockedReply(pricing))
            : reply(notAllowedReply(error.feature), true);
    }

    private async loadUser(message: InboundMessage): Promise<User> {
        const now = this.clock();
        const existing = await this.store.users.findByChatId(message.chatId);
        if (existing) {
            await this.store.users.touch(existing.userId, now, message.username);
            return { ...existing, lastActive: now, username: message.username ?? existing.username };
        }

        const created = await this.store.users.create({
            userId: generateUserId(),
            chatId: message.chatId,
            username: message.username,
            tier: 'free',
            usage: createEmptyUsage(),
            quotaResetAt: this.entitlements.initialResetAt(now),
            premiumExpiresAt: null,
            createdAt: now,
            lastActive: now
        });
        log.info('New user registered', { userId: created.userId });
        return created;
    }

    private context(user: User, job: Job, attachmentRef?: string): StepContext {
        return {
            tier: user.tier,
            isAdmin: this.adminPolicy.isAdmin(user),
            decision: this.entitlements.canGenerate(user, job.docType),
            paymentsEnabled: this.payments.isEnabled(),
            pricing: this.payments.getPricing(),
            attachmentRef
        };
    }

    private async dispatch(
        user: User,
        active: Job | null,
        message: InboundMessage,
        command: Command | null
    ): Promise<Turn | Replacement> {
        const handled = command ? await this.dispatchCommand(user, active, message, command) : null;
        if (handled) {
            return handled;
        }

        if (!active) {
            return { directive: reply('Please choose a document type to begin.', true) };
        }
        return this.fromOutcome(handleStep(active, message.text, this.context(user, active, message.attachmentRef)));
    }

    /** Null when the text should go to the current step instead */
    private async dispatchCommand(
        user: User,
        active: Job | null,
        message: InboundMessage,
        command: Command
    ): Promise<Turn | Replacement | null> {
        // A delivered job only waits for the next document choice
        const open = active && active.status !== 'delivered' ? active : null;

        switch (command.kind) {
            case 'menu': {
                const lead = open ? `\n\nYou have a ${documentDisplayName(open.docType)} in progress. Send continue to pick up where you left off.` : '';
                return { directive: reply(WELCOME + lead, true) };
            }
            case 'help':
                return { directive: reply(HELP) };
            case 'status':
                return { directive: reply(formatStatus(this.entitlements.getStatus(user), active)) };
            case 'history':
                return { directive: reply(formatHistory(await this.store.jobs.listRecent(user.userId, HISTORY_LIMIT))) };
            case 'upgrade':
                return { directive: reply(await this.upgradeReply(user)) };
            case 'pdf':
                return { directive: await this.pdfDirective(user, message.chatId) };
            case 'admin_stats':
                return { directive: reply(await this.adminStats(message.chatId)) };
            case 'admin_setpro':
                return { directive: reply(await this.adminSetPro(message.chatId, command.chatId)) };
            case 'reset':
                return open ? this.reset(user, open) : { directive: reply(NOTHING_TO_RESET, true) };
            case 'skip':
                if (!open) {
                    return { directive: reply(NO_ACTIVE_JOB, true) };
                }
                if (!SKIPPABLE_STEPS.has(open.step)) {
                    return { directive: reply(STEP_NOT_SKIPPABLE) };
                }
                return this.fromOutcome(handleStep(open, 'skip', this.context(user, open, message.attachmentRef)));
            case 'wake':
                if (!active) {
                    return { directive: reply(NO_ACTIVE_JOB, true) };
                }
                return this.fromOutcome(enterStep(active, active.step, this.context(user, active)));
            case 'new':
                return this.newJob(user, command.docType, message);
            case 'select': {
                if (!open) {
                    return this.newJob(user, command.docType, message);
                }
                if (!command.explicit) {
                    // Typed text that happens to name a document is an answer
                    return null;
                }
                if (open.docType !== command.docType) {
                    return this.newJob(user, command.docType, message);
                }
                const resumed = enterStep(open, open.step, this.context(user, open));
                return this.fromOutcome({
                    ...resumed,
                    reply: `Continuing your ${documentDisplayName(open.docType)}.\n\n${resumed.reply}`
                });
            }
        }
    }

    private fromOutcome(outcome: StepOutcome): Turn {
        return {
            directive: reply(outcome.reply, outcome.menu ?? false),
            job: outcome.job,
            effects: outcome.effects
        };
    }

    private reset(user: User, job: Job): Turn {
        const first = firstStep(job.docType);
        const cleared: Job = {
            ...job,
            answers: createEmptyAnswers(),
            generated: {},
            epoch: job.epoch + 1,
            status: 'collecting',
            step: first,
            updatedAt: this.clock()
        };
        const outcome = enterStep(cleared, first, this.context(user, cleared));
        log.info('Job reset', { jobId: job.jobId, docType: job.docType });

        return {
            directive: reply(`Your answers were cleared. Let's start again.\n\n${outcome.reply}`),
            job: outcome.job,
            clearGenerated: true,
            effects: outcome.effects
        };
    }

    private newJob(user: User, docType: DocumentType, message: InboundMessage): Turn | Replacement {
        const decision = this.entitlements.canGenerate(user, docType);
        if (!decision.allowed && decision.reason === 'not_allowed') {
            throw new EntitlementDeniedError(docType);
        }

        const now = this.clock();
        const step = firstStep(docType);
        const created: Job = {
            jobId: generateJobId(),
            userId: user.userId,
            docType,
            status: 'collecting',
            step,
            answers: createEmptyAnswers(),
            generated: {},
            epoch: 0,
            paidGeneration: false,
            lastProcessedMessageId: message.messageId,
            version: 0,
            createdAt: now,
            updatedAt: now
        };
        const outcome = enterStep(created, step, this.context(user, created));
        return { replacement: outcome.job, outcome };
    }

    private async startJob(user: User, active: Job | null, message: InboundMessage, turn: Replacement): Promise<ResponseDirective> {
        const now = this.clock();
        await this.store.transaction(async tx => {
            if (active) {
                await tx.jobs.commit(
                    { ...this.idempotency.markProcessed(active, message.messageId), status: 'closed', updatedAt: now },
                    this.idempotency.expectedVersion(active)
                );
            }
            await tx.jobs.insert(turn.replacement);
        });
        log.info('Job started', { jobId: turn.replacement.jobId, docType: turn.replacement.docType, closed: active?.jobId });

        const intro = `Let's create your ${documentDisplayName(turn.replacement.docType)}.`;
        return this.afterCommit(user, turn.replacement, message, {
            directive: reply(`${intro}\n\n${turn.outcome.reply}`, turn.outcome.menu ?? false),
            effects: turn.outcome.effects
        });
    }

    private async commitTurn(user: User, active: Job | null, message: InboundMessage, turn: Turn): Promise<ResponseDirective> {
        if (!active) {
            return turn.directive;
        }

        const next = turn.job ?? active;
        const effects = turn.effects ?? [];
        const checkout = effects.some(effect => effect.kind === 'checkout');
        // The reference is claimed by the CAS commit; only the winning turn opens a checkout
        const claimed: Job = checkout
            ? { ...next, status: 'awaiting_payment', paymentReference: generatePaymentReference(next.docType) }
            : next;

        const committed = await this.store.jobs.commit(
            { ...this.idempotency.markProcessed(claimed, message.messageId), updatedAt: this.clock() },
            this.idempotency.expectedVersion(active),
            { clearGenerated: turn.clearGenerated }
        );

        const directive = checkout ? await this.openCheckout(user, next, committed) : turn.directive;
        return this.afterCommit(user, committed, message, { directive, effects });
    }

    /** Opens the checkout for a committed claim, or puts the job back if the gateway fails */
    private async openCheckout(user: User, before: Job, committed: Job): Promise<ResponseDirective> {
        try {
            const session = await this.payments.createCheckout(user, committed.docType, committed, committed.paymentReference);
            log.info('Document checkout created', { jobId: committed.jobId, reference: session.reference });
            return reply(paymentLinkReply(this.payments.getPricing(), session.authorizationUrl));
        } catch (error) {
            await this.store.jobs.commit(
                { ...committed, status: before.status, paymentReference: before.paymentReference, updatedAt: this.clock() },
                this.idempotency.expectedVersion(committed)
            );
            throw error;
        }
    }

    private afterCommit(user: User, job: Job, message: InboundMessage, turn: Turn): ResponseDirective {
        let directive = turn.directive;
        for (const effect of turn.effects ?? []) {
            switch (effect.kind) {
                case 'generate':
                    this.generation.request(job, effect.generation, user.tier);
                    break;
                case 'render':
                    directive = {
                        kind: 'render',
                        text: directive.kind === 'reply' ? directive.text : '',
                        request: buildRenderRequest(job, message.chatId, 'docx')
                    };
                    break;
                case 'checkout':
                    break;
            }
        }
        return directive;
    }

    private async upgradeReply(user: User): Promise<string> {
        const pricing = this.payments.getPricing();
        if (user.tier === 'pro' || this.adminPolicy.isAdmin(user)) {
            return alreadyPremium(this.entitlements.getStatus(user));
        }
        if (!this.payments.isEnabled()) {
            return upgradeOffer(pricing);
        }
        const session = await this.payments.createCheckout(user, 'premium_upgrade');
        log.info('Premium checkout created', { userId: user.userId, reference: session.reference });
        return upgradeOffer(pricing, session.authorizationUrl);
    }

    private async pdfDirective(user: User, chatId: string): Promise<ResponseDirective> {
        if (!this.entitlements.canUsePdfExport(user)) {
            throw new EntitlementDeniedError('pdf_export');
        }
        const delivered = await this.store.jobs.findLatestDelivered(user.userId);
        if (!delivered) {
            return reply('You have no finished document yet. Create one first, then type pdf for a PDF copy.', true);
        }
        return { kind: 'pdf', request: buildRenderRequest(delivered, chatId, 'pdf') };
    }

    private async adminStats(chatId: string): Promise<string> {
        if (!this.adminPolicy.isAdminChat(chatId)) {
            return ADMIN_ONLY;
        }
        return this.statistics.formatStats(await this.statistics.getAdminStats());
    }

    private async adminSetPro(chatId: string, targetChatId: string | null): Promise<string> {
        if (!this.adminPolicy.isAdminChat(chatId)) {
            return ADMIN_ONLY;
        }
        if (!targetChatId) {
            return 'Usage: /setpro <chatId>';
        }
        const target = await this.store.users.findByChatId(targetChatId);
        if (!target) {
            return `No user found with chat id ${targetChatId}.`;
        }

        const upgraded = await this.entitlements.upgrade(target);
        log.info('Admin granted premium', { admin: anonymizeChatId(chatId), userId: target.userId });
        return upgraded.premiumExpiresAt
            ? `User ${targetChatId} is now premium until ${formatDate(upgraded.premiumExpiresAt)}.`
            : `User ${targetChatId} is an administrator and already has full access.`;
    }
}
