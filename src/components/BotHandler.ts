import axios from 'axios';
import { Context, Markup, Telegraf } from 'telegraf';
import { AppConfig } from '../config/Config';
import { DatabaseManager, InMemoryStore, Store } from '../database';
import {
    AdminPolicy,
    ContentGenerationManager,
    DeliveryManager,
    EntitlementManager,
    EntitlementSweepManager,
    IdempotencyFilter,
    PaymentManager,
    StatisticsManager
} from '../managers';
import { ConversationEngine } from '../conversation/ConversationEngine';
import { DOCUMENT_SENT, GENERIC_APOLOGY, RENDER_FAILED } from '../conversation/messages';
import { OpenAiContentGenerator } from '../services/OpenAiContentGenerator';
import { ContentGenerator } from '../services/ContentGenerator';
import { StaticContentGenerator } from '../services/fallbackContent';
import { DocxPdfRenderer } from '../services/DocumentRenderer';
import { PaystackGateway } from '../services/PaymentGateway';
import { InboundMessage, ResponseDirective } from '../types/Directive';
import { anonymizeChatId } from '../models';
import { PaymentWebhookServer } from './PaymentWebhookServer';
import { logger } from '../utils/logger';

const log = logger.child('bot');

const DOCUMENT_MENU = Markup.inlineKeyboard([
    [Markup.button.callback('Resume', 'choose_resume'), Markup.button.callback('CV', 'choose_cv')],
    [Markup.button.callback('Cover Letter', 'choose_cover_letter'), Markup.button.callback('Revamp Resume', 'choose_revamp')]
]);

// Plain-text resumes only; anything larger is not a resume
const MAX_ATTACHMENT_BYTES = 200 * 1024;

// Bot Handler Component - wires the stores and managers and routes Telegram updates to the engine
export class BotHandler {
    private config: AppConfig;
    private bot: Telegraf<Context> | null = null;
    private dbManager: DatabaseManager | null = null;
    private engine: ConversationEngine | null = null;
    private deliveries: DeliveryManager | null = null;
    private generation: ContentGenerationManager | null = null;
    private sweepManager: EntitlementSweepManager | null = null;
    private webhookServer: PaymentWebhookServer | null = null;
    private sweepInterval: NodeJS.Timeout | null = null;

    constructor(config: AppConfig) {
        this.config = config;
    }

    async initialize(): Promise<void> {
        logger.setLevel(this.config.logLevel);

        const store = await this.openStore();
        const adminPolicy = new AdminPolicy(this.config.adminChatIds);
        const entitlements = new EntitlementManager(store, adminPolicy, { cycleDays: this.config.quotaCycleDays });

        const generator: ContentGenerator = this.config.openaiApiKey
            ? new OpenAiContentGenerator({
                apiKey: this.config.openaiApiKey,
                model: this.config.openaiModel,
                timeoutMs: this.config.aiTimeoutMs
            })
            : new StaticContentGenerator();
        if (!this.config.openaiApiKey) {
            log.warn('OPENAI_API_KEY is not set; using static suggestions');
        }
        this.generation = new ContentGenerationManager(store, generator, this.config.aiTimeoutMs);

        const gateway = this.config.paystackSecret
            ? new PaystackGateway({
                secretKey: this.config.paystackSecret,
                callbackUrl: `${this.config.publicUrl.replace(/\/$/, '')}/payments/callback`
            })
            : null;
        const payments = new PaymentManager(store, entitlements, gateway, {
            currency: this.config.currency,
            premiumPrice: this.config.premiumPrice,
            documentPrice: this.config.documentPrice
        });

        this.deliveries = new DeliveryManager(store, entitlements, new DocxPdfRenderer());
        this.sweepManager = new EntitlementSweepManager(store, entitlements, adminPolicy);
        this.engine = new ConversationEngine({
            store,
            entitlements,
            adminPolicy,
            idempotency: new IdempotencyFilter(),
            generation: this.generation,
            payments,
            statistics: new StatisticsManager(store)
        });

        this.bot = new Telegraf(this.config.botToken);

        this.bot.catch(async (error: unknown, ctx) => {
            log.error('Telegram bot error', { error, chatId: ctx.chat ? anonymizeChatId(String(ctx.chat.id)) : undefined });
            try {
                await ctx.reply(GENERIC_APOLOGY);
            } catch (replyError) {
                log.warn('Could not send apology', { error: replyError });
            }
        });

        this.registerMessageHandlers();

        if (gateway) {
            const bot = this.bot;
            this.webhookServer = new PaymentWebhookServer({
                payments,
                gateway,
                notify: async (chatId, text) => {
                    await bot.telegram.sendMessage(chatId, text);
                }
            }, this.config.port);
            await this.webhookServer.start();
        } else {
            log.warn('PAYSTACK_SECRET is not set; payments are disabled');
        }

        // launch() resolves only when polling stops
        this.bot.launch().catch(error => {
            log.error('Bot polling stopped', { error });
        });

        this.scheduleSweep();
    }

    async shutdown(): Promise<void> {
        if (this.bot) {
            this.bot.stop();
        }

        if (this.sweepInterval) {
            clearInterval(this.sweepInterval);
            this.sweepInterval = null;
        }

        if (this.webhookServer) {
            await this.webhookServer.stop();
        }

        if (this.generation) {
            await this.generation.whenIdle();
        }

        if (this.dbManager) {
            await this.dbManager.disconnect();
        }
    }

    private async openStore(): Promise<Store> {
        if (this.config.storageDriver === 'memory') {
            log.warn('Using the in-memory store; data is lost on restart');
            return new InMemoryStore();
        }
        this.dbManager = new DatabaseManager(this.config.mongodbUri, this.config.mongodbDbName);
        return this.dbManager.initialize();
    }

    private registerMessageHandlers(): void {
        if (!this.bot) {
            throw new Error('BotHandler not initialized.');
        }

        const bot = this.bot;

        bot.action(/^choose_(resume|cv|cover_letter|revamp)$/, async ctx => {
            await ctx.answerCbQuery();
            if (!ctx.chat) return;

            await this.handle(ctx, {
                chatId: String(ctx.chat.id),
                username: ctx.from?.username,
                text: ctx.match[0],
                messageId: `cb:${ctx.callbackQuery.id}`
            });
        });

        bot.on('text', async ctx => {
            if (!ctx.chat) return;

            await this.handle(ctx, {
                chatId: String(ctx.chat.id),
                username: ctx.from?.username,
                text: ctx.message.text,
                messageId: String(ctx.message.message_id)
            });
        });

        bot.on('document', async ctx => {
            if (!ctx.chat) return;

            const file = ctx.message.document;
            const isText = file.mime_type === 'text/plain' || (file.file_name ?? '').toLowerCase().endsWith('.txt');
            if (!isText) {
                await ctx.reply('Please send your resume as a .txt file, or paste the text here.');
                return;
            }
            if (file.file_size !== undefined && file.file_size > MAX_ATTACHMENT_BYTES) {
                await ctx.reply('That file is too large. Please paste the text of your resume instead.');
                return;
            }

            const link = await ctx.telegram.getFileLink(file.file_id);
            const response = await axios.get<string>(link.href, { responseType: 'text', timeout: 15000 });

            await this.handle(ctx, {
                chatId: String(ctx.chat.id),
                username: ctx.from?.username,
                text: response.data,
                messageId: String(ctx.message.message_id),
                attachmentRef: file.file_id
            });
        });
    }

    private async handle(ctx: Context, message: InboundMessage): Promise<void> {
        if (!this.engine) {
            throw new Error('BotHandler not initialized.');
        }
        const directive = await this.engine.handleInbound(message);
        await this.respond(ctx, directive);
    }

    private async respond(ctx: Context, directive: ResponseDirective): Promise<void> {
        if (!this.deliveries) {
            throw new Error('BotHandler not initialized.');
        }

        switch (directive.kind) {
            case 'noop':
                return;
            case 'reply':
                await ctx.reply(directive.text, directive.menu ? DOCUMENT_MENU : undefined);
                return;
            case 'render': {
                if (directive.text) {
                    await ctx.reply(directive.text);
                }
                const result = await this.deliveries.deliver(directive.request);
                if (result.kind === 'sent') {
                    await ctx.replyWithDocument({ source: result.document.content, filename: result.document.filename });
                    await ctx.reply(DOCUMENT_SENT, DOCUMENT_MENU);
                } else if (result.kind === 'failed') {
                    await ctx.reply(RENDER_FAILED);
                }
                return;
            }
            case 'pdf': {
                const document = await this.deliveries.export(directive.request);
                await ctx.replyWithDocument({ source: document.content, filename: document.filename });
                return;
            }
        }
    }

    private scheduleSweep(): void {
        if (!this.sweepManager || this.config.entitlementSweepIntervalHours === 0) {
            return;
        }

        const sweepManager = this.sweepManager;
        const intervalMs = this.config.entitlementSweepIntervalHours * 60 * 60 * 1000;

        const runSweep = async () => {
            try {
                const result = await sweepManager.sweep();
                log.info('Entitlement sweep finished', { ...result });
            } catch (error) {
                log.error('Entitlement sweep failed', { error });
            }
        };

        void runSweep();
        this.sweepInterval = setInterval(() => void runSweep(), intervalMs);
    }
}
