import { ConversationEngine } from './ConversationEngine';
import {
    ADMIN_ONLY,
    AWAITING_PAYMENT,
    GENERATING_PLACEHOLDER,
    GENERIC_APOLOGY,
    notAllowedReply,
    WELCOME
} from './messages';
import { InMemoryStore } from '../database/InMemoryStore';
import {
    AdminPolicy,
    ContentGenerationManager,
    DeliveryManager,
    EntitlementManager,
    IdempotencyFilter,
    PaymentManager,
    StatisticsManager
} from '../managers';
import { StaticContentGenerator } from '../services/fallbackContent';
import { ResponseDirective } from '../types/Directive';
import { Job } from '../types/Job';
import { User } from '../types/User';
import { FakePaymentGateway, FakeRenderer } from '../testing/fakes';
import { makeJob, makeUser, TestClock } from '../testing/factories';

const CHAT = '1001';

const setup = (options: { admins?: string[]; payments?: boolean } = {}) => {
    const store = new InMemoryStore();
    const clock = new TestClock();
    const adminPolicy = new AdminPolicy(options.admins ?? []);
    const entitlements = new EntitlementManager(store, adminPolicy, { clock: clock.now });
    const generation = new ContentGenerationManager(store, new StaticContentGenerator(), 1000);
    const gateway = new FakePaymentGateway();
    const payments = new PaymentManager(
        store,
        entitlements,
        options.payments === false ? null : gateway,
        { currency: 'NGN', premiumPrice: 7500, documentPrice: 5000 },
        clock.now
    );
    const renderer = new FakeRenderer();
    const deliveries = new DeliveryManager(store, entitlements, renderer, clock.now);
    const engine = new ConversationEngine({
        store,
        entitlements,
        adminPolicy,
        idempotency: new IdempotencyFilter(),
        generation,
        payments,
        statistics: new StatisticsManager(store),
        clock: clock.now
    });

    let sequence = 0;
    const send = (text: string, messageId: string = `m-${++sequence}`, chatId: string = CHAT) =>
        engine.handleInbound({ chatId, text, messageId });

    const user = async (chatId: string = CHAT): Promise<User> => {
        const found = await store.users.findByChatId(chatId);
        if (!found) {
            throw new Error(`no user for ${chatId}`);
        }
        return found;
    };

    const activeJob = async (chatId: string = CHAT): Promise<Job> => {
        const found = await store.jobs.findActive((await user(chatId)).userId);
        if (!found) {
            throw new Error('no active job');
        }
        return found;
    };

    return { store, clock, engine, generation, gateway, payments, deliveries, renderer, send, user, activeJob };
};

const textOf = (directive: ResponseDirective): string => {
    if (directive.kind === 'reply' || directive.kind === 'render') {
        return directive.text;
    }
    throw new Error(`expected a text directive, got ${directive.kind}`);
};

/** Registers the chat and places a finished resume at the finalize step */
const seedFinalizedResume = async (
    env: ReturnType<typeof setup>,
    userOverrides: Partial<User> = {},
    jobOverrides: Partial<Job> = {}
): Promise<Job> => {
    const owner = await env.store.users.create(makeUser({ chatId: CHAT, ...userOverrides }));
    const base = makeJob({ userId: owner.userId });
    const job: Job = {
        ...base,
        step: 'finalize',
        status: 'preview_ready',
        answers: {
            ...base.answers,
            basics: { name: 'Ada Obi', email: 'ada@example.com', phone: '0800', location: 'Lagos' },
            targetRole: 'Data Analyst',
            skills: ['SQL', 'Excel', 'Python'],
            summary: 'Analyst with five years of experience in retail reporting.',
            template: 'template_1'
        },
        ...jobOverrides
    };
    await env.store.jobs.insert(job);
    return job;
};

describe('ConversationEngine', () => {
    test('a greeting registers the user and shows the document menu', async () => {
        const env = setup();
        expect(await env.send('hi')).toEqual({ kind: 'reply', text: WELCOME, menu: 'documents' });

        const created = await env.user();
        expect(created.tier).toBe('free');
        expect(created.usage).toEqual({ resume: 0, cv: 0, cover_letter: 0, revamp: 0 });
    });

    test('free text with no job asks for a document type', async () => {
        const env = setup();
        expect(await env.send('I need help')).toEqual({
            kind: 'reply',
            text: 'Please choose a document type to begin.',
            menu: 'documents'
        });
    });

    test('a resume goes from selection to a render request and is delivered once', async () => {
        const env = setup();

        const started = textOf(await env.send('choose_resume'));
        expect(started.startsWith('Let\'s create your Resume.')).toBe(true);

        await env.send('Ada Obi, ada@example.com, 0800 000 0000, Lagos Nigeria');
        await env.send('Data Analyst');
        for (let i = 0; i < 4; i++) {
            // experience, education, certifications, profiles
            await env.send('skip');
        }

        expect(textOf(await env.send('skip'))).toContain(GENERATING_PLACEHOLDER);
        expect((await env.activeJob()).step).toBe('skills');
        await env.generation.whenIdle();

        expect(textOf(await env.send('continue'))).toContain('1. Data Analysis\n2. SQL\n3. Excel');
        await env.send('1,2,3');
        await env.send('skip');
        await env.generation.whenIdle();

        expect(textOf(await env.send('continue')))
            .toContain('Data Analyst with hands-on experience. Skilled in Data Analysis, SQL, Excel.');
        expect(textOf(await env.send('yes'))).toContain('Preview of your information');
        expect((await env.activeJob()).status).toBe('preview_ready');

        const render = await env.send('yes');
        expect(render.kind).toBe('render');
        if (render.kind !== 'render') return;
        expect(render.text).toBe('Generating your Resume... It will arrive in a moment.');
        expect(render.request.template).toBe('template_1');
        expect(render.request.format).toBe('docx');
        expect(render.request.answers.skills).toEqual(['Data Analysis', 'SQL', 'Excel']);
        expect((await env.activeJob()).status).toBe('rendering');

        const result = await env.deliveries.deliver(render.request);
        expect(result.kind).toBe('sent');
        const delivered = await env.store.jobs.findById(render.request.jobId);
        expect(delivered?.status).toBe('delivered');
        expect(delivered?.step).toBe('done');
        expect((await env.user()).usage.resume).toBe(1);

        // A second delivery of the same request sends nothing and counts nothing
        expect((await env.deliveries.deliver(render.request)).kind).toBe('skipped');
        expect((await env.user()).usage.resume).toBe(1);
    });

    test('Scenario E: the same message delivered twice transitions the job once', async () => {
        const env = setup();
        await env.send('choose_resume');
        const before = await env.activeJob();

        const first = await env.send('Ada Obi, ada@example.com, 0800, Lagos', 'dup-1');
        const second = await env.send('Ada Obi, ada@example.com, 0800, Lagos', 'dup-1');

        expect(first.kind).toBe('reply');
        expect(second).toEqual({ kind: 'noop' });

        const after = await env.activeJob();
        expect(after.version).toBe(before.version + 1);
        expect(after.step).toBe('target_role');
        expect(after.lastProcessedMessageId).toBe('dup-1');
    });

    test('Scenario E: concurrent deliveries of one message produce exactly one reply', async () => {
        const env = setup();
        await env.send('choose_resume');
        const before = await env.activeJob();

        const results = await Promise.all([
            env.send('Ada Obi, ada@example.com, 0800, Lagos', 'race-1'),
            env.send('Ada Obi, ada@example.com, 0800, Lagos', 'race-1')
        ]);

        expect(results.filter(result => result.kind === 'noop')).toHaveLength(1);
        expect((await env.activeJob()).version).toBe(before.version + 1);
    });

    test('concurrent deliveries of a first document choice open one job', async () => {
        const env = setup();

        const results = await Promise.all([
            env.send('choose_resume', 'cb-1'),
            env.send('choose_resume', 'cb-1')
        ]);

        expect(results.map(result => result.kind).sort()).toEqual(['noop', 'reply']);
        const owner = await env.user();
        const open = (await env.store.jobs.listRecent(owner.userId, 10)).filter(job => job.status !== 'closed');
        expect(open).toHaveLength(1);
        expect(open[0].lastProcessedMessageId).toBe('cb-1');
    });

    test('validation errors keep the step and show an example', async () => {
        const env = setup();
        await env.send('choose_resume');
        const reply = await env.send('Ada Obi');

        expect(textOf(reply)).toBe('Please send 4 comma-separated values: Full Name, Email, Phone, City Country\n\nExample: Jane Doe, jane@example.com, +234 800 000 0000, Lagos Nigeria');
        expect((await env.activeJob()).step).toBe('basics');
    });

    test('Scenario B: a free user cannot start a cover letter', async () => {
        const env = setup();
        expect(await env.send('choose_cover_letter')).toEqual({
            kind: 'reply',
            text: notAllowedReply('cover_letter'),
            menu: 'documents'
        });
        expect(await env.store.jobs.findActive((await env.user()).userId)).toBeNull();
    });

    test('a refused cover letter keeps the open job and is answered once', async () => {
        const env = setup();
        await env.send('choose_resume');
        const before = await env.activeJob();

        expect(textOf(await env.send('choose_cover_letter', 'cover-1'))).toBe(notAllowedReply('cover_letter'));
        expect(await env.send('choose_cover_letter', 'cover-1')).toEqual({ kind: 'noop' });

        const after = await env.activeJob();
        expect(after.jobId).toBe(before.jobId);
        expect(after.docType).toBe('resume');
        expect(after.step).toBe('basics');
    });

    test('typed document names are answers while a job is collecting', async () => {
        const env = setup();
        await env.send('choose_resume');
        await env.send('Ada Obi, ada@example.com, 0800, Lagos');
        await env.send('cv');

        const job = await env.activeJob();
        expect(job.docType).toBe('resume');
        expect(job.answers.targetRole).toBe('cv');
    });

    test('choosing another document closes the current job', async () => {
        const env = setup();
        await env.send('choose_resume');
        const resume = await env.activeJob();

        await env.send('choose_cv');
        const cv = await env.activeJob();
        expect(cv.docType).toBe('cv');
        expect((await env.store.jobs.findById(resume.jobId))?.status).toBe('closed');

        const resumed = textOf(await env.send('choose_cv'));
        expect(resumed.startsWith('Continuing your CV.')).toBe(true);
        expect((await env.activeJob()).jobId).toBe(cv.jobId);
    });

    test('reset clears answers and bumps the epoch without touching quota', async () => {
        const env = setup();
        await env.send('choose_resume');
        await env.send('Ada Obi, ada@example.com, 0800, Lagos');
        await env.send('Data Analyst');

        const reply = textOf(await env.send('reset'));
        expect(reply.startsWith('Your answers were cleared. Let\'s start again.')).toBe(true);

        const job = await env.activeJob();
        expect(job.step).toBe('basics');
        expect(job.status).toBe('collecting');
        expect(job.epoch).toBe(1);
        expect(job.answers.basics).toBeUndefined();
        expect((await env.user()).usage.resume).toBe(0);
    });

    test('skip is refused on required steps', async () => {
        const env = setup();
        await env.send('choose_resume');
        expect(textOf(await env.send('skip'))).toBe('This step is required and cannot be skipped.');
    });

    test('Scenario A through finalize: a spent quota denies without changing the job', async () => {
        const env = setup({ payments: false });
        const job = await seedFinalizedResume(env, { usage: { resume: 1, cv: 0, cover_letter: 0, revamp: 0 } });

        const reply = textOf(await env.send('yes'));
        expect(reply).toBe([
            'You have used all 1 Resume generation in this cycle.',
            'Type upgrade for the premium plan, or wait for your quota to reset.'
        ].join('\n'));

        const after = await env.store.jobs.findById(job.jobId);
        expect(after?.status).toBe('preview_ready');
        expect(after?.step).toBe('finalize');
    });

    test('pay-per-document: checkout, payment event, then generation without using quota', async () => {
        const env = setup();
        const job = await seedFinalizedResume(env, { usage: { resume: 1, cv: 0, cover_letter: 0, revamp: 0 } });

        const link = textOf(await env.send('pay'));
        const awaiting = await env.store.jobs.findById(job.jobId);
        expect(awaiting?.status).toBe('awaiting_payment');
        const reference = awaiting?.paymentReference ?? '';
        expect(link).toBe(`Pay NGN 5,000 to generate this document: https://pay.example.test/${reference}\nI will let you know as soon as the payment is confirmed.`);
        expect(env.gateway.checkouts[0]).toMatchObject({ amount: 5000, purpose: 'resume', jobId: job.jobId, email: 'ada@example.com' });

        expect(textOf(await env.send('yes'))).toBe(AWAITING_PAYMENT);

        const owner = await env.user();
        const notice = await env.payments.handleEvent({
            reference,
            status: 'success',
            metadata: { userId: owner.userId, purpose: 'resume' }
        });
        expect(notice).toEqual({ chatId: CHAT, message: 'Payment received! Reply yes to generate your document.' });
        expect((await env.store.jobs.findById(job.jobId))?.status).toBe('paid');

        const render = await env.send('yes');
        expect(render.kind).toBe('render');
        if (render.kind !== 'render') return;
        await env.deliveries.deliver(render.request);

        expect((await env.store.jobs.findById(job.jobId))?.status).toBe('delivered');
        expect((await env.user()).usage.resume).toBe(1);
    });

    test('two pay messages racing open a single checkout', async () => {
        const env = setup();
        const job = await seedFinalizedResume(env, { usage: { resume: 1, cv: 0, cover_letter: 0, revamp: 0 } });

        const results = await Promise.all([env.send('pay', 'p-1'), env.send('pay', 'p-2')]);

        expect(results.map(result => result.kind).sort()).toEqual(['noop', 'reply']);
        expect(env.gateway.checkouts).toHaveLength(1);
        const awaiting = await env.store.jobs.findById(job.jobId);
        expect(awaiting?.status).toBe('awaiting_payment');
        expect(awaiting?.paymentReference).toBe(env.gateway.checkouts[0].reference);
    });

    test('a gateway failure puts the job back at finalize', async () => {
        const env = setup();
        const job = await seedFinalizedResume(env, { usage: { resume: 1, cv: 0, cover_letter: 0, revamp: 0 } });
        env.gateway.failWith = new Error('gateway unavailable');

        expect(textOf(await env.send('pay', 'p-1'))).toBe(GENERIC_APOLOGY);
        const reverted = await env.store.jobs.findById(job.jobId);
        expect(reverted?.status).toBe('preview_ready');
        expect(reverted?.paymentReference).toBeUndefined();
        expect(reverted?.lastProcessedMessageId).toBe('p-1');

        env.gateway.failWith = null;
        await env.send('pay', 'p-2');
        expect((await env.store.jobs.findById(job.jobId))?.status).toBe('awaiting_payment');
        expect(env.gateway.checkouts).toHaveLength(2);
    });

    test('a failed render returns the job to finalize with no quota used', async () => {
        const env = setup();
        const job = await seedFinalizedResume(env);

        const render = await env.send('yes');
        if (render.kind !== 'render') throw new Error('expected render');
        env.renderer.failWith = new Error('disk full');

        expect(await env.deliveries.deliver(render.request)).toEqual({ kind: 'failed' });
        const after = await env.store.jobs.findById(job.jobId);
        expect(after?.status).toBe('preview_ready');
        expect(after?.step).toBe('finalize');
        expect((await env.user()).usage.resume).toBe(0);
    });

    test('status and history', async () => {
        const env = setup();
        await env.send('choose_resume');

        const status = textOf(await env.send('STATUS'));
        expect(status).toContain('Account status: Free plan');
        expect(status).toContain('Resume: 1 of 1 left');
        expect(status).toContain('In progress: Resume (collecting)');

        expect(textOf(await env.send('history'))).toBe('Your recent documents:\n1. Resume (collecting)');
    });

    test('pdf export is premium and needs a delivered document', async () => {
        const env = setup();
        await env.send('hi');
        expect(textOf(await env.send('pdf'))).toBe('PDF export is a premium feature.\nType upgrade to unlock it for NGN 7,500 per month.');

        const env2 = setup();
        await seedFinalizedResume(env2, { tier: 'pro', premiumExpiresAt: new Date('2026-02-01T00:00:00.000Z') }, {
            status: 'delivered',
            step: 'done',
            deliveredAt: new Date('2026-01-01T00:00:00.000Z')
        });
        const pdf = await env2.send('pdf');
        expect(pdf.kind).toBe('pdf');
        if (pdf.kind === 'pdf') {
            expect(pdf.request.format).toBe('pdf');
        }
    });

    test('upgrade offers a premium checkout to free users', async () => {
        const env = setup();
        const reply = textOf(await env.send('upgrade'));
        const reference = env.gateway.checkouts[0].reference;

        expect(env.gateway.checkouts[0]).toMatchObject({ amount: 7500, purpose: 'premium_upgrade' });
        expect(reply.endsWith(`Pay securely here: https://pay.example.test/${reference}`)).toBe(true);
    });

    test('admin commands are refused to other users', async () => {
        const env = setup({ admins: ['42'] });
        expect(textOf(await env.send('/stats'))).toBe(ADMIN_ONLY);
        expect(textOf(await env.send('/setpro 1001'))).toBe(ADMIN_ONLY);
    });

    test('an admin can grant premium and read statistics', async () => {
        const env = setup({ admins: ['42'] });
        await env.send('hi');

        const granted = textOf(await env.send('/setpro 1001', 'a-1', '42'));
        expect(granted).toBe('User 1001 is now premium until 2026-01-31.');
        expect((await env.user()).tier).toBe('pro');

        const stats = textOf(await env.send('/stats', 'a-2', '42'));
        expect(stats).toContain('Users: 2 (free 1, pro 1)');
    });

    test('storage failures become a generic apology', async () => {
        const env = setup();
        jest.spyOn(env.store.jobs, 'findActive').mockRejectedValueOnce(new Error('connection reset'));
        expect(await env.send('hi')).toEqual({ kind: 'reply', text: GENERIC_APOLOGY });
    });
});
