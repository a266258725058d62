import { describe, it, expect, vi, afterEach } from 'vitest';
import { InvalidRequestError, NotFoundError, ServiceUnavailableError } from '../src/errors';
import { RegistryOptions, SessionRegistry, checkMeetingUrl, generateBotId } from '../src/sessionRegistry';
import {
    FakeBackend,
    FakeMeetingAdapter,
    MEETING_URL,
    TEST_SETTINGS,
    WEBHOOK_URL,
    createTestDeliverer,
    statusEvents,
} from './helpers/fakes';

function setup(overrides: Partial<RegistryOptions> = {}) {
    const adapters: FakeMeetingAdapter[] = [];
    const backend = new FakeBackend();
    const { deliverer, requests } = createTestDeliverer();
    const registry = new SessionRegistry({
        settings: TEST_SETTINGS,
        defaultBotName: 'Transcription Bot',
        removalGraceMs: 60000,
        webhookPolicy: { allowInsecure: false, allowPrivate: false },
        createAdapter: () => {
            const adapter = new FakeMeetingAdapter();
            adapters.push(adapter);
            return adapter;
        },
        backend,
        deliverer,
        ...overrides,
    });
    return { registry, adapters, backend, requests };
}

describe('generateBotId', () => {
    it('should produce bot_ followed by 16 hex characters', () => {
        expect(generateBotId()).toMatch(/^bot_[0-9a-f]{16}$/);
    });
});

describe('checkMeetingUrl', () => {
    it('should accept Teams meeting links', () => {
        expect(checkMeetingUrl(MEETING_URL)).toBeNull();
        expect(checkMeetingUrl('https://teams.live.com/meet/9876543210')).toBeNull();
    });

    it('should reject anything else', () => {
        expect(checkMeetingUrl('teams')).toBe('meeting_url is not a valid URL');
        expect(checkMeetingUrl('ftp://teams.microsoft.com/x')).toBe('meeting_url must be an http(s) URL');
        expect(checkMeetingUrl('https://zoom.us/j/123')).toBe('meeting_url must be a Microsoft Teams meeting link');
        expect(checkMeetingUrl('https://teams.microsoft.com.evil.test/x')).toBe(
            'meeting_url must be a Microsoft Teams meeting link'
        );
    });
});

describe('SessionRegistry', () => {
    let registry: SessionRegistry | null = null;

    afterEach(async () => {
        await registry?.shutdown();
        registry = null;
    });

    it('should create a joining session with defaults applied', () => {
        const ctx = setup();
        registry = ctx.registry;

        const snapshot = ctx.registry.create({ meetingUrl: MEETING_URL, webhookUrl: WEBHOOK_URL });

        expect(snapshot.id).toMatch(/^bot_[0-9a-f]{16}$/);
        expect(snapshot.state).toBe('joining');
        expect(snapshot.botName).toBe('Transcription Bot');
        expect(snapshot.language).toBe('en');
        expect(snapshot.endedAt).toBeNull();
        expect(ctx.adapters[0].joinCalls).toEqual([{ meetingUrl: MEETING_URL, displayName: 'Transcription Bot' }]);
        expect(ctx.registry.get(snapshot.id).id).toBe(snapshot.id);
    });

    it('should honour bot name and language from the request', () => {
        const ctx = setup();
        registry = ctx.registry;

        const snapshot = ctx.registry.create({
            meetingUrl: MEETING_URL,
            webhookUrl: WEBHOOK_URL,
            botName: 'Minutes',
            language: 'de',
        });

        expect(snapshot.botName).toBe('Minutes');
        expect(snapshot.language).toBe('de');
    });

    it('should reject invalid requests without creating a session', () => {
        const ctx = setup();
        registry = ctx.registry;

        expect(() => ctx.registry.create({ meetingUrl: '  ', webhookUrl: WEBHOOK_URL })).toThrow(
            new InvalidRequestError('meeting_url is required')
        );
        expect(() => ctx.registry.create({ meetingUrl: 'https://zoom.us/j/1', webhookUrl: WEBHOOK_URL })).toThrow(
            'meeting_url must be a Microsoft Teams meeting link'
        );
        expect(() => ctx.registry.create({ meetingUrl: MEETING_URL, webhookUrl: 'http://hooks.example.com/x' })).toThrow(
            'webhook_url must use https'
        );
        expect(ctx.registry.size).toBe(0);
        expect(ctx.adapters).toHaveLength(0);
    });

    it('should throw NotFoundError for unknown bots', () => {
        const ctx = setup();
        registry = ctx.registry;

        expect(() => ctx.registry.get('bot_missing')).toThrow(NotFoundError);
        expect(() => ctx.registry.requestLeave('bot_missing')).toThrow('Bot bot_missing not found');
    });

    it('should retry id generation on a collision', () => {
        const ids = ['bot_a', 'bot_a', 'bot_b'];
        const ctx = setup({ generateId: () => ids.shift() ?? 'bot_z' });
        registry = ctx.registry;

        ctx.registry.create({ meetingUrl: MEETING_URL, webhookUrl: WEBHOOK_URL });
        const second = ctx.registry.create({ meetingUrl: MEETING_URL, webhookUrl: WEBHOOK_URL });

        expect(second.id).toBe('bot_b');
    });

    it('should relay leave requests and keep the finished session for the grace period', async () => {
        const ctx = setup();
        registry = ctx.registry;
        const { id } = ctx.registry.create({ meetingUrl: MEETING_URL, webhookUrl: WEBHOOK_URL });

        expect(ctx.registry.requestLeave(id).state).toBe('leaving');
        await ctx.registry.waitForCompletion(id);

        expect(ctx.adapters[0].leaveCalls).toBe(1);
        expect(ctx.registry.get(id).state).toBe('left');
        expect(ctx.registry.list().map((s) => s.id)).toEqual([id]);
    });

    it('should remove finished sessions once the grace period passes', async () => {
        const ctx = setup({ removalGraceMs: 0 });
        registry = ctx.registry;
        const { id } = ctx.registry.create({ meetingUrl: MEETING_URL, webhookUrl: WEBHOOK_URL });

        ctx.adapters[0].failJoin('Lobby timeout');
        await ctx.registry.waitForCompletion(id);

        expect(() => ctx.registry.get(id)).toThrow(NotFoundError);
        expect(ctx.registry.size).toBe(0);
    });

    it('should count only sessions in the meeting as active', async () => {
        const ctx = setup();
        registry = ctx.registry;
        ctx.registry.create({ meetingUrl: MEETING_URL, webhookUrl: WEBHOOK_URL });
        ctx.registry.create({ meetingUrl: MEETING_URL, webhookUrl: WEBHOOK_URL });

        ctx.adapters[0].admit();

        await vi.waitFor(() => expect(ctx.registry.activeCount()).toBe(1));
        expect(ctx.registry.size).toBe(2);
    });

    it('should make every bot leave on shutdown', async () => {
        const ctx = setup();
        ctx.registry.create({ meetingUrl: MEETING_URL, webhookUrl: WEBHOOK_URL });
        ctx.registry.create({ meetingUrl: MEETING_URL, webhookUrl: WEBHOOK_URL });
        ctx.adapters[0].admit();
        await vi.waitFor(() => expect(ctx.registry.activeCount()).toBe(1));

        await ctx.registry.shutdown();

        expect(ctx.adapters.map((a) => a.leaveCalls)).toEqual([1, 1]);
        expect(ctx.adapters.every((a) => a.disposed)).toBe(true);
        expect(ctx.registry.size).toBe(0);
    });

    it('should stop unsent webhook events on shutdown', async () => {
        const { deliverer, requests } = createTestDeliverer(() => 500, { retryBaseMs: 60000 });
        const ctx = setup({ deliverer });
        ctx.registry.create({ meetingUrl: MEETING_URL, webhookUrl: WEBHOOK_URL });
        ctx.adapters[0].admit();
        await vi.waitFor(() => expect(ctx.registry.activeCount()).toBe(1));
        await vi.waitFor(() => expect(requests).toHaveLength(1));

        await ctx.registry.shutdown();

        // the joining status was in flight; in_meeting, leaving and left never go out
        expect(statusEvents(requests)).toEqual([{ status: 'joining', message: null }]);
        expect(ctx.adapters[0].leaveCalls).toBe(1);
        expect(ctx.adapters[0].disposed).toBe(true);
    });

    it('should refuse new bots while shutting down', async () => {
        const ctx = setup();
        ctx.registry.create({ meetingUrl: MEETING_URL, webhookUrl: WEBHOOK_URL });

        const stopping = ctx.registry.shutdown();

        expect(() => ctx.registry.create({ meetingUrl: MEETING_URL, webhookUrl: WEBHOOK_URL })).toThrow(
            new ServiceUnavailableError('Service is shutting down')
        );
        await stopping;
        expect(ctx.adapters).toHaveLength(1);
    });
});
