import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import axios, { AxiosInstance } from 'axios';
import { Server } from 'http';
import { AddressInfo } from 'net';
import { createApp } from '../src/app';
import { extractApiKey } from '../src/auth';
import { SessionRegistry } from '../src/sessionRegistry';
import {
    FakeBackend,
    FakeMeetingAdapter,
    MEETING_URL,
    TEST_SETTINGS,
    WEBHOOK_URL,
    createTestDeliverer,
} from './helpers/fakes';

const API_KEY = 'test-secret';

describe('extractApiKey', () => {
    it('should accept Bearer and Token schemes', () => {
        expect(extractApiKey('Bearer test-secret')).toBe('test-secret');
        expect(extractApiKey('token test-secret')).toBe('test-secret');
        expect(extractApiKey('Basic dGVzdA==')).toBeNull();
        expect(extractApiKey(undefined)).toBeNull();
    });
});

describe('HTTP API', () => {
    let registry: SessionRegistry;
    let adapters: FakeMeetingAdapter[];
    let server: Server;
    let client: AxiosInstance;

    beforeEach(async () => {
        adapters = [];
        const { deliverer } = createTestDeliverer();
        registry = new SessionRegistry({
            settings: TEST_SETTINGS,
            defaultBotName: 'Transcription Bot',
            removalGraceMs: 60000,
            webhookPolicy: { allowInsecure: false, allowPrivate: false },
            createAdapter: () => {
                const adapter = new FakeMeetingAdapter();
                adapters.push(adapter);
                return adapter;
            },
            backend: new FakeBackend(),
            deliverer,
        });

        const app = createApp(registry, { apiKey: API_KEY });
        server = await new Promise<Server>((resolve) => {
            const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
        });
        const address = server.address();
        if (!address || typeof address === 'string') throw new Error('server has no port');
        const { port }: AddressInfo = address;

        client = axios.create({
            baseURL: `http://127.0.0.1:${port}`,
            headers: { Authorization: `Bearer ${API_KEY}` },
            validateStatus: () => true,
        });
    });

    afterEach(async () => {
        await registry.shutdown();
        await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    });

    it('should report health without credentials', async () => {
        const response = await client.get('/health', { headers: { Authorization: '' } });

        expect(response.status).toBe(200);
        expect(response.data).toEqual({ status: 'healthy', active_sessions: 0, total_sessions: 0 });
    });

    it('should reject bot routes without a valid key', async () => {
        const missing = await client.post('/bots', {}, { headers: { Authorization: '' } });
        const wrong = await client.get('/bots/bot_x', { headers: { Authorization: 'Bearer not-it' } });

        expect(missing.status).toBe(401);
        expect(missing.data).toEqual({ error: 'Invalid or missing API key' });
        expect(wrong.status).toBe(401);
    });

    it('should create a bot and return its snapshot', async () => {
        const response = await client.post(
            '/bots',
            { meeting_url: MEETING_URL, webhook_url: WEBHOOK_URL, bot_name: 'Notes', metadata: { team: 'core' } },
            { headers: { Authorization: `Token ${API_KEY}` } }
        );

        expect(response.status).toBe(201);
        expect(response.data).toMatchObject({
            state: 'joining',
            meeting_url: MEETING_URL,
            webhook_url: WEBHOOK_URL,
            bot_name: 'Notes',
            language: 'en',
            ended_at: null,
            error: null,
            participant_count: 0,
        });
        expect(response.data.id).toMatch(/^bot_[0-9a-f]{16}$/);
        expect(adapters).toHaveLength(1);
    });

    it('should describe a malformed body', async () => {
        const response = await client.post('/bots', { meeting_url: MEETING_URL });

        expect(response.status).toBe(400);
        expect(response.data).toEqual({
            error: 'webhook_url is required',
            detail: [{ path: 'webhook_url', message: 'webhook_url is required' }],
        });
    });

    it('should reject a body that is not JSON', async () => {
        const response = await client.post('/bots', '{"meeting_url":', {
            headers: { 'Content-Type': 'application/json' },
            transformRequest: [(data: string) => data],
        });

        expect(response.status).toBe(400);
        expect(response.data).toEqual({ error: 'Malformed JSON body' });
    });

    it('should reject a meeting link that is not Teams', async () => {
        const response = await client.post('/bots', { meeting_url: 'https://zoom.us/j/1', webhook_url: WEBHOOK_URL });

        expect(response.status).toBe(400);
        expect(response.data).toEqual({ error: 'meeting_url must be a Microsoft Teams meeting link' });
    });

    it('should return 404 for an unknown bot', async () => {
        const fetched = await client.get('/bots/bot_unknown');
        const left = await client.post('/bots/bot_unknown/leave');

        expect(fetched.status).toBe(404);
        expect(fetched.data).toEqual({ error: 'Bot bot_unknown not found' });
        expect(left.status).toBe(404);
    });

    it('should ask a bot to leave and report the outcome', async () => {
        const created = await client.post('/bots', { meeting_url: MEETING_URL, webhook_url: WEBHOOK_URL });
        const id: string = created.data.id;

        const response = await client.post(`/bots/${id}/leave`);

        expect(response.status).toBe(200);
        expect(response.data.id).toBe(id);
        expect(response.data.state).toBe('leaving');
        await vi.waitFor(async () => {
            const current = await client.get(`/bots/${id}`);
            expect(current.data.state).toBe('left');
            expect(current.data.ended_at).not.toBeNull();
        });
        expect(adapters[0].leaveCalls).toBe(1);
    });

    it('should answer 503 once the service is shutting down', async () => {
        await registry.shutdown();

        const response = await client.post('/bots', { meeting_url: MEETING_URL, webhook_url: WEBHOOK_URL });

        expect(response.status).toBe(503);
        expect(response.data).toEqual({ error: 'Service is shutting down' });
    });

    it('should list bots and count active ones', async () => {
        await client.post('/bots', { meeting_url: MEETING_URL, webhook_url: WEBHOOK_URL });
        adapters[0].admit();

        await vi.waitFor(async () => {
            const health = await client.get('/health');
            expect(health.data).toEqual({ status: 'healthy', active_sessions: 1, total_sessions: 1 });
        });
        const listed = await client.get('/bots');
        expect(listed.status).toBe(200);
        expect(listed.data.count).toBe(1);
        expect(listed.data.bots[0].state).toBe('in_meeting');
    });
});
