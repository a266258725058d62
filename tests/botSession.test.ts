import { describe, it, expect, vi } from 'vitest';
import { BotSession, SessionSettings } from '../src/botSession';
import {
    FakeBackend,
    FakeMeetingAdapter,
    MEETING_URL,
    Responder,
    TEST_SETTINGS,
    WEBHOOK_URL,
    audioChunk,
    createTestDeliverer,
    statusEvents,
} from './helpers/fakes';

interface SetupOptions {
    settings?: Partial<SessionSettings>;
    respond?: Responder;
    retryCount?: number;
    retryBaseMs?: number;
}

function setup(options: SetupOptions = {}) {
    const adapter = new FakeMeetingAdapter();
    const backend = new FakeBackend();
    const { deliverer, requests } = createTestDeliverer(options.respond, {
        retryCount: options.retryCount ?? 3,
        retryBaseMs: options.retryBaseMs ?? 1,
    });
    const session = new BotSession({
        id: 'bot_0123456789abcdef',
        meetingUrl: MEETING_URL,
        webhookUrl: WEBHOOK_URL,
        botName: 'Notes Bot',
        metadata: { meeting_id: 'm-42' },
        settings: { ...TEST_SETTINGS, ...options.settings },
        adapter,
        backend,
        deliverer,
    });
    return { adapter, backend, requests, session };
}

async function admitted(session: BotSession, backend: FakeBackend): Promise<void> {
    await vi.waitFor(() => {
        expect(session.currentState).toBe('in_meeting');
        expect(backend.connections).toHaveLength(1);
    });
}

describe('BotSession', () => {
    it('should join, transcribe and leave on request', async () => {
        const { adapter, backend, requests, session } = setup();
        const done = session.start();

        await vi.waitFor(() => expect(adapter.joinCalls).toEqual([{ meetingUrl: MEETING_URL, displayName: 'Notes Bot' }]));
        adapter.admit();
        await admitted(session, backend);

        adapter.addParticipant('8:orgid:ada', 'Ada');
        await vi.waitFor(() => expect(session.snapshot().participants).toEqual([{ id: '8:orgid:ada', name: 'Ada' }]));

        const chunk = audioChunk(3);
        adapter.emitAudio(chunk);
        await vi.waitFor(() => expect(backend.latest.sent).toEqual([chunk]));

        backend.latest.emit({ speakerId: 'speaker_1', text: 'Hello there', startSec: 0, durationSec: 0.5, isFinal: true });
        await vi.waitFor(() => expect(requests.some((r) => r.body.event_type === 'transcription')).toBe(true));

        session.requestLeave();
        await done;

        expect(requests.map((r) => r.body.event_type)).toEqual([
            'bot_status',
            'bot_status',
            'transcription',
            'bot_status',
            'bot_status',
        ]);
        expect(statusEvents(requests)).toEqual([
            { status: 'joining', message: null },
            { status: 'in_meeting', message: null },
            { status: 'leaving', message: 'Leave requested' },
            { status: 'left', message: null },
        ]);
        expect(requests[2].body).toMatchObject({
            event_type: 'transcription',
            bot_id: 'bot_0123456789abcdef',
            data: {
                speaker_id: 'speaker_1',
                speaker_name: null,
                text: 'Hello there',
                timestamp_ms: 0,
                duration_ms: 500,
                is_final: true,
                metadata: { meeting_id: 'm-42' },
            },
        });
        expect(session.stateHistory).toEqual(['joining', 'in_meeting', 'leaving', 'left']);
        expect(adapter.leaveCalls).toBe(1);
        expect(adapter.disposed).toBe(true);
        expect(backend.latest.closeCalls).toBe(1);

        const snapshot = session.snapshot();
        expect(snapshot.state).toBe('left');
        expect(snapshot.error).toBeNull();
        expect(snapshot.endedAt).toBeInstanceOf(Date);
    });

    it('should carry metadata on every status event', async () => {
        const { adapter, requests, session } = setup();
        const done = session.start();

        adapter.failJoin('Lobby timeout');
        await done;

        for (const request of requests) {
            expect(request.body.data.metadata).toEqual({ meeting_id: 'm-42' });
        }
    });

    it('should end in error when the join fails', async () => {
        const { adapter, backend, requests, session } = setup();
        const done = session.start();

        adapter.failJoin('Join button never appeared');
        await done;

        expect(statusEvents(requests)).toEqual([
            { status: 'joining', message: null },
            { status: 'error', message: 'Join button never appeared' },
        ]);
        expect(session.snapshot().error).toBe('Join button never appeared');
        expect(backend.connectCalls).toBe(0);
        expect(adapter.disposed).toBe(true);
    });

    it('should end in error when removed before being admitted', async () => {
        const { adapter, requests, session } = setup();
        const done = session.start();

        adapter.remove();
        await done;

        expect(statusEvents(requests)).toEqual([
            { status: 'joining', message: null },
            { status: 'error', message: 'Meeting closed before the bot was admitted' },
        ]);
    });

    it('should report left when the meeting ends', async () => {
        const { adapter, backend, requests, session } = setup();
        const done = session.start();

        adapter.admit();
        await admitted(session, backend);
        adapter.end();
        await done;

        expect(statusEvents(requests)).toEqual([
            { status: 'joining', message: null },
            { status: 'in_meeting', message: null },
            { status: 'left', message: 'Meeting ended' },
        ]);
        expect(adapter.leaveCalls).toBe(0);
    });

    it('should end in error when the transcription backend is unavailable', async () => {
        const { adapter, backend, requests, session } = setup();
        backend.failures = 1;
        const done = session.start();

        adapter.admit();
        await done;

        expect(statusEvents(requests)).toEqual([
            { status: 'joining', message: null },
            { status: 'in_meeting', message: null },
            { status: 'error', message: 'Transcription backend unavailable: connection refused' },
        ]);
        expect(session.currentState).toBe('error');
    });

    it('should end in error once stream reconnects run out', async () => {
        const { adapter, backend, requests, session } = setup();
        const done = session.start();

        adapter.admit();
        await admitted(session, backend);
        backend.failures = Infinity;
        backend.latest.drop();
        await done;

        expect(backend.connectCalls).toBe(3);
        expect(statusEvents(requests).pop()).toEqual({
            status: 'error',
            message: 'Transcription stream lost after 2 reconnect attempts: connection refused',
        });
        expect(session.snapshot().error).toBe(
            'Transcription stream lost after 2 reconnect attempts: connection refused'
        );
    });

    it('should treat repeated leave requests as one', async () => {
        const { adapter, requests, session } = setup();
        const done = session.start();

        session.requestLeave();
        session.requestLeave();
        await done;
        session.requestLeave();

        expect(adapter.leaveCalls).toBe(1);
        expect(statusEvents(requests).filter((s) => s.status === 'leaving')).toHaveLength(1);
        expect(session.currentState).toBe('left');
    });

    it('should report leaving as soon as a leave is accepted', async () => {
        const { session } = setup();
        const done = session.start();

        session.requestLeave();

        expect(session.currentState).toBe('joining');
        expect(session.snapshot().state).toBe('leaving');
        await done;
        expect(session.snapshot().state).toBe('left');
    });

    it('should stop sending webhooks once cancelled', async () => {
        const { adapter, backend, requests, session } = setup({ respond: () => 500, retryBaseMs: 60000 });
        const done = session.start();

        adapter.admit();
        await admitted(session, backend);
        await vi.waitFor(() => expect(requests).toHaveLength(1));
        session.cancel('Service shutting down');
        await done;

        expect(requests).toHaveLength(1);
        expect(statusEvents(requests)).toEqual([{ status: 'joining', message: null }]);
        expect(session.stateHistory).toEqual(['joining', 'in_meeting', 'leaving', 'left']);
        expect(adapter.leaveCalls).toBe(1);
    });

    it('should finish leaving when the adapter never confirms', async () => {
        const { adapter, requests, session } = setup({ settings: { leaveTimeoutMs: 20 } });
        adapter.confirmLeave = false;
        const done = session.start();

        session.requestLeave();
        await done;

        expect(statusEvents(requests)).toEqual([
            { status: 'joining', message: null },
            { status: 'leaving', message: 'Leave requested' },
            { status: 'left', message: null },
        ]);
    });

    it('should treat a failing leave as having left', async () => {
        const { adapter, backend, session } = setup();
        adapter.leaveError = new Error('hangup button missing');
        const done = session.start();

        adapter.admit();
        await admitted(session, backend);
        session.requestLeave();
        await done;

        expect(session.currentState).toBe('left');
    });

    it('should leave once the maximum duration is reached', async () => {
        // 30ms
        const { adapter, backend, requests, session } = setup({ settings: { maxDurationMinutes: 0.0005 } });
        const done = session.start();

        adapter.admit();
        await admitted(session, backend);
        await done;

        expect(statusEvents(requests)).toContainEqual({ status: 'leaving', message: 'Maximum meeting duration reached' });
        expect(session.currentState).toBe('left');
    });

    it('should keep running when the webhook keeps failing', async () => {
        const { adapter, backend, requests, session } = setup({ respond: () => 500, retryCount: 2 });
        const done = session.start();

        adapter.admit();
        await admitted(session, backend);
        session.requestLeave();
        await done;

        expect(session.stateHistory).toEqual(['joining', 'in_meeting', 'leaving', 'left']);
        // four status events, two attempts each
        expect(requests).toHaveLength(8);
    });

    it('should send nothing after the terminal status', async () => {
        const { adapter, backend, requests, session } = setup();
        const done = session.start();

        adapter.admit();
        await admitted(session, backend);
        const connection = backend.latest;
        adapter.end();
        await done;
        connection.emit({ speakerId: 'speaker_0', text: 'too late', startSec: 0, durationSec: 1, isFinal: true });

        const last = requests[requests.length - 1].body;
        expect(last.event_type).toBe('bot_status');
        expect(requests.filter((r) => r.body.event_type === 'transcription')).toHaveLength(0);
    });
});
