/**
 * Bot Session
 *
 * Drives one bot through its lifecycle. Every state change goes through the
 * session's inbox and is applied by its run loop alone; meeting signals, leave
 * requests, stream failures and timers only ever push events onto that inbox.
 */

import { SessionEvent, Transition, isForward, isTerminal, transition } from './botState';
import { Channel } from './channel';
import { InternalFaultError } from './errors';
import { createLogger, errorMessage } from './logger';
import { MeetingAdapter, MeetingSignal } from './meetingAdapter';
import { TranscriptionBackend, TranscriptionStream } from './transcriptionStream';
import { AudioFormat, BotState, Metadata, Participant, SessionSnapshot } from './types';
import { WebhookDeliverer, WebhookDispatcher, buildStatusEvent, buildTranscriptionEvent } from './webhookDelivery';

const log = createLogger('BotSession');

export interface SessionSettings {
    model: string;
    language: string;
    sampleRate: number;
    transcriptionRetryCount: number;
    transcriptionRetryBaseMs: number;
    audioBufferMaxChunks: number;
    flushBufferOnReconnect: boolean;
    leaveTimeoutMs: number;
    maxDurationMinutes: number;
}

export interface BotSessionInit {
    id: string;
    meetingUrl: string;
    webhookUrl: string;
    botName: string;
    metadata?: Metadata;
    settings: SessionSettings;
    adapter: MeetingAdapter;
    backend: TranscriptionBackend;
    deliverer: WebhookDeliverer;
}

export class BotSession {
    readonly id: string;
    readonly meetingUrl: string;
    readonly webhookUrl: string;
    readonly botName: string;
    readonly createdAt = new Date();

    private state: BotState = 'joining';
    private endedAt: Date | null = null;
    private error: string | null = null;
    private terminalMessage: string | null = null;
    private leaveRequested = false;
    private readonly participants = new Map<string, Participant>();
    private readonly history: BotState[] = ['joining'];

    private readonly inbox = new Channel<SessionEvent>();
    private readonly dispatcher: WebhookDispatcher;
    private stream: TranscriptionStream | null = null;
    private audioPump: Promise<void> | null = null;
    private fragmentPump: Promise<void> | null = null;
    private signalPump: Promise<void> | null = null;
    private joinTask: Promise<void> | null = null;
    private leaveTask: Promise<void> | null = null;
    private leaveTimer: NodeJS.Timeout | null = null;
    private durationTimer: NodeJS.Timeout | null = null;
    private running: Promise<void> | null = null;

    constructor(private readonly init: BotSessionInit) {
        this.id = init.id;
        this.meetingUrl = init.meetingUrl;
        this.webhookUrl = init.webhookUrl;
        this.botName = init.botName;
        this.dispatcher = new WebhookDispatcher(init.id, init.webhookUrl, init.deliverer);
    }

    get currentState(): BotState {
        return this.state;
    }

    /**
     * Every state the session has been in, oldest first.
     */
    get stateHistory(): readonly BotState[] {
        return this.history;
    }

    snapshot(): SessionSnapshot {
        return {
            id: this.id,
            // An accepted leave is reported before the run loop gets to it
            state: this.leaveRequested && !isTerminal(this.state) ? 'leaving' : this.state,
            meetingUrl: this.meetingUrl,
            webhookUrl: this.webhookUrl,
            botName: this.botName,
            language: this.init.settings.language,
            createdAt: this.createdAt,
            endedAt: this.endedAt,
            error: this.error,
            participants: Array.from(this.participants.values()),
        };
    }

    /**
     * Start the run loop. Resolves once the session is terminal, its
     * resources are released and its webhook queue has drained.
     */
    start(): Promise<void> {
        if (!this.running) {
            this.running = this.run();
        }
        return this.running;
    }

    /**
     * Begin graceful teardown. No-op once leaving or finished.
     */
    requestLeave(reason = 'Leave requested'): void {
        if (this.leaveRequested || this.state === 'leaving' || isTerminal(this.state)) return;
        this.leaveRequested = true;
        this.inbox.push({ type: 'leave_requested', reason });
    }

    /**
     * Leave and stop sending webhooks. Events not yet sent are dropped, so
     * consumers see nothing past the delivery already in flight.
     */
    cancel(reason: string): void {
        this.dispatcher.cancel();
        this.requestLeave(reason);
    }

    private async run(): Promise<void> {
        log.info(`Bot ${this.id} joining ${this.meetingUrl} as "${this.botName}"`);
        this.emitStatus('joining', null);

        this.signalPump = this.pumpSignals();
        this.joinTask = this.init.adapter.join(this.meetingUrl, this.botName).catch((error: unknown) => {
            this.inbox.push({ type: 'join_failed', reason: `Failed to join meeting: ${errorMessage(error)}` });
        });

        try {
            for await (const event of this.inbox) {
                try {
                    await this.handle(event);
                } catch (error) {
                    const fault = new InternalFaultError(`Internal error: ${errorMessage(error)}`);
                    log.error(`Bot ${this.id} fault while handling ${event.type}:`, error);
                    this.apply({ type: 'fault', reason: fault.message });
                }
                if (isTerminal(this.state)) break;
            }
        } finally {
            await this.finalize();
        }
    }

    private async handle(event: SessionEvent): Promise<void> {
        const previous = this.state;
        const change = this.apply(event);
        if (!change) return;

        if (change.next === 'in_meeting') {
            await this.startTranscription();
            this.startDurationTimer();
        } else if (change.next === 'leaving' && previous !== 'leaving') {
            this.beginLeave();
        }
    }

    /**
     * Apply a transition synchronously and emit its status event.
     */
    private apply(event: SessionEvent): Transition | null {
        const change = transition(this.state, event);
        if (!change) {
            log.debug(`Bot ${this.id} ignoring ${event.type} while ${this.state}`);
            return null;
        }
        if (!isForward(this.state, change.next)) {
            log.error(`Bot ${this.id} refusing backward transition ${this.state} -> ${change.next}`);
            return null;
        }

        log.info(`Bot ${this.id} state changed: ${this.state} -> ${change.next}`);
        this.state = change.next;
        this.history.push(change.next);

        if (change.next === 'error') {
            this.error = change.message;
        }
        if (isTerminal(change.next)) {
            this.endedAt = new Date();
        }

        // Terminal status goes out from finalize, after the stream is closed
        if (!isTerminal(change.next)) {
            this.emitStatus(change.next, change.message);
        } else {
            this.terminalMessage = change.message;
        }
        return change;
    }

    private async startTranscription(): Promise<void> {
        const settings = this.init.settings;
        const stream = new TranscriptionStream(this.init.backend, {
            botId: this.id,
            model: settings.model,
            language: settings.language,
            retryCount: settings.transcriptionRetryCount,
            retryBaseMs: settings.transcriptionRetryBaseMs,
            bufferMaxChunks: settings.audioBufferMaxChunks,
            flushBufferOnReconnect: settings.flushBufferOnReconnect,
        });
        this.stream = stream;

        const format: AudioFormat = { encoding: 'linear16', sampleRate: settings.sampleRate, channels: 1 };
        try {
            await stream.open(format);
        } catch (error) {
            this.inbox.push({ type: 'stream_failed', reason: errorMessage(error) });
            return;
        }

        this.audioPump = this.pumpAudio(stream);
        this.fragmentPump = this.pumpFragments(stream);
    }

    private beginLeave(): void {
        this.clearDurationTimer();
        this.leaveTask = this.init.adapter.leave().catch((error: unknown) => {
            log.warn(`Bot ${this.id} leave failed, treating as left: ${errorMessage(error)}`);
            this.inbox.push({ type: 'left' });
        });

        this.leaveTimer = setTimeout(() => {
            log.warn(`Bot ${this.id} did not confirm leaving within ${this.init.settings.leaveTimeoutMs}ms`);
            this.inbox.push({ type: 'left' });
        }, this.init.settings.leaveTimeoutMs);
    }

    private startDurationTimer(): void {
        const minutes = this.init.settings.maxDurationMinutes;
        if (minutes <= 0) return;
        this.durationTimer = setTimeout(() => {
            log.info(`Bot ${this.id} reached the maximum duration of ${minutes} minutes`);
            this.requestLeave('Maximum meeting duration reached');
        }, minutes * 60 * 1000);
    }

    private clearDurationTimer(): void {
        if (this.durationTimer) {
            clearTimeout(this.durationTimer);
            this.durationTimer = null;
        }
    }

    private async pumpSignals(): Promise<void> {
        for await (const signal of this.init.adapter.signals) {
            this.onSignal(signal);
        }
    }

    private onSignal(signal: MeetingSignal): void {
        switch (signal.type) {
            case 'participant_joined':
                this.participants.set(signal.participant.id, signal.participant);
                break;
            case 'participant_left':
                this.participants.delete(signal.participant.id);
                break;
            case 'joined':
            case 'ended':
            case 'removed':
            case 'left':
                this.inbox.push({ type: signal.type });
                break;
            case 'join_failed':
                this.inbox.push({ type: 'join_failed', reason: signal.reason });
                break;
            case 'error':
                this.inbox.push({ type: 'meeting_error', reason: signal.reason });
                break;
        }
    }

    private async pumpAudio(stream: TranscriptionStream): Promise<void> {
        for await (const chunk of this.init.adapter.audio) {
            if (isTerminal(this.state)) break;
            stream.send(chunk);
        }
    }

    private async pumpFragments(stream: TranscriptionStream): Promise<void> {
        for await (const fragment of stream.fragments()) {
            if (this.state !== 'in_meeting' && this.state !== 'leaving') break;
            this.dispatcher.enqueue(buildTranscriptionEvent(this.id, fragment, this.init.metadata));
        }

        if (stream.failure) {
            this.inbox.push({ type: 'stream_failed', reason: stream.failure.message });
        }
    }

    /**
     * Release everything in order: stream first so no transcription event
     * follows the terminal status, then the adapter, then drain webhooks.
     */
    private async finalize(): Promise<void> {
        this.clearDurationTimer();
        if (this.leaveTimer) {
            clearTimeout(this.leaveTimer);
            this.leaveTimer = null;
        }

        if (!isTerminal(this.state)) {
            // Inbox closed underneath the loop; should not happen
            this.apply({ type: 'fault', reason: 'Session loop ended unexpectedly' });
        }

        try {
            if (this.stream) {
                await this.stream.close();
            }
            if (this.fragmentPump) {
                await this.fragmentPump;
            }

            await this.init.adapter.dispose();
            await Promise.all([this.audioPump, this.signalPump, this.joinTask, this.leaveTask]);
        } catch (error) {
            log.error(`Bot ${this.id} error while releasing resources:`, error);
        }

        this.inbox.close();
        this.emitStatus(this.state, this.terminalMessage);
        await this.dispatcher.close();

        const stats = this.dispatcher.stats;
        log.info(
            `Bot ${this.id} finished in state ${this.state} ` +
                `(${stats.delivered} events delivered, ${stats.dropped} dropped, ` +
                `${this.init.adapter.droppedAudio} audio chunks dropped before transcription)`
        );
    }

    private emitStatus(status: BotState, message: string | null): void {
        this.dispatcher.enqueue(buildStatusEvent(this.id, status, message, this.init.metadata));
    }
}
