/**
 * Transcription Stream
 *
 * One logical streaming session with the ASR backend for one bot. Survives
 * transport drops by reconnecting with backoff while buffering audio, and
 * hands fragments to the session through a channel.
 */

import { AbortError, withRetry } from './backoff';
import { Channel } from './channel';
import { StreamFailureError } from './errors';
import { createLogger, errorMessage } from './logger';
import { AudioFormat, TranscriptFragment } from './types';

const log = createLogger('Transcription');

/**
 * A result as the backend reports it, relative to its own connection.
 */
export interface BackendResult {
    speakerId: string;
    text: string;
    startSec: number;
    durationSec: number;
    isFinal: boolean;
}

export interface BackendHandlers {
    onResult(result: BackendResult): void;
    /** Transport dropped without being asked to close */
    onDisconnect(reason: string): void;
}

export interface BackendConnection {
    send(chunk: Buffer): void;
    close(): Promise<void>;
}

export interface BackendConnectOptions {
    model: string;
    language: string;
    format: AudioFormat;
}

export interface TranscriptionBackend {
    connect(options: BackendConnectOptions, handlers: BackendHandlers): Promise<BackendConnection>;
}

export interface TranscriptionStreamOptions {
    botId: string;
    model: string;
    language: string;
    /** Reconnect attempts after a drop; 0 fails on the first drop */
    retryCount: number;
    retryBaseMs: number;
    bufferMaxChunks: number;
    flushBufferOnReconnect: boolean;
}

export type StreamState = 'idle' | 'open' | 'reconnecting' | 'closed' | 'failed';

interface BufferedChunk {
    data: Buffer;
    offsetMs: number;
}

export class TranscriptionStream {
    private state: StreamState = 'idle';
    private format: AudioFormat | null = null;
    private connection: BackendConnection | null = null;
    private connectionId = 0;
    private readonly output = new Channel<TranscriptFragment>();
    private buffer: BufferedChunk[] = [];
    private droppedChunks = 0;
    private receivedMs = 0;
    private baseOffsetMs = 0;
    private lastFinalEndMs = -1;
    private reconnects = 0;
    private reconnecting: Promise<void> | null = null;
    private closing: Promise<void> | null = null;
    private readonly abortController = new AbortController();
    private failureError: StreamFailureError | null = null;

    constructor(
        private readonly backend: TranscriptionBackend,
        private readonly options: TranscriptionStreamOptions
    ) {}

    get status(): StreamState {
        return this.state;
    }

    get failure(): StreamFailureError | null {
        return this.failureError;
    }

    get stats(): { reconnects: number; droppedChunks: number; bufferedChunks: number } {
        return { reconnects: this.reconnects, droppedChunks: this.droppedChunks, bufferedChunks: this.buffer.length };
    }

    /**
     * Establish the first connection. No retries here: a failed handshake
     * throws a BackendUnavailable StreamFailureError.
     */
    async open(format: AudioFormat): Promise<void> {
        if (this.state !== 'idle') {
            throw new StreamFailureError(`Cannot open a stream that is ${this.state}`);
        }
        this.format = format;

        try {
            const connection = await this.connect();
            if (this.state !== 'idle') {
                // closed while the handshake was in progress
                await connection.close();
                return;
            }
            this.activate(connection);
            log.info(`Stream open for ${this.options.botId} (model=${this.options.model}, language=${this.options.language})`);
        } catch (error) {
            const failure = new StreamFailureError(
                `Transcription backend unavailable: ${errorMessage(error)}`,
                'BackendUnavailable'
            );
            this.fail(failure);
            throw failure;
        }
    }

    /**
     * Hand an audio chunk to the backend. Never throws; while no connection
     * is up the chunk is buffered, dropping the oldest past the bound.
     */
    send(chunk: Buffer): void {
        if (this.state === 'closed' || this.state === 'failed') return;

        const offsetMs = this.receivedMs;
        this.receivedMs += this.chunkDurationMs(chunk);

        if (this.state === 'open' && this.connection) {
            try {
                this.connection.send(chunk);
                return;
            } catch (error) {
                this.bufferChunk({ data: chunk, offsetMs });
                this.handleDisconnect(this.connectionId, `send failed: ${errorMessage(error)}`);
                return;
            }
        }

        this.bufferChunk({ data: chunk, offsetMs });
    }

    /**
     * Fragments in the order they were produced. Ends on close or failure.
     */
    fragments(): AsyncIterable<TranscriptFragment> {
        return this.output;
    }

    /**
     * Tear the stream down. The backend connection is closed exactly once,
     * whether or not a failure or reconnect is racing with this call.
     */
    close(): Promise<void> {
        if (!this.closing) {
            this.closing = this.shutdown();
        }
        return this.closing;
    }

    private async shutdown(): Promise<void> {
        if (this.state !== 'failed') {
            this.state = 'closed';
        }
        this.abortController.abort();
        this.buffer = [];
        this.output.close();

        const connection = this.connection;
        this.connection = null;
        if (connection) {
            await this.closeConnection(connection);
        }
        if (this.reconnecting) {
            await this.reconnecting;
        }
        log.info(
            `Stream closed for ${this.options.botId} (${this.reconnects} reconnects, ${this.droppedChunks} chunks dropped)`
        );
    }

    private connect(): Promise<BackendConnection> {
        if (!this.format) {
            return Promise.reject(new StreamFailureError('Stream has no audio format'));
        }

        const id = ++this.connectionId;
        return this.backend.connect(
            { model: this.options.model, language: this.options.language, format: this.format },
            {
                onResult: (result) => this.handleResult(id, result),
                onDisconnect: (reason) => this.handleDisconnect(id, reason),
            }
        );
    }

    /**
     * Switch to a fresh connection and replay or discard buffered audio.
     */
    private activate(connection: BackendConnection): void {
        const replay = this.options.flushBufferOnReconnect ? this.buffer : [];
        this.buffer = [];

        // Backend timestamps restart at zero on every connection
        this.baseOffsetMs = replay.length > 0 ? replay[0].offsetMs : this.receivedMs;
        this.connection = connection;
        this.state = 'open';

        for (const chunk of replay) {
            connection.send(chunk.data);
        }
    }

    private handleResult(id: number, result: BackendResult): void {
        if (id !== this.connectionId || this.state !== 'open') return;

        const text = result.text.trim();
        if (!text) return;

        // Chunk offsets are fractional at sample rates that do not divide evenly
        const startMs = Math.round(this.baseOffsetMs + result.startSec * 1000);
        const durationMs = Math.round(result.durationSec * 1000);
        const endMs = startMs + durationMs;

        // Covered by a final already handed out: a replay after reconnect
        if (endMs <= this.lastFinalEndMs) {
            log.debug(`Skipping already-finalized fragment for ${this.options.botId}: "${text}"`);
            return;
        }
        if (result.isFinal) {
            this.lastFinalEndMs = endMs;
        }

        this.output.push({
            speakerId: result.speakerId,
            text,
            startMs,
            durationMs,
            isFinal: result.isFinal,
        });
    }

    private handleDisconnect(id: number, reason: string): void {
        if (id !== this.connectionId || this.state !== 'open') return;

        log.warn(`Stream for ${this.options.botId} disconnected: ${reason}`);
        this.state = 'reconnecting';

        const stale = this.connection;
        this.connection = null;
        if (stale) {
            this.reconnecting = this.closeConnection(stale).then(() => this.reconnect(reason));
        } else {
            this.reconnecting = this.reconnect(reason);
        }

        // Partials from the dropped connection are superseded once the backend resyncs
        const discarded = this.output.discard((fragment) => !fragment.isFinal);
        if (discarded > 0) {
            log.debug(`Discarded ${discarded} in-flight partial(s) for ${this.options.botId}`);
        }
    }

    private async reconnect(reason: string): Promise<void> {
        if (this.options.retryCount < 1) {
            this.fail(new StreamFailureError(`Transcription stream lost: ${reason}`));
            return;
        }

        try {
            const connection = await withRetry(
                async (attempt) => {
                    this.reconnects++;
                    log.info(`Reconnecting stream for ${this.options.botId} (attempt ${attempt}/${this.options.retryCount})`);
                    return this.connect();
                },
                {
                    maxAttempts: this.options.retryCount,
                    baseDelayMs: this.options.retryBaseMs,
                    factor: 2,
                    signal: this.abortController.signal,
                    onRetry: (error, attempt, delayMs) =>
                        log.warn(`Reconnect attempt ${attempt} failed: ${errorMessage(error)}; retrying in ${delayMs}ms`),
                }
            );

            if (this.state !== 'reconnecting') {
                await this.closeConnection(connection);
                return;
            }
            this.activate(connection);
            log.info(`Stream for ${this.options.botId} reconnected`);
        } catch (error) {
            if (error instanceof AbortError || this.state !== 'reconnecting') return;
            this.fail(
                new StreamFailureError(
                    `Transcription stream lost after ${this.options.retryCount} reconnect attempts: ${errorMessage(error)}`
                )
            );
        }
    }

    private fail(error: StreamFailureError): void {
        if (this.state === 'closed' || this.state === 'failed') return;
        log.error(`Stream for ${this.options.botId} failed: ${error.message}`);
        this.state = 'failed';
        this.failureError = error;
        this.buffer = [];
        this.output.close();
    }

    private bufferChunk(chunk: BufferedChunk): void {
        this.buffer.push(chunk);
        if (this.buffer.length > this.options.bufferMaxChunks) {
            this.buffer.shift();
            this.droppedChunks++;
            if (this.droppedChunks === 1 || this.droppedChunks % 100 === 0) {
                log.warn(`Audio buffer full for ${this.options.botId}, ${this.droppedChunks} chunk(s) dropped so far`);
            }
        }
    }

    private chunkDurationMs(chunk: Buffer): number {
        const format = this.format;
        if (!format) return 0;
        // linear16: two bytes per sample per channel
        return (chunk.length / (format.sampleRate * 2 * format.channels)) * 1000;
    }

    private async closeConnection(connection: BackendConnection): Promise<void> {
        try {
            await connection.close();
        } catch (error) {
            log.warn(`Error closing backend connection for ${this.options.botId}: ${errorMessage(error)}`);
        }
    }
}
