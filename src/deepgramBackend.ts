/**
 * Deepgram live streaming backend
 *
 * Speaks the Deepgram /v1/listen WebSocket protocol directly: binary audio
 * frames out, JSON `Results` messages in.
 */

import WebSocket from 'ws';
import { z } from 'zod';
import { createLogger, errorMessage } from './logger';
import {
    BackendConnectOptions,
    BackendConnection,
    BackendHandlers,
    BackendResult,
    TranscriptionBackend,
} from './transcriptionStream';

const log = createLogger('Deepgram');

export const DEEPGRAM_LISTEN_URL = 'wss://api.deepgram.com/v1/listen';

const KEEPALIVE_INTERVAL_MS = 8000;
const CONNECT_TIMEOUT_MS = 10000;
const CLOSE_TIMEOUT_MS = 2000;

const ResultsMessage = z.object({
    type: z.literal('Results'),
    start: z.number(),
    duration: z.number(),
    is_final: z.boolean().default(false),
    channel: z.object({
        alternatives: z
            .array(
                z.object({
                    transcript: z.string(),
                    words: z
                        .array(z.object({ speaker: z.number().int().optional() }).passthrough())
                        .default([]),
                })
            )
            .default([]),
    }),
});

const ErrorMessage = z.object({
    type: z.literal('Error'),
    description: z.string().optional(),
    message: z.string().optional(),
});

export interface DeepgramBackendOptions {
    apiKey: string;
    url?: string;
}

/**
 * Map one Deepgram message onto a backend result. Returns null for
 * messages that carry no transcript (metadata, speech events, empty results).
 */
export function parseDeepgramMessage(raw: string): BackendResult | { error: string } | null {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch {
        return null;
    }

    const error = ErrorMessage.safeParse(json);
    if (error.success) {
        return { error: error.data.description ?? error.data.message ?? 'Deepgram error' };
    }

    const results = ResultsMessage.safeParse(json);
    if (!results.success) return null;

    const alternative = results.data.channel.alternatives[0];
    if (!alternative || !alternative.transcript.trim()) return null;

    const speaker = alternative.words.find((word) => word.speaker !== undefined)?.speaker;
    return {
        speakerId: speaker === undefined ? 'speaker_0' : `speaker_${speaker}`,
        text: alternative.transcript,
        startSec: results.data.start,
        durationSec: results.data.duration,
        isFinal: results.data.is_final,
    };
}

export function buildListenUrl(baseUrl: string, options: BackendConnectOptions): string {
    const params = new URLSearchParams({
        model: options.model,
        language: options.language,
        encoding: options.format.encoding,
        sample_rate: String(options.format.sampleRate),
        channels: String(options.format.channels),
        interim_results: 'true',
        smart_format: 'true',
        punctuate: 'true',
        diarize: 'true',
    });
    return `${baseUrl}?${params.toString()}`;
}

class DeepgramConnection implements BackendConnection {
    private closedByClient = false;
    private keepAlive: NodeJS.Timeout | null = null;

    constructor(
        private readonly ws: WebSocket,
        private readonly handlers: BackendHandlers
    ) {
        ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
            if (isBinary) return;
            this.handleMessage(data.toString());
        });

        ws.on('error', (error: Error) => {
            log.error(`WebSocket error: ${error.message}`);
        });

        ws.on('close', (code: number, reason: Buffer) => {
            this.stopKeepAlive();
            if (!this.closedByClient) {
                this.handlers.onDisconnect(`closed with code ${code}${reason.length ? ` (${reason.toString()})` : ''}`);
            }
        });

        this.keepAlive = setInterval(() => {
            if (ws.readyState === WebSocket.OPEN) {
                ws.send(JSON.stringify({ type: 'KeepAlive' }));
            }
        }, KEEPALIVE_INTERVAL_MS);
    }

    send(chunk: Buffer): void {
        if (this.ws.readyState !== WebSocket.OPEN) {
            throw new Error('WebSocket not open');
        }
        this.ws.send(chunk);
    }

    async close(): Promise<void> {
        if (this.closedByClient) return;
        this.closedByClient = true;
        this.stopKeepAlive();

        if (this.ws.readyState === WebSocket.CLOSED) return;

        await new Promise<void>((resolve) => {
            const timer = setTimeout(() => {
                this.ws.terminate();
                resolve();
            }, CLOSE_TIMEOUT_MS);

            this.ws.once('close', () => {
                clearTimeout(timer);
                resolve();
            });

            if (this.ws.readyState === WebSocket.OPEN) {
                // Ask Deepgram to flush pending results before closing
                this.ws.send(JSON.stringify({ type: 'CloseStream' }));
                this.ws.close(1000, 'Client disconnect');
            } else {
                this.ws.terminate();
            }
        });
    }

    private handleMessage(raw: string): void {
        const parsed = parseDeepgramMessage(raw);
        if (parsed === null) return;

        if ('error' in parsed) {
            log.error(`Deepgram reported an error: ${parsed.error}`);
            this.ws.close(1011, 'Backend error');
            return;
        }

        this.handlers.onResult(parsed);
    }

    private stopKeepAlive(): void {
        if (this.keepAlive) {
            clearInterval(this.keepAlive);
            this.keepAlive = null;
        }
    }
}

export class DeepgramBackend implements TranscriptionBackend {
    private readonly url: string;

    constructor(private readonly options: DeepgramBackendOptions) {
        this.url = options.url ?? DEEPGRAM_LISTEN_URL;
    }

    async connect(options: BackendConnectOptions, handlers: BackendHandlers): Promise<BackendConnection> {
        if (!this.options.apiKey) {
            throw new Error('DEEPGRAM_API_KEY is not configured');
        }

        const ws = new WebSocket(buildListenUrl(this.url, options), {
            headers: { Authorization: `Token ${this.options.apiKey}` },
        });

        await new Promise<void>((resolve, reject) => {
            const timeout = setTimeout(() => {
                ws.terminate();
                reject(new Error('Connection timeout'));
            }, CONNECT_TIMEOUT_MS);

            ws.once('open', () => {
                clearTimeout(timeout);
                ws.removeAllListeners('error');
                resolve();
            });

            ws.once('error', (error: Error) => {
                clearTimeout(timeout);
                reject(error);
            });
        }).catch((error: unknown) => {
            log.warn(`Connection failed: ${errorMessage(error)}`);
            throw error;
        });

        log.debug(`Connected to ${this.url}`);
        return new DeepgramConnection(ws, handlers);
    }
}
