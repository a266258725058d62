/**
 * Webhook Delivery
 *
 * Posts bot events to the caller's webhook URL. Each session owns one
 * dispatcher so its events go out strictly one after another; retries of
 * event N finish before event N+1 is attempted.
 *
 * Nothing is persisted: an event that runs out of retries is logged and dropped.
 */

import axios, { AxiosInstance, isAxiosError } from 'axios';
import { withRetry } from './backoff';
import { Channel } from './channel';
import { DeliveryFailureError } from './errors';
import { createLogger, errorMessage } from './logger';
import { BotState, Metadata, TranscriptFragment, WebhookEvent } from './types';

const log = createLogger('Webhook');

const USER_AGENT = 'meeting-transcription-bot/1.0';
const BLOCKED_HOSTS = new Set(['localhost', '127.0.0.1', '0.0.0.0', '::1', '[::1]']);

export type DeliveryOutcome = 'success' | 'retryable' | 'permanent';

export interface DeliveryAttempt {
    attempt: number;
    outcome: DeliveryOutcome;
    status: number | null;
    elapsedMs: number;
    error?: string;
}

export interface DeliveryResult {
    delivered: boolean;
    attempts: DeliveryAttempt[];
}

export interface WebhookUrlPolicy {
    allowInsecure: boolean;
    allowPrivate: boolean;
}

export interface WebhookDeliveryOptions extends WebhookUrlPolicy {
    timeoutMs: number;
    /** Total attempts per event */
    retryCount: number;
    retryBaseMs: number;
    maxRetryDelayMs?: number;
    http?: AxiosInstance;
}

function isPrivateHost(hostname: string): boolean {
    if (hostname.startsWith('10.') || hostname.startsWith('192.168.')) return true;
    const match = /^172\.(\d{1,3})\./.exec(hostname);
    if (match) {
        const second = Number(match[1]);
        return second >= 16 && second <= 31;
    }
    return false;
}

/**
 * Check a webhook URL against the delivery policy.
 * Returns the reason it is rejected, or null when it may be called.
 */
export function checkWebhookUrl(url: string, policy: WebhookUrlPolicy): string | null {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch {
        return 'webhook_url is not a valid URL';
    }

    if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
        return `Unsupported webhook URL scheme: ${parsed.protocol.replace(':', '')}`;
    }
    if (parsed.protocol === 'http:' && !policy.allowInsecure) {
        return 'webhook_url must use https';
    }

    const hostname = parsed.hostname.toLowerCase();
    if (!policy.allowPrivate && (BLOCKED_HOSTS.has(hostname) || isPrivateHost(hostname))) {
        return `webhook_url points to a private host: ${hostname}`;
    }

    return null;
}

export function buildTranscriptionEvent(
    botId: string,
    fragment: TranscriptFragment,
    metadata?: Metadata,
    now: Date = new Date()
): WebhookEvent {
    return {
        event_type: 'transcription',
        bot_id: botId,
        timestamp: now.toISOString(),
        data: {
            speaker_id: fragment.speakerId,
            // Diarization ids carry no roster name
            speaker_name: null,
            text: fragment.text,
            timestamp_ms: fragment.startMs,
            duration_ms: fragment.durationMs,
            is_final: fragment.isFinal,
            ...(metadata ? { metadata } : {}),
        },
    };
}

export function buildStatusEvent(
    botId: string,
    status: BotState,
    message: string | null,
    metadata?: Metadata,
    now: Date = new Date()
): WebhookEvent {
    return {
        event_type: 'bot_status',
        bot_id: botId,
        timestamp: now.toISOString(),
        data: {
            status,
            message,
            ...(metadata ? { metadata } : {}),
        },
    };
}

export class WebhookDeliverer {
    private readonly http: AxiosInstance;

    constructor(private readonly options: WebhookDeliveryOptions) {
        this.http = options.http ?? axios.create();
    }

    /**
     * Deliver one event, retrying transient failures. Never throws.
     * Aborting the signal stops further retries; an attempt already sent is left to finish.
     */
    async deliver(event: WebhookEvent, url: string, signal?: AbortSignal): Promise<DeliveryResult> {
        const attempts: DeliveryAttempt[] = [];

        const rejected = checkWebhookUrl(url, this.options);
        if (rejected) {
            log.error(`Not delivering ${event.event_type} for ${event.bot_id}: ${rejected}`);
            attempts.push({ attempt: 1, outcome: 'permanent', status: null, elapsedMs: 0, error: rejected });
            return { delivered: false, attempts };
        }

        try {
            await withRetry(
                async (attempt) => {
                    const started = Date.now();
                    try {
                        const status = await this.post(event, url);
                        attempts.push({ attempt, outcome: 'success', status, elapsedMs: Date.now() - started });
                    } catch (error) {
                        const failure = toDeliveryFailure(error);
                        attempts.push({
                            attempt,
                            outcome: failure.retryable ? 'retryable' : 'permanent',
                            status: failure.httpStatus,
                            elapsedMs: Date.now() - started,
                            error: failure.message,
                        });
                        log.warn(
                            `Delivery of ${event.event_type} for ${event.bot_id} failed ` +
                                `(attempt ${attempt}/${this.options.retryCount}): ${failure.message}`
                        );
                        throw failure;
                    }
                },
                {
                    maxAttempts: this.options.retryCount,
                    baseDelayMs: this.options.retryBaseMs,
                    maxDelayMs: this.options.maxRetryDelayMs ?? 10000,
                    isRetryable: (error) => error instanceof DeliveryFailureError && error.retryable,
                    signal,
                }
            );
            log.debug(`Delivered ${event.event_type} for ${event.bot_id} to ${url}`);
            return { delivered: true, attempts };
        } catch (error) {
            log.error(
                `Dropping ${event.event_type} event for ${event.bot_id} after ${attempts.length} attempt(s): ${errorMessage(error)}`
            );
            return { delivered: false, attempts };
        }
    }

    private async post(event: WebhookEvent, url: string): Promise<number> {
        const response = await this.http.post(url, event, {
            timeout: this.options.timeoutMs,
            signal: AbortSignal.timeout(this.options.timeoutMs),
            headers: {
                'Content-Type': 'application/json',
                'User-Agent': USER_AGENT,
            },
            maxRedirects: 0,
            validateStatus: () => true,
        });

        const status = response.status;
        if (status >= 200 && status < 300) return status;

        throw new DeliveryFailureError(`HTTP ${status}`, status >= 500 || status === 429, status);
    }
}

function toDeliveryFailure(error: unknown): DeliveryFailureError {
    if (error instanceof DeliveryFailureError) return error;
    if (isAxiosError(error)) {
        // No response at all: timeout, refused connection, DNS failure
        const reason = error.code ? `${error.code}: ${error.message}` : error.message;
        return new DeliveryFailureError(reason, true);
    }
    return new DeliveryFailureError(errorMessage(error), true);
}

function utteranceKey(event: WebhookEvent): string | null {
    if (event.event_type !== 'transcription') return null;
    return `${event.data.speaker_id}:${event.data.timestamp_ms}`;
}

/**
 * Per-session ordered delivery queue with a single worker.
 */
export class WebhookDispatcher {
    private readonly queue = new Channel<WebhookEvent>();
    private readonly abortController = new AbortController();
    private readonly worker: Promise<void>;
    private cancelled = false;
    private delivered = 0;
    private dropped = 0;
    private superseded = 0;

    constructor(
        private readonly botId: string,
        private readonly url: string,
        private readonly deliverer: WebhookDeliverer
    ) {
        this.worker = this.run();
    }

    get stats(): { delivered: number; dropped: number; superseded: number } {
        return { delivered: this.delivered, dropped: this.dropped, superseded: this.superseded };
    }

    /**
     * Queue an event behind everything already queued. A transcription event
     * replaces queued partials of the same utterance that have not been sent yet.
     */
    enqueue(event: WebhookEvent): boolean {
        const key = utteranceKey(event);
        if (key !== null) {
            this.superseded += this.queue.discard(
                (queued) =>
                    queued.event_type === 'transcription' && !queued.data.is_final && utteranceKey(queued) === key
            );
        }
        if (this.queue.push(event)) return true;

        this.dropped++;
        log.debug(`Dispatcher for ${this.botId} is stopped, not sending ${event.event_type}`);
        return false;
    }

    /**
     * Stop accepting events and resolve once everything queued has been attempted.
     */
    async close(): Promise<void> {
        this.queue.close();
        await this.worker;
    }

    /**
     * Stop sending. Queued events are dropped and later ones refused; the
     * attempt in flight (if any) finishes but is not retried.
     * `close()` still resolves once that attempt is done.
     */
    cancel(): void {
        if (this.cancelled) return;
        this.cancelled = true;

        const discarded = this.queue.discard(() => true);
        this.dropped += discarded;
        this.queue.close();
        this.abortController.abort();
        if (discarded > 0) {
            log.info(`Dispatcher for ${this.botId} cancelled with ${discarded} event(s) unsent`);
        }
    }

    private async run(): Promise<void> {
        for await (const event of this.queue) {
            const result = await this.deliverer.deliver(event, this.url, this.abortController.signal);
            if (result.delivered) {
                this.delivered++;
            } else {
                this.dropped++;
            }
        }
        log.debug(
            `Dispatcher for ${this.botId} finished: ${this.delivered} delivered, ${this.dropped} dropped, ${this.superseded} superseded`
        );
    }
}
