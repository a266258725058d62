/**
 * Session Registry
 *
 * Process-wide table of bot sessions keyed by bot id. Creates sessions,
 * hands out snapshots, relays leave requests and purges finished sessions
 * after a grace period. Passed explicitly to the HTTP layer.
 */

import { randomUUID } from 'crypto';
import { BotSession, SessionSettings } from './botSession';
import { InvalidRequestError, NotFoundError, ServiceUnavailableError } from './errors';
import { createLogger, errorMessage } from './logger';
import { MeetingAdapter } from './meetingAdapter';
import { TranscriptionBackend } from './transcriptionStream';
import { CreateBotInput, SessionSnapshot } from './types';
import { WebhookDeliverer, WebhookUrlPolicy, checkWebhookUrl } from './webhookDelivery';

const log = createLogger('SessionRegistry');

const TEAMS_HOSTS = ['teams.microsoft.com', 'teams.live.com'];

export interface RegistryOptions {
    settings: SessionSettings;
    defaultBotName: string;
    removalGraceMs: number;
    webhookPolicy: WebhookUrlPolicy;
    createAdapter: () => MeetingAdapter;
    backend: TranscriptionBackend;
    deliverer: WebhookDeliverer;
    generateId?: () => string;
}

export function generateBotId(): string {
    return `bot_${randomUUID().replace(/-/g, '').slice(0, 16)}`;
}

/**
 * Only Teams meeting links are accepted.
 */
export function checkMeetingUrl(url: string): string | null {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch {
        return 'meeting_url is not a valid URL';
    }
    if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
        return 'meeting_url must be an http(s) URL';
    }
    const host = parsed.hostname.toLowerCase();
    if (!TEAMS_HOSTS.some((teams) => host === teams || host.endsWith(`.${teams}`))) {
        return 'meeting_url must be a Microsoft Teams meeting link';
    }
    return null;
}

export class SessionRegistry {
    private readonly sessions = new Map<string, BotSession>();
    private readonly tasks = new Map<string, Promise<void>>();
    private readonly removalTimers = new Map<string, NodeJS.Timeout>();
    private readonly generateId: () => string;
    private closing = false;

    constructor(private readonly options: RegistryOptions) {
        this.generateId = options.generateId ?? generateBotId;
    }

    /**
     * Validate the request, register a session in `joining` and start it.
     * Returns without waiting for the join.
     */
    create(input: CreateBotInput): SessionSnapshot {
        if (this.closing) throw new ServiceUnavailableError('Service is shutting down');

        const meetingUrl = input.meetingUrl.trim();
        const webhookUrl = input.webhookUrl.trim();
        const botName = input.botName?.trim() || this.options.defaultBotName;
        const language = input.language?.trim() || this.options.settings.language;

        if (!meetingUrl) throw new InvalidRequestError('meeting_url is required');
        if (!webhookUrl) throw new InvalidRequestError('webhook_url is required');

        const meetingProblem = checkMeetingUrl(meetingUrl);
        if (meetingProblem) throw new InvalidRequestError(meetingProblem);

        const webhookProblem = checkWebhookUrl(webhookUrl, this.options.webhookPolicy);
        if (webhookProblem) throw new InvalidRequestError(webhookProblem);

        let id = this.generateId();
        while (this.sessions.has(id)) {
            id = this.generateId();
        }

        const session = new BotSession({
            id,
            meetingUrl,
            webhookUrl,
            botName,
            metadata: input.metadata,
            settings: { ...this.options.settings, language },
            adapter: this.options.createAdapter(),
            backend: this.options.backend,
            deliverer: this.options.deliverer,
        });

        this.sessions.set(id, session);
        const task = session
            .start()
            .catch((error: unknown) => {
                log.error(`Bot ${id} run loop crashed: ${errorMessage(error)}`);
            })
            .then(() => this.scheduleRemoval(id));
        this.tasks.set(id, task);

        log.info(`Created bot session ${id} for meeting ${meetingUrl}`);
        return session.snapshot();
    }

    get(id: string): SessionSnapshot {
        return this.require(id).snapshot();
    }

    /**
     * Ask a bot to leave. Repeated calls on a leaving or finished bot do nothing.
     * The returned snapshot already reports `leaving`.
     */
    requestLeave(id: string): SessionSnapshot {
        const session = this.require(id);
        session.requestLeave();
        return session.snapshot();
    }

    list(): SessionSnapshot[] {
        return Array.from(this.sessions.values()).map((session) => session.snapshot());
    }

    activeCount(): number {
        let count = 0;
        for (const session of this.sessions.values()) {
            if (session.currentState === 'in_meeting') count++;
        }
        return count;
    }

    get size(): number {
        return this.sessions.size;
    }

    /**
     * Resolves when the session's run loop has finished and its events drained.
     */
    async waitForCompletion(id: string): Promise<void> {
        const task = this.tasks.get(id);
        if (!task) throw new NotFoundError(id);
        await task;
    }

    /**
     * Refuse new bots, make every bot leave and wait for all of them to finish.
     * Webhook events not yet sent are dropped.
     */
    async shutdown(): Promise<void> {
        this.closing = true;
        log.info(`Shutting down ${this.sessions.size} session(s)...`);
        for (const session of this.sessions.values()) {
            session.cancel('Service shutting down');
        }
        await Promise.all(this.tasks.values());

        for (const timer of this.removalTimers.values()) {
            clearTimeout(timer);
        }
        this.removalTimers.clear();
        this.sessions.clear();
        this.tasks.clear();
        log.info('Shutdown complete');
    }

    private require(id: string): BotSession {
        const session = this.sessions.get(id);
        if (!session) throw new NotFoundError(id);
        return session;
    }

    private scheduleRemoval(id: string): void {
        const remove = () => {
            this.removalTimers.delete(id);
            this.sessions.delete(id);
            this.tasks.delete(id);
            log.info(`Removed session ${id} from memory`);
        };

        if (this.options.removalGraceMs <= 0) {
            remove();
            return;
        }

        const timer = setTimeout(remove, this.options.removalGraceMs);
        timer.unref();
        this.removalTimers.set(id, timer);
    }
}
