/**
 * Bot Service Entry Point
 *
 * Wires configuration, the Deepgram backend, webhook delivery and the Teams
 * adapter into a session registry, then serves the REST API.
 */

import { createApp } from './app';
import config from './config';
import { DeepgramBackend } from './deepgramBackend';
import { createLogger, errorMessage } from './logger';
import { SessionRegistry } from './sessionRegistry';
import { TeamsMeetingAdapter } from './teamsAdapter';
import { WebhookDeliverer } from './webhookDelivery';

const log = createLogger('API');

if (!config.deepgram.apiKey) {
    log.warn('DEEPGRAM_API_KEY is not set; every bot will fail once admitted');
}

const deliverer = new WebhookDeliverer({
    timeoutMs: config.webhook.timeoutMs,
    retryCount: config.webhook.retryCount,
    retryBaseMs: config.webhook.retryBaseMs,
    allowInsecure: config.webhook.allowInsecure,
    allowPrivate: config.webhook.allowPrivate,
});

const registry = new SessionRegistry({
    settings: {
        model: config.deepgram.model,
        language: config.deepgram.language,
        sampleRate: config.deepgram.sampleRate,
        transcriptionRetryCount: config.transcription.retryCount,
        transcriptionRetryBaseMs: config.transcription.retryBaseMs,
        audioBufferMaxChunks: config.transcription.audioBufferMaxChunks,
        flushBufferOnReconnect: config.transcription.flushBufferOnReconnect,
        leaveTimeoutMs: config.session.leaveTimeoutMs,
        maxDurationMinutes: config.session.maxDurationMinutes,
    },
    defaultBotName: config.defaultBotName,
    removalGraceMs: config.session.removalGraceMs,
    webhookPolicy: {
        allowInsecure: config.webhook.allowInsecure,
        allowPrivate: config.webhook.allowPrivate,
    },
    createAdapter: () =>
        new TeamsMeetingAdapter({
            sampleRate: config.deepgram.sampleRate,
            displayWidth: config.browser.displayWidth,
            displayHeight: config.browser.displayHeight,
            headless: config.browser.headless,
            executablePath: config.browser.executablePath,
            joinTimeoutMs: config.session.joinTimeoutMs,
        }),
    backend: new DeepgramBackend({ apiKey: config.deepgram.apiKey }),
    deliverer,
});

const app = createApp(registry, { apiKey: config.apiKey });

const server = app.listen(config.port, config.host, () => {
    log.info(`Bot service running on ${config.host}:${config.port}`);
    log.info(`Headless: ${config.browser.headless}`);
    log.info(`Max duration: ${config.session.maxDurationMinutes || 'unlimited'} minutes`);
    log.info(`API key required: ${config.apiKey ? 'yes' : 'no'}`);
});

// Graceful shutdown
let shuttingDown = false;

function shutdown(signal: string): void {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`Received ${signal}, shutting down...`);

    server.close();
    registry
        .shutdown()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
            log.error(`Shutdown failed: ${errorMessage(error)}`);
            process.exit(1);
        });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

export default app;
