import dotenv from 'dotenv';

dotenv.config();

export interface ServiceConfig {
    port: number;
    host: string;
    debug: boolean;
    apiKey: string | null;
    deepgram: {
        apiKey: string;
        model: string;
        language: string;
        sampleRate: number;
    };
    defaultBotName: string;
    webhook: {
        timeoutMs: number;
        retryCount: number;
        retryBaseMs: number;
        allowInsecure: boolean;
        allowPrivate: boolean;
    };
    transcription: {
        retryCount: number;
        retryBaseMs: number;
        audioBufferMaxChunks: number;
        flushBufferOnReconnect: boolean;
    };
    session: {
        removalGraceMs: number;
        leaveTimeoutMs: number;
        joinTimeoutMs: number;
        maxDurationMinutes: number;
    };
    browser: {
        displayWidth: number;
        displayHeight: number;
        headless: boolean;
        executablePath: string | null;
    };
}

type Env = Record<string, string | undefined>;

function int(env: Env, name: string, fallback: number, min = 0): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
    }
    return value;
}

function bool(env: Env, name: string, fallback: boolean): boolean {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    return raw.trim().toLowerCase() === 'true';
}

function str(env: Env, name: string, fallback: string): string {
    const raw = env[name];
    return raw === undefined || raw.trim() === '' ? fallback : raw.trim();
}

function optional(env: Env, name: string): string | null {
    const raw = env[name];
    return raw === undefined || raw.trim() === '' ? null : raw.trim();
}

/**
 * Parse service configuration from environment variables.
 * Throws on malformed numeric values so a bad deploy fails at startup.
 */
export function loadConfig(env: Env = process.env): ServiceConfig {
    const debug = bool(env, 'DEBUG', false);

    return Object.freeze({
        port: int(env, 'PORT', 8000),
        host: str(env, 'HOST', '0.0.0.0'),
        debug,
        apiKey: optional(env, 'API_KEY'),
        deepgram: {
            apiKey: str(env, 'DEEPGRAM_API_KEY', ''),
            model: str(env, 'DEEPGRAM_MODEL', 'nova-2'),
            language: str(env, 'DEEPGRAM_LANGUAGE', 'en'),
            sampleRate: int(env, 'DEEPGRAM_SAMPLE_RATE', 16000, 1),
        },
        defaultBotName: str(env, 'DEFAULT_BOT_NAME', 'Transcription Bot'),
        webhook: {
            timeoutMs: int(env, 'WEBHOOK_TIMEOUT_SECONDS', 30, 1) * 1000,
            retryCount: int(env, 'WEBHOOK_RETRY_COUNT', 3, 1),
            retryBaseMs: int(env, 'WEBHOOK_RETRY_BASE_MS', 500),
            allowInsecure: bool(env, 'ALLOW_INSECURE_WEBHOOKS', debug),
            allowPrivate: bool(env, 'ALLOW_PRIVATE_WEBHOOKS', false),
        },
        transcription: {
            retryCount: int(env, 'TRANSCRIPTION_RETRY_COUNT', 3),
            retryBaseMs: int(env, 'TRANSCRIPTION_RETRY_BASE_MS', 500),
            audioBufferMaxChunks: int(env, 'AUDIO_BUFFER_MAX_CHUNKS', 50, 1),
            flushBufferOnReconnect: bool(env, 'AUDIO_BUFFER_FLUSH_ON_RECONNECT', true),
        },
        session: {
            removalGraceMs: int(env, 'SESSION_REMOVAL_GRACE_MS', 30000),
            leaveTimeoutMs: int(env, 'LEAVE_TIMEOUT_MS', 15000, 1),
            joinTimeoutMs: int(env, 'JOIN_TIMEOUT_MS', 120000, 1),
            maxDurationMinutes: int(env, 'MAX_MEETING_DURATION_MINUTES', 0),
        },
        browser: {
            displayWidth: int(env, 'DISPLAY_WIDTH', 1920, 1),
            displayHeight: int(env, 'DISPLAY_HEIGHT', 1080, 1),
            headless: env.HEADLESS !== 'false',
            executablePath: optional(env, 'CHROME_EXECUTABLE_PATH'),
        },
    });
}

export const config: ServiceConfig = loadConfig();

export default config;
