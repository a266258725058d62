/**
 * HTTP API
 *
 * Thin Express layer over the session registry. Handlers validate input,
 * call the registry and shape the response; they never wait on join or
 * transcription outcomes.
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { requireApiKey } from './auth';
import { BotServiceError } from './errors';
import { createLogger } from './logger';
import { CreateBotRequest, toBotResponse, toCreateBotInput } from './schemas';
import { SessionRegistry } from './sessionRegistry';
import { ErrorResponse } from './types';

const log = createLogger('API');

export interface AppOptions {
    apiKey: string | null;
}

export function createApp(registry: SessionRegistry, options: AppOptions): Express {
    const app = express();

    app.use(cors());
    app.use(express.json());

    // Health check
    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'healthy',
            active_sessions: registry.activeCount(),
            total_sessions: registry.size,
        });
    });

    const bots = express.Router();
    bots.use(requireApiKey(options.apiKey));

    /**
     * POST /bots
     * Send a bot to a meeting
     */
    bots.post('/', (req: Request, res: Response, next: NextFunction) => {
        const parsed = CreateBotRequest.safeParse(req.body ?? {});
        if (!parsed.success) {
            const body: ErrorResponse = {
                error: parsed.error.issues[0]?.message ?? 'Invalid request body',
                detail: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
            };
            res.status(400).json(body);
            return;
        }

        try {
            const snapshot = registry.create(toCreateBotInput(parsed.data));
            log.info(`Bot ${snapshot.id} requested for ${snapshot.meetingUrl}`);
            res.status(201).json(toBotResponse(snapshot));
        } catch (error) {
            next(error);
        }
    });

    /**
     * GET /bots
     * All sessions still held in memory
     */
    bots.get('/', (_req: Request, res: Response) => {
        const sessions = registry.list().map(toBotResponse);
        res.json({ bots: sessions, count: sessions.length });
    });

    /**
     * GET /bots/:id
     */
    bots.get('/:id', (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(toBotResponse(registry.get(req.params.id)));
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /bots/:id/leave
     * Ask the bot to leave; returns immediately
     */
    bots.post('/:id/leave', (req: Request, res: Response, next: NextFunction) => {
        try {
            log.info(`Leave requested for bot ${req.params.id}`);
            res.json(toBotResponse(registry.requestLeave(req.params.id)));
        } catch (error) {
            next(error);
        }
    });

    app.use('/bots', bots);

    // Error handler
    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof BotServiceError && (err.status < 500 || err.status === 503)) {
            const body: ErrorResponse = { error: err.message };
            if (err.detail !== undefined) body.detail = err.detail;
            res.status(err.status).json(body);
            return;
        }
        if (err instanceof SyntaxError) {
            res.status(400).json({ error: 'Malformed JSON body' } satisfies ErrorResponse);
            return;
        }

        log.error('Unhandled error:', err);
        res.status(500).json({ error: 'Internal server error' } satisfies ErrorResponse);
    });

    return app;
}
