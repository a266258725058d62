import { NextFunction, Request, Response } from 'express';
import { timingSafeEqual } from 'crypto';
import { UnauthorizedError } from './errors';

/**
 * Pull the key out of `Authorization: Bearer <key>` or `Authorization: Token <key>`.
 */
export function extractApiKey(header: string | undefined): string | null {
    if (!header) return null;
    const match = /^(Bearer|Token)\s+(.+)$/i.exec(header.trim());
    return match ? match[2].trim() : null;
}

function sameKey(given: string, expected: string): boolean {
    const a = Buffer.from(given);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Express middleware guarding the bot routes. With no key configured every
 * request passes.
 */
export function requireApiKey(apiKey: string | null) {
    return (req: Request, _res: Response, next: NextFunction) => {
        if (!apiKey) return next();

        const given = extractApiKey(req.header('authorization'));
        if (!given || !sameKey(given, apiKey)) {
            return next(new UnauthorizedError('Invalid or missing API key'));
        }
        next();
    };
}
