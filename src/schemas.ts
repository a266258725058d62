/**
 * Request validation and response shaping for the HTTP API
 */

import { z } from 'zod';
import { BotResponse, CreateBotInput, SessionSnapshot } from './types';

export const CreateBotRequest = z.object({
    meeting_url: z.string({ required_error: 'meeting_url is required' }).min(1, 'meeting_url is required'),
    webhook_url: z.string({ required_error: 'webhook_url is required' }).min(1, 'webhook_url is required'),
    bot_name: z.string().max(100).optional(),
    language: z.string().max(20).optional(),
    metadata: z.record(z.unknown()).optional(),
});
export type CreateBotRequest = z.infer<typeof CreateBotRequest>;

export function toCreateBotInput(body: CreateBotRequest): CreateBotInput {
    return {
        meetingUrl: body.meeting_url,
        webhookUrl: body.webhook_url,
        botName: body.bot_name,
        language: body.language,
        metadata: body.metadata,
    };
}

export function toBotResponse(snapshot: SessionSnapshot): BotResponse {
    return {
        id: snapshot.id,
        state: snapshot.state,
        meeting_url: snapshot.meetingUrl,
        webhook_url: snapshot.webhookUrl,
        bot_name: snapshot.botName,
        language: snapshot.language,
        created_at: snapshot.createdAt.toISOString(),
        ended_at: snapshot.endedAt ? snapshot.endedAt.toISOString() : null,
        error: snapshot.error,
        participant_count: snapshot.participants.length,
    };
}
