/**
 * Type definitions for the bot service
 */

export type BotState = 'joining' | 'in_meeting' | 'leaving' | 'left' | 'error';

export type Metadata = Record<string, unknown>;

export interface TranscriptFragment {
    speakerId: string;
    text: string;
    /** Offset from the start of the meeting audio */
    startMs: number;
    durationMs: number;
    isFinal: boolean;
}

export interface AudioFormat {
    encoding: 'linear16';
    sampleRate: number;
    channels: number;
}

export interface Participant {
    id: string;
    name: string;
}

export interface SessionSnapshot {
    id: string;
    state: BotState;
    meetingUrl: string;
    webhookUrl: string;
    botName: string;
    language: string;
    createdAt: Date;
    endedAt: Date | null;
    error: string | null;
    participants: Participant[];
}

export interface CreateBotInput {
    meetingUrl: string;
    webhookUrl: string;
    botName?: string;
    language?: string;
    metadata?: Metadata;
}

// Webhook wire format

export interface TranscriptionEventData {
    speaker_id: string;
    speaker_name: string | null;
    text: string;
    timestamp_ms: number;
    duration_ms: number;
    is_final: boolean;
    metadata?: Metadata;
}

export interface BotStatusEventData {
    status: BotState;
    message: string | null;
    metadata?: Metadata;
}

export type WebhookEvent =
    | {
          event_type: 'transcription';
          bot_id: string;
          timestamp: string;
          data: TranscriptionEventData;
      }
    | {
          event_type: 'bot_status';
          bot_id: string;
          timestamp: string;
          data: BotStatusEventData;
      };

// HTTP wire format

export interface BotResponse {
    id: string;
    state: BotState;
    meeting_url: string;
    webhook_url: string;
    bot_name: string;
    language: string;
    created_at: string;
    ended_at: string | null;
    error: string | null;
    participant_count: number;
}

export interface ErrorResponse {
    error: string;
    detail?: unknown;
}
