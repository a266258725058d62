/**
 * Bot lifecycle state machine
 *
 *   joining -> in_meeting -> leaving -> left
 *        \          \           \
 *         `----------`-----------`--> error
 *
 * `left` and `error` are terminal. The table below is the only place a
 * state change is decided; the session applies whatever it returns.
 */

import { BotState } from './types';

export type SessionEvent =
    | { type: 'joined' }
    | { type: 'join_failed'; reason: string }
    | { type: 'leave_requested'; reason: string }
    | { type: 'left' }
    | { type: 'ended' }
    | { type: 'removed' }
    | { type: 'meeting_error'; reason: string }
    | { type: 'stream_failed'; reason: string }
    | { type: 'fault'; reason: string };

export interface Transition {
    next: BotState;
    /** bot_status webhook message; null for a plain status change */
    message: string | null;
}

export const TERMINAL_STATES: ReadonlySet<BotState> = new Set<BotState>(['left', 'error']);

export function isTerminal(state: BotState): boolean {
    return TERMINAL_STATES.has(state);
}

const STATE_ORDER: Record<BotState, number> = {
    joining: 0,
    in_meeting: 1,
    leaving: 2,
    left: 3,
    error: 3,
};

/**
 * True when moving from `from` to `to` never goes backwards.
 */
export function isForward(from: BotState, to: BotState): boolean {
    if (isTerminal(from)) return false;
    return to === 'error' || STATE_ORDER[to] > STATE_ORDER[from];
}

/**
 * Decide the next state for an event, or null when the event does not
 * change anything in the current state.
 */
export function transition(state: BotState, event: SessionEvent): Transition | null {
    if (isTerminal(state)) return null;

    if (event.type === 'fault') {
        return { next: 'error', message: event.reason };
    }

    switch (state) {
        case 'joining':
            switch (event.type) {
                case 'joined':
                    return { next: 'in_meeting', message: null };
                case 'join_failed':
                    return { next: 'error', message: event.reason };
                case 'leave_requested':
                    return { next: 'leaving', message: event.reason };
                case 'meeting_error':
                    return { next: 'error', message: event.reason };
                case 'ended':
                case 'removed':
                case 'left':
                    return { next: 'error', message: 'Meeting closed before the bot was admitted' };
                default:
                    return null;
            }

        case 'in_meeting':
            switch (event.type) {
                case 'leave_requested':
                    return { next: 'leaving', message: event.reason };
                case 'ended':
                    return { next: 'left', message: 'Meeting ended' };
                case 'removed':
                    return { next: 'left', message: 'Removed from meeting' };
                case 'left':
                    return { next: 'left', message: 'Bot left the meeting' };
                case 'meeting_error':
                case 'stream_failed':
                    return { next: 'error', message: event.reason };
                default:
                    return null;
            }

        case 'leaving':
            switch (event.type) {
                case 'left':
                case 'ended':
                case 'removed':
                case 'join_failed':
                case 'meeting_error':
                case 'stream_failed':
                    return { next: 'left', message: null };
                default:
                    return null;
            }

        default:
            return null;
    }
}
