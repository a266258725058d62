/**
 * Meeting Adapter contract
 *
 * An adapter joins one meeting on behalf of one bot. It reports lifecycle
 * signals in order through `signals` and raw 16-bit PCM audio through `audio`.
 * The session reads both; the adapter never calls into the session.
 */

import { Channel } from './channel';
import { Participant } from './types';

export type MeetingSignal =
    | { type: 'joined' }
    | { type: 'join_failed'; reason: string }
    | { type: 'participant_joined'; participant: Participant }
    | { type: 'participant_left'; participant: Participant }
    | { type: 'ended' }
    | { type: 'removed' }
    | { type: 'error'; reason: string }
    | { type: 'left' };

export const DEFAULT_AUDIO_QUEUE_CHUNKS = 200;

export abstract class MeetingAdapter {
    readonly signals = new Channel<MeetingSignal>();
    readonly audio: Channel<Buffer>;
    private droppedAudioChunks = 0;

    constructor(audioQueueChunks = DEFAULT_AUDIO_QUEUE_CHUNKS) {
        this.audio = new Channel<Buffer>({
            capacity: audioQueueChunks,
            onDrop: () => {
                this.droppedAudioChunks++;
            },
        });
    }

    get droppedAudio(): number {
        return this.droppedAudioChunks;
    }

    /**
     * Start joining. Resolves once the attempt is over; the outcome is
     * reported as a `joined` or `join_failed` signal, never as a rejection.
     */
    abstract join(meetingUrl: string, displayName: string): Promise<void>;

    /**
     * Ask to leave. The adapter emits `left` once it is out of the meeting.
     */
    abstract leave(): Promise<void>;

    /**
     * Release every resource and end both channels. Safe to call more than once.
     */
    async dispose(): Promise<void> {
        this.signals.close();
        this.audio.close();
    }

    protected signal(signal: MeetingSignal): void {
        this.signals.push(signal);
    }

    protected pushAudio(chunk: Buffer): void {
        this.audio.push(chunk);
    }
}
