/**
 * Audio Capture Utilities
 *
 * The capture script is injected into the Teams page before it loads. It taps
 * every remote WebRTC audio track, mixes them into one mono PCM16 stream and
 * hands frames to Node through an exposed binding. A second binding carries
 * roster changes and end-of-meeting notices.
 */

import { z } from 'zod';

export const AUDIO_BINDING = '__botAudioFrame';
export const EVENT_BINDING = '__botMeetingEvent';

/**
 * Page text that means the bot is no longer in the call
 */
const MEETING_END_PATTERNS: Array<{ pattern: RegExp; signal: 'ended' | 'removed' }> = [
    { pattern: /you've been removed from this meeting/i, signal: 'removed' },
    { pattern: /someone removed you from the meeting/i, signal: 'removed' },
    { pattern: /you've been denied entry/i, signal: 'removed' },
    { pattern: /the meeting has ended/i, signal: 'ended' },
    { pattern: /this meeting has ended/i, signal: 'ended' },
    { pattern: /you left the meeting/i, signal: 'ended' },
];

export function detectMeetingEnd(text: string): 'ended' | 'removed' | null {
    for (const { pattern, signal } of MEETING_END_PATTERNS) {
        if (pattern.test(text)) return signal;
    }
    return null;
}

export const CaptureEvent = z.discriminatedUnion('type', [
    z.object({ type: z.literal('participant_joined'), id: z.string().min(1), name: z.string() }),
    z.object({ type: z.literal('participant_left'), id: z.string().min(1), name: z.string() }),
    z.object({ type: z.literal('ended') }),
    z.object({ type: z.literal('removed') }),
    z.object({ type: z.literal('capture_warning'), reason: z.string() }),
]);
export type CaptureEvent = z.infer<typeof CaptureEvent>;

/**
 * Parse a notice sent through the event binding. Unknown shapes are ignored.
 */
export function parseCaptureEvent(raw: string): CaptureEvent | null {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch {
        return null;
    }
    const parsed = CaptureEvent.safeParse(json);
    return parsed.success ? parsed.data : null;
}

export function decodeAudioFrame(base64: string): Buffer | null {
    const data = Buffer.from(base64, 'base64');
    // PCM16 frames are always an even number of bytes
    if (data.length === 0 || data.length % 2 !== 0) return null;
    return data;
}

export interface CaptureScriptOptions {
    sampleRate: number;
    rosterPollMs?: number;
}

/**
 * Script to inject into the page with addInitScript.
 * This is executed in the browser context, not Node.js
 */
export function getAudioCaptureScript(options: CaptureScriptOptions): string {
    const endPatterns = MEETING_END_PATTERNS.map(({ pattern, signal }) => ({
        source: pattern.source,
        flags: pattern.flags,
        signal,
    }));

    return `
    (function() {
      const SAMPLE_RATE = ${options.sampleRate};
      const ROSTER_POLL_MS = ${options.rosterPollMs ?? 2000};
      const END_PATTERNS = ${JSON.stringify(endPatterns)}.map(p => ({ re: new RegExp(p.source, p.flags), signal: p.signal }));

      let ctx = null;
      let mixer = null;
      const tapped = new Set();

      function notify(event) {
        if (typeof window.${EVENT_BINDING} === 'function') {
          window.${EVENT_BINDING}(JSON.stringify(event));
        }
      }

      function toBase64(int16) {
        const bytes = new Uint8Array(int16.buffer);
        let binary = '';
        for (let i = 0; i < bytes.length; i += 0x8000) {
          binary += String.fromCharCode.apply(null, bytes.subarray(i, i + 0x8000));
        }
        return btoa(binary);
      }

      function ensureContext() {
        if (ctx) return;
        ctx = new AudioContext({ sampleRate: SAMPLE_RATE });
        mixer = ctx.createGain();
        const processor = ctx.createScriptProcessor(4096, 1, 1);
        const sink = ctx.createGain();
        sink.gain.value = 0;

        processor.onaudioprocess = (e) => {
          const input = e.inputBuffer.getChannelData(0);
          const pcm = new Int16Array(input.length);
          for (let i = 0; i < input.length; i++) {
            const s = Math.max(-1, Math.min(1, input[i]));
            pcm[i] = s < 0 ? s * 0x8000 : s * 0x7fff;
          }
          if (typeof window.${AUDIO_BINDING} === 'function') {
            window.${AUDIO_BINDING}(toBase64(pcm));
          }
        };

        mixer.connect(processor);
        processor.connect(sink);
        sink.connect(ctx.destination);
      }

      function tapTrack(track) {
        if (track.kind !== 'audio' || tapped.has(track.id)) return;
        tapped.add(track.id);
        try {
          ensureContext();
          const source = ctx.createMediaStreamSource(new MediaStream([track]));
          source.connect(mixer);
          track.addEventListener('ended', () => tapped.delete(track.id));
        } catch (err) {
          notify({ type: 'capture_warning', reason: 'Could not tap track ' + track.id + ': ' + (err && err.message ? err.message : String(err)) });
        }
      }

      const NativePeerConnection = window.RTCPeerConnection;
      window.RTCPeerConnection = function(...args) {
        const pc = new NativePeerConnection(...args);
        pc.addEventListener('track', (event) => tapTrack(event.track));
        return pc;
      };
      window.RTCPeerConnection.prototype = NativePeerConnection.prototype;

      // Roster and end-of-meeting detection
      let roster = new Map();
      let finished = false;
      const poll = setInterval(() => {
        if (finished) return;
        const text = document.body ? document.body.innerText : '';
        for (const p of END_PATTERNS) {
          if (p.re.test(text)) {
            finished = true;
            clearInterval(poll);
            notify({ type: p.signal });
            return;
          }
        }

        const current = new Map();
        document.querySelectorAll('[data-tid^="participantsInCall-"]').forEach((el) => {
          const id = el.getAttribute('data-tid').replace('participantsInCall-', '');
          const name = (el.getAttribute('aria-label') || el.textContent || '').trim();
          if (id) current.set(id, name);
        });

        current.forEach((name, id) => {
          if (!roster.has(id)) notify({ type: 'participant_joined', id, name });
        });
        roster.forEach((name, id) => {
          if (!current.has(id)) notify({ type: 'participant_left', id, name });
        });
        roster = current;
      }, ROSTER_POLL_MS);
    })();
  `;
}
