/**
 * Microsoft Teams Meeting Adapter
 *
 * Drives a Chromium instance with Playwright through the Teams web join
 * flow as an anonymous guest. Audio and roster changes come back from the
 * injected capture script through exposed bindings.
 */

import { Browser, Page, chromium } from 'playwright-core';
import {
    AUDIO_BINDING,
    EVENT_BINDING,
    decodeAudioFrame,
    getAudioCaptureScript,
    parseCaptureEvent,
} from './audioCapture';
import { JoinFailureError } from './errors';
import { createLogger, errorMessage } from './logger';
import { MeetingAdapter } from './meetingAdapter';

const log = createLogger('TeamsAdapter');

const USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const SELECTORS = {
    continueInBrowser: 'button:has-text("Continue on this browser")',
    nameInput: 'input[data-tid="prejoin-display-name-input"], #username',
    cameraToggle: '[data-tid="toggle-video"]',
    micToggle: '[data-tid="toggle-mute"]',
    joinButton: '[data-tid="prejoin-join-button"], button:has-text("Join now")',
    inCall: '[data-tid="hangup-main-btn"], #hangup-button, [data-tid="call-hangup"]',
    hangup: '[data-tid="hangup-main-btn"], #hangup-button, [data-tid="call-hangup"]',
};

export interface TeamsAdapterOptions {
    sampleRate: number;
    displayWidth: number;
    displayHeight: number;
    headless: boolean;
    executablePath: string | null;
    joinTimeoutMs: number;
}

type Phase = 'idle' | 'joining' | 'joined' | 'leaving' | 'done';

export class TeamsMeetingAdapter extends MeetingAdapter {
    private browser: Browser | null = null;
    private page: Page | null = null;
    private phase: Phase = 'idle';

    constructor(private readonly options: TeamsAdapterOptions) {
        super();
    }

    async join(meetingUrl: string, displayName: string): Promise<void> {
        if (this.phase !== 'idle') return;
        this.phase = 'joining';

        try {
            log.info(`Launching browser for ${meetingUrl}`);
            this.browser = await chromium.launch({
                headless: this.options.headless,
                executablePath: this.options.executablePath ?? undefined,
                args: [
                    '--use-fake-ui-for-media-stream',
                    '--use-fake-device-for-media-stream',
                    '--autoplay-policy=no-user-gesture-required',
                    '--disable-notifications',
                    '--no-sandbox',
                    '--disable-dev-shm-usage',
                    '--disable-blink-features=AutomationControlled',
                    `--window-size=${this.options.displayWidth},${this.options.displayHeight}`,
                ],
            });

            const context = await this.browser.newContext({
                viewport: { width: this.options.displayWidth, height: this.options.displayHeight },
                permissions: ['microphone', 'camera'],
                userAgent: USER_AGENT,
                locale: 'en-US',
            });
            const page = await context.newPage();
            this.page = page;
            page.on('crash', () => this.handlePageLost('Meeting page crashed'));
            page.on('close', () => this.handlePageLost('Meeting page closed unexpectedly'));

            await page.exposeFunction(AUDIO_BINDING, (frame: string) => this.handleAudioFrame(frame));
            await page.exposeFunction(EVENT_BINDING, (raw: string) => this.handleCaptureEvent(raw));
            await page.addInitScript(getAudioCaptureScript({ sampleRate: this.options.sampleRate }));

            log.info(`Navigating to: ${meetingUrl}`);
            await page.goto(meetingUrl, { waitUntil: 'domcontentloaded', timeout: 30000 });

            await this.clickIfPresent(page, SELECTORS.continueInBrowser, 10000);

            const nameInput = page.locator(SELECTORS.nameInput).first();
            await nameInput.waitFor({ state: 'visible', timeout: 30000 });
            await nameInput.fill(displayName);

            await this.switchOff(page, SELECTORS.cameraToggle);
            await this.switchOff(page, SELECTORS.micToggle);

            await page.locator(SELECTORS.joinButton).first().click({ timeout: 10000 });
            log.info('Clicked join, waiting to be admitted');

            await page
                .locator(SELECTORS.inCall)
                .first()
                .waitFor({ state: 'visible', timeout: this.options.joinTimeoutMs })
                .catch(() => {
                    throw new JoinFailureError(`Not admitted within ${this.options.joinTimeoutMs / 1000}s`);
                });

            if (this.phase !== 'joining') return;
            this.phase = 'joined';
            log.info('Joined Teams meeting');
            this.signal({ type: 'joined' });
        } catch (error) {
            if (this.phase === 'joining') {
                this.phase = 'done';
                const failure =
                    error instanceof JoinFailureError
                        ? error
                        : new JoinFailureError(`Failed to join meeting: ${errorMessage(error)}`);
                log.error(`Join failed: ${failure.message}`);
                this.signal({ type: 'join_failed', reason: failure.message });
                await this.closeBrowser();
            }
        }
    }

    async leave(): Promise<void> {
        if (this.phase === 'leaving' || this.phase === 'done') return;
        const wasJoined = this.phase === 'joined';
        this.phase = 'leaving';

        if (wasJoined && this.page) {
            await this.clickIfPresent(this.page, SELECTORS.hangup, 5000);
        }

        await this.closeBrowser();
        this.phase = 'done';
        log.info('Left Teams meeting');
        this.signal({ type: 'left' });
    }

    async dispose(): Promise<void> {
        this.phase = 'done';
        await this.closeBrowser();
        await super.dispose();
    }

    private handleAudioFrame(frame: string): void {
        if (this.phase !== 'joined') return;
        const chunk = decodeAudioFrame(frame);
        if (chunk) this.pushAudio(chunk);
    }

    private handleCaptureEvent(raw: string): void {
        const event = parseCaptureEvent(raw);
        if (!event) {
            log.debug(`Ignoring unknown capture event: ${raw}`);
            return;
        }

        switch (event.type) {
            case 'participant_joined':
            case 'participant_left':
                this.signal({ type: event.type, participant: { id: event.id, name: event.name } });
                break;
            case 'ended':
            case 'removed':
                if (this.phase === 'joining') {
                    this.phase = 'done';
                    this.signal({ type: 'join_failed', reason: event.type === 'removed' ? 'Denied entry to meeting' : 'Meeting has ended' });
                } else if (this.phase === 'joined') {
                    this.phase = 'done';
                    log.info(`Meeting ${event.type}`);
                    this.signal({ type: event.type });
                }
                break;
            case 'capture_warning':
                // One lost track leaves the rest of the mix intact
                log.warn(`Audio capture: ${event.reason}`);
                break;
        }
    }

    private handlePageLost(reason: string): void {
        if (this.phase !== 'joined') return;
        this.phase = 'done';
        log.error(reason);
        this.signal({ type: 'error', reason });
    }

    private async clickIfPresent(page: Page, selector: string, timeout: number): Promise<void> {
        try {
            await page.locator(selector).first().click({ timeout });
        } catch {
            log.debug(`${selector} not found`);
        }
    }

    private async switchOff(page: Page, selector: string): Promise<void> {
        try {
            const toggle = page.locator(selector).first();
            if ((await toggle.getAttribute('aria-checked', { timeout: 5000 })) === 'true') {
                await toggle.click();
            }
        } catch (error) {
            log.debug(`Could not toggle ${selector}: ${errorMessage(error)}`);
        }
    }

    private async closeBrowser(): Promise<void> {
        const browser = this.browser;
        this.browser = null;
        this.page = null;
        if (!browser) return;

        try {
            await browser.close();
        } catch (error) {
            log.warn(`Error closing browser: ${errorMessage(error)}`);
        }
    }
}
