/**
 * Overlay Presenter
 * Drives the floating status pill from lifecycle events.
 *
 * The event bus is polled on a fixed interval; every queued event is applied in order
 * and the pill is drawn once per tick. Each new state cancels the pending auto-hide
 * and animation timers, so a hide scheduled for an older state never fires.
 */

import type { EventBus, LifecycleEvent } from '../worker/events';
import {
  flatBars,
  listeningBars,
  LISTENING_STEP,
  loadingBars,
  loadingCaption,
  LOADING_STEP,
} from './waveform';

export type OverlayMode = 'hidden' | 'loading' | 'ready' | 'failed' | 'listening' | 'language-flash';

export type OverlayTone = 'green' | 'blue' | 'orange' | 'red';

export type OverlayView = Readonly<{
  visible: boolean;
  mode: OverlayMode;
  // Text inside the round badge
  label: string;
  // Text next to the waveform
  caption: string;
  tone: OverlayTone;
  bars: readonly number[];
}>;

export interface OverlaySurface {
  render(view: OverlayView): void;
}

export type OverlayTimings = {
  pollIntervalMs: number;
  readyHideMs: number;
  failHideMs: number;
  flashHideMs: number;
  loadingFrameMs: number;
  listeningFrameMs: number;
};

export const DEFAULT_OVERLAY_TIMINGS: OverlayTimings = {
  pollIntervalMs: 100,
  readyHideMs: 2000,
  failHideMs: 5000,
  flashHideMs: 1500,
  loadingFrameMs: 50,
  listeningFrameMs: 40,
};

export const HIDDEN_VIEW: OverlayView = {
  visible: false,
  mode: 'hidden',
  label: '',
  caption: '',
  tone: 'green',
  bars: flatBars(),
};

export class OverlayPresenter {
  private readonly timings: OverlayTimings;
  private view: OverlayView = HIDDEN_VIEW;
  private phase = 0;
  private pollTimer: NodeJS.Timeout | null = null;
  private hideTimer: NodeJS.Timeout | null = null;
  private animationTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly events: EventBus,
    private readonly surface: OverlaySurface,
    timings: Partial<OverlayTimings> = {},
    private readonly random: () => number = Math.random
  ) {
    this.timings = { ...DEFAULT_OVERLAY_TIMINGS, ...timings };
  }

  start(): void {
    if (this.pollTimer) return;
    this.pollTimer = setInterval(() => this.poll(), this.timings.pollIntervalMs);
  }

  stop(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    this.cancelTimers();
  }

  get current(): OverlayView {
    return this.view;
  }

  /**
   * Drain the bus and redraw once. Returns the number of events applied.
   */
  poll(): number {
    const pending = this.events.drain();
    if (pending.length === 0) return 0;

    for (const event of pending) {
      try {
        this.apply(event);
      } catch (error) {
        console.error(`[Overlay] Failed to apply ${event.type}:`, error);
      }
    }
    this.draw();
    return pending.length;
  }

  private apply(event: LifecycleEvent): void {
    this.cancelTimers();

    switch (event.type) {
      case 'model-loading':
        this.phase = 0;
        this.view = {
          visible: true,
          mode: 'loading',
          label: '⏳',
          caption: loadingCaption(this.phase),
          tone: 'orange',
          bars: loadingBars(this.phase),
        };
        this.animate(this.timings.loadingFrameMs, () => {
          this.phase += LOADING_STEP;
          return { caption: loadingCaption(this.phase), bars: loadingBars(this.phase) };
        });
        break;

      case 'model-ready':
        this.view = { visible: true, mode: 'ready', label: '✓', caption: 'Ready!', tone: 'green', bars: flatBars() };
        this.scheduleHide(this.timings.readyHideMs);
        break;

      case 'model-load-failed':
        this.view = { visible: true, mode: 'failed', label: '✗', caption: 'Error!', tone: 'red', bars: flatBars() };
        this.scheduleHide(this.timings.failHideMs);
        break;

      case 'listening-started':
        this.view = {
          visible: true,
          mode: 'listening',
          label: event.language.abbreviation,
          caption: '',
          tone: 'green',
          bars: listeningBars(this.phase, this.random),
        };
        this.animate(this.timings.listeningFrameMs, () => {
          this.phase += LISTENING_STEP;
          return { bars: listeningBars(this.phase, this.random) };
        });
        break;

      case 'listening-stopped':
        this.view = HIDDEN_VIEW;
        break;

      case 'language-switched':
        this.view = {
          visible: true,
          mode: 'language-flash',
          label: event.language.abbreviation,
          caption: '',
          tone: 'blue',
          bars: flatBars(),
        };
        this.scheduleHide(this.timings.flashHideMs);
        break;
    }
  }

  private animate(intervalMs: number, step: () => Partial<OverlayView>): void {
    this.animationTimer = setInterval(() => {
      this.view = { ...this.view, ...step() };
      this.draw();
    }, intervalMs);
  }

  private scheduleHide(delayMs: number): void {
    this.hideTimer = setTimeout(() => {
      this.hideTimer = null;
      this.view = HIDDEN_VIEW;
      this.draw();
    }, delayMs);
  }

  private cancelTimers(): void {
    if (this.hideTimer) {
      clearTimeout(this.hideTimer);
      this.hideTimer = null;
    }
    if (this.animationTimer) {
      clearInterval(this.animationTimer);
      this.animationTimer = null;
    }
  }

  private draw(): void {
    try {
      this.surface.render(this.view);
    } catch (error) {
      console.error('[Overlay] Render failed:', error);
    }
  }
}
