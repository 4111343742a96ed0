/**
 * Capture Worker
 * The single place where utterances are captured. Listen commands are queued by the
 * hotkey path and handled one at a time: record, transcribe, paste. All "listening" /
 * "recording" / model state lives here and is only changed by this class.
 */

import type { Recorder } from '../capture/utteranceRecorder';
import { concatFrames, type UtteranceBuffer } from '../capture/types';
import type { Language } from '../config';
import { describeError, TranscriptionFailureError } from '../errors';
import type { TextOutputSink } from '../output/types';
import { joinSegments, type TranscriptionService } from '../transcription/types';
import { AsyncQueue } from './channels';
import type { EventBus } from './events';
import { LanguageSelector } from './languages';

export type ModelStatus = 'idle' | 'loading' | 'ready' | 'failed';

export type SubmitResult = 'accepted' | 'model-not-ready' | 'busy' | 'stopped';

export type ListenCommand = { type: 'listen' };

export type WorkerSnapshot = Readonly<{
  modelStatus: ModelStatus;
  // A listen command was accepted and its recording has not finished yet
  listening: boolean;
  // A command is being processed (recording or transcribing)
  recording: boolean;
  busy: boolean;
  language: Language;
}>;

export type CaptureWorkerDeps = {
  recorder: Recorder;
  transcriber: TranscriptionService;
  output: TextOutputSink;
  events: EventBus;
  languages: readonly Language[];
  dialectHints?: Record<string, string>;
};

export class CaptureWorker {
  readonly languages: LanguageSelector;

  private readonly commands = new AsyncQueue<ListenCommand>();
  private readonly recorder: Recorder;
  private readonly transcriber: TranscriptionService;
  private readonly output: TextOutputSink;
  private readonly events: EventBus;
  private readonly dialectHints: Record<string, string>;

  private modelStatus: ModelStatus = 'idle';
  private listening = false;
  private recording = false;
  private running = false;

  constructor(deps: CaptureWorkerDeps) {
    this.recorder = deps.recorder;
    this.transcriber = deps.transcriber;
    this.output = deps.output;
    this.events = deps.events;
    this.dialectHints = deps.dialectHints ?? {};
    this.languages = new LanguageSelector(deps.languages, deps.events, () => this.isBusy());
  }

  snapshot(): WorkerSnapshot {
    return {
      modelStatus: this.modelStatus,
      listening: this.listening,
      recording: this.recording,
      busy: this.isBusy(),
      language: this.languages.current(),
    };
  }

  /**
   * Initialize the transcription backend. Never rejects: failure is reported through
   * the event bus and leaves the worker refusing listen commands.
   */
  async loadModel(): Promise<void> {
    if (this.modelStatus === 'loading' || this.modelStatus === 'ready') return;

    console.log(`[CaptureWorker] Loading ${this.transcriber.name}...`);
    this.modelStatus = 'loading';
    this.events.post({ type: 'model-loading' });

    try {
      await this.transcriber.initialize();
      this.modelStatus = 'ready';
      console.log(`[CaptureWorker] ✓ ${this.transcriber.name} ready`);
      this.events.post({ type: 'model-ready' });
    } catch (error) {
      this.modelStatus = 'failed';
      const reason = describeError(error);
      console.error(`[CaptureWorker] ✗ FATAL: ${reason}`);
      this.events.post({ type: 'model-load-failed', reason });
    }
  }

  /**
   * Non-blocking admission point for listen requests.
   */
  submitListen(): SubmitResult {
    if (this.commands.isClosed) {
      return 'stopped';
    }

    if (this.modelStatus !== 'ready') {
      console.log(
        this.modelStatus === 'failed'
          ? '[CaptureWorker] Transcription unavailable, ignoring listen request.'
          : '[CaptureWorker] Model still loading, please wait...'
      );
      return 'model-not-ready';
    }

    if (this.isBusy()) {
      console.log('[CaptureWorker] Already capturing, ignoring listen request.');
      return 'busy';
    }

    this.listening = true;
    this.commands.put({ type: 'listen' });
    return 'accepted';
  }

  /**
   * Command loop. Resolves after stop().
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new Error('CaptureWorker is already running');
    }
    this.running = true;

    try {
      for (;;) {
        const command = await this.commands.take();
        if (!command) break;
        await this.handleListen();
      }
    } finally {
      this.running = false;
      console.log('[CaptureWorker] Stopped');
    }
  }

  /**
   * Stop taking commands. A capture already in flight is not interrupted.
   */
  stop(): void {
    this.commands.close();
  }

  private isBusy(): boolean {
    return this.listening || this.recording;
  }

  private async handleListen(): Promise<void> {
    this.recording = true;
    const language = this.languages.current();
    this.events.post({ type: 'listening-started', language });

    try {
      let utterance: UtteranceBuffer | null = null;
      try {
        utterance = await this.captureUtterance();
      } finally {
        this.events.post({ type: 'listening-stopped' });
        this.listening = false;
      }

      if (utterance) {
        await this.transcribeAndEmit(utterance, language);
      }
    } finally {
      this.recording = false;
    }
  }

  private async captureUtterance(): Promise<UtteranceBuffer | null> {
    try {
      const outcome = await this.recorder.record();
      if (!outcome.ok) {
        console.log(`[CaptureWorker] ${outcome.error.message}`);
        return null;
      }
      return outcome.utterance;
    } catch (error) {
      console.error('[CaptureWorker] Microphone error:', describeError(error));
      return null;
    }
  }

  private async transcribeAndEmit(utterance: UtteranceBuffer, language: Language): Promise<void> {
    const samples = concatFrames(utterance);
    if (samples.length === 0) return;

    console.log(`[CaptureWorker] Transcribing (${language.code})...`);

    const dialectHint: string | undefined = this.dialectHints[language.code];
    let text: string;
    try {
      const segments = await this.transcriber.transcribe({
        samples,
        sampleRate: utterance.sampleRate,
        languageCode: language.code,
        ...(dialectHint ? { dialectHint } : {}),
      });
      text = joinSegments(segments);
    } catch (error) {
      const failure =
        error instanceof TranscriptionFailureError
          ? error
          : new TranscriptionFailureError(this.transcriber.name, error);
      console.error(`[CaptureWorker] ✗ ${failure.message}`);
      return;
    }

    if (!text) {
      console.log('[CaptureWorker] No text recognized.');
      return;
    }

    console.log(`[CaptureWorker] Result: ${text}`);
    try {
      await this.output.emit(text);
    } catch (error) {
      console.error('[CaptureWorker] ✗ Failed to paste text:', describeError(error));
    }
  }
}
