#!/usr/bin/env node
import * as dotenv from 'dotenv';
import * as path from 'path';
import { MicrophoneFrameSource, checkRecorderInstalled } from './capture/microphone';
import { UtteranceRecorder } from './capture/utteranceRecorder';
import { loadConfig, type AppConfig } from './config';
import { startConsoleControls } from './controls/console';
import { startHotkeys } from './controls/hotkeys';
import type { ControlActions, ControlHandle } from './controls/types';
import { ConfigError, describeError } from './errors';
import { ClipboardPasteSink } from './output/pasteSink';
import { OverlayPresenter } from './presentation/overlay';
import { TerminalSurface } from './presentation/terminalSurface';
import { createTranscriptionService } from './transcription';
import { CaptureWorker } from './worker/captureWorker';
import { EventBus } from './worker/events';

// Load environment variables from multiple possible locations
const envPaths = [
  path.join(process.cwd(), '.env'),
  path.join(__dirname, '..', '.env'),
];

for (const envPath of envPaths) {
  const result = dotenv.config({ path: envPath });
  if (!result.error) {
    console.log('[Main] Loaded .env from:', envPath);
    break;
  }
}

function printBanner(config: AppConfig): void {
  console.log('[Main] ========================================');
  console.log('[Main] voicepaste: speech to text at the cursor');
  console.log('[Main] ========================================');
  console.log(`[Main] Provider: ${config.transcription.provider}`);
  console.log(`[Main] Languages: ${config.languages.map((l) => l.abbreviation).join(' / ')}`);
  console.log(`[Main] ${config.hotkeys.listen}: start recording, ${config.hotkeys.switchLanguage}: toggle language`);
  console.log('[Main] Running in background. Press Ctrl+C to exit.');
}

async function startControls(config: AppConfig, actions: ControlActions): Promise<ControlHandle> {
  try {
    return await startHotkeys(config.hotkeys, actions);
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    console.error('[Main] ✗ Failed to register hotkeys:', describeError(error));
    return startConsoleControls(actions);
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  printBanner(config);

  if (!(await checkRecorderInstalled(config.audio.recordProgram))) {
    console.warn(
      `[Main] ⚠️ "${config.audio.recordProgram}" not found, recordings will fail. Install SoX:\n` +
      '  macOS: brew install sox\n' +
      '  Ubuntu: sudo apt-get install sox\n' +
      '  Windows: Download from https://sox.sourceforge.net/'
    );
  }

  const events = new EventBus();
  const worker = new CaptureWorker({
    recorder: new UtteranceRecorder(() => new MicrophoneFrameSource(config.audio), config.gate),
    transcriber: createTranscriptionService(config.transcription),
    output: new ClipboardPasteSink(),
    events,
    languages: config.languages,
    dialectHints: config.transcription.dialectHints,
  });

  const surface = new TerminalSurface();
  const presenter = new OverlayPresenter(events, surface);
  presenter.start();

  events.subscribe((event) => {
    if (event.type === 'model-load-failed') {
      console.error(`[Main] ✗ Transcription unavailable (${event.reason}). Listen requests will be ignored.`);
    }
  });

  worker.run().catch((error: unknown) => {
    console.error('[Main] ✗ Capture worker stopped unexpectedly:', error);
  });

  // Fire-and-forget: listen requests are refused until this settles
  worker.loadModel().catch((error: unknown) => {
    console.error('[Main] ✗ Model load crashed:', error);
  });

  let controls: ControlHandle | null = null;
  const shutdown = (code: number): void => {
    console.log('\n[Main] Exiting...');
    controls?.stop();
    presenter.stop();
    surface.release();
    worker.stop();
    process.exit(code);
  };

  controls = await startControls(config, {
    listen: () => {
      worker.submitListen();
    },
    switchLanguage: () => {
      worker.languages.switchLanguage();
    },
    quit: () => shutdown(0),
  });

  process.on('SIGINT', () => shutdown(0));
  process.on('SIGTERM', () => shutdown(0));
}

main().catch((error: unknown) => {
  console.error('[Main] ✗ Failed to start:', describeError(error));
  process.exit(1);
});
