/**
 * Offline transcription through the whisper.cpp command line tool.
 * Each utterance is written to its own temp directory, which is removed afterwards.
 */

import { spawn } from 'child_process';
import { constants } from 'fs';
import { access, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { encodeWav } from '../capture/wav';
import { ModelLoadError, TranscriptionFailureError } from '../errors';
import type { TranscriptionRequest, TranscriptionService, TranscriptSegment } from './types';

export type ProcessResult = {
  code: number | null;
  stdout: string;
  stderr: string;
};

export type ProcessRunner = (command: string, args: string[]) => Promise<ProcessResult>;

export const runProcess: ProcessRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args);
    let stdout = '';
    let stderr = '';

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', reject);
    child.on('close', (code) => resolve({ code, stdout, stderr }));
  });

export type WhisperCliOptions = {
  binary: string;
  model: string;
  threads: number;
};

export function parseWhisperOutput(text: string): TranscriptSegment[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => ({ text: line }));
}

async function canAccess(file: string, mode: number): Promise<boolean> {
  try {
    await access(file, mode);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve a binary name against PATH, or check an explicit path
 */
async function findExecutable(binary: string, envPath = process.env.PATH ?? ''): Promise<string | null> {
  if (binary.includes(path.sep) || binary.includes('/')) {
    return (await canAccess(binary, constants.X_OK)) ? binary : null;
  }

  for (const dir of envPath.split(path.delimiter).filter(Boolean)) {
    const candidate = path.join(dir, binary);
    if (await canAccess(candidate, constants.X_OK)) {
      return candidate;
    }
  }
  return null;
}

export class WhisperCliTranscriber implements TranscriptionService {
  readonly name = 'whisper.cpp';
  private binaryPath: string | null = null;

  constructor(
    private readonly options: WhisperCliOptions,
    private readonly run: ProcessRunner = runProcess,
    private readonly tempRoot: string = os.tmpdir()
  ) {}

  async initialize(): Promise<void> {
    const binaryPath = await findExecutable(this.options.binary);
    if (!binaryPath) {
      throw new ModelLoadError(
        this.name,
        `whisper.cpp binary "${this.options.binary}" not found. Set WHISPER_BIN to the whisper-cli path.`
      );
    }

    if (!(await canAccess(this.options.model, constants.R_OK))) {
      throw new ModelLoadError(
        this.name,
        `Whisper model not found at ${this.options.model}. Set WHISPER_MODEL to a ggml model file.`
      );
    }

    this.binaryPath = binaryPath;
    console.log(`[Whisper] ✓ Using ${binaryPath} with ${path.basename(this.options.model)}`);
  }

  async transcribe(request: TranscriptionRequest): Promise<TranscriptSegment[]> {
    if (!this.binaryPath) {
      throw new TranscriptionFailureError(this.name, new Error('Not initialized. Call initialize() first.'));
    }

    const workDir = await mkdtemp(path.join(this.tempRoot, 'voicepaste-'));
    try {
      const audioPath = path.join(workDir, 'utterance.wav');
      const outputBase = path.join(workDir, 'output');
      await writeFile(audioPath, encodeWav(request.samples, request.sampleRate));

      const args = [
        '-m', this.options.model,
        '-f', audioPath,
        '-l', request.languageCode,
        '-t', String(this.options.threads),
        '-nt',     // no timestamps
        '-otxt',   // output txt
        '-of', outputBase,
      ];
      if (request.dialectHint) {
        args.push('--prompt', request.dialectHint);
      }

      const result = await this.run(this.binaryPath, args);
      if (result.code !== 0) {
        throw new Error(`whisper.cpp failed with code ${result.code}: ${result.stderr.trim()}`);
      }

      return parseWhisperOutput(await readFile(`${outputBase}.txt`, 'utf-8'));
    } catch (error) {
      throw new TranscriptionFailureError(this.name, error);
    } finally {
      await rm(workDir, { recursive: true, force: true }).catch((error: unknown) => {
        console.error('[Whisper] Failed to delete temporary audio:', error);
      });
    }
  }
}
