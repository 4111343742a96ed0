/**
 * Draws the status pill as a single, continuously rewritten terminal line.
 * Without a TTY, only state changes are printed, one line each.
 */

import * as readline from 'readline';
import type { OverlaySurface, OverlayTone, OverlayView } from './overlay';
import { FLAT_HEIGHT, MAX_HEIGHT } from './waveform';

const BAR_GLYPHS = '▁▂▃▄▅▆▇█';

// 256-colour approximations of the pill palette
const TONE_CODES: Record<OverlayTone, string> = {
  green: '\x1b[38;5;149m',
  blue: '\x1b[38;5;39m',
  orange: '\x1b[38;5;215m',
  red: '\x1b[38;5;203m',
};
const RESET = '\x1b[0m';

export type PillStream = NodeJS.WritableStream & { isTTY?: boolean };

export function barGlyph(height: number): string {
  const ratio = (height - FLAT_HEIGHT) / (MAX_HEIGHT - FLAT_HEIGHT);
  const index = Math.round(ratio * (BAR_GLYPHS.length - 1));
  return BAR_GLYPHS[Math.max(0, Math.min(BAR_GLYPHS.length - 1, index))];
}

export function formatPill(view: OverlayView): string {
  const wave = view.bars.map(barGlyph).join('');
  const parts = [`(${view.label})`, wave];
  if (view.caption) parts.push(view.caption);
  return parts.join(' ');
}

export class TerminalSurface implements OverlaySurface {
  private lastSummary = '';
  private lineActive = false;

  constructor(private readonly stream: PillStream = process.stderr) {}

  render(view: OverlayView): void {
    if (!this.stream.isTTY) {
      this.renderPlain(view);
      return;
    }

    readline.cursorTo(this.stream, 0);
    readline.clearLine(this.stream, 0);

    if (!view.visible) {
      this.lineActive = false;
      return;
    }

    this.stream.write(`${TONE_CODES[view.tone]}${formatPill(view)}${RESET}`);
    this.lineActive = true;
  }

  /**
   * Move past the pill line so regular output does not overwrite it
   */
  release(): void {
    if (this.lineActive) {
      this.stream.write('\n');
      this.lineActive = false;
    }
  }

  private renderPlain(view: OverlayView): void {
    // Captions animate, so only mode and badge count as a change
    const summary = view.visible ? `[Overlay] ${view.mode} ${view.label}` : '[Overlay] hidden';
    if (summary === this.lastSummary) return;
    this.lastSummary = summary;
    this.stream.write(`${summary}\n`);
  }
}
