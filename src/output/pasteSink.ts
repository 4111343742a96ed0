/**
 * Paste-at-cursor output
 * Puts the transcript on the clipboard and sends the paste chord to the focused app.
 *
 * LAZY LOADING: nut-js is only loaded on the first paste, so a broken native
 * module does not take down capture.
 */

import type { TextOutputSink } from './types';

export type Automation = {
  setClipboard: (text: string) => Promise<void>;
  pressPaste: () => Promise<void>;
};

export async function loadNutAutomation(platform: NodeJS.Platform = process.platform): Promise<Automation> {
  const { clipboard, keyboard, Key } = await import('@computer-use/nut-js');
  keyboard.config.autoDelayMs = 10;

  // Cmd+V on macOS, Ctrl+V elsewhere
  const modifier = platform === 'darwin' ? Key.LeftSuper : Key.LeftControl;

  return {
    setClipboard: async (text) => {
      await clipboard.setContent(text);
    },
    pressPaste: async () => {
      await keyboard.pressKey(modifier, Key.V);
      await keyboard.releaseKey(modifier, Key.V);
    },
  };
}

export class ClipboardPasteSink implements TextOutputSink {
  private automation: Promise<Automation> | null = null;

  constructor(private readonly loadAutomation: () => Promise<Automation> = loadNutAutomation) {}

  async emit(text: string): Promise<void> {
    const automation = await this.getAutomation();
    // Trailing space separates this from whatever is typed next
    await automation.setClipboard(`${text} `);
    await automation.pressPaste();
    console.log(`[Paste] ✓ Pasted ${text.length} characters`);
  }

  private getAutomation(): Promise<Automation> {
    if (!this.automation) {
      this.automation = this.loadAutomation().catch((error: unknown) => {
        // Retry the load on the next paste
        this.automation = null;
        throw error;
      });
    }
    return this.automation;
  }
}
