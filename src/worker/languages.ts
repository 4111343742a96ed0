import type { Language } from '../config';
import type { EventBus } from './events';

/**
 * Cycles through the configured languages. Switching is refused while a capture is
 * in flight so a running utterance keeps the language it started with.
 */
export class LanguageSelector {
  private index = 0;

  constructor(
    private readonly languages: readonly Language[],
    private readonly events: EventBus,
    private readonly isCapturing: () => boolean
  ) {
    if (languages.length === 0) {
      throw new Error('At least one language must be configured');
    }
  }

  current(): Language {
    return this.languages[this.index];
  }

  switchLanguage(): boolean {
    if (this.isCapturing()) {
      console.log('[Language] Cannot switch language while recording.');
      return false;
    }

    this.index = (this.index + 1) % this.languages.length;
    const language = this.current();
    console.log(`[Language] Language: ${language.displayName}`);
    this.events.post({ type: 'language-switched', language });
    return true;
  }
}
