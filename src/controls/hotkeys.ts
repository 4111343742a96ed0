/**
 * Global hotkeys
 * Uses uiohook-napi for system-wide key down detection.
 *
 * LAZY LOADING: uiohook-napi is only loaded when hotkeys are started, so a native
 * module problem leaves the console controls usable.
 */

import type { HotkeyConfig } from '../config';
import { ConfigError } from '../errors';
import type { ControlActions, ControlHandle } from './types';

type KeyEvent = { keycode: number };

export type HookModule = {
  uIOhook: {
    on(event: 'keydown', listener: (event: KeyEvent) => void): unknown;
    off(event: 'keydown', listener: (event: KeyEvent) => void): unknown;
    start(): void;
    stop(): void;
  };
  UiohookKey: Record<string, number>;
};

export const loadUiohook = (): Promise<HookModule> => import('uiohook-napi');

/**
 * Map a key name such as "F9" to its uiohook keycode (case-insensitive)
 */
export function resolveKeycode(name: string, keys: Record<string, number>, variable: string): number {
  const wanted = name.trim().toLowerCase();
  const match = Object.entries(keys).find(([key]) => key.toLowerCase() === wanted);
  if (!match) {
    throw new ConfigError(variable, name, 'a key name such as F9');
  }
  return match[1];
}

export async function startHotkeys(
  config: HotkeyConfig,
  actions: ControlActions,
  loadHook: () => Promise<HookModule> = loadUiohook
): Promise<ControlHandle> {
  const { uIOhook, UiohookKey } = await loadHook();

  const listenCode = resolveKeycode(config.listen, UiohookKey, 'LISTEN_HOTKEY');
  const switchCode = resolveKeycode(config.switchLanguage, UiohookKey, 'SWITCH_HOTKEY');
  if (listenCode === switchCode) {
    throw new ConfigError('SWITCH_HOTKEY', config.switchLanguage, 'a key different from LISTEN_HOTKEY');
  }

  const onKeyDown = (event: KeyEvent): void => {
    if (event.keycode === listenCode) {
      actions.listen();
    } else if (event.keycode === switchCode) {
      actions.switchLanguage();
    }
  };

  uIOhook.on('keydown', onKeyDown);
  uIOhook.start();
  console.log(`[Hotkeys] ✓ ${config.listen}: start listening, ${config.switchLanguage}: switch language`);

  return {
    stop: () => {
      uIOhook.off('keydown', onKeyDown);
      uIOhook.stop();
    },
  };
}
