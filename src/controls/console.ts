/**
 * Line-based controls on stdin, used when global hotkeys are unavailable
 */

import * as readline from 'readline';
import type { ControlActions, ControlHandle } from './types';

const COMMANDS = new Map<string, keyof ControlActions>([
  ['l', 'listen'],
  ['listen', 'listen'],
  ['s', 'switchLanguage'],
  ['lang', 'switchLanguage'],
  ['q', 'quit'],
  ['quit', 'quit'],
]);

export function startConsoleControls(
  actions: ControlActions,
  input: NodeJS.ReadableStream = process.stdin
): ControlHandle {
  const rl = readline.createInterface({ input, terminal: false });

  rl.on('line', (line) => {
    const command = line.trim().toLowerCase();
    if (!command) return;

    const action = COMMANDS.get(command);
    if (!action) {
      console.log(`[Console] Unknown command "${command}". Use: listen (l), lang (s), quit (q)`);
      return;
    }
    actions[action]();
  });

  console.log('[Console] Commands: listen (l), lang (s), quit (q)');

  return {
    stop: () => rl.close(),
  };
}
