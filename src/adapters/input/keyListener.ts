import readline from 'node:readline';
import { createLogger } from '@/shared/logging/logger';
import type { KeyInput } from '@/ports/SessionIoPort';
import type { PlaybackCommand } from '@/domain/playback/playbackState';

const KEY_COMMANDS: Record<string, PlaybackCommand> = {
  p: 'pause',
  r: 'restart',
  s: 'stop',
  q: 'quit',
};

export type KeyInputStream = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export function decodeKey(name: string | undefined): PlaybackCommand | null {
  const key = name?.toLowerCase();
  if (!key || !Object.hasOwn(KEY_COMMANDS, key)) return null;
  return KEY_COMMANDS[key];
}

/**
 * Reads single key presses from a terminal and forwards them as playback
 * commands: p pause, r restart, s stop, q quit.
 */
export class KeyListener implements KeyInput {
  private readonly log = createLogger('Input', 'Keys');
  private handler: ((str: string | undefined, key: readline.Key | undefined) => void) | null = null;

  constructor(private readonly input: KeyInputStream = process.stdin) {}

  public start(onCommand: (command: PlaybackCommand) => void): void {
    if (this.handler) {
      return;
    }
    readline.emitKeypressEvents(this.input);
    if (this.input.isTTY) {
      this.input.setRawMode?.(true);
    }
    this.handler = (str, key) => {
      // Raw mode swallows Ctrl+C; hand it back to the default SIGINT behaviour.
      if (key?.ctrl && key.name === 'c') {
        process.kill(process.pid, 'SIGINT');
        return;
      }
      const command = decodeKey(key?.name ?? str);
      if (!command) {
        this.log.debug('ignored key', { key: key?.name ?? str });
        return;
      }
      this.log.debug('key command', { command });
      onCommand(command);
    };
    this.input.on('keypress', this.handler);
    this.input.resume();
    this.log.info("interactive keys: 'p' pause, 'r' (re)start, 's' stop, 'q' quit");
  }

  public stop(): void {
    if (!this.handler) {
      return;
    }
    this.input.removeListener('keypress', this.handler);
    this.handler = null;
    if (this.input.isTTY) {
      this.input.setRawMode?.(false);
    }
    this.input.pause();
  }
}
