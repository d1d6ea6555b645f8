import { createLogger, type PlaybackLogger } from '@/shared/logging/logger';
import { isTerminalCommand, type PlaybackCommand } from '@/domain/playback/playbackState';

export const DEFAULT_COMMAND_QUEUE_CAPACITY = 16;

/**
 * Bounded hand-off from the key listener to the streaming loop. The listener
 * offers, the loop drains at the top of each iteration, so every transport
 * call stays on the loop's side.
 */
export class CommandQueue {
  private readonly items: PlaybackCommand[] = [];

  constructor(
    private readonly capacity = DEFAULT_COMMAND_QUEUE_CAPACITY,
    private readonly log: PlaybackLogger = createLogger('Playback', 'Commands'),
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`command queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  public get size(): number {
    return this.items.length;
  }

  /**
   * Enqueues a command. A full queue drops pause/restart; stop and quit evict
   * the oldest entry so shutdown is never lost.
   */
  public offer(command: PlaybackCommand): boolean {
    if (this.items.length >= this.capacity) {
      if (!isTerminalCommand(command)) {
        this.log.warn('command queue full; dropping command', { command, capacity: this.capacity });
        return false;
      }
      const evicted = this.items.shift();
      this.log.warn('command queue full; evicted oldest command', { command, evicted });
    }
    this.items.push(command);
    this.log.debug('command queued', { command, size: this.items.length });
    return true;
  }

  public drain(): PlaybackCommand[] {
    return this.items.splice(0);
  }
}
