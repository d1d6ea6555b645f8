import { createLogger, type PlaybackLogger } from '@/shared/logging/logger';
import type { ClockPort } from '@/ports/ClockPort';
import type { TransportClient } from '@/ports/TransportClientPort';
import { PlaybackState, type PlaybackCommand } from '@/domain/playback/playbackState';
import { formatNtpSeconds } from '@/domain/time/ntpTime';
import { computeRestart } from '@/application/playback/playbackScheduler';

/**
 * Local playback state and the transport calls each command triggers:
 *
 * - pause: from PLAYING, pause then flush and go PAUSED; otherwise a no-op.
 * - restart: from any state, startAt(now + 200 ms - latency) and go PLAYING.
 *   Unlike pause and stop it does not flush.
 * - stop / quit: from any state, stop then flush, go STOPPED and raise the
 *   shutdown flag.
 */
export class TransportController {
  private current = PlaybackState.PLAYING;
  private shutdown = false;

  constructor(
    private readonly transport: TransportClient,
    private readonly clock: ClockPort,
    private readonly log: PlaybackLogger = createLogger('Playback', 'Transport'),
  ) {}

  public get state(): PlaybackState {
    return this.current;
  }

  /** Set once stop or quit was applied; the streaming loop exits on it. */
  public get shutdownRequested(): boolean {
    return this.shutdown;
  }

  public isPlaying(): boolean {
    return this.current === PlaybackState.PLAYING;
  }

  public apply(command: PlaybackCommand): PlaybackState {
    switch (command) {
      case 'pause':
        this.pause();
        break;
      case 'restart':
        this.restart();
        break;
      case 'stop':
      case 'quit':
        this.stop(command);
        break;
    }
    return this.current;
  }

  private pause(): void {
    if (this.current !== PlaybackState.PLAYING) {
      this.log.debug('pause ignored', { state: this.current });
      return;
    }
    this.transport.pause();
    this.transport.flush();
    this.current = PlaybackState.PAUSED;
    this.log.info('paused', { at: formatNtpSeconds(this.clock.now()) });
  }

  private restart(): void {
    const startAt = computeRestart(this.clock, this.transport.latency, this.transport.sampleRate);
    this.current = PlaybackState.PLAYING;
    this.transport.startAt(startAt);
    this.log.info('restarted', {
      at: formatNtpSeconds(this.clock.now()),
      startAt: formatNtpSeconds(startAt),
    });
  }

  private stop(command: PlaybackCommand): void {
    this.transport.stop();
    this.transport.flush();
    this.current = PlaybackState.STOPPED;
    this.shutdown = true;
    this.log.info('stopped', { at: formatNtpSeconds(this.clock.now()), command });
  }
}
