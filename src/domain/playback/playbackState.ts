/** Local transport state of the streaming client. Reaching STOPPED ends the session. */
export enum PlaybackState {
  PLAYING = 'playing',
  PAUSED = 'paused',
  STOPPED = 'stopped',
}

/** Interactive commands accepted by the transport controller. */
export type PlaybackCommand = 'pause' | 'restart' | 'stop' | 'quit';

export function isTerminalCommand(command: PlaybackCommand): boolean {
  return command === 'stop' || command === 'quit';
}
