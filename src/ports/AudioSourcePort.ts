/**
 * Bounded reads of encoded audio. `read` resolves to null once the source is
 * exhausted.
 */
export interface AudioSource {
  read(maxBytes: number): Promise<Buffer | null>;
  close(): Promise<void>;
}

export type AudioSourceOpener = (path: string) => Promise<AudioSource>;
