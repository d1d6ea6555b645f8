import fs, { type FileHandle } from 'node:fs/promises';
import type { AudioSource } from '@/ports/AudioSourcePort';

/**
 * Raw audio file read in bounded chunks. Opening a missing file rejects,
 * which the CLI treats as a fatal startup error.
 */
export class FileAudioSource implements AudioSource {
  private closed = false;

  private constructor(private readonly handle: FileHandle) {}

  public static async open(filePath: string): Promise<FileAudioSource> {
    return new FileAudioSource(await fs.open(filePath, 'r'));
  }

  public async read(maxBytes: number): Promise<Buffer | null> {
    if (this.closed) {
      return null;
    }
    const buffer = Buffer.alloc(maxBytes);
    const { bytesRead } = await this.handle.read(buffer, 0, maxBytes, null);
    if (bytesRead === 0) {
      return null;
    }
    return bytesRead === maxBytes ? buffer : buffer.subarray(0, bytesRead);
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.handle.close();
  }
}
