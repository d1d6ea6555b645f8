import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from '../testHarness';
import { FileAudioSource } from '../../src/adapters/source/fileAudioSource';
import { ntpFileStore } from '../../src/adapters/storage/ntpFileStore';

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'raop-play-tests-'));
  try {
    await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

test('file audio source reads bounded chunks until the end', async () => {
  await withTempDir(async (dir) => {
    const file = path.join(dir, 'tone.pcm');
    await fs.writeFile(file, Buffer.from([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]));
    const source = await FileAudioSource.open(file);

    assert.deepEqual(await source.read(4), Buffer.from([1, 2, 3, 4]));
    assert.deepEqual(await source.read(4), Buffer.from([5, 6, 7, 8]));
    assert.deepEqual(await source.read(4), Buffer.from([9, 10]));
    assert.equal(await source.read(4), null);

    await source.close();
    await source.close();
    assert.equal(await source.read(4), null);
  });
});

test('file audio source rejects a missing file', async () => {
  await withTempDir(async (dir) => {
    await assert.rejects(FileAudioSource.open(path.join(dir, 'absent.pcm')), { code: 'ENOENT' });
  });
});

test('ntp files hold one decimal value', async () => {
  await withTempDir(async (dir) => {
    const file = path.join(dir, 'ntp.txt');
    await ntpFileStore.writeNtp(file, 16_045_690_984_833_335_023n);
    assert.equal(await fs.readFile(file, 'utf8'), '16045690984833335023');
    assert.equal(await ntpFileStore.readStartTime(file), 16_045_690_984_833_335_023n);

    await fs.writeFile(file, 'soon\n');
    await assert.rejects(ntpFileStore.readStartTime(file), /invalid NTP value/);
  });
});
