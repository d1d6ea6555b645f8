import assert from 'node:assert/strict';
import { test } from '../testHarness';
import { CliUsageError, parseCliArgs } from '../../src/config/cli';
import { loadConfig } from '../../src/config';

test('cli defaults', () => {
  const options = parseCliArgs(['192.168.1.20', 'song.pcm']);
  assert.equal(options.help, false);
  assert.equal(options.debug, 0);
  assert.equal(options.jsonLogs, false);
  assert.deepEqual(options.request, {
    serverAddress: '192.168.1.20',
    filename: 'song.pcm',
    port: 5000,
    volume: 50,
    latency: null,
    codec: 'pcm',
    crypto: 'clear',
    waitMs: 0,
    start: null,
    startFile: null,
    ntpFile: null,
    password: null,
    secret: null,
    interactive: false,
    streamName: null,
  });
});

test('cli reads every option', () => {
  const options = parseCliArgs([
    '-p', '7000',
    '-v', '80',
    '-l', '22050',
    '-a',
    '-w', '500',
    '-n', '16045690984833335023',
    '--start-file', 'start.txt',
    '-e',
    '--password', 'test-password',
    '-s', 'test-secret',
    '-d', '2',
    '-i',
    '--ntp-file', 'ntp.txt',
    '--stream-name', 'zone1',
    '--json-logs',
    'kitchen',
    'song.pcm',
  ]);
  assert.deepEqual(options.request, {
    serverAddress: 'kitchen',
    filename: 'song.pcm',
    port: 7000,
    volume: 80,
    latency: 22050,
    codec: 'alac',
    crypto: 'rsa',
    waitMs: 500,
    start: 16_045_690_984_833_335_023n,
    startFile: 'start.txt',
    ntpFile: 'ntp.txt',
    password: 'test-password',
    secret: 'test-secret',
    interactive: true,
    streamName: 'zone1',
  });
  assert.equal(options.debug, 2);
  assert.equal(options.jsonLogs, true);
});

test('cli treats a zero start as no start', () => {
  assert.equal(parseCliArgs(['-n', '0', 'host', 'file']).request.start, null);
});

test('cli keeps a negative latency for the default to replace', () => {
  assert.equal(parseCliArgs(['--latency=-1', 'host', 'file']).request.latency, -1);
});

test('cli rejects bad input with a usage error', () => {
  const cases: Array<[string[], RegExp]> = [
    [['-v', '101', 'host', 'file'], /--volume must be within 0\.\.100, got 101/],
    [['-p', 'abc', 'host', 'file'], /--port expects an integer/],
    [['-p', '0', 'host', 'file'], /--port must be within 1\.\.65535/],
    [['--wait=-5', 'host', 'file'], /--wait must be within 0\.\.inf/],
    [['-n', 'soon', 'host', 'file'], /--start expects a decimal NTP value/],
    [['host'], /expected <server_address> and <filename>/],
    [['host', 'file', 'extra'], /expected <server_address> and <filename>/],
    [['--bogus', 'host', 'file'], /bogus/],
  ];
  for (const [argv, message] of cases) {
    assert.throws(() => parseCliArgs(argv), (error: unknown) => {
      assert.ok(error instanceof CliUsageError, `${argv.join(' ')} should raise a usage error`);
      assert.match(error.message, message);
      return true;
    });
  }
});

test('cli help skips the positional check', () => {
  assert.equal(parseCliArgs(['-h']).help, true);
});

test('debug level selects the log level', () => {
  assert.equal(loadConfig(['host', 'file']).env.logLevel, 'info');
  assert.equal(loadConfig(['-d', '1', 'host', 'file']).env.logLevel, 'debug');
  assert.equal(loadConfig(['-d', '3', 'host', 'file']).env.logLevel, 'spam');
  assert.equal(loadConfig(['--json-logs', 'host', 'file']).env.logJson, true);
});
