import { parseArgs } from 'node:util';
import type { StreamRequest } from '@/domain/playback/session';
import { parseNtp } from '@/domain/time/ntpTime';
import { DEFAULT_PORT, DEFAULT_VOLUME } from '@/config/audio';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export interface CliOptions {
  request: StreamRequest;
  debug: number;
  jsonLogs: boolean;
  help: boolean;
}

export const USAGE = `usage: raop-play [options] <server_address> <filename>

Stream raw 44.1 kHz 16-bit stereo PCM to a network audio receiver.

options:
  --ntp-file <file>      write the current NTP to <file> and exit
  -p, --port <n>         receiver port (default ${DEFAULT_PORT})
  -v, --volume <n>       volume 0..100 (default ${DEFAULT_VOLUME})
  -l, --latency <n>      output latency in frames (default 1000 ms)
  -a, --alac             ALAC encode the audio stream
  -w, --wait <ms>        start after <ms> milliseconds
  -n, --start <ntp>      start at NTP <ntp> + <wait>
  --start-file <file>    start at the NTP read from <file> + <wait>
  -e, --encrypt          encrypt the audio stream
  --password <pwd>       receiver password
  -s, --secret <secret>  valid secret for AppleTV
  -d, --debug <n>        debug level (0 = progress only)
  -i, --interactive      keys: 'p' pause, 'r' (re)start, 's' stop, 'q' quit
  --stream-name <name>   header line sent to a named PCM ingest
  --json-logs            log JSON lines
  -h, --help             show this help`;

function parseInteger(
  name: string,
  raw: string | undefined,
  fallback: number,
  range: { min?: number; max?: number } = {},
): number {
  if (raw === undefined) {
    return fallback;
  }
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new CliUsageError(`--${name} expects an integer, got ${JSON.stringify(raw)}`);
  }
  const value = Number.parseInt(trimmed, 10);
  if ((range.min !== undefined && value < range.min) || (range.max !== undefined && value > range.max)) {
    const bounds = `${range.min ?? '-inf'}..${range.max ?? 'inf'}`;
    throw new CliUsageError(`--${name} must be within ${bounds}, got ${value}`);
  }
  return value;
}

function parseStart(raw: string | undefined): bigint | null {
  if (raw === undefined) {
    return null;
  }
  try {
    const value = parseNtp(raw);
    return value === 0n ? null : value;
  } catch {
    throw new CliUsageError(`--start expects a decimal NTP value, got ${JSON.stringify(raw)}`);
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  let parsed: ReturnType<typeof parseWithSchema>;
  try {
    parsed = parseWithSchema(argv);
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }
  const { values, positionals } = parsed;

  if (values.help) {
    return { request: emptyRequest(), debug: 0, jsonLogs: false, help: true };
  }
  if (positionals.length !== 2) {
    throw new CliUsageError('expected <server_address> and <filename>');
  }
  const [serverAddress, filename] = positionals;

  return {
    request: {
      serverAddress,
      filename,
      port: parseInteger('port', values.port, DEFAULT_PORT, { min: 1, max: 65535 }),
      volume: parseInteger('volume', values.volume, DEFAULT_VOLUME, { min: 0, max: 100 }),
      latency: values.latency === undefined ? null : parseInteger('latency', values.latency, -1),
      codec: values.alac ? 'alac' : 'pcm',
      crypto: values.encrypt ? 'rsa' : 'clear',
      waitMs: parseInteger('wait', values.wait, 0, { min: 0 }),
      start: parseStart(values.start),
      startFile: values['start-file'] ?? null,
      ntpFile: values['ntp-file'] ?? null,
      password: values.password ?? null,
      secret: values.secret ?? null,
      interactive: values.interactive ?? false,
      streamName: values['stream-name'] ?? null,
    },
    debug: parseInteger('debug', values.debug, 0, { min: 0 }),
    jsonLogs: values['json-logs'] ?? false,
    help: false,
  };
}

function parseWithSchema(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      'ntp-file': { type: 'string' },
      port: { type: 'string', short: 'p' },
      volume: { type: 'string', short: 'v' },
      latency: { type: 'string', short: 'l' },
      alac: { type: 'boolean', short: 'a' },
      wait: { type: 'string', short: 'w' },
      start: { type: 'string', short: 'n' },
      'start-file': { type: 'string' },
      encrypt: { type: 'boolean', short: 'e' },
      password: { type: 'string' },
      secret: { type: 'string', short: 's' },
      debug: { type: 'string', short: 'd' },
      interactive: { type: 'boolean', short: 'i' },
      'stream-name': { type: 'string' },
      'json-logs': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

function emptyRequest(): StreamRequest {
  return {
    serverAddress: '',
    filename: '',
    port: DEFAULT_PORT,
    volume: DEFAULT_VOLUME,
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
  };
}
