import { applyLogging, loadConfig, type AppConfig } from '@/config';
import { CliUsageError, USAGE } from '@/config/cli';
import type { EnvironmentConfig } from '@/config/environment';
import { DEFAULT_LATENCY_TICKS, MAX_SAMPLES_PER_CHUNK, SESSION_AUDIO_FORMAT } from '@/config/audio';
import { createLogger } from '@/shared/logging/logger';
import { systemClock } from '@/infrastructure/time/systemClock';
import { createPcmTcpTransport } from '@/adapters/transport/pcmTcpTransport';
import { FileAudioSource } from '@/adapters/source/fileAudioSource';
import { ntpFileStore } from '@/adapters/storage/ntpFileStore';
import { createReceiverResolver } from '@/adapters/discovery/receiverDiscovery';
import { KeyListener } from '@/adapters/input/keyListener';
import {
  EXIT_FAILURE,
  EXIT_OK,
  runStreamSession,
  type StreamSessionDeps,
  type StreamSessionSettings,
} from '@/application/playback/streamSession';
import { stopWithTimeout } from '@/runtime/stopWithTimeout';

/**
 * Wires the production adapters behind the playback ports.
 */
export function createSessionDeps(env: EnvironmentConfig): StreamSessionDeps {
  return {
    clock: systemClock,
    createTransport: createPcmTcpTransport,
    openSource: (filePath) => FileAudioSource.open(filePath),
    ntpFiles: ntpFileStore,
    resolver: createReceiverResolver(env.discoveryTimeoutMs),
    keyInput: new KeyListener(),
    disconnect: async (transport) => {
      await stopWithTimeout('transport', () => transport.disconnect(), env.disconnectTimeoutMs);
    },
  };
}

export function createSessionSettings(env: EnvironmentConfig): StreamSessionSettings {
  return {
    format: SESSION_AUDIO_FORMAT,
    defaultLatencyTicks: DEFAULT_LATENCY_TICKS,
    chunkFrames: MAX_SAMPLES_PER_CHUNK,
    commandQueueCapacity: env.commandQueueCapacity,
    idleSleepMs: env.idleSleepMs,
  };
}

/**
 * Parses the command line, runs one streaming session and resolves to the
 * process exit code.
 */
export async function runCli(
  argv: string[],
  makeDeps: (env: EnvironmentConfig) => StreamSessionDeps = createSessionDeps,
  stdout: NodeJS.WritableStream = process.stdout,
  stderr: NodeJS.WritableStream = process.stderr,
): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      stderr.write(`${error.message}\n\n${USAGE}\n`);
      return EXIT_FAILURE;
    }
    throw error;
  }
  if (config.cli.help) {
    stdout.write(`${USAGE}\n`);
    return EXIT_OK;
  }

  applyLogging(config);
  createLogger('Runtime').debug('starting stream session', {
    server: config.cli.request.serverAddress,
    file: config.cli.request.filename,
    interactive: config.cli.request.interactive,
  });
  const outcome = await runStreamSession(
    config.cli.request,
    createSessionSettings(config.env),
    makeDeps(config.env),
  );
  return outcome.exitCode;
}
