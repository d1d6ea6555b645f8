import net from 'node:net';
import Bonjour, { type Service } from 'bonjour-service';
import { createLogger } from '@/shared/logging/logger';
import { bestEffortSync, errorMessage } from '@/shared/bestEffort';
import type { ReceiverResolver } from '@/ports/SessionIoPort';

export interface ReceiverDescriptor {
  name: string;
  host: string;
  address?: string;
  port: number;
  protocol: 'airplay' | 'raop';
}

const log = createLogger('Transport', 'Discovery');

export const DEFAULT_DISCOVERY_TIMEOUT_MS = 3000;

export function toReceiverDescriptor(
  service: Pick<Service, 'name' | 'host' | 'port' | 'addresses'>,
  protocol: ReceiverDescriptor['protocol'],
): ReceiverDescriptor {
  const addresses = service.addresses ?? [];
  const ipv4 = addresses.find((addr) => net.isIPv4(addr)) ?? addresses[0];
  return {
    // RAOP instance names carry a `<mac>@` prefix in front of the friendly name.
    name: protocol === 'raop' ? service.name.replace(/^[0-9a-f]{12}@/i, '') : service.name,
    host: service.host,
    address: ipv4,
    port: service.port,
    protocol,
  };
}

/**
 * Picks the receiver whose name or host equals the target (case-insensitive).
 * RAOP entries win over AirPlay 2 entries for the same device.
 */
export function matchReceiver(
  receivers: ReceiverDescriptor[],
  target: string,
): ReceiverDescriptor | null {
  const wanted = target.trim().toLowerCase();
  const matches = receivers.filter((receiver) =>
    [receiver.name, receiver.host, receiver.host.replace(/\.local\.?$/i, '')]
      .some((value) => value.toLowerCase() === wanted),
  );
  return matches.find((receiver) => receiver.protocol === 'raop') ?? matches[0] ?? null;
}

export async function discoverReceivers(timeoutMs = DEFAULT_DISCOVERY_TIMEOUT_MS): Promise<ReceiverDescriptor[]> {
  const bonjour = new Bonjour();
  const found: ReceiverDescriptor[] = [];
  const browsers: Array<ReturnType<Bonjour['find']>> = [];

  const close = (): void => {
    for (const browser of browsers) {
      bestEffortSync(() => browser.stop(), { fallback: undefined, onError: 'debug', log });
    }
    bestEffortSync(() => bonjour.destroy(), { fallback: undefined, onError: 'debug', log });
  };

  return new Promise<ReceiverDescriptor[]>((resolve) => {
    const finish = (): void => {
      close();
      resolve(found);
    };

    try {
      browsers.push(
        bonjour.find({ type: 'raop', protocol: 'tcp' }, (service: Service) => {
          found.push(toReceiverDescriptor(service, 'raop'));
        }),
        bonjour.find({ type: 'airplay', protocol: 'tcp' }, (service: Service) => {
          found.push(toReceiverDescriptor(service, 'airplay'));
        }),
      );
      browsers.forEach((browser) => browser.start());
    } catch (error) {
      log.warn('receiver discovery failed to start', { message: errorMessage(error) });
      finish();
      return;
    }

    setTimeout(finish, timeoutMs);
  });
}

/**
 * IP literals pass straight through; names are looked up over mDNS and fall
 * back to the name itself, leaving resolution to DNS.
 */
export function createReceiverResolver(
  timeoutMs = DEFAULT_DISCOVERY_TIMEOUT_MS,
  discover: (timeoutMs: number) => Promise<ReceiverDescriptor[]> = discoverReceivers,
): ReceiverResolver {
  return {
    resolve: async (address: string): Promise<string> => {
      if (net.isIP(address) !== 0) {
        return address;
      }
      const receiver = matchReceiver(await discover(timeoutMs), address);
      if (!receiver) {
        log.info('receiver not found over mdns; using name as given', { address });
        return address;
      }
      const resolved = receiver.address ?? receiver.host;
      log.info('receiver resolved over mdns', { address, resolved, protocol: receiver.protocol });
      return resolved;
    },
  };
}
