import type { MdnsBrowser, MdnsPort, MdnsServiceRecord } from '@/ports/MdnsPort';
import { buildJid, isValidJid } from '@/domain/beolink/jid';
import type { DeviceDirectory, DirectoryEntry } from '@/application/devices/deviceDirectory';
import { bestEffortSync } from '@/shared/bestEffort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export const MOZART_SERVICE_TYPE = 'bangolufsen';

function txtString(txt: Record<string, unknown> | undefined, key: string): string | null {
  const value = txt?.[key];
  if (typeof value === 'string' && value.trim()) return value.trim();
  if (Buffer.isBuffer(value)) return value.toString('utf8').trim() || null;
  return null;
}

/**
 * Maps a `_bangolufsen._tcp` announcement to a directory entry. The JID is assembled from the
 * `tn`, `in` and `sn` TXT records; announcements missing any of them are ignored.
 */
export function entryFromService(service: MdnsServiceRecord): DirectoryEntry | null {
  const typeNumber = txtString(service.txt, 'tn');
  const itemNumber = txtString(service.txt, 'in');
  const serial = txtString(service.txt, 'sn');
  if (!typeNumber || !itemNumber || !serial) {
    return null;
  }
  const jid = buildJid(typeNumber, itemNumber, serial);
  if (!isValidJid(jid)) {
    return null;
  }
  const ipv4 = service.addresses?.find((address) => address.includes('.'));
  const host = ipv4 ?? service.addresses?.[0] ?? service.host;
  if (!host) {
    return null;
  }
  return {
    jid,
    host,
    serial,
    name: txtString(service.txt, 'fn') ?? service.name ?? null,
    model: null,
    origin: 'mdns',
  };
}

export class MozartDiscovery {
  private readonly log: ComponentLogger;
  private browser: MdnsBrowser | null = null;

  constructor(
    private readonly mdns: MdnsPort,
    private readonly directory: DeviceDirectory,
    log?: ComponentLogger,
  ) {
    this.log = log ?? createLogger('Discovery', 'Mozart');
  }

  public start(): void {
    if (this.browser) return;
    this.browser = this.mdns.browse({ type: MOZART_SERVICE_TYPE, protocol: 'tcp' }, (service) =>
      this.handleService(service),
    );
    this.log.info('browsing for mozart devices', { type: MOZART_SERVICE_TYPE });
  }

  public stop(): void {
    this.browser?.stop();
    this.browser = null;
  }

  public handleService(service: MdnsServiceRecord): void {
    const entry = entryFromService(service);
    if (!entry) {
      this.log.debug('ignoring mdns announcement', { name: service.name, host: service.host });
      return;
    }
    const changed = bestEffortSync(() => this.directory.register(entry), {
      fallback: false,
      log: this.log,
      label: 'directory registration failed',
    });
    if (changed) {
      this.log.info('discovered mozart device', { jid: entry.jid, host: entry.host, name: entry.name });
    }
  }
}
