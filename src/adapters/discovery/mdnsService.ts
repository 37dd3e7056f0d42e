import Bonjour from 'bonjour-service';
import { createLogger } from '@/shared/logging/logger';
import type { MdnsBrowseOptions, MdnsBrowser, MdnsPort, MdnsServiceRecord } from '@/ports/MdnsPort';

export class MdnsService implements MdnsPort {
  private readonly log = createLogger('Discovery', 'Mdns');
  private readonly bonjour = new Bonjour();

  public browse(
    options: MdnsBrowseOptions,
    onService: (service: MdnsServiceRecord) => void,
  ): MdnsBrowser {
    const browser = this.bonjour.find(
      { type: options.type, protocol: options.protocol ?? 'tcp' },
      (service) =>
        onService({
          name: service.name,
          host: service.host,
          port: service.port,
          addresses: service.addresses,
          txt: service.txt,
          type: service.type,
          protocol: service.protocol,
        }),
    );
    browser.start();
    return {
      stop: () => {
        try {
          browser.stop();
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          this.log.debug('mdns browse stop failed', { message, type: options.type });
        }
      },
    };
  }

  public shutdown(): void {
    try {
      this.bonjour.destroy();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.debug('mdns shutdown failed', { message });
    }
  }
}
