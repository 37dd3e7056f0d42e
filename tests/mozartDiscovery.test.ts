import assert from 'node:assert/strict';
import { test } from './testHarness';
import { MozartDiscovery, entryFromService } from '../src/adapters/discovery/mozartDiscovery';
import { DeviceDirectory } from '../src/application/devices/deviceDirectory';
import type { MdnsBrowseOptions, MdnsPort, MdnsServiceRecord } from '../src/ports/MdnsPort';

const JID = '2714.1200304.28000002@products.bang-olufsen.com';

function announcement(overrides: Partial<MdnsServiceRecord> = {}): MdnsServiceRecord {
  return {
    name: 'Beosound Balance-28000002',
    host: 'balance.local',
    port: 80,
    addresses: ['fe80::1', '192.0.2.2'],
    txt: { tn: '2714', in: '1200304', sn: Buffer.from('28000002'), fn: 'Kitchen' },
    ...overrides,
  };
}

test('announcements map to directory entries', () => {
  assert.deepEqual(entryFromService(announcement()), {
    jid: JID,
    host: '192.0.2.2',
    serial: '28000002',
    name: 'Kitchen',
    model: null,
    origin: 'mdns',
  });
  assert.equal(entryFromService(announcement({ addresses: [] }))?.host, 'balance.local');
  assert.equal(entryFromService(announcement({ txt: { tn: '2714', in: '1200304', sn: '28000002' } }))?.name, 'Beosound Balance-28000002');
  assert.equal(entryFromService(announcement({ txt: { tn: '2714', sn: '28000002' } })), null);
  assert.equal(entryFromService(announcement({ txt: { tn: '27', in: '1200304', sn: '28000002' } })), null);
});

test('discovery registers announcements without replacing configured devices', () => {
  const browsed: MdnsBrowseOptions[] = [];
  let onService: (service: MdnsServiceRecord) => void = () => undefined;
  let stopped = 0;
  const mdns: MdnsPort = {
    browse: (options, callback) => {
      browsed.push(options);
      onService = callback;
      return {
        stop: () => {
          stopped += 1;
        },
      };
    },
    shutdown: () => undefined,
  };
  const directory = new DeviceDirectory();
  directory.register({ jid: JID, host: '192.0.2.20', serial: '28000002', name: 'Configured', model: null, origin: 'config' });
  const discovery = new MozartDiscovery(mdns, directory);

  discovery.start();
  discovery.start();
  assert.deepEqual(browsed, [{ type: 'bangolufsen', protocol: 'tcp' }]);

  onService(announcement());
  assert.equal(directory.resolve(JID)?.host, '192.0.2.20');

  const other = '2714.1200304.28000003@products.bang-olufsen.com';
  onService(announcement({ txt: { tn: '2714', in: '1200304', sn: '28000003' }, addresses: ['192.0.2.3'] }));
  assert.equal(directory.resolve(other)?.host, '192.0.2.3');

  discovery.stop();
  assert.equal(stopped, 1);
});
