import assert from 'node:assert/strict';
import { test } from './testHarness';
import { MozartRestClient, type FetchLike } from '../src/adapters/mozart/mozartRestClient';
import { RemoteCommandFailedError } from '../src/domain/errors';

type RecordedRequest = { url: string; method: string; body: string | null };

function createClient(respond: (url: string) => Response | Promise<Response>) {
  const requests: RecordedRequest[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    requests.push({
      url,
      method: init?.method ?? 'GET',
      body: typeof init?.body === 'string' ? init.body : null,
    });
    return respond(url);
  };
  const client = new MozartRestClient({ requestTimeoutMs: 1000, fetchImpl });
  return { client, requests };
}

const HOST = '192.0.2.1';
const PEER = '2714.1200304.28000002@products.bang-olufsen.com';

test('rest client builds grouping requests', async () => {
  const { client, requests } = createClient(() => new Response(null, { status: 200 }));
  await client.joinBeolinkPeer(HOST, PEER, 'RADIO');
  await client.joinBeolinkPeer(HOST, PEER);
  await client.expandBeolink(HOST, PEER);
  await client.standby(HOST);
  await client.setVolumeLevel(HOST, 40);
  await client.seekToPosition(HOST, 1500.4);

  assert.deepEqual(requests, [
    {
      url: 'http://192.0.2.1/api/v1/beolink/join/2714.1200304.28000002%40products.bang-olufsen.com?source=RADIO',
      method: 'POST',
      body: null,
    },
    {
      url: 'http://192.0.2.1/api/v1/beolink/join/2714.1200304.28000002%40products.bang-olufsen.com',
      method: 'POST',
      body: null,
    },
    {
      url: 'http://192.0.2.1/api/v1/beolink/expand/2714.1200304.28000002%40products.bang-olufsen.com',
      method: 'POST',
      body: null,
    },
    { url: 'http://192.0.2.1/api/v1/power/state', method: 'PUT', body: '{"value":"networkStandby"}' },
    { url: 'http://192.0.2.1/api/v1/playback/volume/level', method: 'POST', body: '{"level":40}' },
    { url: 'http://192.0.2.1/api/v1/playback/command', method: 'POST', body: '{"action":"seek","positionMs":1500}' },
  ]);
});

test('rest client reads wrapped and flat scalars', async () => {
  const bodies: Record<string, string> = {
    '/playback/volume': '{"level":{"level":35},"muted":{"muted":true},"maximum":{"level":80}}',
    '/playback/state': '{"state":{"value":"paused"}}',
    '/beolink/peers': JSON.stringify([{ jid: PEER, friendlyName: 'Kitchen' }, { friendlyName: 'No jid' }, { jid: 'x' }]),
    '/playback/sources': JSON.stringify({ items: [{ id: 'spotify', isEnabled: true, isPlayable: true }] }),
  };
  const { client } = createClient((url) => {
    const path = new URL(url).pathname.replace('/api/v1', '');
    return new Response(bodies[path] ?? '{}', { status: 200 });
  });

  assert.deepEqual(await client.getVolume(HOST), { level: 35, muted: true, maximum: 80 });
  assert.equal(await client.getPlaybackState(HOST), 'paused');
  assert.deepEqual(await client.getBeolinkPeers(HOST), [
    { jid: PEER, friendlyName: 'Kitchen' },
    { jid: 'x', friendlyName: 'x' },
  ]);
  assert.deepEqual(await client.getSources(HOST), [
    { id: 'spotify', name: 'spotify', isEnabled: true, isPlayable: true, isMultiroomAvailable: false },
  ]);
});

test('rest client maps failures to remote command errors', async () => {
  const { client } = createClient((url) => {
    if (url.endsWith('/power/state')) {
      return new Response('busy', { status: 503 });
    }
    if (url.endsWith('/software/update/status')) {
      return new Response('{}', { status: 200 });
    }
    throw new Error('connect ECONNREFUSED');
  });

  await assert.rejects(client.standby(HOST), (error: unknown) => {
    assert.ok(error instanceof RemoteCommandFailedError);
    assert.equal(error.message, 'PUT /power/state failed with status 503');
    assert.equal(error.status, 503);
    assert.equal(error.detail, 'busy');
    return true;
  });
  await assert.rejects(client.getPlaybackState(HOST), {
    name: 'RemoteCommandFailedError',
    message: 'GET /playback/state failed: connect ECONNREFUSED',
  });
  await assert.rejects(client.getSoftwareStatus(HOST), {
    name: 'RemoteCommandFailedError',
    message: 'software status response has no version',
  });
});
