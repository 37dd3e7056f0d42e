import assert from 'node:assert/strict';
import { test } from './testHarness';
import {
  BeolinkUnavailableError,
  InvalidGroupingTargetError,
  InvalidParameterError,
  NotALeaderError,
  RemoteCommandFailedError,
} from '../src/domain/errors';
import { BeolinkGroupCoordinator } from '../src/application/beolink/beolinkGroupCoordinator';
import { DeviceDirectory } from '../src/application/devices/deviceDirectory';
import { emptyDeviceState } from '../src/domain/device/state';
import { FakeDeviceApi } from './fakes/deviceApi';
import { flush } from './fakes/notificationTransport';
import {
  PEER_A,
  PEER_A_HOST,
  PEER_B,
  PEER_B_HOST,
  SELF,
  SELF_HOST,
  UNKNOWN,
  createCoordinatorHarness,
} from './fakes/beolinkFixtures';

test('join with a known target requests the session and becomes a listener', async () => {
  const { api, coordinator, events } = createCoordinatorHarness();
  await coordinator.join(PEER_A, 'radio');

  assert.deepEqual(api.callsTo('joinBeolinkPeer'), [
    { method: 'joinBeolinkPeer', host: SELF_HOST, args: [PEER_A, 'RADIO'] },
  ]);
  assert.deepEqual(coordinator.currentTopology(), {
    role: 'listening',
    leader: { jid: PEER_A, friendlyName: 'Kitchen' },
  });
  assert.equal(events.length, 1);
  assert.equal(events[0]?.role, 'listening');
  assert.equal(events[0]?.leader, PEER_A);
});

test('join without a target auto-joins and keeps the cached role', async () => {
  const { api, coordinator, events } = createCoordinatorHarness();
  await coordinator.join();

  assert.equal(api.callsTo('joinLatestBeolinkExperience').length, 1);
  assert.equal(coordinator.snapshot().role, 'standalone');
  assert.equal(events.length, 0);
});

test('join resolves unknown targets through the peer list', async () => {
  const { api, coordinator } = createCoordinatorHarness();
  api.peers = [{ jid: UNKNOWN, friendlyName: 'Study' }];
  await coordinator.join(UNKNOWN);

  assert.deepEqual(coordinator.currentTopology(), {
    role: 'listening',
    leader: { jid: UNKNOWN, friendlyName: 'Study' },
  });
});

test('join rejects invalid targets and sources', async () => {
  const { api, coordinator } = createCoordinatorHarness();
  await assert.rejects(coordinator.join(SELF), InvalidGroupingTargetError);
  await assert.rejects(coordinator.join('not-a-jid'), InvalidGroupingTargetError);
  await assert.rejects(coordinator.join(UNKNOWN), {
    name: 'InvalidGroupingTargetError',
    message: `${UNKNOWN} is not a known Beolink device`,
  });
  await assert.rejects(coordinator.join(PEER_A, 'bluetooth'), InvalidParameterError);
  await assert.rejects(coordinator.join(undefined, 'spotify'), InvalidParameterError);

  assert.equal(api.callsTo('joinBeolinkPeer').length, 0);
  assert.equal(coordinator.snapshot().role, 'standalone');
});

test('expand adds listeners in order without duplicates', async () => {
  const { api, coordinator, events } = createCoordinatorHarness();
  const results = await coordinator.expand({ jids: [PEER_A, PEER_B, PEER_A] });

  assert.deepEqual(results, [
    { jid: PEER_A, ok: true },
    { jid: PEER_B, ok: true },
  ]);
  assert.deepEqual(
    api.callsTo('expandBeolink').map((call) => [call.host, call.args[0]]),
    [
      [SELF_HOST, PEER_A],
      [SELF_HOST, PEER_B],
    ],
  );
  assert.deepEqual(coordinator.snapshot(), {
    role: 'leading',
    leader: SELF,
    listeners: [PEER_A, PEER_B],
    sourceId: null,
    membershipChange: null,
  });
  assert.deepEqual(
    events.map((event) => [event.role, event.membershipChange, event.listeners.length]),
    [
      ['standalone', 'expanding', 0],
      ['leading', null, 2],
    ],
  );
});

test('expand leaves the cache untouched when a member call fails', async () => {
  const { api, coordinator, events } = createCoordinatorHarness();
  api.failures.add(`expandBeolink ${SELF_HOST} ${PEER_B}`);

  await assert.rejects(coordinator.expand({ jids: [PEER_A, PEER_B] }), (error: unknown) => {
    assert.ok(error instanceof RemoteCommandFailedError);
    assert.deepEqual(error.results, [
      { jid: PEER_A, ok: true },
      { jid: PEER_B, ok: false, error: 'expandBeolink failed' },
    ]);
    assert.equal(error.message, 'expand failed for 1 of 2 devices');
    return true;
  });
  assert.equal(coordinator.snapshot().role, 'standalone');
  assert.equal(coordinator.snapshot().membershipChange, null);
  assert.deepEqual(
    events.map((event) => [event.role, event.membershipChange]),
    [
      ['standalone', 'expanding'],
      ['standalone', null],
    ],
  );
});

test('expand with allDiscovered targets every peer except the device itself', async () => {
  const { api, coordinator } = createCoordinatorHarness();
  assert.deepEqual(await coordinator.expand({ allDiscovered: true }), []);

  api.peers = [
    { jid: PEER_B, friendlyName: 'Bedroom' },
    { jid: SELF, friendlyName: 'Living Room' },
    { jid: PEER_A, friendlyName: 'Kitchen' },
  ];
  await coordinator.expand({ allDiscovered: true });
  assert.deepEqual(coordinator.snapshot().listeners, [PEER_B, PEER_A]);
});

test('expand validates role, arguments and the current source', async () => {
  const { coordinator, state } = createCoordinatorHarness();
  await assert.rejects(coordinator.expand({}), InvalidParameterError);
  await assert.rejects(coordinator.expand({ jids: [PEER_A], allDiscovered: true }), InvalidParameterError);
  await assert.rejects(coordinator.expand({ jids: ['garbage'] }), InvalidGroupingTargetError);
  await assert.rejects(coordinator.expand({ jids: [SELF] }), InvalidGroupingTargetError);

  state.playback = { state: 'paused', progress: null };
  await assert.rejects(coordinator.expand({ jids: [PEER_A] }), BeolinkUnavailableError);

  state.playback = { state: 'started', progress: 10 };
  state.source = { id: 'linein', isMultiroomAvailable: false };
  await assert.rejects(coordinator.expand({ jids: [PEER_A] }), {
    name: 'BeolinkUnavailableError',
    message: 'source linein cannot be shared with Beolink',
  });

  coordinator.applyNotification({ kind: 'beolink', leader: { jid: PEER_A }, listeners: [] });
  await assert.rejects(coordinator.expand({ jids: [PEER_B] }), NotALeaderError);
});

test('unexpand removes listeners and dissolves an empty session', async () => {
  const { api, coordinator, events } = createCoordinatorHarness();
  await assert.rejects(coordinator.unexpand([PEER_A]), NotALeaderError);

  await coordinator.expand({ jids: [PEER_A, PEER_B] });
  await assert.rejects(coordinator.unexpand([UNKNOWN]), InvalidGroupingTargetError);

  await coordinator.unexpand([PEER_A]);
  assert.deepEqual(coordinator.snapshot().listeners, [PEER_B]);
  await coordinator.unexpand([PEER_B]);

  assert.equal(coordinator.snapshot().role, 'standalone');
  assert.deepEqual(
    api.callsTo('unexpandBeolink').map((call) => call.args[0]),
    [PEER_A, PEER_B],
  );
  assert.deepEqual(
    events.filter((event) => event.membershipChange === null).map((event) => event.role),
    ['leading', 'leading', 'standalone'],
  );
  assert.deepEqual(
    events.filter((event) => event.membershipChange !== null).map((event) => event.membershipChange),
    ['expanding', 'unexpanding', 'unexpanding'],
  );
});

test('leave is a no-op when standalone and resets a listener', async () => {
  const { api, coordinator } = createCoordinatorHarness();
  await coordinator.leave();
  assert.equal(api.callsTo('leaveBeolink').length, 0);

  coordinator.applyNotification({ kind: 'beolink', leader: { jid: PEER_A }, listeners: [] });
  await coordinator.leave();
  assert.equal(api.callsTo('leaveBeolink').length, 1);
  assert.equal(coordinator.snapshot().role, 'standalone');
});

test('allStandby reaches every resolvable session member', async () => {
  const { api, coordinator } = createCoordinatorHarness();
  await coordinator.expand({ jids: [PEER_A, UNKNOWN] });
  const outcome = await coordinator.allStandby();

  assert.deepEqual(
    api.callsTo('standby').map((call) => call.host),
    [SELF_HOST, PEER_A_HOST],
  );
  assert.deepEqual(outcome, {
    results: [
      { jid: SELF, ok: true },
      { jid: PEER_A, ok: true },
    ],
    unresolved: [UNKNOWN],
  });
});

test('session volume is applied to every member and capped at each maximum', async () => {
  const { api, coordinator } = createCoordinatorHarness();
  api.volumes.set(SELF_HOST, { level: 10, muted: false, maximum: 100 });
  api.volumes.set(PEER_A_HOST, { level: 10, muted: false, maximum: 30 });
  coordinator.applyNotification({ kind: 'beolink', leader: { jid: PEER_A }, listeners: [] });

  await coordinator.setVolume(0.4);
  assert.deepEqual(
    api.callsTo('setVolumeLevel').map((call) => [call.host, call.args[0]]),
    [
      [PEER_A_HOST, 30],
      [SELF_HOST, 40],
    ],
  );
  await assert.rejects(coordinator.setVolume(1.5), InvalidParameterError);
});

test('relative session volume clamps to the valid range', async () => {
  const { api, coordinator } = createCoordinatorHarness();
  api.volumes.set(SELF_HOST, { level: 50, muted: false, maximum: 100 });
  await coordinator.setRelativeVolume(0.25);
  await coordinator.setRelativeVolume(-1);

  assert.deepEqual(
    api.callsTo('setVolumeLevel').map((call) => call.args[0]),
    [75, 0],
  );
  await assert.rejects(coordinator.setRelativeVolume(-2), InvalidParameterError);
});

test('leader commands go to the leader only', async () => {
  const { api, coordinator } = createCoordinatorHarness();
  coordinator.applyNotification({ kind: 'beolink', leader: { jid: PEER_B }, listeners: [] });

  assert.deepEqual(await coordinator.leaderCommand('media_next_track'), { leader: PEER_B });
  api.playback.set(PEER_B_HOST, 'started');
  await coordinator.leaderCommand('toggle');
  await coordinator.leaderCommand('mute_volume', 'true');

  assert.deepEqual(
    api.calls.filter((call) => call.method !== 'getPlaybackState').map((call) => [call.method, call.host, call.args[0]]),
    [
      ['playbackCommand', PEER_B_HOST, 'skip'],
      ['standby', PEER_B_HOST, undefined],
      ['setMute', PEER_B_HOST, true],
    ],
  );
});

test('select_source requires an enabled playable source of the leader', async () => {
  const { api, coordinator } = createCoordinatorHarness();
  api.sources = [
    { id: 'spotify', name: 'Spotify', isEnabled: true, isPlayable: true, isMultiroomAvailable: true },
    { id: 'tidal', name: 'Tidal', isEnabled: false, isPlayable: true, isMultiroomAvailable: true },
  ];

  await assert.rejects(coordinator.leaderCommand('select_source'), {
    name: 'InvalidParameterError',
    message: 'select_source requires a source id',
  });
  await assert.rejects(coordinator.leaderCommand('select_source', 'tidal'), {
    name: 'InvalidParameterError',
    message: 'unknown source tidal; valid sources: spotify',
  });
  await coordinator.leaderCommand('select_source', 'Spotify');

  assert.deepEqual(api.callsTo('setActiveSource'), [
    { method: 'setActiveSource', host: SELF_HOST, args: ['spotify'] },
  ]);
  await assert.rejects(coordinator.leaderCommand('media_play', 1), InvalidParameterError);
  await assert.rejects(coordinator.leaderCommand('rewind'), InvalidParameterError);
});

test('leader commands fail when the leader has no known address', async () => {
  const { coordinator } = createCoordinatorHarness();
  coordinator.applyNotification({ kind: 'beolink', leader: { jid: UNKNOWN }, listeners: [] });
  await assert.rejects(coordinator.leaderCommand('media_pause'), InvalidGroupingTargetError);
});

test('a notification during a pending join wins over the join result', async () => {
  let release: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  class GatedApi extends FakeDeviceApi {
    public async joinBeolinkPeer(host: string, jid: string, source?: string): Promise<void> {
      await super.joinBeolinkPeer(host, jid, source);
      await gate;
    }
  }
  const { coordinator, events } = createCoordinatorHarness(new GatedApi());

  const pending = coordinator.join(PEER_A);
  await flush();
  coordinator.applyNotification({ kind: 'beolink', leader: null, listeners: [{ jid: PEER_B }] });
  coordinator.applyNotification({ kind: 'beolink', leader: null, listeners: [{ jid: PEER_B }] });
  release();
  await pending;

  assert.deepEqual(coordinator.currentTopology(), { role: 'leading', listeners: [PEER_B] });
  assert.equal(events.length, 1);
});

function createLocalPair() {
  const api = new FakeDeviceApi();
  const directory = new DeviceDirectory();
  directory.register({ jid: SELF, host: SELF_HOST, serial: '28000001', name: null, model: null, origin: 'config' });
  directory.register({ jid: PEER_A, host: PEER_A_HOST, serial: '28000002', name: null, model: null, origin: 'config' });
  directory.register({ jid: PEER_B, host: PEER_B_HOST, serial: '28000003', name: null, model: null, origin: 'config' });
  const local = (serial: string, host: string, jid: string) => {
    const state = emptyDeviceState();
    const coordinator = new BeolinkGroupCoordinator({
      device: { serial, host, jid },
      api,
      directory,
      state: { snapshot: () => state },
      onTopologyChanged: () => undefined,
    });
    directory.attachSession(jid, () => coordinator.leadingSession());
    return coordinator;
  };
  return {
    api,
    self: local('28000001', SELF_HOST, SELF),
    peer: local('28000003', PEER_B_HOST, PEER_B),
  };
}

test('a listener fans out to the session its local leader reports', async () => {
  const { api, self, peer } = createLocalPair();
  peer.applyNotification({ kind: 'beolink', leader: null, listeners: [{ jid: SELF }, { jid: PEER_A }] });
  self.applyNotification({ kind: 'beolink', leader: { jid: PEER_B }, listeners: [] });

  assert.deepEqual(self.members(), [PEER_B, SELF, PEER_A]);
  await self.setVolume(0.4);
  assert.deepEqual(
    api.callsTo('setVolumeLevel').map((call) => [call.host, call.args[0]]),
    [
      [PEER_B_HOST, 40],
      [SELF_HOST, 40],
      [PEER_A_HOST, 40],
    ],
  );
});

test('two local devices naming each other as leader fall back to the pair', async () => {
  const { api, self, peer } = createLocalPair();
  self.applyNotification({ kind: 'beolink', leader: { jid: PEER_B }, listeners: [] });
  peer.applyNotification({ kind: 'beolink', leader: { jid: SELF }, listeners: [] });

  assert.deepEqual(await self.allStandby(), {
    results: [
      { jid: PEER_B, ok: true },
      { jid: SELF, ok: true },
    ],
    unresolved: [],
  });
  assert.deepEqual(
    api.callsTo('standby').map((call) => call.host),
    [PEER_B_HOST, SELF_HOST],
  );
  assert.deepEqual(peer.members(), [SELF, PEER_B]);
});

test('a listener sends set_volume_level to the leader address', async () => {
  const { api, coordinator } = createCoordinatorHarness();
  coordinator.applyNotification({ kind: 'beolink', leader: { jid: PEER_B }, listeners: [] });

  assert.deepEqual(await coordinator.leaderCommand('set_volume_level', 0.4), { leader: PEER_B });
  assert.deepEqual(
    api.calls.map((call) => [call.method, call.host, call.args[0]]),
    [
      ['getVolume', PEER_B_HOST, undefined],
      ['setVolumeLevel', PEER_B_HOST, 40],
    ],
  );
});
