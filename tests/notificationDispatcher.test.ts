import assert from 'node:assert/strict';
import { test } from './testHarness';
import { NotificationDispatcher } from '../src/application/notifications/notificationDispatcher';
import type { RawNotification } from '../src/domain/device/notifications';
import { ConnectionLostError } from '../src/domain/errors';
import { FakeTransport, flush } from './fakes/notificationTransport';

function createRecordingDispatcher(options: { failOnButton?: boolean } = {}) {
  const routed: Array<{ sink: string; notification: RawNotification }> = [];
  const dispatcher = new NotificationDispatcher({
    button: (notification) => {
      if (options.failOnButton) throw new Error('sink exploded');
      routed.push({ sink: 'button', notification });
    },
    wheel: (notification) => routed.push({ sink: 'wheel', notification }),
    beolink: (notification) => routed.push({ sink: 'beolink', notification }),
    state: (notification) => routed.push({ sink: 'state', notification }),
  });
  return { dispatcher, routed };
}

test('dispatcher routes each frame kind to its sink in arrival order', async () => {
  const { dispatcher, routed } = createRecordingDispatcher();
  const transport = new FakeTransport();
  const controller = new AbortController();
  const running = dispatcher.run(transport, controller.signal);

  transport.push(
    '{"type":"button","controlId":"Next","state":"pressed"}',
    'not json at all',
    '{"type":"wheel","controlId":"Volume","counts":2}',
    '{"type":"volume","level":25}',
    '{"type":"beolink","leader":null,"listeners":[]}',
    '{"type":"battery","level":80,"isCharging":true}',
  );
  await flush();

  assert.deepEqual(
    routed.map((entry) => [entry.sink, entry.notification.kind]),
    [
      ['button', 'button'],
      ['wheel', 'wheel'],
      ['state', 'volume'],
      ['beolink', 'beolink'],
      ['state', 'battery'],
    ],
  );

  controller.abort();
  await transport.close();
  await running;
});

test('dispatcher keeps reading after a sink throws', async () => {
  const { dispatcher, routed } = createRecordingDispatcher({ failOnButton: true });
  const transport = new FakeTransport();
  const controller = new AbortController();
  const running = dispatcher.run(transport, controller.signal);

  transport.push(
    '{"type":"button","controlId":"Next","state":"pressed"}',
    '{"type":"playback_progress","progress":12}',
  );
  await flush();
  assert.deepEqual(routed.map((entry) => entry.notification), [{ kind: 'playback_progress', progress: 12 }]);

  controller.abort();
  await transport.close();
  await running;
});

test('dispatcher reports a transport error as connection lost', async () => {
  const { dispatcher } = createRecordingDispatcher();
  const transport = new FakeTransport();
  const running = dispatcher.run(transport, new AbortController().signal);
  transport.fail(new Error('socket reset'));

  await assert.rejects(
    running,
    (error: unknown) =>
      error instanceof ConnectionLostError && error.message === 'notification stream failed: socket reset',
  );
});

test('dispatcher treats an unexpected end of stream as connection lost', async () => {
  const { dispatcher, routed } = createRecordingDispatcher();
  const transport = new FakeTransport();
  transport.push('{"type":"playback_state","state":"started"}');
  transport.end();

  await assert.rejects(
    dispatcher.run(transport, new AbortController().signal),
    (error: unknown) =>
      error instanceof ConnectionLostError && error.message === 'notification stream ended unexpectedly',
  );
  assert.equal(routed.length, 1);
});

test('readNotifications ends quietly after shutdown', async () => {
  const { dispatcher } = createRecordingDispatcher();
  const transport = new FakeTransport();
  const controller = new AbortController();
  transport.push('{"type":"button","controlId":"Next","state":"released"}');

  const seen: string[] = [];
  const reading = (async () => {
    for await (const notification of dispatcher.readNotifications(transport, controller.signal)) {
      seen.push(notification.kind);
      controller.abort();
      await transport.close();
    }
  })();
  await reading;

  assert.deepEqual(seen, ['button']);
});
