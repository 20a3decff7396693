import assert from 'node:assert/strict';
import { test } from './testHarness';
import { CaptureSession } from '../src/application/recording/CaptureSession';
import { FakeCapturer } from './fakes/capturer';
import { FakeClock } from './fakes/clock';

const SINK = { id: '42', label: 'Spotify' };
const FORMAT = {
  sampleFormat: 'f32',
  channelMap: 'stereo',
  sampleRate: 44100,
  quality: 15,
  latencyMs: 20,
  volume: 1,
} as const;

function makeSession(capturer = new FakeCapturer(), clock = new FakeClock()) {
  return {
    capturer,
    clock,
    session: new CaptureSession(capturer, clock, { format: FORMAT, preRollMs: 500, stopTimeoutMs: 2000 }),
  };
}

test('capture starts after the pre-roll with the configured format', async () => {
  const { capturer, clock, session } = makeSession();

  const outcome = await session.start(SINK, '/tmp/build/abc.wav');

  assert.equal(outcome.ok, true);
  assert.deepEqual(capturer.starts, [{ targetId: '42', outputPath: '/tmp/build/abc.wav', format: FORMAT }]);
  assert.equal(clock.now(), 500);
  assert.equal(session.current?.outputPath, '/tmp/build/abc.wav');
});

test('a capture that dies during pre-roll is a CaptureProcessFailure', async () => {
  const { capturer, session } = makeSession();
  capturer.onStart = (proc) => proc.exit(1);

  const outcome = await session.start(SINK, '/tmp/build/abc.wav');

  assert.equal(outcome.ok, false);
  if (outcome.ok) return;
  assert.equal(outcome.error.kind, 'CaptureProcessFailure');
  assert.equal(outcome.error.message, 'capture exited during pre-roll');
  assert.equal(session.current, null);
});

test('spawn errors surface their message', async () => {
  const { capturer, session } = makeSession();
  capturer.onStart = (proc) => proc.exit(null, null, new Error('spawn pw-record ENOENT'));

  const outcome = await session.start(SINK, '/tmp/build/abc.wav');

  assert.equal(outcome.ok, false);
  if (outcome.ok) return;
  assert.equal(outcome.error.message, 'capture failed to start: spawn pw-record ENOENT');
});

test('only one capture runs at a time', async () => {
  const { session } = makeSession();
  await session.start(SINK, '/tmp/build/a.wav');

  const second = await session.start(SINK, '/tmp/build/b.wav');

  assert.equal(second.ok, false);
  if (second.ok) return;
  assert.equal(second.error.kind, 'CaptureProcessFailure');
});

test('stop sends SIGTERM and waits for the exit', async () => {
  const { session } = makeSession();
  const started = await session.start(SINK, '/tmp/build/a.wav');
  assert.equal(started.ok, true);
  if (!started.ok) return;

  const result = await session.stop(started.value);

  assert.deepEqual(result.signals, ['SIGTERM']);
  assert.deepEqual(result.exit, { code: null, signal: 'SIGTERM' });
  assert.equal(session.current, null);
});

test('stop escalates to SIGKILL when SIGTERM is ignored', async () => {
  const { capturer, clock, session } = makeSession();
  capturer.onStart = (proc) => {
    proc.ignoreSigterm = true;
  };
  const started = await session.start(SINK, '/tmp/build/a.wav');
  assert.equal(started.ok, true);
  if (!started.ok) return;

  const result = await session.stop(started.value);

  assert.deepEqual(result.signals, ['SIGTERM', 'SIGKILL']);
  assert.deepEqual(result.exit, { code: null, signal: 'SIGKILL' });
  assert.equal(capturer.last?.isRunning(), false);
  assert.equal(clock.now(), 2500);
});

test('stopping nothing is a no-op', async () => {
  const { session } = makeSession();
  assert.deepEqual(await session.stop(null), { exit: null, signals: [] });
});
