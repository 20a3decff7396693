import assert from 'node:assert/strict';
import { test } from './testHarness';
import {
  PLACEHOLDER_TRACK_PATH,
  PlayerController,
  parsePlaybackStatus,
} from '../src/application/recording/PlayerController';
import { FakeClock } from './fakes/clock';
import { FakePlayerControl, type PlayerFakeOptions } from './fakes/playerControl';
import { TEST_PLAYER_TIMING } from './fakes/recorder';

function makeController(options: PlayerFakeOptions = {}) {
  const clock = new FakeClock();
  const control = new FakePlayerControl(clock, options);
  return { clock, control, player: new PlayerController(control, clock, TEST_PLAYER_TIMING) };
}

test('playback status parsing is case-insensitive', () => {
  assert.equal(parsePlaybackStatus('playing'), 'Playing');
  assert.equal(parsePlaybackStatus(' Paused\n'), 'Paused');
  assert.equal(parsePlaybackStatus('Buffering'), 'Unknown');
  assert.equal(parsePlaybackStatus(null), 'Unknown');
});

test('a responsive player is reused', async () => {
  const { control, player } = makeController();

  const outcome = await player.ensureRunning();

  assert.deepEqual(outcome, { ok: true, value: 'reused' });
  assert.deepEqual(control.calls, ['pgrep']);
});

test('a missing player is relaunched once', async () => {
  const { clock, control, player } = makeController({ running: false });

  const outcome = await player.ensureRunning();

  assert.deepEqual(outcome, { ok: true, value: 'launched' });
  assert.deepEqual(control.calls, ['pgrep', 'pkill', 'launch']);
  assert.equal(clock.now(), TEST_PLAYER_TIMING.relaunchDelayMs);
});

test('a running but silent player is restarted', async () => {
  const { control, player } = makeController({ running: true, responsive: false });

  const outcome = await player.ensureRunning();

  assert.deepEqual(outcome, { ok: true, value: 'launched' });
  assert.deepEqual(control.calls, ['pgrep', 'pkill', 'launch']);
});

test('cancellation during relaunch is reported as Cancelled', async () => {
  const { player } = makeController({ running: false });
  const controller = new AbortController();
  controller.abort();

  const outcome = await player.ensureRunning(controller.signal);

  assert.equal(outcome.ok, false);
  if (outcome.ok) return;
  assert.equal(outcome.error.kind, 'Cancelled');
});

test('open loads, pauses and seeks to zero in that order', async () => {
  const { clock, control, player } = makeController();

  await player.activate();
  await player.open('spotify:track:abc123');

  assert.deepEqual(control.calls, [
    'Play',
    'OpenUri spotify:track:abc123',
    'Pause',
    'SetPosition /com/spotify/track/abc123 0',
  ]);
  assert.equal(clock.now(), 40);
  assert.deepEqual(await player.getState(), {
    status: 'Paused',
    positionSec: 0,
    trackId: '/com/spotify/track/abc123',
  });
});

test('seek falls back to the placeholder track path', async () => {
  const { control, player } = makeController({ ignoreOpen: true });

  await player.open('spotify:track:abc123');

  assert.equal(control.calls[2], `SetPosition ${PLACEHOLDER_TRACK_PATH} 0`);
});

test('waitForLoad reports the expected and current track on timeout', async () => {
  const { clock, control, player } = makeController();
  control.trackId = '/com/spotify/track/previous';

  const outcome = await player.waitForLoad('spotify:track:abc123', 300);

  assert.equal(outcome.ok, false);
  if (outcome.ok) return;
  assert.equal(outcome.error.kind, 'TrackLoadTimeout');
  assert.deepEqual(outcome.error.context, {
    expected: 'spotify:track:abc123',
    current: '/com/spotify/track/previous',
    timeoutMs: 300,
  });
  assert.equal(clock.now(), 300);
});

test('pause confirmation rejects a track that keeps playing', async () => {
  const { control, player } = makeController();
  await control.openUri('spotify:track:abc123');

  const outcome = await player.waitForPausedAtZero(200);

  assert.equal(outcome.ok, false);
  if (outcome.ok) return;
  assert.equal(outcome.error.kind, 'TrackLoadTimeout');
});

test('an unresponsive player reads as Unknown', async () => {
  const { player } = makeController({ running: true, responsive: false });

  assert.deepEqual(await player.getState(), { status: 'Unknown', positionSec: null, trackId: null });
});
