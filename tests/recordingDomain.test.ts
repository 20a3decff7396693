import assert from 'node:assert/strict';
import { test } from './testHarness';
import {
  PhaseTransitionError,
  RecordingStateMachine,
  canTransition,
} from '../src/domain/recording/stateMachine';
import { rawCapturePath, sameTrack, trackIdOf } from '../src/domain/recording/trackHandle';
import { RecordingError, failure, success, unwrap } from '../src/domain/recording/errors';
import { createTrackRequest } from '../src/domain/recording/types';

test('phases only advance one step at a time', () => {
  const machine = new RecordingStateMachine();
  machine.transition('PlayerReady');
  machine.transition('TrackLoading');

  assert.throws(() => machine.transition('Capturing'), PhaseTransitionError);
  assert.equal(machine.phase, 'TrackLoading');
  assert.deepEqual(machine.history, ['Idle', 'PlayerReady', 'TrackLoading']);
});

test('failure and cancellation are reachable from any active phase', () => {
  assert.equal(canTransition('Idle', 'Failed'), true);
  assert.equal(canTransition('Monitoring', 'Cancelled'), true);
  assert.equal(canTransition('Done', 'Failed'), false);
  assert.equal(canTransition('Failed', 'Cancelled'), false);

  const machine = new RecordingStateMachine();
  machine.transition('PlayerReady');
  machine.transition('Failed');
  assert.equal(machine.lastActivePhase, 'PlayerReady');
});

test('track ids compare by their last segment', () => {
  assert.equal(trackIdOf('spotify:track:trackid000001'), 'trackid000001');
  assert.equal(trackIdOf('/com/spotify/track/trackid000001'), 'trackid000001');
  assert.equal(sameTrack('/com/spotify/track/abc', 'spotify:track:abc'), true);
  assert.equal(sameTrack('/com/spotify/track/abd', 'spotify:track:abc'), false);
  assert.equal(sameTrack(null, 'spotify:track:abc'), false);
});

test('raw capture path is derived from the track id', () => {
  assert.equal(rawCapturePath('/tmp/build', 'spotify:track:abc'), '/tmp/build/abc.wav');
  assert.equal(rawCapturePath('/tmp/build', 'file:///x/y z'), '/tmp/build/y_z.wav');
});

test('unwrap returns values and throws recording errors', () => {
  assert.equal(unwrap(success(3)), 3);
  assert.throws(
    () => unwrap(failure('SinkNotFound', 'no route')),
    (error: unknown) => error instanceof RecordingError && error.kind === 'SinkNotFound',
  );
});

test('track requests are frozen and default to quiet', () => {
  const request = createTrackRequest({
    trackHandle: 'spotify:track:abc',
    destinationPath: '/music/a.mp3',
    expectedDurationSec: 200,
  });
  assert.equal(request.verbose, false);
  assert.equal(Object.isFrozen(request), true);
});
