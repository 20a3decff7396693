import assert from 'node:assert/strict';
import { EventEmitter } from 'node:events';
import { test } from './testHarness';
import { registerShutdownHandlers } from '../src/runtime/shutdown';
import { requiredTools } from '../src/runtime/bootstrap';
import { defaultConfig } from '../src/application/config/configRepository';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

test('first signal aborts the job, second exits with 130', () => {
  const target = new EventEmitter();
  const controller = new AbortController();
  const exits: number[] = [];
  const unregister = registerShutdownHandlers(controller, {
    processLike: target,
    exit: (code) => exits.push(code),
    forceExitMs: 60000,
  });

  target.emit('SIGINT', 'SIGINT');
  assert.equal(controller.signal.aborted, true);
  assert.deepEqual(exits, []);

  target.emit('SIGTERM', 'SIGTERM');
  assert.deepEqual(exits, [130]);

  unregister();
  assert.equal(target.listenerCount('SIGINT'), 0);
  assert.equal(target.listenerCount('SIGTERM'), 0);
});

test('shutdown watchdog forces exit when cleanup hangs', async () => {
  const target = new EventEmitter();
  const exits: number[] = [];
  const unregister = registerShutdownHandlers(new AbortController(), {
    processLike: target,
    exit: (code) => exits.push(code),
    forceExitMs: 10,
  });

  target.emit('SIGTERM', 'SIGTERM');
  await delay(40);

  assert.deepEqual(exits, [1]);
  unregister();
});

test('unregistering cancels the watchdog', async () => {
  const target = new EventEmitter();
  const exits: number[] = [];
  const unregister = registerShutdownHandlers(new AbortController(), {
    processLike: target,
    exit: (code) => exits.push(code),
    forceExitMs: 10,
  });

  target.emit('SIGINT', 'SIGINT');
  unregister();
  await delay(40);

  assert.deepEqual(exits, []);
});

test('required tools follow the configured commands', () => {
  const config = defaultConfig();
  config.player.launchCommand = ['flatpak', 'run', 'com.spotify.Client'];

  assert.deepEqual(
    requiredTools(config, '/opt/ffmpeg/bin/ffmpeg').map((tool) => tool.command),
    ['pw-record', 'pactl', 'dbus-send', 'pgrep', 'pkill', 'flatpak', '/opt/ffmpeg/bin/ffmpeg'],
  );
});
