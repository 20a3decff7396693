import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from './testHarness';
import {
  MprisPlayerControl,
  parseTrackIdFromMetadata,
  parseVariantInteger,
  parseVariantString,
  toObjectPath,
} from '../src/adapters/player/mprisPlayerControl';
import { PulseAudioRouting, parseModuleId, parseSinkInputs } from '../src/adapters/audio/pulseAudioRouting';
import { PwRecordCapturer, buildPwRecordArgs } from '../src/adapters/capture/pwRecordCapturer';
import { FfmpegEncoder, buildEncodeArgs } from '../src/adapters/encoder/ffmpegEncoder';
import {
  FfmpegSilenceAnalyzer,
  parseDuration,
  parseProcessedTime,
  parseSilenceLog,
} from '../src/adapters/encoder/ffmpegSilenceAnalyzer';
import { decideTrim } from '../src/domain/recording/trimPolicy';
import { resolveFfmpegPath } from '../src/adapters/encoder/ffmpegBinary';
import { ShellToolProbe } from '../src/adapters/system/toolProbe';
import { CommandError } from '../src/shared/process/commandRunner';
import { defaultConfig } from '../src/application/config/configRepository';
import { makeCommandRunner, makeSpawn } from './fakes/commands';

const STATUS_REPLY = `method return time=1700000000.1 sender=:1.80 -> destination=:1.99 serial=9 reply_serial=2
   variant       string "Playing"
`;

const POSITION_REPLY = `method return time=1700000000.2 sender=:1.80 -> destination=:1.99 serial=10 reply_serial=2
   variant       int64 12345678
`;

const METADATA_REPLY = `method return time=1700000000.3 sender=:1.80 -> destination=:1.99 serial=11 reply_serial=2
   variant       array [
         dict entry(
            string "mpris:trackid"
            variant                string "spotify:track:abc123"
         )
         dict entry(
            string "mpris:length"
            variant                uint64 201000000
         )
      ]
`;

const SINK_INPUTS = `Sink Input #12
	Driver: protocol-native.c
	Sink: 0
	Properties:
		media.name = "Firefox"
		application.name = "Firefox"

Sink Input #57
	Driver: protocol-native.c
	Sink: 0
	Properties:
		media.name = "Spotify"
		application.name = "spotify"
		application.process.id = "4321"

Sink Input #58
	Driver: PipeWire
	Properties:
		application.name = "mpv"
`;

const SILENCE_LOG = `Input #0, wav, from '/tmp/build/abc.wav':
  Duration: 00:03:05.12, bitrate: 2822 kb/s
[silencedetect @ 0x55d0] silence_start: 0
[silencedetect @ 0x55d0] silence_end: 1.204 | silence_duration: 1.204
[silencedetect @ 0x55d0] silence_start: 92.5
[silencedetect @ 0x55d0] silence_end: 93.1 | silence_duration: 0.6
[silencedetect @ 0x55d0] silence_start: 181.733
size=N/A time=00:03:05.12 bitrate=N/A speed= 612x
`;

const PLAYER = defaultConfig().player;

test('MPRIS replies are parsed', () => {
  assert.equal(parseVariantString(STATUS_REPLY), 'Playing');
  assert.equal(parseVariantInteger(POSITION_REPLY), 12345678);
  assert.equal(parseTrackIdFromMetadata(METADATA_REPLY), 'spotify:track:abc123');
  assert.equal(parseTrackIdFromMetadata('variant array [\n]'), null);
  assert.equal(parseVariantString('Error org.freedesktop.DBus.Error.ServiceUnknown'), null);
});

test('track uris map to object paths', () => {
  assert.equal(toObjectPath('/com/spotify/track/abc'), '/com/spotify/track/abc');
  assert.equal(toObjectPath('spotify:track:abc'), '/spotify/track/abc');
});

test('MPRIS commands go through dbus-send', async () => {
  const { run, calls } = makeCommandRunner((command, args) =>
    args.includes('string:Position') ? { stdout: POSITION_REPLY, stderr: '' } : { stdout: '', stderr: '' },
  );
  const control = new MprisPlayerControl({ player: PLAYER, commandTimeoutMs: 2000, run });

  await control.openUri('spotify:track:abc');
  await control.setPosition('/com/spotify/track/abc', 0);
  const position = await control.readPositionUs();

  assert.equal(position, 12345678);
  assert.deepEqual(calls.map((call) => [call.command, ...call.args]), [
    [
      'dbus-send',
      '--print-reply',
      '--dest=org.mpris.MediaPlayer2.spotify',
      '/org/mpris/MediaPlayer2',
      'org.mpris.MediaPlayer2.Player.OpenUri',
      'string:spotify:track:abc',
    ],
    [
      'dbus-send',
      '--print-reply',
      '--dest=org.mpris.MediaPlayer2.spotify',
      '/org/mpris/MediaPlayer2',
      'org.mpris.MediaPlayer2.Player.SetPosition',
      'objpath:/com/spotify/track/abc',
      'int64:0',
    ],
    [
      'dbus-send',
      '--print-reply',
      '--dest=org.mpris.MediaPlayer2.spotify',
      '/org/mpris/MediaPlayer2',
      'org.freedesktop.DBus.Properties.Get',
      'string:org.mpris.MediaPlayer2.Player',
      'string:Position',
    ],
  ]);
  assert.equal(calls[0]?.options?.timeoutMs, 2000);
});

test('pgrep exit status 1 means the player is not running', async () => {
  const { run, calls } = makeCommandRunner(() => new CommandError('pgrep failed', 'pgrep', 1, '', false));
  const control = new MprisPlayerControl({ player: PLAYER, commandTimeoutMs: 2000, run });

  assert.equal(await control.isProcessRunning(), false);
  await control.terminateProcess();
  assert.deepEqual(calls.map((call) => [call.command, ...call.args]), [
    ['pgrep', '-x', 'spotify'],
    ['pkill', '-x', 'spotify'],
  ]);
});

test('the player is launched detached', async () => {
  const { spawn, children, calls } = makeSpawn();
  const control = new MprisPlayerControl({
    player: { ...PLAYER, launchCommand: ['flatpak', 'run', 'com.spotify.Client'] },
    commandTimeoutMs: 2000,
    spawn,
  });

  await control.launchProcess();

  assert.deepEqual(calls, [{ command: 'flatpak', args: ['run', 'com.spotify.Client'] }]);
  assert.equal(children[0]?.unrefCalled, true);
});

test('sink inputs are parsed from pactl output', () => {
  assert.deepEqual(parseSinkInputs(SINK_INPUTS), [
    { id: '12', label: 'Firefox', application: 'Firefox' },
    { id: '57', label: 'Spotify', application: 'spotify' },
    { id: '58', label: '', application: 'mpv' },
  ]);
  assert.equal(parseModuleId('536870913\n'), '536870913');
  assert.equal(parseModuleId('Failure: Module initialization failed'), '');
});

test('pactl runs with a C locale', async () => {
  const { run, calls } = makeCommandRunner(() => ({ stdout: '31\n', stderr: '' }));
  const routing = new PulseAudioRouting({ commandTimeoutMs: 2000, run });

  const moduleId = await routing.createNullSink('track_recorder_silent', 'Track-Recorder-Silent');
  await routing.moveRoute('57', 'track_recorder_silent');
  await routing.destroyModule(moduleId);

  assert.equal(moduleId, '31');
  assert.deepEqual(calls.map((call) => call.args), [
    [
      'load-module',
      'module-null-sink',
      'sink_name=track_recorder_silent',
      'sink_properties=device.description=Track-Recorder-Silent',
    ],
    ['move-sink-input', '57', 'track_recorder_silent'],
    ['unload-module', '31'],
  ]);
  assert.deepEqual(calls[0]?.options?.env, { LANG: 'C', LC_ALL: 'C' });
});

test('pw-record arguments match the capture format', () => {
  assert.deepEqual(
    buildPwRecordArgs('57', '/tmp/build/abc.wav', {
      sampleFormat: 'f32',
      channelMap: 'stereo',
      sampleRate: 44100,
      quality: 15,
      latencyMs: 20,
      volume: 1,
    }),
    [
      '--latency=20ms',
      '--volume=1.0',
      '--format=f32',
      '--channel-map',
      'stereo',
      '--rate',
      '44100',
      '--quality=15',
      '--target=57',
      '/tmp/build/abc.wav',
    ],
  );
});

test('pw-record process exit is reported once', async () => {
  const { spawn, children } = makeSpawn();
  const capturer = new PwRecordCapturer('pw-record', spawn);
  const proc = capturer.start('57', '/tmp/build/abc.wav', {
    sampleFormat: 'f32',
    channelMap: 'stereo',
    sampleRate: 44100,
    quality: 15,
    latencyMs: 20,
    volume: 1,
  });
  const child = children[0];
  assert.ok(child);

  assert.equal(proc.isRunning(), true);
  proc.kill('SIGTERM');
  child.finish(null, 'SIGTERM');

  assert.deepEqual(await proc.exited, { code: null, signal: 'SIGTERM' });
  assert.equal(proc.isRunning(), false);
  proc.kill('SIGKILL');
  assert.deepEqual(child.killed, ['SIGTERM']);
});

test('a pw-record spawn error resolves the exit with the error', async () => {
  const { spawn, children } = makeSpawn();
  const proc = new PwRecordCapturer('pw-record', spawn).start('57', '/tmp/a.wav', {
    sampleFormat: 'f32',
    channelMap: 'stereo',
    sampleRate: 44100,
    quality: 15,
    latencyMs: 20,
    volume: 1,
  });
  children[0]?.emit('error', new Error('spawn pw-record ENOENT'));

  const exit = await proc.exited;
  assert.equal(exit.error?.message, 'spawn pw-record ENOENT');
});

test('silencedetect output becomes intervals', () => {
  assert.deepEqual(parseSilenceLog(SILENCE_LOG), {
    intervals: [
      { startSec: 0, endSec: 1.204 },
      { startSec: 92.5, endSec: 93.1 },
      { startSec: 181.733 },
    ],
    durationSec: 185.12,
  });
  assert.equal(parseDuration('no duration here'), undefined);
});

const UNKNOWN_DURATION_LOG = `Input #0, wav, from '/tmp/build/abc.wav':
  Duration: N/A, bitrate: 2822 kb/s
[silencedetect @ 0x55d0] silence_start: 0
[silencedetect @ 0x55d0] silence_end: 0.8 | silence_duration: 0.8
[silencedetect @ 0x55d0] silence_start: 178.25
[silencedetect @ 0x55d0] silence_end: 180.5 | silence_duration: 2.25
`;

test('unknown container duration falls back to the final progress time', () => {
  const report = parseSilenceLog(`${UNKNOWN_DURATION_LOG}size=N/A time=00:03:00.50 bitrate=N/A speed= 540x\n`);

  assert.equal(report.durationSec, 180.5);
  assert.deepEqual(decideTrim(report, { epsilonSec: 0.1, edgeToleranceSec: 0.05 }), {
    kind: 'window',
    startSec: 0.9,
    endSec: 178.25,
    leadingEndSec: 0.8,
    trailingStartSec: 178.25,
  });
});

test('unknown duration without progress output ends at the last silence_end', () => {
  const report = parseSilenceLog(UNKNOWN_DURATION_LOG);

  assert.equal(report.durationSec, 180.5);
  assert.equal(parseProcessedTime(UNKNOWN_DURATION_LOG), undefined);
  assert.equal(parseSilenceLog('Duration: N/A\n').durationSec, undefined);
});

test('silence analysis runs ffmpeg with the thresholds', async () => {
  const { run, calls } = makeCommandRunner(() => ({ stdout: '', stderr: SILENCE_LOG }));
  const analyzer = new FfmpegSilenceAnalyzer('/opt/ffmpeg', run);

  const report = await analyzer.detect('/tmp/build/abc.wav', -30, 0.5);

  assert.equal(report.intervals.length, 3);
  assert.deepEqual(calls[0]?.args, [
    '-hide_banner',
    '-nostats',
    '-i',
    '/tmp/build/abc.wav',
    '-af',
    'silencedetect=noise=-30dB:d=0.5',
    '-f',
    'null',
    '-',
  ]);
});

test('encode arguments place the trim after the input', () => {
  assert.deepEqual(
    buildEncodeArgs({
      inputPath: '/tmp/a.wav',
      outputPath: '/music/a.mp3',
      bitrateKbps: 320,
      window: { startSec: 1.3, durationSec: 177.1 },
    }),
    [
      '-hide_banner',
      '-loglevel',
      'error',
      '-y',
      '-i',
      '/tmp/a.wav',
      '-ss',
      '1.3',
      '-t',
      '177.1',
      '-acodec',
      'libmp3lame',
      '-b:a',
      '320k',
      '/music/a.mp3',
    ],
  );
  assert.deepEqual(
    buildEncodeArgs({ inputPath: '/tmp/a.wav', outputPath: '/music/a.mp3', bitrateKbps: 320, verbose: true }).slice(0, 3),
    ['-hide_banner', '-loglevel', 'info'],
  );
});

test('encoder reports the written size and duration', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'recorder-encode-'));
  const output = path.join(dir, 'out.mp3');
  try {
    const calls: string[][] = [];
    const encoder = new FfmpegEncoder('/opt/ffmpeg', {
      run: async (command, args) => {
        calls.push([command, ...args]);
        await fs.writeFile(output, Buffer.alloc(2048));
        return { stdout: '', stderr: '' };
      },
      readDuration: async () => 12.5,
    });

    const result = await encoder.encode({ inputPath: '/tmp/a.wav', outputPath: output, bitrateKbps: 320 });

    assert.deepEqual(result, { bytes: 2048, durationSec: 12.5 });
    assert.equal(calls[0]?.[0], '/opt/ffmpeg');
    assert.equal(calls[0]?.[calls[0].length - 1], output);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test('configured ffmpeg path wins over the bundled binary', () => {
  assert.equal(resolveFfmpegPath('/usr/local/bin/ffmpeg'), '/usr/local/bin/ffmpeg');
  assert.notEqual(resolveFfmpegPath(''), '');
});

test('tool probe asks the shell for the command', async () => {
  const { run, calls } = makeCommandRunner((command, args) =>
    args[3] === 'pactl' ? { stdout: '/usr/bin/pactl\n', stderr: '' } : new CommandError('sh failed', 'sh', 1, '', false),
  );
  const probe = new ShellToolProbe(run);

  assert.equal(await probe.isAvailable('pactl'), true);
  assert.equal(await probe.isAvailable('pw-record'), false);
  assert.equal(await probe.isAvailable('/nonexistent/tool-binary'), false);
  assert.deepEqual(calls[0]?.args, ['-c', 'command -v "$1"', 'sh', 'pactl']);
  assert.equal(calls.length, 2);
});
