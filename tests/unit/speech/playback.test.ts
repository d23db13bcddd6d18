import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'node:events';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { ExecOptions, ExecResult } from '../../../src/utils/execFileNoThrow.js';

const { spawnMock, execMock } = vi.hoisted(() => ({
  spawnMock: vi.fn(),
  execMock: vi.fn<(file: string, args: string[], options?: ExecOptions) => Promise<ExecResult>>(),
}));

vi.mock('node:child_process', () => ({ spawn: spawnMock }));
vi.mock('../../../src/utils/execFileNoThrow.js', () => ({ execFileNoThrow: execMock }));

import { EventBus, type EventMap } from '../../../src/kernel/event-bus.js';
import { SystemAudioPlayer, playerCommand } from '../../../src/speech/playback.js';

/** Child process stand-in; `kill` reports an exit on the next tick. */
class FakeChild extends EventEmitter {
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  readonly kill = vi.fn((signal: NodeJS.Signals = 'SIGTERM') => {
    this.signalCode = signal;
    setImmediate(() => this.emit('exit', null, signal));
    return true;
  });

  exitWith(code: number): void {
    this.exitCode = code;
    this.emit('exit', code, null);
  }
}

describe('playerCommand', () => {
  it('should use afplay on macOS', () => {
    expect(playerCommand('/tmp/a.mp3', 'darwin')).toEqual({ command: 'afplay', args: ['/tmp/a.mp3'] });
  });

  it('should use ffplay elsewhere', () => {
    expect(playerCommand('/tmp/a.mp3', 'linux')).toEqual({
      command: 'ffplay',
      args: ['-nodisp', '-autoexit', '-loglevel', 'error', '/tmp/a.mp3'],
    });
  });

  it('should drive MediaPlayer through PowerShell on Windows', () => {
    const { command, args } = playerCommand("C:\\it's\\a.mp3", 'win32');

    expect(command).toBe('powershell');
    expect(args.slice(0, 3)).toEqual(['-NoProfile', '-NonInteractive', '-Command']);
    expect(args[3]).toContain("$player.Open([uri]'C:\\it''s\\a.mp3')");
  });
});

describe('SystemAudioPlayer', () => {
  let tempDir: string;
  let audioFile: string;
  let child: FakeChild;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(tmpdir(), 'voxpipe-playback-test-'));
    audioFile = path.join(tempDir, 'clip.mp3');
    writeFileSync(audioFile, 'mp3');
    child = new FakeChild();
    spawnMock.mockImplementation(() => child);
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should report completion when the player exits cleanly', async () => {
    const eventBus = new EventBus();
    const finished: Array<EventMap['playback:finished']> = [];
    eventBus.on('playback:finished', (payload) => finished.push(payload));
    spawnMock.mockImplementation(() => {
      setImmediate(() => child.exitWith(0));
      return child;
    });
    const player = new SystemAudioPlayer({ platform: 'linux', eventBus });

    const result = await player.play(audioFile);

    expect(result).toEqual({ success: true, data: 'completed' });
    expect(spawnMock).toHaveBeenCalledWith(
      'ffplay',
      ['-nodisp', '-autoexit', '-loglevel', 'error', audioFile],
      { stdio: 'ignore' },
    );
    expect(finished).toEqual([{ filePath: audioFile, outcome: 'completed' }]);
    await expect(player.stop()).resolves.toEqual({ success: true, data: 'idle' });
  });

  it('should fail without spawning when the file is missing', async () => {
    const player = new SystemAudioPlayer({ platform: 'linux' });
    const missing = path.join(tempDir, 'missing.mp3');

    const result = await player.play(missing);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe(`Audio file not found: ${missing}`);
    expect(spawnMock).not.toHaveBeenCalled();
  });

  it('should report a non-zero exit', async () => {
    spawnMock.mockImplementation(() => {
      setImmediate(() => child.exitWith(1));
      return child;
    });
    const player = new SystemAudioPlayer({ platform: 'linux' });

    const result = await player.play(audioFile);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe('ffplay exited with 1');
  });

  it('should report a player that cannot start', async () => {
    spawnMock.mockImplementation(() => {
      setImmediate(() => child.emit('error', new Error('spawn ffplay ENOENT')));
      return child;
    });
    const player = new SystemAudioPlayer({ platform: 'linux' });

    const result = await player.play(audioFile);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe('Failed to start ffplay: spawn ffplay ENOENT');
  });

  it('should stop the running playback', async () => {
    const player = new SystemAudioPlayer({ platform: 'linux' });

    const playing = player.play(audioFile);
    await vi.waitFor(() => expect(spawnMock).toHaveBeenCalled());

    await expect(player.stop()).resolves.toEqual({ success: true, data: 'stopped' });
    await expect(playing).resolves.toEqual({ success: true, data: 'stopped' });
    expect(child.kill).toHaveBeenCalledWith('SIGTERM');
  });

  it('should report idle when nothing is playing', async () => {
    const player = new SystemAudioPlayer({ platform: 'linux' });
    await expect(player.stop()).resolves.toEqual({ success: true, data: 'idle' });
  });

  it('should kill a player that runs past the timeout', async () => {
    const player = new SystemAudioPlayer({ platform: 'linux', timeoutMs: 20 });

    const result = await player.play(audioFile);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe('Playback timed out after 20ms');
    expect(child.kill).toHaveBeenCalledWith('SIGTERM');
  });

  describe('isAvailable', () => {
    it('should look up the player binary', async () => {
      execMock.mockResolvedValue({ stdout: '/usr/bin/ffplay', stderr: '', status: 0 });

      await expect(new SystemAudioPlayer({ platform: 'linux' }).isAvailable()).resolves.toBe(true);
      expect(execMock).toHaveBeenCalledWith('which', ['ffplay'], { timeoutMs: 5_000 });
    });

    it('should use where on Windows', async () => {
      execMock.mockResolvedValue({ stdout: '', stderr: '', status: 1 });

      await expect(new SystemAudioPlayer({ platform: 'win32' }).isAvailable()).resolves.toBe(false);
      expect(execMock).toHaveBeenCalledWith('where', ['powershell'], { timeoutMs: 5_000 });
    });
  });
});
