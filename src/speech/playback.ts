import { spawn, type ChildProcess } from 'node:child_process';
import { access } from 'node:fs/promises';
import type { EventBus } from '../kernel/event-bus.js';
import { createLogger } from '../kernel/logger.js';
import { err, ok, type Result } from '../types/index.js';
import { execFileNoThrow } from '../utils/execFileNoThrow.js';
import { PlaybackError, errorMessage } from './errors.js';

const log = createLogger('playback');

// ═══════════════════════════════════════════════════════════════════════════════
// AUDIO PLAYBACK
// ═══════════════════════════════════════════════════════════════════════════════

export type PlaybackOutcome = 'completed' | 'stopped';
export type StopOutcome = 'stopped' | 'idle';

export interface AudioPlayer {
  /** Blocks until playback ends or is stopped. */
  play(filePath: string): Promise<Result<PlaybackOutcome, PlaybackError>>;
  stop(): Promise<Result<StopOutcome, PlaybackError>>;
  isAvailable(): Promise<boolean>;
}

export interface PlayerCommand {
  command: string;
  args: string[];
}

export function playerCommand(filePath: string, platform: NodeJS.Platform = process.platform): PlayerCommand {
  switch (platform) {
    case 'darwin':
      return { command: 'afplay', args: [filePath] };
    case 'win32': {
      const uri = filePath.replace(/'/g, "''");
      const script = [
        'Add-Type -AssemblyName presentationCore',
        '$player = New-Object System.Windows.Media.MediaPlayer',
        `$player.Open([uri]'${uri}')`,
        '$player.Play()',
        'Start-Sleep -Milliseconds 500',
        'while ($player.NaturalDuration.HasTimeSpan -eq $false) { Start-Sleep -Milliseconds 100 }',
        'Start-Sleep -Seconds $player.NaturalDuration.TimeSpan.TotalSeconds',
        '$player.Stop()',
        '$player.Close()',
      ].join('; ');
      return { command: 'powershell', args: ['-NoProfile', '-NonInteractive', '-Command', script] };
    }
    default:
      return { command: 'ffplay', args: ['-nodisp', '-autoexit', '-loglevel', 'error', filePath] };
  }
}

export interface SystemAudioPlayerOptions {
  /** Hung players are killed after this long (default: 5 min) */
  timeoutMs?: number;
  /** Wait between SIGTERM and SIGKILL on stop (default: 3 s) */
  killGraceMs?: number;
  platform?: NodeJS.Platform;
  eventBus?: EventBus;
}

interface PlaybackSession {
  child: ChildProcess;
  filePath: string;
  stopped: boolean;
  timedOut: boolean;
}

/**
 * Dispatches to the platform's command-line player. One playback at a time:
 * starting a new one stops the current one.
 */
export class SystemAudioPlayer implements AudioPlayer {
  private readonly timeoutMs: number;
  private readonly killGraceMs: number;
  private readonly platform: NodeJS.Platform;
  private readonly eventBus: EventBus | null;
  private current: PlaybackSession | null = null;

  constructor(options: SystemAudioPlayerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 300_000;
    this.killGraceMs = options.killGraceMs ?? 3_000;
    this.platform = options.platform ?? process.platform;
    this.eventBus = options.eventBus ?? null;
  }

  async play(filePath: string): Promise<Result<PlaybackOutcome, PlaybackError>> {
    try {
      await access(filePath);
    } catch {
      return err(new PlaybackError(`Audio file not found: ${filePath}`));
    }

    const stopped = await this.stop();
    if (!stopped.success) return stopped;

    const command = playerCommand(filePath, this.platform);
    log.debug({ command: command.command, filePath }, 'Starting playback');
    this.eventBus?.emit('playback:started', { filePath });

    const result = await this.run(command, filePath);

    this.eventBus?.emit('playback:finished', {
      filePath,
      outcome: result.success ? result.data : 'failed',
    });
    if (!result.success) {
      log.warn({ filePath, error: result.error.message }, 'Playback failed');
    }
    return result;
  }

  async stop(): Promise<Result<StopOutcome, PlaybackError>> {
    const session = this.current;
    if (!session) return ok('idle');

    session.stopped = true;
    this.current = null;
    try {
      await this.terminate(session.child);
    } catch (error) {
      return err(new PlaybackError(`Failed to stop playback: ${errorMessage(error)}`, error));
    }
    log.info({ filePath: session.filePath }, 'Playback stopped');
    return ok('stopped');
  }

  async isAvailable(): Promise<boolean> {
    const { command } = playerCommand('', this.platform);
    const locator = this.platform === 'win32' ? 'where' : 'which';
    const result = await execFileNoThrow(locator, [command], { timeoutMs: 5_000 });
    return result.status === 0;
  }

  // ── Internals ──────────────────────────────────────────────────────

  private run(command: PlayerCommand, filePath: string): Promise<Result<PlaybackOutcome, PlaybackError>> {
    return new Promise((resolve) => {
      let child: ChildProcess;
      try {
        child = spawn(command.command, command.args, { stdio: 'ignore' });
      } catch (error) {
        resolve(err(new PlaybackError(`Failed to start ${command.command}: ${errorMessage(error)}`, error)));
        return;
      }

      const session: PlaybackSession = { child, filePath, stopped: false, timedOut: false };
      this.current = session;
      let settled = false;

      const timer = setTimeout(() => {
        session.timedOut = true;
        void this.terminate(child);
      }, this.timeoutMs);

      const finish = (result: Result<PlaybackOutcome, PlaybackError>): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (this.current === session) this.current = null;
        resolve(result);
      };

      child.once('error', (error) => {
        finish(err(new PlaybackError(`Failed to start ${command.command}: ${error.message}`, error)));
      });

      child.once('exit', (code, signal) => {
        if (session.stopped) {
          finish(ok('stopped'));
        } else if (session.timedOut) {
          finish(err(new PlaybackError(`Playback timed out after ${this.timeoutMs}ms`)));
        } else if (code === 0) {
          finish(ok('completed'));
        } else {
          finish(err(new PlaybackError(`${command.command} exited with ${code ?? signal ?? 'unknown status'}`)));
        }
      });
    });
  }

  /** SIGTERM, then SIGKILL after the grace period. Resolves once the child exits. */
  private terminate(child: ChildProcess): Promise<void> {
    return new Promise((resolve) => {
      if (child.exitCode !== null || child.signalCode !== null) {
        resolve();
        return;
      }

      const killTimer = setTimeout(() => {
        child.kill('SIGKILL');
        resolve();
      }, this.killGraceMs);

      child.once('exit', () => {
        clearTimeout(killTimer);
        resolve();
      });

      if (!child.kill('SIGTERM')) {
        clearTimeout(killTimer);
        resolve();
      }
    });
  }
}
