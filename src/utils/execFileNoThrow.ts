/**
 * execFileNoThrow — subprocess wrapper for short-lived tools (ffmpeg, probes)
 *
 * NEVER throws. Resolves { stdout, stderr, status } always.
 * No shell expansion (execFile, not exec). Aborting the signal kills the child.
 */
import { execFile } from 'node:child_process';

export interface ExecResult {
  stdout: string;
  stderr: string;
  /** 0 = success, 124 = killed (timeout or abort), 127 = binary not found, N = exit code */
  status: number;
}

export interface ExecOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  maxBuffer?: number;
  signal?: AbortSignal;
}

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_BUFFER = 10 * 1024 * 1024; // 10 MB

function statusFromError(error: { code?: unknown; killed?: boolean }): number {
  const { code } = error;
  if (typeof code === 'number') return code;
  if (code === 'ENOENT') return 127;
  if (code === 'ABORT_ERR' || error.killed === true) return 124;
  return 1;
}

/**
 * @param file - Absolute path or binary name (resolved via PATH)
 * @param args - Arguments array (no shell interpolation)
 */
export function execFileNoThrow(
  file: string,
  args: string[],
  options: ExecOptions = {},
): Promise<ExecResult> {
  const {
    cwd,
    env,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    maxBuffer = DEFAULT_MAX_BUFFER,
    signal,
  } = options;

  return new Promise<ExecResult>((resolve) => {
    execFile(
      file,
      args,
      {
        cwd,
        env,
        timeout: timeoutMs,
        maxBuffer,
        signal,
        windowsHide: true,
        encoding: 'utf8',
      },
      (error, stdout, stderr) => {
        if (error) {
          resolve({ stdout, stderr: stderr || error.message, status: statusFromError(error) });
        } else {
          resolve({ stdout, stderr, status: 0 });
        }
      },
    );
  });
}
