/**
 * SmokeProber
 *
 * Starts a long-running process (dev server), watches it against a deadline and
 * classifies it. Two probes share one contract:
 *
 * - BlockingProbe (backend servers): liveness checked on an interval; an early
 *   non-zero exit is a crash, still alive at the deadline is healthy.
 * - StreamingProbe (frontend dev servers): stdout/stderr consumed line by line;
 *   the first compile-error line fails the probe immediately.
 *
 * Both always terminate the process before returning.
 */

import { ChildProcess } from 'child_process';
import readline from 'readline';
import { Logger } from '../../utils/logger';
import { getErrorMessage } from '../../utils/errorUtils';
import { PROBE_TIMEOUTS, TEXT_LIMITS } from './constants/Timeouts';
import { spawnShell, terminateTree } from './ProcessControl';
import type { HealthVerdict } from './types/ExecutionTypes';

// ==================== PROCESS SOURCE ====================

export interface ProbeProcess {
  readonly stdout: NodeJS.ReadableStream;
  readonly stderr: NodeJS.ReadableStream;
  /** Resolves with the exit code; null when killed by a signal or never started */
  readonly exited: Promise<number | null>;
  /** Set when the process could not be started */
  readonly spawnError: Error | null;
  isRunning(): boolean;
  terminate(graceMs: number): Promise<void>;
}

export interface ProcessLauncher {
  launch(command: string, cwd: string): ProbeProcess;
}

class ChildProbeProcess implements ProbeProcess {
  readonly stdout: NodeJS.ReadableStream;
  readonly stderr: NodeJS.ReadableStream;
  readonly exited: Promise<number | null>;
  private error: Error | null = null;
  private done = false;

  constructor(private readonly child: ChildProcess) {
    if (!child.stdout || !child.stderr) {
      throw new Error('Probe process spawned without piped output');
    }
    this.stdout = child.stdout;
    this.stderr = child.stderr;
    this.exited = new Promise((resolve) => {
      child.once('exit', (code) => {
        this.done = true;
        resolve(code);
      });
      child.once('error', (error) => {
        this.error = error;
        this.done = true;
        resolve(null);
      });
    });
  }

  get spawnError(): Error | null {
    return this.error;
  }

  isRunning(): boolean {
    return !this.done;
  }

  terminate(graceMs: number): Promise<void> {
    return terminateTree(this.child, graceMs);
  }
}

export class ShellProcessLauncher implements ProcessLauncher {
  launch(command: string, cwd: string): ProbeProcess {
    return new ChildProbeProcess(spawnShell(command, cwd));
  }
}

// ==================== PROBES ====================

export interface SmokeProbe {
  probe(command: string, cwd: string, timeoutMs?: number): Promise<HealthVerdict>;
}

export interface ProbeOptions {
  launcher?: ProcessLauncher;
  pollIntervalMs?: number;
  killGraceMs?: number;
}

const FRONTEND_ERROR_FINGERPRINTS = ['module not found', "can't resolve", 'error in', 'failed to compile'];

export function hasFrontendError(line: string): boolean {
  const lowered = line.toLowerCase();
  return FRONTEND_ERROR_FINGERPRINTS.some((fingerprint) => lowered.includes(fingerprint));
}

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function truncate(text: string): string {
  return text.substring(0, TEXT_LIMITS.PROBE_OUTPUT);
}

/**
 * Accumulate a stream's text as it arrives
 */
function collect(stream: NodeJS.ReadableStream): { text: () => string; ended: Promise<void> } {
  let buffer = '';
  stream.on('data', (chunk: Buffer | string) => {
    buffer += chunk.toString();
  });
  const ended = new Promise<void>((resolve) => {
    stream.once('end', () => resolve());
    stream.once('close', () => resolve());
  });
  return { text: () => buffer, ended };
}

function spawnFailed(command: string, error: unknown): HealthVerdict {
  Logger.warn(`✗ Failed to start '${command}': ${getErrorMessage(error)}`);
  return { status: 'spawn_failed', healthy: false, stdout: '', stderr: getErrorMessage(error), exitCode: null };
}

abstract class BaseProbe implements SmokeProbe {
  protected readonly launcher: ProcessLauncher;
  protected readonly pollIntervalMs: number;
  protected readonly killGraceMs: number;

  constructor(options: ProbeOptions = {}) {
    this.launcher = options.launcher ?? new ShellProcessLauncher();
    this.pollIntervalMs = options.pollIntervalMs ?? PROBE_TIMEOUTS.POLL_INTERVAL;
    this.killGraceMs = options.killGraceMs ?? PROBE_TIMEOUTS.KILL_GRACE;
  }

  protected abstract readonly defaultTimeoutMs: number;

  protected abstract watch(proc: ProbeProcess, command: string, timeoutMs: number): Promise<HealthVerdict>;

  async probe(command: string, cwd: string, timeoutMs: number = this.defaultTimeoutMs): Promise<HealthVerdict> {
    let proc: ProbeProcess;
    try {
      proc = this.launcher.launch(command, cwd);
    } catch (error) {
      return spawnFailed(command, error);
    }

    try {
      return await this.watch(proc, command, timeoutMs);
    } catch (error) {
      Logger.error(`[SmokeProber] Probe of '${command}' failed`, error);
      return { status: 'crashed', healthy: false, stdout: '', stderr: getErrorMessage(error), exitCode: null };
    } finally {
      await this.shutdown(proc, command);
    }
  }

  /**
   * Output may still be in flight when the exit event fires
   */
  protected async drain(...streams: Array<{ ended: Promise<void> }>): Promise<void> {
    await Promise.race([Promise.all(streams.map((s) => s.ended)), delay(this.pollIntervalMs)]);
  }

  private async shutdown(proc: ProbeProcess, command: string): Promise<void> {
    try {
      await proc.terminate(this.killGraceMs);
    } catch (error) {
      Logger.warn(`[SmokeProber] Could not terminate '${command}': ${getErrorMessage(error)}`);
    }
  }
}

/**
 * Backend servers: poll liveness until the deadline
 */
export class BlockingProbe extends BaseProbe {
  protected readonly defaultTimeoutMs = PROBE_TIMEOUTS.BACKEND;

  protected async watch(proc: ProbeProcess, command: string, timeoutMs: number): Promise<HealthVerdict> {
    const stdout = collect(proc.stdout);
    const stderr = collect(proc.stderr);
    const deadline = Date.now() + timeoutMs;
    while (Date.now() < deadline) {
      await delay(this.pollIntervalMs);
      if (proc.spawnError) {
        return spawnFailed(command, proc.spawnError);
      }
      if (!proc.isRunning()) {
        const code = await proc.exited;
        await this.drain(stdout, stderr);
        if (code === 0) {
          return { status: 'healthy', healthy: true, stdout: truncate(stdout.text()), stderr: truncate(stderr.text()), exitCode: 0 };
        }
        Logger.warn(`✗ Command exited early: ${command}`);
        return {
          status: 'crashed',
          healthy: false,
          stdout: truncate(stdout.text()),
          stderr: truncate(stderr.text()),
          exitCode: code,
        };
      }
    }

    // Still running at the deadline: assume it started
    return { status: 'healthy', healthy: true, stdout: truncate(stdout.text()), stderr: truncate(stderr.text()), exitCode: null };
  }
}

/**
 * Frontend dev servers: fail on the first compile-error line
 */
export class StreamingProbe extends BaseProbe {
  protected readonly defaultTimeoutMs = PROBE_TIMEOUTS.FRONTEND;

  protected async watch(proc: ProbeProcess, command: string, timeoutMs: number): Promise<HealthVerdict> {
    const stdoutLines: string[] = [];
    const stderrLines: string[] = [];
    const stdoutEnded = collectEnd(proc.stdout);
    const stderrEnded = collectEnd(proc.stderr);
    const readers = [
      readline.createInterface({ input: proc.stdout, crlfDelay: Infinity }),
      readline.createInterface({ input: proc.stderr, crlfDelay: Infinity }),
    ];

    let timer: NodeJS.Timeout | undefined;
    const state: { errorDetected: boolean; exited: boolean; exitCode: number | null } = {
      errorDetected: false,
      exited: false,
      exitCode: null,
    };

    try {
      await new Promise<void>((resolve) => {
        const onLine = (lines: string[]) => (line: string) => {
          lines.push(line);
          if (hasFrontendError(line)) {
            state.errorDetected = true;
            resolve();
          }
        };
        readers[0].on('line', onLine(stdoutLines));
        readers[1].on('line', onLine(stderrLines));

        timer = setTimeout(resolve, timeoutMs);
        void proc.exited.then((code) => {
          state.exited = true;
          state.exitCode = code;
          resolve();
        });
      });

      if (state.exited && !state.errorDetected) {
        // Let the readers deliver whatever was written before exit
        await this.drain({ ended: stdoutEnded }, { ended: stderrEnded });
        state.errorDetected = [...stdoutLines, ...stderrLines].some(hasFrontendError);
      }
    } finally {
      if (timer) clearTimeout(timer);
      readers.forEach((reader) => reader.close());
    }

    if (proc.spawnError) {
      return spawnFailed(command, proc.spawnError);
    }

    const stdoutText = stdoutLines.join('\n');
    const stderrText = stderrLines.join('\n');
    const combined = `${stdoutText}\n${stderrText}`.toLowerCase();
    const exitCode = state.exitCode;

    // CRA/webpack summary lines
    if (state.errorDetected || (combined.includes('compiled with') && combined.includes('error'))) {
      Logger.warn(`✗ Frontend compile error detected: ${command}`);
      return { status: 'compile_error', healthy: false, stdout: stdoutText, stderr: stderrText, exitCode };
    }

    if (exitCode !== null && exitCode !== 0) {
      return { status: 'crashed', healthy: false, stdout: stdoutText, stderr: stderrText, exitCode };
    }

    return { status: 'healthy', healthy: true, stdout: stdoutText, stderr: stderrText, exitCode };
  }
}

function collectEnd(stream: NodeJS.ReadableStream): Promise<void> {
  return new Promise<void>((resolve) => {
    stream.once('end', () => resolve());
    stream.once('close', () => resolve());
  });
}
