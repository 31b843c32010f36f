/**
 * ProcessControl - spawn and tear down shell commands as process groups
 *
 * `shell: true` puts the real command one level below the spawned shell, so
 * signals go to the whole group (negative pid) and fall back to the child.
 */

import { spawn, ChildProcess } from 'child_process';
import { Logger } from '../../utils/logger';
import { getErrorMessage } from '../../utils/errorUtils';

const IS_WINDOWS = process.platform === 'win32';

const INTERRUPT_EXIT_CODES: Partial<Record<NodeJS.Signals, number>> = { SIGINT: 130, SIGTERM: 143 };

// Own process groups do not receive the terminal's Ctrl-C
const liveChildren = new Set<ChildProcess>();

export function spawnShell(command: string, cwd: string): ChildProcess {
  const child = spawn(command, {
    cwd,
    shell: true,
    stdio: ['ignore', 'pipe', 'pipe'],
    detached: !IS_WINDOWS,
    env: process.env,
  });
  liveChildren.add(child);
  child.once('exit', () => liveChildren.delete(child));
  child.once('error', () => liveChildren.delete(child));
  return child;
}

export function liveChildCount(): number {
  return liveChildren.size;
}

/**
 * SIGKILL every spawned group still running
 * @returns how many groups were signalled
 */
export function killLiveChildren(): number {
  const children = [...liveChildren];
  for (const child of children) {
    signalTree(child, 'SIGKILL');
  }
  liveChildren.clear();
  return children.length;
}

/**
 * Kill the live groups, then exit with 128 + signal number
 */
export function handleInterrupt(signal: NodeJS.Signals, exit: (code: number) => void = (code) => process.exit(code)): void {
  const killed = killLiveChildren();
  Logger.warn(`Received ${signal}, stopped ${killed} running command(s)`);
  exit(INTERRUPT_EXIT_CODES[signal] ?? 1);
}

/**
 * Route SIGINT and SIGTERM through `handleInterrupt`
 * @returns a function that removes the handlers
 */
export function installInterruptHandlers(): () => void {
  const onSigint = () => handleInterrupt('SIGINT');
  const onSigterm = () => handleInterrupt('SIGTERM');
  process.on('SIGINT', onSigint);
  process.on('SIGTERM', onSigterm);
  return () => {
    process.removeListener('SIGINT', onSigint);
    process.removeListener('SIGTERM', onSigterm);
  };
}

export function hasExited(child: ChildProcess): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

/**
 * Signal the child's process group, or the child alone when that fails
 */
export function signalTree(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) {
    return;
  }
  if (!IS_WINDOWS) {
    try {
      process.kill(-child.pid, signal);
      return;
    } catch (error) {
      Logger.debug(`[ProcessControl] Group ${signal} failed for ${child.pid}: ${getErrorMessage(error)}`);
    }
  }
  try {
    child.kill(signal);
  } catch (error) {
    Logger.debug(`[ProcessControl] ${signal} failed for ${child.pid}: ${getErrorMessage(error)}`);
  }
}

/**
 * Resolve true once the child exits, false after `timeoutMs`
 */
export function waitForExit(child: ChildProcess, timeoutMs: number): Promise<boolean> {
  if (hasExited(child)) {
    return Promise.resolve(true);
  }
  return new Promise((resolve) => {
    const onExit = () => {
      clearTimeout(timer);
      resolve(true);
    };
    const timer = setTimeout(() => {
      child.removeListener('exit', onExit);
      resolve(hasExited(child));
    }, timeoutMs);
    child.once('exit', onExit);
  });
}

/**
 * SIGTERM the group, then SIGKILL when it outlives the grace period
 */
export async function terminateTree(child: ChildProcess, graceMs: number): Promise<void> {
  if (hasExited(child)) {
    // Leftover grandchildren still share the group
    signalTree(child, 'SIGKILL');
    return;
  }
  signalTree(child, 'SIGTERM');
  if (await waitForExit(child, graceMs)) {
    signalTree(child, 'SIGKILL');
    return;
  }
  signalTree(child, 'SIGKILL');
  await waitForExit(child, graceMs);
}
