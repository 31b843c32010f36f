/**
 * CommandRunner
 *
 * `ShellCommandExecutor` runs one shell command with a wall-clock timeout.
 * `CommandRunner.runWithRetry` wraps it in the bounded auto-fix loop: every
 * failure goes to the AutoFixAdvisor and its solution becomes the next command.
 */

import { Logger } from '../../utils/logger';
import { getErrorMessage } from '../../utils/errorUtils';
import { askUser, UserPrompter } from '../InteractiveController';
import { AutoFixAdvisor } from './AutoFixAdvisor';
import { StuckDetector } from './StuckDetector';
import { COMMAND_TIMEOUTS, PROBE_TIMEOUTS, RETRY_LIMITS, TEXT_LIMITS } from './constants/Timeouts';
import { spawnShell, terminateTree } from './ProcessControl';

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  durationMs: number;
}

export interface CommandExecutor {
  /**
   * @throws when the command cannot be spawned
   */
  run(command: string, cwd: string, timeoutMs: number): Promise<CommandResult>;
}

export function commandSucceeded(result: CommandResult): boolean {
  return !result.timedOut && result.exitCode === 0;
}

/**
 * Error text for a failed run: stderr, or stdout when stderr is empty
 */
export function errorOutputOf(result: CommandResult): string {
  return result.stderr || result.stdout;
}

export class ShellCommandExecutor implements CommandExecutor {
  constructor(private readonly killGraceMs: number = PROBE_TIMEOUTS.KILL_GRACE) {}

  run(command: string, cwd: string, timeoutMs: number): Promise<CommandResult> {
    const startTime = Date.now();

    return new Promise((resolve, reject) => {
      const child = spawnShell(command, cwd);
      let stdout = '';
      let stderr = '';
      let timedOut = false;

      child.stdout?.setEncoding('utf-8');
      child.stderr?.setEncoding('utf-8');
      child.stdout?.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr?.on('data', (chunk: string) => {
        stderr += chunk;
      });

      const timer = setTimeout(() => {
        timedOut = true;
        Logger.command(command, `timed out after ${timeoutMs}ms, killing process group`);
        terminateTree(child, this.killGraceMs).catch((error: unknown) => {
          Logger.warn(`[ShellCommandExecutor] Failed to kill "${command}": ${getErrorMessage(error)}`);
        });
      }, timeoutMs);

      child.once('error', (error) => {
        clearTimeout(timer);
        reject(error);
      });

      child.once('close', (code) => {
        clearTimeout(timer);
        const durationMs = Date.now() - startTime;
        Logger.command(command, `exited with ${code}`, { durationMs, timedOut });
        resolve({ exitCode: code, stdout, stderr, timedOut, durationMs });
      });
    });
  }
}

export interface RetryOptions {
  /** Attempt ceiling (default 15) */
  maxRetries?: number;
  /** Directory holding the conversation log */
  logDir?: string;
}

export class CommandRunner {
  constructor(
    private readonly executor: CommandExecutor,
    private readonly advisor: AutoFixAdvisor,
    private readonly prompter: UserPrompter
  ) {}

  /**
   * Run `command`, asking the advisor for a replacement after every failure.
   * Never throws; returns false once the ceiling is reached or the operator aborts.
   */
  async runWithRetry(command: string, cwd: string, context: string, options: RetryOptions = {}): Promise<boolean> {
    const maxRetries = options.maxRetries ?? RETRY_LIMITS.MAX_AUTO_RETRY_ATTEMPTS;
    const stuck = new StuckDetector(TEXT_LIMITS.COMMAND_ERROR_SIGNATURE);
    let currentCommand = command;
    let attempt = 0;

    while (attempt < maxRetries) {
      this.prompter.say(`\n▶ Running: ${currentCommand}`);

      let errorOutput: string;
      try {
        const result = await this.executor.run(currentCommand, cwd, COMMAND_TIMEOUTS.DEFAULT);
        if (commandSucceeded(result)) {
          this.prompter.say('✓ Success');
          return true;
        }
        errorOutput = result.timedOut
          ? `Command timed out after ${COMMAND_TIMEOUTS.DEFAULT / 1000} seconds\n${errorOutputOf(result)}`
          : errorOutputOf(result);
      } catch (error) {
        this.prompter.say(`✗ Error: ${getErrorMessage(error)}`);
        attempt++;
        continue;
      }

      this.prompter.say(`✗ Failed with error:\n  ${errorOutput.substring(0, 500)}`);

      const occurrences = stuck.record(errorOutput);
      if (stuck.isStuck) {
        this.prompter.say(`\n⚠️  Same error seen ${occurrences} times - trying radically different approach...`);
      }

      if (attempt < maxRetries - 1) {
        this.prompter.say(`\n🔄 Retrying... (attempt ${attempt + 1}/${maxRetries})`);

        try {
          const fix = await this.advisor.suggestFix(errorOutput, stuck.annotate(context), currentCommand, attempt);

          if (fix.needsHuman) {
            this.prompter.say(`\n⚠️  Human intervention needed:\n\n${fix.explanation}`);
            this.prompter.say(`\n📋 Required action:\n  ${fix.humanInstructions ?? 'Please review and fix manually'}`);

            const { choice } = await askUser(
              this.prompter,
              'Options:\n  1. I\'ve fixed it, retry the original command\n  2. Skip this step\n  3. Abort\n\nYour choice',
              { context: `Human intervention needed while ${context}`, logDir: options.logDir }
            );

            if (choice === '1') {
              currentCommand = command;
              attempt++;
              continue;
            }
            if (choice === '2') {
              this.prompter.say('⏭️  Skipping this step...');
              return true;
            }
            this.prompter.say('❌ Aborting...');
            return false;
          }

          this.prompter.say(`\n💡 Fix suggestion: ${fix.explanation}`);
          if (fix.solution) {
            currentCommand = fix.solution;
          }
        } catch (error) {
          Logger.warn(`[CommandRunner] Auto-fix step failed: ${getErrorMessage(error)}`);
        }
      }

      attempt++;
    }

    this.prompter.say(`\n❌ Command failed after ${maxRetries} attempts`);
    return false;
  }
}
