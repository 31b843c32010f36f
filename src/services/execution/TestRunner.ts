/**
 * TestRunner
 *
 * Detects the project's test commands and runs each one inside a bounded
 * auto-fix loop: on failure the DebugAgentBridge proposes a patch set, it is
 * applied, and the command runs again. A fix is logged to the session only
 * once the next run of the same command passes.
 */

import fs from 'fs';
import path from 'path';
import { getErrorMessage } from '../../utils/errorUtils';
import type { UserPrompter } from '../InteractiveController';
import { CommandExecutor, commandSucceeded, errorOutputOf } from './CommandRunner';
import { DebugAgentBridge } from './DebugAgentBridge';
import { StuckDetector } from './StuckDetector';
import { COMMAND_TIMEOUTS, RETRY_LIMITS, TEXT_LIMITS } from './constants/Timeouts';
import { getFileTreeWithContents, readPackageScripts, resolveInProject, walkTree } from './ProjectSnapshot';
import { SessionTracker } from './SessionTracker';
import type { DebugFix, FileTreeWithContents, TestResult } from './types/ExecutionTypes';

export interface TestRunOptions {
  /** Label used in progress output and the debugger's context */
  testType?: string;
  autoFix?: boolean;
  readmeContent?: string;
}

export type TreeCollector = (targetDir: string) => FileTreeWithContents;

const TEST_SCAN_IGNORED = new Set(['node_modules', 'venv', 'env', '__pycache__']);

/**
 * `pytest -v` for pytest.ini or any test_*.py, `npm test` for a test script
 */
export function detectTestCommands(targetDir: string): string[] {
  const commands: string[] = [];

  const hasPytestConfig = fs.existsSync(path.join(targetDir, 'pytest.ini'));
  const hasPythonTests =
    hasPytestConfig ||
    walkTree(targetDir, (name) => name.startsWith('.') || TEST_SCAN_IGNORED.has(name)).some(
      (entry) => entry.isFile && entry.name.startsWith('test_') && entry.name.endsWith('.py')
    );
  if (hasPythonTests) {
    commands.push('pytest -v');
  }

  if ('test' in readPackageScripts(targetDir)) {
    commands.push('npm test');
  }

  return commands;
}

export class TestRunner {
  constructor(
    private readonly executor: CommandExecutor,
    private readonly bridge: DebugAgentBridge,
    private readonly prompter: UserPrompter,
    private readonly collectTree: TreeCollector = getFileTreeWithContents
  ) {}

  async runTests(targetDir: string, tracker: SessionTracker, options: TestRunOptions = {}): Promise<TestResult> {
    const testType = options.testType ?? 'all';
    const autoFix = options.autoFix ?? true;
    const maxAttempts = RETRY_LIMITS.MAX_AUTO_RETRY_ATTEMPTS;

    this.prompter.say(`\n🧪 Running ${testType} tests...`);

    const commands = detectTestCommands(targetDir);
    if (commands.length === 0) {
      this.prompter.say('⚠️  No test framework detected');
      return { passed: true, output: 'No tests to run', errors: [] };
    }

    let allPassed = true;
    const allOutput: string[] = [];
    const allErrors: string[] = [];

    for (const command of commands) {
      const stuck = new StuckDetector(TEXT_LIMITS.TEST_ERROR_SIGNATURE);
      let pendingFix: { error: string; explanation: string } | null = null;
      let attempt = 0;

      while (attempt < maxAttempts) {
        this.prompter.say(`\n▶ Running: ${command}`);

        let errorOutput: string;
        try {
          const result = await this.executor.run(command, targetDir, COMMAND_TIMEOUTS.DEFAULT);
          allOutput.push(result.stdout);

          if (result.timedOut) {
            this.prompter.say(`✗ Tests timed out after ${COMMAND_TIMEOUTS.DEFAULT / 1000} seconds`);
            allErrors.push(`${command} timed out`);
            allPassed = false;
            break;
          }

          if (commandSucceeded(result)) {
            this.prompter.say('✓ All tests passed');
            if (pendingFix) {
              tracker.logErrorFix(pendingFix.error, pendingFix.explanation);
            }
            break;
          }

          errorOutput = errorOutputOf(result);
        } catch (error) {
          allErrors.push(getErrorMessage(error));
          this.prompter.say(`✗ Error running tests: ${getErrorMessage(error)}`);
          allPassed = false;
          break;
        }

        allErrors.push(errorOutput);
        this.prompter.say(`✗ Tests failed\n\n📊 Test Output:\n${errorOutput.substring(0, 1000)}`);

        const occurrences = stuck.record(errorOutput);
        if (stuck.isStuck) {
          this.prompter.say(`\n⚠️  Same error seen ${occurrences} times - trying different approach...`);
        }

        if (!autoFix || attempt >= maxAttempts - 1) {
          allPassed = false;
          break;
        }

        this.prompter.say(`\n🔄 Launching debugging agent... (attempt ${attempt + 1}/${maxAttempts})`);

        const debugFix = await this.bridge.analyzeTestFailure(
          errorOutput,
          this.collectTree(targetDir),
          stuck.annotate(`running ${testType} tests`),
          options.readmeContent
        );

        if (debugFix.needsHuman) {
          this.prompter.say(`\n⚠️  Debugging agent: Human intervention needed\n\n${debugFix.explanation}`);
          if (debugFix.humanInstructions) {
            this.prompter.say(`\n📋 Required action:\n  ${debugFix.humanInstructions}`);
          }
          allPassed = false;
          break;
        }

        this.prompter.say(`\n${'='.repeat(60)}\n🔧 ERROR FIX #${attempt + 1}\n${'='.repeat(60)}`);
        this.prompter.say(`\n📋 Problem identified:\n   ${debugFix.explanation}\n\n🎯 Confidence: ${debugFix.confidence}`);

        await this.applyDebugFix(debugFix, targetDir, tracker);
        pendingFix = { error: errorOutput.substring(0, TEXT_LIMITS.FIXED_ERROR), explanation: debugFix.explanation };
        attempt++;
      }
    }

    return { passed: allPassed, output: allOutput.join('\n'), errors: allErrors };
  }

  /**
   * Deletions, then creations, then modifications, then commands.
   * Individual failures are reported and the rest still applied.
   */
  async applyDebugFix(fix: DebugFix, targetDir: string, tracker: SessionTracker): Promise<void> {
    this.prompter.say('\n📝 Changes being applied:');

    for (const relativePath of fix.filesToDelete) {
      try {
        fs.unlinkSync(resolveInProject(targetDir, relativePath));
        this.prompter.say(`   ✓ Deleted: ${relativePath}`);
      } catch (error) {
        this.prompter.say(`   ✗ Failed to delete ${relativePath}: ${getErrorMessage(error)}`);
      }
    }

    for (const file of fix.filesToCreate) {
      try {
        const filePath = resolveInProject(targetDir, file.path);
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, file.content, 'utf-8');
        tracker.trackCreated(filePath);
        this.prompter.say(`   ✓ Created: ${file.path}`);
      } catch (error) {
        this.prompter.say(`   ✗ Failed to create ${file.path}: ${getErrorMessage(error)}`);
      }
    }

    for (const file of fix.filesToModify) {
      try {
        const filePath = resolveInProject(targetDir, file.path);
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, file.content, 'utf-8');
        tracker.trackModified(filePath);
        this.prompter.say(`   ✓ Modified: ${file.path}`);
      } catch (error) {
        this.prompter.say(`   ✗ Failed to modify ${file.path}: ${getErrorMessage(error)}`);
      }
    }

    for (const command of fix.commandsToRun) {
      this.prompter.say(`   ▶ Running: ${command}`);
      try {
        const result = await this.executor.run(command, targetDir, COMMAND_TIMEOUTS.DEBUG_COMMAND);
        if (commandSucceeded(result)) {
          this.prompter.say('   ✓ Success');
        } else {
          this.prompter.say(`   ⚠️  Command failed: ${result.stderr.substring(0, 200)}`);
        }
      } catch (error) {
        this.prompter.say(`   ✗ Error running command: ${getErrorMessage(error)}`);
      }
    }
  }
}
