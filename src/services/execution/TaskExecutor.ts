/**
 * TaskExecutor
 *
 * Per-task state machine:
 *
 *   GENERATING → AWAITING_APPROVAL → APPLYING → CHECKING_ERRORS → TESTING
 *     → INTEGRATION_TESTING → DONE          (terminal: FAILED, SKIPPED)
 *
 * Any gate may send the task back to GENERATING. Restarts are a bounded loop;
 * an abort choice ends the whole task list.
 */

import { Logger } from '../../utils/logger';
import { askUser, AskOptions, UserPrompter } from '../InteractiveController';
import { CodeGenerator } from './CodeGenerator';
import { FileApplier } from './FileApplier';
import { RETRY_LIMITS } from './constants/Timeouts';
import { detectProjectType, takeFileTreeSnapshot } from './ProjectSnapshot';
import { StaticErrorChecker } from './StaticErrorChecker';
import { TestRunner } from './TestRunner';
import type { CodeChangeSet, ExecutionContext, FileTreeSnapshot, ProjectType, Task, TaskOutcome } from './types/ExecutionTypes';

export type TaskState =
  | 'GENERATING'
  | 'AWAITING_APPROVAL'
  | 'APPLYING'
  | 'CHECKING_ERRORS'
  | 'TESTING'
  | 'INTEGRATION_TESTING'
  | 'DONE'
  | 'FAILED'
  | 'SKIPPED';

/** One pass through the machine either finishes or asks for a restart */
type PassResult = TaskOutcome | 'restart';

export interface TaskExecutorDeps {
  codeGenerator: CodeGenerator;
  fileApplier: FileApplier;
  staticChecker: StaticErrorChecker;
  testRunner: TestRunner;
  prompter: UserPrompter;
  snapshot?: (targetDir: string) => FileTreeSnapshot;
  projectType?: (targetDir: string) => ProjectType;
  maxRestarts?: number;
}

export class TaskExecutor {
  private readonly snapshot: (targetDir: string) => FileTreeSnapshot;
  private readonly projectType: (targetDir: string) => ProjectType;
  private readonly maxRestarts: number;
  private state: TaskState = 'GENERATING';

  constructor(private readonly deps: TaskExecutorDeps) {
    this.snapshot = deps.snapshot ?? takeFileTreeSnapshot;
    this.projectType = deps.projectType ?? detectProjectType;
    this.maxRestarts = deps.maxRestarts ?? RETRY_LIMITS.MAX_TASK_RESTARTS;
  }

  /**
   * Last state entered (for progress reporting)
   */
  get currentState(): TaskState {
    return this.state;
  }

  async executeTask(task: Task, taskIndex: number, context: ExecutionContext): Promise<TaskOutcome> {
    const { prompter } = this.deps;
    const title = task.title || `Task ${taskIndex + 1}`;

    for (let restarts = 0; restarts <= this.maxRestarts; restarts++) {
      prompter.say(`\n${'='.repeat(80)}\n🚀 EXECUTING TASK ${taskIndex + 1}: ${title}${restarts > 0 ? ` (restart ${restarts})` : ''}\n${'='.repeat(80)}`);

      const result = await this.runPass(task, taskIndex, title, context);
      if (result !== 'restart') {
        Logger.task(title, `Task finished: ${result}`, { restarts });
        return result;
      }
    }

    prompter.say(`\n❌ Task ${taskIndex + 1} restarted ${this.maxRestarts} times, giving up`);
    this.state = 'FAILED';
    return 'failed';
  }

  private enter(state: TaskState, title: string): void {
    this.state = state;
    Logger.task(title, `→ ${state}`);
  }

  private gate(context: ExecutionContext, label: string, extra: Partial<AskOptions> = {}): AskOptions {
    return { context: label, logDir: context.targetDir, ...extra };
  }

  private async runPass(task: Task, taskIndex: number, title: string, context: ExecutionContext): Promise<PassResult> {
    const { codeGenerator, fileApplier, staticChecker, testRunner, prompter } = this.deps;
    const n = taskIndex + 1;

    // GENERATING
    this.enter('GENERATING', title);
    let currentTask = task;
    let changeSet: CodeChangeSet | null = await codeGenerator.generateTaskCode(currentTask, context, taskIndex);
    if (!changeSet) {
      prompter.say('✗ Failed to generate code');
      this.state = 'FAILED';
      return 'failed';
    }

    // AWAITING_APPROVAL (instructions loop back through GENERATING)
    for (;;) {
      this.enter('AWAITING_APPROVAL', title);
      prompter.say(`\n📋 Implementation plan:\n   ${changeSet.description || 'N/A'}`);

      const { choice, instructions } = await askUser(
        prompter,
        "Proceed with implementation? (y/n/skip, or add modifications like 'y, but also add error logging')",
        this.gate(context, `Task ${n} (${title}): Implementation approval`, { allowInstructions: true })
      );

      if (choice === 'skip') {
        prompter.say('⏭️  Skipping this task');
        this.state = 'SKIPPED';
        return 'skipped';
      }
      if (!choice.startsWith('y')) {
        prompter.say('❌ Task cancelled');
        this.state = 'FAILED';
        return 'aborted';
      }
      if (!instructions) {
        break;
      }

      prompter.say(`\n💡 Applying modifications: ${instructions}`);
      this.enter('GENERATING', title);
      currentTask = {
        ...currentTask,
        description: `${currentTask.description}\n\nAdditional requirements: ${instructions}`,
      };
      const regenerated: CodeChangeSet | null = await codeGenerator.generateTaskCode(currentTask, context, taskIndex);
      if (regenerated) {
        changeSet = regenerated;
      } else {
        prompter.say('⚠️  Regeneration produced nothing, keeping the previous plan');
      }
    }

    // APPLYING
    this.enter('APPLYING', title);
    if (!(await fileApplier.applyCodeChanges(changeSet, context.targetDir, context.sessionTracker))) {
      prompter.say('\n❌ Failed to apply code changes');
      const { choice } = await askUser(prompter, 'Retry? (y/n)', this.gate(context, `Task ${n}: Failed to apply code changes`));
      if (choice === 'y' || choice === 'yes') {
        return 'restart';
      }
      this.state = 'FAILED';
      return 'failed';
    }

    // CHECKING_ERRORS
    this.enter('CHECKING_ERRORS', title);
    const projectType = this.projectType(context.targetDir);
    const check = await staticChecker.check(context.targetDir, projectType, context.sessionTracker, true);
    if (!check.allFixed) {
      prompter.say(`\n❌ ${check.remainingErrors.length} error(s) could not be auto-fixed\n\n⚠️  Human intervention required:`);
      check.remainingErrors.forEach((error, i) => prompter.say(`\n  ${i + 1}. ${error}`));
      prompter.say('\n📋 Please fix these errors manually, then choose an option:');

      const { choice } = await askUser(
        prompter,
        "Options:\n  1. I've fixed the errors, continue\n  2. Retry (regenerate code)\n  3. Skip this task\n  4. Abort",
        this.gate(context, `Task ${n}: ${check.remainingErrors.length} syntax errors could not be auto-fixed`)
      );

      const next = await this.menuOutcome(choice, async () => {
        const recheck = await staticChecker.check(context.targetDir, projectType, context.sessionTracker, false);
        if (!recheck.allFixed) {
          prompter.say('⚠️  Errors still present');
        }
        return recheck.allFixed;
      });
      if (next !== 'continue') {
        return next;
      }
    }

    // TESTING
    this.enter('TESTING', title);
    const testResult = await testRunner.runTests(context.targetDir, context.sessionTracker, {
      autoFix: true,
      readmeContent: context.readmeContent,
    });
    if (!testResult.passed) {
      prompter.say(`\n❌ Tests failed after auto-fix attempts!\n\n📊 Test Output:\n${testResult.output.substring(0, 1500)}`);
      prompter.say('\n⚠️  Human intervention required to fix failing tests');

      const { choice } = await askUser(
        prompter,
        "Options:\n  1. I've fixed it, re-run tests\n  2. Retry task (regenerate)\n  3. Skip this task\n  4. Abort",
        this.gate(context, `Task ${n}: Tests failed after ${RETRY_LIMITS.MAX_AUTO_RETRY_ATTEMPTS} auto-fix attempts`)
      );

      const next = await this.menuOutcome(choice, async () => {
        const rerun = await testRunner.runTests(context.targetDir, context.sessionTracker, {
          autoFix: false,
          readmeContent: context.readmeContent,
        });
        if (!rerun.passed) {
          prompter.say('⚠️  Tests still failing');
        }
        return rerun.passed;
      });
      if (next !== 'continue') {
        return next;
      }
    }

    // INTEGRATION_TESTING
    if (context.completedTasks.length > 0) {
      this.enter('INTEGRATION_TESTING', title);
      prompter.say('\n🔗 Running integration tests with previous tasks...');
      const integration = await testRunner.runTests(context.targetDir, context.sessionTracker, {
        testType: 'integration',
        autoFix: true,
        readmeContent: context.readmeContent,
      });

      if (!integration.passed) {
        const next = await this.integrationFailure(n, context);
        if (next !== 'continue') {
          return next;
        }
      }
    }

    // DONE
    this.enter('DONE', title);
    prompter.say(`\n✅ Task ${n} completed successfully!`);
    context.completedTasks.push(title);

    prompter.say('\n📸 Refreshing file tree snapshot...');
    context.fileTreeSnapshot = this.snapshot(context.targetDir);
    return 'completed';
  }

  /**
   * Shared 1/2/3/other menu of the error-check and test gates
   */
  private async menuOutcome(choice: string, recheck: () => Promise<boolean>): Promise<PassResult | 'continue'> {
    if (choice === '1') {
      return (await recheck()) ? 'continue' : 'restart';
    }
    if (choice === '2') {
      return 'restart';
    }
    if (choice === '3') {
      this.deps.prompter.say('⏭️  Skipping task');
      this.state = 'SKIPPED';
      return 'skipped';
    }
    this.state = 'FAILED';
    return 'aborted';
  }

  private async integrationFailure(n: number, context: ExecutionContext): Promise<PassResult | 'continue'> {
    const { prompter, testRunner } = this.deps;
    prompter.say('\n❌ Integration tests failed!\n⚠️  This task may have broken existing functionality\n\n📋 Options:');

    const { choice } = await askUser(
      prompter,
      "  1. Try to fix automatically\n  2. I'll fix it manually\n  3. Rollback this task\n  4. Continue anyway (risky)",
      this.gate(context, `Task ${n}: Integration tests failed`)
    );

    if (choice === '1') {
      prompter.say('\n🔄 Regenerating task with integration awareness...');
      return 'restart';
    }

    if (choice === '2') {
      prompter.say('\n📋 Please fix the integration issues, then:');
      const retry = await askUser(
        prompter,
        "  1. I've fixed it, re-run integration tests\n  2. Abort",
        this.gate(context, `Task ${n}: User chose manual fix for integration issues`)
      );
      if (retry.choice !== '1') {
        this.state = 'FAILED';
        return 'aborted';
      }
      const rerun = await testRunner.runTests(context.targetDir, context.sessionTracker, {
        testType: 'integration',
        autoFix: false,
        readmeContent: context.readmeContent,
      });
      if (!rerun.passed) {
        prompter.say('⚠️  Integration tests still failing');
        this.state = 'FAILED';
        return 'failed';
      }
      return 'continue';
    }

    if (choice === '3') {
      this.rollbackTask();
      this.state = 'FAILED';
      return 'failed';
    }

    if (choice === '4') {
      prompter.say('⚠️  Continuing with integration test failures (risky)');
      return 'continue';
    }

    this.state = 'FAILED';
    return 'failed';
  }

  /**
   * Not implemented: changes stay on disk and must be reverted by hand
   */
  rollbackTask(): boolean {
    this.deps.prompter.say('⏪ Rollback not yet implemented. Please revert changes manually.');
    return false;
  }
}
