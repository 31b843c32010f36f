/**
 * ExecutionOrchestrator
 *
 * Whole-run sequencing:
 *   reset tracker → load artifacts → snapshot → README → environment setup
 *   → tasks in order (stop on first failure) → summary → verification → Quick Start
 */

import fs from 'fs';
import path from 'path';
import { AppConfig } from '../../config/AppConfig';
import { Logger } from '../../utils/logger';
import { ArtifactLoadError, getErrorMessage } from '../../utils/errorUtils';
import { ConsoleUserPrompter, UserPrompter } from '../InteractiveController';
import { JsonCollaborator, LLMClient } from '../llm/LLMClient';
import { AutoFixAdvisor } from './AutoFixAdvisor';
import { CodeGenerator } from './CodeGenerator';
import { CommandExecutor, CommandRunner, ShellCommandExecutor } from './CommandRunner';
import { DebugAgentBridge } from './DebugAgentBridge';
import { EnvironmentSetup } from './EnvironmentSetup';
import { FileApplier } from './FileApplier';
import { ProjectVerifier, VerificationResult } from './ProjectVerifier';
import { detectEnvironment, takeFileTreeSnapshot } from './ProjectSnapshot';
import { ReadmeGenerator } from './ReadmeGenerator';
import { SchemaValidator } from './schemas/CollaboratorSchemas';
import { SessionTracker } from './SessionTracker';
import { BlockingProbe, StreamingProbe } from './SmokeProber';
import { StaticErrorChecker } from './StaticErrorChecker';
import { TaskExecutor } from './TaskExecutor';
import { TestRunner } from './TestRunner';
import type { ExecutionContext, JsonObject, Task, TaskOutcome } from './types/ExecutionTypes';

export const ARCHITECTURE_FILE = 'architecture.json';
export const TASK_LIST_FILE = 'majortasks.json';

const SUMMARY_FIXES = 10;
const SUMMARY_CREATED_FILES = 15;

export interface ExecutionReport {
  /** Every task ran to completion or was skipped */
  finished: boolean;
  completedTasks: string[];
  /** Outcome of the task that stopped the run */
  stoppedBy?: { task: string; outcome: TaskOutcome };
  /** Null when the run stopped before verification */
  verification: VerificationResult | null;
}

export interface ExecutionOrchestratorDeps {
  taskExecutor: TaskExecutor;
  environmentSetup: EnvironmentSetup;
  readmeGenerator: ReadmeGenerator;
  verifier: ProjectVerifier;
  prompter: UserPrompter;
  tracker?: SessionTracker;
  autoRun?: boolean;
  persistServers?: boolean;
}

export interface EngineOptions {
  collaborator?: JsonCollaborator;
  executor?: CommandExecutor;
  prompter?: UserPrompter;
  autoRun?: boolean;
  persistServers?: boolean;
}

/**
 * Read and decode one JSON artifact
 * @throws ArtifactLoadError
 */
export function loadArtifact<T>(filePath: string, decode: (data: unknown) => T | null): T {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ArtifactLoadError(filePath, getErrorMessage(error));
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ArtifactLoadError(filePath, `invalid JSON (${getErrorMessage(error)})`);
  }

  const decoded = decode(data);
  if (decoded === null) {
    throw new ArtifactLoadError(filePath, 'unexpected structure');
  }
  return decoded;
}

export class ExecutionOrchestrator {
  readonly tracker: SessionTracker;

  constructor(private readonly deps: ExecutionOrchestratorDeps) {
    this.tracker = deps.tracker ?? new SessionTracker();
  }

  /**
   * Wire the whole engine from a collaborator, a command executor and a prompter
   */
  static create(options: EngineOptions = {}): ExecutionOrchestrator {
    const collaborator = options.collaborator ?? new LLMClient().asCollaborator();
    const executor = options.executor ?? new ShellCommandExecutor();
    const prompter = options.prompter ?? new ConsoleUserPrompter();

    const advisor = new AutoFixAdvisor(collaborator);
    const runner = new CommandRunner(executor, advisor, prompter);

    return new ExecutionOrchestrator({
      taskExecutor: new TaskExecutor({
        codeGenerator: new CodeGenerator(collaborator),
        fileApplier: new FileApplier(prompter),
        staticChecker: new StaticErrorChecker(executor, advisor, prompter),
        testRunner: new TestRunner(executor, new DebugAgentBridge(collaborator), prompter),
        prompter,
      }),
      environmentSetup: new EnvironmentSetup(collaborator, runner, prompter),
      readmeGenerator: new ReadmeGenerator(executor),
      verifier: new ProjectVerifier({
        runner,
        executor,
        backendProbe: new BlockingProbe(),
        frontendProbe: new StreamingProbe(),
        prompter,
      }),
      prompter,
      autoRun: options.autoRun ?? AppConfig.verification.autoRun,
      persistServers: options.persistServers ?? AppConfig.verification.persistServers,
    });
  }

  /**
   * @throws ArtifactLoadError when either artifact is unreadable or malformed
   */
  async startExecution(
    architecturePath: string,
    tasksPath: string,
    targetDir: string,
    codebaseInsight?: JsonObject | null
  ): Promise<ExecutionReport> {
    const { prompter, environmentSetup, readmeGenerator, taskExecutor } = this.deps;

    prompter.say(`\n${'='.repeat(80)}\n🚀 STARTING AUTONOMOUS EXECUTION\n${'='.repeat(80)}`);
    this.tracker.reset();

    const architecture = loadArtifact(architecturePath, (data) => SchemaValidator.decodeArchitecture(data));
    const taskList = loadArtifact(tasksPath, (data) => SchemaValidator.decodeTaskList(data));
    Logger.info(`Loaded ${taskList.tasks.length} tasks`, { architecturePath, tasksPath, targetDir });

    prompter.say('\n📸 Taking file tree snapshot...');
    const snapshot = takeFileTreeSnapshot(targetDir);
    prompter.say(`✓ Found ${snapshot.files.length} files, ${snapshot.directories.length} directories`);

    const readmeContent = await readmeGenerator.generate(architecture, targetDir, snapshot, codebaseInsight);

    const context: ExecutionContext = {
      targetDir,
      architecture,
      tasks: taskList.document,
      completedTasks: [],
      fileTreeSnapshot: snapshot,
      readmeContent,
      codebaseInsight,
      sessionTracker: this.tracker,
    };

    prompter.say('\n🔍 Detecting environment...');
    const envInfo = detectEnvironment(snapshot, targetDir);
    prompter.say(`   Project type: ${envInfo.projectType}`);
    if (envInfo.needsSetup.length > 0) {
      prompter.say(`   Needs setup: ${envInfo.needsSetup.join(', ')}`);
      const ready = await environmentSetup.setup({ envInfo, targetDir, architecture, readmeContent, codebaseInsight });
      if (!ready) {
        prompter.say('\n❌ Environment setup failed. Aborting execution.');
        return { finished: false, completedTasks: [...context.completedTasks], verification: null };
      }
    }

    prompter.say(`\n📋 Total tasks to execute: ${taskList.tasks.length}`);
    const stop = await this.runTasks(taskList.tasks, context, taskExecutor);
    if (stop) {
      prompter.say(`\n❌ Execution stopped at '${stop.task}' (${stop.outcome})`);
      return { finished: false, completedTasks: [...context.completedTasks], stoppedBy: stop, verification: null };
    }

    this.printSummary(context);

    const verification = await this.deps.verifier.verifyProjectRuns(targetDir, architecture, {
      autoRun: this.deps.autoRun ?? true,
      persistServers: this.deps.persistServers ?? false,
    });

    prompter.say(`\n${'='.repeat(80)}\n🚀 PROJECT READY!\n${'='.repeat(80)}`);
    prompter.say(verification.success ? `\n📋 To run your project:\n${verification.instructions}` : `\n${verification.instructions}`);
    readmeGenerator.addQuickStart(targetDir, verification.instructions);

    return { finished: true, completedTasks: [...context.completedTasks], verification };
  }

  /**
   * Action mode: verification only, for the sides the prompt names
   */
  async runAction(prompt: string, targetDir: string): Promise<VerificationResult> {
    return this.deps.verifier.runActionPrompt(prompt, targetDir, this.deps.autoRun ?? true, this.deps.persistServers ?? false);
  }

  private async runTasks(
    tasks: Task[],
    context: ExecutionContext,
    executor: TaskExecutor
  ): Promise<{ task: string; outcome: TaskOutcome } | null> {
    for (const [index, task] of tasks.entries()) {
      const outcome = await executor.executeTask(task, index, context);
      if (outcome === 'failed' || outcome === 'aborted') {
        return { task: task.title, outcome };
      }
    }
    return null;
  }

  private printSummary(context: ExecutionContext): void {
    const { prompter } = this.deps;
    const lines: string[] = [`\n${'='.repeat(80)}`, '🎉 ALL TASKS COMPLETED SUCCESSFULLY!', '='.repeat(80)];

    lines.push('\n✅ Completed tasks:');
    context.completedTasks.forEach((title, i) => lines.push(`  ${i + 1}. ✓ ${title}`));

    const fixes = this.tracker.getErrorLog();
    if (fixes.length > 0) {
      lines.push(`\n🔧 Errors fixed during execution (${fixes.length} total):`);
      fixes.slice(-SUMMARY_FIXES).forEach((entry, i) => lines.push(`  ${i + 1}. [${entry.timestamp}] ${entry.fix.substring(0, 80)}...`));
      if (fixes.length > SUMMARY_FIXES) {
        lines.push(`  ... and ${fixes.length - SUMMARY_FIXES} more fixes`);
      }
    }

    const created = [...this.tracker.getCreatedFiles()]
      .map((file) => path.relative(context.targetDir, file))
      .sort();
    if (created.length > 0) {
      lines.push(`\n📁 Files created/modified (${created.length} total):`);
      created.slice(0, SUMMARY_CREATED_FILES).forEach((file) => lines.push(`  • ${file}`));
      if (created.length > SUMMARY_CREATED_FILES) {
        lines.push(`  ... and ${created.length - SUMMARY_CREATED_FILES} more files`);
      }
    }

    prompter.say(lines.join('\n'));
  }
}
