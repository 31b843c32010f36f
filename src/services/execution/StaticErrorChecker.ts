/**
 * StaticErrorChecker
 *
 * Python: py_compile every source file. Node: `npm run lint` when the project
 * has a lint script. With auto-fix on, each Python file with a syntax error is
 * sent to the AutoFixAdvisor as a whole; the replacement is kept only when the
 * file then compiles.
 */

import fs from 'fs';
import { Logger } from '../../utils/logger';
import { getErrorMessage } from '../../utils/errorUtils';
import type { UserPrompter } from '../InteractiveController';
import { AutoFixAdvisor } from './AutoFixAdvisor';
import { CommandExecutor, CommandResult, commandSucceeded } from './CommandRunner';
import { COMMAND_TIMEOUTS } from './constants/Timeouts';
import { readPackageScripts, walkTree, TreeEntry } from './ProjectSnapshot';
import { SessionTracker } from './SessionTracker';
import type { ProjectType } from './types/ExecutionTypes';

export interface StaticCheckResult {
  allFixed: boolean;
  remainingErrors: string[];
}

interface SyntaxFailure {
  file: TreeEntry;
  message: string;
  stderr: string;
}

const PYTHON_IGNORED = new Set(['venv', 'env', '__pycache__']);

export class StaticErrorChecker {
  constructor(
    private readonly executor: CommandExecutor,
    private readonly advisor: AutoFixAdvisor,
    private readonly prompter: UserPrompter
  ) {}

  async check(
    targetDir: string,
    projectType: ProjectType,
    tracker: SessionTracker,
    autoFix = true
  ): Promise<StaticCheckResult> {
    this.prompter.say('\n🔍 Checking for errors...');

    const errors: string[] = [];
    const failures: SyntaxFailure[] = [];

    if (projectType === 'python') {
      for (const file of this.pythonFiles(targetDir)) {
        try {
          const result = await this.compilePython(file, targetDir);
          if (!commandSucceeded(result)) {
            const message = `Syntax error in ${file.name}: ${result.stderr}`;
            errors.push(message);
            failures.push({ file, message, stderr: result.stderr });
          }
        } catch (error) {
          errors.push(`Error checking ${file.name}: ${getErrorMessage(error)}`);
        }
      }
    }

    if (projectType === 'node' && 'lint' in readPackageScripts(targetDir)) {
      try {
        const result = await this.executor.run('npm run lint 2>&1 || true', targetDir, COMMAND_TIMEOUTS.LINT);
        if (result.stdout.toLowerCase().includes('error')) {
          errors.push(`Linting errors found:\n${result.stdout}`);
        }
      } catch (error) {
        Logger.debug(`[StaticErrorChecker] Lint run failed: ${getErrorMessage(error)}`);
      }
    }

    if (errors.length === 0) {
      this.prompter.say('✓ No errors detected');
      return { allFixed: true, remainingErrors: [] };
    }

    this.prompter.say(`✗ Found ${errors.length} error(s)`);
    errors.forEach((err) => this.prompter.say(`  - ${err.substring(0, 200)}`));

    if (!autoFix) {
      return { allFixed: false, remainingErrors: errors };
    }

    this.prompter.say(`\n🔄 Attempting to auto-fix ${failures.length} file(s) with errors...`);
    const fixed = new Set<string>();

    for (const failure of failures) {
      if (await this.repairFile(failure, targetDir, tracker)) {
        fixed.add(failure.message);
      }
    }

    const remainingErrors = errors.filter((err) => !fixed.has(err));
    if (remainingErrors.length === 0) {
      this.prompter.say('\n✅ All errors fixed!');
      return { allFixed: true, remainingErrors: [] };
    }

    this.prompter.say(`\n⚠️  ${remainingErrors.length} error(s) remaining`);
    return { allFixed: false, remainingErrors };
  }

  private pythonFiles(targetDir: string): TreeEntry[] {
    return walkTree(targetDir, (name) => name.startsWith('.') || PYTHON_IGNORED.has(name)).filter(
      (entry) => entry.isFile && entry.name.endsWith('.py')
    );
  }

  private compilePython(file: TreeEntry, targetDir: string): Promise<CommandResult> {
    return this.executor.run(`python -m py_compile "${file.absolutePath}"`, targetDir, COMMAND_TIMEOUTS.SYNTAX_CHECK);
  }

  /**
   * Replace the file with the advisor's version; restore it if it still fails
   */
  private async repairFile(failure: SyntaxFailure, targetDir: string, tracker: SessionTracker): Promise<boolean> {
    const { file } = failure;
    this.prompter.say(`\n📝 Fixing: ${file.name}`);

    let original: string;
    try {
      original = fs.readFileSync(file.absolutePath, 'utf-8');
    } catch (error) {
      this.prompter.say(`  ✗ Error during auto-fix: ${getErrorMessage(error)}`);
      return false;
    }

    const fix = await this.advisor.suggestFix(failure.stderr, `syntax error in ${file.name}`, original, 0);
    if (fix.needsHuman) {
      this.prompter.say(`  ⚠️  Cannot auto-fix ${file.name}\n  ${fix.explanation}`);
      return false;
    }

    const fixedContent = fix.solution;
    if (!fixedContent || fixedContent === original) {
      return false;
    }

    try {
      fs.writeFileSync(file.absolutePath, fixedContent, 'utf-8');
      this.prompter.say(`  ✓ Applied fix: ${fix.explanation}`);

      const recheck = await this.compilePython(file, targetDir);
      if (commandSucceeded(recheck)) {
        this.prompter.say(`  ✅ Fix verified - no more errors in ${file.name}`);
        tracker.trackModified(file.absolutePath);
        tracker.logErrorFix(failure.stderr, fix.explanation, file.relativePath);
        return true;
      }

      this.prompter.say("  ⚠️  Fix didn't resolve the error");
    } catch (error) {
      this.prompter.say(`  ✗ Error during auto-fix: ${getErrorMessage(error)}`);
    }

    try {
      fs.writeFileSync(file.absolutePath, original, 'utf-8');
    } catch (error) {
      Logger.error(`[StaticErrorChecker] Could not restore ${file.relativePath}`, error);
    }
    return false;
  }
}
