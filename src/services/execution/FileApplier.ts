/**
 * FileApplier
 *
 * Writes a CodeChangeSet to disk. Files this run already owns are overwritten
 * silently; anything else that exists needs the operator's consent.
 */

import fs from 'fs';
import path from 'path';
import { getErrorMessage } from '../../utils/errorUtils';
import { askUser, UserPrompter } from '../InteractiveController';
import { resolveInProject } from './ProjectSnapshot';
import { SessionTracker } from './SessionTracker';
import type { CodeChangeSet, FileChange, TestFileChange } from './types/ExecutionTypes';

const isYes = (choice: string) => choice === 'y' || choice === 'yes';

export class FileApplier {
  constructor(private readonly prompter: UserPrompter) {}

  /**
   * @returns false when a write failed and the operator chose to stop
   */
  async applyCodeChanges(changeSet: CodeChangeSet, targetDir: string, tracker: SessionTracker): Promise<boolean> {
    this.prompter.say('\n📝 Applying code changes...');

    for (const file of changeSet.files) {
      try {
        await this.applyFile(file, targetDir, tracker);
      } catch (error) {
        this.prompter.say(`✗ Error applying change to ${file.path}: ${getErrorMessage(error)}`);
        this.prompter.say(
          `\n📋 Manual action required:\n   1. Check file permissions for ${file.path}\n   2. Ensure the parent directory exists`
        );
        const { choice } = await askUser(this.prompter, 'Continue with remaining files? (y/n)');
        if (!isYes(choice)) {
          return false;
        }
      }
    }

    if (changeSet.tests.length > 0) {
      this.prompter.say(`\n🧪 Creating ${changeSet.tests.length} test file(s)...`);
    }

    for (const test of changeSet.tests) {
      try {
        await this.applyTest(test, targetDir, tracker);
      } catch (error) {
        this.prompter.say(`✗ Error creating test ${test.path}: ${getErrorMessage(error)}`);
        const { choice } = await askUser(this.prompter, 'Continue with remaining files? (y/n)');
        if (!isYes(choice)) {
          return false;
        }
      }
    }

    this.prompter.say(`\n✅ Applied ${changeSet.files.length} code file(s) and ${changeSet.tests.length} test file(s)`);
    return true;
  }

  private async applyFile(file: FileChange, targetDir: string, tracker: SessionTracker): Promise<void> {
    const filePath = resolveInProject(targetDir, file.path);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });

    if (file.action === 'modify') {
      if (!fs.existsSync(filePath)) {
        this.prompter.say(`✗ File does not exist: ${file.path}`);
        const { choice } = await askUser(this.prompter, 'Create new file instead? (y/n)');
        if (choice !== 'y') {
          return;
        }
      }
      fs.writeFileSync(filePath, file.content, 'utf-8');
      tracker.trackModified(filePath);
      this.prompter.say(`✓ Modified: ${file.path}`);
      return;
    }

    if (fs.existsSync(filePath)) {
      if (tracker.isOwnFile(filePath)) {
        fs.writeFileSync(filePath, file.content, 'utf-8');
        tracker.trackModified(filePath);
        this.prompter.say(`✓ Updated: ${file.path} (created this session)`);
        return;
      }

      this.prompter.say(`⚠️  File already exists: ${file.path}`);
      const { choice, instructions } = await askUser(
        this.prompter,
        `Overwrite ${file.path}? (y/n, or add instructions like 'y, but keep the existing imports')`,
        { allowInstructions: true }
      );
      if (!isYes(choice)) {
        this.prompter.say(`⏭️  Skipping ${file.path}`);
        return;
      }
      if (instructions) {
        this.prompter.say(`💡 Note: ${instructions}\n   (Manual merge may be needed)`);
      }
    }

    fs.writeFileSync(filePath, file.content, 'utf-8');
    tracker.trackCreated(filePath);
    this.prompter.say(`✓ Created: ${file.path}`);
  }

  private async applyTest(test: TestFileChange, targetDir: string, tracker: SessionTracker): Promise<void> {
    const testPath = resolveInProject(targetDir, test.path);
    fs.mkdirSync(path.dirname(testPath), { recursive: true });

    if (fs.existsSync(testPath)) {
      if (tracker.isOwnFile(testPath)) {
        fs.writeFileSync(testPath, test.content, 'utf-8');
        tracker.trackModified(testPath);
        this.prompter.say(`✓ Updated test: ${test.path} (created this session)`);
        return;
      }

      this.prompter.say(`⚠️  Test file already exists: ${test.path}`);
      const { choice } = await askUser(this.prompter, `Overwrite ${test.path}? (y/n)`);
      if (!isYes(choice)) {
        return;
      }
    }

    fs.writeFileSync(testPath, test.content, 'utf-8');
    tracker.trackCreated(testPath);
    this.prompter.say(`✓ Created test: ${test.path}`);
  }
}
