/**
 * FileApplier Tests
 */

import fs from 'fs';
import path from 'path';
import { FileApplier } from './FileApplier';
import { SessionTracker } from './SessionTracker';
import { ScriptedPrompter, makeTempDir, removeDir, writeFiles } from '../../tests/fakes';
import type { CodeChangeSet } from './types/ExecutionTypes';

const changeSet: CodeChangeSet = {
  files: [
    { path: 'app/models.py', content: 'class User: pass', action: 'create' },
    { path: 'app/views.py', content: 'def index(): pass', action: 'create' },
  ],
  tests: [{ path: 'tests/test_models.py', content: 'def test_user(): pass' }],
  description: 'User model',
};

describe('FileApplier', () => {
  let targetDir: string;
  let tracker: SessionTracker;

  beforeEach(() => {
    targetDir = makeTempDir('apply');
    tracker = new SessionTracker();
  });

  afterEach(() => {
    removeDir(targetDir);
  });

  const read = (relative: string) => fs.readFileSync(path.join(targetDir, relative), 'utf-8');

  it('should create files and tests and track them', async () => {
    const prompter = new ScriptedPrompter();

    await expect(new FileApplier(prompter).applyCodeChanges(changeSet, targetDir, tracker)).resolves.toBe(true);

    expect(read('app/models.py')).toBe('class User: pass');
    expect(read('tests/test_models.py')).toBe('def test_user(): pass');
    expect(tracker.isOwnFile(path.join(targetDir, 'app/views.py'))).toBe(true);
    expect(prompter.prompts).toHaveLength(0);
  });

  it('should apply the same change set twice without prompting', async () => {
    const prompter = new ScriptedPrompter();
    const applier = new FileApplier(prompter);

    await applier.applyCodeChanges(changeSet, targetDir, tracker);
    await applier.applyCodeChanges(changeSet, targetDir, tracker);

    expect(prompter.prompts).toHaveLength(0);
    expect(read('app/views.py')).toBe('def index(): pass');
  });

  it('should ask before overwriting a file it does not own', async () => {
    writeFiles(targetDir, { 'app/models.py': 'original' });
    const prompter = new ScriptedPrompter(['n']);

    await new FileApplier(prompter).applyCodeChanges(changeSet, targetDir, tracker);

    expect(prompter.prompts[0].prompt).toBe(
      "Overwrite app/models.py? (y/n, or add instructions like 'y, but keep the existing imports')"
    );
    expect(read('app/models.py')).toBe('original');
    expect(read('app/views.py')).toBe('def index(): pass');
  });

  it('should overwrite after consent and echo instructions as a merge note', async () => {
    writeFiles(targetDir, { 'app/models.py': 'original' });
    const prompter = new ScriptedPrompter(['yes, keep the Meta class']);

    await new FileApplier(prompter).applyCodeChanges(changeSet, targetDir, tracker);

    expect(read('app/models.py')).toBe('class User: pass');
    expect(prompter.messages).toContain('💡 Note: keep the Meta class\n   (Manual merge may be needed)');
  });

  it('should ask before creating a file that was meant to be modified', async () => {
    const modify: CodeChangeSet = {
      files: [{ path: 'settings.py', content: 'DEBUG = True', action: 'modify' }],
      tests: [],
      description: '',
    };

    await new FileApplier(new ScriptedPrompter(['no'])).applyCodeChanges(modify, targetDir, tracker);
    expect(fs.existsSync(path.join(targetDir, 'settings.py'))).toBe(false);

    const prompter = new ScriptedPrompter(['y']);
    await new FileApplier(prompter).applyCodeChanges(modify, targetDir, tracker);
    expect(prompter.prompts[0].prompt).toBe('Create new file instead? (y/n)');
    expect(read('settings.py')).toBe('DEBUG = True');
    expect(tracker.getModifiedFiles().has(path.join(targetDir, 'settings.py'))).toBe(true);
  });

  it('should stop when a write fails and the operator declines to continue', async () => {
    writeFiles(targetDir, { blocker: 'a file where a directory should be' });
    const broken: CodeChangeSet = {
      files: [
        { path: 'blocker/inner.py', content: 'x', action: 'create' },
        { path: 'later.py', content: 'y', action: 'create' },
      ],
      tests: [],
      description: '',
    };
    const prompter = new ScriptedPrompter(['n']);

    await expect(new FileApplier(prompter).applyCodeChanges(broken, targetDir, tracker)).resolves.toBe(false);
    expect(prompter.prompts[0].prompt).toBe('Continue with remaining files? (y/n)');
    expect(fs.existsSync(path.join(targetDir, 'later.py'))).toBe(false);
  });

  it('should not write outside the project directory', async () => {
    const outer = makeTempDir('apply-outer');
    try {
      const projectDir = path.join(outer, 'project');
      const prompter = new ScriptedPrompter(['n']);
      const escaping: CodeChangeSet = {
        files: [{ path: '../outside.js', content: 'planted', action: 'create' }],
        tests: [],
        description: 'Escapes',
      };

      await expect(new FileApplier(prompter).applyCodeChanges(escaping, projectDir, tracker)).resolves.toBe(false);

      expect(fs.existsSync(path.join(outer, 'outside.js'))).toBe(false);
      expect(prompter.messages[1]).toBe(
        '✗ Error applying change to ../outside.js: Path escapes the project directory: ../outside.js'
      );
      expect(prompter.prompts.map((p) => p.prompt)).toEqual(['Continue with remaining files? (y/n)']);
    } finally {
      removeDir(outer);
    }
  });

  it('should refuse a test path that leaves the project directory', async () => {
    const prompter = new ScriptedPrompter(['n']);
    const escaping: CodeChangeSet = {
      files: [],
      tests: [{ path: '../../test_escape.py', content: 'planted' }],
      description: 'Escapes',
    };

    await expect(new FileApplier(prompter).applyCodeChanges(escaping, targetDir, tracker)).resolves.toBe(false);

    expect(prompter.output).toContain(
      '✗ Error creating test ../../test_escape.py: Path escapes the project directory: ../../test_escape.py'
    );
  });
});
