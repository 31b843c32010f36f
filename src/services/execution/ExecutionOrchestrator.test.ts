/**
 * ExecutionOrchestrator Tests
 */

import fs from 'fs';
import path from 'path';
import { ExecutionOrchestrator, loadArtifact } from './ExecutionOrchestrator';
import { SchemaValidator } from './schemas/CollaboratorSchemas';
import { ArtifactLoadError } from '../../utils/errorUtils';
import { ScriptedExecutor, ScriptedPrompter, makeTempDir, removeDir, scriptedCollaborator, writeFiles } from '../../tests/fakes';

const architecture = {
  app_name: 'shop',
  overview: 'Order tracking',
  tech_stack: { backend: { framework: 'FastAPI' } },
};

const taskList = {
  major_tasks: [
    { title: 'Models', description: 'Define orders' },
    { title: 'API', description: 'Serve orders' },
  ],
};

function changeSet(filePath: string) {
  return { files: [{ path: filePath, content: 'x = 1\n' }], tests: [], description: `Create ${filePath}` };
}

describe('ExecutionOrchestrator', () => {
  let workDir: string;
  let targetDir: string;
  let architecturePath: string;
  let tasksPath: string;

  beforeEach(() => {
    workDir = makeTempDir('orchestrator');
    targetDir = path.join(workDir, 'project');
    architecturePath = path.join(workDir, 'architecture.json');
    tasksPath = path.join(workDir, 'majortasks.json');
    writeFiles(workDir, {
      'architecture.json': JSON.stringify(architecture),
      'majortasks.json': JSON.stringify(taskList),
      'project/.env': 'DEBUG=1\n',
    });
  });

  afterEach(() => {
    removeDir(workDir);
  });

  describe('loadArtifact', () => {
    const decode = (data: unknown) => SchemaValidator.decodeTaskList(data);

    it('should report a missing file', () => {
      const missing = path.join(workDir, 'absent.json');
      expect(() => loadArtifact(missing, decode)).toThrow(ArtifactLoadError);
      expect(() => loadArtifact(missing, decode)).toThrow(`Could not load ${missing}: `);
    });

    it('should report invalid JSON', () => {
      writeFiles(workDir, { 'broken.json': '{ "major_tasks": [' });
      expect(() => loadArtifact(path.join(workDir, 'broken.json'), decode)).toThrow('invalid JSON (');
    });

    it('should report an unexpected structure', () => {
      writeFiles(workDir, { 'list.json': '[]' });
      const listPath = path.join(workDir, 'list.json');
      expect(() => loadArtifact(listPath, decode)).toThrow(`Could not load ${listPath}: unexpected structure`);
    });

    it('should return the decoded artifact', () => {
      const loaded = loadArtifact(tasksPath, decode);
      expect(loaded.tasks.map((task) => task.title)).toEqual(['Models', 'API']);
    });
  });

  describe('startExecution', () => {
    function build(replies: unknown[], answers: string[]) {
      const collaborator = scriptedCollaborator(replies);
      const prompter = new ScriptedPrompter(answers);
      const orchestrator = ExecutionOrchestrator.create({
        collaborator,
        executor: new ScriptedExecutor(),
        prompter,
        autoRun: false,
      });
      return { orchestrator, collaborator, prompter };
    }

    it('should run every task, verify and add a Quick Start', async () => {
      const { orchestrator, prompter } = build([changeSet('models.py'), changeSet('api.py')], ['y', 'y']);

      const report = await orchestrator.startExecution(architecturePath, tasksPath, targetDir);

      expect(report).toEqual({
        finished: true,
        completedTasks: ['Models', 'API'],
        verification: { success: true, instructions: '  1. uvicorn main:app --reload' },
      });
      expect(prompter.output).toContain('✅ Completed tasks:\n  1. ✓ Models\n  2. ✓ API');
      expect(prompter.output).toContain('📁 Files created/modified (2 total):\n  • api.py\n  • models.py');

      const readme = fs.readFileSync(path.join(targetDir, 'README.md'), 'utf-8');
      expect(readme.startsWith('# shop\n')).toBe(true);
      expect(readme).toContain('## Quick Start\n\nTo run this project:\n\n  1. uvicorn main:app --reload\n');
      expect(orchestrator.tracker.getCreatedFiles().size).toBe(2);
    });

    it('should stop at the first aborted task without verifying', async () => {
      const { orchestrator, collaborator, prompter } = build([changeSet('models.py')], ['n']);

      const report = await orchestrator.startExecution(architecturePath, tasksPath, targetDir);

      expect(report).toEqual({
        finished: false,
        completedTasks: [],
        stoppedBy: { task: 'Models', outcome: 'aborted' },
        verification: null,
      });
      expect(collaborator.calls).toHaveLength(1);
      expect(prompter.output).not.toContain('ALL TASKS COMPLETED');
      expect(fs.readFileSync(path.join(targetDir, 'README.md'), 'utf-8')).not.toContain('## Quick Start');
    });

    it('should stop when environment setup fails', async () => {
      fs.rmSync(path.join(targetDir, '.env'));
      const { orchestrator, collaborator } = build([null], []);

      const report = await orchestrator.startExecution(architecturePath, tasksPath, targetDir);

      expect(report).toEqual({ finished: false, completedTasks: [], verification: null });
      expect(collaborator.calls).toHaveLength(1);
      expect(collaborator.calls[0].user).toContain('And these detected setup needs:\ncreate .env file\n');
    });

    it('should reject an unreadable task list', async () => {
      const { orchestrator } = build([], []);

      await expect(
        orchestrator.startExecution(architecturePath, path.join(workDir, 'absent.json'), targetDir)
      ).rejects.toBeInstanceOf(ArtifactLoadError);
    });
  });

  describe('runAction', () => {
    it('should point at the README when nothing runnable is found', async () => {
      const orchestrator = ExecutionOrchestrator.create({
        collaborator: scriptedCollaborator(),
        executor: new ScriptedExecutor(),
        prompter: new ScriptedPrompter(),
        autoRun: false,
      });

      await expect(orchestrator.runAction('run the project', targetDir)).resolves.toEqual({
        success: false,
        instructions: 'Please refer to the README.md for run instructions',
      });
    });
  });
});
