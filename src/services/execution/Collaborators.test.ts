/**
 * Collaborator bridge Tests
 *
 * AutoFixAdvisor, DebugAgentBridge and CodeGenerator never throw: a missing,
 * failing or malformed reply becomes their fallback.
 */

import { AutoFixAdvisor, buildFixPrompt, fallbackFixSuggestion } from './AutoFixAdvisor';
import { DebugAgentBridge, fallbackDebugFix } from './DebugAgentBridge';
import { CodeGenerator, buildCodePrompt } from './CodeGenerator';
import { SessionTracker } from './SessionTracker';
import { LLMError } from '../../utils/errorUtils';
import { scriptedCollaborator } from '../../tests/fakes';
import type { ExecutionContext, Task } from './types/ExecutionTypes';

const task: Task = {
  title: 'User accounts',
  description: 'Registration and login',
  owners: [],
  dependencies: [],
  acceptanceCriteria: ['users can log in'],
};

function context(overrides: Partial<ExecutionContext> = {}): ExecutionContext {
  return {
    targetDir: '/tmp/project',
    architecture: { app_name: 'shop' },
    tasks: {},
    completedTasks: [],
    fileTreeSnapshot: { files: ['manage.py'], directories: [], keyFiles: {} },
    readmeContent: '# Shop',
    sessionTracker: new SessionTracker(),
    ...overrides,
  };
}

describe('AutoFixAdvisor', () => {
  it('should return the fallback for every unusable reply', async () => {
    const collaborator = scriptedCollaborator([null, new LLMError('No JSON found in response'), { confidence: 'sure' }]);
    const advisor = new AutoFixAdvisor(collaborator);

    for (let i = 0; i < 3; i++) {
      await expect(advisor.suggestFix('err', 'ctx', 'cmd', 0)).resolves.toEqual(fallbackFixSuggestion());
    }
    expect(fallbackFixSuggestion().needsHuman).toBe(true);
  });

  it('should decode a usable reply', async () => {
    const advisor = new AutoFixAdvisor(scriptedCollaborator([{ solution: 'npm ci', explanation: 'lockfile', confidence: 'high' }]));

    await expect(advisor.suggestFix('err', 'ctx', 'npm install', 2)).resolves.toEqual({
      solution: 'npm ci',
      explanation: 'lockfile',
      confidence: 'high',
      needsHuman: false,
      humanInstructions: undefined,
    });
  });

  it('should describe the failure in the prompt', () => {
    const prompt = buildFixPrompt('ModuleNotFoundError', 'running setup', 'pip install', 4);
    expect(prompt.startsWith('An error occurred while running setup.\n\nPrevious attempt:\n```\npip install\n```')).toBe(true);
    expect(prompt).toContain('Error message:\n```\nModuleNotFoundError\n```\n\nRetry count: 4');
  });
});

describe('DebugAgentBridge', () => {
  it('should return the fallback when the collaborator fails', async () => {
    const bridge = new DebugAgentBridge(scriptedCollaborator([new Error('overloaded')]));

    await expect(bridge.analyzeTestFailure('FAILED', { structure: [], files: {} })).resolves.toEqual(fallbackDebugFix());
  });

  it('should send the context, tree and truncated error log', async () => {
    const collaborator = scriptedCollaborator([{ explanation: 'Added conftest', files_to_create: [{ path: 'conftest.py', content: '' }] }]);
    const bridge = new DebugAgentBridge(collaborator);

    const fix = await bridge.analyzeTestFailure('E'.repeat(4000), { structure: ['app.py'], files: { 'app.py': 'x = 1' } }, 'running unit tests');

    expect(fix.filesToCreate).toEqual([{ path: 'conftest.py', content: '' }]);
    expect(fix.needsHuman).toBe(false);
    const user = collaborator.calls[0].user;
    expect(user).toContain('## Context\nrunning unit tests\n');
    expect(user).toContain('## Project README\nNo README available\n');
    expect(user).toContain(`\`\`\`\n${'E'.repeat(3000)}\n\`\`\``);
    expect(user).toContain('"app.py": "x = 1"');
  });
});

describe('CodeGenerator', () => {
  it('should return the decoded change set', async () => {
    const generator = new CodeGenerator(
      scriptedCollaborator([{ files: [{ path: 'accounts/views.py', content: 'pass' }], description: 'Views' }])
    );

    await expect(generator.generateTaskCode(task, context(), 0)).resolves.toEqual({
      files: [{ path: 'accounts/views.py', content: 'pass', action: 'create' }],
      tests: [],
      description: 'Views',
    });
  });

  it('should treat an empty change set as nothing generated', async () => {
    const generator = new CodeGenerator(scriptedCollaborator([{ files: [], tests: [], description: 'nothing' }]));
    await expect(generator.generateTaskCode(task, context(), 0)).resolves.toBeNull();
  });

  it('should return null when the collaborator throws', async () => {
    const generator = new CodeGenerator(scriptedCollaborator([new LLMError('Anthropic API error: timeout')]));
    await expect(generator.generateTaskCode(task, context(), 0)).resolves.toBeNull();
  });

  it('should include the task, completed tasks and snapshot in the prompt', () => {
    const prompt = buildCodePrompt(task, context({ completedTasks: ['Models', 'Admin'] }));

    expect(prompt).toContain('Task: User accounts\nDescription: Registration and login\nAcceptance criteria:\n- users can log in\n');
    expect(prompt).toContain('Already completed tasks: Models, Admin');
    expect(prompt).toContain('"key_files": {}');
    expect(prompt).toContain('## Project README (IMPORTANT - Read First!)\n# Shop\n');
  });

  it('should cut the snapshot to 3000 characters', () => {
    const files = Array.from({ length: 500 }, (_, i) => `src/module_${i}.py`);
    const prompt = buildCodePrompt(task, context({ fileTreeSnapshot: { files, directories: [], keyFiles: {} } }));

    expect(prompt).toContain('src/module_10.py');
    expect(prompt).not.toContain('src/module_499.py');
  });
});
