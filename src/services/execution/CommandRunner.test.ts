/**
 * CommandRunner Tests
 *
 * Bounded auto-fix loop: attempt ceiling, stuck escalation, needs-human gate.
 */

import fs from 'fs';
import path from 'path';
import { CommandRunner, commandSucceeded, errorOutputOf } from './CommandRunner';
import { AutoFixAdvisor } from './AutoFixAdvisor';
import { CONVERSATION_LOG_FILE } from '../InteractiveController';
import {
  ScriptedExecutor,
  ScriptedPrompter,
  commandResult,
  fail,
  makeTempDir,
  ok,
  removeDir,
  scriptedCollaborator,
} from '../../tests/fakes';

function fixReply(solution: string) {
  return { solution, explanation: `try ${solution}`, confidence: 'medium', needs_human: false };
}

function build(executor: ScriptedExecutor, replies: unknown[], answers: string[] = []) {
  const collaborator = scriptedCollaborator(replies);
  const prompter = new ScriptedPrompter(answers);
  const runner = new CommandRunner(executor, new AutoFixAdvisor(collaborator), prompter);
  return { runner, collaborator, prompter };
}

describe('CommandRunner', () => {
  let tempDir: string;

  beforeAll(() => {
    tempDir = makeTempDir('runner');
  });

  afterAll(() => {
    removeDir(tempDir);
  });

  describe('helpers', () => {
    it('should treat only a zero exit without timeout as success', () => {
      expect(commandSucceeded(ok())).toBe(true);
      expect(commandSucceeded(fail('x'))).toBe(false);
      expect(commandSucceeded(commandResult({ exitCode: 0, timedOut: true }))).toBe(false);
    });

    it('should prefer stderr over stdout for error text', () => {
      expect(errorOutputOf(commandResult({ stdout: 'out', stderr: 'err' }))).toBe('err');
      expect(errorOutputOf(commandResult({ stdout: 'out', stderr: '' }))).toBe('out');
    });
  });

  describe('runWithRetry', () => {
    it('should return true on first success without consulting the advisor', async () => {
      const executor = new ScriptedExecutor([ok('done')]);
      const { runner, collaborator } = build(executor, []);

      await expect(runner.runWithRetry('npm install', tempDir, 'installing')).resolves.toBe(true);
      expect(executor.calls).toEqual([{ command: 'npm install', cwd: tempDir, timeoutMs: 300000 }]);
      expect(collaborator.calls).toHaveLength(0);
    });

    it('should never exceed the attempt ceiling', async () => {
      const executor = new ScriptedExecutor([], fail('boom'));
      const { runner, collaborator, prompter } = build(executor, Array(10).fill(fixReply('alt')));

      await expect(runner.runWithRetry('make', tempDir, 'building', { maxRetries: 4 })).resolves.toBe(false);
      expect(executor.commands).toEqual(['make', 'alt', 'alt', 'alt']);
      expect(collaborator.calls).toHaveLength(3);
      expect(prompter.messages).toContain('\n❌ Command failed after 4 attempts');
    });

    it('should demand a different approach on the third identical error', async () => {
      const executor = new ScriptedExecutor([], fail('same error'));
      const { runner, collaborator } = build(executor, Array(10).fill(fixReply('again')));

      await runner.runWithRetry('setup', tempDir, 'installing deps', { maxRetries: 5 });

      expect(collaborator.calls[0].user).toContain('An error occurred while installing deps.');
      expect(collaborator.calls[0].user).not.toContain('CRITICAL');
      expect(collaborator.calls[1].user).not.toContain('CRITICAL');
      expect(collaborator.calls[2].user).toContain(
        'installing deps (CRITICAL: Same error repeated 3 times - previous fixes FAILED, try a COMPLETELY DIFFERENT approach)'
      );
    });

    it('should reset the stuck count when the error changes', async () => {
      const executor = new ScriptedExecutor([fail('a'), fail('a'), fail('b'), fail('b')], ok());
      const { runner, collaborator } = build(executor, Array(10).fill(fixReply('next')));

      await expect(runner.runWithRetry('cmd', tempDir, 'ctx')).resolves.toBe(true);
      expect(collaborator.calls).toHaveLength(4);
      expect(collaborator.calls.some((call) => call.user.includes('CRITICAL'))).toBe(false);
    });

    it('should pass the previous command and retry count to the advisor', async () => {
      const executor = new ScriptedExecutor([fail('first'), fail('second')], ok());
      const { runner, collaborator } = build(executor, [fixReply('fixed-cmd'), fixReply('fixed-again')]);

      await runner.runWithRetry('orig', tempDir, 'ctx');

      expect(collaborator.calls[1].user).toContain('```\nfixed-cmd\n```');
      expect(collaborator.calls[1].user).toContain('Retry count: 1');
      expect(executor.commands).toEqual(['orig', 'fixed-cmd', 'fixed-again']);
    });

    it('should keep the current command when the advisor offers no solution', async () => {
      const executor = new ScriptedExecutor([fail('x')], ok());
      const { runner } = build(executor, [{ explanation: 'nothing to change' }]);

      await expect(runner.runWithRetry('same', tempDir, 'ctx')).resolves.toBe(true);
      expect(executor.commands).toEqual(['same', 'same']);
    });

    it('should report a timeout as a failure with a timeout message', async () => {
      const executor = new ScriptedExecutor([commandResult({ exitCode: null, timedOut: true, stdout: 'partial' })], ok());
      const { runner, collaborator } = build(executor, [fixReply('faster')]);

      await expect(runner.runWithRetry('slow', tempDir, 'ctx')).resolves.toBe(true);
      expect(collaborator.calls[0].user).toContain('Command timed out after 300 seconds\npartial');
    });

    it('should count an executor exception as an attempt without asking the advisor', async () => {
      const executor = new ScriptedExecutor([new Error('spawn ENOENT')], ok());
      const { runner, collaborator, prompter } = build(executor, []);

      await expect(runner.runWithRetry('cmd', tempDir, 'ctx')).resolves.toBe(true);
      expect(collaborator.calls).toHaveLength(0);
      expect(prompter.messages).toContain('✗ Error: spawn ENOENT');
    });

    describe('when the advisor needs a human', () => {
      const needsHuman = { explanation: 'credentials missing', needs_human: true, human_instructions: 'Set API_TOKEN' };

      it('should retry the original command after choice 1', async () => {
        const executor = new ScriptedExecutor([fail('e1'), fail('e2')], ok());
        const { runner, prompter } = build(executor, [fixReply('alt'), needsHuman], ['1']);

        await expect(runner.runWithRetry('deploy', tempDir, 'deploying')).resolves.toBe(true);
        expect(executor.commands).toEqual(['deploy', 'alt', 'deploy']);
        expect(prompter.prompts[0].prompt).toBe(
          "Options:\n  1. I've fixed it, retry the original command\n  2. Skip this step\n  3. Abort\n\nYour choice"
        );
      });

      it('should report success when the step is skipped', async () => {
        const executor = new ScriptedExecutor([fail('e1')]);
        const { runner } = build(executor, [needsHuman], ['2']);

        await expect(runner.runWithRetry('deploy', tempDir, 'deploying')).resolves.toBe(true);
        expect(executor.calls).toHaveLength(1);
      });

      it('should abort on any other choice', async () => {
        const executor = new ScriptedExecutor([fail('e1')]);
        const { runner } = build(executor, [needsHuman], ['3']);

        await expect(runner.runWithRetry('deploy', tempDir, 'deploying')).resolves.toBe(false);
        expect(executor.calls).toHaveLength(1);
      });

      it('should treat a missing reply as needing a human', async () => {
        const executor = new ScriptedExecutor([fail('e1')]);
        const { runner, prompter } = build(executor, [null], ['3']);

        await expect(runner.runWithRetry('deploy', tempDir, 'deploying')).resolves.toBe(false);
        expect(prompter.prompts).toHaveLength(1);
      });

      it('should record the decision in the conversation log', async () => {
        const logDir = makeTempDir('runner-log');
        try {
          const executor = new ScriptedExecutor([fail('e1')]);
          const { runner } = build(executor, [needsHuman], ['3']);

          await runner.runWithRetry('deploy', tempDir, 'deploying', { logDir });

          const log = fs.readFileSync(path.join(logDir, CONVERSATION_LOG_FILE), 'utf-8');
          expect(log).toContain('Context: Human intervention needed while deploying\nUser Choice: 3\n');
        } finally {
          removeDir(logDir);
        }
      });
    });
  });
});
