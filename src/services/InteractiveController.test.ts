/**
 * InteractiveController Tests
 */

import fs from 'fs';
import path from 'path';
import { PassThrough } from 'stream';
import {
  CONVERSATION_LOG_FILE,
  ConsoleUserPrompter,
  askUser,
  formatInteraction,
  logUserInteraction,
  parseUserInput,
} from './InteractiveController';
import { InputClosedError } from '../utils/errorUtils';
import { ScriptedPrompter, makeTempDir, removeDir } from '../tests/fakes';

describe('InteractiveController', () => {
  let logDir: string;

  beforeEach(() => {
    logDir = makeTempDir('conversation');
  });

  afterEach(() => {
    removeDir(logDir);
  });

  describe('parseUserInput', () => {
    it('should split the choice from instructions on the first comma', () => {
      expect(parseUserInput('  Y, but also install redis, and celery ')).toEqual({
        choice: 'y',
        instructions: 'but also install redis, and celery',
      });
    });

    it('should lower-case a bare choice', () => {
      expect(parseUserInput('SKIP')).toEqual({ choice: 'skip', instructions: '' });
    });
  });

  describe('formatInteraction', () => {
    it('should render the log entry with instructions', () => {
      const at = new Date(2024, 0, 5, 9, 3, 7);
      expect(formatInteraction('Environment setup approval', 'y', 'add redis', at)).toBe(
        `\n[2024-01-05 09:03:07]\nContext: Environment setup approval\nUser Choice: y\nAdditional Instructions: add redis\n${'-'.repeat(80)}\n`
      );
    });

    it('should omit the instructions line when there are none', () => {
      const at = new Date(2024, 11, 31, 23, 59, 59);
      expect(formatInteraction('Task 1: approval', 'n', '', at)).toBe(
        `\n[2024-12-31 23:59:59]\nContext: Task 1: approval\nUser Choice: n\n${'-'.repeat(80)}\n`
      );
    });
  });

  describe('logUserInteraction', () => {
    it('should append entries', () => {
      expect(logUserInteraction(logDir, 'first', '1')).toBe(true);
      expect(logUserInteraction(logDir, 'second', '2')).toBe(true);

      const log = fs.readFileSync(path.join(logDir, CONVERSATION_LOG_FILE), 'utf-8');
      expect(log.match(/Context: /g)).toHaveLength(2);
    });

    it('should report failure without throwing', () => {
      expect(logUserInteraction(path.join(logDir, 'missing', 'dir'), 'ctx', 'y')).toBe(false);
    });
  });

  describe('askUser', () => {
    it('should log only when both context and directory are given', async () => {
      const prompter = new ScriptedPrompter(['y, keep imports', 'n']);

      await expect(askUser(prompter, 'Overwrite?', { context: 'Overwrite a.py', logDir })).resolves.toEqual({
        choice: 'y',
        instructions: 'keep imports',
      });
      await askUser(prompter, 'Again?', { logDir });

      const log = fs.readFileSync(path.join(logDir, CONVERSATION_LOG_FILE), 'utf-8');
      expect(log).toContain('Context: Overwrite a.py\nUser Choice: y\nAdditional Instructions: keep imports\n');
      expect(log).not.toContain('Again?');
    });
  });

  describe('ConsoleUserPrompter', () => {
    it('should read one line and show the tip when instructions are allowed', async () => {
      const input = new PassThrough();
      const output = new PassThrough();
      let written = '';
      output.on('data', (chunk: Buffer) => {
        written += chunk.toString();
      });

      const prompter = new ConsoleUserPrompter(input, output);
      const reply = prompter.ask('Proceed? (y/n)', { allowInstructions: true });
      input.write('yes, go\n');

      await expect(reply).resolves.toEqual({ choice: 'yes', instructions: 'go' });
      prompter.close();
      expect(written).toContain('\nProceed? (y/n)\n');
      expect(written).toContain('Tip: You can add instructions after your choice');
    });

    it('should reject a pending prompt when the input ends', async () => {
      const input = new PassThrough();
      const prompter = new ConsoleUserPrompter(input, new PassThrough());

      const reply = prompter.ask('Proceed? (y/n)');
      input.end();

      await expect(reply).rejects.toBeInstanceOf(InputClosedError);
      await expect(prompter.ask('Retry? (y/n)')).rejects.toThrow(
        'Input closed while waiting for an answer to: Retry? (y/n)'
      );
    });

    it('should reopen after an explicit close()', async () => {
      const input = new PassThrough();
      const prompter = new ConsoleUserPrompter(input, new PassThrough());

      const first = prompter.ask('Proceed? (y/n)');
      input.write('y\n');
      await expect(first).resolves.toEqual({ choice: 'y', instructions: '' });
      prompter.close();

      const second = prompter.ask('Retry? (y/n)');
      input.write('n\n');
      await expect(second).resolves.toEqual({ choice: 'n', instructions: '' });
      prompter.close();
    });
  });
});
