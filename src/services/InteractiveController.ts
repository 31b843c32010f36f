/**
 * 🎮 INTERACTIVE CONTROLLER
 * Operator gates for the execution engine: approval prompts, retry/skip/abort
 * menus and progress output. Every gate with a context is appended to
 * gryffin_conversation.log in the target directory.
 */

import fs from 'fs';
import path from 'path';
import readline from 'readline';
import { Logger } from '../utils/logger';
import { getErrorMessage, InputClosedError } from '../utils/errorUtils';

export const CONVERSATION_LOG_FILE = 'gryffin_conversation.log';

export interface UserReply {
  /** Lower-cased text before the first comma */
  choice: string;
  /** Free text after the first comma, trimmed */
  instructions: string;
}

export interface AskOptions {
  /** What was being decided; logged together with the reply */
  context?: string;
  /** Directory holding the conversation log */
  logDir?: string;
  /** Show the "add instructions after your choice" tip */
  allowInstructions?: boolean;
}

/**
 * Anything that can put a question to the operator
 */
export interface UserPrompter {
  ask(prompt: string, options?: AskOptions): Promise<UserReply>;
  /** Progress line for the operator */
  say(message: string): void;
}

/**
 * `y, but also install redis` → { choice: 'y', instructions: 'but also install redis' }
 */
export function parseUserInput(line: string): UserReply {
  const input = line.trim();
  const comma = input.indexOf(',');
  if (comma === -1) {
    return { choice: input.toLowerCase(), instructions: '' };
  }
  return {
    choice: input.substring(0, comma).trim().toLowerCase(),
    instructions: input.substring(comma + 1).trim(),
  };
}

function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatInteraction(context: string, choice: string, instructions: string, at: Date = new Date()): string {
  let entry = `\n[${formatTimestamp(at)}]\nContext: ${context}\nUser Choice: ${choice}\n`;
  if (instructions) {
    entry += `Additional Instructions: ${instructions}\n`;
  }
  entry += '-'.repeat(80) + '\n';
  return entry;
}

/**
 * Append one gate to the conversation log. Never throws.
 */
export function logUserInteraction(logDir: string, context: string, choice: string, instructions = ''): boolean {
  try {
    fs.appendFileSync(path.join(logDir, CONVERSATION_LOG_FILE), formatInteraction(context, choice, instructions), 'utf-8');
    return true;
  } catch (error) {
    Logger.warn(`Failed to log interaction: ${getErrorMessage(error)}`);
    return false;
  }
}

/**
 * Put a gate to the operator and record it when a context is given
 */
export async function askUser(prompter: UserPrompter, prompt: string, options: AskOptions = {}): Promise<UserReply> {
  const reply = await prompter.ask(prompt, options);
  if (options.logDir && options.context) {
    logUserInteraction(options.logDir, options.context, reply.choice, reply.instructions);
  }
  return reply;
}

/**
 * Console prompter backed by readline
 */
export class ConsoleUserPrompter implements UserPrompter {
  private rl?: readline.Interface;
  private inputEnded = false;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  say(message: string): void {
    this.output.write(`${message}\n`);
  }

  async ask(prompt: string, options: AskOptions = {}): Promise<UserReply> {
    this.say(`\n${prompt}`);
    if (options.allowInstructions) {
      this.say("  💡 Tip: You can add instructions after your choice (e.g., 'y, but also install redis')");
    }

    const answer = await this.question('\n> ', prompt);
    return parseUserInput(answer);
  }

  /**
   * @throws InputClosedError when the input ends before a line arrives
   */
  private question(query: string, prompt: string): Promise<string> {
    if (this.inputEnded) {
      return Promise.reject(new InputClosedError(prompt));
    }
    if (!this.rl) {
      const created = readline.createInterface({ input: this.input, output: this.output });
      created.once('close', () => {
        // close() clears rl first, so only an ended input gets here with rl still set
        if (this.rl === created) {
          this.inputEnded = true;
          this.rl = undefined;
        }
      });
      // A TTY in raw mode turns Ctrl-C into a keypress; hand it back as a signal
      created.on('SIGINT', () => {
        this.close();
        process.kill(process.pid, 'SIGINT');
      });
      this.rl = created;
    }
    const rl = this.rl;
    return new Promise((resolve, reject) => {
      const onClose = () => reject(new InputClosedError(prompt));
      rl.once('close', onClose);
      rl.question(query, (answer) => {
        rl.removeListener('close', onClose);
        resolve(answer);
      });
    });
  }

  /**
   * Close interactive interface
   */
  close(): void {
    const rl = this.rl;
    if (rl) {
      this.rl = undefined;
      rl.close();
    }
  }
}
