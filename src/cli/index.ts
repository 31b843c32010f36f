#!/usr/bin/env node
/**
 * Gryffin CLI
 *
 * Usage:
 *   gryffin start <dir>           - Execute architecture.json + majortasks.json in <dir>
 *   gryffin run <dir> [prompt]    - Action mode: verify and run the project only
 */

import path from 'path';
import { AppConfig } from '../config/AppConfig';
import { ConsoleUserPrompter } from '../services/InteractiveController';
import { ExecutionOrchestrator, ARCHITECTURE_FILE, TASK_LIST_FILE } from '../services/execution/ExecutionOrchestrator';
import { installInterruptHandlers } from '../services/execution/ProcessControl';
import { ArtifactLoadError, getErrorMessage, InputClosedError } from '../utils/errorUtils';

const VERSION = '0.2.0';

// ANSI colors
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
};

function log(message: string, color: keyof typeof colors = 'reset'): void {
  console.log(`${colors[color]}${message}${colors.reset}`);
}

function banner(): void {
  console.log(`
${colors.cyan}╔═══════════════════════════════════════════════════════════════╗
║                                                               ║
║   ${colors.bright}🦁 Gryffin Execution Engine${colors.reset}${colors.cyan}                                ║
║   ${colors.dim}Generate, apply, check, test, run${colors.reset}${colors.cyan}                          ║
║                                                               ║
╚═══════════════════════════════════════════════════════════════╝${colors.reset}
`);
}

function showHelp(): void {
  console.log(`
${colors.cyan}Gryffin CLI${colors.reset}

${colors.bright}Usage:${colors.reset}
  gryffin <command> [options]

${colors.bright}Commands:${colors.reset}
  start <dir>               Execute ${ARCHITECTURE_FILE} and ${TASK_LIST_FILE} found in <dir>
  run <dir> [prompt]        Verify the project in <dir> runs (e.g. "run the backend")

${colors.bright}Options:${colors.reset}
  --help, -h                Show this help
  --version, -v             Show version

${colors.bright}Environment:${colors.reset}
  ANTHROPIC_API_KEY         Collaborator key (${AppConfig.anthropic.maskedKey})
  GRYFFIN_AUTO_RUN          Smoke-start dev servers after the task list (default: true)
  GRYFFIN_PERSIST_SERVERS   Leave healthy servers running (default: false)

${colors.bright}Examples:${colors.reset}
  gryffin start ./my-app
  gryffin run ./my-app "start the frontend"
`);
}

async function startCommand(dir: string, prompter: ConsoleUserPrompter): Promise<number> {
  const targetDir = path.resolve(dir);
  if (!AppConfig.anthropic.isConfigured) {
    log('⚠️  ANTHROPIC_API_KEY is not set: collaborators will fall back to defaults', 'yellow');
  }

  const orchestrator = ExecutionOrchestrator.create({ prompter });
  const report = await orchestrator.startExecution(
    path.join(targetDir, ARCHITECTURE_FILE),
    path.join(targetDir, TASK_LIST_FILE),
    targetDir
  );

  if (report.finished) {
    log(`\n🎉 Done: ${report.completedTasks.length} task(s) completed`, 'green');
    return 0;
  }
  return 1;
}

async function runCommand(dir: string, prompt: string, prompter: ConsoleUserPrompter): Promise<number> {
  const orchestrator = ExecutionOrchestrator.create({ prompter });
  const result = await orchestrator.runAction(prompt, path.resolve(dir));
  return result.success ? 0 : 1;
}

// Main CLI entry point
async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    showHelp();
    return 0;
  }

  if (args[0] === '--version' || args[0] === '-v') {
    console.log(`Gryffin CLI v${VERSION}`);
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  if (command !== 'start' && command !== 'run') {
    log(`❌ Unknown command: ${command}`, 'red');
    showHelp();
    return 1;
  }
  if (!commandArgs[0]) {
    log('❌ Please provide a target directory', 'red');
    return 1;
  }

  banner();
  const prompter = new ConsoleUserPrompter();
  const removeInterruptHandlers = installInterruptHandlers();
  try {
    if (command === 'start') {
      return await startCommand(commandArgs[0], prompter);
    }
    return await runCommand(commandArgs[0], commandArgs.slice(1).join(' ') || 'run the project', prompter);
  } catch (error) {
    if (error instanceof ArtifactLoadError) {
      log(`\n❌ ${error.message}`, 'red');
      return 1;
    }
    if (error instanceof InputClosedError) {
      log('\n❌ Input closed before the run finished', 'red');
      return 1;
    }
    throw error;
  } finally {
    prompter.close();
    removeInterruptHandlers();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', getErrorMessage(error));
    process.exit(1);
  });
