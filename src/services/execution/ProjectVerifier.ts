/**
 * ProjectVerifier
 *
 * Whole-project "does it actually run" check after the task list:
 * finds Django and Node projects in the target (including nested ones),
 * runs their checks/builds, smoke-starts their dev servers and assembles the
 * numbered run instructions that end up in the README's Quick Start.
 */

import { spawn } from 'child_process';
import fs from 'fs';
import path from 'path';
import { Logger } from '../../utils/logger';
import { getErrorMessage } from '../../utils/errorUtils';
import { isPlainObject, objectAt, stringAt } from '../../utils/ObjectUtils';
import type { UserPrompter } from '../InteractiveController';
import { CommandExecutor, CommandRunner, commandSucceeded } from './CommandRunner';
import { COMMAND_TIMEOUTS, RETRY_LIMITS } from './constants/Timeouts';
import { readPackageScripts, walkTree } from './ProjectSnapshot';
import type { SmokeProbe } from './SmokeProber';
import type { JsonObject } from './types/ExecutionTypes';

export const SERVER_LOG_DIR = '.gryffin_logs';

const PROJECT_SCAN_IGNORED = new Set(['node_modules', '.git', '__pycache__', 'venv', 'env', '.venv', 'dist', 'build']);
const VENV_DIRS = ['venv', 'env', '.venv'];

export interface VerifyOptions {
  autoRun?: boolean;
  runBackend?: boolean;
  runFrontend?: boolean;
  persistServers?: boolean;
}

export interface VerificationResult {
  success: boolean;
  /** Numbered run commands, or a pointer to the README */
  instructions: string;
}

/**
 * Start a server detached from this process, appending its output to
 * `<cwd>/.gryffin_logs/<name>.log`
 */
export type PersistentStarter = (command: string, cwd: string, name: string) => void;

export const startPersistent: PersistentStarter = (command, cwd, name) => {
  const logDir = path.join(cwd, SERVER_LOG_DIR);
  fs.mkdirSync(logDir, { recursive: true });
  const logFile = path.join(logDir, `${name}.log`);

  fs.appendFileSync(logFile, `\n[${new Date().toISOString().substring(0, 19)}] START ${command}\n`, 'utf-8');

  const fd = fs.openSync(logFile, 'a');
  try {
    const child = spawn(command, { cwd, shell: true, detached: true, stdio: ['ignore', fd, fd] });
    child.on('error', (error) => Logger.error(`[ProjectVerifier] ${name} failed to start`, error));
    child.unref();
  } finally {
    fs.closeSync(fd);
  }
  Logger.info(`✓ Started ${name}. Logs: ${logFile}`);
};

/**
 * Which sides a free-text action prompt asks for; both when it names neither
 */
export function inferRunTargets(prompt: string): { runBackend: boolean; runFrontend: boolean } {
  const text = prompt.toLowerCase();
  const backend = ['backend', 'django', 'api', 'server', 'runserver', 'manage.py', 'migrate'].some((k) => text.includes(k));
  const frontend = ['frontend', 'react', 'web', 'ui', 'client', 'npm', 'vite', 'next'].some((k) => text.includes(k));
  if (!backend && !frontend) {
    return { runBackend: true, runFrontend: true };
  }
  return { runBackend: backend, runFrontend: frontend };
}

function projectDirs(targetDir: string): string[] {
  return [
    targetDir,
    ...walkTree(targetDir, (name) => PROJECT_SCAN_IGNORED.has(name))
      .filter((entry) => entry.isDirectory)
      .map((entry) => entry.absolutePath),
  ];
}

export function findDjangoProjects(targetDir: string): string[] {
  return projectDirs(targetDir).filter((dir) => fs.existsSync(path.join(dir, 'manage.py')));
}

export function findNodeProjects(targetDir: string): string[] {
  return projectDirs(targetDir).filter((dir) => fs.existsSync(path.join(dir, 'package.json')));
}

function hasFlaskApp(targetDir: string): boolean {
  return walkTree(targetDir, (name) => PROJECT_SCAN_IGNORED.has(name)).some(
    (entry) => entry.isFile && entry.name === 'app.py'
  );
}

function inDir(targetDir: string, projectDir: string, command: string): string {
  const rel = path.relative(targetDir, projectDir);
  return rel ? `cd ${rel}\n  ${command}` : command;
}

/**
 * Run command for a project whose layout gave nothing to detect
 */
export function genericRunCommand(architecture: JsonObject): string | null {
  const backend = objectAt(architecture, 'tech_stack').backend;
  const framework = (isPlainObject(backend) ? stringAt(backend, 'framework') : String(backend ?? '')).toLowerCase();

  if (framework.includes('django')) return 'python manage.py runserver';
  if (framework.includes('flask')) return 'flask run';
  if (framework.includes('fastapi')) return 'uvicorn main:app --reload';
  if (framework.includes('node') || framework.includes('express')) return 'npm start';
  if (framework.includes('next')) return 'npm run dev';
  return null;
}

export interface ProjectVerifierDeps {
  runner: CommandRunner;
  executor: CommandExecutor;
  backendProbe: SmokeProbe;
  frontendProbe: SmokeProbe;
  prompter: UserPrompter;
  startServer?: PersistentStarter;
}

export class ProjectVerifier {
  private readonly startServer: PersistentStarter;

  constructor(private readonly deps: ProjectVerifierDeps) {
    this.startServer = deps.startServer ?? startPersistent;
  }

  async verifyProjectRuns(
    targetDir: string,
    architecture: JsonObject,
    options: VerifyOptions = {}
  ): Promise<VerificationResult> {
    const { runner, prompter } = this.deps;
    const autoRun = options.autoRun ?? true;
    const runBackend = options.runBackend ?? true;
    const runFrontend = options.runFrontend ?? true;

    prompter.say(`\n${'='.repeat(60)}\n🔍 VERIFYING PROJECT IS RUNNABLE\n${'='.repeat(60)}`);

    const runInstructions: string[] = [];
    let detected = false;

    const djangoProjects = runBackend ? findDjangoProjects(targetDir) : [];
    for (const dir of djangoProjects) {
      detected = true;
      const checkOk = await runner.runWithRetry('python manage.py check', dir, 'running Django system checks', {
        maxRetries: RETRY_LIMITS.DJANGO_CHECK_ATTEMPTS,
        logDir: targetDir,
      });
      if (checkOk) {
        prompter.say(`✓ Django project check passed (${dir})`);
      }
      runInstructions.push(inDir(targetDir, dir, 'python manage.py runserver'));
    }

    const nodeProjects = runFrontend ? findNodeProjects(targetDir) : [];
    for (const dir of nodeProjects) {
      const scripts = readPackageScripts(dir);
      if (!fs.existsSync(path.join(dir, 'node_modules'))) {
        runInstructions.push(inDir(targetDir, dir, 'npm install'));
      }
      const startCommand = 'dev' in scripts ? 'npm run dev' : 'start' in scripts ? 'npm start' : null;
      if (startCommand) {
        detected = true;
        runInstructions.push(inDir(targetDir, dir, startCommand));
      }
    }

    if (!detected && hasFlaskApp(targetDir)) {
      runInstructions.push('flask run');
    }

    if (
      fs.existsSync(path.join(targetDir, 'requirements.txt')) &&
      !VENV_DIRS.some((d) => fs.existsSync(path.join(targetDir, d)))
    ) {
      runInstructions.unshift('python -m venv venv && source venv/bin/activate && pip install -r requirements.txt');
    }

    if (runInstructions.length === 0) {
      const generic = genericRunCommand(architecture);
      if (generic) {
        runInstructions.push(generic);
      }
    }

    if (runInstructions.length === 0) {
      prompter.say('\n⚠️  Could not auto-detect run commands');
      return { success: false, instructions: 'Please refer to the README.md for run instructions' };
    }

    const instructions = runInstructions.map((cmd, i) => `  ${i + 1}. ${cmd}`).join('\n');

    let autoOk = true;
    if (autoRun) {
      prompter.say('\n▶ Auto-running detected dev commands...');
      for (const dir of djangoProjects) {
        autoOk = (await this.runDjango(dir, targetDir, options.persistServers ?? false)) && autoOk;
      }
      for (const dir of nodeProjects) {
        autoOk = (await this.runNode(dir, targetDir, options.persistServers ?? false)) && autoOk;
      }
      prompter.say(autoOk ? '✓ Auto-run verification succeeded' : '⚠️  Auto-run verification had failures; see logs above');
    }

    if (autoOk) {
      prompter.say(`\n✅ Project appears runnable!\n\n📋 To run the project:\n${instructions}`);
      return { success: true, instructions };
    }
    prompter.say(`\n⚠️  Project run verification failed\n\n📋 Suggested run commands:\n${instructions}`);
    return { success: false, instructions };
  }

  /**
   * Action mode: verification only, for the sides the prompt names
   */
  async runActionPrompt(prompt: string, targetDir: string, autoRun: boolean, persistServers = false): Promise<VerificationResult> {
    const { prompter } = this.deps;
    prompter.say(`\n${'='.repeat(80)}\n⚡ ACTION MODE\n${'='.repeat(80)}\nPrompt: ${prompt}`);

    const targets = inferRunTargets(prompt);
    const result = await this.verifyProjectRuns(targetDir, {}, { autoRun, persistServers, ...targets });

    prompter.say(`\n${'='.repeat(80)}`);
    prompter.say(result.success ? '✅ ACTION COMPLETE' : '⚠️  ACTION FINISHED WITH WARNINGS');
    prompter.say('='.repeat(80));
    prompter.say(`\n📋 Run commands:\n${result.instructions}`);
    return result;
  }

  /**
   * For each `Can't resolve '<module>' in '<dir>'`: relative modules become
   * empty files, packages get installed
   */
  async autoFixFrontendErrors(errorOutput: string, cwd: string): Promise<boolean> {
    if (!errorOutput) {
      return false;
    }

    let fixedAny = false;
    for (const match of errorOutput.matchAll(/Can't resolve '([^']+)' in '([^']+)'/g)) {
      const [, moduleName, baseDir] = match;

      if (moduleName.startsWith('.')) {
        let missingPath = path.resolve(baseDir, moduleName);
        if (!path.extname(missingPath)) {
          missingPath += '.js';
        }
        if (!fs.existsSync(missingPath)) {
          fs.mkdirSync(path.dirname(missingPath), { recursive: true });
          fs.writeFileSync(missingPath, '', 'utf-8');
          this.deps.prompter.say(`✓ Created missing file: ${missingPath}`);
          fixedAny = true;
        }
      } else {
        const ok = await this.deps.runner.runWithRetry(
          `npm install ${moduleName}`,
          cwd,
          `installing missing frontend dependency: ${moduleName}`
        );
        fixedAny = fixedAny || ok;
      }
    }

    return fixedAny;
  }

  /**
   * Build or lint; one auto-fix pass and retry on failure
   */
  async runFrontendBuild(command: string, cwd: string): Promise<boolean> {
    const { executor } = this.deps;
    try {
      const result = await executor.run(command, cwd, COMMAND_TIMEOUTS.DEFAULT);
      if (commandSucceeded(result)) {
        return true;
      }
      if (await this.autoFixFrontendErrors(`${result.stdout}\n${result.stderr}`, cwd)) {
        return commandSucceeded(await executor.run(command, cwd, COMMAND_TIMEOUTS.DEFAULT));
      }
    } catch (error) {
      Logger.warn(`[ProjectVerifier] ${command} failed in ${cwd}: ${getErrorMessage(error)}`);
    }
    return false;
  }

  private async runDjango(dir: string, targetDir: string, persist: boolean): Promise<boolean> {
    const migrateOk = await this.deps.runner.runWithRetry('python manage.py migrate', dir, 'running Django migrations', {
      logDir: targetDir,
    });
    if (!migrateOk) {
      return false;
    }

    const verdict = await this.deps.backendProbe.probe('python manage.py runserver', dir);
    let ok = verdict.healthy;
    if (!ok && verdict.stderr.toLowerCase().includes('port is already in use')) {
      this.deps.prompter.say('ℹ️  Django server already running; continuing.');
      ok = true;
    }
    if (persist && ok) {
      this.startServer('python manage.py runserver', dir, 'django-runserver');
    }
    return ok;
  }

  private async runNode(dir: string, targetDir: string, persist: boolean): Promise<boolean> {
    const { runner, prompter, frontendProbe } = this.deps;
    let ok = true;

    if (!fs.existsSync(path.join(dir, 'node_modules'))) {
      ok = await runner.runWithRetry('npm install', dir, 'installing node dependencies', { logDir: targetDir });
    }

    const scripts = readPackageScripts(dir);
    const buildScript = 'build' in scripts ? 'build' : 'lint' in scripts ? 'lint' : null;
    if (buildScript) {
      prompter.say(`\n▶ Running: npm run ${buildScript} (${dir})`);
      ok = (await this.runFrontendBuild(`npm run ${buildScript}`, dir)) && ok;
    }

    const startCommand = 'dev' in scripts ? 'npm run dev' : 'start' in scripts ? 'npm start' : null;
    if (!startCommand) {
      return ok;
    }

    prompter.say(`\n▶ Running: ${startCommand} (${dir})`);
    let verdict = await frontendProbe.probe(startCommand, dir);
    if (!verdict.healthy && (await this.autoFixFrontendErrors(`${verdict.stdout}\n${verdict.stderr}`, dir))) {
      verdict = await frontendProbe.probe(startCommand, dir);
    }
    if (persist && verdict.healthy) {
      this.startServer(startCommand, dir, startCommand === 'npm run dev' ? 'npm-dev' : 'npm-start');
    }
    return verdict.healthy && ok;
  }
}
