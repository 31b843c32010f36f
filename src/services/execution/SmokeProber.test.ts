/**
 * SmokeProber Tests
 *
 * Fake processes drive the classification; short-lived real children check that
 * nothing is left running after a probe.
 */

import { PassThrough } from 'stream';
import {
  BlockingProbe,
  ProbeProcess,
  ProcessLauncher,
  ShellProcessLauncher,
  StreamingProbe,
  hasFrontendError,
} from './SmokeProber';
import { ShellCommandExecutor } from './CommandRunner';

class FakeProcess implements ProbeProcess {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly exited: Promise<number | null>;
  readonly spawnError: Error | null = null;
  terminateCalls = 0;
  private running = true;
  private resolveExit: (code: number | null) => void = () => undefined;

  constructor() {
    this.exited = new Promise((resolve) => {
      this.resolveExit = resolve;
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  exit(code: number | null): void {
    if (!this.running) return;
    this.running = false;
    this.stdout.end();
    this.stderr.end();
    this.resolveExit(code);
  }

  async terminate(): Promise<void> {
    this.terminateCalls++;
    this.exit(null);
  }
}

class FakeLauncher implements ProcessLauncher {
  readonly launched: FakeProcess[] = [];

  constructor(private readonly script: (proc: FakeProcess) => void = () => undefined) {}

  launch(): ProbeProcess {
    const proc = new FakeProcess();
    this.launched.push(proc);
    setTimeout(() => this.script(proc), 5);
    return proc;
  }
}

const nodeCommand = (code: string) => `"${process.execPath}" -e "${code}"`;

describe('SmokeProber', () => {
  describe('hasFrontendError', () => {
    it('should match compile-error fingerprints case-insensitively', () => {
      expect(hasFrontendError("Module not found: Error: Can't resolve './Header'")).toBe(true);
      expect(hasFrontendError('Failed to compile.')).toBe(true);
      expect(hasFrontendError('ERROR in ./src/index.js')).toBe(true);
      expect(hasFrontendError('webpack compiled successfully')).toBe(false);
    });
  });

  describe('BlockingProbe', () => {
    it('should report a process still alive at the deadline as healthy and stop it', async () => {
      const launcher = new FakeLauncher((proc) => proc.stdout.write('Starting development server\n'));
      const probe = new BlockingProbe({ launcher, pollIntervalMs: 10 });

      const verdict = await probe.probe('python manage.py runserver', '/tmp', 60);

      expect(verdict).toEqual({
        status: 'healthy',
        healthy: true,
        stdout: 'Starting development server\n',
        stderr: '',
        exitCode: null,
      });
      expect(launcher.launched[0].terminateCalls).toBe(1);
      expect(launcher.launched[0].isRunning()).toBe(false);
    });

    it('should report an early non-zero exit as a crash with its output', async () => {
      const launcher = new FakeLauncher((proc) => {
        proc.stderr.write('Error: That port is already in use.\n');
        proc.exit(1);
      });
      const probe = new BlockingProbe({ launcher, pollIntervalMs: 10 });

      const verdict = await probe.probe('python manage.py runserver', '/tmp', 1000);

      expect(verdict.status).toBe('crashed');
      expect(verdict.healthy).toBe(false);
      expect(verdict.exitCode).toBe(1);
      expect(verdict.stderr).toBe('Error: That port is already in use.\n');
    });

    it('should report a clean early exit as healthy', async () => {
      const launcher = new FakeLauncher((proc) => proc.exit(0));
      const verdict = await new BlockingProbe({ launcher, pollIntervalMs: 10 }).probe('true', '/tmp', 1000);

      expect(verdict.status).toBe('healthy');
      expect(verdict.exitCode).toBe(0);
    });

    it('should report a launch failure as spawn_failed', async () => {
      const launcher: ProcessLauncher = {
        launch: () => {
          throw new Error('spawn /bin/sh ENOENT');
        },
      };
      const verdict = await new BlockingProbe({ launcher }).probe('anything', '/tmp', 100);

      expect(verdict).toEqual({
        status: 'spawn_failed',
        healthy: false,
        stdout: '',
        stderr: 'spawn /bin/sh ENOENT',
        exitCode: null,
      });
    });
  });

  describe('StreamingProbe', () => {
    it('should fail immediately on a compile-error line', async () => {
      const launcher = new FakeLauncher((proc) => {
        proc.stdout.write('Starting the development server...\n');
        proc.stdout.write("Module not found: Error: Can't resolve './Header' in '/app/src'\n");
      });
      const probe = new StreamingProbe({ launcher, pollIntervalMs: 10 });

      const started = Date.now();
      const verdict = await probe.probe('npm run dev', '/tmp', 5000);

      expect(Date.now() - started).toBeLessThan(4000);
      expect(verdict.status).toBe('compile_error');
      expect(verdict.stdout).toBe(
        "Starting the development server...\nModule not found: Error: Can't resolve './Header' in '/app/src'"
      );
      expect(launcher.launched[0].isRunning()).toBe(false);
    });

    it('should treat a webpack error summary as a compile error', async () => {
      const launcher = new FakeLauncher((proc) => proc.stdout.write('Compiled with 1 error\n'));
      const verdict = await new StreamingProbe({ launcher, pollIntervalMs: 10 }).probe('npm start', '/tmp', 80);

      expect(verdict.status).toBe('compile_error');
      expect(verdict.exitCode).toBeNull();
    });

    it('should report a quiet server at the deadline as healthy', async () => {
      const launcher = new FakeLauncher((proc) => proc.stdout.write('Compiled successfully!\n'));
      const verdict = await new StreamingProbe({ launcher, pollIntervalMs: 10 }).probe('npm start', '/tmp', 80);

      expect(verdict).toEqual({
        status: 'healthy',
        healthy: true,
        stdout: 'Compiled successfully!',
        stderr: '',
        exitCode: null,
      });
      expect(launcher.launched[0].terminateCalls).toBe(1);
    });

    it('should report a non-zero exit without fingerprints as a crash', async () => {
      const launcher = new FakeLauncher((proc) => {
        proc.stderr.write('sh: vite: command not found\n');
        proc.exit(127);
      });
      const verdict = await new StreamingProbe({ launcher, pollIntervalMs: 10 }).probe('npm run dev', '/tmp', 5000);

      expect(verdict.status).toBe('crashed');
      expect(verdict.exitCode).toBe(127);
      expect(verdict.stderr).toBe('sh: vite: command not found');
    });
  });

  describe('with real processes', () => {
    function recordingLauncher(): { launcher: ProcessLauncher; launched: ProbeProcess[] } {
      const real = new ShellProcessLauncher();
      const launched: ProbeProcess[] = [];
      return {
        launched,
        launcher: {
          launch: (command, cwd) => {
            const proc = real.launch(command, cwd);
            launched.push(proc);
            return proc;
          },
        },
      };
    }

    it('should leave no blocking-probed process running', async () => {
      const { launcher, launched } = recordingLauncher();
      const probe = new BlockingProbe({ launcher, pollIntervalMs: 50, killGraceMs: 1000 });

      const verdict = await probe.probe(nodeCommand('setInterval(() => {}, 1000)'), process.cwd(), 400);

      expect(verdict.status).toBe('healthy');
      expect(launched[0].isRunning()).toBe(false);
    });

    it('should leave no streaming-probed process running after a compile error', async () => {
      const { launcher, launched } = recordingLauncher();
      const probe = new StreamingProbe({ launcher, pollIntervalMs: 50, killGraceMs: 1000 });

      const verdict = await probe.probe(
        nodeCommand("console.log('Failed to compile.'); setInterval(() => {}, 1000)"),
        process.cwd(),
        5000
      );

      expect(verdict.status).toBe('compile_error');
      expect(launched[0].isRunning()).toBe(false);
    });
  });

  describe('ShellCommandExecutor', () => {
    const executor = new ShellCommandExecutor(500);

    it('should capture output and the exit code', async () => {
      const result = await executor.run(nodeCommand("process.stdout.write('hi'); process.exit(3)"), process.cwd(), 10000);

      expect(result.exitCode).toBe(3);
      expect(result.stdout).toBe('hi');
      expect(result.timedOut).toBe(false);
    });

    it('should kill a command that outlives its timeout', async () => {
      const result = await executor.run(nodeCommand('setInterval(() => {}, 1000)'), process.cwd(), 200);

      expect(result.timedOut).toBe(true);
      expect(result.exitCode).toBeNull();
    });
  });
});
