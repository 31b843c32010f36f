/**
 * Timeout and limit constants for the execution engine
 *
 * All durations are in milliseconds.
 */

// Subprocess timeouts
export const COMMAND_TIMEOUTS = {
  /** Build, install and test commands */
  DEFAULT: 300_000, // 5 minutes
  /** Commands proposed by the debugging collaborator */
  DEBUG_COMMAND: 60_000,
  /** npm run lint */
  LINT: 60_000,
  /** python -m py_compile <file> */
  SYNTAX_CHECK: 30_000,
  /** node --version, python -m django --version */
  VERSION_PROBE: 5_000,
} as const;

// Smoke-start probes
export const PROBE_TIMEOUTS = {
  /** Backend servers (blocking probe) */
  BACKEND: 8_000,
  /** Frontend dev servers (streaming probe) */
  FRONTEND: 20_000,
  /** Liveness poll interval for the blocking probe */
  POLL_INTERVAL: 500,
  /** SIGTERM → SIGKILL grace period */
  KILL_GRACE: 3_000,
} as const;

// Loop ceilings
export const RETRY_LIMITS = {
  /** Auto-fix attempts per command */
  MAX_AUTO_RETRY_ATTEMPTS: 15,
  /** Whole-task restarts before giving up */
  MAX_TASK_RESTARTS: 15,
  /** manage.py check */
  DJANGO_CHECK_ATTEMPTS: 3,
  /** Consecutive identical errors before the "different approach" note */
  STUCK_THRESHOLD: 3,
} as const;

// Text truncation
export const TEXT_LIMITS = {
  /** Error prefix compared by the command runner's stuck detector */
  COMMAND_ERROR_SIGNATURE: 300,
  /** Error prefix compared by the test runner's stuck detector */
  TEST_ERROR_SIGNATURE: 500,
  /** Error text kept in the session error log */
  ERROR_LOG_ENTRY: 500,
  /** Error text the test runner hands to the error log */
  FIXED_ERROR: 300,
  /** Probe stdout/stderr kept in a verdict */
  PROBE_OUTPUT: 2_000,
  /** Debug tree: files with contents */
  DEBUG_MAX_FILES: 50,
  /** Debug tree: characters per file */
  DEBUG_FILE_CHARS: 5_000,
  /** Debug prompt: structure entries */
  DEBUG_STRUCTURE_ENTRIES: 100,
  /** Debug prompt: error log characters */
  DEBUG_ERROR_CHARS: 3_000,
  /** Snapshot JSON in the code-generation prompt */
  SNAPSHOT_PROMPT_CHARS: 3_000,
  /** README excerpt in the setup-plan prompt */
  README_PROMPT_CHARS: 3_000,
  /** Files listed in the README file structure */
  README_TREE_FILES: 30,
} as const;

export const STUCK_NOTE = (count: number): string =>
  ` (CRITICAL: Same error repeated ${count} times - previous fixes FAILED, try a COMPLETELY DIFFERENT approach)`;
