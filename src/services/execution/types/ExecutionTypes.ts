/**
 * Execution Types - shared shapes for the build-and-fix engine
 *
 * Collaborator wire formats are snake_case JSON; everything in here is the
 * decoded, camelCase form (see schemas/CollaboratorSchemas.ts).
 */

import type { JsonObject } from '../../../utils/ObjectUtils';
import type { SessionTracker } from '../SessionTracker';

export type { JsonObject };

/**
 * One entry of majortasks.json `major_tasks`. Never mutated by the executor.
 */
export interface Task {
  title: string;
  description: string;
  owners: string[];
  dependencies: string[];
  acceptanceCriteria: string[];
}

export interface FileTreeSnapshot {
  /** Relative file paths */
  files: string[];
  /** Relative directory paths */
  directories: string[];
  /** Well-known file name → relative path */
  keyFiles: Record<string, string>;
}

/**
 * Long-lived run state handed to the Task Executor for every task
 */
export interface ExecutionContext {
  targetDir: string;
  architecture: JsonObject;
  /** The whole task-list document */
  tasks: JsonObject;
  /** Append-only, in execution order */
  completedTasks: string[];
  fileTreeSnapshot: FileTreeSnapshot;
  readmeContent: string;
  codebaseInsight?: JsonObject | null;
  sessionTracker: SessionTracker;
}

// ==================== COLLABORATOR RESULTS ====================

export type FileAction = 'create' | 'modify';

export interface FileChange {
  path: string;
  content: string;
  action: FileAction;
}

export interface TestFileChange {
  path: string;
  content: string;
  type?: string;
}

export interface CodeChangeSet {
  files: FileChange[];
  tests: TestFileChange[];
  description: string;
}

export type Confidence = 'high' | 'medium' | 'low';

export interface FileContent {
  path: string;
  content: string;
}

export interface DebugFix {
  filesToCreate: FileContent[];
  filesToModify: FileContent[];
  filesToDelete: string[];
  commandsToRun: string[];
  explanation: string;
  confidence: Confidence;
  needsHuman: boolean;
  humanInstructions?: string;
}

export interface FixSuggestion {
  /** Replacement command, or full file content for syntax repairs */
  solution?: string;
  explanation: string;
  confidence: Confidence;
  needsHuman: boolean;
  humanInstructions?: string;
}

// ==================== RUN RESULTS ====================

export interface TestResult {
  passed: boolean;
  output: string;
  errors: string[];
}

export type ProjectType = 'node' | 'python' | 'unknown';

export interface EnvInfo {
  projectType: ProjectType;
  hasEnvFile: boolean;
  needsSetup: string[];
  detectedDependencies: string[];
}

export type HealthStatus = 'healthy' | 'crashed' | 'compile_error' | 'spawn_failed';

export interface HealthVerdict {
  status: HealthStatus;
  healthy: boolean;
  stdout: string;
  stderr: string;
  exitCode?: number | null;
}

/**
 * Result of one executeTask call. `skipped` counts as success for sequencing
 * but is not recorded in completedTasks; `aborted` ends the whole run.
 */
export type TaskOutcome = 'completed' | 'skipped' | 'failed' | 'aborted';

/**
 * Input to the debugging collaborator
 */
export interface FileTreeWithContents {
  structure: string[];
  files: Record<string, string>;
}

export interface ErrorLogEntry {
  /** HH:MM:SS */
  timestamp: string;
  error: string;
  fix: string;
  file: string | null;
}
