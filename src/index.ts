/**
 * Gryffin execution engine
 */

export { ExecutionOrchestrator, loadArtifact, ARCHITECTURE_FILE, TASK_LIST_FILE } from './services/execution/ExecutionOrchestrator';
export type { ExecutionReport, EngineOptions, ExecutionOrchestratorDeps } from './services/execution/ExecutionOrchestrator';
export { TaskExecutor } from './services/execution/TaskExecutor';
export type { TaskState, TaskExecutorDeps } from './services/execution/TaskExecutor';
export { CommandRunner, ShellCommandExecutor, commandSucceeded } from './services/execution/CommandRunner';
export type { CommandExecutor, CommandResult, RetryOptions } from './services/execution/CommandRunner';
export { BlockingProbe, StreamingProbe, ShellProcessLauncher } from './services/execution/SmokeProber';
export type { SmokeProbe, ProbeProcess, ProcessLauncher } from './services/execution/SmokeProber';
export { AutoFixAdvisor } from './services/execution/AutoFixAdvisor';
export { DebugAgentBridge } from './services/execution/DebugAgentBridge';
export { StaticErrorChecker } from './services/execution/StaticErrorChecker';
export { TestRunner } from './services/execution/TestRunner';
export { FileApplier } from './services/execution/FileApplier';
export { CodeGenerator } from './services/execution/CodeGenerator';
export { EnvironmentSetup } from './services/execution/EnvironmentSetup';
export { ReadmeGenerator } from './services/execution/ReadmeGenerator';
export { ProjectVerifier } from './services/execution/ProjectVerifier';
export type { VerificationResult, VerifyOptions } from './services/execution/ProjectVerifier';
export { SessionTracker } from './services/execution/SessionTracker';
export { takeFileTreeSnapshot, detectEnvironment, detectProjectType } from './services/execution/ProjectSnapshot';
export { SchemaValidator } from './services/execution/schemas/CollaboratorSchemas';
export * from './services/execution/types/ExecutionTypes';
export { ConsoleUserPrompter, askUser, parseUserInput } from './services/InteractiveController';
export type { UserPrompter, UserReply, AskOptions } from './services/InteractiveController';
export { LLMClient } from './services/llm/LLMClient';
export type { JsonCollaborator } from './services/llm/LLMClient';
export { LLMError, ArtifactLoadError, InputClosedError, getErrorMessage } from './utils/errorUtils';
