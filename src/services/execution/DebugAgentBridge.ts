/**
 * DebugAgentBridge
 *
 * Turns a test failure into a multi-file patch set through the debugging
 * collaborator. Does no file I/O: the caller collects the tree
 * (see getFileTreeWithContents) and applies the result.
 */

import { Logger } from '../../utils/logger';
import { getErrorMessage } from '../../utils/errorUtils';
import type { JsonCollaborator } from '../llm/LLMClient';
import { TEXT_LIMITS } from './constants/Timeouts';
import { SchemaValidator } from './schemas/CollaboratorSchemas';
import type { DebugFix, FileTreeWithContents } from './types/ExecutionTypes';

const SYSTEM_PROMPT =
  'You are a world-class debugging agent who ALWAYS provides autonomous fixes. You analyze test failures ' +
  'deeply and generate complete, working solutions. Return only valid JSON with all required fields.';

export function fallbackDebugFix(): DebugFix {
  return {
    filesToCreate: [],
    filesToModify: [],
    filesToDelete: [],
    commandsToRun: [],
    explanation: 'Could not generate debug fix',
    confidence: 'low',
    needsHuman: true,
    humanInstructions: 'Please manually review the test failures.',
  };
}

export function buildDebugPrompt(
  errorLog: string,
  fileTree: FileTreeWithContents,
  context: string,
  readmeContent?: string
): string {
  const structure = JSON.stringify(fileTree.structure.slice(0, TEXT_LIMITS.DEBUG_STRUCTURE_ENTRIES), null, 2);
  const contents = JSON.stringify(fileTree.files, null, 2);

  return `You are a senior debugging agent analyzing a test failure.

## Context
${context}

## Project README
${readmeContent || 'No README available'}

## File Tree Structure
${structure}

## Relevant File Contents
${contents}

## Test Failure Output
\`\`\`
${errorLog.substring(0, TEXT_LIMITS.DEBUG_ERROR_CHARS)}
\`\`\`

## Your Task
Analyze this test failure and provide a COMPLETE, AUTONOMOUS fix.

Common issues you should fix:
1. **Framework settings not configured** → Create pytest.ini / conftest.py / jest config as needed
2. **Tests in wrong location** → Move tests to the proper app structure
3. **Missing mocks for external services** → Add proper mocks
4. **Missing imports** → Add missing import statements
5. **Wrong file paths** → Fix import paths and file locations
6. **Missing test dependencies** → Install them
7. **Code structure issues** → Fix class/function definitions

Only flag needs_human=true if truly impossible to fix (requires credentials, manual setup, etc.)

Return JSON with:
- files_to_create: Array of {"path": "relative/path", "content": "full file content"}
- files_to_modify: Array of {"path": "relative/path", "content": "new full content"}
- files_to_delete: Array of file paths to delete
- commands_to_run: Array of shell commands to execute (in order)
- explanation: Detailed explanation of what was wrong and how you fixed it
- confidence: "high"/"medium"/"low"
- needs_human: true only if impossible to fix autonomously
- human_instructions: (only if needs_human=true) step-by-step instructions
`;
}

export class DebugAgentBridge {
  constructor(private readonly collaborator: JsonCollaborator) {}

  async analyzeTestFailure(
    errorLog: string,
    fileTree: FileTreeWithContents,
    context = 'test failure',
    readmeContent?: string
  ): Promise<DebugFix> {
    Logger.info(`🔍 Debugging Agent: Analyzing ${context}...`);

    let reply: unknown;
    try {
      reply = await this.collaborator(SYSTEM_PROMPT, buildDebugPrompt(errorLog, fileTree, context, readmeContent));
    } catch (error) {
      Logger.warn(`[DebugAgentBridge] Collaborator failed: ${getErrorMessage(error)}`);
      return fallbackDebugFix();
    }

    return SchemaValidator.decodeDebugFix(reply) ?? fallbackDebugFix();
  }
}
