/**
 * CodeGenerator - asks the code-generation collaborator for one task's changes
 */

import { Logger } from '../../utils/logger';
import { getErrorMessage } from '../../utils/errorUtils';
import type { JsonCollaborator } from '../llm/LLMClient';
import { listAt, objectAt, stringAt } from '../../utils/ObjectUtils';
import { TEXT_LIMITS } from './constants/Timeouts';
import { SchemaValidator } from './schemas/CollaboratorSchemas';
import type { CodeChangeSet, ExecutionContext, JsonObject, Task } from './types/ExecutionTypes';

const SYSTEM_PROMPT =
  'You are a senior software engineer who meticulously follows project architecture and README guidelines. ' +
  'You NEVER introduce new frameworks or libraries not in the tech stack. You place files in correct locations, ' +
  'include all imports, mock external services in tests, and create production-ready code. ' +
  'Return only valid JSON with files, tests, and description.';

function codebaseSection(insight: JsonObject | null | undefined): string {
  if (!insight) {
    return '';
  }
  const recommendations = objectAt(insight, 'recommendations');
  const functionality = listAt(insight, 'existing_functionality')
    .slice(0, 10)
    .map((item) => `- ${item}`)
    .join('\n');

  return `
## EXISTING CODEBASE ANALYSIS (CRITICAL - MUST RESPECT)

**Project Type**: ${stringAt(insight, 'project_type', 'Unknown')}
**Architecture**: ${stringAt(insight, 'architecture_summary', 'N/A')}

**Existing Tech Stack**:
${JSON.stringify(objectAt(insight, 'tech_stack'), null, 2)}

**Existing Functionality** (DO NOT DUPLICATE):
${functionality}

**Patterns to Follow**:
${stringAt(recommendations, 'patterns_to_follow', 'Follow existing code patterns')}

**Integration Points**:
${stringAt(recommendations, 'integration_points', 'Integrate with existing modules')}

**Cautions**:
${stringAt(recommendations, 'cautions', 'Respect existing architecture')}

CRITICAL: Your code MUST integrate with the existing codebase. Do NOT:
- Create duplicate functionality that already exists
- Use different frameworks/libraries than what's already in use
- Break existing patterns or conventions
- Introduce incompatible dependencies
`;
}

export function buildCodePrompt(task: Task, context: ExecutionContext): string {
  const snapshot = JSON.stringify(
    {
      files: context.fileTreeSnapshot.files,
      directories: context.fileTreeSnapshot.directories,
      key_files: context.fileTreeSnapshot.keyFiles,
    },
    null,
    2
  ).substring(0, TEXT_LIMITS.SNAPSHOT_PROMPT_CHARS);

  return `You are implementing this task:

Task: ${task.title}
Description: ${task.description}
${task.acceptanceCriteria.length > 0 ? `Acceptance criteria:\n${task.acceptanceCriteria.map((c) => `- ${c}`).join('\n')}\n` : ''}
## Project README (IMPORTANT - Read First!)
${context.readmeContent || 'No README available'}
${codebaseSection(context.codebaseInsight)}
## Project Architecture
${JSON.stringify(context.architecture, null, 2)}

## Implementation Context
Already completed tasks: ${context.completedTasks.join(', ') || 'None'}

Current file tree:
${snapshot}

## Your Task
Generate a complete, production-ready implementation for this task.

CRITICAL RULES:
1. **Follow the README**: The project README defines what this app IS and IS NOT. Stay within those bounds.
2. **Respect the architecture**: Use ONLY the specified tech stack - do NOT introduce new frameworks.
3. **Proper file locations**: Place files in the correct directories based on the file tree structure.
4. **Complete imports**: Include all necessary import statements.
5. **Proper test setup**: Include the test configuration the framework needs.
6. **Mock external services**: Mock any external APIs in tests.
7. **No dependency drift**: Only use dependencies that are in the architecture.
8. **Integrate, don't replace**: If there's existing code, integrate with it rather than replacing it.

Generate the implementation. Return JSON with:
- files: array of {path: "relative/path/in/correct/location", content: "complete file content with all imports", action: "create" | "modify"}
- tests: array of {path: "tests/path", content: "complete test with mocks", type: "unit" | "integration"}
- description: string explaining what was implemented and where files were placed
`;
}

export class CodeGenerator {
  constructor(private readonly collaborator: JsonCollaborator) {}

  /**
   * @returns null when the collaborator produced nothing usable
   */
  async generateTaskCode(task: Task, context: ExecutionContext, taskIndex: number): Promise<CodeChangeSet | null> {
    Logger.task(task.title, `💻 Generating code for task ${taskIndex + 1}`);

    let reply: unknown;
    try {
      reply = await this.collaborator(SYSTEM_PROMPT, buildCodePrompt(task, context));
    } catch (error) {
      Logger.warn(`[CodeGenerator] Collaborator failed: ${getErrorMessage(error)}`);
      return null;
    }

    const changeSet = SchemaValidator.decodeCodeChangeSet(reply);
    if (!changeSet || (changeSet.files.length === 0 && changeSet.tests.length === 0)) {
      Logger.task(task.title, '✗ Failed to generate code');
      return null;
    }

    Logger.task(task.title, `✓ Generated ${changeSet.files.length} files and ${changeSet.tests.length} tests`);
    return changeSet;
  }
}
