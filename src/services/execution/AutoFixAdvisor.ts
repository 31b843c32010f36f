/**
 * AutoFixAdvisor
 *
 * Stateless request/response: an error plus what was attempted in, a
 * FixSuggestion out. Never throws; collaborator failures and malformed replies
 * return the canonical fallback, which asks for a human.
 */

import { Logger } from '../../utils/logger';
import { getErrorMessage } from '../../utils/errorUtils';
import type { JsonCollaborator } from '../llm/LLMClient';
import { RETRY_LIMITS } from './constants/Timeouts';
import { SchemaValidator } from './schemas/CollaboratorSchemas';
import type { FixSuggestion } from './types/ExecutionTypes';

const SYSTEM_PROMPT =
  'You are a senior debugging engineer who ALWAYS tries to fix errors autonomously. ' +
  'Only escalate to humans as an absolute last resort. Return only valid JSON with solution, ' +
  'explanation, confidence, needs_human (default false), and optionally human_instructions.';

export function fallbackFixSuggestion(): FixSuggestion {
  return {
    solution: undefined,
    explanation: 'Could not generate auto-fix',
    confidence: 'low',
    needsHuman: true,
    humanInstructions: 'Please review the error manually and fix the issue.',
  };
}

export function buildFixPrompt(errorMessage: string, context: string, previousAttempt: string, retryCount: number): string {
  return `An error occurred while ${context}.

Previous attempt:
\`\`\`
${previousAttempt}
\`\`\`

Error message:
\`\`\`
${errorMessage}
\`\`\`

Retry count: ${retryCount}

IMPORTANT: Your goal is to FIX THIS ERROR AUTONOMOUSLY. Only flag needs_human=true if it's IMPOSSIBLE to fix without human intervention (e.g., requires external credentials, manual API setup, physical access).

For common errors you CAN and SHOULD fix:
- Missing files/directories → Create them
- Missing project structure → Initialize it with the proper commands (django-admin startproject, npm init, etc.)
- Missing dependencies → Install them
- Wrong directory → cd to the correct directory or create it
- Configuration issues → Generate proper config
- Missing environment variables → Create .env with placeholders

Analyze this error and provide an AUTONOMOUS fix. Return JSON with:
- solution: The corrected code/command(s) to try - can be multiple commands separated by &&
- explanation: Brief explanation of what went wrong and how your fix addresses it
- confidence: "high" if you're confident this will work, "medium" if unsure, "low" if unlikely to work
- needs_human: true ONLY if truly impossible to fix autonomously (default: false)
- human_instructions: (only if needs_human=true) detailed step-by-step instructions for the human
`;
}

export class AutoFixAdvisor {
  constructor(private readonly collaborator: JsonCollaborator) {}

  async suggestFix(
    errorMessage: string,
    context: string,
    previousAttempt: string,
    retryCount: number
  ): Promise<FixSuggestion> {
    Logger.info(`🤖 Analyzing error (attempt ${retryCount + 1}/${RETRY_LIMITS.MAX_AUTO_RETRY_ATTEMPTS})`);

    let reply: unknown;
    try {
      reply = await this.collaborator(SYSTEM_PROMPT, buildFixPrompt(errorMessage, context, previousAttempt, retryCount));
    } catch (error) {
      Logger.warn(`[AutoFixAdvisor] Collaborator failed: ${getErrorMessage(error)}`);
      return fallbackFixSuggestion();
    }

    return SchemaValidator.decodeFixSuggestion(reply) ?? fallbackFixSuggestion();
  }
}
