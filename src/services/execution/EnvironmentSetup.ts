/**
 * EnvironmentSetup
 *
 * Asks the setup-plan collaborator for the shell commands that bring a fresh
 * project up (installs, .env, migrations), gets the operator's approval and
 * runs them through the CommandRunner.
 */

import os from 'os';
import { Logger } from '../../utils/logger';
import { getErrorMessage } from '../../utils/errorUtils';
import { listAt, objectAt, stringAt } from '../../utils/ObjectUtils';
import { askUser, UserPrompter } from '../InteractiveController';
import type { JsonCollaborator } from '../llm/LLMClient';
import { CommandRunner } from './CommandRunner';
import { TEXT_LIMITS } from './constants/Timeouts';
import { SchemaValidator } from './schemas/CollaboratorSchemas';
import type { EnvInfo, JsonObject } from './types/ExecutionTypes';

export interface SetupRequest {
  envInfo: EnvInfo;
  targetDir: string;
  architecture: JsonObject;
  readmeContent?: string;
  codebaseInsight?: JsonObject | null;
}

function systemPrompt(osType: string): string {
  return (
    `You are a senior DevOps engineer creating setup scripts for ${osType}. ` +
    'CRITICAL: Use OS-appropriate package managers (macOS=brew, Linux=apt/yum). Check if tools exist before ' +
    'installing. Always initialize project structure before running framework-specific commands. ' +
    'Return only valid JSON with setup_commands array.'
  );
}

export function buildSetupPrompt(request: SetupRequest, osDescription: string): string {
  let contextSection = '';
  if (request.readmeContent) {
    contextSection += `
## PROJECT README (MUST FOLLOW THIS)
${request.readmeContent.substring(0, TEXT_LIMITS.README_PROMPT_CHARS)}
`;
  }

  const insight = request.codebaseInsight;
  if (insight) {
    const techStack = objectAt(insight, 'tech_stack');
    contextSection += `
## EXISTING CODEBASE ANALYSIS (MUST RESPECT THIS)
Tech Stack: ${JSON.stringify(techStack, null, 2)}
Existing Dependencies: ${listAt(techStack, 'dependencies').join(', ')}
Architecture: ${stringAt(insight, 'architecture_summary', 'N/A')}
Patterns to Follow: ${stringAt(objectAt(insight, 'recommendations'), 'patterns_to_follow', 'N/A')}

CRITICAL: Only install dependencies that are compatible with the existing tech stack.
Do NOT install conflicting versions or alternative frameworks.
`;
  }

  return `Given this project architecture:
${JSON.stringify(request.architecture, null, 2)}

${contextSection}

And these detected setup needs:
${request.envInfo.needsSetup.join(', ')}

Project type: ${request.envInfo.projectType}
Current directory: ${request.targetDir}
Operating System: ${osDescription}

CRITICAL OS-SPECIFIC REQUIREMENTS:
- macOS (Darwin): Use 'brew' for packages, NOT apt/apt-get/yum
- Linux: Use apt/apt-get/yum based on distro
- Windows: Use choco or direct installers
- ALWAYS check if tools are already installed before trying to install them

CRITICAL ARCHITECTURE REQUIREMENTS:
- ONLY install dependencies that match the architecture in the README
- Do NOT deviate from the decided tech stack
- If the README specifies certain versions, use those exact versions

Generate COMPLETE setup commands including:
1. PROJECT INITIALIZATION (if needed)
2. DEPENDENCIES (only what's in the architecture/README)
3. CONFIGURATION (.env with all necessary variables, config files)
4. DATABASE (migrations only after the project structure exists)

IMPORTANT:
- CHECK if tools exist first using 'command -v' before installing
- Commands must be in the correct order (check existence → install if missing → initialize → configure)
- Use relative paths and proper directory navigation

Return JSON with key 'setup_commands' (array of shell commands to run in sequence).
`;
}

export class EnvironmentSetup {
  constructor(
    private readonly collaborator: JsonCollaborator,
    private readonly runner: CommandRunner,
    private readonly prompter: UserPrompter
  ) {}

  async setup(request: SetupRequest): Promise<boolean> {
    this.prompter.say('\n🔧 Setting up environment...');

    if (request.envInfo.needsSetup.length === 0) {
      this.prompter.say('✓ Environment already set up');
      return true;
    }

    const osType = os.type();
    const prompt = buildSetupPrompt(request, `${osType} ${os.release()}`);

    let commands = await this.requestPlan(osType, prompt);
    if (!commands) {
      this.prompter.say('⚠️  Could not generate setup plan. Please set up manually.');
      return false;
    }
    this.showPlan('📋 Setup plan', commands);

    const { choice, instructions } = await askUser(
      this.prompter,
      "Proceed with setup? (y/n, or add instructions like 'y, but also install redis')",
      { allowInstructions: true, context: 'Environment setup approval', logDir: request.targetDir }
    );

    if (instructions) {
      this.prompter.say(`\n💡 Adding to setup: ${instructions}`);
      const updated = await this.requestPlan(osType, `${prompt}\n\nAdditional user requirements: ${instructions}`);
      if (updated) {
        commands = updated;
        this.showPlan('📋 Updated setup plan', commands);
      }
    }

    if (choice !== 'y' && choice !== 'yes') {
      this.prompter.say('⏭️  Setup declined');
      return false;
    }

    for (const command of commands) {
      const ok = await this.runner.runWithRetry(command, request.targetDir, `running setup command: ${command}`, {
        logDir: request.targetDir,
      });
      if (!ok) {
        return false;
      }
    }

    this.prompter.say('\n✅ Environment setup complete!');
    return true;
  }

  private async requestPlan(osType: string, prompt: string): Promise<string[] | null> {
    try {
      return SchemaValidator.decodeSetupPlan(await this.collaborator(systemPrompt(osType), prompt));
    } catch (error) {
      Logger.warn(`[EnvironmentSetup] Collaborator failed: ${getErrorMessage(error)}`);
      return null;
    }
  }

  private showPlan(title: string, commands: string[]): void {
    this.prompter.say(`\n${title}: ${commands.length} commands`);
    commands.forEach((cmd, i) => this.prompter.say(`  ${i + 1}. ${cmd}`));
  }
}
