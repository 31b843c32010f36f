/**
 * ReadmeGenerator
 *
 * Builds README.md from the architecture document. The README is the shared
 * context handed to every collaborator, and later receives a Quick Start
 * section with the verified run commands.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { Logger } from '../../utils/logger';
import { getErrorMessage } from '../../utils/errorUtils';
import { isPlainObject, listAt, objectAt, stringAt } from '../../utils/ObjectUtils';
import { CommandExecutor, commandSucceeded } from './CommandRunner';
import { COMMAND_TIMEOUTS, TEXT_LIMITS } from './constants/Timeouts';
import type { FileTreeSnapshot, JsonObject } from './types/ExecutionTypes';

export interface SystemInfo {
  os: string;
  nodeVersion: string;
  /** Tool name → version string, only for tools that answered */
  toolVersions: Record<string, string>;
}

const VERSION_PROBES: Array<{ tool: string; command: string }> = [
  { tool: 'Python', command: 'python --version' },
  { tool: 'Django', command: 'python -m django --version' },
];

/**
 * "user_api service" → "User_Api Service"
 */
export function titleCase(value: string): string {
  return value.replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

function renderComponents(architecture: JsonObject): string {
  const components = architecture.components;
  if (!isPlainObject(components)) {
    return '';
  }
  return Object.entries(components)
    .map(([name, details]) => {
      const functionality = isPlainObject(details)
        ? stringAt(details, 'functionality', 'Component functionality')
        : String(details);
      return `- **${titleCase(name)}**: ${functionality}\n`;
    })
    .join('');
}

function renderTechStack(architecture: JsonObject): string {
  let out = '';
  for (const [component, details] of Object.entries(objectAt(architecture, 'tech_stack'))) {
    out += `\n### ${titleCase(component)}\n\n`;
    if (!isPlainObject(details)) {
      out += `- **Framework**: ${String(details)}\n`;
      continue;
    }
    out += `- **Framework**: ${stringAt(details, 'framework', 'N/A')}\n`;
    const libraries = listAt(details, 'libraries');
    if (libraries.length > 0) {
      out += '- **Libraries**:\n' + libraries.map((lib) => `  - ${lib}\n`).join('');
    }
    const version = stringAt(details, 'version');
    if (version) {
      out += `- **Version**: ${version}\n`;
    }
  }
  return out;
}

function renderDataFlow(architecture: JsonObject): string {
  const dataFlow = architecture.data_flow;
  if (typeof dataFlow === 'string') {
    return `${dataFlow}\n`;
  }
  if (Array.isArray(dataFlow)) {
    return dataFlow.map((step, i) => `${i + 1}. ${String(step)}\n`).join('');
  }
  if (isPlainObject(dataFlow)) {
    return Object.keys(dataFlow)
      .sort()
      .map((step) => `${step}. ${String(dataFlow[step])}\n`)
      .join('');
  }
  return '';
}

function renderInsight(insight: JsonObject | null | undefined): string {
  if (!insight) {
    return '';
  }
  let out = `
## Existing Codebase Analysis

This project has existing code that was analyzed before execution:

`;
  const existing = listAt(insight, 'existing_functionality');
  if (existing.length > 0) {
    out += '### Existing Functionality\n\n' + existing.map((f) => `- ${f}\n`).join('') + '\n';
  }
  const gaps = listAt(insight, 'gaps_and_opportunities');
  if (gaps.length > 0) {
    out += '### Gaps & Opportunities\n\n' + gaps.map((g) => `- ${g}\n`).join('') + '\n';
  }
  const recommendations = objectAt(insight, 'recommendations');
  if (Object.keys(recommendations).length > 0) {
    out += '### Integration Recommendations\n\n';
    const howToExtend = stringAt(recommendations, 'how_to_extend');
    if (howToExtend) out += `**How to Extend**: ${howToExtend}\n\n`;
    const patterns = stringAt(recommendations, 'patterns_to_follow');
    if (patterns) out += `**Patterns to Follow**: ${patterns}\n\n`;
    const integration = stringAt(recommendations, 'integration_points');
    if (integration) out += `**Integration Points**: ${integration}\n\n`;
  }
  return out;
}

export function buildReadme(
  architecture: JsonObject,
  snapshot: FileTreeSnapshot,
  system: SystemInfo,
  codebaseInsight?: JsonObject | null
): string {
  const appName = stringAt(architecture, 'app_name', 'Project');
  const assumptions = listAt(architecture, 'assumptions');
  const risks = listAt(architecture, 'risks');
  const fileTree = snapshot.files
    .slice(0, TEXT_LIMITS.README_TREE_FILES)
    .map((f) => `├── ${f}`)
    .join('\n');

  let readme = `# ${appName}

> Generated by Gryffin - AI-powered development tool

## Overview

${stringAt(architecture, 'overview', 'No overview available.')}

## What This App IS

${renderComponents(architecture)}
## What This App IS NOT

`;

  if (assumptions.length > 0) {
    readme += assumptions
      .map((a) => `- Not designed for: ${a.replace('Users will', 'Scenarios where users will not')}\n`)
      .join('');
  } else {
    readme += '- Not a production-ready application (MVP/prototype stage)\n';
    readme += '- Not fully tested in all environments\n';
  }

  readme += `
## File Structure

\`\`\`
${stringAt(architecture, 'app_name', 'project')}/
${fileTree}
\`\`\`

## System Configuration

- **Operating System**: ${system.os}
- **Node.js Version**: ${system.nodeVersion}
`;
  for (const [tool, version] of Object.entries(system.toolVersions)) {
    readme += `- **${tool}**: ${version}\n`;
  }

  readme += `
## Tech Stack
${renderTechStack(architecture)}
## Data Flow

${renderDataFlow(architecture)}`;

  if (risks.length > 0) {
    readme += '\n## Known Risks & Limitations\n\n' + risks.map((r) => `- ⚠️  ${r}\n`).join('');
  }
  if (assumptions.length > 0) {
    readme += '\n## Assumptions\n\n' + assumptions.map((a) => `- ${a}\n`).join('');
  }

  readme += renderInsight(codebaseInsight);

  readme += `
## Development

This project is being developed with Gryffin, which:
- Implements features task by task
- Tests and debugs code automatically
- Maintains this README for context

### For AI Agents

This README provides essential context for all AI agents working on this project:
- **Architecture**: Defines the high-level structure and components
- **Tech Stack**: Specifies technologies and versions in use
- **File Structure**: Shows organization of code and resources
- **System Config**: Indicates the development environment
- **Limitations**: Clarifies what this application is NOT designed for

When implementing features or debugging, always reference this README to maintain consistency with the project's architecture and constraints.

---

*Last updated: Auto-generated at project initialization*
`;

  return readme;
}

/**
 * Insert a Quick Start section before the first `## ` heading (after the
 * title when there is none). Unchanged when one already exists.
 */
export function insertQuickStart(readme: string, runInstructions: string): string {
  if (readme.includes('## Quick Start')) {
    return readme;
  }

  const quickStart = `\n\n## Quick Start\n\nTo run this project:\n\n${runInstructions}\n\n---\n`;
  const lines = readme.split('\n');
  const headingIndex = lines.findIndex((line) => line.startsWith('## '));
  const insertAt = headingIndex === -1 ? Math.min(2, lines.length) : headingIndex;

  lines.splice(insertAt, 0, quickStart);
  return lines.join('\n');
}

export class ReadmeGenerator {
  constructor(private readonly executor: CommandExecutor) {}

  async detectSystemInfo(targetDir: string): Promise<SystemInfo> {
    const toolVersions: Record<string, string> = {};

    for (const probe of VERSION_PROBES) {
      try {
        const result = await this.executor.run(probe.command, targetDir, COMMAND_TIMEOUTS.VERSION_PROBE);
        const version = (result.stdout || result.stderr).trim();
        if (commandSucceeded(result) && version) {
          toolVersions[probe.tool] = version;
        }
      } catch (error) {
        Logger.debug(`[ReadmeGenerator] ${probe.tool} not detected: ${getErrorMessage(error)}`);
      }
    }

    return {
      os: `${os.type()} ${os.release()}`,
      nodeVersion: process.version,
      toolVersions,
    };
  }

  async generate(
    architecture: JsonObject,
    targetDir: string,
    snapshot: FileTreeSnapshot,
    codebaseInsight?: JsonObject | null
  ): Promise<string> {
    Logger.info('📝 Generating README.md...');

    const system = await this.detectSystemInfo(targetDir);
    const content = buildReadme(architecture, snapshot, system, codebaseInsight);
    const readmePath = path.join(targetDir, 'README.md');
    fs.writeFileSync(readmePath, content, 'utf-8');

    Logger.info(`✓ README.md created at ${readmePath}`);
    return content;
  }

  /**
   * @returns whether README.md was changed
   */
  addQuickStart(targetDir: string, runInstructions: string): boolean {
    const readmePath = path.join(targetDir, 'README.md');
    if (!fs.existsSync(readmePath)) {
      return false;
    }
    const current = fs.readFileSync(readmePath, 'utf-8');
    const updated = insertQuickStart(current, runInstructions);
    if (updated === current) {
      return false;
    }
    fs.writeFileSync(readmePath, updated, 'utf-8');
    Logger.info('✓ README.md updated with Quick Start instructions');
    return true;
  }
}
