/**
 * Collaborator Schemas
 *
 * Zod schemas for every JSON document the engine reads: collaborator replies
 * and the architecture / task-list artifacts. Replies that fail their schema
 * are treated as malformed and the caller takes its fallback.
 */

import { z } from 'zod';
import { Logger } from '../../../utils/logger';
import type {
  CodeChangeSet,
  DebugFix,
  FixSuggestion,
  JsonObject,
  Task,
} from '../types/ExecutionTypes';

const ConfidenceSchema = z.enum(['high', 'medium', 'low']);

/** null and missing are the same thing on the wire */
const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const FileContentSchema = z.object({
  path: z.string().min(1),
  content: z.string().default(''),
});

// ============================================================================
// Fix advisor
// ============================================================================

export const FixSuggestionSchema = z
  .object({
    solution: optionalText,
    explanation: z.string().default('Trying alternative approach'),
    confidence: ConfidenceSchema.default('low'),
    needs_human: z.boolean().default(false),
    human_instructions: optionalText,
  })
  .transform(
    (raw): FixSuggestion => ({
      solution: raw.solution,
      explanation: raw.explanation,
      confidence: raw.confidence,
      needsHuman: raw.needs_human,
      humanInstructions: raw.human_instructions,
    })
  );

// ============================================================================
// Debugging collaborator
// ============================================================================

export const DebugFixSchema = z
  .object({
    files_to_create: z.array(FileContentSchema).default([]),
    files_to_modify: z.array(FileContentSchema).default([]),
    files_to_delete: z.array(z.string()).default([]),
    commands_to_run: z.array(z.string()).default([]),
    explanation: z.string().default('Unknown fix'),
    confidence: ConfidenceSchema.default('low'),
    needs_human: z.boolean().default(false),
    human_instructions: optionalText,
  })
  .transform(
    (raw): DebugFix => ({
      filesToCreate: raw.files_to_create,
      filesToModify: raw.files_to_modify,
      filesToDelete: raw.files_to_delete,
      commandsToRun: raw.commands_to_run,
      explanation: raw.explanation,
      confidence: raw.confidence,
      needsHuman: raw.needs_human,
      humanInstructions: raw.human_instructions,
    })
  );

// ============================================================================
// Code-generation collaborator
// ============================================================================

export const CodeChangeSetSchema = z
  .object({
    files: z
      .array(
        z.object({
          path: z.string().min(1),
          content: z.string().default(''),
          action: z.enum(['create', 'modify']).default('create'),
        })
      )
      .default([]),
    tests: z
      .array(
        z.object({
          path: z.string().min(1),
          content: z.string().default(''),
          type: optionalText,
        })
      )
      .default([]),
    description: z.string().default(''),
  })
  .transform(
    (raw): CodeChangeSet => ({
      files: raw.files,
      tests: raw.tests.map((test) => ({
        path: test.path,
        content: test.content,
        ...(test.type !== undefined ? { type: test.type } : {}),
      })),
      description: raw.description,
    })
  );

// ============================================================================
// Setup-plan collaborator
// ============================================================================

export const SetupPlanSchema = z.object({
  setup_commands: z.array(z.string()).default([]),
});

// ============================================================================
// Artifacts
// ============================================================================

export const ArchitectureSchema = z.record(z.unknown());

const stringList = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => (value === undefined ? [] : typeof value === 'string' ? [value] : value));

export const RawTaskSchema = z.object({
  title: z.string().optional(),
  description: z.string().default(''),
  owners: stringList,
  dependencies: stringList,
  acceptance_criteria: stringList,
});

export const TaskListSchema = z
  .object({
    major_tasks: z.array(RawTaskSchema).default([]),
  })
  .passthrough();

// ============================================================================
// Validator
// ============================================================================

export class SchemaValidator {
  /**
   * Parse or return null, logging the violations
   */
  static decode<S extends z.ZodTypeAny>(schema: S, data: unknown, label: string): z.output<S> | null {
    if (data === null || data === undefined) {
      return null;
    }
    const result = schema.safeParse(data);
    if (!result.success) {
      Logger.warn(`[SchemaValidator] Malformed ${label} response`, {
        errors: this.getValidationErrors(result.error),
      });
      return null;
    }
    return result.data;
  }

  static decodeFixSuggestion(data: unknown): FixSuggestion | null {
    return this.decode(FixSuggestionSchema, data, 'fix suggestion');
  }

  static decodeDebugFix(data: unknown): DebugFix | null {
    return this.decode(DebugFixSchema, data, 'debug fix');
  }

  static decodeCodeChangeSet(data: unknown): CodeChangeSet | null {
    return this.decode(CodeChangeSetSchema, data, 'code generation');
  }

  static decodeSetupPlan(data: unknown): string[] | null {
    const plan = this.decode(SetupPlanSchema, data, 'setup plan');
    return plan ? plan.setup_commands : null;
  }

  static decodeArchitecture(data: unknown): JsonObject | null {
    return this.decode(ArchitectureSchema, data, 'architecture');
  }

  /**
   * Task list document plus its decoded tasks (untitled tasks become `Task <n>`)
   */
  static decodeTaskList(data: unknown): { document: JsonObject; tasks: Task[] } | null {
    const document = this.decode(ArchitectureSchema, data, 'task list');
    const parsed = this.decode(TaskListSchema, data, 'task list');
    if (!document || !parsed) {
      return null;
    }

    const tasks = parsed.major_tasks.map(
      (raw, index): Task => ({
        title: raw.title && raw.title.trim() ? raw.title : `Task ${index + 1}`,
        description: raw.description,
        owners: raw.owners,
        dependencies: raw.dependencies,
        acceptanceCriteria: raw.acceptance_criteria,
      })
    );

    return { document, tasks };
  }

  static getValidationErrors(error: z.ZodError): string[] {
    return error.errors.map((err) => {
      const path = err.path.join('.');
      return `${path}: ${err.message}`;
    });
  }
}
