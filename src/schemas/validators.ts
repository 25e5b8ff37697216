/**
 * Schema Validation with Zod
 * Runtime validation for everything read back from disk
 */

import { z } from 'zod';
import { ENGINE_STATES } from '../types/engine-state';
import type { EngineState } from '../types/engine-state';
import { TURN_SENDERS } from '../types/project';
import type { Project, ProjectState, Turn } from '../types/project';

export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: string[];
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

function parseJson(json: string): { ok: true; data: unknown } | { ok: false; error: string } {
  try {
    const data: unknown = JSON.parse(json);
    return { ok: true, data };
  } catch (e) {
    return { ok: false, error: `Invalid JSON: ${e instanceof Error ? e.message : String(e)}` };
  }
}

// =============================================================================
// Engine state
// =============================================================================

export const engineStateSchema = z.enum(ENGINE_STATES);

/**
 * Strictly parse a persisted status name
 */
export function parseEngineState(value: unknown): ValidationResult<EngineState> {
  const result = engineStateSchema.safeParse(value);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: [`Unknown engine state: ${JSON.stringify(value)}`] };
}

// =============================================================================
// Turns and project state
// =============================================================================

const turnSchema = z.object({
  sender: z.enum(TURN_SENDERS),
  message: z.string(),
  timestamp: z.string().datetime({ offset: true }),
  metadata: z.record(z.string()).optional(),
});

const projectStateSchema = z.object({
  projectId: z.string().min(1),
  conversationHistory: z.array(turnSchema).default([]),
  currentStatus: engineStateSchema,
  lastInstructionSent: z.string().nullable().default(null),
  contextSummary: z.string().nullable().default(null),
  pendingUserQuestion: z.string().nullable().default(null),
  managerTurnsSinceLastSummary: z.number().int().min(0).default(0),
});

export function validateTurn(data: unknown): ValidationResult<Turn> {
  const result = turnSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

export function validateProjectState(data: unknown): ValidationResult<ProjectState> {
  const result = projectStateSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

export function parseProjectState(json: string): ValidationResult<ProjectState> {
  const parsed = parseJson(json);
  if (!parsed.ok) {
    return { success: false, errors: [parsed.error] };
  }
  return validateProjectState(parsed.data);
}

// =============================================================================
// Project registry
// =============================================================================

const projectSchema = z.object({
  name: z.string().trim().min(1, 'Project name cannot be empty'),
  workspaceRootPath: z.string().min(1, 'Workspace path cannot be empty'),
  overallGoal: z.string(),
  id: z.string().min(1).optional(),
});

const projectsFileSchema = z.object({
  schemaVersion: z.literal('1.0.0'),
  projects: z.array(projectSchema),
});

export interface ProjectsFile {
  schemaVersion: '1.0.0';
  projects: Project[];
}

export function parseProjectsFile(json: string): ValidationResult<ProjectsFile> {
  const parsed = parseJson(json);
  if (!parsed.ok) {
    return { success: false, errors: [parsed.error] };
  }
  const result = projectsFileSchema.safeParse(parsed.data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

// =============================================================================
// Config files (repo and user level)
// =============================================================================

const fileConfigSchema = z
  .object({
    resultTimeoutSeconds: z.number().positive(),
    backendTimeoutSeconds: z.number().positive(),
    summarizationInterval: z.number().int().min(0),
    maxHistoryTurns: z.number().int().min(1),
    maxContextTokens: z.number().int().min(1),
    summaryMaxTokens: z.number().int().min(1),
    debounceSeconds: z.number().min(0),
    usePolling: z.boolean(),
    instructionsDir: z.string().min(1),
    logsDir: z.string().min(1),
    instructionFileName: z.string().min(1),
    resultFileName: z.string().min(1),
    backend: z.enum(['claude', 'codex', 'mock']),
    model: z.string().min(1),
    executablePath: z.string().min(1),
    dataDirectory: z.string().min(1),
  })
  .partial()
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

export function parseFileConfig(json: string): ValidationResult<FileConfig> {
  const parsed = parseJson(json);
  if (!parsed.ok) {
    return { success: false, errors: [parsed.error] };
  }
  const result = fileConfigSchema.safeParse(parsed.data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}
