/**
 * Configuration loading
 *
 * Rule settings come from `<project>/.shepherd/settings.json` or the
 * shared `~/.shepherd/settings.json`; the multi-project list from
 * `~/.shepherd/projects.json`. Both are validated once at load time.
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { z } from 'zod';
import { ConfigError, describeError } from './errors.js';
import type { Rule, RuleSet } from './types.js';
import { STOP_REQUEST_RULE_ID } from './types.js';

// Paths
export const CLAUDE_PROJECTS_DIR = join(homedir(), '.claude', 'projects');
export const SETTINGS_FILE = 'settings.json';
export const PROJECTS_FILE = 'projects.json';
export const LOG_FILE = 'shepherd.log';

export const DEFAULT_SEED = 'You are a software engineering supervisor monitoring a developer conversation.';

export const DEFAULTS = {
  contextSize: 10,
  heartbeatInterval: 10,
  pollIntervalMs: 250,
  logPollTimeoutMs: 2000,
  analysisTimeoutMs: 30000,
  shutdownGraceMs: 5000,
} as const;

/**
 * State directory for settings, suggestions and the log file
 */
export function getStateDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.SHEPHERD_HOME || join(homedir(), '.shepherd');
}

/**
 * Host tool's directory name for a project: the absolute path with every
 * non-alphanumeric character replaced by '-'
 */
export function projectKey(projectPath: string): string {
  return resolve(projectPath).replace(/[^a-zA-Z0-9]/g, '-');
}

const ruleIdSchema = z
  .string()
  .trim()
  .min(1, 'rule id must not be empty')
  .regex(/^\S+$/, 'rule id must not contain whitespace')
  .refine((id) => id !== STOP_REQUEST_RULE_ID, `"${STOP_REQUEST_RULE_ID}" is reserved`);

export const settingsSchema = z.object({
  seed: z.string().trim().min(1).optional(),
  rules: z.record(z.string().trim().min(1, 'rule description must not be empty')),
});

export type ShepherdSettings = z.infer<typeof settingsSchema>;

export const projectsSchema = z.object({
  projects: z.array(z.string().min(1)).min(1, 'projects must list at least one path'),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function readJson(path: string): unknown {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read ${path}: ${describeError(err)}`, { cause: err });
  }

  try {
    return JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${path}: ${describeError(err)}`, { cause: err });
  }
}

/**
 * Validate raw settings into an ordered rule set
 */
export function parseRuleSet(raw: unknown, source = 'settings'): RuleSet {
  const parsed = settingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(parsed.error)}`);
  }

  const rules: Rule[] = [];
  for (const [id, description] of Object.entries(parsed.data.rules)) {
    const checkedId = ruleIdSchema.safeParse(id);
    if (!checkedId.success) {
      throw new ConfigError(`Invalid ${source}: rules.${id}: ${formatIssues(checkedId.error)}`);
    }
    rules.push({ id: checkedId.data, description });
  }

  return {
    persona: parsed.data.seed ?? DEFAULT_SEED,
    rules,
  };
}

/**
 * Candidate settings files for a project, most specific first
 */
export function settingsCandidates(projectPath: string, stateDir: string = getStateDir()): string[] {
  return [join(resolve(projectPath), '.shepherd', SETTINGS_FILE), join(stateDir, SETTINGS_FILE)];
}

/**
 * Load the rule set that applies to a project
 */
export function loadRuleSet(projectPath: string, stateDir: string = getStateDir()): { ruleSet: RuleSet; source: string } {
  const candidates = settingsCandidates(projectPath, stateDir);
  const source = candidates.find((candidate) => existsSync(candidate));

  if (!source) {
    throw new ConfigError(`No shepherd settings found. Searched: ${candidates.join(', ')}`, {
      projectId: projectPath,
    });
  }

  try {
    return { ruleSet: parseRuleSet(readJson(source), source), source };
  } catch (err) {
    if (err instanceof ConfigError) {
      throw new ConfigError(err.message, { projectId: projectPath, cause: err.cause });
    }
    throw err;
  }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Load the multi-project list. Paths that are not directories are reported
 * through `onSkipped` and left out.
 */
export function loadProjectList(
  stateDir: string = getStateDir(),
  onSkipped: (path: string) => void = () => undefined
): string[] {
  const path = join(stateDir, PROJECTS_FILE);
  if (!existsSync(path)) {
    throw new ConfigError(
      `No projects config found at ${path}. Expected format: {"projects": ["/path/to/project1", "/path/to/project2"]}`
    );
  }

  const parsed = projectsSchema.safeParse(readJson(path));
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${path}: ${formatIssues(parsed.error)}`);
  }

  const valid: string[] = [];
  for (const project of parsed.data.projects) {
    const resolved = resolve(project);
    if (isDirectory(resolved)) {
      if (!valid.includes(resolved)) valid.push(resolved);
    } else {
      onSkipped(project);
    }
  }

  if (valid.length === 0) {
    throw new ConfigError(`No valid projects found in ${path}`);
  }

  return valid;
}
