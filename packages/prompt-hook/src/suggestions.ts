/**
 * Reading side of the suggestion channel.
 *
 * The monitor writes `<state dir>/suggestions/<project key>.md`; the hook
 * claims it by renaming, reads it and deletes it, so each suggestion is
 * injected at most once even when two prompts race.
 */

import { readFile, rename, rm } from 'fs/promises';
import { homedir } from 'os';
import { join, resolve } from 'path';

/**
 * State directory shared with the monitor
 */
export function getStateDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.SHEPHERD_HOME || join(homedir(), '.shepherd');
}

/**
 * Directory name the host tool uses for a project
 */
export function projectKey(projectPath: string): string {
  return resolve(projectPath).replace(/[^a-zA-Z0-9]/g, '-');
}

export function suggestionPath(stateDir: string, projectPath: string): string {
  return join(stateDir, 'suggestions', `${projectKey(projectPath)}.md`);
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Take the pending suggestion for a project, or null when there is none
 */
export async function consumeSuggestion(stateDir: string, projectPath: string): Promise<string | null> {
  const target = suggestionPath(stateDir, projectPath);
  const claimed = `${target}.${process.pid}.claimed`;

  try {
    await rename(target, claimed);
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }

  try {
    const text = (await readFile(claimed, 'utf-8')).trim();
    return text || null;
  } finally {
    await rm(claimed, { force: true });
  }
}
