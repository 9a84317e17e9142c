/**
 * Hands the latest suggestion for a project to the prompt hook.
 *
 * One file per project under `<state dir>/suggestions/`. A write replaces
 * the previous suggestion atomically; the hook consumes it at most once.
 */

import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { getStateDir, projectKey } from './config.js';
import { SuggestionWriteError, describeError } from './errors.js';

export const SUGGESTIONS_DIR = 'suggestions';

/**
 * Suggestion file for a project
 */
export function suggestionPath(stateDir: string, projectId: string): string {
  return join(stateDir, SUGGESTIONS_DIR, `${projectKey(projectId)}.md`);
}

export interface SuggestionChannelOptions {
  /** Only writes when feedback mode is on */
  enabled: boolean;
  stateDir?: string;
}

export class SuggestionChannel {
  readonly enabled: boolean;
  readonly stateDir: string;
  private sequence = 0;

  constructor(options: SuggestionChannelOptions) {
    this.enabled = options.enabled;
    this.stateDir = options.stateDir ?? getStateDir();
  }

  /**
   * Replace the project's pending suggestion. Resolves false when the
   * channel is disabled or the text is blank.
   */
  async write(projectId: string, text: string): Promise<boolean> {
    const content = text.trim();
    if (!this.enabled || !content) return false;

    const target = suggestionPath(this.stateDir, projectId);
    this.sequence += 1;
    const temp = `${target}.${process.pid}.${this.sequence}.tmp`;

    let staged = false;
    try {
      await mkdir(join(this.stateDir, SUGGESTIONS_DIR), { recursive: true });
      await writeFile(temp, `${content}\n`, 'utf-8');
      staged = true;
      await rename(temp, target);
    } catch (err) {
      if (staged) await rm(temp, { force: true });
      throw new SuggestionWriteError(`Cannot write suggestion to ${target}: ${describeError(err)}`, {
        projectId,
        cause: err,
      });
    }

    return true;
  }
}
