/**
 * @convo-shepherd/prompt-hook - UserPromptSubmit hook
 *
 * Claude Code runs the hook before each prompt with a JSON payload on
 * stdin. Whatever the hook prints is added to the prompt's context, so a
 * pending shepherd suggestion reaches the assistant on its next turn.
 */

import { z } from 'zod';
import { consumeSuggestion, getStateDir } from './suggestions.js';

export { consumeSuggestion, getStateDir, projectKey, suggestionPath } from './suggestions.js';

export const hookPayloadSchema = z
  .object({
    cwd: z.string().min(1),
    session_id: z.string().optional(),
    prompt: z.string().optional(),
  })
  .passthrough();

export type HookPayload = z.infer<typeof hookPayloadSchema>;

/**
 * Parse the hook payload; null when it is not usable
 */
export function parseHookPayload(input: string): HookPayload | null {
  let raw: unknown;
  try {
    raw = JSON.parse(input);
  } catch {
    return null;
  }
  const parsed = hookPayloadSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Text to print for this prompt: the pending suggestion followed by a blank
 * line, or an empty string
 */
export async function runHook(input: string, stateDir: string = getStateDir()): Promise<string> {
  const payload = parseHookPayload(input);
  if (!payload) return '';

  const suggestion = await consumeSuggestion(stateDir, payload.cwd);
  return suggestion ? `${suggestion}\n\n` : '';
}
