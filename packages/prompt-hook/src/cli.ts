#!/usr/bin/env node

/**
 * shepherd-hook - register as a UserPromptSubmit hook:
 *
 *   "hooks": { "UserPromptSubmit": [{ "hooks": [{ "type": "command", "command": "shepherd-hook" }] }] }
 *
 * Never blocks the prompt: failures go to stderr and the exit code stays 0.
 */

import { runHook } from './index.js';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

async function main(): Promise<void> {
  const output = await runHook(await readStdin());
  if (output) process.stdout.write(output);
}

main().catch((error: unknown) => {
  console.error(`[shepherd-hook] ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 0;
});
