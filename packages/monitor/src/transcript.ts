/**
 * Claude Code transcript entries.
 *
 * Each line of a conversation log is one JSON entry. User entries carry
 * `message.content` as a string; assistant entries carry an array of
 * content blocks, of which only text blocks are kept.
 */

import { z } from 'zod';
import type { MessageRole } from './types.js';

const contentBlockSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

const transcriptEntrySchema = z
  .object({
    type: z.string(),
    timestamp: z.string().optional(),
    content: z.unknown().optional(),
    message: z
      .object({
        content: z.union([z.string(), z.array(z.unknown())]).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type TranscriptEntry = z.infer<typeof transcriptEntrySchema>;

export interface ParsedEntry {
  role: MessageRole;
  content: string;
  timestamp: string;
}

function isRole(type: string): type is MessageRole {
  return type === 'user' || type === 'assistant';
}

/**
 * Text of an entry: nested message content first, top-level content as fallback
 */
export function extractContent(entry: TranscriptEntry): string {
  const nested = entry.message?.content;

  if (typeof nested === 'string') {
    return nested;
  }

  if (Array.isArray(nested)) {
    const parts: string[] = [];
    for (const block of nested) {
      const parsed = contentBlockSchema.safeParse(block);
      if (parsed.success && parsed.data.type === 'text' && parsed.data.text) {
        parts.push(parsed.data.text);
      }
    }
    return parts.join(' ');
  }

  return typeof entry.content === 'string' ? entry.content : '';
}

function normalizeTimestamp(value: string | undefined, fallback: Date): string {
  if (value) {
    const parsed = new Date(value);
    if (!Number.isNaN(parsed.getTime())) {
      return parsed.toISOString();
    }
  }
  return fallback.toISOString();
}

/**
 * Parse one log line into a role-tagged entry.
 * Returns null for malformed JSON, non-conversation entries and empty text.
 */
export function parseTranscriptLine(line: string, readAt: Date = new Date()): ParsedEntry | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch {
    return null;
  }

  const parsed = transcriptEntrySchema.safeParse(raw);
  if (!parsed.success || !isRole(parsed.data.type)) {
    return null;
  }

  const content = extractContent(parsed.data);
  if (!content.trim()) {
    return null;
  }

  return {
    role: parsed.data.type,
    content,
    timestamp: normalizeTimestamp(parsed.data.timestamp, readAt),
  };
}
