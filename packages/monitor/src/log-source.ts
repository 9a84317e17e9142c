/**
 * Incremental reader over a project's Claude Code conversation log.
 *
 * The host tool writes one `*.jsonl` file per conversation under
 * `~/.claude/projects/<project key>/`. The most recently modified file is
 * the live one. Only bytes appended since the cursor are read; a partial
 * trailing line waits in the handle until its newline arrives.
 */

import { open, readdir, stat } from 'fs/promises';
import { join, resolve } from 'path';
import { CLAUDE_PROJECTS_DIR, DEFAULTS, projectKey } from './config.js';
import { LogAccessError, describeError, errorCode } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { withTimeout } from './timing.js';
import { parseTranscriptLine } from './transcript.js';
import type { Message, RotationReason } from './types.js';

const NEWLINE = 0x0a;

/**
 * Read cursor for one project's log
 */
export interface LogHandle {
  readonly projectId: string;
  readonly logDir: string;
  /** Log file currently followed (null until one exists) */
  file: string | null;
  /** Byte offset of the next unread byte */
  offset: number;
  /** Index the next message will receive */
  nextIndex: number;
  /** Bytes of an incomplete trailing line */
  pending: Buffer;
  /** Set when the cursor landed inside a line; its remainder is dropped */
  skipToNewline: boolean;
}

export interface LogRotation {
  previousFile: string | null;
  currentFile: string;
  reason: RotationReason;
}

export interface PollResult {
  /** `waiting` while the project has no conversation log yet */
  status: 'waiting' | 'ready';
  /** New messages in index order (possibly empty) */
  messages: Message[];
  rotation?: LogRotation;
}

/**
 * What a supervisor needs from a log; replaceable in tests
 */
export interface ConversationLog {
  open(projectId: string): Promise<LogHandle>;
  poll(handle: LogHandle): Promise<PollResult>;
}

export interface LogSourceOptions {
  /** Root holding one directory per project (default ~/.claude/projects) */
  projectsDir?: string;
  /** Upper bound for a single poll in ms */
  pollTimeoutMs?: number;
  logger?: Logger;
}

interface LogFileInfo {
  path: string;
  size: number;
  mtimeMs: number;
}

type Cursor = Pick<LogHandle, 'file' | 'offset' | 'nextIndex' | 'pending' | 'skipToNewline'>;

/**
 * Most recently modified `*.jsonl` file in a directory, or null
 */
export async function findLatestLog(logDir: string): Promise<LogFileInfo | null> {
  let names: string[];
  try {
    names = await readdir(logDir);
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return null;
    throw new LogAccessError(`Cannot list ${logDir}: ${describeError(err)}`, { cause: err });
  }

  let latest: LogFileInfo | null = null;
  for (const name of names) {
    if (!name.endsWith('.jsonl')) continue;
    const path = join(logDir, name);
    try {
      const info = await stat(path);
      if (!info.isFile()) continue;
      if (!latest || info.mtimeMs > latest.mtimeMs || (info.mtimeMs === latest.mtimeMs && path > latest.path)) {
        latest = { path, size: info.size, mtimeMs: info.mtimeMs };
      }
    } catch (err) {
      // Removed between readdir and stat
      if (errorCode(err) !== 'ENOENT') {
        throw new LogAccessError(`Cannot stat ${path}: ${describeError(err)}`, { cause: err });
      }
    }
  }

  return latest;
}

async function readRange(path: string, start: number, end: number): Promise<Buffer> {
  const length = end - start;
  if (length <= 0) return Buffer.alloc(0);

  const fh = await open(path, 'r');
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await fh.read(buffer, 0, length, start);
    return buffer.subarray(0, bytesRead);
  } finally {
    await fh.close();
  }
}

/**
 * True when the last byte before `size` is not a newline
 */
async function endsMidLine(path: string, size: number): Promise<boolean> {
  if (size === 0) return false;
  const last = await readRange(path, size - 1, size);
  return last.length === 1 && last[0] !== NEWLINE;
}

/**
 * Split into complete lines and the trailing partial line
 */
export function splitLines(data: Buffer): { lines: string[]; rest: Buffer } {
  const lines: string[] = [];
  let start = 0;
  let newline = data.indexOf(NEWLINE, start);

  while (newline !== -1) {
    lines.push(data.subarray(start, newline).toString('utf-8'));
    start = newline + 1;
    newline = data.indexOf(NEWLINE, start);
  }

  return { lines, rest: Buffer.from(data.subarray(start)) };
}

export class LogSource implements ConversationLog {
  private readonly projectsDir: string;
  private readonly pollTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: LogSourceOptions = {}) {
    this.projectsDir = options.projectsDir ?? CLAUDE_PROJECTS_DIR;
    this.pollTimeoutMs = options.pollTimeoutMs ?? DEFAULTS.logPollTimeoutMs;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Locate the project's log directory. An existing conversation log is
   * followed from its current end; history is not replayed.
   */
  async open(projectId: string): Promise<LogHandle> {
    const projectPath = resolve(projectId);

    let isDirectory = false;
    try {
      isDirectory = (await stat(projectPath)).isDirectory();
    } catch (err) {
      throw new LogAccessError(`Project path is not accessible: ${projectPath} (${describeError(err)})`, {
        projectId,
        cause: err,
      });
    }
    if (!isDirectory) {
      throw new LogAccessError(`Project path is not a directory: ${projectPath}`, { projectId });
    }

    try {
      await readdir(this.projectsDir);
    } catch (err) {
      if (errorCode(err) !== 'ENOENT') {
        throw new LogAccessError(`Cannot read ${this.projectsDir}: ${describeError(err)}`, { projectId, cause: err });
      }
    }

    const logDir = join(this.projectsDir, projectKey(projectPath));
    const handle: LogHandle = {
      projectId,
      logDir,
      file: null,
      offset: 0,
      nextIndex: 1,
      pending: Buffer.alloc(0),
      skipToNewline: false,
    };

    const latest = await this.guard(projectId, findLatestLog(logDir));
    if (latest) {
      handle.file = latest.path;
      handle.offset = latest.size;
      handle.skipToNewline = await this.guard(projectId, endsMidLine(latest.path, latest.size));
      this.logger.debug(`${projectId}: following ${latest.path} from byte ${latest.size}`);
    } else {
      this.logger.debug(`${projectId}: no conversation log yet in ${logDir}`);
    }

    return handle;
  }

  /**
   * Read everything appended since the last poll. The handle only advances
   * when the poll completes within the timeout.
   */
  async poll(handle: LogHandle): Promise<PollResult> {
    const { result, cursor } = await withTimeout(
      this.read(handle),
      this.pollTimeoutMs,
      () => new LogAccessError(`Polling ${handle.file ?? handle.logDir} timed out after ${this.pollTimeoutMs}ms`, {
        projectId: handle.projectId,
      })
    );

    handle.file = cursor.file;
    handle.offset = cursor.offset;
    handle.nextIndex = cursor.nextIndex;
    handle.pending = cursor.pending;
    handle.skipToNewline = cursor.skipToNewline;
    return result;
  }

  private async guard<T>(projectId: string, work: Promise<T>): Promise<T> {
    try {
      return await work;
    } catch (err) {
      if (err instanceof LogAccessError) {
        throw new LogAccessError(err.message, { projectId, cause: err.cause });
      }
      throw new LogAccessError(describeError(err), { projectId, cause: err });
    }
  }

  private async read(handle: LogHandle): Promise<{ result: PollResult; cursor: Cursor }> {
    const cursor: Cursor = {
      file: handle.file,
      offset: handle.offset,
      nextIndex: handle.nextIndex,
      pending: handle.pending,
      skipToNewline: handle.skipToNewline,
    };

    const latest = await this.guard(handle.projectId, findLatestLog(handle.logDir));
    if (!latest) {
      return { result: { status: 'waiting', messages: [] }, cursor };
    }

    if (cursor.file === null) {
      // First log created while watching: it is all new
      this.logger.info(`${handle.projectId}: conversation log appeared: ${latest.path}`);
      cursor.file = latest.path;
      cursor.offset = 0;
      cursor.pending = Buffer.alloc(0);
      cursor.skipToNewline = false;
    } else if (latest.path !== cursor.file) {
      return this.reset(handle, cursor, latest, 'switched');
    }

    if (latest.size < cursor.offset) {
      return this.reset(handle, cursor, latest, 'truncated');
    }

    if (latest.size === cursor.offset) {
      return { result: { status: 'ready', messages: [] }, cursor };
    }

    // Re-read the byte before the cursor to confirm the file still lines up
    const verify = cursor.offset > 0 && cursor.pending.length === 0 && !cursor.skipToNewline;
    let chunk: Buffer;
    try {
      chunk = await readRange(latest.path, verify ? cursor.offset - 1 : cursor.offset, latest.size);
    } catch (err) {
      if (errorCode(err) === 'ENOENT') {
        return { result: { status: 'ready', messages: [] }, cursor };
      }
      throw new LogAccessError(`Cannot read ${latest.path}: ${describeError(err)}`, {
        projectId: handle.projectId,
        cause: err,
      });
    }

    if (verify) {
      if (chunk[0] !== NEWLINE) {
        return this.reset(handle, cursor, latest, 'discontinuity');
      }
      chunk = chunk.subarray(1);
    }

    let fresh = chunk;
    if (cursor.skipToNewline) {
      const end = chunk.indexOf(NEWLINE);
      if (end === -1) {
        cursor.offset += chunk.length;
        return { result: { status: 'ready', messages: [] }, cursor };
      }
      fresh = chunk.subarray(end + 1);
      cursor.skipToNewline = false;
    }

    const readAt = new Date();
    const { lines, rest } = splitLines(Buffer.concat([cursor.pending, fresh]));
    const messages: Message[] = [];
    for (const line of lines) {
      const entry = parseTranscriptLine(line, readAt);
      if (!entry) continue;
      messages.push(Object.freeze({ index: cursor.nextIndex, ...entry }));
      cursor.nextIndex += 1;
    }

    cursor.offset += chunk.length;
    cursor.pending = rest;

    return { result: { status: 'ready', messages }, cursor };
  }

  private async reset(
    handle: LogHandle,
    cursor: Cursor,
    latest: LogFileInfo,
    reason: RotationReason
  ): Promise<{ result: PollResult; cursor: Cursor }> {
    const previousFile = cursor.file;
    const skipToNewline = await this.guard(handle.projectId, endsMidLine(latest.path, latest.size));
    this.logger.info(`${handle.projectId}: log ${reason}, resuming at end of ${latest.path}`);

    return {
      result: {
        status: 'ready',
        messages: [],
        rotation: { previousFile, currentFile: latest.path, reason },
      },
      cursor: {
        file: latest.path,
        offset: latest.size,
        nextIndex: cursor.nextIndex,
        pending: Buffer.alloc(0),
        skipToNewline,
      },
    };
  }
}
