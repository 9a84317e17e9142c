import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { appendFileSync, mkdirSync, mkdtempSync, rmSync, utimesSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { projectKey } from '../src/config.js';
import { LogAccessError } from '../src/errors.js';
import { LogSource, findLatestLog, splitLines } from '../src/log-source.js';
import type { PollResult } from '../src/log-source.js';

function userLine(content: string): string {
  return `${JSON.stringify({ type: 'user', timestamp: '2026-03-01T10:00:00.000Z', message: { content } })}\n`;
}

function assistantLine(text: string): string {
  return `${JSON.stringify({ type: 'assistant', message: { content: [{ type: 'text', text }] } })}\n`;
}

function summarize(result: PollResult): Array<[number, string, string]> {
  return result.messages.map((m) => [m.index, m.role, m.content]);
}

describe('splitLines', () => {
  it('returns complete lines and the trailing partial line', () => {
    const { lines, rest } = splitLines(Buffer.from('one\ntwo\nthr'));

    expect(lines).toEqual(['one', 'two']);
    expect(rest.toString()).toBe('thr');
  });

  it('returns an empty rest after a final newline', () => {
    const { lines, rest } = splitLines(Buffer.from('one\n'));

    expect(lines).toEqual(['one']);
    expect(rest.length).toBe(0);
  });
});

describe('LogSource', () => {
  let root: string;
  let projectsDir: string;
  let project: string;
  let logDir: string;
  let source: LogSource;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'shepherd-log-'));
    projectsDir = join(root, 'claude-projects');
    project = join(root, 'project');
    mkdirSync(project);
    logDir = join(projectsDir, projectKey(project));
    source = new LogSource({ projectsDir });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('rejects a project path that does not exist', async () => {
    await expect(source.open(join(root, 'missing'))).rejects.toBeInstanceOf(LogAccessError);
  });

  it('rejects a project path that is a file', async () => {
    const file = join(root, 'file.txt');
    writeFileSync(file, 'x');

    await expect(source.open(file)).rejects.toThrow(`Project path is not a directory: ${file}`);
  });

  it('waits until a conversation log exists', async () => {
    const handle = await source.open(project);

    expect(handle.file).toBeNull();
    expect(await source.poll(handle)).toEqual({ status: 'waiting', messages: [] });
  });

  it('reads a log created after opening from its start', async () => {
    const handle = await source.open(project);
    mkdirSync(logDir, { recursive: true });
    writeFileSync(join(logDir, 'a.jsonl'), userLine('first') + assistantLine('second'));

    const result = await source.poll(handle);

    expect(result.status).toBe('ready');
    expect(summarize(result)).toEqual([
      [1, 'user', 'first'],
      [2, 'assistant', 'second'],
    ]);
    expect(handle.file).toBe(join(logDir, 'a.jsonl'));
  });

  it('follows an existing log from its end', async () => {
    mkdirSync(logDir, { recursive: true });
    const file = join(logDir, 'a.jsonl');
    writeFileSync(file, userLine('history'));

    const handle = await source.open(project);
    expect(summarize(await source.poll(handle))).toEqual([]);

    appendFileSync(file, userLine('live'));
    expect(summarize(await source.poll(handle))).toEqual([[1, 'user', 'live']]);
  });

  it('holds a partial line until its newline arrives', async () => {
    mkdirSync(logDir, { recursive: true });
    const file = join(logDir, 'a.jsonl');
    writeFileSync(file, userLine('history'));
    const handle = await source.open(project);

    const line = userLine('split across writes');
    appendFileSync(file, line.slice(0, 20));
    expect(summarize(await source.poll(handle))).toEqual([]);

    appendFileSync(file, line.slice(20));
    expect(summarize(await source.poll(handle))).toEqual([[1, 'user', 'split across writes']]);
  });

  it('drops the unfinished line it opened inside and reads the ones after it', async () => {
    mkdirSync(logDir, { recursive: true });
    const file = join(logDir, 'a.jsonl');
    const interrupted = userLine('second');
    writeFileSync(file, userLine('first') + interrupted.slice(0, 15));
    const handle = await source.open(project);

    appendFileSync(file, interrupted.slice(15) + userLine('third'));
    expect(await source.poll(handle)).toEqual({
      status: 'ready',
      messages: [expect.objectContaining({ index: 1, role: 'user', content: 'third' })],
    });

    appendFileSync(file, userLine('fourth'));
    expect(summarize(await source.poll(handle))).toEqual([[2, 'user', 'fourth']]);
  });

  it('keeps dropping an unfinished line across polls until it ends', async () => {
    mkdirSync(logDir, { recursive: true });
    const file = join(logDir, 'a.jsonl');
    const interrupted = userLine('long line');
    writeFileSync(file, interrupted.slice(0, 10));
    const handle = await source.open(project);

    appendFileSync(file, interrupted.slice(10, 20));
    expect(await source.poll(handle)).toEqual({ status: 'ready', messages: [] });

    appendFileSync(file, interrupted.slice(20) + assistantLine('after'));
    expect(summarize(await source.poll(handle))).toEqual([[1, 'assistant', 'after']]);
  });

  it('skips entries that are not conversation turns without using an index', async () => {
    mkdirSync(logDir, { recursive: true });
    const file = join(logDir, 'a.jsonl');
    writeFileSync(file, '');
    const handle = await source.open(project);

    appendFileSync(file, `${JSON.stringify({ type: 'summary', summary: 'x' })}\nnot json\n${userLine('kept')}`);

    expect(summarize(await source.poll(handle))).toEqual([[1, 'user', 'kept']]);
  });

  it('resets on truncation and continues the index sequence', async () => {
    mkdirSync(logDir, { recursive: true });
    const file = join(logDir, 'a.jsonl');
    writeFileSync(file, '');
    const handle = await source.open(project);
    appendFileSync(file, userLine('one') + userLine('two'));
    expect(summarize(await source.poll(handle))).toEqual([
      [1, 'user', 'one'],
      [2, 'user', 'two'],
    ]);

    writeFileSync(file, userLine('x'));
    const reset = await source.poll(handle);
    expect(reset).toEqual({
      status: 'ready',
      messages: [],
      rotation: { previousFile: file, currentFile: file, reason: 'truncated' },
    });

    appendFileSync(file, userLine('three'));
    expect(summarize(await source.poll(handle))).toEqual([[3, 'user', 'three']]);
  });

  it('switches to a newer log file', async () => {
    mkdirSync(logDir, { recursive: true });
    const first = join(logDir, 'a.jsonl');
    const second = join(logDir, 'b.jsonl');
    writeFileSync(first, userLine('old session'));
    const handle = await source.open(project);

    writeFileSync(second, userLine('new session'));
    const later = Date.now() / 1000 + 60;
    utimesSync(second, later, later);

    const result = await source.poll(handle);
    expect(result.messages).toEqual([]);
    expect(result.rotation).toEqual({ previousFile: first, currentFile: second, reason: 'switched' });

    appendFileSync(second, assistantLine('reply'));
    utimesSync(second, later + 1, later + 1);
    expect(summarize(await source.poll(handle))).toEqual([[1, 'assistant', 'reply']]);
  });

  it('drops the unfinished line of a log it switches to', async () => {
    mkdirSync(logDir, { recursive: true });
    const first = join(logDir, 'a.jsonl');
    const second = join(logDir, 'b.jsonl');
    writeFileSync(first, userLine('old session'));
    const handle = await source.open(project);

    const interrupted = userLine('in progress');
    writeFileSync(second, userLine('new session') + interrupted.slice(0, 12));
    const later = Date.now() / 1000 + 60;
    utimesSync(second, later, later);
    expect((await source.poll(handle)).rotation).toEqual({ previousFile: first, currentFile: second, reason: 'switched' });

    appendFileSync(second, interrupted.slice(12) + assistantLine('reply'));
    utimesSync(second, later + 1, later + 1);
    const result = await source.poll(handle);
    expect(result.rotation).toBeUndefined();
    expect(summarize(result)).toEqual([[1, 'assistant', 'reply']]);
  });

  it('reports a discontinuity when the bytes before the cursor changed', async () => {
    mkdirSync(logDir, { recursive: true });
    const file = join(logDir, 'a.jsonl');
    const original = userLine('original');
    writeFileSync(file, original);
    const handle = await source.open(project);

    const rewritten = `${'x'.repeat(original.length + 5)}\n`;
    writeFileSync(file, rewritten);

    const result = await source.poll(handle);
    expect(result.rotation).toEqual({ previousFile: file, currentFile: file, reason: 'discontinuity' });
    expect(handle.offset).toBe(rewritten.length);
  });
});

describe('findLatestLog', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'shepherd-latest-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns null for a missing directory', async () => {
    expect(await findLatestLog(join(dir, 'nope'))).toBeNull();
  });

  it('ignores files that are not jsonl', async () => {
    writeFileSync(join(dir, 'notes.txt'), 'x');

    expect(await findLatestLog(dir)).toBeNull();
  });

  it('picks the most recently modified log', async () => {
    writeFileSync(join(dir, 'a.jsonl'), 'a\n');
    writeFileSync(join(dir, 'b.jsonl'), 'bb\n');
    const earlier = Date.now() / 1000 - 60;
    utimesSync(join(dir, 'b.jsonl'), earlier, earlier);

    expect(await findLatestLog(dir)).toMatchObject({ path: join(dir, 'a.jsonl'), size: 2 });
  });
});
