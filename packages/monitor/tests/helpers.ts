/**
 * In-process stand-ins for the conversation log, the reasoning service and
 * the suggestion channel
 */

import type { AnalysisClient, AnalysisRequest } from '../src/analysis-client.js';
import type { ConversationLog, LogHandle, PollResult } from '../src/log-source.js';
import type { SuggestionWriter } from '../src/supervisor.js';
import type { Message, MonitorEvent, RuleSet, Verdict } from '../src/types.js';

export const RULE_SET: RuleSet = {
  persona: 'You are a strict reviewer.',
  rules: [
    { id: 'test-coverage', description: 'Every behaviour change ships with unit tests' },
    { id: 'no-force-push', description: 'Never force push to shared branches' },
  ],
};

export function message(index: number): Message {
  return {
    index,
    role: index % 2 === 1 ? 'user' : 'assistant',
    content: `message ${index}`,
    timestamp: '2026-03-01T10:00:00.000Z',
  };
}

export function range(from: number, to: number): number[] {
  const indices: number[] = [];
  for (let i = from; i <= to; i++) indices.push(i);
  return indices;
}

export function verdict(ruleId: string, suggestion?: string): Verdict {
  return {
    ruleId,
    reasoning: `${ruleId} was broken`,
    ...(suggestion ? { suggestion } : {}),
    isStopRequest: ruleId === 'stop-request',
  };
}

/**
 * Log whose polls return queued results; an empty queue reads as "no news"
 */
export class FakeLog implements ConversationLog {
  readonly queue: Array<PollResult | Error> = [];
  openError: Error | null = null;
  startFile: string | null = '/logs/a.jsonl';

  async open(projectId: string): Promise<LogHandle> {
    if (this.openError) throw this.openError;
    return {
      projectId,
      logDir: '/logs',
      file: this.startFile,
      offset: 0,
      nextIndex: 1,
      pending: Buffer.alloc(0),
      skipToNewline: false,
    };
  }

  async poll(): Promise<PollResult> {
    const next = this.queue.shift();
    if (next === undefined) return { status: 'ready', messages: [] };
    if (next instanceof Error) throw next;
    return next;
  }

  push(...indices: number[]): void {
    this.queue.push({ status: 'ready', messages: indices.map(message) });
  }
}

interface PendingCall {
  request: AnalysisRequest;
  signal: AbortSignal | undefined;
  resolve: (verdicts: Verdict[]) => void;
  reject: (error: Error) => void;
}

/**
 * Reasoning service whose calls stay open until the test settles them
 */
export class FakeAnalysis implements AnalysisClient {
  readonly calls: PendingCall[] = [];
  private readonly open: PendingCall[] = [];

  analyze(request: AnalysisRequest, signal?: AbortSignal): Promise<Verdict[]> {
    return new Promise<Verdict[]>((resolve, reject) => {
      const call = { request, signal, resolve, reject };
      this.calls.push(call);
      this.open.push(call);
    });
  }

  respond(verdicts: Verdict[]): void {
    this.next().resolve(verdicts);
  }

  fail(error: Error): void {
    this.next().reject(error);
  }

  lastContext(): number[] {
    const call = this.calls[this.calls.length - 1];
    return call ? call.request.context.map((m) => m.index) : [];
  }

  private next(): PendingCall {
    const call = this.open.shift();
    if (!call) throw new Error('no analysis call is waiting');
    return call;
  }
}

export class RecordingWriter implements SuggestionWriter {
  readonly written: Array<[string, string]> = [];
  failWith: Error | null = null;

  async write(projectId: string, text: string): Promise<boolean> {
    if (this.failWith) throw this.failWith;
    this.written.push([projectId, text]);
    return true;
  }
}

export function eventsOf<K extends MonitorEvent['kind']>(
  events: readonly MonitorEvent[],
  kind: K
): Array<Extract<MonitorEvent, { kind: K }>> {
  return events.filter((event): event is Extract<MonitorEvent, { kind: K }> => event.kind === kind);
}
