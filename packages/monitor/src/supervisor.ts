/**
 * One project's supervision loop.
 *
 * Polls the conversation log, keeps the context window current and sends
 * it to the reasoning service whenever unanalyzed messages exist. At most
 * one analysis call is outstanding; messages keep flowing into the window
 * while it runs, and the next round picks them up.
 *
 *   WAITING_LOGS → IDLE ⇄ ANALYZING
 *                   ↑        ↓ failure
 *                   └── ERROR_BACKOFF
 *
 * Any state → STOPPED on shutdown or a fatal startup error.
 */

import { setTimeout as sleep } from 'timers/promises';
import type { AnalysisClient, AnalysisRequest } from './analysis-client.js';
import type { BackoffConfig, BackoffState } from './backoff.js';
import { DEFAULT_BACKOFF, canAttempt, getBackoffSummary, initialBackoffState, recordFailure, recordSuccess } from './backoff.js';
import { DEFAULTS } from './config.js';
import { ContextWindow } from './context-window.js';
import { ConfigError, LogAccessError, ShepherdError, describeError } from './errors.js';
import type { ConversationLog, LogHandle, LogRotation, PollResult } from './log-source.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { settlesWithin } from './timing.js';
import type {
  ContextSnapshot,
  EventSink,
  Message,
  MonitorErrorKind,
  RuleSet,
  SupervisorState,
  SupervisorStats,
  Verdict,
  Violation,
} from './types.js';
import { ViolationLedger } from './violation-ledger.js';

/**
 * Where suggestions go; SuggestionChannel in production
 */
export interface SuggestionWriter {
  write(projectId: string, text: string): Promise<boolean>;
}

export interface SupervisorOptions {
  projectId: string;
  ruleSet: RuleSet;
  /** Context window capacity K */
  contextSize: number;
  /** Heartbeat every N processed messages (0 disables) */
  heartbeatInterval: number;
  log: ConversationLog;
  analysisClient: AnalysisClient;
  suggestions: SuggestionWriter;
  emit: EventSink;
  pollIntervalMs?: number;
  backoff?: BackoffConfig;
  /** Clock for backoff decisions */
  now?: () => number;
  logger?: Logger;
}

export class ProjectSupervisor {
  readonly projectId: string;

  private readonly ruleSet: RuleSet;
  private readonly contextSize: number;
  private readonly heartbeatInterval: number;
  private readonly log: ConversationLog;
  private readonly analysisClient: AnalysisClient;
  private readonly suggestions: SuggestionWriter;
  private readonly emit: EventSink;
  private readonly pollIntervalMs: number;
  private readonly backoffConfig: BackoffConfig;
  private readonly now: () => number;
  private readonly logger: Logger;

  private readonly window: ContextWindow;
  private readonly ledger = new ViolationLedger();
  private readonly counters: SupervisorStats = { messagesProcessed: 0, alertsRaised: 0 };

  private current: SupervisorState = 'WAITING_LOGS';
  private handle: LogHandle | null = null;
  private backoffState: BackoffState = initialBackoffState();
  private highestIndex = 0;
  private lastAnalyzedIndex = 0;
  private logErrorReported = false;
  private stopping = false;
  private stopPromise: Promise<void> | null = null;
  private reason: string | null = null;

  private inFlight: Promise<void> | null = null;
  private inFlightController: AbortController | null = null;
  /** Unexpected failure while applying a round; rethrown by the next tick or reported on stop */
  private crash: unknown = null;

  constructor(options: SupervisorOptions) {
    this.projectId = options.projectId;
    this.ruleSet = options.ruleSet;
    this.contextSize = options.contextSize;
    this.heartbeatInterval = options.heartbeatInterval;
    this.log = options.log;
    this.analysisClient = options.analysisClient;
    this.suggestions = options.suggestions;
    this.emit = options.emit;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULTS.pollIntervalMs;
    this.backoffConfig = options.backoff ?? DEFAULT_BACKOFF;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;

    if (!Number.isInteger(options.heartbeatInterval) || options.heartbeatInterval < 0) {
      throw new ConfigError(`Heartbeat interval must be a non-negative integer, got ${options.heartbeatInterval}`, {
        projectId: options.projectId,
      });
    }
    this.window = new ContextWindow(options.contextSize);
  }

  get state(): SupervisorState {
    return this.current;
  }

  /** Why the supervisor stopped, once it has */
  get stopReason(): string | null {
    return this.reason;
  }

  stats(): SupervisorStats {
    return { ...this.counters };
  }

  context(): ContextSnapshot {
    return this.window.snapshot();
  }

  violations(): Violation[] {
    return this.ledger.active();
  }

  /**
   * Open the project's log. Resolves false (and stops) when it cannot be
   * located or read.
   */
  async start(): Promise<boolean> {
    if (this.current === 'STOPPED' || this.handle) return this.current !== 'STOPPED';

    try {
      this.handle = await this.log.open(this.projectId);
    } catch (err) {
      if (!(err instanceof LogAccessError) && !(err instanceof ConfigError)) throw err;
      this.report(err.kind, err.message);
      this.logger.error(`Cannot start: ${err.message}`);
      this.reason = err.message;
      this.stopping = true;
      this.transition('STOPPED');
      return false;
    }

    this.logger.info(`Supervising ${this.projectId} (${this.ruleSet.rules.length} rules, context ${this.contextSize})`);
    if (this.handle.file) {
      this.transition('IDLE');
    } else {
      this.logger.info(`Waiting for a conversation log in ${this.handle.logDir}`);
    }
    return true;
  }

  /**
   * One polling step: ingest new messages, then dispatch analysis if due
   */
  async tick(): Promise<void> {
    if (this.crash !== null) {
      const crash = this.crash;
      this.crash = null;
      throw crash;
    }
    if (!this.handle || this.stopping) return;

    let result: PollResult;
    try {
      result = await this.log.poll(this.handle);
    } catch (err) {
      if (!(err instanceof LogAccessError)) throw err;
      if (!this.logErrorReported) {
        this.logErrorReported = true;
        this.report('LogAccessError', err.message);
        this.logger.warn(`Poll failed: ${err.message}`);
      }
      return;
    }

    if (this.logErrorReported) {
      this.logErrorReported = false;
      this.logger.info('Log readable again');
    }
    if (this.stopping || result.status === 'waiting') return;

    if (this.current === 'WAITING_LOGS') this.transition('IDLE');
    if (result.rotation) this.rotated(result.rotation);

    for (const message of result.messages) {
      this.ingest(message);
    }

    this.maybeDispatch();
  }

  /**
   * Start, then tick every poll interval until the signal aborts or the
   * supervisor stops
   */
  async run(signal: AbortSignal): Promise<void> {
    if (signal.aborted || !(await this.start())) return;

    while (!signal.aborted && !this.stopping) {
      await this.tick();
      try {
        await sleep(this.pollIntervalMs, undefined, { signal });
      } catch (err) {
        if (signal.aborted) break;
        throw err;
      }
    }
  }

  /**
   * Stop polling and dispatching. An in-flight call gets `graceMs` to
   * finish and have its result applied; after that it is cancelled and
   * anything it returns is discarded.
   */
  stop(graceMs: number = DEFAULTS.shutdownGraceMs, reason = 'shutdown'): Promise<void> {
    if (!this.stopPromise) {
      this.stopping = true;
      this.stopPromise = this.finish(graceMs, reason);
    }
    return this.stopPromise;
  }

  /**
   * Resolves once no analysis call is outstanding
   */
  async settled(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  private async finish(graceMs: number, reason: string): Promise<void> {
    const inFlight = this.inFlight;
    if (inFlight && !(await settlesWithin(inFlight, graceMs))) {
      this.logger.warn(`Analysis still running after ${graceMs}ms, cancelling`);
      this.inFlightController?.abort();
    }

    if (this.crash !== null) {
      this.report('SupervisorFailure', describeError(this.crash));
      this.crash = null;
    }

    if (this.current !== 'STOPPED') {
      this.reason = reason;
      this.transition('STOPPED');
      this.logger.info(`Stopped: ${reason}`);
    }
  }

  private ingest(message: Message): void {
    this.window.append(message);
    this.highestIndex = message.index;
    this.counters.messagesProcessed += 1;

    if (this.heartbeatInterval > 0 && this.counters.messagesProcessed % this.heartbeatInterval === 0) {
      this.emit({
        kind: 'heartbeat',
        projectId: this.projectId,
        messagesProcessed: this.counters.messagesProcessed,
        alertsRaised: this.counters.alertsRaised,
        timestamp: new Date().toISOString(),
      });
    }
  }

  private rotated(rotation: LogRotation): void {
    this.logger.info(`Log ${rotation.reason}: now following ${rotation.currentFile}`);
    this.emit({
      kind: 'rotation',
      projectId: this.projectId,
      previousFile: rotation.previousFile,
      currentFile: rotation.currentFile,
      reason: rotation.reason,
      timestamp: new Date().toISOString(),
    });
  }

  private maybeDispatch(): void {
    if (this.inFlight || this.stopping) return;
    if (this.highestIndex <= this.lastAnalyzedIndex) return;

    if (this.current === 'ERROR_BACKOFF') {
      const check = canAttempt(this.backoffState, this.now());
      if (!check.allowed) {
        this.logger.debug(check.reason);
        return;
      }
      this.transition('IDLE');
    }

    this.dispatch();
  }

  private dispatch(): void {
    const messageIndex = this.highestIndex;
    const request: AnalysisRequest = {
      persona: this.ruleSet.persona,
      rules: this.ruleSet.rules,
      context: this.window.snapshot(),
      reported: this.ledger.active(),
    };
    const controller = new AbortController();

    this.transition('ANALYZING');
    this.logger.debug(`Analyzing up to message #${messageIndex}`);

    this.inFlightController = controller;
    this.inFlight = this.analysisClient
      .analyze(request, controller.signal)
      .then(
        (verdicts) => this.applyVerdicts(verdicts, messageIndex),
        (err: unknown) => this.analysisFailed(err, messageIndex)
      )
      .catch((err: unknown) => {
        this.logger.error(`Failed to apply analysis: ${describeError(err)}`);
        this.crash = err;
      })
      .finally(() => {
        this.inFlight = null;
        this.inFlightController = null;
      });
  }

  private async applyVerdicts(verdicts: Verdict[], messageIndex: number): Promise<void> {
    if (this.current === 'STOPPED') {
      this.logger.debug(`Discarding late result for message #${messageIndex}`);
      return;
    }

    this.lastAnalyzedIndex = messageIndex;
    this.backoffState = recordSuccess(this.backoffState, this.now());

    // Messages ingested during the call count towards expiry
    const purged = this.ledger.expire(this.highestIndex, this.contextSize);
    if (purged.length > 0) {
      this.logger.debug(`Expired: ${purged.join(', ')}`);
    }

    for (const verdict of verdicts) {
      if (this.ledger.register(verdict.ruleId, messageIndex, verdict.suggestion) === 'duplicate') {
        this.ledger.touch(verdict.ruleId, messageIndex);
        this.logger.debug(`Already reported: ${verdict.ruleId}`);
        continue;
      }

      this.counters.alertsRaised += 1;
      this.logger.info(`ALERT ${verdict.ruleId} at message #${messageIndex}`);
      this.emit({
        kind: 'alert',
        projectId: this.projectId,
        ruleId: verdict.ruleId,
        reasoning: verdict.reasoning,
        ...(verdict.suggestion ? { suggestion: verdict.suggestion } : {}),
        isStopRequest: verdict.isStopRequest,
        messageIndex,
        timestamp: new Date().toISOString(),
      });

      if (verdict.suggestion) {
        await this.deliver(verdict.suggestion);
      }
    }

    if (this.current === 'ANALYZING') this.transition('IDLE');
  }

  private async deliver(suggestion: string): Promise<void> {
    try {
      if (await this.suggestions.write(this.projectId, suggestion)) {
        this.logger.debug('Suggestion written for the prompt hook');
      }
    } catch (err) {
      const kind: MonitorErrorKind = err instanceof ShepherdError ? err.kind : 'SuggestionWriteError';
      this.report(kind, describeError(err));
      this.logger.warn(`Suggestion not delivered: ${describeError(err)}`);
    }
  }

  private analysisFailed(err: unknown, messageIndex: number): void {
    if (this.current === 'STOPPED') {
      this.logger.debug(`Discarding late failure for message #${messageIndex}: ${describeError(err)}`);
      return;
    }

    this.backoffState = recordFailure(this.backoffState, this.now(), this.backoffConfig);
    this.report('AnalysisServiceError', describeError(err));
    this.logger.warn(
      `Analysis of message #${messageIndex} failed: ${describeError(err)} (${getBackoffSummary(this.backoffState, this.now())})`
    );
    this.transition('ERROR_BACKOFF');
  }

  private report(errorKind: MonitorErrorKind, message: string): void {
    this.emit({
      kind: 'error',
      projectId: this.projectId,
      errorKind,
      message,
      timestamp: new Date().toISOString(),
    });
  }

  private transition(to: SupervisorState): void {
    const from = this.current;
    if (from === to) return;
    this.current = to;
    this.logger.debug(`${from} → ${to}`);
    this.emit({ kind: 'state', projectId: this.projectId, from, to, timestamp: new Date().toISOString() });
  }
}
