/**
 * Runs one supervisor per project and merges their events into one sink.
 *
 * Supervisors share nothing. A project that fails to configure is skipped,
 * and one that crashes is reported and dropped; the others keep running.
 */

import { DEFAULTS } from './config.js';
import { ShepherdError, describeError } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { ProjectSupervisor } from './supervisor.js';
import type { EventSink, MonitorErrorKind, SupervisorStats } from './types.js';

/**
 * Builds the supervisor for a project. Throwing (typically ConfigError)
 * skips that project.
 */
export type SupervisorFactory = (projectId: string, emit: EventSink) => ProjectSupervisor;

export interface OrchestratorOptions {
  projects: readonly string[];
  createSupervisor: SupervisorFactory;
  onEvent: EventSink;
  shutdownGraceMs?: number;
  logger?: Logger;
}

export class Orchestrator {
  private readonly active = new Map<string, ProjectSupervisor>();
  /** Every supervisor ever started, for totals after removal */
  private readonly created = new Map<string, ProjectSupervisor>();
  private readonly controller = new AbortController();
  private readonly onEvent: EventSink;
  private readonly shutdownGraceMs: number;
  private readonly logger: Logger;
  private running: Promise<void> | null = null;

  constructor(options: OrchestratorOptions) {
    this.onEvent = options.onEvent;
    this.shutdownGraceMs = options.shutdownGraceMs ?? DEFAULTS.shutdownGraceMs;
    this.logger = options.logger ?? silentLogger;

    for (const projectId of options.projects) {
      if (this.created.has(projectId)) continue;
      try {
        const supervisor = options.createSupervisor(projectId, this.onEvent);
        this.active.set(projectId, supervisor);
        this.created.set(projectId, supervisor);
      } catch (err) {
        const errorKind: MonitorErrorKind = err instanceof ShepherdError ? err.kind : 'SupervisorFailure';
        this.logger.error(`${projectId}: skipped: ${describeError(err)}`);
        this.onEvent({
          kind: 'error',
          projectId,
          errorKind,
          message: describeError(err),
          timestamp: new Date().toISOString(),
        });
      }
    }
  }

  activeProjects(): string[] {
    return [...this.active.keys()];
  }

  /**
   * Sum of every supervisor's counters, including stopped ones
   */
  totals(): SupervisorStats {
    const totals: SupervisorStats = { messagesProcessed: 0, alertsRaised: 0 };
    for (const supervisor of this.created.values()) {
      const stats = supervisor.stats();
      totals.messagesProcessed += stats.messagesProcessed;
      totals.alertsRaised += stats.alertsRaised;
    }
    return totals;
  }

  /**
   * Run every supervisor concurrently. Resolves when none remain.
   */
  run(): Promise<void> {
    if (!this.running) {
      this.logger.info(`Starting ${this.active.size} supervisor(s)`);
      this.running = Promise.all(
        [...this.active.entries()].map(([projectId, supervisor]) => this.supervise(projectId, supervisor))
      ).then(() => undefined);
    }
    return this.running;
  }

  /**
   * Stop polling everywhere; in-flight analysis gets the grace period
   */
  async shutdown(): Promise<void> {
    this.logger.info('Shutting down');
    this.controller.abort();

    if (this.running) {
      await this.running;
      return;
    }

    await Promise.all([...this.active.values()].map((supervisor) => supervisor.stop(this.shutdownGraceMs)));
    this.active.clear();
  }

  private async supervise(projectId: string, supervisor: ProjectSupervisor): Promise<void> {
    let reason: string;
    try {
      await supervisor.run(this.controller.signal);
      await supervisor.stop(this.shutdownGraceMs);
      reason = supervisor.stopReason ?? 'shutdown';
    } catch (err) {
      reason = `failure: ${describeError(err)}`;
      this.logger.error(`${projectId}: supervisor failed: ${describeError(err)}`);
      this.onEvent({
        kind: 'error',
        projectId,
        errorKind: 'SupervisorFailure',
        message: describeError(err),
        timestamp: new Date().toISOString(),
      });
      await supervisor.stop(0, reason);
    }

    this.active.delete(projectId);
    this.onEvent({ kind: 'stopped', projectId, reason, timestamp: new Date().toISOString() });
  }
}
