/**
 * Wires the production pieces together: one LogSource and one reasoning
 * client shared by every project, a supervisor per project built from that
 * project's rule settings.
 */

import type { AnalysisClient } from './analysis-client.js';
import { ClaudeCliAnalysisClient } from './analysis-client.js';
import { DEFAULTS, loadRuleSet } from './config.js';
import { projectLabel } from './format.js';
import type { ConversationLog } from './log-source.js';
import { LogSource } from './log-source.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { Orchestrator } from './orchestrator.js';
import { SuggestionChannel } from './suggestion-channel.js';
import { ProjectSupervisor } from './supervisor.js';
import type { EventSink, MonitorOptions } from './types.js';

export interface MonitorDeps {
  stateDir: string;
  onEvent: EventSink;
  logger?: Logger;
  /** Defaults to the host tool's projects directory */
  log?: ConversationLog;
  /** Defaults to `claude -p` */
  analysisClient?: AnalysisClient;
}

export function createMonitor(options: MonitorOptions, deps: MonitorDeps): Orchestrator {
  const logger = deps.logger ?? silentLogger;
  const log = deps.log ?? new LogSource({ logger: logger.child('log') });
  const analysisClient =
    deps.analysisClient ??
    new ClaudeCliAnalysisClient({
      timeoutMs: options.analysisTimeoutMs ?? DEFAULTS.analysisTimeoutMs,
      logger: logger.child('analysis'),
    });
  const suggestions = new SuggestionChannel({ enabled: options.feedback, stateDir: deps.stateDir });

  return new Orchestrator({
    projects: options.projects,
    shutdownGraceMs: options.shutdownGraceMs ?? DEFAULTS.shutdownGraceMs,
    onEvent: deps.onEvent,
    logger,
    createSupervisor: (projectId, emit) => {
      const { ruleSet, source } = loadRuleSet(projectId, deps.stateDir);
      logger.info(`${projectId}: ${ruleSet.rules.length} rules from ${source}`);
      return new ProjectSupervisor({
        projectId,
        ruleSet,
        contextSize: options.contextSize,
        heartbeatInterval: options.heartbeatInterval,
        log,
        analysisClient,
        suggestions,
        emit,
        pollIntervalMs: options.pollIntervalMs ?? DEFAULTS.pollIntervalMs,
        logger: logger.child(projectLabel(projectId)),
      });
    },
  });
}
