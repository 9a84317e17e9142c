/**
 * @convo-shepherd/monitor - live rule supervision for Claude Code sessions
 *
 * - Tails each project's conversation log
 * - Keeps a sliding context window per project
 * - Asks a reasoning service for rule violations and deduplicates them
 * - Hands suggestions to the prompt hook
 */

export * from './types.js';
export * from './errors.js';
export { ContextWindow } from './context-window.js';
export { ViolationLedger, expireViolations } from './violation-ledger.js';
export { parseTranscriptLine, extractContent } from './transcript.js';
export type { ParsedEntry, TranscriptEntry } from './transcript.js';
export { LogSource, findLatestLog, splitLines } from './log-source.js';
export type { ConversationLog, LogHandle, LogRotation, LogSourceOptions, PollResult } from './log-source.js';
export {
  ClaudeCliAnalysisClient,
  STOP_REQUEST_RULE,
  buildAnalysisPrompt,
  buildReformatPrompt,
  createExecRunner,
  parseAlertBlocks,
  toVerdicts,
} from './analysis-client.js';
export type { AnalysisClient, AnalysisRequest, ClaudeCliOptions, CommandRunner, ParsedBlock } from './analysis-client.js';
export {
  DEFAULT_BACKOFF,
  calculateBackoffDelay,
  canAttempt,
  getBackoffSummary,
  initialBackoffState,
  recordFailure,
  recordSuccess,
} from './backoff.js';
export type { BackoffConfig, BackoffState } from './backoff.js';
export { SuggestionChannel, suggestionPath } from './suggestion-channel.js';
export type { SuggestionChannelOptions } from './suggestion-channel.js';
export { ProjectSupervisor } from './supervisor.js';
export type { SuggestionWriter, SupervisorOptions } from './supervisor.js';
export { Orchestrator } from './orchestrator.js';
export type { OrchestratorOptions, SupervisorFactory } from './orchestrator.js';
export { createMonitor } from './monitor.js';
export type { MonitorDeps } from './monitor.js';
export {
  CLAUDE_PROJECTS_DIR,
  DEFAULTS,
  DEFAULT_SEED,
  getStateDir,
  loadProjectList,
  loadRuleSet,
  parseRuleSet,
  projectKey,
  settingsCandidates,
} from './config.js';
export { createLogger, formatLogLine, silentLogger } from './logger.js';
export type { Logger, LoggerOptions, LogLevel } from './logger.js';
export { formatAlert, formatEvent, formatHeartbeat, formatTotals } from './format.js';
export { parseCliArgs } from './args.js';
export type { CliArgs } from './args.js';
