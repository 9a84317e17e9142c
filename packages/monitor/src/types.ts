/**
 * Conversation Shepherd - Monitoring Types
 *
 * Shared shapes for messages, rules, verdicts, violations and the
 * structured records every supervisor publishes on the output stream.
 */

/**
 * Speaker of a conversation entry
 */
export type MessageRole = 'user' | 'assistant';

/**
 * One complete entry read from a project's conversation log
 */
export interface Message {
  /** Monotonically increasing per project, starting at 1 */
  readonly index: number;

  readonly role: MessageRole;

  /** Plain text of the entry (text blocks joined) */
  readonly content: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;
}

/**
 * Ordered, frozen copy of the context window, most recent last
 */
export type ContextSnapshot = readonly Message[];

/**
 * A development rule the reasoning service checks the conversation against
 */
export interface Rule {
  id: string;
  description: string;
}

/**
 * Persona plus the ordered rules for one project
 */
export interface RuleSet {
  /** Seed text that frames the reasoning service's role */
  persona: string;
  rules: readonly Rule[];
}

/**
 * Reserved rule id for the always-evaluated "ignored a stop request" check
 */
export const STOP_REQUEST_RULE_ID = 'stop-request';

/**
 * One result unit returned by the reasoning service
 */
export interface Verdict {
  ruleId: string;
  reasoning: string;
  /** Advice directed at the supervised assistant */
  suggestion?: string;
  /** True only for the reserved stop-request rule */
  isStopRequest: boolean;
}

/**
 * An active, deduplicated record that a rule was broken
 */
export interface Violation {
  ruleId: string;
  firstSeenIndex: number;
  lastSeenIndex: number;
  suggestion?: string;
}

export type RegisterOutcome = 'new' | 'duplicate';

/**
 * Supervisor lifecycle states
 */
export type SupervisorState =
  | 'WAITING_LOGS'
  | 'IDLE'
  | 'ANALYZING'
  | 'ERROR_BACKOFF'
  | 'STOPPED';

/**
 * Failure kinds surfaced on the output stream
 */
export type MonitorErrorKind =
  | 'LogAccessError'
  | 'AnalysisServiceError'
  | 'ConfigError'
  | 'SuggestionWriteError'
  | 'SupervisorFailure';

/**
 * Why a log cursor was reset
 */
export type RotationReason = 'switched' | 'truncated' | 'discontinuity';

export interface AlertEvent {
  kind: 'alert';
  projectId: string;
  ruleId: string;
  reasoning: string;
  suggestion?: string;
  isStopRequest: boolean;
  /** Index of the message the analysis was dispatched for */
  messageIndex: number;
  timestamp: string;
}

export interface HeartbeatEvent {
  kind: 'heartbeat';
  projectId: string;
  messagesProcessed: number;
  alertsRaised: number;
  timestamp: string;
}

export interface RotationEvent {
  kind: 'rotation';
  projectId: string;
  previousFile: string | null;
  currentFile: string;
  reason: RotationReason;
  timestamp: string;
}

export interface ErrorEvent {
  kind: 'error';
  projectId: string;
  errorKind: MonitorErrorKind;
  message: string;
  timestamp: string;
}

export interface StateEvent {
  kind: 'state';
  projectId: string;
  from: SupervisorState;
  to: SupervisorState;
  timestamp: string;
}

export interface StoppedEvent {
  kind: 'stopped';
  projectId: string;
  reason: string;
  timestamp: string;
}

/**
 * Structured records on the merged output stream
 */
export type MonitorEvent =
  | AlertEvent
  | HeartbeatEvent
  | RotationEvent
  | ErrorEvent
  | StateEvent
  | StoppedEvent;

export type EventSink = (event: MonitorEvent) => void;

/**
 * Cumulative counters reported by heartbeats
 */
export interface SupervisorStats {
  messagesProcessed: number;
  alertsRaised: number;
}

/**
 * Runtime parameters injected by the CLI
 */
export interface MonitorOptions {
  /** Absolute project paths to supervise */
  projects: string[];

  /** Echo debug records and state transitions */
  verbose: boolean;

  /** Emit a heartbeat every N processed messages (0 disables) */
  heartbeatInterval: number;

  /** Context window capacity K */
  contextSize: number;

  /** Write suggestions for the prompt hook */
  feedback: boolean;

  /** Delay between log polls in ms */
  pollIntervalMs?: number;

  /** Timeout for one reasoning-service call in ms */
  analysisTimeoutMs?: number;

  /** How long shutdown waits for in-flight analysis in ms */
  shutdownGraceMs?: number;
}
