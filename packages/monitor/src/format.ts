/**
 * Terminal rendering for monitor events
 */

import { basename } from 'path';
import type { AlertEvent, HeartbeatEvent, MonitorEvent, SupervisorStats } from './types.js';

// Colors
export const red = (s: string) => `\x1b[31m${s}\x1b[0m`;
export const green = (s: string) => `\x1b[32m${s}\x1b[0m`;
export const yellow = (s: string) => `\x1b[33m${s}\x1b[0m`;
export const orange = (s: string) => `\x1b[38;5;208m${s}\x1b[0m`;
export const dim = (s: string) => `\x1b[2m${s}\x1b[0m`;
export const bold = (s: string) => `\x1b[1m${s}\x1b[0m`;

/**
 * Short name shown for a project (its directory name)
 */
export function projectLabel(projectId: string): string {
  return basename(projectId) || projectId;
}

export function formatAlert(event: AlertEvent): string {
  const label = projectLabel(event.projectId);
  const title = event.isStopRequest ? `🛑 ${event.ruleId} (stop request ignored)` : `🚨 ${event.ruleId}`;
  const lines = [red(`${label}: ${title}`), `${orange('REASON:')} ${event.reasoning}`];
  if (event.suggestion) {
    lines.push(`${green('SUGGESTION:')} ${event.suggestion}`);
  }
  return lines.join('\n');
}

export function formatHeartbeat(event: HeartbeatEvent): string {
  const label = projectLabel(event.projectId);
  if (event.alertsRaised === 0) {
    return `🐑 ${label}: ${event.messagesProcessed} messages processed`;
  }
  return yellow(`⚠️  ${label}: ${event.messagesProcessed} messages processed, ${event.alertsRaised} alerts raised`);
}

/**
 * Line(s) to print for an event, or null when it is hidden at this verbosity
 */
export function formatEvent(event: MonitorEvent, verbose: boolean): string | null {
  const label = projectLabel(event.projectId);

  switch (event.kind) {
    case 'alert':
      return formatAlert(event);
    case 'heartbeat':
      return formatHeartbeat(event);
    case 'error':
      return red(`${label}: ${event.errorKind}: ${event.message}`);
    case 'stopped':
      return yellow(`${label}: stopped (${event.reason})`);
    case 'rotation':
      return yellow(`${label}: log ${event.reason}, now following ${event.currentFile}`);
    case 'state':
      return verbose ? dim(`${label}: ${event.from} → ${event.to}`) : null;
  }
}

export function formatTotals(totals: SupervisorStats): string {
  return `Total: ${totals.messagesProcessed} messages processed, ${totals.alertsRaised} alerts raised`;
}
