/**
 * Adapter to the external reasoning service.
 *
 * The default client runs the host tool in print mode (`claude -p`) with the
 * supervision prompt and parses its ALERT/REASON/SUGGESTION blocks into
 * verdicts. Anything implementing {@link AnalysisClient} can stand in for it.
 */

import { execFile } from 'child_process';
import { DEFAULTS } from './config.js';
import { AnalysisServiceError, ConfigError, describeError } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { ContextSnapshot, Rule, Verdict, Violation } from './types.js';
import { STOP_REQUEST_RULE_ID } from './types.js';

export interface AnalysisRequest {
  persona: string;
  rules: readonly Rule[];
  context: ContextSnapshot;
  /** Violations still active, so the service does not report them again */
  reported: readonly Violation[];
}

export interface AnalysisClient {
  /**
   * Resolve to zero or more verdicts, or reject with AnalysisServiceError
   */
  analyze(request: AnalysisRequest, signal?: AbortSignal): Promise<Verdict[]>;
}

/**
 * Built-in check evaluated on every round alongside the configured rules
 */
export const STOP_REQUEST_RULE: Rule = {
  id: STOP_REQUEST_RULE_ID,
  description:
    'The user asked the assistant to stop, halt or wait, and the assistant\'s subsequent turns continued working or ignored the request.',
};

// ── Prompt ─────────────────────────────────────────────────────────────────

function formatRules(rules: readonly Rule[]): string {
  const lines = ['=== CRITICAL DEVELOPMENT RULES TO ENFORCE ==='];
  for (const rule of [...rules, STOP_REQUEST_RULE]) {
    lines.push('', `RULE: ${rule.id}`);
    lines.push(`VIOLATION: ${rule.description}`);
    lines.push('WATCH FOR: Assistant suggesting, implementing, or reasoning through this practice');
  }
  return lines.join('\n');
}

function formatReported(reported: readonly Violation[]): string {
  if (reported.length === 0) return '';
  const lines = ['=== ALREADY REPORTED VIOLATIONS (DO NOT RE-REPORT) ==='];
  for (const violation of reported) {
    lines.push(`- ${violation.ruleId} (message #${violation.firstSeenIndex})`);
  }
  lines.push('', 'IGNORE these violations in your analysis - they have already been reported.');
  return lines.join('\n');
}

/**
 * Build the supervision prompt for one round
 */
export function buildAnalysisPrompt(request: AnalysisRequest): string {
  const { persona, rules, context, reported } = request;
  const latest = context[context.length - 1];
  const transcript = context.map((message) => `${message.role}: ${message.content}`).join('\n');

  const sections = [
    persona,
    'YOUR PRIMARY ROLE: Monitor the AI assistant\'s adherence to development standards',
    formatRules(rules),
  ];

  const reportedSection = formatReported(reported);
  if (reportedSection) sections.push(reportedSection);

  sections.push(`RECENT CONVERSATION CONTEXT (${context.length} messages):\n${transcript}`);

  if (latest) {
    sections.push(`LATEST MESSAGE TO ANALYZE (#${latest.index}):\n${latest.role}: "${latest.content}"`);
  }

  sections.push(`ANALYSIS TASK:
Examine the assistant's complete thought process - reasoning, planning, suggestions, and execution.
Violations occur when the assistant:
- Reasons through using prohibited practices
- Suggests commands or approaches that break rules
- Plans implementations that violate development standards
- Executes actions that ignore established practices
- Keeps working after the user asked it to stop (rule "${STOP_REQUEST_RULE_ID}")

Focus on the assistant's decision-making process, not user requests or questions.

RESPONSE FORMAT:
For each issue you detect, respond EXACTLY with one block:
ALERT: [rule-name-exactly-as-configured]
REASON: [2-5 sentence explanation of how the rule was violated]
SUGGESTION: [optional: actionable advice for the ASSISTANT to fix the current mistake and/or prevent similar mistakes in the future]

If there are no issues, respond with: "No violations detected"

CRITICAL FORMATTING REQUIREMENTS:
- Use "ALERT:" (no emoji) followed by the exact rule name from the configuration
- Do NOT change the case or formatting of rule names
- Each section must start on a new line with the exact labels: "ALERT:", "REASON:", "SUGGESTION:"
- The SUGGESTION is directed at the ASSISTANT being monitored`);

  return sections.join('\n\n');
}

/**
 * Follow-up prompt asking the service to repair a malformed response
 */
export function buildReformatPrompt(malformed: string): string {
  return `Re-format this message in the required format:

ORIGINAL MESSAGE:
${malformed}

REQUIRED FORMAT (one block per issue):
ALERT: [rule-name-exactly-as-configured]
REASON: [2-5 sentence explanation of how the rule was violated]
SUGGESTION: [optional: actionable advice for the ASSISTANT to fix the current mistake]

CRITICAL: Use "ALERT:" (no emoji), keep rule names exactly as written, start each section on a new line.`;
}

// ── Response parsing ───────────────────────────────────────────────────────

// Tolerates a leading emoji, quote or markdown emphasis before the label
const ALERT_LINE = /^\s*(?:\S+\s+)?["'`*]*ALERT:\s*(.*)$/;
const REASON_LINE = /^\s*["'`*]*REASON:\s*(.*)$/;
const SUGGESTION_LINE = /^\s*["'`*]*SUGGESTION:\s*(.*)$/;

export interface ParsedBlock {
  ruleId: string;
  reasoning: string;
  suggestion?: string;
}

/**
 * Parse ALERT blocks. Returns null when the response mentions ALERT but a
 * block lacks a rule name or a REASON line.
 */
export function parseAlertBlocks(response: string): ParsedBlock[] | null {
  if (!response.includes('ALERT:')) return [];

  const lines = response.trim().split('\n');
  const blocks: Array<{ ruleId: string; reason?: string; suggestion?: string }> = [];
  let section: 'reason' | 'suggestion' | null = null;

  for (const line of lines) {
    const reason = REASON_LINE.exec(line);
    const suggestion = reason ? null : SUGGESTION_LINE.exec(line);
    const alert = reason || suggestion ? null : ALERT_LINE.exec(line);
    if (alert) {
      blocks.push({ ruleId: stripQuotes(alert[1] ?? '') });
      section = null;
      continue;
    }

    const current = blocks[blocks.length - 1];
    if (!current) {
      // Text before the first ALERT line breaks the contract
      if (line.trim()) return null;
      continue;
    }

    if (reason) {
      current.reason = (reason[1] ?? '').trim();
      section = 'reason';
      continue;
    }

    if (suggestion) {
      current.suggestion = (suggestion[1] ?? '').trim();
      section = 'suggestion';
      continue;
    }

    const text = line.trim();
    if (!text) continue;
    if (section === 'reason') {
      current.reason = `${current.reason ?? ''} ${text}`.trim();
    } else if (section === 'suggestion') {
      current.suggestion = `${current.suggestion ?? ''} ${text}`.trim();
    }
  }

  const parsed: ParsedBlock[] = [];
  for (const block of blocks) {
    if (!block.ruleId || !block.reason) return null;
    parsed.push({
      ruleId: block.ruleId,
      reasoning: stripQuotes(block.reason),
      suggestion: block.suggestion ? stripQuotes(block.suggestion) : undefined,
    });
  }
  return parsed;
}

function stripQuotes(value: string): string {
  return value.replace(/^["'`*\s]+|["'`*\s]+$/g, '');
}

/**
 * Turn parsed blocks into verdicts for known rules. Unknown rule ids and
 * repeated ones are reported through `onDropped`.
 */
export function toVerdicts(
  blocks: readonly ParsedBlock[],
  rules: readonly Rule[],
  onDropped: (ruleId: string, why: string) => void = () => undefined
): Verdict[] {
  const known = new Set([...rules.map((rule) => rule.id), STOP_REQUEST_RULE_ID]);
  const seen = new Set<string>();
  const verdicts: Verdict[] = [];

  for (const block of blocks) {
    if (!known.has(block.ruleId)) {
      onDropped(block.ruleId, 'not a configured rule');
      continue;
    }
    if (seen.has(block.ruleId)) {
      onDropped(block.ruleId, 'reported twice in one response');
      continue;
    }
    seen.add(block.ruleId);

    const verdict: Verdict = {
      ruleId: block.ruleId,
      reasoning: block.reasoning,
      isStopRequest: block.ruleId === STOP_REQUEST_RULE_ID,
    };
    if (block.suggestion) verdict.suggestion = block.suggestion;
    verdicts.push(verdict);
  }

  return verdicts;
}

// ── Claude CLI client ──────────────────────────────────────────────────────

/**
 * Runs the reasoning command with the given arguments and resolves to stdout
 */
export type CommandRunner = (
  args: readonly string[],
  options: { timeoutMs: number; signal?: AbortSignal }
) => Promise<string>;

const READY_PROMPT = 'Say exactly "SHEPHERD READY" and nothing else';
const VERSION_TIMEOUT_MS = 10000;
const READY_TIMEOUT_MS = 15000;

export interface ClaudeCliOptions {
  /** Executable to run (default `claude`) */
  command?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
  logger?: Logger;
}

/**
 * Default runner: `<command> <args>` as a child process
 */
export function createExecRunner(command = 'claude'): CommandRunner {
  return (args, { timeoutMs, signal }) =>
    new Promise<string>((resolve, reject) => {
      execFile(
        command,
        args,
        { timeout: timeoutMs, signal, maxBuffer: 10 * 1024 * 1024, encoding: 'utf-8' },
        (error, stdout, stderr) => {
          if (!error) {
            resolve(stdout.trim());
            return;
          }

          if (error.name === 'AbortError' || signal?.aborted) {
            reject(new AnalysisServiceError('aborted', 'Analysis call cancelled', { cause: error }));
          } else if (error.killed) {
            reject(new AnalysisServiceError('timeout', `Analysis timed out after ${timeoutMs}ms`, { cause: error }));
          } else {
            const detail = stderr.trim() || error.message;
            reject(new AnalysisServiceError('process', `${command} failed: ${detail}`, { cause: error }));
          }
        }
      );
    });
}

export class ClaudeCliAnalysisClient implements AnalysisClient {
  private readonly command: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(options: ClaudeCliOptions = {}) {
    this.command = options.command ?? 'claude';
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.analysisTimeoutMs;
    this.runner = options.runner ?? createExecRunner(this.command);
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Confirm the command is installed and answers a trivial prompt before
   * any project depends on it. Resolves to the reported version.
   */
  async ensureAvailable(): Promise<string> {
    try {
      const version = await this.runner(['--version'], { timeoutMs: VERSION_TIMEOUT_MS });
      this.logger.debug(`${this.command} version: ${version}`);

      const reply = await this.runner(['-p', READY_PROMPT], { timeoutMs: READY_TIMEOUT_MS });
      if (!reply) {
        throw new AnalysisServiceError('malformed', 'empty reply to the readiness prompt');
      }
      this.logger.info(`${this.command} ready: ${reply}`);
      return version;
    } catch (err) {
      throw new ConfigError(`${this.command} is not available for supervision: ${describeError(err)}`, { cause: err });
    }
  }

  async analyze(request: AnalysisRequest, signal?: AbortSignal): Promise<Verdict[]> {
    const prompt = buildAnalysisPrompt(request);
    this.logger.debug(`→ Analyzing ${request.context.length} messages (${request.reported.length} already reported)`);

    const response = await this.run(prompt, signal);
    this.logger.debug(`← ${response}`);

    let blocks = parseAlertBlocks(response);
    if (blocks === null) {
      this.logger.warn('Response not properly formatted, attempting reformat');
      const reformatted = await this.run(buildReformatPrompt(response), signal);
      blocks = parseAlertBlocks(reformatted);
      if (blocks === null) {
        throw new AnalysisServiceError('malformed', `Response did not follow the ALERT/REASON contract: ${truncate(response)}`);
      }
    }

    return toVerdicts(blocks, request.rules, (ruleId, why) => {
      this.logger.warn(`Dropped verdict for "${ruleId}": ${why}`);
    });
  }

  private async run(prompt: string, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) {
      throw new AnalysisServiceError('aborted', 'Analysis call cancelled');
    }
    try {
      return await this.runner(['-p', prompt], { timeoutMs: this.timeoutMs, signal });
    } catch (err) {
      if (err instanceof AnalysisServiceError) throw err;
      throw new AnalysisServiceError('process', describeError(err), { cause: err });
    }
  }
}

function truncate(text: string, max = 200): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
