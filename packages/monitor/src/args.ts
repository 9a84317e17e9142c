/**
 * Command-line arguments for `shepherd`
 */

import { DEFAULTS } from './config.js';
import { ConfigError } from './errors.js';

export interface CliArgs {
  /** Single project to supervise; absent means projects.json */
  projectPath?: string;
  verbose: boolean;
  heartbeatInterval: number;
  contextSize: number;
  feedback: boolean;
  help: boolean;
}

export const USAGE = `
Conversation Shepherd - live rule supervision for Claude Code sessions

Usage:
  shepherd [project_path] [options]

Without a project path, every project listed in ~/.shepherd/projects.json
is supervised.

Options:
  -v, --verbose          Show state changes, log rotations and debug output
  -b, --heartbeat=N      Heartbeat every N messages (default ${DEFAULTS.heartbeatInterval}, 0 disables)
  -c, --context=K        Messages sent to each analysis (default ${DEFAULTS.contextSize})
  -f, --feedback         Write suggestions for the prompt hook
  -h, --help             Show this help

Environment:
  SHEPHERD_HOME          State directory (default ~/.shepherd)
`;

function parseCount(flag: string, value: string | undefined, min: number): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new ConfigError(`${flag} expects a whole number, got ${value === undefined ? 'nothing' : `"${value}"`}`);
  }
  const parsed = parseInt(value, 10);
  if (parsed < min) {
    throw new ConfigError(`${flag} must be at least ${min}, got ${parsed}`);
  }
  return parsed;
}

/**
 * Parse argv (without node and script). Accepts `--flag=value`,
 * `--flag value` and `-f value`.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const result: CliArgs = {
    verbose: false,
    heartbeatInterval: DEFAULTS.heartbeatInterval,
    contextSize: DEFAULTS.contextSize,
    feedback: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);
    const next = (): string | undefined => {
      if (inline !== undefined) return inline;
      i += 1;
      return argv[i];
    };

    switch (name) {
      case '-v':
      case '--verbose':
        result.verbose = true;
        break;
      case '-f':
      case '--feedback':
        result.feedback = true;
        break;
      case '-h':
      case '--help':
        result.help = true;
        break;
      case '-b':
      case '--heartbeat':
        result.heartbeatInterval = parseCount(name, next(), 0);
        break;
      case '-c':
      case '--context':
        result.contextSize = parseCount(name, next(), 1);
        break;
      default:
        if (arg.startsWith('-')) {
          throw new ConfigError(`Unknown option: ${arg}`);
        }
        if (result.projectPath !== undefined) {
          throw new ConfigError(`Only one project path may be given (got "${result.projectPath}" and "${arg}")`);
        }
        result.projectPath = arg;
    }
  }

  return result;
}
