#!/usr/bin/env node

/**
 * Conversation Shepherd - live supervision of Claude Code sessions
 *
 * Usage:
 *   shepherd [project_path] [-v] [-b N] [-c K] [-f]
 *
 * Without a path, every project in ~/.shepherd/projects.json is watched.
 * Ctrl+C stops all supervisors (in-flight analysis gets a grace period)
 * and prints the totals.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ClaudeCliAnalysisClient } from './analysis-client.js';
import type { CliArgs } from './args.js';
import { USAGE, parseCliArgs } from './args.js';
import { DEFAULTS, LOG_FILE, getStateDir, loadProjectList } from './config.js';
import { ConfigError, describeError } from './errors.js';
import { bold, dim, formatEvent, formatTotals, projectLabel, red, yellow } from './format.js';
import type { Logger } from './logger.js';
import { createLogger } from './logger.js';
import { createMonitor } from './monitor.js';
import type { MonitorOptions } from './types.js';

function resolveProjects(args: CliArgs, stateDir: string, logger: Logger): string[] {
  if (args.projectPath === undefined) {
    return loadProjectList(stateDir, (skipped) => {
      logger.warn(`Skipping missing project: ${skipped}`);
      console.warn(yellow(`Skipping ${skipped}: not a directory`));
    });
  }

  const projectPath = path.resolve(args.projectPath);
  let isDirectory = false;
  try {
    isDirectory = fs.statSync(projectPath).isDirectory();
  } catch (err) {
    throw new ConfigError(`Project path does not exist: ${projectPath} (${describeError(err)})`);
  }
  if (!isDirectory) {
    throw new ConfigError(`Project path is not a directory: ${projectPath}`);
  }
  return [projectPath];
}

function printBanner(args: CliArgs, projects: readonly string[], stateDir: string): void {
  console.log(`\n ${bold('🐑 Conversation Shepherd')}\n`);
  for (const project of projects) {
    console.log(`  Watching:   ${projectLabel(project)} ${dim(`(${project})`)}`);
  }
  console.log(`  Context:    ${args.contextSize} messages`);
  console.log(`  Heartbeat:  ${args.heartbeatInterval === 0 ? 'off' : `every ${args.heartbeatInterval} messages`}`);
  console.log(`  Feedback:   ${args.feedback ? 'on' : 'off'}`);
  console.log(`  Log:        ${dim(path.join(stateDir, LOG_FILE))}`);
  console.log(dim('\n  Press Ctrl+C to stop.\n'));
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const stateDir = getStateDir();
  const logger = createLogger({ filePath: path.join(stateDir, LOG_FILE), verbose: args.verbose });
  const projects = resolveProjects(args, stateDir, logger);

  const options: MonitorOptions = {
    projects,
    verbose: args.verbose,
    heartbeatInterval: args.heartbeatInterval,
    contextSize: args.contextSize,
    feedback: args.feedback,
    pollIntervalMs: DEFAULTS.pollIntervalMs,
    analysisTimeoutMs: DEFAULTS.analysisTimeoutMs,
    shutdownGraceMs: DEFAULTS.shutdownGraceMs,
  };

  printBanner(args, projects, stateDir);

  const analysisClient = new ClaudeCliAnalysisClient({
    timeoutMs: options.analysisTimeoutMs,
    logger: logger.child('analysis'),
  });
  console.log(dim('  Checking claude...'));
  const version = await analysisClient.ensureAvailable();
  console.log(`  Reasoning:  claude ${version}\n`);

  const orchestrator = createMonitor(options, {
    stateDir,
    logger,
    analysisClient,
    onEvent: (event) => {
      const line = formatEvent(event, options.verbose);
      if (line) console.log(line);
    },
  });

  if (orchestrator.activeProjects().length === 0) {
    throw new ConfigError('No project could be supervised');
  }

  let shuttingDown = false;
  const onSignal = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      // Second Ctrl+C: skip the grace period
      process.exit(130);
    }
    shuttingDown = true;
    console.log(dim(`\n  ${signal} received, stopping...`));
    orchestrator.shutdown().catch((err: unknown) => {
      logger.error(`Shutdown failed: ${describeError(err)}`);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  await orchestrator.run();

  console.log(`\n ${formatTotals(orchestrator.totals())}\n`);
}

main().catch((error: unknown) => {
  console.error(red(`Error: ${describeError(error)}`));
  if (error instanceof ConfigError) {
    console.error(dim('Run `shepherd --help` for usage.'));
  }
  process.exit(1);
});
