import { Command } from 'commander';
import chalk from 'chalk';
import { resolve } from 'path';

import { loadConfig, type Config } from '../config.js';
import { createAnalysisService, type AnalysisService } from '../core/service.js';
import { describeError } from '../core/errors.js';
import type { AnalysisTask } from '../core/task.js';
import { toEnvelope } from '../core/envelope.js';
import { renderTaskSummary } from '../ui/table.js';

export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
}

export function resolveConfig(command: Command): Config {
  const { config: configPath, verbose } = command.optsWithGlobals<GlobalOptions>();
  const config = configPath ? loadConfig(resolve(configPath)) : loadConfig();
  return verbose ? { ...config, logging: { level: 'debug' } } : config;
}

export async function startService(command: Command): Promise<AnalysisService> {
  return createAnalysisService(resolveConfig(command));
}

export function printTask(task: AnalysisTask, json: boolean | undefined): void {
  if (json) {
    console.log(JSON.stringify(toEnvelope(task), null, 2));
  } else {
    renderTaskSummary(task);
  }
}

/** Print a thrown error and mark the process as failed. */
export function reportError(error: unknown): void {
  const { kind, message } = describeError(error);
  console.error(chalk.red(`\n  ${kind}: ${message}\n`));
  process.exitCode = 1;
}
