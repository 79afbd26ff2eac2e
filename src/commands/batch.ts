import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { readFile } from 'fs/promises';
import { basename, resolve } from 'path';

import type { BatchItem } from '../core/task.js';
import { toBatchEnvelope } from '../core/envelope.js';
import { renderBatchSummary } from '../ui/table.js';
import { collect, parseOptionPairs } from '../utils/options.js';
import { reportError, startService } from './shared.js';

interface BatchCommandOptions {
  option: string[];
  json?: boolean;
}

export function registerBatchCommand(program: Command): void {
  program
    .command('batch <files...>')
    .description('Analyze several files in one batch')
    .option('-o, --option <key=value>', 'Analyzer option applied to every file (repeatable)', collect, [])
    .option('--json', 'Output as JSON')
    .action(async (files: string[], options: BatchCommandOptions, command: Command) => {
      try {
        const analyzerOptions = parseOptionPairs(options.option);
        const items: BatchItem[] = await Promise.all(files.map(async file => {
          const fullPath = resolve(file);
          const content = await readFile(fullPath);
          return { content, filename: basename(fullPath), options: analyzerOptions };
        }));

        const { orchestrator } = await startService(command);
        const spinner = options.json ? null : ora(`Analyzing ${items.length} files...`).start();
        const batch = await orchestrator.submitBatch(items);
        spinner?.stop();

        if (options.json) {
          console.log(JSON.stringify(toBatchEnvelope(batch), null, 2));
        } else {
          renderBatchSummary(batch);
        }

        if (batch.metadata.failed > 0) {
          if (!options.json) {
            console.log(chalk.yellow(`  ${batch.metadata.failed} of ${batch.metadata.total} files failed\n`));
          }
          process.exitCode = 1;
        }
      } catch (error) {
        reportError(error);
      }
    });
}
