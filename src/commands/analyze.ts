import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { readFile } from 'fs/promises';
import { basename, resolve } from 'path';

import { formatSize } from '../ui/colors.js';
import { collect, parseOptionPairs } from '../utils/options.js';
import { printTask, reportError, startService } from './shared.js';

interface AnalyzeCommandOptions {
  type?: string;
  option: string[];
  json?: boolean;
}

export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze <file>')
    .description('Analyze a text, audio or video file')
    .option('-t, --type <mime>', 'Content type to use instead of the one derived from the filename')
    .option('-o, --option <key=value>', 'Analyzer option (repeatable)', collect, [])
    .option('--json', 'Output as JSON')
    .action(async (file: string, options: AnalyzeCommandOptions, command: Command) => {
      const fullPath = resolve(file);

      let content: Buffer;
      try {
        content = await readFile(fullPath);
      } catch (error) {
        console.error(chalk.red(`Cannot read file: ${fullPath}`));
        reportError(error);
        return;
      }

      try {
        const { orchestrator } = await startService(command);
        const spinner = options.json
          ? null
          : ora(`Analyzing ${chalk.cyan(basename(fullPath))} (${formatSize(content.length)})...`).start();

        const submitted = await orchestrator.submitFile({
          content,
          filename: basename(fullPath),
          contentType: options.type,
          options: parseOptionPairs(options.option),
        });
        const task = await orchestrator.waitFor(submitted.id);

        if (task.status === 'completed') {
          spinner?.succeed('Analysis complete');
        } else {
          spinner?.fail('Analysis failed');
          process.exitCode = 1;
        }
        printTask(task, options.json);
      } catch (error) {
        reportError(error);
      }
    });
}
