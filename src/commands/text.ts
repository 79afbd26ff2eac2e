import { Command } from 'commander';
import ora from 'ora';

import { collect, parseOptionPairs } from '../utils/options.js';
import { printTask, reportError, startService } from './shared.js';

interface TextCommandOptions {
  option: string[];
  json?: boolean;
}

export function registerTextCommand(program: Command): void {
  program
    .command('text <text...>')
    .description('Analyze a piece of text')
    .option('-o, --option <key=value>', 'Analyzer option (repeatable)', collect, [])
    .option('--json', 'Output as JSON')
    .action(async (words: string[], options: TextCommandOptions, command: Command) => {
      try {
        const { orchestrator } = await startService(command);
        const spinner = options.json ? null : ora('Analyzing text...').start();

        const task = await orchestrator.submitText(words.join(' '), parseOptionPairs(options.option));

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
