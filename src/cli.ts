#!/usr/bin/env node

import { Command } from 'commander';

import { VERSION } from './config.js';
import { registerAllCommands } from './commands/index.js';
import { logger } from './utils/logger.js';

const program = new Command();

program
  .name('contentlens')
  .description('Analyze text, audio and video content')
  .version(VERSION)
  .option('-c, --config <path>', 'Path to a config.yaml file')
  .option('-v, --verbose', 'Log debug output');

registerAllCommands(program);

program.parseAsync(process.argv).catch(error => {
  logger.error('Unexpected error:', error);
  process.exitCode = 1;
});
