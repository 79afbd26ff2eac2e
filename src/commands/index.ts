import { Command } from 'commander';

import { registerTextCommand } from './text.js';
import { registerAnalyzeCommand } from './analyze.js';
import { registerBatchCommand } from './batch.js';
import { registerAnalyzersCommand } from './analyzers.js';

export function registerAllCommands(program: Command): void {
  registerTextCommand(program);
  registerAnalyzeCommand(program);
  registerBatchCommand(program);
  registerAnalyzersCommand(program);
}
