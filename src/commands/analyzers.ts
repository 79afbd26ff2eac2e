import { Command } from 'commander';

import { renderCapabilitiesTable } from '../ui/table.js';
import { reportError, startService } from './shared.js';

export function registerAnalyzersCommand(program: Command): void {
  program
    .command('analyzers')
    .description('List analyzers with their capabilities and health')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }, command: Command) => {
      try {
        const { orchestrator, registry } = await startService(command);
        const capabilities = orchestrator.listAnalyzers();
        const health = registry.health();

        if (options.json) {
          console.log(JSON.stringify({ capabilities, health }, null, 2));
        } else {
          renderCapabilitiesTable(capabilities, health);
        }
      } catch (error) {
        reportError(error);
      }
    });
}
