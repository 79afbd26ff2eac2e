import Table from 'cli-table3';
import chalk from 'chalk';
import type { AnalyzerCapabilities, AnalyzerHealth, AnalyzerKind } from '../analyzers/types.js';
import type { AnalysisTask, BatchResult } from '../core/task.js';
import {
  colorByKind,
  colorByStatus,
  formatElapsed,
  getKindIcon,
  indent,
  truncate,
} from './colors.js';

export interface TableOptions {
  head?: string[];
  colWidths?: number[];
  wordWrap?: boolean;
}

export function createTable(options: TableOptions = {}) {
  return new Table({
    head: options.head?.map(h => chalk.bold(h)) || [],
    colWidths: options.colWidths,
    wordWrap: options.wordWrap ?? true,
    style: {
      head: [],
      border: ['gray'],
    },
  });
}

type CliTable = ReturnType<typeof createTable>;

function printTable(table: CliTable): void {
  console.log(indent(table.toString()));
}

function elapsed(task: AnalysisTask): string {
  if (!task.startedAt) return '-';
  const end = task.completedAt ?? task.updatedAt;
  return formatElapsed(end.getTime() - task.startedAt.getTime());
}

export function renderTaskSummary(task: AnalysisTask): void {
  const statusColor = colorByStatus(task.status);

  console.log(chalk.bold('\n  Task ') + chalk.dim(task.id));
  console.log(`  Status:   ${statusColor(task.status)}`);
  console.log(`  Type:     ${task.contentType}`);
  console.log(`  Analyzer: ${getKindIcon(task.analyzerKind)} ${colorByKind(task.analyzerKind)(task.analyzerKind ?? 'unresolved')}`);
  if (task.metadata.filename) {
    console.log(`  File:     ${task.metadata.filename}`);
  }
  console.log(`  Elapsed:  ${elapsed(task)}`);

  if (task.status === 'failed') {
    console.log(chalk.red(`\n  ${task.errorKind ?? 'Error'}: ${task.error ?? 'unknown error'}\n`));
    return;
  }

  if (task.result) {
    console.log(chalk.bold('\n  Results:\n'));
    const table = createTable({ head: ['Field', 'Value'], colWidths: [26, 50] });
    for (const [key, value] of Object.entries(task.result)) {
      if (value === undefined) continue;
      const rendered = typeof value === 'object' ? JSON.stringify(value) : String(value);
      table.push([key, truncate(rendered, 200)]);
    }
    printTable(table);
    console.log();
  }
}

export function renderTaskTable(tasks: AnalysisTask[]): void {
  const table = createTable({
    head: ['File', 'Analyzer', 'Status', 'Elapsed', 'Detail'],
    colWidths: [30, 12, 12, 10, 40],
  });

  for (const task of tasks) {
    const detail = task.status === 'failed'
      ? chalk.red(task.errorKind ?? 'failed')
      : chalk.dim(task.contentType);

    table.push([
      truncate(task.metadata.filename ?? '(text)', 28),
      `${getKindIcon(task.analyzerKind)} ${colorByKind(task.analyzerKind)(task.analyzerKind ?? '-')}`,
      colorByStatus(task.status)(task.status),
      elapsed(task),
      detail,
    ]);
  }

  printTable(table);
}

export function renderBatchSummary(batch: BatchResult): void {
  const { total, successful, failed } = batch.metadata;
  console.log(chalk.bold(`\n  Batch ${chalk.dim(batch.batchId)}\n`));
  renderTaskTable(batch.items);
  console.log(
    `\n  ${total} total, ${chalk.green(`${successful} completed`)}, ` +
    `${failed > 0 ? chalk.red(`${failed} failed`) : chalk.dim('0 failed')}\n`
  );
}

export function renderCapabilitiesTable(
  capabilities: Record<AnalyzerKind, AnalyzerCapabilities>,
  health: Record<AnalyzerKind, AnalyzerHealth>
): void {
  const table = createTable({
    head: ['Analyzer', 'Status', 'Model', 'Features', 'Limit'],
    colWidths: [18, 14, 12, 40, 10],
  });

  for (const caps of Object.values(capabilities)) {
    const report = health[caps.kind];
    const status = report.status === 'healthy'
      ? chalk.green(report.modelLoaded ? 'ready' : 'ready (stub)')
      : chalk.red('unavailable');

    table.push([
      `${getKindIcon(caps.kind)} ${colorByKind(caps.kind)(caps.analyzer)}`,
      status,
      caps.model,
      caps.features.join(', ') || chalk.dim(report.reason ?? '-'),
      caps.maxDurationSeconds !== undefined ? `${caps.maxDurationSeconds}s` : '-',
    ]);
  }

  console.log(chalk.bold('\n  Analyzers:\n'));
  printTable(table);
  console.log();
}
