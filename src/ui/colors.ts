import chalk from 'chalk';
import type { AnalyzerKind } from '../analyzers/types.js';
import type { TaskStatus } from '../core/task.js';

export const colors = {
  primary: chalk.cyan,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  muted: chalk.dim,
  highlight: chalk.bold,

  // Analyzer kinds
  text: chalk.blue,
  audio: chalk.green,
  video: chalk.yellow,

  // Task status
  pending: chalk.gray,
  processing: chalk.cyan,
  completed: chalk.green,
  failed: chalk.red,
};

export function colorByKind(kind: AnalyzerKind | undefined): chalk.ChalkFunction {
  return kind ? colors[kind] : colors.muted;
}

export function colorByStatus(status: TaskStatus): chalk.ChalkFunction {
  return colors[status];
}

export function getKindIcon(kind: AnalyzerKind | undefined): string {
  const icons: Record<AnalyzerKind, string> = {
    text: '📄',
    audio: '🎵',
    video: '🎬',
  };
  return kind ? icons[kind] : '❓';
}

export function formatSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let unitIndex = 0;
  let size = bytes;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  const formatted = unitIndex === 0 ? size.toString() : size.toFixed(1);
  return `${formatted} ${units[unitIndex]}`;
}

/** 1234 -> "1.2s", 65000 -> "1m 5s" */
export function formatElapsed(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${Math.round(seconds % 60)}s`;
}

export function indent(text: string, spaces = 2): string {
  const prefix = ' '.repeat(spaces);
  return text.split('\n').map(line => prefix + line).join('\n');
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - 3) + '...';
}
