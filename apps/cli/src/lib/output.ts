/**
 * Console Output
 *
 * Plans, tables and JSON go to stdout. Status lines go to stderr so that
 * `split --json` and `media --json` print nothing but the document.
 */

import chalk from 'chalk';
import type { CopyStats } from '@debslice/mirror';
import type { MediaInfo, SkippedItem } from '@debslice/core';

function status(symbol: string, message: string): void {
  process.stderr.write(`${symbol} ${message}\n`);
}

export function printSuccess(message: string): void {
  status(chalk.green('✓'), message);
}

export function printError(message: string): void {
  status(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  status(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  status(chalk.blue('i'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printLines(lines: readonly string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

export function printSkipped(items: readonly SkippedItem[]): void {
  for (const item of items) {
    printWarning(`Skipped ${chalk.bold(item.name)}: size '${item.size}' exceeds '${item.capacity}'`);
  }
}

export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(2))} ${sizes[i]}`;
}

export function mediaRows(media: readonly MediaInfo[]): string[] {
  const width = Math.max(...media.map((entry) => entry.name.length));
  return media.map((entry) =>
    `${entry.name.padEnd(width)}  ${String(entry.capacity).padStart(10)}  ${formatBytes(entry.capacity).padStart(9)}  ${entry.description}`
  );
}

export function printMediaTable(media: readonly MediaInfo[]): void {
  console.log(chalk.bold.underline('Media Types'));
  printLines(mediaRows(media));
}

export function printCopyStats(stats: CopyStats): void {
  console.log(chalk.bold.underline('Copy Summary'));
  console.log(`  ${chalk.gray('Copied files:')} ${stats.copied}`);
  console.log(`  ${chalk.gray('Ignored files:')} ${stats.ignored}`);
  console.log(`  ${chalk.gray('Missing files:')} ${stats.notFound}`);
}
