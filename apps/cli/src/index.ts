#!/usr/bin/env tsx
/**
 * CLI Entry Point
 * 
 * Command-line interface for debslice.
 * Commands only parse flags and print; partitioning lives in @debslice/core.
 */

import { config } from './config/index.js';
import { Command } from 'commander';
import chalk from 'chalk';
import { setLogLevel } from '@debslice/utils';

// Commands
import { splitCommand } from './commands/split.js';
import { copyCommand } from './commands/copy.js';
import { mediaCommand } from './commands/media.js';
import { collectList } from './lib/settings.js';

const program = new Command();

program
  .name('debslice')
  .description('Split a Debian archive into size-limited partitions')
  .version('1.0.0')
  .option('--debug', 'Enable debug output');

program.hook('preAction', () => {
  setLogLevel(program.opts<{ debug?: boolean }>().debug ? 'debug' : config.logLevel);
});

// ============================================
// PARTITION COMMANDS
// ============================================

program
  .command('split <source> <dest>')
  .description('Partition Packages.gz/Sources.gz of <source> into partitions under <dest>')
  .option('-S, --size <list>', 'Comma separated partition sizes (bytes or media type)')
  .option('-R, --srcsize <list>', 'Comma separated source partition sizes (defaults to --size)')
  .option('-d, --dist <list>', 'Comma separated distributions')
  .option('-s, --section <list>', 'Comma separated sections')
  .option('-a, --arch <list>', 'Comma separated architectures')
  .option('-i, --include <list>', 'Comma separated packages to handle first (repeatable)', collectList)
  .option('--include-from <file>', 'File listing packages to handle, one per line')
  .option('-D, --dirmap <list>', 'Comma separated partition names')
  .option('--dirprefix <prefix>', 'Prefix of partition directories')
  .option('--dirsrcprefix <prefix>', 'Prefix of source partition directories')
  .option('-l, --limit <count>', 'Maximum number of partitions (0 = no limit)')
  .option('--nosource', "Don't handle sources")
  .option('-m, --merge-source', 'Put sources into the same partitions as their packages')
  .option('-I, --ignore-large-packages', 'Skip packages larger than a partition instead of failing')
  .option('--dry-run', 'Print the partition plan without writing anything')
  .option('--json', 'Output the plan in JSON format')
  .action(splitCommand);

program
  .command('copy <source> <dest>')
  .description('Copy the files listed by the indices under <dest>/dists from the mirror <source>')
  .option('-l, --symlink', 'Create relative symlinks instead of copies')
  .action(copyCommand);

program
  .command('media')
  .description('List built-in media types')
  .option('--json', 'Output in JSON format')
  .action(mediaCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('debslice --help'), 'for available commands');
  }
  process.exit(1);
});

// Parse and execute
await program.parseAsync();
