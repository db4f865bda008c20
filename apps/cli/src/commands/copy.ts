/**
 * Copy Command
 * 
 * Copy (or symlink) the pool files referenced by a partition's indices
 * from a mirror.
 */

import ora from 'ora';
import { copyMirror } from '@debslice/mirror';
import { printCopyStats, printError } from '../lib/output.js';

interface CopyOptions {
  symlink?: boolean;
}

export async function copyCommand(
  source: string,
  dest: string,
  options: CopyOptions
): Promise<void> {
  const spinner = ora('Copying files...').start();

  try {
    const stats = await copyMirror({
      source,
      dest,
      symlink: options.symlink ?? false,
      onIndex: (file, paths) => {
        spinner.text = `Processed ${file} (${paths} files)`;
      },
    });
    spinner.succeed('Copy finished');

    printCopyStats(stats);
  } catch (error) {
    spinner.fail('Copy failed');
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  }
}
