/**
 * Mirror Copier
 * 
 * Materializes the files referenced by a partition's indices: every
 * `Filename` of its Packages.gz files and every `Directory/file` of its
 * Sources.gz files is copied (or symlinked) from the source mirror.
 */

import { join } from 'node:path';
import {
  copyFile,
  createLogger,
  findFiles,
  pathExists,
  symlinkRelative,
} from '@debslice/utils';
import {
  getField,
  getFileList,
  readIndexDocument,
  type IndexDocument,
} from '@debslice/core';

export interface CopyMirrorOptions {
  /** Top directory of the source mirror */
  source: string;
  /** Top directory of one partition (holding `dists/`) */
  dest: string;
  /** Create relative symlinks instead of copies */
  symlink?: boolean;
  onIndex?: (file: string, paths: number) => void;
}

export interface CopyStats {
  copied: number;
  ignored: number;
  notFound: number;
}

export function packageFilePaths(document: IndexDocument): string[] {
  const paths: string[] = [];
  for (const stanza of document.stanzas()) {
    const filename = getField(stanza, 'Filename');
    if (filename) {
      paths.push(filename);
    }
  }
  return paths;
}

export function sourceFilePaths(document: IndexDocument): string[] {
  const paths: string[] = [];
  for (const stanza of document.stanzas()) {
    const directory = getField(stanza, 'Directory');
    if (!directory) {
      continue;
    }
    for (const entry of getFileList(stanza, 'Files')) {
      paths.push(`${directory}/${entry.filename}`);
    }
  }
  return paths;
}

export async function copyMirror(options: CopyMirrorOptions): Promise<CopyStats> {
  const log = createLogger({ module: 'mirror-copier', source: options.source, dest: options.dest });
  const stats: CopyStats = { copied: 0, ignored: 0, notFound: 0 };
  const distsDir = join(options.dest, 'dists');

  const copy = async (path: string): Promise<void> => {
    const from = join(options.source, path);
    const to = join(options.dest, path);

    if (await pathExists(to)) {
      stats.ignored += 1;
      return;
    }
    if (!(await pathExists(from))) {
      stats.notFound += 1;
      log.warn({ file: from }, 'File not found in source mirror');
      return;
    }

    if (options.symlink) {
      await symlinkRelative(from, to);
    } else {
      await copyFile(from, to);
    }
    stats.copied += 1;
  };

  for (const file of await findFiles(distsDir, 'Packages.gz')) {
    const paths = packageFilePaths(await readIndexDocument('packages', file));
    for (const path of paths) {
      await copy(path);
    }
    options.onIndex?.(file, paths.length);
  }

  for (const file of await findFiles(distsDir, 'Sources.gz')) {
    const paths = sourceFilePaths(await readIndexDocument('sources', file));
    for (const path of paths) {
      await copy(path);
    }
    options.onIndex?.(file, paths.length);
  }

  log.info({ ...stats }, 'Mirror copy finished');
  return stats;
}
