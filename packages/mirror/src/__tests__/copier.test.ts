import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { lstat, mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { safeWriteFile, writeGzipFile } from '@debslice/utils';
import { IndexDocument } from '@debslice/core';
import { copyMirror, packageFilePaths, sourceFilePaths } from '../copier.js';

describe('file paths of an index', () => {
  it('lists Filename of every package', () => {
    const document = IndexDocument.parse(
      'packages',
      'test',
      'Package: a\nFilename: pool/a.deb\n\nPackage: b\n\nPackage: c\nFilename: pool/c.deb\n'
    );
    expect(packageFilePaths(document)).toEqual(['pool/a.deb', 'pool/c.deb']);
  });

  it('lists the Files entries under each Directory', () => {
    const document = IndexDocument.parse(
      'sources',
      'test',
      'Package: s\nDirectory: pool/s\nFiles:\n 00 1 s.dsc\n 11 2 s.tar.gz\nChecksums-Sha256:\n 22 1 s.dsc\n\n' +
      'Package: t\nFiles:\n 00 1 t.dsc\n'
    );
    expect(sourceFilePaths(document)).toEqual(['pool/s/s.dsc', 'pool/s/s.tar.gz']);
  });
});

describe('copyMirror', () => {
  let root: string;
  let source: string;
  let dest: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'debslice-copier-'));
    source = join(root, 'mirror');
    dest = join(root, 'Debian0');

    await safeWriteFile(join(source, 'pool/main/h/hello/hello_1_i386.deb'), 'deb');
    await safeWriteFile(join(source, 'pool/main/h/hello/hello_1.dsc'), 'dsc');

    await writeGzipFile(
      join(dest, 'dists/unstable/main/binary-i386/Packages.gz'),
      'Package: hello\nFilename: pool/main/h/hello/hello_1_i386.deb\n\n' +
      'Package: gone\nFilename: pool/main/g/gone/gone_1_i386.deb\n\n'
    );
    await writeGzipFile(
      join(dest, 'dists/unstable/main/source/Sources.gz'),
      'Package: hello\nDirectory: pool/main/h/hello\nFiles:\n 00 3 hello_1.dsc\n\n'
    );
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('copies every referenced file and counts the missing ones', async () => {
    const indices: Array<[string, number]> = [];
    const stats = await copyMirror({ source, dest, onIndex: (file, paths) => indices.push([file, paths]) });

    expect(stats).toEqual({ copied: 2, ignored: 0, notFound: 1 });
    expect(indices).toEqual([
      [join(dest, 'dists/unstable/main/binary-i386/Packages.gz'), 2],
      [join(dest, 'dists/unstable/main/source/Sources.gz'), 1],
    ]);
    expect(await readFile(join(dest, 'pool/main/h/hello/hello_1.dsc'), 'utf8')).toBe('dsc');
  });

  it('leaves files already in place alone', async () => {
    await copyMirror({ source, dest });
    const stats = await copyMirror({ source, dest });

    expect(stats).toEqual({ copied: 0, ignored: 2, notFound: 1 });
  });

  it('links instead of copying when asked', async () => {
    const stats = await copyMirror({ source, dest, symlink: true });
    const target = join(dest, 'pool/main/h/hello/hello_1_i386.deb');

    expect(stats.copied).toBe(2);
    expect((await lstat(target)).isSymbolicLink()).toBe(true);
    expect(await readFile(target, 'utf8')).toBe('deb');
  });
});
