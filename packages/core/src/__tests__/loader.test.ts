import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, mkdir, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { writeGzipFile } from '@debslice/utils';
import { loadArchive, readIndexDocument } from '../archive/loader.js';
import { packagesIndexPath, sourcesIndexPath } from '../archive/layout.js';
import { IndexReadError } from '../errors/index.js';

describe('loadArchive', () => {
  let root: string;

  beforeAll(async () => {
    root = await mkdtemp(join(tmpdir(), 'debslice-loader-'));

    await writeGzipFile(
      join(root, packagesIndexPath('unstable', 'main', 'i386')),
      'Package: hello\nSize: 100\nFilename: pool/main/h/hello/hello_1_i386.deb\n\n' +
      'Package: hello-doc\nSize: 40\nFilename: pool/main/h/hello/hello-doc_1_all.deb\n\n'
    );
    await writeGzipFile(
      join(root, packagesIndexPath('unstable', 'main', 'amd64')),
      'Package: hello\nSize: 110\nFilename: pool/main/h/hello/hello_1_amd64.deb\n\n' +
      'Package: hello-doc\nSize: 40\nFilename: pool/main/h/hello/hello-doc_1_all.deb\n\n'
    );
    await writeGzipFile(
      join(root, sourcesIndexPath('unstable', 'main')),
      'Package: hello\nBinary: hello, hello-doc\nDirectory: pool/main/h/hello\nFiles:\n aaaa 700 hello_1.dsc\n bbbb 9000 hello_1.tar.gz\n\n'
    );

    const plain = join(root, 'dists/unstable/contrib/binary-i386');
    await mkdir(plain, { recursive: true });
    await writeFile(join(plain, 'Packages.gz'), 'Package: not-compressed\n');
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('reads every architecture into one catalog', async () => {
    const archive = await loadArchive({
      root,
      dists: ['unstable'],
      sections: ['main'],
      arches: ['i386', 'amd64'],
      sources: true,
    });

    expect(archive.packages.sizeOf('hello')).toBe(210);
    expect(archive.packages.sizeOf('hello-doc')).toBe(40);
    expect(archive.sources.sizeOf('hello')).toBe(9700);
    expect(archive.sources.sourceOf('hello-doc')).toBe('hello');
    expect([...archive.packageDocuments.keys()]).toEqual(['unstable/main/i386', 'unstable/main/amd64']);
    expect([...archive.sourceDocuments.keys()]).toEqual(['unstable/main']);
  });

  it('skips Sources.gz when sources are not handled', async () => {
    const read: string[] = [];
    const archive = await loadArchive({
      root,
      dists: ['unstable'],
      sections: ['main'],
      arches: ['i386'],
      sources: false,
      onRead: (file) => read.push(file),
    });

    expect(archive.sources.count).toBe(0);
    expect(read).toEqual(['dists/unstable/main/binary-i386/Packages.gz']);
  });

  it('fails on a missing index', async () => {
    await expect(loadArchive({
      root,
      dists: ['unstable'],
      sections: ['non-free'],
      arches: ['i386'],
      sources: false,
    })).rejects.toBeInstanceOf(IndexReadError);
  });

  it('fails on an index that is not gzip', async () => {
    await expect(
      readIndexDocument('packages', join(root, 'dists/unstable/contrib/binary-i386/Packages.gz'))
    ).rejects.toBeInstanceOf(IndexReadError);
  });
});
