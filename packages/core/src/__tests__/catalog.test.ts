import { describe, it, expect } from 'vitest';
import { IndexDocument } from '../archive/document.js';
import { PackageCatalog } from '../catalog/packageCatalog.js';
import { SourceCatalog } from '../catalog/sourceCatalog.js';
import type { PartitionWarning } from '../types/warnings.js';

function packages(location: string, text: string): IndexDocument {
  return IndexDocument.parse('packages', location, text);
}

function sources(location: string, text: string): IndexDocument {
  return IndexDocument.parse('sources', location, text);
}

const I386 = `Package: base-files
Architecture: i386
Size: 100
Filename: pool/main/b/base-files/base-files_1_i386.deb

Package: doc-all
Architecture: all
Size: 50
Filename: pool/main/d/doc-all/doc-all_1_all.deb

Package: broken
Filename: pool/main/b/broken/broken_1_i386.deb
`;

const AMD64 = `Package: base-files
Architecture: amd64
Size: 120
Filename: pool/main/b/base-files/base-files_1_amd64.deb

Package: doc-all
Architecture: all
Size: 50
Filename: pool/main/d/doc-all/doc-all_1_all.deb
`;

describe('PackageCatalog', () => {
  it('counts a file shared by several architectures once', () => {
    const catalog = new PackageCatalog();
    catalog.ingest(packages('unstable/main/i386', I386));
    catalog.ingest(packages('unstable/main/amd64', AMD64));

    expect(catalog.sizeOf('doc-all')).toBe(50);
  });

  it('sums distinct files of the same package', () => {
    const catalog = new PackageCatalog();
    catalog.ingest(packages('unstable/main/i386', I386));
    catalog.ingest(packages('unstable/main/amd64', AMD64));

    expect(catalog.sizeOf('base-files')).toBe(220);
    expect(catalog.totalSize).toBe(270);
  });

  it('does not double count when the same document is ingested twice', () => {
    const catalog = new PackageCatalog();
    const document = packages('unstable/main/i386', I386);
    catalog.ingest(document);
    catalog.ingest(document);

    expect(catalog.sizeOf('base-files')).toBe(100);
  });

  it('skips stanzas without a size', () => {
    const catalog = new PackageCatalog();
    catalog.ingest(packages('unstable/main/i386', I386));

    expect(catalog.has('broken')).toBe(false);
    expect(catalog.sizeOf('broken')).toBe(0);
  });

  it('keeps names in first-seen order', () => {
    const catalog = new PackageCatalog();
    catalog.ingest(packages('unstable/main/amd64', AMD64));
    catalog.add({ name: 'zlib1g', size: 7, filename: 'pool/main/z/zlib/zlib1g.deb' });

    expect(catalog.names()).toEqual(['base-files', 'doc-all', 'zlib1g']);
    expect(catalog.count).toBe(3);
  });

  it('treats unknown names as zero in totals', () => {
    const catalog = new PackageCatalog();
    catalog.ingest(packages('unstable/main/i386', I386));

    expect(catalog.totalSizeOf(['base-files', 'missing', 'doc-all'])).toBe(150);
  });

  it('reports whether an added record brought new bytes', () => {
    const catalog = new PackageCatalog();
    const record = { name: 'hello', size: 10, filename: 'pool/main/h/hello/hello_1_i386.deb' };

    expect(catalog.add(record)).toBe(true);
    expect(catalog.add(record)).toBe(false);
    expect(catalog.count).toBe(1);
    expect(catalog.sizeOf('hello')).toBe(10);
  });
});

const MAIN_SOURCES = `Package: hello
Binary: hello, hello-dbg
Directory: pool/main/h/hello
Files:
 aaaa 1000 hello_1.dsc
 bbbb 20000 hello_1.tar.gz
Checksums-Sha256:
 cccc 1000 hello_1.dsc
 dddd 20000 hello_1.tar.gz

Package: nodir
Binary: nodir-bin
Files:
 eeee 300 nodir_1.dsc
`;

const TESTING_SOURCES = `Package: hello
Binary: hello
Directory: pool/main/h/hello
Files:
 aaaa 1000 hello_1.dsc
 ffff 500 hello_1.diff.gz
`;

describe('SourceCatalog', () => {
  it('sums the files of a source once across checksum fields', () => {
    const catalog = new SourceCatalog();
    catalog.ingest(sources('unstable/main', MAIN_SOURCES));

    expect(catalog.sizeOf('hello')).toBe(21000);
  });

  it('counts each directory/file pair once across documents', () => {
    const catalog = new SourceCatalog();
    catalog.ingest(sources('unstable/main', MAIN_SOURCES));
    catalog.ingest(sources('testing/main', TESTING_SOURCES));

    expect(catalog.sizeOf('hello')).toBe(21500);
  });

  it('knows a source without a directory but gives it no size', () => {
    const catalog = new SourceCatalog();
    catalog.ingest(sources('unstable/main', MAIN_SOURCES));

    expect(catalog.has('nodir')).toBe(true);
    expect(catalog.sizeOf('nodir')).toBe(0);
    expect(catalog.sourceOf('nodir-bin')).toBe('nodir');
  });

  it('maps binaries to their source', () => {
    const catalog = new SourceCatalog();
    catalog.ingest(sources('unstable/main', MAIN_SOURCES));

    expect(catalog.sourceOf('hello-dbg')).toBe('hello');
    expect(catalog.binariesOf('hello')).toEqual(['hello', 'hello-dbg']);
  });

  it('returns distinct sources in first-seen order', () => {
    const catalog = new SourceCatalog();
    catalog.ingest(sources('unstable/main', MAIN_SOURCES));

    expect(catalog.sourcesOf(['nodir-bin', 'hello', 'hello-dbg'])).toEqual(['nodir', 'hello']);
  });

  it('reports a binary without source once per catalog', () => {
    const catalog = new SourceCatalog();
    catalog.ingest(sources('unstable/main', MAIN_SOURCES));
    const warnings: PartitionWarning[] = [];
    const onMissing = (warning: PartitionWarning): void => {
      warnings.push(warning);
    };

    expect(catalog.sourcesOf(['orphan', 'hello', 'orphan'], onMissing)).toEqual(['hello']);
    expect(catalog.sourceOf('orphan', onMissing)).toBeUndefined();
    catalog.sourcesOf(['other'], onMissing);

    expect(warnings).toEqual([
      { kind: 'missing-source', binary: 'orphan' },
      { kind: 'missing-source', binary: 'other' },
    ]);
  });
});
