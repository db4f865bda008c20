/**
 * Archive Loader
 *
 * Reads every Packages.gz (and Sources.gz) of the requested scope into
 * one pair of catalogs. Any unreadable index aborts the load before
 * anything is written.
 */

import { join } from 'node:path';
import { createLogger, readGzipFile } from '@debslice/utils';
import { PackageCatalog } from '../catalog/packageCatalog.js';
import { SourceCatalog } from '../catalog/sourceCatalog.js';
import { IndexReadError } from '../errors/index.js';
import { IndexDocument, type IndexKind } from './document.js';
import {
  packagesIndexPath,
  packagesKey,
  sourcesIndexPath,
  sourcesKey,
  type ArchiveScope,
} from './layout.js';

export interface LoadArchiveOptions extends ArchiveScope {
  root: string;
  /** Read Sources.gz as well */
  sources: boolean;
  onRead?: (file: string, entries: number) => void;
}

export interface LoadedArchive {
  packages: PackageCatalog;
  sources: SourceCatalog;
  /** Keyed by `dist/section/arch` */
  packageDocuments: Map<string, IndexDocument>;
  /** Keyed by `dist/section` */
  sourceDocuments: Map<string, IndexDocument>;
}

export async function readIndexDocument(
  kind: IndexKind,
  file: string,
  location: string = file
): Promise<IndexDocument> {
  let text: string;
  try {
    text = await readGzipFile(file);
  } catch (error) {
    throw new IndexReadError(file, error);
  }
  return IndexDocument.parse(kind, location, text);
}

export async function loadArchive(options: LoadArchiveOptions): Promise<LoadedArchive> {
  const log = createLogger({ module: 'archive-loader', root: options.root });
  const archive: LoadedArchive = {
    packages: new PackageCatalog(),
    sources: new SourceCatalog(),
    packageDocuments: new Map(),
    sourceDocuments: new Map(),
  };

  for (const arch of options.arches) {
    for (const dist of options.dists) {
      for (const section of options.sections) {
        const file = packagesIndexPath(dist, section, arch);
        const key = packagesKey(dist, section, arch);
        const document = await readIndexDocument('packages', join(options.root, file), key);
        archive.packages.ingest(document);
        archive.packageDocuments.set(key, document);
        log.debug({ file, entries: document.size }, 'Read Packages index');
        options.onRead?.(file, document.size);
      }
    }
  }

  if (options.sources) {
    for (const dist of options.dists) {
      for (const section of options.sections) {
        const file = sourcesIndexPath(dist, section);
        const key = sourcesKey(dist, section);
        const document = await readIndexDocument('sources', join(options.root, file), key);
        archive.sources.ingest(document);
        archive.sourceDocuments.set(key, document);
        log.debug({ file, entries: document.size }, 'Read Sources index');
        options.onRead?.(file, document.size);
      }
    }
  }

  log.info(
    { packages: archive.packages.count, sources: archive.sources.count },
    'Archive catalogs loaded'
  );
  return archive;
}
