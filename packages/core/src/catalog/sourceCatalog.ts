/**
 * Source Catalog
 *
 * Source package sizes and the binary -> source mapping, collected from
 * one or more Sources documents. A source's size is the sum of the files
 * listed under it; each `Directory/filename` is counted once across every
 * document ingested.
 */

import { getField, getFileList, getList, getToken, type Stanza } from '../archive/stanza.js';
import type { IndexDocument } from '../archive/document.js';
import type { WarningHandler } from '../types/warnings.js';
import { ArchiveCatalog } from './archiveCatalog.js';

export interface SourceFile {
  filename: string;
  size: number;
}

export interface SourceRecord {
  name: string;
  binaries: string[];
  directory?: string;
  files: SourceFile[];
}

const FILE_LIST_FIELDS = ['Files', 'Checksums-Sha1', 'Checksums-Sha256'];

export function readSourceRecord(stanza: Stanza): SourceRecord | null {
  const name = getToken(stanza, 'Package');
  if (name === undefined) {
    return null;
  }

  // Every checksum field lists the same files; the dedup key collapses them
  const files: SourceFile[] = [];
  for (const field of FILE_LIST_FIELDS) {
    for (const entry of getFileList(stanza, field)) {
      files.push({ filename: entry.filename, size: entry.size });
    }
  }

  return {
    name,
    binaries: getList(stanza, 'Binary'),
    directory: getField(stanza, 'Directory') || undefined,
    files,
  };
}

export class SourceCatalog extends ArchiveCatalog {
  private readonly bySource = new Map<string, Set<string>>();
  private readonly byBinary = new Map<string, string>();
  private readonly reported = new Set<string>();

  ingest(document: IndexDocument): void {
    for (const stanza of document.stanzas()) {
      const record = readSourceRecord(stanza);
      if (record) {
        this.add(record);
      }
    }
  }

  add(record: SourceRecord): void {
    this.touch(record.name);

    for (const binary of record.binaries) {
      this.byBinary.set(binary, record.name);
      const binaries = this.bySource.get(record.name) ?? new Set<string>();
      binaries.add(binary);
      this.bySource.set(record.name, binaries);
    }

    // Files without a directory cannot be located, so they add nothing
    if (record.directory === undefined) {
      return;
    }
    for (const file of record.files) {
      this.register(record.name, `${record.directory}/${file.filename}`, file.size);
    }
  }

  binariesOf(source: string): string[] {
    return [...(this.bySource.get(source) ?? [])];
  }

  /**
   * Source of one binary. A binary without a known source is reported
   * through `onMissing` once for the lifetime of this catalog.
   */
  sourceOf(binary: string, onMissing?: WarningHandler): string | undefined {
    const source = this.byBinary.get(binary);
    if (source === undefined && onMissing && !this.reported.has(binary)) {
      this.reported.add(binary);
      onMissing({ kind: 'missing-source', binary });
    }
    return source;
  }

  /**
   * Distinct sources of `binaries`, in first-seen order
   */
  sourcesOf(binaries: Iterable<string>, onMissing?: WarningHandler): string[] {
    const sources = new Set<string>();
    for (const binary of binaries) {
      const source = this.sourceOf(binary, onMissing);
      if (source !== undefined) {
        sources.add(source);
      }
    }
    return [...sources];
  }
}
