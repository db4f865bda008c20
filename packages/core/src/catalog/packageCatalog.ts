/**
 * Package Catalog
 *
 * Binary package sizes collected from one or more Packages documents.
 * The same `.deb` listed by several architectures (arch: all) or sections
 * is counted once, keyed by its `Filename`.
 */

import { getField, getSize, getToken, type Stanza } from '../archive/stanza.js';
import type { IndexDocument } from '../archive/document.js';
import { ArchiveCatalog } from './archiveCatalog.js';

export interface PackageRecord {
  name: string;
  size: number;
  /** Pool path, used as the dedup key */
  filename: string;
}

export function readPackageRecord(stanza: Stanza): PackageRecord | null {
  const name = getToken(stanza, 'Package');
  const size = getSize(stanza, 'Size');
  const filename = getField(stanza, 'Filename');
  if (name === undefined || size === undefined || !filename) {
    return null;
  }
  return { name, size, filename };
}

export class PackageCatalog extends ArchiveCatalog {
  ingest(document: IndexDocument): void {
    for (const stanza of document.stanzas()) {
      const record = readPackageRecord(stanza);
      if (record) {
        this.add(record);
      }
    }
  }

  add(record: PackageRecord): boolean {
    return this.register(record.name, record.filename, record.size);
  }
}
