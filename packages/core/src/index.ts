/**
 * @debslice/core
 *
 * Indexing and partitioning engine:
 * - Stanza parsing and index documents
 * - Package and source catalogs
 * - Media capacities
 * - Next-fit partitioner
 * - Error handling
 * - Shared types
 */

// Types
export type {
  Partition,
  PartitionPlan,
  SkippedItem,
  SourceMode,
} from './types/partition.js';

export { createPartition } from './types/partition.js';

export type {
  PartitionWarning,
  PartitionObserver,
  WarningHandler,
} from './types/warnings.js';

export { WarningCollector, formatWarning } from './types/warnings.js';

// Errors
export {
  DebsliceError,
  ConfigurationError,
  IndexReadError,
  OversizedItemError,
  isDebsliceError,
  type OversizedItemKind,
} from './errors/index.js';

// Media configuration
export {
  SAFE_SPACE,
  CapacitySequence,
  isMediaType,
  resolveMedia,
  listMediaTypes,
  parseCapacityEntry,
  parseCapacityList,
  type CapacityEntry,
  type MediaType,
  type MediaInfo,
} from './config/media.js';

// Archive indices
export {
  parseStanzas,
  getField,
  getToken,
  getSize,
  getList,
  getFileList,
  type Stanza,
  type FileListEntry,
} from './archive/stanza.js';

export {
  IndexDocument,
  type IndexKind,
  type RenderedIndex,
} from './archive/document.js';

export {
  packagesIndexPath,
  sourcesIndexPath,
  packagesKey,
  sourcesKey,
  type ArchiveScope,
} from './archive/layout.js';

export {
  loadArchive,
  readIndexDocument,
  type LoadArchiveOptions,
  type LoadedArchive,
} from './archive/loader.js';

// Catalogs
export { ArchiveCatalog } from './catalog/archiveCatalog.js';
export {
  PackageCatalog,
  readPackageRecord,
  type PackageRecord,
} from './catalog/packageCatalog.js';
export {
  SourceCatalog,
  readSourceRecord,
  type SourceRecord,
  type SourceFile,
} from './catalog/sourceCatalog.js';

// Partitioning
export { PartitionSequence } from './partition/partitionSequence.js';
export {
  SourcePartitionSequence,
  type OpenGuard,
} from './partition/sourcePartitionSequence.js';
export {
  Partitioner,
  type PartitionerOptions,
} from './partition/partitioner.js';
export {
  selectPackages,
  parseIncludeList,
  type PackageSelection,
} from './partition/selection.js';
