/**
 * @debslice/mirror
 * 
 * Output layer.
 * 
 * Responsibilities:
 * - Name partition directories
 * - Write each partition's Packages.gz / Sources.gz subset
 * - Copy or symlink the referenced pool files from a mirror
 */

export {
  DEFAULT_NAMING,
  partitionName,
  sourcePartitionName,
  type PartitionNaming,
} from './naming.js';
export {
  Emitter,
  type EmitResult,
  type EmitterOptions,
  type WrittenIndex,
} from './emitter.js';
export {
  copyMirror,
  packageFilePaths,
  sourceFilePaths,
  type CopyMirrorOptions,
  type CopyStats,
} from './copier.js';
