/**
 * Partition Naming
 *
 * Partition i lives in `<prefix><name(i)>` where name(i) is the i-th dirmap
 * entry, or the index itself. Source partitions use their own prefix; when
 * it equals the package prefix their numbering continues after the package
 * partitions so the two never share a directory.
 */

export interface PartitionNaming {
  prefix: string;
  sourcePrefix: string;
  dirmap: readonly string[];
}

export const DEFAULT_NAMING: PartitionNaming = {
  prefix: 'Debian',
  sourcePrefix: 'Debian-Src',
  dirmap: [],
};

function topDir(naming: PartitionNaming, index: number): string {
  return naming.dirmap[index] ?? String(index);
}

export function partitionName(naming: PartitionNaming, index: number): string {
  return `${naming.prefix}${topDir(naming, index)}`;
}

export function sourcePartitionName(
  naming: PartitionNaming,
  index: number,
  packagePartitions: number
): string {
  const slot = naming.sourcePrefix === naming.prefix ? packagePartitions + index : index;
  return `${naming.sourcePrefix}${topDir(naming, slot)}`;
}
