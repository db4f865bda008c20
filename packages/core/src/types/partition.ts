/**
 * Partition Types
 */

export type SourceMode = 'separate' | 'merge' | 'none';

/**
 * One output unit of the archive (a disc, a disk)
 */
export interface Partition {
  index: number;
  capacity: number;
  /** Package names, or source names for a source partition */
  items: string[];
  /** Bytes of the items themselves */
  size: number;
  /** Merge mode: source bytes charged into this partition */
  sourceSize: number;
  /** Merge mode: sources charged into this partition, in charge order */
  sources: string[];
}

export interface SkippedItem {
  name: string;
  size: number;
  capacity: number;
}

export interface PartitionPlan {
  sourceMode: SourceMode;
  packages: Partition[];
  /** Separate mode only */
  sources: Partition[];
  skipped: SkippedItem[];
  /** The partition limit stopped the pass before every package was placed */
  truncated: boolean;
}

export function createPartition(index: number, capacity: number): Partition {
  return {
    index,
    capacity,
    items: [],
    size: 0,
    sourceSize: 0,
    sources: [],
  };
}
