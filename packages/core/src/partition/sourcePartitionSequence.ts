/**
 * Source Partition Sequence
 *
 * Next-fit packing of sources into their own partitions, used when sources
 * are not merged into the package partitions. Runs alongside the package
 * pass: every placed package asks for its source to be added here.
 */

import type { CapacitySequence } from '../config/media.js';
import type { SourceCatalog } from '../catalog/sourceCatalog.js';
import { OversizedItemError } from '../errors/index.js';
import { createPartition, type Partition } from '../types/partition.js';

/**
 * Asked before a new source partition is opened; receives the number of
 * source partitions that already exist.
 */
export type OpenGuard = (openedCount: number) => boolean;

export class SourcePartitionSequence {
  private readonly parts: Partition[] = [];
  private readonly written = new Set<string>();

  constructor(
    private readonly catalog: SourceCatalog,
    private readonly capacities: CapacitySequence,
    private readonly canOpen: OpenGuard = () => true
  ) {}

  get count(): number {
    return this.parts.length;
  }

  get partitions(): readonly Partition[] {
    return this.parts;
  }

  /**
   * Place `source` in the current partition, or in a new one when it does
   * not fit. Returns false when a new partition was needed but the guard
   * refused it. Throws OversizedItemError when the source alone exceeds the
   * capacity of the partition it would open.
   */
  add(source: string): boolean {
    if (this.written.has(source)) {
      return true;
    }

    const size = this.catalog.sizeOf(source);
    const current = this.parts[this.parts.length - 1];
    if (current && current.size + size <= current.capacity) {
      this.place(current, source, size);
      return true;
    }

    const index = this.parts.length;
    const capacity = this.capacities.capacityAt(index);
    if (size > capacity) {
      throw new OversizedItemError('source', source, size, capacity, index);
    }
    if (!this.canOpen(this.parts.length)) {
      return false;
    }

    const partition = createPartition(index, capacity);
    this.parts.push(partition);
    this.place(partition, source, size);
    return true;
  }

  private place(partition: Partition, source: string, size: number): void {
    partition.items.push(source);
    partition.size += size;
    this.written.add(source);
  }
}
