/**
 * Partition Sequence
 *
 * Ordered package partitions. The partitioner fills a draft partition and
 * commits it once closed; a committed partition is never touched again.
 */

import type { CapacitySequence } from '../config/media.js';
import { createPartition, type Partition } from '../types/partition.js';

export class PartitionSequence {
  private readonly committed: Partition[] = [];

  constructor(private readonly capacities: CapacitySequence) {}

  get count(): number {
    return this.committed.length;
  }

  get partitions(): readonly Partition[] {
    return this.committed;
  }

  /**
   * Empty partition for the next index, not yet part of the sequence
   */
  draft(): Partition {
    const index = this.committed.length;
    return createPartition(index, this.capacities.capacityAt(index));
  }

  commit(partition: Partition): void {
    if (partition.index !== this.committed.length) {
      throw new RangeError(`Partition ${partition.index} committed out of order (expected ${this.committed.length})`);
    }
    this.committed.push(partition);
  }
}
