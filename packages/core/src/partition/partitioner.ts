/**
 * Partitioner
 *
 * Splits an ordered package list into partitions with a single left to
 * right next-fit pass. Nothing is reordered and a closed partition is never
 * revisited.
 *
 * Source handling:
 * - separate: each placed package's source goes to a SourcePartitionSequence
 *   with its own capacities; when that sequence may not grow any more the
 *   package partition closes.
 * - merge: a source is charged to the package partition where it is first
 *   needed; later binaries of the same source add nothing.
 * - none: sources are ignored.
 *
 * A package that does not fit into an empty partition is an oversized
 * singleton: skipped with a warning under `ignoreOversized`, fatal otherwise.
 */

import { createLogger, type Logger } from '@debslice/utils';
import type { PackageCatalog } from '../catalog/packageCatalog.js';
import type { SourceCatalog } from '../catalog/sourceCatalog.js';
import type { CapacitySequence } from '../config/media.js';
import { ConfigurationError, OversizedItemError } from '../errors/index.js';
import type { Partition, PartitionPlan, SkippedItem, SourceMode } from '../types/partition.js';
import type { PartitionObserver, PartitionWarning } from '../types/warnings.js';
import { PartitionSequence } from './partitionSequence.js';
import { SourcePartitionSequence } from './sourcePartitionSequence.js';

export interface PartitionerOptions {
  capacities: CapacitySequence;
  /** Capacities of source partitions, defaults to `capacities` */
  sourceCapacities?: CapacitySequence;
  sourceMode?: SourceMode;
  /** Maximum number of partitions, package and source together. 0 = no limit */
  maxPartitions?: number;
  ignoreOversized?: boolean;
  observer?: PartitionObserver;
}

interface PassState {
  sequence: PartitionSequence;
  sourceSequence?: SourcePartitionSequence;
  /** Merge mode: sources already charged to some partition */
  charged: Set<string>;
}

export class Partitioner {
  private readonly capacities: CapacitySequence;
  private readonly sourceCapacities: CapacitySequence;
  private readonly sourceMode: SourceMode;
  private readonly maxPartitions: number;
  private readonly ignoreOversized: boolean;
  private readonly observer?: PartitionObserver;
  private readonly log: Logger;

  constructor(
    private readonly packages: PackageCatalog,
    private readonly sources: SourceCatalog,
    options: PartitionerOptions
  ) {
    this.capacities = options.capacities;
    this.sourceCapacities = options.sourceCapacities ?? options.capacities;
    this.sourceMode = options.sourceMode ?? 'separate';
    this.maxPartitions = options.maxPartitions ?? 0;
    this.ignoreOversized = options.ignoreOversized ?? false;
    this.observer = options.observer;
    this.log = createLogger({ module: 'partitioner' });

    if (!Number.isInteger(this.maxPartitions) || this.maxPartitions < 0) {
      throw new ConfigurationError('limit', `Partition limit must be a non-negative integer: ${this.maxPartitions}`);
    }
    if (this.sourceMode === 'separate' && this.maxPartitions === 1) {
      throw new ConfigurationError('limit', 'limit must be larger than 1 when sources get their own partitions');
    }
  }

  run(names: readonly string[]): PartitionPlan {
    const sequence = new PartitionSequence(this.capacities);
    const state: PassState = {
      sequence,
      charged: new Set<string>(),
    };
    if (this.sourceMode === 'separate') {
      // One slot stays reserved for the package partition being filled
      state.sourceSequence = new SourcePartitionSequence(
        this.sources,
        this.sourceCapacities,
        (opened) => this.maxPartitions === 0 || sequence.count + 1 + opened < this.maxPartitions
      );
    }

    const skipped: SkippedItem[] = [];
    let truncated = false;
    let left = 0;

    while (left < names.length) {
      if (this.limitReached(state)) {
        truncated = true;
        break;
      }

      const partition = sequence.draft();
      try {
        left = this.fill(names, left, partition, state);
      } catch (error) {
        if (!(error instanceof OversizedItemError) || !this.ignoreOversized) {
          throw error;
        }
        const name = names[left] ?? error.item;
        skipped.push({ name, size: error.size, capacity: error.capacity });
        this.warn({
          kind: 'oversized-skipped',
          name,
          item: error.kind,
          itemName: error.item,
          size: error.size,
          capacity: error.capacity,
        });
        left += 1;
        continue;
      }

      // The source sequence refused to grow before anything was placed
      if (partition.items.length === 0) {
        truncated = true;
        break;
      }

      sequence.commit(partition);
      this.log.debug(
        { partition: partition.index, packages: partition.items.length, size: partition.size, sourceSize: partition.sourceSize },
        'Partition closed'
      );
      this.observer?.partitionClosed?.(partition);
    }

    return {
      sourceMode: this.sourceMode,
      packages: [...sequence.partitions],
      sources: [...(state.sourceSequence?.partitions ?? [])],
      skipped,
      truncated,
    };
  }

  private limitReached(state: PassState): boolean {
    if (this.maxPartitions === 0) {
      return false;
    }
    const used = state.sequence.count + (state.sourceSequence?.count ?? 0);
    return used >= this.maxPartitions;
  }

  /**
   * Fill `partition` starting at `start`; returns the position of the first
   * package left out.
   */
  private fill(
    names: readonly string[],
    start: number,
    partition: Partition,
    state: PassState
  ): number {
    let position = start;

    while (position < names.length) {
      const name = names[position];
      if (name === undefined) {
        break;
      }
      const used = partition.size + partition.sourceSize;
      const packageSize = this.packages.sizeOf(name);

      if (used + packageSize > partition.capacity) {
        if (position === start) {
          throw new OversizedItemError('package', name, packageSize, partition.capacity, partition.index);
        }
        break;
      }

      let chargedSource: string | undefined;
      let sourceSize = 0;

      if (this.sourceMode !== 'none') {
        const source = this.sources.sourceOf(name, (warning) => this.warn(warning));

        if (source !== undefined && this.sourceMode === 'merge') {
          if (!state.charged.has(source)) {
            chargedSource = source;
            sourceSize = this.sources.sizeOf(source);
          }
        } else if (source !== undefined && state.sourceSequence) {
          try {
            if (!state.sourceSequence.add(source)) {
              break;
            }
          } catch (error) {
            if (position === start || !(error instanceof OversizedItemError)) {
              throw error;
            }
            break;
          }
        }
      }

      if (used + packageSize + sourceSize > partition.capacity) {
        if (position === start) {
          throw new OversizedItemError('package', name, packageSize + sourceSize, partition.capacity, partition.index);
        }
        break;
      }

      if (chargedSource !== undefined) {
        state.charged.add(chargedSource);
        partition.sources.push(chargedSource);
        partition.sourceSize += sourceSize;
      }
      partition.items.push(name);
      partition.size += packageSize;
      position += 1;
    }

    return position;
  }

  private warn(warning: PartitionWarning): void {
    this.observer?.warning?.(warning);
  }
}
