/**
 * Plan Report
 *
 * Human and JSON renderings of a partition plan, plus the observer that
 * sends core warnings to the logger.
 */

import {
  formatWarning,
  type Partition,
  type PartitionObserver,
  type PartitionPlan,
} from '@debslice/core';
import { partitionName, sourcePartitionName, type PartitionNaming } from '@debslice/mirror';
import type { Logger } from '@debslice/utils';

export function createLoggingObserver(log: Logger): PartitionObserver {
  return {
    warning(warning) {
      log.warn({ warning }, formatWarning(warning));
    },
    partitionClosed(partition) {
      log.debug({ partition: partition.index, packages: partition.items.length }, 'Partition closed');
    },
  };
}

function itemsPreview(partition: Partition): string {
  const first = partition.items[0] ?? '';
  return partition.items.length > 1 ? `[ ${first}, ... ]` : `[ ${first} ]`;
}

/**
 * One line per partition, e.g.
 * `Debian0: 2 packages. Size: 80 + 30 = 110 [ a, ... ]`
 */
export function describePlan(plan: PartitionPlan, naming: PartitionNaming): string[] {
  const lines: string[] = [];

  for (const partition of plan.packages) {
    let line = `${partitionName(naming, partition.index)}: ${partition.items.length} packages. Size: ${partition.size}`;
    if (plan.sourceMode === 'merge') {
      line += ` + ${partition.sourceSize} = ${partition.size + partition.sourceSize}`;
    }
    lines.push(`${line} ${itemsPreview(partition)}`);
  }

  for (const partition of plan.sources) {
    const name = sourcePartitionName(naming, partition.index, plan.packages.length);
    lines.push(`${name}: ${partition.items.length} sources. Size: ${partition.size} ${itemsPreview(partition)}`);
  }

  return lines;
}

export interface PlanJson {
  sourceMode: PartitionPlan['sourceMode'];
  truncated: boolean;
  skipped: PartitionPlan['skipped'];
  partitions: Array<{
    name: string;
    kind: 'packages' | 'sources';
    capacity: number;
    size: number;
    sourceSize: number;
    items: string[];
    sources: string[];
  }>;
}

export function planToJson(plan: PartitionPlan, naming: PartitionNaming): PlanJson {
  return {
    sourceMode: plan.sourceMode,
    truncated: plan.truncated,
    skipped: plan.skipped,
    partitions: [
      ...plan.packages.map((partition) => ({
        name: partitionName(naming, partition.index),
        kind: 'packages' as const,
        capacity: partition.capacity,
        size: partition.size,
        sourceSize: partition.sourceSize,
        items: partition.items,
        sources: partition.sources,
      })),
      ...plan.sources.map((partition) => ({
        name: sourcePartitionName(naming, partition.index, plan.packages.length),
        kind: 'sources' as const,
        capacity: partition.capacity,
        size: partition.size,
        sourceSize: 0,
        items: partition.items,
        sources: [],
      })),
    ],
  };
}
