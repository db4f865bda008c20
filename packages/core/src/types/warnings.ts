/**
 * Warning Types
 *
 * Recoverable conditions raised while loading catalogs and partitioning.
 * They are handed to a PartitionObserver; nothing here is fatal.
 */

import type { OversizedItemKind } from '../errors/index.js';
import type { Partition } from './partition.js';

export type PartitionWarning =
  | { kind: 'unknown-media'; media: string }
  | { kind: 'missing-source'; binary: string }
  | { kind: 'unknown-package'; name: string }
  | {
      kind: 'oversized-skipped';
      /** The package left out */
      name: string;
      /** What did not fit: the package itself or its source */
      item: OversizedItemKind;
      itemName: string;
      size: number;
      capacity: number;
    };

export type WarningHandler = (warning: PartitionWarning) => void;

export interface PartitionObserver {
  warning?(warning: PartitionWarning): void;
  partitionClosed?(partition: Readonly<Partition>): void;
}

/**
 * Observer that collects every warning, mostly useful in tests
 */
export class WarningCollector implements PartitionObserver {
  readonly warnings: PartitionWarning[] = [];

  warning(warning: PartitionWarning): void {
    this.warnings.push(warning);
  }
}

export function formatWarning(warning: PartitionWarning): string {
  switch (warning.kind) {
    case 'unknown-media':
      return `Unknown media name: ${warning.media}`;
    case 'missing-source':
      return `Source of ${warning.binary} not found`;
    case 'unknown-package':
      return `No such package: ${warning.name}`;
    case 'oversized-skipped':
      if (warning.item === 'source') {
        return `Ignoring package '${warning.name}': source '${warning.itemName}' of size '${warning.size}' exceeds source partition size '${warning.capacity}'`;
      }
      return `Ignoring package '${warning.name}': size '${warning.size}' exceeds partition size '${warning.capacity}'`;
  }
}
