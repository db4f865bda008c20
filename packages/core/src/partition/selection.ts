/**
 * Package Selection
 *
 * Decides which packages are partitioned and in what order: explicit
 * names first, then the lines of an include file. When neither yields a
 * known package, every cataloged package is taken in catalog order.
 */

import type { PackageCatalog } from '../catalog/packageCatalog.js';
import type { WarningHandler } from '../types/warnings.js';

export interface PackageSelection {
  /** Explicit names; unknown ones are reported */
  include?: readonly string[];
  /** One name per entry (lines of an include file); unknown ones are dropped quietly */
  includeFrom?: readonly string[];
}

/**
 * Split an include file into package names, ignoring blank lines
 */
export function parseIncludeList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function selectPackages(
  catalog: PackageCatalog,
  selection: PackageSelection = {},
  onWarning?: WarningHandler
): string[] {
  const selected = new Set<string>();

  for (const name of selection.include ?? []) {
    if (catalog.has(name)) {
      selected.add(name);
    } else {
      onWarning?.({ kind: 'unknown-package', name });
    }
  }

  for (const name of selection.includeFrom ?? []) {
    if (catalog.has(name)) {
      selected.add(name);
    }
  }

  if (selected.size === 0) {
    return catalog.names();
  }
  return [...selected];
}
