/**
 * Archive Layout
 *
 * Relative locations of index files inside a Debian-style archive tree.
 */

export interface ArchiveScope {
  dists: readonly string[];
  sections: readonly string[];
  arches: readonly string[];
}

export function packagesIndexPath(dist: string, section: string, arch: string): string {
  return `dists/${dist}/${section}/binary-${arch}/Packages.gz`;
}

export function sourcesIndexPath(dist: string, section: string): string {
  return `dists/${dist}/${section}/source/Sources.gz`;
}

/** Key of a Packages document: `dist/section/arch` */
export function packagesKey(dist: string, section: string, arch: string): string {
  return `${dist}/${section}/${arch}`;
}

/** Key of a Sources document: `dist/section` */
export function sourcesKey(dist: string, section: string): string {
  return `${dist}/${section}`;
}
