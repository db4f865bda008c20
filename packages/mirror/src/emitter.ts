/**
 * Emitter
 * 
 * Writes each partition's subset of the Packages and Sources indices
 * into the destination tree.
 */

import { join } from 'node:path';
import { createLogger, writeGzipFile } from '@debslice/utils';
import {
  packagesIndexPath,
  packagesKey,
  sourcesIndexPath,
  sourcesKey,
  type ArchiveScope,
  type IndexDocument,
  type PartitionPlan,
} from '@debslice/core';
import { partitionName, sourcePartitionName, type PartitionNaming } from './naming.js';

export interface WrittenIndex {
  partition: string;
  kind: 'packages' | 'sources';
  /** Relative to the destination root */
  file: string;
  count: number;
}

export interface EmitResult {
  success: boolean;
  dest: string;
  files: WrittenIndex[];
  error?: string;
}

export interface EmitterOptions {
  dest: string;
  scope: ArchiveScope;
  naming: PartitionNaming;
  /** Keyed by `dist/section/arch` */
  packageDocuments: ReadonlyMap<string, IndexDocument>;
  /** Keyed by `dist/section` */
  sourceDocuments: ReadonlyMap<string, IndexDocument>;
  onWrite?: (written: WrittenIndex) => void;
}

export class Emitter {
  private readonly log = createLogger({ module: 'emitter' });

  constructor(private readonly options: EmitterOptions) {}

  /**
   * Write every partition of `plan`
   */
  async emit(plan: PartitionPlan): Promise<EmitResult> {
    const files: WrittenIndex[] = [];
    const { scope, naming } = this.options;

    try {
      for (const dist of scope.dists) {
        for (const section of scope.sections) {
          // Sources already written for this dist/section
          const written = new Set<string>();

          for (const partition of plan.packages) {
            const name = partitionName(naming, partition.index);

            for (const arch of scope.arches) {
              const document = this.options.packageDocuments.get(packagesKey(dist, section, arch));
              if (!document) {
                continue;
              }
              files.push(await this.write(name, packagesIndexPath(dist, section, arch), document, partition.items));
            }

            if (plan.sourceMode === 'merge') {
              files.push(...await this.writeSources(name, dist, section, partition.sources, written));
            }
          }

          if (plan.sourceMode === 'separate') {
            for (const partition of plan.sources) {
              const name = sourcePartitionName(naming, partition.index, plan.packages.length);
              files.push(...await this.writeSources(name, dist, section, partition.items, written));
            }
          }
        }
      }

      this.log.info({ dest: this.options.dest, files: files.length }, 'Partition indices written');

      return {
        success: true,
        dest: this.options.dest,
        files,
      };
    } catch (error) {
      this.log.error({ err: error, dest: this.options.dest }, 'Failed to write partition indices');
      return {
        success: false,
        dest: this.options.dest,
        files,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }

  private async writeSources(
    partition: string,
    dist: string,
    section: string,
    sources: readonly string[],
    written: Set<string>
  ): Promise<WrittenIndex[]> {
    const document = this.options.sourceDocuments.get(sourcesKey(dist, section));
    if (!document) {
      return [];
    }
    const file = await this.write(partition, sourcesIndexPath(dist, section), document, sources, written);
    for (const source of sources) {
      written.add(source);
    }
    return [file];
  }

  private async write(
    partition: string,
    indexPath: string,
    document: IndexDocument,
    names: readonly string[],
    exclude?: ReadonlySet<string>
  ): Promise<WrittenIndex> {
    const file = join(partition, indexPath);
    const rendered = document.render(names, exclude);
    await writeGzipFile(join(this.options.dest, file), rendered.text);

    const written: WrittenIndex = { partition, kind: document.kind, file, count: rendered.count };
    this.log.debug({ ...written, from: document.location }, 'Index written');
    this.options.onWrite?.(written);
    return written;
  }
}
