/**
 * Split Settings
 *
 * Validates the raw `split` flags and turns them into the values the
 * core and mirror packages take. Every check here runs before any file
 * is read.
 */

import { z } from 'zod';
import {
  ConfigurationError,
  parseCapacityList,
  type ArchiveScope,
  type CapacityEntry,
  type SourceMode,
} from '@debslice/core';
import type { PartitionNaming } from '@debslice/mirror';
import type { SplitDefaults } from '../config/index.js';

export interface SplitCommandOptions {
  size?: string;
  srcsize?: string;
  dist?: string;
  section?: string;
  arch?: string;
  include?: string[];
  includeFrom?: string;
  dirmap?: string;
  dirprefix?: string;
  dirsrcprefix?: string;
  limit?: string;
  nosource?: boolean;
  mergeSource?: boolean;
  ignoreLargePackages?: boolean;
  dryRun?: boolean;
  json?: boolean;
}

export interface SplitSettings {
  source: string;
  dest: string;
  capacities: CapacityEntry[];
  sourceCapacities: CapacityEntry[];
  scope: ArchiveScope;
  include: string[];
  includeFrom?: string;
  naming: PartitionNaming;
  limit: number;
  sourceMode: SourceMode;
  ignoreOversized: boolean;
  dryRun: boolean;
  json: boolean;
}

const listSchema = z
  .string()
  .transform((value) => value.split(',').map((item) => item.trim()).filter((item) => item.length > 0));

const splitOptionsSchema = z.object({
  size: z.string().min(1),
  srcsize: z.string().min(1).optional(),
  dist: listSchema.pipe(z.array(z.string()).min(1, 'at least one distribution is required')),
  section: listSchema.pipe(z.array(z.string()).min(1, 'at least one section is required')),
  arch: listSchema.pipe(z.array(z.string()).min(1, 'at least one architecture is required')),
  include: z.array(listSchema).default([]).transform((lists) => lists.flat()),
  includeFrom: z.string().min(1).optional(),
  dirmap: listSchema.optional(),
  dirprefix: z.string(),
  dirsrcprefix: z.string(),
  limit: z.string().regex(/^\d+$/, 'limit must be a non-negative integer').transform(Number).default('0'),
  nosource: z.boolean().default(false),
  mergeSource: z.boolean().default(false),
  ignoreLargePackages: z.boolean().default(false),
  dryRun: z.boolean().default(false),
  json: z.boolean().default(false),
});

export function resolveSplitSettings(
  source: string,
  dest: string,
  options: SplitCommandOptions,
  defaults: SplitDefaults
): SplitSettings {
  const parsed = splitOptionsSchema.safeParse({
    ...options,
    size: options.size ?? defaults.size,
    dist: options.dist ?? defaults.dist,
    section: options.section ?? defaults.section,
    arch: options.arch ?? defaults.arch,
    dirprefix: options.dirprefix ?? defaults.dirprefix,
    dirsrcprefix: options.dirsrcprefix ?? defaults.dirsrcprefix,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const option = issue?.path.join('.') || 'options';
    throw new ConfigurationError(option, `Invalid --${option}: ${issue?.message ?? 'invalid value'}`);
  }

  const raw = parsed.data;

  if (raw.mergeSource && raw.nosource) {
    throw new ConfigurationError('merge-source', '--merge-source and --nosource are given');
  }

  const sourceMode: SourceMode = raw.nosource ? 'none' : raw.mergeSource ? 'merge' : 'separate';
  if (sourceMode === 'separate' && raw.limit === 1) {
    throw new ConfigurationError('limit', 'limit must be larger than 1 in no merge-mode');
  }

  const capacities = parseCapacityList(raw.size);
  const sourceCapacities = raw.srcsize ? parseCapacityList(raw.srcsize) : capacities;

  return {
    source,
    dest,
    capacities,
    sourceCapacities,
    scope: {
      dists: raw.dist,
      sections: raw.section,
      arches: raw.arch,
    },
    include: raw.include,
    includeFrom: raw.includeFrom,
    naming: {
      prefix: raw.dirprefix,
      // Merged sources live in the package partitions
      sourcePrefix: raw.mergeSource ? raw.dirprefix : raw.dirsrcprefix,
      dirmap: raw.dirmap ?? [],
    },
    limit: raw.limit,
    sourceMode,
    ignoreOversized: raw.ignoreLargePackages,
    dryRun: raw.dryRun,
    json: raw.json,
  };
}

/**
 * Commander collector for repeatable list options
 */
export function collectList(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}
