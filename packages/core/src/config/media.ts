/**
 * Media Capacity Configuration
 *
 * Named media aliases and their usable capacity in bytes.
 *
 * Every raw value is scaled by SAFE_SPACE because the fixed cluster
 * (block) size of the written filesystem makes files take more room
 * than their byte count.
 *
 * CD sizes are counted in CD-ROM Mode 2 / XA Form 1 blocks of 2048 bytes,
 * 75 blocks per second of audio:
 *   74min CD -> 74 * 60 * 75 blocks
 *   80min CD -> 79m57s74 -> (79 * 60 * 75) + (57 * 75) + 74 blocks
 */

import { ConfigurationError } from '../errors/index.js';
import type { WarningHandler } from '../types/warnings.js';

export const SAFE_SPACE = 0.93;

const MIB = 1024 * 1024;
const CD_BLOCK = 2048;

const MEDIA_TABLE = [
  { name: 'FD', description: '2HD 1.44M Floppy Disk', rawBytes: 1440000 },
  { name: 'CF8', description: '8M Compact Flash', rawBytes: 8 * MIB },
  { name: 'CF16', description: '16M Compact Flash', rawBytes: 16 * MIB },
  { name: 'CF32', description: '32M Compact Flash', rawBytes: 32 * MIB },
  { name: 'CF64', description: '64M Compact Flash', rawBytes: 64 * MIB },
  { name: 'MO128', description: '128M MO', rawBytes: 128 * MIB },
  { name: 'MO230', description: '230M MO', rawBytes: 230 * MIB },
  { name: 'MO640', description: '640M MO', rawBytes: 640 * MIB },
  { name: 'MO1.3G', description: '1.3G MO', rawBytes: 1300 * MIB },
  { name: 'CD74', description: '74min (650M) CD', rawBytes: 74 * 60 * 75 * CD_BLOCK },
  { name: 'CD80', description: '80min (700M) CD', rawBytes: ((79 * 60 * 75) + (57 * 75) + 74) * CD_BLOCK },
  { name: 'DVD-RAM', description: '(2.6G) DVD-RAM', rawBytes: 2600000000 },
  { name: 'DVD', description: 'Single Layer (4.7G) DVD-ROM', rawBytes: 4700000000 },
] as const;

export type MediaType = (typeof MEDIA_TABLE)[number]['name'];

const MEDIA_CAPACITIES: ReadonlyMap<string, number> = new Map(
  MEDIA_TABLE.map((media) => [media.name, Math.round(media.rawBytes * SAFE_SPACE)])
);

export function isMediaType(name: string): name is MediaType {
  return MEDIA_CAPACITIES.has(name);
}

/**
 * Resolve a media alias to its usable capacity.
 * Unknown names report an `unknown-media` warning and resolve to 0.
 */
export function resolveMedia(name: string, onWarning?: WarningHandler): number {
  const capacity = MEDIA_CAPACITIES.get(name);
  if (capacity === undefined) {
    onWarning?.({ kind: 'unknown-media', media: name });
    return 0;
  }
  return capacity;
}

export interface MediaInfo {
  name: MediaType;
  description: string;
  rawBytes: number;
  capacity: number;
}

export function listMediaTypes(): MediaInfo[] {
  return MEDIA_TABLE.map((media) => ({
    name: media.name,
    description: media.description,
    rawBytes: media.rawBytes,
    capacity: Math.round(media.rawBytes * SAFE_SPACE),
  }));
}

/** A literal byte count or a media alias */
export type CapacityEntry = number | string;

/**
 * Parse one `--size` entry. Plain integers are byte counts, anything else
 * must name a known media type.
 */
export function parseCapacityEntry(text: string): CapacityEntry {
  const value = text.trim();
  if (/^\d+$/.test(value)) {
    return Number(value);
  }
  if (!isMediaType(value)) {
    throw new ConfigurationError('size', `Unknown media type ${value}`);
  }
  return value;
}

/**
 * Parse a comma separated `--size` list. An empty slot (`100,,200`) is
 * rejected rather than dropped, so later entries keep their positions.
 */
export function parseCapacityList(text: string): CapacityEntry[] {
  return text.split(',').map((entry) => {
    if (entry.trim().length === 0) {
      throw new ConfigurationError('size', `Empty entry in size list '${text}'`);
    }
    return parseCapacityEntry(entry);
  });
}

/**
 * Ordered capacities for partitions 0, 1, 2, ...
 * Past the end of the list the last entry is carried forward, and a `0`
 * entry stands for the nearest earlier non-zero entry, so `CD74,0,0,DVD`
 * gives three CD74 partitions followed by DVDs.
 */
export class CapacitySequence {
  private readonly entries: readonly CapacityEntry[];
  private readonly resolved = new Map<number, number>();
  private readonly onWarning?: WarningHandler;

  constructor(entries: readonly CapacityEntry[], onWarning?: WarningHandler) {
    if (entries.length === 0) {
      throw new ConfigurationError('size', 'Capacity list must not be empty');
    }
    this.entries = [...entries];
    this.onWarning = onWarning;
  }

  get length(): number {
    return this.entries.length;
  }

  capacityAt(index: number): number {
    let slot = Math.min(Math.max(index, 0), this.entries.length - 1);
    while (slot > 0 && this.entries[slot] === 0) {
      slot -= 1;
    }
    const cached = this.resolved.get(slot);
    if (cached !== undefined) {
      return cached;
    }

    const entry = this.entries[slot];
    const capacity = typeof entry === 'number' ? entry : resolveMedia(entry, this.onWarning);
    this.resolved.set(slot, capacity);
    return capacity;
  }
}
