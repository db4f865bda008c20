import { describe, it, expect } from 'vitest';
import {
  CapacitySequence,
  isMediaType,
  listMediaTypes,
  parseCapacityEntry,
  parseCapacityList,
  resolveMedia,
} from '../config/media.js';
import { ConfigurationError } from '../errors/index.js';
import type { PartitionWarning } from '../types/warnings.js';

describe('resolveMedia', () => {
  it('scales a 74 minute CD to 93% of 333000 blocks of 2048 bytes', () => {
    expect(resolveMedia('CD74')).toBe(634245120);
  });

  it('rounds the scaled 80 minute CD capacity', () => {
    expect(resolveMedia('CD80')).toBe(685382799);
  });

  it('scales decimal and binary sized media', () => {
    expect(resolveMedia('FD')).toBe(1339200);
    expect(resolveMedia('DVD')).toBe(4371000000);
    expect(resolveMedia('CF8')).toBe(7801405);
  });

  it('reports unknown media and resolves them to zero', () => {
    const warnings: PartitionWarning[] = [];
    expect(resolveMedia('BLURAY', (warning) => warnings.push(warning))).toBe(0);
    expect(warnings).toEqual([{ kind: 'unknown-media', media: 'BLURAY' }]);
  });
});

describe('listMediaTypes', () => {
  it('lists every alias with its raw and usable size', () => {
    const media = listMediaTypes();
    expect(media).toHaveLength(13);
    expect(media.find((entry) => entry.name === 'CD74')).toEqual({
      name: 'CD74',
      description: '74min (650M) CD',
      rawBytes: 681984000,
      capacity: 634245120,
    });
  });

  it('recognizes aliases case-sensitively', () => {
    expect(isMediaType('DVD-RAM')).toBe(true);
    expect(isMediaType('dvd')).toBe(false);
  });
});

describe('parseCapacityEntry', () => {
  it('reads plain integers as byte counts', () => {
    expect(parseCapacityEntry('400000000')).toBe(400000000);
  });

  it('keeps known media names', () => {
    expect(parseCapacityEntry(' MO640 ')).toBe('MO640');
  });

  it('rejects anything else', () => {
    expect(() => parseCapacityEntry('700M')).toThrow(ConfigurationError);
    expect(() => parseCapacityEntry('700M')).toThrow('Unknown media type 700M');
  });

  it('splits comma separated lists', () => {
    expect(parseCapacityList('CD74, 1000,0,DVD')).toEqual(['CD74', 1000, 0, 'DVD']);
  });

  it('rejects an empty slot instead of shifting later entries', () => {
    expect(() => parseCapacityList('100,,200')).toThrow(ConfigurationError);
    expect(() => parseCapacityList('100,,200')).toThrow("Empty entry in size list '100,,200'");
  });
});

describe('CapacitySequence', () => {
  it('carries the last entry forward', () => {
    const sequence = new CapacitySequence([100, 'FD', 300]);
    expect(sequence.capacityAt(0)).toBe(100);
    expect(sequence.capacityAt(1)).toBe(1339200);
    expect(sequence.capacityAt(2)).toBe(300);
    expect(sequence.capacityAt(3)).toBe(300);
    expect(sequence.capacityAt(50)).toBe(300);
  });

  it('reports an unknown alias once per entry', () => {
    const warnings: PartitionWarning[] = [];
    const sequence = new CapacitySequence(['NOPE'], (warning) => warnings.push(warning));
    expect(sequence.capacityAt(0)).toBe(0);
    expect(sequence.capacityAt(4)).toBe(0);
    expect(warnings).toHaveLength(1);
  });

  it('reads a zero entry as the nearest earlier non-zero entry', () => {
    const sequence = new CapacitySequence([100, 0, 0, 'FD', 0]);
    expect(sequence.capacityAt(1)).toBe(100);
    expect(sequence.capacityAt(2)).toBe(100);
    expect(sequence.capacityAt(3)).toBe(1339200);
    expect(sequence.capacityAt(4)).toBe(1339200);
    expect(sequence.capacityAt(9)).toBe(1339200);
  });

  it('keeps a leading zero as zero', () => {
    expect(new CapacitySequence([0, 100]).capacityAt(0)).toBe(0);
  });

  it('refuses an empty list', () => {
    expect(() => new CapacitySequence([])).toThrow(ConfigurationError);
  });
});
