/**
 * Stanza Parser
 *
 * Index documents (Packages, Sources) are blocks of `Field: value` lines
 * separated by blank lines. Lines starting with whitespace continue the
 * previous field. Field names are matched case-insensitively.
 */

export interface Stanza {
  /** Raw lines of the block, without the separating blank line */
  text: string;
  /** Lower-cased field name -> value; continuation lines are joined with '\n' */
  fields: ReadonlyMap<string, string>;
}

const FIELD_LINE = /^([^\s:][^:]*):\s*(.*)$/;

function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

function buildStanza(lines: string[]): Stanza {
  const fields = new Map<string, string>();
  let current: string | null = null;

  for (const line of lines) {
    if (/^[ \t]/.test(line)) {
      // Continuation without a field before it is dropped
      if (current !== null) {
        fields.set(current, `${fields.get(current) ?? ''}\n${line.trim()}`);
      }
      continue;
    }

    const match = FIELD_LINE.exec(line);
    if (!match) {
      current = null;
      continue;
    }
    current = (match[1] ?? '').trim().toLowerCase();
    fields.set(current, (match[2] ?? '').trim());
  }

  return { text: lines.join('\n'), fields };
}

export function parseStanzas(text: string): Stanza[] {
  const stanzas: Stanza[] = [];
  let block: string[] = [];

  for (const line of text.split(/\r?\n/)) {
    if (isBlank(line)) {
      if (block.length > 0) {
        stanzas.push(buildStanza(block));
        block = [];
      }
      continue;
    }
    block.push(line);
  }
  if (block.length > 0) {
    stanzas.push(buildStanza(block));
  }

  return stanzas;
}

export function getField(stanza: Stanza, name: string): string | undefined {
  return stanza.fields.get(name.toLowerCase());
}

/**
 * First whitespace-delimited token of a field, e.g. the name in `Package: foo`
 */
export function getToken(stanza: Stanza, name: string): string | undefined {
  const value = getField(stanza, name);
  if (value === undefined) {
    return undefined;
  }
  const token = value.split(/\s+/)[0];
  return token ? token : undefined;
}

/**
 * Non-negative integer field, undefined when absent or malformed
 */
export function getSize(stanza: Stanza, name: string): number | undefined {
  const value = getField(stanza, name);
  if (value === undefined || !/^\d+$/.test(value)) {
    return undefined;
  }
  return Number(value);
}

export interface FileListEntry {
  checksum: string;
  size: number;
  filename: string;
}

/**
 * Continuation lines of a file list field (`Files`, `Checksums-Sha256`):
 * `<checksum> <size> <filename>`
 */
export function getFileList(stanza: Stanza, name: string): FileListEntry[] {
  const value = getField(stanza, name);
  if (value === undefined) {
    return [];
  }

  const entries: FileListEntry[] = [];
  for (const line of value.split('\n')) {
    const match = /^(\S+)\s+(\d+)\s+(\S+)$/.exec(line.trim());
    if (match && match[1] && match[2] && match[3]) {
      entries.push({ checksum: match[1], size: Number(match[2]), filename: match[3] });
    }
  }
  return entries;
}

/**
 * Comma separated field, e.g. `Binary: foo, foo-dev`
 */
export function getList(stanza: Stanza, name: string): string[] {
  const value = getField(stanza, name);
  if (value === undefined) {
    return [];
  }
  return value
    .split(/[,\s]+/)
    .filter((item) => item.length > 0);
}
