/**
 * Index Document
 *
 * One parsed Packages or Sources file. Stanzas are kept by name, in
 * document order, so a partition's subset can be written back verbatim.
 */

import { getToken, parseStanzas, type Stanza } from './stanza.js';

export type IndexKind = 'packages' | 'sources';

export interface RenderedIndex {
  text: string;
  count: number;
}

export class IndexDocument {
  private readonly byName = new Map<string, Stanza>();
  private readonly all: readonly Stanza[];

  constructor(
    public readonly kind: IndexKind,
    public readonly location: string,
    stanzas: readonly Stanza[]
  ) {
    this.all = [...stanzas];
    // A later stanza for the same name replaces the earlier one
    for (const stanza of stanzas) {
      const name = getToken(stanza, 'Package');
      if (name !== undefined) {
        this.byName.set(name, stanza);
      }
    }
  }

  static parse(kind: IndexKind, location: string, text: string): IndexDocument {
    return new IndexDocument(kind, location, parseStanzas(text));
  }

  /** Number of distinct names */
  get size(): number {
    return this.byName.size;
  }

  /** Every stanza, duplicates included */
  stanzas(): readonly Stanza[] {
    return this.all;
  }

  /**
   * Text of the stanzas for `names`, in the given order. Names missing from
   * this document or listed in `exclude` are left out.
   */
  render(names: Iterable<string>, exclude?: ReadonlySet<string>): RenderedIndex {
    let text = '';
    let count = 0;

    for (const name of names) {
      if (exclude?.has(name)) {
        continue;
      }
      const stanza = this.byName.get(name);
      if (!stanza) {
        continue;
      }
      text += `${stanza.text}\n\n`;
      count += 1;
    }

    return { text, count };
  }
}
