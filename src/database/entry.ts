import { warn } from '../dx/warnings.js';

/** One compilation: where it ran, what it compiled, and the exact argv. */
export type Entry = {
  /** Working directory of the build command. */
  directory: string;
  /** Compiled source file. */
  file: string;
  /** Argument vector, program name first. */
  command: readonly string[];
  /** Produced object/artifact, when known. Not part of the entry's identity. */
  output?: string;
};

/** No validation: paths are kept as given and an empty command is allowed. */
export function createEntry(input: Entry): Entry {
  const entry: Entry = {
    directory: input.directory,
    file: input.file,
    command: [...input.command],
  };
  if (input.output !== undefined) entry.output = input.output;
  return entry;
}

/**
 * Identity key over `(directory, file, command)`.
 *
 * JSON encoding keeps token boundaries, so `['a b']` and `['a', 'b']` differ.
 */
export function entryKey(entry: Entry): string {
  return JSON.stringify([entry.directory, entry.file, entry.command]);
}

export function isSameEntry(a: Entry, b: Entry): boolean {
  return entryKey(a) === entryKey(b);
}

/**
 * Set of entries unique by identity (`output` ignored).
 *
 * Adding an entry whose identity is already present replaces the stored one
 * (last write wins). Iteration follows first insertion of each identity.
 */
export class Entries implements Iterable<Entry> {
  private readonly byKey = new Map<string, Entry>();

  static from(entries: Iterable<Entry>): Entries {
    const set = new Entries();
    for (const e of entries) set.add(e);
    return set;
  }

  get size(): number {
    return this.byKey.size;
  }

  add(entry: Entry): this {
    const key = entryKey(entry);
    const prev = this.byKey.get(key);
    if (prev && prev.output !== entry.output) {
      warn({
        code: 'DUPLICATE_ENTRY',
        message: `${entry.file} recorded twice with different outputs (${prev.output ?? '<none>'} -> ${entry.output ?? '<none>'})`,
        hint: 'the later entry is kept',
      });
    }
    this.byKey.set(key, entry);
    return this;
  }

  has(entry: Entry): boolean {
    return this.byKey.has(entryKey(entry));
  }

  /** The stored entry with the same identity, which may carry a different `output`. */
  get(entry: Entry): Entry | undefined {
    return this.byKey.get(entryKey(entry));
  }

  delete(entry: Entry): boolean {
    return this.byKey.delete(entryKey(entry));
  }

  values(): IterableIterator<Entry> {
    return this.byKey.values();
  }

  [Symbol.iterator](): IterableIterator<Entry> {
    return this.values();
  }

  /** Same identities, regardless of order or `output`. */
  equals(other: Entries): boolean {
    if (other.size !== this.size) return false;
    for (const key of this.byKey.keys()) {
      if (!other.byKey.has(key)) return false;
    }
    return true;
  }
}
