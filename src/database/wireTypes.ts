/** `{ directory, file, arguments: [...] }` on disk. */
export type ArrayEntry = {
  kind: 'array';
  directory: string;
  file: string;
  arguments: string[];
  output?: string;
};

/** `{ directory, file, command: "..." }` on disk. */
export type StringEntry = {
  kind: 'string';
  directory: string;
  file: string;
  command: string;
  output?: string;
};

/**
 * A record as stored in the database file.
 *
 * `kind` is in-memory only; on disk the shape is told apart by which of
 * `arguments` / `command` is present.
 */
export type WireRecord = ArrayEntry | StringEntry;

export type ArrayEntryJson = Omit<ArrayEntry, 'kind'>;
export type StringEntryJson = Omit<StringEntry, 'kind'>;
export type WireRecordJson = ArrayEntryJson | StringEntryJson;
