import { readFileSync, writeFileSync } from 'node:fs';

import { applyConfig, loadOptionalConfig, resolveDatabasePath } from '../dx/config.js';
import { logDebug, logInfo } from '../dx/logger.js';
import { traceError, traceInfo } from '../dx/trace.js';
import { Entries, type Entry } from './entry.js';
import { DatabaseFormat } from './databaseFormat.js';
import { CompilationDatabaseError, describeError } from './errors.js';
import { fromEntry, intoEntry, parseWireRecords, toJsonObject } from './wireRecord.js';

// Fatal: a malformed byte must fail the load, not become U+FFFD.
const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * A JSON compilation database file.
 *
 * Stateless: it only remembers the path, so instances can be created and
 * dropped freely. Every call reads or writes the whole file synchronously and
 * nothing locks it, so concurrent writers race and the last one wins.
 */
export class Database {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  /**
   * Read every entry.
   *
   * Either all records convert or none are returned: when some `command`
   * strings cannot be split, the error message lists every failing record,
   * joined with ", ".
   */
  load(): Entries {
    traceInfo('db.load.start', { path: this.path });

    let bytes: Buffer;
    try {
      bytes = readFileSync(this.path);
    } catch (e) {
      traceError('db.load.io', { path: this.path, error: describeError(e) });
      throw new CompilationDatabaseError(
        'IO_ERROR',
        `Failed to read compilation database ${this.path}: ${describeError(e)}`,
        { cause: e, details: { path: this.path } },
      );
    }

    let raw: string;
    try {
      raw = utf8.decode(bytes);
    } catch (e) {
      throw new CompilationDatabaseError(
        'DESERIALIZATION_ERROR',
        `Invalid UTF-8 in ${this.path}: ${describeError(e)}`,
        { cause: e, details: { path: this.path } },
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      throw new CompilationDatabaseError(
        'DESERIALIZATION_ERROR',
        `Invalid JSON in ${this.path}: ${describeError(e)}`,
        { cause: e, details: { path: this.path } },
      );
    }

    const records = parseWireRecords(json);

    const entries: Entry[] = [];
    const errors: Error[] = [];
    for (const record of records) {
      try {
        entries.push(intoEntry(record));
      } catch (e) {
        errors.push(e instanceof Error ? e : new Error(String(e)));
      }
    }

    if (errors.length > 0) {
      traceError('db.load.convert', { path: this.path, failed: errors.length });
      throw new CompilationDatabaseError(
        'CONVERSION_ERROR',
        errors.map((e) => e.message).join(', '),
        { details: { path: this.path, errors } },
      );
    }

    const result = Entries.from(entries);
    traceInfo('db.load.done', { path: this.path, records: records.length, entries: result.size });
    logInfo(`loaded ${result.size} entries from ${this.path}`);
    return result;
  }

  /**
   * Write `entries` as a pretty-printed JSON array, replacing the file.
   *
   * Every entry is converted before the file is opened, so a conversion
   * failure leaves an existing file untouched.
   */
  save(entries: Iterable<Entry>, format: DatabaseFormat = new DatabaseFormat()): void {
    const unique = entries instanceof Entries ? entries : Entries.from(entries);
    traceInfo('db.save.start', {
      path: this.path,
      entries: unique.size,
      commandAsArray: format.isCommandAsArray(),
    });

    const records = [...unique].map((entry) => toJsonObject(fromEntry(entry, format)));

    let text: string;
    try {
      text = `${JSON.stringify(records, null, 2)}\n`;
    } catch (e) {
      throw new CompilationDatabaseError(
        'SERIALIZATION_ERROR',
        `Failed to serialize compilation database: ${describeError(e)}`,
        { cause: e },
      );
    }

    try {
      writeFileSync(this.path, text, 'utf8');
    } catch (e) {
      traceError('db.save.io', { path: this.path, error: describeError(e) });
      throw new CompilationDatabaseError(
        'IO_ERROR',
        `Failed to write compilation database ${this.path}: ${describeError(e)}`,
        { cause: e, details: { path: this.path } },
      );
    }

    traceInfo('db.save.done', { path: this.path, records: records.length });
    logInfo(`saved ${records.length} entries to ${this.path}`);
  }
}

/**
 * Database and save format as configured by the project's optional
 * `compdb.config.js`.
 */
export async function openConfiguredDatabase(
  projectRoot: string = process.cwd(),
): Promise<{ database: Database; format: DatabaseFormat }> {
  const config = await loadOptionalConfig(projectRoot);
  applyConfig(config);
  const path = resolveDatabasePath(config, projectRoot);
  logDebug('opening compilation database', { path });
  return {
    database: new Database(path),
    format: DatabaseFormat.fromConfig(config),
  };
}
