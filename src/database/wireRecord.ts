import { z } from 'zod';

import { warn } from '../dx/warnings.js';
import { joinShellwords, splitShellwords } from '../shell/shellwords.js';
import type { Entry } from './entry.js';
import type { DatabaseFormat } from './databaseFormat.js';
import { CompilationDatabaseError, describeError } from './errors.js';
import type { ArrayEntry, StringEntry, WireRecord, WireRecordJson } from './wireTypes.js';

// `null` is read as absent; it is never written.
const outputSchema = z.string().nullish();

const arrayEntrySchema = z
  .object({
    directory: z.string(),
    file: z.string(),
    arguments: z.array(z.string()),
    output: outputSchema,
  })
  .transform((r): ArrayEntry => {
    const record: ArrayEntry = {
      kind: 'array',
      directory: r.directory,
      file: r.file,
      arguments: r.arguments,
    };
    if (r.output != null) record.output = r.output;
    return record;
  });

const stringEntrySchema = z
  .object({
    directory: z.string(),
    file: z.string(),
    command: z.string(),
    output: outputSchema,
  })
  .transform((r): StringEntry => {
    const record: StringEntry = {
      kind: 'string',
      directory: r.directory,
      file: r.file,
      command: r.command,
    };
    if (r.output != null) record.output = r.output;
    return record;
  });

// Order matters: a record carrying both keys is read as the string form.
const wireRecordSchema = z.union([stringEntrySchema, arrayEntrySchema]);

function shapeError(where: string, error: z.ZodError): CompilationDatabaseError {
  const issues = describeIssues(error);
  return new CompilationDatabaseError(
    'DESERIALIZATION_ERROR',
    `${where} is not a compilation database entry: expected an object with string "directory" and "file" and either an "arguments" string array or a "command" string (${issues.join('; ')})`,
    { details: { issues } },
  );
}

// A failed union reports each alternative's issues; flatten them to `path: message`.
function describeIssues(error: z.ZodError): string[] {
  const out: string[] = [];
  for (const issue of error.issues) {
    if (issue.code === z.ZodIssueCode.invalid_union) {
      for (const inner of issue.unionErrors) out.push(...describeIssues(inner));
      continue;
    }
    out.push(`${issue.path.join('.') || '<root>'}: ${issue.message}`);
  }
  return [...new Set(out)];
}

export function parseWireRecord(value: unknown): WireRecord {
  const parsed = wireRecordSchema.safeParse(value);
  if (!parsed.success) throw shapeError('record', parsed.error);
  return parsed.data;
}

export function parseWireRecords(value: unknown): WireRecord[] {
  if (!Array.isArray(value)) {
    throw new CompilationDatabaseError(
      'DESERIALIZATION_ERROR',
      'compilation database must be a JSON array of entries',
    );
  }
  return value.map((item, index) => {
    const parsed = wireRecordSchema.safeParse(item);
    if (!parsed.success) throw shapeError(`record ${index}`, parsed.error);
    return parsed.data;
  });
}

// A lone UTF-16 surrogate has no UTF-8 encoding.
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

function pathToText(path: string): string {
  if (LONE_SURROGATE.test(path)) {
    throw new CompilationDatabaseError(
      'PATH_ENCODING_ERROR',
      `Failed to convert to string ${JSON.stringify(path)}`,
      { details: { path } },
    );
  }
  return path;
}

/** Domain to wire. Throws `PATH_ENCODING_ERROR` before producing anything. */
export function fromEntry(entry: Entry, format: DatabaseFormat): WireRecord {
  const directory = pathToText(entry.directory);
  const file = pathToText(entry.file);
  const output = entry.output === undefined ? undefined : pathToText(entry.output);

  if (entry.command.length === 0) {
    warn({ code: 'EMPTY_COMMAND', message: `${file} has an empty command` });
  }

  const record: WireRecord = format.isCommandAsArray()
    ? { kind: 'array', directory, file, arguments: [...entry.command] }
    : { kind: 'string', directory, file, command: joinShellwords(entry.command) };
  if (output !== undefined) record.output = output;
  return record;
}

/** Wire to domain. Throws `CONVERSION_ERROR` when a `command` string cannot be split. */
export function intoEntry(record: WireRecord): Entry {
  let command: string[];
  if (record.kind === 'array') {
    command = [...record.arguments];
  } else {
    try {
      command = splitShellwords(record.command);
    } catch (e) {
      throw new CompilationDatabaseError(
        'CONVERSION_ERROR',
        `Failed to split command of ${record.file}: ${describeError(e)}`,
        { cause: e, details: { file: record.file, command: record.command } },
      );
    }
  }

  const entry: Entry = { directory: record.directory, file: record.file, command };
  if (record.output !== undefined) entry.output = record.output;
  return entry;
}

/** Plain object as written to disk: no `kind`, `output` only when present. */
export function toJsonObject(record: WireRecord): WireRecordJson {
  const base =
    record.kind === 'array'
      ? { directory: record.directory, file: record.file, arguments: record.arguments }
      : { directory: record.directory, file: record.file, command: record.command };
  return record.output === undefined ? base : { ...base, output: record.output };
}
