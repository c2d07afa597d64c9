import { describe, it, expect, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { __resetConfigCacheForTests } from '../dx/config.js';
import { setDebugEnabled } from '../dx/logger.js';
import { Database, openConfiguredDatabase } from './database.js';
import { DatabaseFormat } from './databaseFormat.js';
import { Entries, type Entry } from './entry.js';
import { CompilationDatabaseError, isCompilationDatabaseError } from './errors.js';

function withTempDir(fn: (dir: string) => void | Promise<void>) {
  return async () => {
    const dir = mkdtempSync(join(tmpdir(), 'compdb-db-'));
    try {
      await fn(dir);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  };
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('expected a throw');
}

const sample: Entry[] = [
  { directory: '/build', file: '/build/a.c', command: ['cc', '-c', 'a.c'] },
  {
    directory: '/build/sub dir',
    file: '/src/b.cpp',
    command: ['c++', '-DMSG="hello world"', '-I', '/opt/inc dir', '-c', "it's.cpp", ''],
    output: '/build/sub dir/b.o',
  },
  { directory: '/build', file: '/build/ünï.c', command: ['cc', '-c', 'ünï.c', '-o', 'ünï.o'] },
];

describe('Database save', () => {
  it(
    'writes the array form without an output key',
    withTempDir((dir) => {
      const path = join(dir, 'compile_commands.json');
      new Database(path).save(Entries.from([sample[0]]), new DatabaseFormat());

      expect(JSON.parse(readFileSync(path, 'utf8'))).toEqual([
        { directory: '/build', file: '/build/a.c', arguments: ['cc', '-c', 'a.c'] },
      ]);
      expect(readFileSync(path, 'utf8')).not.toContain('"output"');
    }),
  );

  it(
    'writes the string form',
    withTempDir((dir) => {
      const path = join(dir, 'compile_commands.json');
      new Database(path).save([sample[0]], new DatabaseFormat().setCommandAsArray(false));

      expect(JSON.parse(readFileSync(path, 'utf8'))).toEqual([
        { directory: '/build', file: '/build/a.c', command: 'cc -c a.c' },
      ]);
    }),
  );

  it(
    'pretty-prints the document',
    withTempDir((dir) => {
      const path = join(dir, 'compile_commands.json');
      new Database(path).save([sample[0]]);

      expect(readFileSync(path, 'utf8')).toBe(
        [
          '[',
          '  {',
          '    "directory": "/build",',
          '    "file": "/build/a.c",',
          '    "arguments": [',
          '      "cc",',
          '      "-c",',
          '      "a.c"',
          '    ]',
          '  }',
          ']',
          '',
        ].join('\n'),
      );
    }),
  );

  it(
    'truncates an existing file',
    withTempDir((dir) => {
      const path = join(dir, 'compile_commands.json');
      writeFileSync(path, 'x'.repeat(4096), 'utf8');
      new Database(path).save([]);

      expect(readFileSync(path, 'utf8')).toBe('[]\n');
    }),
  );

  it(
    'collapses duplicates given as a plain list',
    withTempDir((dir) => {
      const path = join(dir, 'compile_commands.json');
      const db = new Database(path);
      db.save([sample[0], { ...sample[0], output: '/build/a.o' }]);

      const loaded = db.load();
      expect(loaded.size).toBe(1);
      expect([...loaded][0]?.output).toBe('/build/a.o');
    }),
  );

  it(
    'leaves the destination untouched on a path encoding failure',
    withTempDir((dir) => {
      const path = join(dir, 'compile_commands.json');
      writeFileSync(path, 'previous contents', 'utf8');

      const bad: Entry = { directory: '/build/\uDFFF', file: '/build/a.c', command: ['cc'] };
      const err = catchError(() => new Database(path).save([sample[0], bad]));

      expect(isCompilationDatabaseError(err, 'PATH_ENCODING_ERROR')).toBe(true);
      expect(readFileSync(path, 'utf8')).toBe('previous contents');
    }),
  );

  it(
    'does not create the destination on a path encoding failure',
    withTempDir((dir) => {
      const path = join(dir, 'compile_commands.json');
      const bad: Entry = { directory: '/build', file: '\uD800.c', command: ['cc'] };

      expect(() => new Database(path).save([bad])).toThrow(CompilationDatabaseError);
      expect(() => readFileSync(path, 'utf8')).toThrow();
    }),
  );

  it(
    'reports an unwritable destination as an I/O error',
    withTempDir((dir) => {
      const path = join(dir, 'missing', 'compile_commands.json');
      const err = catchError(() => new Database(path).save([sample[0]]));

      expect(isCompilationDatabaseError(err, 'IO_ERROR')).toBe(true);
      if (err instanceof CompilationDatabaseError) {
        expect(err.message.startsWith(`Failed to write compilation database ${path}:`)).toBe(true);
        expect(err.cause).toBeInstanceOf(Error);
      }
    }),
  );
});

describe('Database load', () => {
  for (const asArray of [true, false]) {
    it(
      `round-trips entries with commandAsArray=${asArray}`,
      withTempDir((dir) => {
        const db = new Database(join(dir, 'compile_commands.json'));
        const entries = Entries.from(sample);
        db.save(entries, new DatabaseFormat().setCommandAsArray(asArray));

        const loaded = db.load();
        expect(loaded.equals(entries)).toBe(true);
        expect([...loaded]).toEqual(sample);
      }),
    );
  }

  it(
    'reads records of both shapes from one file',
    withTempDir((dir) => {
      const path = join(dir, 'compile_commands.json');
      writeFileSync(
        path,
        JSON.stringify([
          { directory: '/b', file: 'a.c', arguments: ['cc', '-c', 'a.c'] },
          { directory: '/b', file: 'b.c', command: 'cc -c "b c.c"', output: '/b/b.o' },
        ]),
        'utf8',
      );

      expect([...new Database(path).load()]).toEqual([
        { directory: '/b', file: 'a.c', command: ['cc', '-c', 'a.c'] },
        { directory: '/b', file: 'b.c', command: ['cc', '-c', 'b c.c'], output: '/b/b.o' },
      ]);
    }),
  );

  it(
    'returns nothing and names the malformed record when one command cannot be split',
    withTempDir((dir) => {
      const path = join(dir, 'compile_commands.json');
      writeFileSync(
        path,
        JSON.stringify([
          { directory: '/b', file: 'good.c', command: 'cc -c good.c' },
          { directory: '/b', file: 'bad.c', command: 'cc -c "bad.c' },
        ]),
        'utf8',
      );

      const err = catchError(() => new Database(path).load());
      expect(isCompilationDatabaseError(err, 'CONVERSION_ERROR')).toBe(true);
      if (err instanceof Error) {
        expect(err.message).toBe(
          'Failed to split command of bad.c: Unmatched double quote at offset 6',
        );
      }
    }),
  );

  it(
    'joins every failing record into one message',
    withTempDir((dir) => {
      const path = join(dir, 'compile_commands.json');
      writeFileSync(
        path,
        JSON.stringify([
          { directory: '/b', file: 'x.c', command: "cc 'x.c" },
          { directory: '/b', file: 'ok.c', arguments: ['cc'] },
          { directory: '/b', file: 'y.c', command: 'cc y.c \\' },
        ]),
        'utf8',
      );

      const err = catchError(() => new Database(path).load());
      expect(err).toBeInstanceOf(CompilationDatabaseError);
      if (err instanceof CompilationDatabaseError) {
        expect(err.message).toBe(
          'Failed to split command of x.c: Unmatched single quote at offset 3, ' +
            'Failed to split command of y.c: Trailing backslash at offset 7',
        );
        expect(err.details?.errors).toHaveLength(2);
      }
    }),
  );

  it(
    'reports a missing file as an I/O error',
    withTempDir((dir) => {
      const err = catchError(() => new Database(join(dir, 'nope.json')).load());
      expect(isCompilationDatabaseError(err, 'IO_ERROR')).toBe(true);
    }),
  );

  it(
    'reports invalid JSON as a deserialization error',
    withTempDir((dir) => {
      const path = join(dir, 'compile_commands.json');
      writeFileSync(path, '[{"directory": ', 'utf8');
      const err = catchError(() => new Database(path).load());
      expect(isCompilationDatabaseError(err, 'DESERIALIZATION_ERROR')).toBe(true);
    }),
  );

  it(
    'reports an object of unknown shape as a deserialization error',
    withTempDir((dir) => {
      const path = join(dir, 'compile_commands.json');
      writeFileSync(path, JSON.stringify([{ directory: '/b', file: 'a.c', cmd: 'cc' }]), 'utf8');
      const err = catchError(() => new Database(path).load());
      expect(isCompilationDatabaseError(err, 'DESERIALIZATION_ERROR')).toBe(true);
    }),
  );

  it(
    'reports bytes that are not UTF-8 as a deserialization error',
    withTempDir((dir) => {
      const path = join(dir, 'compile_commands.json');
      writeFileSync(
        path,
        Buffer.concat([
          Buffer.from('[{"directory":"/b","file":"a', 'utf8'),
          Buffer.from([0xff, 0xfe]),
          Buffer.from('.c","arguments":["cc"]}]', 'utf8'),
        ]),
      );

      const err = catchError(() => new Database(path).load());
      expect(isCompilationDatabaseError(err, 'DESERIALIZATION_ERROR')).toBe(true);
      if (err instanceof Error) {
        expect(err.message.startsWith(`Invalid UTF-8 in ${path}:`)).toBe(true);
      }
    }),
  );

  it(
    'accepts any formatting',
    withTempDir((dir) => {
      const path = join(dir, 'compile_commands.json');
      writeFileSync(
        path,
        '\n[ {"file":"a.c","arguments":[],\n"directory":"/b"} ]\n',
        'utf8',
      );
      expect([...new Database(path).load()]).toEqual([
        { directory: '/b', file: 'a.c', command: [] },
      ]);
    }),
  );
});

describe('Database logging', () => {
  afterEach(() => {
    setDebugEnabled(false);
    vi.restoreAllMocks();
  });

  it(
    'logs entry counts for save and load when debug is on',
    withTempDir((dir) => {
      const path = join(dir, 'compile_commands.json');
      setDebugEnabled(true);
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

      const db = new Database(path);
      db.save(sample);
      db.load();

      expect(spy).toHaveBeenCalledWith('[compdb]', `saved 3 entries to ${path}`);
      expect(spy).toHaveBeenCalledWith('[compdb]', `loaded 3 entries from ${path}`);
    }),
  );
});

describe('openConfiguredDatabase', () => {
  afterEach(() => {
    __resetConfigCacheForTests();
    setDebugEnabled(false);
  });

  it(
    'defaults to compile_commands.json and the array form',
    withTempDir(async (dir) => {
      const { database, format } = await openConfiguredDatabase(dir);
      expect(database.path).toBe(join(dir, 'compile_commands.json'));
      expect(format.isCommandAsArray()).toBe(true);
    }),
  );

  it(
    'follows compdb.config.js',
    withTempDir(async (dir) => {
      writeFileSync(
        join(dir, 'compdb.config.js'),
        `export default { databasePath: "cc.json", format: { commandAsArray: false } };\n`,
        'utf8',
      );

      const { database, format } = await openConfiguredDatabase(dir);
      database.save([{ directory: '/b', file: 'a.c', command: ['cc', 'a.c'] }], format);

      expect(JSON.parse(readFileSync(join(dir, 'cc.json'), 'utf8'))).toEqual([
        { directory: '/b', file: 'a.c', command: 'cc a.c' },
      ]);
    }),
  );

  it(
    'uses each project root\'s own config',
    withTempDir(async (dir) => {
      const first = join(dir, 'first');
      const second = join(dir, 'second');
      mkdirSync(first);
      mkdirSync(second);
      writeFileSync(
        join(second, 'compdb.config.js'),
        `export default { databasePath: "b.json", format: { commandAsArray: false } };\n`,
        'utf8',
      );

      const a = await openConfiguredDatabase(first);
      const b = await openConfiguredDatabase(second);

      expect(a.database.path).toBe(join(first, 'compile_commands.json'));
      expect(a.format.isCommandAsArray()).toBe(true);
      expect(b.database.path).toBe(join(second, 'b.json'));
      expect(b.format.isCommandAsArray()).toBe(false);
    }),
  );
});
