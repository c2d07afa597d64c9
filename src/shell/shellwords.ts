/**
 * POSIX shell word quoting without any expansion.
 *
 * `joinShellwords` quotes like Python's `shlex.quote()`: safe tokens stay bare,
 * anything else is wrapped in single quotes and an embedded `'` becomes `'\''`.
 * `splitShellwords` understands the quoting a POSIX shell applies before
 * expansion, so it also reads commands written by other tools
 * (`-DNAME=\"x\"`, `"a b"`, line continuations).
 */

export type ShellwordsErrorCode = 'MISMATCHED_QUOTES' | 'DANGLING_ESCAPE';

export class ShellwordsError extends Error {
  override name = 'ShellwordsError';
  readonly code: ShellwordsErrorCode;

  constructor(code: ShellwordsErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}

const SAFE_CHARS = /^[a-zA-Z0-9_@%+=:,./-]+$/;

const WHITESPACE = new Set([' ', '\t', '\n', '\r']);

// Characters a backslash escapes inside double quotes.
const DQUOTE_ESCAPABLE = new Set(['$', '`', '"', '\\', '\n']);

export function quoteShellword(s: string): string {
  if (s === '') return "''";
  if (SAFE_CHARS.test(s)) return s;
  return "'" + s.replaceAll("'", "'\\''") + "'";
}

export function joinShellwords(args: readonly string[]): string {
  return args.map(quoteShellword).join(' ');
}

export function splitShellwords(text: string): string[] {
  const words: string[] = [];
  let current = '';
  // A word can be empty ('' or ""), so track presence separately from content.
  let inWord = false;
  let i = 0;

  while (i < text.length) {
    const c = text[i];

    if (c === "'") {
      const end = text.indexOf("'", i + 1);
      if (end === -1) {
        throw new ShellwordsError('MISMATCHED_QUOTES', `Unmatched single quote at offset ${i}`);
      }
      current += text.slice(i + 1, end);
      inWord = true;
      i = end + 1;
      continue;
    }

    if (c === '"') {
      const start = i;
      i++;
      let closed = false;
      while (i < text.length) {
        const d = text[i];
        if (d === '"') {
          closed = true;
          i++;
          break;
        }
        const next = text[i + 1];
        if (d === '\\' && next !== undefined && DQUOTE_ESCAPABLE.has(next)) {
          if (next !== '\n') current += next;
          i += 2;
          continue;
        }
        current += d;
        i++;
      }
      if (!closed) {
        throw new ShellwordsError('MISMATCHED_QUOTES', `Unmatched double quote at offset ${start}`);
      }
      inWord = true;
      continue;
    }

    if (c === '\\') {
      const next = text[i + 1];
      if (next === undefined) {
        throw new ShellwordsError('DANGLING_ESCAPE', `Trailing backslash at offset ${i}`);
      }
      // Line continuation.
      if (next !== '\n') {
        current += next;
        inWord = true;
      }
      i += 2;
      continue;
    }

    if (WHITESPACE.has(c)) {
      if (inWord) words.push(current);
      current = '';
      inWord = false;
      i++;
      continue;
    }

    current += c;
    inWord = true;
    i++;
  }

  if (inWord) words.push(current);
  return words;
}
