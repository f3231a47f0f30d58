export type TokenKind = 'name' | 'number' | 'string' | 'punct' | 'error' | 'eof';

export type Token = {
  kind: TokenKind;
  value: string;
  start: number;
  end: number;
  line: number;
  column: number;
};

const PUNCTUATION = new Set(['{', '}', '[', ']', '=', ',', ';']);
const NAME_START = /[A-Za-z_]/;
const NAME_PART = /[A-Za-z0-9_]/;
const NUMBER = /-?(?:0[xX][0-9a-fA-F]+|(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)/y;
const LONG_OPEN = /\[(=*)\[/y;
const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Tokenizes the subset of Lua that SavedVariables files are written in.
 * Never throws: lexical faults come back as `error` tokens so the parser can
 * drop the one statement they belong to.
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  // A leading byte-order mark is not part of the text.
  let pos = source.startsWith(BYTE_ORDER_MARK) ? BYTE_ORDER_MARK.length : 0;
  let line = 1;
  let lineStart = pos;

  const advance = (to: number) => {
    for (let i = pos; i < to; i += 1) {
      if (source[i] === '\n') {
        line += 1;
        lineStart = i + 1;
      }
    }
    pos = to;
  };

  const push = (kind: TokenKind, value: string, end: number) => {
    tokens.push({ kind, value, start: pos, end, line, column: pos - lineStart + 1 });
    advance(end);
  };

  const longBracketEnd = (from: number): { end: number; bodyStart: number } | undefined => {
    LONG_OPEN.lastIndex = from;
    const open = LONG_OPEN.exec(source);
    if (!open) return undefined;
    const close = `]${open[1]}]`;
    const bodyStart = from + open[0].length;
    const closeAt = source.indexOf(close, bodyStart);
    return { end: closeAt === -1 ? -1 : closeAt + close.length, bodyStart };
  };

  while (pos < source.length) {
    const ch = source[pos];

    if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n') {
      advance(pos + 1);
      continue;
    }

    if (source.startsWith('--', pos)) {
      const long = longBracketEnd(pos + 2);
      if (long) {
        if (long.end === -1) {
          push('error', 'unterminated comment', source.length);
        } else {
          advance(long.end);
        }
        continue;
      }
      const eol = source.indexOf('\n', pos);
      advance(eol === -1 ? source.length : eol);
      continue;
    }

    if (ch === '[') {
      const long = longBracketEnd(pos);
      if (long) {
        if (long.end === -1) {
          push('error', 'unterminated long string', source.length);
        } else {
          const closeLength = long.bodyStart - pos;
          push('string', source.slice(long.bodyStart, long.end - closeLength), long.end);
        }
        continue;
      }
    }

    if (PUNCTUATION.has(ch)) {
      push('punct', ch, pos + 1);
      continue;
    }

    if (ch === '"' || ch === "'") {
      let i = pos + 1;
      let value = '';
      let closed = false;
      while (i < source.length) {
        const c = source[i];
        if (c === ch) {
          closed = true;
          break;
        }
        if (c === '\n') break;
        if (c === '\\' && i + 1 < source.length) {
          value += unescape(source[i + 1]);
          i += 2;
          continue;
        }
        value += c;
        i += 1;
      }
      if (closed) {
        push('string', value, i + 1);
      } else {
        push('error', 'unterminated string', i);
      }
      continue;
    }

    NUMBER.lastIndex = pos;
    const number = NUMBER.exec(source);
    if (number) {
      push('number', number[0], pos + number[0].length);
      continue;
    }

    if (NAME_START.test(ch)) {
      let i = pos + 1;
      while (i < source.length && NAME_PART.test(source[i])) i += 1;
      push('name', source.slice(pos, i), i);
      continue;
    }

    push('error', `unexpected character '${ch}'`, pos + 1);
  }

  tokens.push({ kind: 'eof', value: '', start: pos, end: pos, line, column: pos - lineStart + 1 });
  return tokens;
}

function unescape(c: string): string {
  switch (c) {
    case 'n': return '\n';
    case 't': return '\t';
    case 'r': return '\r';
    default: return c;
  }
}
