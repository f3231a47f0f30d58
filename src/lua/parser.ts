import { Token, tokenize } from './lexer.js';

export type LuaValue = string | number | boolean | null | LuaTable;

export type LuaField = {
  /** `undefined` for positional fields. */
  key: LuaValue | undefined;
  value: LuaValue;
};

export type LuaTable = { kind: 'table'; fields: LuaField[] };

/** One top-level `Name = value` statement and the text it came from. */
export type Section = {
  name: string;
  value: LuaValue;
  source: string;
  line: number;
};

export type SectionError = {
  /** Set when the statement got as far as its name. */
  name?: string;
  message: string;
  line: number;
  /** Everything skipped up to the next statement. */
  source: string;
};

export type ParsedDocument = {
  sections: Section[];
  errors: SectionError[];
};

class SyntaxFault extends Error {
  readonly line: number;

  constructor(message: string, line: number) {
    super(message);
    this.line = line;
  }
}

export const isTable = (value: LuaValue | undefined): value is LuaTable =>
  typeof value === 'object' && value !== null && value.kind === 'table';

/**
 * Recursive-descent reader for SavedVariables text. Each statement is parsed
 * on its own; a broken one is reported and skipped up to the next statement
 * that starts in column 1, and parsing carries on from there.
 */
export function parseDocument(source: string): ParsedDocument {
  const tokens = tokenize(source);
  const sections: Section[] = [];
  const errors: SectionError[] = [];
  let index = 0;

  const peek = (offset = 0): Token => tokens[Math.min(index + offset, tokens.length - 1)];
  const next = (): Token => {
    const token = peek();
    if (token.kind !== 'eof') index += 1;
    return token;
  };
  const fail = (token: Token, expected: string): never => {
    const found = token.kind === 'eof' ? 'end of file' : token.kind === 'error' ? token.value : `'${token.value}'`;
    throw new SyntaxFault(`expected ${expected}, found ${found}`, token.line);
  };
  const expectPunct = (value: string): Token => {
    const token = next();
    if (token.kind !== 'punct' || token.value !== value) fail(token, `'${value}'`);
    return token;
  };
  const atPunct = (value: string): boolean => {
    const token = peek();
    return token.kind === 'punct' && token.value === value;
  };

  const isStatementStart = (at: number): boolean => {
    const token = tokens[at];
    const after = tokens[at + 1];
    return token.kind === 'name' && token.column === 1 && after !== undefined && after.kind === 'punct' && after.value === '=';
  };

  const parseValue = (): LuaValue => {
    const token = next();
    switch (token.kind) {
      case 'number':
        return Number(token.value);
      case 'string':
        return token.value;
      case 'name':
        if (token.value === 'true') return true;
        if (token.value === 'false') return false;
        if (token.value === 'nil') return null;
        return fail(token, 'a value');
      case 'punct':
        if (token.value === '{') return parseTableBody();
        return fail(token, 'a value');
      default:
        return fail(token, 'a value');
    }
  };

  const parseTableBody = (): LuaTable => {
    const fields: LuaField[] = [];
    while (!atPunct('}')) {
      // A column-1 assignment means the table was never closed.
      if (isStatementStart(index)) fail(peek(), "'}'");
      if (atPunct('[')) {
        next();
        const key = parseValue();
        expectPunct(']');
        expectPunct('=');
        fields.push({ key, value: parseValue() });
      } else if (peek().kind === 'name' && peek(1).kind === 'punct' && peek(1).value === '=') {
        const key = next().value;
        next();
        fields.push({ key, value: parseValue() });
      } else {
        fields.push({ key: undefined, value: parseValue() });
      }
      if (atPunct(',') || atPunct(';')) {
        next();
      } else if (!atPunct('}')) {
        fail(peek(), "',' or '}'");
      }
    }
    next();
    return { kind: 'table', fields };
  };

  while (peek().kind !== 'eof') {
    const startIndex = index;
    const first = peek();
    let name: string | undefined;
    try {
      const nameToken = next();
      if (nameToken.kind !== 'name') fail(nameToken, 'a variable name');
      name = nameToken.value;
      expectPunct('=');
      const value = parseValue();
      const last = tokens[index - 1];
      sections.push({ name, value, source: source.slice(first.start, last.end), line: first.line });
    } catch (error) {
      if (!(error instanceof SyntaxFault)) throw error;
      // The failing token may itself open the next statement.
      index = startIndex + 1;
      while (peek().kind !== 'eof' && !isStatementStart(index)) {
        index += 1;
      }
      const last = tokens[index - 1];
      errors.push({ name, message: error.message, line: error.line, source: source.slice(first.start, last.end) });
    }
  }

  return { sections, errors };
}
