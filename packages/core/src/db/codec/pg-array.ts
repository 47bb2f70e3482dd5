/**
 * Parser for the Postgres array text format, e.g. `{1,NULL,"a \"b\""}` or
 * `[0:1]={{1,2},{3,4}}`. Elements come back as raw text for the element
 * decoder; a bare NULL is null, a quoted "NULL" is the string.
 */

export type PgArrayElement = string | null | PgArrayElement[];

export function parsePgArray(literal: string, delimiter = ','): PgArrayElement[] {
  let source = literal.trim();
  if (source.startsWith('[')) {
    const eq = source.indexOf('=');
    if (eq < 0) {
      throw new SyntaxError('Array dimension prefix without "="');
    }
    source = source.slice(eq + 1);
  }
  return new ArrayLiteralParser(source, delimiter).parse();
}

class ArrayLiteralParser {
  private pos = 0;

  constructor(
    private readonly source: string,
    private readonly delimiter: string,
  ) {}

  parse(): PgArrayElement[] {
    const items = this.parseArray();
    this.skipWhitespace();
    if (this.pos !== this.source.length) {
      throw this.fail('unexpected trailing characters');
    }
    return items;
  }

  private parseArray(): PgArrayElement[] {
    if (this.source.charAt(this.pos) !== '{') {
      throw this.fail('expected "{"');
    }
    this.pos++;
    const items: PgArrayElement[] = [];

    this.skipWhitespace();
    if (this.source.charAt(this.pos) === '}') {
      this.pos++;
      return items;
    }

    for (;;) {
      this.skipWhitespace();
      const ch = this.source.charAt(this.pos);
      if (ch === '{') {
        items.push(this.parseArray());
      } else if (ch === '"') {
        items.push(this.parseQuoted());
      } else {
        items.push(this.parseBare());
      }

      this.skipWhitespace();
      const next = this.source.charAt(this.pos);
      this.pos++;
      if (next === '}') return items;
      if (next !== this.delimiter) {
        throw this.fail(`expected "${this.delimiter}" or "}"`);
      }
    }
  }

  private parseQuoted(): string {
    this.pos++;
    let out = '';
    while (this.pos < this.source.length) {
      const ch = this.source.charAt(this.pos++);
      if (ch === '\\') {
        if (this.pos >= this.source.length) break;
        out += this.source.charAt(this.pos++);
      } else if (ch === '"') {
        return out;
      } else {
        out += ch;
      }
    }
    throw this.fail('unterminated quoted element');
  }

  private parseBare(): string | null {
    const start = this.pos;
    while (this.pos < this.source.length) {
      const ch = this.source.charAt(this.pos);
      if (ch === this.delimiter || ch === '}') break;
      if (ch === '{' || ch === '"') throw this.fail(`unexpected "${ch}"`);
      this.pos++;
    }
    const text = this.source.slice(start, this.pos).trim();
    if (text.length === 0) {
      throw this.fail('empty element');
    }
    return text.toUpperCase() === 'NULL' ? null : text;
  }

  private skipWhitespace(): void {
    while (/\s/.test(this.source.charAt(this.pos))) this.pos++;
  }

  private fail(reason: string): SyntaxError {
    return new SyntaxError(`Malformed array literal at offset ${this.pos}: ${reason}`);
  }
}
