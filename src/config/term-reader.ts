/**
 * Term Reader
 *
 * Reads the term syntax used by shell configuration files: a sequence of terms,
 * each ending with a dot. The last term may omit its dot.
 *
 *   [{myapp, [{port, 8080}, {name, "demo"}]}].
 */

export type TermTuple = {
  readonly kind: 'tuple';
  readonly elements: Term[];
};

export type Term = string | number | boolean | Term[] | TermTuple;

export class TermSyntaxError extends Error {
  public readonly line: number;
  public readonly column: number;

  constructor(message: string, line: number, column: number) {
    super(`${message} at line ${line}, column ${column}`);
    this.name = 'TermSyntaxError';
    this.line = line;
    this.column = column;
  }
}

export function tuple(...elements: Term[]): TermTuple {
  return { kind: 'tuple', elements };
}

export function isTuple(term: Term): term is TermTuple {
  return typeof term === 'object' && !Array.isArray(term) && term.kind === 'tuple';
}

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  s: ' ',
  e: '\x1b',
  '0': '\0',
  '\\': '\\',
  '"': '"',
  "'": "'"
};

class TermParser {
  private pos = 0;

  constructor(private readonly text: string) {}

  readAll(): Term[] {
    const terms: Term[] = [];
    this.skipLayout();
    while (!this.atEnd()) {
      terms.push(this.readTerm());
      this.skipLayout();
      if (this.atEnd()) {
        break;
      }
      this.expect('.');
      const next = this.text[this.pos];
      if (next !== undefined && !/\s|%/.test(next)) {
        this.fail(`unexpected '${next}' after end of term`);
      }
      this.skipLayout();
    }
    return terms;
  }

  private readTerm(): Term {
    this.skipLayout();
    const ch = this.text[this.pos];
    if (ch === undefined) {
      this.fail('unexpected end of input');
    }
    if (ch === '[') {
      return this.readList();
    }
    if (ch === '{') {
      return this.readTuple();
    }
    if (ch === '"') {
      return this.readQuoted('"');
    }
    if (ch === "'") {
      return this.readQuoted("'");
    }
    if (ch === '<' && this.text[this.pos + 1] === '<') {
      return this.readBinary();
    }
    if (ch === '$') {
      return this.readChar();
    }
    if (/[0-9]/.test(ch) || (ch === '-' && /[0-9]/.test(this.text[this.pos + 1] ?? ''))) {
      return this.readNumber();
    }
    if (/[a-z]/.test(ch)) {
      const atom = this.readAtom();
      if (atom === 'true') {
        return true;
      }
      if (atom === 'false') {
        return false;
      }
      return atom;
    }
    if (/[A-Z_]/.test(ch)) {
      this.fail('variables are not allowed in terms');
    }
    this.fail(`unexpected '${ch}'`);
  }

  private readList(): Term[] {
    this.expect('[');
    const items: Term[] = [];
    this.skipLayout();
    if (this.peek(']')) {
      this.pos++;
      return items;
    }
    for (;;) {
      items.push(this.readTerm());
      this.skipLayout();
      if (this.peek(',')) {
        this.pos++;
        continue;
      }
      if (this.peek('|')) {
        this.pos++;
        const tail = this.readTerm();
        if (!Array.isArray(tail)) {
          this.fail('improper list tail');
        }
        items.push(...tail);
        this.skipLayout();
      }
      this.expect(']');
      return items;
    }
  }

  private readTuple(): TermTuple {
    this.expect('{');
    const elements: Term[] = [];
    this.skipLayout();
    if (this.peek('}')) {
      this.pos++;
      return tuple();
    }
    for (;;) {
      elements.push(this.readTerm());
      this.skipLayout();
      if (this.peek(',')) {
        this.pos++;
        continue;
      }
      this.expect('}');
      return tuple(...elements);
    }
  }

  private readBinary(): string {
    this.pos += 2;
    this.skipLayout();
    let value = '';
    if (this.peek('"')) {
      value = this.readQuoted('"');
      this.skipLayout();
    }
    this.expect('>');
    this.expect('>');
    return value;
  }

  private readQuoted(quote: '"' | "'"): string {
    this.expect(quote);
    let value = '';
    for (;;) {
      const ch = this.text[this.pos];
      if (ch === undefined) {
        this.fail('unterminated quoted text');
      }
      this.pos++;
      if (ch === quote) {
        return value;
      }
      if (ch === '\\') {
        const escaped = this.text[this.pos];
        if (escaped === undefined) {
          this.fail('unterminated escape');
        }
        this.pos++;
        value += ESCAPES[escaped] ?? escaped;
        continue;
      }
      value += ch;
    }
  }

  private readChar(): number {
    this.pos++;
    let ch = this.text[this.pos];
    if (ch === undefined) {
      this.fail('unexpected end of input');
    }
    this.pos++;
    if (ch === '\\') {
      const escaped = this.text[this.pos];
      if (escaped === undefined) {
        this.fail('unterminated escape');
      }
      this.pos++;
      ch = ESCAPES[escaped] ?? escaped;
    }
    return ch.charCodeAt(0);
  }

  private readNumber(): number {
    const rest = this.text.slice(this.pos);
    const radix = /^(-?)(\d{1,2})#([0-9A-Za-z]+)/.exec(rest);
    if (radix) {
      const base = Number(radix[2]);
      const digits = radix[3];
      const value = parseInt(digits, base);
      if (base < 2 || base > 36 || Number.isNaN(value) || value.toString(base) !== digits.toLowerCase().replace(/^0+(?=.)/, '')) {
        this.fail(`invalid base ${base} integer`);
      }
      this.pos += radix[0].length;
      return radix[1] === '-' ? -value : value;
    }
    const match = /^-?\d+(\.\d+([eE][+-]?\d+)?)?/.exec(rest);
    if (!match) {
      this.fail('invalid number');
    }
    this.pos += match[0].length;
    return Number(match[0]);
  }

  private readAtom(): string {
    const match = /^[a-z][A-Za-z0-9_@]*/.exec(this.text.slice(this.pos));
    if (!match) {
      this.fail('invalid atom');
    }
    this.pos += match[0].length;
    return match[0];
  }

  private skipLayout(): void {
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === '%') {
        const newline = this.text.indexOf('\n', this.pos);
        this.pos = newline < 0 ? this.text.length : newline + 1;
      } else if (/\s/.test(ch)) {
        this.pos++;
      } else {
        return;
      }
    }
  }

  private peek(ch: string): boolean {
    return this.text[this.pos] === ch;
  }

  private expect(ch: string): void {
    if (this.text[this.pos] !== ch) {
      const found = this.text[this.pos];
      this.fail(found === undefined ? `expected '${ch}' before end of input` : `expected '${ch}' but found '${found}'`);
    }
    this.pos++;
  }

  private atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  private fail(message: string): never {
    const before = this.text.slice(0, this.pos);
    const line = before.split('\n').length;
    const column = this.pos - before.lastIndexOf('\n');
    throw new TermSyntaxError(message, line, column);
  }
}

/**
 * Parses every term in `text`. Throws TermSyntaxError on malformed input.
 */
export function readTerms(text: string): Term[] {
  return new TermParser(text).readAll();
}
