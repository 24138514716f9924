/**
 * Lossless JSON parser.
 *
 * Produces the immutable value model, keeping number text verbatim and
 * duplicate object keys in order. Iterative: nesting depth is limited by
 * memory, not by the call stack.
 */

import {
  jsonArray,
  jsonBool,
  jsonNull,
  jsonNumber,
  jsonObject,
  jsonString,
  type JsonEntry,
  type JsonValue,
} from './value.js';

export class JsonSyntaxError extends Error {
  constructor(
    readonly reason: string,
    readonly position: number,
  ) {
    super(`${reason} at position ${position}`);
    this.name = 'JsonSyntaxError';
  }
}

interface ArrayFrame {
  kind: 'array';
  items: JsonValue[];
}

interface ObjectFrame {
  kind: 'object';
  entries: JsonEntry[];
  key: string;
}

type Frame = ArrayFrame | ObjectFrame;

const NUMBER = /-?(?:0|[1-9][0-9]*)(?:\.[0-9]+)?(?:[eE][+-]?[0-9]+)?/y;

const SIMPLE_ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

class Parser {
  private pos = 0;

  constructor(private readonly text: string) {}

  parse(): JsonValue {
    const stack: Frame[] = [];
    this.skipWhitespace();

    for (;;) {
      let value: JsonValue;
      const ch = this.text[this.pos];

      if (ch === '{') {
        this.pos++;
        this.skipWhitespace();
        if (this.text[this.pos] === '}') {
          this.pos++;
          value = jsonObject([]);
        } else {
          stack.push({ kind: 'object', entries: [], key: this.readKey() });
          continue;
        }
      } else if (ch === '[') {
        this.pos++;
        this.skipWhitespace();
        if (this.text[this.pos] === ']') {
          this.pos++;
          value = jsonArray([]);
        } else {
          stack.push({ kind: 'array', items: [] });
          continue;
        }
      } else {
        value = this.readScalar();
      }

      // Attach the finished value to its parent, closing parents that end here.
      let expectValue = false;
      while (!expectValue) {
        const frame = stack[stack.length - 1];
        if (!frame) return this.finish(value);

        this.skipWhitespace();
        const next = this.text[this.pos];
        if (frame.kind === 'array') {
          frame.items.push(value);
          if (next === ',') {
            this.pos++;
            this.skipWhitespace();
            expectValue = true;
          } else if (next === ']') {
            this.pos++;
            stack.pop();
            value = jsonArray(frame.items);
          } else {
            throw this.error("Expected ',' or ']'");
          }
        } else {
          frame.entries.push({ key: frame.key, value });
          if (next === ',') {
            this.pos++;
            frame.key = this.readKey();
            expectValue = true;
          } else if (next === '}') {
            this.pos++;
            stack.pop();
            value = jsonObject(frame.entries);
          } else {
            throw this.error("Expected ',' or '}'");
          }
        }
      }
    }
  }

  private finish(value: JsonValue): JsonValue {
    this.skipWhitespace();
    if (this.pos < this.text.length) throw this.error('Unexpected trailing characters');
    return value;
  }

  private readKey(): string {
    this.skipWhitespace();
    if (this.text[this.pos] !== '"') throw this.error('Expected string key');
    const key = this.readString();
    this.skipWhitespace();
    if (this.text[this.pos] !== ':') throw this.error("Expected ':'");
    this.pos++;
    this.skipWhitespace();
    return key;
  }

  private readScalar(): JsonValue {
    const ch = this.text.charAt(this.pos);
    switch (ch) {
      case '':
        throw this.error('Unexpected end of input');
      case '"':
        return jsonString(this.readString());
      case 't':
        this.expectLiteral('true');
        return jsonBool(true);
      case 'f':
        this.expectLiteral('false');
        return jsonBool(false);
      case 'n':
        this.expectLiteral('null');
        return jsonNull();
    }

    NUMBER.lastIndex = this.pos;
    const match = NUMBER.exec(this.text);
    if (!match) throw this.error(`Unexpected character ${JSON.stringify(ch)}`);
    this.pos += match[0].length;
    return jsonNumber(match[0]);
  }

  private expectLiteral(literal: string): void {
    if (!this.text.startsWith(literal, this.pos)) throw this.error(`Invalid literal, expected ${literal}`);
    this.pos += literal.length;
  }

  private readString(): string {
    this.pos++;
    let out = '';
    let start = this.pos;

    for (;;) {
      if (this.pos >= this.text.length) throw this.error('Unterminated string');
      const code = this.text.charCodeAt(this.pos);

      if (code === 0x22) {
        out += this.text.slice(start, this.pos);
        this.pos++;
        return out;
      }

      if (code === 0x5c) {
        out += this.text.slice(start, this.pos);
        const escape = this.text.charAt(this.pos + 1);
        if (escape === 'u') {
          const hex = this.text.slice(this.pos + 2, this.pos + 6);
          if (!/^[0-9a-fA-F]{4}$/.test(hex)) throw this.error('Invalid unicode escape');
          out += String.fromCharCode(parseInt(hex, 16));
          this.pos += 6;
        } else if (escape !== '' && escape in SIMPLE_ESCAPES) {
          out += SIMPLE_ESCAPES[escape];
          this.pos += 2;
        } else {
          throw this.error('Invalid escape');
        }
        start = this.pos;
        continue;
      }

      if (code < 0x20) throw this.error('Unescaped control character in string');
      this.pos++;
    }
  }

  private skipWhitespace(): void {
    for (;;) {
      const code = this.text.charCodeAt(this.pos);
      if (code === 0x20 || code === 0x09 || code === 0x0a || code === 0x0d) this.pos++;
      else return;
    }
  }

  private error(reason: string): JsonSyntaxError {
    return new JsonSyntaxError(reason, this.pos);
  }
}

/** Parse one complete JSON text. Throws JsonSyntaxError. */
export function parseJson(text: string): JsonValue {
  return new Parser(text).parse();
}
