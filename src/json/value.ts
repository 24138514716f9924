/**
 * Immutable JSON value model.
 *
 * Numbers keep their source text so large integers and long decimals render
 * exactly as they arrived. Objects are ordered entry lists: duplicate keys are
 * kept, in insertion order.
 */

export type JsonValue =
  | JsonNull
  | JsonBool
  | JsonNumber
  | JsonString
  | JsonArray
  | JsonObject;

export interface JsonNull {
  readonly type: 'null';
}

export interface JsonBool {
  readonly type: 'bool';
  readonly value: boolean;
}

export interface JsonNumber {
  readonly type: 'number';
  /** Decimal text exactly as written in the source. */
  readonly text: string;
}

export interface JsonString {
  readonly type: 'string';
  readonly value: string;
}

export interface JsonArray {
  readonly type: 'array';
  readonly items: readonly JsonValue[];
}

export interface JsonEntry {
  readonly key: string;
  readonly value: JsonValue;
}

export interface JsonObject {
  readonly type: 'object';
  readonly entries: readonly JsonEntry[];
}

export type JsonContainer = JsonArray | JsonObject;
export type JsonScalar = JsonNull | JsonBool | JsonNumber | JsonString;

const NULL: JsonNull = Object.freeze({ type: 'null' });
const TRUE: JsonBool = Object.freeze({ type: 'bool', value: true });
const FALSE: JsonBool = Object.freeze({ type: 'bool', value: false });

export const jsonNull = (): JsonNull => NULL;
export const jsonBool = (value: boolean): JsonBool => (value ? TRUE : FALSE);
export const jsonNumber = (text: string): JsonNumber => Object.freeze({ type: 'number', text });
export const jsonString = (value: string): JsonString => Object.freeze({ type: 'string', value });

export function jsonArray(items: readonly JsonValue[]): JsonArray {
  return Object.freeze({ type: 'array', items: Object.freeze([...items]) });
}

export function jsonObject(entries: readonly JsonEntry[]): JsonObject {
  return Object.freeze({
    type: 'object',
    entries: Object.freeze(entries.map((e) => Object.freeze({ key: e.key, value: e.value }))),
  });
}

export function isContainer(value: JsonValue): value is JsonContainer {
  return value.type === 'array' || value.type === 'object';
}

/** Number of direct children (elements or entries); 0 for scalars. */
export function childCount(value: JsonValue): number {
  switch (value.type) {
    case 'array':
      return value.items.length;
    case 'object':
      return value.entries.length;
    default:
      return 0;
  }
}

/** Scalar as it appears on a display row. */
export function scalarText(value: JsonScalar): string {
  switch (value.type) {
    case 'null':
      return 'null';
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'number':
      return value.text;
    case 'string':
      return JSON.stringify(value.value);
  }
}

/**
 * Convert a plain JavaScript value (e.g. from JSON.parse) into the model.
 * Numbers go through String(), so precision is whatever the number held.
 */
export function fromPlain(input: unknown): JsonValue {
  if (input === null || input === undefined) return jsonNull();
  if (typeof input === 'boolean') return jsonBool(input);
  if (typeof input === 'number') return jsonNumber(String(input));
  if (typeof input === 'string') return jsonString(input);
  if (Array.isArray(input)) return jsonArray(input.map(fromPlain));
  if (typeof input === 'object') {
    return jsonObject(Object.entries(input).map(([key, value]) => ({ key, value: fromPlain(value) })));
  }
  throw new TypeError(`Cannot represent ${typeof input} as JSON`);
}

/** Compact JSON text; numbers are emitted verbatim. */
export function stringify(value: JsonValue): string {
  switch (value.type) {
    case 'array':
      return `[${value.items.map(stringify).join(',')}]`;
    case 'object':
      return `{${value.entries.map((e) => `${JSON.stringify(e.key)}:${stringify(e.value)}`).join(',')}}`;
    default:
      return scalarText(value);
  }
}
