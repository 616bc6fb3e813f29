/**
 * Primitive Codec - text <-> typed scalar conversion
 *
 * Accepted text, per type (surrounding whitespace is ignored except for
 * strings declared with `stripWhitespace: false`):
 *   boolean  true | yes | 1   /  false | no | 0   (case-insensitive)
 *   integer  [+-]digits, within the safe integer range
 *   float    decimal with optional fraction and exponent, NaN, [+-]Infinity
 *   string   anything, including ''
 */

export type PrimitiveType = 'boolean' | 'integer' | 'float' | 'string';

export type ScalarValue = boolean | number | string;

export type ParseResult =
  | { ok: true; value: ScalarValue }
  | { ok: false; reason: string };

const TRUE_TOKENS = new Set(['true', 'yes', '1']);
const FALSE_TOKENS = new Set(['false', 'no', '0']);

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const FLOAT_SPECIALS = new Map([
  ['NaN', NaN],
  ['Infinity', Infinity],
  ['+Infinity', Infinity],
  ['-Infinity', -Infinity],
]);

/**
 * Convert raw text to a value of the declared type
 */
export function parsePrimitive(text: string, type: PrimitiveType, stripWhitespace = true): ParseResult {
  switch (type) {
    case 'boolean': {
      const token = text.trim().toLowerCase();
      if (TRUE_TOKENS.has(token)) return { ok: true, value: true };
      if (FALSE_TOKENS.has(token)) return { ok: true, value: false };
      return { ok: false, reason: `Invalid boolean value "${text}"` };
    }

    case 'integer': {
      const token = text.trim();
      const value = Number(token);
      if (!INTEGER_PATTERN.test(token) || !Number.isSafeInteger(value)) {
        return { ok: false, reason: `Invalid integer value "${text}"` };
      }
      return { ok: true, value };
    }

    case 'float': {
      const token = text.trim();
      const special = FLOAT_SPECIALS.get(token);
      if (special !== undefined) return { ok: true, value: special };
      if (!FLOAT_PATTERN.test(token)) {
        return { ok: false, reason: `Invalid float value "${text}"` };
      }
      return { ok: true, value: Number(token) };
    }

    case 'string':
      return { ok: true, value: stripWhitespace ? text.trim() : text };
  }
}

/**
 * Convert a value to text. Total: a value of the wrong JS type is
 * converted with String().
 */
export function serializePrimitive(value: unknown, type: PrimitiveType): string {
  if (type === 'boolean' && typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  return String(value);
}

/**
 * Omit-empty predicate
 *
 * Empty: null, undefined, '', 0, NaN, false, [] and objects without own
 * enumerable keys.
 */
export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  switch (typeof value) {
    case 'string':
      return value === '';
    case 'number':
      return value === 0 || Number.isNaN(value);
    case 'boolean':
      return !value;
    case 'object':
      return Array.isArray(value) ? value.length === 0 : Object.keys(value).length === 0;
    default:
      return false;
  }
}
