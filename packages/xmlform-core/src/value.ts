/**
 * Structured values - what decode produces and encode consumes
 */

import type { ScalarValue } from './primitive.js';

/**
 * Name -> value mapping produced by dictionary processors, in
 * declaration order
 */
export interface Mapping {
  [alias: string]: StructuredValue | undefined;
}

/**
 * Decoded or encodable value
 *
 * `object` stands for record instances (user objects, named tuples),
 * which the engine treats as opaque and reaches only through a
 * `RecordSchema`.
 */
export type StructuredValue = ScalarValue | null | StructuredValue[] | Mapping | object;

/**
 * True for null and undefined, the two spellings of "absent"
 */
export function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Narrow an arbitrary input to a value the engine can process
 *
 * Returns undefined for undefined, functions, symbols and bigints.
 */
export function toStructured(value: unknown): StructuredValue | undefined {
  switch (typeof value) {
    case 'boolean':
    case 'number':
    case 'string':
      return value;
    case 'object':
      return value;
    default:
      return undefined;
  }
}

/**
 * True for plain objects (mappings), false for arrays, null and class
 * instances
 */
export function isMapping(value: unknown): value is Mapping {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Copy a default value so decoded results never share structure
 *
 * Arrays and plain objects are copied deeply; scalars are immutable and
 * record instances are returned as given.
 */
export function cloneDefault(value: StructuredValue | undefined): StructuredValue {
  if (value === undefined || value === null) {
    return null;
  }
  if (Array.isArray(value)) {
    return value.map(item => cloneDefault(item));
  }
  if (isMapping(value)) {
    const copy: Mapping = {};
    for (const [key, item] of Object.entries(value)) {
      copy[key] = item === undefined ? undefined : cloneDefault(item);
    }
    return copy;
  }
  return value;
}
