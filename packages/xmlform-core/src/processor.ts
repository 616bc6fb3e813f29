/**
 * Processor Model
 *
 * A processor declares how one value maps to and from a location in the
 * element tree. Processors form a closed union discriminated on `kind`:
 *
 * - primitive   scalar in an element's text or attribute
 * - dictionary  plain-object mapping built from child processors
 * - record      user object or named tuple built from child processors
 * - array       repeated elements, either embedded in the parent or
 *               nested under a container element
 *
 * Processors are validated and frozen when declared, hold no mutable
 * state and can be shared by any number of decode/encode calls.
 *
 * Example:
 *   const author = dictionary('author', [
 *     string('name'),
 *     integer('birth-year'),
 *     array(string('title'), { nested: 'books' }),
 *   ]);
 */

import { InvalidRootConfiguration } from './errors.js';
import type { Hooks } from './hooks.js';
import { isSelfPath, lastName, namesOf, parsePath, renderPath, type PathExpression, type PathSegment } from './path.js';
import type { PrimitiveType } from './primitive.js';
import type { Mapping, StructuredValue } from './value.js';

interface ProcessorBase {
  readonly path: PathExpression;
  /** Key of the value on the structured side */
  readonly alias: string;
  readonly required: boolean;
  /** Only consulted when the value is absent and `required` is false */
  readonly default: StructuredValue | undefined;
  readonly omitEmpty: boolean;
  readonly hooks: Hooks | undefined;
}

export interface PrimitiveProcessor extends ProcessorBase {
  readonly kind: 'primitive';
  readonly type: PrimitiveType;
  readonly attribute: string | undefined;
  readonly stripWhitespace: boolean;
}

export interface DictionaryProcessor extends ProcessorBase {
  readonly kind: 'dictionary';
  readonly children: readonly Processor[];
}

/**
 * Construction and field access for record values
 */
export interface RecordSchema<T extends object> {
  create(): T;
  assign(record: T, field: string, value: StructuredValue): void;
  read(record: T, field: string): unknown;
  /** Final step after all fields are assigned (e.g. freezing) */
  seal?(record: T): T;
}

export interface RecordProcessor<T extends object = object> extends ProcessorBase {
  readonly kind: 'record';
  readonly children: readonly Processor[];
  readonly schema: RecordSchema<T>;
}

export interface ArrayProcessor extends ProcessorBase {
  readonly kind: 'array';
  readonly item: Processor;
  /** Container path for nested arrays, undefined for embedded ones */
  readonly nested: PathExpression | undefined;
}

export type Processor = PrimitiveProcessor | DictionaryProcessor | RecordProcessor | ArrayProcessor;

// ============ Options ============

export interface ProcessorOptions {
  alias?: string;
  required?: boolean;
  default?: StructuredValue;
  omitEmpty?: boolean;
  hooks?: Hooks;
}

export interface PrimitiveOptions extends ProcessorOptions {
  /** Read/write this attribute of the element instead of its text */
  attribute?: string;
}

export interface StringOptions extends PrimitiveOptions {
  /** Trim leading and trailing whitespace when decoding (default true) */
  stripWhitespace?: boolean;
}

export interface ArrayOptions {
  alias?: string;
  /** Defaults to the item processor's `required` */
  required?: boolean;
  /** Name (or path) of the container element; omit for an embedded array */
  nested?: string;
  /** Skip an empty nested array's container when encoding */
  omitEmpty?: boolean;
  hooks?: Hooks;
}

// ============ Primitive processors ============

export function boolean(path: string, options: PrimitiveOptions = {}): PrimitiveProcessor {
  return primitive(path, 'boolean', options, true);
}

export function integer(path: string, options: PrimitiveOptions = {}): PrimitiveProcessor {
  return primitive(path, 'integer', options, true);
}

export function floatingPoint(path: string, options: PrimitiveOptions = {}): PrimitiveProcessor {
  return primitive(path, 'float', options, true);
}

export function string(path: string, options: StringOptions = {}): PrimitiveProcessor {
  return primitive(path, 'string', options, options.stripWhitespace ?? true);
}

function primitive(
  pathText: string,
  type: PrimitiveType,
  options: PrimitiveOptions,
  stripWhitespace: boolean
): PrimitiveProcessor {
  const path = parsePath(pathText);
  const base = baseOf(path, options, options.attribute);
  const processor: PrimitiveProcessor = {
    kind: 'primitive',
    ...base,
    type,
    attribute: options.attribute,
    stripWhitespace,
  };
  return Object.freeze(processor);
}

// ============ Aggregate processors ============

export function dictionary(path: string, children: readonly Processor[], options: ProcessorOptions = {}): DictionaryProcessor {
  const parsed = parsePath(path);
  const base = baseOf(parsed, options);
  const processor: DictionaryProcessor = {
    kind: 'dictionary',
    ...base,
    children: checkChildren(parsed, children),
  };
  return Object.freeze(processor);
}

/**
 * Record processor over an explicit schema
 */
export function record<T extends object>(
  path: string,
  schema: RecordSchema<T>,
  children: readonly Processor[],
  options: ProcessorOptions = {}
): RecordProcessor<T> {
  const parsed = parsePath(path);
  if (typeof schema?.create !== 'function' || typeof schema.assign !== 'function' || typeof schema.read !== 'function') {
    throw new InvalidRootConfiguration('Record processor needs create, assign and read', renderPath(parsed));
  }
  const base = baseOf(parsed, options);
  const processor: RecordProcessor<T> = {
    kind: 'record',
    ...base,
    children: checkChildren(parsed, children),
    schema,
  };
  return Object.freeze(processor);
}

/**
 * Record processor for instances of a class with a zero-argument constructor
 *
 * Decoded values are assigned to the fields named by each child's alias.
 */
export function userObject<T extends object>(
  path: string,
  type: new () => T,
  children: readonly Processor[],
  options: ProcessorOptions = {}
): RecordProcessor<T> {
  if (typeof type !== 'function') {
    throw new InvalidRootConfiguration('User object processor needs a constructor', path);
  }
  return record(path, classSchema(type), children, options);
}

/**
 * Record processor for frozen objects with a fixed set of fields
 *
 * Every field starts out null; child aliases must be among `fields`.
 */
export function namedTuple(
  path: string,
  fields: readonly string[],
  children: readonly Processor[],
  options: ProcessorOptions = {}
): RecordProcessor<Mapping> {
  const known = new Set(fields);
  for (const child of children) {
    if (!known.has(child.alias)) {
      throw new InvalidRootConfiguration(`Field "${child.alias}" is not declared for named tuple`, path);
    }
  }
  return record(path, tupleSchema(Object.freeze([...fields])), children, options);
}

function classSchema<T extends object>(type: new () => T): RecordSchema<T> {
  return {
    create: () => new type(),
    assign: (target, field, value) => {
      Reflect.set(target, field, value);
    },
    read: (source, field) => Reflect.get(source, field),
  };
}

function tupleSchema(fields: readonly string[]): RecordSchema<Mapping> {
  return {
    create: () => {
      const tuple: Mapping = {};
      for (const field of fields) {
        tuple[field] = null;
      }
      return tuple;
    },
    assign: (target, field, value) => {
      target[field] = value;
    },
    read: (source, field) => source[field],
    seal: tuple => Object.freeze(tuple),
  };
}

// ============ Array processor ============

export function array(item: Processor, options: ArrayOptions = {}): ArrayProcessor {
  const nested = options.nested === undefined ? undefined : parsePath(options.nested);
  const location = nested ? renderPath(nested) : renderPath(item.path);

  if (item.kind === 'array' && item.nested === undefined) {
    throw new InvalidRootConfiguration('Array items cannot be an embedded array', location);
  }
  if (lastName(item.path) === undefined) {
    throw new InvalidRootConfiguration('Array items need an element name', location);
  }
  if (nested && isSelfPath(nested)) {
    throw new InvalidRootConfiguration('Nested array container needs an element name', location);
  }

  const required = options.required ?? item.required;
  const omitEmpty = options.omitEmpty ?? false;
  if (omitEmpty && required) {
    throw new InvalidRootConfiguration('omitEmpty requires required: false', location);
  }
  if (omitEmpty && !nested) {
    throw new InvalidRootConfiguration('omitEmpty requires a nested array', location);
  }

  const processor: ArrayProcessor = {
    kind: 'array',
    path: nested ?? item.path,
    alias: options.alias ?? (nested ? containerName(nested) : item.alias),
    required,
    default: undefined,
    omitEmpty,
    hooks: options.hooks,
    item,
    nested,
  };
  return Object.freeze(processor);
}

// ============ Shared helpers ============

/**
 * Last element name of a container path (`a/b` -> `b`, `b/.` -> `b`)
 */
function containerName(nested: PathExpression): string {
  const names = namesOf(nested);
  return names.length > 0 ? names[names.length - 1] : renderPath(nested);
}

function baseOf(path: PathExpression, options: ProcessorOptions, attribute?: string): ProcessorBase {
  const required = options.required ?? true;
  const omitEmpty = options.omitEmpty ?? false;
  const location = renderPath(path);

  if (omitEmpty && required) {
    throw new InvalidRootConfiguration('omitEmpty requires required: false', location);
  }

  const alias = options.alias ?? attribute ?? lastName(path);
  if (alias === undefined || alias === '') {
    throw new InvalidRootConfiguration('An alias is needed for a path without an element name', location);
  }

  return {
    path,
    alias,
    required,
    default: options.default,
    omitEmpty,
    hooks: options.hooks,
  };
}

function checkChildren(path: PathExpression, children: readonly Processor[]): readonly Processor[] {
  const seen = new Set<string>();
  for (const child of children) {
    if (seen.has(child.alias)) {
      throw new InvalidRootConfiguration(`Duplicate alias "${child.alias}"`, renderPath(path));
    }
    seen.add(child.alias);
  }
  return Object.freeze([...children]);
}

/**
 * Split a root processor's path into the document element name and the
 * path below it
 *
 * @throws InvalidRootConfiguration for primitives, embedded arrays and
 *   paths that do not start with an element name
 */
export function rootPathOf(processor: Processor): { name: string; rest: PathSegment[] } {
  if (processor.kind === 'primitive') {
    throw new InvalidRootConfiguration('A primitive processor cannot be the root processor', renderPath(processor.path));
  }
  if (processor.kind === 'array' && processor.nested === undefined) {
    throw new InvalidRootConfiguration('An embedded array cannot be the root processor', renderPath(processor.path));
  }

  const [first, ...rest] = processor.path;
  if (first.kind !== 'named') {
    throw new InvalidRootConfiguration('Root processor path must start with an element name', renderPath(processor.path));
  }
  return { name: first.name, rest };
}
