/**
 * xmlform core - declarative processors mapping XML trees to values
 *
 * This is the core library containing:
 * - Grove interfaces (abstract element tree) and an in-memory grove
 * - Processor declarations (primitives, dictionaries, records, arrays)
 * - Decode and encode engines
 * - Hook protocol and error taxonomy
 */

export * from './grove/index.js';
export {
  boolean,
  integer,
  floatingPoint,
  string,
  dictionary,
  record,
  userObject,
  namedTuple,
  array,
  rootPathOf,
} from './processor.js';
export type {
  Processor,
  PrimitiveProcessor,
  DictionaryProcessor,
  RecordProcessor,
  RecordSchema,
  ArrayProcessor,
  ProcessorOptions,
  PrimitiveOptions,
  StringOptions,
  ArrayOptions,
} from './processor.js';
export { decode } from './decode.js';
export { encode } from './encode.js';
export { applyAfterDecode, applyBeforeEncode } from './hooks.js';
export type { Hooks, HookFunction } from './hooks.js';
export { ProcessorState } from './state.js';
export type { ProcessorStateView } from './state.js';
export { parsePath, renderPath, findNode, findNodes, ensureNode, appendNode } from './path.js';
export type { PathExpression, PathSegment } from './path.js';
export { parsePrimitive, serializePrimitive, isEmptyValue } from './primitive.js';
export type { PrimitiveType, ScalarValue, ParseResult } from './primitive.js';
export { isMapping, cloneDefault } from './value.js';
export type { StructuredValue, Mapping } from './value.js';
export {
  XmlError,
  MissingValue,
  InvalidPrimitiveValue,
  InvalidRootConfiguration,
  UserFailure,
} from './errors.js';
export type { LocatedErrorClass } from './errors.js';
