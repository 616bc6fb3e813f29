/**
 * Encode Engine - structured value -> document tree
 *
 * The structural inverse of decode. The walk only writes: elements are
 * created through the builder the first time something is written to
 * them, so an omitted value leaves no empty element behind.
 */

import { MissingValue, XmlError } from './errors.js';
import type { BuildNode, TreeBuilder } from './grove/index.js';
import { applyBeforeEncode } from './hooks.js';
import { appendNode, ensureNode, renderPath } from './path.js';
import { isEmptyValue, serializePrimitive } from './primitive.js';
import {
  rootPathOf,
  type ArrayProcessor,
  type DictionaryProcessor,
  type PrimitiveProcessor,
  type Processor,
  type RecordProcessor,
} from './processor.js';
import { ProcessorState } from './state.js';
import { isAbsent, isMapping, toStructured, type StructuredValue } from './value.js';

/**
 * Creates (or finds) the element a value is written to. Only called once
 * the engine knows something will be written.
 */
type Locator = () => BuildNode;

/**
 * Encode a value into a new document
 *
 * @returns The document element created through `builder`
 * @throws MissingValue, InvalidRootConfiguration, XmlError for values of
 *   the wrong shape, or whatever a hook raised
 */
export function encode<N extends BuildNode>(processor: Processor, value: unknown, builder: TreeBuilder<N>): N {
  const { name, rest } = rootPathOf(processor);
  const root = builder.createRoot(name);
  const state = new ProcessorState();

  if (process.env.DEBUG_XMLFORM) {
    console.error(`encode: <${name}> with ${processor.kind} processor "${processor.alias}"`);
  }

  try {
    state.within(renderPath(processor.path), () => {
      encodeValue(processor, toStructured(value), () => ensureNode(root, rest), state, false);
    });
  } catch (error) {
    if (process.env.DEBUG_XMLFORM) {
      console.error(`encode failed: ${error instanceof Error ? error.message : String(error)}`);
    }
    throw error;
  }

  return root;
}

/**
 * Encode a child processor's field value below its parent element
 */
function encodeChild(
  processor: Processor,
  value: StructuredValue | undefined,
  parent: BuildNode,
  state: ProcessorState
): void {
  if (processor.kind === 'array' && processor.nested === undefined) {
    encodeArray(processor, value, () => parent, state, false);
    return;
  }

  state.within(renderPath(processor.path), () => {
    encodeValue(processor, value, () => ensureNode(parent, processor.path), state, false);
  });
}

/**
 * @param asItem The value is an array item: it is never omitted, so the
 *   item count survives a round trip
 */
function encodeValue(
  processor: Processor,
  value: StructuredValue | undefined,
  locate: Locator,
  state: ProcessorState,
  asItem: boolean
): void {
  switch (processor.kind) {
    case 'primitive':
      encodePrimitive(processor, value, locate, state, asItem);
      return;
    case 'dictionary':
    case 'record':
      encodeAggregate(processor, value, locate, state, asItem);
      return;
    case 'array':
      encodeArray(processor, value, locate, state, asItem);
      return;
  }
}

function encodePrimitive(
  processor: PrimitiveProcessor,
  value: StructuredValue | undefined,
  locate: Locator,
  state: ProcessorState,
  asItem: boolean
): void {
  if (isAbsent(value)) {
    if (processor.required) {
      throw new MissingValue(`Missing required value "${processor.alias}"`, state.location);
    }
    const fallback = processor.default;
    if (isAbsent(fallback)) {
      if (asItem) {
        locate();
      }
      return;
    }
    if (processor.omitEmpty && !asItem) {
      return;
    }
    writePrimitive(processor, locate(), serializePrimitive(fallback, processor.type));
    return;
  }

  const hooked = applyBeforeEncode(processor.hooks, state, value);
  if (processor.omitEmpty && !asItem && isEmptyValue(hooked)) {
    return;
  }
  writePrimitive(processor, locate(), serializePrimitive(hooked, processor.type));
}

function writePrimitive(processor: PrimitiveProcessor, node: BuildNode, text: string): void {
  if (processor.attribute === undefined) {
    node.setText(text);
  } else {
    node.setAttribute(processor.attribute, text);
  }
}

function encodeAggregate(
  processor: DictionaryProcessor | RecordProcessor,
  value: StructuredValue | undefined,
  locate: Locator,
  state: ProcessorState,
  asItem: boolean
): void {
  if (isAbsent(value)) {
    if (processor.required) {
      throw new MissingValue(`Missing required aggregate "${processor.alias}"`, state.location);
    }
    if (asItem) {
      locate();
    }
    return;
  }

  const hooked = applyBeforeEncode(processor.hooks, state, value);
  if (processor.omitEmpty && !asItem && isEmptyValue(hooked)) {
    return;
  }

  const readField = fieldReader(processor, hooked, state);
  const node = locate();
  for (const child of processor.children) {
    encodeChild(child, readField(child.alias), node, state);
  }
}

/**
 * Field access on the value of an aggregate: by key for dictionaries,
 * through the schema for records
 */
function fieldReader(
  processor: DictionaryProcessor | RecordProcessor,
  value: StructuredValue,
  state: ProcessorState
): (alias: string) => StructuredValue | undefined {
  if (processor.kind === 'dictionary') {
    if (!isMapping(value)) {
      throw new XmlError(`Expected a mapping for "${processor.alias}"`, state.location);
    }
    const mapping = value;
    return alias => mapping[alias];
  }

  if (typeof value !== 'object' || value === null) {
    throw new XmlError(`Expected an object for "${processor.alias}"`, state.location);
  }
  const record = value;
  const { schema } = processor;
  return alias => toStructured(schema.read(record, alias));
}

function encodeArray(
  processor: ArrayProcessor,
  value: StructuredValue | undefined,
  locate: Locator,
  state: ProcessorState,
  asItem: boolean
): void {
  if (isAbsent(value)) {
    if (processor.required) {
      throw new MissingValue(`Missing required array "${processor.alias}"`, state.location);
    }
    if (asItem) {
      locate();
    }
    return;
  }

  const hooked = applyBeforeEncode(processor.hooks, state, value);
  if (!Array.isArray(hooked)) {
    throw new XmlError(`Expected an array for "${processor.alias}"`, state.location);
  }

  if (hooked.length === 0) {
    if (processor.required) {
      throw new MissingValue(`Missing required array "${processor.alias}"`, state.location);
    }
    if (processor.omitEmpty && !asItem) {
      return;
    }
  }

  const container = locate();
  const { item } = processor;
  const itemName = renderPath(item.path);
  hooked.forEach((itemValue: unknown, index) => {
    state.within(itemName, () => {
      encodeValue(item, toStructured(itemValue), () => appendNode(container, item.path), state, true);
    }, index);
  });
}
