/**
 * Decode Engine - document tree -> structured value
 *
 * Single depth-first, pre-order walk of the processor tree against the
 * grove. Children are decoded in declaration order and the first failure
 * aborts the whole walk.
 */

import { InvalidPrimitiveValue, MissingValue } from './errors.js';
import type { Grove, GroveNode } from './grove/index.js';
import { applyAfterDecode } from './hooks.js';
import { findNode, findNodes, renderPath } from './path.js';
import { parsePrimitive } from './primitive.js';
import {
  rootPathOf,
  type ArrayProcessor,
  type DictionaryProcessor,
  type PrimitiveProcessor,
  type Processor,
  type RecordProcessor,
} from './processor.js';
import { ProcessorState } from './state.js';
import { cloneDefault, type Mapping, type StructuredValue } from './value.js';

/**
 * Decode a document with a root processor
 *
 * The first segment of the root processor's path (or the container of a
 * nested array) must name the document element.
 *
 * @throws MissingValue, InvalidPrimitiveValue, InvalidRootConfiguration,
 *   or whatever a hook raised
 */
export function decode(processor: Processor, grove: Grove): StructuredValue {
  const { name, rest } = rootPathOf(processor);
  const root = grove.root();
  const state = new ProcessorState();

  if (process.env.DEBUG_XMLFORM) {
    console.error(`decode: <${root.name()}> with ${processor.kind} processor "${processor.alias}"`);
  }

  try {
    return state.within(renderPath(processor.path), () => {
      const node = root.name() === name ? findNode(root, rest) : null;
      return decodeAt(processor, node, state);
    });
  } catch (error) {
    if (process.env.DEBUG_XMLFORM) {
      console.error(`decode failed: ${error instanceof Error ? error.message : String(error)}`);
    }
    throw error;
  }
}

/**
 * Decode a child processor relative to its parent element
 */
function decodeChild(processor: Processor, parent: GroveNode, state: ProcessorState): StructuredValue {
  if (processor.kind === 'array' && processor.nested === undefined) {
    // Embedded items sit directly in the parent; no location of their own
    return decodeItems(processor, findNodes(parent, processor.item.path), state);
  }

  return state.within(renderPath(processor.path), () =>
    decodeAt(processor, findNode(parent, processor.path), state)
  );
}

/**
 * Decode a processor at an already resolved element (null when absent)
 */
function decodeAt(processor: Processor, node: GroveNode | null, state: ProcessorState): StructuredValue {
  switch (processor.kind) {
    case 'primitive':
      return decodePrimitive(processor, node, state);
    case 'dictionary':
    case 'record':
      return decodeAggregate(processor, node, state);
    case 'array':
      return decodeNestedArray(processor, node, state);
  }
}

function decodePrimitive(processor: PrimitiveProcessor, node: GroveNode | null, state: ProcessorState): StructuredValue {
  const { attribute } = processor;

  let raw: string | null = null;
  if (node !== null) {
    raw = attribute === undefined ? node.text() ?? '' : node.attribute(attribute);
  }

  if (raw === null) {
    if (processor.required) {
      const what = attribute === undefined
        ? `element "${processor.alias}"`
        : `attribute "${attribute}"`;
      throw new MissingValue(`Missing required ${what}`, state.location);
    }
    // Defaults bypass hooks: nothing was parsed
    return cloneDefault(processor.default);
  }

  const result = parsePrimitive(raw, processor.type, processor.stripWhitespace);
  if (!result.ok) {
    throw new InvalidPrimitiveValue(result.reason, state.location, { rawText: raw });
  }

  return applyAfterDecode(processor.hooks, state, result.value);
}

function decodeAggregate(
  processor: DictionaryProcessor | RecordProcessor,
  node: GroveNode | null,
  state: ProcessorState
): StructuredValue {
  if (node === null) {
    if (processor.required) {
      throw new MissingValue(`Missing required aggregate "${processor.alias}"`, state.location);
    }
    if (processor.default !== undefined) {
      return cloneDefault(processor.default);
    }
    return processor.kind === 'dictionary' ? {} : null;
  }

  let value: StructuredValue;
  if (processor.kind === 'dictionary') {
    const mapping: Mapping = {};
    for (const child of processor.children) {
      mapping[child.alias] = decodeChild(child, node, state);
    }
    value = mapping;
  } else {
    const { schema } = processor;
    const record = schema.create();
    for (const child of processor.children) {
      schema.assign(record, child.alias, decodeChild(child, node, state));
    }
    value = schema.seal ? schema.seal(record) : record;
  }

  return applyAfterDecode(processor.hooks, state, value);
}

/**
 * Decode an array whose items live under `container` (a nested array
 * decoded as a child, as the root, or as an item of another array)
 */
function decodeNestedArray(processor: ArrayProcessor, container: GroveNode | null, state: ProcessorState): StructuredValue {
  if (container === null) {
    if (processor.required) {
      throw new MissingValue(`Missing required array "${processor.alias}"`, state.location);
    }
    return [];
  }
  return decodeItems(processor, findNodes(container, processor.item.path), state);
}

function decodeItems(processor: ArrayProcessor, nodes: GroveNode[], state: ProcessorState): StructuredValue {
  const itemName = renderPath(processor.item.path);
  const values = nodes.map((node, index) =>
    state.within(itemName, () => decodeAt(processor.item, node, state), index)
  );

  if (values.length === 0) {
    if (processor.required) {
      throw new MissingValue(`Missing required array "${processor.alias}"`, state.location);
    }
    // No items is an absent value: no hook
    return values;
  }

  return applyAfterDecode(processor.hooks, state, values);
}
