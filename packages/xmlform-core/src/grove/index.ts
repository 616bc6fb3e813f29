/**
 * Grove module - Abstract element tree for the processors
 *
 * Separates the decode/encode engines from specific XML libraries.
 */

export type { GroveNode, Grove, BuildNode, TreeBuilder } from './grove.js';
export { MemoryElement, MemoryGrove, MemoryTreeBuilder } from './memory-grove.js';
