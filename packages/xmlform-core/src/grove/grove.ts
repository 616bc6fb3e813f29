/**
 * Grove Interface - Abstract element tree used by the processors
 *
 * The decode and encode engines never see a concrete XML library. They
 * read through `GroveNode` and write through `BuildNode`, so any parser
 * or writer (an xmldom DOM, an in-memory tree) can sit underneath.
 *
 * USAGE PATTERN:
 * - Methods return null when the thing asked for is not there
 * - Only elements are modelled; text is read as a whole
 *
 * Example:
 *   const year = node.child('birth-year')?.text();
 */

/**
 * Read side of an element
 */
export interface GroveNode {
  /**
   * Element name (local name, without namespace prefix)
   */
  name(): string;

  /**
   * First child element with the given name
   *
   * Returns null if there is none
   */
  child(name: string): GroveNode | null;

  /**
   * All child elements with the given name, in document order
   */
  children(name: string): GroveNode[];

  /**
   * Attribute value
   *
   * Returns null if the attribute is not present. An attribute set to
   * the empty string returns ''.
   */
  attribute(name: string): string | null;

  /**
   * Character data directly inside the element
   *
   * Returns null if the element has no text at all
   */
  text(): string | null;
}

/**
 * Grove - a parsed document
 */
export interface Grove {
  /**
   * Document element (e.g. <genre-authors>)
   */
  root(): GroveNode;
}

/**
 * Write side of an element
 */
export interface BuildNode {
  name(): string;

  /**
   * First child element with the given name, if one was already appended
   *
   * Used for get-or-create: values that share an element (attributes,
   * slash paths) end up on the same node.
   */
  child(name: string): BuildNode | null;

  /**
   * Append a new child element and return it
   */
  appendChild(name: string): BuildNode;

  setAttribute(name: string, value: string): void;

  /**
   * Replace the character data of the element
   */
  setText(text: string): void;
}

/**
 * TreeBuilder - creates the document element of a new document
 */
export interface TreeBuilder<N extends BuildNode = BuildNode> {
  createRoot(name: string): N;
}
