/**
 * xmldom Grove Implementation
 *
 * Concrete grove (read and build sides) over @xmldom/xmldom for Node.js.
 *
 * Wrappers are lightweight: each holds a reference to the DOM element
 * and is cached in a WeakMap so the same element always maps to the
 * same wrapper.
 */

import { DOMImplementation, DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { XmlError, type BuildNode, type Grove, type GroveNode, type TreeBuilder } from 'xmlform-core';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

const nodeWrapperCache = new WeakMap<Element, DomNode>();

/**
 * Wrap a DOM element
 *
 * Always use this instead of `new DomNode()` to reuse wrappers.
 */
function wrapElement(element: Element): DomNode {
  let wrapper = nodeWrapperCache.get(element);
  if (!wrapper) {
    wrapper = new DomNode(element);
    nodeWrapperCache.set(element, wrapper);
  }
  return wrapper;
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function isText(node: Node): boolean {
  return node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE;
}

// xmldom node lists are not iterable
function childNodes(element: Element): Node[] {
  const nodes: Node[] = [];
  const list = element.childNodes;
  for (let i = 0; i < list.length; i++) {
    const node = list.item(i);
    if (node) {
      nodes.push(node);
    }
  }
  return nodes;
}

function childElements(element: Element): Element[] {
  return childNodes(element).filter(isElement);
}

/**
 * DomNode - GroveNode and BuildNode over a DOM element
 *
 * Names are compared by local name, so namespace prefixes are ignored.
 */
export class DomNode implements GroveNode, BuildNode {
  /**
   * IMPORTANT: Don't call this directly. Use wrapElement() to get the cached wrapper.
   */
  constructor(private readonly element: Element) {}

  // ============ Read side ============

  name(): string {
    return this.element.localName;
  }

  child(name: string): DomNode | null {
    const found = childElements(this.element).find(element => element.localName === name);
    return found ? wrapElement(found) : null;
  }

  children(name: string): DomNode[] {
    return childElements(this.element)
      .filter(element => element.localName === name)
      .map(wrapElement);
  }

  attribute(name: string): string | null {
    return this.element.hasAttribute(name) ? this.element.getAttribute(name) : null;
  }

  /**
   * Direct text and CDATA children joined; null for an element with no
   * content at all
   */
  text(): string | null {
    const nodes = childNodes(this.element);
    if (nodes.length === 0) {
      return null;
    }
    let text = '';
    for (const node of nodes) {
      if (isText(node)) {
        text += node.nodeValue ?? '';
      }
    }
    return text;
  }

  // ============ Write side ============

  appendChild(name: string): DomNode {
    const created = this.element.ownerDocument.createElement(name);
    this.element.appendChild(created);
    return wrapElement(created);
  }

  setAttribute(name: string, value: string): void {
    this.element.setAttribute(name, value);
  }

  setText(text: string): void {
    for (const node of childNodes(this.element)) {
      if (isText(node)) {
        this.element.removeChild(node);
      }
    }
    if (text !== '') {
      this.element.insertBefore(this.element.ownerDocument.createTextNode(text), this.element.firstChild);
    }
  }

  /**
   * Serialize this element (without XML declaration)
   *
   * @param format Indent child elements by two spaces per level
   */
  toXml(format: boolean): string {
    const serializer = new XMLSerializer();
    if (!format) {
      return serializer.serializeToString(this.element);
    }
    const copy = this.element.cloneNode(true);
    if (isElement(copy)) {
      indentElement(copy, 0);
    }
    return serializer.serializeToString(copy);
  }
}

// Elements with their own text are left as they are
function indentElement(element: Element, level: number): void {
  const nodes = childNodes(element);
  const elements = nodes.filter(isElement);
  if (elements.length === 0 || nodes.some(node => isText(node) && (node.nodeValue ?? '').trim() !== '')) {
    return;
  }

  const document = element.ownerDocument;
  for (const child of elements) {
    element.insertBefore(document.createTextNode(`\n${'  '.repeat(level + 1)}`), child);
    indentElement(child, level + 1);
  }
  element.appendChild(document.createTextNode(`\n${'  '.repeat(level)}`));
}

/**
 * DomGrove - a parsed document
 */
export class DomGrove implements Grove {
  private rootNode: DomNode;

  constructor(doc: Document) {
    // A document that failed to parse can come back without a root
    const root: Element | null = doc.documentElement;
    if (!root) {
      throw new XmlError('Document has no root element');
    }
    this.rootNode = wrapElement(root);
  }

  root(): DomNode {
    return this.rootNode;
  }
}

/**
 * DomTreeBuilder - each root starts a new document
 */
export class DomTreeBuilder implements TreeBuilder<DomNode> {
  createRoot(name: string): DomNode {
    const doc = new DOMImplementation().createDocument(null, name, null);
    return wrapElement(doc.documentElement);
  }
}

/**
 * Parse XML and create a grove
 *
 * The text is already decoded, so a leading byte order mark is dropped
 * and a declared encoding is not acted on.
 *
 * @throws XmlError when the text is not well-formed
 */
export function parseXmlGrove(xml: string | Buffer): Grove {
  const xmlString = (typeof xml === 'string' ? xml : xml.toString('utf-8')).replace(/^\uFEFF/, '');

  const problems: string[] = [];
  const collect = (message: string): void => {
    problems.push(message.replace(/^\[xmldom [a-zA-Z]+\]\s*/, '').trim());
  };
  const parser = new DOMParser({ errorHandler: { error: collect, fatalError: collect } });

  let doc: Document;
  try {
    doc = parser.parseFromString(xmlString, 'text/xml');
  } catch (error) {
    const message = error instanceof Error ? error.message.trim() : String(error);
    throw new XmlError(`Malformed XML: ${message}`, '', { cause: error });
  }

  if (problems.length > 0) {
    throw new XmlError(`Malformed XML: ${problems[0]}`);
  }

  return new DomGrove(doc);
}
