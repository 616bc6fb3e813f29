/**
 * In-memory Grove Implementation
 *
 * A plain element tree that implements both sides of the grove:
 * `MemoryTreeBuilder` builds it during encode, `MemoryGrove` reads it
 * during decode. It has no markup parser; trees are built through the
 * builder API (or by encoding a value) and dumped with `toXml()`.
 */

import type { BuildNode, Grove, GroveNode, TreeBuilder } from './grove.js';

/**
 * MemoryElement - element with ordered attributes, text and child elements
 */
export class MemoryElement implements GroveNode, BuildNode {
  private readonly attrs = new Map<string, string>();
  private readonly elements: MemoryElement[] = [];
  private content: string | null = null;

  constructor(private readonly elementName: string) {}

  // ============ Read side ============

  name(): string {
    return this.elementName;
  }

  child(name: string): MemoryElement | null {
    return this.elements.find(e => e.elementName === name) ?? null;
  }

  children(name: string): MemoryElement[] {
    return this.elements.filter(e => e.elementName === name);
  }

  attribute(name: string): string | null {
    return this.attrs.get(name) ?? null;
  }

  text(): string | null {
    return this.content;
  }

  // ============ Write side ============

  appendChild(name: string): MemoryElement {
    const element = new MemoryElement(name);
    this.elements.push(element);
    return element;
  }

  setAttribute(name: string, value: string): void {
    this.attrs.set(name, value);
  }

  setText(text: string): void {
    this.content = text;
  }

  /**
   * All child elements regardless of name
   */
  childElements(): readonly MemoryElement[] {
    return this.elements;
  }

  /**
   * Dump the element as XML text
   *
   * @param indent When set, each element goes on its own line, indented
   *   by this string per level
   */
  toXml(indent?: string): string {
    let output = '';
    this.write(indent, 0, text => {
      output += text;
    });
    return output;
  }

  private write(indent: string | undefined, level: number, out: (text: string) => void): void {
    const pad = indent ? indent.repeat(level) : '';
    const newline = indent ? '\n' : '';

    let open = `${pad}<${this.elementName}`;
    for (const [name, value] of this.attrs) {
      open += ` ${name}="${escapeXml(value)}"`;
    }

    if (this.elements.length === 0) {
      if (this.content === null || this.content === '') {
        out(`${open}/>${newline}`);
      } else {
        out(`${open}>${escapeXml(this.content)}</${this.elementName}>${newline}`);
      }
      return;
    }

    out(`${open}>${this.content ? escapeXml(this.content) : ''}${newline}`);
    for (const element of this.elements) {
      element.write(indent, level + 1, out);
    }
    out(`${pad}</${this.elementName}>${newline}`);
  }
}

/**
 * Escape XML special characters
 */
function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * MemoryGrove - read access to a built tree
 */
export class MemoryGrove implements Grove {
  constructor(private readonly rootElement: MemoryElement) {}

  root(): MemoryElement {
    return this.rootElement;
  }
}

/**
 * MemoryTreeBuilder - creates detached in-memory documents
 */
export class MemoryTreeBuilder implements TreeBuilder<MemoryElement> {
  createRoot(name: string): MemoryElement {
    return new MemoryElement(name);
  }
}
