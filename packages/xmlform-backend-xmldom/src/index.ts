/**
 * xmlform xmldom backend - XML text and files in, XML text and files out
 *
 * Thin layer over the core engine: parsing goes through @xmldom/xmldom
 * into a grove, encoding builds a DOM document and serializes it.
 */

import * as fs from 'fs';
import * as path from 'path';
import { decode, encode, type Processor, type StructuredValue } from 'xmlform-core';
import { DomTreeBuilder, parseXmlGrove } from './xmldom-grove.js';

export { DomGrove, DomNode, DomTreeBuilder, parseXmlGrove } from './xmldom-grove.js';

/**
 * Encodings supported for buffers and files
 */
export type TextEncoding = 'utf-8' | 'utf16le' | 'latin1';

const DECLARED_ENCODING: Record<TextEncoding, string> = {
  'utf-8': 'UTF-8',
  utf16le: 'UTF-16',
  latin1: 'ISO-8859-1',
};

export interface ReadOptions {
  /** Default 'utf-8' */
  encoding?: TextEncoding;
}

export interface SerializeOptions {
  /** Put each element on its own line, indented by two spaces per level */
  indent?: boolean;
  /** Start with an XML declaration (default false for strings, true for files) */
  declaration?: boolean;
}

export interface WriteOptions extends SerializeOptions {
  /** Default 'utf-8' */
  encoding?: TextEncoding;
}

// ============ Parsing ============

export function parseFromString(processor: Processor, xml: string): StructuredValue {
  return decode(processor, parseXmlGrove(xml));
}

export function parseFromBuffer(processor: Processor, buffer: Buffer, options: ReadOptions = {}): StructuredValue {
  return parseFromString(processor, buffer.toString(options.encoding ?? 'utf-8'));
}

export function parseFromFile(processor: Processor, filePath: string, options: ReadOptions = {}): StructuredValue {
  const resolvedPath = path.resolve(filePath);
  const encoding = options.encoding ?? 'utf-8';

  if (process.env.DEBUG_XMLFORM_IO) {
    console.error(`DEBUG_XMLFORM_IO: Reading ${resolvedPath} (${encoding})`);
  }

  const content = fs.readFileSync(resolvedPath, encoding);
  return decode(processor, parseXmlGrove(content));
}

// ============ Serialization ============

/**
 * Encode a value and serialize the document
 *
 * Compact output has no whitespace between elements. Indented output
 * ends with a newline.
 */
export function serializeToString(processor: Processor, value: unknown, options: SerializeOptions = {}): string {
  return render(processor, value, options, 'utf-8');
}

/**
 * Encode a value and write it to a file, creating missing directories
 *
 * UTF-16 output starts with a byte order mark.
 */
export function serializeToFile(processor: Processor, value: unknown, filePath: string, options: WriteOptions = {}): void {
  const encoding = options.encoding ?? 'utf-8';
  const xml = render(processor, value, { ...options, declaration: options.declaration ?? true }, encoding);
  const resolvedPath = path.resolve(filePath);

  const dir = path.dirname(resolvedPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  if (process.env.DEBUG_XMLFORM_IO) {
    console.error(`DEBUG_XMLFORM_IO: Writing ${resolvedPath} (${encoding}, ${xml.length} chars)`);
  }

  const bom = encoding === 'utf16le' ? '\uFEFF' : '';
  fs.writeFileSync(resolvedPath, bom + xml, { encoding });
}

function render(processor: Processor, value: unknown, options: SerializeOptions, encoding: TextEncoding): string {
  const indent = options.indent ?? false;
  const root = encode(processor, value, new DomTreeBuilder());

  let xml = root.toXml(indent);
  if (options.declaration) {
    xml = `<?xml version="1.0" encoding="${DECLARED_ENCODING[encoding]}"?>\n${xml}`;
  }
  return indent ? `${xml}\n` : xml;
}
