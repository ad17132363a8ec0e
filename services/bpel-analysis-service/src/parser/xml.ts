/**
 * XML Scanner
 *
 * A single tokenizer regex drives a small stack machine that builds an element
 * tree. Only what BPEL, WSDL and XSD documents need is supported: elements,
 * attributes, namespaces, text, CDATA. Comments, processing instructions and
 * DOCTYPE are skipped. Source offsets are kept on every element so literal
 * XML and embedded code can be reproduced exactly.
 */

import { XmlParseError } from '../errors';

export interface XmlText {
  type: 'text';
  value: string;
  cdata: boolean;
}

export interface XmlElement {
  type: 'element';
  name: string;
  prefix: string;
  local: string;
  namespace: string;
  attributes: Record<string, string>;
  /** Prefix → URI mapping in scope at this element ('' is the default namespace) */
  namespaces: Record<string, string>;
  children: XmlNode[];
  parent?: XmlElement;
  line: number;
  start: number;
  end: number;
  innerStart: number;
  innerEnd: number;
}

export type XmlNode = XmlElement | XmlText;

export interface XmlDocument {
  source: string;
  root: XmlElement;
}

const XML_NAMESPACE = 'http://www.w3.org/XML/1998/namespace';

// 1: CDATA, 2: closing tag, 3: opening tag name, 4: attributes,
// 5: self-closing slash, 6: text. A bare '<' that matches nothing else is an error.
const TOKEN_REGEX =
  /<!--[\s\S]*?-->|<!\[CDATA\[([\s\S]*?)\]\]>|<\?[\s\S]*?\?>|<!DOCTYPE(?:[^>[]|\[[\s\S]*?\])*>|<\/([^\s>]+)\s*>|<([^\s/>!?]+)((?:\s+[^\s=/>]+\s*=\s*(?:"[^"]*"|'[^']*'))*)\s*(\/?)>|([^<]+)|</g;

const ATTRIBUTE_REGEX = /([^\s=]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;

const ENTITY_REGEX = /&(lt|gt|amp|quot|apos|#\d+|#x[0-9a-fA-F]+);/g;

const NAMED_ENTITIES: Record<string, string> = {
  lt: '<',
  gt: '>',
  amp: '&',
  quot: '"',
  apos: "'",
};

/** Code points the XML Char production allows */
export function isXmlChar(codePoint: number): boolean {
  return (
    codePoint === 0x9 ||
    codePoint === 0xa ||
    codePoint === 0xd ||
    (codePoint >= 0x20 && codePoint <= 0xd7ff) ||
    (codePoint >= 0xe000 && codePoint <= 0xfffd) ||
    (codePoint >= 0x10000 && codePoint <= 0x10ffff)
  );
}

/**
 * Replace the predefined entities and character references. A character
 * reference outside the XML character range goes to `invalid`, which by
 * default leaves it as written.
 */
export function decodeEntities(
  text: string,
  invalid: (reference: string, index: number) => string = reference => reference
): string {
  return text.replace(ENTITY_REGEX, (match: string, entity: string, index: number) => {
    if (entity.startsWith('#')) {
      const codePoint = entity.startsWith('#x') ? parseInt(entity.slice(2), 16) : parseInt(entity.slice(1), 10);
      return isXmlChar(codePoint) ? String.fromCodePoint(codePoint) : invalid(match, index);
    }
    return NAMED_ENTITIES[entity] ?? match;
  });
}

function splitName(name: string): { prefix: string; local: string } {
  const colon = name.indexOf(':');
  if (colon === -1) return { prefix: '', local: name };
  return { prefix: name.slice(0, colon), local: name.slice(colon + 1) };
}

function parseAttributes(raw: string, invalid: (reference: string) => string): Record<string, string> {
  const attributes: Record<string, string> = {};
  ATTRIBUTE_REGEX.lastIndex = 0;
  let m: RegExpExecArray | null;
  while ((m = ATTRIBUTE_REGEX.exec(raw)) !== null) {
    attributes[m[1]] = decodeEntities(m[2] ?? m[3] ?? '', invalid);
  }
  return attributes;
}

function scopeNamespaces(attributes: Record<string, string>, inherited: Record<string, string>): Record<string, string> {
  let scoped = inherited;
  for (const [name, value] of Object.entries(attributes)) {
    if (name === 'xmlns' || name.startsWith('xmlns:')) {
      if (scoped === inherited) scoped = { ...inherited };
      scoped[name === 'xmlns' ? '' : name.slice(6)] = value;
    }
  }
  return scoped;
}

export const MAX_ELEMENT_DEPTH = 512;

/**
 * Parse an XML document into an element tree.
 * Throws XmlParseError with the line and column of the first problem.
 */
export function parseXml(source: string): XmlDocument {
  const stack: XmlElement[] = [];
  let root: XmlElement | undefined;

  // Incremental line tracking keeps position lookups linear
  let line = 1;
  let scanned = 0;
  const advanceTo = (offset: number) => {
    for (let i = scanned; i < offset; i++) {
      if (source.charCodeAt(i) === 10) line++;
    }
    scanned = offset;
  };
  const fail: (message: string, offset: number) => never = (message, offset) => {
    const before = source.slice(0, offset);
    const errorLine = before.split('\n').length;
    const column = offset - (before.lastIndexOf('\n') + 1) + 1;
    throw new XmlParseError(message, errorLine, column);
  };
  const invalidReference = (offset: number) => (reference: string) => fail(`Invalid character reference ${reference}`, offset);

  TOKEN_REGEX.lastIndex = 0;
  let m: RegExpExecArray | null;
  while ((m = TOKEN_REGEX.exec(source)) !== null) {
    const token = m[0];
    const offset = m.index;
    advanceTo(offset);
    const current = stack[stack.length - 1];

    if (m[1] !== undefined) {
      if (!current) fail('CDATA section outside the root element', offset);
      current.children.push({ type: 'text', value: m[1], cdata: true });
    } else if (m[2] !== undefined) {
      const closing = m[2];
      if (!current) fail(`Unexpected closing tag </${closing}>`, offset);
      if (current.name !== closing) {
        fail(`Mismatched closing tag </${closing}>, expected </${current.name}>`, offset);
      }
      current.innerEnd = offset;
      current.end = offset + token.length;
      stack.pop();
    } else if (m[3] !== undefined) {
      if (!current && root) fail(`Unexpected second root element <${m[3]}>`, offset);
      if (stack.length >= MAX_ELEMENT_DEPTH) fail(`Element nesting exceeds ${MAX_ELEMENT_DEPTH} levels`, offset);
      const attributes = parseAttributes(m[4] ?? '', invalidReference(offset));
      const namespaces = scopeNamespaces(attributes, current ? current.namespaces : { xml: XML_NAMESPACE });
      const { prefix, local } = splitName(m[3]);
      const element: XmlElement = {
        type: 'element',
        name: m[3],
        prefix,
        local,
        namespace: namespaces[prefix] ?? '',
        attributes,
        namespaces,
        children: [],
        parent: current,
        line,
        start: offset,
        end: offset + token.length,
        innerStart: offset + token.length,
        innerEnd: offset + token.length,
      };
      if (current) {
        current.children.push(element);
      } else {
        root = element;
      }
      if (m[5] !== '/') stack.push(element);
    } else if (m[6] !== undefined) {
      if (current) {
        const value = decodeEntities(m[6], (reference, index) => fail(`Invalid character reference ${reference}`, offset + index));
        current.children.push({ type: 'text', value, cdata: false });
      } else if (m[6].trim().length > 0) {
        fail('Text content outside the root element', offset);
      }
    } else if (token === '<') {
      fail("Unexpected '<'", offset);
    }
    // comments, processing instructions and DOCTYPE fall through
  }

  const unclosed = stack[stack.length - 1];
  if (unclosed) {
    fail(`Unclosed element <${unclosed.name}>`, unclosed.start);
  }
  if (!root) {
    fail('Document has no root element', source.length);
  }
  return { source, root };
}

// ============================================================================
// Tree helpers
// ============================================================================

export function elementChildren(element: XmlElement): XmlElement[] {
  return element.children.filter((c): c is XmlElement => c.type === 'element');
}

export function childrenNamed(element: XmlElement, local: string): XmlElement[] {
  return elementChildren(element).filter(c => c.local === local);
}

export function firstChild(element: XmlElement, local: string): XmlElement | undefined {
  return elementChildren(element).find(c => c.local === local);
}

/** Document order, without recursion */
export function* descendants(element: XmlElement): Generator<XmlElement> {
  const pending = elementChildren(element).reverse();
  let next = pending.pop();
  while (next) {
    yield next;
    pending.push(...elementChildren(next).reverse());
    next = pending.pop();
  }
}

/**
 * Attribute lookup by unprefixed name, falling back to a prefixed attribute
 * with the same local name (vendor attributes such as wf:key).
 */
export function attr(element: XmlElement, name: string): string | undefined {
  const direct = element.attributes[name];
  if (direct !== undefined) return direct;
  for (const [key, value] of Object.entries(element.attributes)) {
    if (key.startsWith('xmlns')) continue;
    if (splitName(key).local === name) return value;
  }
  return undefined;
}

export function textContent(element: XmlElement): string {
  const parts: string[] = [];
  const pending: XmlNode[] = [...element.children].reverse();
  let node = pending.pop();
  while (node) {
    if (node.type === 'text') {
      parts.push(node.value);
    } else {
      pending.push(...[...node.children].reverse());
    }
    node = pending.pop();
  }
  return parts.join('');
}

/** Exact source text between the element's start and end tags */
export function innerXml(document: XmlDocument, element: XmlElement): string {
  return document.source.slice(element.innerStart, element.innerEnd);
}

export interface QName {
  namespace: string;
  local: string;
}

/** Resolve a prefixed name against the namespaces in scope at `element` */
export function resolveQName(element: XmlElement, qname: string): QName {
  const { prefix, local } = splitName(qname.trim());
  return { namespace: element.namespaces[prefix] ?? '', local };
}

export function sameQName(a: QName, b: QName): boolean {
  return a.namespace === b.namespace && a.local === b.local;
}

export function localPart(qname: string): string {
  return splitName(qname).local;
}
