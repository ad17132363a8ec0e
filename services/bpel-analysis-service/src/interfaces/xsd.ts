/**
 * XSD type extraction: top-level elements, complex types and simple types.
 */

import { XmlElement, attr, childrenNamed, elementChildren, firstChild } from '../parser/xml';
import { parseOrFail } from '../parser/bpel';
import { AnalysisError } from '../errors';
import { SchemaField, SchemaType } from '../types/summary';

const CONTENT_MODEL = new Set(['sequence', 'choice', 'all', 'complexContent', 'simpleContent', 'extension', 'restriction', 'group']);

function collectFields(container: XmlElement, fields: SchemaField[]): void {
  for (const child of elementChildren(container)) {
    if (child.local === 'element' || child.local === 'attribute') {
      const name = attr(child, 'name') ?? attr(child, 'ref');
      if (!name) continue;
      fields.push({
        name: child.local === 'attribute' ? `@${name}` : name,
        type: attr(child, 'type'),
        minOccurs: child.local === 'attribute' ? (attr(child, 'use') === 'required' ? '1' : '0') : attr(child, 'minOccurs'),
        maxOccurs: attr(child, 'maxOccurs'),
      });
    } else if (CONTENT_MODEL.has(child.local)) {
      collectFields(child, fields);
    }
  }
}

function findBase(complexType: XmlElement): string | undefined {
  for (const content of ['complexContent', 'simpleContent']) {
    const model = firstChild(complexType, content);
    if (!model) continue;
    const derivation = firstChild(model, 'extension') ?? firstChild(model, 'restriction');
    if (derivation) return attr(derivation, 'base');
  }
  return undefined;
}

function describeComplexType(complexType: XmlElement): { base?: string; fields: SchemaField[] } {
  const fields: SchemaField[] = [];
  collectFields(complexType, fields);
  return { base: findBase(complexType), fields };
}

/**
 * Extract the named types of one <xsd:schema> element.
 */
export function parseSchemaElement(schema: XmlElement, sourceFile: string): SchemaType[] {
  const namespace = attr(schema, 'targetNamespace');
  const types: SchemaType[] = [];

  for (const child of elementChildren(schema)) {
    const name = attr(child, 'name');
    if (!name) continue;

    if (child.local === 'element') {
      const inline = firstChild(child, 'complexType');
      const described = inline ? describeComplexType(inline) : { base: undefined, fields: [] };
      types.push({
        name,
        kind: 'element',
        namespace,
        sourceFile,
        type: attr(child, 'type'),
        base: described.base,
        fields: described.fields,
        enumerations: [],
      });
    } else if (child.local === 'complexType') {
      const described = describeComplexType(child);
      types.push({ name, kind: 'complexType', namespace, sourceFile, base: described.base, fields: described.fields, enumerations: [] });
    } else if (child.local === 'simpleType') {
      const restriction = firstChild(child, 'restriction');
      types.push({
        name,
        kind: 'simpleType',
        namespace,
        sourceFile,
        base: restriction ? attr(restriction, 'base') : undefined,
        fields: [],
        enumerations: restriction
          ? childrenNamed(restriction, 'enumeration').map(e => attr(e, 'value') ?? '')
          : [],
      });
    }
  }

  return types;
}

export function parseXsd(source: string, fileName: string): SchemaType[] {
  const document = parseOrFail(source, fileName, 'INVALID_INTERFACE');
  if (document.root.local !== 'schema') {
    throw new AnalysisError('INVALID_INTERFACE', `${fileName}: root element <${document.root.name}> is not an XML schema`, {
      fileName,
      root: document.root.name,
    });
  }
  return parseSchemaElement(document.root, fileName);
}
