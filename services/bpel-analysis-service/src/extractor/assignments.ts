/**
 * Data mappings of assign activities. Endpoints are kept exactly as written so
 * the PRD can reproduce every copy rule without interpretation.
 */

import { XmlElement, attr, elementChildren, firstChild, innerXml, textContent } from '../parser/xml';
import { BpelDocument } from '../parser/bpel';
import { ActivityIndex } from './activities';
import { readExpression } from './expressions';
import { Assignment, CopyEndpoint } from '../types/summary';

function readEndpoint(document: BpelDocument, endpoint: XmlElement): CopyEndpoint {
  const literal = firstChild(endpoint, 'literal');
  const reference = attr(endpoint, 'endpointReference');
  const result: CopyEndpoint = {
    variable: attr(endpoint, 'variable'),
    part: attr(endpoint, 'part'),
    query: readExpression(endpoint, 'query')?.text,
    partnerLink: attr(endpoint, 'partnerLink'),
    endpointReference: reference,
    property: attr(endpoint, 'property'),
    literal: literal ? innerXml(document.xml, literal).trim() : undefined,
    expression: attr(endpoint, 'expression')?.trim(),
  };

  if (!result.expression && !result.variable && !result.partnerLink && !result.property && !literal) {
    const inline = elementChildren(endpoint).length === 0 ? textContent(endpoint).trim() : '';
    if (inline.length > 0) result.expression = inline;
  }

  return result;
}

function readOperation(document: BpelDocument, operation: XmlElement): Assignment['operations'][number] {
  const from = firstChild(operation, 'from');
  const to = firstChild(operation, 'to');
  return {
    kind: operation.prefix ? `${operation.prefix}:${operation.local}` : operation.local,
    from: from ? readEndpoint(document, from) : undefined,
    to: to ? readEndpoint(document, to) : undefined,
  };
}

export function extractAssignments(document: BpelDocument, index: ActivityIndex): Assignment[] {
  const assignments: Assignment[] = [];

  for (const node of index.nodes) {
    if (node.kind !== 'assign') continue;
    const operations: Assignment['operations'] = [];

    for (const child of elementChildren(node.element)) {
      if (child.local === 'documentation' || child.local === 'targets' || child.local === 'sources') continue;
      if (child.local === 'extensionAssignOperation') {
        // BPEL 2.0 wraps vendor operations (bpelx:append, bpelx:remove, ...)
        for (const vendorOperation of elementChildren(child)) operations.push(readOperation(document, vendorOperation));
      } else {
        operations.push(readOperation(document, child));
      }
    }

    assignments.push({ activityId: node.id, operations });
  }

  return assignments;
}
