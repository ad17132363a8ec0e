/**
 * WSDL 1.1 interface extraction
 *
 * Reads what the requirements document needs to describe a partner: partner
 * link types and their roles, port type operations, messages, service
 * endpoints and any schema embedded under <types>.
 */

import { XmlElement, attr, childrenNamed, elementChildren, firstChild, resolveQName } from '../parser/xml';
import { parseOrFail } from '../parser/bpel';
import { parseSchemaElement } from './xsd';
import { AnalysisError } from '../errors';
import { Interfaces } from '../types/summary';

export type WsdlDefinitions = Interfaces;

export function emptyInterfaces(): Interfaces {
  return { partnerLinkTypes: [], portTypes: [], messages: [], services: [], schemaTypes: [] };
}

type Role = Interfaces['partnerLinkTypes'][number]['roles'][number];

function parseRole(role: XmlElement): Role {
  // BPEL 2.0 puts portType on the role, BPEL 1.1 nests <plnk:portType name="..."/>
  const nested = firstChild(role, 'portType');
  const direct = attr(role, 'portType');
  const declaredOn = direct !== undefined ? role : nested;
  const portType = direct ?? (nested ? attr(nested, 'name') : undefined);
  return {
    name: attr(role, 'name') ?? '',
    portType,
    portTypeNamespace: portType !== undefined && declaredOn ? resolveQName(declaredOn, portType).namespace : undefined,
  };
}

export function parseWsdl(source: string, fileName: string): WsdlDefinitions {
  const document = parseOrFail(source, fileName, 'INVALID_INTERFACE');
  const definitions = document.root;
  if (definitions.local !== 'definitions') {
    throw new AnalysisError('INVALID_INTERFACE', `${fileName}: root element <${definitions.name}> is not a WSDL <definitions>`, {
      fileName,
      root: definitions.name,
    });
  }

  const namespace = attr(definitions, 'targetNamespace');
  const result = emptyInterfaces();

  for (const child of elementChildren(definitions)) {
    const name = attr(child, 'name') ?? '';

    switch (child.local) {
      case 'partnerLinkType':
        result.partnerLinkTypes.push({
          name,
          namespace,
          sourceFile: fileName,
          roles: childrenNamed(child, 'role').map(parseRole),
        });
        break;

      case 'portType':
        result.portTypes.push({
          name,
          namespace,
          sourceFile: fileName,
          operations: childrenNamed(child, 'operation').map(op => {
            const input = firstChild(op, 'input');
            const output = firstChild(op, 'output');
            return {
              name: attr(op, 'name') ?? '',
              input: input ? attr(input, 'message') : undefined,
              output: output ? attr(output, 'message') : undefined,
              faults: childrenNamed(op, 'fault').map(f => ({ name: attr(f, 'name') ?? '', message: attr(f, 'message') })),
            };
          }),
        });
        break;

      case 'message':
        result.messages.push({
          name,
          namespace,
          sourceFile: fileName,
          parts: childrenNamed(child, 'part').map(p => ({
            name: attr(p, 'name') ?? '',
            element: attr(p, 'element'),
            type: attr(p, 'type'),
          })),
        });
        break;

      case 'service':
        result.services.push({
          name,
          sourceFile: fileName,
          ports: childrenNamed(child, 'port').map(port => {
            const address = firstChild(port, 'address');
            return {
              name: attr(port, 'name') ?? '',
              binding: attr(port, 'binding'),
              address: address ? attr(address, 'location') : undefined,
            };
          }),
        });
        break;

      case 'types':
        for (const schema of childrenNamed(child, 'schema')) {
          result.schemaTypes.push(...parseSchemaElement(schema, fileName));
        }
        break;
    }
  }

  return result;
}

export function mergeInterfaces(parts: Interfaces[]): Interfaces {
  const merged = emptyInterfaces();
  for (const part of parts) {
    merged.partnerLinkTypes.push(...part.partnerLinkTypes);
    merged.portTypes.push(...part.portTypes);
    merged.messages.push(...part.messages);
    merged.services.push(...part.services);
    merged.schemaTypes.push(...part.schemaTypes);
  }
  return merged;
}
