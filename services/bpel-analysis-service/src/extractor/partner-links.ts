/**
 * Partner links, the operations the process uses on them, and their
 * resolution against supplied WSDL partner link types and port types.
 */

import { QName, attr, childrenNamed, firstChild, localPart, resolveQName, sameQName } from '../parser/xml';
import { BpelDocument } from '../parser/bpel';
import { ActivityIndex, declarationOwners, messageEvents } from './activities';
import { Faults, Interfaces, PartnerLink, PartnerLinkOperation, WsdlOperation } from '../types/summary';

interface OperationUsage {
  invokedBy: string[];
  receivedBy: string[];
  repliedBy: string[];
  synchronousInvoke: boolean;
}

export interface PartnerLinkExtraction {
  partnerLinks: PartnerLink[];
  declaredFaults: Faults['declared'];
}

function direction(myRole?: string, partnerRole?: string): PartnerLink['direction'] {
  if (myRole && partnerRole) return 'bidirectional';
  if (myRole) return 'inbound';
  if (partnerRole) return 'outbound';
  return 'unknown';
}

function operationStyle(usage: OperationUsage, linkInvokes: boolean): PartnerLinkOperation['style'] {
  if (usage.invokedBy.length > 0) return usage.synchronousInvoke ? 'synchronous' : 'one-way';
  if (usage.repliedBy.length > 0) return 'synchronous';
  return linkInvokes ? 'callback' : 'asynchronous';
}

type Role = Interfaces['partnerLinkTypes'][number]['roles'][number];

// WSDL definitions without a targetNamespace declare names in no namespace
const definedName = (definition: { name: string; namespace?: string }): QName => ({
  namespace: definition.namespace ?? '',
  local: definition.name,
});

function findPortTypeOperations(interfaces: Interfaces, role: Role | undefined): WsdlOperation[] | undefined {
  if (!role?.portType) return undefined;
  const wanted: QName = { namespace: role.portTypeNamespace ?? '', local: localPart(role.portType) };
  return interfaces.portTypes.find(p => sameQName(definedName(p), wanted))?.operations;
}

export function extractPartnerLinks(document: BpelDocument, index: ActivityIndex, interfaces: Interfaces): PartnerLinkExtraction {
  const usages = new Map<string, Map<string, OperationUsage>>();
  const use = (partnerLink: string | undefined, operation: string | undefined): OperationUsage | undefined => {
    if (!partnerLink || !operation) return undefined;
    const ops = usages.get(partnerLink) ?? new Map<string, OperationUsage>();
    usages.set(partnerLink, ops);
    const existing = ops.get(operation);
    if (existing) return existing;
    const created: OperationUsage = { invokedBy: [], receivedBy: [], repliedBy: [], synchronousInvoke: false };
    ops.set(operation, created);
    return created;
  };

  for (const node of index.nodes) {
    const el = node.element;
    const usage = use(attr(el, 'partnerLink'), attr(el, 'operation'));
    if (!usage) continue;
    if (node.kind === 'invoke') {
      usage.invokedBy.push(node.id);
      if (attr(el, 'outputVariable') || firstChild(el, 'fromParts')) usage.synchronousInvoke = true;
    } else if (node.kind === 'receive') {
      usage.receivedBy.push(node.id);
    } else if (node.kind === 'reply') {
      usage.repliedBy.push(node.id);
    }
  }
  for (const event of messageEvents(document, index)) {
    use(attr(event.element, 'partnerLink'), attr(event.element, 'operation'))?.receivedBy.push(event.ownerId);
  }

  const partnerLinks: PartnerLink[] = [];
  const declaredFaults: Faults['declared'] = [];

  for (const owner of declarationOwners(document, index)) {
    const block = firstChild(owner.element, 'partnerLinks');
    if (!block) continue;

    for (const declaration of childrenNamed(block, 'partnerLink')) {
      const name = attr(declaration, 'name') ?? '';
      const partnerLinkType = attr(declaration, 'partnerLinkType');
      const myRole = attr(declaration, 'myRole');
      const partnerRole = attr(declaration, 'partnerRole');

      const pltName = partnerLinkType ? resolveQName(declaration, partnerLinkType) : undefined;
      const plt = pltName ? interfaces.partnerLinkTypes.find(t => sameQName(definedName(t), pltName)) : undefined;
      const roleOf = (role: string | undefined) => (role ? plt?.roles.find(r => r.name === role) : undefined);
      const myRoleDefinition = roleOf(myRole);
      const partnerRoleDefinition = roleOf(partnerRole);
      const myRolePortType = myRoleDefinition?.portType;
      const partnerRolePortType = partnerRoleDefinition?.portType;
      const myRoleOperations = findPortTypeOperations(interfaces, myRoleDefinition);
      const partnerRoleOperations = findPortTypeOperations(interfaces, partnerRoleDefinition);

      const ops = usages.get(name) ?? new Map<string, OperationUsage>();
      const linkInvokes = Array.from(ops.values()).some(u => u.invokedBy.length > 0);

      const operations: PartnerLinkOperation[] = Array.from(ops.entries()).map(([operation, usage]) => {
        const candidates = usage.invokedBy.length > 0 ? partnerRoleOperations : myRoleOperations;
        const wsdlOperation = candidates?.find(o => o.name === operation);
        if (wsdlOperation && usage.invokedBy.length > 0) {
          for (const fault of wsdlOperation.faults) {
            declaredFaults.push({ partnerLink: name, operation, faultName: fault.name, message: fault.message });
          }
        }
        return {
          operation,
          style: operationStyle(usage, linkInvokes),
          invokedBy: usage.invokedBy,
          receivedBy: usage.receivedBy,
          repliedBy: usage.repliedBy,
          inPortType: candidates ? wsdlOperation !== undefined : undefined,
        };
      });

      partnerLinks.push({
        name,
        scope: owner.scopeId,
        partnerLinkType,
        myRole,
        partnerRole,
        direction: direction(myRole, partnerRole),
        myRolePortType,
        partnerRolePortType,
        resolved: plt !== undefined,
        operations,
      });
    }
  }

  return { partnerLinks, declaredFaults };
}
