/**
 * Fault handling, compensation and correlation.
 */

import { QName, XmlElement, attr, childrenNamed, elementChildren, firstChild, resolveQName, sameQName } from '../parser/xml';
import { BpelDocument } from '../parser/bpel';
import { ActivityIndex, firstActivityIn, messageEvents, PROCESS_SCOPE_ID, declarationOwners } from './activities';
import { Compensations, Correlations, Faults } from '../types/summary';

type FaultHandler = Faults['handlers'][number];

/** What a handler catches, with fault names resolved where each catch declares them */
interface CatchMatcher {
  catchAll: boolean;
  faults: QName[];
}

function handlerOwners(document: BpelDocument, index: ActivityIndex): Array<{ scopeId: string; element: XmlElement }> {
  // Scopes and the process, plus invokes carrying inline catch blocks (BPEL 2.0 shorthand)
  return [
    { scopeId: PROCESS_SCOPE_ID, element: document.process },
    ...index.nodes
      .filter(n => n.kind === 'scope' || n.kind === 'invoke')
      .map(n => ({ scopeId: n.id, element: n.element })),
  ];
}

function readHandler(scopeId: string, container: XmlElement, index: ActivityIndex): FaultHandler | undefined {
  const catches = childrenNamed(container, 'catch');
  const catchAll = firstChild(container, 'catchAll');
  if (catches.length === 0 && !catchAll) return undefined;
  return {
    scopeId,
    catches: catches.map(c => ({
      faultName: attr(c, 'faultName'),
      faultVariable: attr(c, 'faultVariable'),
      faultMessageType: attr(c, 'faultMessageType'),
      faultElement: attr(c, 'faultElement'),
      activityId: firstActivityIn(c, index)?.id,
    })),
    catchAll: catchAll !== undefined,
    catchAllActivityId: catchAll ? firstActivityIn(catchAll, index)?.id : undefined,
  };
}

function catchMatcher(container: XmlElement): CatchMatcher {
  return {
    catchAll: firstChild(container, 'catchAll') !== undefined,
    faults: childrenNamed(container, 'catch').flatMap(c => {
      const faultName = attr(c, 'faultName');
      return faultName ? [resolveQName(c, faultName)] : [];
    }),
  };
}

function catches(matcher: CatchMatcher, fault: QName): boolean {
  return matcher.catchAll || matcher.faults.some(f => sameQName(f, fault));
}

export function extractFaults(document: BpelDocument, index: ActivityIndex, declared: Faults['declared']): Faults {
  const handlers: FaultHandler[] = [];
  const matchers = new Map<string, CatchMatcher>();
  for (const owner of handlerOwners(document, index)) {
    const block = firstChild(owner.element, 'faultHandlers');
    // BPEL 2.0 invoke shorthand places catch/catchAll directly on the invoke
    const container = block ?? (owner.element.local === 'invoke' ? owner.element : undefined);
    if (!container) continue;
    const handler = readHandler(owner.scopeId, container, index);
    if (handler) {
      handlers.push(handler);
      matchers.set(owner.scopeId, catchMatcher(container));
    }
  }

  const thrown: Faults['thrown'] = [];
  const rethrows: string[] = [];
  for (const node of index.nodes) {
    if (node.kind === 'rethrow') {
      rethrows.push(node.id);
    } else if (node.kind === 'throw') {
      const faultName = attr(node.element, 'faultName') ?? '';
      const fault = resolveQName(node.element, faultName);
      const caughtBy = [...node.faultScopes].reverse().find(scopeId => {
        const matcher = matchers.get(scopeId);
        return matcher !== undefined && catches(matcher, fault);
      });
      thrown.push({ activityId: node.id, faultName, faultVariable: attr(node.element, 'faultVariable'), caughtBy });
    }
  }

  return { handlers, thrown, rethrows, declared };
}

export function extractCompensations(document: BpelDocument, index: ActivityIndex): Compensations {
  const handlers: Compensations['handlers'] = [];
  for (const owner of declarationOwners(document, index)) {
    const block = firstChild(owner.element, 'compensationHandler');
    if (block) handlers.push({ scopeId: owner.scopeId, activityId: firstActivityIn(block, index)?.id });
  }

  const invocations: Compensations['invocations'] = [];
  for (const node of index.nodes) {
    if (node.kind !== 'compensate' && node.kind !== 'compensateScope') continue;
    // BPEL 1.1 <compensate scope="..."/>, BPEL 2.0 <compensateScope target="..."/>
    const target = attr(node.element, 'target') ?? attr(node.element, 'scope');
    const resolved = target ? index.nodes.find(n => n.kind === 'scope' && n.name === target) : undefined;
    invocations.push({ activityId: node.id, kind: node.kind, target, resolvedScopeId: resolved?.id });
  }

  return { handlers, invocations };
}

function readInitiate(value: string | undefined): Correlations['usages'][number]['initiate'] {
  if (value === 'yes' || value === 'join') return value;
  return 'no';
}

export function extractCorrelations(document: BpelDocument, index: ActivityIndex): Correlations {
  const sets: Correlations['sets'] = [];
  for (const owner of declarationOwners(document, index)) {
    const block = firstChild(owner.element, 'correlationSets');
    if (!block) continue;
    for (const set of childrenNamed(block, 'correlationSet')) {
      sets.push({
        name: attr(set, 'name') ?? '',
        scope: owner.scopeId,
        properties: (attr(set, 'properties') ?? '').split(/\s+/).filter(Boolean),
      });
    }
  }

  const usages: Correlations['usages'] = [];
  const readUsages = (activityId: string, element: XmlElement) => {
    const block = firstChild(element, 'correlations');
    if (!block) return;
    for (const correlation of elementChildren(block)) {
      if (correlation.local !== 'correlation') continue;
      usages.push({
        activityId,
        set: attr(correlation, 'set') ?? '',
        initiate: readInitiate(attr(correlation, 'initiate')),
        pattern: attr(correlation, 'pattern'),
      });
    }
  };

  for (const node of index.nodes) readUsages(node.id, node.element);
  for (const event of messageEvents(document, index)) readUsages(event.ownerId, event.element);

  return { sets, usages };
}
