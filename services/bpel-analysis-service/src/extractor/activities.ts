/**
 * Activity Walker
 *
 * Walks the process depth-first and assigns every activity a stable path id.
 * All other extractors work from the resulting index instead of walking the
 * tree themselves, so ids and contexts agree across the summary.
 */

import { XmlElement, attr, elementChildren, firstChild, textContent } from '../parser/xml';
import { BpelDocument } from '../parser/bpel';
import { Activity, ActivityContext } from '../types/summary';

export const PROCESS_SCOPE_ID = 'process';

export const ACTIVITY_KINDS = new Set([
  'receive',
  'reply',
  'invoke',
  'assign',
  'throw',
  'rethrow',
  'exit',
  'terminate',
  'wait',
  'empty',
  'sequence',
  'if',
  'switch',
  'while',
  'repeatUntil',
  'forEach',
  'pick',
  'flow',
  'scope',
  'compensate',
  'compensateScope',
  'validate',
  'extensionActivity',
]);

// Vendor activities recognised regardless of namespace (Oracle Java embedding)
const VENDOR_ACTIVITY_KINDS = new Set(['exec']);

// Elements that never contain activities, or whose content must not be read as such
const OPAQUE_ELEMENTS = new Set([
  'literal',
  'partnerLinks',
  'variables',
  'correlationSets',
  'correlations',
  'documentation',
  'import',
  'extensions',
  'messageExchanges',
  'from',
  'to',
  'query',
  'condition',
  'targets',
  'sources',
  'links',
]);

const HANDLER_CONTEXTS: Record<string, ActivityContext> = {
  faultHandlers: 'faultHandler',
  compensationHandler: 'compensationHandler',
  terminationHandler: 'terminationHandler',
  eventHandlers: 'eventHandler',
};

export interface ActivityNode {
  id: string;
  kind: string;
  name?: string;
  element: XmlElement;
  parent?: ActivityNode;
  depth: number;
  context: ActivityContext;
  /** Nearest enclosing scope activity id, or 'process' */
  scopeId: string;
  /** Scopes whose fault handlers catch faults raised here, outermost first */
  faultScopes: string[];
}

export interface ActivityIndex {
  nodes: ActivityNode[];
  byElement: Map<XmlElement, ActivityNode>;
  byId: Map<string, ActivityNode>;
}

interface WalkState {
  parent?: ActivityNode;
  context: ActivityContext;
  scopeId: string;
  faultScopes: string[];
  /** Fault scopes that apply inside this level's fault/compensation/termination handlers */
  handlerFaultScopes: string[];
}

export function isActivityElement(element: XmlElement, processNamespace: string): boolean {
  if (VENDOR_ACTIVITY_KINDS.has(element.local)) return true;
  return element.namespace === processNamespace && ACTIVITY_KINDS.has(element.local);
}

export function activityLabel(node: { kind: string; name?: string }): string {
  return node.name ?? node.kind;
}

export function walkActivities(document: BpelDocument): ActivityIndex {
  const index: ActivityIndex = { nodes: [], byElement: new Map(), byId: new Map() };
  const processNamespace = document.process.namespace;
  const unnamedCounters = new Map<string, Map<string, number>>();

  const makeId = (parent: ActivityNode | undefined, kind: string, name: string | undefined): string => {
    const parentKey = parent?.id ?? '';
    let segment: string;
    if (name) {
      segment = `${kind}:${name}`;
    } else {
      const counters = unnamedCounters.get(parentKey) ?? new Map<string, number>();
      const next = (counters.get(kind) ?? 0) + 1;
      counters.set(kind, next);
      unnamedCounters.set(parentKey, counters);
      segment = `${kind}[${next}]`;
    }
    const base = parent ? `${parent.id}/${segment}` : segment;
    let id = base;
    let duplicate = 1;
    while (index.byId.has(id)) {
      duplicate++;
      id = `${base}#${duplicate}`;
    }
    return id;
  };

  const walk = (element: XmlElement, state: WalkState): void => {
    for (const child of elementChildren(element)) {
      if (isActivityElement(child, processNamespace)) {
        const name = attr(child, 'name');
        const node: ActivityNode = {
          id: makeId(state.parent, child.local, name),
          kind: child.local,
          name,
          element: child,
          parent: state.parent,
          depth: state.parent ? state.parent.depth + 1 : 0,
          context: state.context,
          scopeId: state.scopeId,
          faultScopes: state.faultScopes,
        };
        index.nodes.push(node);
        index.byElement.set(child, node);
        index.byId.set(node.id, node);

        const isScope = child.local === 'scope';
        walk(child, {
          parent: node,
          context: state.context,
          scopeId: isScope ? node.id : state.scopeId,
          faultScopes: isScope ? [...state.faultScopes, node.id] : state.faultScopes,
          handlerFaultScopes: isScope ? state.faultScopes : state.handlerFaultScopes,
        });
        continue;
      }

      if (OPAQUE_ELEMENTS.has(child.local)) continue;

      const handlerContext = HANDLER_CONTEXTS[child.local];
      if (handlerContext) {
        walk(child, {
          ...state,
          context: handlerContext,
          faultScopes: handlerContext === 'eventHandler' ? state.faultScopes : state.handlerFaultScopes,
        });
      } else {
        walk(child, state);
      }
    }
  };

  walk(document.process, {
    context: 'main',
    scopeId: PROCESS_SCOPE_ID,
    faultScopes: [PROCESS_SCOPE_ID],
    handlerFaultScopes: [],
  });

  return index;
}

export function documentationOf(element: XmlElement): string | undefined {
  const doc = firstChild(element, 'documentation');
  const text = doc ? textContent(doc).trim() : '';
  return text.length > 0 ? text : undefined;
}

export function toActivity(node: ActivityNode): Activity {
  const el = node.element;
  const createInstance = attr(el, 'createInstance');
  return {
    id: node.id,
    kind: node.kind,
    name: node.name,
    parentId: node.parent?.id,
    depth: node.depth,
    context: node.context,
    line: el.line,
    partnerLink: attr(el, 'partnerLink'),
    operation: attr(el, 'operation'),
    inputVariable: attr(el, 'inputVariable'),
    outputVariable: attr(el, 'outputVariable'),
    variable: attr(el, 'variable'),
    createInstance: createInstance === undefined ? undefined : createInstance === 'yes',
    documentation: documentationOf(el),
  };
}

export interface MessageEvent {
  /** Activity (pick or scope) that owns the handler, or 'process' */
  ownerId: string;
  element: XmlElement;
  kind: 'onMessage' | 'onEvent';
}

/**
 * onMessage branches of picks plus onMessage/onEvent event handlers of scopes
 * and the process. These receive messages without being activities.
 */
export function messageEvents(document: BpelDocument, index: ActivityIndex): MessageEvent[] {
  const events: MessageEvent[] = [];
  const collectHandlers = (ownerId: string, owner: XmlElement) => {
    const handlers = firstChild(owner, 'eventHandlers');
    if (!handlers) return;
    for (const child of elementChildren(handlers)) {
      if (child.local === 'onMessage' || child.local === 'onEvent') {
        events.push({ ownerId, element: child, kind: child.local });
      }
    }
  };

  collectHandlers(PROCESS_SCOPE_ID, document.process);
  for (const node of index.nodes) {
    if (node.kind === 'pick') {
      for (const child of elementChildren(node.element)) {
        if (child.local === 'onMessage') events.push({ ownerId: node.id, element: child, kind: 'onMessage' });
      }
    } else if (node.kind === 'scope') {
      collectHandlers(node.id, node.element);
    }
  }
  return events;
}

/** First activity directly inside a container element (branch, handler, loop body) */
export function firstActivityIn(container: XmlElement, index: ActivityIndex): ActivityNode | undefined {
  for (const child of elementChildren(container)) {
    const node = index.byElement.get(child);
    if (node) return node;
  }
  return undefined;
}

/** Scope-level declarations: the process plus every scope activity */
export function declarationOwners(document: BpelDocument, index: ActivityIndex): Array<{ scopeId: string; element: XmlElement }> {
  return [
    { scopeId: PROCESS_SCOPE_ID, element: document.process },
    ...index.nodes.filter(n => n.kind === 'scope').map(n => ({ scopeId: n.id, element: n.element })),
  ];
}
