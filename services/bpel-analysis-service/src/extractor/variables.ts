/**
 * Variable declarations and data flow (who writes, who reads).
 */

import { XmlElement, attr, childrenNamed, descendants, firstChild, textContent } from '../parser/xml';
import { BpelDocument } from '../parser/bpel';
import { ActivityIndex, declarationOwners, messageEvents, PROCESS_SCOPE_ID } from './activities';
import { insideLiteral } from './expressions';
import { Expression, Variable } from '../types/summary';

const SET_VARIABLE_REGEX = /setVariableData\(\s*['"]([^'"]+)['"]/g;
const GET_VARIABLE_REGEX = /getVariableData\(\s*['"]([^'"]+)['"]/g;

export interface VariableExtraction {
  variables: Variable[];
  /** Names used by activities but declared nowhere, with the activities using them */
  undeclared: Map<string, string[]>;
}

class UsageTracker {
  private readonly writes = new Map<string, Set<string>>();
  private readonly reads = new Map<string, Set<string>>();

  write(name: string | undefined, activityId: string): void {
    if (!name) return;
    const set = this.writes.get(name) ?? new Set<string>();
    set.add(activityId);
    this.writes.set(name, set);
  }

  read(name: string | undefined, activityId: string): void {
    if (!name) return;
    const set = this.reads.get(name) ?? new Set<string>();
    set.add(activityId);
    this.reads.set(name, set);
  }

  writtenBy(name: string): string[] {
    return Array.from(this.writes.get(name) ?? []);
  }

  readBy(name: string): string[] {
    return Array.from(this.reads.get(name) ?? []);
  }

  names(): string[] {
    return Array.from(new Set([...this.writes.keys(), ...this.reads.keys()]));
  }
}

function declaredKind(variable: XmlElement): Pick<Variable, 'kind' | 'messageType' | 'type' | 'element'> {
  const messageType = attr(variable, 'messageType');
  const type = attr(variable, 'type');
  const element = attr(variable, 'element');
  if (messageType) return { kind: 'message', messageType };
  if (element) return { kind: 'element', element };
  return { kind: 'type', type };
}

function ownerOf(element: XmlElement, index: ActivityIndex): string {
  let current = element.parent;
  while (current) {
    const node = index.byElement.get(current);
    if (node) return node.id;
    current = current.parent;
  }
  return PROCESS_SCOPE_ID;
}

export function extractVariables(document: BpelDocument, index: ActivityIndex, expressions: Expression[]): VariableExtraction {
  const declared: Variable[] = [];
  const usage = new UsageTracker();
  const implicit: Array<{ name: string; scope: string; declaredBy: string }> = [];

  for (const owner of declarationOwners(document, index)) {
    const block = firstChild(owner.element, 'variables');
    if (!block) continue;
    for (const variable of childrenNamed(block, 'variable')) {
      declared.push({
        name: attr(variable, 'name') ?? '',
        scope: owner.scopeId,
        ...declaredKind(variable),
        writtenBy: [],
        readBy: [],
      });
    }
  }

  for (const node of index.nodes) {
    const el = node.element;
    switch (node.kind) {
      case 'receive':
        usage.write(attr(el, 'variable'), node.id);
        break;
      case 'reply':
        usage.read(attr(el, 'variable'), node.id);
        break;
      case 'invoke':
        usage.read(attr(el, 'inputVariable'), node.id);
        usage.write(attr(el, 'outputVariable'), node.id);
        break;
      case 'throw':
        usage.read(attr(el, 'faultVariable'), node.id);
        break;
      case 'validate':
        for (const name of (attr(el, 'variables') ?? '').split(/\s+/).filter(Boolean)) usage.read(name, node.id);
        break;
      case 'forEach': {
        const counter = attr(el, 'counterName');
        if (counter) {
          usage.write(counter, node.id);
          implicit.push({ name: counter, scope: node.id, declaredBy: node.id });
        }
        break;
      }
      case 'assign':
        for (const endpoint of descendants(el)) {
          if (insideLiteral(endpoint, el)) continue;
          if (endpoint.local === 'from') usage.read(attr(endpoint, 'variable'), node.id);
          if (endpoint.local === 'to') usage.write(attr(endpoint, 'variable'), node.id);
        }
        break;
      case 'exec': {
        const code = textContent(el);
        for (const m of code.matchAll(GET_VARIABLE_REGEX)) usage.read(m[1], node.id);
        for (const m of code.matchAll(SET_VARIABLE_REGEX)) usage.write(m[1], node.id);
        break;
      }
    }
  }

  for (const event of messageEvents(document, index)) {
    const name = attr(event.element, 'variable');
    usage.write(name, event.ownerId);
    if (name && event.kind === 'onEvent') {
      implicit.push({ name, scope: event.ownerId, declaredBy: event.ownerId });
    }
  }

  for (const handlerBlock of [document.process, ...index.nodes.map(n => n.element)]) {
    const handlers = firstChild(handlerBlock, 'faultHandlers');
    if (!handlers) continue;
    for (const c of childrenNamed(handlers, 'catch')) {
      const name = attr(c, 'faultVariable');
      if (!name) continue;
      const owner = ownerOf(handlers, index);
      usage.write(name, owner);
      implicit.push({ name, scope: owner, declaredBy: owner });
    }
  }

  for (const expression of expressions) {
    for (const name of expression.variables) {
      if (expression.role === 'to') {
        usage.write(name, expression.activityId);
      } else {
        usage.read(name, expression.activityId);
      }
    }
  }

  const declaredNames = new Set(declared.map(v => v.name));
  for (const candidate of implicit) {
    if (declaredNames.has(candidate.name)) continue;
    declaredNames.add(candidate.name);
    declared.push({ name: candidate.name, scope: candidate.scope, kind: 'implicit', declaredBy: candidate.declaredBy, writtenBy: [], readBy: [] });
  }

  const variables = declared.map(v => ({
    ...v,
    writtenBy: usage.writtenBy(v.name),
    readBy: usage.readBy(v.name),
  }));

  const undeclared = new Map<string, string[]>();
  for (const name of usage.names()) {
    if (declaredNames.has(name)) continue;
    undeclared.set(name, Array.from(new Set([...usage.writtenBy(name), ...usage.readBy(name)])));
  }

  return { variables, undeclared };
}
