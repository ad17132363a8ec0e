/**
 * Expression Collection
 *
 * Every XPath, duration and deadline expression is captured verbatim (entity
 * decoded, outer whitespace removed) together with the variables and prefixed
 * functions it references. BPEL 2.0 writes expressions as element content,
 * BPEL 1.1 as attributes; `readExpression` accepts both.
 */

import { XmlElement, attr, childrenNamed, descendants, elementChildren, firstChild, textContent } from '../parser/xml';
import { BpelDocument } from '../parser/bpel';
import { ActivityIndex, ActivityNode, PROCESS_SCOPE_ID } from './activities';
import { Expression, ExpressionRole } from '../types/summary';
import { unique } from '../../../../shared/utils';

export interface ExpressionText {
  text: string;
  language?: string;
}

const DOLLAR_VARIABLE_REGEX = /\$([A-Za-z_][\w-]*)/g;
const GET_VARIABLE_REGEX = /(?:getVariableData|getVariableProperty)\(\s*['"]([^'"]+)['"]/g;
const PREFIXED_FUNCTION_REGEX = /(?<![\w:.-])([A-Za-z_][\w.-]*):([A-Za-z_][\w.-]*)\s*\(/g;

// Prefixes Oracle SOA tooling binds by default
const ORACLE_FUNCTION_PREFIXES = new Set(['ora', 'orcl', 'xp20', 'oraext', 'xdk', 'ids', 'hwf', 'dvm', 'xref', 'bpelx', 'med', 'bpm']);

/**
 * Read an expression from a child element (BPEL 2.0) or an attribute (BPEL 1.1).
 * Returns undefined when neither is present or the text is blank.
 */
export function readExpression(container: XmlElement, local: string, attributeName: string = local): ExpressionText | undefined {
  const child = firstChild(container, local);
  if (child) {
    const text = textContent(child).trim();
    if (text.length === 0) return undefined;
    return { text, language: attr(child, 'expressionLanguage') ?? attr(child, 'queryLanguage') };
  }
  return readAttributeExpression(container, attributeName);
}

export function readAttributeExpression(container: XmlElement, attributeName: string): ExpressionText | undefined {
  const value = attr(container, attributeName);
  if (value === undefined || value.trim().length === 0) return undefined;
  return { text: value.trim() };
}

export function referencedVariables(text: string): string[] {
  const names: string[] = [];
  for (const m of text.matchAll(DOLLAR_VARIABLE_REGEX)) names.push(m[1]);
  for (const m of text.matchAll(GET_VARIABLE_REGEX)) names.push(m[1]);
  return unique(names);
}

export function calledFunctions(text: string): string[] {
  return unique(Array.from(text.matchAll(PREFIXED_FUNCTION_REGEX), m => `${m[1]}:${m[2]}`));
}

/**
 * A function is vendor specific when its prefix is bound to an Oracle
 * namespace, or is one of the prefixes Oracle tooling binds by default.
 */
export function isVendorFunction(qualifiedName: string, namespaces: Record<string, string>): boolean {
  const prefix = qualifiedName.slice(0, qualifiedName.indexOf(':'));
  const uri = namespaces[prefix];
  if (uri !== undefined) return /oracle\.com/i.test(uri);
  return ORACLE_FUNCTION_PREFIXES.has(prefix);
}

/** True when the element sits inside a <literal> below `stop` */
export function insideLiteral(element: XmlElement, stop: XmlElement): boolean {
  for (let current = element.parent; current && current !== stop; current = current.parent) {
    if (current.local === 'literal') return true;
  }
  return false;
}

class ExpressionCollector {
  readonly expressions: Expression[] = [];

  add(activityId: string, role: ExpressionRole, expression: ExpressionText | undefined): void {
    if (!expression) return;
    this.expressions.push({
      activityId,
      role,
      text: expression.text,
      language: expression.language,
      variables: referencedVariables(expression.text),
      functions: calledFunctions(expression.text),
    });
  }

  addTimer(activityId: string, container: XmlElement): void {
    this.add(activityId, 'duration', readExpression(container, 'for'));
    this.add(activityId, 'deadline', readExpression(container, 'until'));
    this.add(activityId, 'repeatEvery', readExpression(container, 'repeatEvery'));
  }

  addCopyEndpoint(activityId: string, endpoint: XmlElement, role: 'from' | 'to'): void {
    this.add(activityId, 'query', readExpression(endpoint, 'query'));
    // BPEL 1.1 <from expression="..."/>
    this.add(activityId, role, readAttributeExpression(endpoint, 'expression'));

    const structured = ['variable', 'partnerLink', 'property', 'expression'].some(a => attr(endpoint, a) !== undefined);
    if (structured || firstChild(endpoint, 'literal')) return;
    // BPEL 2.0 expression variant: the element content is the expression
    const inline = elementChildren(endpoint).length === 0 ? textContent(endpoint).trim() : '';
    if (inline.length > 0) {
      this.add(activityId, role, { text: inline, language: attr(endpoint, 'expressionLanguage') });
    }
  }

  addLinks(node: ActivityNode): void {
    const el = node.element;
    const sources = firstChild(el, 'sources');
    const sourceElements = sources ? childrenNamed(sources, 'source') : childrenNamed(el, 'source');
    for (const source of sourceElements) {
      this.add(node.id, 'transition', readExpression(source, 'transitionCondition'));
    }
    const targets = firstChild(el, 'targets');
    if (targets) {
      this.add(node.id, 'join', readExpression(targets, 'joinCondition'));
    } else {
      this.add(node.id, 'join', readAttributeExpression(el, 'joinCondition'));
    }
  }

  addEventHandlerAlarms(ownerId: string, owner: XmlElement): void {
    const handlers = firstChild(owner, 'eventHandlers');
    if (!handlers) return;
    for (const alarm of childrenNamed(handlers, 'onAlarm')) {
      this.addTimer(ownerId, alarm);
    }
  }
}

export function collectExpressions(document: BpelDocument, index: ActivityIndex): Expression[] {
  const collector = new ExpressionCollector();
  collector.addEventHandlerAlarms(PROCESS_SCOPE_ID, document.process);

  for (const node of index.nodes) {
    const el = node.element;

    switch (node.kind) {
      case 'if':
        collector.add(node.id, 'condition', readExpression(el, 'condition'));
        for (const branch of childrenNamed(el, 'elseif')) {
          collector.add(node.id, 'condition', readExpression(branch, 'condition'));
        }
        break;
      case 'switch':
        for (const branch of childrenNamed(el, 'case')) {
          collector.add(node.id, 'condition', readExpression(branch, 'condition'));
        }
        break;
      case 'while':
      case 'repeatUntil':
        collector.add(node.id, 'condition', readExpression(el, 'condition'));
        break;
      case 'forEach': {
        collector.add(node.id, 'startCounter', readExpression(el, 'startCounterValue'));
        collector.add(node.id, 'finalCounter', readExpression(el, 'finalCounterValue'));
        const completion = firstChild(el, 'completionCondition');
        if (completion) collector.add(node.id, 'completion', readExpression(completion, 'branches'));
        break;
      }
      case 'wait':
        collector.addTimer(node.id, el);
        break;
      case 'pick':
        for (const alarm of childrenNamed(el, 'onAlarm')) collector.addTimer(node.id, alarm);
        break;
      case 'scope':
        collector.addEventHandlerAlarms(node.id, el);
        break;
      case 'assign':
        for (const endpoint of descendants(el)) {
          if ((endpoint.local === 'from' || endpoint.local === 'to') && !insideLiteral(endpoint, el)) {
            collector.addCopyEndpoint(node.id, endpoint, endpoint.local);
          }
        }
        break;
    }

    collector.addLinks(node);
  }

  return collector.expressions;
}
