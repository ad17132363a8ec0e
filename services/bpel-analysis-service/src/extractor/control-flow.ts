/**
 * Decisions, loops, parallel flows and timers.
 */

import { XmlElement, attr, childrenNamed, elementChildren, firstChild } from '../parser/xml';
import { BpelDocument } from '../parser/bpel';
import { ActivityIndex, firstActivityIn, PROCESS_SCOPE_ID } from './activities';
import { readExpression } from './expressions';
import { Concurrency, Decision, Loop, Timer } from '../types/summary';

type Branch = Decision['branches'][number];

function alarmTrigger(alarm: XmlElement): string | undefined {
  const duration = readExpression(alarm, 'for');
  if (duration) return `for ${duration.text}`;
  const deadline = readExpression(alarm, 'until');
  return deadline ? `until ${deadline.text}` : undefined;
}

export function extractDecisions(index: ActivityIndex): Decision[] {
  const decisions: Decision[] = [];

  for (const node of index.nodes) {
    const el = node.element;
    const branches: Branch[] = [];

    if (node.kind === 'if') {
      branches.push({ label: 'if', condition: readExpression(el, 'condition')?.text, activityId: firstActivityIn(el, index)?.id });
      for (const child of elementChildren(el)) {
        if (child.local === 'elseif') {
          branches.push({ label: 'elseif', condition: readExpression(child, 'condition')?.text, activityId: firstActivityIn(child, index)?.id });
        } else if (child.local === 'else') {
          branches.push({ label: 'else', activityId: firstActivityIn(child, index)?.id });
        }
      }
      decisions.push({ activityId: node.id, kind: 'if', branches, hasDefault: branches.some(b => b.label === 'else') });
    } else if (node.kind === 'switch') {
      for (const child of elementChildren(el)) {
        if (child.local === 'case') {
          branches.push({ label: 'case', condition: readExpression(child, 'condition')?.text, activityId: firstActivityIn(child, index)?.id });
        } else if (child.local === 'otherwise') {
          branches.push({ label: 'otherwise', activityId: firstActivityIn(child, index)?.id });
        }
      }
      decisions.push({ activityId: node.id, kind: 'switch', branches, hasDefault: branches.some(b => b.label === 'otherwise') });
    } else if (node.kind === 'pick') {
      for (const child of elementChildren(el)) {
        if (child.local === 'onMessage') {
          branches.push({
            label: 'onMessage',
            trigger: `${attr(child, 'partnerLink') ?? '?'}.${attr(child, 'operation') ?? '?'}`,
            activityId: firstActivityIn(child, index)?.id,
          });
        } else if (child.local === 'onAlarm') {
          branches.push({ label: 'onAlarm', trigger: alarmTrigger(child), activityId: firstActivityIn(child, index)?.id });
        }
      }
      decisions.push({ activityId: node.id, kind: 'pick', branches, hasDefault: branches.some(b => b.label === 'onAlarm') });
    }
  }

  return decisions;
}

export function extractLoops(index: ActivityIndex): Loop[] {
  const loops: Loop[] = [];
  for (const node of index.nodes) {
    const el = node.element;
    if (node.kind === 'while' || node.kind === 'repeatUntil') {
      loops.push({
        activityId: node.id,
        kind: node.kind,
        condition: readExpression(el, 'condition')?.text,
        parallel: false,
        bodyActivityId: firstActivityIn(el, index)?.id,
      });
    } else if (node.kind === 'forEach') {
      const completion = firstChild(el, 'completionCondition');
      loops.push({
        activityId: node.id,
        kind: 'forEach',
        counterName: attr(el, 'counterName'),
        startCounter: readExpression(el, 'startCounterValue')?.text,
        finalCounter: readExpression(el, 'finalCounterValue')?.text,
        completionCondition: completion ? readExpression(completion, 'branches')?.text : undefined,
        parallel: attr(el, 'parallel') === 'yes',
        bodyActivityId: firstActivityIn(el, index)?.id,
      });
    }
  }
  return loops;
}

export function extractConcurrency(index: ActivityIndex): Concurrency[] {
  const result: Concurrency[] = [];

  // link name → source/target activity ids, wherever they sit inside the flow
  const linkEnds = new Map<string, { source?: string; target?: string; transitionCondition?: string }>();
  for (const node of index.nodes) {
    const el = node.element;
    const sources = firstChild(el, 'sources');
    for (const source of sources ? childrenNamed(sources, 'source') : childrenNamed(el, 'source')) {
      const name = attr(source, 'linkName');
      if (!name) continue;
      const end = linkEnds.get(name) ?? {};
      end.source = node.id;
      end.transitionCondition = readExpression(source, 'transitionCondition')?.text;
      linkEnds.set(name, end);
    }
    const targets = firstChild(el, 'targets');
    for (const target of targets ? childrenNamed(targets, 'target') : childrenNamed(el, 'target')) {
      const name = attr(target, 'linkName');
      if (!name) continue;
      const end = linkEnds.get(name) ?? {};
      end.target = node.id;
      linkEnds.set(name, end);
    }
  }

  for (const node of index.nodes) {
    if (node.kind === 'flow') {
      const linksBlock = firstChild(node.element, 'links');
      const links = (linksBlock ? childrenNamed(linksBlock, 'link') : []).map(link => {
        const name = attr(link, 'name') ?? '';
        return { name, ...linkEnds.get(name) };
      });
      const branches = elementChildren(node.element)
        .map(child => index.byElement.get(child)?.id)
        .filter((id): id is string => id !== undefined);
      result.push({ activityId: node.id, kind: 'flow', branches, links });
    } else if (node.kind === 'forEach' && attr(node.element, 'parallel') === 'yes') {
      const body = firstActivityIn(node.element, index);
      result.push({ activityId: node.id, kind: 'forEach', branches: body ? [body.id] : [], links: [] });
    }
  }

  return result;
}

export function extractTimers(document: BpelDocument, index: ActivityIndex): Timer[] {
  const timers: Timer[] = [];
  const addTimer = (activityId: string, kind: Timer['kind'], container: XmlElement) => {
    timers.push({
      activityId,
      kind,
      duration: readExpression(container, 'for')?.text,
      deadline: readExpression(container, 'until')?.text,
      repeatEvery: readExpression(container, 'repeatEvery')?.text,
    });
  };
  const addEventAlarms = (ownerId: string, owner: XmlElement) => {
    const handlers = firstChild(owner, 'eventHandlers');
    if (handlers) childrenNamed(handlers, 'onAlarm').forEach(alarm => addTimer(ownerId, 'onAlarm', alarm));
  };

  addEventAlarms(PROCESS_SCOPE_ID, document.process);
  for (const node of index.nodes) {
    if (node.kind === 'wait') {
      addTimer(node.id, 'wait', node.element);
    } else if (node.kind === 'pick') {
      childrenNamed(node.element, 'onAlarm').forEach(alarm => addTimer(node.id, 'onAlarm', alarm));
    } else if (node.kind === 'scope') {
      addEventAlarms(node.id, node.element);
    }
  }
  return timers;
}
