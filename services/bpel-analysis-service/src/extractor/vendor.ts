/**
 * Oracle SOA specifics: human workflow steps and vendor extensions.
 *
 * Oracle generates a scope per human task, with an invoke of the task
 * service's initiateTask operation and a receive of onTaskCompleted inside it.
 * The scope usually carries attributes from the workflow extension namespace.
 */

import { XmlElement, attr, descendants, elementChildren, textContent } from '../parser/xml';
import { BpelDocument } from '../parser/bpel';
import { ActivityIndex, ActivityNode, activityLabel } from './activities';
import { Extension, HumanTask } from '../types/summary';

const TASK_OPERATIONS = new Set(['initiateTask', 'onTaskCompleted', 'onTaskAssigned', 'onTaskUpdated']);
const VENDOR_ASSIGN_OPERATIONS = new Set(['append', 'insertAfter', 'insertBefore', 'remove', 'copyList', 'rename']);

function workflowAttribute(element: XmlElement, local: string): string | undefined {
  for (const [name, value] of Object.entries(element.attributes)) {
    const colon = name.indexOf(':');
    if (colon === -1 || name.startsWith('xmlns')) continue;
    const uri = element.namespaces[name.slice(0, colon)] ?? '';
    if (/workflow/i.test(uri) && name.slice(colon + 1) === local) return value;
  }
  return undefined;
}

function hasWorkflowAttributes(element: XmlElement): boolean {
  return Object.keys(element.attributes).some(name => {
    const colon = name.indexOf(':');
    if (colon === -1 || name.startsWith('xmlns')) return false;
    return /workflow/i.test(element.namespaces[name.slice(0, colon)] ?? '');
  });
}

function taskOwner(node: ActivityNode): ActivityNode {
  let current: ActivityNode | undefined = node;
  while (current) {
    if (current.kind === 'scope') return current;
    current = current.parent;
  }
  return node;
}

export function extractHumanTasks(index: ActivityIndex): HumanTask[] {
  const tasks = new Map<string, HumanTask>();
  const signal = (node: ActivityNode, description: string) => {
    const owner = taskOwner(node);
    const task = tasks.get(owner.id) ?? {
      activityId: owner.id,
      name: activityLabel(owner),
      taskKey: workflowAttribute(owner.element, 'key'),
      signals: [],
    };
    if (!task.signals.includes(description)) task.signals.push(description);
    tasks.set(owner.id, task);
  };

  for (const node of index.nodes) {
    const el = node.element;
    if (node.kind === 'scope' && hasWorkflowAttributes(el)) {
      signal(node, 'scope carries workflow extension attributes');
    }
    const operation = attr(el, 'operation');
    if ((node.kind === 'invoke' || node.kind === 'receive') && operation && TASK_OPERATIONS.has(operation)) {
      signal(node, `${node.kind} ${operation}`);
    }
    const partnerLink = attr(el, 'partnerLink');
    if (partnerLink && /taskservice/i.test(partnerLink)) {
      signal(node, `uses partner link ${partnerLink}`);
    }
  }

  return Array.from(tasks.values());
}

export function extractExtensions(document: BpelDocument, index: ActivityIndex): Extension[] {
  const processNamespace = document.process.namespace;
  const extensions: Extension[] = [];

  for (const node of index.nodes) {
    const el = node.element;

    if (node.kind === 'exec') {
      extensions.push({
        activityId: node.id,
        kind: 'java-embedding',
        element: el.name,
        language: attr(el, 'language'),
        code: textContent(el).trim(),
      });
      continue;
    }

    if (node.kind === 'extensionActivity') {
      for (const child of elementChildren(el)) {
        if (index.byElement.has(child)) continue; // reported as its own activity
        extensions.push({ activityId: node.id, kind: 'extension-activity', element: child.name });
      }
      continue;
    }

    if (node.kind === 'assign') {
      for (const operation of descendants(el)) {
        if (/oracle\.com/i.test(operation.namespace) && VENDOR_ASSIGN_OPERATIONS.has(operation.local)) {
          extensions.push({ activityId: node.id, kind: 'vendor-assign-operation', element: operation.name });
        }
      }
    }

    for (const child of elementChildren(el)) {
      if (child.namespace === processNamespace || index.byElement.has(child)) continue;
      if (/oracle\.com/i.test(child.namespace)) {
        if (node.kind === 'assign' && VENDOR_ASSIGN_OPERATIONS.has(child.local)) continue;
        extensions.push({ activityId: node.id, kind: 'vendor-element', element: child.name });
      }
    }
  }

  return extensions;
}
