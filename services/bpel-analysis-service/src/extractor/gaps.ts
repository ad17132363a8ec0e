/**
 * Gap Detection
 *
 * Turns structural findings into "gaps and assumptions" rows: something the
 * BPEL does not answer that an implementer has to ask about. Rules run in a
 * fixed order and each walks the summary in document order, so the numbering
 * is stable for a given input.
 */

import { activityLabel, PROCESS_SCOPE_ID } from './activities';
import { isVendorFunction } from './expressions';
import { BpelSummary, Gap, GapCategory, RiskLevel } from '../types/summary';

export type GapInput = Omit<BpelSummary, 'gaps' | 'statistics'>;

export interface GapContext {
  summary: GapInput;
  /** Variable name → activities that use it without a declaration */
  undeclaredVariables: Map<string, string[]>;
  /** Whether any WSDL was supplied; resolution gaps only make sense then */
  interfacesSupplied: boolean;
  /** File names supplied alongside the process (for import checks) */
  suppliedFiles: string[];
}

type GapDraft = Omit<Gap, 'id'>;
type GapRule = (context: GapContext) => GapDraft[];

function gap(
  category: GapCategory,
  risk: RiskLevel,
  description: string,
  question: string,
  proposedDefault: string,
  validation: string,
  relatedTo: string[] = []
): GapDraft {
  return { category, risk, description, question, proposedDefault, validation, relatedTo };
}

function label(summary: GapInput, activityId: string): string {
  if (activityId === PROCESS_SCOPE_ID) return 'process';
  const activity = summary.activities.find(a => a.id === activityId);
  return activity ? `${activity.kind} "${activityLabel(activity)}"` : activityId;
}

function baseName(path: string): string {
  const parts = path.split(/[\\/]/);
  return parts[parts.length - 1] ?? path;
}

// ============================================================================
// Rules
// ============================================================================

const missingWsdl: GapRule = ({ summary, interfacesSupplied }) => {
  if (interfacesSupplied || summary.partnerLinks.length === 0) return [];
  return [gap(
    'interface',
    'medium',
    `No WSDL was supplied for ${summary.partnerLinks.length} partner link(s); operation signatures and message structures are unknown.`,
    'Where are the WSDL contracts for the partner services?',
    'Derive request/response payloads from the variables bound to each operation.',
    'Obtain the WSDL files and re-run the analysis.',
    summary.partnerLinks.map(p => p.name)
  )];
};

const unresolvedPartnerLinkTypes: GapRule = ({ summary, interfacesSupplied }) => {
  if (!interfacesSupplied) return [];
  return summary.partnerLinks
    .filter(p => p.partnerLinkType !== undefined && !p.resolved)
    .map(p => gap(
      'interface',
      'medium',
      `Partner link type ${p.partnerLinkType} of partner link "${p.name}" is not defined in the supplied WSDLs.`,
      `Which WSDL defines ${p.partnerLinkType}?`,
      'Treat the partner as an opaque service addressed by the operations used.',
      'Locate the defining WSDL and confirm the role port types.',
      [p.name]
    ));
};

const unknownOperations: GapRule = ({ summary }) =>
  summary.partnerLinks.flatMap(p =>
    p.operations
      .filter(o => o.inPortType === false)
      .map(o => gap(
        'interface',
        'high',
        `Operation "${o.operation}" used on partner link "${p.name}" is not declared on its port type.`,
        `Is "${o.operation}" a renamed or removed operation of ${p.partnerRolePortType ?? p.myRolePortType ?? 'the port type'}?`,
        'Keep the operation name as used in the process.',
        'Compare the process with the current service contract.',
        [p.name, ...o.invokedBy, ...o.receivedBy, ...o.repliedBy]
      ))
  );

const missingImports: GapRule = ({ summary, suppliedFiles }) => {
  const supplied = new Set(suppliedFiles.map(baseName));
  return summary.process.imports
    .filter(i => i.location !== undefined && !supplied.has(baseName(i.location)))
    .map(i => gap(
      'interface',
      'low',
      `Imported ${i.importType ?? 'document'} ${i.location} was not supplied.`,
      `Can ${i.location} be provided?`,
      'Assume the import only declares types already referenced by name.',
      'Supply the imported file and re-run the analysis.',
      [i.location ?? '']
    ));
};

const undeclaredVariables: GapRule = ({ summary, undeclaredVariables }) =>
  Array.from(undeclaredVariables.entries()).map(([name, users]) => gap(
    'data',
    'high',
    `Variable "${name}" is used by ${users.map(u => label(summary, u)).join(', ')} but never declared.`,
    `What is the type of "${name}", and is the reference a typo?`,
    'Treat it as an untyped local variable.',
    'Check the process in the designer for validation errors.',
    users
  ));

const readNeverWritten: GapRule = ({ summary }) =>
  summary.variables
    .filter(v => v.readBy.length > 0 && v.writtenBy.length === 0)
    .map(v => gap(
      'data',
      'medium',
      `Variable "${v.name}" is read but never written; reading it raises uninitializedVariable unless it is set elsewhere.`,
      `Where does "${v.name}" get its value?`,
      'Initialise it with an empty instance of its declared type.',
      'Trace the variable through the runtime audit trail.',
      [v.name, ...v.readBy]
    ));

const unusedVariables: GapRule = ({ summary }) =>
  summary.variables
    .filter(v => v.kind !== 'implicit' && v.readBy.length === 0 && v.writtenBy.length === 0)
    .map(v => gap(
      'data',
      'low',
      `Variable "${v.name}" is declared but never used.`,
      `Can "${v.name}" be dropped?`,
      'Omit it from the target data model.',
      'Confirm with the process owner.',
      [v.name]
    ));

const receiveWithoutReply: GapRule = ({ summary }) =>
  summary.partnerLinks
    .filter(p => p.myRole !== undefined)
    .flatMap(p => p.operations
      .filter(o => o.style === 'asynchronous')
      .map(o => gap(
        'interface',
        'medium',
        `Operation "${o.operation}" on partner link "${p.name}" is received but never replied to.`,
        `Is "${o.operation}" one-way, or does the caller expect a response (possibly via callback)?`,
        p.partnerRole ? 'Treat it as asynchronous with a callback on the partner role.' : 'Treat it as one-way.',
        'Check the operation for an <output> in the WSDL.',
        [p.name, ...o.receivedBy]
      )));

const uncaughtFaults: GapRule = ({ summary }) =>
  summary.faults.thrown
    .filter(t => t.caughtBy === undefined)
    .map(t => gap(
      'error-handling',
      'medium',
      `Fault ${t.faultName || '(unnamed)'} thrown by ${label(summary, t.activityId)} is not caught by any enclosing handler.`,
      'Should this fault terminate the instance and be returned to the caller?',
      'Propagate it to the caller as a service fault.',
      'Exercise the fault path in a test instance.',
      [t.activityId]
    ));

const noProcessCatchAll: GapRule = ({ summary }) => {
  const processHandler = summary.faults.handlers.find(h => h.scopeId === PROCESS_SCOPE_ID);
  if (processHandler?.catchAll) return [];
  return [gap(
    'error-handling',
    'medium',
    'The process has no process-level catchAll; unexpected faults end the instance with the default fault behaviour.',
    'What should happen to an instance that hits an unexpected fault?',
    'Log the fault, return a generic error to the caller and end the instance.',
    'Agree the error contract with consumers.',
    [PROCESS_SCOPE_ID]
  )];
};

const compensation: GapRule = ({ summary }) => [
  ...summary.compensations.handlers.map(h => gap(
    'transaction',
    'medium',
    `${label(summary, h.scopeId)} defines a compensation handler.`,
    'Which transactional boundary (saga step, distributed transaction) replaces the compensation semantics?',
    'Implement the handler as an explicit undo step invoked on failure of later steps.',
    'Walk through a failure after the scope completes.',
    [h.scopeId]
  )),
  ...summary.compensations.invocations
    .filter(c => c.target !== undefined && c.resolvedScopeId === undefined)
    .map(c => gap(
      'transaction',
      'high',
      `${label(summary, c.activityId)} compensates "${c.target}", which names no scope in the process.`,
      `Which scope is "${c.target}" meant to be?`,
      'Ignore the compensation call.',
      'Fix the target in the source process.',
      [c.activityId]
    )),
];

const correlation: GapRule = ({ summary }) => {
  const { sets, usages } = summary.correlations;
  const gaps: GapDraft[] = [];
  for (const set of sets) {
    const uses = usages.filter(u => u.set === set.name);
    if (uses.length === 0) {
      gaps.push(gap(
        'correlation',
        'low',
        `Correlation set "${set.name}" is declared but never used.`,
        `Can "${set.name}" be dropped?`,
        'Omit it.',
        'Confirm with the process owner.',
        [set.name]
      ));
    } else if (!uses.some(u => u.initiate !== 'no')) {
      gaps.push(gap(
        'correlation',
        'medium',
        `Correlation set "${set.name}" is used but never initiated.`,
        `Which message initiates "${set.name}" (properties: ${set.properties.join(', ') || 'none'})?`,
        'Initiate it on the first activity that uses it.',
        'Run an instance that receives a correlated message.',
        [set.name, ...uses.map(u => u.activityId)]
      ));
    }
  }
  return gaps;
};

const humanTasks: GapRule = ({ summary }) =>
  summary.humanTasks.map(t => gap(
    'human-task',
    'medium',
    `Human task "${t.name}"${t.taskKey ? ` (${t.taskKey})` : ''}: assignment, escalation and outcome rules live in the task definition, not the process.`,
    'Who is assigned, what are the outcomes, and when does the task escalate or expire?',
    'Single assignee group with APPROVE/REJECT outcomes and no expiry.',
    'Review the .task definition with the business owner.',
    [t.activityId]
  ));

const concurrency: GapRule = ({ summary }) =>
  summary.concurrency.map(c => gap(
    'concurrency',
    'low',
    c.kind === 'forEach'
      ? `${label(summary, c.activityId)} runs its body in parallel for each counter value.`
      : `${label(summary, c.activityId)} runs ${c.branches.length} branch(es) in parallel.`,
    'Do the branches share data or external resources that need ordering?',
    'Run branches concurrently and join before continuing.',
    'Check for shared variables written by more than one branch.',
    [c.activityId]
  ));

const missingDefaultBranch: GapRule = ({ summary }) =>
  summary.decisions
    .filter(d => d.kind !== 'pick' && !d.hasDefault)
    .map(d => gap(
      'logic',
      'low',
      `${label(summary, d.activityId)} has no ${d.kind === 'if' ? 'else' : 'otherwise'} branch.`,
      'Is doing nothing the intended outcome when no condition matches?',
      'Continue without action.',
      'Test with input that matches none of the conditions.',
      [d.activityId]
    ));

const absoluteDeadlines: GapRule = ({ summary }) =>
  summary.timers
    .filter(t => t.deadline !== undefined)
    .map(t => gap(
      'timing',
      'low',
      `${label(summary, t.activityId)} waits until an absolute deadline (${t.deadline}).`,
      'Which time zone and calendar apply to the deadline?',
      'Evaluate deadlines in UTC.',
      'Run an instance across the deadline.',
      [t.activityId]
    ));

const vendorFunctions: GapRule = ({ summary }) => {
  const usage = new Map<string, string[]>();
  for (const expression of summary.expressions) {
    for (const fn of expression.functions) {
      if (!isVendorFunction(fn, summary.process.namespaces)) continue;
      const users = usage.get(fn) ?? [];
      if (!users.includes(expression.activityId)) users.push(expression.activityId);
      usage.set(fn, users);
    }
  }
  return Array.from(usage.entries()).map(([fn, users]) => gap(
    'expression',
    'medium',
    `Vendor XPath function ${fn}() is used by ${users.length} activity(ies).`,
    `What is the exact behaviour of ${fn}() that the target platform must reproduce?`,
    'Replace it with an equivalent utility function.',
    'Compare outputs of the original and the replacement on sample data.',
    users
  ));
};

const vendorExtensions: GapRule = ({ summary }) =>
  summary.extensions.map(e => e.kind === 'java-embedding'
    ? gap(
      'extension',
      'high',
      `${label(summary, e.activityId)} embeds ${e.language ?? 'Java'} code that the process model does not describe.`,
      'What business logic does the embedded code implement, and which classes does it depend on?',
      'Port the code as a service method with the same variable reads and writes.',
      'Review the embedded code with its author.',
      [e.activityId]
    )
    : gap(
      'extension',
      'medium',
      `${label(summary, e.activityId)} uses vendor extension ${e.element}.`,
      `What does ${e.element} do here, and is there a standard equivalent?`,
      'Re-express it with standard data mapping.',
      'Check vendor documentation for the element.',
      [e.activityId]
    ));

const missingDocumentation: GapRule = ({ summary }) => {
  if (summary.process.documentation) return [];
  return [gap(
    'documentation',
    'low',
    'The process carries no documentation describing its business purpose.',
    'What business capability does this process implement, and who owns it?',
    'Describe the purpose from the operations it exposes.',
    'Confirm with the process owner.',
    [PROCESS_SCOPE_ID]
  )];
};

export const GAP_RULES: GapRule[] = [
  missingWsdl,
  unresolvedPartnerLinkTypes,
  unknownOperations,
  missingImports,
  undeclaredVariables,
  readNeverWritten,
  unusedVariables,
  receiveWithoutReply,
  uncaughtFaults,
  noProcessCatchAll,
  compensation,
  correlation,
  humanTasks,
  concurrency,
  missingDefaultBranch,
  absoluteDeadlines,
  vendorFunctions,
  vendorExtensions,
  missingDocumentation,
];

export function formatGapId(sequence: number): string {
  return `GAP-${String(sequence).padStart(3, '0')}`;
}

export function detectGaps(context: GapContext): Gap[] {
  return GAP_RULES
    .flatMap(rule => rule(context))
    .map((draft, i) => ({ id: formatGapId(i + 1), ...draft }));
}
