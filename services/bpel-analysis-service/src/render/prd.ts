/**
 * PRD Renderer
 *
 * Turns a `BpelSummary` into the markdown requirements document. Rendering is
 * deterministic: the same summary always yields the same text. Every
 * expression is printed verbatim in a fenced block; expressions no section
 * claims end up in an appendix so none is dropped.
 */

import { Activity, ActivityContext, BpelSummary, CopyEndpoint, Expression, ExpressionRole } from '../types/summary';
import { BusinessOverview } from '../prompts/business-overview';
import { PROCESS_SCOPE_ID } from '../extractor/activities';
import { cell, fence, inlineCode, list, table } from './markdown';
import { checkCompleteness, CompletenessReport, PRD_SECTIONS } from './completeness';

export interface PrdOptions {
  /** Model-drafted overview; rendered in its own section marked unverified */
  aiOverview?: BusinessOverview;
}

const CONTEXT_LABELS: Record<ActivityContext, string> = {
  main: 'main flow',
  faultHandler: 'fault handler',
  compensationHandler: 'compensation handler',
  terminationHandler: 'termination handler',
  eventHandler: 'event handler',
};

const [
  OVERVIEW,
  INTERFACES,
  DATA_MODEL,
  PROCESS_FLOW,
  BUSINESS_RULES,
  LOOPS,
  DATA_MAPPINGS,
  ERROR_HANDLING,
  COMPENSATION,
  CORRELATION,
  HUMAN_TASKS,
  TIMERS,
  CONCURRENCY,
  VENDOR_EXTENSIONS,
  GAPS,
] = PRD_SECTIONS;

// ============================================================================
// Writer
// ============================================================================

function expressionKey(activityId: string, role: ExpressionRole, text: string): string {
  return `${activityId}\u0000${role}\u0000${text}`;
}

class PrdWriter {
  private readonly blocks: string[] = [];
  private readonly emitted = new Set<string>();
  private readonly activities: Map<string, Activity>;

  constructor(readonly summary: BpelSummary) {
    this.activities = new Map(summary.activities.map(a => [a.id, a]));
  }

  push(...blocks: string[]): void {
    this.blocks.push(...blocks);
  }

  none(text: string): void {
    this.blocks.push(`_${text}_`);
  }

  ref(id: string | undefined): string {
    if (id === undefined) return '-';
    if (id === PROCESS_SCOPE_ID) return 'process';
    const activity = this.activities.get(id);
    if (!activity) return id;
    return activity.name ? `${activity.kind} "${activity.name}"` : `${activity.kind} (line ${activity.line})`;
  }

  refs(ids: string[]): string {
    return ids.length > 0 ? ids.map(id => this.ref(id)).join(', ') : '-';
  }

  expression(activityId: string, role: ExpressionRole, text: string | undefined, label: string): void {
    if (text === undefined) return;
    this.emitted.add(expressionKey(activityId, role, text));
    this.blocks.push(`${label}:`, fence(text, 'xpath'));
  }

  unclaimedExpressions(): Expression[] {
    return this.summary.expressions.filter(e => !this.emitted.has(expressionKey(e.activityId, e.role, e.text)));
  }

  toString(): string {
    return this.blocks.join('\n\n');
  }
}

// ============================================================================
// Sections
// ============================================================================

function renderHeader(w: PrdWriter): void {
  const { process, source } = w.summary;
  const version = `${process.bpelVersion}${process.abstract ? ' (abstract)' : ' (executable)'}`;
  w.push(
    `# PRD: ${process.name}`,
    table(['Field', 'Value'], [
      ['Source file', cell(source.fileName)],
      ['BPEL version', version],
      ['Target namespace', cell(process.targetNamespace)],
      ['Query language', cell(process.queryLanguage)],
      ['Expression language', cell(process.expressionLanguage)],
      ['WSDL files', cell(source.wsdlFiles.join(', '))],
      ['XSD files', cell(source.xsdFiles.join(', '))],
      ['SHA-256', inlineCode(source.sha256)],
      ['Analyzed at', source.analyzedAt],
    ])
  );
}

function renderOverview(w: PrdWriter): void {
  const { process, activities, statistics } = w.summary;
  w.push(OVERVIEW);
  if (process.documentation) {
    w.push(process.documentation);
  } else {
    w.none('The process carries no documentation.');
  }

  const starters = activities.filter(a => a.createInstance);
  if (starters.length > 0) {
    w.push(
      'Instances are created by:',
      list(starters.map(a => `${w.ref(a.id)}${a.operation ? ` on ${inlineCode(`${a.partnerLink ?? '?'}.${a.operation}`)}` : ''}`))
    );
  }

  w.push(
    `The process has ${statistics.totalActivities} activities, ${statistics.variables} variables and ` +
      `${statistics.partnerLinks} partner links. Analysis raised ${statistics.gapsByRisk.high} high, ` +
      `${statistics.gapsByRisk.medium} medium and ${statistics.gapsByRisk.low} low risk gaps.`
  );
  if (process.suppressJoinFailure) {
    w.push('Join failures are suppressed for the whole process (`suppressJoinFailure="yes"`).');
  }
}

function renderAiOverview(w: PrdWriter, overview: BusinessOverview): void {
  w.push(
    '## AI-Drafted Overview (unverified)',
    '> Drafted by a language model from the extracted summary. Verify every statement against the BPEL source.',
    overview.overview,
    `**Business purpose:** ${overview.businessPurpose}`
  );
  if (overview.openQuestions.length > 0) {
    w.push('**Open questions:**', list(overview.openQuestions));
  }
}

function renderInterfaces(w: PrdWriter): void {
  const { partnerLinks, interfaces, process } = w.summary;
  w.push(INTERFACES);

  if (partnerLinks.length === 0) {
    w.none('No partner links declared.');
  } else {
    w.push(
      table(
        ['Partner link', 'Scope', 'Direction', 'Partner link type', 'My role', 'Partner role', 'Resolved'],
        partnerLinks.map(p => [
          inlineCode(p.name),
          w.ref(p.scope),
          p.direction,
          cell(p.partnerLinkType),
          cell(p.myRole && p.myRolePortType ? `${p.myRole} (${p.myRolePortType})` : p.myRole),
          cell(p.partnerRole && p.partnerRolePortType ? `${p.partnerRole} (${p.partnerRolePortType})` : p.partnerRole),
          p.resolved ? 'yes' : 'no',
        ])
      )
    );
  }

  for (const link of partnerLinks.filter(p => p.operations.length > 0)) {
    w.push(
      `### Operations on ${inlineCode(link.name)}`,
      table(
        ['Operation', 'Style', 'Invoked by', 'Received by', 'Replied by', 'In port type'],
        link.operations.map(o => [
          inlineCode(o.operation),
          o.style,
          cell(w.refs(o.invokedBy)),
          cell(w.refs(o.receivedBy)),
          cell(w.refs(o.repliedBy)),
          o.inPortType === undefined ? 'unknown' : o.inPortType ? 'yes' : 'no',
        ])
      )
    );
  }

  if (interfaces.portTypes.length > 0) {
    w.push(
      '### Port types',
      table(
        ['Port type', 'Operation', 'Input', 'Output', 'Faults'],
        interfaces.portTypes.flatMap(pt =>
          pt.operations.map(op => [
            inlineCode(pt.name),
            inlineCode(op.name),
            cell(op.input),
            cell(op.output),
            cell(op.faults.map(f => f.name).join(', ')),
          ])
        )
      )
    );
  }

  if (interfaces.services.length > 0) {
    w.push(
      '### Service endpoints',
      table(
        ['Service', 'Port', 'Binding', 'Address'],
        interfaces.services.flatMap(s => s.ports.map(p => [inlineCode(s.name), cell(p.name), cell(p.binding), cell(p.address)]))
      )
    );
  }

  if (process.imports.length > 0) {
    w.push(
      '### Imports',
      table(
        ['Namespace', 'Location', 'Import type'],
        process.imports.map(i => [cell(i.namespace), cell(i.location), cell(i.importType)])
      )
    );
  }
}

function renderDataModel(w: PrdWriter): void {
  const { variables, interfaces } = w.summary;
  w.push(DATA_MODEL);

  if (variables.length === 0) {
    w.none('No variables declared.');
  } else {
    w.push(
      table(
        ['Variable', 'Scope', 'Kind', 'Type', 'Written by', 'Read by'],
        variables.map(v => [
          inlineCode(v.name),
          w.ref(v.scope),
          v.kind,
          cell(v.messageType ?? v.type ?? v.element),
          cell(w.refs(v.writtenBy)),
          cell(w.refs(v.readBy)),
        ])
      )
    );
  }

  if (interfaces.messages.length > 0) {
    w.push(
      '### Messages',
      table(
        ['Message', 'Part', 'Element / type'],
        interfaces.messages.flatMap(m =>
          m.parts.length > 0
            ? m.parts.map(p => [inlineCode(m.name), cell(p.name), cell(p.element ?? p.type)])
            : [[inlineCode(m.name), '-', '-']]
        )
      )
    );
  }

  for (const type of interfaces.schemaTypes) {
    const heading = `### ${inlineCode(type.name)} (${type.kind}${type.base ? `, restricts ${type.base}` : ''}${type.type ? `, of type ${type.type}` : ''})`;
    w.push(heading);
    if (type.fields.length > 0) {
      w.push(
        table(
          ['Field', 'Type', 'Min', 'Max'],
          type.fields.map(f => [inlineCode(f.name), cell(f.type), cell(f.minOccurs), cell(f.maxOccurs)])
        )
      );
    }
    if (type.enumerations.length > 0) {
      w.push(`Allowed values: ${type.enumerations.map(inlineCode).join(', ')}`);
    }
  }
}

function activityLine(w: PrdWriter, activity: Activity): string {
  const details: string[] = [];
  if (activity.partnerLink || activity.operation) {
    details.push(`${activity.partnerLink ?? '?'}.${activity.operation ?? '?'}`);
  }
  if (activity.inputVariable) details.push(`in: ${activity.inputVariable}`);
  if (activity.outputVariable) details.push(`out: ${activity.outputVariable}`);
  if (activity.variable) details.push(`variable: ${activity.variable}`);
  if (activity.createInstance) details.push('creates instance');
  if (activity.context !== 'main') details.push(CONTEXT_LABELS[activity.context]);
  details.push(`line ${activity.line}`);

  const indent = '  '.repeat(activity.depth);
  const doc = activity.documentation ? ` - ${activity.documentation.replace(/\s+/g, ' ')}` : '';
  return `${indent}- **${activity.kind}**${activity.name ? ` ${activity.name}` : ''} (${details.join('; ')})${doc}`;
}

function renderProcessFlow(w: PrdWriter): void {
  w.push(PROCESS_FLOW);
  if (w.summary.activities.length === 0) {
    w.none('The process contains no activities.');
    return;
  }
  w.push(w.summary.activities.map(a => activityLine(w, a)).join('\n'));
}

function renderDecisions(w: PrdWriter): void {
  w.push(BUSINESS_RULES);
  if (w.summary.decisions.length === 0) {
    w.none('No decisions in this process.');
    return;
  }

  for (const decision of w.summary.decisions) {
    w.push(`### ${w.ref(decision.activityId)} (${decision.kind})`);
    decision.branches.forEach((branch, i) => {
      const trigger = branch.trigger ? ` ${inlineCode(branch.trigger)}` : '';
      w.push(`${i + 1}. **${branch.label}**${trigger} then ${w.ref(branch.activityId)}`);
      w.expression(decision.activityId, 'condition', branch.condition, 'Condition');
    });
    if (!decision.hasDefault) {
      w.push('No default branch.');
    }
  }
}

function renderLoops(w: PrdWriter): void {
  w.push(LOOPS);
  if (w.summary.loops.length === 0) {
    w.none('No loops in this process.');
    return;
  }

  for (const loop of w.summary.loops) {
    const facts = [`Body: ${w.ref(loop.bodyActivityId)}`];
    if (loop.kind === 'forEach') {
      facts.push(`Counter: ${loop.counterName ? inlineCode(loop.counterName) : '-'}`, `Parallel: ${loop.parallel ? 'yes' : 'no'}`);
    }
    w.push(`### ${w.ref(loop.activityId)} (${loop.kind})`, list(facts));
    w.expression(loop.activityId, 'condition', loop.condition, loop.kind === 'while' ? 'Repeat while' : 'Repeat until');
    w.expression(loop.activityId, 'startCounter', loop.startCounter, 'Start counter');
    w.expression(loop.activityId, 'finalCounter', loop.finalCounter, 'Final counter');
    w.expression(loop.activityId, 'completion', loop.completionCondition, 'Completion condition (branches)');
  }
}

function describeEndpoint(endpoint: CopyEndpoint | undefined): string {
  if (!endpoint) return '-';
  const parts: string[] = [];
  if (endpoint.variable) {
    parts.push(inlineCode(endpoint.part ? `${endpoint.variable}.${endpoint.part}` : endpoint.variable));
  }
  if (endpoint.partnerLink) {
    parts.push(`partner link ${inlineCode(endpoint.partnerLink)}${endpoint.endpointReference ? ` (${endpoint.endpointReference})` : ''}`);
  }
  if (endpoint.property) parts.push(`property ${inlineCode(endpoint.property)}`);
  if (endpoint.query) parts.push('with query');
  if (endpoint.expression) parts.push('expression');
  if (endpoint.literal !== undefined) parts.push('literal');
  return parts.length > 0 ? cell(parts.join(' ')) : '-';
}

function renderAssignments(w: PrdWriter): void {
  w.push(DATA_MAPPINGS);
  if (w.summary.assignments.length === 0) {
    w.none('No assign activities.');
    return;
  }

  for (const assignment of w.summary.assignments) {
    w.push(`### ${w.ref(assignment.activityId)}`);
    if (assignment.operations.length === 0) {
      w.none('Empty assign.');
      continue;
    }
    w.push(
      table(
        ['#', 'Operation', 'From', 'To'],
        assignment.operations.map((op, i) => [String(i + 1), op.kind, describeEndpoint(op.from), describeEndpoint(op.to)])
      )
    );
    assignment.operations.forEach((op, i) => {
      const n = i + 1;
      w.expression(assignment.activityId, 'from', op.from?.expression, `${n}. From expression`);
      w.expression(assignment.activityId, 'query', op.from?.query, `${n}. From query`);
      const literal = op.from?.literal;
      if (literal !== undefined) {
        w.push(`${n}. From literal:`, fence(literal, 'xml'));
      }
      w.expression(assignment.activityId, 'to', op.to?.expression, `${n}. To expression`);
      w.expression(assignment.activityId, 'query', op.to?.query, `${n}. To query`);
    });
  }
}

function renderFaults(w: PrdWriter): void {
  const { faults } = w.summary;
  w.push(ERROR_HANDLING);

  if (faults.handlers.length === 0) {
    w.none('No fault handlers declared.');
  } else {
    w.push(
      '### Fault handlers',
      table(
        ['Scope', 'Catches', 'Catch-all'],
        faults.handlers.map(h => [
          w.ref(h.scopeId),
          cell(
            h.catches
              .map(c => {
                const fault = c.faultName ?? c.faultElement ?? c.faultMessageType ?? 'typed fault';
                const variable = c.faultVariable ? ` (variable ${c.faultVariable})` : '';
                return `${fault}${variable} then ${w.ref(c.activityId)}`;
              })
              .join('; ')
          ),
          h.catchAll ? `yes, then ${w.ref(h.catchAllActivityId)}` : 'no',
        ])
      )
    );
  }

  if (faults.thrown.length > 0) {
    w.push(
      '### Thrown faults',
      table(
        ['Activity', 'Fault', 'Fault variable', 'Caught by'],
        faults.thrown.map(t => [w.ref(t.activityId), inlineCode(t.faultName), cell(t.faultVariable), t.caughtBy ? w.ref(t.caughtBy) : '**uncaught**'])
      )
    );
  }

  if (faults.rethrows.length > 0) {
    w.push('### Rethrows', list(faults.rethrows.map(id => w.ref(id))));
  }

  if (faults.declared.length > 0) {
    w.push(
      '### Faults declared by invoked operations',
      table(
        ['Partner link', 'Operation', 'Fault', 'Message'],
        faults.declared.map(d => [inlineCode(d.partnerLink), inlineCode(d.operation), inlineCode(d.faultName), cell(d.message)])
      )
    );
  }
}

function renderCompensation(w: PrdWriter): void {
  const { compensations } = w.summary;
  w.push(COMPENSATION);
  if (compensations.handlers.length === 0 && compensations.invocations.length === 0) {
    w.none('No compensation logic.');
    return;
  }
  if (compensations.handlers.length > 0) {
    w.push(
      table(['Scope', 'Handler runs'], compensations.handlers.map(h => [w.ref(h.scopeId), w.ref(h.activityId)]))
    );
  }
  if (compensations.invocations.length > 0) {
    w.push(
      '### Compensation triggers',
      table(
        ['Activity', 'Kind', 'Target', 'Resolved scope'],
        compensations.invocations.map(c => [w.ref(c.activityId), c.kind, cell(c.target), c.resolvedScopeId ? w.ref(c.resolvedScopeId) : '-'])
      )
    );
  }
}

function renderCorrelation(w: PrdWriter): void {
  const { correlations } = w.summary;
  w.push(CORRELATION);
  if (correlations.sets.length === 0) {
    w.none('No correlation sets.');
  } else {
    w.push(
      table(
        ['Correlation set', 'Scope', 'Properties'],
        correlations.sets.map(s => [inlineCode(s.name), w.ref(s.scope), cell(s.properties.join(', '))])
      )
    );
  }
  if (correlations.usages.length > 0) {
    w.push(
      '### Usage',
      table(
        ['Activity', 'Set', 'Initiate', 'Pattern'],
        correlations.usages.map(u => [w.ref(u.activityId), inlineCode(u.set), u.initiate, cell(u.pattern)])
      )
    );
  }
}

function renderHumanTasks(w: PrdWriter): void {
  w.push(HUMAN_TASKS);
  if (w.summary.humanTasks.length === 0) {
    w.none('No human workflow steps detected.');
    return;
  }
  w.push(
    table(
      ['Task', 'Task key', 'Detected from'],
      w.summary.humanTasks.map(t => [w.ref(t.activityId), cell(t.taskKey), cell(t.signals.join('; '))])
    )
  );
}

function renderTimers(w: PrdWriter): void {
  w.push(TIMERS);
  if (w.summary.timers.length === 0) {
    w.none('No waits or alarms.');
    return;
  }
  for (const timer of w.summary.timers) {
    w.push(`### ${w.ref(timer.activityId)} (${timer.kind})`);
    w.expression(timer.activityId, 'duration', timer.duration, 'Duration');
    w.expression(timer.activityId, 'deadline', timer.deadline, 'Deadline');
    w.expression(timer.activityId, 'repeatEvery', timer.repeatEvery, 'Repeat every');
  }
}

function renderConcurrency(w: PrdWriter): void {
  w.push(CONCURRENCY);
  const joins = w.summary.expressions.filter(e => e.role === 'join');
  if (w.summary.concurrency.length === 0 && joins.length === 0) {
    w.none('No parallel branches.');
    return;
  }

  for (const block of w.summary.concurrency) {
    w.push(`### ${w.ref(block.activityId)} (${block.kind})`, `Parallel branches: ${w.refs(block.branches)}`);
    if (block.links.length > 0) {
      w.push(
        table(
          ['Link', 'Source', 'Target'],
          block.links.map(l => [inlineCode(l.name), w.ref(l.source), w.ref(l.target)])
        )
      );
      for (const link of block.links) {
        if (link.source) {
          w.expression(link.source, 'transition', link.transitionCondition, `Transition condition of ${inlineCode(link.name)}`);
        }
      }
    }
  }

  if (joins.length > 0) {
    w.push('### Join conditions');
    for (const join of joins) w.expression(join.activityId, 'join', join.text, w.ref(join.activityId));
  }
}

function renderExtensions(w: PrdWriter): void {
  w.push(VENDOR_EXTENSIONS);
  const { extensions } = w.summary;
  if (extensions.length === 0) {
    w.none('No vendor extensions.');
    return;
  }
  w.push(
    table(
      ['Activity', 'Kind', 'Element', 'Language'],
      extensions.map(e => [w.ref(e.activityId), e.kind, inlineCode(e.element), cell(e.language)])
    )
  );
  for (const extension of extensions) {
    if (extension.code) {
      w.push(`### Embedded code in ${w.ref(extension.activityId)}`, fence(extension.code, 'java'));
    }
  }
}

function renderGaps(w: PrdWriter): void {
  w.push(GAPS);
  if (w.summary.gaps.length === 0) {
    w.none('No gaps detected.');
    return;
  }
  w.push(
    table(
      ['ID', 'Category', 'Description', 'Question', 'Proposed default', 'Risk', 'Validation'],
      w.summary.gaps.map(g => [g.id, g.category, cell(g.description), cell(g.question), cell(g.proposedDefault), g.risk, cell(g.validation)])
    )
  );
}

function renderUnclaimed(w: PrdWriter): string {
  const remaining = w.unclaimedExpressions();
  if (remaining.length === 0) return '';
  const blocks = ['## Appendix B: Other Expressions'];
  for (const e of remaining) {
    blocks.push(`${w.ref(e.activityId)} (${e.role}):`, fence(e.text, 'xpath'));
  }
  return blocks.join('\n\n');
}

export function renderChecklist(report: CompletenessReport): string {
  const lines = report.checks.map(c => {
    const found = c.total - c.missing.length;
    const missing = c.missing.length > 0 ? ` Missing: ${c.missing.map(inlineCode).join(', ')}` : '';
    return `- [${c.passed ? 'x' : ' '}] ${c.description} (${found}/${c.total})${missing}`;
  });
  return ['## 16. Completeness Checklist', lines.join('\n')].join('\n\n');
}

function renderStatistics(summary: BpelSummary): string {
  const { statistics } = summary;
  const kinds = Object.keys(statistics.activitiesByKind).sort();
  return [
    '## Appendix A: Statistics',
    table(['Activity kind', 'Count'], kinds.map(kind => [kind, String(statistics.activitiesByKind[kind])])),
    list([
      `Activities: ${statistics.totalActivities}`,
      `Variables: ${statistics.variables}`,
      `Partner links: ${statistics.partnerLinks}`,
      `Decisions: ${statistics.decisions}`,
      `Loops: ${statistics.loops}`,
      `Expressions: ${statistics.expressions}`,
      `Gaps: ${statistics.gapsByRisk.high} high, ${statistics.gapsByRisk.medium} medium, ${statistics.gapsByRisk.low} low`,
    ]),
  ].join('\n\n');
}

// ============================================================================
// Entry point
// ============================================================================

export function renderPrd(summary: BpelSummary, options: PrdOptions = {}): string {
  const w = new PrdWriter(summary);

  renderHeader(w);
  renderOverview(w);
  if (options.aiOverview) renderAiOverview(w, options.aiOverview);
  renderInterfaces(w);
  renderDataModel(w);
  renderProcessFlow(w);
  renderDecisions(w);
  renderLoops(w);
  renderAssignments(w);
  renderFaults(w);
  renderCompensation(w);
  renderCorrelation(w);
  renderHumanTasks(w);
  renderTimers(w);
  renderConcurrency(w);
  renderExtensions(w);
  renderGaps(w);

  const body = w.toString();
  const unclaimed = renderUnclaimed(w);
  const report = checkCompleteness(summary, unclaimed ? `${body}\n\n${unclaimed}` : body);

  const blocks = [body, renderChecklist(report), renderStatistics(summary)];
  if (unclaimed) blocks.push(unclaimed);
  return `${blocks.join('\n\n')}\n`;
}
