/**
 * PRD Rendering & Completeness Tests
 */

import { describe, it, expect } from '@jest/globals';
import { summarizeBpel } from '../src/services/analysis';
import { renderPrd, renderChecklist } from '../src/render/prd';
import { checkCompleteness, PRD_SECTIONS } from '../src/render/completeness';
import { cell, fence, inlineCode, list, table } from '../src/render/markdown';
import { ANALYZED_AT, fixture, sourceFile } from './helpers';

const order = summarizeBpel({
  fileName: 'OrderProcess.bpel',
  bpel: fixture('OrderProcess.bpel'),
  wsdl: [sourceFile('OrderProcess.wsdl')],
  xsd: [sourceFile('Order.xsd')],
  analyzedAt: ANALYZED_AT,
});
const loan = summarizeBpel({ fileName: 'LoanApproval.bpel', bpel: fixture('LoanApproval.bpel'), analyzedAt: ANALYZED_AT });

// ============================================================================
// Markdown helpers
// ============================================================================

describe('markdown helpers', () => {
  it('escapes table cells', () => {
    expect(cell(undefined)).toBe('-');
    expect(cell('')).toBe('-');
    expect(cell('a|b\nc')).toBe('a\\|b c');
  });

  it('wraps inline code containing backticks', () => {
    expect(inlineCode('x')).toBe('`x`');
    expect(inlineCode('a`b')).toBe('`` a`b ``');
  });

  it('fences content with a marker longer than any backtick run', () => {
    expect(fence('a = b', 'xpath')).toBe('```xpath\na = b\n```');
    expect(fence('x ``` y')).toBe('````\nx ``` y\n````');
  });

  it('builds tables and lists', () => {
    expect(table(['A', 'B'], [['1', '2']])).toBe('| A | B |\n| --- | --- |\n| 1 | 2 |');
    expect(list(['one', 'two'])).toBe('- one\n- two');
  });
});

// ============================================================================
// PRD
// ============================================================================

describe('renderPrd', () => {
  const prd = renderPrd(order);

  it('starts with the source header', () => {
    expect(prd.startsWith([
      '# PRD: OrderProcess',
      '',
      '| Field | Value |',
      '| --- | --- |',
      '| Source file | OrderProcess.bpel |',
      '| BPEL version | 2.0 (executable) |',
      '| Target namespace | http://example.com/order |',
      '| Query language | - |',
    ].join('\n'))).toBe(true);
    expect(prd).toContain(`| SHA-256 | \`${order.source.sha256}\` |`);
    expect(prd).toContain(`| Analyzed at | ${ANALYZED_AT} |`);
  });

  it('contains every section in order', () => {
    const positions = PRD_SECTIONS.map(section => prd.indexOf(`\n${section}\n`));
    expect(positions.every(p => p > 0)).toBe(true);
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
  });

  it('lists instance-creating activities in the overview', () => {
    expect(prd).toContain('Instances are created by:\n\n- receive "ReceiveOrder" on `client.process`');
    expect(prd).toContain(
      'The process has 10 activities, 5 variables and 2 partner links. Analysis raised 0 high, 1 medium and 1 low risk gaps.'
    );
  });

  it('documents partner links and variables', () => {
    expect(prd).toContain('| `client` | process | inbound | tns:OrderProcessPLT | OrderProcessProvider (tns:OrderProcessPT) | - | yes |');
    expect(prd).toContain(
      '| `inputVariable` | process | message | tns:OrderRequestMessage | receive "ReceiveOrder" | assign "PrepareCredit" |'
    );
    expect(prd).toContain('| `auditNote` | process | type | xsd:string | - | - |');
  });

  it('documents schema types', () => {
    expect(prd).toContain('| `@channel` | xsd:string | 1 | - |');
    expect(prd).toContain('### `OrderStatus` (simpleType, restricts xsd:string)\n\nAllowed values: `NEW`, `APPROVED`, `REJECTED`');
  });

  it('outlines the flow with indentation, context and line', () => {
    expect(prd).toContain('- **reply** ReplyRejected (client.process; variable: outputVariable; fault handler; line 23)');
    expect(prd).toContain('\n  - **receive** ReceiveOrder (client.process; variable: inputVariable; creates instance; line 30)\n');
    expect(prd).toContain('\n    - **throw** RejectCredit (line 51)');
  });

  it('reproduces decision conditions verbatim', () => {
    expect(prd).toContain(
      [
        '### if "IsApproved" (if)',
        '1. **if** then assign "SetApproved"',
        'Condition:',
        "```xpath\n$creditResponse.payload/tns:approved = 'true' and ora:getInstanceId() > 0\n```",
        '2. **else** then throw "RejectCredit"',
      ].join('\n\n')
    );
  });

  it('reproduces data mappings, literals included', () => {
    expect(prd).toContain('| 2 | copy | literal | `outputVariable.payload` with query |');
    expect(prd).toContain('2. From literal:\n\n```xml\n<tns:status xmlns:tns="http://example.com/order">NEW</tns:status>\n```');
    expect(prd).toContain('2. To query:\n\n```xpath\ntns:status\n```');
  });

  it('shows where thrown faults are caught', () => {
    expect(prd).toContain('| throw "RejectCredit" | `tns:CreditRejected` | - | process |');
    expect(prd).toContain('| `CreditService` | `check` | `CreditFault` | tns:CreditFaultMessage |');
  });

  it('marks empty sections', () => {
    expect(prd).toContain('## 6. Loops\n\n_No loops in this process._');
    expect(prd).toContain('## 9. Compensation\n\n_No compensation logic._');
  });

  it('renders the gap table', () => {
    expect(prd).toContain(
      '| GAP-001 | data | Variable "auditNote" is declared but never used. | Can "auditNote" be dropped? | Omit it from the target data model. | low | Confirm with the process owner. |'
    );
  });

  it('ends with a passing checklist and statistics', () => {
    expect(prd).toContain('- [x] All PRD sections present (15/15)');
    expect(prd).toContain('- [x] Every expression reproduced verbatim (6/6)');
    expect(prd).toContain('| assign | 2 |');
    expect(prd).not.toContain('## Appendix B');
    expect(prd.endsWith('- Gaps: 0 high, 1 medium, 1 low\n')).toBe(true);
  });

  it('is deterministic', () => {
    expect(renderPrd(order)).toBe(prd);
  });

  it('renders the AI overview in its own unverified section', () => {
    const withOverview = renderPrd(order, {
      aiOverview: { overview: 'Orders are checked.', businessPurpose: 'Sell things.', openQuestions: ['Who approves?'] },
    });
    expect(withOverview).toContain('## AI-Drafted Overview (unverified)');
    expect(withOverview).toContain('**Business purpose:** Sell things.');
    expect(withOverview).toContain('**Open questions:**\n\n- Who approves?');
    expect(withOverview.indexOf('## AI-Drafted Overview')).toBeLessThan(withOverview.indexOf('## 2. Interfaces'));
  });

  it('puts expressions no section claims in an appendix', () => {
    const extended = {
      ...order,
      expressions: [
        ...order.expressions,
        { activityId: 'sequence:main/receive:ReceiveOrder', role: 'condition' as const, text: 'true()', variables: [], functions: [] },
      ],
    };
    const rendered = renderPrd(extended);
    expect(rendered.endsWith('## Appendix B: Other Expressions\n\nreceive "ReceiveOrder" (condition):\n\n```xpath\ntrue()\n```\n')).toBe(true);
    expect(rendered).toContain('- [x] Every expression reproduced verbatim (7/7)');
  });

  it('covers a BPEL 1.1 process completely', () => {
    const loanPrd = renderPrd(loan);
    expect(checkCompleteness(loan, loanPrd).passed).toBe(true);
    expect(loanPrd).toContain('Join failures are suppressed for the whole process (`suppressJoinFailure="yes"`).');
    expect(loanPrd).toContain('_The process carries no documentation._');
    expect(loanPrd).toContain(
      '### Embedded code in exec "LogDecision"\n\n```java\naddAuditTrailEntry("decided: " + getVariableData("decision"));\n```'
    );
    expect(loanPrd).toContain('Transition condition of `toArchive`:\n\n```xpath\nxp20:current-date() != \'\'\n```');
    expect(loanPrd).toContain("Deadline:\n\n```xpath\n'2030-01-01T00:00:00'\n```");
    expect(loanPrd).toContain('| throw "Abort" | `lns:LoanAborted` | - | **uncaught** |');
    expect(loanPrd).toContain('1. **onMessage** `client.cancel` then compensate "UndoAll"');
    expect(loanPrd).toContain('No default branch.');
  });
});

// ============================================================================
// Completeness
// ============================================================================

describe('checkCompleteness', () => {
  const prd = renderPrd(order);

  it('passes on the generated PRD', () => {
    const report = checkCompleteness(order, prd);
    expect(report.passed).toBe(true);
    expect(report.checks.map(c => [c.name, c.total])).toEqual([
      ['sections', 15],
      ['variables', 5],
      ['partner-links', 2],
      ['activities', 10],
      ['expressions', 6],
      ['gaps', 2],
    ]);
  });

  it('reports what an edited PRD dropped', () => {
    const edited = prd.replace('## 6. Loops', '## 6. Iteration').split('GAP-002').join('GAP-XXX');
    const report = checkCompleteness(order, edited);
    expect(report.passed).toBe(false);
    expect(report.checks.filter(c => !c.passed).map(c => [c.name, c.missing])).toEqual([
      ['sections', ['## 6. Loops']],
      ['gaps', ['GAP-002']],
    ]);
  });

  it('renders failed checks with their missing items', () => {
    const report = checkCompleteness(order, '');
    const checklist = renderChecklist(report);
    expect(checklist.startsWith('## 16. Completeness Checklist\n\n- [ ] All PRD sections present (0/15) Missing: `## 1. Overview`')).toBe(true);
    expect(checklist).toContain('- [ ] Every gap listed in the gap table (0/2) Missing: `GAP-001`, `GAP-002`');
  });
});
