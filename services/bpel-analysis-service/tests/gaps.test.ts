/**
 * Gap Detection Tests
 */

import { describe, it, expect } from '@jest/globals';
import { summarizeBpel } from '../src/services/analysis';
import { formatGapId, GAP_RULES } from '../src/extractor/gaps';
import { ANALYZED_AT, fixture, sourceFile } from './helpers';

const SETTLEMENT = 'sequence:main/scope:Settlement';

describe('formatGapId', () => {
  it('pads sequence numbers to three digits', () => {
    expect(formatGapId(1)).toBe('GAP-001');
    expect(formatGapId(42)).toBe('GAP-042');
    expect(formatGapId(1234)).toBe('GAP-1234');
  });

  it('runs a fixed rule list', () => {
    expect(GAP_RULES).toHaveLength(19);
  });
});

describe('BPEL 2.0 process with interfaces', () => {
  const summary = summarizeBpel({
    fileName: 'OrderProcess.bpel',
    bpel: fixture('OrderProcess.bpel'),
    wsdl: [sourceFile('OrderProcess.wsdl')],
    xsd: [sourceFile('Order.xsd')],
    analyzedAt: ANALYZED_AT,
  });

  it('only raises the unused variable and the vendor function', () => {
    expect(summary.gaps).toEqual([
      {
        id: 'GAP-001',
        category: 'data',
        risk: 'low',
        description: 'Variable "auditNote" is declared but never used.',
        question: 'Can "auditNote" be dropped?',
        proposedDefault: 'Omit it from the target data model.',
        validation: 'Confirm with the process owner.',
        relatedTo: ['auditNote'],
      },
      {
        id: 'GAP-002',
        category: 'expression',
        risk: 'medium',
        description: 'Vendor XPath function ora:getInstanceId() is used by 1 activity(ies).',
        question: 'What is the exact behaviour of ora:getInstanceId() that the target platform must reproduce?',
        proposedDefault: 'Replace it with an equivalent utility function.',
        validation: 'Compare outputs of the original and the replacement on sample data.',
        relatedTo: ['sequence:main/if:IsApproved'],
      },
    ]);
  });
});

describe('BPEL 2.0 process without interfaces', () => {
  const summary = summarizeBpel({ fileName: 'OrderProcess.bpel', bpel: fixture('OrderProcess.bpel'), analyzedAt: ANALYZED_AT });

  it('asks for the WSDL and the missing import', () => {
    expect(summary.gaps.map(g => [g.id, g.category, g.risk])).toEqual([
      ['GAP-001', 'interface', 'medium'],
      ['GAP-002', 'interface', 'low'],
      ['GAP-003', 'data', 'low'],
      ['GAP-004', 'expression', 'medium'],
    ]);
    expect(summary.gaps[0]).toMatchObject({
      description: 'No WSDL was supplied for 2 partner link(s); operation signatures and message structures are unknown.',
      relatedTo: ['client', 'CreditService'],
    });
    expect(summary.gaps[1].description).toBe('Imported http://schemas.xmlsoap.org/wsdl/ OrderProcess.wsdl was not supplied.');
  });

  it('does not judge operations against unknown port types', () => {
    expect(summary.partnerLinks.flatMap(p => p.operations.map(o => o.inPortType))).toEqual([undefined, undefined]);
  });
});

describe('operations missing from the port type', () => {
  const bpel = fixture('OrderProcess.bpel').replace('operation="check"', 'operation="checkCredit"');
  const summary = summarizeBpel({
    fileName: 'OrderProcess.bpel',
    bpel,
    wsdl: [sourceFile('OrderProcess.wsdl')],
    analyzedAt: ANALYZED_AT,
  });

  it('raises a high risk interface gap', () => {
    expect(summary.gaps[0]).toMatchObject({
      id: 'GAP-001',
      category: 'interface',
      risk: 'high',
      description: 'Operation "checkCredit" used on partner link "CreditService" is not declared on its port type.',
      question: 'Is "checkCredit" a renamed or removed operation of tns:CreditPT?',
      relatedTo: ['CreditService', 'sequence:main/invoke:CheckCredit'],
    });
  });
});

describe('BPEL 1.1 process with Oracle extensions', () => {
  const summary = summarizeBpel({ fileName: 'LoanApproval.bpel', bpel: fixture('LoanApproval.bpel'), analyzedAt: ANALYZED_AT });

  it('numbers gaps in rule order', () => {
    expect(summary.gaps.map(g => [g.id, g.category, g.risk, g.description])).toEqual([
      ['GAP-001', 'interface', 'medium', 'No WSDL was supplied for 2 partner link(s); operation signatures and message structures are unknown.'],
      ['GAP-002', 'data', 'high', 'Variable "taskResult" is used by receive "TaskDone" but never declared.'],
      ['GAP-003', 'data', 'medium', 'Variable "taskInput" is read but never written; reading it raises uninitializedVariable unless it is set elsewhere.'],
      ['GAP-004', 'interface', 'medium', 'Operation "apply" on partner link "client" is received but never replied to.'],
      ['GAP-005', 'interface', 'medium', 'Operation "cancel" on partner link "client" is received but never replied to.'],
      ['GAP-006', 'error-handling', 'medium', 'Fault lns:LoanAborted thrown by throw "Abort" is not caught by any enclosing handler.'],
      ['GAP-007', 'error-handling', 'medium', 'The process has no process-level catchAll; unexpected faults end the instance with the default fault behaviour.'],
      ['GAP-008', 'transaction', 'medium', 'scope "ManualReview" defines a compensation handler.'],
      ['GAP-009', 'correlation', 'medium', 'Correlation set "LoanKey" is used but never initiated.'],
      ['GAP-010', 'human-task', 'medium', 'Human task "ManualReview": assignment, escalation and outcome rules live in the task definition, not the process.'],
      ['GAP-011', 'concurrency', 'low', 'flow "Notify" runs 2 branch(es) in parallel.'],
      ['GAP-012', 'logic', 'low', 'switch "CheckAmount" has no otherwise branch.'],
      ['GAP-013', 'timing', 'low', "pick \"AwaitCancel\" waits until an absolute deadline ('2030-01-01T00:00:00')."],
      ['GAP-014', 'expression', 'medium', 'Vendor XPath function xp20:current-date() is used by 1 activity(ies).'],
      ['GAP-015', 'extension', 'medium', 'assign "Increment" uses vendor extension bpelx:append.'],
      ['GAP-016', 'extension', 'high', 'exec "LogDecision" embeds java code that the process model does not describe.'],
      ['GAP-017', 'documentation', 'low', 'The process carries no documentation describing its business purpose.'],
    ]);
  });

  it('proposes one-way handling for links without a partner role', () => {
    expect(summary.gaps[3].proposedDefault).toBe('Treat it as one-way.');
    expect(summary.gaps[3].relatedTo).toEqual(['client', 'sequence[1]/receive:ReceiveApplication']);
  });

  it('names the correlation properties in the question', () => {
    expect(summary.gaps[8].question).toBe('Which message initiates "LoanKey" (properties: lns:loanId)?');
  });

  it('counts gaps by risk', () => {
    expect(summary.statistics.gapsByRisk).toEqual({ low: 4, medium: 11, high: 2 });
  });

  it('is stable across runs', () => {
    const again = summarizeBpel({ fileName: 'LoanApproval.bpel', bpel: fixture('LoanApproval.bpel'), analyzedAt: ANALYZED_AT });
    expect(again.gaps).toEqual(summary.gaps);
  });
});

describe('BPEL 2.0 process with nested scopes', () => {
  const summary = summarizeBpel({
    fileName: 'ClaimHandling.bpel',
    bpel: fixture('ClaimHandling.bpel'),
    wsdl: [sourceFile('OrderProcess.wsdl')],
    analyzedAt: ANALYZED_AT,
  });

  it('numbers gaps in rule order', () => {
    expect(summary.gaps.map(g => [g.id, g.category, g.risk, g.description])).toEqual([
      ['GAP-001', 'interface', 'medium', 'Partner link type cl:OrderProcessPLT of partner link "ledger" is not defined in the supplied WSDLs.'],
      ['GAP-002', 'error-handling', 'medium', 'Fault tns:Rejected thrown by throw "RejectUpstream" is not caught by any enclosing handler.'],
      ['GAP-003', 'error-handling', 'medium', 'The process has no process-level catchAll; unexpected faults end the instance with the default fault behaviour.'],
      ['GAP-004', 'transaction', 'medium', 'scope "Review" defines a compensation handler.'],
      ['GAP-005', 'transaction', 'high', 'compensateScope "UndoAudit" compensates "Audit", which names no scope in the process.'],
      ['GAP-006', 'correlation', 'low', 'Correlation set "claimId" is declared but never used.'],
      ['GAP-007', 'concurrency', 'low', 'forEach "PostItems" runs its body in parallel for each counter value.'],
    ]);
  });

  it('asks which WSDL defines an unresolved partner link type', () => {
    expect(summary.gaps[0]).toEqual({
      id: 'GAP-001',
      category: 'interface',
      risk: 'medium',
      description: 'Partner link type cl:OrderProcessPLT of partner link "ledger" is not defined in the supplied WSDLs.',
      question: 'Which WSDL defines cl:OrderProcessPLT?',
      proposedDefault: 'Treat the partner as an opaque service addressed by the operations used.',
      validation: 'Locate the defining WSDL and confirm the role port types.',
      relatedTo: ['ledger'],
    });
  });

  it('flags a compensation target that names no scope as high risk', () => {
    expect(summary.gaps[4]).toMatchObject({
      question: 'Which scope is "Audit" meant to be?',
      proposedDefault: 'Ignore the compensation call.',
      relatedTo: [`${SETTLEMENT}/compensateScope:UndoAudit`],
    });
  });

  it('offers to drop an unused correlation set', () => {
    expect(summary.gaps[5]).toMatchObject({ question: 'Can "claimId" be dropped?', proposedDefault: 'Omit it.', relatedTo: ['claimId'] });
  });

  it('counts gaps by risk', () => {
    expect(summary.statistics.gapsByRisk).toEqual({ low: 2, medium: 4, high: 1 });
  });
});

describe('fault matching across namespaces', () => {
  const bpel = fixture('ClaimHandling.bpel').replace('faultName="tns:Rejected"', 'faultName="cl:Rejected"');
  const summary = summarizeBpel({
    fileName: 'ClaimHandling.bpel',
    bpel,
    wsdl: [sourceFile('OrderProcess.wsdl')],
    analyzedAt: ANALYZED_AT,
  });

  it('catches the fault once its namespace matches the handler', () => {
    expect(summary.gaps.filter(g => g.category === 'error-handling').map(g => g.id)).toEqual(['GAP-002']);
    expect(summary.faults.thrown.every(t => t.caughtBy !== undefined)).toBe(true);
  });

  it('catches a fault written with a different prefix bound to the same namespace', () => {
    const aliased = summarizeBpel({
      fileName: 'ClaimHandling.bpel',
      bpel: bpel.replace('<catch faultName="cl:Rejected">', '<catch xmlns:claims="http://example.com/claims" faultName="claims:Rejected">'),
      wsdl: [sourceFile('OrderProcess.wsdl')],
      analyzedAt: ANALYZED_AT,
    });
    expect(aliased.faults.thrown.map(t => t.caughtBy)).toEqual([
      SETTLEMENT,
      `${SETTLEMENT}/sequence:settle/scope:Review`,
      `${SETTLEMENT}/sequence:settle/scope:Review`,
    ]);
  });
});
