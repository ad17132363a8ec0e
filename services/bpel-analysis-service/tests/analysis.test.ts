/**
 * Analysis Service & Repository Tests
 */

import { describe, it, expect } from '@jest/globals';
import { analyzeBpel, sha256, summarizeBpel, validateSummary } from '../src/services/analysis';
import { InMemoryAnalysisRepository } from '../src/services/repository';
import { ANALYZED_AT, analysisErrorFrom, fixture, silentLogger, sourceFile } from './helpers';

describe('sha256', () => {
  it('hashes UTF-8 text as hex', () => {
    expect(sha256('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });
});

describe('summarizeBpel', () => {
  const bpel = fixture('OrderProcess.bpel');

  it('fingerprints the source', () => {
    const summary = summarizeBpel({ fileName: 'OrderProcess.bpel', bpel, analyzedAt: ANALYZED_AT });
    expect(summary.schemaVersion).toBe('1.0');
    expect(summary.source.sha256).toBe(sha256(bpel));
    expect(summary.source.analyzedAt).toBe(ANALYZED_AT);
    expect(summary.source.wsdlFiles).toEqual([]);
  });

  it('rejects broken interface files before the process', () => {
    const error = analysisErrorFrom(() =>
      summarizeBpel({ fileName: 'OrderProcess.bpel', bpel, wsdl: [{ fileName: 'broken.wsdl', content: '<definitions>' }] })
    );
    expect(error.code).toBe('INVALID_INTERFACE');
    expect(error.message).toBe('broken.wsdl: Unclosed element <definitions> (line 1, column 1)');
  });
});

describe('validateSummary', () => {
  it('accepts a summary that went through JSON', () => {
    const summary = summarizeBpel({ fileName: 'LoanApproval.bpel', bpel: fixture('LoanApproval.bpel'), analyzedAt: ANALYZED_AT });
    const roundTripped: unknown = JSON.parse(JSON.stringify(summary));
    expect(validateSummary(roundTripped, 'LoanApproval.json')).toEqual(summary);
  });

  it('rejects anything else with INVALID_SUMMARY', () => {
    const error = analysisErrorFrom(() => validateSummary({ schemaVersion: '2.0' }, 'bad.json'));
    expect(error.code).toBe('INVALID_SUMMARY');
    expect(error.message).toBe('bad.json: summary does not match schema');
    expect(error.details?.fileName).toBe('bad.json');
  });
});

describe('analyzeBpel', () => {
  it('renders a complete PRD', async () => {
    const result = await analyzeBpel(
      {
        fileName: 'OrderProcess.bpel',
        bpel: fixture('OrderProcess.bpel'),
        wsdl: [sourceFile('OrderProcess.wsdl')],
        xsd: [sourceFile('Order.xsd')],
        analyzedAt: ANALYZED_AT,
      },
      silentLogger
    );
    expect(result.summary.process.name).toBe('OrderProcess');
    expect(result.prd.startsWith('# PRD: OrderProcess\n')).toBe(true);
    expect(result.completeness.passed).toBe(true);
    expect(result.aiOverview).toBe(false);
  });

  it('is reproducible for a fixed timestamp', async () => {
    const input = { fileName: 'LoanApproval.bpel', bpel: fixture('LoanApproval.bpel'), analyzedAt: ANALYZED_AT };
    const [first, second] = await Promise.all([analyzeBpel(input, silentLogger), analyzeBpel(input, silentLogger)]);
    expect(second.prd).toBe(first.prd);
  });
});

describe('InMemoryAnalysisRepository', () => {
  it('stores, lists newest first and deletes analyses', async () => {
    const repository = new InMemoryAnalysisRepository();
    const result = await analyzeBpel(
      { fileName: 'OrderProcess.bpel', bpel: fixture('OrderProcess.bpel'), analyzedAt: ANALYZED_AT },
      silentLogger
    );
    const record = {
      fileName: 'OrderProcess.bpel',
      processName: result.summary.process.name,
      summary: result.summary,
      prd: result.prd,
      completeness: result.completeness,
    };

    const first = await repository.save(record);
    const second = await repository.save({ ...record, fileName: 'Copy.bpel' });

    expect(await repository.get(first.id)).toEqual(first);
    expect((await repository.list()).map(item => [item.fileName, item.gapCount])).toEqual([
      ['Copy.bpel', 4],
      ['OrderProcess.bpel', 4],
    ]);
    expect(await repository.delete(second.id)).toBe(true);
    expect(await repository.delete(second.id)).toBe(false);
    expect(await repository.get(second.id)).toBeNull();
    expect(await repository.healthy()).toBe(true);
  });
});
