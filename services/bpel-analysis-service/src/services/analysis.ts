/**
 * Analysis Service
 *
 * One entry point shared by the HTTP API and the CLI: parse the interface
 * files, load the BPEL document, extract and validate the summary, then render
 * the PRD and its completeness report.
 */

import { createHash } from 'crypto';
import { loadBpelDocument } from '../parser/bpel';
import { emptyInterfaces, mergeInterfaces, parseWsdl } from '../interfaces/wsdl';
import { parseXsd } from '../interfaces/xsd';
import { extractSummary } from '../extractor';
import { renderPrd } from '../render/prd';
import { checkCompleteness, CompletenessReport } from '../render/completeness';
import { draftBusinessOverview } from './ai';
import { AnalysisError } from '../errors';
import { BpelSummary, BpelSummarySchema } from '../types/summary';
import { createLogger, Logger } from '../../../../shared/utils';

export interface SourceFile {
  fileName: string;
  content: string;
}

export interface AnalysisInput {
  fileName: string;
  bpel: string;
  wsdl?: SourceFile[];
  xsd?: SourceFile[];
  /** Draft an AI overview section (needs ANTHROPIC_API_KEY) */
  enrich?: boolean;
  /** Fixed timestamp for reproducible output */
  analyzedAt?: string;
}

export interface AnalysisResult {
  summary: BpelSummary;
  prd: string;
  completeness: CompletenessReport;
  aiOverview: boolean;
}

const defaultLogger = createLogger('analysis');

export function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

export function validateSummary(candidate: unknown, fileName: string): BpelSummary {
  const parsed = BpelSummarySchema.safeParse(candidate);
  if (!parsed.success) {
    throw new AnalysisError('INVALID_SUMMARY', `${fileName}: summary does not match schema`, {
      fileName,
      issues: parsed.error.issues.map(i => ({ path: i.path.join('.'), message: i.message })),
    });
  }
  return parsed.data;
}

/**
 * Extraction only, without rendering. Synchronous and deterministic.
 */
export function summarizeBpel(input: AnalysisInput): BpelSummary {
  const wsdl = input.wsdl ?? [];
  const xsd = input.xsd ?? [];

  const interfaces = mergeInterfaces([
    ...wsdl.map(file => parseWsdl(file.content, file.fileName)),
    { ...emptyInterfaces(), schemaTypes: xsd.flatMap(file => parseXsd(file.content, file.fileName)) },
  ]);

  const document = loadBpelDocument(input.bpel, input.fileName);
  const summary = extractSummary(document, {
    interfaces,
    wsdlFiles: wsdl.map(f => f.fileName),
    xsdFiles: xsd.map(f => f.fileName),
    sha256: sha256(input.bpel),
    analyzedAt: input.analyzedAt ?? new Date().toISOString(),
  });

  return validateSummary(summary, input.fileName);
}

export async function analyzeBpel(input: AnalysisInput, logger: Logger = defaultLogger): Promise<AnalysisResult> {
  const startTime = Date.now();
  const summary = summarizeBpel(input);

  const aiOverview = input.enrich ? await draftBusinessOverview(summary, logger) : undefined;
  const prd = renderPrd(summary, { aiOverview });
  const completeness = checkCompleteness(summary, prd);

  logger.info('BPEL analyzed', {
    fileName: input.fileName,
    process: summary.process.name,
    activities: summary.statistics.totalActivities,
    gaps: summary.gaps.length,
    complete: completeness.passed,
    durationMs: Date.now() - startTime,
  });

  return { summary, prd, completeness, aiOverview: aiOverview !== undefined };
}
