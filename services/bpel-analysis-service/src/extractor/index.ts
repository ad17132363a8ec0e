/**
 * Summary Extraction
 *
 * Runs every extractor over one loaded BPEL document and assembles the
 * `BpelSummary`. Extractors share a single activity index; gap detection runs
 * last because its rules read the assembled summary.
 */

import { attr, childrenNamed } from '../parser/xml';
import { BpelDocument } from '../parser/bpel';
import { documentationOf, toActivity, walkActivities } from './activities';
import { collectExpressions } from './expressions';
import { extractVariables } from './variables';
import { extractPartnerLinks } from './partner-links';
import { extractConcurrency, extractDecisions, extractLoops, extractTimers } from './control-flow';
import { extractCompensations, extractCorrelations, extractFaults } from './faults';
import { extractAssignments } from './assignments';
import { extractExtensions, extractHumanTasks } from './vendor';
import { detectGaps, GapInput } from './gaps';
import { BpelSummary, Gap, Interfaces, ProcessInfo, Statistics, SUMMARY_SCHEMA_VERSION } from '../types/summary';

export interface ExtractionOptions {
  interfaces: Interfaces;
  wsdlFiles: string[];
  xsdFiles: string[];
  sha256: string;
  analyzedAt: string;
}

function extractProcessInfo(document: BpelDocument): ProcessInfo {
  const process = document.process;
  const namespaces = { ...process.namespaces };
  delete namespaces.xml;

  return {
    name: attr(process, 'name') ?? document.fileName,
    targetNamespace: attr(process, 'targetNamespace'),
    bpelVersion: document.version,
    abstract: document.abstract,
    queryLanguage: attr(process, 'queryLanguage'),
    expressionLanguage: attr(process, 'expressionLanguage'),
    suppressJoinFailure: attr(process, 'suppressJoinFailure') === 'yes',
    namespaces,
    imports: childrenNamed(process, 'import').map(i => ({
      namespace: attr(i, 'namespace'),
      location: attr(i, 'location'),
      importType: attr(i, 'importType'),
    })),
    documentation: documentationOf(process),
  };
}

export function computeStatistics(summary: GapInput, gaps: Gap[]): Statistics {
  const activitiesByKind: Record<string, number> = {};
  for (const activity of summary.activities) {
    activitiesByKind[activity.kind] = (activitiesByKind[activity.kind] ?? 0) + 1;
  }
  return {
    activitiesByKind,
    totalActivities: summary.activities.length,
    variables: summary.variables.length,
    partnerLinks: summary.partnerLinks.length,
    decisions: summary.decisions.length,
    loops: summary.loops.length,
    expressions: summary.expressions.length,
    gapsByRisk: {
      low: gaps.filter(g => g.risk === 'low').length,
      medium: gaps.filter(g => g.risk === 'medium').length,
      high: gaps.filter(g => g.risk === 'high').length,
    },
  };
}

export function extractSummary(document: BpelDocument, options: ExtractionOptions): BpelSummary {
  const index = walkActivities(document);
  const expressions = collectExpressions(document, index);
  const { variables, undeclared } = extractVariables(document, index, expressions);
  const { partnerLinks, declaredFaults } = extractPartnerLinks(document, index, options.interfaces);

  const partial: GapInput = {
    schemaVersion: SUMMARY_SCHEMA_VERSION,
    source: {
      fileName: document.fileName,
      sha256: options.sha256,
      analyzedAt: options.analyzedAt,
      wsdlFiles: options.wsdlFiles,
      xsdFiles: options.xsdFiles,
    },
    process: extractProcessInfo(document),
    partnerLinks,
    variables,
    activities: index.nodes.map(toActivity),
    assignments: extractAssignments(document, index),
    decisions: extractDecisions(index),
    loops: extractLoops(index),
    faults: extractFaults(document, index, declaredFaults),
    compensations: extractCompensations(document, index),
    correlations: extractCorrelations(document, index),
    humanTasks: extractHumanTasks(index),
    timers: extractTimers(document, index),
    extensions: extractExtensions(document, index),
    concurrency: extractConcurrency(index),
    expressions,
    interfaces: options.interfaces,
  };

  const gaps = detectGaps({
    summary: partial,
    undeclaredVariables: undeclared,
    interfacesSupplied: options.wsdlFiles.length > 0,
    suppliedFiles: [...options.wsdlFiles, ...options.xsdFiles],
  });

  return { ...partial, gaps, statistics: computeStatistics(partial, gaps) };
}
