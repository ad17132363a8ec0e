/**
 * Workspace Service
 *
 * File conventions of a BPEL migration workspace:
 *
 *   bpel/*.bpel   processes to analyse
 *   wsdl/*.wsdl   interface definitions shared by all processes (optional)
 *   xsd/*.xsd     schemas shared by all processes (optional)
 *
 * Each process yields prds/<name>.md and summaries/<name>.json under the
 * output directory (the workspace root unless given).
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { glob } from 'glob';
import { analyzeBpel, AnalysisResult, SourceFile } from './analysis';
import { isAnalysisError } from '../errors';
import { Gap, RiskLevel } from '../types/summary';
import { createLogger, Logger } from '../../../../shared/utils';

export interface WorkspaceFiles {
  bpel: string[];
  wsdl: string[];
  xsd: string[];
}

export interface WorkspaceOptions {
  root: string;
  outDir?: string;
  enrich?: boolean;
  analyzedAt?: string;
  logger?: Logger;
}

export interface WorkspaceFileResult {
  bpelFile: string;
  processName?: string;
  prdPath?: string;
  summaryPath?: string;
  gaps: Gap[];
  complete?: boolean;
  error?: { code: string; message: string };
}

export interface WorkspaceReport {
  results: WorkspaceFileResult[];
  failed: number;
}

const RISK_ORDER: Record<RiskLevel, number> = { low: 1, medium: 2, high: 3 };

export function gapsAtOrAbove(gaps: Gap[], risk: RiskLevel): Gap[] {
  return gaps.filter(g => RISK_ORDER[g.risk] >= RISK_ORDER[risk]);
}

async function find(root: string, pattern: string): Promise<string[]> {
  const files = await glob(pattern, { cwd: root, absolute: true, nodir: true });
  return files.sort();
}

export async function discoverWorkspace(root: string): Promise<WorkspaceFiles> {
  const [bpel, wsdl, xsd] = await Promise.all([find(root, 'bpel/*.bpel'), find(root, 'wsdl/*.wsdl'), find(root, 'xsd/*.xsd')]);
  return { bpel, wsdl, xsd };
}

export async function readSources(files: string[]): Promise<SourceFile[]> {
  return Promise.all(
    files.map(async file => ({ fileName: path.basename(file), content: await readFile(file, 'utf8') }))
  );
}

export function outputName(bpelFile: string): string {
  return path.basename(bpelFile).replace(/\.bpel$/i, '');
}

export async function writeOutputs(outDir: string, name: string, result: AnalysisResult): Promise<{ prdPath: string; summaryPath: string }> {
  const prdPath = path.join(outDir, 'prds', `${name}.md`);
  const summaryPath = path.join(outDir, 'summaries', `${name}.json`);
  await mkdir(path.dirname(prdPath), { recursive: true });
  await mkdir(path.dirname(summaryPath), { recursive: true });
  await writeFile(prdPath, result.prd, 'utf8');
  await writeFile(summaryPath, `${JSON.stringify(result.summary, null, 2)}\n`, 'utf8');
  return { prdPath, summaryPath };
}

function describeFailure(error: unknown): { code: string; message: string } {
  if (isAnalysisError(error)) return { code: error.code, message: error.message };
  return { code: 'ANALYSIS_FAILED', message: error instanceof Error ? error.message : String(error) };
}

/**
 * Analyse every BPEL file of a workspace. A file that cannot be read or
 * analysed is recorded and the batch continues; failures writing the outputs
 * propagate.
 */
export async function analyzeWorkspace(options: WorkspaceOptions): Promise<WorkspaceReport> {
  const logger = options.logger ?? createLogger('workspace');
  const outDir = options.outDir ?? options.root;
  const files = await discoverWorkspace(options.root);
  const [wsdl, xsd] = await Promise.all([readSources(files.wsdl), readSources(files.xsd)]);

  logger.info('Workspace discovered', {
    root: options.root,
    bpel: files.bpel.length,
    wsdl: wsdl.length,
    xsd: xsd.length,
  });

  const results: WorkspaceFileResult[] = [];
  for (const bpelFile of files.bpel) {
    let result: AnalysisResult;
    try {
      const bpel = await readFile(bpelFile, 'utf8');
      result = await analyzeBpel(
        { fileName: path.basename(bpelFile), bpel, wsdl, xsd, enrich: options.enrich, analyzedAt: options.analyzedAt },
        logger
      );
    } catch (error) {
      const failure = describeFailure(error);
      logger.warn('Analysis failed', { file: bpelFile, ...failure });
      results.push({ bpelFile, gaps: [], error: failure });
      continue;
    }

    const written = await writeOutputs(outDir, outputName(bpelFile), result);
    results.push({
      bpelFile,
      processName: result.summary.process.name,
      ...written,
      gaps: result.summary.gaps,
      complete: result.completeness.passed,
    });
  }

  return { results, failed: results.filter(r => r.error).length };
}
