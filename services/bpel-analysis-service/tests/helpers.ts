import { readFileSync } from 'fs';
import path from 'path';
import { AnalysisError, isAnalysisError } from '../src/errors';
import { SourceFile } from '../src/services/analysis';
import { createLogger } from '../../../shared/utils';

export const FIXTURES_DIR = path.join(__dirname, 'fixtures');

export function fixture(fileName: string): string {
  return readFileSync(path.join(FIXTURES_DIR, fileName), 'utf8');
}

export function sourceFile(fileName: string): SourceFile {
  return { fileName, content: fixture(fileName) };
}

export const silentLogger = createLogger('test', 'silent');

export const ANALYZED_AT = '2026-01-01T00:00:00.000Z';

export function analysisErrorFrom(action: () => unknown): AnalysisError {
  try {
    action();
  } catch (error) {
    if (isAnalysisError(error)) return error;
    throw error;
  }
  throw new Error('Expected an AnalysisError');
}
