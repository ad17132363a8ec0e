/**
 * Analysis Errors
 *
 * Every failure the analysis pipeline can report to a caller carries a stable
 * code. Routes map these to 4xx responses, the CLI to exit code 1.
 */

export type AnalysisErrorCode =
  | 'INVALID_XML'
  | 'NOT_BPEL'
  | 'UNSUPPORTED_BPEL_VERSION'
  | 'INVALID_INTERFACE'
  | 'INVALID_SUMMARY';

export class XmlParseError extends Error {
  constructor(
    message: string,
    public readonly line: number,
    public readonly column: number
  ) {
    super(`${message} (line ${line}, column ${column})`);
    this.name = 'XmlParseError';
  }
}

export class AnalysisError extends Error {
  public readonly status: number;

  constructor(
    public readonly code: AnalysisErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AnalysisError';
    this.status = 422;
  }

  static fromParseError(fileName: string, error: XmlParseError, code: AnalysisErrorCode = 'INVALID_XML'): AnalysisError {
    return new AnalysisError(code, `${fileName}: ${error.message}`, {
      fileName,
      line: error.line,
      column: error.column,
    });
  }
}

export function isAnalysisError(error: unknown): error is AnalysisError {
  return error instanceof AnalysisError;
}
