/**
 * BPEL Document Loader
 *
 * Validates that a parsed document is a BPEL process and works out which
 * dialect it is written in. Extractors branch on `version` where BPEL 1.1 and
 * 2.0 express the same thing differently (switch vs if, condition attributes
 * vs condition elements, getVariableData vs $variable).
 */

import { XmlDocument, XmlElement, parseXml } from './xml';
import { AnalysisError, XmlParseError } from '../errors';

export const BPEL_NAMESPACES = {
  v20Executable: 'http://docs.oasis-open.org/wsbpel/2.0/process/executable',
  v20Abstract: 'http://docs.oasis-open.org/wsbpel/2.0/process/abstract',
  v11: 'http://schemas.xmlsoap.org/ws/2003/03/business-process/',
} as const;

export type BpelVersion = '1.1' | '2.0';

export interface BpelDocument {
  fileName: string;
  xml: XmlDocument;
  process: XmlElement;
  version: BpelVersion;
  abstract: boolean;
}

/**
 * Parse with the XML scanner, converting scanner failures into an
 * AnalysisError with the given code.
 */
export function parseOrFail(source: string, fileName: string, code: 'INVALID_XML' | 'INVALID_INTERFACE'): XmlDocument {
  try {
    return parseXml(source);
  } catch (error) {
    if (error instanceof XmlParseError) {
      throw AnalysisError.fromParseError(fileName, error, code);
    }
    throw error;
  }
}

export function loadBpelDocument(source: string, fileName: string): BpelDocument {
  const xml = parseOrFail(source, fileName, 'INVALID_XML');
  const process = xml.root;

  if (process.local !== 'process') {
    throw new AnalysisError('NOT_BPEL', `${fileName}: root element <${process.name}> is not a BPEL <process>`, {
      fileName,
      root: process.name,
    });
  }

  switch (process.namespace) {
    case BPEL_NAMESPACES.v20Executable:
      return { fileName, xml, process, version: '2.0', abstract: false };
    case BPEL_NAMESPACES.v20Abstract:
      return { fileName, xml, process, version: '2.0', abstract: true };
    case BPEL_NAMESPACES.v11:
      return { fileName, xml, process, version: '1.1', abstract: process.attributes.abstractProcess === 'yes' };
    default:
      throw new AnalysisError(
        'UNSUPPORTED_BPEL_VERSION',
        `${fileName}: unsupported process namespace "${process.namespace || '(none)'}"`,
        { fileName, namespace: process.namespace }
      );
  }
}
