/**
 * Input Validation Middleware
 *
 * Size limits for analysis requests:
 * - BPEL source: MAX_BPEL_BYTES
 * - each WSDL/XSD file: MAX_INTERFACE_BYTES
 * - overall JSON payload: enforced by express.json({ limit })
 *
 * Shape validation happens in the route with zod; this only rejects
 * oversized content with 413 before any parsing starts.
 */

import { Request, Response, NextFunction } from 'express';
import { byteSize } from '../../../../shared/utils';
import { ApiError } from '../../../../shared/types';

export interface SizeLimits {
  maxBpelBytes: number;
  maxInterfaceBytes: number;
  maxInterfaceFiles: number;
}

function tooLarge(res: Response, code: string, message: string, maxSize: number): void {
  const body: ApiError = { error: 'Payload Too Large', message, code, details: { maxSize } };
  res.status(413).json(body);
}

function interfaceFiles(value: unknown): Array<{ fileName: string; content: string }> {
  if (!Array.isArray(value)) return [];
  return value.flatMap((item: unknown) => {
    if (typeof item !== 'object' || item === null) return [];
    const content: unknown = 'content' in item ? item.content : undefined;
    const fileName: unknown = 'fileName' in item ? item.fileName : undefined;
    return typeof content === 'string' ? [{ fileName: typeof fileName === 'string' ? fileName : '(unnamed)', content }] : [];
  });
}

const kb = (bytes: number) => `${Math.round(bytes / 1024)}KB`;

export function validateAnalysisSize(limits: SizeLimits) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const body: unknown = req.body;
    if (typeof body !== 'object' || body === null) {
      next();
      return;
    }

    const bpel: unknown = 'bpel' in body ? body.bpel : undefined;
    if (typeof bpel === 'string' && byteSize(bpel) > limits.maxBpelBytes) {
      tooLarge(res, 'BPEL_TOO_LARGE', `BPEL source exceeds maximum size of ${kb(limits.maxBpelBytes)}`, limits.maxBpelBytes);
      return;
    }

    const files = [
      ...interfaceFiles('wsdl' in body ? body.wsdl : undefined),
      ...interfaceFiles('xsd' in body ? body.xsd : undefined),
    ];
    if (files.length > limits.maxInterfaceFiles) {
      tooLarge(res, 'TOO_MANY_INTERFACE_FILES', `At most ${limits.maxInterfaceFiles} WSDL/XSD files per request`, limits.maxInterfaceFiles);
      return;
    }
    for (const file of files) {
      if (byteSize(file.content) > limits.maxInterfaceBytes) {
        tooLarge(res, 'INTERFACE_TOO_LARGE', `${file.fileName} exceeds maximum size of ${kb(limits.maxInterfaceBytes)}`, limits.maxInterfaceBytes);
        return;
      }
    }

    next();
  };
}
