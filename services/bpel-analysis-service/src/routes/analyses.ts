/**
 * Analysis Routes
 *
 * POST a BPEL document (plus optional WSDL/XSD files) to run the analysis and
 * store the result; read stored analyses back as JSON, summary or markdown.
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { AnalysisRepository } from '../services/repository';
import { analyzeBpel } from '../services/analysis';
import { isAnalysisError } from '../errors';
import { validateAnalysisSize, SizeLimits } from '../middleware/validation';
import { Logger } from '../../../../shared/utils';
import { AnalysisListItem, ApiError, ApiResponse } from '../../../../shared/types';

// ============================================================================
// Request Schemas
// ============================================================================

const SourceFileSchema = z.object({
  fileName: z.string().min(1).max(255),
  content: z.string().min(1),
});

export const AnalyzeRequestSchema = z.object({
  fileName: z.string().min(1).max(255).default('process.bpel'),
  bpel: z.string().min(1),
  wsdl: z.array(SourceFileSchema).default([]),
  xsd: z.array(SourceFileSchema).default([]),
  enrich: z.boolean().default(false),
});

const notFound: ApiError = { error: 'Not Found', message: 'Analysis not found', code: 'NOT_FOUND' };

export interface AnalysesRouterOptions {
  repository: AnalysisRepository;
  logger: Logger;
  limits: SizeLimits;
}

export function createAnalysesRouter({ repository, logger, limits }: AnalysesRouterOptions): Router {
  const router = Router();

  // ==========================================================================
  // POST /api/analyses
  // Analyze a BPEL document and store the result
  // ==========================================================================

  router.post('/', validateAnalysisSize(limits), async (req: Request, res: Response) => {
    const parsed = AnalyzeRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const body: ApiError = {
        error: 'Bad Request',
        message: 'Invalid request body',
        code: 'VALIDATION_ERROR',
        details: { issues: parsed.error.issues.map(i => ({ path: i.path.join('.'), message: i.message })) },
      };
      return res.status(400).json(body);
    }

    try {
      const request = parsed.data;
      const result = await analyzeBpel(
        { fileName: request.fileName, bpel: request.bpel, wsdl: request.wsdl, xsd: request.xsd, enrich: request.enrich },
        logger
      );

      const stored = await repository.save({
        fileName: request.fileName,
        processName: result.summary.process.name,
        summary: result.summary,
        prd: result.prd,
        completeness: result.completeness,
      });

      res.status(201).json({
        id: stored.id,
        createdAt: stored.createdAt,
        summary: stored.summary,
        prd: stored.prd,
        completeness: stored.completeness,
        aiOverview: result.aiOverview,
      });
    } catch (error) {
      if (isAnalysisError(error)) {
        logger.warn('Analysis rejected', { code: error.code, message: error.message });
        const body: ApiError = { error: 'Unprocessable Entity', message: error.message, code: error.code, details: error.details };
        return res.status(error.status).json(body);
      }
      logger.error('Analysis failed', error instanceof Error ? error : undefined);
      res.status(500).json({ error: 'Internal Server Error', message: 'Failed to analyze BPEL document' });
    }
  });

  // ==========================================================================
  // GET /api/analyses
  // ==========================================================================

  router.get('/', async (_req: Request, res: Response) => {
    try {
      const body: ApiResponse<AnalysisListItem[]> = { data: await repository.list() };
      res.json(body);
    } catch (error) {
      logger.error('List analyses failed', error instanceof Error ? error : undefined);
      res.status(500).json({ error: 'Internal Server Error', message: 'Failed to list analyses' });
    }
  });

  // ==========================================================================
  // GET /api/analyses/:id
  // ==========================================================================

  router.get('/:id', async (req: Request, res: Response) => {
    try {
      const analysis = await repository.get(req.params.id);
      if (!analysis) return res.status(404).json(notFound);
      res.json(analysis);
    } catch (error) {
      logger.error('Get analysis failed', error instanceof Error ? error : undefined, { id: req.params.id });
      res.status(500).json({ error: 'Internal Server Error', message: 'Failed to get analysis' });
    }
  });

  // ==========================================================================
  // GET /api/analyses/:id/prd
  // The PRD as markdown
  // ==========================================================================

  router.get('/:id/prd', async (req: Request, res: Response) => {
    try {
      const analysis = await repository.get(req.params.id);
      if (!analysis) return res.status(404).json(notFound);
      res.type('text/markdown').send(analysis.prd);
    } catch (error) {
      logger.error('Get PRD failed', error instanceof Error ? error : undefined, { id: req.params.id });
      res.status(500).json({ error: 'Internal Server Error', message: 'Failed to get PRD' });
    }
  });

  // ==========================================================================
  // GET /api/analyses/:id/summary
  // ==========================================================================

  router.get('/:id/summary', async (req: Request, res: Response) => {
    try {
      const analysis = await repository.get(req.params.id);
      if (!analysis) return res.status(404).json(notFound);
      res.json(analysis.summary);
    } catch (error) {
      logger.error('Get summary failed', error instanceof Error ? error : undefined, { id: req.params.id });
      res.status(500).json({ error: 'Internal Server Error', message: 'Failed to get summary' });
    }
  });

  // ==========================================================================
  // DELETE /api/analyses/:id
  // ==========================================================================

  router.delete('/:id', async (req: Request, res: Response) => {
    try {
      const deleted = await repository.delete(req.params.id);
      if (!deleted) return res.status(404).json(notFound);
      res.status(204).send();
    } catch (error) {
      logger.error('Delete analysis failed', error instanceof Error ? error : undefined, { id: req.params.id });
      res.status(500).json({ error: 'Internal Server Error', message: 'Failed to delete analysis' });
    }
  });

  return router;
}
