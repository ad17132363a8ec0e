/**
 * Analysis API Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import request from 'supertest';
import { createApp } from '../src/app';
import { InMemoryAnalysisRepository } from '../src/services/repository';
import { fixture, silentLogger, sourceFile } from './helpers';

const BPEL_20 = 'http://docs.oasis-open.org/wsbpel/2.0/process/executable';

class UnhealthyRepository extends InMemoryAnalysisRepository {
  async healthy(): Promise<boolean> {
    return false;
  }
}

describe('Analysis API', () => {
  let repository: InMemoryAnalysisRepository;
  let app: ReturnType<typeof createApp>;

  const analyzeOrder = () =>
    request(app)
      .post('/api/analyses')
      .send({
        fileName: 'OrderProcess.bpel',
        bpel: fixture('OrderProcess.bpel'),
        wsdl: [sourceFile('OrderProcess.wsdl')],
        xsd: [sourceFile('Order.xsd')],
      });

  beforeEach(() => {
    repository = new InMemoryAnalysisRepository();
    app = createApp({ repository, logger: silentLogger, accessLog: false });
  });

  describe('GET /health', () => {
    it('reports storage status', async () => {
      const res = await request(app).get('/health');
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        status: 'ok',
        service: 'bpel-analysis-service',
        storage: 'memory',
        prompts: [{ id: 'business-overview', version: '1.0.0' }],
      });
    });

    it('returns 503 when storage is down', async () => {
      const unhealthy = createApp({ repository: new UnhealthyRepository(), logger: silentLogger, accessLog: false });
      const res = await request(unhealthy).get('/health');
      expect(res.status).toBe(503);
      expect(res.body.status).toBe('unhealthy');
    });
  });

  describe('POST /api/analyses', () => {
    it('analyzes and stores a process', async () => {
      const res = await analyzeOrder();

      expect(res.status).toBe(201);
      expect(typeof res.body.id).toBe('string');
      expect(res.body.summary.process.name).toBe('OrderProcess');
      expect(res.body.summary.gaps).toHaveLength(2);
      expect(res.body.completeness.passed).toBe(true);
      expect(res.body.aiOverview).toBe(false);
      expect(await repository.get(res.body.id)).not.toBeNull();
    });

    it('validates the request body', async () => {
      const res = await request(app).post('/api/analyses').send({ fileName: 'x.bpel' });

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: 'Bad Request', message: 'Invalid request body', code: 'VALIDATION_ERROR' });
      expect(res.body.details.issues.map((i: { path: string }) => i.path)).toEqual(['bpel']);
    });

    it('rejects malformed JSON', async () => {
      const res = await request(app).post('/api/analyses').set('Content-Type', 'application/json').send('{"bpel":');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Bad Request', message: 'Malformed JSON body', code: 'VALIDATION_ERROR' });
    });

    it('returns 422 with position details for invalid XML', async () => {
      const res = await request(app).post('/api/analyses').send({ bpel: '<process>' });

      expect(res.status).toBe(422);
      expect(res.body).toEqual({
        error: 'Unprocessable Entity',
        message: 'process.bpel: Unclosed element <process> (line 1, column 1)',
        code: 'INVALID_XML',
        details: { fileName: 'process.bpel', line: 1, column: 1 },
      });
    });

    it('returns 422 for character references outside the XML range', async () => {
      const bpel = `<process xmlns="${BPEL_20}" name="P"><documentation>&#x110000;</documentation></process>`;
      const res = await request(app).post('/api/analyses').send({ bpel });

      expect(res.status).toBe(422);
      expect(res.body).toEqual({
        error: 'Unprocessable Entity',
        message: 'process.bpel: Invalid character reference &#x110000; (line 1, column 99)',
        code: 'INVALID_XML',
        details: { fileName: 'process.bpel', line: 1, column: 99 },
      });
    });

    it('returns 422 for nesting deeper than the parser allows', async () => {
      const depth = 20000;
      const bpel = `<process xmlns="${BPEL_20}">${'<sequence>'.repeat(depth)}${'</sequence>'.repeat(depth)}</process>`;
      const res = await request(app).post('/api/analyses').send({ bpel });

      expect(res.status).toBe(422);
      expect(res.body.code).toBe('INVALID_XML');
      expect(res.body.message).toBe('process.bpel: Element nesting exceeds 512 levels (line 1, column 5185)');
    });

    it('returns 422 for documents that are not BPEL', async () => {
      const notBpel = await request(app).post('/api/analyses').send({ bpel: '<definitions/>' });
      expect(notBpel.status).toBe(422);
      expect(notBpel.body.code).toBe('NOT_BPEL');

      const unknownVersion = await request(app).post('/api/analyses').send({ bpel: '<process xmlns="urn:other"/>' });
      expect(unknownVersion.status).toBe(422);
      expect(unknownVersion.body.code).toBe('UNSUPPORTED_BPEL_VERSION');
    });

    describe('size limits', () => {
      const limits = { maxBpelBytes: 2048, maxInterfaceBytes: 4096, maxInterfaceFiles: 2 };

      beforeEach(() => {
        app = createApp({ repository, logger: silentLogger, accessLog: false, limits });
      });

      it('rejects an oversized BPEL source', async () => {
        const res = await request(app).post('/api/analyses').send({ bpel: 'x'.repeat(3000) });

        expect(res.status).toBe(413);
        expect(res.body).toEqual({
          error: 'Payload Too Large',
          message: 'BPEL source exceeds maximum size of 2KB',
          code: 'BPEL_TOO_LARGE',
          details: { maxSize: 2048 },
        });
      });

      it('rejects too many interface files', async () => {
        const file = { fileName: 'a.wsdl', content: '<definitions/>' };
        const res = await request(app).post('/api/analyses').send({ bpel: '<process/>', wsdl: [file, file], xsd: [file] });

        expect(res.status).toBe(413);
        expect(res.body.code).toBe('TOO_MANY_INTERFACE_FILES');
        expect(res.body.message).toBe('At most 2 WSDL/XSD files per request');
      });

      it('rejects bodies over the JSON limit', async () => {
        const res = await request(app).post('/api/analyses').send({ bpel: 'x'.repeat(20000) });

        expect(res.status).toBe(413);
        expect(res.body.code).toBe('PAYLOAD_TOO_LARGE');
      });
    });
  });

  describe('stored analyses', () => {
    it('lists analyses', async () => {
      const created = await analyzeOrder();
      const res = await request(app).get('/api/analyses');

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual([
        {
          id: created.body.id,
          fileName: 'OrderProcess.bpel',
          processName: 'OrderProcess',
          gapCount: 2,
          createdAt: created.body.createdAt,
        },
      ]);
    });

    it('serves the PRD as markdown and the summary as JSON', async () => {
      const created = await analyzeOrder();

      const prd = await request(app).get(`/api/analyses/${created.body.id}/prd`);
      expect(prd.status).toBe(200);
      expect(prd.headers['content-type']).toMatch(/^text\/markdown/);
      expect(prd.text.startsWith('# PRD: OrderProcess\n')).toBe(true);

      const summary = await request(app).get(`/api/analyses/${created.body.id}/summary`);
      expect(summary.status).toBe(200);
      expect(summary.body.process.name).toBe('OrderProcess');

      const full = await request(app).get(`/api/analyses/${created.body.id}`);
      expect(full.body.prd).toBe(prd.text);
    });

    it('deletes analyses', async () => {
      const created = await analyzeOrder();

      const deleted = await request(app).delete(`/api/analyses/${created.body.id}`);
      expect(deleted.status).toBe(204);

      const missing = await request(app).get(`/api/analyses/${created.body.id}`);
      expect(missing.status).toBe(404);
      expect(missing.body).toEqual({ error: 'Not Found', message: 'Analysis not found', code: 'NOT_FOUND' });

      const again = await request(app).delete(`/api/analyses/${created.body.id}`);
      expect(again.status).toBe(404);
    });

    it('returns 404 for unknown ids', async () => {
      const res = await request(app).get('/api/analyses/00000000-0000-0000-0000-000000000000/prd');
      expect(res.status).toBe(404);
    });
  });

  it('returns 404 for unknown routes', async () => {
    const res = await request(app).get('/nope');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Not Found', message: 'Route GET /nope not found' });
  });
});
