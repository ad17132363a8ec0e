/**
 * Analysis Repository
 *
 * Stores finished analyses. PostgreSQL when DATABASE_URL is set, otherwise an
 * in-memory map that lives as long as the process.
 */

import { Pool } from 'pg';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import { BpelSummary } from '../types/summary';
import { CompletenessReport } from '../render/completeness';
import { AnalysisListItem } from '../../../../shared/types';

export interface StoredAnalysis {
  id: string;
  fileName: string;
  processName: string;
  summary: BpelSummary;
  prd: string;
  completeness: CompletenessReport;
  createdAt: string;
}

export type NewAnalysis = Omit<StoredAnalysis, 'id' | 'createdAt'>;

export interface AnalysisRepository {
  readonly kind: 'postgres' | 'memory';
  save(analysis: NewAnalysis): Promise<StoredAnalysis>;
  get(id: string): Promise<StoredAnalysis | null>;
  list(): Promise<AnalysisListItem[]>;
  delete(id: string): Promise<boolean>;
  healthy(): Promise<boolean>;
}

function toListItem(analysis: StoredAnalysis): AnalysisListItem {
  return {
    id: analysis.id,
    fileName: analysis.fileName,
    processName: analysis.processName,
    gapCount: analysis.summary.gaps.length,
    createdAt: analysis.createdAt,
  };
}

// ============================================================================
// In-memory
// ============================================================================

export class InMemoryAnalysisRepository implements AnalysisRepository {
  readonly kind = 'memory' as const;
  private readonly analyses = new Map<string, StoredAnalysis>();

  async save(analysis: NewAnalysis): Promise<StoredAnalysis> {
    const stored: StoredAnalysis = { ...analysis, id: uuidv4(), createdAt: new Date().toISOString() };
    this.analyses.set(stored.id, stored);
    return stored;
  }

  async get(id: string): Promise<StoredAnalysis | null> {
    return this.analyses.get(id) ?? null;
  }

  async list(): Promise<AnalysisListItem[]> {
    // newest first, same as the SQL ordering
    return Array.from(this.analyses.values()).reverse().map(toListItem);
  }

  async delete(id: string): Promise<boolean> {
    return this.analyses.delete(id);
  }

  async healthy(): Promise<boolean> {
    return true;
  }
}

// ============================================================================
// PostgreSQL
// ============================================================================

// type aliases, so the rows satisfy pg's QueryResultRow index signature
type AnalysisRow = {
  id: string;
  file_name: string;
  process_name: string;
  summary: BpelSummary;
  prd: string;
  completeness: CompletenessReport;
  created_at: Date;
};

type ListRow = {
  id: string;
  file_name: string;
  process_name: string;
  gap_count: number;
  created_at: Date;
};

export class PgAnalysisRepository implements AnalysisRepository {
  readonly kind = 'postgres' as const;

  constructor(private readonly pool: Pool) {}

  static fromUrl(connectionString: string): PgAnalysisRepository {
    return new PgAnalysisRepository(new Pool({ connectionString }));
  }

  async save(analysis: NewAnalysis): Promise<StoredAnalysis> {
    const id = uuidv4();
    const result = await this.pool.query<AnalysisRow>(
      `INSERT INTO bpel_analyses (id, file_name, process_name, summary, prd, completeness, gap_count)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING id, file_name, process_name, summary, prd, completeness, created_at`,
      [
        id,
        analysis.fileName,
        analysis.processName,
        JSON.stringify(analysis.summary),
        analysis.prd,
        JSON.stringify(analysis.completeness),
        analysis.summary.gaps.length,
      ]
    );
    return this.fromRow(result.rows[0]);
  }

  // ids are a uuid column; anything else can only be "not found"
  async get(id: string): Promise<StoredAnalysis | null> {
    if (!isUuid(id)) return null;
    const result = await this.pool.query<AnalysisRow>(
      'SELECT id, file_name, process_name, summary, prd, completeness, created_at FROM bpel_analyses WHERE id = $1',
      [id]
    );
    if (result.rows.length === 0) return null;
    return this.fromRow(result.rows[0]);
  }

  async list(): Promise<AnalysisListItem[]> {
    const result = await this.pool.query<ListRow>(
      'SELECT id, file_name, process_name, gap_count, created_at FROM bpel_analyses ORDER BY created_at DESC'
    );
    return result.rows.map(row => ({
      id: row.id,
      fileName: row.file_name,
      processName: row.process_name,
      gapCount: row.gap_count,
      createdAt: row.created_at.toISOString(),
    }));
  }

  async delete(id: string): Promise<boolean> {
    if (!isUuid(id)) return false;
    const result = await this.pool.query('DELETE FROM bpel_analyses WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async healthy(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  private fromRow(row: AnalysisRow): StoredAnalysis {
    return {
      id: row.id,
      fileName: row.file_name,
      processName: row.process_name,
      summary: row.summary,
      prd: row.prd,
      completeness: row.completeness,
      createdAt: row.created_at.toISOString(),
    };
  }
}

export function createRepository(databaseUrl: string): AnalysisRepository {
  return databaseUrl ? PgAnalysisRepository.fromUrl(databaseUrl) : new InMemoryAnalysisRepository();
}
