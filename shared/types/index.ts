// =============================================================================
// BPEL PRD Platform - Shared Type Definitions
// =============================================================================

// -----------------------------------------------------------------------------
// Common Types
// -----------------------------------------------------------------------------

export interface ApiResponse<T> {
  data: T;
}

export interface ApiError {
  error: string;
  message: string;
  code?: string;
  details?: Record<string, unknown>;
}

export interface HealthStatus {
  status: 'ok' | 'unhealthy';
  service: string;
  storage: 'postgres' | 'memory';
  /** Registered AI prompts and their versions */
  prompts: Array<{ id: string; version: string }>;
  timestamp: string;
}

// -----------------------------------------------------------------------------
// Analysis Types
// -----------------------------------------------------------------------------

export interface AnalysisListItem {
  id: string;
  fileName: string;
  processName: string;
  gapCount: number;
  createdAt: string;
}
