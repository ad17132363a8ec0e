// =============================================================================
// BPEL Analysis Service Configuration
// =============================================================================

export const config = {
  // Server
  port: parseInt(process.env.PORT || '3010', 10),
  serviceName: 'bpel-analysis-service',

  // Database (in-memory storage when unset)
  databaseUrl: process.env.DATABASE_URL || '',

  // AI overview
  anthropicApiKey: process.env.ANTHROPIC_API_KEY || '',
  aiModel: process.env.AI_MODEL || 'claude-sonnet-4-20250514',

  // Request limits
  limits: {
    maxBpelBytes: parseInt(process.env.MAX_BPEL_BYTES || String(5 * 1024 * 1024), 10),
    maxInterfaceBytes: parseInt(process.env.MAX_INTERFACE_BYTES || String(2 * 1024 * 1024), 10),
    maxInterfaceFiles: 50,
  },
};
