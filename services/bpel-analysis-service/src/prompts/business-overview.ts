/**
 * Prompt: Business Overview
 *
 * Drafts the plain-language overview of a process from its extracted summary.
 * The model sees the summary only, never the BPEL source, and must not add
 * behaviour the summary does not contain.
 */

import { z } from 'zod';
import { registerPrompt } from './index';
import { BpelSummary } from '../types/summary';

// ============================================================================
// Input / Output
// ============================================================================

export interface BusinessOverviewInput {
  summary: BpelSummary;
}

export const BusinessOverviewSchema = z.object({
  overview: z.string().min(1),
  businessPurpose: z.string().min(1),
  openQuestions: z.array(z.string()),
});
export type BusinessOverview = z.infer<typeof BusinessOverviewSchema>;

// ============================================================================
// Prompt Definition
// ============================================================================

const SYSTEM_PROMPT = `You are a business analyst documenting an Oracle BPEL process for a team that will re-implement it.

You receive a structured summary extracted from the BPEL source. Write for business stakeholders, not developers.

## Rules
- Describe only behaviour present in the summary. Do not guess at business logic.
- When the purpose of a step is unclear, say so and add an open question instead of inventing an explanation.
- Refer to partner links, operations and variables by their exact names.
- Keep the overview under 250 words.

## JSON Output Format
{
  "overview": "What the process does, step by step, in plain language",
  "businessPurpose": "One or two sentences on why the process exists",
  "openQuestions": ["Question for the business owner"]
}

Respond with the JSON object only.`;

function buildUserMessage({ summary }: BusinessOverviewInput): string {
  const sections = [
    `Process: ${summary.process.name} (BPEL ${summary.process.bpelVersion})`,
    summary.process.documentation ? `Documentation: ${summary.process.documentation}` : undefined,
    'Partner links:',
    ...summary.partnerLinks.map(
      p => `- ${p.name} (${p.direction}): ${p.operations.map(o => `${o.operation} [${o.style}]`).join(', ') || 'no operations used'}`
    ),
    'Activities (document order):',
    ...summary.activities
      .filter(a => a.context === 'main')
      .map(a => `${'  '.repeat(a.depth)}- ${a.kind}${a.name ? ` "${a.name}"` : ''}${a.operation ? ` ${a.partnerLink ?? '?'}.${a.operation}` : ''}`),
    'Decisions:',
    ...summary.decisions.flatMap(d => d.branches.map(b => `- ${d.kind}/${b.label}: ${b.condition ?? b.trigger ?? 'default'}`)),
    'Known gaps:',
    ...summary.gaps.map(g => `- ${g.id} [${g.category}] ${g.description}`),
  ];
  return sections.filter((line): line is string => line !== undefined).join('\n');
}

export const businessOverviewPrompt = registerPrompt<BusinessOverviewInput, BusinessOverview>({
  id: 'business-overview',
  version: '1.0.0',
  description: 'Plain-language overview of a BPEL process for the PRD',
  systemPrompt: SYSTEM_PROMPT,
  buildUserMessage,
  outputSchema: BusinessOverviewSchema,
  modelPreferences: {
    temperature: 0.2,
    maxTokens: 2048,
  },
});
