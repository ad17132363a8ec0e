/**
 * Completeness Checks
 *
 * Deterministic checks that a PRD accounts for everything the summary holds.
 * Works on any markdown text, so a PRD edited by hand can be checked against
 * the summary it was generated from.
 */

import { BpelSummary } from '../types/summary';
import { unique } from '../../../../shared/utils';

export const PRD_SECTIONS = [
  '## 1. Overview',
  '## 2. Interfaces & Partner Links',
  '## 3. Data Model',
  '## 4. Process Flow',
  '## 5. Business Rules & Decisions',
  '## 6. Loops',
  '## 7. Data Mappings',
  '## 8. Error Handling',
  '## 9. Compensation',
  '## 10. Correlation',
  '## 11. Human Tasks',
  '## 12. Timers & Events',
  '## 13. Concurrency',
  '## 14. Vendor Extensions',
  '## 15. Gaps & Assumptions',
] as const;

export interface CompletenessCheck {
  name: string;
  description: string;
  total: number;
  passed: boolean;
  missing: string[];
}

export interface CompletenessReport {
  passed: boolean;
  checks: CompletenessCheck[];
}

function check(name: string, description: string, expected: string[], prd: string): CompletenessCheck {
  const items = unique(expected);
  const missing = items.filter(item => !prd.includes(item));
  return { name, description, total: items.length, passed: missing.length === 0, missing };
}

export function checkCompleteness(summary: BpelSummary, prd: string): CompletenessReport {
  const checks = [
    check('sections', 'All PRD sections present', [...PRD_SECTIONS], prd),
    check('variables', 'Every variable documented', summary.variables.map(v => v.name), prd),
    check('partner-links', 'Every partner link documented', summary.partnerLinks.map(p => p.name), prd),
    check(
      'activities',
      'Every named activity appears in the flow',
      summary.activities.flatMap(a => (a.name ? [a.name] : [])),
      prd
    ),
    check('expressions', 'Every expression reproduced verbatim', summary.expressions.map(e => e.text), prd),
    check('gaps', 'Every gap listed in the gap table', summary.gaps.map(g => g.id), prd),
  ];

  return { passed: checks.every(c => c.passed), checks };
}
