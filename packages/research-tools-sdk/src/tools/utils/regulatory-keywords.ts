// Domain vocabulary that raises a section's relevance score.
export const REGULATORY_KEYWORDS: readonly string[] = [
  'clinical trial',
  'approval',
  'requirement',
  'timeline',
  'compliance',
  'safety',
  'regulation',
  'permission',
  'licence',
  'drug',
  'pharmaceutical',
];
