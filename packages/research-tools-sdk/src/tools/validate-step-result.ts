import type { QueryRow } from '@deep-research/domain/entities';

export type StepValidation = {
  passed: boolean;
  feedback: string;
};

// "count" but not "country"
const COUNT_LIKE_KEY = /count(?!ry)/i;

export const hasCountLikeKey = (row: QueryRow): boolean =>
  Object.keys(row).some((key) => COUNT_LIKE_KEY.test(key));

/**
 * Checks a result's shape against the step's free-text hint. Only the
 * substrings "count" and "list" carry meaning.
 */
export function validateStepResult(
  validationHint: string,
  rows: QueryRow[],
): StepValidation {
  const hint = validationHint.toLowerCase();

  if (hint.includes('count')) {
    const [first] = rows;
    if (rows.length === 1 && first !== undefined && hasCountLikeKey(first)) {
      return { passed: true, feedback: 'Count query successful' };
    }
    return {
      passed: false,
      feedback: `Expected a single row with a count column, got ${rows.length} rows`,
    };
  }

  if (hint.includes('list')) {
    if (rows.length > 0) {
      return {
        passed: true,
        feedback: `List query returned ${rows.length} items`,
      };
    }
    return { passed: false, feedback: 'Expected non-empty list result' };
  }

  return { passed: true, feedback: 'Query executed successfully' };
}
