import type {
  ColumnDataType,
  KeywordCategory,
  ColumnCategory,
} from '@deep-research/domain/entities';

/**
 * Keyword table behind column categorization. Shared by the schema analyzer
 * and the column matcher; entry order is the classification priority.
 */
export const CATEGORY_KEYWORDS: ReadonlyArray<
  readonly [KeywordCategory, readonly string[]]
> = [
  [
    'company',
    ['company', 'empresa', 'corporation', 'corp', 'manufacturer', 'applicant'],
  ],
  ['product', ['product', 'medicamento', 'drug', 'medicine', 'brand', 'trademark']],
  ['country', ['country', 'pais', 'nation', 'location']],
  ['approval', ['approval', 'approved', 'authorization', 'permit', 'license']],
  ['date', ['date', 'fecha', 'time', 'year', 'month']],
  ['status', ['status', 'estado', 'state', 'condition']],
];

export const keywordsFor = (category: KeywordCategory): readonly string[] =>
  CATEGORY_KEYWORDS.find(([name]) => name === category)?.[1] ?? [];

const containsKeyword = (name: string, keywords: readonly string[]) => {
  const lower = name.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword));
};

/**
 * Classifies a name by keyword substring. `null` when nothing matches.
 */
export function classifyName(name: string): KeywordCategory | null {
  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (containsKeyword(name, keywords)) {
      return category;
    }
  }
  return null;
}

/**
 * Same priority as `classifyName`, except that a datetime column lands in
 * `date` even without a date keyword (it is still outranked by the
 * categories listed before `date`).
 */
export function categorizeColumn(
  name: string,
  dataType: ColumnDataType,
): ColumnCategory {
  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (containsKeyword(name, keywords)) {
      return category;
    }
    if (category === 'date' && dataType === 'datetime') {
      return 'date';
    }
  }
  return 'other';
}
