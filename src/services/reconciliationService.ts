import { AmbiguousDuplicateError } from '../errors';
import type {
  BillExtractionResult,
  DuplicateGroup,
  LineItem,
  PageExtraction,
  ReconciledLineItem,
  ReconciliationOptions,
  ReconciliationVerdict,
} from '../types/bill';
import { descriptionSimilarity } from './textSimilarity';

export const DEFAULT_RECONCILIATION_OPTIONS: ReconciliationOptions = {
  similarityThreshold: 0.85,
  amountEpsilon: 1,
};

const COLUMN_SEPARATOR = /\s*\|\s*|\t|\s{2,}/;

/** Number of non-empty columns in an OCR row fragment. */
export const rawTextCompleteness = (rawText: string): number =>
  rawText.split(COLUMN_SEPARATOR).filter((field) => field.trim().length > 0).length;

export const isDuplicateCandidate = (
  a: LineItem,
  b: LineItem,
  options: ReconciliationOptions = DEFAULT_RECONCILIATION_OPTIONS
): boolean =>
  Math.abs(a.line_total - b.line_total) <= options.amountEpsilon &&
  descriptionSimilarity(a.description, b.description) >= options.similarityThreshold;

const compareCanonicalPreference = (a: LineItem, b: LineItem): number =>
  rawTextCompleteness(b.raw_text) - rawTextCompleteness(a.raw_text) ||
  a.page_index - b.page_index ||
  a.item_index - b.item_index;

const isIdentical = (a: LineItem, b: LineItem): boolean =>
  a.description === b.description &&
  a.quantity === b.quantity &&
  a.unit_price === b.unit_price &&
  a.line_total === b.line_total &&
  a.raw_text === b.raw_text;

const ambiguityBetween = (items: ReadonlyArray<LineItem>, canonical: number, candidate: number) =>
  compareCanonicalPreference(items[canonical], items[candidate]) === 0 &&
  !isIdentical(items[canonical], items[candidate]);

const ascending = (a: number, b: number) => a - b;

/**
 * Groups items that describe the same physical charge. Items are visited in
 * canonical-preference order and each joins the first group whose canonical
 * item it duplicates, so every member of a group is a candidate duplicate of
 * that group's canonical item. Each returned group holds at least two items.
 */
export const detectDuplicates = (
  items: ReadonlyArray<LineItem>,
  options: ReconciliationOptions = DEFAULT_RECONCILIATION_OPTIONS
): DuplicateGroup[] => {
  const ranked = items
    .map((_, index) => index)
    .sort((a, b) => compareCanonicalPreference(items[a], items[b]));

  // first member of each group is its canonical item
  const groups: number[][] = [];
  ranked.forEach((index) => {
    const group = groups.find(([canonical]) => isDuplicateCandidate(items[canonical], items[index], options));
    if (!group) {
      groups.push([index]);
      return;
    }
    const [canonical] = group;
    if (ambiguityBetween(items, canonical, index)) {
      throw new AmbiguousDuplicateError([canonical, index].sort(ascending));
    }
    group.push(index);
  });

  return groups
    .filter((members) => members.length > 1)
    .map(([canonical, ...duplicates]) => ({
      item_indices: [canonical, ...duplicates].sort(ascending),
      canonical_index: canonical,
      duplicate_indices: duplicates.sort(ascending),
    }))
    .sort((a, b) => a.canonical_index - b.canonical_index);
};

type TotalledItem = Pick<ReconciledLineItem, 'line_total'> &
  Partial<Pick<ReconciledLineItem, 'is_duplicate' | 'validation_error'>>;

export const reconcileTotal = (
  items: ReadonlyArray<TotalledItem>,
  reportedTotal?: number | null,
  options: ReconciliationOptions = DEFAULT_RECONCILIATION_OPTIONS
): ReconciliationVerdict => {
  const computedTotal = items.reduce(
    (sum, item) =>
      item.is_duplicate || item.validation_error || item.line_total === null
        ? sum
        : sum + item.line_total,
    0
  );

  if (reportedTotal === undefined || reportedTotal === null) {
    return {
      verdict: 'UNVERIFIABLE',
      computed_total: computedTotal,
      reported_total: null,
      difference: null,
    };
  }

  const difference = computedTotal - reportedTotal;
  return {
    verdict: Math.abs(difference) <= options.amountEpsilon ? 'MATCH' : 'MISMATCH',
    computed_total: computedTotal,
    reported_total: reportedTotal,
    difference,
  };
};

export const expectedLineTotal = (item: Pick<LineItem, 'quantity' | 'unit_price'>): number =>
  Math.round(item.quantity * item.unit_price);

// indices in errors raised over the valid items are reported as flat positions
const detectValidDuplicates = (
  validItems: ReadonlyArray<LineItem>,
  validPositions: ReadonlyArray<number>,
  options: ReconciliationOptions
): DuplicateGroup[] => {
  try {
    return detectDuplicates(validItems, options);
  } catch (error) {
    if (error instanceof AmbiguousDuplicateError) {
      throw new AmbiguousDuplicateError(error.conflictingIndices.map((index) => validPositions[index]));
    }
    throw error;
  }
};

export const extractAndReconcile = (
  pages: ReadonlyArray<PageExtraction>,
  reportedTotal?: number | null,
  options: ReconciliationOptions = DEFAULT_RECONCILIATION_OPTIONS
): BillExtractionResult => {
  const entries = pages.flatMap((page) => page.items);

  const validItems: LineItem[] = [];
  const validPositions: number[] = [];
  const reconciled: ReconciledLineItem[] = entries.map((entry, position) => {
    if (!entry.ok) {
      return {
        ...entry.error.item,
        is_duplicate: false,
        duplicate_of: null,
        validation_error: entry.error.message,
        line_total_mismatch: false,
        expected_line_total: null,
      };
    }

    validItems.push(entry.value);
    validPositions.push(position);
    const expected = expectedLineTotal(entry.value);
    return {
      ...entry.value,
      is_duplicate: false,
      duplicate_of: null,
      validation_error: null,
      line_total_mismatch: Math.abs(expected - entry.value.line_total) > options.amountEpsilon,
      expected_line_total: expected,
    };
  });

  const duplicateGroups = detectValidDuplicates(validItems, validPositions, options).map((group) => ({
    item_indices: group.item_indices.map((index) => validPositions[index]),
    canonical_index: validPositions[group.canonical_index],
    duplicate_indices: group.duplicate_indices.map((index) => validPositions[index]),
  }));

  duplicateGroups.forEach((group) => {
    group.duplicate_indices.forEach((position) => {
      reconciled[position].is_duplicate = true;
      reconciled[position].duplicate_of = group.canonical_index;
    });
  });

  const reconciliation = reconcileTotal(reconciled, reportedTotal, options);

  let cursor = 0;
  const reconciledPages = pages.map((page) => {
    const items = reconciled.slice(cursor, cursor + page.items.length);
    cursor += page.items.length;
    return { page_no: page.page_no, page_type: page.page_type, items };
  });

  const duplicateCount = reconciled.filter((item) => item.is_duplicate).length;
  const invalidCount = reconciled.filter((item) => item.validation_error !== null).length;

  return {
    pages: reconciledPages,
    total_item_count: reconciled.length,
    deduplicated_item_count: reconciled.length - duplicateCount,
    computed_grand_total: reconciliation.computed_total,
    reported_grand_total: reconciliation.reported_total,
    duplicate_groups: duplicateGroups,
    reconciliation,
    quality: {
      valid_item_count: reconciled.length - invalidCount,
      invalid_item_count: invalidCount,
      line_total_mismatch_count: reconciled.filter((item) => item.line_total_mismatch).length,
    },
  };
};
