export type PageType = 'Bill Detail' | 'Final Bill' | 'Pharmacy' | 'Unknown';

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/**
 * One billed charge as it enters the reconciliation engine.
 * Money fields are integer currency minor units.
 */
export interface LineItem {
  description: string;
  quantity: number;
  unit_price: number;
  line_total: number;
  page_index: number;
  item_index: number;
  raw_text: string;
}

export type PartialLineItem = Pick<LineItem, 'page_index' | 'item_index' | 'raw_text'> & {
  description: string | null;
  quantity: number | null;
  unit_price: number | null;
  line_total: number | null;
};

export interface LineItemValidationFailure {
  message: string;
  issues: string[];
  item: PartialLineItem;
}

export type LineItemResult = Result<LineItem, LineItemValidationFailure>;

export interface PageExtraction {
  page_no: string;
  page_type: PageType;
  items: LineItemResult[];
}

export interface DuplicateGroup {
  item_indices: number[];
  canonical_index: number;
  duplicate_indices: number[];
}

export type Verdict = 'MATCH' | 'MISMATCH' | 'UNVERIFIABLE';

export interface ReconciliationVerdict {
  verdict: Verdict;
  computed_total: number;
  reported_total: number | null;
  difference: number | null;
}

export interface ReconciledLineItem extends PartialLineItem {
  is_duplicate: boolean;
  duplicate_of: number | null;
  validation_error: string | null;
  line_total_mismatch: boolean;
  expected_line_total: number | null;
}

export interface ReconciledPage {
  page_no: string;
  page_type: PageType;
  items: ReconciledLineItem[];
}

export interface ExtractionQuality {
  valid_item_count: number;
  invalid_item_count: number;
  line_total_mismatch_count: number;
}

export interface BillExtractionResult {
  readonly pages: ReadonlyArray<ReconciledPage>;
  readonly total_item_count: number;
  readonly deduplicated_item_count: number;
  readonly computed_grand_total: number;
  readonly reported_grand_total: number | null;
  readonly duplicate_groups: ReadonlyArray<DuplicateGroup>;
  readonly reconciliation: ReconciliationVerdict;
  readonly quality: ExtractionQuality;
}

export interface ReconciliationOptions {
  /** Minimum description similarity (0..1) for two items to be duplicate candidates. */
  similarityThreshold: number;
  /** Tolerance in minor units for amount comparisons. */
  amountEpsilon: number;
}
