import type { DuplicateGroup, ExtractionQuality, PageType, Verdict } from './bill';

export interface TokenUsage {
  total_tokens: number;
  input_tokens: number;
  output_tokens: number;
}

/** Line item as rendered in responses, amounts in major units. */
export interface BillItemView {
  item_name: string | null;
  item_quantity: number | null;
  item_rate: number | null;
  item_amount: number | null;
  raw_text: string;
  is_duplicate: boolean;
  duplicate_of: number | null;
  validation_error: string | null;
  line_total_mismatch: boolean;
}

export interface PageLineItemsView {
  page_no: string;
  page_type: PageType;
  bill_items: BillItemView[];
}

export interface ExtractionDataView {
  pagewise_line_items: PageLineItemsView[];
  total_item_count: number;
  deduplicated_item_count: number;
  computed_grand_total: number;
  reported_grand_total: number | null;
  duplicate_groups: DuplicateGroup[];
  quality: ExtractionQuality;
  reconciliation: {
    verdict: Verdict;
    difference: number | null;
  };
}

export interface ExtractionResponse {
  is_success: true;
  extraction_id: number;
  token_usage: TokenUsage;
  data: ExtractionDataView;
}

export interface ErrorResponse {
  is_success: false;
  error: string;
  data: null;
  conflicting_indices?: number[];
}
