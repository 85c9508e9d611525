import { env } from '../config/env';
import type {
  BillExtractionResult,
  ReconciledLineItem,
  ReconciliationOptions,
} from '../types/bill';
import type {
  BillItemView,
  ExtractionDataView,
  ExtractionResponse,
  TokenUsage,
} from '../types/extraction';
import { nullableMajorUnits, toMajorUnits, toMinorUnits } from '../utils/money';
import { preprocessForHandwriting, type LoadedDocument } from './documentService';
import { saveExtraction } from './extractionRecordService';
import { parseRawPage, type RawPage } from './lineItemParser';
import { extractAndReconcile } from './reconciliationService';
import { createVisionService, emptyTokenUsage } from './visionService';

export const reconciliationOptions: ReconciliationOptions = {
  similarityThreshold: env.fuzzyMatchThreshold,
  amountEpsilon: env.amountEpsilon,
};

const visionService = createVisionService({
  apiKey: env.googleApiKey,
  model: env.geminiModel,
  timeoutMs: env.requestTimeoutMs,
  maxRetries: env.visionMaxRetries,
  retryDelayMs: env.visionRetryDelayMs,
});

const renderItem = (item: ReconciledLineItem): BillItemView => ({
  item_name: item.description,
  item_quantity: item.quantity,
  item_rate: nullableMajorUnits(item.unit_price),
  item_amount: nullableMajorUnits(item.line_total),
  raw_text: item.raw_text,
  is_duplicate: item.is_duplicate,
  duplicate_of: item.duplicate_of,
  validation_error: item.validation_error,
  line_total_mismatch: item.line_total_mismatch,
});

export const renderExtractionData = (result: BillExtractionResult): ExtractionDataView => ({
  pagewise_line_items: result.pages.map((page) => ({
    page_no: page.page_no,
    page_type: page.page_type,
    bill_items: page.items.map(renderItem),
  })),
  total_item_count: result.total_item_count,
  deduplicated_item_count: result.deduplicated_item_count,
  computed_grand_total: toMajorUnits(result.computed_grand_total),
  reported_grand_total: nullableMajorUnits(result.reported_grand_total),
  duplicate_groups: result.duplicate_groups.map((group) => ({ ...group })),
  quality: { ...result.quality },
  reconciliation: {
    verdict: result.reconciliation.verdict,
    difference: nullableMajorUnits(result.reconciliation.difference),
  },
});

/**
 * Runs the reconciliation engine over pages in the model's reply shape.
 * `reportedTotal` is in major units.
 */
export const reconcileRawPages = (
  pages: RawPage[],
  reportedTotal: number | null,
  options: ReconciliationOptions = reconciliationOptions
): BillExtractionResult =>
  extractAndReconcile(
    pages.map((page, pageIndex) => parseRawPage(page, pageIndex)),
    reportedTotal === null ? null : toMinorUnits(reportedTotal),
    options
  );

const addTokenUsage = (a: TokenUsage, b: TokenUsage): TokenUsage => ({
  total_tokens: a.total_tokens + b.total_tokens,
  input_tokens: a.input_tokens + b.input_tokens,
  output_tokens: a.output_tokens + b.output_tokens,
});

export interface ExtractBillInput {
  documents: LoadedDocument[];
  /** Overrides the total printed on the document, in major units. */
  reportedTotal?: number | null;
}

export const extractBillData = async ({
  documents,
  reportedTotal,
}: ExtractBillInput): Promise<ExtractionResponse> => {
  const pages: RawPage[] = [];
  let tokenUsage = emptyTokenUsage();
  let printedTotal: number | null = null;

  // Pages are numbered across documents in upload order.
  for (const document of documents) {
    const prepared = env.preprocessImages ? await preprocessForHandwriting(document) : document;
    const extraction = await visionService.extractPages(prepared);
    const offset = pages.length;
    pages.push(
      ...extraction.pages.map((page, index) => ({
        page_no: String(offset + index + 1),
        page_type: page.page_type,
        bill_items: page.bill_items,
      }))
    );
    tokenUsage = addTokenUsage(tokenUsage, extraction.tokenUsage);
    printedTotal = extraction.reportedTotal ?? printedTotal;
  }

  const result = reconcileRawPages(pages, reportedTotal ?? printedTotal);
  const data = renderExtractionData(result);
  const source = documents.map((document) => document.source).join(', ');
  const extractionId = saveExtraction({ source, result, data, tokenUsage });

  console.info('[Extract] Extraction reconciled', {
    extractionId,
    pageCount: result.pages.length,
    totalItems: result.total_item_count,
    duplicates: result.total_item_count - result.deduplicated_item_count,
    verdict: result.reconciliation.verdict,
  });

  return {
    is_success: true,
    extraction_id: extractionId,
    token_usage: tokenUsage,
    data,
  };
};
