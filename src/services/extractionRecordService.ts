import { z } from 'zod';
import { db } from '../db/connection';
import type { BillExtractionResult } from '../types/bill';
import type { ExtractionDataView, ExtractionResponse, TokenUsage } from '../types/extraction';

interface ExtractionRow {
  id: number;
  source?: string;
  verdict: string;
  computed_total: number;
  reported_total: number | null;
  difference: number | null;
  total_item_count: number;
  deduplicated_item_count: number;
  token_usage_json?: string;
  response_json: string;
  created_at: string;
}

interface ExtractionLineItemRow {
  id: number;
  extraction_id: number;
  page_index: number;
  item_index: number;
  description: string | null;
  quantity: number | null;
  unit_price: number | null;
  line_total: number | null;
  flags?: string;
}

export interface StoredLineItem extends Omit<ExtractionLineItemRow, 'flags'> {
  flags?: unknown;
}

export interface ExtractionRecordInput {
  source: string;
  result: BillExtractionResult;
  data: ExtractionDataView;
  tokenUsage: TokenUsage;
}

const tokenUsageSchema = z.object({
  total_tokens: z.number(),
  input_tokens: z.number(),
  output_tokens: z.number(),
});

const insertExtraction = db.transaction((record: ExtractionRecordInput): number => {
  const { result } = record;
  const inserted = db
    .prepare(
      `INSERT INTO extractions (source, verdict, computed_total, reported_total, difference,
         total_item_count, deduplicated_item_count, token_usage_json, response_json)
       VALUES (@source, @verdict, @computedTotal, @reportedTotal, @difference,
         @totalItemCount, @deduplicatedItemCount, @tokenUsage, @response)`
    )
    .run({
      source: record.source,
      verdict: result.reconciliation.verdict,
      computedTotal: result.computed_grand_total,
      reportedTotal: result.reported_grand_total,
      difference: result.reconciliation.difference,
      totalItemCount: result.total_item_count,
      deduplicatedItemCount: result.deduplicated_item_count,
      tokenUsage: JSON.stringify(record.tokenUsage),
      response: JSON.stringify(record.data),
    });
  const extractionId = Number(inserted.lastInsertRowid);

  const insertLineItem = db.prepare(
    `INSERT INTO extraction_line_items (extraction_id, page_index, item_index, description,
       quantity, unit_price, line_total, flags)
     VALUES (@extractionId, @pageIndex, @itemIndex, @description, @quantity, @unitPrice,
       @lineTotal, @flags)`
  );

  result.pages.forEach((page) => {
    page.items.forEach((item) => {
      insertLineItem.run({
        extractionId,
        pageIndex: item.page_index,
        itemIndex: item.item_index,
        description: item.description,
        quantity: item.quantity,
        unitPrice: item.unit_price,
        lineTotal: item.line_total,
        flags: JSON.stringify({
          is_duplicate: item.is_duplicate,
          duplicate_of: item.duplicate_of,
          validation_error: item.validation_error,
          line_total_mismatch: item.line_total_mismatch,
          expected_line_total: item.expected_line_total,
        }),
      });
    });
  });

  return extractionId;
});

export const saveExtraction = (record: ExtractionRecordInput): number => insertExtraction(record);

export const getExtractionById = (extractionId: number): ExtractionResponse | null => {
  const row = db
    .prepare<[number], ExtractionRow>('SELECT * FROM extractions WHERE id = ?')
    .get(extractionId);
  if (!row) return null;

  const data: ExtractionDataView = JSON.parse(row.response_json);
  const tokenUsage = tokenUsageSchema.safeParse(
    row.token_usage_json ? JSON.parse(row.token_usage_json) : null
  );

  return {
    is_success: true,
    extraction_id: row.id,
    token_usage: tokenUsage.success
      ? tokenUsage.data
      : { total_tokens: 0, input_tokens: 0, output_tokens: 0 },
    data,
  };
};

export const getExtractionLineItems = (extractionId: number): StoredLineItem[] | null => {
  const exists = db
    .prepare<[number], { id: number }>('SELECT id FROM extractions WHERE id = ?')
    .get(extractionId);
  if (!exists) return null;

  const rows = db
    .prepare<[number], ExtractionLineItemRow>(
      'SELECT * FROM extraction_line_items WHERE extraction_id = ? ORDER BY page_index, item_index, id'
    )
    .all(extractionId);

  return rows.map((row) => ({
    ...row,
    flags: row.flags ? JSON.parse(row.flags) : undefined,
  }));
};
