import { z } from 'zod';
import type {
  LineItemResult,
  PageExtraction,
  PageType,
  PartialLineItem,
} from '../types/bill';
import { isRepresentableAmount, toMinorUnits } from '../utils/money';

const PAGE_TYPES: readonly PageType[] = ['Bill Detail', 'Final Bill', 'Pharmacy', 'Unknown'];

export const rawPageSchema = z.object({
  /** Explicit page position; re-scans of one page share it. Defaults to the page's order. */
  page_index: z.number().int().nonnegative().optional(),
  page_no: z.union([z.string(), z.number()]).optional(),
  page_type: z.string().optional(),
  bill_items: z.array(z.unknown()),
});

export type RawPage = z.infer<typeof rawPageSchema>;

/** An amount in major units that converts to safe integer minor units. */
export const amountSchema = z.number().finite().refine(isRepresentableAmount, 'is out of range');

/** A grand total; null when none is printed. */
export const reportedTotalSchema = amountSchema.nullable().optional();

const recordSchema = z.record(z.string(), z.unknown());
const descriptionSchema = z.string().trim().min(1);
const numericSchema = z.number().finite();

const FIELD_ALIASES = {
  description: ['item_name', 'description'],
  quantity: ['item_quantity', 'quantity'],
  unit_price: ['item_rate', 'unit_price'],
  line_total: ['item_amount', 'line_total'],
} as const;

type FieldName = keyof typeof FIELD_ALIASES;

const readField = (record: Record<string, unknown>, field: FieldName): unknown => {
  for (const alias of FIELD_ALIASES[field]) {
    const value = record[alias];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
};

const readNumber = (
  record: Record<string, unknown>,
  field: FieldName,
  issues: string[]
): number | null => {
  const value = readField(record, field);
  if (value === undefined) {
    issues.push(`missing ${field}`);
    return null;
  }
  const parsed = numericSchema.safeParse(value);
  if (!parsed.success) {
    issues.push(`${field} must be a finite number`);
    return null;
  }
  return parsed.data;
};

const readAmount = (
  record: Record<string, unknown>,
  field: FieldName,
  issues: string[]
): number | null => {
  const value = readNumber(record, field, issues);
  if (value === null) return null;
  if (!isRepresentableAmount(value)) {
    issues.push(`${field} is out of range`);
    return null;
  }
  return toMinorUnits(value);
};

const readRawText = (record: Record<string, unknown>): string => {
  const value = record.raw_text;
  return typeof value === 'string' ? value : '';
};

/**
 * Validates one record of the model's reply. Values are never coerced:
 * a numeric string is reported as an issue rather than parsed.
 */
export const parseRawLineItem = (
  raw: unknown,
  pageIndex: number,
  itemIndex: number
): LineItemResult => {
  const record = recordSchema.safeParse(raw);
  if (!record.success) {
    const item: PartialLineItem = {
      description: null,
      quantity: null,
      unit_price: null,
      line_total: null,
      page_index: pageIndex,
      item_index: itemIndex,
      raw_text: '',
    };
    return {
      ok: false,
      error: { message: 'line item is not an object', issues: ['line item is not an object'], item },
    };
  }

  const fields = record.data;
  const issues: string[] = [];

  const description = descriptionSchema.safeParse(readField(fields, 'description'));
  if (!description.success) {
    issues.push('missing description');
  }
  const quantity = readNumber(fields, 'quantity', issues);
  const unitPrice = readAmount(fields, 'unit_price', issues);
  const lineTotal = readAmount(fields, 'line_total', issues);

  const item: PartialLineItem = {
    description: description.success ? description.data : null,
    quantity,
    unit_price: unitPrice,
    line_total: lineTotal,
    page_index: pageIndex,
    item_index: itemIndex,
    raw_text: readRawText(fields),
  };

  if (
    issues.length ||
    item.description === null ||
    item.quantity === null ||
    item.unit_price === null ||
    item.line_total === null
  ) {
    return { ok: false, error: { message: issues.join('; '), issues, item } };
  }

  return {
    ok: true,
    value: {
      description: item.description,
      quantity: item.quantity,
      unit_price: item.unit_price,
      line_total: item.line_total,
      page_index: pageIndex,
      item_index: itemIndex,
      raw_text: item.raw_text,
    },
  };
};

const toPageType = (value: string | undefined): PageType =>
  PAGE_TYPES.find((type) => type.toLowerCase() === value?.trim().toLowerCase()) ?? 'Unknown';

export const parseRawPage = (page: RawPage, position: number): PageExtraction => {
  const pageIndex = page.page_index ?? position;
  return {
    page_no: page.page_no === undefined ? String(pageIndex + 1) : String(page.page_no),
    page_type: toPageType(page.page_type),
    items: page.bill_items.map((raw, itemIndex) => parseRawLineItem(raw, pageIndex, itemIndex)),
  };
};
