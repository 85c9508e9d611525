import { GoogleGenAI, Type, type Schema } from '@google/genai';
import { z } from 'zod';
import {
  ServiceUnavailableError,
  VisionRequestError,
  VisionResponseError,
} from '../errors';
import type { TokenUsage } from '../types/extraction';
import { withRetry } from '../utils/retry';
import type { LoadedDocument } from './documentService';
import { rawPageSchema, reportedTotalSchema, type RawPage } from './lineItemParser';

export interface VisionServiceOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

export interface VisionExtraction {
  pages: RawPage[];
  /** Grand total printed on the document, in major units. */
  reportedTotal: number | null;
  tokenUsage: TokenUsage;
}

export const EXTRACTION_PROMPT = `You are an expert at extracting line items from medical bills, invoices and receipts, including handwritten entries, mixed layouts and poor image quality.

TASK: Extract EVERY line item from every page of this document.

RULES:
1. Look for rows of the form Item Name | Qty | Rate | Amount, even when columns are misaligned or handwritten.
2. Extract ALL line items, including handwritten ones. Do not skip any.
3. EXCLUDE totals and subtotals such as "Total", "Sub Total", "Grand Total", "Net Amount", "Amount Payable", "Balance Due".
4. EXCLUDE headers, category names and section titles.
5. item_amount is the net amount of the row after discounts.
6. If the quantity or rate column is missing for a row, return null for it. Never invent a value.
7. raw_text is the row exactly as printed, with columns separated by " | ".
8. page_type is one of "Bill Detail", "Final Bill", "Pharmacy".
9. reported_total is the grand total printed on the document, or null when none is printed.

Return ONLY JSON matching the response schema.`;

const billItemSchema: Schema = {
  type: Type.OBJECT,
  properties: {
    item_name: { type: Type.STRING, description: 'Exactly as written on the bill' },
    item_quantity: { type: Type.NUMBER, nullable: true },
    item_rate: { type: Type.NUMBER, nullable: true },
    item_amount: { type: Type.NUMBER, description: 'Net amount of the row after discounts' },
    raw_text: { type: Type.STRING, description: 'The row as printed, columns joined by " | "' },
  },
  required: ['item_name', 'item_amount'],
};

export const responseSchema: Schema = {
  type: Type.OBJECT,
  properties: {
    pages: {
      type: Type.ARRAY,
      items: {
        type: Type.OBJECT,
        properties: {
          page_no: { type: Type.STRING },
          page_type: { type: Type.STRING, enum: ['Bill Detail', 'Final Bill', 'Pharmacy'] },
          bill_items: { type: Type.ARRAY, items: billItemSchema },
        },
        required: ['page_no', 'page_type', 'bill_items'],
      },
    },
    reported_total: { type: Type.NUMBER, nullable: true },
  },
  required: ['pages'],
};

const visionReplySchema = z.object({
  pages: z.array(rawPageSchema),
  reported_total: reportedTotalSchema,
});

const singlePageReplySchema = rawPageSchema.extend({
  reported_total: reportedTotalSchema,
});

const tryParseJson = (text: string): { value: unknown } | null => {
  try {
    return { value: JSON.parse(text) };
  } catch (error) {
    if (error instanceof SyntaxError) return null;
    throw error;
  }
};

/** Parses the reply, falling back to the outermost `{...}` when the model wraps JSON in prose. */
export const parseModelJson = (text: string): unknown => {
  const direct = tryParseJson(text);
  if (direct) return direct.value;

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  const embedded = start >= 0 && end > start ? tryParseJson(text.slice(start, end + 1)) : null;
  if (embedded) {
    console.info('[Vision] Extracted JSON from surrounding text', { start, end });
    return embedded.value;
  }

  throw new VisionResponseError('Vision model reply is not valid JSON');
};

export const parseVisionReply = (text: string): Omit<VisionExtraction, 'tokenUsage'> => {
  const json = parseModelJson(text);

  const multiPage = visionReplySchema.safeParse(json);
  if (multiPage.success) {
    return { pages: multiPage.data.pages, reportedTotal: multiPage.data.reported_total ?? null };
  }

  const singlePage = singlePageReplySchema.safeParse(json);
  if (singlePage.success) {
    const { reported_total: reportedTotal, ...page } = singlePage.data;
    return { pages: [page], reportedTotal: reportedTotal ?? null };
  }

  throw new VisionResponseError(
    `Vision model reply does not match the expected shape: ${multiPage.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'} ${issue.message}`)
      .join('; ')}`
  );
};

const PERMANENT_STATUSES = new Set([400, 401, 403, 404, 429]);

export const upstreamStatus = (error: unknown): number | null => {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    if (typeof status === 'number') return status;
  }
  return null;
};

export const isRetryableVisionError = (error: unknown): boolean => {
  if (error instanceof VisionResponseError) return false;
  const status = upstreamStatus(error);
  if (status === null) return true;
  if (PERMANENT_STATUSES.has(status)) return false;
  return status === 408 || status >= 500;
};

const toVisionRequestError = (error: unknown): VisionRequestError => {
  const status = upstreamStatus(error);
  const reason = error instanceof Error ? error.message : String(error);
  const kind =
    status === 401 || status === 403
      ? 'authentication failed'
      : status === 429
        ? 'quota exceeded'
        : 'request failed';
  return new VisionRequestError(
    `Vision model ${kind}${status ? ` (HTTP ${status})` : ''}: ${reason}`,
    status,
    isRetryableVisionError(error)
  );
};

export const emptyTokenUsage = (): TokenUsage => ({
  total_tokens: 0,
  input_tokens: 0,
  output_tokens: 0,
});

export const createVisionService = (options: VisionServiceOptions) => {
  let client: GoogleGenAI | null = null;

  const getClient = () => {
    if (!options.apiKey) {
      throw new ServiceUnavailableError('Extractor not initialized: GOOGLE_API_KEY is not set');
    }
    client ??= new GoogleGenAI({ apiKey: options.apiKey });
    return client;
  };

  const extractPages = async (document: LoadedDocument): Promise<VisionExtraction> => {
    const ai = getClient();

    const response = await withRetry(
      () =>
        ai.models.generateContent({
          model: options.model,
          contents: [
            {
              role: 'user',
              parts: [
                { inlineData: { data: document.data.toString('base64'), mimeType: document.mimeType } },
                { text: EXTRACTION_PROMPT },
              ],
            },
          ],
          config: {
            responseMimeType: 'application/json',
            responseSchema,
            temperature: 0,
            httpOptions: { timeout: options.timeoutMs },
          },
        }),
      {
        retries: options.maxRetries,
        baseDelayMs: options.retryDelayMs,
        shouldRetry: isRetryableVisionError,
        onRetry: (error, attempt, delayMs) => {
          console.warn('[Vision] Transient failure, retrying', {
            source: document.source,
            attempt,
            delayMs,
            error: error instanceof Error ? error.message : error,
          });
        },
      }
    ).catch((error: unknown) => {
      throw toVisionRequestError(error);
    });

    const text = response.text;
    if (!text) {
      throw new VisionResponseError('Vision model returned an empty reply');
    }

    const reply = parseVisionReply(text);
    const usage = response.usageMetadata;
    const tokenUsage: TokenUsage = {
      input_tokens: usage?.promptTokenCount ?? 0,
      output_tokens: usage?.candidatesTokenCount ?? 0,
      total_tokens: usage?.totalTokenCount ?? 0,
    };

    console.info('[Vision] Reply parsed', {
      source: document.source,
      pageCount: reply.pages.length,
      itemCount: reply.pages.reduce((sum, page) => sum + page.bill_items.length, 0),
      totalTokens: tokenUsage.total_tokens,
    });

    return { ...reply, tokenUsage };
  };

  return { extractPages };
};

export type VisionService = ReturnType<typeof createVisionService>;
