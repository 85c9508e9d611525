import { Router, type Request } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { env } from '../config/env';
import { NotFoundError } from '../errors';
import {
  loadDocument,
  loadUploadedDocument,
  type LoadedDocument,
} from '../services/documentService';
import {
  getExtractionById,
  getExtractionLineItems,
} from '../services/extractionRecordService';
import {
  extractBillData,
  reconcileRawPages,
  renderExtractionData,
} from '../services/extractionService';
import { amountSchema, rawPageSchema, reportedTotalSchema } from '../services/lineItemParser';

const MAX_UPLOAD_FILES = 10;

const router = Router();
const upload = multer({
  dest: env.uploadDir,
  limits: { fileSize: env.maxDocumentSize, files: MAX_UPLOAD_FILES },
});

const extractionIdParamSchema = z.object({
  extractionId: z.coerce.number().int().positive(),
});

const documentRequestSchema = z.object({
  document: z
    .string({ required_error: "Missing 'document' field" })
    .trim()
    .min(1, 'Document URL/data cannot be empty'),
  reported_total: reportedTotalSchema,
});

// multipart fields arrive as strings; a blank field means no total was given
const uploadRequestSchema = z.object({
  reported_total: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce.number().pipe(amountSchema).optional()
  ),
});

const reconcileRequestSchema = z.object({
  pages: z.array(rawPageSchema).min(1),
  reported_total: reportedTotalSchema,
});

const uploadedFiles = (req: Request): Express.Multer.File[] =>
  Array.isArray(req.files) ? req.files : [];

const documentOptions = {
  timeoutMs: env.requestTimeoutMs,
  maxBytes: env.maxDocumentSize,
};

router.post('/extract-bill-data', upload.array('files', MAX_UPLOAD_FILES), async (req, res, next) => {
  try {
    const files = uploadedFiles(req);
    let documents: LoadedDocument[];
    let reportedTotal: number | null | undefined;

    if (files.length) {
      // every upload is read (and removed from disk) before any failure is reported
      const loaded = await Promise.allSettled(
        files.map((file) => loadUploadedDocument(file, documentOptions.maxBytes))
      );
      documents = [];
      for (const outcome of loaded) {
        if (outcome.status === 'rejected') throw outcome.reason;
        documents.push(outcome.value);
      }
      reportedTotal = uploadRequestSchema.parse(req.body ?? {}).reported_total;
    } else {
      const body = documentRequestSchema.parse(req.body ?? {});
      reportedTotal = body.reported_total;
      documents = [await loadDocument(body.document, documentOptions)];
    }

    console.info('[Extract] Processing', {
      documents: documents.map((document) => document.source),
    });

    const response = await extractBillData({ documents, reportedTotal });
    res.json(response);
  } catch (error) {
    next(error);
  }
});

router.post('/reconcile', (req, res, next) => {
  try {
    const body = reconcileRequestSchema.parse(req.body ?? {});
    const result = reconcileRawPages(body.pages, body.reported_total ?? null);
    res.json({ is_success: true, data: renderExtractionData(result) });
  } catch (error) {
    next(error);
  }
});

router.get('/extractions/:extractionId', (req, res, next) => {
  try {
    const { extractionId } = extractionIdParamSchema.parse(req.params);
    const extraction = getExtractionById(extractionId);
    if (!extraction) {
      throw new NotFoundError('Extraction not found');
    }
    res.json(extraction);
  } catch (error) {
    next(error);
  }
});

router.get('/extractions/:extractionId/line-items', (req, res, next) => {
  try {
    const { extractionId } = extractionIdParamSchema.parse(req.params);
    const lineItems = getExtractionLineItems(extractionId);
    if (!lineItems) {
      throw new NotFoundError('Extraction not found');
    }
    res.json({ extraction_id: extractionId, line_items: lineItems });
  } catch (error) {
    next(error);
  }
});

export default router;
