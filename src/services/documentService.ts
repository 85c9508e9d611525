import axios from 'axios';
import fs from 'fs/promises';
import sharp from 'sharp';
import { DocumentError } from '../errors';

export type SupportedMimeType =
  | 'application/pdf'
  | 'image/png'
  | 'image/jpeg'
  | 'image/gif'
  | 'image/webp';

export interface LoadedDocument {
  data: Buffer;
  mimeType: SupportedMimeType;
  source: string;
}

export interface DocumentLoadOptions {
  timeoutMs: number;
  maxBytes: number;
}

export interface UploadedDocument {
  path: string;
  originalname: string;
}

const startsWith = (data: Buffer, signature: number[], offset = 0) =>
  data.length >= offset + signature.length &&
  signature.every((byte, index) => data[offset + index] === byte);

export const sniffMimeType = (data: Buffer): SupportedMimeType | null => {
  if (startsWith(data, [0x25, 0x50, 0x44, 0x46])) return 'application/pdf';
  if (startsWith(data, [0x89, 0x50, 0x4e, 0x47])) return 'image/png';
  if (startsWith(data, [0xff, 0xd8, 0xff])) return 'image/jpeg';
  if (startsWith(data, [0x47, 0x49, 0x46, 0x38])) return 'image/gif';
  if (startsWith(data, [0x52, 0x49, 0x46, 0x46]) && startsWith(data, [0x57, 0x45, 0x42, 0x50], 8)) {
    return 'image/webp';
  }
  return null;
};

const describeSource = (source: string) =>
  source.startsWith('data:') ? 'data URL' : source.slice(0, 80);

const toLoadedDocument = (data: Buffer, source: string, maxBytes: number): LoadedDocument => {
  if (!data.length) {
    throw new DocumentError(`Document from ${describeSource(source)} is empty`);
  }
  if (data.length > maxBytes) {
    throw new DocumentError(
      `Document is ${data.length} bytes, larger than the ${maxBytes} byte limit`,
      413
    );
  }
  const mimeType = sniffMimeType(data);
  if (!mimeType) {
    throw new DocumentError('Unsupported document format; expected PDF, PNG, JPEG, GIF or WEBP');
  }
  return { data, mimeType, source: describeSource(source) };
};

export const decodeDataUrl = (url: string): Buffer => {
  const separator = url.indexOf(',');
  if (separator < 0) {
    throw new DocumentError('Invalid data URL format: missing payload');
  }
  const header = url.slice(0, separator);
  if (!header.endsWith(';base64')) {
    throw new DocumentError('Invalid data URL format: only base64 payloads are supported');
  }
  return Buffer.from(url.slice(separator + 1), 'base64');
};

const fetchRemoteDocument = async (url: string, options: DocumentLoadOptions): Promise<Buffer> => {
  try {
    const response = await axios.get<ArrayBuffer>(url, {
      responseType: 'arraybuffer',
      timeout: options.timeoutMs,
      maxContentLength: options.maxBytes,
    });
    return Buffer.from(response.data);
  } catch (error) {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      throw new DocumentError(
        `Failed to fetch document${status ? ` (HTTP ${status})` : ''}: ${error.message}`
      );
    }
    throw error;
  }
};

export const loadDocument = async (
  source: string,
  options: DocumentLoadOptions
): Promise<LoadedDocument> => {
  const trimmed = source.trim();
  if (trimmed.startsWith('data:')) {
    return toLoadedDocument(decodeDataUrl(trimmed), trimmed, options.maxBytes);
  }
  if (/^https?:\/\//i.test(trimmed)) {
    return toLoadedDocument(await fetchRemoteDocument(trimmed, options), trimmed, options.maxBytes);
  }
  throw new DocumentError('Document must be an http(s) URL or a base64 data URL');
};

export const loadUploadedDocument = async (
  file: UploadedDocument,
  maxBytes: number
): Promise<LoadedDocument> => {
  try {
    const data = await fs.readFile(file.path);
    return toLoadedDocument(data, file.originalname, maxBytes);
  } finally {
    await fs.rm(file.path, { force: true });
  }
};

const MAX_IMAGE_DIMENSION = 4096;
const BINARY_THRESHOLD = 150;

/**
 * Prepares a page image for handwriting recognition: downscales pages larger
 * than 4096 px, then grayscale, contrast stretch, sharpen and binarise.
 * PDFs are sent as they are. An image sharp cannot decode is sent unchanged.
 */
export const preprocessForHandwriting = async (document: LoadedDocument): Promise<LoadedDocument> => {
  if (document.mimeType === 'application/pdf') return document;

  try {
    const image = sharp(document.data);
    const { width = 0, height = 0 } = await image.metadata();
    if (width > MAX_IMAGE_DIMENSION || height > MAX_IMAGE_DIMENSION) {
      image.resize({ width: MAX_IMAGE_DIMENSION, height: MAX_IMAGE_DIMENSION, fit: 'inside' });
    }
    const data = await image
      .grayscale()
      .normalise()
      .sharpen({ sigma: 1.5 })
      .threshold(BINARY_THRESHOLD)
      .png()
      .toBuffer();

    console.info('[Document] Image preprocessed', {
      source: document.source,
      width,
      height,
      bytes: data.length,
    });
    return { data, mimeType: 'image/png', source: document.source };
  } catch (error) {
    console.warn('[Document] Preprocessing failed, sending the original image', {
      source: document.source,
      error: error instanceof Error ? error.message : error,
    });
    return document;
  }
};
