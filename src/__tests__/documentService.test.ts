import fs from 'fs';
import os from 'os';
import path from 'path';
import sharp from 'sharp';

const mockGet = jest.fn();

jest.mock('axios', () => {
  const actual = jest.requireActual('axios');
  return {
    __esModule: true,
    default: {
      get: (...args: unknown[]) => mockGet(...args),
      isAxiosError: actual.isAxiosError,
    },
  };
});

import { DocumentError } from '../errors';
import {
  decodeDataUrl,
  loadDocument,
  loadUploadedDocument,
  preprocessForHandwriting,
  sniffMimeType,
  type LoadedDocument,
} from '../services/documentService';

const png = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d]);
const pdf = Buffer.from('%PDF-1.7\n%test\n');
const options = { timeoutMs: 1000, maxBytes: 1024 };

const expectDocumentError = async (promise: Promise<unknown>, status: number, message: string) => {
  await expect(promise).rejects.toBeInstanceOf(DocumentError);
  await expect(promise).rejects.toMatchObject({ status, message });
};

describe('documentService', () => {
  it('sniffs supported formats from magic bytes', () => {
    expect(sniffMimeType(pdf)).toBe('application/pdf');
    expect(sniffMimeType(png)).toBe('image/png');
    expect(sniffMimeType(Buffer.from([0xff, 0xd8, 0xff, 0xe0]))).toBe('image/jpeg');
    expect(sniffMimeType(Buffer.from('GIF89a'))).toBe('image/gif');
    expect(sniffMimeType(Buffer.from('RIFF\0\0\0\0WEBPVP8 '))).toBe('image/webp');
    expect(sniffMimeType(Buffer.from('RIFF\0\0\0\0WAVEfmt '))).toBeNull();
    expect(sniffMimeType(Buffer.from('hello'))).toBeNull();
  });

  it('decodes base64 data URLs', () => {
    expect(decodeDataUrl(`data:image/png;base64,${png.toString('base64')}`)).toEqual(png);
    expect(() => decodeDataUrl('data:image/png,abc')).toThrow(
      'Invalid data URL format: only base64 payloads are supported'
    );
    expect(() => decodeDataUrl('data:image/png;base64')).toThrow(
      'Invalid data URL format: missing payload'
    );
  });

  it('loads a data URL document', async () => {
    const document = await loadDocument(`data:image/png;base64,${png.toString('base64')}`, options);

    expect(document).toEqual({ data: png, mimeType: 'image/png', source: 'data URL' });
    expect(mockGet).not.toHaveBeenCalled();
  });

  it('rejects unsupported formats and oversized documents', async () => {
    await expectDocumentError(
      loadDocument('data:text/plain;base64,aGVsbG8=', options),
      400,
      'Unsupported document format; expected PDF, PNG, JPEG, GIF or WEBP'
    );
    await expectDocumentError(
      loadDocument(`data:image/png;base64,${png.toString('base64')}`, { ...options, maxBytes: 4 }),
      413,
      'Document is 12 bytes, larger than the 4 byte limit'
    );
    await expectDocumentError(
      loadDocument('ftp://example.com/bill.pdf', options),
      400,
      'Document must be an http(s) URL or a base64 data URL'
    );
  });

  it('downloads http documents as binary', async () => {
    mockGet.mockResolvedValue({ data: pdf });

    const document = await loadDocument('https://example.com/bill.pdf', options);

    expect(mockGet).toHaveBeenCalledWith('https://example.com/bill.pdf', {
      responseType: 'arraybuffer',
      timeout: 1000,
      maxContentLength: 1024,
    });
    expect(document.mimeType).toBe('application/pdf');
    expect(document.source).toBe('https://example.com/bill.pdf');
  });

  it('reports download failures as document errors', async () => {
    mockGet.mockRejectedValue(
      Object.assign(new Error('Request failed with status code 404'), {
        isAxiosError: true,
        response: { status: 404 },
      })
    );

    await expectDocumentError(
      loadDocument('https://example.com/missing.png', options),
      400,
      'Failed to fetch document (HTTP 404): Request failed with status code 404'
    );
  });

  it('reads uploaded files and removes them', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bill-upload-'));
    const filePath = path.join(dir, 'upload-1');
    fs.writeFileSync(filePath, png);

    const document = await loadUploadedDocument({ path: filePath, originalname: 'page1.png' }, 1024);

    expect(document).toEqual({ data: png, mimeType: 'image/png', source: 'page1.png' });
    expect(fs.existsSync(filePath)).toBe(false);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});

const gradientPng = (width: number, height: number) => {
  const pixels = Buffer.alloc(width * height);
  for (let index = 0; index < pixels.length; index += 1) {
    pixels[index] = Math.round(((index % width) / width) * 255);
  }
  return sharp(pixels, { raw: { width, height, channels: 1 } }).png().toBuffer();
};

describe('preprocessForHandwriting', () => {
  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('sends PDFs unchanged', async () => {
    const document: LoadedDocument = { data: pdf, mimeType: 'application/pdf', source: 'bill.pdf' };

    await expect(preprocessForHandwriting(document)).resolves.toBe(document);
  });

  it('binarises page images into PNG', async () => {
    const document: LoadedDocument = {
      data: await sharp(await gradientPng(40, 20)).jpeg().toBuffer(),
      mimeType: 'image/jpeg',
      source: 'scan.jpg',
    };

    const prepared = await preprocessForHandwriting(document);

    expect(prepared.mimeType).toBe('image/png');
    expect(prepared.source).toBe('scan.jpg');
    const metadata = await sharp(prepared.data).metadata();
    expect(metadata.format).toBe('png');
    expect([metadata.width, metadata.height]).toEqual([40, 20]);
    const pixels = await sharp(prepared.data).raw().toBuffer();
    expect([...new Set(pixels)].sort((a, b) => a - b)).toEqual([0, 255]);
  });

  it('downscales pages larger than 4096 pixels', async () => {
    const document: LoadedDocument = {
      data: await gradientPng(5000, 10),
      mimeType: 'image/png',
      source: 'long-receipt.png',
    };

    const prepared = await preprocessForHandwriting(document);

    const metadata = await sharp(prepared.data).metadata();
    expect(metadata.width).toBe(4096);
    expect(metadata.height).toBeLessThanOrEqual(10);
  });

  it('sends an image sharp cannot decode unchanged', async () => {
    const document: LoadedDocument = { data: png, mimeType: 'image/png', source: 'page1.png' };

    await expect(preprocessForHandwriting(document)).resolves.toBe(document);
    expect(console.warn).toHaveBeenCalledWith(
      '[Document] Preprocessing failed, sending the original image',
      expect.objectContaining({ source: 'page1.png' })
    );
  });
});
