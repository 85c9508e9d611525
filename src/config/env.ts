import { config } from 'dotenv';
import fs from 'fs';
import path from 'path';

const envFile = process.env.NODE_ENV === 'test' ? '.env.test' : '.env';
config({ path: path.resolve(process.cwd(), envFile) });

const uploadDir = process.env.UPLOAD_DIR ?? path.resolve(process.cwd(), 'uploads');
if (!fs.existsSync(uploadDir)) {
  fs.mkdirSync(uploadDir, { recursive: true });
}

const numberFromEnv = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Environment variable ${name} must be numeric, received "${raw}"`);
  }
  return value;
};

const booleanFromEnv = (name: string, fallback: boolean): boolean => {
  const raw = process.env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  return raw === 'true' || raw === '1';
};

export const env = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  port: numberFromEnv('PORT', 5000),
  sqlitePath: process.env.SQLITE_PATH ?? ':memory:',
  uploadDir,
  googleApiKey: process.env.GOOGLE_API_KEY ?? '',
  geminiModel: process.env.GEMINI_MODEL ?? 'gemini-2.0-flash',
  fuzzyMatchThreshold: numberFromEnv('FUZZY_MATCH_THRESHOLD', 0.85),
  // minor currency units
  amountEpsilon: numberFromEnv('AMOUNT_EPSILON', 1),
  requestTimeoutMs: numberFromEnv('REQUEST_TIMEOUT_MS', 30_000),
  maxDocumentSize: numberFromEnv('MAX_DOCUMENT_SIZE', 50 * 1024 * 1024),
  visionMaxRetries: numberFromEnv('VISION_MAX_RETRIES', 2),
  visionRetryDelayMs: numberFromEnv('VISION_RETRY_DELAY_MS', 500),
  preprocessImages: booleanFromEnv('PREPROCESS_IMAGES', true),
};
