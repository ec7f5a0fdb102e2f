import dotenv from 'dotenv';
import { ExtractorKind } from '../services/extraction';
dotenv.config();

function required(key: string): string {
  const val = process.env[key];
  if (!val) throw new Error(`Missing required env var: ${key}`);
  return val;
}

function extractorKind(): ExtractorKind {
  const val = (process.env.EXTRACTOR || 'openai').toLowerCase();
  if (val !== 'openai' && val !== 'rules') {
    throw new Error(`Invalid EXTRACTOR: ${val} (expected "openai" or "rules")`);
  }
  return val;
}

function positiveInt(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const val = parseInt(raw, 10);
  if (!Number.isInteger(val) || val <= 0) throw new Error(`Invalid ${key}: ${raw} (expected a positive integer)`);
  return val;
}

const kind = extractorKind();

export const config = {
  port: parseInt(process.env.PORT || '3000', 10),
  nodeEnv: process.env.NODE_ENV || 'development',
  sessions: {
    idleTtlMs: positiveInt('SESSION_IDLE_TTL_MS', 30 * 60_000),
    completedTtlMs: positiveInt('SESSION_COMPLETED_TTL_MS', 5 * 60_000),
  },
  extractor: {
    kind,
    timeoutMs: positiveInt('EXTRACTION_TIMEOUT_MS', 20_000),
    enrichRecommendation: process.env.ENRICH_RECOMMENDATION === 'true',
    openai: {
      apiKey: kind === 'openai' ? required('OPENAI_API_KEY') : process.env.OPENAI_API_KEY || '',
      model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
      baseURL: process.env.OPENAI_BASE_URL || undefined,
    },
  },
};
