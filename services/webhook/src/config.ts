import { z } from 'zod';
import type { GateThresholds } from './decision';

export const THREECOMMAS_BASE_URL = 'https://api.3commas.io/public/api';

// Unset and empty variables both fall back to the default.
const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);
const num = (def: number) => z.preprocess(blankToUndefined, z.coerce.number().finite().default(def));
const str = (def = '') => z.string().default(def);

const Env = z
  .object({
    PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(65535).default(5000)),
    TV_WEBHOOK_TOKEN: str(),
    THREECOMMAS_API_KEY: str(),
    THREECOMMAS_API_SECRET: str(),
    THREECOMMAS_BOT_ID: z.string().trim().regex(/^\d*$/, 'must be a numeric bot id').default(''),
    THREECOMMAS_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(THREECOMMAS_BASE_URL)),
    DRY_RUN: str('false').transform((v) => v.trim().toLowerCase() === 'true'),
    SENTIMENT_PROVIDER: z.preprocess(blankToUndefined, z.enum(['lexicon', 'claude']).default('lexicon')),
    ANTHROPIC_API_KEY: str(),
    CLAUDE_SENTIMENT_MODEL: z.preprocess(blankToUndefined, z.string().default('claude-3-haiku-20240307')),
    SENTIMENT_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(15_000)),
    LEXICON_SCALE: z.preprocess(blankToUndefined, z.coerce.number().positive().default(1)),
    BUY_THRESHOLD: num(0.2),
    SELL_THRESHOLD: num(-0.2),
    MIN_CONFIDENCE: num(60),
    DEAL_MESSAGE_PREFIX: str('TV+FinBERT'),
    LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'))
  })
  .superRefine((env, ctx) => {
    if (env.SENTIMENT_PROVIDER === 'claude' && !env.ANTHROPIC_API_KEY) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['ANTHROPIC_API_KEY'], message: 'required when SENTIMENT_PROVIDER=claude' });
    }
  });

export type SentimentProvider = 'lexicon' | 'claude';

export interface SentimentConfig {
  readonly provider: SentimentProvider;
  readonly anthropicApiKey: string;
  readonly model: string;
  readonly timeoutMs: number;
  readonly lexiconScale: number;
}

export interface ThreeCommasConfig {
  readonly apiKey: string;
  readonly apiSecret: string;
  readonly botId: number | undefined;
  readonly baseUrl: string;
}

export interface AppConfig {
  readonly port: number;
  readonly webhookToken: string;
  readonly dryRun: boolean;
  readonly threeCommas: ThreeCommasConfig;
  readonly sentiment: SentimentConfig;
  readonly gates: GateThresholds;
  readonly dealMessagePrefix: string;
  readonly logLevel: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Builds the process-wide configuration from environment variables.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = Env.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;
  return Object.freeze({
    port: e.PORT,
    webhookToken: e.TV_WEBHOOK_TOKEN,
    dryRun: e.DRY_RUN,
    threeCommas: Object.freeze({
      apiKey: e.THREECOMMAS_API_KEY,
      apiSecret: e.THREECOMMAS_API_SECRET,
      botId: e.THREECOMMAS_BOT_ID ? Number(e.THREECOMMAS_BOT_ID) : undefined,
      baseUrl: e.THREECOMMAS_BASE_URL.replace(/\/+$/, '')
    }),
    sentiment: Object.freeze({
      provider: e.SENTIMENT_PROVIDER,
      anthropicApiKey: e.ANTHROPIC_API_KEY,
      model: e.CLAUDE_SENTIMENT_MODEL,
      timeoutMs: e.SENTIMENT_TIMEOUT_MS,
      lexiconScale: e.LEXICON_SCALE
    }),
    gates: Object.freeze({
      buyThreshold: e.BUY_THRESHOLD,
      sellThreshold: e.SELL_THRESHOLD,
      minConfidence: e.MIN_CONFIDENCE
    }),
    dealMessagePrefix: e.DEAL_MESSAGE_PREFIX,
    logLevel: e.LOG_LEVEL
  });
}

export function isTradingConfigured(cfg: ThreeCommasConfig): cfg is ThreeCommasConfig & { botId: number } {
  return Boolean(cfg.apiKey && cfg.apiSecret && cfg.botId !== undefined);
}
