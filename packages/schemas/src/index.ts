import { z } from 'zod';

// TradingView templates often quote placeholders ("{{strategy.confidence}}"), so numeric strings are accepted.
const Confidence = z.preprocess(
  (v) => (typeof v === 'string' ? (v.trim() === '' ? undefined : Number(v)) : v),
  z.number().finite().optional()
);

export const Alert = z.object({
  token: z.string().catch(''),
  symbol: z.string().min(1),
  exchange: z.string().default('BINANCE').transform((s) => s.toUpperCase()),
  side: z.string().default('').transform((s) => s.toLowerCase()),
  note: z.string().nullish().transform((v) => v ?? ''),
  confidence: Confidence
});
export type Alert = z.infer<typeof Alert>;

export const SentimentLabel = z.object({
  label: z.string().min(1),
  score: z.number().min(0).max(1)
});
export type SentimentLabel = z.infer<typeof SentimentLabel>;

export const DEAL_MESSAGE_MAX_CHARS = 240;

export const DealRequest = z.object({
  bot_id: z.number().int(),
  pair: z.string().min(1),
  message: z.string()
});
export type DealRequest = z.infer<typeof DealRequest>;

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type DryRunResponse = { status: 'dry_run' };

/** Returned when the 3Commas body is not JSON. */
export type RawDealResponse = { status_code: number; text: string };

export type DealResponse = DryRunResponse | RawDealResponse | JsonValue;

export type WebhookBody =
  | { ok: true; action: 'skipped'; reason: string }
  | { ok: true; action: 'deal_started'; threecommas: DealResponse }
  | { ok: false; error: string; details?: string[]; message?: string };
