import { formatPercent, toFixed2 } from "./utils/text";

export interface GateThresholds {
  /** Sentiment must be strictly above this to allow a buy. */
  buyThreshold: number;
  /** Sentiment must be strictly below this to allow a sell. */
  sellThreshold: number;
  /** A supplied, nonzero TradingView confidence under this blocks the trade. */
  minConfidence: number;
}

export const DEFAULT_GATES: GateThresholds = { buyThreshold: 0.2, sellThreshold: -0.2, minConfidence: 60 };

export type Decision = {
  shouldTrade: boolean;
  reason: string;
};

export function derivePair(exchange: string, symbol: string): string {
  return symbol.includes(":") ? symbol : `${exchange}:${symbol}`;
}

export function alignmentGate(side: string, sentiment: number, gates: GateThresholds = DEFAULT_GATES): Decision {
  const s = toFixed2(sentiment);
  if (side === "buy" && sentiment > gates.buyThreshold) return { shouldTrade: true, reason: `BUY allowed (sentiment ${s})` };
  if (side === "sell" && sentiment < gates.sellThreshold) return { shouldTrade: true, reason: `SELL allowed (sentiment ${s})` };
  return { shouldTrade: false, reason: `Blocked by sentiment ${s}` };
}

// Confidence 0 is indistinguishable from "not supplied" and never blocks.
export function confidenceGate(decision: Decision, confidence: number | undefined, gates: GateThresholds = DEFAULT_GATES): Decision {
  if (confidence === undefined || confidence === 0 || confidence >= gates.minConfidence) return decision;
  return { shouldTrade: false, reason: `${decision.reason} | low TV confidence ${formatPercent(confidence)}%` };
}

export function decide(side: string, sentiment: number, confidence: number | undefined, gates: GateThresholds = DEFAULT_GATES): Decision {
  return confidenceGate(alignmentGate(side, sentiment, gates), confidence, gates);
}
