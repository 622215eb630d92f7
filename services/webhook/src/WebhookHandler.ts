import { timingSafeEqual } from "crypto";
import type { Logger } from "pino";
import { z } from "zod";
import { Alert, type WebhookBody } from "@sentigate/schemas";
import { type AppConfig, isTradingConfigured } from "./config";
import { decide, derivePair } from "./decision";
import type { IDealStarter } from "./dealers";
import type { AlertOutcome } from "./metrics";
import type { TextScorer } from "./SentimentScorer";

export type WebhookResult = {
  status: number;
  body: WebhookBody;
  outcome: AlertOutcome;
};

export type WebhookHandlerDeps = {
  config: AppConfig;
  scorer: TextScorer;
  dealer: IDealStarter;
  log: Logger;
};

export function tokensMatch(expected: string, provided: string): boolean {
  const a = Buffer.from(expected, "utf8");
  const b = Buffer.from(provided, "utf8");
  return a.length === b.length && timingSafeEqual(a, b);
}

const JsonObject = z.record(z.unknown());

function parseObject(raw: string): Record<string, unknown> | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  const obj = JsonObject.safeParse(data);
  return obj.success ? obj.data : null;
}

/**
 * TradingView alert -> sentiment gates -> 3Commas start_deal.
 * Scorer and dealer failures reject; the server turns them into a 500.
 */
export class WebhookHandler {
  constructor(private readonly deps: WebhookHandlerDeps) {}

  async handle(rawBody: string, log: Logger = this.deps.log): Promise<WebhookResult> {
    const { config, scorer, dealer } = this.deps;

    const data = parseObject(rawBody);
    if (!data) return { status: 400, body: { ok: false, error: "invalid JSON" }, outcome: "invalid_json" };

    const token = typeof data.token === "string" ? data.token : "";
    if (config.webhookToken && !tokensMatch(config.webhookToken, token)) {
      log.warn("rejected alert with bad token");
      return { status: 401, body: { ok: false, error: "bad token" }, outcome: "bad_token" };
    }

    const parsed = Alert.safeParse(data);
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
      return { status: 400, body: { ok: false, error: "invalid alert", details }, outcome: "invalid_alert" };
    }
    const { symbol, exchange, side, note, confidence } = parsed.data;
    const pair = derivePair(exchange, symbol);

    const sentiment = await scorer.score(note);
    const { shouldTrade, reason } = decide(side, sentiment, confidence, config.gates);

    log.info({ pair, side, sentiment, confidence, note, reason, shouldTrade }, "[TV] alert evaluated");

    if (!shouldTrade) return { status: 200, body: { ok: true, action: "skipped", reason }, outcome: "skipped" };

    const tc = config.threeCommas;
    if (!isTradingConfigured(tc)) {
      return {
        status: 500,
        body: { ok: false, error: "3Commas API not configured (API key/secret/bot id)" },
        outcome: "not_configured"
      };
    }

    const threecommas = await dealer.startDeal(tc.botId, pair, `${config.dealMessagePrefix}: ${side} (${reason})`);
    return { status: 200, body: { ok: true, action: "deal_started", threecommas }, outcome: "deal_started" };
  }
}
