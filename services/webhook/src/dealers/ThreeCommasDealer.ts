import type { Logger } from "pino";
import type { DealResponse, JsonValue, RawDealResponse } from "@sentigate/schemas";
import { type IDealStarter, toDealRequest } from "./IDealStarter";
import { Signer } from "./Signer";

export const START_DEAL_PATH = "/ver1/bots/start_deal";
export const START_DEAL_TIMEOUT_MS = 20_000;

export type ThreeCommasDealerOptions = {
  apiKey: string;
  apiSecret: string;
  baseUrl: string;
  log: Logger;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

/**
 * Live start_deal call. Non-2xx answers are returned as-is; only transport
 * failures and the timeout reject.
 */
export class ThreeCommasDealer implements IDealStarter {
  private readonly signer: Signer;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(private readonly opts: ThreeCommasDealerOptions) {
    this.signer = new Signer(opts.apiSecret);
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.timeoutMs = opts.timeoutMs ?? START_DEAL_TIMEOUT_MS;
  }

  async startDeal(botId: number, pair: string, message: string): Promise<DealResponse> {
    // start_deal takes its parameters in the JSON body, so the signed query is empty.
    const query = "";
    const payload = toDealRequest(botId, pair, message);
    const res = await this.fetchImpl(this.opts.baseUrl + START_DEAL_PATH, {
      method: "POST",
      headers: {
        APIKEY: this.opts.apiKey,
        Signature: this.signer.sign(query),
        "Content-Type": "application/json"
      },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(this.timeoutMs)
    });
    const text = await res.text();
    const data = parseBody(res.status, text);
    this.opts.log.info({ pair, status: res.status, response: data }, "3Commas response");
    return data;
  }
}

function parseBody(status: number, text: string): JsonValue | RawDealResponse {
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch {
    return { status_code: status, text };
  }
}
