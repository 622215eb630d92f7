import type { Logger } from "pino";
import type { DryRunResponse } from "@sentigate/schemas";
import { type IDealStarter, toDealRequest } from "./IDealStarter";

export class DryRunDealer implements IDealStarter {
  constructor(private readonly log: Logger) {}

  async startDeal(botId: number, pair: string, message: string): Promise<DryRunResponse> {
    const payload = toDealRequest(botId, pair, message);
    this.log.info({ payload }, "DRY_RUN: would call 3Commas start_deal");
    return { status: "dry_run" };
  }
}
