import { DEAL_MESSAGE_MAX_CHARS, DealRequest, type DealResponse } from "@sentigate/schemas";
import { truncateChars } from "../utils/text";

export type { DealRequest, DealResponse };

export interface IDealStarter {
  startDeal(botId: number, pair: string, message: string): Promise<DealResponse>;
}

export function toDealRequest(botId: number, pair: string, message: string): DealRequest {
  return DealRequest.parse({ bot_id: botId, pair, message: truncateChars(message, DEAL_MESSAGE_MAX_CHARS) });
}
