import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { DryRunDealer } from "./DryRunDealer";
import type { IDealStarter } from "./IDealStarter";
import { ThreeCommasDealer } from "./ThreeCommasDealer";

export function createDealStarter(cfg: AppConfig, log: Logger, fetchImpl?: typeof fetch): IDealStarter {
  if (cfg.dryRun) return new DryRunDealer(log);
  const { apiKey, apiSecret, baseUrl } = cfg.threeCommas;
  return new ThreeCommasDealer({ apiKey, apiSecret, baseUrl, log, fetchImpl });
}

export type { IDealStarter } from "./IDealStarter";
